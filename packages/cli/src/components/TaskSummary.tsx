import React from 'react';
import { Box, Text } from 'ink';
import type { FinishResult, StartTaskResult, TaskRecord, TaskWarning } from '@tasksnap/shared';
import { THEME } from '../theme.js';
import { formatDate, statusColor, truncate } from '../format.js';

const Warnings: React.FC<{ warnings: TaskWarning[] }> = ({ warnings }) => (
  <>
    {warnings.map((w, i) => (
      <Box key={i} flexDirection="column">
        <Text color={THEME.warning}>⚠ {w.message}</Text>
        {w.kind === 'dirty_tree' &&
          w.files.slice(0, 10).map((f) => (
            <Text key={f} color={THEME.textDim}>
              {'    '}
              {f}
            </Text>
          ))}
      </Box>
    ))}
  </>
);

export const TaskStarted: React.FC<{ result: StartTaskResult }> = ({ result }) => {
  const { record } = result;
  return (
    <Box flexDirection="column">
      <Warnings warnings={result.warnings} />
      <Text bold color={THEME.success}>
        ✓ Task started: {record.title}
      </Text>
      <Text color={THEME.textDim}>
        {'  '}id {record.taskId} · {record.type}
        {record.branch ? ` · ${record.branch}` : ''}
      </Text>
      <Text color={THEME.textDim}>{'  '}snapshot {record.snapshotId ?? 'none'}</Text>
      {result.briefPath && <Text color={THEME.textDim}>{'  '}brief {result.briefPath}</Text>}
    </Box>
  );
};

export const TaskFinished: React.FC<{ result: FinishResult }> = ({ result }) => {
  const { record } = result;
  return (
    <Box flexDirection="column">
      <Text bold color={result.passed ? THEME.success : THEME.error}>
        {result.passed ? '✓ Task complete' : '✗ Validation failed'}: {record.title}
      </Text>
      {result.findings.map((f, i) => (
        <Text
          key={i}
          color={f.severity === 'error' ? THEME.error : f.severity === 'warning' ? THEME.warning : THEME.textDim}
        >
          {'  '}
          {f.message}
        </Text>
      ))}
      {!result.passed && (
        <Text color={THEME.textDim}>
          {'  '}Fix the findings and run `tasksnap task finish` again (attempt {record.attempts}).
        </Text>
      )}
      {result.archivedBrief && <Text color={THEME.textDim}>{'  '}brief archived to {result.archivedBrief}</Text>}
      {result.commit && (
        <Text
          color={
            result.commit.error
              ? THEME.error
              : result.commit.committed
                ? THEME.success
                : THEME.textDim
          }
        >
          {'  '}
          {result.commit.error
            ? `commit failed: ${result.commit.error}`
            : result.commit.committed
              ? `committed: ${result.commit.message.split('\n')[0]}`
              : 'nothing to commit'}
        </Text>
      )}
    </Box>
  );
};

export const TaskList: React.FC<{ tasks: TaskRecord[] }> = ({ tasks }) => {
  if (tasks.length === 0) {
    return <Text color={THEME.textDim}>No tasks found.</Text>;
  }
  return (
    <Box flexDirection="column">
      <Text bold color={THEME.primary}>
        ◆ TASKS ({tasks.length})
      </Text>
      {tasks.map((t) => (
        <Box key={t.taskId}>
          <Text color={statusColor(t.status)}>{t.status.padEnd(10)}</Text>
          <Text color={THEME.textDim}>
            {formatDate(t.createdAt)}
            {'  '}
          </Text>
          <Text>{t.taskId}</Text>
          <Text color={THEME.textDim}>
            {'  '}
            {truncate(t.title, 40)}
          </Text>
        </Box>
      ))}
    </Box>
  );
};
