import React from 'react';
import { Box, Text } from 'ink';
import type { FileDiff } from '@tasksnap/shared';
import { THEME } from '../theme.js';
import { changeColor, changeMark, patchLineColor } from '../format.js';

interface DiffViewProps {
  snapshotId: string;
  diffs: FileDiff[];
  /** Print unified patches below the file list. */
  showPatches?: boolean;
}

export const DiffView: React.FC<DiffViewProps> = ({ snapshotId, diffs, showPatches = true }) => {
  const changed = diffs.filter((d) => d.change !== 'unchanged');

  return (
    <Box flexDirection="column">
      <Text bold color={THEME.primary}>
        ◆ DIFF {snapshotId} → working tree
      </Text>

      {changed.length === 0 ? (
        <Text color={THEME.textDim}>No differences.</Text>
      ) : (
        <Box flexDirection="column" marginTop={1}>
          {changed.map((d) => (
            <Text key={d.path} color={changeColor(d.change)}>
              {changeMark(d.change)} {d.path}
              {d.binary ? ' (binary)' : ''}
              {d.action === 'leave' ? ' (kept on rollback)' : ''}
            </Text>
          ))}
        </Box>
      )}

      {showPatches &&
        changed
          .filter((d) => d.patch !== null)
          .map((d) => (
            <Box key={`patch:${d.path}`} flexDirection="column" marginTop={1}>
              {(d.patch ?? '').split('\n').map((line, i) => (
                <Text key={i} color={patchLineColor(line)}>
                  {line}
                </Text>
              ))}
            </Box>
          ))}
    </Box>
  );
};
