import React from 'react';
import { Box, Text } from 'ink';
import type { RollbackResult } from '@tasksnap/shared';
import { THEME } from '../theme.js';
import { actionable, changeMark, rollbackCounts } from '../format.js';

interface RollbackSummaryProps {
  result: RollbackResult;
}

export const RollbackSummary: React.FC<RollbackSummaryProps> = ({ result }) => {
  const ok = result.errors.length === 0;

  return (
    <Box flexDirection="column">
      <Text bold color={result.dryRun ? THEME.warning : ok ? THEME.success : THEME.error}>
        {result.dryRun ? '◇ DRY RUN' : ok ? '✓ ROLLED BACK' : '✗ ROLLBACK INCOMPLETE'} {result.snapshotId}
      </Text>

      {result.dryRun &&
        actionable(result.diffs).map((d) => (
          <Text key={d.path} color={THEME.textDim}>
            {'  '}
            {d.action === 'remove' ? 'would remove ' : 'would restore'} {changeMark(d.change)} {d.path}
          </Text>
        ))}

      {result.restored.map((p) => (
        <Text key={`r:${p}`} color={THEME.success}>
          {'  '}restored {p}
        </Text>
      ))}
      {result.removed.map((p) => (
        <Text key={`d:${p}`} color={THEME.warning}>
          {'  '}removed {p}
        </Text>
      ))}
      {result.errors.map((e) => (
        <Text key={`e:${e.path}`} color={THEME.error}>
          {'  '}failed {e.path}: {e.code} {e.message}
        </Text>
      ))}
      {result.skipped.length > 0 && (
        <Text color={THEME.warning}>
          {'  '}not in snapshot: {result.skipped.join(', ')}
        </Text>
      )}

      <Box marginTop={1}>
        <Text color={THEME.textDim}>{rollbackCounts(result)}</Text>
      </Box>
    </Box>
  );
};
