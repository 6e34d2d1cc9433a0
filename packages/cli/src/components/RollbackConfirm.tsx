import React from 'react';
import { Box, Text, useInput } from 'ink';
import type { FileDiff, SnapshotMeta } from '@tasksnap/shared';
import { THEME } from '../theme.js';
import { changeColor, changeMark, formatDate, truncate } from '../format.js';

interface RollbackConfirmProps {
  snapshot: SnapshotMeta;
  /** Only the files that will be written or removed. */
  plan: FileDiff[];
  onConfirm: () => void;
  onCancel: () => void;
}

export const RollbackConfirm: React.FC<RollbackConfirmProps> = ({
  snapshot,
  plan,
  onConfirm,
  onCancel,
}) => {
  useInput((input, key) => {
    if (input === 'y' || input === 'Y') {
      onConfirm();
    } else if (input === 'n' || input === 'N' || key.escape) {
      onCancel();
    }
  });

  return (
    <Box
      flexDirection="column"
      borderStyle="single"
      borderColor={THEME.warning}
      paddingX={2}
      paddingY={1}
    >
      <Text bold color={THEME.warning}>
        ⚠ ROLLBACK CONFIRMATION
      </Text>

      <Box marginTop={1}>
        <Text color={THEME.primary}>
          {snapshot.snapshotId}
          {'  '}
          {formatDate(snapshot.createdAt)}
          {'  '}
          {truncate(snapshot.label, 36)}
        </Text>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text color={THEME.warning}>
          This will overwrite {plan.length} file(s) in the working tree:
        </Text>
        {plan.map((d) => (
          <Text key={d.path} color={changeColor(d.change)}>
            {'    '}
            {d.action === 'remove' ? 'remove ' : 'restore'} {changeMark(d.change)} {d.path}
          </Text>
        ))}
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor={THEME.dimBorder} paddingX={1}>
        <Text color={THEME.warning}>Confirm rollback? </Text>
        <Text color={THEME.textDim}>
          <Text bold color={THEME.success}>
            Y
          </Text>
          es ·{' '}
          <Text bold color={THEME.error}>
            N
          </Text>
          o
        </Text>
      </Box>
    </Box>
  );
};
