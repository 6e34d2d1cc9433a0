import React from 'react';
import { Box, Text } from 'ink';
import type { SnapshotMeta } from '@tasksnap/shared';
import { THEME } from '../theme.js';
import { formatDate, truncate } from '../format.js';

interface SnapshotListProps {
  snapshots: SnapshotMeta[];
}

export const SnapshotList: React.FC<SnapshotListProps> = ({ snapshots }) => {
  if (snapshots.length === 0) {
    return <Text color={THEME.textDim}>No snapshots found.</Text>;
  }

  return (
    <Box flexDirection="column">
      <Text bold color={THEME.primary}>
        ◆ SNAPSHOTS ({snapshots.length})
      </Text>
      {snapshots.map((snap, i) => (
        <Box key={snap.snapshotId}>
          <Text color={i === 0 ? THEME.primary : THEME.text}>{snap.snapshotId}</Text>
          <Text color={THEME.textDim}>
            {'  '}
            {formatDate(snap.createdAt)}
            {'  '}
            {snap.capture.mode === 'native' ? 'git ' : 'copy'}
            {'  '}
            {String(snap.files.length).padStart(4)} file(s)
            {'  '}
          </Text>
          <Text>{truncate(snap.label, 48)}</Text>
          {i === 0 ? <Text color={THEME.dim}>{'  ← latest'}</Text> : null}
        </Box>
      ))}
    </Box>
  );
};
