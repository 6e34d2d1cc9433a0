/** How a snapshot's file content is held. */
export type CaptureMode =
  | { mode: 'file_copy' }
  | {
      mode: 'native';
      /** Commit sha holding the captured tree. */
      ref: string;
      /** `stash` when a stash commit was stored, `head` when the tree was clean. */
      baseline: 'stash' | 'head';
    };

export type CaptureModeName = CaptureMode['mode'];

export interface SnapshotMeta {
  schemaVersion: number;
  snapshotId: string;
  createdAt: number;
  label: string;
  taskId: string | null;
  /** Paths requested at capture time, relative to the project root. */
  roots: string[];
  /** Files actually captured, relative to the project root, POSIX separators. */
  files: string[];
  capture: CaptureMode;
  archivedAt: number | null;
}

export type FileChange = 'modified' | 'deleted' | 'added' | 'unchanged';

/**
 * What a rollback would do with the file:
 * `restore` writes snapshot content, `remove` deletes a file absent from the
 * snapshot (only when configured), `leave` keeps a file absent from the
 * snapshot, `none` means content already matches.
 */
export type RollbackAction = 'restore' | 'remove' | 'leave' | 'none';

export interface FileDiff {
  path: string;
  change: FileChange;
  action: RollbackAction;
  /** Unified patch from snapshot to working tree; null for binary or unchanged files. */
  patch: string | null;
  binary: boolean;
}

export interface RollbackRequest {
  snapshotId: string;
  paths?: string[];
  dryRun: boolean;
}

export interface FileWriteFailure {
  path: string;
  code: string;
  message: string;
}

export interface RollbackResult {
  snapshotId: string;
  dryRun: boolean;
  diffs: FileDiff[];
  restored: string[];
  removed: string[];
  unchanged: string[];
  /** Requested paths that matched nothing in the snapshot. */
  skipped: string[];
  errors: FileWriteFailure[];
}

export type HistoryAction = 'create' | 'rollback' | 'delete' | 'archive' | 'prune';

export interface HistoryEntry {
  action: HistoryAction;
  snapshotId: string;
  timestamp: number;
  details: Record<string, unknown>;
}
