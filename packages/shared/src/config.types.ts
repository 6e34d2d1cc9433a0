export type SnapshotModeSetting = 'auto' | 'native' | 'file_copy';

export interface TasksnapConfig {
  snapshots: {
    mode: SnapshotModeSetting;
    /** Active snapshots kept after a task completes. */
    retention: number;
    /** Escalate a dirty working tree at task start to an error. */
    strict_dirty: boolean;
    /** Path segments never captured. */
    ignore: string[];
  };
  rollback: {
    delete_untracked: boolean;
    lock_timeout_ms: number;
  };
  validation: {
    command: string | null;
    timeout_ms: number;
  };
  briefs: {
    dir: string;
  };
  archive: {
    by_branch: boolean;
    by_title: boolean;
  };
  logs: {
    retention: number;
  };
}
