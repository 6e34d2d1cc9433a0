import type { TasksnapConfig } from '@tasksnap/shared'

export const DEFAULT_CONFIG: TasksnapConfig = {
  snapshots: {
    mode: 'auto',
    retention: 10,
    strict_dirty: false,
    ignore: ['.git', 'node_modules'],
  },
  rollback: {
    delete_untracked: false,
    lock_timeout_ms: 5_000,
  },
  validation: {
    command: null,
    timeout_ms: 120_000,
  },
  briefs: {
    dir: 'docs/task-briefs',
  },
  archive: {
    by_branch: true,
    by_title: true,
  },
  logs: {
    retention: 200,
  },
}
