export const TASK_TYPES = ['feature', 'fix', 'refactor', 'test', 'docs', 'chore', 'custom'] as const;

export type TaskType = (typeof TASK_TYPES)[number];

/**
 * open → validating → complete | failed
 * failed → validating (retry). Nothing leaves complete.
 */
export type TaskStatus = 'open' | 'validating' | 'complete' | 'failed';

export interface ValidationFinding {
  severity: 'error' | 'warning' | 'info';
  message: string;
}

export interface ValidationResult {
  passed: boolean;
  findings: ValidationFinding[];
}

export interface TaskRecord {
  schemaVersion: number;
  taskId: string;
  title: string;
  description: string;
  type: TaskType;
  files: string[];
  agent: string | null;
  snapshotId: string | null;
  branch: string | null;
  status: TaskStatus;
  createdAt: number;
  completedAt: number | null;
  /** Number of validation runs so far. */
  attempts: number;
  lastFindings: ValidationFinding[];
}

export interface DirtyTreeWarning {
  kind: 'dirty_tree';
  message: string;
  files: string[];
}

export interface CaptureFallbackWarning {
  kind: 'capture_fallback';
  message: string;
}

/** Bookkeeping that failed without affecting the operation's result. */
export interface StorageWarning {
  kind: 'history_failed' | 'unreadable_entry';
  message: string;
}

export type SnapshotWarning = CaptureFallbackWarning | StorageWarning;

export type TaskWarning = DirtyTreeWarning | SnapshotWarning;

export interface StartTaskResult {
  record: TaskRecord;
  warnings: TaskWarning[];
  briefPath: string | null;
}

export interface CommitOutcome {
  committed: boolean;
  message: string;
  /** Set when git reported nothing to commit. */
  nothingToCommit: boolean;
  /** Why the commit failed; the task stays complete either way. */
  error: string | null;
}

export interface FinishResult {
  record: TaskRecord;
  passed: boolean;
  findings: ValidationFinding[];
  archivedBrief: string | null;
  commit: CommitOutcome | null;
}
