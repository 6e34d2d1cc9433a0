// @tasksnap/shared — barrel export
export type {
  CaptureMode,
  CaptureModeName,
  SnapshotMeta,
  FileChange,
  RollbackAction,
  FileDiff,
  RollbackRequest,
  FileWriteFailure,
  RollbackResult,
  HistoryAction,
  HistoryEntry,
} from './snapshot.types.js';
export { TASK_TYPES } from './task.types.js';
export type {
  TaskType,
  TaskStatus,
  TaskRecord,
  ValidationFinding,
  ValidationResult,
  DirtyTreeWarning,
  CaptureFallbackWarning,
  StorageWarning,
  SnapshotWarning,
  TaskWarning,
  StartTaskResult,
  CommitOutcome,
  FinishResult,
} from './task.types.js';
export type { FileLock } from './lock.types.js';
export type { SnapshotModeSetting, TasksnapConfig } from './config.types.js';
