// @tasksnap/core entry point
export * from './errors/errors.js';
export * from './config/config.defaults.js';
export * from './config/config.loader.js';
export { storageLayout, ensureStorage, STORAGE_DIR } from './storage/storage.layout.js';
export type { StorageLayout } from './storage/storage.layout.js';
export { writeFileAtomic } from './fs/atomic.write.js';
export { normalizeProjectPath, toProjectRelative } from './fs/path.utils.js';
export { walkFiles, isIgnored } from './fs/tree.walker.js';
export { HistoryLogger } from './history/history.logger.js';
// Snapshots
export {
  SnapshotStore,
  SNAPSHOT_SCHEMA_VERSION,
  formatSnapshotId,
  isSnapshotId,
  parseSnapshotMeta,
} from './snapshots/snapshot.store.js';
export type {
  SnapshotStoreOptions,
  CreateSnapshotOptions,
  CreatedSnapshot,
  ListSnapshotsOptions,
} from './snapshots/snapshot.store.js';
// Diff + rollback
export { DiffEngine, compareFile, isBinary } from './diff/diff.engine.js';
export type { DiffEngineOptions } from './diff/diff.engine.js';
export { RollbackExecutor } from './rollback/rollback.executor.js';
export type { RollbackExecutorOptions } from './rollback/rollback.executor.js';
export { RollbackLock } from './rollback/rollback.lock.js';
export type { RollbackLockOptions } from './rollback/rollback.lock.js';
// Version control
export { GitVersionControl } from './vcs/git.vcs.js';
export { FakeVersionControl } from './vcs/fake.vcs.js';
export type { FakeVersionControlOptions } from './vcs/fake.vcs.js';
export type { VersionControl, NativeCapture, CommitResult } from './vcs/vcs.types.js';
// Tasks
export { TaskStore, isTaskId, TASK_SCHEMA_VERSION } from './tasks/task.store.js';
export { TaskCoordinator, canTransition, deriveTitle } from './tasks/task.coordinator.js';
export type {
  TaskCoordinatorOptions,
  StartTaskInput,
  FinishTaskOptions,
} from './tasks/task.coordinator.js';
export { generateCommitMessage } from './tasks/commit.message.js';
export { commandValidator, passingValidator, outputToFindings } from './validation/validation.runner.js';
export type { Validator, ValidationContext } from './validation/validation.runner.js';
export { renderBrief, parseBrief, slugify } from './briefs/task.brief.js';
export { FsBriefArchiver, archiveStamp } from './briefs/brief.archiver.js';
export type { BriefArchiver, ArchiveOptions } from './briefs/brief.archiver.js';
// Runtime
export { createRuntime } from './runtime.js';
export type { Runtime, RuntimeOverrides } from './runtime.js';
