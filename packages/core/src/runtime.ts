import * as path from 'node:path';
import type { TasksnapConfig } from '@tasksnap/shared';
import { FsBriefArchiver } from './briefs/brief.archiver.js';
import { DiffEngine } from './diff/diff.engine.js';
import { HistoryLogger } from './history/history.logger.js';
import { RollbackExecutor } from './rollback/rollback.executor.js';
import { SnapshotStore } from './snapshots/snapshot.store.js';
import { storageLayout } from './storage/storage.layout.js';
import { TaskCoordinator } from './tasks/task.coordinator.js';
import { TaskStore } from './tasks/task.store.js';
import { commandValidator, passingValidator } from './validation/validation.runner.js';
import { GitVersionControl } from './vcs/git.vcs.js';
import type { VersionControl } from './vcs/vcs.types.js';

export interface Runtime {
  projectRoot: string;
  config: TasksnapConfig;
  vcs: VersionControl;
  history: HistoryLogger;
  store: SnapshotStore;
  diff: DiffEngine;
  rollback: RollbackExecutor;
  tasks: TaskCoordinator;
  /** Apply logs.retention to the history log. */
  pruneHistory(): Promise<number>;
}

export interface RuntimeOverrides {
  vcs?: VersionControl;
  now?: () => number;
}

/**
 * Wire every component for one project from a loaded config.
 */
export function createRuntime(
  projectRoot: string,
  config: TasksnapConfig,
  overrides: RuntimeOverrides = {},
): Runtime {
  const root = path.resolve(projectRoot);
  const vcs = overrides.vcs ?? new GitVersionControl(root);

  const history = new HistoryLogger(storageLayout(root).logs);
  const store = new SnapshotStore(root, {
    mode: config.snapshots.mode,
    ignore: config.snapshots.ignore,
    vcs,
    history,
  });

  const deleteUntracked = config.rollback.delete_untracked;
  const diff = new DiffEngine(store, { deleteUntracked });
  const rollback = new RollbackExecutor(store, {
    deleteUntracked,
    lockTimeoutMs: config.rollback.lock_timeout_ms,
    history,
  });

  const command = config.validation.command;
  const tasks = new TaskCoordinator({
    projectRoot: root,
    store,
    tasks: new TaskStore(store.layout.tasks),
    vcs,
    validator: command
      ? commandValidator(command, { timeoutMs: config.validation.timeout_ms })
      : passingValidator,
    archiver: new FsBriefArchiver(path.resolve(root, config.briefs.dir), overrides.now),
    strictDirty: config.snapshots.strict_dirty,
    retention: config.snapshots.retention,
    archiveByBranch: config.archive.by_branch,
    archiveByTitle: config.archive.by_title,
    now: overrides.now,
  });

  return {
    projectRoot: root,
    config,
    vcs,
    history,
    store,
    diff,
    rollback,
    tasks,
    pruneHistory: () => history.pruneOldEntries(config.logs.retention),
  };
}
