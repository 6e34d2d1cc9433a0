import { EventEmitter } from 'node:events';
import * as crypto from 'node:crypto';
import type {
  FinishResult,
  StartTaskResult,
  TaskRecord,
  TaskStatus,
  TaskType,
  TaskWarning,
  ValidationResult,
} from '@tasksnap/shared';
import type { BriefArchiver } from '../briefs/brief.archiver.js';
import { renderBrief } from '../briefs/task.brief.js';
import {
  BriefExistsError,
  DirtyTreeError,
  NotFoundError,
  TaskStateError,
  TasksnapError,
  errorMessage,
} from '../errors/errors.js';
import { isIgnored } from '../fs/tree.walker.js';
import type { SnapshotStore } from '../snapshots/snapshot.store.js';
import type { VersionControl } from '../vcs/vcs.types.js';
import { passingValidator, type Validator } from '../validation/validation.runner.js';
import { generateCommitMessage } from './commit.message.js';
import { TASK_SCHEMA_VERSION, type TaskStore } from './task.store.js';

const TITLE_MAX = 50;

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface TaskCoordinatorOptions {
  projectRoot: string;
  store: SnapshotStore;
  tasks: TaskStore;
  vcs?: VersionControl | null;
  validator?: Validator;
  archiver?: BriefArchiver | null;
  /** Dirty working tree at task start becomes DirtyTreeError. */
  strictDirty?: boolean;
  /** Active snapshots kept once a task completes. */
  retention?: number;
  archiveByBranch?: boolean;
  archiveByTitle?: boolean;
  now?: () => number;
}

export interface StartTaskInput {
  description: string;
  type?: TaskType;
  files?: string[];
  title?: string;
  agent?: string | null;
  /** Overwrite an existing task brief. */
  force?: boolean;
  /** Set false to skip the snapshot. */
  snapshot?: boolean;
}

export interface FinishTaskOptions {
  commit?: boolean;
  message?: string;
  archive?: boolean;
  validate?: boolean;
}

/** Allowed status transitions. */
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  open: ['validating'],
  // A run interrupted mid-validation may be retried
  validating: ['validating', 'complete', 'failed'],
  failed: ['validating'],
  complete: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** First 50 characters of the description, with "..." when cut. */
export function deriveTitle(description: string): string {
  const oneLine = description.replace(/\s+/g, ' ').trim();
  return oneLine.length > TITLE_MAX ? `${oneLine.slice(0, TITLE_MAX)}...` : oneLine;
}

function taskIdFor(type: TaskType, ms: number): string {
  const iso = new Date(ms).toISOString();
  const stamp = `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
  return `task_${type}_${stamp}_${crypto.randomBytes(2).toString('hex')}`;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface TaskCoordinator {
  /** Emitted on every TaskRecord status change. */
  on(event: 'task:status', listener: (record: TaskRecord) => void): this;
  /** Emitted for non-fatal advisories such as a dirty working tree. */
  on(event: 'warning', listener: (warning: TaskWarning) => void): this;

  emit(event: 'task:status', record: TaskRecord): boolean;
  emit(event: 'warning', warning: TaskWarning): boolean;
}

// ---------------------------------------------------------------------------
// TaskCoordinator
// ---------------------------------------------------------------------------

/**
 * Binds snapshots to the task workflow:
 *
 *   startTask  → dirty check → snapshot → TaskRecord (open) → brief
 *   finishTask → validating → complete (archive brief + snapshot, prune, commit?)
 *                           → failed   (record kept, retry later)
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class TaskCoordinator extends EventEmitter {
  private readonly options: TaskCoordinatorOptions;
  private readonly vcs: VersionControl | null;
  private readonly validator: Validator;
  private readonly archiver: BriefArchiver | null;
  private readonly now: () => number;

  constructor(options: TaskCoordinatorOptions) {
    super();
    this.options = options;
    this.vcs = options.vcs ?? null;
    this.validator = options.validator ?? passingValidator;
    this.archiver = options.archiver ?? null;
    this.now = options.now ?? Date.now;
    options.tasks.on('warning', (warning) => this.emit('warning', warning));
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /**
   * Snapshot the task's files and open a TaskRecord.
   *
   * A dirty working tree produces a DirtyTreeWarning (or DirtyTreeError in
   * strict mode). Snapshot failures propagate and leave no record behind.
   */
  async startTask(input: StartTaskInput): Promise<StartTaskResult> {
    const description = input.description.trim();
    if (!description) {
      throw new TasksnapError('Task description is required', 'TASK_STATE');
    }
    const type = input.type ?? 'feature';
    const files = input.files ?? [];
    const warnings: TaskWarning[] = [];

    if (this.archiver && !input.force && (await this.archiver.hasLatest())) {
      throw new BriefExistsError(this.archiver.latestPath());
    }

    const vcsReady = this.vcs !== null && (await this.vcs.isAvailable());
    if (this.vcs && vcsReady) {
      const ignore = this.options.store.ignoreList();
      const dirty = (await this.vcs.changedFiles()).filter((f) => !isIgnored(f, ignore));
      if (dirty.length > 0) {
        if (this.options.strictDirty) throw new DirtyTreeError(dirty);
        warnings.push({
          kind: 'dirty_tree',
          message: `Working tree has ${dirty.length} uncommitted change(s); they are included in the snapshot`,
          files: dirty,
        });
      }
    }

    const createdAt = this.now();
    const taskId = taskIdFor(type, createdAt);

    let snapshotId: string | null = null;
    if (input.snapshot !== false) {
      const created = await this.options.store.createSnapshot(files, description, { taskId });
      snapshotId = created.meta.snapshotId;
      warnings.push(...created.warnings);
    }

    const record: TaskRecord = {
      schemaVersion: TASK_SCHEMA_VERSION,
      taskId,
      title: input.title?.trim() || deriveTitle(description),
      description,
      type,
      files,
      agent: input.agent ?? null,
      snapshotId,
      branch: this.vcs && vcsReady ? await this.vcs.currentBranch() : null,
      status: 'open',
      createdAt,
      completedAt: null,
      attempts: 0,
      lastFindings: [],
    };

    try {
      await this.options.tasks.save(record);
    } catch (err) {
      if (snapshotId) await this.options.store.deleteSnapshot(snapshotId);
      throw err;
    }

    let briefPath: string | null = null;
    if (this.archiver) {
      await this.archiver.writeLatest(renderBrief(record), true);
      briefPath = this.archiver.latestPath();
    }

    for (const warning of warnings) this.emit('warning', warning);
    this.emit('task:status', record);
    return { record, warnings, briefPath };
  }

  /**
   * Validate and, on success, complete a task.
   *
   * Validation failure is an ordinary outcome: the record moves to `failed`
   * and the result carries `passed: false` with the findings.
   * @throws TaskStateError when the task is already complete
   */
  async finishTask(taskId: string, options: FinishTaskOptions = {}): Promise<FinishResult> {
    let record = await this.options.tasks.get(taskId);

    if (options.commit && !(this.vcs && (await this.vcs.isAvailable()))) {
      throw new TasksnapError('Cannot commit: project is not a git checkout', 'TASK_STATE');
    }

    record = await this.transition(record, 'validating', { attempts: record.attempts + 1 });

    let validation: ValidationResult;
    try {
      validation =
        options.validate === false
          ? { passed: true, findings: [] }
          : await this.validator({ projectRoot: this.options.projectRoot, task: record });
    } catch (err) {
      await this.transition(record, 'failed', {
        lastFindings: [{ severity: 'error', message: `Validation crashed: ${errorMessage(err)}` }],
      });
      throw err;
    }

    if (!validation.passed) {
      record = await this.transition(record, 'failed', { lastFindings: validation.findings });
      return {
        record,
        passed: false,
        findings: validation.findings,
        archivedBrief: null,
        commit: null,
      };
    }

    record = await this.transition(record, 'complete', {
      completedAt: this.now(),
      lastFindings: validation.findings,
    });

    let archivedBrief: string | null = null;
    if (options.archive !== false && this.archiver) {
      archivedBrief = await this.archiver.archiveLatest({
        byBranch: this.options.archiveByBranch ?? true,
        byTitle: this.options.archiveByTitle ?? true,
        fallbackBranch: record.branch,
      });
    }

    await this.retainSnapshot(record);

    let commit: FinishResult['commit'] = null;
    if (options.commit && this.vcs) {
      const ignore = this.options.store.ignoreList();
      const changed = (await this.vcs.changedFiles()).filter((f) => !isIgnored(f, ignore));
      const message = options.message?.trim() || generateCommitMessage(record, changed);
      // The record is already complete, so a failed commit goes into the result
      try {
        const outcome = await this.vcs.commitAll(message);
        commit = {
          committed: outcome.committed,
          message,
          nothingToCommit: outcome.nothingToCommit,
          error: null,
        };
      } catch (err) {
        commit = { committed: false, message, nothingToCommit: false, error: errorMessage(err) };
      }
    }

    return { record, passed: true, findings: validation.findings, archivedBrief, commit };
  }

  async getTask(taskId: string): Promise<TaskRecord> {
    return this.options.tasks.get(taskId);
  }

  async listTasks(): Promise<TaskRecord[]> {
    return this.options.tasks.list();
  }

  /**
   * Apply snapshot retention, keeping every snapshot an unfinished task
   * still points at.
   */
  async pruneSnapshots(keep: number): Promise<string[]> {
    const tasks = await this.options.tasks.list();
    const protect = new Set<string>();
    for (const task of tasks) {
      if (task.status !== 'complete' && task.snapshotId) protect.add(task.snapshotId);
    }
    return this.options.store.pruneSnapshots(keep, protect);
  }

  /** Most recent task that is not complete, or null. */
  async latestOpenTask(): Promise<TaskRecord | null> {
    const tasks = await this.options.tasks.list();
    return tasks.find((t) => t.status !== 'complete') ?? null;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async transition(
    record: TaskRecord,
    to: TaskStatus,
    patch: Partial<Pick<TaskRecord, 'attempts' | 'completedAt' | 'lastFindings'>> = {},
  ): Promise<TaskRecord> {
    if (!canTransition(record.status, to)) {
      throw new TaskStateError(record.taskId, record.status, to);
    }
    const next: TaskRecord = { ...record, ...patch, status: to };
    await this.options.tasks.save(next);
    this.emit('task:status', next);
    return next;
  }

  /**
   * Archive the task's snapshot and apply the retention policy. A snapshot
   * removed by hand in the meantime is not an error.
   */
  private async retainSnapshot(record: TaskRecord): Promise<void> {
    const { store } = this.options;
    if (record.snapshotId) {
      try {
        await store.archiveSnapshot(record.snapshotId);
      } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
      }
    }
    if (this.options.retention !== undefined) {
      await this.pruneSnapshots(this.options.retention);
    }
  }
}
