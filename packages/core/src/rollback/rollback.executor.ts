import { EventEmitter } from 'node:events';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type {
  FileDiff,
  RollbackRequest,
  RollbackResult,
  SnapshotMeta,
  StorageWarning,
} from '@tasksnap/shared';
import { DiffEngine } from '../diff/diff.engine.js';
import { NotFoundError, WriteError, errnoCode, errorMessage } from '../errors/errors.js';
import { writeFileAtomic } from '../fs/atomic.write.js';
import { isWithin, normalizeProjectPath } from '../fs/path.utils.js';
import type { HistoryLogger } from '../history/history.logger.js';
import type { SnapshotStore } from '../snapshots/snapshot.store.js';
import { RollbackLock } from './rollback.lock.js';

export interface RollbackExecutorOptions {
  deleteUntracked?: boolean;
  lock?: RollbackLock;
  lockTimeoutMs?: number;
  history?: HistoryLogger | null;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface RollbackExecutor {
  on(event: 'file:restored', listener: (filePath: string) => void): this;
  on(event: 'file:removed', listener: (filePath: string) => void): this;
  on(event: 'file:error', listener: (error: WriteError) => void): this;
  on(event: 'warning', listener: (warning: StorageWarning) => void): this;

  emit(event: 'file:restored', filePath: string): boolean;
  emit(event: 'file:removed', filePath: string): boolean;
  emit(event: 'file:error', error: WriteError): boolean;
  emit(event: 'warning', warning: StorageWarning): boolean;
}

/**
 * Applies snapshot content back onto the working tree.
 *
 * Each file is written to a temporary sibling and renamed into place, so an
 * interrupted rollback never leaves a half-written file. Across files there is
 * no transaction: a failure on one file is recorded and the rest continue.
 * Re-running the same rollback is safe.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class RollbackExecutor extends EventEmitter {
  private readonly diffEngine: DiffEngine;
  private readonly lock: RollbackLock;
  private readonly history: HistoryLogger | null;

  constructor(
    private readonly store: SnapshotStore,
    options: RollbackExecutorOptions = {},
  ) {
    super();
    this.diffEngine = new DiffEngine(store, { deleteUntracked: options.deleteUntracked });
    this.lock =
      options.lock ?? new RollbackLock(store.layout.lockFile, { timeoutMs: options.lockTimeoutMs });
    this.history = options.history ?? null;
  }

  async rollback(request: RollbackRequest): Promise<RollbackResult> {
    const meta = await this.store.getSnapshot(request.snapshotId);
    await this.store.verify(meta);

    const root = this.store.projectRoot;
    const filters =
      request.paths && request.paths.length > 0
        ? [...new Set(request.paths.map((p) => normalizeProjectPath(p, root)))]
        : null;

    const diffs = await this.diffEngine.diffSnapshot(meta, filters ?? undefined);
    const skipped =
      filters?.filter((f) => !diffs.some((d) => d.action !== 'leave' && isWithin(d.path, f))) ?? [];

    const result: RollbackResult = {
      snapshotId: meta.snapshotId,
      dryRun: request.dryRun,
      diffs,
      restored: [],
      removed: [],
      unchanged: diffs.filter((d) => d.action === 'none').map((d) => d.path),
      skipped,
      errors: [],
    };

    if (request.dryRun) return result;

    await this.lock.withLock(async () => {
      for (const diff of diffs) {
        try {
          await this.apply(meta, diff, result);
        } catch (err) {
          const failure = new WriteError(diff.path, errnoCode(err), errorMessage(err));
          result.errors.push({ path: failure.path, code: failure.errno, message: failure.message });
          this.emit('file:error', failure);
        }
      }
    });

    // Files are already written at this point
    try {
      await this.history?.record('rollback', meta.snapshotId, {
        paths: filters,
        restored: result.restored.length,
        removed: result.removed.length,
        errors: result.errors.length,
      });
    } catch (err) {
      this.emit('warning', {
        kind: 'history_failed',
        message: `History entry for rollback of ${meta.snapshotId} was not written: ${errorMessage(err)}`,
      });
    }

    return result;
  }

  /**
   * Roll back to the most recent active snapshot.
   * @throws NotFoundError when there are no snapshots
   */
  async rollbackLatest(options: { paths?: string[]; dryRun: boolean }): Promise<RollbackResult> {
    const latest = await this.store.getLatestSnapshot();
    if (!latest) {
      throw new NotFoundError('snapshot', 'latest', 'No snapshots available for rollback');
    }
    return this.rollback({ snapshotId: latest.snapshotId, ...options });
  }

  private async apply(meta: SnapshotMeta, diff: FileDiff, result: RollbackResult): Promise<void> {
    const dest = path.join(this.store.projectRoot, diff.path);

    switch (diff.action) {
      case 'restore': {
        const content = await this.store.readFile(meta, diff.path);
        if (content === null) {
          throw new Error(`Snapshot ${meta.snapshotId} has no readable content for ${diff.path}`);
        }
        const mode = await this.store.fileMode(meta, diff.path);
        await writeFileAtomic(dest, content, mode ?? undefined);
        result.restored.push(diff.path);
        this.emit('file:restored', diff.path);
        return;
      }
      case 'remove':
        await fs.rm(dest, { force: true });
        result.removed.push(diff.path);
        this.emit('file:removed', diff.path);
        return;
      case 'leave':
      case 'none':
        return;
    }
  }
}
