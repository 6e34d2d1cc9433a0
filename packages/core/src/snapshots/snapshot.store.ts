import { EventEmitter } from 'node:events';
import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type {
  CaptureMode,
  CaptureModeName,
  HistoryAction,
  SnapshotMeta,
  SnapshotModeSetting,
  SnapshotWarning,
  StorageWarning,
} from '@tasksnap/shared';
import {
  CaptureError,
  NotFoundError,
  SnapshotFormatError,
  errorMessage,
  isEnoent,
} from '../errors/errors.js';
import { normalizeProjectPath } from '../fs/path.utils.js';
import { isIgnored, readIfExists, walkFiles } from '../fs/tree.walker.js';
import { writeFileAtomic } from '../fs/atomic.write.js';
import type { HistoryLogger } from '../history/history.logger.js';
import { ensureStorage, storageLayout, type StorageLayout } from '../storage/storage.layout.js';
import { isRecord, isStringArray } from '../storage/guards.js';
import type { VersionControl } from '../vcs/vcs.types.js';

export const SNAPSHOT_SCHEMA_VERSION = 1;

const META_FILE = 'meta.json';
const FILES_DIR = 'files';
const STAGING_PREFIX = '.staging-';
const SNAPSHOT_ID_PATTERN = /^snap_\d{8}T\d{9}Z_[0-9a-f]{4}$/;
const FILE_COPY: CaptureMode = { mode: 'file_copy' };

export interface SnapshotStoreOptions {
  mode?: SnapshotModeSetting;
  ignore?: string[];
  vcs?: VersionControl | null;
  history?: HistoryLogger | null;
}

export interface CreateSnapshotOptions {
  taskId?: string | null;
}

export interface CreatedSnapshot {
  meta: SnapshotMeta;
  warnings: SnapshotWarning[];
}

export interface ListSnapshotsOptions {
  includeArchived?: boolean;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface SnapshotStore {
  on(event: 'snapshot:created', listener: (meta: SnapshotMeta) => void): this;
  on(event: 'snapshot:deleted', listener: (snapshotId: string) => void): this;
  on(event: 'warning', listener: (warning: SnapshotWarning) => void): this;

  emit(event: 'snapshot:created', meta: SnapshotMeta): boolean;
  emit(event: 'snapshot:deleted', snapshotId: string): boolean;
  emit(event: 'warning', warning: SnapshotWarning): boolean;
}

/** `snap_20260203T143022123Z_ab12` for the given epoch ms. */
export function formatSnapshotId(createdAt: number, suffix: string): string {
  const stamp = new Date(createdAt).toISOString().replace(/[-:.]/g, '');
  return `snap_${stamp}_${suffix}`;
}

export function isSnapshotId(value: string): boolean {
  return SNAPSHOT_ID_PATTERN.test(value);
}

function parseCapture(value: unknown): CaptureMode | null {
  if (!isRecord(value)) return null;
  const v = value;
  if (v['mode'] === 'file_copy') return { mode: 'file_copy' };
  if (
    v['mode'] === 'native' &&
    typeof v['ref'] === 'string' &&
    (v['baseline'] === 'stash' || v['baseline'] === 'head')
  ) {
    return { mode: 'native', ref: v['ref'], baseline: v['baseline'] };
  }
  return null;
}

/**
 * Validate a parsed meta.json. Unknown schema versions are rejected so a
 * newer on-disk format is never misread.
 */
export function parseSnapshotMeta(raw: string, file: string): SnapshotMeta {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new SnapshotFormatError(file, errorMessage(err));
  }
  if (!isRecord(data)) {
    throw new SnapshotFormatError(file, 'not an object');
  }
  const d = data;
  if (d['schemaVersion'] !== SNAPSHOT_SCHEMA_VERSION) {
    throw new SnapshotFormatError(file, `unsupported schemaVersion ${String(d['schemaVersion'])}`);
  }
  const { snapshotId, createdAt, label, taskId, roots, files, archivedAt } = d;
  const capture = parseCapture(d['capture']);
  if (
    typeof snapshotId !== 'string' ||
    typeof createdAt !== 'number' ||
    typeof label !== 'string' ||
    !(taskId === null || typeof taskId === 'string') ||
    !isStringArray(roots) ||
    !isStringArray(files) ||
    capture === null ||
    !(archivedAt === null || typeof archivedAt === 'number')
  ) {
    throw new SnapshotFormatError(file, 'missing or mistyped fields');
  }
  return {
    schemaVersion: SNAPSHOT_SCHEMA_VERSION,
    snapshotId,
    createdAt,
    label,
    taskId,
    roots,
    files,
    capture,
    archivedAt,
  };
}

/**
 * Persists point-in-time captures of file sets under `.tasksnap/snapshots/`.
 *
 * Layout per snapshot:
 *   snapshots/<snapshotId>/meta.json
 *   snapshots/<snapshotId>/files/<relativePath>   (file-copy mode only)
 *
 * Archived snapshots move, unchanged, to `.tasksnap/archive/<snapshotId>/`.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class SnapshotStore extends EventEmitter {
  readonly layout: StorageLayout;
  private readonly mode: SnapshotModeSetting;
  private readonly ignore: string[];
  private readonly vcs: VersionControl | null;
  private readonly history: HistoryLogger | null;

  constructor(
    readonly projectRoot: string,
    options: SnapshotStoreOptions = {},
  ) {
    super();
    this.layout = storageLayout(projectRoot);
    this.mode = options.mode ?? 'auto';
    this.ignore = [...(options.ignore ?? ['.git', 'node_modules'])];
    this.vcs = options.vcs ?? null;
    this.history = options.history ?? null;

    const storageRel = path.relative(projectRoot, this.layout.root).split(path.sep).join('/');
    if (!this.ignore.includes(storageRel)) this.ignore.push(storageRel);
  }

  /** Path segments and prefixes excluded from capture. */
  ignoreList(): readonly string[] {
    return this.ignore;
  }

  private activeDir(snapshotId: string): string {
    return path.join(this.layout.snapshots, snapshotId);
  }

  private archivedDir(snapshotId: string): string {
    return path.join(this.layout.archive, snapshotId);
  }

  private dirFor(meta: SnapshotMeta): string {
    return meta.archivedAt === null
      ? this.activeDir(meta.snapshotId)
      : this.archivedDir(meta.snapshotId);
  }

  // ---------------------------------------------------------------------------
  // Capture
  // ---------------------------------------------------------------------------

  /**
   * Capture every existing file under `paths` (the whole project when empty).
   * The snapshot is staged in a hidden directory and only becomes visible once
   * its metadata is complete. Publishing is a single rename; any failure before
   * it removes the staging area and throws CaptureError. History is written
   * after publishing and a failure there only produces a warning.
   */
  async createSnapshot(
    paths: readonly string[],
    label: string,
    options: CreateSnapshotOptions = {},
  ): Promise<CreatedSnapshot> {
    let roots: string[];
    try {
      roots = paths.length > 0 ? paths.map((p) => normalizeProjectPath(p, this.projectRoot)) : ['.'];
    } catch (err) {
      throw new CaptureError(errorMessage(err), { cause: err });
    }
    roots = [...new Set(roots)];

    try {
      await ensureStorage(this.layout);
    } catch (err) {
      throw new CaptureError(`Cannot prepare snapshot storage: ${errorMessage(err)}`, { cause: err });
    }

    let createdAt: number;
    try {
      createdAt = await this.nextCreatedAt();
    } catch (err) {
      throw new CaptureError(`Cannot read existing snapshots: ${errorMessage(err)}`, { cause: err });
    }
    const snapshotId = formatSnapshotId(createdAt, crypto.randomBytes(2).toString('hex'));
    const staging = path.join(this.layout.snapshots, `${STAGING_PREFIX}${snapshotId}`);
    const warnings: SnapshotWarning[] = [];

    let capture: CaptureMode = FILE_COPY;
    let files: string[] = [];
    let meta: SnapshotMeta;

    try {
      await fs.mkdir(staging, { recursive: true });

      const preferred = await this.chooseMode(roots, warnings);
      if (preferred === 'native' && this.vcs) {
        const native = await this.vcs.captureStash(label, roots);
        if (native) {
          capture = { mode: 'native', ref: native.ref, baseline: native.baseline };
          files = native.files.filter((f) => !isIgnored(f, this.ignore)).sort();
        } else {
          this.fallback(warnings, 'Working tree could not be stashed');
        }
      }

      if (capture.mode === 'file_copy') {
        files = await walkFiles(this.projectRoot, roots, this.ignore);
        for (const relativePath of files) {
          const dest = path.join(staging, FILES_DIR, relativePath);
          await fs.mkdir(path.dirname(dest), { recursive: true });
          await fs.copyFile(path.join(this.projectRoot, relativePath), dest);
        }
      }

      meta = {
        schemaVersion: SNAPSHOT_SCHEMA_VERSION,
        snapshotId,
        createdAt,
        label,
        taskId: options.taskId ?? null,
        roots,
        files,
        capture,
        archivedAt: null,
      };

      await fs.writeFile(path.join(staging, META_FILE), JSON.stringify(meta, null, 2), 'utf-8');
      await fs.rename(staging, this.activeDir(snapshotId));
    } catch (err) {
      const cleanup: string[] = [];
      await fs.rm(staging, { recursive: true, force: true }).catch((rmErr: unknown) => {
        cleanup.push(`staging cleanup failed: ${errorMessage(rmErr)}`);
      });
      if (capture.mode === 'native' && capture.baseline === 'stash' && this.vcs) {
        await this.vcs.dropStash(capture.ref).catch((dropErr: unknown) => {
          cleanup.push(`stash cleanup failed: ${errorMessage(dropErr)}`);
        });
      }
      const suffix = cleanup.length > 0 ? ` (${cleanup.join('; ')})` : '';
      throw new CaptureError(`Failed to capture snapshot: ${errorMessage(err)}${suffix}`, {
        cause: err,
      });
    }

    const logged = await this.record('create', snapshotId, {
      label,
      mode: capture.mode,
      files: files.length,
    });
    if (logged) warnings.push(logged);
    for (const warning of warnings) this.emit('warning', warning);
    this.emit('snapshot:created', meta);
    return { meta, warnings };
  }

  /**
   * Strictly increasing creation time, so ids and listing order never tie.
   */
  private async nextCreatedAt(): Promise<number> {
    const all = await this.listSnapshots({ includeArchived: true });
    const latest = all.length > 0 ? all[0].createdAt : 0;
    return Math.max(Date.now(), latest + 1);
  }

  private fallback(warnings: SnapshotWarning[], reason: string): void {
    if (this.mode === 'native') {
      warnings.push({
        kind: 'capture_fallback',
        message: `${reason}; falling back to file-copy snapshot`,
      });
    }
  }

  private async chooseMode(
    roots: string[],
    warnings: SnapshotWarning[],
  ): Promise<CaptureModeName> {
    if (this.mode === 'file_copy') return 'file_copy';

    if (!this.vcs || !(await this.vcs.isAvailable())) {
      this.fallback(warnings, 'Project is not a git checkout');
      return 'file_copy';
    }

    // Includes files git ignores: a stash would leave them out
    const untracked = (await this.vcs.untrackedFiles(roots)).filter(
      (f) => !isIgnored(f, this.ignore),
    );
    if (untracked.length > 0) {
      this.fallback(warnings, `${untracked.length} untracked or ignored file(s) cannot be stashed`);
      return 'file_copy';
    }

    return 'native';
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * List snapshots, newest first. Entries whose metadata cannot be parsed are
   * skipped with an `unreadable_entry` warning; `getSnapshot` still rejects them.
   */
  async listSnapshots(options: ListSnapshotsOptions = {}): Promise<SnapshotMeta[]> {
    const snapshots = await this.readAll(this.layout.snapshots);
    if (options.includeArchived) {
      snapshots.push(...(await this.readAll(this.layout.archive)));
    }

    snapshots.sort((a, b) =>
      b.createdAt !== a.createdAt
        ? b.createdAt - a.createdAt
        : b.snapshotId.localeCompare(a.snapshotId),
    );
    return snapshots;
  }

  async getLatestSnapshot(): Promise<SnapshotMeta | null> {
    const snapshots = await this.listSnapshots();
    return snapshots[0] ?? null;
  }

  /**
   * Metadata for a snapshot, active or archived.
   * @throws NotFoundError when the identifier is unknown
   */
  async getSnapshot(snapshotId: string): Promise<SnapshotMeta> {
    if (!isSnapshotId(snapshotId)) {
      throw new NotFoundError('snapshot', snapshotId);
    }
    for (const dir of [this.activeDir(snapshotId), this.archivedDir(snapshotId)]) {
      const file = path.join(dir, META_FILE);
      let raw: string;
      try {
        raw = await fs.readFile(file, 'utf-8');
      } catch (err) {
        if (isEnoent(err)) continue;
        throw err;
      }
      return parseSnapshotMeta(raw, file);
    }
    throw new NotFoundError('snapshot', snapshotId);
  }

  /**
   * Check that a snapshot's content is still reachable. A native snapshot
   * whose stash was dropped outside tasksnap is reported as not found.
   */
  async verify(meta: SnapshotMeta): Promise<void> {
    if (meta.capture.mode !== 'native') return;
    if (!this.vcs || !(await this.vcs.isAvailable())) {
      throw new NotFoundError(
        'snapshot',
        meta.snapshotId,
        `Snapshot ${meta.snapshotId} was captured with git, which is not available here`,
      );
    }
    if (!(await this.vcs.hasRef(meta.capture.ref, meta.capture.baseline))) {
      throw new NotFoundError(
        'snapshot',
        meta.snapshotId,
        `Snapshot ${meta.snapshotId} refers to ${meta.capture.baseline} ${meta.capture.ref}, which no longer exists`,
      );
    }
  }

  /**
   * Captured bytes of one file, or null when the snapshot does not hold it.
   */
  async readFile(meta: SnapshotMeta, relativePath: string): Promise<Buffer | null> {
    if (!meta.files.includes(relativePath)) return null;

    if (meta.capture.mode === 'native') {
      if (!this.vcs) {
        throw new NotFoundError('snapshot', meta.snapshotId, 'git is required to read this snapshot');
      }
      return this.vcs.readFile(meta.capture.ref, relativePath);
    }

    return readIfExists(path.join(this.dirFor(meta), FILES_DIR, relativePath));
  }

  /** Permission bits a captured file had, or null when unknown. */
  async fileMode(meta: SnapshotMeta, relativePath: string): Promise<number | null> {
    if (!meta.files.includes(relativePath)) return null;

    if (meta.capture.mode === 'native') {
      return this.vcs ? this.vcs.fileMode(meta.capture.ref, relativePath) : null;
    }

    try {
      const stat = await fs.stat(path.join(this.dirFor(meta), FILES_DIR, relativePath));
      return stat.mode & 0o777;
    } catch (err) {
      if (isEnoent(err)) return null;
      throw err;
    }
  }

  // ---------------------------------------------------------------------------
  // Retention
  // ---------------------------------------------------------------------------

  /**
   * Remove a snapshot and, for native captures, its stash entry.
   * Deleting an unknown snapshot is a no-op; returns whether anything was removed.
   */
  async deleteSnapshot(snapshotId: string): Promise<boolean> {
    let meta: SnapshotMeta;
    try {
      meta = await this.getSnapshot(snapshotId);
    } catch (err) {
      if (err instanceof NotFoundError) return false;
      throw err;
    }

    if (meta.capture.mode === 'native' && meta.capture.baseline === 'stash' && this.vcs) {
      await this.vcs.dropStash(meta.capture.ref);
    }
    await fs.rm(this.dirFor(meta), { recursive: true, force: true });

    await this.recordOrWarn('delete', snapshotId);
    this.emit('snapshot:deleted', snapshotId);
    return true;
  }

  /**
   * Move a snapshot to long-term storage. Content is untouched; only
   * `archivedAt` is set.
   */
  async archiveSnapshot(snapshotId: string): Promise<SnapshotMeta> {
    const meta = await this.getSnapshot(snapshotId);
    if (meta.archivedAt !== null) return meta;

    await fs.mkdir(this.layout.archive, { recursive: true });
    const dest = this.archivedDir(snapshotId);
    await fs.rename(this.activeDir(snapshotId), dest);

    const archived: SnapshotMeta = { ...meta, archivedAt: Date.now() };
    await writeFileAtomic(path.join(dest, META_FILE), JSON.stringify(archived, null, 2));

    await this.recordOrWarn('archive', snapshotId);
    return archived;
  }

  /**
   * Keep the `keep` newest active snapshots and delete the rest, except those
   * in `protect`. Returns the deleted identifiers, oldest last.
   */
  async pruneSnapshots(keep: number, protect: ReadonlySet<string> = new Set()): Promise<string[]> {
    const snapshots = await this.listSnapshots();
    const doomed = snapshots.slice(Math.max(0, keep)).filter((s) => !protect.has(s.snapshotId));
    const deleted: string[] = [];

    for (const snap of doomed) {
      if (await this.deleteSnapshot(snap.snapshotId)) deleted.push(snap.snapshotId);
    }
    if (deleted.length > 0) {
      await this.recordOrWarn('prune', deleted[0], { deleted, keep });
    }
    return deleted;
  }

  private async record(
    action: HistoryAction,
    snapshotId: string,
    details?: Record<string, unknown>,
  ): Promise<StorageWarning | null> {
    if (!this.history) return null;
    try {
      await this.history.record(action, snapshotId, details);
      return null;
    } catch (err) {
      return {
        kind: 'history_failed',
        message: `History entry for ${action} of ${snapshotId} was not written: ${errorMessage(err)}`,
      };
    }
  }

  private async recordOrWarn(
    action: HistoryAction,
    snapshotId: string,
    details?: Record<string, unknown>,
  ): Promise<void> {
    const warning = await this.record(action, snapshotId, details);
    if (warning) this.emit('warning', warning);
  }

  private async readAll(dir: string): Promise<SnapshotMeta[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (err) {
      if (isEnoent(err)) return [];
      throw err;
    }

    const snapshots: SnapshotMeta[] = [];
    for (const entry of entries) {
      if (!isSnapshotId(entry)) continue;
      const file = path.join(dir, entry, META_FILE);
      let raw: string;
      try {
        raw = await fs.readFile(file, 'utf-8');
      } catch (err) {
        // A directory without metadata was never registered
        if (isEnoent(err)) continue;
        throw err;
      }
      try {
        snapshots.push(parseSnapshotMeta(raw, file));
      } catch (err) {
        if (!(err instanceof SnapshotFormatError)) throw err;
        this.emit('warning', { kind: 'unreadable_entry', message: `Skipping snapshot: ${err.message}` });
      }
    }
    return snapshots;
  }
}
