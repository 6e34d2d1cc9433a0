import * as path from 'node:path';
import { createTwoFilesPatch } from 'diff';
import type { FileDiff, SnapshotMeta } from '@tasksnap/shared';
import { matchesAny, normalizeProjectPath } from '../fs/path.utils.js';
import { readIfExists, walkFiles } from '../fs/tree.walker.js';
import type { SnapshotStore } from '../snapshots/snapshot.store.js';

const BINARY_SNIFF_BYTES = 8_000;

export interface DiffEngineOptions {
  /** Report files absent from the snapshot as `remove` instead of `leave`. */
  deleteUntracked?: boolean;
}

/** NUL byte in the first 8000 bytes, the same heuristic git uses. */
export function isBinary(content: Buffer): boolean {
  return content.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/**
 * Classify one path given its snapshot bytes and working-tree bytes.
 * The patch reads from snapshot to working tree.
 */
export function compareFile(
  filePath: string,
  snapshot: Buffer | null,
  current: Buffer | null,
  deleteUntracked = false,
): FileDiff {
  const binary = (snapshot !== null && isBinary(snapshot)) || (current !== null && isBinary(current));

  const patchOf = (before: Buffer | null, after: Buffer | null): string | null =>
    binary
      ? null
      : createTwoFilesPatch(
          `a/${filePath}`,
          `b/${filePath}`,
          before?.toString('utf-8') ?? '',
          after?.toString('utf-8') ?? '',
          'snapshot',
          'working tree',
        );

  if (snapshot === null && current === null) {
    return { path: filePath, change: 'unchanged', action: 'none', patch: null, binary };
  }
  if (snapshot === null) {
    return {
      path: filePath,
      change: 'added',
      action: deleteUntracked ? 'remove' : 'leave',
      patch: patchOf(null, current),
      binary,
    };
  }
  if (current === null) {
    return { path: filePath, change: 'deleted', action: 'restore', patch: patchOf(snapshot, null), binary };
  }
  if (snapshot.equals(current)) {
    return { path: filePath, change: 'unchanged', action: 'none', patch: null, binary };
  }
  return { path: filePath, change: 'modified', action: 'restore', patch: patchOf(snapshot, current), binary };
}

/**
 * Read-only comparison of a snapshot against the working tree.
 */
export class DiffEngine {
  private readonly deleteUntracked: boolean;

  constructor(
    private readonly store: SnapshotStore,
    options: DiffEngineOptions = {},
  ) {
    this.deleteUntracked = options.deleteUntracked ?? false;
  }

  /**
   * Compare snapshot `snapshotId` with the working tree, optionally restricted
   * to `paths` (files or directories).
   * @throws NotFoundError when the snapshot is unknown or its stash is gone
   */
  async diff(snapshotId: string, paths?: readonly string[]): Promise<FileDiff[]> {
    const meta = await this.store.getSnapshot(snapshotId);
    await this.store.verify(meta);
    return this.diffSnapshot(meta, paths);
  }

  /**
   * Union of files captured in the snapshot and files currently under the
   * snapshot's roots, sorted by path.
   */
  async diffSnapshot(meta: SnapshotMeta, paths?: readonly string[]): Promise<FileDiff[]> {
    const root = this.store.projectRoot;
    const filters =
      paths && paths.length > 0 ? paths.map((p) => normalizeProjectPath(p, root)) : null;

    const onDisk = await walkFiles(root, meta.roots, this.store.ignoreList());
    const union = [...new Set([...meta.files, ...onDisk])]
      .filter((file) => filters === null || matchesAny(file, filters))
      .sort();

    const diffs: FileDiff[] = [];
    for (const file of union) {
      const snapshot = await this.store.readFile(meta, file);
      const current = await readIfExists(path.join(root, file));
      diffs.push(compareFile(file, snapshot, current, this.deleteUntracked));
    }
    return diffs;
  }
}
