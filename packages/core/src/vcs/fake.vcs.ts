import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { walkFiles } from '../fs/tree.walker.js';
import type { CommitResult, NativeCapture, VersionControl } from './vcs.types.js';

export interface FakeVersionControlOptions {
  available?: boolean;
  branch?: string | null;
  changed?: string[];
  untracked?: string[];
  /** Make captureStash report an unstashable tree. */
  stashFails?: boolean;
  ignore?: string[];
}

/**
 * In-process VersionControl for tests. Stashes read the real files under the
 * project root and keep them in memory, keyed by a fake commit sha.
 */
export class FakeVersionControl implements VersionControl {
  available: boolean;
  branch: string | null;
  changed: string[];
  untracked: string[];
  stashFails: boolean;
  readonly stashes = new Map<string, Map<string, Buffer>>();
  readonly modes = new Map<string, Map<string, number>>();
  readonly commits: string[] = [];
  private seq = 0;
  private readonly ignore: string[];

  constructor(
    private readonly projectRoot: string,
    options: FakeVersionControlOptions = {},
  ) {
    this.available = options.available ?? true;
    this.branch = options.branch ?? 'main';
    this.changed = options.changed ?? [];
    this.untracked = options.untracked ?? [];
    this.stashFails = options.stashFails ?? false;
    this.ignore = options.ignore ?? ['.git', '.tasksnap'];
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async changedFiles(): Promise<string[]> {
    return [...this.changed];
  }

  async untrackedFiles(paths: readonly string[]): Promise<string[]> {
    return this.untracked.filter((f) =>
      paths.some((p) => p === '.' || f === p || f.startsWith(`${p}/`)),
    );
  }

  async currentBranch(): Promise<string | null> {
    return this.branch;
  }

  async captureStash(_label: string, paths: readonly string[]): Promise<NativeCapture | null> {
    if (this.stashFails) return null;
    const files = await walkFiles(this.projectRoot, paths, this.ignore);
    const content = new Map<string, Buffer>();
    const modes = new Map<string, number>();
    for (const file of files) {
      const full = path.join(this.projectRoot, file);
      content.set(file, await fs.readFile(full));
      modes.set(file, (await fs.stat(full)).mode & 0o777);
    }
    this.seq += 1;
    const ref = this.seq.toString(16).padStart(40, '0');
    this.stashes.set(ref, content);
    this.modes.set(ref, modes);
    return { ref, baseline: 'stash', files };
  }

  async readFile(ref: string, file: string): Promise<Buffer | null> {
    return this.stashes.get(ref)?.get(file) ?? null;
  }

  async fileMode(ref: string, file: string): Promise<number | null> {
    return this.modes.get(ref)?.get(file) ?? null;
  }

  async hasRef(ref: string): Promise<boolean> {
    return this.stashes.has(ref);
  }

  async dropStash(ref: string): Promise<void> {
    this.stashes.delete(ref);
    this.modes.delete(ref);
  }

  async commitAll(message: string): Promise<CommitResult> {
    this.commits.push(message);
    return { committed: true, nothingToCommit: false, output: '' };
  }
}
