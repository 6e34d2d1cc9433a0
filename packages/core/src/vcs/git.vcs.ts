import { spawn } from 'node:child_process';
import type { CommitResult, NativeCapture, VersionControl } from './vcs.types.js';

const STASH_PREFIX = 'tasksnap';

interface GitOutput {
  code: number | null;
  stdout: Buffer;
  stderr: string;
}

/**
 * Parse `git status --porcelain -z` output into the list of changed paths.
 * Renames and copies report the destination path.
 */
export function parsePorcelainZ(output: string): string[] {
  const files: string[] = [];
  const records = output.split('\0');

  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    if (record.length < 4) continue;
    const status = record.slice(0, 2);
    files.push(record.slice(3));
    // Rename/copy entries are followed by the original path
    if (status.includes('R') || status.includes('C')) i++;
  }

  return files;
}

/** Split NUL-terminated git output into non-empty entries. */
export function splitNul(output: string): string[] {
  return output.split('\0').filter((entry) => entry.length > 0);
}

/** Permission bits of the first `git ls-tree` entry; null for symlinks and submodules. */
export function parseTreeMode(lsTreeOutput: string): number | null {
  const mode = lsTreeOutput.split(' ', 1)[0];
  if (mode === '100755') return 0o755;
  if (mode === '100644') return 0o644;
  return null;
}

/** Find the stash@{n} index of a stash commit in `git stash list --format=%H` output. */
export function findStashIndex(listOutput: string, ref: string): number {
  return listOutput
    .split('\n')
    .map((line) => line.trim())
    .indexOf(ref);
}

export class GitVersionControl implements VersionControl {
  constructor(private readonly cwd: string) {}

  private run(args: string[]): Promise<GitOutput> {
    return new Promise<GitOutput>((resolve) => {
      const proc = spawn('git', args, { cwd: this.cwd });
      const chunks: Buffer[] = [];
      let stderr = '';

      proc.stdout.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      proc.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      proc.on('close', (code) => {
        resolve({ code, stdout: Buffer.concat(chunks), stderr });
      });
      // Missing git binary surfaces here rather than as an exit code
      proc.on('error', (err) => {
        resolve({ code: -1, stdout: Buffer.alloc(0), stderr: err.message });
      });
    });
  }

  private async text(args: string[]): Promise<string | null> {
    const result = await this.run(args);
    return result.code === 0 ? result.stdout.toString('utf-8') : null;
  }

  async isAvailable(): Promise<boolean> {
    const out = await this.text(['rev-parse', '--is-inside-work-tree']);
    return out?.trim() === 'true';
  }

  async changedFiles(): Promise<string[]> {
    const out = await this.text(['status', '--porcelain', '-z']);
    return out === null ? [] : parsePorcelainZ(out);
  }

  async untrackedFiles(paths: readonly string[]): Promise<string[]> {
    // No --exclude-standard: ignored files are untracked too
    const out = await this.text(['ls-files', '--others', '-z', '--', ...paths]);
    return out === null ? [] : splitNul(out);
  }

  async currentBranch(): Promise<string | null> {
    const out = await this.text(['rev-parse', '--abbrev-ref', 'HEAD']);
    return out?.trim() || null;
  }

  async captureStash(label: string, paths: readonly string[]): Promise<NativeCapture | null> {
    const message = `${STASH_PREFIX}: ${label}`;
    const created = await this.text(['stash', 'create', message]);
    if (created === null) return null;

    let ref = created.trim();
    let baseline: NativeCapture['baseline'] = 'stash';

    if (!ref) {
      // Clean tree: nothing to stash, HEAD already holds the content
      const head = await this.text(['rev-parse', 'HEAD']);
      if (!head?.trim()) return null;
      ref = head.trim();
      baseline = 'head';
    } else {
      const stored = await this.run(['stash', 'store', '-m', message, ref]);
      if (stored.code !== 0) return null;
    }

    const listing = await this.text(['ls-tree', '-r', '-z', '--name-only', '--full-tree', ref]);
    if (listing === null) {
      if (baseline === 'stash') await this.dropStash(ref);
      return null;
    }

    const prefix = await this.text(['rev-parse', '--show-prefix']);
    const files = relativeToPrefix(splitNul(listing), prefix?.trim() ?? '').filter((file) =>
      paths.some((p) => p === '.' || file === p || file.startsWith(`${p.replace(/\/$/, '')}/`)),
    );

    return { ref, baseline, files };
  }

  async readFile(ref: string, file: string): Promise<Buffer | null> {
    const result = await this.run(['show', `${ref}:./${file}`]);
    return result.code === 0 ? result.stdout : null;
  }

  async fileMode(ref: string, file: string): Promise<number | null> {
    const out = await this.text(['ls-tree', '-z', ref, '--', `./${file}`]);
    return out === null ? null : parseTreeMode(out);
  }

  async hasRef(ref: string, baseline: 'stash' | 'head'): Promise<boolean> {
    if (baseline === 'head') {
      const result = await this.run(['cat-file', '-e', `${ref}^{commit}`]);
      return result.code === 0;
    }
    const list = await this.text(['stash', 'list', '--format=%H']);
    return list !== null && findStashIndex(list, ref) >= 0;
  }

  async dropStash(ref: string): Promise<void> {
    const list = await this.text(['stash', 'list', '--format=%H']);
    if (list === null) return;
    const index = findStashIndex(list, ref);
    if (index < 0) return;

    const result = await this.run(['stash', 'drop', `stash@{${index}}`]);
    if (result.code !== 0) {
      throw new Error(`git stash drop failed: ${result.stderr.trim()}`);
    }
  }

  async commitAll(message: string): Promise<CommitResult> {
    const added = await this.run(['add', '-A']);
    if (added.code !== 0) {
      throw new Error(`Failed to stage changes: ${added.stderr.trim()}`);
    }

    const result = await this.run(['commit', '-m', message]);
    const output = `${result.stdout.toString('utf-8')}${result.stderr}`.trim();
    if (result.code === 0) {
      return { committed: true, nothingToCommit: false, output };
    }
    if (output.includes('nothing to commit')) {
      return { committed: false, nothingToCommit: true, output };
    }
    throw new Error(`Commit failed: ${output}`);
  }
}

/** Strip the repository prefix of the project directory from full-tree paths. */
export function relativeToPrefix(files: string[], prefix: string): string[] {
  if (!prefix) return files;
  return files.filter((f) => f.startsWith(prefix)).map((f) => f.slice(prefix.length));
}
