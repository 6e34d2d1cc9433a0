import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { errnoCode, isEnoent } from '../errors/errors.js';
import { parseBrief, slugify } from './task.brief.js';

export interface ArchiveOptions {
  byBranch: boolean;
  byTitle: boolean;
  /** Branch to use when the brief does not name one. */
  fallbackBranch?: string | null;
}

/** Persists completed task briefs into a path-structured history. */
export interface BriefArchiver {
  latestPath(): string;
  hasLatest(): Promise<boolean>;
  writeLatest(content: string, force: boolean): Promise<boolean>;
  /** Returns the archive path, or null when there was nothing new to archive. */
  archiveLatest(options: ArchiveOptions): Promise<string | null>;
}

/** "2026-02-03--143022Z" */
export function archiveStamp(ms: number): string {
  const iso = new Date(ms).toISOString();
  return `${iso.slice(0, 10)}--${iso.slice(11, 19).replace(/:/g, '')}Z`;
}

async function listMarkdown(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isEnoent(err)) return [];
    throw err;
  }
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) files.push(...(await listMarkdown(full)));
    else if (entry.isFile() && entry.name.endsWith('.md')) files.push(full);
  }
  return files;
}

/**
 * Task briefs under `<dir>/latest.md`, archived to
 * `<dir>/archive/[<branch>/][<title>/]<stamp>.md`.
 */
export class FsBriefArchiver implements BriefArchiver {
  private readonly archiveDir: string;

  constructor(
    private readonly dir: string,
    private readonly now: () => number = Date.now,
  ) {
    this.archiveDir = path.join(dir, 'archive');
  }

  latestPath(): string {
    return path.join(this.dir, 'latest.md');
  }

  async hasLatest(): Promise<boolean> {
    try {
      await fs.access(this.latestPath());
      return true;
    } catch (err) {
      if (isEnoent(err)) return false;
      throw err;
    }
  }

  /**
   * Write the latest brief. Returns false without writing when one already
   * exists and `force` is not set.
   */
  async writeLatest(content: string, force: boolean): Promise<boolean> {
    await fs.mkdir(this.dir, { recursive: true });
    try {
      await fs.writeFile(this.latestPath(), content, { encoding: 'utf-8', flag: force ? 'w' : 'wx' });
      return true;
    } catch (err) {
      if (errnoCode(err) === 'EEXIST') return false;
      throw err;
    }
  }

  async archiveLatest(options: ArchiveOptions): Promise<string | null> {
    let content: string;
    try {
      content = await fs.readFile(this.latestPath(), 'utf-8');
    } catch (err) {
      if (isEnoent(err)) return null;
      throw err;
    }
    if (!content.trim()) {
      await fs.rm(this.latestPath(), { force: true });
      return null;
    }

    const meta = parseBrief(content);
    let target = this.archiveDir;
    if (options.byBranch) {
      const branch = meta.branch && meta.branch !== 'unknown' ? meta.branch : options.fallbackBranch;
      target = path.join(target, slugify(branch ?? 'unknown'));
    }
    if (options.byTitle) target = path.join(target, slugify(meta.title ?? 'untitled'));

    for (const existing of await listMarkdown(target)) {
      if ((await fs.readFile(existing, 'utf-8')) === content) {
        await fs.rm(this.latestPath(), { force: true });
        return null;
      }
    }

    await fs.mkdir(target, { recursive: true });
    const archived = path.join(target, `${archiveStamp(this.now())}.md`);
    await fs.writeFile(archived, content, { encoding: 'utf-8', flag: 'wx' });
    await fs.rm(this.latestPath(), { force: true });
    return archived;
  }
}
