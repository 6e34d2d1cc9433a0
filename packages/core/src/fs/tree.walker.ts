import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { errnoCode, isEnoent } from '../errors/errors.js';
import { resolveAndValidatePath, toProjectRelative } from './path.utils.js';

/**
 * Decide whether a project-relative path is excluded.
 * Entries containing "/" match as path prefixes, bare names match any segment.
 */
export function isIgnored(relativePath: string, ignore: readonly string[]): boolean {
  const segments = relativePath.split('/');
  for (const entry of ignore) {
    const trimmed = entry.replace(/\/+$/, '');
    if (!trimmed) continue;
    if (trimmed.includes('/')) {
      if (relativePath === trimmed || relativePath.startsWith(`${trimmed}/`)) return true;
    } else if (segments.includes(trimmed)) {
      return true;
    }
  }
  return false;
}

/**
 * Collect every regular file beneath `roots` (files or directories, relative to
 * `projectRoot`). Missing roots are skipped. Symlinks are not followed.
 * Returns sorted, de-duplicated project-relative POSIX paths.
 */
export async function walkFiles(
  projectRoot: string,
  roots: readonly string[],
  ignore: readonly string[],
): Promise<string[]> {
  const found = new Set<string>();

  async function visit(absolute: string): Promise<void> {
    const rel = toProjectRelative(absolute, projectRoot);
    if (rel !== '.' && isIgnored(rel, ignore)) return;

    let stat: Stats;
    try {
      stat = await fs.lstat(absolute);
    } catch (err) {
      if (isEnoent(err)) return;
      throw err;
    }

    if (stat.isFile()) {
      found.add(rel);
      return;
    }
    if (!stat.isDirectory()) return;

    const entries = await fs.readdir(absolute);
    for (const entry of entries) {
      await visit(path.join(absolute, entry));
    }
  }

  for (const root of roots.length > 0 ? roots : ['.']) {
    await visit(resolveAndValidatePath(root, projectRoot));
  }

  return [...found].sort();
}

/** Read a file, returning null when no regular file exists at the path. */
export async function readIfExists(absolutePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(absolutePath);
  } catch (err) {
    if (isEnoent(err) || errnoCode(err) === 'EISDIR') return null;
    throw err;
  }
}
