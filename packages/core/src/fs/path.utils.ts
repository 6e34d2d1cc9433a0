import * as path from 'node:path';

/**
 * Resolve `filePath` to an absolute path and verify it stays within `projectRoot`.
 *
 * - Relative paths are resolved against `projectRoot`.
 * - Absolute paths are accepted as-is, but still validated.
 * - Throws an Error if the resolved path escapes `projectRoot`.
 */
export function resolveAndValidatePath(filePath: string, projectRoot: string): string {
  const root = path.resolve(projectRoot);
  const resolved = path.isAbsolute(filePath)
    ? path.resolve(filePath)
    : path.resolve(root, filePath);

  if (resolved !== root && !resolved.startsWith(root + path.sep)) {
    throw new Error(`Path "${filePath}" resolves outside the project root`);
  }

  return resolved;
}

/** Project-relative form with POSIX separators; the root itself is "." */
export function toProjectRelative(absolutePath: string, projectRoot: string): string {
  const rel = path.relative(path.resolve(projectRoot), absolutePath);
  return rel === '' ? '.' : rel.split(path.sep).join('/');
}

/** Normalize a user-supplied path to project-relative POSIX form. */
export function normalizeProjectPath(filePath: string, projectRoot: string): string {
  return toProjectRelative(resolveAndValidatePath(filePath, projectRoot), projectRoot);
}

/**
 * True when `file` equals `filter` or sits beneath it.
 * Both are project-relative POSIX paths; "." matches everything.
 */
export function isWithin(file: string, filter: string): boolean {
  if (filter === '.') return true;
  return file === filter || file.startsWith(filter.endsWith('/') ? filter : `${filter}/`);
}

export function matchesAny(file: string, filters: readonly string[]): boolean {
  return filters.some((f) => isWithin(file, f));
}
