import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export const STORAGE_DIR = '.tasksnap';

const GITIGNORE = '# tasksnap storage\nsnapshots/\narchive/\nlogs/\ntasks/\nrollback.lock\n';

/** Absolute locations of everything tasksnap keeps inside a project. */
export interface StorageLayout {
  root: string;
  snapshots: string;
  archive: string;
  tasks: string;
  logs: string;
  lockFile: string;
  projectConfig: string;
}

export function storageLayout(projectRoot: string): StorageLayout {
  const root = path.join(projectRoot, STORAGE_DIR);
  return {
    root,
    snapshots: path.join(root, 'snapshots'),
    archive: path.join(root, 'archive'),
    tasks: path.join(root, 'tasks'),
    logs: path.join(root, 'logs'),
    lockFile: path.join(root, 'rollback.lock'),
    projectConfig: path.join(root, 'config.yaml'),
  };
}

/**
 * Create the storage directory and its .gitignore if missing.
 */
export async function ensureStorage(layout: StorageLayout): Promise<void> {
  await fs.mkdir(layout.snapshots, { recursive: true });
  const gitignore = path.join(layout.root, '.gitignore');
  try {
    await fs.writeFile(gitignore, GITIGNORE, { encoding: 'utf-8', flag: 'wx' });
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) throw err;
  }
}
