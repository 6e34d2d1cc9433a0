import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Write `data` to a temporary sibling of `dest`, then rename it into place.
 * Readers see either the old file or the complete new one. `mode` sets the
 * permission bits regardless of the umask.
 */
export async function writeFileAtomic(
  dest: string,
  data: Buffer | string,
  mode?: number,
): Promise<void> {
  const dir = path.dirname(dest);
  await fs.mkdir(dir, { recursive: true });

  const tmp = path.join(
    dir,
    `.${path.basename(dest)}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`,
  );

  try {
    await fs.writeFile(tmp, data);
    if (mode !== undefined) await fs.chmod(tmp, mode);
    await fs.rename(tmp, dest);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}
