import { EventEmitter } from 'node:events';
import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import type { FileLock } from '@tasksnap/shared';
import { LockHeldError, errnoCode } from '../errors/errors.js';
import { isRecord } from '../storage/guards.js';

export interface RollbackLockOptions {
  /** Give up waiting after this long. */
  timeoutMs?: number;
  /** A lock older than this is considered abandoned. */
  staleMs?: number;
  /** Identifies the holder; defaults to `pid:<process.pid>`. */
  holder?: string;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface RollbackLock {
  on(event: 'lock_acquired', listener: (lock: FileLock) => void): this;
  on(event: 'lock_released', listener: (lock: FileLock) => void): this;
  on(event: 'lock_stale', listener: (lock: FileLock) => void): this;

  emit(event: 'lock_acquired', lock: FileLock): boolean;
  emit(event: 'lock_released', lock: FileLock): boolean;
  emit(event: 'lock_stale', lock: FileLock): boolean;
}

interface ExistingLock {
  lock: FileLock;
  raw: string;
  mtimeMs: number;
}

function isFileLock(value: unknown): value is FileLock {
  return (
    isRecord(value) &&
    typeof value['path'] === 'string' &&
    typeof value['lockedBy'] === 'string' &&
    typeof value['lockedAt'] === 'number'
  );
}

function pidAlive(holder: string): boolean {
  const match = /^pid:(\d+)$/.exec(holder);
  if (!match) return true;
  try {
    process.kill(Number(match[1]), 0);
    return true;
  } catch (err) {
    // EPERM means the process exists under another user
    return errnoCode(err) === 'EPERM';
  }
}

/**
 * Advisory lock file that keeps two rollbacks from interleaving their writes.
 * Created with O_EXCL; waits with exponential backoff (100ms → 2s).
 *
 * A stale lock is taken over by renaming it aside and checking that the file
 * moved is the one judged stale; anything else is put back.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class RollbackLock extends EventEmitter {
  private readonly timeoutMs: number;
  private readonly staleMs: number;
  private readonly holder: string;
  private held: FileLock | null = null;
  private heldRaw = '';

  constructor(
    private readonly lockPath: string,
    options: RollbackLockOptions = {},
  ) {
    super();
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.staleMs = options.staleMs ?? 10 * 60_000;
    this.holder = options.holder ?? `pid:${process.pid}`;
  }

  isHeld(): boolean {
    return this.held !== null;
  }

  async acquire(): Promise<FileLock> {
    if (this.held) return this.held;

    const deadline = Date.now() + this.timeoutMs;
    let delay = 100;

    while (true) {
      const lock: FileLock = { path: this.lockPath, lockedBy: this.holder, lockedAt: Date.now() };
      const raw = JSON.stringify(lock);
      try {
        await fs.writeFile(this.lockPath, raw, { encoding: 'utf-8', flag: 'wx' });
        this.held = lock;
        this.heldRaw = raw;
        this.emit('lock_acquired', lock);
        return lock;
      } catch (err) {
        if (errnoCode(err) !== 'EEXIST') throw err;
      }

      const existing = await this.readExisting();
      if (existing === null) continue;

      const { lock: current } = existing;
      if (Date.now() - current.lockedAt > this.staleMs || !pidAlive(current.lockedBy)) {
        if (await this.takeOver(existing)) {
          this.emit('lock_stale', current);
          continue;
        }
      }

      if (Date.now() + delay > deadline) {
        throw new LockHeldError(this.lockPath, current.lockedBy);
      }

      await new Promise<void>((resolve) => setTimeout(resolve, delay));
      delay = Math.min(delay * 2, 2_000);
    }
  }

  /** Removes the lock file only while it still holds this lock. */
  async release(): Promise<void> {
    const lock = this.held;
    if (!lock) return;
    this.held = null;

    let raw: string | null;
    try {
      raw = await fs.readFile(this.lockPath, 'utf-8');
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') throw err;
      raw = null;
    }
    if (raw === this.heldRaw) await fs.rm(this.lockPath, { force: true });
    this.emit('lock_released', lock);
  }

  /** Run `fn` while holding the lock. */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  /**
   * Move the lock file aside. Returns true when the file moved is the one
   * read as `existing`; a lock written since then is restored.
   */
  private async takeOver(existing: ExistingLock): Promise<boolean> {
    const aside = `${this.lockPath}.${crypto.randomBytes(4).toString('hex')}.stale`;
    try {
      await fs.rename(this.lockPath, aside);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return false;
      throw err;
    }

    const [raw, stat] = await Promise.all([fs.readFile(aside, 'utf-8'), fs.stat(aside)]);
    if (raw === existing.raw && stat.mtimeMs === existing.mtimeMs) {
      await fs.rm(aside, { force: true });
      return true;
    }

    try {
      await fs.link(aside, this.lockPath);
    } catch (err) {
      // A third holder already created a fresh lock
      if (errnoCode(err) !== 'EEXIST') throw err;
    }
    await fs.rm(aside, { force: true });
    return false;
  }

  /**
   * Current lock file; null when it vanished between calls. A file that does
   * not parse may still be mid-write, so its age comes from its mtime.
   */
  private async readExisting(): Promise<ExistingLock | null> {
    let raw: string;
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(this.lockPath)).mtimeMs;
      raw = await fs.readFile(this.lockPath, 'utf-8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return null;
      throw err;
    }
    let parsed: unknown = null;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
    }
    if (isFileLock(parsed)) return { lock: parsed, raw, mtimeMs };
    return { lock: { path: this.lockPath, lockedBy: 'unknown', lockedAt: mtimeMs }, raw, mtimeMs };
  }
}
