import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { HistoryAction, HistoryEntry } from '@tasksnap/shared';
import { SnapshotFormatError, isEnoent } from '../errors/errors.js';
import { isRecord } from '../storage/guards.js';

const ACTIONS: readonly HistoryAction[] = ['create', 'rollback', 'delete', 'archive', 'prune'];

function parseEntry(raw: string, file: string): HistoryEntry {
  const data: unknown = JSON.parse(raw);
  if (isRecord(data)) {
    const { snapshotId, timestamp, details } = data;
    const action = ACTIONS.find((a) => a === data['action']);
    if (action && typeof snapshotId === 'string' && typeof timestamp === 'number' && isRecord(details)) {
      return { action, snapshotId, timestamp, details };
    }
  }
  throw new SnapshotFormatError(file, 'not a history entry');
}

function sanitizeFilename(str: string): string {
  return str
    .toLowerCase()
    .replace(/[^a-z0-9_-]/g, '')
    .slice(0, 50);
}

/**
 * Append-only audit trail of snapshot actions, one JSON file per entry.
 */
export class HistoryLogger {
  constructor(private readonly logsDir: string) {}

  /**
   * Filename: <ISO timestamp>_<action>_<snapshotId>_<rand>.json
   */
  async record(
    action: HistoryAction,
    snapshotId: string,
    details: Record<string, unknown> = {},
  ): Promise<HistoryEntry> {
    await fs.mkdir(this.logsDir, { recursive: true });

    const entry: HistoryEntry = { action, snapshotId, timestamp: Date.now(), details };
    // e.g. "2024-01-15T14-32-00-123Z"
    const iso = new Date(entry.timestamp).toISOString().replace(/[:.]/g, '-');
    const suffix = crypto.randomBytes(2).toString('hex');
    const filename = `${iso}_${action}_${sanitizeFilename(snapshotId)}_${suffix}.json`;

    await fs.writeFile(path.join(this.logsDir, filename), JSON.stringify(entry, null, 2), 'utf-8');
    return entry;
  }

  /**
   * Load all entries, newest first.
   */
  async listEntries(): Promise<HistoryEntry[]> {
    const files = await this.entryFiles();
    const entries: HistoryEntry[] = [];

    for (const file of files) {
      const full = path.join(this.logsDir, file);
      entries.push(parseEntry(await fs.readFile(full, 'utf-8'), full));
    }

    entries.sort((a, b) => b.timestamp - a.timestamp);
    return entries;
  }

  /**
   * Delete old entries, keeping only the most recent `maxCount`.
   */
  async pruneOldEntries(maxCount: number): Promise<number> {
    // Oldest first by ISO timestamp prefix
    const files = await this.entryFiles();
    const toDelete = files.slice(0, Math.max(0, files.length - maxCount));

    for (const file of toDelete) {
      await fs.rm(path.join(this.logsDir, file), { force: true });
    }
    return toDelete.length;
  }

  private async entryFiles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.logsDir);
    } catch (err) {
      if (isEnoent(err)) return [];
      throw err;
    }
    return entries.filter((e) => e.endsWith('.json')).sort();
  }
}
