import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { CaptureError, NotFoundError, SnapshotFormatError } from '../errors/errors.js';
import { HistoryLogger } from '../history/history.logger.js';
import { FakeVersionControl } from '../vcs/fake.vcs.js';
import { SnapshotStore, formatSnapshotId, isSnapshotId, parseSnapshotMeta } from './snapshot.store.js';

let tmpDir: string;
let store: SnapshotStore;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tasksnap-store-'));
  store = new SnapshotStore(tmpDir, { mode: 'file_copy' });
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function writeFile(relativePath: string, content: string): Promise<void> {
  const full = path.join(tmpDir, relativePath);
  await fs.mkdir(path.dirname(full), { recursive: true });
  await fs.writeFile(full, content, 'utf-8');
}

// ─── ids ─────────────────────────────────────────────────────────

describe('formatSnapshotId', () => {
  it('encodes the UTC creation time and suffix', () => {
    const id = formatSnapshotId(Date.UTC(2026, 1, 3, 14, 30, 22, 123), 'ab12');
    expect(id).toBe('snap_20260203T143022123Z_ab12');
    expect(isSnapshotId(id)).toBe(true);
  });

  it('rejects foreign names', () => {
    expect(isSnapshotId('.staging-snap_20260203T143022123Z_ab12')).toBe(false);
    expect(isSnapshotId('task_001_1')).toBe(false);
  });
});

// ─── createSnapshot ─────────────────────────────────────────────

describe('createSnapshot', () => {
  it('copies every file under the given roots', async () => {
    await writeFile('src/index.ts', 'one');
    await writeFile('src/lib/util.ts', 'two');
    await writeFile('README.md', 'three');

    const { meta, warnings } = await store.createSnapshot(['src'], 'edit src');

    expect(warnings).toEqual([]);
    expect(meta.roots).toEqual(['src']);
    expect(meta.files).toEqual(['src/index.ts', 'src/lib/util.ts']);
    expect(meta.capture).toEqual({ mode: 'file_copy' });
    expect(meta.label).toBe('edit src');
    expect(meta.taskId).toBeNull();
    expect(meta.archivedAt).toBeNull();

    const copied = path.join(tmpDir, '.tasksnap/snapshots', meta.snapshotId, 'files/src/lib/util.ts');
    expect(await fs.readFile(copied, 'utf-8')).toBe('two');
  });

  it('captures the whole project when no paths are given', async () => {
    await writeFile('a.txt', 'A');
    await writeFile('node_modules/pkg/index.js', 'ignored');

    const { meta } = await store.createSnapshot([], 'all');

    expect(meta.roots).toEqual(['.']);
    expect(meta.files).toEqual(['a.txt']);
  });

  it('records a path that does not exist yet as a root with no files', async () => {
    const { meta } = await store.createSnapshot(['new/file.ts'], 'create file');
    expect(meta.roots).toEqual(['new/file.ts']);
    expect(meta.files).toEqual([]);
  });

  it('stores the owning task id', async () => {
    const { meta } = await store.createSnapshot([], 'task', { taskId: 'task_fix_20260203_143022_ab12' });
    expect(meta.taskId).toBe('task_fix_20260203_143022_ab12');
  });

  it('writes a .gitignore into the storage directory', async () => {
    await store.createSnapshot([], 'first');
    const gitignore = await fs.readFile(path.join(tmpDir, '.tasksnap/.gitignore'), 'utf-8');
    expect(gitignore).toContain('snapshots/');
  });

  it('rejects paths outside the project root', async () => {
    await expect(store.createSnapshot(['../outside.txt'], 'escape')).rejects.toBeInstanceOf(
      CaptureError,
    );
  });

  it('gives successive snapshots strictly increasing creation times', async () => {
    await writeFile('a.txt', 'A');
    const first = await store.createSnapshot([], 'first');
    const second = await store.createSnapshot([], 'second');
    expect(second.meta.createdAt).toBeGreaterThan(first.meta.createdAt);
  });

  it('keeps a published snapshot and warns when its history entry fails', async () => {
    await writeFile('a.txt', 'A');
    await writeFile('.tasksnap/logs', 'not a directory');
    const history = new HistoryLogger(path.join(tmpDir, '.tasksnap/logs'));
    const logged = new SnapshotStore(tmpDir, { mode: 'file_copy', history });
    const emitted: string[] = [];
    logged.on('warning', (w) => emitted.push(w.kind));

    const { meta, warnings } = await logged.createSnapshot([], 'unlogged');

    expect(warnings).toHaveLength(1);
    expect(warnings[0].kind).toBe('history_failed');
    expect(warnings[0].message).toMatch(
      new RegExp(`^History entry for create of ${meta.snapshotId} was not written: `),
    );
    expect(emitted).toEqual(['history_failed']);
    expect((await logged.listSnapshots()).map((m) => m.snapshotId)).toEqual([meta.snapshotId]);
    expect((await logged.getSnapshot(meta.snapshotId)).files).toEqual(['a.txt']);
  });

  it('records the permission bits of captured files', async () => {
    await writeFile('run.sh', 'echo hi');
    await fs.chmod(path.join(tmpDir, 'run.sh'), 0o755);
    const { meta } = await store.createSnapshot([], 'modes');

    expect(await store.fileMode(meta, 'run.sh')).toBe(0o755);
    expect(await store.fileMode(meta, 'missing.sh')).toBeNull();
  });

  it('leaves no staging directory behind', async () => {
    await writeFile('a.txt', 'A');
    await store.createSnapshot([], 'first');
    const entries = await fs.readdir(path.join(tmpDir, '.tasksnap/snapshots'));
    expect(entries.every((e) => isSnapshotId(e))).toBe(true);
  });
});

// ─── capture modes ──────────────────────────────────────────────

describe('capture mode selection', () => {
  it('uses a stash when git is available and nothing is untracked', async () => {
    await writeFile('a.txt', 'A');
    const vcs = new FakeVersionControl(tmpDir);
    const native = new SnapshotStore(tmpDir, { mode: 'auto', vcs });

    const { meta, warnings } = await native.createSnapshot([], 'native');

    expect(warnings).toEqual([]);
    expect(meta.capture).toEqual({
      mode: 'native',
      ref: '1'.padStart(40, '0'),
      baseline: 'stash',
    });
    expect(meta.files).toEqual(['a.txt']);
    expect((await native.readFile(meta, 'a.txt'))?.toString()).toBe('A');
  });

  it('falls back silently in auto mode when git is missing', async () => {
    const vcs = new FakeVersionControl(tmpDir, { available: false });
    const auto = new SnapshotStore(tmpDir, { mode: 'auto', vcs });

    const { meta, warnings } = await auto.createSnapshot([], 'auto');

    expect(meta.capture).toEqual({ mode: 'file_copy' });
    expect(warnings).toEqual([]);
  });

  it('warns when native mode was requested but untracked files exist', async () => {
    await writeFile('new.txt', 'N');
    const vcs = new FakeVersionControl(tmpDir, { untracked: ['new.txt'] });
    const forced = new SnapshotStore(tmpDir, { mode: 'native', vcs });
    const emitted: string[] = [];
    forced.on('warning', (w) => emitted.push(w.message));

    const { meta, warnings } = await forced.createSnapshot([], 'forced');

    expect(meta.capture).toEqual({ mode: 'file_copy' });
    expect(warnings).toEqual([
      {
        kind: 'capture_fallback',
        message:
          '1 untracked or ignored file(s) cannot be stashed; falling back to file-copy snapshot',
      },
    ]);
    expect(emitted).toEqual([warnings[0].message]);
  });

  it('falls back when the stash cannot be created', async () => {
    const vcs = new FakeVersionControl(tmpDir, { stashFails: true });
    const forced = new SnapshotStore(tmpDir, { mode: 'native', vcs });

    const { meta, warnings } = await forced.createSnapshot([], 'forced');

    expect(meta.capture.mode).toBe('file_copy');
    expect(warnings[0].message).toBe(
      'Working tree could not be stashed; falling back to file-copy snapshot',
    );
  });
});

// ─── queries ────────────────────────────────────────────────────

describe('listSnapshots / getLatestSnapshot / getSnapshot', () => {
  it('lists newest first', async () => {
    const a = await store.createSnapshot([], 'a');
    const b = await store.createSnapshot([], 'b');
    const c = await store.createSnapshot([], 'c');

    const ids = (await store.listSnapshots()).map((m) => m.snapshotId);
    expect(ids).toEqual([c.meta.snapshotId, b.meta.snapshotId, a.meta.snapshotId]);
    expect((await store.getLatestSnapshot())?.snapshotId).toBe(c.meta.snapshotId);
  });

  it('returns an empty list and null latest when nothing exists', async () => {
    expect(await store.listSnapshots()).toEqual([]);
    expect(await store.getLatestSnapshot()).toBeNull();
  });

  it('skips a snapshot with unreadable metadata and keeps capturing', async () => {
    const good = await store.createSnapshot([], 'good');
    const bad = await store.createSnapshot([], 'bad');
    await fs.writeFile(
      path.join(store.layout.snapshots, bad.meta.snapshotId, 'meta.json'),
      '{"schemaVersion":1,',
      'utf-8',
    );
    const emitted: string[] = [];
    store.on('warning', (w) => emitted.push(w.kind));

    expect((await store.listSnapshots()).map((m) => m.snapshotId)).toEqual([good.meta.snapshotId]);
    expect((await store.getLatestSnapshot())?.snapshotId).toBe(good.meta.snapshotId);
    expect(emitted).toEqual(['unreadable_entry', 'unreadable_entry']);

    const next = await store.createSnapshot([], 'next');
    expect(next.meta.createdAt).toBeGreaterThan(good.meta.createdAt);
    await expect(store.getSnapshot(bad.meta.snapshotId)).rejects.toBeInstanceOf(SnapshotFormatError);
  });

  it('throws NotFoundError for unknown or malformed ids', async () => {
    await expect(store.getSnapshot('snap_20260203T143022123Z_ffff')).rejects.toBeInstanceOf(
      NotFoundError,
    );
    await expect(store.getSnapshot('../../etc')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('finds archived snapshots by id', async () => {
    const { meta } = await store.createSnapshot([], 'a');
    await store.archiveSnapshot(meta.snapshotId);

    const found = await store.getSnapshot(meta.snapshotId);
    expect(found.archivedAt).toBeTypeOf('number');
    expect(await store.listSnapshots()).toEqual([]);
    expect(await store.listSnapshots({ includeArchived: true })).toHaveLength(1);
  });
});

// ─── verify ─────────────────────────────────────────────────────

describe('verify', () => {
  it('reports a stash dropped outside the store as not found', async () => {
    await writeFile('a.txt', 'A');
    const vcs = new FakeVersionControl(tmpDir);
    const native = new SnapshotStore(tmpDir, { vcs });
    const { meta } = await native.createSnapshot([], 'native');

    vcs.stashes.clear();

    await expect(native.verify(meta)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('accepts a file-copy snapshot', async () => {
    const { meta } = await store.createSnapshot([], 'copy');
    await expect(store.verify(meta)).resolves.toBeUndefined();
  });
});

// ─── retention ──────────────────────────────────────────────────

describe('deleteSnapshot / pruneSnapshots', () => {
  it('deletes a snapshot and is idempotent', async () => {
    const { meta } = await store.createSnapshot([], 'a');
    expect(await store.deleteSnapshot(meta.snapshotId)).toBe(true);
    expect(await store.deleteSnapshot(meta.snapshotId)).toBe(false);
    expect(await store.listSnapshots()).toEqual([]);
  });

  it('drops the stash of a native snapshot', async () => {
    const vcs = new FakeVersionControl(tmpDir);
    const native = new SnapshotStore(tmpDir, { vcs });
    const { meta } = await native.createSnapshot([], 'native');
    expect(vcs.stashes.size).toBe(1);

    await native.deleteSnapshot(meta.snapshotId);
    expect(vcs.stashes.size).toBe(0);
  });

  it('keeps only the newest snapshots', async () => {
    const a = await store.createSnapshot([], 'a');
    const b = await store.createSnapshot([], 'b');
    const c = await store.createSnapshot([], 'c');

    const deleted = await store.pruneSnapshots(1);

    expect(deleted).toEqual([b.meta.snapshotId, a.meta.snapshotId]);
    expect((await store.listSnapshots()).map((m) => m.snapshotId)).toEqual([c.meta.snapshotId]);
  });

  it('never prunes protected snapshots', async () => {
    const a = await store.createSnapshot([], 'a');
    const b = await store.createSnapshot([], 'b');
    const c = await store.createSnapshot([], 'c');

    const deleted = await store.pruneSnapshots(1, new Set([a.meta.snapshotId]));

    expect(deleted).toEqual([b.meta.snapshotId]);
    expect((await store.listSnapshots()).map((m) => m.snapshotId)).toEqual([
      c.meta.snapshotId,
      a.meta.snapshotId,
    ]);
  });

  it('records history entries for each operation', async () => {
    const history = new HistoryLogger(path.join(tmpDir, '.tasksnap/logs'));
    const logged = new SnapshotStore(tmpDir, { mode: 'file_copy', history });
    const { meta } = await logged.createSnapshot([], 'a');
    await logged.deleteSnapshot(meta.snapshotId);

    const actions = (await history.listEntries()).map((e) => e.action).sort();
    expect(actions).toEqual(['create', 'delete']);
  });
});

// ─── parseSnapshotMeta ──────────────────────────────────────────

describe('parseSnapshotMeta', () => {
  const valid = {
    schemaVersion: 1,
    snapshotId: 'snap_20260203T143022123Z_ab12',
    createdAt: 1,
    label: 'x',
    taskId: null,
    roots: ['.'],
    files: [],
    capture: { mode: 'file_copy' },
    archivedAt: null,
  };

  it('accepts well-formed metadata', () => {
    expect(parseSnapshotMeta(JSON.stringify(valid), 'meta.json').snapshotId).toBe(valid.snapshotId);
  });

  it('rejects an unknown schema version', () => {
    expect(() =>
      parseSnapshotMeta(JSON.stringify({ ...valid, schemaVersion: 2 }), 'meta.json'),
    ).toThrow(SnapshotFormatError);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseSnapshotMeta('{', 'meta.json')).toThrow(SnapshotFormatError);
  });

  it('rejects a native capture without a ref', () => {
    expect(() =>
      parseSnapshotMeta(JSON.stringify({ ...valid, capture: { mode: 'native' } }), 'meta.json'),
    ).toThrow(SnapshotFormatError);
  });
});
