import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import type { TaskRecord, TaskStatus } from '@tasksnap/shared';
import { FsBriefArchiver } from '../briefs/brief.archiver.js';
import {
  BriefExistsError,
  DirtyTreeError,
  NotFoundError,
  TaskStateError,
  TasksnapError,
} from '../errors/errors.js';
import { RollbackExecutor } from '../rollback/rollback.executor.js';
import { SnapshotStore } from '../snapshots/snapshot.store.js';
import { FakeVersionControl } from '../vcs/fake.vcs.js';
import type { Validator } from '../validation/validation.runner.js';
import { TaskCoordinator, canTransition, deriveTitle, type TaskCoordinatorOptions } from './task.coordinator.js';
import { TaskStore } from './task.store.js';

const NOW = Date.UTC(2026, 1, 3, 14, 30, 22);

let tmpDir: string;
let vcs: FakeVersionControl;
let store: SnapshotStore;
let tasks: TaskStore;
let archiver: FsBriefArchiver;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tasksnap-task-'));
  vcs = new FakeVersionControl(tmpDir, { branch: 'feature/login' });
  store = new SnapshotStore(tmpDir, { vcs });
  tasks = new TaskStore(store.layout.tasks);
  archiver = new FsBriefArchiver(path.join(tmpDir, 'docs/task-briefs'), () => NOW);
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

function coordinator(overrides: Partial<TaskCoordinatorOptions> = {}): TaskCoordinator {
  return new TaskCoordinator({
    projectRoot: tmpDir,
    store,
    tasks,
    vcs,
    archiver,
    now: () => NOW,
    ...overrides,
  });
}

async function writeFile(relativePath: string, content: string): Promise<void> {
  const full = path.join(tmpDir, relativePath);
  await fs.mkdir(path.dirname(full), { recursive: true });
  await fs.writeFile(full, content, 'utf-8');
}

const failing: Validator = async () => ({
  passed: false,
  findings: [{ severity: 'error', message: '2 tests failed' }],
});

// ─── helpers ────────────────────────────────────────────────────

describe('deriveTitle', () => {
  it('keeps short descriptions and truncates long ones', () => {
    expect(deriveTitle('Fix the  login\nredirect')).toBe('Fix the login redirect');
    expect(deriveTitle('y'.repeat(60))).toBe(`${'y'.repeat(50)}...`);
  });
});

describe('canTransition', () => {
  it('allows the task lifecycle and nothing out of complete', () => {
    const allowed: [TaskStatus, TaskStatus][] = [
      ['open', 'validating'],
      ['validating', 'complete'],
      ['validating', 'failed'],
      ['failed', 'validating'],
    ];
    for (const [from, to] of allowed) expect(canTransition(from, to)).toBe(true);
    expect(canTransition('open', 'complete')).toBe(false);
    expect(canTransition('complete', 'validating')).toBe(false);
  });
});

// ─── startTask ──────────────────────────────────────────────────

describe('startTask', () => {
  it('snapshots the task files and opens a record', async () => {
    await writeFile('src/auth.ts', 'v1');

    const { record, warnings, briefPath } = await coordinator().startTask({
      description: 'Fix login redirect',
      type: 'fix',
      files: ['src/auth.ts'],
    });

    expect(warnings).toEqual([]);
    expect(record.taskId).toMatch(/^task_fix_20260203_143022_[0-9a-f]{4}$/);
    expect(record).toMatchObject({
      title: 'Fix login redirect',
      status: 'open',
      branch: 'feature/login',
      attempts: 0,
    });
    const snapshot = await store.getSnapshot(record.snapshotId ?? '');
    expect(snapshot.taskId).toBe(record.taskId);
    expect(snapshot.files).toEqual(['src/auth.ts']);
    expect(await tasks.get(record.taskId)).toEqual(record);
    expect(briefPath).toBe(path.join(tmpDir, 'docs/task-briefs/latest.md'));
  });

  it('warns about a dirty tree and still produces a usable snapshot', async () => {
    await writeFile('a.txt', 'committed edit');
    vcs.changed = ['a.txt'];
    const c = coordinator();
    const emitted: string[] = [];
    c.on('warning', (w) => emitted.push(w.kind));

    const { record, warnings } = await c.startTask({ description: 'Refactor a', files: ['a.txt'] });

    expect(warnings).toEqual([
      {
        kind: 'dirty_tree',
        message: 'Working tree has 1 uncommitted change(s); they are included in the snapshot',
        files: ['a.txt'],
      },
    ]);
    expect(emitted).toEqual(['dirty_tree']);

    await writeFile('a.txt', 'agent edit');
    const result = await new RollbackExecutor(store).rollback({
      snapshotId: record.snapshotId ?? '',
      dryRun: false,
    });
    expect(result.restored).toEqual(['a.txt']);
    expect(await fs.readFile(path.join(tmpDir, 'a.txt'), 'utf-8')).toBe('committed edit');
  });

  it('refuses a dirty tree in strict mode without snapshotting', async () => {
    vcs.changed = ['a.txt'];

    await expect(
      coordinator({ strictDirty: true }).startTask({ description: 'Strict' }),
    ).rejects.toBeInstanceOf(DirtyTreeError);
    expect(await store.listSnapshots()).toEqual([]);
  });

  it('ignores changes under ignored paths', async () => {
    vcs.changed = ['node_modules/x/index.js', '.tasksnap/tasks/t.json'];
    const { warnings } = await coordinator({ strictDirty: true }).startTask({ description: 'Clean' });
    expect(warnings).toEqual([]);
  });

  it('refuses to overwrite an existing brief unless forced', async () => {
    await archiver.writeLatest('# previous brief', false);

    await expect(coordinator().startTask({ description: 'Second' })).rejects.toBeInstanceOf(
      BriefExistsError,
    );
    expect(await store.listSnapshots()).toEqual([]);

    const { briefPath } = await coordinator().startTask({ description: 'Second', force: true });
    expect(await fs.readFile(briefPath ?? '', 'utf-8')).toContain('- Title: Second');
  });

  it('works without git', async () => {
    vcs.available = false;
    const { record } = await coordinator().startTask({ description: 'No git' });
    expect(record.branch).toBeNull();
    expect((await store.getSnapshot(record.snapshotId ?? '')).capture).toEqual({ mode: 'file_copy' });
  });

  it('rejects an empty description', async () => {
    await expect(coordinator().startTask({ description: '   ' })).rejects.toBeInstanceOf(
      TasksnapError,
    );
  });
});

// ─── finishTask ─────────────────────────────────────────────────

describe('finishTask', () => {
  it('completes, archives the brief and the snapshot', async () => {
    const c = coordinator();
    const { record } = await c.startTask({ description: 'Fix login redirect', type: 'fix' });
    const statuses: TaskStatus[] = [];
    c.on('task:status', (r) => statuses.push(r.status));

    const result = await c.finishTask(record.taskId);

    expect(result.passed).toBe(true);
    expect(result.record.status).toBe('complete');
    expect(result.record.completedAt).toBe(NOW);
    expect(result.record.attempts).toBe(1);
    expect(statuses).toEqual(['validating', 'complete']);
    expect(result.archivedBrief).toBe(
      path.join(
        tmpDir,
        'docs/task-briefs/archive/feature-login/fix-login-redirect/2026-02-03--143022Z.md',
      ),
    );
    expect(await store.listSnapshots()).toEqual([]);
    const archived = await store.getSnapshot(record.snapshotId ?? '');
    expect(archived.archivedAt).toBeTypeOf('number');
  });

  it('marks the task failed when validation fails and allows a retry', async () => {
    let validator: Validator = failing;
    const c = coordinator({ validator: (ctx) => validator(ctx) });
    const { record } = await c.startTask({ description: 'Flaky' });

    const first = await c.finishTask(record.taskId);
    expect(first.passed).toBe(false);
    expect(first.record.status).toBe('failed');
    expect(first.findings).toEqual([{ severity: 'error', message: '2 tests failed' }]);
    expect(first.archivedBrief).toBeNull();
    expect(await archiver.hasLatest()).toBe(true);

    validator = async () => ({ passed: true, findings: [] });
    const second = await c.finishTask(record.taskId);
    expect(second.record.status).toBe('complete');
    expect(second.record.attempts).toBe(2);
  });

  it('rejects finishing a completed task', async () => {
    const c = coordinator();
    const { record } = await c.startTask({ description: 'Once' });
    await c.finishTask(record.taskId);

    await expect(c.finishTask(record.taskId)).rejects.toBeInstanceOf(TaskStateError);
  });

  it('records a crashed validator as a failure and rethrows', async () => {
    const c = coordinator({
      validator: async () => {
        throw new Error('validator exploded');
      },
    });
    const { record } = await c.startTask({ description: 'Crash' });

    await expect(c.finishTask(record.taskId)).rejects.toThrow('validator exploded');
    const saved: TaskRecord = await tasks.get(record.taskId);
    expect(saved.status).toBe('failed');
    expect(saved.lastFindings).toEqual([
      { severity: 'error', message: 'Validation crashed: validator exploded' },
    ]);
  });

  it('commits with a generated message when asked', async () => {
    vcs.changed = [];
    const c = coordinator();
    const { record } = await c.startTask({ description: 'Add export', type: 'feature' });
    vcs.changed = ['src/export.ts'];

    const result = await c.finishTask(record.taskId, { commit: true });

    expect(result.commit).toEqual({
      committed: true,
      message: 'feat: Add export\n\nFiles changed (1):\n- src/export.ts',
      nothingToCommit: false,
      error: null,
    });
    expect(vcs.commits).toEqual([result.commit?.message]);
  });

  it('reports a failed commit without undoing completion', async () => {
    const c = coordinator();
    const { record } = await c.startTask({ description: 'Hooked' });
    vcs.commitAll = async () => {
      throw new Error('Commit failed: pre-commit hook rejected');
    };

    const result = await c.finishTask(record.taskId, { commit: true, message: 'fix: hooked' });

    expect(result.passed).toBe(true);
    expect(result.commit).toEqual({
      committed: false,
      message: 'fix: hooked',
      nothingToCommit: false,
      error: 'Commit failed: pre-commit hook rejected',
    });
    expect((await tasks.get(record.taskId)).status).toBe('complete');
  });

  it('refuses to commit without git before changing the record', async () => {
    const c = coordinator();
    const { record } = await c.startTask({ description: 'No git' });
    vcs.available = false;

    await expect(c.finishTask(record.taskId, { commit: true })).rejects.toThrow(
      'Cannot commit: project is not a git checkout',
    );
    expect((await tasks.get(record.taskId)).status).toBe('open');
  });

  it('prunes active snapshots to the retention limit', async () => {
    await store.createSnapshot([], 'older 1');
    await store.createSnapshot([], 'older 2');
    const c = coordinator({ retention: 1 });
    const { record } = await c.startTask({ description: 'Retain' });

    await c.finishTask(record.taskId);

    expect(await store.listSnapshots()).toHaveLength(1);
  });

  it('keeps snapshots of unfinished tasks when pruning', async () => {
    const c = coordinator({ retention: 1 });
    const open = await c.startTask({ description: 'Still open' });
    const adHoc = await store.createSnapshot([], 'manual');
    const done = await c.startTask({ description: 'Done', force: true });

    await c.finishTask(done.record.taskId);

    const active = (await store.listSnapshots()).map((s) => s.snapshotId);
    expect(active).toEqual([adHoc.meta.snapshotId, open.record.snapshotId]);
  });

  it('throws NotFoundError for an unknown task', async () => {
    await expect(
      coordinator().finishTask('task_fix_20260203_143022_ffff'),
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});

// ─── queries ────────────────────────────────────────────────────

describe('listTasks / latestOpenTask', () => {
  it('returns the newest task that is not complete', async () => {
    let clock = NOW;
    const c = coordinator({ now: () => clock });
    const first = await c.startTask({ description: 'First', force: true });
    clock += 1_000;
    const second = await c.startTask({ description: 'Second', force: true });
    await c.finishTask(second.record.taskId);

    expect((await c.listTasks()).map((t) => t.taskId)).toEqual([
      second.record.taskId,
      first.record.taskId,
    ]);
    expect((await c.latestOpenTask())?.taskId).toBe(first.record.taskId);
  });
});
