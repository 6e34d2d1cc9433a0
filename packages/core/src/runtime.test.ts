import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import type { TasksnapConfig } from '@tasksnap/shared';
import { DEFAULT_CONFIG } from './config/config.defaults.js';
import { createRuntime } from './runtime.js';
import { FakeVersionControl } from './vcs/fake.vcs.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tasksnap-runtime-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

function config(overrides: Partial<TasksnapConfig> = {}): TasksnapConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

describe('createRuntime', () => {
  it('runs a task from start through rollback to completion', async () => {
    await fs.writeFile(path.join(tmpDir, 'a.txt'), '1');
    const vcs = new FakeVersionControl(tmpDir);
    const runtime = createRuntime(tmpDir, config(), { vcs });

    const started = await runtime.tasks.startTask({ description: 'Edit a', files: ['a.txt'] });
    await fs.writeFile(path.join(tmpDir, 'a.txt'), 'agent output');

    const rolledBack = await runtime.rollback.rollbackLatest({ dryRun: false });
    expect(rolledBack.snapshotId).toBe(started.record.snapshotId);
    expect(await fs.readFile(path.join(tmpDir, 'a.txt'), 'utf-8')).toBe('1');

    const finished = await runtime.tasks.finishTask(started.record.taskId);
    expect(finished.passed).toBe(true);
    expect(finished.archivedBrief).not.toBeNull();

    const actions = (await runtime.history.listEntries()).map((e) => e.action).sort();
    expect(actions).toEqual(['archive', 'create', 'rollback']);
  });

  it('writes briefs to the configured directory', async () => {
    const runtime = createRuntime(tmpDir, config({ briefs: { dir: 'notes' } }), {
      vcs: new FakeVersionControl(tmpDir, { available: false }),
    });

    const { briefPath } = await runtime.tasks.startTask({ description: 'Brief location' });

    expect(briefPath).toBe(path.join(tmpDir, 'notes/latest.md'));
  });

  it('fails a task when the validation command fails', async () => {
    const runtime = createRuntime(
      tmpDir,
      config({ validation: { command: 'exit 1', timeout_ms: 5_000 } }),
      { vcs: new FakeVersionControl(tmpDir, { available: false }) },
    );
    const { record } = await runtime.tasks.startTask({ description: 'Validated' });

    const result = await runtime.tasks.finishTask(record.taskId);

    expect(result.passed).toBe(false);
    expect(result.findings[0].message).toBe('Validation command exited with code 1');
  });

  it('prunes history to the configured retention', async () => {
    const runtime = createRuntime(tmpDir, config({ logs: { retention: 1 } }), {
      vcs: new FakeVersionControl(tmpDir, { available: false }),
    });
    await runtime.store.createSnapshot([], 'one');
    await runtime.store.createSnapshot([], 'two');

    expect(await runtime.pruneHistory()).toBe(1);
    expect(await runtime.history.listEntries()).toHaveLength(1);
  });
});
