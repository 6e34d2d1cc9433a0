import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import type { FileDiff, FinishResult, RollbackResult } from '@tasksnap/shared';
import {
  actionable,
  finishExitCode,
  formatDate,
  parseFileList,
  parseKeep,
  parseTaskType,
  rollbackCounts,
  rollbackExitCode,
  truncate,
} from './format.js';

function diff(path: string, change: FileDiff['change'], action: FileDiff['action']): FileDiff {
  return { path, change, action, patch: null, binary: false };
}

function result(overrides: Partial<RollbackResult> = {}): RollbackResult {
  return {
    snapshotId: 'snap_20260203T143022123Z_ab12',
    dryRun: false,
    diffs: [],
    restored: [],
    removed: [],
    unchanged: [],
    skipped: [],
    errors: [],
    ...overrides,
  };
}

describe('formatDate / truncate', () => {
  it('formats UTC minutes', () => {
    expect(formatDate(Date.UTC(2026, 1, 3, 14, 30, 22))).toBe('2026-02-03 14:30');
  });

  it('flattens and shortens text', () => {
    expect(truncate('line one\nline two', 9)).toBe('line one…');
    expect(truncate('short', 10)).toBe('short');
  });
});

describe('option parsers', () => {
  it('splits comma-separated and repeated file options', () => {
    expect(parseFileList(['a.txt,b.txt', ' src ', ''])).toEqual(['a.txt', 'b.txt', 'src']);
    expect(parseFileList(undefined)).toEqual([]);
  });

  it('accepts known task types case-insensitively', () => {
    expect(parseTaskType('Fix')).toBe('fix');
    expect(() => parseTaskType('epic')).toThrow(InvalidArgumentError);
  });

  it('parses a retention count', () => {
    expect(parseKeep('3')).toBe(3);
    expect(() => parseKeep('-1')).toThrow(InvalidArgumentError);
  });
});

describe('rollback summaries', () => {
  it('counts the plan of a dry run', () => {
    const plan = result({
      dryRun: true,
      diffs: [
        diff('a.txt', 'modified', 'restore'),
        diff('b.txt', 'deleted', 'restore'),
        diff('c.txt', 'added', 'remove'),
        diff('d.txt', 'added', 'leave'),
        diff('e.txt', 'unchanged', 'none'),
      ],
      unchanged: ['e.txt'],
    });
    expect(actionable(plan.diffs).map((d) => d.path)).toEqual(['a.txt', 'b.txt', 'c.txt']);
    expect(rollbackCounts(plan)).toBe('2 to restore, 1 to remove, 1 unchanged');
  });

  it('counts an applied rollback and fails on write errors', () => {
    const applied = result({
      restored: ['a.txt'],
      unchanged: ['b.txt'],
      errors: [{ path: 'c.txt', code: 'EACCES', message: 'permission denied' }],
    });
    expect(rollbackCounts(applied)).toBe('1 restored, 1 unchanged, 1 failed');
    expect(rollbackExitCode(applied)).toBe(1);
    expect(rollbackExitCode(result())).toBe(0);
  });
});

describe('finishExitCode', () => {
  function finished(overrides: Partial<FinishResult> = {}): FinishResult {
    return {
      record: {
        schemaVersion: 1,
        taskId: 'task_fix_20260203_143022_ab12',
        title: 'Fix',
        description: 'Fix',
        type: 'fix',
        files: [],
        agent: null,
        snapshotId: null,
        branch: 'main',
        status: 'complete',
        createdAt: 1,
        completedAt: 2,
        attempts: 1,
        lastFindings: [],
      },
      passed: true,
      findings: [],
      archivedBrief: null,
      commit: null,
      ...overrides,
    };
  }

  it('is 0 for a passing task with or without a commit', () => {
    expect(finishExitCode(finished())).toBe(0);
    expect(
      finishExitCode(
        finished({ commit: { committed: true, message: 'fix: x', nothingToCommit: false, error: null } }),
      ),
    ).toBe(0);
  });

  it('is 1 when validation fails or the commit fails', () => {
    expect(finishExitCode(finished({ passed: false }))).toBe(1);
    expect(
      finishExitCode(
        finished({
          commit: { committed: false, message: 'fix: x', nothingToCommit: false, error: 'hook rejected' },
        }),
      ),
    ).toBe(1);
  });
});
