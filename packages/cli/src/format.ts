import type {
  FileChange,
  FileDiff,
  FinishResult,
  RollbackResult,
  TaskStatus,
  TaskType,
} from '@tasksnap/shared';
import { TASK_TYPES } from '@tasksnap/shared';
import { InvalidArgumentError } from 'commander';
import { THEME } from './theme.js';

/** "2026-02-03 14:30" in UTC. */
export function formatDate(ts: number): string {
  return new Date(ts).toISOString().slice(0, 16).replace('T', ' ');
}

export function truncate(str: string, len: number): string {
  const clean = str.replace(/\n/g, ' ').trim();
  return clean.length > len ? clean.slice(0, len - 1) + '…' : clean;
}

const CHANGE_MARKS: Record<FileChange, string> = {
  modified: 'M',
  deleted: 'D',
  added: 'A',
  unchanged: ' ',
};

export function changeMark(change: FileChange): string {
  return CHANGE_MARKS[change];
}

export function changeColor(change: FileChange): string {
  switch (change) {
    case 'modified':
      return THEME.warning;
    case 'deleted':
      return THEME.error;
    case 'added':
      return THEME.success;
    case 'unchanged':
      return THEME.dim;
  }
}

export function statusColor(status: TaskStatus): string {
  if (status === 'complete') return THEME.success;
  if (status === 'failed') return THEME.error;
  return THEME.warning;
}

/** Color for one line of a unified patch. */
export function patchLineColor(line: string): string {
  if (line.startsWith('+++') || line.startsWith('---') || line.startsWith('Index:')) return THEME.dim;
  if (line.startsWith('===')) return THEME.dim;
  if (line.startsWith('@@')) return THEME.primary;
  if (line.startsWith('+')) return THEME.success;
  if (line.startsWith('-')) return THEME.error;
  return THEME.text;
}

/** Diffs that would change something on rollback. */
export function actionable(diffs: readonly FileDiff[]): FileDiff[] {
  return diffs.filter((d) => d.action === 'restore' || d.action === 'remove');
}

/** "2 restored, 1 removed, 3 unchanged" */
export function rollbackCounts(result: RollbackResult): string {
  const parts: string[] = [];
  if (result.dryRun) {
    const plan = actionable(result.diffs);
    const restore = plan.filter((d) => d.action === 'restore').length;
    const remove = plan.length - restore;
    parts.push(`${restore} to restore`);
    if (remove > 0) parts.push(`${remove} to remove`);
  } else {
    parts.push(`${result.restored.length} restored`);
    if (result.removed.length > 0) parts.push(`${result.removed.length} removed`);
  }
  parts.push(`${result.unchanged.length} unchanged`);
  if (result.errors.length > 0) parts.push(`${result.errors.length} failed`);
  return parts.join(', ');
}

export function rollbackExitCode(result: RollbackResult): number {
  return result.errors.length > 0 ? 1 : 0;
}

export function finishExitCode(result: FinishResult): number {
  return result.passed && !result.commit?.error ? 0 : 1;
}

/** Split a comma- or space-separated option value into paths. */
export function parseFileList(values: readonly string[] | undefined): string[] {
  if (!values) return [];
  return values
    .flatMap((v) => v.split(','))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

export function parseTaskType(value: string): TaskType {
  const type = TASK_TYPES.find((t) => t === value.toLowerCase());
  if (!type) {
    throw new InvalidArgumentError(`Unknown task type "${value}" (expected one of ${TASK_TYPES.join(', ')})`);
  }
  return type;
}

export function parseKeep(value: string): number {
  const keep = Number(value);
  if (!Number.isInteger(keep) || keep < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}"`);
  }
  return keep;
}
