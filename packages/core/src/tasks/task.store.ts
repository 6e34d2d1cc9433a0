import { EventEmitter } from 'node:events';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  TASK_TYPES,
  type StorageWarning,
  type TaskRecord,
  type TaskStatus,
  type TaskType,
  type ValidationFinding,
} from '@tasksnap/shared';
import { NotFoundError, SnapshotFormatError, errorMessage, isEnoent } from '../errors/errors.js';
import { writeFileAtomic } from '../fs/atomic.write.js';
import { isRecord, isStringArray } from '../storage/guards.js';

export const TASK_SCHEMA_VERSION = 1;

const TASK_ID_PATTERN = /^task_[a-z]+_\d{8}_\d{6}_[0-9a-f]{4}$/;
const TASK_STATUSES: readonly TaskStatus[] = ['open', 'validating', 'complete', 'failed'];
const SEVERITIES: readonly ValidationFinding['severity'][] = ['error', 'warning', 'info'];

export function isTaskId(value: string): boolean {
  return TASK_ID_PATTERN.test(value);
}

function isTaskType(value: unknown): value is TaskType {
  return TASK_TYPES.some((t) => t === value);
}

function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some((s) => s === value);
}

function parseFindings(value: unknown): ValidationFinding[] | null {
  if (!Array.isArray(value)) return null;
  const findings: ValidationFinding[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) return null;
    const { severity: raw, message } = entry;
    const severity = SEVERITIES.find((s) => s === raw);
    if (!severity || typeof message !== 'string') return null;
    findings.push({ severity, message });
  }
  return findings;
}

function nullable<T>(value: unknown, check: (v: unknown) => v is T): value is T | null {
  return value === null || check(value);
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isNumber = (v: unknown): v is number => typeof v === 'number';

function parseTaskRecord(raw: string, file: string): TaskRecord {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new SnapshotFormatError(file, errorMessage(err));
  }
  if (!isRecord(data)) {
    throw new SnapshotFormatError(file, 'not an object');
  }
  if (data['schemaVersion'] !== TASK_SCHEMA_VERSION) {
    throw new SnapshotFormatError(file, `unsupported schemaVersion ${String(data['schemaVersion'])}`);
  }
  const {
    taskId, title, description, type, files, agent, snapshotId, branch, status,
    createdAt, completedAt, attempts,
  } = data;
  const lastFindings = parseFindings(data['lastFindings']);
  if (
    !isString(taskId) ||
    !isString(title) ||
    !isString(description) ||
    !isTaskType(type) ||
    !isStringArray(files) ||
    !nullable(agent, isString) ||
    !nullable(snapshotId, isString) ||
    !nullable(branch, isString) ||
    !isTaskStatus(status) ||
    !isNumber(createdAt) ||
    !nullable(completedAt, isNumber) ||
    !isNumber(attempts) ||
    lastFindings === null
  ) {
    throw new SnapshotFormatError(file, 'missing or mistyped fields');
  }
  return {
    schemaVersion: TASK_SCHEMA_VERSION,
    taskId,
    title,
    description,
    type,
    files,
    agent,
    snapshotId,
    branch,
    status,
    createdAt,
    completedAt,
    attempts,
    lastFindings,
  };
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface TaskStore {
  on(event: 'warning', listener: (warning: StorageWarning) => void): this;
  emit(event: 'warning', warning: StorageWarning): boolean;
}

/**
 * Task records as `<tasksDir>/<taskId>.json`.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class TaskStore extends EventEmitter {
  constructor(private readonly tasksDir: string) {
    super();
  }

  private recordPath(taskId: string): string {
    return path.join(this.tasksDir, `${taskId}.json`);
  }

  async save(record: TaskRecord): Promise<void> {
    await writeFileAtomic(this.recordPath(record.taskId), JSON.stringify(record, null, 2));
  }

  /**
   * @throws NotFoundError when no record exists for `taskId`
   */
  async get(taskId: string): Promise<TaskRecord> {
    if (!isTaskId(taskId)) throw new NotFoundError('task', taskId);
    const file = this.recordPath(taskId);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (isEnoent(err)) throw new NotFoundError('task', taskId);
      throw err;
    }
    return parseTaskRecord(raw, file);
  }

  /**
   * All records, newest first. Unparseable records are skipped with an
   * `unreadable_entry` warning.
   */
  async list(): Promise<TaskRecord[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.tasksDir);
    } catch (err) {
      if (isEnoent(err)) return [];
      throw err;
    }

    const records: TaskRecord[] = [];
    for (const entry of entries) {
      if (!entry.endsWith('.json') || !isTaskId(entry.slice(0, -5))) continue;
      const file = path.join(this.tasksDir, entry);
      const raw = await fs.readFile(file, 'utf-8');
      try {
        records.push(parseTaskRecord(raw, file));
      } catch (err) {
        if (!(err instanceof SnapshotFormatError)) throw err;
        this.emit('warning', { kind: 'unreadable_entry', message: `Skipping task: ${err.message}` });
      }
    }

    records.sort((a, b) =>
      b.createdAt !== a.createdAt ? b.createdAt - a.createdAt : b.taskId.localeCompare(a.taskId),
    );
    return records;
  }
}
