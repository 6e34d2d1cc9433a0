export type TasksnapErrorCode =
  | 'NOT_FOUND'
  | 'CAPTURE_FAILED'
  | 'WRITE_FAILED'
  | 'DIRTY_TREE'
  | 'LOCK_HELD'
  | 'SNAPSHOT_FORMAT'
  | 'TASK_STATE'
  | 'BRIEF_EXISTS'
  | 'CONFIG_INVALID';

export class TasksnapError extends Error {
  constructor(
    message: string,
    readonly code: TasksnapErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TasksnapError';
  }
}

/** A snapshot or task identifier that does not exist. */
export class NotFoundError extends TasksnapError {
  constructor(
    readonly kind: 'snapshot' | 'task',
    readonly id: string,
    detail?: string,
  ) {
    super(detail ?? `${kind === 'snapshot' ? 'Snapshot' : 'Task'} not found: ${id}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class CaptureError extends TasksnapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CAPTURE_FAILED', options);
    this.name = 'CaptureError';
  }
}

/** A single file that could not be written during rollback. */
export class WriteError extends TasksnapError {
  constructor(
    readonly path: string,
    readonly errno: string,
    message: string,
  ) {
    super(message, 'WRITE_FAILED');
    this.name = 'WriteError';
  }
}

export class DirtyTreeError extends TasksnapError {
  constructor(readonly files: string[]) {
    super(
      `Working tree has ${files.length} uncommitted change(s); refusing to snapshot in strict mode`,
      'DIRTY_TREE',
    );
    this.name = 'DirtyTreeError';
  }
}

export class LockHeldError extends TasksnapError {
  constructor(
    readonly lockPath: string,
    readonly lockedBy: string,
  ) {
    super(`Rollback lock ${lockPath} is held by ${lockedBy}`, 'LOCK_HELD');
    this.name = 'LockHeldError';
  }
}

export class SnapshotFormatError extends TasksnapError {
  constructor(file: string, detail: string) {
    super(`Unreadable metadata in ${file}: ${detail}`, 'SNAPSHOT_FORMAT');
    this.name = 'SnapshotFormatError';
  }
}

export class TaskStateError extends TasksnapError {
  constructor(taskId: string, from: string, to: string) {
    super(`Task ${taskId} cannot move from "${from}" to "${to}"`, 'TASK_STATE');
    this.name = 'TaskStateError';
  }
}

export class BriefExistsError extends TasksnapError {
  constructor(readonly briefPath: string) {
    super(`Task brief already exists: ${briefPath} (archive it first or use --force)`, 'BRIEF_EXISTS');
    this.name = 'BriefExistsError';
  }
}

export class ConfigError extends TasksnapError {
  constructor(message: string) {
    super(`Config validation failed: ${message}`, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

/** Node errno code of a filesystem error, or 'UNKNOWN'. */
export function errnoCode(err: unknown): string {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return 'UNKNOWN';
}

export function isEnoent(err: unknown): boolean {
  return errnoCode(err) === 'ENOENT';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
