/** Result of capturing the working tree through version control. */
export interface NativeCapture {
  ref: string;
  baseline: 'stash' | 'head';
  /** Files present in the captured tree under the requested paths. */
  files: string[];
}

export interface CommitResult {
  committed: boolean;
  nothingToCommit: boolean;
  output: string;
}

/**
 * Version-control operations the snapshot store and task coordinator consume.
 * All paths are project-relative with POSIX separators.
 */
export interface VersionControl {
  isAvailable(): Promise<boolean>;
  /** Modified, staged, deleted and untracked files. */
  changedFiles(): Promise<string[]>;
  /** Files git does not track under `paths`, ignored ones included. */
  untrackedFiles(paths: readonly string[]): Promise<string[]>;
  currentBranch(): Promise<string | null>;
  /** Capture without touching the working tree; null when the tree cannot be stashed. */
  captureStash(label: string, paths: readonly string[]): Promise<NativeCapture | null>;
  readFile(ref: string, file: string): Promise<Buffer | null>;
  /** Permission bits recorded for `file` in `ref`, or null when unknown. */
  fileMode(ref: string, file: string): Promise<number | null>;
  hasRef(ref: string, baseline: 'stash' | 'head'): Promise<boolean>;
  /** Remove a stored stash entry; no-op when it is already gone. */
  dropStash(ref: string): Promise<void>;
  commitAll(message: string): Promise<CommitResult>;
}
