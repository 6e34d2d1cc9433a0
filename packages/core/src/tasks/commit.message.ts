import type { TaskRecord, TaskType } from '@tasksnap/shared';

const COMMIT_TYPES: Record<TaskType, string> = {
  feature: 'feat',
  fix: 'fix',
  refactor: 'refactor',
  test: 'test',
  docs: 'docs',
  chore: 'chore',
  custom: 'chore',
};

const MAX_DESCRIPTION = 200;
const MAX_FILES = 10;

/**
 * Conventional-commit message for a finished task.
 */
export function generateCommitMessage(
  task: Pick<TaskRecord, 'type' | 'title' | 'description'>,
  files: readonly string[],
): string {
  let message = `${COMMIT_TYPES[task.type]}: ${task.title}`;

  let description = task.description.trim();
  if (description && description !== task.title) {
    if (description.length > MAX_DESCRIPTION) {
      description = `${description.slice(0, MAX_DESCRIPTION - 3)}...`;
    }
    message += `\n\n${description}`;
  }

  if (files.length > 0) {
    message += `\n\nFiles changed (${files.length}):`;
    for (const file of files.slice(0, MAX_FILES)) message += `\n- ${file}`;
    if (files.length > MAX_FILES) message += `\n... and ${files.length - MAX_FILES} more`;
  }

  return message;
}
