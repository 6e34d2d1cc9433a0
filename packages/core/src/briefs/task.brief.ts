import type { TaskRecord } from '@tasksnap/shared';

export interface BriefMetadata {
  title: string | null;
  type: string | null;
  branch: string | null;
  description: string | null;
}

/**
 * Lowercase, collapse anything non-alphanumeric to "-", trim dashes, cap length.
 */
export function slugify(value: string, maxLen = 64): string {
  const cleaned = value
    .replace(/[^a-zA-Z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .toLowerCase();
  return cleaned ? cleaned.slice(0, maxLen) : 'untitled';
}

/** "2026-02-03T14:30:22Z" */
export function utcStamp(ms: number): string {
  return new Date(ms).toISOString().replace(/\.\d+Z$/, 'Z');
}

export function renderBrief(task: TaskRecord): string {
  const files =
    task.files.length > 0 ? task.files.map((f) => `- ${f}`).join('\n') : '- (To be determined)';

  return `# Task Brief (Latest)

## Meta
- UpdatedAt: ${utcStamp(task.createdAt)}
- Branch: ${task.branch ?? 'unknown'}
- Title: ${task.title}
- Type: ${task.type}
- Agent: ${task.agent ?? 'auto'}
- Task: ${task.taskId}
- Snapshot: ${task.snapshotId ?? 'none'}

## Description
${task.description}

## Scope
### In-scope
- ${task.title}

### Out-of-scope
- (Define what's not included)

## Files
${files}

## Acceptance Criteria
- [ ] Task completed as described
- [ ] Tests pass
- [ ] Documentation updated (if needed)
`;
}

function metaValue(content: string, key: string): string | null {
  const prefix = `- ${key}:`;
  for (const line of content.split('\n')) {
    if (line.trim().startsWith(prefix)) {
      const value = line.trim().slice(prefix.length).trim();
      return value || null;
    }
  }
  return null;
}

export function parseBrief(content: string): BriefMetadata {
  let description: string | null = null;
  const marker = '## Description';
  const start = content.indexOf(marker);
  if (start !== -1) {
    const bodyStart = start + marker.length;
    const end = content.indexOf('##', bodyStart);
    description = content.slice(bodyStart, end === -1 ? undefined : end).trim() || null;
  }

  return {
    title: metaValue(content, 'Title'),
    type: metaValue(content, 'Type'),
    branch: metaValue(content, 'Branch'),
    description,
  };
}
