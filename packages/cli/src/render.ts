import React from 'react';
import { render } from 'ink';
import type { FileDiff, SnapshotMeta } from '@tasksnap/shared';
import { RollbackConfirm } from './components/RollbackConfirm.js';
import { TaskPrompt, type TaskAnswers } from './components/TaskPrompt.js';

/** Render a static element once and release the terminal. */
export function renderOnce(element: React.ReactElement): void {
  const { unmount } = render(element);
  unmount();
}

/** Confirmation only makes sense when a person can answer. */
export function canPrompt(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

export async function confirmRollback(snapshot: SnapshotMeta, plan: FileDiff[]): Promise<boolean> {
  let answer = false;
  const app = render(
    React.createElement(RollbackConfirm, {
      snapshot,
      plan,
      onConfirm: () => {
        answer = true;
        app.unmount();
      },
      onCancel: () => {
        app.unmount();
      },
    }),
    { exitOnCtrlC: true },
  );
  await app.waitUntilExit();
  return answer;
}

export async function promptTask(initial: TaskAnswers): Promise<TaskAnswers> {
  let result: TaskAnswers = initial;
  const app = render(
    React.createElement(TaskPrompt, {
      initial,
      onDone: (answers: TaskAnswers) => {
        result = answers;
        app.unmount();
      },
    }),
  );
  await app.waitUntilExit();
  return result;
}
