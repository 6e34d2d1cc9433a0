import React from 'react';
import type { Command } from 'commander';
import type { TaskType } from '@tasksnap/shared';
import { NotFoundError } from '@tasksnap/core';
import { TaskFinished, TaskList, TaskStarted } from '../components/TaskSummary.js';
import { finishExitCode, parseFileList, parseTaskType } from '../format.js';
import { canPrompt, promptTask, renderOnce } from '../render.js';
import { forwardWarnings, type GlobalOptions, type ProgramContext } from './context.js';

interface StartOptions extends GlobalOptions {
  type: TaskType;
  files?: string[];
  title?: string;
  agent?: string;
  force?: boolean;
  interactive?: boolean;
}

interface FinishOptions extends GlobalOptions {
  id?: string;
  commit?: boolean;
  message?: string;
  validate: boolean;
  archive: boolean;
}

async function startTask(
  context: ProgramContext,
  description: string | undefined,
  options: StartOptions,
): Promise<void> {
  let input = {
    description: description ?? '',
    type: options.type,
    files: parseFileList(options.files),
    title: options.title,
  };

  if (options.interactive) {
    if (!canPrompt()) throw new Error('--interactive needs a terminal');
    const answers = await promptTask({
      description: input.description,
      type: input.type,
      files: input.files.join(', '),
      title: input.title ?? '',
    });
    input = {
      description: answers.description,
      type: answers.type ? parseTaskType(answers.type) : input.type,
      files: parseFileList([answers.files]),
      title: answers.title || undefined,
    };
  }

  const runtime = await context.openRuntime(options);
  const result = await runtime.tasks.startTask({
    ...input,
    agent: options.agent ?? null,
    force: options.force,
  });
  renderOnce(React.createElement(TaskStarted, { result }));
  await runtime.pruneHistory();
}

async function finishTask(context: ProgramContext, options: FinishOptions): Promise<void> {
  const runtime = await context.openRuntime(options);
  forwardWarnings(runtime);

  let taskId = options.id;
  if (!taskId) {
    const open = await runtime.tasks.latestOpenTask();
    if (!open) throw new NotFoundError('task', 'latest', 'No open task to finish');
    taskId = open.taskId;
  }

  const result = await runtime.tasks.finishTask(taskId, {
    commit: options.commit,
    message: options.message,
    validate: options.validate,
    archive: options.archive,
  });
  renderOnce(React.createElement(TaskFinished, { result }));
  process.exitCode = finishExitCode(result);
  await runtime.pruneHistory();
}

export function registerTaskCommand(program: Command, context: ProgramContext): void {
  const task = program.command('task').description('Snapshot-backed task workflow');

  task
    .command('start [description]')
    .description('Snapshot the task files and open a task')
    .option('-t, --type <type>', 'feature | fix | refactor | test | docs | chore | custom', parseTaskType, 'feature')
    .option('--files <paths...>', 'Files or directories the task will touch')
    .option('--title <title>', 'Short title (derived from the description by default)')
    .option('--agent <name>', 'Agent that will work on the task')
    .option('-f, --force', 'Overwrite an existing task brief')
    .option('-i, --interactive', 'Prompt for the task details')
    .action(async (description: string | undefined, options: StartOptions, command: Command) => {
      await startTask(context, description, { ...command.optsWithGlobals<GlobalOptions>(), ...options });
    });

  task
    .command('finish')
    .description('Validate and complete the latest open task')
    .option('--id <taskId>', 'Task to finish (latest open task by default)')
    .option('--commit', 'Commit all changes when validation passes')
    .option('-m, --message <message>', 'Commit message (generated by default)')
    .option('--no-validate', 'Skip the validation command')
    .option('--no-archive', 'Keep the task brief in place')
    .action(async (options: FinishOptions, command: Command) => {
      await finishTask(context, { ...command.optsWithGlobals<GlobalOptions>(), ...options });
    });

  task
    .command('list')
    .description('List tasks, newest first')
    .action(async (_options: GlobalOptions, command: Command) => {
      const runtime = await context.openRuntime(command.optsWithGlobals<GlobalOptions>());
      forwardWarnings(runtime);
      renderOnce(React.createElement(TaskList, { tasks: await runtime.tasks.listTasks() }));
    });
}
