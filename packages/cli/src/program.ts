import { Command } from 'commander';
import { TasksnapError, errorMessage } from '@tasksnap/core';
import { defaultContext, type ProgramContext } from './commands/context.js';
import { registerSnapshotCommand } from './commands/snapshot.command.js';
import { registerTaskCommand } from './commands/task.command.js';

export function createProgram(context: ProgramContext = defaultContext): Command {
  const program = new Command();

  program
    .name('tasksnap')
    .description('Snapshots and rollback for AI-assisted edits')
    .version('0.1.0')
    .option('--project-root <path>', 'Project directory (defaults to the current directory)');

  registerSnapshotCommand(program, context);
  registerTaskCommand(program, context);

  return program;
}

/**
 * Run one command line (without the node and script entries) and return its
 * exit code. Failures are printed to stderr as `CODE: message`.
 */
export async function runCli(
  argv: readonly string[],
  context: ProgramContext = defaultContext,
): Promise<number> {
  try {
    await createProgram(context).parseAsync([...argv], { from: 'user' });
  } catch (err) {
    const prefix = err instanceof TasksnapError ? `${err.code}: ` : '';
    process.stderr.write(prefix + errorMessage(err) + '\n');
    return 1;
  }
  return typeof process.exitCode === 'number' ? process.exitCode : 0;
}
