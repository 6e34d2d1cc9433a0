import React from 'react';
import type { Command } from 'commander';
import type { RollbackResult } from '@tasksnap/shared';
import { NotFoundError, type Runtime } from '@tasksnap/core';
import { DiffView } from '../components/DiffView.js';
import { RollbackSummary } from '../components/RollbackSummary.js';
import { SnapshotList } from '../components/SnapshotList.js';
import { actionable, parseFileList, parseKeep, rollbackExitCode } from '../format.js';
import { canPrompt, confirmRollback, renderOnce } from '../render.js';
import { forwardWarnings, type GlobalOptions, type ProgramContext } from './context.js';

interface SnapshotOptions extends GlobalOptions {
  list?: boolean;
  latest?: boolean;
  id?: string;
  diff?: string;
  create?: string;
  delete?: string;
  cleanup?: number | true;
  files?: string[];
  dryRun?: boolean;
  yes?: boolean;
}

async function rollback(
  runtime: Runtime,
  snapshotId: string | null,
  options: SnapshotOptions,
): Promise<void> {
  const paths = parseFileList(options.files);
  const target = snapshotId ?? (await runtime.store.getLatestSnapshot())?.snapshotId;
  if (!target) {
    throw new NotFoundError('snapshot', 'latest', 'No snapshots available for rollback');
  }

  // Plan first so the user confirms exactly what will be written
  const plan = await runtime.rollback.rollback({ snapshotId: target, paths, dryRun: true });
  if (options.dryRun) {
    renderOnce(React.createElement(RollbackSummary, { result: plan }));
    return;
  }

  const changes = actionable(plan.diffs);
  if (changes.length > 0 && !options.yes && canPrompt()) {
    const meta = await runtime.store.getSnapshot(target);
    if (!(await confirmRollback(meta, changes))) {
      process.stderr.write('Rollback cancelled.\n');
      return;
    }
  }

  const result: RollbackResult = await runtime.rollback.rollback({
    snapshotId: target,
    paths,
    dryRun: false,
  });
  renderOnce(React.createElement(RollbackSummary, { result }));
  process.exitCode = rollbackExitCode(result);
}

async function runSnapshot(context: ProgramContext, options: SnapshotOptions): Promise<void> {
  const runtime = await context.openRuntime(options);
  forwardWarnings(runtime);

  if (options.create !== undefined) {
    const { meta } = await runtime.store.createSnapshot(parseFileList(options.files), options.create);
    process.stdout.write(`${meta.snapshotId}\n`);
  } else if (options.diff) {
    const diffs = await runtime.diff.diff(options.diff, parseFileList(options.files));
    renderOnce(React.createElement(DiffView, { snapshotId: options.diff, diffs }));
  } else if (options.id) {
    await rollback(runtime, options.id, options);
  } else if (options.latest) {
    await rollback(runtime, null, options);
  } else if (options.delete) {
    const removed = await runtime.store.deleteSnapshot(options.delete);
    process.stdout.write(removed ? `Deleted ${options.delete}\n` : `No snapshot ${options.delete}\n`);
  } else if (options.cleanup !== undefined) {
    const keep = options.cleanup === true ? runtime.config.snapshots.retention : options.cleanup;
    const deleted = await runtime.tasks.pruneSnapshots(keep);
    process.stdout.write(`Removed ${deleted.length} snapshot(s), kept ${keep}\n`);
  } else {
    const snapshots = await runtime.store.listSnapshots();
    renderOnce(React.createElement(SnapshotList, { snapshots }));
  }

  await runtime.pruneHistory();
}

export function registerSnapshotCommand(program: Command, context: ProgramContext): void {
  program
    .command('snapshot')
    .description('List, inspect, create and roll back snapshots')
    .option('--list', 'List snapshots, newest first (default)')
    .option('--latest', 'Roll back to the most recent snapshot')
    .option('--id <snapshotId>', 'Roll back to a specific snapshot')
    .option('--diff <snapshotId>', 'Show what changed since a snapshot')
    .option('--create <label>', 'Capture a snapshot now')
    .option('--delete <snapshotId>', 'Delete a snapshot')
    .option('--cleanup [keep]', 'Keep only the newest snapshots', parseKeep)
    .option('--files <paths...>', 'Restrict to these files or directories')
    .option('--dry-run', 'Show what a rollback would do without writing')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (options: SnapshotOptions, command: Command) => {
      await runSnapshot(context, { ...command.optsWithGlobals<GlobalOptions>(), ...options });
    });
}
