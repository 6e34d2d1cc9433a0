import * as path from 'node:path';
import { createRuntime, loadConfig, type Runtime } from '@tasksnap/core';

export interface GlobalOptions {
  projectRoot?: string;
}

/** What the commands need from the outside world. */
export interface ProgramContext {
  openRuntime(options: GlobalOptions): Promise<Runtime>;
}

/** Load config for the project and wire the runtime. */
export async function openRuntime(options: GlobalOptions): Promise<Runtime> {
  const projectRoot = path.resolve(options.projectRoot ?? process.cwd());
  const config = await loadConfig(projectRoot);
  return createRuntime(projectRoot, config);
}

export const defaultContext: ProgramContext = { openRuntime };

function printWarning(warning: { message: string }): void {
  process.stderr.write(`warning: ${warning.message}\n`);
}

export function forwardWarnings(runtime: Runtime): void {
  runtime.store.on('warning', printWarning);
  runtime.rollback.on('warning', printWarning);
  runtime.tasks.on('warning', printWarning);
}
