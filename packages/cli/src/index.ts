#!/usr/bin/env node
/**
 * tasksnap: snapshot the files an AI task will touch, inspect what changed,
 * and roll back all or part of it.
 *
 *   tasksnap task start "Fix login redirect" --type fix --files src/auth
 *   tasksnap snapshot --diff <id>
 *   tasksnap snapshot --latest --files src/auth/session.ts
 *   tasksnap task finish --commit
 */
import { runCli } from './program.js';

process.exitCode = await runCli(process.argv.slice(2));
