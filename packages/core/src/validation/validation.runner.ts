import { spawn } from 'node:child_process';
import type { TaskRecord, ValidationFinding, ValidationResult } from '@tasksnap/shared';
import { errnoCode } from '../errors/errors.js';

const MAX_FINDINGS = 50;

export interface ValidationContext {
  projectRoot: string;
  task: TaskRecord;
}

/** Pass/fail check run before a task is marked complete. */
export type Validator = (ctx: ValidationContext) => Promise<ValidationResult>;

/** Used when no validation command is configured. */
export const passingValidator: Validator = async () => ({ passed: true, findings: [] });

/**
 * Turn command output into findings, one per non-empty line, capped.
 */
export function outputToFindings(
  output: string,
  severity: ValidationFinding['severity'],
): ValidationFinding[] {
  const lines = output
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.trim().length > 0);

  const findings = lines.slice(0, MAX_FINDINGS).map((message) => ({ severity, message }));
  if (lines.length > MAX_FINDINGS) {
    findings.push({ severity: 'info', message: `... ${lines.length - MAX_FINDINGS} more line(s)` });
  }
  return findings;
}

/**
 * Run `command` through the shell in the project root. Exit code 0 passes;
 * anything else fails with the output lines as findings.
 *
 * The shell runs in its own process group so a timeout kills everything it
 * started, not just the shell.
 */
export function commandValidator(command: string, options: { timeoutMs?: number } = {}): Validator {
  const timeoutMs = options.timeoutMs ?? 120_000;

  return (ctx) =>
    new Promise<ValidationResult>((resolve) => {
      const proc = spawn(command, {
        shell: true,
        cwd: ctx.projectRoot,
        env: { ...process.env, TASKSNAP_TASK_ID: ctx.task.taskId },
        detached: true,
      });
      let output = '';
      let timedOut = false;
      let settled = false;

      const settle = (result: ValidationResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const timer = setTimeout(() => {
        timedOut = true;
        killGroup(proc.pid);
        proc.kill('SIGKILL');
      }, timeoutMs);

      proc.stdout.on('data', (chunk: Buffer) => {
        output += chunk.toString();
      });
      proc.stderr.on('data', (chunk: Buffer) => {
        output += chunk.toString();
      });

      const timeoutResult = (): ValidationResult => ({
        passed: false,
        findings: [{ severity: 'error', message: `Validation timed out after ${timeoutMs}ms` }],
      });

      // A killed shell may leave children holding the pipes open, so 'close'
      // can lag far behind 'exit'
      proc.on('exit', () => {
        if (timedOut) settle(timeoutResult());
      });

      proc.on('close', (code) => {
        if (timedOut) {
          settle(timeoutResult());
          return;
        }
        if (code === 0) {
          settle({ passed: true, findings: outputToFindings(output, 'info') });
          return;
        }
        settle({
          passed: false,
          findings: [
            { severity: 'error', message: `Validation command exited with code ${code}` },
            ...outputToFindings(output, 'error'),
          ],
        });
      });

      proc.on('error', (err) => {
        settle({
          passed: false,
          findings: [{ severity: 'error', message: `Could not run validation: ${err.message}` }],
        });
      });
    });
}

function killGroup(pid: number | undefined): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    // ESRCH: the group already exited
    if (errnoCode(err) !== 'ESRCH') throw err;
  }
}
