/**
 * Process Runner
 *
 * Runs a subprocess to completion with a hard timeout.
 * - stdout and stderr are captured separately
 * - On timeout: SIGTERM, then SIGKILL after a grace period
 * - A timeout is reported through `timedOut`, not as an exception
 * - Failing to start the process rejects with RelayError (E502)
 */

import { spawn } from 'child_process';
import { ErrorCode, RelayError } from '../errors';

/**
 * Grace period before force kill after SIGTERM
 */
export const SIGTERM_GRACE_MS = 5000;

export interface ProcessRunOptions {
  /** Hard limit for the whole run */
  timeoutMs: number;
  /** Working directory */
  cwd?: string;
  /** Delay between SIGTERM and SIGKILL (default: 5000ms) */
  killGraceMs?: number;
}

export interface ProcessOutcome {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
}

export interface IProcessRunner {
  run(command: string, args: string[], options: ProcessRunOptions): Promise<ProcessOutcome>;
}

export class SpawnProcessRunner implements IProcessRunner {
  run(command: string, args: string[], options: ProcessRunOptions): Promise<ProcessOutcome> {
    return new Promise((resolve, reject) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;
      let killTimer: ReturnType<typeof setTimeout> | null = null;

      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, options.killGraceMs ?? SIGTERM_GRACE_MS);
      }, options.timeoutMs);

      const clearTimers = (): void => {
        clearTimeout(timeoutTimer);
        if (killTimer) {
          clearTimeout(killTimer);
        }
      };

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', error => {
        clearTimers();
        if (settled) {
          return;
        }
        settled = true;
        reject(new RelayError(ErrorCode.E502_PROCESS_SPAWN_FAILURE, `${command}: ${error.message}`));
      });

      child.on('close', (code, signal) => {
        clearTimers();
        if (settled) {
          return;
        }
        settled = true;
        resolve({
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: Buffer.concat(stderr).toString('utf-8'),
          exitCode: code,
          signal,
          timedOut,
        });
      });
    });
  }
}
