/**
 * @fileoverview Process runner
 *
 * Spawns a local executable with a timeout and collects its output.
 */

import { spawn } from 'child_process';
import { CommandError } from '../errors.js';

const DEFAULT_TIMEOUT = 60_000;
const SIGKILL_GRACE_MS = 1_000;

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut?: boolean;
  interrupted?: boolean;
}

export interface RunCommandOptions {
  timeoutMs?: number;
  /** Terminates the process when aborted */
  signal?: AbortSignal;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunCommandOptions): Promise<CommandResult>;
}

export class ProcessRunner implements CommandRunner {
  constructor(private readonly defaultTimeout: number = DEFAULT_TIMEOUT) {}

  /**
   * Non-zero exit codes resolve normally; only a process that cannot be
   * started rejects, with a CommandError. A timeout or abort sends SIGTERM,
   * then SIGKILL if the process is still running after a grace period.
   */
  run(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandResult> {
    const timeout = options.timeoutMs ?? this.defaultTimeout;
    const { signal } = options;

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let interrupted = false;
      let graceId: NodeJS.Timeout | undefined;

      const proc = spawn(command, args, { windowsHide: true });

      const terminate = () => {
        graceId ??= setTimeout(() => {
          if (proc.exitCode === null && proc.signalCode === null) {
            proc.kill('SIGKILL');
          }
        }, SIGKILL_GRACE_MS);
        proc.kill('SIGTERM');
      };

      const timeoutId = setTimeout(() => {
        timedOut = true;
        terminate();
      }, timeout);

      const abortHandler = () => {
        interrupted = true;
        terminate();
      };

      const cleanup = () => {
        clearTimeout(timeoutId);
        clearTimeout(graceId);
        signal?.removeEventListener('abort', abortHandler);
      };

      if (signal?.aborted) {
        abortHandler();
      } else {
        signal?.addEventListener('abort', abortHandler, { once: true });
      }

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code: number | null) => {
        cleanup();
        const output = { stdout: stdout.trim(), stderr: stderr.trim() };
        if (timedOut) {
          resolve({ ...output, exitCode: code ?? 137, timedOut: true });
          return;
        }
        if (interrupted) {
          resolve({ ...output, exitCode: code ?? 130, interrupted: true });
          return;
        }
        resolve({ ...output, exitCode: code ?? 1 });
      });

      proc.on('error', (err: Error) => {
        cleanup();
        reject(new CommandError(command, null, err.message, { cause: err }));
      });
    });
  }
}
