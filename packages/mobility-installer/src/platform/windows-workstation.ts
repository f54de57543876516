/**
 * @fileoverview Windows workstation
 *
 * Answers the installer's questions about the local machine with
 * PowerShell cmdlets, and runs the installer package directly.
 */

import * as fs from 'fs/promises';
import { createLogger, type PaperkitLogger } from '@paperkit/core';
import { CommandError } from '../errors.js';
import type { ServiceStatus, Workstation } from '../types.js';
import { ProcessRunner, type CommandRunner } from './process-runner.js';

const POWERSHELL = 'powershell.exe';
const POWERSHELL_ARGS = ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-Command'];
const TIMED_OUT_EXIT_CODE = 137;

/** ServiceControllerStatus names as printed by PowerShell */
const SERVICE_STATUSES: Record<string, ServiceStatus> = {
  Running: 'running',
  Stopped: 'stopped',
  Paused: 'stopped',
  StartPending: 'pending',
  StopPending: 'pending',
  ContinuePending: 'pending',
  PausePending: 'pending',
};

/**
 * Quote a value as a PowerShell single-quoted string literal
 */
export function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export interface WindowsWorkstationOptions {
  runner?: CommandRunner;
  /** Timeout for each PowerShell query */
  commandTimeoutMs?: number;
  /** Timeout for the installer package itself */
  installerTimeoutMs?: number;
  logger?: PaperkitLogger;
}

export class WindowsWorkstation implements Workstation {
  private readonly runner: CommandRunner;
  private readonly commandTimeoutMs: number;
  private readonly installerTimeoutMs: number;
  private readonly logger: PaperkitLogger;

  constructor(options: WindowsWorkstationOptions = {}) {
    this.runner = options.runner ?? new ProcessRunner();
    this.commandTimeoutMs = options.commandTimeoutMs ?? 30_000;
    this.installerTimeoutMs = options.installerTimeoutMs ?? 15 * 60_000;
    this.logger = options.logger ?? createLogger('windows-workstation');
  }

  async pathExists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async getServiceStatus(serviceName: string): Promise<ServiceStatus> {
    const output = await this.powershell(
      `$service = Get-Service -Name ${quotePowerShell(serviceName)} -ErrorAction SilentlyContinue; ` +
        'if ($service) { $service.Status.ToString() }'
    );
    if (output === '') {
      return 'missing';
    }
    const status = SERVICE_STATUSES[output];
    if (!status) {
      this.logger.debug('Unrecognized service status', { serviceName, output });
      return 'pending';
    }
    return status;
  }

  async listPrinters(): Promise<string[]> {
    const output = await this.powershell('Get-Printer | Select-Object -ExpandProperty Name');
    return output
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async runInstaller(file: string, args: string[], signal?: AbortSignal): Promise<number> {
    this.logger.info('Running installer', { file, args });
    const result = await this.runner.run(file, args, { timeoutMs: this.installerTimeoutMs, signal });
    if (result.timedOut) {
      this.logger.warn('Installer timed out', { file, timeoutMs: this.installerTimeoutMs });
      // A killed installer may still exit 0
      return result.exitCode === 0 ? TIMED_OUT_EXIT_CODE : result.exitCode;
    }
    return result.exitCode;
  }

  async openUri(uri: string): Promise<void> {
    await this.powershell(`Start-Process ${quotePowerShell(uri)}`);
  }

  async removeFile(path: string): Promise<void> {
    await fs.rm(path, { force: true });
  }

  private async powershell(script: string): Promise<string> {
    const result = await this.runner.run(POWERSHELL, [...POWERSHELL_ARGS, script], {
      timeoutMs: this.commandTimeoutMs,
    });
    if (result.exitCode !== 0) {
      throw new CommandError(POWERSHELL, result.exitCode, result.stderr);
    }
    return result.stdout;
  }
}
