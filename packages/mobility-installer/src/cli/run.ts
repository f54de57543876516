/**
 * @fileoverview CLI driver
 *
 * Everything the command does between parsing arguments and exiting, with
 * the process-level pieces passed in.
 */

import {
  VERSION,
  formatError,
  getLogger,
  loadSettings,
  resetLogger,
  type SettingsEnv,
} from '@paperkit/core';
import { buildInstallerConfig } from '../config.js';
import { UnsupportedPlatformError } from '../errors.js';
import { MobilityInstaller } from '../installer.js';
import { HttpPackageSource } from '../platform/http-package-source.js';
import { WindowsWorkstation } from '../platform/windows-workstation.js';
import type { InstallReport, PackageSource, Workstation } from '../types.js';
import { COMMAND_NAME, parseCliArgs, usage, type CliOptions } from './args.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface CliContext {
  platform: string;
  env: SettingsEnv;
  io: CliIo;
  signal?: AbortSignal;
  downloadDir?: string;
  /** Replace the OS adapters (tests) */
  workstation?: Workstation;
  packageSource?: PackageSource;
}

export function formatReport(report: InstallReport): string {
  if (report.alreadyInstalled) {
    return `Already installed; queues: ${report.queues.join(', ')}`;
  }
  const action = report.installed ? 'Installed client' : 'Client present';
  return `${action}; queues: ${report.queues.join(', ')} (service checks: ${report.attempts.service}, queue checks: ${report.attempts.queues})`;
}

export async function runCli(argv: string[], context: CliContext): Promise<number> {
  const { io } = context;

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    io.stderr(formatError(error));
    io.stderr(usage());
    return EXIT_USAGE;
  }

  if (options.help) {
    io.stdout(usage());
    return EXIT_OK;
  }
  if (options.version) {
    io.stdout(`${COMMAND_NAME} v${VERSION}`);
    return EXIT_OK;
  }
  if (options.token === undefined) {
    io.stderr('Missing required <token>');
    io.stderr(usage());
    return EXIT_USAGE;
  }
  if (context.platform !== 'win32') {
    io.stderr(formatError(new UnsupportedPlatformError(context.platform)));
    return EXIT_USAGE;
  }

  try {
    const settings = await loadSettings({ settingsPath: options.settingsPath, env: context.env });

    resetLogger();
    const logger = getLogger({ level: options.verbose ? 'debug' : settings.logging.level }).child({ component: 'cli' });

    const config = buildInstallerConfig(
      options.token,
      settings.installer,
      { packageUrl: options.packageUrl, appPath: options.appPath },
      context.downloadDir
    );

    const installer = new MobilityInstaller(config, {
      workstation: context.workstation ?? new WindowsWorkstation(),
      packageSource: context.packageSource ?? new HttpPackageSource({ timeoutMs: settings.installer.downloadTimeoutMs }),
      onStateChange: (state) => io.stdout(`state: ${state}`),
    });

    const report = await installer.run({ signal: context.signal });
    logger.debug('Install report', { report });
    io.stdout(formatReport(report));
    return EXIT_OK;
  } catch (error) {
    io.stderr(formatError(error));
    return EXIT_FAILURE;
  }
}
