/**
 * @fileoverview Mobility Print unattended installer
 *
 * Makes sure the client application is installed, its service is running,
 * and at least one matching print queue exists. Runs are idempotent: a
 * workstation that already has the client and a queue is left untouched.
 *
 * States: NotInstalled -> Installing -> InstalledNoQueues -> InstalledWithQueues,
 * with AlreadyInstalled as a short-circuit to the last.
 */

import * as crypto from 'crypto';
import { ConfigError, createLogger, updateLoggingContext, withLoggingContext, type PaperkitLogger } from '@paperkit/core';
import { InstallAbortedError, InstallerExitError } from './errors.js';
import { pollUntil, systemClock, throwIfAborted, type PollOptions } from './polling.js';
import type {
  Clock,
  DownloadedPackage,
  InstallerConfig,
  InstallerDependencies,
  InstallReport,
  InstallRunOptions,
  InstallState,
  PackageSource,
  Workstation,
} from './types.js';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Fill `{token}` in the provisioning URI template. The token is URI-encoded
 * so it cannot change the URI's structure.
 */
export function buildProvisioningUri(template: string, token: string): string {
  return template.split('{token}').join(encodeURIComponent(token));
}

export function matchQueues(printers: string[], match: string): string[] {
  return printers.filter((name) => name.includes(match));
}

// =============================================================================
// MobilityInstaller
// =============================================================================

export class MobilityInstaller {
  private readonly workstation: Workstation;
  private readonly packageSource: PackageSource;
  private readonly clock: Clock;
  private readonly logger: PaperkitLogger;
  private readonly onStateChange?: (state: InstallState) => void;
  private stage = 'initial check';

  constructor(
    private readonly config: InstallerConfig,
    deps: InstallerDependencies
  ) {
    this.workstation = deps.workstation;
    this.packageSource = deps.packageSource;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('mobility-installer');
    this.onStateChange = deps.onStateChange;
  }

  /**
   * Bring the workstation to InstalledWithQueues.
   *
   * @throws {PollTimeoutError} when the service or a queue does not appear in time
   * @throws {InstallAbortedError} when `signal` aborts
   */
  async run(options: InstallRunOptions = {}): Promise<InstallReport> {
    const runId = `run_${crypto.randomUUID().slice(0, 8)}`;
    return withLoggingContext({ runId }, async () => {
      try {
        return await this.execute(options.signal);
      } catch (error) {
        if (options.signal?.aborted && !(error instanceof InstallAbortedError)) {
          throw new InstallAbortedError(this.stage, { cause: error });
        }
        throw error;
      }
    });
  }

  private async execute(signal: AbortSignal | undefined): Promise<InstallReport> {
    const { config, workstation } = this;

    this.stage = 'initial check';
    throwIfAborted(signal, this.stage);
    const appPresent = await workstation.pathExists(config.appPath);
    const initialQueues = matchQueues(await workstation.listPrinters(), config.printerMatch);
    this.logger.info('Workstation checked', { appPresent, queues: initialQueues });

    if (appPresent && initialQueues.length > 0) {
      this.transition('AlreadyInstalled');
      this.transition('InstalledWithQueues');
      return {
        state: 'InstalledWithQueues',
        alreadyInstalled: true,
        installed: false,
        queues: initialQueues,
        attempts: { service: 0, queues: 0 },
      };
    }

    let downloaded: DownloadedPackage | undefined;
    try {
      if (!appPresent) {
        this.transition('NotInstalled');
        downloaded = await this.fetchPackage(signal);
        this.transition('Installing');
        await this.install(downloaded, signal);
      }

      const service = await this.waitForService(signal);
      this.transition('InstalledNoQueues');

      const queues = initialQueues.length > 0
        ? { value: initialQueues, attempts: 0 }
        : await this.provisionQueues(signal);
      this.transition('InstalledWithQueues');

      return {
        state: 'InstalledWithQueues',
        alreadyInstalled: false,
        installed: downloaded !== undefined,
        queues: queues.value,
        attempts: { service: service.attempts, queues: queues.attempts },
      };
    } finally {
      if (downloaded) {
        await this.cleanup(downloaded.path);
      }
    }
  }

  private transition(state: InstallState): void {
    updateLoggingContext({ state });
    this.logger.info('Install state changed', { state });
    this.onStateChange?.(state);
  }

  private async fetchPackage(signal: AbortSignal | undefined): Promise<DownloadedPackage> {
    const { packageUrl, downloadDir } = this.config;
    if (!packageUrl) {
      throw new ConfigError('No package URL configured', [
        'installer.packageUrl: set it in settings, PAPERKIT_PACKAGE_URL or --package-url',
      ]);
    }

    this.stage = 'package resolution';
    throwIfAborted(signal, this.stage);
    const location = await this.packageSource.resolveLatest(packageUrl, signal);
    this.logger.info('Resolved latest package', { packageUrl, location });

    this.stage = 'download';
    throwIfAborted(signal, this.stage);
    const downloaded = await this.logger.timed(
      'Package download',
      () => this.packageSource.download(location, downloadDir, signal),
      'info'
    );
    this.logger.info('Package downloaded', { path: downloaded.path, bytes: downloaded.bytes });
    return downloaded;
  }

  private async install(downloaded: DownloadedPackage, signal: AbortSignal | undefined): Promise<void> {
    this.stage = 'install';
    throwIfAborted(signal, this.stage);
    const exitCode = await this.workstation.runInstaller(downloaded.path, this.config.installerArgs, signal);
    throwIfAborted(signal, this.stage);
    if (exitCode !== 0) {
      throw new InstallerExitError(downloaded.path, exitCode);
    }
    this.logger.info('Installer finished', { path: downloaded.path });
  }

  private async waitForService(signal: AbortSignal | undefined): Promise<{ attempts: number }> {
    const { serviceName } = this.config;
    this.stage = `service ${serviceName}`;
    const result = await pollUntil(
      this.stage,
      async (attempt) => {
        const status = await this.workstation.getServiceStatus(serviceName);
        this.logger.debug('Service status', { serviceName, status, attempt });
        return status === 'running' ? true : undefined;
      },
      this.pollOptions(this.config.serviceTimeoutMs, signal)
    );
    this.logger.info('Service running', { serviceName, attempts: result.attempts });
    return result;
  }

  private async provisionQueues(signal: AbortSignal | undefined): Promise<{ value: string[]; attempts: number }> {
    const { printerMatch } = this.config;
    const uri = buildProvisioningUri(this.config.uriTemplate, this.config.token);
    this.stage = `print queue matching "${printerMatch}"`;

    const result = await pollUntil(
      this.stage,
      async (attempt) => {
        await this.workstation.openUri(uri);
        const queues = matchQueues(await this.workstation.listPrinters(), printerMatch);
        this.logger.debug('Queue check', { attempt, found: queues.length });
        return queues.length > 0 ? queues : undefined;
      },
      this.pollOptions(this.config.queueTimeoutMs, signal)
    );
    this.logger.info('Print queues present', { queues: result.value, attempts: result.attempts });
    return result;
  }

  private pollOptions(timeoutMs: number, signal: AbortSignal | undefined): PollOptions {
    return { intervalMs: this.config.pollIntervalMs, timeoutMs, clock: this.clock, signal };
  }

  private async cleanup(path: string): Promise<void> {
    try {
      await this.workstation.removeFile(path);
      this.logger.debug('Removed downloaded package', { path });
    } catch (error) {
      // Logged only; the run's own result or error stands
      this.logger.warn('Could not remove downloaded package', {
        path,
        err: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }
}
