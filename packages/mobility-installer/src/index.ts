/**
 * @fileoverview Main entry point for @paperkit/mobility-installer
 */

export { MobilityInstaller, buildProvisioningUri, matchQueues } from './installer.js';
export { buildInstallerConfig, type InstallerOverrides } from './config.js';
export { pollUntil, systemClock, type PollOptions, type PollResult } from './polling.js';
export {
  DownloadError,
  InstallerExitError,
  PollTimeoutError,
  InstallAbortedError,
  CommandError,
  UnsupportedPlatformError,
} from './errors.js';
export * from './platform/index.js';
export { runCli, formatReport, EXIT_OK, EXIT_FAILURE, EXIT_USAGE, type CliContext, type CliIo } from './cli/run.js';
export { parseCliArgs, usage, COMMAND_NAME, type CliOptions } from './cli/args.js';
export * from './types.js';
