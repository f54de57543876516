/**
 * @fileoverview Installer errors
 */

import { ErrorCodes, PaperkitError } from '@paperkit/core';

/**
 * The package could not be resolved, fetched or saved
 */
export class DownloadError extends PaperkitError {
  override readonly name = 'DownloadError';

  constructor(public readonly url: string, message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.DOWNLOAD_FAILED, `Download of ${url} failed: ${message}`, options);
  }
}

/**
 * The installer package ran but reported failure
 */
export class InstallerExitError extends PaperkitError {
  override readonly name = 'InstallerExitError';

  constructor(public readonly file: string, public readonly exitCode: number) {
    super(ErrorCodes.INSTALL_FAILED, `Installer ${file} exited with code ${exitCode}`);
  }
}

/**
 * A wait ran past its deadline
 */
export class PollTimeoutError extends PaperkitError {
  override readonly name = 'PollTimeoutError';

  constructor(
    public readonly awaited: string,
    public readonly timeoutMs: number,
    public readonly attempts: number
  ) {
    super(
      ErrorCodes.POLL_TIMEOUT,
      `Timed out after ${timeoutMs}ms waiting for ${awaited} (${attempts} attempts)`
    );
  }
}

export class InstallAbortedError extends PaperkitError {
  override readonly name = 'InstallAbortedError';

  constructor(public readonly stage: string, options?: { cause?: unknown }) {
    super(ErrorCodes.ABORTED, `Install aborted during ${stage}`, options);
  }
}

/**
 * A local command could not be started or failed
 */
export class CommandError extends PaperkitError {
  override readonly name = 'CommandError';

  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    options?: { cause?: unknown }
  ) {
    const detail = stderr ? `: ${stderr}` : '';
    super(
      ErrorCodes.COMMAND_FAILED,
      exitCode === null ? `${command} could not be run${detail}` : `${command} exited with code ${exitCode}${detail}`,
      options
    );
  }
}

export class UnsupportedPlatformError extends PaperkitError {
  override readonly name = 'UnsupportedPlatformError';

  constructor(public readonly platform: string) {
    super(ErrorCodes.UNSUPPORTED_PLATFORM, `The installer only runs on Windows (this is ${platform})`);
  }
}
