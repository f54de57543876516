/**
 * @fileoverview Error types and handling utilities
 *
 * Provides the base error class and the standardized error codes used by
 * the server-command client and the installer.
 */

/**
 * Centralized error codes
 */
export const ErrorCodes = {
  // Configuration
  CONFIG_INVALID: 'CONFIG_INVALID',

  // Remote command transport
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  TIMEOUT: 'TIMEOUT',
  REMOTE_FAULT: 'REMOTE_FAULT',
  INVALID_RESPONSE: 'INVALID_RESPONSE',

  // Local machine
  COMMAND_FAILED: 'COMMAND_FAILED',
  UNSUPPORTED_PLATFORM: 'UNSUPPORTED_PLATFORM',

  // Installer
  DOWNLOAD_FAILED: 'DOWNLOAD_FAILED',
  INSTALL_FAILED: 'INSTALL_FAILED',
  POLL_TIMEOUT: 'POLL_TIMEOUT',
  ABORTED: 'ABORTED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for every failure the tools raise on purpose
 */
export class PaperkitError extends Error {
  override readonly name: string = 'PaperkitError';

  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Invalid settings file, environment value or command-line input
 */
export class ConfigError extends PaperkitError {
  override readonly name = 'ConfigError';

  constructor(message: string, public readonly issues: string[] = []) {
    super(ErrorCodes.CONFIG_INVALID, message);
  }
}

/**
 * Type guard for PaperkitError
 */
export function isPaperkitError(error: unknown): error is PaperkitError {
  return error instanceof PaperkitError;
}

/**
 * Extract a message from any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Format an error for console display
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigError && error.issues.length > 0) {
    return `[${error.code}] ${error.message}\n${error.issues.map((issue) => `  - ${issue}`).join('\n')}`;
  }
  if (isPaperkitError(error)) {
    return `[${error.code}] ${error.message}`;
  }
  return errorMessage(error);
}
