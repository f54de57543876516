/**
 * @fileoverview Server command errors
 *
 * Two failure kinds reach callers: the server answered with a fault, or the
 * exchange itself failed. A response of an unexpected shape is reported
 * separately so it is never mistaken for either.
 */

import { ErrorCodes, PaperkitError, type ErrorCode } from '@paperkit/core';

/**
 * Base class for errors raised by a remote command
 */
export class ServerCommandError extends PaperkitError {
  override readonly name: string = 'ServerCommandError';

  constructor(
    code: ErrorCode,
    public readonly method: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(code, message, options);
  }
}

/**
 * The server rejected the call (bad token, unknown user, invalid arguments...)
 */
export class RemoteFaultError extends ServerCommandError {
  override readonly name = 'RemoteFaultError';

  constructor(
    method: string,
    public readonly faultCode: number | string,
    public readonly faultString: string
  ) {
    super(ErrorCodes.REMOTE_FAULT, method, `${method} failed with fault ${faultCode}: ${faultString}`);
  }
}

export type TransportFailure = 'connection' | 'timeout';

/**
 * The request never produced a server answer
 */
export class TransportError extends ServerCommandError {
  override readonly name = 'TransportError';

  constructor(
    method: string,
    public readonly reason: TransportFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(
      reason === 'timeout' ? ErrorCodes.TIMEOUT : ErrorCodes.CONNECTION_FAILED,
      method,
      message,
      options
    );
  }
}

/**
 * The server answered with a value of the wrong shape for the method
 */
export class InvalidResponseError extends ServerCommandError {
  override readonly name = 'InvalidResponseError';

  constructor(method: string, public readonly issues: string[]) {
    super(ErrorCodes.INVALID_RESPONSE, method, `${method} returned an unexpected value: ${issues.join('; ')}`);
  }
}

export function isRemoteFault(error: unknown): error is RemoteFaultError {
  return error instanceof RemoteFaultError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}
