/**
 * @fileoverview Transport contract between the proxy and the wire
 */

import type { ServerEndpoint, XmlRpcValue } from '../types.js';

export interface TransportOptions {
  /** Per-call timeout in milliseconds */
  timeoutMs: number;
  /** Verify the server certificate over HTTPS */
  rejectUnauthorized: boolean;
}

/**
 * One open connection to the server. `call` resolves with the decoded
 * response value, or rejects with a RemoteFaultError or TransportError.
 */
export interface ServerCommandTransport {
  call(method: string, params: XmlRpcValue[]): Promise<unknown>;
  close(): void;
}

export type TransportFactory = (
  endpoint: ServerEndpoint,
  options: TransportOptions
) => ServerCommandTransport;
