/**
 * @fileoverview XML-RPC transport over node http/https
 *
 * Wraps the `xmlrpc` client with a keep-alive agent that is the only
 * resource the proxy holds open, a per-call timeout, and mapping of
 * faults and socket failures onto the proxy's error types.
 */

import * as http from 'http';
import * as https from 'https';
import xmlrpc from 'xmlrpc';
import { errorMessage } from '@paperkit/core';
import { RemoteFaultError, TransportError } from '../errors.js';
import { XmlRpcDouble, type ServerEndpoint, type XmlRpcValue } from '../types.js';
import type { ServerCommandTransport, TransportOptions } from './types.js';

// =============================================================================
// Wire Encoding
// =============================================================================

/** Serializes as `<double>` regardless of the value's fractional part */
class DoubleType extends xmlrpc.CustomType {
  tagName = 'double';

  constructor(value: number) {
    super(String(value));
  }
}

export function toWireValue(value: XmlRpcValue): unknown {
  if (value instanceof XmlRpcDouble) {
    return new DoubleType(value.value);
  }
  if (Array.isArray(value)) {
    return value.map(toWireValue);
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Date) && !Buffer.isBuffer(value)) {
    const struct: Record<string, unknown> = {};
    for (const [key, member] of Object.entries(value)) {
      struct[key] = toWireValue(member);
    }
    return struct;
  }
  return value;
}

// =============================================================================
// Error Mapping
// =============================================================================

interface FaultLike {
  faultCode: unknown;
  faultString?: unknown;
}

function isFault(error: unknown): error is Error & FaultLike {
  return error instanceof Error && 'faultCode' in error;
}

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

export function toServerCommandError(method: string, error: unknown, endpoint: ServerEndpoint): Error {
  if (isFault(error)) {
    const faultCode = typeof error.faultCode === 'number' || typeof error.faultCode === 'string'
      ? error.faultCode
      : String(error.faultCode);
    const faultString = typeof error.faultString === 'string' ? error.faultString : error.message;
    return new RemoteFaultError(method, faultCode, faultString);
  }
  const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
  const reason = code !== undefined && TIMEOUT_CODES.has(code) ? 'timeout' : 'connection';
  return new TransportError(
    method,
    reason,
    `${method} could not reach ${endpoint.url}: ${errorMessage(error)}`,
    { cause: error }
  );
}

// =============================================================================
// Transport
// =============================================================================

export class XmlRpcTransport implements ServerCommandTransport {
  private readonly agent: http.Agent;
  private readonly client: xmlrpc.Client;
  private closed = false;

  constructor(
    private readonly endpoint: ServerEndpoint,
    private readonly options: TransportOptions
  ) {
    this.agent = endpoint.ssl
      ? new https.Agent({ keepAlive: true, rejectUnauthorized: options.rejectUnauthorized })
      : new http.Agent({ keepAlive: true });

    const clientOptions: Exclude<Parameters<typeof xmlrpc.createClient>[0], string> & { agent: http.Agent } = {
      host: endpoint.host,
      port: endpoint.port,
      path: endpoint.path,
      agent: this.agent,
    };
    this.client = endpoint.ssl
      ? xmlrpc.createSecureClient(clientOptions)
      : xmlrpc.createClient(clientOptions);
  }

  call(method: string, params: XmlRpcValue[]): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new TransportError(method, 'connection', `${method} called on a closed connection`));
    }

    return new Promise((resolve, reject) => {
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.dropActiveSockets();
        reject(new TransportError(
          method,
          'timeout',
          `${method} timed out after ${this.options.timeoutMs}ms waiting for ${this.endpoint.url}`
        ));
      }, this.options.timeoutMs);

      this.client.methodCall(method, params.map(toWireValue), (error: unknown, value: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(toServerCommandError(method, error, this.endpoint));
        } else {
          resolve(value);
        }
      });
    });
  }

  /**
   * Calls are sequential, so any socket in use belongs to the call that
   * timed out. The next call opens a fresh connection.
   */
  private dropActiveSockets(): void {
    for (const sockets of Object.values(this.agent.sockets)) {
      for (const socket of sockets ?? []) {
        socket.destroy();
      }
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.agent.destroy();
  }
}

export function createXmlRpcTransport(endpoint: ServerEndpoint, options: TransportOptions): ServerCommandTransport {
  return new XmlRpcTransport(endpoint, options);
}
