/**
 * @fileoverview Endpoint resolution for the Application Server's XML-RPC API
 */

import type { ServerConnectionOptions, ServerEndpoint } from './types.js';

export const DEFAULT_HOST = 'localhost';
export const DEFAULT_PORT = 9191;
export const RPC_PATH = '/rpc/api/xmlrpc';

export function resolveEndpoint(options: ServerConnectionOptions = {}): ServerEndpoint {
  const host = options.host ?? DEFAULT_HOST;
  const port = options.port ?? DEFAULT_PORT;
  const ssl = options.ssl ?? false;
  const scheme = ssl ? 'https' : 'http';
  return {
    host,
    port,
    ssl,
    path: RPC_PATH,
    url: `${scheme}://${host}:${port}${RPC_PATH}`,
  };
}
