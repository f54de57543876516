/**
 * @fileoverview Main entry point for @paperkit/server-command
 */

export {
  ServerCommandProxy,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_LIMIT,
  type ServerCommandProxyOptions,
  type ServerCommandMethod,
} from './server-command-proxy.js';
export { withServerCommandProxy } from './scope.js';
export { resolveEndpoint, DEFAULT_HOST, DEFAULT_PORT, RPC_PATH } from './endpoint.js';
export {
  ServerCommandError,
  RemoteFaultError,
  TransportError,
  InvalidResponseError,
  isRemoteFault,
  isTransportError,
  type TransportFailure,
} from './errors.js';
export { decode, decoderFor, type ResultDecoder, type TaskStatus } from './decoders.js';
export * from './transport/index.js';
export * from './types.js';
