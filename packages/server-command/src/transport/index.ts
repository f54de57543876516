export type { ServerCommandTransport, TransportFactory, TransportOptions } from './types.js';
export { XmlRpcTransport, createXmlRpcTransport, toWireValue, toServerCommandError } from './xmlrpc-transport.js';
