/**
 * @fileoverview Scoped proxy usage
 */

import { ServerCommandProxy, type ServerCommandProxyOptions } from './server-command-proxy.js';

/**
 * Run `fn` with an open proxy and close it afterwards, whether `fn`
 * resolves or throws.
 *
 * @example
 * const balance = await withServerCommandProxy({ host: 'papercut.local' }, (proxy) =>
 *   proxy.getUserAccountBalance(token, 'alice')
 * );
 */
export async function withServerCommandProxy<T>(
  options: ServerCommandProxyOptions,
  fn: (proxy: ServerCommandProxy) => Promise<T>
): Promise<T> {
  const proxy = new ServerCommandProxy(options).open();
  try {
    return await fn(proxy);
  } finally {
    proxy.close();
  }
}
