/**
 * @fileoverview Tests for withServerCommandProxy
 */
import { describe, it, expect, vi, type Mock } from 'vitest';
import { withServerCommandProxy } from '../src/scope.js';
import type { ServerCommandTransport } from '../src/transport/types.js';

function fakeTransport(): ServerCommandTransport & { close: Mock<() => void> } {
  return {
    call: vi.fn(async () => 7),
    close: vi.fn<() => void>(),
  };
}

describe('withServerCommandProxy', () => {
  it('should open the proxy for the callback and close it after', async () => {
    const transport = fakeTransport();

    const total = await withServerCommandProxy({ transportFactory: () => transport }, async (proxy) => {
      expect(proxy.isOpen).toBe(true);
      return proxy.getTotalUsers('test-token');
    });

    expect(total).toBe(7);
    expect(transport.close).toHaveBeenCalledTimes(1);
  });

  it('should close the proxy when the callback throws', async () => {
    const transport = fakeTransport();
    const failure = new Error('boom');

    await expect(
      withServerCommandProxy({ transportFactory: () => transport }, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(transport.close).toHaveBeenCalledTimes(1);
  });
});
