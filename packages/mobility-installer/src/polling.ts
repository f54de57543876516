/**
 * @fileoverview Bounded polling
 *
 * Every wait in the installer goes through `pollUntil`, so each one has a
 * deadline and stops promptly on abort.
 */

import { setTimeout as delay } from 'timers/promises';
import { InstallAbortedError, PollTimeoutError } from './errors.js';
import type { Clock } from './types.js';

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) => delay(ms, undefined, { signal }),
};

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  clock: Clock;
  signal?: AbortSignal;
}

export interface PollResult<T> {
  value: T;
  attempts: number;
}

export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new InstallAbortedError(stage, { cause: signal.reason });
  }
}

/**
 * Run `probe` until it returns a value other than `undefined`.
 *
 * The probe always runs at least once. After a miss, the deadline is
 * checked before sleeping, so a probe that never succeeds runs about
 * `timeoutMs / intervalMs + 1` times.
 */
export async function pollUntil<T>(
  awaited: string,
  probe: (attempt: number) => Promise<T | undefined>,
  options: PollOptions
): Promise<PollResult<T>> {
  const { clock, signal } = options;
  const startedAt = clock.now();

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal, awaited);

    const value = await probe(attempt);
    if (value !== undefined) {
      return { value, attempts: attempt };
    }

    if (clock.now() - startedAt >= options.timeoutMs) {
      throw new PollTimeoutError(awaited, options.timeoutMs, attempt);
    }

    try {
      await clock.sleep(options.intervalMs, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new InstallAbortedError(awaited, { cause: error });
      }
      throw error;
    }
  }
}
