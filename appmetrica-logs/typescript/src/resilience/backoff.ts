/**
 * Backoff delays for export polling.
 */

import type { PollingConfig } from '../config/index.js';

/**
 * Delay before re-poll number `retry` (1-based):
 * initialDelayMs * multiplier^(retry - 1), capped at maxDelayMs, plus jitter.
 *
 * With jitterFactor < 1 and multiplier >= 2, uncapped delays grow strictly.
 */
export function calculateBackoffDelay(
  retry: number,
  config: Pick<PollingConfig, 'initialDelayMs' | 'maxDelayMs' | 'multiplier' | 'jitterFactor'>,
  random: () => number = Math.random
): number {
  const exponential = config.initialDelayMs * Math.pow(config.multiplier, Math.max(0, retry - 1));
  const capped = Math.min(exponential, config.maxDelayMs);
  const jitter = capped * config.jitterFactor * random();
  return Math.floor(capped + jitter);
}

/**
 * Waits for `ms` milliseconds without blocking the event loop.
 * Resolves to false if the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
