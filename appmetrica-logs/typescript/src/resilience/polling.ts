/**
 * Polling executor for the asynchronous export protocol.
 *
 * The Logs API answers 202 (or 201) while it prepares an export file and 200
 * once the file is ready. Everything else is final.
 */

import { DEFAULT_POLLING_CONFIG, type PollingConfig } from '../config/index.js';
import { ApiError, ExportCancelledError, ExportTimeoutError } from '../errors/index.js';
import type { ExportHttpResponse } from '../transport/index.js';
import { calculateBackoffDelay, sleep } from './backoff.js';

/**
 * Statuses meaning "export accepted, still preparing".
 */
export const PREPARING_STATUSES: ReadonlySet<number> = new Set([201, 202]);

/**
 * Polling hook callbacks.
 */
export interface PollingHooks {
  /** Called before sleeping after a 201/202 */
  onPending?: (retry: number, status: number, delayMs: number) => void;
  /** Called when the export is ready */
  onReady?: (retries: number) => void;
}

/**
 * Re-issues an export request until it is ready, fails, runs out of budget
 * or is cancelled.
 */
export class PollingExecutor {
  private readonly config: PollingConfig;
  private readonly hooks: PollingHooks;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(
    config: PollingConfig,
    hooks: PollingHooks = {},
    clock: { random?: () => number; now?: () => number } = {}
  ) {
    this.config = config;
    this.hooks = hooks;
    this.random = clock.random ?? Math.random;
    this.now = clock.now ?? Date.now;
  }

  /**
   * Runs the polling loop.
   * @param send - Issues one request; transport failures reject and end the loop
   * @param signal - Checked before every attempt and while sleeping
   * @returns The 200 response
   * @throws ApiError on any status other than 200/201/202
   * @throws ExportTimeoutError when maxRetries or maxWaitMs is exceeded
   * @throws ExportCancelledError when the signal aborts
   */
  async execute(
    send: () => Promise<ExportHttpResponse>,
    signal?: AbortSignal
  ): Promise<ExportHttpResponse> {
    const startedAt = this.now();
    let retries = 0;

    for (;;) {
      if (signal?.aborted) {
        throw new ExportCancelledError(retries, abortReason(signal));
      }

      const response = await send();

      if (response.status === 200) {
        this.hooks.onReady?.(retries);
        return response;
      }

      if (!PREPARING_STATUSES.has(response.status)) {
        throw new ApiError(response.status, response.body);
      }

      const elapsedMs = this.now() - startedAt;
      if (retries >= this.config.maxRetries) {
        throw new ExportTimeoutError(retries, elapsedMs, 'max_retries');
      }

      const delayMs = calculateBackoffDelay(retries + 1, this.config, this.random);
      if (this.config.maxWaitMs !== undefined && elapsedMs + delayMs > this.config.maxWaitMs) {
        throw new ExportTimeoutError(retries, elapsedMs, 'deadline');
      }

      retries++;
      this.hooks.onPending?.(retries, response.status, delayMs);

      const completed = await sleep(delayMs, signal);
      if (!completed) {
        throw new ExportCancelledError(retries, signal ? abortReason(signal) : undefined);
      }
    }
  }
}

function abortReason(signal: AbortSignal): Error | undefined {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : undefined;
}

/**
 * Creates a polling executor, filling unset values from the defaults.
 */
export function createPollingExecutor(
  config: Partial<PollingConfig> = {},
  hooks: PollingHooks = {}
): PollingExecutor {
  return new PollingExecutor({ ...DEFAULT_POLLING_CONFIG, ...config }, hooks);
}
