/**
 * Readiness polling
 *
 * Replaces fixed sleeps with exponential backoff bounded by a per-node
 * budget. Every wait ends in one of ready, degraded, timeout or cancelled.
 */

import { toError } from '../errors.js';
import type { DeploymentEvent, ReadinessConfig } from '../types/deployment.js';
import type { ReadinessResult } from '../types/resources.js';

export type PollStatus = 'ready' | 'degraded' | 'timeout' | 'cancelled';

export interface PollOutcome {
  status: PollStatus;
  /** Last successful readiness result, if any */
  readiness?: ReadinessResult;
  lastError?: Error;
  attempts: number;
  durationMs: number;
}

export interface PollOptions {
  resourceId: string;
  config: ReadinessConfig;
  emitEvent?: (event: DeploymentEvent) => void;
  signal?: AbortSignal;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after `ms`, or as soon as the signal aborts
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export class ReadinessPoller {
  constructor(
    private readonly wait: Sleep = sleep,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Poll `read` until it reports ready, reports a terminal failure, the
   * budget runs out or the signal aborts. `read` runs at least once.
   */
  async waitFor(read: () => Promise<ReadinessResult>, options: PollOptions): Promise<PollOutcome> {
    const { resourceId, config, signal } = options;
    const startTime = this.now();
    const deadline = startTime + config.timeout;
    let attempt = 0;
    let readiness: ReadinessResult | undefined;
    let lastError: Error | undefined;

    const outcome = (status: PollStatus): PollOutcome => ({
      status,
      ...(readiness ? { readiness } : {}),
      ...(lastError ? { lastError } : {}),
      attempts: attempt,
      durationMs: this.now() - startTime,
    });

    while (true) {
      if (signal?.aborted) {
        return outcome('cancelled');
      }

      attempt++;
      let delay: number;

      try {
        readiness = await read();
        lastError = undefined;

        if (readiness.ready) {
          this.emit(options, 'resource-ready', `${resourceId} is ready after ${this.now() - startTime}ms`);
          return outcome('ready');
        }

        if (readiness.terminal) {
          this.emit(
            options,
            'resource-warning',
            `${resourceId} reached a terminal state: ${readiness.reason ?? 'unknown reason'}`
          );
          return outcome('degraded');
        }

        if (attempt % config.progressInterval === 0) {
          this.emit(
            options,
            'progress',
            `Still waiting for ${resourceId} (attempt ${attempt}): ${readiness.reason ?? 'not ready'}`
          );
        }

        delay = Math.min(
          config.initialDelay * config.backoffMultiplier ** (attempt - 1),
          config.maxDelay
        );
      } catch (error) {
        lastError = toError(error);
        if (attempt % config.progressInterval === 0) {
          this.emit(
            options,
            'progress',
            `Error checking readiness for ${resourceId}: ${lastError.message}`,
            lastError
          );
        }
        delay = config.errorRetryDelay;
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        return outcome('timeout');
      }
      await this.wait(Math.min(delay, remaining), signal);
    }
  }

  private emit(
    options: PollOptions,
    type: DeploymentEvent['type'],
    message: string,
    error?: Error
  ): void {
    options.emitEvent?.({
      type,
      resourceId: options.resourceId,
      message,
      timestamp: new Date(),
      ...(error ? { error } : {}),
    });
  }
}
