/**
 * Retry Engine
 *
 * Bounded exponential backoff with jitter:
 *
 *   delay(n) = min(baseDelay × factor^n × jitter, maxDelay),  jitter ∈ [1 - j, 1 + j]
 *
 * Waits are per-call timers tied to an AbortSignal, so a retrying message only
 * suspends its own partition. Aborting the signal, or a failing `onWait`
 * hook, ends the sequence with a CancelledError and no further attempt is made.
 */

import {
  CancelledError,
  RetryExhaustedError,
  isCancellation,
  isRetryableError,
  toError,
} from '../errors/hierarchy.js';
import type { MetricsCollector } from '../metrics/index.js';
import type { Clock, RetryAttempt, RetryHistory, StructuredLogger } from '../types/index.js';
import { NullLogger, systemClock } from '../types/index.js';

export interface RetryPolicy {
  /** Maximum number of invocations of the operation */
  maxAttempts: number;
  baseDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  /** Jitter amplitude; 0.2 spreads delays over ±20% */
  jitter?: number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryEngineOptions extends RetryPolicy {
  logger?: StructuredLogger;
  metrics?: MetricsCollector;
  clock?: Clock;
  sleep?: Sleep;
  /** Uniform random source in [0, 1) */
  random?: () => number;
}

export interface RetryTarget {
  operationId: string;
  entity: string;
  operation: string;
}

export interface RetryRunOptions {
  signal?: AbortSignal;
  /** Overrides the policy's maxAttempts for this call */
  maxAttempts?: number;
  /**
   * Called before and after each backoff wait, e.g. to keep a consumer group
   * session alive. A rejection interrupts the sequence as a cancellation.
   */
  onWait?: () => Promise<void>;
}

/**
 * Cancellable timer. Rejects with CancelledError when `signal` aborts.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Retry wait cancelled', undefined, { cause: signal.reason }));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError('Retry wait cancelled', undefined, { cause: signal?.reason }));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

export class RetryEngine {
  private readonly policy: Required<RetryPolicy>;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsCollector | undefined;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(options: RetryEngineOptions) {
    this.policy = {
      maxAttempts: options.maxAttempts,
      baseDelayMs: options.baseDelayMs,
      backoffFactor: options.backoffFactor,
      maxDelayMs: options.maxDelayMs,
      jitter: options.jitter ?? 0.2,
    };
    this.logger = options.logger ?? new NullLogger();
    this.metrics = options.metrics;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  get maxAttempts(): number {
    return this.policy.maxAttempts;
  }

  /**
   * Delay to wait after the failed attempt `attempt` (0-indexed)
   */
  computeDelay(attempt: number): number {
    const { baseDelayMs, backoffFactor, maxDelayMs, jitter } = this.policy;
    const exponential = baseDelayMs * Math.pow(backoffFactor, attempt);
    const factor = 1 - jitter + this.random() * 2 * jitter;
    return Math.min(exponential * factor, maxDelayMs);
  }

  /**
   * Run `fn` until it succeeds, fails with a non-retryable error, the signal
   * aborts, or `maxAttempts` invocations have failed.
   */
  async run<T>(
    target: RetryTarget,
    fn: (attempt: number, signal?: AbortSignal) => Promise<T>,
    options: RetryRunOptions = {},
  ): Promise<T> {
    const { signal } = options;
    const maxAttempts = Math.max(1, options.maxAttempts ?? this.policy.maxAttempts);
    const history: RetryHistory = {
      operationId: target.operationId,
      entity: target.entity,
      operation: target.operation,
      attempts: [],
      status: 'IN_PROGRESS',
    };
    const errorContext = {
      operation: target.operation,
      entity: target.entity,
      entityId: target.operationId,
    };

    let lastError: unknown;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw this.cancel(history, new CancelledError('Retry sequence cancelled', errorContext, { cause: signal.reason }));
      }

      const startedAt = this.clock();
      const record: RetryAttempt = { attempt: attempt + 1, timestamp: startedAt, durationMs: 0 };

      try {
        const result = await fn(attempt, signal);
        record.durationMs = this.clock().getTime() - startedAt.getTime();
        history.attempts.push(record);
        history.status = 'SUCCESS';
        this.metrics?.recordRetryAttempt(target.operation, 'success');
        this.logHistory(history);
        return result;
      } catch (error) {
        record.durationMs = this.clock().getTime() - startedAt.getTime();
        record.error = toError(error).message;
        history.attempts.push(record);

        if (isCancellation(error)) {
          throw this.cancel(history, error);
        }
        if (signal?.aborted) {
          throw this.cancel(history, new CancelledError('Retry sequence cancelled', errorContext, { cause: error }));
        }

        if (!isRetryableError(error)) {
          history.status = 'FAILED';
          this.metrics?.recordRetryAttempt(target.operation, 'fatal');
          this.logger.warn('Non-retryable failure, stopping retry sequence', {
            ...errorContext,
            attempt: attempt + 1,
            error: record.error,
          });
          this.logHistory(history);
          throw error;
        }

        lastError = error;

        if (attempt === maxAttempts - 1) {
          break;
        }

        const delayMs = this.computeDelay(attempt);
        record.delayMs = delayMs;
        record.nextRetryAt = new Date(this.clock().getTime() + delayMs);
        this.metrics?.recordRetryAttempt(target.operation, 'retry');

        this.logger.warn('Retry attempt failed', {
          ...errorContext,
          attempt: attempt + 1,
          delayMs: Math.round(delayMs),
          nextRetryAt: record.nextRetryAt.toISOString(),
          durationMs: record.durationMs,
          error: record.error,
        });

        try {
          await options.onWait?.();
          await this.sleep(delayMs, signal);
          await options.onWait?.();
        } catch (waitError) {
          throw this.cancel(
            history,
            isCancellation(waitError)
              ? waitError
              : new CancelledError('Retry wait cancelled', errorContext, { cause: waitError }),
          );
        }
      }
    }

    history.status = 'FAILED';
    this.metrics?.recordRetryAttempt(target.operation, 'exhausted');
    this.logHistory(history);

    throw new RetryExhaustedError(
      `Max retries (${maxAttempts}) reached`,
      history.attempts.length,
      lastError,
      errorContext,
      history,
    );
  }

  private cancel(history: RetryHistory, error: CancelledError): CancelledError {
    history.status = 'CANCELLED';
    this.logHistory(history);
    return error;
  }

  private logHistory(history: RetryHistory): void {
    const firstTry = history.status === 'SUCCESS' && history.attempts.length === 1;
    const log = firstTry ? this.logger.debug.bind(this.logger) : this.logger.info.bind(this.logger);
    log('Retry sequence completed', {
      operationId: history.operationId,
      entity: history.entity,
      operation: history.operation,
      status: history.status,
      totalAttempts: history.attempts.length,
      attempts: history.attempts.map((a) => ({
        attempt: a.attempt,
        timestamp: a.timestamp.toISOString(),
        durationMs: a.durationMs,
        error: a.error,
        delayMs: a.delayMs === undefined ? undefined : Math.round(a.delayMs),
      })),
    });
  }
}
