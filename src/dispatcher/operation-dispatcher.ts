/**
 * Operation Dispatcher
 *
 * validate → resolve index (processing time) → write → metrics. Every write
 * attempt runs under the Retry Engine: the first one immediately, then up to
 * `maxRetries` more after backoff while failures stay retryable. The outcome
 * is finalized as a SyncRecord that goes to the log and to metrics.
 *
 * Writes are idempotent on the document id:
 * - CREATE indexes the full document (replays overwrite the same slot)
 * - UPDATE is a partial merge with doc_as_upsert (an update before its create converges)
 * - DELETE of an absent document succeeds
 */

import { RetryExhaustedError, SyncError, ValidationError, isCancellation } from '../errors/hierarchy.js';
import { payloadSize, toDocument } from '../elasticsearch/documents.js';
import type { IndexWriter } from '../elasticsearch/index-writer.js';
import type { MetricsCollector } from '../metrics/index.js';
import { getIndexName } from '../naming/index-naming.js';
import type { RetryEngine } from '../retry/retry-engine.js';
import { createSyncRecord, markFailed, markRetrying, markSuccess, toLogContext } from '../sync/sync-record.js';
import type { CategoryOperation, Clock, StructuredLogger, SyncRecord } from '../types/index.js';
import { NullLogger, systemClock } from '../types/index.js';

export interface DispatchOptions {
  signal?: AbortSignal;
  /** Invoked around retry waits */
  onWait?: () => Promise<void>;
}

export interface DispatchResult {
  indexName: string;
  /** Number of write attempts made, first one included */
  attempts: number;
  record: SyncRecord;
}

export interface OperationDispatcherOptions {
  writer: IndexWriter;
  retry: RetryEngine;
  /** Environment label used in index names */
  environment: string;
  service: string;
  entity: string;
  /** Retry attempts after the first failed write */
  maxRetries: number;
  /** Deadline of every single write */
  operationTimeoutMs?: number;
  metrics?: MetricsCollector;
  logger?: StructuredLogger;
  clock?: Clock;
}

/**
 * Check the fields every write relies on
 *
 * @throws ValidationError
 */
export function validateOperation(op: CategoryOperation): void {
  const context = { operation: op.operation, entity: 'category', entityId: op.payload.id };

  if (!op.payload.id || op.payload.id.trim() === '') {
    throw new ValidationError('Category id is required', context);
  }

  if (op.operation === 'DELETE') return;

  if (!op.payload.name || op.payload.name.trim() === '') {
    throw new ValidationError('Category name is required', context);
  }
  if (!Number.isInteger(op.payload.status) || op.payload.status < 0) {
    throw new ValidationError('Category status must be a non-negative integer', context);
  }
}

export class OperationDispatcher {
  private readonly writer: IndexWriter;
  private readonly retry: RetryEngine;
  private readonly metrics: MetricsCollector | undefined;
  private readonly logger: StructuredLogger;
  private readonly clock: Clock;

  constructor(private readonly options: OperationDispatcherOptions) {
    this.writer = options.writer;
    this.retry = options.retry;
    this.metrics = options.metrics;
    this.logger = options.logger ?? new NullLogger();
    this.clock = options.clock ?? systemClock;
  }

  get entity(): string {
    return this.options.entity;
  }

  /**
   * Active index for an operation processed now
   */
  resolveIndexName(): string {
    return getIndexName({
      environment: this.options.environment,
      service: this.options.service,
      entity: this.options.entity,
      date: this.clock(),
    });
  }

  /**
   * Apply an operation, retrying transient failures
   *
   * @throws ValidationError | StoreRejectedError | ConflictError | RetryExhaustedError | CancelledError
   */
  async dispatch(op: CategoryOperation, options: DispatchOptions = {}): Promise<DispatchResult> {
    validateOperation(op);

    const record = createSyncRecord(this.options.entity, op.payload.id, op.operation, this.clock);
    let attempts = 0;

    try {
      const indexName = await this.retry.run(
        { operationId: op.payload.id, entity: this.options.entity, operation: op.operation },
        (_attempt, signal) => {
          attempts++;
          if (attempts > 1) markRetrying(record, this.clock);
          return this.dispatchOnce(op, { signal });
        },
        { signal: options.signal, maxAttempts: this.options.maxRetries + 1, onWait: options.onWait },
      );
      return this.succeed(record, indexName, attempts);
    } catch (error) {
      throw this.fail(record, error, attempts);
    }
  }

  /**
   * Single write attempt without retry. Metrics are recorded for success and failure.
   *
   * @returns the index written to
   */
  async dispatchOnce(op: CategoryOperation, options: DispatchOptions = {}): Promise<string> {
    const indexName = this.resolveIndexName();
    const now = this.clock();
    const document = toDocument(op.payload, now);
    const writeOptions = { signal: options.signal, timeoutMs: this.options.operationTimeoutMs };
    const started = Date.now();

    try {
      switch (op.operation) {
        case 'CREATE':
          await this.writer.index(indexName, document, writeOptions);
          break;
        case 'UPDATE':
          await this.writer.update(indexName, op.payload.id, document, writeOptions);
          break;
        case 'DELETE':
          await this.writer.delete(indexName, op.payload.id, writeOptions);
          break;
      }
      this.recordMetrics(op, 'success', started, document);
      this.logger.debug('Operation applied', { operation: op.operation, entityId: op.payload.id, indexName });
      return indexName;
    } catch (error) {
      this.recordMetrics(op, 'error', started, document);
      throw error;
    }
  }

  private recordMetrics(
    op: CategoryOperation,
    status: 'success' | 'error',
    started: number,
    document: object,
  ): void {
    this.metrics?.recordOperation({
      operation: op.operation,
      entity: this.options.entity,
      status,
      durationMs: Date.now() - started,
      payloadSize: op.operation === 'DELETE' ? 0 : payloadSize(document),
    });
  }

  private succeed(record: SyncRecord, indexName: string, attempts: number): DispatchResult {
    markSuccess(record, this.clock);
    record.retryCount = attempts - 1;
    this.metrics?.recordSyncRecord(record);
    this.logger.debug('Sync record finalized', { ...toLogContext(record), indexName, attempts });
    return { indexName, attempts, record };
  }

  private fail(record: SyncRecord, error: unknown, attempts: number): unknown {
    if (isCancellation(error)) {
      this.logger.warn('Operation cancelled', { operation: record.operation, entityId: record.entityId, attempts });
      return error;
    }

    const exhausted = error instanceof RetryExhaustedError;
    markFailed(record, exhausted ? error.lastError : error, this.retry.computeDelay(attempts), this.clock);
    record.retryCount = attempts;
    this.metrics?.recordSyncRecord(record);
    this.logger.error(exhausted ? 'Retries exhausted, sync record failed' : 'Sync operation failed', error, {
      ...toLogContext(record),
      code: error instanceof SyncError ? error.code : undefined,
    });
    return error;
  }
}
