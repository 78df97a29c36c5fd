/**
 * Bulk Buffer
 *
 * Accumulates validated operations and submits them as one bulk request.
 * All access goes through a single async-mutex Mutex: an `add` never
 * interleaves with a `flush`, and the buffer cannot grow while a snapshot
 * is being encoded and submitted.
 *
 * A failed flush leaves every operation in place. Callers either retry the
 * flush or `drain()` the buffer and requeue the operations themselves.
 */

import { Mutex } from 'async-mutex';
import { toDocument } from '../elasticsearch/documents.js';
import type { BulkLine, IndexWriter } from '../elasticsearch/index-writer.js';
import type { MetricsCollector } from '../metrics/index.js';
import { getIndexName } from '../naming/index-naming.js';
import { validateOperation } from '../dispatcher/operation-dispatcher.js';
import type { CategoryOperation, Clock, StructuredLogger } from '../types/index.js';
import { NullLogger, systemClock } from '../types/index.js';

export interface BulkBufferOptions {
  writer: IndexWriter;
  batchSize: number;
  environment: string;
  service: string;
  entity: string;
  /** Deadline of each bulk request */
  operationTimeoutMs?: number;
  metrics?: MetricsCollector;
  logger?: StructuredLogger;
  clock?: Clock;
}

export interface FlushOptions {
  signal?: AbortSignal;
}

export interface FlushResult {
  /** Operations confirmed by the store */
  flushed: number;
  /** Bulk requests issued */
  requests: number;
}

/**
 * Encode operations as bulk action/body pairs addressed to `indexName`
 */
export function encodeBulk(ops: readonly CategoryOperation[], indexName: string, syncedAt: Date): BulkLine[] {
  const lines: BulkLine[] = [];

  for (const op of ops) {
    const target = { _index: indexName, _id: op.payload.id };
    switch (op.operation) {
      case 'CREATE':
        lines.push({ index: target }, toDocument(op.payload, syncedAt));
        break;
      case 'UPDATE':
        lines.push({ update: target }, { doc: toDocument(op.payload, syncedAt), doc_as_upsert: true });
        break;
      case 'DELETE':
        lines.push({ delete: target });
        break;
    }
  }

  return lines;
}

export class BulkBuffer {
  private readonly mutex = new Mutex();
  private buffer: CategoryOperation[] = [];
  private readonly logger: StructuredLogger;
  private readonly clock: Clock;

  constructor(private readonly options: BulkBufferOptions) {
    if (options.batchSize < 1) {
      throw new RangeError('batchSize must be at least 1');
    }
    this.logger = options.logger ?? new NullLogger();
    this.clock = options.clock ?? systemClock;
  }

  get size(): number {
    return this.buffer.length;
  }

  get batchSize(): number {
    return this.options.batchSize;
  }

  /**
   * Buffer an operation. Reaching `batchSize` flushes exactly `batchSize`
   * operations before the call returns.
   *
   * @throws ValidationError (operation not buffered) | BulkFlushError (operation kept)
   * @returns the flush result when the add triggered one
   */
  async add(op: CategoryOperation, options: FlushOptions = {}): Promise<FlushResult | undefined> {
    validateOperation(op);

    return this.mutex.runExclusive(async () => {
      this.buffer.push(op);
      if (this.buffer.length < this.options.batchSize) {
        return undefined;
      }
      await this.submit(this.options.batchSize, options);
      return { flushed: this.options.batchSize, requests: 1 };
    });
  }

  /**
   * Submit everything buffered, `batchSize` operations per request. Chunks
   * confirmed before a failure are removed; the rest stay buffered.
   *
   * @throws BulkFlushError
   */
  async flush(options: FlushOptions = {}): Promise<FlushResult> {
    return this.mutex.runExclusive(async () => {
      const result: FlushResult = { flushed: 0, requests: 0 };
      while (this.buffer.length > 0) {
        const count = Math.min(this.buffer.length, this.options.batchSize);
        await this.submit(count, options);
        result.flushed += count;
        result.requests++;
      }
      return result;
    });
  }

  /**
   * Remove and return every buffered operation, oldest first
   */
  async drain(): Promise<CategoryOperation[]> {
    return this.mutex.runExclusive(() => {
      const drained = this.buffer;
      this.buffer = [];
      return drained;
    });
  }

  /**
   * Submit the oldest `count` operations; caller holds the mutex
   */
  private async submit(count: number, options: FlushOptions): Promise<void> {
    const snapshot = this.buffer.slice(0, count);
    const now = this.clock();
    const indexName = getIndexName({
      environment: this.options.environment,
      service: this.options.service,
      entity: this.options.entity,
      date: now,
    });
    const lines = encodeBulk(snapshot, indexName, now);

    try {
      const result = await this.options.writer.bulk(lines, {
        signal: options.signal,
        timeoutMs: this.options.operationTimeoutMs,
      });
      this.buffer.splice(0, count);
      this.options.metrics?.recordBulkOperation(this.options.entity, count, false);
      this.logger.debug('Bulk flush completed', { indexName, operations: count, took: result.took });
    } catch (error) {
      this.options.metrics?.recordBulkOperation(this.options.entity, count, true);
      this.logger.warn('Bulk flush failed, operations retained', {
        indexName,
        operations: count,
        buffered: this.buffer.length,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
