/**
 * Change Event Processor
 *
 * Turns one consumed message into a terminal outcome the runner can commit:
 *
 * - `applied`  the operation reached the index
 * - `skipped`  the message can never be applied (decode or validation failure)
 * - `failed`   the store refused it or retries ran out; dead-lettered when a sink is configured
 *
 * Only cancellation (and a dead-letter publish failure) escapes as an error,
 * which leaves the offset uncommitted.
 */

import type { BulkBuffer } from '../bulk/bulk-buffer.js';
import { getContext, withContext } from '../context/execution-context.js';
import { decodeSafe } from '../decoder/event-decoder.js';
import type { OperationDispatcher } from '../dispatcher/operation-dispatcher.js';
import { validateOperation } from '../dispatcher/operation-dispatcher.js';
import { SyncError, ValidationError, isCancellation } from '../errors/hierarchy.js';
import type { DeadLetterSink } from '../kafka/dead-letter.js';
import type { MetricsCollector } from '../metrics/index.js';
import type { RetryEngine } from '../retry/retry-engine.js';
import type { FailureLog } from '../sync/failure-log.js';
import type { CategoryOperation, StructuredLogger } from '../types/index.js';
import { NullLogger } from '../types/index.js';

export type ProcessOutcome = 'applied' | 'skipped' | 'failed';

/**
 * Consumed message with its coordinates
 */
export interface InboundMessage {
  topic: string;
  partition: number;
  offset: string;
  key: Buffer | null;
  value: Buffer | null;
}

export interface ProcessOptions {
  signal?: AbortSignal;
  /** Keeps the consumer group session alive while retries wait */
  heartbeat?: () => Promise<void>;
}

export interface BatchSummary {
  applied: number;
  skipped: number;
  failed: number;
  /** Operations re-dispatched one by one after the bulk flush gave up */
  fallback: number;
}

export type BulkBufferFactory = () => BulkBuffer;

export interface ChangeEventProcessorOptions {
  dispatcher: OperationDispatcher;
  retry: RetryEngine;
  /** Retries after the first failed bulk flush */
  maxRetries: number;
  /** Present in batch processing mode; each topic partition gets its own buffer */
  createBulk?: BulkBufferFactory;
  deadLetter?: DeadLetterSink;
  failures?: FailureLog;
  metrics?: MetricsCollector;
  logger?: StructuredLogger;
}

interface PendingEntry {
  message: InboundMessage;
  op: CategoryOperation;
}

function rawSize(message: InboundMessage): number {
  return message.value?.length ?? 0;
}

export class ChangeEventProcessor {
  private readonly dispatcher: OperationDispatcher;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsCollector | undefined;
  private readonly buffers = new Map<string, BulkBuffer>();

  constructor(private readonly options: ChangeEventProcessorOptions) {
    this.dispatcher = options.dispatcher;
    this.logger = options.logger ?? new NullLogger();
    this.metrics = options.metrics;
  }

  /**
   * Decode and apply a single message
   *
   * @throws CancelledError | ConsumerError (dead-letter publish failed)
   */
  async process(message: InboundMessage, options: ProcessOptions = {}): Promise<ProcessOutcome> {
    return this.inContext(message, async () => {
      const op = this.decode(message);
      if (op === undefined) {
        return this.finish(message, 'skipped');
      }

      try {
        await this.dispatcher.dispatch(op, { signal: options.signal, onWait: options.heartbeat });
        this.options.failures?.resolve(op.payload.id);
        return this.finish(message, 'applied');
      } catch (error) {
        return this.finish(message, await this.handleFailure(op, error, message));
      }
    });
  }

  /**
   * Operations currently buffered across all partitions
   */
  get buffered(): number {
    let total = 0;
    for (const buffer of this.buffers.values()) total += buffer.size;
    return total;
  }

  /**
   * Empty every partition buffer
   *
   * @returns the number of operations discarded
   */
  async drainBuffers(): Promise<number> {
    let discarded = 0;
    for (const buffer of this.buffers.values()) {
      discarded += (await buffer.drain()).length;
    }
    return discarded;
  }

  /**
   * Apply one partition's batch through that partition's bulk buffer. The
   * buffer is flushed under the retry policy; when the flush gives up,
   * whatever is still buffered is drained and dispatched one operation at a
   * time.
   *
   * @throws CancelledError | ConsumerError (dead-letter publish failed)
   */
  async processBatch(messages: readonly InboundMessage[], options: ProcessOptions = {}): Promise<BatchSummary> {
    const createBulk = this.options.createBulk;
    if (createBulk === undefined) {
      throw new Error('processBatch requires a bulk buffer factory');
    }

    const summary: BatchSummary = { applied: 0, skipped: 0, failed: 0, fallback: 0 };
    const pending: PendingEntry[] = [];

    for (const message of messages) {
      const op = this.inContext(message, () => this.decode(message));
      if (op === undefined) {
        summary.skipped++;
        this.finish(message, 'skipped');
        continue;
      }
      try {
        validateOperation(op);
      } catch (error) {
        this.inContext(message, () => this.logSkip(message, error, op));
        summary.skipped++;
        this.finish(message, 'skipped');
        continue;
      }
      pending.push({ message, op });
    }

    if (pending.length === 0) return summary;

    const first = pending[0].message;
    const bulk = this.bufferFor(first, createBulk);
    const stale = await bulk.drain();
    if (stale.length > 0) {
      // Left by a cancelled batch of this partition; uncommitted, so redelivered
      this.logger.warn('Discarded operations of an interrupted batch', {
        topic: first.topic,
        partition: first.partition,
        operations: stale.length,
      });
    }
    let added = 0;

    try {
      await this.options.retry.run(
        {
          operationId: `${first.topic}:${first.partition}:${first.offset}`,
          entity: this.dispatcher.entity,
          operation: 'BULK',
        },
        async (_attempt, signal) => {
          // An add that triggers a failed flush keeps its operation buffered
          while (added < pending.length) {
            const { op } = pending[added];
            added++;
            await bulk.add(op, { signal });
          }
          await bulk.flush({ signal });
        },
        { signal: options.signal, maxAttempts: this.options.maxRetries + 1, onWait: options.heartbeat },
      );
    } catch (error) {
      if (isCancellation(error)) throw error;

      this.logger.warn('Bulk flush gave up, dispatching buffered operations individually', {
        topic: first.topic,
        partition: first.partition,
        operations: pending.length,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.fallback(bulk, pending, added, summary, options);
    }

    for (const { message, op } of pending) {
      this.options.failures?.resolve(op.payload.id);
      this.finish(message, 'applied');
    }
    summary.applied += pending.length;
    return summary;
  }

  private async fallback(
    bulk: BulkBuffer,
    pending: PendingEntry[],
    added: number,
    summary: BatchSummary,
    options: ProcessOptions,
  ): Promise<BatchSummary> {
    const unconfirmed = new Set(await bulk.drain());

    for (const [position, { message, op }] of pending.entries()) {
      // Added operations no longer buffered were confirmed by an earlier flush
      if (position < added && !unconfirmed.has(op)) {
        summary.applied++;
        this.options.failures?.resolve(op.payload.id);
        this.finish(message, 'applied');
        continue;
      }

      await options.heartbeat?.();
      summary.fallback++;
      summary[await this.process(message, options)]++;
    }

    return summary;
  }

  private bufferFor(message: InboundMessage, createBulk: BulkBufferFactory): BulkBuffer {
    const key = `${message.topic}:${message.partition}`;
    let buffer = this.buffers.get(key);
    if (buffer === undefined) {
      buffer = createBulk();
      this.buffers.set(key, buffer);
    }
    return buffer;
  }

  private decode(message: InboundMessage): CategoryOperation | undefined {
    const result = decodeSafe(message.value);
    if (result.ok) return result.operation;

    this.metrics?.recordDecodeFailure(result.error.code);
    this.logSkip(message, result.error);
    return undefined;
  }

  private async handleFailure(op: CategoryOperation, error: unknown, message: InboundMessage): Promise<ProcessOutcome> {
    if (isCancellation(error)) throw error;

    if (error instanceof ValidationError) {
      this.logSkip(message, error, op);
      return 'skipped';
    }

    let deadLettered = false;
    if (this.options.deadLetter) {
      await this.options.deadLetter.publish({ ...message, error });
      deadLettered = true;
    }

    this.options.failures?.record({
      entityId: op.payload.id,
      operation: op.operation,
      topic: message.topic,
      partition: message.partition,
      offset: message.offset,
      deadLettered,
      error,
    });

    this.logger.error('Change event failed terminally', error, {
      operation: op.operation,
      entityId: op.payload.id,
      code: error instanceof SyncError ? error.code : undefined,
      deadLettered,
    });
    return 'failed';
  }

  private logSkip(message: InboundMessage, error: unknown, op?: CategoryOperation): void {
    this.logger.warn('Skipping change event', {
      operation: op?.operation,
      entityId: op?.payload.id,
      payloadBytes: rawSize(message),
      code: error instanceof SyncError ? error.code : undefined,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  private finish(message: InboundMessage, outcome: ProcessOutcome): ProcessOutcome {
    this.metrics?.recordMessage(message.topic, outcome);
    return outcome;
  }

  private inContext<T>(message: InboundMessage, fn: () => T): T {
    const current = getContext();
    if (
      current?.topic === message.topic &&
      current.partition === message.partition &&
      current.offset === message.offset
    ) {
      return fn();
    }
    return withContext({ topic: message.topic, partition: message.partition, offset: message.offset }, fn);
  }
}
