/**
 * Consumer Group Runner
 *
 * Drives a kafkajs consumer with manual commits. kafkajs hands each
 * partition to one worker and awaits `eachMessage` before delivering the
 * next message of that partition, which gives strict per-partition order
 * while different partitions progress concurrently.
 *
 * An offset is committed (as `offset + 1`) only once the processor reports a
 * terminal outcome. Anything thrown leaves the offset uncommitted, so the
 * message is redelivered after a rebalance or restart.
 *
 * Retry waits heartbeat through the payload, so a long retry sequence keeps
 * the partition assigned to this member.
 *
 *   INITIALIZED → STARTING → RUNNING → { ERROR | STOPPED | CLOSING → CLOSED }
 *
 * A crash kafkajs will restart from is an ERROR; one it will not restart
 * from (the group is gone) stops the runner.
 */

import type { Consumer, EachBatchPayload, EachMessagePayload } from 'kafkajs';
import { ConsumerError, ErrorCode, toError } from '../errors/hierarchy.js';
import type { ChangeEventProcessor, InboundMessage } from '../pipeline/change-event-processor.js';
import type { ProcessingMode } from '../types/config.js';
import type { StructuredLogger } from '../types/index.js';
import { NullLogger } from '../types/index.js';

export type RunnerStatus = 'INITIALIZED' | 'STARTING' | 'RUNNING' | 'ERROR' | 'STOPPED' | 'CLOSING' | 'CLOSED';

export interface RunnerHealth {
  healthy: boolean;
  status: RunnerStatus;
  since: Date;
  error?: string;
}

export type RunnerErrorListener = (error: Error) => void;

export interface ConsumerGroupRunnerOptions {
  consumer: Consumer;
  processor: ChangeEventProcessor;
  topics: string[];
  processing: ProcessingMode;
  /** Partitions processed in parallel; order is kept within each one */
  partitionsConsumedConcurrently: number;
  fromBeginning?: boolean;
  logger?: StructuredLogger;
}

/**
 * Offset to commit after `offset` has been handled
 */
export function nextOffset(offset: string): string {
  return (BigInt(offset) + 1n).toString();
}

export class ConsumerGroupRunner {
  private readonly consumer: Consumer;
  private readonly logger: StructuredLogger;
  private readonly listeners = new Set<RunnerErrorListener>();
  private readonly removeInstrumentation: (() => void)[] = [];
  private controller = new AbortController();
  private currentStatus: RunnerStatus = 'INITIALIZED';
  private statusSince = new Date();
  private lastError: Error | undefined;

  constructor(private readonly options: ConsumerGroupRunnerOptions) {
    this.consumer = options.consumer;
    this.logger = options.logger ?? new NullLogger();
  }

  get status(): RunnerStatus {
    return this.currentStatus;
  }

  get error(): Error | undefined {
    return this.lastError;
  }

  /**
   * Register a listener for consumer crashes
   *
   * @returns unsubscribe function
   */
  onError(listener: RunnerErrorListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Connect, subscribe and start consuming
   *
   * @throws ConsumerError when the consumer cannot be started
   */
  async start(): Promise<void> {
    if (this.currentStatus !== 'INITIALIZED' && this.currentStatus !== 'STOPPED') {
      throw new ConsumerError(
        ErrorCode.ERR_CONSUMER_FAILED,
        `Cannot start consumer in status ${this.currentStatus}`,
      );
    }

    this.setStatus('STARTING');
    this.lastError = undefined;
    this.controller = new AbortController();
    this.attachInstrumentation();

    const { topics, processing, partitionsConsumedConcurrently, fromBeginning = false } = this.options;

    try {
      await this.consumer.connect();
      await this.consumer.subscribe({ topics, fromBeginning });

      if (processing === 'batch') {
        await this.consumer.run({
          autoCommit: false,
          eachBatchAutoResolve: false,
          partitionsConsumedConcurrently,
          eachBatch: (payload) => this.handleBatch(payload),
        });
      } else {
        await this.consumer.run({
          autoCommit: false,
          partitionsConsumedConcurrently,
          eachMessage: (payload) => this.handleMessage(payload),
        });
      }
    } catch (error) {
      this.fail(error);
      throw new ConsumerError(ErrorCode.ERR_CONSUMER_FAILED, 'Failed to start consumer', { entity: topics.join(',') }, {
        cause: error,
      });
    }

    this.setStatus('RUNNING');
    this.logger.info('Consumer group runner started', { topics, processing, partitionsConsumedConcurrently });
  }

  /**
   * Stop consuming. In-flight retry waits are cancelled and their messages
   * stay uncommitted.
   */
  async stop(): Promise<void> {
    if (this.currentStatus === 'CLOSED' || this.currentStatus === 'CLOSING') return;

    this.controller.abort();
    await this.consumer.stop();
    this.setStatus('STOPPED');
    this.logger.info('Consumer group runner stopped');
  }

  async close(): Promise<void> {
    if (this.currentStatus === 'CLOSED') return;

    this.setStatus('CLOSING');
    this.controller.abort();
    try {
      await this.consumer.disconnect();
    } finally {
      this.detachInstrumentation();
      this.setStatus('CLOSED');
      this.logger.info('Consumer group runner closed');
    }
  }

  healthCheck(): RunnerHealth {
    const healthy = this.currentStatus === 'RUNNING' || this.currentStatus === 'STARTING';
    return {
      healthy,
      status: this.currentStatus,
      since: this.statusSince,
      error: this.currentStatus === 'ERROR' || this.currentStatus === 'STOPPED' ? this.lastError?.message : undefined,
    };
  }

  private async handleMessage({ topic, partition, message, heartbeat }: EachMessagePayload): Promise<void> {
    const inbound: InboundMessage = {
      topic,
      partition,
      offset: message.offset,
      key: message.key,
      value: message.value,
    };

    const outcome = await this.withHeartbeat(heartbeat, (beat) =>
      this.options.processor.process(inbound, { signal: this.controller.signal, heartbeat: beat }),
    );
    await this.commit(topic, partition, message.offset);

    this.logger.debug('Message committed', { topic, partition, offset: message.offset, outcome });
  }

  private async handleBatch({ batch, resolveOffset, heartbeat, isRunning, isStale }: EachBatchPayload): Promise<void> {
    if (!isRunning() || isStale() || batch.messages.length === 0) return;

    const messages: InboundMessage[] = batch.messages.map((message) => ({
      topic: batch.topic,
      partition: batch.partition,
      offset: message.offset,
      key: message.key,
      value: message.value,
    }));

    const summary = await this.withHeartbeat(heartbeat, (beat) =>
      this.options.processor.processBatch(messages, { signal: this.controller.signal, heartbeat: beat }),
    );
    const last = batch.lastOffset();

    resolveOffset(last);
    await this.commit(batch.topic, batch.partition, last);
    await heartbeat();

    this.logger.debug('Batch committed', { topic: batch.topic, partition: batch.partition, offset: last, ...summary });
  }

  /**
   * Run `fn` with a heartbeat that remembers its own failure. A failed
   * heartbeat (rebalance, fenced member) is rethrown as is, so kafkajs
   * rejoins the group instead of treating it as a processing error.
   */
  private async withHeartbeat<T>(
    heartbeat: () => Promise<void>,
    fn: (beat: () => Promise<void>) => Promise<T>,
  ): Promise<T> {
    let heartbeatError: unknown;
    const beat = async (): Promise<void> => {
      try {
        await heartbeat();
      } catch (error) {
        heartbeatError = error;
        throw error;
      }
    };

    try {
      return await fn(beat);
    } catch (error) {
      throw heartbeatError ?? error;
    }
  }

  private async commit(topic: string, partition: number, offset: string): Promise<void> {
    await this.consumer.commitOffsets([{ topic, partition, offset: nextOffset(offset) }]);
  }

  private attachInstrumentation(): void {
    this.detachInstrumentation();
    const { CRASH, STOP, DISCONNECT, GROUP_JOIN } = this.consumer.events;

    this.removeInstrumentation.push(
      this.consumer.on(CRASH, (event) => {
        const { error, restart } = event.payload;
        if (restart === false) {
          this.lastError = toError(error);
          this.setStatus('STOPPED');
          this.logger.error('Consumer crashed without restart, runner stopped', error, {
            groupId: event.payload.groupId,
            restart,
          });
          return;
        }
        this.fail(error);
        this.logger.error('Consumer crashed', error, { groupId: event.payload.groupId, restart });
      }),
      this.consumer.on(GROUP_JOIN, (event) => {
        if (this.currentStatus === 'ERROR') {
          this.setStatus('RUNNING');
          this.logger.info('Consumer rejoined group after crash', { groupId: event.payload.groupId });
        }
      }),
      this.consumer.on(STOP, () => {
        this.logger.debug('Consumer stop event received');
      }),
      this.consumer.on(DISCONNECT, () => {
        this.logger.debug('Consumer disconnect event received');
      }),
    );
  }

  private detachInstrumentation(): void {
    for (const remove of this.removeInstrumentation.splice(0)) remove();
  }

  private fail(error: unknown): void {
    this.lastError = toError(error);
    this.setStatus('ERROR');
    for (const listener of this.listeners) {
      try {
        listener(this.lastError);
      } catch (listenerError) {
        this.logger.warn('Runner error listener threw', {
          error: listenerError instanceof Error ? listenerError.message : String(listenerError),
        });
      }
    }
  }

  private setStatus(status: RunnerStatus): void {
    if (this.currentStatus === status) return;
    this.currentStatus = status;
    this.statusSince = new Date();
  }
}
