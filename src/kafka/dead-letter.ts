/**
 * Dead-letter routing
 *
 * When a failure topic is configured, change events that end in a terminal
 * failure are republished there (original key and bytes, error details in
 * headers) before their offset is committed. A publish failure fails the
 * message so that it is redelivered instead of being lost.
 */

import type { IHeaders, Producer } from 'kafkajs';
import { ConsumerError, ErrorCode, SyncError } from '../errors/hierarchy.js';
import type { MetricsCollector } from '../metrics/index.js';
import type { Clock, StructuredLogger } from '../types/index.js';
import { NullLogger, systemClock } from '../types/index.js';

/**
 * Terminally failed message, as consumed
 */
export interface DeadLetterEntry {
  topic: string;
  partition: number;
  offset: string;
  key: Buffer | string | null;
  value: Buffer | string | null;
  error: unknown;
}

export interface DeadLetterSink {
  readonly topic: string;
  /** @throws ConsumerError (ERR_DEAD_LETTER_FAILED) */
  publish(entry: DeadLetterEntry): Promise<void>;
  close(): Promise<void>;
}

/**
 * Headers describing why and where a message failed
 */
export function buildDeadLetterHeaders(entry: DeadLetterEntry, failedAt: Date): IHeaders {
  const error = entry.error;
  return {
    'x-source-topic': entry.topic,
    'x-source-partition': String(entry.partition),
    'x-source-offset': entry.offset,
    'x-error-code': error instanceof SyncError ? error.code : 'UNKNOWN',
    'x-error-message': error instanceof Error ? error.message : String(error),
    'x-failed-at': failedAt.toISOString(),
  };
}

export interface KafkaDeadLetterSinkOptions {
  producer: Producer;
  topic: string;
  logger?: StructuredLogger;
  metrics?: MetricsCollector;
  clock?: Clock;
}

export class KafkaDeadLetterSink implements DeadLetterSink {
  readonly topic: string;
  private readonly producer: Producer;
  private readonly logger: StructuredLogger;
  private readonly clock: Clock;
  private connected = false;

  constructor(private readonly options: KafkaDeadLetterSinkOptions) {
    this.topic = options.topic;
    this.producer = options.producer;
    this.logger = options.logger ?? new NullLogger();
    this.clock = options.clock ?? systemClock;
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    await this.producer.connect();
    this.connected = true;
    this.logger.info('Dead-letter producer connected', { topic: this.topic });
  }

  async publish(entry: DeadLetterEntry): Promise<void> {
    try {
      await this.connect();
      await this.producer.send({
        topic: this.topic,
        messages: [
          {
            key: entry.key,
            value: entry.value,
            headers: buildDeadLetterHeaders(entry, this.clock()),
          },
        ],
      });
    } catch (error) {
      this.logger.error('Failed to publish to dead-letter topic', error, {
        topic: this.topic,
        sourceTopic: entry.topic,
        partition: entry.partition,
        offset: entry.offset,
      });
      throw new ConsumerError(
        ErrorCode.ERR_DEAD_LETTER_FAILED,
        `Dead-letter publish to ${this.topic} failed`,
        { operation: 'DEAD_LETTER', entity: entry.topic },
        { cause: error },
      );
    }

    this.options.metrics?.recordDeadLetter(entry.topic);
    this.logger.warn('Message routed to dead-letter topic', {
      topic: this.topic,
      sourceTopic: entry.topic,
      partition: entry.partition,
      offset: entry.offset,
    });
  }

  async close(): Promise<void> {
    if (!this.connected) return;
    await this.producer.disconnect();
    this.connected = false;
    this.logger.info('Dead-letter producer disconnected', { topic: this.topic });
  }
}
