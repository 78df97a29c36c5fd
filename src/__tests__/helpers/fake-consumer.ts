/**
 * In-process stand-in for a kafkajs Consumer: records subscriptions and
 * commits, and lets tests deliver messages through the registered handlers.
 * Like kafkajs, deliveries to one partition run one after another.
 */

import { vi } from 'vitest';
import type { Consumer, ConsumerRunConfig, EachBatchPayload, EachMessagePayload, TopicPartitionOffsetAndMetadata } from 'kafkajs';

type Listener = (event: { payload: Record<string, unknown> }) => void;

export interface DeliveredMessage {
  offset: string;
  value: Buffer | null;
  key?: Buffer | null;
}

export class FakeConsumer {
  readonly events = {
    CRASH: 'consumer.crash',
    GROUP_JOIN: 'consumer.group_join',
    STOP: 'consumer.stop',
    DISCONNECT: 'consumer.disconnect',
  };

  readonly commits: TopicPartitionOffsetAndMetadata[] = [];
  readonly listeners = new Map<string, Set<Listener>>();
  runConfig: ConsumerRunConfig | undefined;

  private readonly partitionQueues = new Map<string, Promise<unknown>>();

  connect = vi.fn(async () => {});
  subscribe = vi.fn(async (_subscription: { topics: string[]; fromBeginning?: boolean }) => {});
  run = vi.fn(async (config: ConsumerRunConfig) => {
    this.runConfig = config;
  });
  stop = vi.fn(async () => {});
  disconnect = vi.fn(async () => {});
  commitOffsets = vi.fn(async (offsets: TopicPartitionOffsetAndMetadata[]) => {
    this.commits.push(...offsets);
  });

  on(event: string, listener: Listener): () => void {
    const set = this.listeners.get(event) ?? new Set<Listener>();
    set.add(listener);
    this.listeners.set(event, set);
    return () => {
      set.delete(listener);
    };
  }

  emit(event: string, payload: Record<string, unknown>): void {
    for (const listener of this.listeners.get(event) ?? []) listener({ payload });
  }

  get listenerCount(): number {
    let count = 0;
    for (const set of this.listeners.values()) count += set.size;
    return count;
  }

  asConsumer(): Consumer {
    return this as unknown as Consumer;
  }

  deliver(
    topic: string,
    partition: number,
    message: DeliveredMessage,
    heartbeat: () => Promise<void> = async () => {},
  ): Promise<void> {
    const handler = this.runConfig?.eachMessage;
    if (!handler) return Promise.reject(new Error('consumer is not running in message mode'));
    const payload = {
      topic,
      partition,
      message: { key: null, timestamp: '0', attributes: 0, headers: {}, ...message },
      heartbeat,
      pause: () => () => {},
    };
    return this.inPartitionOrder(topic, partition, () => handler(payload as unknown as EachMessagePayload));
  }

  async deliverBatch(
    topic: string,
    partition: number,
    messages: DeliveredMessage[],
    state: { running?: boolean; stale?: boolean } = {},
  ): Promise<{ resolved: string[]; heartbeats: number }> {
    const handler = this.runConfig?.eachBatch;
    if (!handler) throw new Error('consumer is not running in batch mode');
    const resolved: string[] = [];
    let heartbeats = 0;
    const payload = {
      batch: {
        topic,
        partition,
        messages: messages.map((m) => ({ key: null, timestamp: '0', attributes: 0, headers: {}, ...m })),
        lastOffset: () => messages[messages.length - 1]?.offset ?? '-1',
      },
      resolveOffset: (offset: string) => {
        resolved.push(offset);
      },
      heartbeat: async () => {
        heartbeats++;
      },
      isRunning: () => state.running ?? true,
      isStale: () => state.stale ?? false,
    };
    await handler(payload as unknown as EachBatchPayload);
    return { resolved, heartbeats };
  }

  private inPartitionOrder(topic: string, partition: number, fn: () => Promise<void>): Promise<void> {
    const key = `${topic}:${partition}`;
    const previous = this.partitionQueues.get(key) ?? Promise.resolve();
    const next = previous.catch(() => undefined).then(fn);
    this.partitionQueues.set(key, next);
    return next;
  }
}
