/**
 * kafkajs client factory
 *
 * Builds the Kafka client from configuration and routes kafkajs' internal
 * logging through the process logger.
 */

import { Kafka, logLevel } from 'kafkajs';
import type { Consumer, LogEntry, SASLOptions } from 'kafkajs';
import type { KafkaConfig, KafkaSaslConfig } from '../types/config.js';
import type { StructuredLogger } from '../types/index.js';

function toSasl(sasl: KafkaSaslConfig): SASLOptions {
  const { username, password } = sasl;
  switch (sasl.mechanism) {
    case 'plain':
      return { mechanism: 'plain', username, password };
    case 'scram-sha-256':
      return { mechanism: 'scram-sha-256', username, password };
    case 'scram-sha-512':
      return { mechanism: 'scram-sha-512', username, password };
  }
}

/**
 * kafkajs `logCreator` writing to a StructuredLogger
 */
export function kafkaLogCreator(logger: StructuredLogger): () => (entry: LogEntry) => void {
  return () =>
    ({ namespace, level, log }: LogEntry) => {
      const { message, timestamp: _timestamp, ...extra } = log;
      const context = { component: 'kafkajs', namespace, ...extra };
      switch (level) {
        case logLevel.ERROR:
        case logLevel.NOTHING:
          logger.error(message, undefined, context);
          break;
        case logLevel.WARN:
          logger.warn(message, context);
          break;
        case logLevel.INFO:
          logger.info(message, context);
          break;
        default:
          logger.debug(message, context);
      }
    };
}

export function createKafka(config: KafkaConfig, logger: StructuredLogger): Kafka {
  return new Kafka({
    clientId: config.clientId,
    brokers: config.brokers,
    ssl: config.ssl,
    sasl: config.sasl ? toSasl(config.sasl) : undefined,
    logLevel: logLevel.WARN,
    logCreator: kafkaLogCreator(logger),
    retry: {
      initialRetryTime: 300,
      retries: 5,
      maxRetryTime: 30000,
      factor: 2,
    },
    connectionTimeout: 10000,
    requestTimeout: 30000,
  });
}

export function createConsumer(kafka: Pick<Kafka, 'consumer'>, config: KafkaConfig): Consumer {
  return kafka.consumer({
    groupId: config.groupId,
    sessionTimeout: config.sessionTimeoutMs,
    heartbeatInterval: 3000,
  });
}

/**
 * Topics to subscribe to: explicit list, else `{topicPrefix}.{entity}`
 */
export function resolveTopics(config: KafkaConfig, entity: string): string[] {
  return config.topics && config.topics.length > 0 ? config.topics : [`${config.topicPrefix}.${entity}`];
}
