/**
 * Configuration types
 *
 * One tree for the whole process. Presets provide every value; `loadConfig`
 * layers `SYNC_*` environment variables on top and validates the result.
 */

import type { Environment } from '../logger/index.js';

export type SyncMode = 'custom' | 'kafka-connect';

export type ProcessingMode = 'single' | 'batch';

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AppConfig {
  environment: Environment;
  /** Defaults per environment when absent */
  logLevel?: LogLevelName;
  serviceName: string;
}

/**
 * Segments of `{environment}-{service}-{entity}-{yyyy-MM}`
 */
export interface IndexConfig {
  environment: string;
  service: string;
  entity: string;
  templateName: string;
  policyName: string;
  shards: number;
  replicas: number;
}

export interface CircuitBreakerConfig {
  enabled: boolean;
  timeoutMs: number;
  errorThresholdPercentage: number;
  resetTimeoutMs: number;
  volumeThreshold: number;
}

export interface ElasticsearchConfig {
  nodes: string[];
  username?: string;
  password?: string;
  /** Transport-level retries inside the client */
  maxRetries: number;
  requestTimeoutMs: number;
  /** Connection pool size per node */
  maxConnections: number;
  compression: boolean;
  sniffOnStart: boolean;
  circuitBreaker: CircuitBreakerConfig;
}

export interface KafkaSaslConfig {
  mechanism: 'plain' | 'scram-sha-256' | 'scram-sha-512';
  username: string;
  password: string;
}

export interface KafkaConfig {
  brokers: string[];
  clientId: string;
  groupId: string;
  topicPrefix: string;
  /** Explicit topics; defaults to `{topicPrefix}.{index.entity}` */
  topics?: string[];
  fromBeginning: boolean;
  partitionsConsumedConcurrently: number;
  sessionTimeoutMs: number;
  ssl: boolean;
  sasl?: KafkaSaslConfig;
}

export interface SyncSettings {
  mode: SyncMode;
  processing: ProcessingMode;
  batchSize: number;
  /** Attempts after the first failed write */
  maxRetries: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
  backoffFactor: number;
  /** Deadline of every single store request */
  operationTimeoutMs: number;
  /** Dead-letter topic; failures are only logged and counted when unset */
  failureTopic?: string;
}

export interface KafkaConnectConfig {
  url: string;
  connectorName: string;
  pollIntervalMs: number;
}

export interface HttpConfig {
  enabled: boolean;
  port: number;
}

export interface ObservabilityConfig {
  enableMetrics: boolean;
  collectDefaultMetrics: boolean;
  metricsPrefix: string;
}

export interface SyncConfig {
  app: AppConfig;
  index: IndexConfig;
  elasticsearch: ElasticsearchConfig;
  kafka: KafkaConfig;
  sync: SyncSettings;
  kafkaConnect: KafkaConnectConfig;
  http: HttpConfig;
  observability: ObservabilityConfig;
}
