/**
 * Configuration Presets
 *
 * Complete configurations for each environment. `loadConfig` picks one from
 * APP_ENV and overlays environment variables on it.
 */

import type { SyncConfig } from '../types/config.js';

/**
 * DEVELOPMENT Preset
 *
 * Local broker and cluster, pretty debug logs, short waits between retries
 * so that failures surface quickly.
 */
export const DEVELOPMENT: SyncConfig = {
  app: {
    environment: 'development',
    logLevel: 'debug',
    serviceName: 'digital-discovery-sync',
  },
  index: {
    environment: 'dev',
    service: 'digital-discovery',
    entity: 'categories',
    templateName: 'categories-template',
    policyName: 'digital-discovery-policy',
    shards: 1,
    replicas: 0,
  },
  elasticsearch: {
    nodes: ['http://localhost:9200'],
    maxRetries: 3,
    requestTimeoutMs: 30000,
    maxConnections: 10,
    compression: false,
    sniffOnStart: false,
    circuitBreaker: {
      enabled: true,
      timeoutMs: 30000,
      errorThresholdPercentage: 50,
      resetTimeoutMs: 10000,
      volumeThreshold: 10,
    },
  },
  kafka: {
    brokers: ['localhost:9092'],
    clientId: 'digital-discovery-sync',
    groupId: 'digital-discovery-sync',
    topicPrefix: 'postgres.digital_discovery.public',
    fromBeginning: true,
    partitionsConsumedConcurrently: 1,
    sessionTimeoutMs: 30000,
    ssl: false,
  },
  sync: {
    mode: 'custom',
    processing: 'single',
    batchSize: 100,
    maxRetries: 3,
    retryDelayMs: 500, // 500ms - fail fast while iterating
    maxRetryDelayMs: 10000,
    backoffFactor: 2,
    operationTimeoutMs: 30000,
  },
  kafkaConnect: {
    url: 'http://localhost:8083',
    connectorName: 'elasticsearch-sink',
    pollIntervalMs: 30000,
  },
  http: {
    enabled: true,
    port: 8082,
  },
  observability: {
    enableMetrics: true,
    collectDefaultMetrics: false,
    metricsPrefix: 'search_sync_',
  },
};

/**
 * PRODUCTION Preset
 *
 * JSON logs, gzip and sniffing on, multi-second backoff capped at one hour.
 */
export const PRODUCTION: SyncConfig = {
  app: {
    environment: 'production',
    serviceName: 'digital-discovery-sync',
  },
  index: {
    environment: 'prod',
    service: 'digital-discovery',
    entity: 'categories',
    templateName: 'categories-template',
    policyName: 'digital-discovery-policy',
    shards: 3,
    replicas: 1,
  },
  elasticsearch: {
    nodes: ['http://localhost:9200'],
    maxRetries: 3,
    requestTimeoutMs: 30000,
    maxConnections: 10,
    compression: true,
    sniffOnStart: true,
    circuitBreaker: {
      enabled: true,
      timeoutMs: 30000,
      errorThresholdPercentage: 50,
      resetTimeoutMs: 60000, // 1 minute in open state before probing
      volumeThreshold: 10,
    },
  },
  kafka: {
    brokers: ['localhost:9092'],
    clientId: 'digital-discovery-sync',
    groupId: 'digital-discovery-sync',
    topicPrefix: 'postgres.digital_discovery.public',
    fromBeginning: true,
    partitionsConsumedConcurrently: 3,
    sessionTimeoutMs: 30000,
    ssl: false,
  },
  sync: {
    mode: 'custom',
    processing: 'single',
    batchSize: 100,
    maxRetries: 3,
    retryDelayMs: 5000, // 5s base delay
    maxRetryDelayMs: 3600000, // 1h cap
    backoffFactor: 2,
    operationTimeoutMs: 30000,
  },
  kafkaConnect: {
    url: 'http://localhost:8083',
    connectorName: 'elasticsearch-sink',
    pollIntervalMs: 30000,
  },
  http: {
    enabled: true,
    port: 8082,
  },
  observability: {
    enableMetrics: true,
    collectDefaultMetrics: true,
    metricsPrefix: 'search_sync_',
  },
};

/**
 * TESTING Preset
 *
 * Silent logs, breaker off, millisecond backoff, HTTP surface disabled.
 */
export const TESTING: SyncConfig = {
  app: {
    environment: 'test',
    logLevel: 'silent',
    serviceName: 'digital-discovery-sync',
  },
  index: {
    environment: 'test',
    service: 'digital-discovery',
    entity: 'categories',
    templateName: 'categories-template',
    policyName: 'digital-discovery-policy',
    shards: 1,
    replicas: 0,
  },
  elasticsearch: {
    nodes: ['http://localhost:9200'],
    maxRetries: 0,
    requestTimeoutMs: 2000,
    maxConnections: 2,
    compression: false,
    sniffOnStart: false,
    circuitBreaker: {
      enabled: false,
      timeoutMs: 2000,
      errorThresholdPercentage: 50,
      resetTimeoutMs: 1000,
      volumeThreshold: 0,
    },
  },
  kafka: {
    brokers: ['localhost:9092'],
    clientId: 'digital-discovery-sync-test',
    groupId: 'digital-discovery-sync-test',
    topicPrefix: 'postgres.digital_discovery.public',
    fromBeginning: true,
    partitionsConsumedConcurrently: 1,
    sessionTimeoutMs: 10000,
    ssl: false,
  },
  sync: {
    mode: 'custom',
    processing: 'single',
    batchSize: 10,
    maxRetries: 1,
    retryDelayMs: 10,
    maxRetryDelayMs: 50,
    backoffFactor: 1,
    operationTimeoutMs: 2000,
  },
  kafkaConnect: {
    url: 'http://localhost:8083',
    connectorName: 'elasticsearch-sink',
    pollIntervalMs: 1000,
  },
  http: {
    enabled: false,
    port: 0,
  },
  observability: {
    enableMetrics: false,
    collectDefaultMetrics: false,
    metricsPrefix: 'search_sync_',
  },
};

/**
 * Preset Registry
 */
export const PRESETS = {
  DEVELOPMENT,
  PRODUCTION,
  TESTING,
} as const;

export type PresetName = keyof typeof PRESETS;

/**
 * Deep copy of a preset, safe to mutate
 */
export function getPreset(name: PresetName): SyncConfig {
  return structuredClone(PRESETS[name]);
}

/**
 * Map APP_ENV values onto preset names
 */
export function presetForEnvironment(appEnv: string | undefined): PresetName {
  switch (appEnv?.toLowerCase()) {
    case 'production':
    case 'prod':
      return 'PRODUCTION';
    case 'test':
    case 'testing':
      return 'TESTING';
    default:
      return 'DEVELOPMENT';
  }
}
