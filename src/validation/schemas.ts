/**
 * Zod Validation Schemas
 *
 * - wire schemas for the change-capture envelope and the category snapshot
 * - the query string of the read-side category lookup
 * - runtime configuration schemas, checked once at startup
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Change-capture envelope
// ---------------------------------------------------------------------------

/**
 * Source metadata block. Only `ts_ms` is read; connector-specific fields
 * (db, table, lsn, ...) pass through untouched.
 */
export const SourceSchema = z
  .object({
    ts_ms: z.number().int().nonnegative().optional(),
  })
  .passthrough();

const SnapshotSchema = z.record(z.unknown()).nullable().optional();

export const ChangeEnvelopeSchema = z
  .object({
    payload: z
      .object({
        before: SnapshotSchema,
        after: SnapshotSchema,
        source: SourceSchema,
        op: z.string(),
      })
      .passthrough(),
  })
  .passthrough();

const timestampValue = z.union([z.string(), z.number()]).nullish().transform((v) => v ?? null);

/**
 * Category row as captured. Numeric ids are stringified so that the document
 * id is identical whatever the source column type is. Cleared or absent
 * nullable columns become `null`. Business rules (non-empty
 * name, non-negative status) are checked by the dispatcher, not here.
 */
export const CategorySnapshotSchema = z.object({
  id: z.union([z.string(), z.number().int()]).transform((v) => String(v)),
  name: z
    .string()
    .nullish()
    .transform((v) => v ?? ''),
  description: z
    .string()
    .nullish()
    .transform((v) => v ?? null),
  status: z
    .number()
    .int('status must be an integer')
    .nullish()
    .transform((v) => v ?? 0),
  version: z
    .number()
    .int()
    .nullish()
    .transform((v) => v ?? null),
  created_at: timestampValue,
  updated_at: timestampValue,
});

export type ChangeEnvelope = z.infer<typeof ChangeEnvelopeSchema>;
export type CategorySnapshot = z.infer<typeof CategorySnapshotSchema>;

// ---------------------------------------------------------------------------
// Read-side lookups
// ---------------------------------------------------------------------------

/**
 * Query string of `GET /api/v1/categories`
 */
export const CategorySearchQuerySchema = z.object({
  q: z.string().trim().min(1).optional(),
  status: z.coerce.number().int().nonnegative().optional(),
  from: z.coerce.number().int().nonnegative().default(0),
  size: z.coerce.number().int().min(1).max(100, 'size must not exceed 100').default(20),
});

export type CategorySearchQuery = z.infer<typeof CategorySearchQuerySchema>;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export const AppConfigSchema = z.object({
  environment: z
    .enum(['development', 'production', 'test'], {
      errorMap: () => ({ message: 'environment must be "development", "production", or "test"' }),
    })
    .describe('Runtime environment (selects log format and defaults)'),

  logLevel: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'silent'], {
      errorMap: () => ({ message: 'logLevel must be one of trace, debug, info, warn, error, silent' }),
    })
    .optional()
    .describe('Minimum log level; defaults per environment'),

  serviceName: z.string().min(1, 'serviceName is required').describe('Process name used in logs'),
});

export const IndexConfigSchema = z.object({
  environment: z
    .string()
    .min(1, 'index environment label is required')
    .describe('Environment label in index names (prod, stg, dev)'),

  service: z.string().min(1, 'index service is required').describe('Service segment of index names'),

  entity: z.string().min(1, 'index entity is required').describe('Entity segment of index names'),

  templateName: z.string().min(1).describe('Composable index template name'),

  policyName: z.string().min(1).describe('ILM policy name'),

  shards: z.number().int().min(1, 'shards must be at least 1'),

  replicas: z.number().int().min(0, 'replicas must be non-negative'),
});

export const CircuitBreakerConfigSchema = z.object({
  enabled: z.boolean(),

  timeoutMs: z
    .number()
    .int()
    .min(100, 'circuit breaker timeoutMs must be at least 100ms')
    .describe('Call timeout counted as a breaker failure'),

  errorThresholdPercentage: z
    .number()
    .min(1)
    .max(100, 'errorThresholdPercentage must be between 1 and 100'),

  resetTimeoutMs: z.number().int().min(100).describe('Time in open state before half-open probe'),

  volumeThreshold: z.number().int().min(0).describe('Minimum calls before the breaker may trip'),
});

export const ElasticsearchConfigSchema = z.object({
  nodes: z.array(z.string().url('each elasticsearch node must be a URL')).min(1, 'at least one node is required'),

  username: z.string().optional(),

  password: z.string().optional(),

  maxRetries: z.number().int().min(0).max(10, 'maxRetries should not exceed 10'),

  requestTimeoutMs: z.number().int().min(100, 'requestTimeoutMs must be at least 100ms'),

  maxConnections: z.number().int().min(1, 'maxConnections must be at least 1'),

  compression: z.boolean().describe('gzip request bodies'),

  sniffOnStart: z.boolean().describe('Discover cluster nodes at startup'),

  circuitBreaker: CircuitBreakerConfigSchema,
});

export const KafkaConfigSchema = z.object({
  brokers: z.array(z.string().min(1)).min(1, 'at least one broker is required'),

  clientId: z.string().min(1),

  groupId: z.string().min(1, 'groupId is required'),

  topicPrefix: z.string().min(1, 'topicPrefix is required'),

  topics: z
    .array(z.string().min(1))
    .optional()
    .describe('Explicit topic list; defaults to {topicPrefix}.{entity}'),

  fromBeginning: z.boolean(),

  partitionsConsumedConcurrently: z.number().int().min(1).max(64),

  sessionTimeoutMs: z.number().int().min(1000),

  ssl: z.boolean(),

  sasl: z
    .object({
      mechanism: z.enum(['plain', 'scram-sha-256', 'scram-sha-512']),
      username: z.string().min(1),
      password: z.string().min(1),
    })
    .optional(),
});

export const SyncSettingsSchema = z.object({
  mode: z
    .enum(['custom', 'kafka-connect'], {
      errorMap: () => ({ message: 'sync mode must be "custom" or "kafka-connect"' }),
    })
    .describe('Which sync path runs; the two are mutually exclusive'),

  processing: z
    .enum(['single', 'batch'], {
      errorMap: () => ({ message: 'processing must be "single" or "batch"' }),
    })
    .describe('Per-message dispatch or bulk buffering per fetched batch'),

  batchSize: z.number().int().min(1, 'batchSize must be at least 1').max(10000),

  maxRetries: z
    .number()
    .int()
    .min(0, 'maxRetries must be non-negative')
    .max(20, 'maxRetries should not exceed 20')
    .describe('Retry attempts after the first failed write'),

  retryDelayMs: z.number().int().min(0, 'retryDelayMs must be non-negative'),

  maxRetryDelayMs: z.number().int().min(0),

  backoffFactor: z.number().min(1, 'backoffFactor must be at least 1'),

  operationTimeoutMs: z.number().int().min(100, 'operationTimeoutMs must be at least 100ms'),

  failureTopic: z.string().min(1).optional().describe('Dead-letter topic for terminal failures'),
}).refine((data) => data.maxRetryDelayMs >= data.retryDelayMs, {
  message: 'maxRetryDelayMs must be greater than or equal to retryDelayMs',
  path: ['maxRetryDelayMs'],
});

export const KafkaConnectConfigSchema = z.object({
  url: z.string().url('kafka connect url must be a URL'),

  connectorName: z.string().min(1),

  pollIntervalMs: z.number().int().min(1000, 'pollIntervalMs must be at least 1s'),
});

export const HttpConfigSchema = z.object({
  enabled: z.boolean(),

  port: z.number().int().min(0).max(65535),
});

export const ObservabilityConfigSchema = z.object({
  enableMetrics: z.boolean().describe('Register Prometheus metrics'),

  collectDefaultMetrics: z.boolean().describe('Also expose Node.js process metrics'),

  metricsPrefix: z.string().regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/, 'metricsPrefix must be a valid metric name prefix'),
});

export const SyncConfigSchema = z.object({
  app: AppConfigSchema,
  index: IndexConfigSchema,
  elasticsearch: ElasticsearchConfigSchema,
  kafka: KafkaConfigSchema,
  sync: SyncSettingsSchema,
  kafkaConnect: KafkaConnectConfigSchema,
  http: HttpConfigSchema,
  observability: ObservabilityConfigSchema,
});

export type SyncConfigInput = z.input<typeof SyncConfigSchema>;
