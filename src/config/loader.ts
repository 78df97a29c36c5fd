/**
 * Configuration loading
 *
 * APP_ENV picks a preset, `SYNC_*` variables override single fields, and the
 * merged tree is validated with zod before anything connects.
 */

import { config as loadDotenv } from 'dotenv';
import { ConfigurationError } from '../errors/hierarchy.js';
import type { SyncConfig } from '../types/config.js';
import { validateAndReportConfig } from '../validation/reporter.js';
import { getPreset, presetForEnvironment } from './presets.js';

export interface LoadConfigOptions {
  /** Variables to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Read a .env file into process.env first */
  dotenv?: boolean;
  dotenvPath?: string;
}

export interface LoadedConfig {
  config: SyncConfig;
  warnings: string[];
}

type Env = NodeJS.ProcessEnv;

function list(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

class EnvReader {
  readonly issues: string[] = [];

  constructor(private readonly env: Env) {}

  string(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  number(name: string): number | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      this.issues.push(`${name}: expected a number, received "${value}"`);
      return undefined;
    }
    return parsed;
  }

  boolean(name: string): boolean | undefined {
    const value = this.string(name)?.toLowerCase();
    if (value === undefined) return undefined;
    if (['true', '1', 'yes', 'on'].includes(value)) return true;
    if (['false', '0', 'no', 'off'].includes(value)) return false;
    this.issues.push(`${name}: expected a boolean, received "${value}"`);
    return undefined;
  }

  list(name: string): string[] | undefined {
    const value = this.string(name);
    return value === undefined ? undefined : list(value);
  }
}

function assign<T extends object, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Apply SYNC_* overrides onto a config tree (mutates `config`)
 */
export function applyEnvOverrides(config: SyncConfig, env: Env): string[] {
  const read = new EnvReader(env);
  const { app, index, elasticsearch: es, kafka, sync, kafkaConnect, http, observability } = config;

  const logLevel = read.string('SYNC_LOG_LEVEL')?.toLowerCase();
  if (logLevel !== undefined) {
    if (
      logLevel === 'trace' ||
      logLevel === 'debug' ||
      logLevel === 'info' ||
      logLevel === 'warn' ||
      logLevel === 'error' ||
      logLevel === 'silent'
    ) {
      app.logLevel = logLevel;
    } else {
      read.issues.push(`SYNC_LOG_LEVEL: unknown level "${logLevel}"`);
    }
  }

  assign(index, 'environment', read.string('SYNC_INDEX_ENV'));
  assign(index, 'service', read.string('SYNC_SERVICE_NAME'));
  assign(index, 'shards', read.number('SYNC_INDEX_SHARDS'));
  assign(index, 'replicas', read.number('SYNC_INDEX_REPLICAS'));

  assign(es, 'nodes', read.list('SYNC_ES_HOSTS'));
  assign(es, 'username', read.string('SYNC_ES_USERNAME'));
  assign(es, 'password', read.string('SYNC_ES_PASSWORD'));
  assign(es, 'maxRetries', read.number('SYNC_ES_MAX_RETRIES'));
  assign(es, 'requestTimeoutMs', read.number('SYNC_ES_TIMEOUT_MS'));
  assign(es, 'maxConnections', read.number('SYNC_ES_MAX_CONNS'));
  assign(es, 'compression', read.boolean('SYNC_ES_GZIP'));
  assign(es, 'sniffOnStart', read.boolean('SYNC_ES_SNIFF'));
  assign(es.circuitBreaker, 'enabled', read.boolean('SYNC_CIRCUIT_BREAKER_ENABLED'));

  assign(kafka, 'brokers', read.list('SYNC_KAFKA_BROKERS'));
  assign(kafka, 'groupId', read.string('SYNC_KAFKA_GROUP_ID'));
  assign(kafka, 'clientId', read.string('SYNC_KAFKA_CLIENT_ID'));
  assign(kafka, 'topicPrefix', read.string('SYNC_KAFKA_TOPIC_PREFIX'));
  assign(kafka, 'topics', read.list('SYNC_KAFKA_TOPICS'));
  assign(kafka, 'partitionsConsumedConcurrently', read.number('SYNC_KAFKA_CONCURRENCY'));
  assign(kafka, 'ssl', read.boolean('SYNC_KAFKA_SSL'));

  const saslUsername = read.string('SYNC_KAFKA_SASL_USERNAME');
  const saslPassword = read.string('SYNC_KAFKA_SASL_PASSWORD');
  if (saslUsername && saslPassword) {
    const mechanism = read.string('SYNC_KAFKA_SASL_MECHANISM') ?? 'plain';
    if (mechanism === 'plain' || mechanism === 'scram-sha-256' || mechanism === 'scram-sha-512') {
      kafka.sasl = { mechanism, username: saslUsername, password: saslPassword };
    } else {
      read.issues.push(`SYNC_KAFKA_SASL_MECHANISM: unsupported mechanism "${mechanism}"`);
    }
  }

  const mode = read.string('SYNC_MODE');
  if (mode !== undefined) {
    if (mode === 'custom' || mode === 'kafka-connect') {
      sync.mode = mode;
    } else {
      read.issues.push(`SYNC_MODE: expected "custom" or "kafka-connect", received "${mode}"`);
    }
  }

  const processing = read.string('SYNC_PROCESSING');
  if (processing !== undefined) {
    if (processing === 'single' || processing === 'batch') {
      sync.processing = processing;
    } else {
      read.issues.push(`SYNC_PROCESSING: expected "single" or "batch", received "${processing}"`);
    }
  }

  assign(sync, 'batchSize', read.number('SYNC_BATCH_SIZE'));
  assign(sync, 'maxRetries', read.number('SYNC_MAX_RETRIES'));
  assign(sync, 'retryDelayMs', read.number('SYNC_RETRY_DELAY_MS'));
  assign(sync, 'maxRetryDelayMs', read.number('SYNC_MAX_RETRY_DELAY_MS'));
  assign(sync, 'backoffFactor', read.number('SYNC_BACKOFF_FACTOR'));
  assign(sync, 'operationTimeoutMs', read.number('SYNC_OPERATION_TIMEOUT_MS'));
  assign(sync, 'failureTopic', read.string('SYNC_FAILURE_TOPIC'));

  assign(kafkaConnect, 'url', read.string('SYNC_CONNECT_URL'));
  assign(kafkaConnect, 'connectorName', read.string('SYNC_CONNECTOR_NAME'));

  assign(http, 'enabled', read.boolean('SYNC_HTTP_ENABLED'));
  assign(http, 'port', read.number('SYNC_HTTP_PORT'));

  assign(observability, 'enableMetrics', read.boolean('SYNC_METRICS_ENABLED'));

  return read.issues;
}

/**
 * Build the process configuration
 *
 * @throws ConfigurationError listing every invalid field
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  if (options.dotenv ?? true) {
    loadDotenv({ path: options.dotenvPath });
  }

  const env = options.env ?? process.env;
  const config = getPreset(presetForEnvironment(env.APP_ENV));
  const envIssues = applyEnvOverrides(config, env);

  if (envIssues.length > 0) {
    throw new ConfigurationError(`Invalid environment: ${envIssues.join('; ')}`, envIssues);
  }

  const report = validateAndReportConfig(config);
  if (!report.valid) {
    const issues = report.errors.map((e) => `${e.path}: ${e.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return { config: report.config, warnings: report.warnings };
}
