/**
 * Configuration Validation Reporter
 *
 * Turns zod issues into path/message pairs and adds non-blocking warnings
 * about settings that are legal but suspicious for the chosen environment.
 */

import type { SyncConfig } from '../types/config.js';
import { SyncConfigSchema } from './schemas.js';

/**
 * Validation issue with an optional suggested fix
 */
export interface ConfigIssue {
  /** Path to the invalid field (e.g., 'sync.batchSize') */
  path: string;
  message: string;
  suggestedFix?: string;
}

export type ValidationReport =
  | { valid: true; config: SyncConfig; warnings: string[] }
  | { valid: false; errors: ConfigIssue[] };

/**
 * Validate and report on a configuration
 *
 * @example
 * ```typescript
 * const report = validateAndReportConfig(candidate);
 * if (!report.valid) {
 *   console.error('Configuration errors:', report.errors);
 * }
 * ```
 */
export function validateAndReportConfig(config: unknown): ValidationReport {
  const result = SyncConfigSchema.safeParse(config);

  if (!result.success) {
    return {
      valid: false,
      errors: result.error.errors.map((error) => {
        const path = error.path.join('.');
        return {
          path,
          message: error.message,
          suggestedFix: generateFix(path),
        };
      }),
    };
  }

  return {
    valid: true,
    config: result.data,
    warnings: generateWarnings(result.data),
  };
}

function generateFix(path: string): string | undefined {
  if (path.startsWith('kafka.brokers')) {
    return 'Set SYNC_KAFKA_BROKERS to a comma-separated list such as "broker-1:9092,broker-2:9092"';
  }
  if (path.startsWith('elasticsearch.nodes')) {
    return 'Set SYNC_ES_HOSTS to a comma-separated list of URLs such as "http://localhost:9200"';
  }
  if (path === 'sync.mode') {
    return 'Set SYNC_MODE to "custom" or "kafka-connect"';
  }
  if (path === 'sync.maxRetryDelayMs') {
    return 'Raise SYNC_MAX_RETRY_DELAY_MS or lower SYNC_RETRY_DELAY_MS';
  }
  return undefined;
}

function generateWarnings(config: SyncConfig): string[] {
  const warnings: string[] = [];
  const production = config.app.environment === 'production';

  if (production && !config.elasticsearch.username) {
    warnings.push('Elasticsearch credentials are not configured in production');
  }

  if (production && !config.elasticsearch.circuitBreaker.enabled) {
    warnings.push('Circuit breaker is disabled in production');
  }

  if (config.sync.maxRetries === 0) {
    warnings.push('maxRetries is 0: transient store failures will not be retried');
  }

  if (config.sync.mode === 'custom' && !config.sync.failureTopic) {
    warnings.push('No failure topic configured: exhausted operations are only logged and counted');
  }

  if (config.sync.processing === 'batch' && config.sync.batchSize === 1) {
    warnings.push('Batch processing with batchSize 1 issues one bulk request per message');
  }

  return warnings;
}
