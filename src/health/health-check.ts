/**
 * Health Check Utilities
 *
 * Readiness combines the search store and the consumer group; the process is
 * ready only when both are. Liveness only says the process answers.
 */

import type { StoreHealth } from '../elasticsearch/index-writer.js';
import type { RunnerHealth } from '../kafka/consumer-group-runner.js';

/**
 * Health status of a component
 */
export interface ComponentHealth {
  healthy: boolean;
  /** Component specific status (cluster color, runner status, connector state) */
  status: string;
  error?: string;
}

export type OverallStatus = 'UP' | 'DOWN';

export interface HealthStatus {
  status: OverallStatus;
  timestamp: string;
  elasticsearch: ComponentHealth;
  kafka: ComponentHealth;
}

export interface HealthCheckConfig {
  /** Probe the search store (usually IndexWriter.checkHealth) */
  checkElasticsearch: () => Promise<StoreHealth>;
  /** Consumer side: runner state, or the connector monitor in kafka-connect mode */
  checkKafka: () => ComponentHealth | Promise<ComponentHealth>;
}

/**
 * Map the runner's state onto a component status
 */
export function fromRunnerHealth(health: RunnerHealth): ComponentHealth {
  return { healthy: health.healthy, status: health.status, error: health.error };
}

/**
 * Perform health check
 *
 * @example
 * ```typescript
 * const health = await performHealthCheck({
 *   checkElasticsearch: () => writer.checkHealth(),
 *   checkKafka: () => fromRunnerHealth(runner.healthCheck()),
 * });
 * ```
 */
export async function performHealthCheck(config: HealthCheckConfig): Promise<HealthStatus> {
  const timestamp = new Date().toISOString();

  let elasticsearch: ComponentHealth;
  try {
    const store = await config.checkElasticsearch();
    elasticsearch = { healthy: store.healthy, status: store.status, error: store.error };
  } catch (error) {
    elasticsearch = { healthy: false, status: 'unreachable', error: errorMessage(error) };
  }

  let kafka: ComponentHealth;
  try {
    kafka = await config.checkKafka();
  } catch (error) {
    kafka = { healthy: false, status: 'unknown', error: errorMessage(error) };
  }

  return {
    status: elasticsearch.healthy && kafka.healthy ? 'UP' : 'DOWN',
    timestamp,
    elasticsearch,
    kafka,
  };
}

export function isReady(health: HealthStatus): boolean {
  return health.status === 'UP';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
