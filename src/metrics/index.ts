/**
 * Prometheus Metrics
 *
 * Metrics live on a Registry owned by one MetricsCollector instance. The
 * process wiring calls `init()` at startup and `cleanup()` at shutdown and
 * hands the same instance to every component that records something.
 * prom-client counters and histograms are safe for concurrent use.
 */

import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { OperationType, SyncRecord } from '../types/index.js';

export type OperationStatus = 'success' | 'error';

export interface OperationMetrics {
  operation: OperationType;
  entity: string;
  status: OperationStatus;
  durationMs: number;
  payloadSize: number;
  indexName?: string;
}

export type MessageOutcome = 'applied' | 'skipped' | 'failed';

export type CircuitBreakerState = 'closed' | 'open' | 'half-open';

const CIRCUIT_STATE_VALUE: Record<CircuitBreakerState, number> = {
  closed: 0,
  'half-open': 1,
  open: 2,
};

interface SyncMetrics {
  operationDuration: Histogram<'operation' | 'entity' | 'status'>;
  operationTotal: Counter<'operation' | 'entity' | 'status'>;
  operationErrors: Counter<'operation' | 'entity'>;
  payloadSize: Histogram<'operation' | 'entity'>;
  bulkOperations: Histogram<'entity' | 'status'>;
  retryAttempts: Counter<'operation' | 'outcome'>;
  syncRecords: Counter<'operation' | 'status'>;
  decodeFailures: Counter<'code'>;
  messages: Counter<'topic' | 'outcome'>;
  deadLetters: Counter<'topic'>;
  circuitBreakerState: Gauge<'name'>;
}

export interface MetricsCollectorOptions {
  /** Metric name prefix */
  prefix?: string;
  /** Also register Node.js process metrics */
  collectDefaultMetrics?: boolean;
}

export class MetricsCollector {
  readonly registry = new Registry();
  private readonly prefix: string;
  private readonly withDefaults: boolean;
  private metrics: SyncMetrics | undefined;

  constructor(options: MetricsCollectorOptions = {}) {
    this.prefix = options.prefix ?? 'search_sync_';
    this.withDefaults = options.collectDefaultMetrics ?? false;
  }

  /**
   * Create and register every metric. Calling it twice is a no-op.
   */
  init(): void {
    if (this.metrics) return;

    const registers = [this.registry];
    const p = this.prefix;

    this.metrics = {
      operationDuration: new Histogram({
        name: `${p}operation_duration_seconds`,
        help: 'Duration of sync operations',
        labelNames: ['operation', 'entity', 'status'],
        buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
        registers,
      }),
      operationTotal: new Counter({
        name: `${p}operations_total`,
        help: 'Total number of sync operations',
        labelNames: ['operation', 'entity', 'status'],
        registers,
      }),
      operationErrors: new Counter({
        name: `${p}operation_errors_total`,
        help: 'Total number of sync operation errors',
        labelNames: ['operation', 'entity'],
        registers,
      }),
      payloadSize: new Histogram({
        name: `${p}payload_size_bytes`,
        help: 'Size of sync operation payloads',
        labelNames: ['operation', 'entity'],
        buckets: [100, 200, 400, 800, 1600, 3200, 6400, 12800, 25600, 51200],
        registers,
      }),
      bulkOperations: new Histogram({
        name: `${p}bulk_operations`,
        help: 'Number of operations in bulk requests',
        labelNames: ['entity', 'status'],
        buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000],
        registers,
      }),
      retryAttempts: new Counter({
        name: `${p}retry_attempts_total`,
        help: 'Retry attempts by outcome',
        labelNames: ['operation', 'outcome'],
        registers,
      }),
      syncRecords: new Counter({
        name: `${p}sync_records_total`,
        help: 'Finalized sync records by status',
        labelNames: ['operation', 'status'],
        registers,
      }),
      decodeFailures: new Counter({
        name: `${p}decode_failures_total`,
        help: 'Change events rejected by the decoder or validation',
        labelNames: ['code'],
        registers,
      }),
      messages: new Counter({
        name: `${p}messages_total`,
        help: 'Consumed change events by terminal outcome',
        labelNames: ['topic', 'outcome'],
        registers,
      }),
      deadLetters: new Counter({
        name: `${p}dead_letters_total`,
        help: 'Change events routed to the failure topic',
        labelNames: ['topic'],
        registers,
      }),
      circuitBreakerState: new Gauge({
        name: `${p}circuit_breaker_state`,
        help: 'Index writer circuit breaker state (0=closed, 1=half-open, 2=open)',
        labelNames: ['name'],
        registers,
      }),
    };

    if (this.withDefaults) {
      collectDefaultMetrics({ register: this.registry, prefix: p });
    }
  }

  get initialized(): boolean {
    return this.metrics !== undefined;
  }

  recordOperation(m: OperationMetrics): void {
    if (!this.metrics) return;
    const labels = { operation: m.operation, entity: m.entity, status: m.status };
    this.metrics.operationDuration.observe(labels, m.durationMs / 1000);
    this.metrics.operationTotal.inc(labels);
    this.metrics.payloadSize.observe({ operation: m.operation, entity: m.entity }, m.payloadSize);
    if (m.status === 'error') {
      this.metrics.operationErrors.inc({ operation: m.operation, entity: m.entity });
    }
  }

  recordBulkOperation(entity: string, size: number, hasError: boolean): void {
    this.metrics?.bulkOperations.observe({ entity, status: hasError ? 'error' : 'success' }, size);
  }

  recordRetryAttempt(operation: string, outcome: 'success' | 'retry' | 'fatal' | 'exhausted'): void {
    this.metrics?.retryAttempts.inc({ operation, outcome });
  }

  recordSyncRecord(record: SyncRecord): void {
    this.metrics?.syncRecords.inc({ operation: record.operation, status: record.status });
  }

  recordDecodeFailure(code: string): void {
    this.metrics?.decodeFailures.inc({ code });
  }

  recordMessage(topic: string, outcome: MessageOutcome): void {
    this.metrics?.messages.inc({ topic, outcome });
  }

  recordDeadLetter(topic: string): void {
    this.metrics?.deadLetters.inc({ topic });
  }

  recordCircuitBreakerState(name: string, state: CircuitBreakerState): void {
    this.metrics?.circuitBreakerState.set({ name }, CIRCUIT_STATE_VALUE[state]);
  }

  /**
   * Metrics in Prometheus text format
   */
  async getMetricsText(): Promise<string> {
    return await this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /**
   * Unregister everything; `init()` may be called again afterwards
   */
  cleanup(): void {
    this.registry.clear();
    this.metrics = undefined;
  }
}
