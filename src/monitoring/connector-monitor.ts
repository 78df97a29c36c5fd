/**
 * Kafka Connect sink connector monitor
 *
 * In `kafka-connect` mode the engine does not consume anything itself; the
 * Elasticsearch sink connector does. This monitor polls the Connect REST API
 * (`GET {url}/connectors/{name}/status`) on an interval, logs the state and
 * feeds readiness.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { ComponentHealth } from '../health/health-check.js';
import type { KafkaConnectConfig } from '../types/config.js';
import type { StructuredLogger } from '../types/index.js';
import { NullLogger } from '../types/index.js';

/**
 * Subset of the Connect status payload
 */
export interface ConnectorStatusResponse {
  name: string;
  connector: { state: string; worker_id?: string };
  tasks?: { id: number; state: string; worker_id?: string; trace?: string }[];
}

export interface ConnectorStatus {
  state: string;
  failedTasks: number;
  checkedAt: Date;
  error?: string;
}

export type ConnectorHttpClient = Pick<AxiosInstance, 'get'>;

export interface ConnectorMonitorOptions {
  connect: KafkaConnectConfig;
  http?: ConnectorHttpClient;
  logger?: StructuredLogger;
  /** Per-request timeout */
  timeoutMs?: number;
}

export class ConnectorMonitor {
  private readonly http: ConnectorHttpClient;
  private readonly logger: StructuredLogger;
  private timer: NodeJS.Timeout | undefined;
  private latest: ConnectorStatus | undefined;

  constructor(private readonly options: ConnectorMonitorOptions) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 5000 });
    this.logger = options.logger ?? new NullLogger();
  }

  get lastStatus(): ConnectorStatus | undefined {
    return this.latest;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  statusUrl(): string {
    const base = this.options.connect.url.replace(/\/+$/, '');
    return `${base}/connectors/${encodeURIComponent(this.options.connect.connectorName)}/status`;
  }

  /**
   * Fetch the connector status once. Never throws; failures are reported as
   * state `UNREACHABLE`.
   */
  async check(): Promise<ConnectorStatus> {
    const connectorName = this.options.connect.connectorName;
    try {
      const response = await this.http.get<ConnectorStatusResponse>(this.statusUrl());
      const tasks = response.data.tasks ?? [];
      this.latest = {
        state: response.data.connector.state,
        failedTasks: tasks.filter((t) => t.state === 'FAILED').length,
        checkedAt: new Date(),
      };
      this.logger.info('Connector status', {
        connectorName,
        state: this.latest.state,
        failedTasks: this.latest.failedTasks,
      });
    } catch (error) {
      this.latest = {
        state: 'UNREACHABLE',
        failedTasks: 0,
        checkedAt: new Date(),
        error: error instanceof Error ? error.message : String(error),
      };
      this.logger.error('Failed to check connector status', error, { connectorName });
    }
    return this.latest;
  }

  /**
   * Check now, then every `pollIntervalMs`
   */
  start(): void {
    if (this.timer) return;

    const poll = (): void => {
      this.check().catch((error: unknown) => {
        this.logger.error('Connector monitor unhandled error', error, { action: 'connector_monitor_unhandled_error' });
      });
    };
    this.timer = setInterval(poll, this.options.connect.pollIntervalMs);
    this.timer.unref();
    poll();
    this.logger.info('Connector monitor started', {
      connectorName: this.options.connect.connectorName,
      pollIntervalMs: this.options.connect.pollIntervalMs,
    });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    this.logger.info('Connector monitor stopped');
  }

  health(): ComponentHealth {
    const status = this.latest;
    if (!status) {
      return { healthy: false, status: 'UNKNOWN' };
    }
    return {
      healthy: status.state === 'RUNNING' && status.failedTasks === 0,
      status: status.state,
      error: status.error,
    };
  }
}
