/**
 * Process wiring
 *
 * Builds every component from one SyncConfig and owns their lifecycle:
 *
 *   start: metrics → provisioning → HTTP → custom engine | connector monitor
 *   stop:  rotation timer → monitor → consumer → dead-letter producer → HTTP → store → metrics
 *
 * `custom` mode runs the consumer engine; `kafka-connect` mode only watches
 * the sink connector. The two are mutually exclusive.
 */

import type { Client } from '@elastic/elasticsearch';
import type { Consumer, Kafka } from 'kafkajs';
import { BulkBuffer } from '../bulk/bulk-buffer.js';
import { OperationDispatcher } from '../dispatcher/operation-dispatcher.js';
import type { IndexWriter } from '../elasticsearch/index-writer.js';
import { ElasticsearchIndexWriter, createElasticsearchClient } from '../elasticsearch/index-writer.js';
import { IndexProvisioner } from '../elasticsearch/provisioning.js';
import type { ComponentHealth, HealthStatus } from '../health/health-check.js';
import { fromRunnerHealth, performHealthCheck } from '../health/health-check.js';
import { ConsumerGroupRunner } from '../kafka/consumer-group-runner.js';
import { KafkaDeadLetterSink } from '../kafka/dead-letter.js';
import { createConsumer, createKafka, resolveTopics } from '../kafka/kafka-client.js';
import { ConsoleStructuredLogger, parseLogLevel } from '../logger/index.js';
import { MetricsCollector } from '../metrics/index.js';
import type { ConnectorHttpClient } from '../monitoring/connector-monitor.js';
import { ConnectorMonitor } from '../monitoring/connector-monitor.js';
import { getAliasName, getIndexName } from '../naming/index-naming.js';
import { ChangeEventProcessor } from '../pipeline/change-event-processor.js';
import { RetryEngine } from '../retry/retry-engine.js';
import type { ModeStatus } from '../server/http-server.js';
import { HttpServer } from '../server/http-server.js';
import { FailureLog } from '../sync/failure-log.js';
import type { SyncConfig } from '../types/config.js';
import type { Clock, StructuredLogger } from '../types/index.js';
import { systemClock } from '../types/index.js';

/** How often the alias is checked against the current month */
export const INDEX_ROTATION_INTERVAL_MS = 60 * 60 * 1000;

export type IndexMaintenance = Pick<IndexProvisioner, 'provision' | 'ensureCurrentIndex'>;

export type KafkaFactory = Pick<Kafka, 'consumer' | 'producer'>;

/**
 * Overrides for the components the application would otherwise build
 */
export interface SyncApplicationDependencies {
  logger?: StructuredLogger;
  clock?: Clock;
  esClient?: Client;
  writer?: IndexWriter;
  provisioner?: IndexMaintenance;
  kafka?: KafkaFactory;
  consumer?: Consumer;
  connectorHttp?: ConnectorHttpClient;
}

export type ApplicationState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

export function createLogger(config: SyncConfig): StructuredLogger {
  return new ConsoleStructuredLogger(config.app.environment, {
    level: parseLogLevel(config.app.logLevel),
    service: config.app.serviceName,
  });
}

export class SyncApplication {
  readonly metrics: MetricsCollector;
  readonly failures = new FailureLog();
  readonly logger: StructuredLogger;

  private readonly clock: Clock;
  private readonly writer: IndexWriter;
  private readonly provisioner: IndexMaintenance;
  private kafka: KafkaFactory | undefined;
  private runner: ConsumerGroupRunner | undefined;
  private processor: ChangeEventProcessor | undefined;
  private deadLetter: KafkaDeadLetterSink | undefined;
  private monitor: ConnectorMonitor | undefined;
  private http: HttpServer | undefined;
  private rotationTimer: NodeJS.Timeout | undefined;
  private currentState: ApplicationState = 'idle';

  constructor(
    readonly config: SyncConfig,
    private readonly deps: SyncApplicationDependencies = {},
  ) {
    this.logger = deps.logger ?? createLogger(config);
    this.clock = deps.clock ?? systemClock;
    this.metrics = new MetricsCollector({
      prefix: config.observability.metricsPrefix,
      collectDefaultMetrics: config.observability.collectDefaultMetrics,
    });

    let client = deps.esClient;
    const esClient = (): Client => {
      client ??= createElasticsearchClient(config.elasticsearch);
      return client;
    };

    this.writer =
      deps.writer ??
      new ElasticsearchIndexWriter(esClient(), {
        circuitBreaker: config.elasticsearch.circuitBreaker,
        logger: this.logger,
        metrics: this.metrics,
      });
    this.provisioner =
      deps.provisioner ??
      new IndexProvisioner(esClient(), { index: config.index, clock: this.clock, logger: this.logger });
  }

  get state(): ApplicationState {
    return this.currentState;
  }

  /**
   * @throws ProvisioningError | ConsumerError; the application is stopped again before rethrowing
   */
  async start(): Promise<void> {
    if (this.currentState !== 'idle') {
      throw new Error(`Application cannot start from state ${this.currentState}`);
    }
    this.currentState = 'starting';

    const { app, sync } = this.config;
    this.logger.info('Server starting', {
      service: app.serviceName,
      environment: app.environment,
      mode: sync.mode,
      processing: sync.processing,
    });

    try {
      if (this.config.observability.enableMetrics) {
        this.metrics.init();
      }

      await this.provisioner.provision();

      if (this.config.http.enabled) {
        this.http = new HttpServer({
          port: this.config.http.port,
          writer: this.writer,
          aliasName: getAliasName(this.config.index),
          readiness: () => this.readiness(),
          mode: () => this.modeStatus(),
          metrics: this.metrics,
          failures: this.failures,
          logger: this.logger,
        });
        await this.http.start();
      }

      if (sync.mode === 'custom') {
        await this.startCustomSync();
      } else {
        this.startConnectorMonitor();
      }
    } catch (error) {
      this.logger.error('Application failed to start', error);
      await this.stop();
      throw error;
    }

    this.currentState = 'running';
    this.logger.info('Application started', { mode: sync.mode });
  }

  async stop(): Promise<void> {
    if (this.currentState === 'stopping' || this.currentState === 'stopped') return;
    this.currentState = 'stopping';
    this.logger.info('Shutdown initiated');

    if (this.rotationTimer) {
      clearInterval(this.rotationTimer);
      this.rotationTimer = undefined;
    }
    this.monitor?.stop();

    await this.shutdownStep('kafka_consumer', async () => {
      if (!this.runner) return;
      await this.runner.stop();
      await this.runner.close();
    });

    const leftover = (await this.processor?.drainBuffers()) ?? 0;
    if (leftover > 0) {
      // Their offsets were never committed; they are redelivered on restart
      this.logger.warn('Discarded uncommitted buffered operations', { operations: leftover });
    }

    await this.shutdownStep('dead_letter_producer', async () => this.deadLetter?.close());
    await this.shutdownStep('http_server', async () => this.http?.stop());
    await this.shutdownStep('elasticsearch_client', () => this.writer.close());

    this.metrics.cleanup();
    this.currentState = 'stopped';
    this.logger.info('Shutdown complete');
  }

  async readiness(): Promise<HealthStatus> {
    return performHealthCheck({
      checkElasticsearch: () => this.writer.checkHealth(),
      checkKafka: () => this.consumerHealth(),
    });
  }

  modeStatus(): ModeStatus {
    const { index, sync } = this.config;
    return {
      mode: sync.mode,
      processing: sync.processing,
      currentIndex: getIndexName({ ...index, date: this.clock() }),
      alias: getAliasName(index),
      consumerStatus: sync.mode === 'custom' ? (this.runner?.status ?? 'INITIALIZED') : 'using-kafka-connect',
    };
  }

  /**
   * Move the alias onto this month's index when the month has changed
   */
  async rotateIndex(): Promise<void> {
    const current = await this.provisioner.ensureCurrentIndex();
    if (current.index === 'created' || current.alias !== 'exists') {
      this.logger.info('Index rotation applied', { ...current });
    }
  }

  private async startCustomSync(): Promise<void> {
    const { index, kafka: kafkaConfig, sync } = this.config;
    const kafka = this.kafkaClient();

    const retry = new RetryEngine({
      maxAttempts: sync.maxRetries + 1,
      baseDelayMs: sync.retryDelayMs,
      backoffFactor: sync.backoffFactor,
      maxDelayMs: sync.maxRetryDelayMs,
      logger: this.logger,
      metrics: this.metrics,
      clock: this.clock,
    });

    const dispatcher = new OperationDispatcher({
      writer: this.writer,
      retry,
      environment: index.environment,
      service: index.service,
      entity: index.entity,
      maxRetries: sync.maxRetries,
      operationTimeoutMs: sync.operationTimeoutMs,
      metrics: this.metrics,
      logger: this.logger,
      clock: this.clock,
    });

    const createBulk =
      sync.processing === 'batch'
        ? () =>
            new BulkBuffer({
              writer: this.writer,
              batchSize: sync.batchSize,
              environment: index.environment,
              service: index.service,
              entity: index.entity,
              operationTimeoutMs: sync.operationTimeoutMs,
              metrics: this.metrics,
              logger: this.logger,
              clock: this.clock,
            })
        : undefined;

    if (sync.failureTopic) {
      this.deadLetter = new KafkaDeadLetterSink({
        producer: kafka.producer({ allowAutoTopicCreation: false }),
        topic: sync.failureTopic,
        logger: this.logger,
        metrics: this.metrics,
        clock: this.clock,
      });
      await this.deadLetter.connect();
    }

    const processor = new ChangeEventProcessor({
      dispatcher,
      retry,
      maxRetries: sync.maxRetries,
      createBulk,
      deadLetter: this.deadLetter,
      failures: this.failures,
      metrics: this.metrics,
      logger: this.logger,
    });

    this.runner = new ConsumerGroupRunner({
      consumer: this.deps.consumer ?? createConsumer(kafka, kafkaConfig),
      processor,
      topics: resolveTopics(kafkaConfig, index.entity),
      processing: sync.processing,
      partitionsConsumedConcurrently: kafkaConfig.partitionsConsumedConcurrently,
      fromBeginning: kafkaConfig.fromBeginning,
      logger: this.logger,
    });
    this.processor = processor;
    this.runner.onError((error) => {
      this.logger.error('Consumer group runner entered ERROR state', error);
    });

    this.logger.info('Starting custom sync mode', { mode: 'custom', processing: sync.processing });
    await this.runner.start();

    this.rotationTimer = setInterval(() => {
      this.rotateIndex().catch((error: unknown) => {
        this.logger.error('Index rotation failed', error, { action: 'index_rotation_failed' });
      });
    }, INDEX_ROTATION_INTERVAL_MS);
    this.rotationTimer.unref();
  }

  private startConnectorMonitor(): void {
    this.logger.info('Starting Kafka Connect sync mode', { mode: 'kafka-connect' });
    this.monitor = new ConnectorMonitor({
      connect: this.config.kafkaConnect,
      http: this.deps.connectorHttp,
      logger: this.logger,
    });
    this.monitor.start();
  }

  private consumerHealth(): ComponentHealth {
    if (this.config.sync.mode === 'kafka-connect') {
      return this.monitor?.health() ?? { healthy: false, status: 'UNKNOWN' };
    }
    return this.runner ? fromRunnerHealth(this.runner.healthCheck()) : { healthy: false, status: 'INITIALIZED' };
  }

  private kafkaClient(): KafkaFactory {
    this.kafka ??= this.deps.kafka ?? createKafka(this.config.kafka, this.logger);
    return this.kafka;
  }

  private async shutdownStep(component: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      this.logger.error('Shutdown step failed', error, { component });
    }
  }
}
