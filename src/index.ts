/**
 * category-search-sync
 *
 * Change-data-capture synchronization engine:
 * - decodes change envelopes consumed from Kafka
 * - applies them to a monthly Elasticsearch index behind an alias
 * - retries transient store failures with bounded exponential backoff
 * - commits offsets only after a terminal outcome
 */

// ========== Types ==========
export type {
  OperationType,
  SyncStatus,
  Category,
  CategoryDocument,
  CategoryOperation,
  SyncRecord,
  RetryAttempt,
  RetryHistory,
  RetryHistoryStatus,
  WriteOptions,
  Clock,
} from './types/index.js';

export { OPERATION_TYPES, systemClock } from './types/index.js';

export type {
  SyncConfig,
  SyncMode,
  ProcessingMode,
  AppConfig,
  IndexConfig,
  ElasticsearchConfig,
  CircuitBreakerConfig,
  KafkaConfig,
  SyncSettings,
  KafkaConnectConfig,
  HttpConfig,
  ObservabilityConfig,
} from './types/config.js';

// ========== Configuration ==========
export { DEVELOPMENT, PRODUCTION, TESTING, PRESETS, getPreset, presetForEnvironment } from './config/presets.js';
export type { PresetName } from './config/presets.js';
export { loadConfig, applyEnvOverrides } from './config/loader.js';
export type { LoadConfigOptions, LoadedConfig } from './config/loader.js';
export { validateAndReportConfig } from './validation/reporter.js';
export type { ConfigIssue, ValidationReport } from './validation/reporter.js';
export { SyncConfigSchema, ChangeEnvelopeSchema, CategorySnapshotSchema } from './validation/schemas.js';

// ========== Errors ==========
export {
  ErrorCode,
  ErrorDomain,
  ErrorSeverity,
  SyncError,
  DecodeError,
  ValidationError,
  StoreUnavailableError,
  StoreTimeoutError,
  StoreRejectedError,
  ConflictError,
  BulkFlushError,
  RetryExhaustedError,
  CancelledError,
  ProvisioningError,
  ConfigurationError,
  ConsumerError,
  getErrorMetadata,
  isRetryableError,
  isCancellation,
} from './errors/hierarchy.js';
export type { ErrorMetadata, SyncErrorContext, BulkItemFailure } from './errors/hierarchy.js';

// ========== Logging & context ==========
export { ConsoleStructuredLogger, NullLogger, LogLevel, parseLogLevel } from './logger/index.js';
export type { StructuredLogger, LogContext, Environment } from './logger/index.js';
export { withContext, getContext, getCorrelationId } from './context/execution-context.js';
export type { ExecutionContext } from './context/execution-context.js';

// ========== Core ==========
export { decode, decodeSafe, OPERATION_CODES } from './decoder/event-decoder.js';
export type { RawMessage, DecodeResult } from './decoder/event-decoder.js';
export { getIndexName, getAliasName, getIndexPattern, formatTimeBucket } from './naming/index-naming.js';
export type { IndexNaming } from './naming/index-naming.js';
export { RetryEngine, sleep } from './retry/retry-engine.js';
export type { RetryPolicy, RetryEngineOptions, RetryTarget, Sleep } from './retry/retry-engine.js';
export { OperationDispatcher, validateOperation } from './dispatcher/operation-dispatcher.js';
export type { DispatchResult, OperationDispatcherOptions } from './dispatcher/operation-dispatcher.js';
export { BulkBuffer, encodeBulk } from './bulk/bulk-buffer.js';
export type { BulkBufferOptions, FlushResult } from './bulk/bulk-buffer.js';
export { createSyncRecord, markFailed, markRetrying, markSuccess } from './sync/sync-record.js';
export { FailureLog } from './sync/failure-log.js';
export type { FailureEntry } from './sync/failure-log.js';
export { ChangeEventProcessor } from './pipeline/change-event-processor.js';
export type { ProcessOutcome, InboundMessage, BatchSummary } from './pipeline/change-event-processor.js';

// ========== Elasticsearch ==========
export {
  ElasticsearchIndexWriter,
  createElasticsearchClient,
  classifyStoreError,
  collectBulkFailures,
} from './elasticsearch/index-writer.js';
export type { IndexWriter, BulkLine, BulkResult, SearchQuery, SearchResult, StoreHealth } from './elasticsearch/index-writer.js';
export { IndexProvisioner, buildCategoryMappings, buildLifecyclePolicy } from './elasticsearch/provisioning.js';
export type { ProvisioningReport, StepOutcome } from './elasticsearch/provisioning.js';
export { toDocument } from './elasticsearch/documents.js';

// ========== Kafka ==========
export { ConsumerGroupRunner, nextOffset } from './kafka/consumer-group-runner.js';
export type { RunnerStatus, RunnerHealth } from './kafka/consumer-group-runner.js';
export { KafkaDeadLetterSink, buildDeadLetterHeaders } from './kafka/dead-letter.js';
export type { DeadLetterSink, DeadLetterEntry } from './kafka/dead-letter.js';
export { createKafka, createConsumer, resolveTopics } from './kafka/kafka-client.js';

// ========== Operations ==========
export { MetricsCollector } from './metrics/index.js';
export type { OperationMetrics, MessageOutcome, CircuitBreakerState } from './metrics/index.js';
export { performHealthCheck, isReady, fromRunnerHealth } from './health/health-check.js';
export type { HealthStatus, ComponentHealth, HealthCheckConfig } from './health/health-check.js';
export { ConnectorMonitor } from './monitoring/connector-monitor.js';
export type { ConnectorStatus } from './monitoring/connector-monitor.js';
export { HttpServer, createHttpApp } from './server/http-server.js';
export type { HttpServerOptions, ModeStatus } from './server/http-server.js';
export { SyncApplication, createLogger, INDEX_ROTATION_INTERVAL_MS } from './app/sync-application.js';
export type { SyncApplicationDependencies } from './app/sync-application.js';
