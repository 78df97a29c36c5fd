/**
 * Index Writer
 *
 * Executes single-document writes, bulk requests and read lookups against
 * Elasticsearch. Every write accepts an AbortSignal and a request deadline;
 * exceeding the deadline surfaces as a retryable StoreTimeoutError.
 *
 * Failures are mapped into the error taxonomy here, once:
 * - connection failures, 429, 5xx, missing index, open breaker → StoreUnavailableError
 * - request deadline → StoreTimeoutError
 * - 409 → ConflictError
 * - other 4xx → StoreRejectedError
 * - aborted request → CancelledError
 */

import { Client, errors } from '@elastic/elasticsearch';
import type { estypes } from '@elastic/elasticsearch';
import CircuitBreaker from 'opossum';
import {
  BulkFlushError,
  CancelledError,
  ConflictError,
  StoreRejectedError,
  StoreTimeoutError,
  StoreUnavailableError,
  SyncError,
  isRetryableError,
  type BulkItemFailure,
  type SyncErrorContext,
} from '../errors/hierarchy.js';
import type { CircuitBreakerState, MetricsCollector } from '../metrics/index.js';
import type { CircuitBreakerConfig, ElasticsearchConfig } from '../types/config.js';
import type { CategoryDocument, StructuredLogger, WriteOptions } from '../types/index.js';
import { NullLogger } from '../types/index.js';

export type BulkAction = 'index' | 'update' | 'delete';

export type BulkActionLine =
  | { index: { _index: string; _id: string } }
  | { update: { _index: string; _id: string } }
  | { delete: { _index: string; _id: string } };

export type BulkUpdateBody = { doc: CategoryDocument; doc_as_upsert: true };

export type BulkLine = BulkActionLine | CategoryDocument | BulkUpdateBody;

export interface BulkResult {
  /** Items acknowledged by the cluster, delete-of-absent included */
  succeeded: number;
  took: number;
}

export interface SearchQuery {
  /** Full-text match on name and description */
  text?: string;
  status?: number;
  from?: number;
  size?: number;
}

export interface SearchResult {
  total: number;
  items: CategoryDocument[];
}

export interface StoreHealth {
  healthy: boolean;
  /** green | yellow | red, or "unreachable" */
  status: string;
  checkedAt: Date;
  error?: string;
}

export interface IndexWriter {
  index(indexName: string, document: CategoryDocument, options?: WriteOptions): Promise<void>;
  update(indexName: string, id: string, document: CategoryDocument, options?: WriteOptions): Promise<void>;
  /** Deleting an absent document succeeds */
  delete(indexName: string, id: string, options?: WriteOptions): Promise<void>;
  /** @throws BulkFlushError when the request or any item fails */
  bulk(lines: BulkLine[], options?: WriteOptions): Promise<BulkResult>;
  search(indexName: string, query: SearchQuery, options?: WriteOptions): Promise<SearchResult>;
  get(indexName: string, id: string, options?: WriteOptions): Promise<CategoryDocument | null>;
  indexExists(indexName: string): Promise<boolean>;
  ping(): Promise<boolean>;
  checkHealth(): Promise<StoreHealth>;
  /** Result of the latest checkHealth, if any */
  readonly lastHealth: StoreHealth | undefined;
  close(): Promise<void>;
}

/**
 * Build a client from configuration. Pool size, transport retries,
 * compression and sniffing never leak into the write contract.
 */
export function createElasticsearchClient(config: ElasticsearchConfig): Client {
  return new Client({
    nodes: config.nodes,
    auth:
      config.username && config.password
        ? { username: config.username, password: config.password }
        : undefined,
    maxRetries: config.maxRetries,
    requestTimeout: config.requestTimeoutMs,
    compression: config.compression,
    sniffOnStart: config.sniffOnStart,
    agent: { connections: config.maxConnections },
  });
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function statusOf(error: errors.ResponseError): number {
  return error.meta.statusCode ?? 0;
}

/**
 * Map a client error into the taxonomy
 */
export function classifyStoreError(error: unknown, context: SyncErrorContext, timeoutMs?: number): unknown {
  if (error instanceof SyncError) return error;

  if (error instanceof errors.RequestAbortedError) {
    return new CancelledError('Store request aborted', context, { cause: error });
  }
  if (error instanceof errors.TimeoutError || hasCode(error, 'ETIMEDOUT')) {
    return new StoreTimeoutError('Store request timed out', timeoutMs, context, { cause: error });
  }
  if (error instanceof errors.ConnectionError || error instanceof errors.NoLivingConnectionsError) {
    return new StoreUnavailableError(`Store connection failed: ${error.message}`, context, { cause: error });
  }
  if (hasCode(error, 'EOPENBREAKER')) {
    return new StoreUnavailableError('Circuit breaker open', context, { cause: error });
  }
  if (error instanceof errors.ResponseError) {
    const status = statusOf(error);
    if (status === 409) {
      return new ConflictError(`Version conflict: ${error.message}`, context, { cause: error });
    }
    if (status === 404 || status === 429 || status >= 500) {
      return new StoreUnavailableError(`Store unavailable (${status}): ${error.message}`, context, { cause: error });
    }
    return new StoreRejectedError(`Store rejected request (${status}): ${error.message}`, status, context, {
      cause: error,
    });
  }

  return error;
}

function isBulkAction(key: string): key is BulkAction | 'create' {
  return key === 'index' || key === 'update' || key === 'delete' || key === 'create';
}

/**
 * Collect failed items of a bulk response. A delete of an absent document
 * (404) is an acknowledged no-op.
 */
export function collectBulkFailures(response: estypes.BulkResponse): { failures: BulkItemFailure[]; succeeded: number } {
  const failures: BulkItemFailure[] = [];
  let succeeded = 0;

  for (const item of response.items) {
    for (const [key, result] of Object.entries(item)) {
      if (!result || !isBulkAction(key)) continue;
      const action: BulkAction = key === 'create' ? 'index' : key;
      const ok = result.status < 300 || (action === 'delete' && result.status === 404);
      if (ok) {
        succeeded++;
        continue;
      }
      failures.push({
        action,
        id: result._id ?? '',
        status: result.status,
        reason: result.error?.reason ?? result.error?.type ?? 'unknown error',
      });
    }
  }

  return { failures, succeeded };
}

export interface ElasticsearchIndexWriterOptions {
  circuitBreaker?: CircuitBreakerConfig;
  logger?: StructuredLogger;
  metrics?: MetricsCollector;
}

export class ElasticsearchIndexWriter implements IndexWriter {
  private readonly logger: StructuredLogger;
  private readonly breaker: CircuitBreaker<[() => Promise<void>], void> | undefined;
  private health: StoreHealth | undefined;

  constructor(
    private readonly client: Client,
    options: ElasticsearchIndexWriterOptions = {},
  ) {
    this.logger = options.logger ?? new NullLogger();
    const cb = options.circuitBreaker;

    if (cb?.enabled) {
      const breaker = new CircuitBreaker(async (fn: () => Promise<void>) => fn(), {
        timeout: cb.timeoutMs,
        errorThresholdPercentage: cb.errorThresholdPercentage,
        resetTimeout: cb.resetTimeoutMs,
        volumeThreshold: cb.volumeThreshold,
        rollingCountTimeout: 10000, // 10s window for error calculation
        rollingCountBuckets: 10,
        name: 'elasticsearch-circuit-breaker',
        // Rejected documents say nothing about cluster health
        errorFilter: (err: unknown) => !isRetryableError(err),
      });

      const record = (state: CircuitBreakerState): void => {
        options.metrics?.recordCircuitBreakerState('elasticsearch', state);
      };

      breaker.on('open', () => {
        record('open');
        this.logger.error('Elasticsearch circuit breaker OPEN - failing fast', undefined, {
          action: 'circuit_breaker_open',
        });
      });
      breaker.on('halfOpen', () => {
        record('half-open');
        this.logger.warn('Elasticsearch circuit breaker HALF-OPEN - testing recovery');
      });
      breaker.on('close', () => {
        record('closed');
        this.logger.info('Elasticsearch circuit breaker CLOSED - normal operation resumed');
      });

      record('closed');
      this.breaker = breaker;
    }
  }

  get lastHealth(): StoreHealth | undefined {
    return this.health;
  }

  get circuitOpen(): boolean {
    return this.breaker?.opened ?? false;
  }

  async index(indexName: string, document: CategoryDocument, options: WriteOptions = {}): Promise<void> {
    const context = { operation: 'CREATE', entity: indexName, entityId: document.id };
    await this.execute(context, options, async () => {
      await this.client.index(
        { index: indexName, id: document.id, document },
        this.transportOptions(options),
      );
    });
  }

  async update(indexName: string, id: string, document: CategoryDocument, options: WriteOptions = {}): Promise<void> {
    const context = { operation: 'UPDATE', entity: indexName, entityId: id };
    await this.execute(context, options, async () => {
      await this.client.update<CategoryDocument, CategoryDocument>(
        { index: indexName, id, doc: document, doc_as_upsert: true },
        this.transportOptions(options),
      );
    });
  }

  async delete(indexName: string, id: string, options: WriteOptions = {}): Promise<void> {
    const context = { operation: 'DELETE', entity: indexName, entityId: id };
    await this.execute(context, options, async () => {
      const response = await this.client.delete(
        { index: indexName, id },
        { ...this.transportOptions(options), ignore: [404] },
      );
      if (response.result === 'not_found') {
        this.logger.debug('Document already absent, delete is a no-op', { index: indexName, id });
      }
    });
  }

  async bulk(lines: BulkLine[], options: WriteOptions = {}): Promise<BulkResult> {
    const batchSize = Math.ceil(lines.length / 2);
    let response: estypes.BulkResponse;

    try {
      response = await this.execute({ operation: 'BULK' }, options, () =>
        this.client.bulk<CategoryDocument, CategoryDocument>({ operations: lines }, this.transportOptions(options)),
      );
    } catch (error) {
      if (error instanceof CancelledError || !isRetryableError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new BulkFlushError(`Bulk request failed: ${message}`, batchSize, [], { cause: error });
    }

    const { failures, succeeded } = collectBulkFailures(response);
    if (failures.length > 0) {
      throw new BulkFlushError(`Bulk request had ${failures.length} failed item(s)`, batchSize, failures);
    }

    return { succeeded, took: response.took };
  }

  async search(indexName: string, query: SearchQuery, options: WriteOptions = {}): Promise<SearchResult> {
    const must: estypes.QueryDslQueryContainer[] = [];
    const filter: estypes.QueryDslQueryContainer[] = [];

    if (query.text) {
      must.push({ multi_match: { query: query.text, fields: ['name^2', 'description'] } });
    }
    if (query.status !== undefined) {
      filter.push({ term: { status: query.status } });
    }

    const response = await this.execute({ operation: 'SEARCH', entity: indexName }, options, () =>
      this.client.search<CategoryDocument>(
        {
          index: indexName,
          from: query.from ?? 0,
          size: query.size ?? 20,
          query: must.length === 0 && filter.length === 0 ? { match_all: {} } : { bool: { must, filter } },
          sort: [{ 'name.keyword': { order: 'asc' } }],
        },
        this.transportOptions(options),
      ),
    );

    const items: CategoryDocument[] = [];
    for (const hit of response.hits.hits) {
      if (hit._source) items.push(hit._source);
    }
    const total = response.hits.total;

    return {
      total: typeof total === 'number' ? total : (total?.value ?? items.length),
      items,
    };
  }

  async get(indexName: string, id: string, options: WriteOptions = {}): Promise<CategoryDocument | null> {
    const response = await this.execute({ operation: 'GET', entity: indexName, entityId: id }, options, () =>
      this.client.get<CategoryDocument>({ index: indexName, id }, { ...this.transportOptions(options), ignore: [404] }),
    );
    return response.found && response._source ? response._source : null;
  }

  async indexExists(indexName: string): Promise<boolean> {
    try {
      return await this.client.indices.exists({ index: indexName });
    } catch (error) {
      throw classifyStoreError(error, { operation: 'INDEX_EXISTS', entity: indexName });
    }
  }

  async ping(): Promise<boolean> {
    try {
      return await this.client.ping();
    } catch (error) {
      this.logger.debug('Elasticsearch ping failed', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }

  async checkHealth(): Promise<StoreHealth> {
    try {
      const response = await this.client.cluster.health();
      this.health = {
        healthy: response.status !== 'red',
        status: response.status,
        checkedAt: new Date(),
      };
    } catch (error) {
      this.health = {
        healthy: false,
        status: 'unreachable',
        checkedAt: new Date(),
        error: error instanceof Error ? error.message : String(error),
      };
    }
    return this.health;
  }

  async close(): Promise<void> {
    this.breaker?.shutdown();
    await this.client.close();
  }

  private transportOptions(options: WriteOptions): { signal?: AbortSignal; requestTimeout?: number } {
    return { signal: options.signal, requestTimeout: options.timeoutMs };
  }

  /**
   * Run a request through the circuit breaker (when enabled) and map errors.
   * Errors are classified before the breaker sees them so that its filter
   * only counts store-side failures.
   */
  private async execute<T>(context: SyncErrorContext, options: WriteOptions, request: () => Promise<T>): Promise<T> {
    const guarded = async (): Promise<T> => {
      try {
        return await request();
      } catch (error) {
        throw classifyStoreError(error, context, options.timeoutMs);
      }
    };

    try {
      return this.breaker ? await this.fire(this.breaker, guarded) : await guarded();
    } catch (error) {
      throw classifyStoreError(error, context, options.timeoutMs);
    }
  }

  private fire<T>(breaker: CircuitBreaker<[() => Promise<void>], void>, fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      breaker
        .fire(async () => {
          resolve(await fn());
        })
        .catch(reject);
    });
  }
}
