import { describe, it, expect, vi } from 'vitest';
import { errors } from '@elastic/elasticsearch';
import type { Client, estypes } from '@elastic/elasticsearch';
import {
  ElasticsearchIndexWriter,
  classifyStoreError,
  collectBulkFailures,
} from '../../elasticsearch/index-writer.js';
import {
  BulkFlushError,
  CancelledError,
  ConflictError,
  StoreRejectedError,
  StoreTimeoutError,
  StoreUnavailableError,
} from '../../errors/hierarchy.js';
import type { CategoryDocument } from '../../types/index.js';

type ResponseMeta = ConstructorParameters<typeof errors.ResponseError>[0];

function responseError(statusCode: number, type = 'exception'): errors.ResponseError {
  const meta = { body: { error: { type, reason: type } }, statusCode, headers: {}, warnings: null, meta: {} };
  return new errors.ResponseError(meta as unknown as ResponseMeta);
}

function fakeClient() {
  return {
    index: vi.fn().mockResolvedValue({ result: 'created' }),
    update: vi.fn().mockResolvedValue({ result: 'updated' }),
    delete: vi.fn().mockResolvedValue({ result: 'deleted' }),
    bulk: vi.fn(),
    search: vi.fn(),
    get: vi.fn(),
    ping: vi.fn().mockResolvedValue(true),
    close: vi.fn().mockResolvedValue(undefined),
    cluster: { health: vi.fn().mockResolvedValue({ status: 'yellow' }) },
    indices: { exists: vi.fn().mockResolvedValue(true) },
  };
}

function writerFor(client: ReturnType<typeof fakeClient>) {
  return new ElasticsearchIndexWriter(client as unknown as Client);
}

const doc: CategoryDocument = {
  id: '1',
  name: 'Pulsa',
  description: null,
  status: 1,
  version: null,
  created_at: null,
  updated_at: null,
  sync_status: 'SUCCESS',
  last_sync: '2025-04-16T10:00:00.000Z',
};

const context = { operation: 'CREATE', entityId: '1' };

describe('classifyStoreError', () => {
  it('should map 409 to ConflictError', () => {
    expect(classifyStoreError(responseError(409, 'version_conflict_engine_exception'), context)).toBeInstanceOf(
      ConflictError,
    );
  });

  it('should map 429, 5xx and missing index to StoreUnavailableError', () => {
    expect(classifyStoreError(responseError(429), context)).toBeInstanceOf(StoreUnavailableError);
    expect(classifyStoreError(responseError(503), context)).toBeInstanceOf(StoreUnavailableError);
    expect(classifyStoreError(responseError(404, 'index_not_found_exception'), context)).toBeInstanceOf(
      StoreUnavailableError,
    );
  });

  it('should map other 4xx to StoreRejectedError with the status', () => {
    const error = classifyStoreError(responseError(400, 'mapper_parsing_exception'), context);
    expect(error).toBeInstanceOf(StoreRejectedError);
    if (error instanceof StoreRejectedError) {
      expect(error.statusCode).toBe(400);
      expect(error.context).toEqual(context);
    }
  });

  it('should map transport failures', () => {
    expect(classifyStoreError(new errors.ConnectionError('connect ECONNREFUSED'), context)).toBeInstanceOf(
      StoreUnavailableError,
    );
    expect(classifyStoreError(new errors.TimeoutError('Request timed out'), context, 500)).toBeInstanceOf(
      StoreTimeoutError,
    );
    expect(classifyStoreError(new errors.RequestAbortedError('Request aborted'), context)).toBeInstanceOf(
      CancelledError,
    );
  });

  it('should map an open circuit breaker to StoreUnavailableError', () => {
    const open = Object.assign(new Error('Breaker is open'), { code: 'EOPENBREAKER' });
    const error = classifyStoreError(open, context);
    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error instanceof Error && error.message).toBe('Circuit breaker open');
  });

  it('should pass through unknown errors', () => {
    const error = new TypeError('x is undefined');
    expect(classifyStoreError(error, context)).toBe(error);
  });
});

describe('collectBulkFailures', () => {
  it('should count a delete of an absent document as success', () => {
    const response = {
      took: 3,
      errors: true,
      items: [
        { index: { _index: 'i', _id: '1', status: 201 } },
        { delete: { _index: 'i', _id: '2', status: 404 } },
        { update: { _index: 'i', _id: '3', status: 400, error: { type: 'mapper_parsing_exception', reason: 'bad field' } } },
        { create: { _index: 'i', _id: '4', status: 429, error: { type: 'es_rejected_execution_exception' } } },
      ],
    } as unknown as estypes.BulkResponse;

    expect(collectBulkFailures(response)).toEqual({
      succeeded: 2,
      failures: [
        { action: 'update', id: '3', status: 400, reason: 'bad field' },
        { action: 'index', id: '4', status: 429, reason: 'es_rejected_execution_exception' },
      ],
    });
  });
});

describe('ElasticsearchIndexWriter', () => {
  it('should index a document under its id', async () => {
    const client = fakeClient();
    await writerFor(client).index('prod-dd-categories-2025-04', doc, { timeoutMs: 1000 });

    expect(client.index).toHaveBeenCalledWith(
      { index: 'prod-dd-categories-2025-04', id: '1', document: doc },
      { signal: undefined, requestTimeout: 1000 },
    );
  });

  it('should update as an upsert', async () => {
    const client = fakeClient();
    await writerFor(client).update('idx', '1', doc);

    expect(client.update).toHaveBeenCalledWith(
      { index: 'idx', id: '1', doc, doc_as_upsert: true },
      { signal: undefined, requestTimeout: undefined },
    );
  });

  it('should treat deleting an absent document as success', async () => {
    const client = fakeClient();
    client.delete.mockResolvedValue({ result: 'not_found' });

    await expect(writerFor(client).delete('idx', '404')).resolves.toBeUndefined();
    expect(client.delete).toHaveBeenCalledWith(
      { index: 'idx', id: '404' },
      { signal: undefined, requestTimeout: undefined, ignore: [404] },
    );
  });

  it('should classify write failures', async () => {
    const client = fakeClient();
    client.index.mockRejectedValue(responseError(503));

    await expect(writerFor(client).index('idx', doc)).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('should raise BulkFlushError for failed items', async () => {
    const client = fakeClient();
    client.bulk.mockResolvedValue({
      took: 5,
      errors: true,
      items: [
        { index: { _index: 'idx', _id: '1', status: 201 } },
        { index: { _index: 'idx', _id: '2', status: 400, error: { type: 'mapper_parsing_exception' } } },
      ],
    });

    const error = await writerFor(client)
      .bulk([{ index: { _index: 'idx', _id: '1' } }, doc, { index: { _index: 'idx', _id: '2' } }, doc])
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BulkFlushError);
    if (error instanceof BulkFlushError) {
      expect(error.batchSize).toBe(2);
      expect(error.failures).toEqual([{ action: 'index', id: '2', status: 400, reason: 'mapper_parsing_exception' }]);
      expect(error.retryable).toBe(false);
    }
  });

  it('should wrap a retryable bulk transport failure', async () => {
    const client = fakeClient();
    client.bulk.mockRejectedValue(new errors.ConnectionError('socket hang up'));

    const error = await writerFor(client)
      .bulk([{ delete: { _index: 'idx', _id: '1' } }])
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BulkFlushError);
    expect(error instanceof BulkFlushError && error.retryable).toBe(true);
  });

  it('should return acknowledged bulk items', async () => {
    const client = fakeClient();
    client.bulk.mockResolvedValue({ took: 7, errors: false, items: [{ delete: { _index: 'idx', _id: '1', status: 200 } }] });

    await expect(writerFor(client).bulk([{ delete: { _index: 'idx', _id: '1' } }])).resolves.toEqual({
      succeeded: 1,
      took: 7,
    });
  });

  it('should build a filtered search', async () => {
    const client = fakeClient();
    client.search.mockResolvedValue({ hits: { total: { value: 1, relation: 'eq' }, hits: [{ _id: '1', _source: doc }] } });

    const result = await writerFor(client).search('alias', { text: 'pulsa', status: 1, size: 5 });

    expect(result).toEqual({ total: 1, items: [doc] });
    expect(client.search.mock.calls[0]?.[0]).toMatchObject({
      index: 'alias',
      from: 0,
      size: 5,
      query: {
        bool: {
          must: [{ multi_match: { query: 'pulsa', fields: ['name^2', 'description'] } }],
          filter: [{ term: { status: 1 } }],
        },
      },
    });
  });

  it('should return null for a missing document', async () => {
    const client = fakeClient();
    client.get.mockResolvedValue({ found: false });

    await expect(writerFor(client).get('alias', '9')).resolves.toBeNull();
  });

  it('should report cluster health', async () => {
    const client = fakeClient();
    const writer = writerFor(client);

    const health = await writer.checkHealth();
    expect(health).toMatchObject({ healthy: true, status: 'yellow' });
    expect(writer.lastHealth).toBe(health);

    client.cluster.health.mockRejectedValue(new errors.ConnectionError('connect ECONNREFUSED'));
    expect(await writer.checkHealth()).toMatchObject({
      healthy: false,
      status: 'unreachable',
      error: 'connect ECONNREFUSED',
    });
  });

  it('should report a failed ping as false', async () => {
    const client = fakeClient();
    client.ping.mockRejectedValue(new errors.ConnectionError('down'));

    await expect(writerFor(client).ping()).resolves.toBe(false);
  });

  describe('with circuit breaker', () => {
    it('should stop calling the cluster once the breaker opens', async () => {
      const client = fakeClient();
      client.index.mockRejectedValue(responseError(503));
      const writer = new ElasticsearchIndexWriter(client as unknown as Client, {
        circuitBreaker: {
          enabled: true,
          timeoutMs: 1000,
          errorThresholdPercentage: 50,
          resetTimeoutMs: 60_000,
          volumeThreshold: 2,
        },
      });

      for (let i = 0; i < 3; i++) {
        await expect(writer.index('idx', doc)).rejects.toBeInstanceOf(StoreUnavailableError);
      }

      expect(writer.circuitOpen).toBe(true);
      const calls = client.index.mock.calls.length;
      const error = await writer.index('idx', doc).catch((e: unknown) => e);
      expect(error instanceof Error && error.message).toBe('Circuit breaker open');
      expect(client.index.mock.calls.length).toBe(calls);

      await writer.close();
    });

    it('should not count rejected documents against the breaker', async () => {
      const client = fakeClient();
      client.index.mockRejectedValue(responseError(400, 'mapper_parsing_exception'));
      const writer = new ElasticsearchIndexWriter(client as unknown as Client, {
        circuitBreaker: {
          enabled: true,
          timeoutMs: 1000,
          errorThresholdPercentage: 50,
          resetTimeoutMs: 60_000,
          volumeThreshold: 1,
        },
      });

      for (let i = 0; i < 3; i++) {
        await expect(writer.index('idx', doc)).rejects.toBeInstanceOf(StoreRejectedError);
      }
      expect(writer.circuitOpen).toBe(false);

      await writer.close();
    });
  });
});
