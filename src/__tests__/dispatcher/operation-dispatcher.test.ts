import { describe, it, expect, beforeEach } from 'vitest';
import { OperationDispatcher, validateOperation } from '../../dispatcher/operation-dispatcher.js';
import { RetryEngine } from '../../retry/retry-engine.js';
import {
  CancelledError,
  RetryExhaustedError,
  StoreRejectedError,
  StoreTimeoutError,
  StoreUnavailableError,
  ValidationError,
} from '../../errors/hierarchy.js';
import type { CategoryOperation } from '../../types/index.js';
import { InMemoryIndexWriter } from '../helpers/in-memory-writer.js';

const NOW = new Date('2025-04-16T10:00:00Z');
const INDEX = 'prod-digital-discovery-categories-2025-04';

function op(operation: CategoryOperation['operation'], payload: Partial<CategoryOperation['payload']> = {}): CategoryOperation {
  return {
    operation,
    payload: { id: '1', name: 'Pulsa', status: 1, ...payload },
    occurredAt: new Date('2025-03-31T23:59:00Z'),
  };
}

describe('OperationDispatcher', () => {
  let writer: InMemoryIndexWriter;
  let delays: number[];
  let dispatcher: OperationDispatcher;

  beforeEach(() => {
    writer = new InMemoryIndexWriter();
    delays = [];
    const retry = new RetryEngine({
      maxAttempts: 4,
      baseDelayMs: 100,
      backoffFactor: 2,
      maxDelayMs: 1000,
      random: () => 0.5,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });
    dispatcher = new OperationDispatcher({
      writer,
      retry,
      environment: 'prod',
      service: 'digital-discovery',
      entity: 'categories',
      maxRetries: 3,
      operationTimeoutMs: 30000,
      clock: () => NOW,
    });
  });

  it('should index a create into the current month by processing time', async () => {
    const result = await dispatcher.dispatch(op('CREATE'));

    expect(result.indexName).toBe(INDEX);
    expect(result.attempts).toBe(1);
    expect(result.record.status).toBe('SUCCESS');
    expect(writer.document(INDEX, '1')).toEqual({
      id: '1',
      name: 'Pulsa',
      description: null,
      status: 1,
      version: null,
      created_at: null,
      updated_at: null,
      sync_status: 'SUCCESS',
      last_sync: '2025-04-16T10:00:00.000Z',
    });
    expect(writer.calls[0]?.options).toEqual({ signal: undefined, timeoutMs: 30000 });
  });

  it('should converge create then update', async () => {
    await dispatcher.dispatch(op('CREATE'));
    await dispatcher.dispatch(op('UPDATE', { name: 'Pulsa v2' }));

    expect(writer.document(INDEX, '1')?.name).toBe('Pulsa v2');
    expect(writer.indices.get(INDEX)?.size).toBe(1);
  });

  it('should upsert an update that arrives before its create', async () => {
    await dispatcher.dispatch(op('UPDATE', { id: '5', name: 'Games' }));

    expect(writer.document(INDEX, '5')?.name).toBe('Games');
  });

  it('should treat a repeated delete as success', async () => {
    await dispatcher.dispatch(op('CREATE'));
    await dispatcher.dispatch(op('DELETE'));
    const again = await dispatcher.dispatch(op('DELETE'));

    expect(again.record.status).toBe('SUCCESS');
    expect(writer.document(INDEX, '1')).toBeUndefined();
  });

  it('should produce the same document for a replayed create', async () => {
    await dispatcher.dispatch(op('CREATE'));
    const first = writer.document(INDEX, '1');
    await dispatcher.dispatch(op('CREATE'));

    expect(writer.document(INDEX, '1')).toEqual(first);
  });

  it('should reject invalid operations without writing', async () => {
    await expect(dispatcher.dispatch(op('CREATE', { name: '  ' }))).rejects.toBeInstanceOf(ValidationError);
    expect(writer.calls).toHaveLength(0);
  });

  it('should retry transient failures and report the attempt count', async () => {
    writer.failNext('index', new StoreTimeoutError('slow', 30000), 2);

    const result = await dispatcher.dispatch(op('CREATE'));

    expect(result.attempts).toBe(3);
    expect(result.record.retryCount).toBe(2);
    expect(delays).toEqual([100, 200]);
    expect(writer.document(INDEX, '1')).toBeDefined();
  });

  it('should give up after maxRetries retries', async () => {
    writer.failNext('index', new StoreUnavailableError('down'), 10);

    const error = await dispatcher.dispatch(op('CREATE')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(writer.calls).toHaveLength(4);
    expect(delays).toHaveLength(3);
  });

  it('should not retry a rejected document', async () => {
    writer.failNext('update', new StoreRejectedError('mapper_parsing_exception', 400));

    await expect(dispatcher.dispatch(op('UPDATE'))).rejects.toBeInstanceOf(StoreRejectedError);
    expect(writer.calls).toHaveLength(1);
  });

  it('should stop when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(dispatcher.dispatch(op('CREATE'), { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(writer.calls).toHaveLength(0);
  });
});

describe('validateOperation', () => {
  it('should require an id for every operation', () => {
    expect(() => validateOperation(op('DELETE', { id: '' }))).toThrow('Category id is required');
  });

  it('should not check name or status on delete', () => {
    expect(() => validateOperation(op('DELETE', { name: '', status: -1 }))).not.toThrow();
  });

  it('should require a non-negative integer status', () => {
    expect(() => validateOperation(op('CREATE', { status: -1 }))).toThrow(
      'Category status must be a non-negative integer',
    );
  });
});
