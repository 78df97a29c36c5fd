import { describe, it, expect, beforeEach } from 'vitest';
import { BulkBuffer, encodeBulk } from '../../bulk/bulk-buffer.js';
import { BulkFlushError, ValidationError } from '../../errors/hierarchy.js';
import type { CategoryOperation } from '../../types/index.js';
import { InMemoryIndexWriter } from '../helpers/in-memory-writer.js';

const NOW = new Date('2025-04-16T10:00:00Z');
const INDEX = 'prod-digital-discovery-categories-2025-04';

function op(id: string, operation: CategoryOperation['operation'] = 'CREATE'): CategoryOperation {
  return { operation, payload: { id, name: `Category ${id}`, status: 1 }, occurredAt: NOW };
}

describe('encodeBulk', () => {
  it('should encode action and body lines per operation', () => {
    const lines = encodeBulk([op('1'), op('2', 'UPDATE'), op('3', 'DELETE')], 'idx', NOW);
    const cleared = { description: null, version: null, created_at: null, updated_at: null };
    const doc2 = { id: '2', name: 'Category 2', status: 1, ...cleared, sync_status: 'SUCCESS', last_sync: NOW.toISOString() };

    expect(lines).toEqual([
      { index: { _index: 'idx', _id: '1' } },
      { id: '1', name: 'Category 1', status: 1, ...cleared, sync_status: 'SUCCESS', last_sync: NOW.toISOString() },
      { update: { _index: 'idx', _id: '2' } },
      { doc: doc2, doc_as_upsert: true },
      { delete: { _index: 'idx', _id: '3' } },
    ]);
  });
});

describe('BulkBuffer', () => {
  let writer: InMemoryIndexWriter;
  let buffer: BulkBuffer;

  beforeEach(() => {
    writer = new InMemoryIndexWriter();
    buffer = new BulkBuffer({
      writer,
      batchSize: 3,
      environment: 'prod',
      service: 'digital-discovery',
      entity: 'categories',
      clock: () => NOW,
    });
  });

  it('should reject a batch size below 1', () => {
    expect(
      () => new BulkBuffer({ writer, batchSize: 0, environment: 'prod', service: 's', entity: 'e' }),
    ).toThrow(RangeError);
  });

  it('should flush exactly batchSize operations when full', async () => {
    expect(await buffer.add(op('1'))).toBeUndefined();
    expect(await buffer.add(op('2'))).toBeUndefined();
    expect(await buffer.add(op('3'))).toEqual({ flushed: 3, requests: 1 });

    expect(buffer.size).toBe(0);
    expect(writer.bulkRequests).toHaveLength(1);
    expect(writer.indices.get(INDEX)?.size).toBe(3);
  });

  it('should lose nothing when concurrent adds cross the threshold', async () => {
    const ids = ['1', '2', '3', '4', '5', '6', '7', '8', '9', '10'];

    const results = await Promise.all(ids.map((id) => buffer.add(op(id))));

    expect(results.filter((r) => r !== undefined)).toEqual([
      { flushed: 3, requests: 1 },
      { flushed: 3, requests: 1 },
      { flushed: 3, requests: 1 },
    ]);
    expect(writer.bulkRequests.map((lines) => lines.flatMap((line) => ('index' in line ? [line.index._id] : [])))).toEqual([
      ['1', '2', '3'],
      ['4', '5', '6'],
      ['7', '8', '9'],
    ]);
    expect(buffer.size).toBe(1);

    await buffer.flush();
    expect([...(writer.indices.get(INDEX)?.keys() ?? [])].sort()).toEqual([...ids].sort());
  });

  it('should not buffer an invalid operation', async () => {
    const invalid: CategoryOperation = { operation: 'CREATE', payload: { id: '9', name: '', status: 1 }, occurredAt: NOW };

    await expect(buffer.add(invalid)).rejects.toBeInstanceOf(ValidationError);
    expect(buffer.size).toBe(0);
  });

  it('should flush the remainder in batchSize chunks', async () => {
    await buffer.add(op('1'));
    await buffer.add(op('2'));

    expect(await buffer.flush()).toEqual({ flushed: 2, requests: 1 });
    expect(await buffer.flush()).toEqual({ flushed: 0, requests: 0 });
  });

  it('should keep every operation when a flush fails', async () => {
    await buffer.add(op('1'));
    await buffer.add(op('2'));
    writer.failNext('bulk', new BulkFlushError('socket hang up', 2));

    await expect(buffer.flush()).rejects.toBeInstanceOf(BulkFlushError);
    expect(buffer.size).toBe(2);

    await buffer.flush();
    expect(buffer.size).toBe(0);
    expect(writer.indices.get(INDEX)?.size).toBe(2);
  });

  it('should keep the operation that triggered a failed flush', async () => {
    writer.failNext('bulk', new BulkFlushError('socket hang up', 3));
    await buffer.add(op('1'));
    await buffer.add(op('2'));

    await expect(buffer.add(op('3'))).rejects.toBeInstanceOf(BulkFlushError);
    expect(buffer.size).toBe(3);
  });

  it('should never interleave adds with a flush', async () => {
    await buffer.add(op('1'));
    await buffer.add(op('2'));

    const flushing = buffer.flush();
    const adding = buffer.add(op('3'));
    await Promise.all([flushing, adding]);

    expect(writer.bulkRequests.map((lines) => lines.length / 2)).toEqual([2]);
    expect(buffer.size).toBe(1);
  });

  it('should drain oldest first', async () => {
    await buffer.add(op('1'));
    await buffer.add(op('2', 'DELETE'));

    const drained = await buffer.drain();

    expect(drained.map((o) => o.payload.id)).toEqual(['1', '2']);
    expect(buffer.size).toBe(0);
  });
});
