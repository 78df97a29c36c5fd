/**
 * Execution Context Tests
 *
 * Tests for context propagation using AsyncLocalStorage
 */

import { describe, it, expect } from 'vitest';
import {
  getContext,
  withContext,
  getCorrelationId,
  getOperationDuration,
} from '../../context/execution-context.js';

describe('Execution Context', () => {
  describe('getContext', () => {
    it('should return undefined when no context is set', () => {
      expect(getContext()).toBeUndefined();
    });

    it('should return context when set via withContext', () => {
      withContext({ correlationId: 'test-123' }, () => {
        expect(getContext()?.correlationId).toBe('test-123');
      });
    });
  });

  describe('withContext', () => {
    it('should generate a correlation id and start time when absent', () => {
      withContext({ topic: 'pg.categories' }, () => {
        const context = getContext();
        expect(context?.correlationId).toMatch(/^[0-9a-f-]{36}$/);
        expect(typeof context?.startTime).toBe('number');
        expect(context?.topic).toBe('pg.categories');
      });
    });

    it('should carry message coordinates', () => {
      withContext({ topic: 'pg.categories', partition: 3, offset: '1200' }, () => {
        expect(getContext()).toMatchObject({ topic: 'pg.categories', partition: 3, offset: '1200' });
      });
    });

    it('should propagate context across async operations', async () => {
      await withContext({ correlationId: 'async-1' }, async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        expect(getCorrelationId()).toBe('async-1');
      });
    });

    it('should isolate context between nested calls', () => {
      withContext({ correlationId: 'outer' }, () => {
        withContext({ correlationId: 'inner' }, () => {
          expect(getCorrelationId()).toBe('inner');
        });
        expect(getCorrelationId()).toBe('outer');
      });
    });

    it('should return function result', () => {
      expect(withContext({}, () => 42)).toBe(42);
    });

    it('should propagate errors from function', () => {
      expect(() =>
        withContext({}, () => {
          throw new Error('boom');
        }),
      ).toThrow('boom');
    });
  });

  describe('getOperationDuration', () => {
    it('should return undefined when no context', () => {
      expect(getOperationDuration()).toBeUndefined();
    });

    it('should calculate duration from provided startTime', () => {
      withContext({ startTime: Date.now() - 1000 }, () => {
        expect(getOperationDuration()).toBeGreaterThanOrEqual(1000);
      });
    });
  });

  describe('Parallel messages', () => {
    it('should isolate context in parallel operations', async () => {
      const seen = await Promise.all(
        ['a', 'b', 'c'].map((id, i) =>
          withContext({ correlationId: id }, async () => {
            await new Promise((resolve) => setTimeout(resolve, 10 - i * 3));
            return getCorrelationId();
          }),
        ),
      );

      expect(seen).toEqual(['a', 'b', 'c']);
    });
  });
});
