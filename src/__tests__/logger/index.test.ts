/**
 * Tests for Structured Logger
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConsoleStructuredLogger, LogLevel, NullLogger, parseLogLevel } from '../../logger/index.js';
import { withContext } from '../../context/execution-context.js';
import { StoreUnavailableError } from '../../errors/hierarchy.js';

function lastJson(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const line = spy.mock.calls.at(-1)?.[0];
  return JSON.parse(String(line)) as Record<string, unknown>;
}

describe('ConsoleStructuredLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Log Levels', () => {
    it('should log at DEBUG level in development', () => {
      const devLogger = new ConsoleStructuredLogger('development');
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

      devLogger.debug('Debug message');

      expect(spy).toHaveBeenCalledTimes(1);
    });

    it('should log INFO but not DEBUG in production', () => {
      const prodLogger = new ConsoleStructuredLogger('production');
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

      prodLogger.debug('Debug message');
      prodLogger.info('Info message');

      expect(spy).toHaveBeenCalledTimes(1);
      expect(lastJson(spy).message).toBe('Info message');
    });

    it('should be silent by default in test', () => {
      const testLogger = new ConsoleStructuredLogger('test');
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});

      testLogger.info('Info message');
      testLogger.error('Error message');

      expect(log).not.toHaveBeenCalled();
      expect(error).not.toHaveBeenCalled();
    });

    it('should honour an explicit level', () => {
      const logger = new ConsoleStructuredLogger('production', { level: LogLevel.WARN });
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      logger.info('Info message');
      logger.warn('Warn message');

      expect(log).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('Context Propagation', () => {
    it('should include correlation id and message coordinates', () => {
      const logger = new ConsoleStructuredLogger('production', { service: 'sync' });
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

      withContext({ correlationId: 'test-123', topic: 'pg.categories', partition: 2, offset: '41' }, () => {
        logger.info('Applied');
      });

      const entry = lastJson(spy);
      expect(entry.correlationId).toBe('test-123');
      expect(entry.topic).toBe('pg.categories');
      expect(entry.partition).toBe(2);
      expect(entry.offset).toBe('41');
      expect(entry.service).toBe('sync');
      expect(entry.level).toBe('INFO');
    });

    it('should print the correlation id in pretty output', () => {
      const logger = new ConsoleStructuredLogger('development');
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

      withContext({ correlationId: 'test-456' }, () => {
        logger.info('Pretty message');
      });

      const output = String(spy.mock.calls[0]?.[0]);
      expect(output).toContain('[INFO] Pretty message');
      expect(output).toContain('  correlationId: test-456');
    });
  });

  describe('Sensitive Data Redaction', () => {
    it('should redact sensitive keys', () => {
      const logger = new ConsoleStructuredLogger('production');
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

      logger.info('Connecting', { password: 'test-secret', saslUsername: 'user', node: 'http://es:9200' });

      const entry = lastJson(spy);
      expect(entry.password).toBe('[REDACTED]');
      expect(entry.saslUsername).toBe('[REDACTED]');
      expect(entry.node).toBe('http://es:9200');
    });
  });

  describe('Error Serialization', () => {
    it('should serialize code and cause', () => {
      const logger = new ConsoleStructuredLogger('production');
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const error = new StoreUnavailableError('Elasticsearch unavailable', undefined, {
        cause: new Error('connect ECONNREFUSED'),
      });

      logger.error('Write failed', error, { entityId: '7' });

      const entry = lastJson(spy);
      expect(entry.entityId).toBe('7');
      expect(entry.error).toMatchObject({
        name: 'StoreUnavailableError',
        message: 'Elasticsearch unavailable',
        code: 'SYNC_ES_001',
        cause: { message: 'connect ECONNREFUSED' },
      });
    });
  });
});

describe('parseLogLevel', () => {
  it('should parse level names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLogLevel('silent')).toBe(LogLevel.SILENT);
  });

  it('should return undefined for unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

describe('NullLogger', () => {
  it('should never write to the console', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new NullLogger();

    logger.info('ignored');
    logger.error('ignored', new Error('x'));

    expect(spy).not.toHaveBeenCalled();
    vi.restoreAllMocks();
  });
});
