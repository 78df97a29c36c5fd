/**
 * Structured Logging System
 *
 * Provides structured logging with:
 * - Configurable log levels (TRACE, DEBUG, INFO, WARN, ERROR)
 * - Automatic context propagation (correlationId, topic/partition/offset)
 * - Redaction of credentials (ES password, SASL secrets)
 * - JSON output for production
 */

import { getContext } from '../context/execution-context.js';

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  SILENT = 5,
}

export type Environment = 'development' | 'production' | 'test';

export interface LogContext {
  [key: string]: unknown;
}

export interface StructuredLogger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  trace: LogLevel.TRACE,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Parse a textual level ("debug", "INFO") into a LogLevel
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  return LEVEL_NAMES[value.toLowerCase()];
}

export class ConsoleStructuredLogger implements StructuredLogger {
  private level: LogLevel;

  constructor(
    private environment: Environment,
    options?: { level?: LogLevel; service?: string },
  ) {
    this.level = options?.level ?? this.getDefaultLevel();
    this.service = options?.service;
  }

  private readonly service: string | undefined;

  private getDefaultLevel(): LogLevel {
    switch (this.environment) {
      case 'development':
        return LogLevel.DEBUG;
      case 'production':
        return LogLevel.INFO;
      case 'test':
        return LogLevel.SILENT;
    }
  }

  trace(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.TRACE) {
      this.log('TRACE', message, context);
    }
  }

  debug(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.DEBUG) {
      this.log('DEBUG', message, context);
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.INFO) {
      this.log('INFO', message, context);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.WARN) {
      this.log('WARN', message, context);
    }
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (this.level <= LogLevel.ERROR) {
      this.log('ERROR', message, { ...context, error: this.serializeError(error) });
    }
  }

  private log(level: string, message: string, context?: LogContext): void {
    const execContext = getContext();
    const logEntry = {
      level,
      timestamp: new Date().toISOString(),
      message,
      service: this.service,
      correlationId: execContext?.correlationId,
      topic: execContext?.topic,
      partition: execContext?.partition,
      offset: execContext?.offset,
      duration: execContext ? Date.now() - execContext.startTime : undefined,
      environment: this.environment,
      ...this.sanitize(context),
    };

    const output =
      this.environment === 'production' ? JSON.stringify(logEntry) : this.formatPretty(logEntry);

    switch (level) {
      case 'ERROR':
        console.error(output);
        break;
      case 'WARN':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
  }

  private formatPretty(entry: Record<string, unknown>): string {
    const lines = [`${String(entry.timestamp)} [${String(entry.level)}] ${String(entry.message)}`];

    if (entry.correlationId) {
      lines.push(`  correlationId: ${String(entry.correlationId)}`);
    }

    const metaKeys = ['correlationId', 'timestamp', 'level', 'message', 'environment', 'duration', 'service'];
    const contextFields: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(entry)) {
      if (!metaKeys.includes(key) && value !== undefined) {
        contextFields[key] = value;
      }
    }

    if (Object.keys(contextFields).length > 0) {
      lines.push(`  context: ${JSON.stringify(contextFields, null, 2)}`);
    }

    return lines.join('\n');
  }

  private sanitize(data: LogContext | undefined): Record<string, unknown> {
    if (!data) return {};

    const sanitized: Record<string, unknown> = {};
    const sensitiveFields = ['password', 'token', 'secret', 'apiKey', 'authorization', 'sasl'];

    for (const [key, value] of Object.entries(data)) {
      if (sensitiveFields.some((field) => key.toLowerCase().includes(field.toLowerCase()))) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  private serializeError(error: unknown): unknown {
    if (error instanceof Error) {
      const serialized: Record<string, unknown> = {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };

      if ('code' in error && error.code !== undefined) {
        serialized.code = error.code;
      }

      if (error.cause) {
        serialized.cause = this.serializeError(error.cause);
      }

      return serialized;
    }
    return error;
  }
}

export class NullLogger implements StructuredLogger {
  trace(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _error?: unknown, _context?: LogContext): void {}
}
