/**
 * Execution Context - Context propagation using AsyncLocalStorage
 *
 * Every consumed change event runs inside its own context so that log lines
 * emitted by the decoder, dispatcher and retry engine carry the same
 * correlation id and the message coordinates (topic, partition, offset).
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface ExecutionContext {
  correlationId: string;
  topic?: string;
  partition?: number;
  offset?: string;
  startTime: number;
  metadata?: Record<string, string>;
}

export const executionContext = new AsyncLocalStorage<ExecutionContext>();

/**
 * Get current execution context
 */
export function getContext(): ExecutionContext | undefined {
  return executionContext.getStore();
}

/**
 * Run function with execution context
 */
export function withContext<T>(context: Partial<ExecutionContext>, fn: () => T): T {
  const fullContext: ExecutionContext = {
    ...context,
    correlationId: context.correlationId ?? randomUUID(),
    startTime: context.startTime ?? Date.now(),
  };

  return executionContext.run(fullContext, fn);
}

/**
 * Get correlation ID from current context
 */
export function getCorrelationId(): string | undefined {
  return getContext()?.correlationId;
}

/**
 * Get operation duration in milliseconds
 */
export function getOperationDuration(): number | undefined {
  const context = getContext();
  if (context) {
    return Date.now() - context.startTime;
  }
  return undefined;
}
