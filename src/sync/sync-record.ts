/**
 * SyncRecord transitions
 *
 * A record is created once an operation's outcome is about to be finalized
 * and then moved through markRetrying / markFailed / markSuccess. Records are
 * not persisted; they end up in a log line and a metrics increment.
 */

import { randomUUID } from 'crypto';
import type { Clock, OperationType, SyncRecord } from '../types/index.js';
import { systemClock } from '../types/index.js';

export function createSyncRecord(
  entityType: string,
  entityId: string,
  operation: OperationType,
  clock: Clock = systemClock,
): SyncRecord {
  const now = clock();
  return {
    id: randomUUID(),
    entityType,
    entityId,
    operation,
    status: 'PENDING',
    retryCount: 0,
    createdAt: now,
    updatedAt: now,
  };
}

export function markRetrying(record: SyncRecord, clock: Clock = systemClock): SyncRecord {
  record.status = 'RETRYING';
  record.updatedAt = clock();
  return record;
}

/**
 * Record a failed attempt and schedule the next one `retryDelayMs` from now
 */
export function markFailed(
  record: SyncRecord,
  error: unknown,
  retryDelayMs: number,
  clock: Clock = systemClock,
): SyncRecord {
  const now = clock();
  record.status = 'FAILED';
  record.errorMessage = error instanceof Error ? error.message : String(error);
  record.retryCount++;
  record.lastRetryAt = now;
  record.nextRetryAt = new Date(now.getTime() + retryDelayMs);
  record.updatedAt = now;
  return record;
}

export function markSuccess(record: SyncRecord, clock: Clock = systemClock): SyncRecord {
  record.status = 'SUCCESS';
  record.errorMessage = undefined;
  record.lastRetryAt = undefined;
  record.nextRetryAt = undefined;
  record.updatedAt = clock();
  return record;
}

/**
 * Flatten a record into log context
 */
export function toLogContext(record: SyncRecord): Record<string, unknown> {
  return {
    syncRecordId: record.id,
    entityType: record.entityType,
    entityId: record.entityId,
    operation: record.operation,
    status: record.status,
    errorMessage: record.errorMessage,
    retryCount: record.retryCount,
    lastRetryAt: record.lastRetryAt?.toISOString(),
    nextRetryAt: record.nextRetryAt?.toISOString(),
  };
}
