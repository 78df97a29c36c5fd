/**
 * Shared Types
 *
 * Domain model of the change-event synchronization engine: the entity that
 * is mirrored into the search index, the normalized unit of work produced by
 * the decoder, and the outcome records consumed by logs and metrics.
 */

/**
 * Normalized operation kind
 */
export type OperationType = 'CREATE' | 'UPDATE' | 'DELETE';

export const OPERATION_TYPES: readonly OperationType[] = ['CREATE', 'UPDATE', 'DELETE'];

/**
 * Sync status of a record or of an indexed document
 */
export type SyncStatus = 'PENDING' | 'SUCCESS' | 'FAILED' | 'RETRYING';

/**
 * Category row as captured from the source table.
 * `id` is also the search document id, so replays land on the same slot.
 */
export interface Category {
  id: string;
  name: string;
  /** Nullable columns carry `null` once cleared at the source */
  description?: string | null;
  status: number;
  version?: number | null;
  created_at?: string | number | null;
  updated_at?: string | number | null;
  sync_status?: SyncStatus;
  last_sync?: string;
}

/**
 * Document shape written to the search index. Nullable columns are always
 * present so that a partial update overwrites a cleared value.
 */
export interface CategoryDocument extends Category {
  description: string | null;
  version: number | null;
  created_at: string | number | null;
  updated_at: string | number | null;
  sync_status: SyncStatus;
  last_sync: string;
}

/**
 * Normalized unit of work
 */
export interface CategoryOperation {
  operation: OperationType;
  payload: Category;
  /** Source commit time of the change (not used for index rotation) */
  occurredAt: Date;
}

/**
 * Observability record of one operation's outcome
 */
export interface SyncRecord {
  id: string;
  entityType: string;
  entityId: string;
  operation: OperationType;
  status: SyncStatus;
  errorMessage?: string;
  retryCount: number;
  lastRetryAt?: Date;
  nextRetryAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * One attempt inside a retry sequence
 */
export interface RetryAttempt {
  attempt: number;
  timestamp: Date;
  durationMs: number;
  error?: string;
  /** Delay scheduled before the next attempt (absent on the last one) */
  delayMs?: number;
  nextRetryAt?: Date;
}

export type RetryHistoryStatus = 'IN_PROGRESS' | 'SUCCESS' | 'FAILED' | 'CANCELLED';

/**
 * Attempts of one retry sequence, discarded once the sequence ends
 */
export interface RetryHistory {
  operationId: string;
  entity: string;
  operation: string;
  attempts: RetryAttempt[];
  status: RetryHistoryStatus;
}

/**
 * Per-call options accepted by every store write
 */
export interface WriteOptions {
  /** Cancels the in-flight request */
  signal?: AbortSignal;
  /** Request deadline in ms; exceeding it is a retryable timeout */
  timeoutMs?: number;
}

/**
 * Clock abstraction so index rotation and records can be tested
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// Re-export StructuredLogger from logger module
export {
  ConsoleStructuredLogger,
  NullLogger,
  LogLevel,
  type StructuredLogger,
  type LogContext,
} from '../logger/index.js';
