/**
 * Error Hierarchy - Centralized error classification system
 *
 * Defines the closed error taxonomy of the sync engine: codes, domains,
 * severity levels and whether a failure may be retried. Call sites never
 * inspect codes or messages themselves; they ask `isRetryableError`.
 */

import type { RetryHistory } from '../types/index.js';

export enum ErrorDomain {
  DECODE = 'DECODE',
  VALIDATION = 'VALIDATION',
  STORE = 'STORE',
  RESILIENCE = 'RESILIENCE',
  PROVISIONING = 'PROVISIONING',
  CONSUMER = 'CONSUMER',
  SYSTEM = 'SYSTEM',
}

export enum ErrorSeverity {
  RECOVERABLE = 'recoverable', // transient, safe to retry
  DEGRADED = 'degraded',
  CRITICAL = 'critical',
}

export enum ErrorCode {
  // Decode errors (DECODE domain)
  ERR_INVALID_PAYLOAD = 'SYNC_DATA_001',
  ERR_UNKNOWN_OPERATION = 'SYNC_DATA_002',
  ERR_DATA_TRANSFORM = 'SYNC_DATA_003',

  // Validation errors (VALIDATION domain)
  ERR_VALIDATION_FAILED = 'SYNC_VAL_001',
  ERR_INVALID_CONFIG = 'SYNC_SYS_001',

  // Store errors (STORE domain)
  ERR_STORE_UNAVAILABLE = 'SYNC_ES_001',
  ERR_STORE_TIMEOUT = 'SYNC_ES_007',
  ERR_STORE_REJECTED = 'SYNC_ES_002',
  ERR_VERSION_CONFLICT = 'SYNC_ES_006',
  ERR_BULK_FAILED = 'SYNC_ES_008',

  // Resilience errors (RESILIENCE domain)
  ERR_RETRY_EXHAUSTED = 'SYNC_RETRY_001',
  ERR_CANCELLED = 'SYNC_RETRY_002',

  // Provisioning errors (PROVISIONING domain)
  ERR_PROVISIONING_FAILED = 'SYNC_ES_004',

  // Consumer errors (CONSUMER domain)
  ERR_CONSUMER_FAILED = 'SYNC_KAFKA_002',
  ERR_DEAD_LETTER_FAILED = 'SYNC_KAFKA_008',
}

export interface ErrorMetadata {
  code: ErrorCode;
  domain: ErrorDomain;
  severity: ErrorSeverity;
  retryable: boolean;
  statusCode: number;
}

type MetadataEntry = Omit<ErrorMetadata, 'code'>;

const METADATA: Record<ErrorCode, MetadataEntry> = {
  [ErrorCode.ERR_INVALID_PAYLOAD]: {
    domain: ErrorDomain.DECODE,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 400,
  },
  [ErrorCode.ERR_UNKNOWN_OPERATION]: {
    domain: ErrorDomain.DECODE,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 400,
  },
  [ErrorCode.ERR_DATA_TRANSFORM]: {
    domain: ErrorDomain.DECODE,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 422,
  },
  [ErrorCode.ERR_VALIDATION_FAILED]: {
    domain: ErrorDomain.VALIDATION,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 400,
  },
  [ErrorCode.ERR_INVALID_CONFIG]: {
    domain: ErrorDomain.SYSTEM,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 500,
  },
  [ErrorCode.ERR_STORE_UNAVAILABLE]: {
    domain: ErrorDomain.STORE,
    severity: ErrorSeverity.DEGRADED,
    retryable: true,
    statusCode: 503,
  },
  [ErrorCode.ERR_STORE_TIMEOUT]: {
    domain: ErrorDomain.STORE,
    severity: ErrorSeverity.RECOVERABLE,
    retryable: true,
    statusCode: 504,
  },
  [ErrorCode.ERR_STORE_REJECTED]: {
    domain: ErrorDomain.STORE,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 400,
  },
  [ErrorCode.ERR_VERSION_CONFLICT]: {
    domain: ErrorDomain.STORE,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 409,
  },
  [ErrorCode.ERR_BULK_FAILED]: {
    domain: ErrorDomain.STORE,
    severity: ErrorSeverity.DEGRADED,
    retryable: true,
    statusCode: 503,
  },
  [ErrorCode.ERR_RETRY_EXHAUSTED]: {
    domain: ErrorDomain.RESILIENCE,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 503,
  },
  [ErrorCode.ERR_CANCELLED]: {
    domain: ErrorDomain.RESILIENCE,
    severity: ErrorSeverity.RECOVERABLE,
    retryable: false,
    statusCode: 499,
  },
  [ErrorCode.ERR_PROVISIONING_FAILED]: {
    domain: ErrorDomain.PROVISIONING,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 500,
  },
  [ErrorCode.ERR_CONSUMER_FAILED]: {
    domain: ErrorDomain.CONSUMER,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 500,
  },
  [ErrorCode.ERR_DEAD_LETTER_FAILED]: {
    domain: ErrorDomain.CONSUMER,
    severity: ErrorSeverity.DEGRADED,
    retryable: true,
    statusCode: 503,
  },
};

/**
 * Get error metadata for a given error code
 */
export function getErrorMetadata(code: ErrorCode): ErrorMetadata {
  return { code, ...METADATA[code] };
}

/**
 * Check if an error code is retryable
 */
export function isRetryable(code: ErrorCode): boolean {
  return METADATA[code].retryable;
}

export interface SyncErrorContext {
  /** Operation being performed (CREATE, UPDATE, DELETE, DECODE, BULK, ...) */
  operation?: string;
  /** Entity type or resource the failure relates to */
  entity?: string;
  /** Entity id, when known */
  entityId?: string;
}

/**
 * Base class for every failure raised by the engine
 */
export abstract class SyncError extends Error {
  abstract readonly kind:
    | 'decode'
    | 'validation'
    | 'store-unavailable'
    | 'store-timeout'
    | 'store-rejected'
    | 'conflict'
    | 'bulk'
    | 'retry-exhausted'
    | 'cancelled'
    | 'provisioning'
    | 'configuration'
    | 'consumer';

  readonly metadata: ErrorMetadata;

  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly context: SyncErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = getErrorMetadata(code);
  }

  get retryable(): boolean {
    return this.metadata.retryable;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      ...this.context,
    };
  }
}

export class DecodeError extends SyncError {
  readonly kind = 'decode' as const;

  constructor(
    code: ErrorCode.ERR_INVALID_PAYLOAD | ErrorCode.ERR_UNKNOWN_OPERATION | ErrorCode.ERR_DATA_TRANSFORM,
    message: string,
    context?: SyncErrorContext,
    options?: { cause?: unknown },
  ) {
    super(code, message, context, options);
  }
}

export class ValidationError extends SyncError {
  readonly kind = 'validation' as const;

  constructor(message: string, context?: SyncErrorContext) {
    super(ErrorCode.ERR_VALIDATION_FAILED, message, context);
  }
}

export class StoreUnavailableError extends SyncError {
  readonly kind = 'store-unavailable' as const;

  constructor(message: string, context?: SyncErrorContext, options?: { cause?: unknown }) {
    super(ErrorCode.ERR_STORE_UNAVAILABLE, message, context, options);
  }
}

export class StoreTimeoutError extends SyncError {
  readonly kind = 'store-timeout' as const;

  constructor(
    message: string,
    readonly timeoutMs: number | undefined,
    context?: SyncErrorContext,
    options?: { cause?: unknown },
  ) {
    super(ErrorCode.ERR_STORE_TIMEOUT, message, context, options);
  }
}

/**
 * The store refused the request (mapping errors, malformed documents).
 * Re-sending the same payload will fail the same way.
 */
export class StoreRejectedError extends SyncError {
  readonly kind = 'store-rejected' as const;

  constructor(
    message: string,
    readonly statusCode: number,
    context?: SyncErrorContext,
    options?: { cause?: unknown },
  ) {
    super(ErrorCode.ERR_STORE_REJECTED, message, context, options);
  }
}

export class ConflictError extends SyncError {
  readonly kind = 'conflict' as const;

  constructor(message: string, context?: SyncErrorContext, options?: { cause?: unknown }) {
    super(ErrorCode.ERR_VERSION_CONFLICT, message, context, options);
  }
}

export interface BulkItemFailure {
  action: 'index' | 'update' | 'delete';
  id: string;
  status: number;
  reason: string;
}

export class BulkFlushError extends SyncError {
  readonly kind = 'bulk' as const;

  constructor(
    message: string,
    readonly batchSize: number,
    readonly failures: BulkItemFailure[] = [],
    options?: { cause?: unknown },
  ) {
    super(ErrorCode.ERR_BULK_FAILED, message, { operation: 'BULK' }, options);
  }

  /**
   * Transport failures and 429/5xx item failures may succeed on resubmission;
   * a batch whose every failed item was rejected with a 4xx will not.
   */
  override get retryable(): boolean {
    if (this.failures.length === 0) return true;
    return this.failures.some((f) => f.status === 429 || f.status >= 500);
  }
}

export class RetryExhaustedError extends SyncError {
  readonly kind = 'retry-exhausted' as const;

  constructor(
    message: string,
    readonly attempts: number,
    readonly lastError: unknown,
    context?: SyncErrorContext,
    readonly history?: RetryHistory,
  ) {
    super(ErrorCode.ERR_RETRY_EXHAUSTED, message, context, { cause: lastError });
  }
}

export class CancelledError extends SyncError {
  readonly kind = 'cancelled' as const;

  constructor(message = 'Operation cancelled', context?: SyncErrorContext, options?: { cause?: unknown }) {
    super(ErrorCode.ERR_CANCELLED, message, context, options);
  }
}

export class ProvisioningError extends SyncError {
  readonly kind = 'provisioning' as const;

  constructor(message: string, readonly step: string, options?: { cause?: unknown }) {
    super(ErrorCode.ERR_PROVISIONING_FAILED, message, { operation: step }, options);
  }
}

export class ConfigurationError extends SyncError {
  readonly kind = 'configuration' as const;

  constructor(message: string, readonly issues: string[] = []) {
    super(ErrorCode.ERR_INVALID_CONFIG, message, { operation: 'CONFIG' });
  }
}

export class ConsumerError extends SyncError {
  readonly kind = 'consumer' as const;

  constructor(
    code: ErrorCode.ERR_CONSUMER_FAILED | ErrorCode.ERR_DEAD_LETTER_FAILED,
    message: string,
    context?: SyncErrorContext,
    options?: { cause?: unknown },
  ) {
    super(code, message, context, options);
  }
}

/**
 * Single retry predicate used across the engine.
 * Errors that are not part of the taxonomy are treated as fatal.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof SyncError && error.retryable;
}

export function isCancellation(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
