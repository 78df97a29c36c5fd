/**
 * Event Decoder
 *
 * Raw change-capture message → CategoryOperation.
 *
 * - unparsable JSON, schema mismatch, tombstone, missing/zero `source.ts_ms`,
 *   empty `op` → InvalidPayload
 * - `op` outside c/u/d → UnknownOperation
 * - selected snapshot (after for c/u, before for d) absent or malformed → DataTransform
 */

import { DecodeError, ErrorCode } from '../errors/hierarchy.js';
import type { Category, CategoryOperation, OperationType } from '../types/index.js';
import { CategorySnapshotSchema, ChangeEnvelopeSchema } from '../validation/schemas.js';

export const OPERATION_CODES: Readonly<Record<string, OperationType>> = {
  c: 'CREATE',
  u: 'UPDATE',
  d: 'DELETE',
};

export type RawMessage = Buffer | string | null | undefined;

export type DecodeResult =
  | { ok: true; operation: CategoryOperation }
  | { ok: false; error: DecodeError };

function toText(raw: RawMessage): string | undefined {
  if (raw === null || raw === undefined) return undefined;
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');
  return text.trim().length === 0 ? undefined : text;
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

/**
 * Decode a change-capture message
 *
 * @throws DecodeError
 */
export function decode(raw: RawMessage): CategoryOperation {
  const text = toText(raw);
  if (text === undefined) {
    throw new DecodeError(ErrorCode.ERR_INVALID_PAYLOAD, 'Empty message (tombstone)', { operation: 'DECODE' });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(ErrorCode.ERR_INVALID_PAYLOAD, 'Message is not valid JSON', { operation: 'DECODE' }, {
      cause: error,
    });
  }

  const envelope = ChangeEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new DecodeError(
      ErrorCode.ERR_INVALID_PAYLOAD,
      `Invalid change envelope: ${formatIssues(envelope.error.errors)}`,
      { operation: 'DECODE' },
    );
  }

  const { payload } = envelope.data;
  const tsMs = payload.source.ts_ms;
  if (tsMs === undefined || tsMs === 0) {
    throw new DecodeError(ErrorCode.ERR_INVALID_PAYLOAD, 'Missing source timestamp (source.ts_ms)', {
      operation: 'DECODE',
    });
  }

  if (payload.op === '') {
    throw new DecodeError(ErrorCode.ERR_INVALID_PAYLOAD, 'Missing operation code', { operation: 'DECODE' });
  }

  const operation = Object.hasOwn(OPERATION_CODES, payload.op) ? OPERATION_CODES[payload.op] : undefined;
  if (operation === undefined) {
    throw new DecodeError(ErrorCode.ERR_UNKNOWN_OPERATION, `Unknown operation: ${payload.op}`, {
      operation: payload.op,
    });
  }

  const snapshot = operation === 'DELETE' ? payload.before : payload.after;
  const side = operation === 'DELETE' ? 'before' : 'after';
  if (snapshot === null || snapshot === undefined) {
    throw new DecodeError(ErrorCode.ERR_DATA_TRANSFORM, `Missing "${side}" snapshot for ${operation}`, {
      operation,
    });
  }

  const entity = CategorySnapshotSchema.safeParse(snapshot);
  if (!entity.success) {
    throw new DecodeError(
      ErrorCode.ERR_DATA_TRANSFORM,
      `Malformed "${side}" snapshot: ${formatIssues(entity.error.errors)}`,
      { operation },
    );
  }

  const category: Category = entity.data;

  return {
    operation,
    payload: category,
    occurredAt: new Date(tsMs),
  };
}

/**
 * Non-throwing variant of {@link decode}
 */
export function decodeSafe(raw: RawMessage): DecodeResult {
  try {
    return { ok: true, operation: decode(raw) };
  } catch (error) {
    if (error instanceof DecodeError) {
      return { ok: false, error };
    }
    throw error;
  }
}
