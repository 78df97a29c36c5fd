/**
 * Document shapes shared by single writes and bulk requests
 */

import type { Category, CategoryDocument } from '../types/index.js';

/**
 * Document written for a category, stamped with the processing time.
 * Nullable columns are written as `null` rather than omitted: a partial
 * update only touches the keys it carries.
 */
export function toDocument(payload: Category, syncedAt: Date): CategoryDocument {
  return {
    ...payload,
    description: payload.description ?? null,
    version: payload.version ?? null,
    created_at: payload.created_at ?? null,
    updated_at: payload.updated_at ?? null,
    sync_status: 'SUCCESS',
    last_sync: syncedAt.toISOString(),
  };
}

/**
 * Serialized size in bytes, as recorded by the payload size histogram
 */
export function payloadSize(value: unknown): number {
  return Buffer.byteLength(JSON.stringify(value) ?? '', 'utf8');
}
