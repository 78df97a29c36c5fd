/**
 * Validation Schemas Tests
 */

import { describe, it, expect } from 'vitest';
import {
  CategorySearchQuerySchema,
  CategorySnapshotSchema,
  ChangeEnvelopeSchema,
  KafkaConfigSchema,
  SyncSettingsSchema,
} from '../../validation/schemas.js';
import { getPreset } from '../../config/presets.js';

describe('ChangeEnvelopeSchema', () => {
  it('should accept an envelope with unknown source fields', () => {
    const result = ChangeEnvelopeSchema.safeParse({
      payload: {
        before: null,
        after: { id: 1, name: 'Pulsa' },
        source: { ts_ms: 1744761600000, db: 'digital_discovery', table: 'categories' },
        op: 'c',
      },
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.payload.source.db).toBe('digital_discovery');
    }
  });

  it('should reject an envelope without payload', () => {
    expect(ChangeEnvelopeSchema.safeParse({ op: 'c' }).success).toBe(false);
  });

  it('should reject a negative source timestamp', () => {
    const result = ChangeEnvelopeSchema.safeParse({
      payload: { after: {}, source: { ts_ms: -1 }, op: 'c' },
    });
    expect(result.success).toBe(false);
  });
});

describe('CategorySnapshotSchema', () => {
  it('should stringify numeric ids and default missing fields', () => {
    const snapshot = CategorySnapshotSchema.parse({ id: 42, name: null, created_at: null });

    expect(snapshot).toEqual({
      id: '42',
      name: '',
      description: null,
      status: 0,
      version: null,
      created_at: null,
      updated_at: null,
    });
  });

  it('should keep string ids and timestamps as given', () => {
    const snapshot = CategorySnapshotSchema.parse({
      id: 'cat-7',
      name: 'Pulsa',
      status: 1,
      created_at: '2025-04-01T00:00:00Z',
      updated_at: 1744761600000,
    });

    expect(snapshot.id).toBe('cat-7');
    expect(snapshot.created_at).toBe('2025-04-01T00:00:00Z');
    expect(snapshot.updated_at).toBe(1744761600000);
  });

  it('should reject a fractional status', () => {
    const result = CategorySnapshotSchema.safeParse({ id: 1, name: 'Pulsa', status: 1.5 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0]?.message).toBe('status must be an integer');
    }
  });
});

describe('CategorySearchQuerySchema', () => {
  it('should coerce query-string numbers and apply defaults', () => {
    expect(CategorySearchQuerySchema.parse({ status: '1' })).toEqual({ status: 1, from: 0, size: 20 });
  });

  it('should trim the search term', () => {
    expect(CategorySearchQuerySchema.parse({ q: '  pulsa ' }).q).toBe('pulsa');
  });

  it('should cap the page size', () => {
    const result = CategorySearchQuerySchema.safeParse({ size: '500' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0]?.message).toBe('size must not exceed 100');
    }
  });
});

describe('Configuration schemas', () => {
  it('should require at least one broker', () => {
    const kafka = { ...getPreset('DEVELOPMENT').kafka, brokers: [] };
    const result = KafkaConfigSchema.safeParse(kafka);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0]?.message).toBe('at least one broker is required');
    }
  });

  it('should reject an unknown sync mode', () => {
    const sync = { ...getPreset('DEVELOPMENT').sync, mode: 'hybrid' };
    const result = SyncSettingsSchema.safeParse(sync);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0]?.message).toBe('sync mode must be "custom" or "kafka-connect"');
    }
  });

  it('should require maxRetryDelayMs >= retryDelayMs', () => {
    const sync = { ...getPreset('DEVELOPMENT').sync, retryDelayMs: 2000, maxRetryDelayMs: 1000 };
    const result = SyncSettingsSchema.safeParse(sync);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0]?.path).toEqual(['maxRetryDelayMs']);
    }
  });
});
