/**
 * Recent terminal failures
 *
 * Keeps the latest failure per entity id in a bounded LRU so operators can
 * look up why a category is missing or stale in the index without grepping
 * logs. Entries expire after `ttlMs`.
 */

import { LRUCache } from 'lru-cache';
import { SyncError } from '../errors/hierarchy.js';
import type { Clock, OperationType } from '../types/index.js';
import { systemClock } from '../types/index.js';

export interface FailureEntry {
  entityId: string;
  operation: OperationType;
  errorCode: string;
  errorMessage: string;
  /** Source coordinates; absent for operations drained from another batch */
  topic?: string;
  partition?: number;
  offset?: string;
  deadLettered: boolean;
  failedAt: Date;
}

export interface FailureLogConfig {
  /** Maximum number of entities tracked (LRU eviction) */
  maxEntries: number;
  ttlMs: number;
}

export const DEFAULT_FAILURE_LOG_CONFIG: FailureLogConfig = {
  maxEntries: 1000,
  ttlMs: 24 * 60 * 60 * 1000,
};

export type FailureInput = Omit<FailureEntry, 'errorCode' | 'errorMessage' | 'failedAt'> & { error: unknown };

export class FailureLog {
  private readonly entries: LRUCache<string, FailureEntry>;

  constructor(
    config: Partial<FailureLogConfig> = {},
    private readonly clock: Clock = systemClock,
  ) {
    const { maxEntries, ttlMs } = { ...DEFAULT_FAILURE_LOG_CONFIG, ...config };
    this.entries = new LRUCache<string, FailureEntry>({ max: maxEntries, ttl: ttlMs });
  }

  record(input: FailureInput): FailureEntry {
    const { error, ...rest } = input;
    const entry: FailureEntry = {
      ...rest,
      errorCode: error instanceof SyncError ? error.code : 'UNKNOWN',
      errorMessage: error instanceof Error ? error.message : String(error),
      failedAt: this.clock(),
    };
    this.entries.set(entry.entityId, entry);
    return entry;
  }

  get(entityId: string): FailureEntry | undefined {
    return this.entries.get(entityId);
  }

  /**
   * Most recently failed first
   */
  list(limit = 100): FailureEntry[] {
    const result: FailureEntry[] = [];
    for (const entry of this.entries.values()) {
      if (result.length >= limit) break;
      result.push(entry);
    }
    return result;
  }

  /**
   * Drop the entry once the entity syncs successfully again
   */
  resolve(entityId: string): boolean {
    return this.entries.delete(entityId);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
