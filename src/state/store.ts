/**
 * Release Radar: State Store Contract
 *
 * Durable last-observed state, one record per entity key.
 * Absence of a record means "never observed".
 */

import { StateRecordSchema } from '../types';
import type { StateRecord } from '../types';
import { logger } from '../lib/logger';

export interface StateStore {
  /** Last committed record, or null if the key was never observed. */
  get(entityKey: string): Promise<StateRecord | null>;
  /** Atomic upsert. Throws PersistenceError on failure. */
  put(entityKey: string, record: StateRecord): Promise<void>;
  /** Atomically clears every record. */
  reset(): Promise<void>;
  /** All stored keys, sorted. */
  list(): Promise<string[]>;
  close(): Promise<void>;
}

/**
 * Validate a record read back from storage.
 * A record that no longer matches the schema is treated as absent so the
 * next cycle re-baselines instead of diffing against garbage.
 */
export function readRecord(entityKey: string, raw: unknown): StateRecord | null {
  const parsed = StateRecordSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Discarding unreadable state record', {
      entityKey,
      issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    });
    return null;
  }
  return parsed.data;
}

export function assertKeyMatches(entityKey: string, record: StateRecord): void {
  if (record.entityKey !== entityKey) {
    throw new Error(`State record key mismatch: ${record.entityKey} stored under ${entityKey}`);
  }
}
