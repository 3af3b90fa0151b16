/**
 * Release Radar: Supabase State Store
 *
 * One row per entity key in the `watcher_states` table (see sql/).
 * Upserts are atomic per row; reset deletes every row in one statement.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { StateRecord } from '../types';
import { PersistenceError, type PersistenceOperation } from '../lib/errors';
import { logger } from '../lib/logger';
import { assertKeyMatches, readRecord, type StateStore } from './store';

// ============================================================
// ROW MAPPING
// ============================================================

export const StateRowSchema = z.object({
  entity_key: z.string(),
  source_kind: z.string(),
  fingerprint: z.string().nullable(),
  payload: z.unknown(),
  last_checked_at: z.string(),
  last_changed_at: z.string().nullable(),
});
export type StateRow = z.infer<typeof StateRowSchema>;

export function toRow(record: StateRecord): StateRow {
  return {
    entity_key: record.entityKey,
    source_kind: record.sourceKind,
    fingerprint: record.fingerprint,
    payload: record.payload,
    last_checked_at: record.lastCheckedAt,
    last_changed_at: record.lastChangedAt,
  };
}

export function fromRow(raw: unknown): StateRecord | null {
  const row = StateRowSchema.safeParse(raw);
  if (!row.success) {
    logger.warn('Discarding malformed state row', { issues: row.error.issues.length });
    return null;
  }

  return readRecord(row.data.entity_key, {
    entityKey: row.data.entity_key,
    sourceKind: row.data.source_kind,
    fingerprint: row.data.fingerprint,
    payload: row.data.payload,
    lastCheckedAt: row.data.last_checked_at,
    lastChangedAt: row.data.last_changed_at,
  });
}

/**
 * Wrap a PostgREST error the same way everywhere.
 */
function supabaseFailure(
  operation: PersistenceOperation,
  error: { message: string; code?: string },
  entityKey?: string
): PersistenceError {
  const code = error.code ? ` (code: ${error.code})` : '';
  return new PersistenceError(`Supabase ${operation} failed: ${error.message}${code}`, {
    operation,
    entityKey,
    cause: error,
  });
}

// ============================================================
// STORE
// ============================================================

export class SupabaseStateStore implements StateStore {
  private readonly log = logger.child({ component: 'SupabaseStateStore' });

  constructor(
    private readonly client: SupabaseClient,
    private readonly table = 'watcher_states'
  ) {}

  /**
   * Service-role client: the watcher runs as a background job, not as a user.
   */
  static connect(url: string, serviceRoleKey: string, table?: string): SupabaseStateStore {
    const client = createClient(url, serviceRoleKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
    return new SupabaseStateStore(client, table);
  }

  async get(entityKey: string): Promise<StateRecord | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select('*')
      .eq('entity_key', entityKey)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      throw supabaseFailure('get', error, entityKey);
    }
    return fromRow(data);
  }

  async put(entityKey: string, record: StateRecord): Promise<void> {
    assertKeyMatches(entityKey, record);

    const { error } = await this.client
      .from(this.table)
      .upsert(toRow(record), { onConflict: 'entity_key' });

    if (error) throw supabaseFailure('put', error, entityKey);
  }

  async reset(): Promise<void> {
    // PostgREST refuses an unfiltered delete
    const { error } = await this.client.from(this.table).delete().neq('entity_key', '');

    if (error) throw supabaseFailure('reset', error);
    this.log.info('State cleared', { table: this.table });
  }

  async list(): Promise<string[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select('entity_key')
      .order('entity_key', { ascending: true });

    if (error) throw supabaseFailure('list', error);

    const rows = z.array(z.object({ entity_key: z.string() })).parse(data ?? []);
    return rows.map(row => row.entity_key);
  }

  async close(): Promise<void> {
    await this.client.removeAllChannels();
  }
}
