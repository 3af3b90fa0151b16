/**
 * Tests for the Supabase row mapping and store selection
 */

import { describe, it, expect } from 'vitest';
import { createStateStore, fromRow, toRow } from '../../src/state';
import { FileStateStore } from '../../src/state/file-store';
import { MemoryStateStore } from '../../src/state/memory-store';
import { ConfigError } from '../../src/lib/errors';
import { makeRecord } from '../helpers';

describe('toRow / fromRow', () => {
  it('should map a record onto snake_case columns', () => {
    expect(toRow(makeRecord({ lastChangedAt: '2026-02-28T12:00:00.000Z' }))).toEqual({
      entity_key: 'github:Alpha',
      source_kind: 'github',
      fingerprint: 'fp-1',
      payload: {
        kind: 'items',
        items: [{ id: 'sha-1', category: 'commit', fingerprint: 'sha-1' }],
        seenIds: ['sha-1'],
      },
      last_checked_at: '2026-02-28T12:00:00.000Z',
      last_changed_at: '2026-02-28T12:00:00.000Z',
    });
  });

  it('should read back a row it wrote', () => {
    const record = makeRecord();
    expect(fromRow(toRow(record))).toEqual(record);
  });

  it('should discard rows with an unreadable payload', () => {
    expect(fromRow({ ...toRow(makeRecord()), payload: { kind: 'unknown' } })).toBeNull();
    expect(fromRow({ entity_key: 'github:Alpha' })).toBeNull();
    expect(fromRow(null)).toBeNull();
  });
});

describe('createStateStore', () => {
  const base = { path: 'data/test-state.json', table: 'watcher_states' };

  it('should build the store the driver names', () => {
    expect(createStateStore({ ...base, driver: 'memory' })).toBeInstanceOf(MemoryStateStore);
    expect(createStateStore({ ...base, driver: 'file' })).toBeInstanceOf(FileStateStore);
  });

  it('should refuse the supabase driver without credentials', () => {
    expect(() => createStateStore({ ...base, driver: 'supabase', supabaseUrl: 'https://example.supabase.co' })).toThrow(
      ConfigError
    );
  });
});
