/**
 * Release Radar: State Stores
 */

import type { StateConfig } from '../types';
import { ConfigError } from '../lib/errors';
import { FileStateStore } from './file-store';
import { MemoryStateStore } from './memory-store';
import { SupabaseStateStore } from './supabase-store';
import type { StateStore } from './store';

export type { StateStore } from './store';
export { readRecord } from './store';
export { MemoryStateStore } from './memory-store';
export { FileStateStore } from './file-store';
export { SupabaseStateStore, toRow, fromRow } from './supabase-store';

export function createStateStore(config: StateConfig): StateStore {
  switch (config.driver) {
    case 'memory':
      return new MemoryStateStore();
    case 'file':
      return new FileStateStore(config.path);
    case 'supabase':
      if (!config.supabaseUrl || !config.supabaseKey) {
        throw new ConfigError('Supabase state driver selected', [
          'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must both be set',
        ]);
      }
      return SupabaseStateStore.connect(config.supabaseUrl, config.supabaseKey, config.table);
  }
}
