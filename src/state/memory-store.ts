/**
 * Release Radar: In-Memory State Store
 *
 * Backs the `memory` driver and the tests. Records are deep-copied in and out so
 * callers cannot mutate stored state by accident.
 */

import type { StateRecord } from '../types';
import { assertKeyMatches, type StateStore } from './store';

export class MemoryStateStore implements StateStore {
  private readonly records = new Map<string, StateRecord>();

  constructor(initial: StateRecord[] = []) {
    for (const record of initial) {
      this.records.set(record.entityKey, structuredClone(record));
    }
  }

  async get(entityKey: string): Promise<StateRecord | null> {
    const record = this.records.get(entityKey);
    return record ? structuredClone(record) : null;
  }

  async put(entityKey: string, record: StateRecord): Promise<void> {
    assertKeyMatches(entityKey, record);
    this.records.set(entityKey, structuredClone(record));
  }

  async reset(): Promise<void> {
    this.records.clear();
  }

  async list(): Promise<string[]> {
    return [...this.records.keys()].sort();
  }

  async close(): Promise<void> {
    // nothing to release
  }

  get size(): number {
    return this.records.size;
  }
}
