/**
 * Release Radar: File State Store
 *
 * Keeps every record in one JSON file. Writes are serialized and land
 * through write-to-temp + rename, so a crash leaves either the old file
 * or the new one, never a torn write.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { StateRecord } from '../types';
import { PersistenceError, describeError, type PersistenceOperation } from '../lib/errors';
import { logger } from '../lib/logger';
import { assertKeyMatches, readRecord, type StateStore } from './store';

const StateFileSchema = z.object({
  version: z.literal(1),
  records: z.record(z.string(), z.unknown()),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileStateStore implements StateStore {
  private records: Map<string, StateRecord> | null = null;
  private loading: Promise<Map<string, StateRecord>> | null = null;
  private writes: Promise<void> = Promise.resolve();
  private readonly log = logger.child({ component: 'FileStateStore' });

  constructor(private readonly path: string) {}

  async get(entityKey: string): Promise<StateRecord | null> {
    const records = await this.load();
    const record = records.get(entityKey);
    return record ? structuredClone(record) : null;
  }

  async put(entityKey: string, record: StateRecord): Promise<void> {
    assertKeyMatches(entityKey, record);

    return this.enqueue('put', entityKey, async () => {
      const next = new Map(await this.load());
      next.set(entityKey, structuredClone(record));
      await this.persist(next);
      this.records = next;
    });
  }

  async reset(): Promise<void> {
    return this.enqueue('reset', undefined, async () => {
      const empty = new Map<string, StateRecord>();
      await this.persist(empty);
      this.records = empty;
      this.log.info('State cleared', { path: this.path });
    });
  }

  async list(): Promise<string[]> {
    const records = await this.load();
    return [...records.keys()].sort();
  }

  async close(): Promise<void> {
    await this.writes;
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private enqueue(
    operation: PersistenceOperation,
    entityKey: string | undefined,
    task: () => Promise<void>
  ): Promise<void> {
    const run = this.writes.then(task).catch((error: unknown) => {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(`State ${operation} failed: ${describeError(error)}`, {
        operation,
        entityKey,
        cause: error,
      });
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.writes = run.catch(() => undefined);
    return run;
  }

  private load(): Promise<Map<string, StateRecord>> {
    if (this.records) return Promise.resolve(this.records);

    this.loading ??= this.readFromDisk()
      .then(records => {
        this.records ??= records;
        return this.records;
      })
      .finally(() => {
        this.loading = null;
      });
    return this.loading;
  }

  private async readFromDisk(): Promise<Map<string, StateRecord>> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return new Map();
      throw new PersistenceError(`Cannot read state file ${this.path}: ${describeError(error)}`, {
        operation: 'open',
        cause: error,
      });
    }

    let parsed: z.infer<typeof StateFileSchema>;
    try {
      parsed = StateFileSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new PersistenceError(`State file ${this.path} is corrupt: ${describeError(error)}`, {
        operation: 'open',
        cause: error,
      });
    }

    const records = new Map<string, StateRecord>();
    for (const [key, value] of Object.entries(parsed.records)) {
      const record = readRecord(key, value);
      if (record) records.set(key, record);
    }

    this.log.debug('State file loaded', { path: this.path, records: records.size });
    return records;
  }

  private async persist(records: Map<string, StateRecord>): Promise<void> {
    const body = JSON.stringify({ version: 1, records: Object.fromEntries(records) }, null, 2);
    const tmpPath = `${this.path}.${process.pid}.tmp`;

    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(tmpPath, body, 'utf-8');
    await rename(tmpPath, this.path);
  }
}
