/**
 * Shared test fixtures
 */

import type {
  Item,
  ItemSnapshot,
  LeaderboardSnapshot,
  RankedEntry,
  StateRecord,
  WatchTarget,
} from '../src/types';

export const NOW = new Date('2026-03-01T12:00:00.000Z');
export const LATER = new Date('2026-03-01T13:00:00.000Z');

/** Deterministic ids: evt-1, evt-2, ... */
export function sequentialIds(prefix = 'evt'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export function makeTarget(overrides: Partial<WatchTarget> = {}): WatchTarget {
  return {
    entityKey: 'github:Alpha',
    entityName: 'Alpha',
    source: 'github',
    identifier: 'alpha-org/alpha',
    ...overrides,
  };
}

export function makeItem(overrides: Partial<Item> & Pick<Item, 'id'>): Item {
  return {
    category: 'commit',
    fingerprint: overrides.id,
    title: `Item ${overrides.id}`,
    metadata: {},
    ...overrides,
  };
}

export function makeItemSnapshot(items: Item[], overrides: Partial<ItemSnapshot> = {}): ItemSnapshot {
  return {
    kind: 'items',
    source: 'github',
    items,
    fetchedAt: NOW.toISOString(),
    ...overrides,
  };
}

export function makeEntry(itemId: string, rank: number, score = 1200 - rank * 10): RankedEntry {
  return { itemId, name: `Model ${itemId}`, rank, score };
}

export function makeBoard(entries: RankedEntry[], maxRank = 30): LeaderboardSnapshot {
  return {
    kind: 'leaderboard',
    board: 'text-to-image',
    maxRank,
    entries,
    url: 'https://artificialanalysis.ai/image/leaderboard/text-to-image',
    fetchedAt: NOW.toISOString(),
  };
}

export const BOARD_TARGET: WatchTarget = {
  entityKey: 'leaderboard:text-to-image',
  entityName: 'text-to-image',
  source: 'leaderboard',
  identifier: 'text-to-image',
  maxRank: 30,
};

export function makeRecord(overrides: Partial<StateRecord> = {}): StateRecord {
  return {
    entityKey: 'github:Alpha',
    sourceKind: 'github',
    fingerprint: 'fp-1',
    payload: {
      kind: 'items',
      items: [{ id: 'sha-1', category: 'commit', fingerprint: 'sha-1' }],
      seenIds: ['sha-1'],
    },
    lastCheckedAt: '2026-02-28T12:00:00.000Z',
    lastChangedAt: null,
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200, statusText = ''): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'content-type': 'application/json' },
  });
}

export function textResponse(body: string, contentType = 'application/xml'): Response {
  return new Response(body, { status: 200, headers: { 'content-type': contentType } });
}
