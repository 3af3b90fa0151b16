/**
 * Release Radar: Leaderboard Diff Engine
 *
 * Compares two ranked snapshots of the same board.
 * Events come out as entries, then rank changes, then at most one top-3
 * change. Entries that fall out of the window produce nothing.
 * Upstream order is kept as-is; ties are never re-sorted here.
 */

import { nanoid } from 'nanoid';
import type {
  Item,
  LeaderboardEvent,
  LeaderboardPayload,
  LeaderboardSnapshot,
  RankedEntry,
  StateRecord,
  WatchTarget,
} from '../types';
import { fingerprintOf } from '../lib/hash';
import { nextRecord, type DiffOutcome, type IdFactory } from './outcome';

const PODIUM_RANK = 3;

function withinWindow(entries: RankedEntry[], maxRank: number): RankedEntry[] {
  const seen = new Set<string>();
  return entries.filter(entry => {
    if (entry.rank > maxRank || seen.has(entry.itemId)) return false;
    seen.add(entry.itemId);
    return true;
  });
}

/** First three entries ranked 1-3, in upstream order. */
export function topThree(entries: RankedEntry[]): RankedEntry[] {
  return entries.filter(entry => entry.rank <= PODIUM_RANK).slice(0, PODIUM_RANK);
}

function sameMembers(a: RankedEntry[], b: RankedEntry[]): boolean {
  if (a.length !== b.length) return false;
  const ids = new Set(a.map(entry => entry.itemId));
  return b.every(entry => ids.has(entry.itemId));
}

function entryItem(entry: RankedEntry, snapshot: LeaderboardSnapshot): Item {
  const item: Item = {
    id: entry.itemId,
    category: 'ranked_entry',
    fingerprint: `${entry.rank}:${entry.score}`,
    title: entry.name,
    timestamp: snapshot.fetchedAt,
    metadata: {
      board: snapshot.board,
      rank: entry.rank,
      score: entry.score,
      creator: entry.creator ?? null,
    },
  };
  if (snapshot.url) item.url = snapshot.url;
  return item;
}

export class LeaderboardDiffEngine {
  constructor(private readonly createId: IdFactory = nanoid) {}

  diff(
    previous: StateRecord | null,
    snapshot: LeaderboardSnapshot,
    target: WatchTarget,
    now: Date = new Date()
  ): DiffOutcome {
    const detectedAt = now.toISOString();
    const current = withinWindow(snapshot.entries, snapshot.maxRank);
    const stored: LeaderboardPayload | null =
      previous?.payload.kind === 'leaderboard' ? previous.payload : null;

    const base = {
      entityKey: target.entityKey,
      entityName: target.entityName,
      source: target.source,
      board: snapshot.board,
      detectedAt,
    };

    // Never let an empty board replace a stored one
    if (stored && previous && current.length === 0) {
      return {
        events: [],
        record: { ...previous, payload: stored, lastCheckedAt: detectedAt },
        baseline: false,
      };
    }

    const events: LeaderboardEvent[] = [];

    if (stored) {
      // Compare against the old board cut at today's window
      const before = withinWindow(stored.entries, snapshot.maxRank);
      const beforeById = new Map(before.map(entry => [entry.itemId, entry]));

      for (const entry of current) {
        if (beforeById.has(entry.itemId)) continue;
        events.push({
          ...base,
          id: this.createId(),
          kind: 'leaderboard_new_entry',
          subject: entry.name,
          item: entryItem(entry, snapshot),
          entry,
        });
      }

      for (const entry of current) {
        const old = beforeById.get(entry.itemId);
        if (!old || old.rank === entry.rank) continue;
        events.push({
          ...base,
          id: this.createId(),
          kind: 'leaderboard_rank_change',
          subject: entry.name,
          item: entryItem(entry, snapshot),
          entry,
          previousRank: old.rank,
          currentRank: entry.rank,
          delta: old.rank - entry.rank,
          previousScore: old.score,
          currentScore: entry.score,
        });
      }

      const previousTop3 = topThree(before);
      const currentTop3 = topThree(current);

      if (previousTop3.length > 0 && !sameMembers(previousTop3, currentTop3)) {
        const previousIds = new Set(previousTop3.map(entry => entry.itemId));
        const currentIds = new Set(currentTop3.map(entry => entry.itemId));
        const entered = currentTop3.filter(entry => !previousIds.has(entry.itemId));
        const exited = previousTop3.filter(entry => !currentIds.has(entry.itemId));
        const lead = entered[0] ?? currentTop3[0] ?? previousTop3[0];

        events.push({
          ...base,
          id: this.createId(),
          kind: 'leaderboard_top3_change',
          subject: target.entityName,
          item: entryItem(lead, snapshot),
          previousTop3,
          currentTop3,
          entered: entered.map(entry => entry.itemId),
          exited: exited.map(entry => entry.itemId),
        });
      }
    }

    const payload: LeaderboardPayload = {
      kind: 'leaderboard',
      board: snapshot.board,
      maxRank: snapshot.maxRank,
      entries: current,
    };

    const record = nextRecord({
      entityKey: target.entityKey,
      sourceKind: target.source,
      previous: stored ? previous : null,
      payload,
      fingerprint: fingerprintOf(current.map(entry => [entry.itemId, String(entry.rank)])),
      changed: events.length > 0,
      now: detectedAt,
    });

    return { events, record, baseline: stored === null };
  }
}
