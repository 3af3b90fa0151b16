/**
 * Release Radar: Diff Engine
 *
 * Turns an item snapshot and the stored record for the same pair into
 * events. Pure: no I/O, the caller persists `record` afterwards.
 *
 * Identifiers are remembered in a rolling history, so an item that leaves
 * the upstream window and comes back is not reported twice.
 */

import { nanoid } from 'nanoid';
import type {
  DiffConfig,
  Item,
  ItemCategory,
  ItemEvent,
  ItemEventKind,
  ItemSetPayload,
  ItemSnapshot,
  StateRecord,
  StoredItem,
  WatchTarget,
} from '../types';
import { fingerprintOf } from '../lib/hash';
import { nextRecord, type DiffOutcome, type IdFactory } from './outcome';

// ============================================================
// CLASSIFICATION
// ============================================================

const NEW_ITEM_EVENT: Record<ItemCategory, ItemEventKind | null> = {
  repository: 'repo_created',
  commit: 'new_commit',
  release: 'new_release',
  model: 'new_model',
  paper: 'new_paper',
  article: 'news_article',
  ranked_entry: null,
};

/** Categories with one mutable fingerprint per identifier */
const UPDATABLE: ReadonlySet<ItemCategory> = new Set<ItemCategory>(['model']);

export function eventKindFor(category: ItemCategory): ItemEventKind {
  const kind = NEW_ITEM_EVENT[category];
  if (!kind) {
    throw new Error(`Items of category "${category}" belong to a leaderboard snapshot`);
  }
  return kind;
}

// ============================================================
// HELPERS
// ============================================================

function uniqueById(items: Item[]): Item[] {
  const seen = new Set<string>();
  return items.filter(item => {
    if (seen.has(item.id)) return false;
    seen.add(item.id);
    return true;
  });
}

function timeOf(item: Item): number | null {
  if (!item.timestamp) return null;
  const ms = Date.parse(item.timestamp);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Oldest first. Items without a usable timestamp go last, in snapshot order.
 */
function chronological(items: Item[]): Item[] {
  return items
    .map((item, index) => ({ item, index, time: timeOf(item) }))
    .sort((a, b) => {
      if (a.time === null && b.time === null) return a.index - b.index;
      if (a.time === null) return 1;
      if (b.time === null) return -1;
      return a.time - b.time || a.index - b.index;
    })
    .map(entry => entry.item);
}

function toStored(item: Item): StoredItem {
  const stored: StoredItem = { id: item.id, category: item.category, fingerprint: item.fingerprint };
  if (item.timestamp) stored.timestamp = item.timestamp;
  return stored;
}

function rollHistory(previous: string[], current: Item[], limit: number): string[] {
  const history = [...previous];
  const known = new Set(history);
  for (const item of current) {
    if (!known.has(item.id)) {
      history.push(item.id);
      known.add(item.id);
    }
  }
  return history.length > limit ? history.slice(history.length - limit) : history;
}

/**
 * Fingerprints of updatable items that dropped out of the snapshot but are
 * still in the history, so a hub blip cannot hide the next revision.
 */
function retainMissing(
  stored: ItemSetPayload | null,
  current: Item[],
  history: string[]
): Record<string, string> | undefined {
  if (!stored) return undefined;

  const present = new Set(current.map(item => item.id));
  const remembered = new Set(history);
  const retained: Record<string, string> = {};

  for (const [id, fingerprint] of Object.entries(stored.retained ?? {})) {
    if (!present.has(id) && remembered.has(id)) retained[id] = fingerprint;
  }
  for (const item of stored.items) {
    if (UPDATABLE.has(item.category) && !present.has(item.id) && remembered.has(item.id)) {
      retained[item.id] = item.fingerprint;
    }
  }

  return Object.keys(retained).length > 0 ? retained : undefined;
}

// ============================================================
// ENGINE
// ============================================================

export class DiffEngine {
  private readonly firstObservation: ReadonlySet<ItemCategory>;

  constructor(
    private readonly policy: DiffConfig,
    private readonly createId: IdFactory = nanoid
  ) {
    this.firstObservation = new Set(policy.notifyOnFirstObservation);
  }

  diff(
    previous: StateRecord | null,
    snapshot: ItemSnapshot,
    target: WatchTarget,
    now: Date = new Date()
  ): DiffOutcome {
    if (snapshot.source !== target.source) {
      throw new Error(`Snapshot from ${snapshot.source} handed to pair ${target.entityKey}`);
    }

    const detectedAt = now.toISOString();
    const items = uniqueById(snapshot.items);
    // A record of the wrong shape cannot be diffed against; start over
    const stored: ItemSetPayload | null = previous?.payload.kind === 'items' ? previous.payload : null;

    const fresh: Array<{ item: Item; previousFingerprint?: string }> = [];

    if (!stored) {
      for (const item of items) {
        eventKindFor(item.category);
        if (this.firstObservation.has(item.category)) fresh.push({ item });
      }
    } else {
      const seen = new Set(stored.seenIds);
      const fingerprints = new Map<string, string>();
      for (const [id, fingerprint] of Object.entries(stored.retained ?? {})) {
        fingerprints.set(id, fingerprint);
      }
      for (const item of stored.items) {
        seen.add(item.id);
        fingerprints.set(item.id, item.fingerprint);
      }

      for (const item of items) {
        eventKindFor(item.category);
        const before = fingerprints.get(item.id);
        if (!seen.has(item.id)) {
          fresh.push({ item });
        } else if (UPDATABLE.has(item.category) && before !== undefined && before !== item.fingerprint) {
          fresh.push({ item, previousFingerprint: before });
        }
      }
    }

    const order = chronological(fresh.map(f => f.item));
    const updates = new Map(fresh.map(f => [f.item.id, f.previousFingerprint]));

    const events: ItemEvent[] = order.map(item => {
      const previousFingerprint = updates.get(item.id);
      const event: ItemEvent = {
        id: this.createId(),
        kind: previousFingerprint !== undefined ? 'model_update' : eventKindFor(item.category),
        entityKey: target.entityKey,
        entityName: target.entityName,
        source: snapshot.source,
        subject: target.entityName,
        item,
        detectedAt,
      };
      if (previousFingerprint !== undefined) event.previousFingerprint = previousFingerprint;
      return event;
    });

    const payload: ItemSetPayload = {
      kind: 'items',
      items: items.map(toStored),
      seenIds: rollHistory(stored?.seenIds ?? [], items, this.policy.historyLimit),
    };
    const retained = retainMissing(stored, items, payload.seenIds);
    if (retained) payload.retained = retained;

    const record = nextRecord({
      entityKey: target.entityKey,
      sourceKind: snapshot.source,
      previous: stored ? previous : null,
      payload,
      fingerprint: fingerprintOf(items.map(item => [item.id, item.fingerprint])),
      changed: events.length > 0,
      now: detectedAt,
    });

    return { events, record, baseline: stored === null };
  }
}
