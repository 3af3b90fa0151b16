/**
 * Release Radar: Watch Types
 *
 * Entities, snapshots, persisted state and events.
 * Anything that is persisted or read back from storage has a zod schema;
 * in-memory only shapes are plain interfaces.
 */

import { z } from 'zod';

// ============================================================
// SOURCES
// ============================================================

export const SourceKindSchema = z.enum([
  'github',
  'huggingface',
  'modelscope',
  'arxiv',
  'news',
  'leaderboard',
]);
export type SourceKind = z.infer<typeof SourceKindSchema>;

/** Source kinds that watch a single model entity (everything except leaderboards). */
export type EntitySourceKind = Exclude<SourceKind, 'leaderboard'>;

export const ENTITY_SOURCE_KINDS: readonly EntitySourceKind[] = [
  'github',
  'huggingface',
  'modelscope',
  'arxiv',
  'news',
];

// ============================================================
// WATCHED ENTITY
// ============================================================

export type PriorityTier = 'normal' | 'high';

export interface WatchedEntity {
  name: string;
  /** Per-source identifier: repo slug, hub model id, search query or keywords */
  sources: Partial<Record<EntitySourceKind, string>>;
  priority: PriorityTier;
  /** Event kinds that always mention the channel for this entity */
  alwaysNotify: EventKind[];
}

/**
 * One (entity, source) pair as handed to a watcher.
 * For leaderboards the entity is the board and `identifier` is the board name.
 */
export interface WatchTarget {
  entityKey: string;
  entityName: string;
  source: SourceKind;
  identifier: string;
  maxRank?: number;
}

export function buildEntityKey(source: SourceKind, entityName: string): string {
  return `${source}:${entityName}`;
}

// ============================================================
// ITEMS
// ============================================================

export const ItemCategorySchema = z.enum([
  'repository',
  'commit',
  'release',
  'model',
  'paper',
  'article',
  'ranked_entry',
]);
export type ItemCategory = z.infer<typeof ItemCategorySchema>;

export const ReleaseStageSchema = z.enum(['announced', 'launched', 'unknown']);
export type ReleaseStage = z.infer<typeof ReleaseStageSchema>;

export type MetadataValue = string | number | boolean | null | string[];
export type ItemMetadata = Record<string, MetadataValue>;

export interface Item {
  id: string;
  category: ItemCategory;
  fingerprint: string;
  title: string;
  description?: string;
  url?: string;
  /** ISO-8601 */
  timestamp?: string;
  releaseStage?: ReleaseStage;
  metadata: ItemMetadata;
}

export const RankedEntrySchema = z.object({
  itemId: z.string(),
  name: z.string(),
  rank: z.number().int().positive(),
  score: z.number(),
  creator: z.string().optional(),
});
export type RankedEntry = z.infer<typeof RankedEntrySchema>;

// ============================================================
// SNAPSHOTS
// ============================================================

export interface ItemSnapshot {
  kind: 'items';
  source: EntitySourceKind;
  items: Item[];
  fetchedAt: string;
}

export interface LeaderboardSnapshot {
  kind: 'leaderboard';
  board: string;
  maxRank: number;
  /** Upstream order, truncated to maxRank */
  entries: RankedEntry[];
  url?: string;
  fetchedAt: string;
}

export type Snapshot = ItemSnapshot | LeaderboardSnapshot;

// ============================================================
// PERSISTED STATE
// ============================================================

export const StoredItemSchema = z.object({
  id: z.string(),
  category: ItemCategorySchema,
  fingerprint: z.string(),
  timestamp: z.string().optional(),
});
export type StoredItem = z.infer<typeof StoredItemSchema>;

export const ItemSetPayloadSchema = z.object({
  kind: z.literal('items'),
  items: z.array(StoredItemSchema),
  /** Every identifier already observed, oldest first, capped at the history limit */
  seenIds: z.array(z.string()),
  /** Last fingerprint of updatable items missing from the latest snapshot, by id */
  retained: z.record(z.string(), z.string()).optional(),
});
export type ItemSetPayload = z.infer<typeof ItemSetPayloadSchema>;

export const LeaderboardPayloadSchema = z.object({
  kind: z.literal('leaderboard'),
  board: z.string(),
  maxRank: z.number().int().positive(),
  entries: z.array(RankedEntrySchema),
});
export type LeaderboardPayload = z.infer<typeof LeaderboardPayloadSchema>;

export const StatePayloadSchema = z.discriminatedUnion('kind', [
  ItemSetPayloadSchema,
  LeaderboardPayloadSchema,
]);
export type StatePayload = z.infer<typeof StatePayloadSchema>;

export const StateRecordSchema = z.object({
  entityKey: z.string().min(1),
  sourceKind: SourceKindSchema,
  fingerprint: z.string().nullable(),
  payload: StatePayloadSchema,
  lastCheckedAt: z.string(),
  lastChangedAt: z.string().nullable(),
});
export type StateRecord = z.infer<typeof StateRecordSchema>;

// ============================================================
// EVENTS
// ============================================================

export const EventKindSchema = z.enum([
  'repo_created',
  'new_commit',
  'new_release',
  'new_model',
  'model_update',
  'new_paper',
  'news_article',
  'leaderboard_new_entry',
  'leaderboard_rank_change',
  'leaderboard_top3_change',
]);
export type EventKind = z.infer<typeof EventKindSchema>;

export type ItemEventKind = Exclude<
  EventKind,
  'leaderboard_new_entry' | 'leaderboard_rank_change' | 'leaderboard_top3_change'
>;

interface EventBase {
  id: string;
  entityKey: string;
  entityName: string;
  source: SourceKind;
  /** Model the event is about; the ranked model's name for leaderboard entries */
  subject: string;
  item: Item;
  detectedAt: string;
}

export interface ItemEvent extends EventBase {
  kind: ItemEventKind;
  previousFingerprint?: string;
}

export interface LeaderboardEntryEvent extends EventBase {
  kind: 'leaderboard_new_entry';
  board: string;
  entry: RankedEntry;
}

export interface LeaderboardRankChangeEvent extends EventBase {
  kind: 'leaderboard_rank_change';
  board: string;
  entry: RankedEntry;
  previousRank: number;
  currentRank: number;
  /** previousRank - currentRank: positive when the entry climbed */
  delta: number;
  previousScore: number;
  currentScore: number;
}

export interface LeaderboardTop3ChangeEvent extends EventBase {
  kind: 'leaderboard_top3_change';
  board: string;
  previousTop3: RankedEntry[];
  currentTop3: RankedEntry[];
  entered: string[];
  exited: string[];
}

export type LeaderboardEvent =
  | LeaderboardEntryEvent
  | LeaderboardRankChangeEvent
  | LeaderboardTop3ChangeEvent;

export type WatchEvent = Readonly<ItemEvent | LeaderboardEvent>;

// ============================================================
// ROUTING & DELIVERY
// ============================================================

export interface RoutedEvent {
  event: WatchEvent;
  channel: string;
  mentionChannel: boolean;
  priority: boolean;
}

export interface DeliveryResult {
  success: boolean;
  channel: string;
  error?: string;
  sentAt: string;
}

export interface Notifier {
  deliver(
    event: WatchEvent,
    channel: string,
    mention: boolean,
    priority?: boolean
  ): Promise<DeliveryResult>;
}
