/**
 * Release Radar: Type Exports
 *
 * Import from './types' (or '../types') in other modules.
 */

// Watch model: entities, snapshots, state, events
export type {
  SourceKind,
  EntitySourceKind,
  PriorityTier,
  WatchedEntity,
  WatchTarget,
  ItemCategory,
  ReleaseStage,
  MetadataValue,
  ItemMetadata,
  Item,
  RankedEntry,
  ItemSnapshot,
  LeaderboardSnapshot,
  Snapshot,
  StoredItem,
  ItemSetPayload,
  LeaderboardPayload,
  StatePayload,
  StateRecord,
  EventKind,
  ItemEventKind,
  ItemEvent,
  LeaderboardEntryEvent,
  LeaderboardRankChangeEvent,
  LeaderboardTop3ChangeEvent,
  LeaderboardEvent,
  WatchEvent,
  RoutedEvent,
  DeliveryResult,
  Notifier,
} from './watch';
export {
  SourceKindSchema,
  ItemCategorySchema,
  ReleaseStageSchema,
  RankedEntrySchema,
  StoredItemSchema,
  ItemSetPayloadSchema,
  LeaderboardPayloadSchema,
  StatePayloadSchema,
  StateRecordSchema,
  EventKindSchema,
  ENTITY_SOURCE_KINDS,
  buildEntityKey,
} from './watch';

// Configuration
export type {
  LeaderboardBoard,
  WatchlistFile,
  PriorityModelConfig,
  LeaderboardConfig,
  NotificationConfig,
  SlackSettings,
  StateDriver,
  StateConfig,
  DiffConfig,
  Credentials,
  WatcherConfig,
} from './config';
export { LEADERBOARD_BOARDS, LeaderboardBoardSchema, WatchlistFileSchema } from './config';
