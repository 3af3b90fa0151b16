/**
 * Release Radar: Configuration Types
 *
 * Schema for the watch-list file. Keys stay snake_case to match the
 * file on disk; `loadConfig` maps the parsed file onto `WatcherConfig`.
 */

import { z } from 'zod';
import { EventKindSchema, ItemCategorySchema } from './watch';
import type { EventKind, ItemCategory, WatchedEntity } from './watch';

// ============================================================
// LEADERBOARD BOARDS
// ============================================================

export const LEADERBOARD_BOARDS = {
  'text-to-image': {
    endpoint: '/text-to-image',
    url: 'https://artificialanalysis.ai/image/leaderboard/text-to-image',
  },
  'image-editing': {
    endpoint: '/image-editing',
    url: 'https://artificialanalysis.ai/image/leaderboard/editing',
  },
  'text-to-video': {
    endpoint: '/text-to-video',
    url: 'https://artificialanalysis.ai/video/leaderboard/text-to-video',
  },
  'image-to-video': {
    endpoint: '/image-to-video',
    url: 'https://artificialanalysis.ai/video/leaderboard/image-to-video',
  },
  'text-to-speech': {
    endpoint: '/text-to-speech',
    url: 'https://artificialanalysis.ai/speech/leaderboard/text-to-speech',
  },
} as const;

export type LeaderboardBoard = keyof typeof LEADERBOARD_BOARDS;

export const LeaderboardBoardSchema = z.enum([
  'text-to-image',
  'image-editing',
  'text-to-video',
  'image-to-video',
  'text-to-speech',
]);

// ============================================================
// FILE SCHEMA
// ============================================================

export const ModelFileSchema = z.object({
  name: z.string().trim().min(1, 'Model name cannot be empty'),
  github: z
    .string()
    .regex(/^[\w.-]+\/[\w.-]+$/, 'GitHub repository must be "owner/name"')
    .optional(),
  huggingface: z.string().min(1).optional(),
  modelscope: z.string().min(1).optional(),
  arxiv_query: z.string().min(1).optional(),
  news_keywords: z.string().min(1).optional(),
  priority: z.enum(['normal', 'high']).default('normal'),
  always_notify: z.array(EventKindSchema).default([]),
});

export const PriorityModelFileSchema = z.object({
  name: z.string().trim().min(1),
  mention_channel: z.boolean().default(true),
});

export const LeaderboardsFileSchema = z.object({
  enabled: z.boolean().default(true),
  max_rank: z.number().int().positive().default(30),
  // Either { "text-to-image": true, ... } or ["text-to-image", ...]
  boards: z
    .union([z.record(LeaderboardBoardSchema, z.boolean()), z.array(LeaderboardBoardSchema)])
    .optional(),
});

export const NotificationsFileSchema = z.object({
  mention_channel_for: z.array(EventKindSchema).default(['new_release', 'new_model']),
  event_routing: z.record(z.string(), z.string().min(1)).default({}),
  default_channel: z.string().min(1).default('default'),
  include_icons: z.boolean().default(true),
  include_timestamp: z.boolean().default(true),
});

export const StateFileSchema = z.object({
  driver: z.enum(['file', 'supabase', 'memory']).default('file'),
  path: z.string().min(1).default('data/watcher-state.json'),
  table: z.string().min(1).default('watcher_states'),
});

export const DiffFileSchema = z.object({
  notify_on_first_observation: z.array(ItemCategorySchema).default([]),
  history_limit: z.number().int().positive().default(500),
});

export const WatchlistFileSchema = z.object({
  check_interval_hours: z.number().positive().default(1),
  models: z.array(ModelFileSchema).default([]),
  priority_models: z.array(PriorityModelFileSchema).default([]),
  leaderboards: LeaderboardsFileSchema.default({}),
  notifications: NotificationsFileSchema.default({}),
  slack_channels: z.record(z.string(), z.string()).default({}),
  state: StateFileSchema.default({}),
  diff: DiffFileSchema.default({}),
  scheduler: z
    .object({ concurrency: z.number().int().positive().default(4) })
    .default({}),
  watchers: z
    .object({
      timeout_seconds: z.number().positive().default(30),
      max_items: z.number().int().positive().default(10),
    })
    .default({}),
});
export type WatchlistFile = z.infer<typeof WatchlistFileSchema>;

// ============================================================
// RESOLVED CONFIGURATION
// ============================================================

export interface PriorityModelConfig {
  name: string;
  mentionChannel: boolean;
}

export interface LeaderboardConfig {
  enabled: boolean;
  maxRank: number;
  boards: LeaderboardBoard[];
  boardSettings: Record<LeaderboardBoard, boolean>;
}

export interface NotificationConfig {
  mentionChannelFor: EventKind[];
  eventRouting: Record<string, string>;
  defaultChannel: string;
  includeIcons: boolean;
  includeTimestamp: boolean;
}

export interface SlackSettings {
  webhookUrl?: string;
  botToken?: string;
  /** Channel name to webhook URL (webhook mode) or Slack channel (bot mode) */
  channels: Record<string, string>;
}

export type StateDriver = 'file' | 'supabase' | 'memory';

export interface StateConfig {
  driver: StateDriver;
  path: string;
  table: string;
  supabaseUrl?: string;
  supabaseKey?: string;
}

export interface DiffConfig {
  notifyOnFirstObservation: ItemCategory[];
  historyLimit: number;
}

export interface Credentials {
  githubToken?: string;
  huggingfaceToken?: string;
  artificialAnalysisApiKey?: string;
}

export interface WatcherConfig {
  checkIntervalHours: number;
  entities: WatchedEntity[];
  priorityModels: PriorityModelConfig[];
  leaderboards: LeaderboardConfig;
  notifications: NotificationConfig;
  slack: SlackSettings;
  state: StateConfig;
  diff: DiffConfig;
  concurrency: number;
  watcherTimeoutMs: number;
  maxItemsPerFetch: number;
  credentials: Credentials;
}
