/**
 * Release Radar: Configuration Loader
 *
 * Reads the watch-list file, validates it with zod and merges in secrets
 * from the environment. Any problem is a ConfigError listing every issue;
 * the process should not start with a half-valid configuration.
 */

import 'dotenv/config';
import { readFile } from 'fs/promises';
import type { ZodIssue } from 'zod';
import {
  ENTITY_SOURCE_KINDS,
  EventKindSchema,
  LeaderboardBoardSchema,
  SourceKindSchema,
  WatchlistFileSchema,
  buildEntityKey,
} from '../types';
import type {
  LeaderboardBoard,
  LeaderboardConfig,
  WatchedEntity,
  WatcherConfig,
  WatchlistFile,
  WatchTarget,
} from '../types';
import { ConfigError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';

export const DEFAULT_CONFIG_PATH = 'watchlist.json';

const ALL_BOARDS: LeaderboardBoard[] = LeaderboardBoardSchema.options;

/** Channel names the environment can point at a dedicated webhook */
const CHANNEL_WEBHOOK_ENV: Record<string, string> = {
  leaderboard: 'SLACK_WEBHOOK_LEADERBOARD',
  announcements: 'SLACK_WEBHOOK_ANNOUNCEMENTS',
  launches: 'SLACK_WEBHOOK_LAUNCHES',
};

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Valid keys for notifications.event_routing.
 */
function isRoutingKey(key: string): boolean {
  return (
    EventKindSchema.safeParse(key).success ||
    SourceKindSchema.safeParse(key).success ||
    key === 'announced' ||
    key === 'launched'
  );
}

// ============================================================
// SECTIONS
// ============================================================

function resolveLeaderboards(file: WatchlistFile['leaderboards']): LeaderboardConfig {
  const { boards } = file;
  const isOn = (board: LeaderboardBoard): boolean => {
    if (Array.isArray(boards)) return boards.includes(board);
    return boards?.[board] ?? true;
  };

  const boardSettings: Record<LeaderboardBoard, boolean> = {
    'text-to-image': isOn('text-to-image'),
    'image-editing': isOn('image-editing'),
    'text-to-video': isOn('text-to-video'),
    'image-to-video': isOn('image-to-video'),
    'text-to-speech': isOn('text-to-speech'),
  };

  return {
    enabled: file.enabled,
    maxRank: file.max_rank,
    boards: ALL_BOARDS.filter(board => boardSettings[board]),
    boardSettings,
  };
}

function resolveEntities(models: WatchlistFile['models']): WatchedEntity[] {
  return models.map(model => ({
    name: model.name,
    sources: {
      github: model.github,
      huggingface: model.huggingface,
      modelscope: model.modelscope,
      arxiv: model.arxiv_query,
      news: model.news_keywords,
    },
    priority: model.priority,
    alwaysNotify: model.always_notify,
  }));
}

function resolveSlackChannels(file: Record<string, string>, env: NodeJS.ProcessEnv): Record<string, string> {
  const channels: Record<string, string> = {};
  for (const [name, value] of Object.entries(file)) {
    const target = nonEmpty(value);
    if (target) channels[name] = target;
  }
  // Environment wins over the file
  for (const [name, variable] of Object.entries(CHANNEL_WEBHOOK_ENV)) {
    const target = nonEmpty(env[variable]);
    if (target) channels[name] = target;
  }
  return channels;
}

// ============================================================
// PARSE
// ============================================================

/**
 * Validate a parsed watch-list document and resolve it against the environment.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): WatcherConfig {
  const parsed = WatchlistFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError('Invalid watch-list configuration', parsed.error.issues.map(formatIssue));
  }

  const file = parsed.data;
  const issues: string[] = [];

  const entities = resolveEntities(file.models);

  const seen = new Set<string>();
  entities.forEach((entity, index) => {
    const key = entity.name.toLowerCase();
    if (seen.has(key)) issues.push(`models.${index}.name: duplicate model name "${entity.name}"`);
    seen.add(key);

    if (!Object.values(entity.sources).some(Boolean)) {
      logger.warn('Model has no sources configured and will not be watched', { model: entity.name });
    }
  });

  for (const key of Object.keys(file.notifications.event_routing)) {
    if (!isRoutingKey(key)) {
      issues.push(`notifications.event_routing.${key}: not an event kind, release stage or source`);
    }
  }

  const supabaseUrl = nonEmpty(env.SUPABASE_URL);
  const supabaseKey = nonEmpty(env.SUPABASE_SERVICE_ROLE_KEY);
  if (file.state.driver === 'supabase' && (!supabaseUrl || !supabaseKey)) {
    issues.push('state.driver: "supabase" needs SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid watch-list configuration', issues);
  }

  return {
    checkIntervalHours: file.check_interval_hours,
    entities,
    priorityModels: file.priority_models.map(p => ({ name: p.name, mentionChannel: p.mention_channel })),
    leaderboards: resolveLeaderboards(file.leaderboards),
    notifications: {
      mentionChannelFor: file.notifications.mention_channel_for,
      eventRouting: file.notifications.event_routing,
      defaultChannel: file.notifications.default_channel,
      includeIcons: file.notifications.include_icons,
      includeTimestamp: file.notifications.include_timestamp,
    },
    slack: {
      webhookUrl: nonEmpty(env.SLACK_WEBHOOK_URL),
      botToken: nonEmpty(env.SLACK_BOT_TOKEN),
      channels: resolveSlackChannels(file.slack_channels, env),
    },
    state: {
      driver: file.state.driver,
      path: file.state.path,
      table: file.state.table,
      supabaseUrl,
      supabaseKey,
    },
    diff: {
      notifyOnFirstObservation: file.diff.notify_on_first_observation,
      historyLimit: file.diff.history_limit,
    },
    concurrency: file.scheduler.concurrency,
    watcherTimeoutMs: Math.round(file.watchers.timeout_seconds * 1000),
    maxItemsPerFetch: file.watchers.max_items,
    credentials: {
      githubToken: nonEmpty(env.GITHUB_TOKEN),
      huggingfaceToken: nonEmpty(env.HF_TOKEN),
      artificialAnalysisApiKey: nonEmpty(env.ARTIFICIAL_ANALYSIS_API_KEY),
    },
  };
}

/**
 * Load and validate the watch-list file.
 */
export async function loadConfig(path: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): Promise<WatcherConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${path}`, [describeError(error)]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON`, [describeError(error)]);
  }

  const config = parseConfig(raw, env);
  logger.info('Configuration loaded', {
    path,
    models: config.entities.length,
    boards: config.leaderboards.enabled ? config.leaderboards.boards.length : 0,
  });
  return config;
}

// ============================================================
// WATCH PAIRS
// ============================================================

/**
 * Every (entity, source) pair one sweep visits, in configuration order.
 */
export function buildWatchPairs(config: Pick<WatcherConfig, 'entities' | 'leaderboards'>): WatchTarget[] {
  const pairs: WatchTarget[] = [];

  for (const entity of config.entities) {
    for (const source of ENTITY_SOURCE_KINDS) {
      const identifier = entity.sources[source];
      if (!identifier) continue;
      pairs.push({
        entityKey: buildEntityKey(source, entity.name),
        entityName: entity.name,
        source,
        identifier,
      });
    }
  }

  if (config.leaderboards.enabled) {
    for (const board of config.leaderboards.boards) {
      pairs.push({
        entityKey: buildEntityKey('leaderboard', board),
        entityName: board,
        source: 'leaderboard',
        identifier: board,
        maxRank: config.leaderboards.maxRank,
      });
    }
  }

  return pairs;
}
