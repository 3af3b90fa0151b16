/**
 * Release Radar: Leaderboard Watcher
 *
 * Artificial Analysis media leaderboards (image, video, speech).
 * One board per pair. Entries keep the API's order; ties are not re-sorted.
 * Rate limit is 1,000 requests/day, plenty for hourly sweeps.
 */

import { z } from 'zod';
import { LEADERBOARD_BOARDS, LeaderboardBoardSchema } from '../types';
import type { LeaderboardSnapshot, RankedEntry, WatchTarget } from '../types';
import { SourceWatcher, type WatcherOptions } from './base';

const API_BASE = 'https://artificialanalysis.ai/api/v2/data/media';
export const DEFAULT_MAX_RANK = 30;

const LeaderboardResponseSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      rank: z.number().int(),
      elo: z.number().nullable().optional(),
      model_creator: z.object({ name: z.string() }).nullable().optional(),
    })
  ),
});

export class LeaderboardWatcher extends SourceWatcher {
  readonly kind = 'leaderboard' as const;

  constructor(
    options: WatcherOptions,
    private readonly apiKey?: string
  ) {
    super(options);
  }

  async fetch(target: WatchTarget, signal: AbortSignal): Promise<LeaderboardSnapshot> {
    // Failing keeps the stored board intact; an empty snapshot would not
    if (!this.apiKey) {
      throw this.fail('ARTIFICIAL_ANALYSIS_API_KEY is not set', target);
    }

    const board = LeaderboardBoardSchema.safeParse(target.identifier);
    if (!board.success) {
      throw this.fail(`Unknown leaderboard "${target.identifier}"`, target);
    }

    const { endpoint, url } = LEADERBOARD_BOARDS[board.data];
    const maxRank = target.maxRank ?? DEFAULT_MAX_RANK;

    const response = await this.httpGet(`${API_BASE}${endpoint}`, target, {
      signal,
      headers: { Accept: 'application/json', 'x-api-key': this.apiKey },
    });

    const parsed = LeaderboardResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw this.fail(`Unexpected response shape for ${board.data}`, target);
    }

    // An empty board is an upstream hiccup, not a board everyone left
    if (parsed.data.data.length === 0) {
      throw this.fail(`Empty leaderboard returned for ${board.data}`, target);
    }

    const entries: RankedEntry[] = parsed.data.data
      .filter(model => model.rank >= 1 && model.rank <= maxRank)
      .map(model => ({
        itemId: model.id,
        name: model.name,
        rank: model.rank,
        score: model.elo ?? 0,
        creator: model.model_creator?.name,
      }));

    return {
      kind: 'leaderboard',
      board: board.data,
      maxRank,
      entries,
      url,
      fetchedAt: new Date().toISOString(),
    };
  }
}
