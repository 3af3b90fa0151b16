/**
 * Release Radar: Source Watcher Base
 *
 * Abstract base class for all source watchers.
 * A watcher turns one (entity, source) pair into a complete snapshot, or
 * fails. It never hands back a partial snapshot.
 */

import type { Snapshot, SourceKind, WatchTarget } from '../types';
import { FetchError, describeError, statusOf } from '../lib/errors';
import { logger } from '../lib/logger';

export const USER_AGENT = 'ReleaseRadar/1.0';

export interface WatcherOptions {
  timeoutMs: number;
  maxItems: number;
}

export type FetchResult =
  | { ok: true; snapshot: Snapshot }
  | { ok: false; error: FetchError };

/**
 * Abstract base class for source watchers.
 */
export abstract class SourceWatcher {
  abstract readonly kind: SourceKind;

  protected logger = logger.child({ watcher: this.constructor.name });

  constructor(protected readonly options: WatcherOptions) {}

  /**
   * Fetch the current state for one pair.
   * Must be implemented by each watcher. Throwing is the only way to fail.
   */
  abstract fetch(target: WatchTarget, signal: AbortSignal): Promise<Snapshot>;

  /**
   * Execute fetch with a timeout, error conversion and logging.
   */
  async safeFetch(target: WatchTarget): Promise<FetchResult> {
    const startTime = Date.now();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const snapshot = await this.fetch(target, controller.signal);
      this.assertComplete(snapshot, target);

      this.logger.debug('Fetch completed', {
        entityKey: target.entityKey,
        size: snapshot.kind === 'items' ? snapshot.items.length : snapshot.entries.length,
        durationMs: Date.now() - startTime,
      });

      return { ok: true, snapshot };
    } catch (error) {
      const fetchError = controller.signal.aborted
        ? this.fail(`Timed out after ${this.options.timeoutMs}ms`, target)
        : this.toFetchError(error, target);

      this.logger.warn('Fetch failed', {
        entityKey: target.entityKey,
        status: fetchError.status,
        retryable: fetchError.retryable,
        error: fetchError.message,
      });

      return { ok: false, error: fetchError };
    } finally {
      clearTimeout(timer);
    }
  }

  // ============================================================
  // HELPERS FOR SUBCLASSES
  // ============================================================

  /**
   * GET a URL. Non-2xx statuses throw a FetchError unless listed in `accept`.
   */
  protected async httpGet(
    url: string,
    target: WatchTarget,
    init: { signal: AbortSignal; headers?: Record<string, string>; accept?: number[] }
  ): Promise<Response> {
    const response = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT, ...init.headers },
      signal: init.signal,
    });

    if (!response.ok && !init.accept?.includes(response.status)) {
      throw new FetchError(`${this.kind} responded ${response.status} ${response.statusText}`.trim(), {
        source: this.kind,
        entityKey: target.entityKey,
        status: response.status,
      });
    }

    return response;
  }

  protected fail(message: string, target: WatchTarget, status?: number): FetchError {
    return new FetchError(message, { source: this.kind, entityKey: target.entityKey, status });
  }

  private assertComplete(snapshot: Snapshot, target: WatchTarget): void {
    const expected = this.kind === 'leaderboard' ? 'leaderboard' : 'items';
    if (snapshot.kind !== expected || (snapshot.kind === 'items' && snapshot.source !== this.kind)) {
      throw this.fail(`Watcher returned a ${snapshot.kind} snapshot for ${target.entityKey}`, target);
    }
  }

  private toFetchError(error: unknown, target: WatchTarget): FetchError {
    if (error instanceof FetchError) return error;
    return new FetchError(describeError(error), {
      source: this.kind,
      entityKey: target.entityKey,
      status: statusOf(error),
      cause: error,
    });
  }
}

// ============================================================
// REGISTRY
// ============================================================

/**
 * Watchers by source kind. One instance per process, passed to the scheduler.
 */
export class WatcherRegistry {
  private readonly watchers = new Map<SourceKind, SourceWatcher>();

  register(watcher: SourceWatcher): this {
    this.watchers.set(watcher.kind, watcher);
    logger.debug('Watcher registered', { kind: watcher.kind });
    return this;
  }

  get(kind: SourceKind): SourceWatcher | undefined {
    return this.watchers.get(kind);
  }

  kinds(): SourceKind[] {
    return [...this.watchers.keys()];
  }
}

// ============================================================
// TEXT HELPERS
// ============================================================

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function firstLine(text: string): string {
  return text.split('\n')[0]?.trim() ?? '';
}
