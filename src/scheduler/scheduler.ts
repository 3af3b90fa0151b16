/**
 * Release Radar: Scheduler
 *
 * Drives the poll cycle. Two states: idle and polling.
 * One sweep visits every (entity, source) pair:
 *   fetch -> read state -> diff -> route -> deliver -> persist
 *
 * Events are delivered before the new state is written. If the write then
 * fails the same events come back next sweep: a duplicate notification
 * instead of a missed one. A failing pair never stops the others.
 */

import type { RoutedEvent, StateRecord, WatchTarget, Notifier } from '../types';
import { describeError } from '../lib/errors';
import { logger, timeOperation } from '../lib/logger';
import { KeyedLock } from '../lib/keyed-lock';
import { runPool } from '../lib/concurrency';
import type { StateStore } from '../state/store';
import type { DiffEngine } from '../diff/engine';
import type { LeaderboardDiffEngine } from '../diff/leaderboard';
import type { DiffOutcome } from '../diff/outcome';
import type { EventRouter } from '../routing/router';
import type { WatcherRegistry } from '../watchers/base';

// ============================================================
// TYPES
// ============================================================

export type SchedulerState = 'idle' | 'polling';

export type PairStatus =
  | 'baseline'
  | 'changed'
  | 'unchanged'
  | 'fetch_failed'
  | 'state_read_failed'
  | 'diff_failed'
  | 'route_failed'
  | 'persist_failed';

const FAILED_STATUSES: ReadonlySet<PairStatus> = new Set<PairStatus>([
  'fetch_failed',
  'state_read_failed',
  'diff_failed',
  'route_failed',
  'persist_failed',
]);

export interface PairOutcome {
  entityKey: string;
  source: WatchTarget['source'];
  status: PairStatus;
  events: number;
  delivered: number;
  deliveryFailures: number;
  error?: string;
  durationMs: number;
}

export interface SweepReport {
  startedAt: string;
  completedAt: string;
  durationMs: number;
  pairs: PairOutcome[];
  events: RoutedEvent[];
  /** Stopped before every pair was visited */
  interrupted: boolean;
  dryRun: boolean;
}

export interface SchedulerStatus {
  state: SchedulerState;
  /** Timer armed (daemon mode) */
  running: boolean;
  sweeps: number;
  lastReport: SweepReport | null;
}

export interface SchedulerDeps {
  store: StateStore;
  watchers: WatcherRegistry;
  diffEngine: DiffEngine;
  leaderboardEngine: LeaderboardDiffEngine;
  router: EventRouter;
  notifier: Notifier;
}

export interface SchedulerOptions {
  pairs: WatchTarget[];
  intervalMs: number;
  concurrency: number;
  /** Fetch and diff only: nothing is delivered or persisted */
  dryRun?: boolean;
  now?: () => Date;
}

export function isFailure(status: PairStatus): boolean {
  return FAILED_STATUSES.has(status);
}

/**
 * A sweep is healthy unless every pair it visited failed.
 */
export function isHealthySweep(report: SweepReport): boolean {
  if (report.pairs.length === 0) return true;
  return report.pairs.some(pair => !isFailure(pair.status));
}

// ============================================================
// SCHEDULER
// ============================================================

export class Scheduler {
  private state: SchedulerState = 'idle';
  private current: Promise<SweepReport> | null = null;
  private controller: AbortController | null = null;
  private timer: NodeJS.Timeout | null = null;
  private sweeps = 0;
  private lastReport: SweepReport | null = null;

  private readonly lock = new KeyedLock();
  private readonly log = logger.child({ component: 'Scheduler' });
  private readonly now: () => Date;

  constructor(
    private readonly deps: SchedulerDeps,
    private readonly options: SchedulerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one sweep. A call while a sweep is in flight joins that sweep.
   */
  runOnce(): Promise<SweepReport> {
    if (this.current) return this.current;

    const controller = new AbortController();
    this.controller = controller;
    this.state = 'polling';

    this.current = this.sweep(controller.signal).finally(() => {
      this.state = 'idle';
      this.current = null;
      this.controller = null;
    });
    return this.current;
  }

  /**
   * Sweep now, then every interval. Ticks that land mid-sweep are skipped.
   */
  start(): void {
    if (this.timer) return;

    this.log.info('Scheduler started', {
      pairs: this.options.pairs.length,
      intervalMinutes: Math.round(this.options.intervalMs / 60_000),
    });

    this.tick();
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
  }

  /**
   * Disarm the timer, interrupt the sweep between pairs and wait for
   * in-flight pairs to finish.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    this.controller?.abort();
    if (this.current) {
      await this.current;
    }
    this.log.info('Scheduler stopped', { sweeps: this.sweeps });
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      running: this.timer !== null,
      sweeps: this.sweeps,
      lastReport: this.lastReport,
    };
  }

  // ============================================================
  // SWEEP
  // ============================================================

  private tick(): void {
    if (this.state === 'polling') {
      this.log.warn('Previous sweep still running, skipping tick');
      return;
    }

    this.runOnce().catch((error: unknown) => {
      this.log.error('Sweep crashed', { error: describeError(error) });
    });
  }

  private async sweep(signal: AbortSignal): Promise<SweepReport> {
    const started = this.now();
    const startMs = Date.now();
    const dryRun = this.options.dryRun ?? false;

    this.log.info('Sweep started', { pairs: this.options.pairs.length, dryRun });

    const events: RoutedEvent[] = [];
    const { results, interrupted } = await runPool(
      this.options.pairs,
      this.options.concurrency,
      target => this.lock.run(target.entityKey, () => this.processPair(target, events, dryRun)),
      signal
    );

    const report: SweepReport = {
      startedAt: started.toISOString(),
      completedAt: this.now().toISOString(),
      durationMs: Date.now() - startMs,
      pairs: results,
      events,
      interrupted,
      dryRun,
    };

    this.sweeps++;
    this.lastReport = report;

    const failed = results.filter(pair => isFailure(pair.status)).length;
    this.log.info('Sweep completed', {
      pairs: results.length,
      failed,
      events: events.length,
      interrupted,
      durationMs: report.durationMs,
    });

    return report;
  }

  private async processPair(target: WatchTarget, sink: RoutedEvent[], dryRun: boolean): Promise<PairOutcome> {
    const startMs = Date.now();
    const log = this.log.child({ entityKey: target.entityKey });
    const outcome = (status: PairStatus, extra: Partial<PairOutcome> = {}): PairOutcome => ({
      entityKey: target.entityKey,
      source: target.source,
      status,
      events: 0,
      delivered: 0,
      deliveryFailures: 0,
      durationMs: Date.now() - startMs,
      ...extra,
    });

    const watcher = this.deps.watchers.get(target.source);
    if (!watcher) {
      log.error('No watcher registered for source', { source: target.source });
      return outcome('fetch_failed', { error: `No watcher for ${target.source}` });
    }

    // 1. Fetch. A failed fetch leaves the stored record untouched.
    const fetched = await watcher.safeFetch(target);
    if (!fetched.ok) {
      return outcome('fetch_failed', { error: fetched.error.message });
    }

    // 2. Previous state
    let previous: StateRecord | null;
    try {
      previous = await this.deps.store.get(target.entityKey);
    } catch (error) {
      log.error('State read failed', { error: describeError(error) });
      return outcome('state_read_failed', { error: describeError(error) });
    }

    // 3. Diff
    let diff: DiffOutcome;
    try {
      const { snapshot } = fetched;
      const now = this.now();
      diff =
        snapshot.kind === 'leaderboard'
          ? this.deps.leaderboardEngine.diff(previous, snapshot, target, now)
          : this.deps.diffEngine.diff(previous, snapshot, target, now);
    } catch (error) {
      log.error('Diff failed', { error: describeError(error) });
      return outcome('diff_failed', { error: describeError(error) });
    }

    // 4. Route and deliver, oldest event first
    let routed: RoutedEvent[];
    try {
      routed = diff.events.map(event => this.deps.router.route(event));
    } catch (error) {
      log.error('Routing failed', { error: describeError(error) });
      return outcome('route_failed', { events: diff.events.length, error: describeError(error) });
    }
    sink.push(...routed);

    let delivered = 0;
    let deliveryFailures = 0;
    if (!dryRun) {
      for (const { event, channel, mentionChannel, priority } of routed) {
        try {
          const result = await this.deps.notifier.deliver(event, channel, mentionChannel, priority);
          if (result.success) {
            delivered++;
          } else {
            deliveryFailures++;
            log.warn('Delivery failed', { kind: event.kind, channel, error: result.error });
          }
        } catch (error) {
          deliveryFailures++;
          log.warn('Delivery failed', { kind: event.kind, channel, error: describeError(error) });
        }
      }
    }

    const counts = { events: routed.length, delivered, deliveryFailures };

    // 5. Persist
    if (!dryRun) {
      try {
        await timeOperation('State write', () => this.deps.store.put(target.entityKey, diff.record), log);
      } catch (error) {
        log.error('State write failed; events will be re-detected next sweep', {
          error: describeError(error),
        });
        return outcome('persist_failed', { ...counts, error: describeError(error) });
      }
    }

    const status: PairStatus = diff.baseline ? 'baseline' : routed.length > 0 ? 'changed' : 'unchanged';
    if (routed.length > 0) {
      log.info('Changes detected', { events: routed.length, kinds: routed.map(r => r.event.kind) });
    }
    return outcome(status, counts);
  }
}
