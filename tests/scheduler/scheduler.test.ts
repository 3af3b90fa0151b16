/**
 * Tests for the Scheduler
 */

import { describe, it, expect } from 'vitest';
import { Scheduler, isFailure, isHealthySweep, type SweepReport } from '../../src/scheduler/scheduler';
import { SourceWatcher, WatcherRegistry } from '../../src/watchers/base';
import { DiffEngine } from '../../src/diff/engine';
import { LeaderboardDiffEngine } from '../../src/diff/leaderboard';
import { EventRouter, type RoutingTable } from '../../src/routing/router';
import { parseConfig } from '../../src/config/loader';
import { MemoryStateStore } from '../../src/state/memory-store';
import { PersistenceError } from '../../src/lib/errors';
import type { StateStore } from '../../src/state/store';
import type {
  DeliveryResult,
  DiffConfig,
  Notifier,
  RoutedEvent,
  Snapshot,
  SourceKind,
  StateRecord,
  WatchEvent,
  WatchTarget,
} from '../../src/types';
import {
  BOARD_TARGET,
  NOW,
  makeBoard,
  makeEntry,
  makeItem,
  makeItemSnapshot,
  makeRecord,
  makeTarget,
  sequentialIds,
} from '../helpers';

// ============================================================
// FAKES
// ============================================================

class ScriptedWatcher extends SourceWatcher {
  calls = 0;

  constructor(
    readonly kind: SourceKind,
    private readonly respond: (target: WatchTarget) => Promise<Snapshot>
  ) {
    super({ timeoutMs: 1000, maxItems: 10 });
  }

  fetch(target: WatchTarget): Promise<Snapshot> {
    this.calls++;
    return this.respond(target);
  }
}

class RecordingNotifier implements Notifier {
  readonly deliveries: Array<{ event: WatchEvent; channel: string; mention: boolean }> = [];

  constructor(private readonly outcome: 'ok' | 'reject' | 'throw' = 'ok') {}

  async deliver(event: WatchEvent, channel: string, mention: boolean): Promise<DeliveryResult> {
    this.deliveries.push({ event, channel, mention });
    if (this.outcome === 'throw') throw new Error('socket hang up');
    const sentAt = NOW.toISOString();
    return this.outcome === 'ok'
      ? { success: true, channel, sentAt }
      : { success: false, channel, error: 'channel_not_found', sentAt };
  }
}

class ReadOnlyStore extends MemoryStateStore {
  puts = 0;

  async put(entityKey: string): Promise<void> {
    this.puts++;
    throw new PersistenceError('disk full', { operation: 'put', entityKey });
  }
}

class UnreadableStore extends MemoryStateStore {
  async get(entityKey: string): Promise<StateRecord | null> {
    throw new PersistenceError('connection reset', { operation: 'get', entityKey });
  }
}

const GITHUB = makeTarget();
const NEWS = makeTarget({ entityKey: 'news:Alpha', source: 'news', identifier: 'alpha model' });

const commits = () =>
  Promise.resolve(
    makeItemSnapshot([
      makeItem({ id: 'sha-1' }),
      makeItem({ id: 'sha-2', timestamp: '2026-03-01T10:00:00Z' }),
    ])
  );

const ROUTING: RoutingTable = {
  notifications: {
    mentionChannelFor: ['new_release'],
    eventRouting: { leaderboard: 'leaderboard' },
    defaultChannel: 'default',
    includeIcons: true,
    includeTimestamp: true,
  },
  priorityModels: [],
  entities: [],
};

class BrokenRouter extends EventRouter {
  route(): RoutedEvent {
    throw new Error('no route');
  }
}

function setup(params: {
  pairs: WatchTarget[];
  watchers: SourceWatcher[];
  store?: StateStore;
  notifier?: RecordingNotifier;
  dryRun?: boolean;
  concurrency?: number;
  diff?: DiffConfig;
  router?: EventRouter;
}) {
  const store = params.store ?? new MemoryStateStore([makeRecord()]);
  const notifier = params.notifier ?? new RecordingNotifier();
  const registry = new WatcherRegistry();
  params.watchers.forEach(watcher => registry.register(watcher));

  const scheduler = new Scheduler(
    {
      store,
      watchers: registry,
      diffEngine: new DiffEngine(
        params.diff ?? { notifyOnFirstObservation: ['repository'], historyLimit: 500 },
        sequentialIds()
      ),
      leaderboardEngine: new LeaderboardDiffEngine(sequentialIds('lb')),
      router: params.router ?? new EventRouter(ROUTING),
      notifier,
    },
    {
      pairs: params.pairs,
      intervalMs: 60_000,
      concurrency: params.concurrency ?? 2,
      dryRun: params.dryRun,
      now: () => NOW,
    }
  );

  return { scheduler, store, notifier };
}

function pairOf(report: SweepReport, entityKey: string) {
  return report.pairs.find(pair => pair.entityKey === entityKey);
}

// ============================================================
// TESTS
// ============================================================

describe('Scheduler', () => {
  describe('runOnce', () => {
    it('should deliver new events and then persist the new record', async () => {
      const { scheduler, store, notifier } = setup({
        pairs: [GITHUB],
        watchers: [new ScriptedWatcher('github', commits)],
      });

      const report = await scheduler.runOnce();

      expect(report.pairs).toHaveLength(1);
      expect(report.pairs[0]).toMatchObject({
        entityKey: 'github:Alpha',
        source: 'github',
        status: 'changed',
        events: 1,
        delivered: 1,
        deliveryFailures: 0,
      });
      expect(report.events.map(r => [r.event.id, r.event.kind, r.event.item.id, r.channel])).toEqual([
        ['evt-1', 'new_commit', 'sha-2', 'default'],
      ]);
      expect(notifier.deliveries.map(d => d.event.id)).toEqual(['evt-1']);

      const record = await store.get('github:Alpha');
      expect(record?.payload).toEqual({
        kind: 'items',
        items: [
          { id: 'sha-1', category: 'commit', fingerprint: 'sha-1' },
          { id: 'sha-2', category: 'commit', fingerprint: 'sha-2', timestamp: '2026-03-01T10:00:00Z' },
        ],
        seenIds: ['sha-1', 'sha-2'],
      });
      expect(record?.lastChangedAt).toBe(NOW.toISOString());
    });

    it('should report nothing on the next sweep over the same upstream state', async () => {
      const { scheduler, notifier } = setup({
        pairs: [GITHUB],
        watchers: [new ScriptedWatcher('github', commits)],
      });

      await scheduler.runOnce();
      const second = await scheduler.runOnce();

      expect(second.pairs[0].status).toBe('unchanged');
      expect(second.events).toEqual([]);
      expect(notifier.deliveries).toHaveLength(1);
    });

    it('should record a silent baseline for a never-seen pair', async () => {
      const store = new MemoryStateStore();
      const { scheduler, notifier } = setup({
        pairs: [GITHUB],
        watchers: [new ScriptedWatcher('github', commits)],
        store,
      });

      const report = await scheduler.runOnce();

      expect(report.pairs[0]).toMatchObject({ status: 'baseline', events: 0 });
      expect(notifier.deliveries).toEqual([]);
      expect(store.size).toBe(1);
    });

    it('should keep going when one pair fails to fetch', async () => {
      const { scheduler, store } = setup({
        pairs: [NEWS, GITHUB],
        watchers: [
          new ScriptedWatcher('news', () => Promise.reject(new Error('feed down'))),
          new ScriptedWatcher('github', commits),
        ],
      });

      const report = await scheduler.runOnce();

      expect(pairOf(report, 'news:Alpha')).toMatchObject({ status: 'fetch_failed', error: 'feed down' });
      expect(pairOf(report, 'github:Alpha')).toMatchObject({ status: 'changed', delivered: 1 });
      expect(await store.get('news:Alpha')).toBeNull();
      expect(isHealthySweep(report)).toBe(true);
    });

    it('should fail a pair whose source has no watcher', async () => {
      const { scheduler } = setup({ pairs: [GITHUB], watchers: [] });

      const report = await scheduler.runOnce();

      expect(report.pairs[0]).toMatchObject({ status: 'fetch_failed', error: 'No watcher for github' });
      expect(isHealthySweep(report)).toBe(false);
    });

    it('should fail a pair whose state cannot be read', async () => {
      const { scheduler, notifier } = setup({
        pairs: [GITHUB],
        watchers: [new ScriptedWatcher('github', commits)],
        store: new UnreadableStore(),
      });

      const report = await scheduler.runOnce();

      expect(report.pairs[0]).toMatchObject({ status: 'state_read_failed', error: 'connection reset' });
      expect(notifier.deliveries).toEqual([]);
    });

    it('should fail a pair whose snapshot cannot be diffed', async () => {
      const { scheduler, store } = setup({
        pairs: [GITHUB],
        watchers: [
          new ScriptedWatcher('github', async () =>
            makeItemSnapshot([makeItem({ id: 'x', category: 'ranked_entry' })])
          ),
        ],
      });

      const report = await scheduler.runOnce();

      expect(report.pairs[0]).toMatchObject({
        status: 'diff_failed',
        error: 'Items of category "ranked_entry" belong to a leaderboard snapshot',
      });
      expect(await store.get('github:Alpha')).toEqual(makeRecord());
    });

    it('should stay silent when a reset store sees the same repository again', async () => {
      const store = new MemoryStateStore();
      const snapshot = () =>
        Promise.resolve(
          makeItemSnapshot([makeItem({ id: 'repo:alpha-org/alpha', category: 'repository' }), makeItem({ id: 'sha-1' })])
        );
      const { scheduler, notifier } = setup({
        pairs: [GITHUB],
        watchers: [new ScriptedWatcher('github', snapshot)],
        store,
        diff: parseConfig({}, {}).diff,
      });

      const first = await scheduler.runOnce();
      await store.reset();
      const second = await scheduler.runOnce();

      expect(first.pairs[0]).toMatchObject({ status: 'baseline', events: 0 });
      expect(second.pairs[0]).toMatchObject({ status: 'baseline', events: 0 });
      expect(second.events).toEqual([]);
      expect(notifier.deliveries).toEqual([]);
      expect(store.size).toBe(1);
      expect((await store.get('github:Alpha'))?.payload).toEqual({
        kind: 'items',
        items: [
          { id: 'repo:alpha-org/alpha', category: 'repository', fingerprint: 'repo:alpha-org/alpha' },
          { id: 'sha-1', category: 'commit', fingerprint: 'sha-1' },
        ],
        seenIds: ['repo:alpha-org/alpha', 'sha-1'],
      });
    });

    it('should fail only the pair whose events cannot be routed', async () => {
      const { scheduler, store, notifier } = setup({
        pairs: [GITHUB, NEWS],
        watchers: [
          new ScriptedWatcher('github', commits),
          new ScriptedWatcher('news', async () => makeItemSnapshot([], { source: 'news' })),
        ],
        router: new BrokenRouter(ROUTING),
      });

      const report = await scheduler.runOnce();

      expect(pairOf(report, 'github:Alpha')).toMatchObject({ status: 'route_failed', events: 1, error: 'no route' });
      expect(pairOf(report, 'news:Alpha')).toMatchObject({ status: 'baseline', events: 0 });
      expect(report.events).toEqual([]);
      expect(notifier.deliveries).toEqual([]);
      expect(await store.get('github:Alpha')).toEqual(makeRecord());
      expect(isFailure('route_failed')).toBe(true);
    });
  });

  describe('delivery and persistence', () => {
    it('should still persist when a delivery is rejected', async () => {
      const { scheduler, store } = setup({
        pairs: [GITHUB],
        watchers: [new ScriptedWatcher('github', commits)],
        notifier: new RecordingNotifier('reject'),
      });

      const report = await scheduler.runOnce();

      expect(report.pairs[0]).toMatchObject({ status: 'changed', delivered: 0, deliveryFailures: 1 });
      expect((await store.get('github:Alpha'))?.lastChangedAt).toBe(NOW.toISOString());
    });

    it('should count a throwing notifier as a failed delivery', async () => {
      const { scheduler } = setup({
        pairs: [GITHUB],
        watchers: [new ScriptedWatcher('github', commits)],
        notifier: new RecordingNotifier('throw'),
      });

      const report = await scheduler.runOnce();

      expect(report.pairs[0]).toMatchObject({ status: 'changed', deliveryFailures: 1 });
    });

    it('should deliver again next sweep when the record cannot be written', async () => {
      const store = new ReadOnlyStore([makeRecord()]);
      const { scheduler, notifier } = setup({
        pairs: [GITHUB],
        watchers: [new ScriptedWatcher('github', commits)],
        store,
      });

      const first = await scheduler.runOnce();
      await scheduler.runOnce();

      expect(first.pairs[0]).toMatchObject({ status: 'persist_failed', delivered: 1, error: 'disk full' });
      expect(notifier.deliveries.map(d => [d.event.id, d.event.item.id])).toEqual([
        ['evt-1', 'sha-2'],
        ['evt-2', 'sha-2'],
      ]);
      expect(store.puts).toBe(2);
    });

    it('should neither deliver nor persist on a dry run', async () => {
      const store = new ReadOnlyStore([makeRecord()]);
      const { scheduler, notifier } = setup({
        pairs: [GITHUB],
        watchers: [new ScriptedWatcher('github', commits)],
        store,
        dryRun: true,
      });

      const report = await scheduler.runOnce();

      expect(report.dryRun).toBe(true);
      expect(report.pairs[0]).toMatchObject({ status: 'changed', events: 1, delivered: 0 });
      expect(report.events.map(r => r.event.kind)).toEqual(['new_commit']);
      expect(notifier.deliveries).toEqual([]);
      expect(store.puts).toBe(0);
    });
  });

  describe('leaderboards', () => {
    it('should route rank changes to the leaderboard channel', async () => {
      let board = makeBoard([makeEntry('A', 1), makeEntry('B', 2)]);
      const { scheduler, notifier } = setup({
        pairs: [BOARD_TARGET],
        watchers: [new ScriptedWatcher('leaderboard', async () => board)],
        store: new MemoryStateStore(),
      });

      const baseline = await scheduler.runOnce();
      board = makeBoard([makeEntry('B', 1), makeEntry('A', 2)]);
      const report = await scheduler.runOnce();

      expect(baseline.pairs[0].status).toBe('baseline');
      expect(report.events.map(r => [r.event.id, r.event.kind, r.event.subject, r.channel])).toEqual([
        ['lb-1', 'leaderboard_rank_change', 'Model B', 'leaderboard'],
        ['lb-2', 'leaderboard_rank_change', 'Model A', 'leaderboard'],
      ]);
      expect(notifier.deliveries).toHaveLength(2);
    });
  });

  describe('lifecycle', () => {
    it('should join a sweep already in flight', async () => {
      const watcher = new ScriptedWatcher('github', commits);
      const { scheduler } = setup({ pairs: [GITHUB], watchers: [watcher] });

      const first = scheduler.runOnce();
      const second = scheduler.runOnce();

      expect(second).toBe(first);
      expect(scheduler.getStatus().state).toBe('polling');
      await first;
      expect(watcher.calls).toBe(1);
      expect(scheduler.getStatus()).toMatchObject({ state: 'idle', running: false, sweeps: 1 });
    });

    it('should start no new pair once stopped and let the running one finish', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      const news = new ScriptedWatcher('news', async () => {
        await gate;
        return makeItemSnapshot([], { source: 'news' });
      });
      const github = new ScriptedWatcher('github', commits);
      const { scheduler } = setup({ pairs: [NEWS, GITHUB], watchers: [news, github], concurrency: 1 });

      const run = scheduler.runOnce();
      const stopping = scheduler.stop();
      release();
      await stopping;
      const report = await run;

      expect(report.interrupted).toBe(true);
      expect(report.pairs.map(pair => pair.entityKey)).toEqual(['news:Alpha']);
      expect(github.calls).toBe(0);
    });

    it('should sweep on start and report the timer until stopped', async () => {
      const { scheduler } = setup({
        pairs: [GITHUB],
        watchers: [new ScriptedWatcher('github', commits)],
      });

      scheduler.start();
      expect(scheduler.getStatus()).toMatchObject({ state: 'polling', running: true });

      await scheduler.stop();
      const status = scheduler.getStatus();
      expect(status).toMatchObject({ state: 'idle', running: false, sweeps: 1 });
      expect(status.lastReport?.pairs[0].status).toBe('changed');
    });
  });
});

describe('isHealthySweep', () => {
  const report = (statuses: SweepReport['pairs'][number]['status'][]): SweepReport => ({
    startedAt: NOW.toISOString(),
    completedAt: NOW.toISOString(),
    durationMs: 0,
    pairs: statuses.map((status, i) => ({
      entityKey: `github:M${i}`,
      source: 'github',
      status,
      events: 0,
      delivered: 0,
      deliveryFailures: 0,
      durationMs: 0,
    })),
    events: [],
    interrupted: false,
    dryRun: false,
  });

  it('should treat an empty sweep as healthy', () => {
    expect(isHealthySweep(report([]))).toBe(true);
  });

  it('should be healthy while any pair succeeds', () => {
    expect(isHealthySweep(report(['fetch_failed', 'unchanged']))).toBe(true);
  });

  it('should be unhealthy when every pair failed', () => {
    expect(isHealthySweep(report(['fetch_failed', 'persist_failed']))).toBe(false);
  });

  it('should classify failure statuses', () => {
    expect(isFailure('baseline')).toBe(false);
    expect(isFailure('state_read_failed')).toBe(true);
  });
});
