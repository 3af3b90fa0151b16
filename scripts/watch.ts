/**
 * Release Radar: Watch Script
 *
 * Usage:
 *   npm run watch:once                          # One sweep, then exit
 *   npm run watch:daemon                        # Sweep every check_interval_hours
 *   npm run watch:daemon -- --port 8080         # Health server on another port
 *   npm run watch:test-slack                    # Slack connectivity check
 *   npm run watch:clear-state                   # Forget everything (re-baselines)
 *   npm run watch:once -- --list-state          # Print stored entity keys
 *   npm run watch:once -- --dry-run             # Fetch and diff, deliver nothing
 *   npm run watch:once -- --config other.json   # Another watch-list file
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { logger } from '../src/lib/logger';
import { ConfigError, describeError } from '../src/lib/errors';
import { DEFAULT_CONFIG_PATH, buildWatchPairs, loadConfig } from '../src/config/loader';
import { createStateStore, type StateStore } from '../src/state';
import { createWatchers } from '../src/watchers';
import { DiffEngine } from '../src/diff/engine';
import { LeaderboardDiffEngine } from '../src/diff/leaderboard';
import { EventRouter } from '../src/routing/router';
import { SlackNotifier } from '../src/delivery';
import { Scheduler, isFailure, type SweepReport } from '../src/scheduler/scheduler';
import { DEFAULT_HEALTH_PORT, closeHealthServer, createHealthApp, startHealthServer } from '../src/server/health';
import type { WatcherConfig } from '../src/types';

// ============================================================
// CONFIGURATION
// ============================================================

interface WatchOptions {
  config: string;
  daemon: boolean;
  test: boolean;
  clearState: boolean;
  listState: boolean;
  dryRun: boolean;
  port: number;
}

function readOptions(): WatchOptions {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', short: 'c', default: DEFAULT_CONFIG_PATH },
      daemon: { type: 'boolean', short: 'd', default: false },
      test: { type: 'boolean', short: 't', default: false },
      'clear-state': { type: 'boolean', default: false },
      'list-state': { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
      port: { type: 'string', default: String(process.env.HEALTH_PORT ?? DEFAULT_HEALTH_PORT) },
    },
  });

  const rawPort = values.port ?? String(DEFAULT_HEALTH_PORT);
  const port = Number.parseInt(rawPort, 10);
  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigError('Invalid command line', [`--port: "${rawPort}" is not a port number`]);
  }

  return {
    config: values.config ?? DEFAULT_CONFIG_PATH,
    daemon: values.daemon ?? false,
    test: values.test ?? false,
    clearState: values['clear-state'] ?? false,
    listState: values['list-state'] ?? false,
    dryRun: values['dry-run'] ?? false,
    port,
  };
}

// ============================================================
// OUTPUT
// ============================================================

function printReport(report: SweepReport): void {
  const failed = report.pairs.filter(pair => isFailure(pair.status));

  console.log('\n' + '='.repeat(60));
  console.log(report.dryRun ? 'SWEEP COMPLETE (dry run)' : 'SWEEP COMPLETE');
  console.log('='.repeat(60));
  console.log(`Duration: ${(report.durationMs / 1000).toFixed(2)}s`);
  console.log(`Pairs: ${report.pairs.length - failed.length}/${report.pairs.length} ok`);
  console.log(`Events: ${report.events.length}`);
  for (const { event, channel, mentionChannel } of report.events) {
    console.log(`  [${channel}] ${event.kind}: ${event.subject}${mentionChannel ? ' (@channel)' : ''}`);
  }
  for (const pair of failed) {
    console.log(`  FAILED ${pair.entityKey} (${pair.status}): ${pair.error ?? 'unknown error'}`);
  }
  if (report.interrupted) console.log('Interrupted before every pair was visited');
  console.log('='.repeat(60) + '\n');
}

// ============================================================
// COMMANDS
// ============================================================

async function testSlack(config: WatcherConfig): Promise<boolean> {
  const notifier = new SlackNotifier(config.slack);
  if (!notifier.configured) {
    console.log('No Slack webhook or bot token configured; messages go to the console.');
    return false;
  }

  const results = await notifier.testConnection();
  for (const result of results) {
    console.log(`  - ${result.channel}: ${result.success ? 'OK' : `FAILED (${result.error ?? 'unknown'})`}`);
  }
  return results.length > 0 && results.every(result => result.success);
}

async function listState(store: StateStore): Promise<void> {
  const keys = await store.list();
  if (keys.length === 0) {
    console.log('No stored state.');
    return;
  }
  for (const key of keys) {
    const record = await store.get(key);
    const changed = record?.lastChangedAt ?? 'never';
    console.log(`${key}  checked ${record?.lastCheckedAt ?? '-'}  changed ${changed}`);
  }
}

function buildScheduler(config: WatcherConfig, store: StateStore, dryRun: boolean): Scheduler {
  return new Scheduler(
    {
      store,
      watchers: createWatchers(config),
      diffEngine: new DiffEngine(config.diff),
      leaderboardEngine: new LeaderboardDiffEngine(),
      router: new EventRouter({
        notifications: config.notifications,
        priorityModels: config.priorityModels,
        entities: config.entities,
      }),
      notifier: new SlackNotifier(config.slack, {
        includeIcons: config.notifications.includeIcons,
        includeTimestamp: config.notifications.includeTimestamp,
      }),
    },
    {
      pairs: buildWatchPairs(config),
      intervalMs: config.checkIntervalHours * 60 * 60 * 1000,
      concurrency: config.concurrency,
      dryRun,
    }
  );
}

async function runDaemon(scheduler: Scheduler, store: StateStore, port: number): Promise<void> {
  const server = await startHealthServer(createHealthApp(scheduler), port);

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });

    scheduler
      .stop()
      .then(() => closeHealthServer(server))
      .then(() => store.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: describeError(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  scheduler.start();
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<void> {
  const options = readOptions();
  const config = await loadConfig(options.config);

  if (options.test) {
    const ok = await testSlack(config);
    process.exit(ok ? 0 : 1);
  }

  // Dry runs read the stored state but never write it
  const store = createStateStore(config.state);

  if (options.clearState) {
    await store.reset();
    console.log('All stored state cleared. The next sweep records a fresh baseline.');
    await store.close();
    return;
  }

  if (options.listState) {
    await listState(store);
    await store.close();
    return;
  }

  const scheduler = buildScheduler(config, store, options.dryRun);

  if (options.daemon) {
    await runDaemon(scheduler, store, options.port);
    return;
  }

  const report = await scheduler.runOnce();
  await store.close();
  printReport(report);

  if (report.pairs.length > 0 && report.pairs.every(pair => isFailure(pair.status))) {
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`\n${error.message}`);
  } else {
    logger.error('Watch run failed', { error: describeError(error) });
    console.error('\nWatch run failed:', describeError(error));
  }
  process.exit(1);
});
