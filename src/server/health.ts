/**
 * Release Radar: Health Server
 *
 * Minimal HTTP surface for daemon mode. GET /health reports the scheduler
 * state and the last sweep summary; 503 until a healthy sweep has run.
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import { logger } from '../lib/logger';
import { isFailure, isHealthySweep } from '../scheduler/scheduler';
import type { SchedulerStatus } from '../scheduler/scheduler';

const log = logger.child({ component: 'HealthServer' });

export const DEFAULT_HEALTH_PORT = 3001;

export interface StatusSource {
  getStatus(): SchedulerStatus;
}

function summarize(status: SchedulerStatus) {
  const report = status.lastReport;
  return {
    state: status.state,
    running: status.running,
    sweeps: status.sweeps,
    lastSweep: report
      ? {
          startedAt: report.startedAt,
          completedAt: report.completedAt,
          durationMs: report.durationMs,
          pairs: report.pairs.length,
          failed: report.pairs.filter(pair => isFailure(pair.status)).length,
          events: report.events.length,
          interrupted: report.interrupted,
        }
      : null,
  };
}

// ============================================================
// EXPRESS APP
// ============================================================

export function createHealthApp(source: StatusSource): Express {
  const app = express();

  app.get('/health', (_req: Request, res: Response) => {
    const status = source.getStatus();
    const healthy = status.lastReport !== null && isHealthySweep(status.lastReport);

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      service: 'release-radar',
      ...summarize(status),
    });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    log.error('Unhandled error in health server', { error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

// ============================================================
// SERVER START
// ============================================================

export function startHealthServer(app: Express, port: number = DEFAULT_HEALTH_PORT): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      log.info(`Health server listening on port ${port}`);
      resolve(server);
    });
    server.on('error', reject);
  });
}

export function closeHealthServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}
