/**
 * NewsRelay — Control Server
 *
 * Small Express app for operating a running monitor.
 *
 * Endpoints:
 * - GET  /health           — Liveness check
 * - GET  /stats            — History, analyzed-URL and cache statistics
 * - POST /fetch            — Run one cycle now and return its report
 * - POST /scheduler/start  — Start the continuous scheduler
 * - POST /scheduler/stop   — Stop it
 *
 * With CONTROL_TOKEN set, everything except /health needs
 * `Authorization: Bearer <token>`.
 *
 * Run with: npm run server
 */

import crypto from 'crypto';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { loadConfig } from '../lib/config';
import { logger } from '../lib/logger';
import { describeCaches } from '../pipeline/maintenance';
import type { NewsMonitor } from '../pipeline/cycle';
import type { Scheduler } from '../pipeline/scheduler';
import { createApplication } from '../pipeline';

export interface ControlDeps {
  monitor: NewsMonitor;
  scheduler: Scheduler;
  token?: string;
  cacheMaxAgeDays?: number;
}

// ============================================================
// AUTH
// ============================================================

/**
 * Constant-time bearer token check.
 */
export function verifyBearerToken(header: string | undefined, token: string): boolean {
  if (!header?.startsWith('Bearer ')) return false;
  const provided = Buffer.from(header.slice('Bearer '.length));
  const expected = Buffer.from(token);
  if (provided.length !== expected.length) return false;
  return crypto.timingSafeEqual(provided, expected);
}

function requireToken(token: string | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!token || req.path === '/health') {
      next();
      return;
    }
    if (!verifyBearerToken(req.headers.authorization, token)) {
      logger.warn('Rejected control request', { path: req.path });
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
}

// ============================================================
// APP
// ============================================================

export function createControlApp(deps: ControlDeps): Express {
  const { monitor, scheduler } = deps;
  const app = express();

  app.use(express.json());
  app.use(requireToken(deps.token));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'newsrelay-control',
    });
  });

  app.get('/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const [portal, aggregator, analyzed] = await Promise.all([
        monitor.repository.loadPortalHistory(),
        monitor.repository.loadAggregatorHistory(),
        monitor.repository.loadAnalyzedUrls(),
      ]);

      res.json({
        portal: {
          total: portal.length,
          inTargetFeed: portal.filter((item) => item.inTargetFeed).length,
        },
        aggregator: {
          total: aggregator.length,
          semantic: aggregator.filter((r) => r.matchType === 'semantic').length,
          keyword: aggregator.filter((r) => r.matchType === 'keyword').length,
        },
        analyzedUrls: analyzed.size,
        caches: describeCaches(monitor.caches, deps.cacheMaxAgeDays ?? 3),
        scheduler: {
          running: scheduler.isRunning(),
          nextRunAt: scheduler.nextRunAt?.toISOString() ?? null,
        },
        cycle: {
          inProgress: monitor.isRunning,
          last: monitor.lastCycle,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  app.post('/fetch', async (_req: Request, res: Response, next: NextFunction) => {
    if (monitor.isRunning) {
      res.status(409).json({ error: 'A cycle is already in progress' });
      return;
    }
    try {
      const report = await monitor.runCycle();
      res.status(report.status === 'error' ? 500 : 200).json(report);
    } catch (error) {
      next(error);
    }
  });

  app.post('/scheduler/start', (_req: Request, res: Response) => {
    const started = scheduler.start();
    res.status(started ? 200 : 409).json({
      running: scheduler.isRunning(),
      message: started ? 'Scheduler started' : 'Scheduler already running',
    });
  });

  app.post('/scheduler/stop', (_req: Request, res: Response) => {
    const stopped = scheduler.stop();
    res.status(stopped ? 200 : 409).json({
      running: scheduler.isRunning(),
      message: stopped ? 'Scheduler stopped' : 'Scheduler not running',
    });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error in control server', { error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

// ============================================================
// SERVER START
// ============================================================

export function startServer(app: Express, port: number): void {
  app.listen(port, () => {
    logger.info(`Control server listening on port ${port}`);
  });
}

// Start if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const config = loadConfig();
  const { monitor, scheduler } = createApplication(config);
  await monitor.warmUp();
  startServer(
    createControlApp({
      monitor,
      scheduler,
      token: config.control.token,
      cacheMaxAgeDays: config.cache.maxAgeDays,
    }),
    config.control.port
  );
}
