/**
 * Traffic Report API Routes
 *
 * Serves the most recent dashboard report as JSON:
 *
 * - GET /report  latest ReportData, 503 until the first report cycle ran
 * - GET /health  liveness with transport name and uptime
 */

import { Router } from 'express';
import type { ReportData } from '@shared/traffic-types';

export interface TrafficRouteSource {
  /** Most recent report, or null before the first cycle. */
  latest(): ReportData | null;
}

export interface TrafficRouteOptions {
  transport: string;
  /** Epoch seconds the monitor started at. */
  startedAt: number;
  clock?: () => number;
}

export function createTrafficRouter(
  source: TrafficRouteSource,
  options: TrafficRouteOptions
): Router {
  const router = Router();
  const clock = options.clock ?? (() => Date.now() / 1000);

  router.get('/report', (_req, res) => {
    const report = source.latest();
    if (!report) {
      res.status(503).json({ error: 'No report available yet' });
      return;
    }
    res.json(report);
  });

  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      transport: options.transport,
      uptimeSeconds: Math.max(0, clock() - options.startedAt),
    });
  });

  return router;
}
