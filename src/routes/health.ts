import { Router, Request, Response } from 'express';
import type { HealthResponse } from '../types/index.js';
import type { UpstreamPool } from '../lib/upstream-pool.js';
import type { Config } from '../config.js';

export const LIVENESS_MESSAGE = 'Completion bridge is running!';

// Track server start time
const startTime = Date.now();

/**
 * Create health router. Neither endpoint touches the upstream server.
 */
export function createHealthRouter(config: Config, pool: UpstreamPool): Router {
  const router = Router();

  // Credentials embedded in the base URL are not reported
  const upstreamUrl = new URL(config.upstreamBaseUrl);
  upstreamUrl.username = '';
  upstreamUrl.password = '';
  const baseUrl = upstreamUrl.toString();

  /**
   * GET /
   * Liveness check returning a fixed string.
   */
  router.get('/', (_req: Request, res: Response) => {
    res.type('text/plain').send(LIVENESS_MESSAGE);
  });

  /**
   * GET /health
   * Returns uptime, upstream target and queue stats.
   */
  router.get('/health', (_req: Request, res: Response) => {
    const stats = pool.getStats();

    const response: HealthResponse = {
      status: pool.isHealthy() ? 'ok' : 'degraded',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      upstream: {
        baseUrl,
        completionPath: config.upstreamCompletionPath,
      },
      queue: {
        pending: stats.pending,
        processing: stats.processing,
        concurrency: stats.concurrency,
      },
    };

    res.json(response);
  });

  return router;
}
