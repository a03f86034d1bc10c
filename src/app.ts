import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { createRateLimit, type RateLimitOptions } from './middleware/rateLimit.js';
import { metricsHandler, trackHttpMetrics } from './middleware/metrics.js';
import { createNamespaceRouter } from './routes/namespace.js';
import type { QueryResolver } from './services/QueryResolver.js';
import { logger } from './utils/logger.js';

export interface AppOptions {
  resolver: QueryResolver;
  allowedOrigins: string[] | '*';
  rateLimit: RateLimitOptions;
  /** Reported by /health. */
  status?: () => Record<string, number | string>;
}

export function createApp({ resolver, allowedOrigins, rateLimit, status }: AppOptions): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(
    cors({
      origin: allowedOrigins,
      methods: ['GET', 'OPTIONS'],
    })
  );
  app.use(trackHttpMetrics);
  app.use(createRateLimit(rateLimit));

  // Service routes are matched before the namespace, so these two paths are reserved
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString(), ...(status?.() ?? {}) });
  });
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });

  app.use(createNamespaceRouter(resolver));

  // Error handling middleware
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error', { path: req.path, error: error instanceof Error ? error.message : String(error) });
    res.status(500).json({ CODE: 'INTERNAL', MESSAGE: 'Internal Server Error' });
  });

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({ CODE: 'NOT_FOUND', MESSAGE: `Cannot ${req.method} ${req.path}` });
  });

  return app;
}
