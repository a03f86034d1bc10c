import type { NextFunction, Request, Response } from 'express';
import { logger } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';

/**
 * Middleware to track HTTP request metrics and write an access log line
 */
export function trackHttpMetrics(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1e6;

    // Namespace lookups all share one label so every OSC path does not become its own series
    const route = req.path === '/health' || req.path === '/metrics' ? req.path : 'namespace';
    metrics.trackHttpRequest(req.method, route, res.statusCode, durationMs);

    logger.http(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
      durationMs: Math.round(durationMs * 100) / 100,
      ip: req.ip,
    });
  });

  next();
}

/**
 * Prometheus metrics endpoint
 */
export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.set('Content-Type', metrics.register.contentType);
  res.send(await metrics.getMetrics());
}
