import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';
import { logger } from '../utils/logger.js';

export interface RateLimitOptions {
  windowMs: number;
  max: number;
}

/** Per-IP limit on namespace queries. */
export function createRateLimit({ windowMs, max }: RateLimitOptions) {
  return rateLimit({
    windowMs,
    max,
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false, // Disable the `X-RateLimit-*` headers
    handler: (req: Request, res: Response) => {
      logger.warn('Rate limit exceeded', {
        ip: req.ip,
        method: req.method,
        path: req.path,
        timestamp: new Date().toISOString(),
      });

      res.status(429).json({
        CODE: 'RATE_LIMITED',
        MESSAGE: 'Too many requests, please try again later.',
      });
    },
  });
}
