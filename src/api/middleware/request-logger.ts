/**
 * One log line per request, written when the response finishes
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../../utils/logger.js';

const SKIP_PATHS = new Set(['/api/health', '/favicon.ico']);

export function requestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (SKIP_PATHS.has(req.path)) {
      next();
      return;
    }

    const startedAt = process.hrtime.bigint();
    res.on('finish', () => {
      const latencyMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      const line = `${req.method} ${req.originalUrl} ${res.statusCode} ${latencyMs.toFixed(1)}ms`;
      if (res.statusCode >= 500) {
        logger.warn(line);
      } else {
        logger.debug(line);
      }
    });
    next();
  };
}
