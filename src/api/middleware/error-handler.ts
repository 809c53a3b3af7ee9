/**
 * Maps domain errors to HTTP responses
 */

import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import {
  ConfigError,
  ConflictError,
  NotFoundError,
  NotifyError,
  StorageError,
  toError,
} from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

export function errorHandler(logger: Logger) {
  // Express recognises error middleware by its four parameters
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ZodError) {
      res.status(400).json({ error: 'Invalid parameters', details: err.issues });
      return;
    }
    if (err instanceof ConflictError) {
      res.status(409).json({ message: err.message, status: 'already_running' });
      return;
    }
    if (err instanceof NotFoundError) {
      res.status(404).json({ error: err.message });
      return;
    }
    if (err instanceof NotifyError) {
      logger.warn(`${req.method} ${req.path}: ${err.message}`);
      res.status(502).json({ error: err.message, status: err.statusCode ?? null });
      return;
    }
    if (err instanceof ConfigError) {
      res.status(500).json({ error: err.message });
      return;
    }
    if (err instanceof StorageError) {
      logger.error(`${req.method} ${req.path}: storage failure`, err);
      res.status(503).json({ error: err.message });
      return;
    }

    const error = toError(err);
    logger.error(`Unhandled error on ${req.method} ${req.path}`, error);
    res.status(500).json({ error: error.message, type: error.name });
  };
}
