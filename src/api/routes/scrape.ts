import { Router } from 'express';
import type { CrawlRunner } from '../../core/runner.js';
import { ConflictError } from '../../utils/errors.js';

/**
 * Manual crawl trigger; a second trigger while a run is active is refused, never queued
 */
export function createScrapeRouter(runner: CrawlRunner): Router {
  const router = Router();

  router.post('/', (_req, res, next) => {
    try {
      const snapshot = runner.trigger();
      res.status(202).json({
        message: 'Crawl started in background',
        status: 'processing',
        startTime: snapshot.startTime,
      });
    } catch (error) {
      if (error instanceof ConflictError) {
        res.status(409).json({ message: error.message, status: 'already_running' });
        return;
      }
      next(error);
    }
  });

  router.get('/status', (_req, res) => {
    res.json(runner.status());
  });

  return router;
}
