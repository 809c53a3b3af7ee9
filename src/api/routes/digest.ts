import { Router } from 'express';
import type { DigestReporter } from '../../core/reporter.js';

export function createDigestRouter(reporter: DigestReporter): Router {
  const router = Router();

  // 404 without a report, 500 without a webhook, 502 when delivery fails
  router.post('/', async (_req, res, next) => {
    try {
      res.json(await reporter.send());
    } catch (error) {
      next(error);
    }
  });

  return router;
}
