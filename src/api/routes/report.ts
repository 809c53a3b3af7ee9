import { Router } from 'express';
import { summarizeReport, type DigestReporter } from '../../core/reporter.js';

export function createReportRouter(reporter: DigestReporter): Router {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      const report = await reporter.latestReport();
      res.json(summarizeReport(report));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
