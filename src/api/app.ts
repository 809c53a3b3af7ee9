/**
 * HTTP API over the run state, the alert store and the digest reporter
 */

import express, { type Express } from 'express';
import type { DigestReporter } from '../core/reporter.js';
import type { CrawlRunner } from '../core/runner.js';
import type { AlertStore } from '../infrastructure/storage/json-store.js';
import type { Logger } from '../utils/logger.js';
import { errorHandler } from './middleware/error-handler.js';
import { requestLogger } from './middleware/request-logger.js';
import { createAlertsRouter } from './routes/alerts.js';
import { createDigestRouter } from './routes/digest.js';
import { createReportRouter } from './routes/report.js';
import { createScrapeRouter } from './routes/scrape.js';

export interface AppDependencies {
  runner: CrawlRunner;
  store: AlertStore | null;
  reporter: DigestReporter;
  logger: Logger;
}

export function createApp({ runner, store, reporter, logger }: AppDependencies): Express {
  const log = logger.child('http');
  const app = express();

  app.use(express.json());
  app.use(requestLogger(log));

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'healthy',
      storage: store ? 'connected' : 'unavailable',
      run: runner.status().phase,
    });
  });

  app.use('/api/scrape', createScrapeRouter(runner));
  app.use('/api/alerts', createAlertsRouter(store, log));
  app.use('/api/report', createReportRouter(reporter));
  app.use('/api/digest', createDigestRouter(reporter));

  app.use(errorHandler(log));

  return app;
}
