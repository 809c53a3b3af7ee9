#!/usr/bin/env node
/**
 * Main entry point for Component Sentinel
 */

import type { Server } from 'http';
import { createApp } from './api/app.js';
import { loadConfigSafe } from './config/index.js';
import { createNotifier } from './core/notifier.js';
import { CrawlOrchestrator } from './core/orchestrator.js';
import { DigestReporter } from './core/reporter.js';
import { CrawlRunner } from './core/runner.js';
import { createScheduler } from './core/scheduler.js';
import { createSessionFactory } from './infrastructure/playwright/browser.js';
import { createAlertStore } from './infrastructure/storage/json-store.js';
import { createLogger } from './utils/logger.js';

type Mode = 'serve' | 'once' | 'digest';

function parseArgs(args: string[]): { configPath?: string; mode: Mode } {
  const configPath = args.find((a) => a.startsWith('--config='))?.split('=')[1];
  const mode: Mode = args.includes('--digest') ? 'digest' : args.includes('--once') ? 'once' : 'serve';
  return { configPath, mode };
}

/**
 * Main application
 */
async function main(): Promise<void> {
  const { configPath, mode } = parseArgs(process.argv.slice(2));

  const { config, targets, error } = await loadConfigSafe(configPath);
  if (error || !config) {
    console.error(`Configuration error:\n${error}`);
    console.error('\nPlease create config/config.yaml based on config/config.example.yaml');
    process.exit(1);
  }

  const logger = createLogger(config.logging.level, config.logging.file);
  logger.info(`Starting Component Sentinel (${mode})...`);

  const store = createAlertStore(config.storage.dir, logger);
  const sessions = createSessionFactory(config.browser, logger);
  const notifier = createNotifier(config.webhook, logger);
  const reporter = new DigestReporter(store, notifier, config.digest, logger);
  const runner = new CrawlRunner({
    createOrchestrator: () =>
      new CrawlOrchestrator(targets, {
        sessions,
        store,
        logger,
        maxWorkers: config.crawl.maxWorkers,
        alertOnPageError: config.crawl.alertOnPageError,
      }),
    store,
    logger,
  });

  if (mode === 'once') {
    const report = await runner.runNow();
    logger.info(`Crawl finished: ${report.totalAlerts} alerts, ${report.failed} failed targets`);
    process.exit(report.failed > 0 ? 1 : 0);
  }

  if (mode === 'digest') {
    const result = await reporter.send();
    logger.info(`Digest delivered (${result.statusCode})`);
    process.exit(0);
  }

  const app = createApp({ runner, store, reporter, logger });
  const server: Server = app.listen(config.server.port, config.server.host, () => {
    logger.info(`API listening on http://${config.server.host}:${config.server.port}`);
  });

  const scheduler = createScheduler(config.scheduler, logger);
  if (config.scheduler.enabled) {
    logger.info('Starting scheduler...');
    scheduler.start(async () => {
      if (runner.state.isRunning) {
        logger.warn('Skipping scheduled crawl, a run is already in progress');
        return;
      }
      await runner.runNow();
    });
  }

  let isShuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);

    // Stop scheduler first to prevent new runs
    scheduler.stop();

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await runner.idle();

    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error('Error during shutdown', err);
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  logger.info(`Running with ${targets.length} target(s)`);
  logger.info('Press Ctrl+C to stop');
}

// Run main
main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
