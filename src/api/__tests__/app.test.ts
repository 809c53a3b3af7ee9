import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeSessions, NOW_ISO, quietLogger, scenarioTargets, tempDir } from '../../core/__tests__/helpers.js';
import type { Notifier } from '../../core/notifier.js';
import { CrawlOrchestrator } from '../../core/orchestrator.js';
import { DigestReporter } from '../../core/reporter.js';
import { CrawlRunner } from '../../core/runner.js';
import { JsonAlertStore } from '../../infrastructure/storage/json-store.js';
import type { Alert } from '../../types/index.js';
import { createApp } from '../app.js';

const ALERT: Alert = {
  date: NOW_ISO,
  target: 'CL',
  pageType: 'PDP',
  component: 'Cross Sell',
  status: 'MISSING_COMPONENT',
  message: "Componente 'Cross Sell' no encontrado en PDP",
};

describe('HTTP API', () => {
  let dir: ReturnType<typeof tempDir>;
  let store: JsonAlertStore;
  let send: ReturnType<typeof vi.fn>;

  const build = (options: { sessions?: FakeSessions; notifier?: Notifier | null; withStore?: boolean } = {}) => {
    const logger = quietLogger();
    const sessions = options.sessions ?? new FakeSessions();
    const activeStore = options.withStore === false ? null : store;
    const notifier = options.notifier === undefined ? { send } : options.notifier;
    const runner = new CrawlRunner({
      createOrchestrator: () => new CrawlOrchestrator(scenarioTargets(), { sessions, store: activeStore, logger }),
      store: activeStore,
      logger,
    });
    const reporter = new DigestReporter(activeStore, notifier, { windowHours: 24, timeZone: 'UTC' }, logger);
    return { app: createApp({ runner, store: activeStore, reporter, logger }), runner };
  };

  beforeEach(() => {
    dir = tempDir();
    store = new JsonAlertStore(dir.path);
    send = vi.fn().mockResolvedValue(200);
  });

  afterEach(() => {
    dir.cleanup();
  });

  describe('GET /api/health', () => {
    it('reports storage and run phase', async () => {
      const response = await request(build().app).get('/api/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'healthy', storage: 'connected', run: 'idle' });
    });
  });

  describe('/api/scrape', () => {
    it('starts a background run and refuses a second one', async () => {
      const { app, runner } = build({ sessions: new FakeSessions(undefined, { delays: { CL: 20 } }) });

      const first = await request(app).post('/api/scrape');
      expect(first.status).toBe(202);
      expect(first.body).toMatchObject({ status: 'processing' });
      expect(typeof first.body.startTime).toBe('string');

      const second = await request(app).post('/api/scrape');
      expect(second.status).toBe(409);
      expect(second.body.status).toBe('already_running');

      await runner.idle();
      const status = await request(app).get('/api/scrape/status');
      expect(status.body).toMatchObject({ phase: 'success', isRunning: false, alertsCount: 3 });
    });
  });

  describe('/api/alerts', () => {
    beforeEach(async () => {
      await store.insertAlerts([ALERT, { ...ALERT, target: 'PE' }, { ...ALERT, status: 'ERROR', component: 'N/A' }]);
    });

    it('lists with filters and default pagination', async () => {
      const response = await request(build().app).get('/api/alerts').query({ target: 'CL' });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ total: 2, page: 1, limit: 50, pages: 1 });
    });

    it('maps query parameters onto the store filter', async () => {
      const response = await request(build().app)
        .get('/api/alerts')
        .query({ status: 'ERROR', page_type: 'PDP', page: '1', limit: '10' });

      expect(response.body.total).toBe(1);
      expect(response.body.alerts[0].component).toBe('N/A');
    });

    it('rejects invalid query parameters', async () => {
      const app = build().app;

      expect((await request(app).get('/api/alerts').query({ page: '0' })).status).toBe(400);
      expect((await request(app).get('/api/alerts').query({ status: 'OK' })).status).toBe(400);
      const badDate = await request(app).get('/api/alerts').query({ start_date: 'someday' });
      expect(badDate.status).toBe(400);
      expect(badDate.body.error).toBe('Invalid parameters');
    });

    it('returns stats', async () => {
      const response = await request(build().app).get('/api/alerts/stats');

      expect(response.body.total).toBe(3);
      expect(response.body.byTarget).toEqual([
        { key: 'CL', count: 2 },
        { key: 'PE', count: 1 },
      ]);
    });

    it('fetches one alert or answers 404', async () => {
      const app = build().app;
      const [stored] = (await store.listAlerts({ target: 'PE' }, 1, 1)).alerts;

      const found = await request(app).get(`/api/alerts/${stored.id}`);
      expect(found.status).toBe(200);
      expect(found.body).toEqual(stored);

      const missing = await request(app).get('/api/alerts/does-not-exist');
      expect(missing.status).toBe(404);
      expect(missing.body).toEqual({ error: 'Alert not found' });
    });

    it('deletes every alert', async () => {
      const response = await request(build().app).delete('/api/alerts');

      expect(response.body).toEqual({ deleted: 3 });
    });

    it('answers 503 without storage', async () => {
      const response = await request(build({ withStore: false }).app).get('/api/alerts');

      expect(response.status).toBe(503);
      expect(response.body).toEqual({ error: 'Storage is not available' });
    });
  });

  describe('GET /api/report', () => {
    it('answers 404 before the first run', async () => {
      const response = await request(build().app).get('/api/report');

      expect(response.status).toBe(404);
    });

    it('summarizes the latest run', async () => {
      const { app, runner } = build();
      await runner.runNow();

      const response = await request(app).get('/api/report');

      expect(response.status).toBe(200);
      expect(response.body.totalAlerts).toBe(3);
      expect(response.body.results).toEqual([
        { target: 'CL', totalAlerts: 3, status: 'success', timestamp: expect.any(String) },
      ]);
    });
  });

  describe('POST /api/digest', () => {
    it('sends the digest of the latest run', async () => {
      const { app, runner } = build();
      await runner.runNow();

      const response = await request(app).post('/api/digest');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'sent', statusCode: 200 });
      expect(send.mock.calls[0][0]).toContain('**Total alertas: 3**');
    });

    it('answers 404 without a report', async () => {
      expect((await request(build().app).post('/api/digest')).status).toBe(404);
    });

    it('answers 500 without a webhook', async () => {
      const { app, runner } = build({ notifier: null });
      await runner.runNow();

      const response = await request(app).post('/api/digest');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: 'TEAMS_WEBHOOK_URL not configured' });
    });

    it('answers 502 with the webhook status on a rejected delivery', async () => {
      send.mockResolvedValue(403);
      const { app, runner } = build();
      await runner.runNow();

      const response = await request(app).post('/api/digest');

      expect(response.status).toBe(502);
      expect(response.body).toEqual({ error: 'Webhook responded with status 403', status: 403 });
    });
  });
});
