import { Router } from 'express';
import { z } from 'zod';
import type { AlertStore } from '../../infrastructure/storage/json-store.js';
import type { AlertFilter } from '../../types/index.js';
import { NotFoundError, StorageError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

const dateParam = z
  .string()
  .trim()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid date' });

export const alertsQuerySchema = z.object({
  target: z.string().trim().min(1).optional(),
  page_type: z.string().trim().min(1).optional(),
  status: z.enum(['MISSING_COMPONENT', 'ERROR']).optional(),
  start_date: dateParam.optional(),
  end_date: dateParam.optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export function createAlertsRouter(store: AlertStore | null, logger: Logger): Router {
  const router = Router();
  const log = logger.child('alerts');

  const requireStore = (): AlertStore => {
    if (!store) throw new StorageError('Storage is not available');
    return store;
  };

  router.get('/', async (req, res, next) => {
    try {
      const query = alertsQuerySchema.parse(req.query);
      const filter: AlertFilter = {
        target: query.target,
        pageType: query.page_type,
        status: query.status,
        startDate: query.start_date,
        endDate: query.end_date,
      };

      const result = await requireStore().listAlerts(filter, query.page, query.limit);
      log.debug(`Total=${result.total}, Page=${result.page}/${result.pages}, Alerts=${result.alerts.length}`);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  // Registered before /:id so "stats" is not taken for an id
  router.get('/stats', async (_req, res, next) => {
    try {
      res.json(await requireStore().getStats());
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req, res, next) => {
    try {
      const alert = await requireStore().getAlert(req.params.id);
      if (!alert) throw new NotFoundError('Alert not found');
      res.json(alert);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/', async (_req, res, next) => {
    try {
      const deleted = await requireStore().deleteAllAlerts();
      log.info(`Deleted ${deleted} alerts`);
      res.json({ deleted });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
