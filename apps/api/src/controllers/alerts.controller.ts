import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { BatteryQueryPort } from '@voltwatch/domain';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => v === 'true' || v === '1');

const listQuerySchema = z.object({
  vehicleId: z.string().min(1).optional(),
  unreadOnly: booleanFlag,
});

const scopeQuerySchema = z.object({
  vehicleId: z.string().min(1).optional(),
});

const readAllBodySchema = z
  .object({
    vehicleId: z.string().min(1).optional(),
  })
  .default({});

const alertParamsSchema = z.object({
  alertId: z.string().min(1),
});

export function createAlertsRouter(monitor: BatteryQueryPort): Router {
  const router = Router();

  /** GET /api/alerts — newest first */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const alerts = monitor.alerts(query);
      res.json({ data: alerts, total: alerts.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/alerts/unread-count */
  router.get('/unread-count', (req: Request, res: Response, next: NextFunction) => {
    try {
      const scope = scopeQuerySchema.parse(req.query);
      res.json({ count: monitor.unreadCount(scope) });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/alerts/read-all */
  router.post('/read-all', (req: Request, res: Response, next: NextFunction) => {
    try {
      const scope = readAllBodySchema.parse(req.body);
      monitor.markAllRead(scope);
      res.json({ unread: monitor.unreadCount(scope) });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/alerts/:alertId/read — unknown ids are not an error */
  router.post('/:alertId/read', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { alertId } = alertParamsSchema.parse(req.params);
      res.json({ updated: monitor.markRead(alertId) });
    } catch (err) {
      next(err);
    }
  });

  /** DELETE /api/alerts/:alertId */
  router.delete('/:alertId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { alertId } = alertParamsSchema.parse(req.params);
      res.json({ removed: monitor.removeAlert(alertId) });
    } catch (err) {
      next(err);
    }
  });

  /** DELETE /api/alerts — all, or one vehicle's */
  router.delete('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const scope = scopeQuerySchema.parse(req.query);
      monitor.clearAlerts(scope);
      res.json({ remaining: monitor.alerts().length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
