import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { BatteryQueryPort } from '@voltwatch/domain';

const vehicleParamsSchema = z.object({
  vehicleId: z.string().min(1).max(120),
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
});

const analyticsQuerySchema = z.object({
  periodHours: z.coerce.number().positive().max(24 * 30).default(24),
});

export function createBatteryRouter(monitor: BatteryQueryPort): Router {
  const router = Router();

  /** GET /api/battery/:vehicleId/current */
  router.get('/:vehicleId/current', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { vehicleId } = vehicleParamsSchema.parse(req.params);
      res.json({ data: monitor.currentHealth(vehicleId) });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/battery/:vehicleId/history — `from`/`to` bounds are exclusive */
  router.get('/:vehicleId/history', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { vehicleId } = vehicleParamsSchema.parse(req.params);
      const query = historyQuerySchema.parse(req.query);

      let records =
        query.from || query.to
          ? monitor.historyInRange(vehicleId, {
              startTime: new Date(query.from ?? 0),
              endTime: query.to ? new Date(query.to) : new Date(8.64e15),
            })
          : monitor.history(vehicleId);
      if (query.limit !== undefined && records.length > query.limit) {
        records = records.slice(records.length - query.limit);
      }
      res.json({ data: records, total: records.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/battery/:vehicleId/analytics */
  router.get('/:vehicleId/analytics', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { vehicleId } = vehicleParamsSchema.parse(req.params);
      const { periodHours } = analyticsQuerySchema.parse(req.query);
      res.json({ data: monitor.analytics(vehicleId, { periodMs: periodHours * 60 * 60 * 1000 }) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
