import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { BatteryAdminPort, BatteryAlert } from '@voltwatch/domain';
import type { SwapSimulation } from '../services/monitor/monitor-service.js';

/** Admin operations plus the swap simulator used for demos. */
export interface AdminOperations extends BatteryAdminPort {
  simulateBatterySwap(vehicleId: string, opts?: SwapSimulation): BatteryAlert[];
}

const vehicleParamsSchema = z.object({
  vehicleId: z.string().min(1).max(120),
});

const resetBodySchema = z.object({
  keepHours: z.number().min(0).max(24 * 365),
});

const swapBodySchema = z
  .object({
    fromVoltage: z.number().finite().optional(),
    toVoltage: z.number().finite().optional(),
    batteryType: z.string().min(1).max(60).optional(),
    gapMs: z.number().int().min(0).max(10 * 60 * 1000).optional(),
  })
  .default({});

export function createAdminRouter(monitor: AdminOperations): Router {
  const router = Router();

  /** DELETE /api/admin/history/:vehicleId */
  router.delete('/history/:vehicleId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { vehicleId } = vehicleParamsSchema.parse(req.params);
      monitor.clearHistory(vehicleId);
      res.json({ cleared: vehicleId });
    } catch (err) {
      next(err);
    }
  });

  /** DELETE /api/admin/history */
  router.delete('/history', (_req: Request, res: Response, next: NextFunction) => {
    try {
      monitor.clearAllHistory();
      res.json({ cleared: 'all' });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/admin/analytics/reset — keepHours 0 clears everything */
  router.post('/analytics/reset', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { keepHours } = resetBodySchema.parse(req.body);
      monitor.resetAnalyticsWindow(keepHours * 60 * 60 * 1000);
      res.json({ keepHours });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/admin/vehicles/:vehicleId/simulate-swap */
  router.post('/vehicles/:vehicleId/simulate-swap', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { vehicleId } = vehicleParamsSchema.parse(req.params);
      const opts = swapBodySchema.parse(req.body);
      const alerts = monitor.simulateBatterySwap(vehicleId, opts);
      res.status(202).json({ data: alerts });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
