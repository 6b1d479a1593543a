import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { BatteryIngestionPort } from '@voltwatch/domain';

const vehicleParamsSchema = z.object({
  vehicleId: z.string().min(1).max(120),
});

const batchSchema = z.object({
  vehicleId: z.string().min(1).max(120),
  payloads: z.array(z.unknown()).min(1).max(500),
});

export function createIngestRouter(monitor: BatteryIngestionPort): Router {
  const router = Router();

  /** POST /api/ingest/batch — several raw payloads for one vehicle */
  router.post('/batch', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = batchSchema.parse(req.body);
      const result = monitor.ingestBatch(body);
      res.status(202).json(result);
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/ingest/:vehicleId/health — one raw health payload from an edge device */
  router.post('/:vehicleId/health', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { vehicleId } = vehicleParamsSchema.parse(req.params);
      const record = monitor.ingest(vehicleId, req.body);
      res.status(202).json({ accepted: record !== null, data: record });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
