import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer, type Server } from 'http';

import { createIngestRouter } from './controllers/ingest.controller.js';
import { createBatteryRouter } from './controllers/battery.controller.js';
import { createAlertsRouter } from './controllers/alerts.controller.js';
import { createAdminRouter } from './controllers/admin.controller.js';
import { WsGateway, type FramePublisher } from './ws/ws-gateway.js';
import { errorHandler } from './middleware/error-handler.js';
import type { MonitorService } from './services/monitor/monitor-service.js';
import { bridgeStreams } from './services/transport/stream-bridge.js';

export interface AppDeps {
  monitor: MonitorService;
  corsOrigin?: string;
}

export function buildApp(deps: AppDeps): ReturnType<typeof express> {
  const { monitor } = deps;
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  if (process.env['NODE_ENV'] !== 'test') {
    app.use(morgan('combined'));
  }
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/ingest', createIngestRouter(monitor));
  app.use('/api/battery', createBatteryRouter(monitor));
  app.use('/api/alerts', createAlertsRouter(monitor));
  app.use('/api/admin', createAdminRouter(monitor));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      vehicles: monitor.vehicleIds().length,
      unreadAlerts: monitor.unreadCount(),
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export interface HttpServerDeps {
  monitor: MonitorService;
  /** Receives `publish` frames sent by edge devices over the socket. */
  inbound?: FramePublisher;
}

export function buildHttpServer(app: ReturnType<typeof express>, deps: HttpServerDeps) {
  const httpServer: Server = createServer(app);
  const wsGateway = new WsGateway(httpServer, deps.inbound);
  const unbridge = bridgeStreams(deps.monitor, wsGateway);
  return { httpServer, wsGateway, unbridge };
}
