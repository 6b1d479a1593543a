import 'dotenv/config';
import {
  closePool,
  getPool,
  InMemoryMessageBus,
  PgAlertRepository,
  PgHealthRecordRepository,
} from '@voltwatch/adapters';
import { buildApp, buildHttpServer } from './app.js';
import { loadMonitorConfig } from './config/monitor-config.js';
import { MonitorService } from './services/monitor/monitor-service.js';
import { bindTelemetrySource } from './services/transport/topic-router.js';

async function main() {
  const config = loadMonitorConfig();

  const persistence = config.databaseUrl !== undefined;
  if (persistence) {
    await getPool().query('SELECT 1');
    console.log('[server] database connected, write-through enabled');
  }

  const monitor = new MonitorService({
    maxHistoryEntries: config.maxHistoryEntries,
    maxAlerts: config.maxAlerts,
    retentionMs: config.retentionMs,
    cleanupIntervalMs: config.cleanupIntervalMs,
    ...(persistence
      ? { healthSink: new PgHealthRecordRepository(), alertSink: new PgAlertRepository() }
      : {}),
  });
  monitor.start();

  const bus = new InMemoryMessageBus();
  const unbind = bindTelemetrySource(bus, monitor, { pattern: config.healthTopicPattern });

  const app = buildApp({ monitor, corsOrigin: config.corsOrigin });
  const { httpServer, wsGateway, unbridge } = buildHttpServer(app, { monitor, inbound: bus });

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    unbind();
    unbridge();
    monitor.dispose();
    await wsGateway.close();
    httpServer.close();
    if (persistence) await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
