import type { StreamPublisherPort } from '@voltwatch/domain';
import type { MonitorService } from '../monitor/monitor-service.js';

/** Forwards the monitor's health and alert streams to a publisher. Returns a teardown. */
export function bridgeStreams(monitor: MonitorService, publisher: StreamPublisherPort): () => void {
  const offHealth = monitor.subscribeAllHealth(({ vehicleId, record }) => {
    publisher.publishHealth(vehicleId, record).catch((err: unknown) => {
      console.error(`[stream-bridge] health publish failed for ${vehicleId}:`, err);
    });
  });
  const offAlerts = monitor.subscribeAlerts((alerts) => {
    publisher.publishAlerts(alerts).catch((err: unknown) => {
      console.error('[stream-bridge] alert publish failed:', err);
    });
  });
  return () => {
    offHealth();
    offAlerts();
  };
}
