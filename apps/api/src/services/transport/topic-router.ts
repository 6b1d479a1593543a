import type { BatteryIngestionPort, TelemetrySourcePort, TransportMessage } from '@voltwatch/domain';

export const DEFAULT_HEALTH_TOPIC_PATTERN = 'car/+/battery/health';

export interface TopicRouterOptions {
  pattern?: string;
}

/** `car/<vehicleId>/...` → vehicleId */
export function vehicleIdFromTopic(topic: string): string | null {
  const levels = topic.split('/');
  const index = levels.indexOf('car');
  const id = index >= 0 ? levels[index + 1] : undefined;
  return id ? id : null;
}

function decodePayload(payload: unknown): { ok: true; value: unknown } | { ok: false } {
  if (typeof payload !== 'string') return { ok: true, value: payload };
  try {
    const value: unknown = JSON.parse(payload);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Feeds health messages from a pub/sub source into the monitor.
 * Returns the unsubscribe function of the underlying subscription.
 */
export function bindTelemetrySource(
  source: TelemetrySourcePort,
  monitor: BatteryIngestionPort,
  opts: TopicRouterOptions = {},
): () => void {
  const pattern = opts.pattern ?? DEFAULT_HEALTH_TOPIC_PATTERN;

  return source.subscribe(pattern, (message: TransportMessage) => {
    const vehicleId = vehicleIdFromTopic(message.topic);
    if (!vehicleId) {
      console.warn(`[topic-router] no vehicle segment in topic ${message.topic}`);
      return;
    }
    const decoded = decodePayload(message.payload);
    if (!decoded.ok) {
      console.warn(`[topic-router] invalid JSON on ${message.topic}`);
      return;
    }
    monitor.ingest(vehicleId, decoded.value);
  });
}
