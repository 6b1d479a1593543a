import type {
  TelemetrySourcePort,
  TransportHandler,
  TransportMessage,
} from '@voltwatch/domain';

interface Subscription {
  pattern: string[];
  handler: TransportHandler;
}

/** MQTT-style match: `+` matches one level, a trailing `#` matches the rest. */
export function topicMatches(pattern: string, topic: string): boolean {
  return matchLevels(pattern.split('/'), topic.split('/'));
}

function matchLevels(pattern: string[], topic: string[]): boolean {
  for (let i = 0; i < pattern.length; i++) {
    const level = pattern[i];
    if (level === '#') return true;
    const actual = topic[i];
    if (actual === undefined) return false;
    if (level !== '+' && level !== actual) return false;
  }
  return pattern.length === topic.length;
}

/**
 * In-process publish/subscribe transport. Stands in for the broker the
 * edge devices publish to; the WebSocket gateway feeds it inbound frames.
 */
export class InMemoryMessageBus implements TelemetrySourcePort {
  private readonly subscriptions = new Set<Subscription>();

  subscribe(pattern: string, handler: TransportHandler): () => void {
    const sub: Subscription = { pattern: pattern.split('/'), handler };
    this.subscriptions.add(sub);
    return () => {
      this.subscriptions.delete(sub);
    };
  }

  /** Deliver to every matching subscriber. Returns the number of deliveries. */
  publish(topic: string, payload: unknown): number {
    const message: TransportMessage = { topic, payload };
    const levels = topic.split('/');
    let delivered = 0;
    for (const sub of [...this.subscriptions]) {
      if (!matchLevels(sub.pattern, levels)) continue;
      delivered++;
      try {
        sub.handler(message);
      } catch (err) {
        console.error(`[message-bus] handler error on ${topic}:`, err);
      }
    }
    return delivered;
  }

  get size(): number {
    return this.subscriptions.size;
  }

  clear(): void {
    this.subscriptions.clear();
  }
}
