import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { Server } from 'http';
import { z } from 'zod';
import type { BatteryAlert, HealthRecord, StreamPublisherPort } from '@voltwatch/domain';

type WsMessage =
  | { type: 'health'; vehicleId: string; data: HealthRecord | null }
  | { type: 'alerts'; data: readonly BatteryAlert[] };

const inboundFrameSchema = z.object({
  type: z.literal('publish'),
  topic: z.string().min(1),
  payload: z.unknown(),
});

/** Where inbound `publish` frames from edge devices are forwarded. */
export interface FramePublisher {
  publish(topic: string, payload: unknown): number;
}

export class WsGateway implements StreamPublisherPort {
  private readonly wss: WebSocketServer;
  private readonly clients = new Set<WebSocket>();

  constructor(
    server: Server,
    private readonly inbound?: FramePublisher,
  ) {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      ws.on('message', (data: RawData) => {
        this.handleFrame(data.toString());
      });
      ws.on('close', () => this.clients.delete(ws));
      ws.on('error', () => this.clients.delete(ws));
    });

    console.log('[ws-gateway] listening on /ws');
  }

  /** Returns true when the frame was forwarded to the inbound publisher. */
  handleFrame(raw: string): boolean {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      console.warn('[ws-gateway] ignoring non-JSON frame');
      return false;
    }
    const frame = inboundFrameSchema.safeParse(json);
    if (!frame.success) {
      console.warn('[ws-gateway] ignoring invalid frame:', frame.error.issues[0]?.message);
      return false;
    }
    if (!this.inbound) return false;
    this.inbound.publish(frame.data.topic, frame.data.payload);
    return true;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  close(): Promise<void> {
    for (const client of this.clients) client.terminate();
    this.clients.clear();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private broadcast(msg: WsMessage): void {
    const payload = JSON.stringify(msg);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  async publishHealth(vehicleId: string, record: HealthRecord | null): Promise<void> {
    this.broadcast({ type: 'health', vehicleId, data: record });
  }

  async publishAlerts(alerts: readonly BatteryAlert[]): Promise<void> {
    this.broadcast({ type: 'alerts', data: alerts });
  }
}
