export interface TransportMessage {
  topic: string;
  /** Decoded JSON-like record, or a raw JSON string. */
  payload: unknown;
}

export type TransportHandler = (message: TransportMessage) => void;

/** Publish/subscribe message source keyed by topic. */
export interface TelemetrySourcePort {
  /**
   * Subscribe to an MQTT-style pattern (`+` = one level, `#` = remaining levels).
   * Returns an unsubscribe function.
   */
  subscribe(pattern: string, handler: TransportHandler): () => void;
}
