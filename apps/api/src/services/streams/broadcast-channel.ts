export type ChannelListener<T> = (value: T) => void;

/**
 * Fire-and-forget fan-out for one stream. Late subscribers only see future
 * values. A throwing listener is logged and does not stop delivery to the rest.
 */
export class BroadcastChannel<T> {
  private readonly listeners = new Set<ChannelListener<T>>();
  private closed = false;

  constructor(private readonly name: string) {}

  /** Subscribe to future values. Returns an unsubscribe function. */
  subscribe(listener: ChannelListener<T>): () => void {
    if (this.closed) return () => undefined;
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(value: T): void {
    if (this.closed) return;
    for (const listener of [...this.listeners]) {
      try {
        listener(value);
      } catch (err) {
        console.error(`[${this.name}] listener error:`, err);
      }
    }
  }

  /** Drop all listeners; later publishes and subscribes are ignored. */
  close(): void {
    this.closed = true;
    this.listeners.clear();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.listeners.size;
  }
}
