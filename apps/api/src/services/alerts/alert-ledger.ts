import { severityRank } from '@voltwatch/domain';
import type { AlertFilters, BatteryAlert, VehicleScope } from '@voltwatch/domain';
import { BroadcastChannel, type ChannelListener } from '../streams/broadcast-channel.js';

export const DEFAULT_MAX_ALERTS = 100;

function logAlert(alert: BatteryAlert): void {
  const line = `[alerts] ${alert.severity.toUpperCase()} ${alert.vehicleId}: ${alert.title}`;
  const rank = severityRank(alert.severity);
  if (rank >= severityRank('critical')) console.error(line);
  else if (rank >= severityRank('warning')) console.warn(line);
  else console.log(line);
}

/**
 * Newest-first, bounded alert list shared by all vehicles.
 * Every change broadcasts the full snapshot to subscribers.
 */
export class AlertLedger {
  private entries: BatteryAlert[] = [];
  private readonly channel = new BroadcastChannel<readonly BatteryAlert[]>('alert-ledger');

  constructor(readonly maxAlerts: number = DEFAULT_MAX_ALERTS) {}

  append(alert: BatteryAlert): void {
    this.entries.unshift(alert);
    if (this.entries.length > this.maxAlerts) {
      this.entries.length = this.maxAlerts;
    }
    logAlert(alert);
    this.broadcast();
  }

  /** Returns false when no unread alert has that id. */
  markRead(alertId: string): boolean {
    const index = this.entries.findIndex((a) => a.id === alertId);
    const current = this.entries[index];
    if (!current || current.isRead) return false;
    this.entries[index] = Object.freeze({ ...current, isRead: true });
    this.broadcast();
    return true;
  }

  /** Returns the ids that changed state. */
  markAllRead(scope: VehicleScope = {}): string[] {
    const changed: string[] = [];
    this.entries = this.entries.map((a) => {
      if (a.isRead || !inScope(a, scope)) return a;
      changed.push(a.id);
      return Object.freeze({ ...a, isRead: true });
    });
    this.broadcast();
    return changed;
  }

  remove(alertId: string): boolean {
    const before = this.entries.length;
    this.entries = this.entries.filter((a) => a.id !== alertId);
    if (this.entries.length === before) return false;
    this.broadcast();
    return true;
  }

  clear(scope: VehicleScope = {}): void {
    this.entries = scope.vehicleId === undefined ? [] : this.entries.filter((a) => !inScope(a, scope));
    this.broadcast();
  }

  /** Drops alerts stamped before `cutoff`. Returns how many were removed. */
  pruneOlderThan(cutoff: Date): number {
    const limit = cutoff.getTime();
    const before = this.entries.length;
    this.entries = this.entries.filter((a) => a.timestamp.getTime() >= limit);
    const removed = before - this.entries.length;
    if (removed > 0) this.broadcast();
    return removed;
  }

  query(filters: AlertFilters = {}): BatteryAlert[] {
    return this.entries.filter((a) => inScope(a, filters) && !(filters.unreadOnly && a.isRead));
  }

  unreadCount(scope: VehicleScope = {}): number {
    return this.entries.filter((a) => !a.isRead && inScope(a, scope)).length;
  }

  /** Late subscribers only see changes made after subscribing. */
  subscribe(listener: ChannelListener<readonly BatteryAlert[]>): () => void {
    return this.channel.subscribe(listener);
  }

  close(): void {
    this.channel.close();
  }

  get size(): number {
    return this.entries.length;
  }

  private broadcast(): void {
    this.channel.publish(Object.freeze([...this.entries]));
  }
}

function inScope(alert: BatteryAlert, scope: VehicleScope): boolean {
  return scope.vehicleId === undefined || alert.vehicleId === scope.vehicleId;
}
