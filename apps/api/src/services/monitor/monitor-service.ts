import type {
  AlertFilters,
  AlertRepositoryPort,
  AnalyticsOptions,
  BatteryAdminPort,
  BatteryAlert,
  BatteryAnalytics,
  BatteryIngestionPort,
  BatteryQueryPort,
  HealthBatch,
  HealthIngestResult,
  HealthRecord,
  HealthRecordRepositoryPort,
  HistoryOptions,
  TimeRange,
  VehicleScope,
} from '@voltwatch/domain';
import { wallClockNow, type Clock } from '@voltwatch/adapters';
import { HistoryStore, DEFAULT_MAX_HISTORY_ENTRIES } from '../history/history-store.js';
import { AnalyticsEngine } from '../analytics/analytics-engine.js';
import { AlertDetector } from '../rules/alert-detector.js';
import { AlertLedger, DEFAULT_MAX_ALERTS } from '../alerts/alert-ledger.js';
import { BroadcastChannel, type ChannelListener } from '../streams/broadcast-channel.js';
import { normalizeHealthPayload } from './payload-normalizer.js';

export const DEFAULT_RETENTION_MS = 7 * 24 * 60 * 60 * 1000;
export const DEFAULT_CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

export interface MonitorServiceOptions {
  now?: Clock;
  maxHistoryEntries?: number;
  maxAlerts?: number;
  retentionMs?: number;
  cleanupIntervalMs?: number;
  detector?: AlertDetector;
  /** Write-through sinks; failures are logged and never reach the caller. */
  healthSink?: HealthRecordRepositoryPort;
  alertSink?: AlertRepositoryPort;
}

export interface HealthUpdate {
  vehicleId: string;
  /** `null` after the vehicle's history was reset. */
  record: HealthRecord | null;
}

export interface SwapSimulation {
  fromVoltage?: number;
  toVoltage?: number;
  batteryType?: string;
  gapMs?: number;
}

export interface CleanupResult {
  historyRemoved: number;
  alertsRemoved: number;
}

interface VehicleState {
  history: HistoryStore;
  current: HealthRecord | null;
  health: BroadcastChannel<HealthRecord | null>;
}

/**
 * Owns every vehicle's history and the shared alert ledger.
 * Callers only see copies, or subscribe to the health and alert streams.
 */
export class MonitorService implements BatteryIngestionPort, BatteryQueryPort, BatteryAdminPort {
  private readonly vehicles = new Map<string, VehicleState>();
  private readonly allHealth = new BroadcastChannel<HealthUpdate>('vehicle-health');
  private readonly ledger: AlertLedger;
  private readonly analyticsEngine = new AnalyticsEngine();
  private readonly detector: AlertDetector;
  private readonly now: Clock;
  private readonly maxHistoryEntries: number;
  private readonly retentionMs: number;
  private readonly cleanupIntervalMs: number;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private disposed = false;

  constructor(private readonly options: MonitorServiceOptions = {}) {
    this.now = options.now ?? wallClockNow;
    this.maxHistoryEntries = options.maxHistoryEntries ?? DEFAULT_MAX_HISTORY_ENTRIES;
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    this.detector = options.detector ?? new AlertDetector();
    this.ledger = new AlertLedger(options.maxAlerts ?? DEFAULT_MAX_ALERTS);
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /** Starts the periodic retention cleanup. Idempotent. */
  start(): void {
    if (this.cleanupTimer || this.disposed) return;
    this.cleanupTimer = setInterval(() => {
      this.runCleanup();
    }, this.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  /** Prunes history and alerts older than the retention window. Never throws. */
  runCleanup(): CleanupResult {
    try {
      const cutoff = new Date(this.now().getTime() - this.retentionMs);
      let historyRemoved = 0;
      for (const state of this.vehicles.values()) {
        historyRemoved += state.history.pruneOlderThan(cutoff);
      }
      const alertsRemoved = this.ledger.pruneOlderThan(cutoff);
      if (historyRemoved > 0 || alertsRemoved > 0) {
        console.log(`[monitor] cleanup removed ${historyRemoved} records, ${alertsRemoved} alerts`);
      }
      return { historyRemoved, alertsRemoved };
    } catch (err) {
      console.error('[monitor] cleanup failed, retrying next tick:', err);
      return { historyRemoved: 0, alertsRemoved: 0 };
    }
  }

  dispose(): void {
    if (this.cleanupTimer) clearInterval(this.cleanupTimer);
    this.cleanupTimer = null;
    this.disposed = true;
    for (const state of this.vehicles.values()) {
      state.health.close();
    }
    this.vehicles.clear();
    this.allHealth.close();
    this.ledger.close();
  }

  // ─── Ingestion ──────────────────────────────────────────────────────────────

  ingest(vehicleId: string, payload: unknown): HealthRecord | null {
    if (this.disposed) return null;
    try {
      const result = normalizeHealthPayload(vehicleId, payload, this.now());
      if (!result.ok) {
        console.warn(`[monitor] dropped payload for ${vehicleId}: ${result.reason}`);
        return null;
      }
      if (result.defaulted.length > 0) {
        console.warn(`[monitor] ${vehicleId}: defaulted ${result.defaulted.join(', ')} to 0`);
      }

      const { record } = result;
      const state = this.vehicleState(vehicleId);
      state.history.append(record);
      this.persist('health record', () => this.options.healthSink?.append(record));

      const raised = this.detector.evaluate({
        record,
        history: state.history.snapshot(),
        alerts: this.ledger.query({ vehicleId }),
      });
      for (const alert of raised) {
        this.ledger.append(alert);
        this.persist(`alert ${alert.id}`, () => this.options.alertSink?.createAlert(alert));
      }

      state.current = record;
      this.publishHealth(vehicleId, state, record);
      return record;
    } catch (err) {
      console.error(`[monitor] ingest failed for ${vehicleId}:`, err);
      return null;
    }
  }

  ingestBatch(batch: HealthBatch): HealthIngestResult {
    let accepted = 0;
    for (const payload of batch.payloads) {
      if (this.ingest(batch.vehicleId, payload)) accepted++;
    }
    return { accepted, rejected: batch.payloads.length - accepted };
  }

  /** Ingests a good reading, then a near-dead one `gapMs` later, to exercise swap detection. */
  simulateBatterySwap(vehicleId: string, opts: SwapSimulation = {}): BatteryAlert[] {
    const fromVoltage = opts.fromVoltage ?? 8.8;
    const toVoltage = opts.toVoltage ?? 4.8;
    const batteryType = opts.batteryType ?? '9V';
    const gapMs = opts.gapMs ?? 2000;
    const before = new Set(this.ledger.query({ vehicleId }).map((a) => a.id));
    const start = this.now().getTime();

    this.ingest(vehicleId, {
      voltage: fromVoltage,
      soc: 80,
      soh: 95,
      status: 'good',
      battery_type: batteryType,
      timestamp: new Date(start - gapMs).toISOString(),
      simulated: true,
    });
    this.ingest(vehicleId, {
      voltage: toVoltage,
      soc: 0,
      soh: 95,
      status: 'dead',
      battery_type: batteryType,
      timestamp: new Date(start).toISOString(),
      simulated: true,
    });

    return this.ledger
      .query({ vehicleId })
      .filter((a) => !before.has(a.id))
      .reverse();
  }

  // ─── Queries ────────────────────────────────────────────────────────────────

  currentHealth(vehicleId: string): HealthRecord | null {
    return this.vehicles.get(vehicleId)?.current ?? null;
  }

  history(vehicleId: string, opts: HistoryOptions = {}): HealthRecord[] {
    return this.vehicles.get(vehicleId)?.history.snapshot(opts.limit) ?? [];
  }

  historyInRange(vehicleId: string, range: TimeRange): HealthRecord[] {
    return this.vehicles.get(vehicleId)?.history.query(range) ?? [];
  }

  analytics(vehicleId: string, opts: AnalyticsOptions = {}): BatteryAnalytics {
    return this.analyticsEngine.computeAnalytics(this.history(vehicleId), {
      periodMs: opts.periodMs,
      now: this.now(),
    });
  }

  vehicleIds(): string[] {
    return [...this.vehicles.keys()];
  }

  // ─── Alerts ─────────────────────────────────────────────────────────────────

  alerts(filters: AlertFilters = {}): BatteryAlert[] {
    return this.ledger.query(filters);
  }

  unreadCount(scope: VehicleScope = {}): number {
    return this.ledger.unreadCount(scope);
  }

  markRead(alertId: string): boolean {
    const changed = this.ledger.markRead(alertId);
    if (changed) this.persist('read state', () => this.options.alertSink?.markRead([alertId]));
    return changed;
  }

  markAllRead(scope: VehicleScope = {}): void {
    const ids = this.ledger.markAllRead(scope);
    if (ids.length > 0) this.persist('read state', () => this.options.alertSink?.markRead(ids));
  }

  removeAlert(alertId: string): boolean {
    return this.ledger.remove(alertId);
  }

  clearAlerts(scope: VehicleScope = {}): void {
    this.ledger.clear(scope);
  }

  // ─── Admin ──────────────────────────────────────────────────────────────────

  clearHistory(vehicleId: string): void {
    const state = this.vehicles.get(vehicleId);
    if (!state) return;
    state.history.clear();
    state.current = null;
    this.publishHealth(vehicleId, state, null);
  }

  clearAllHistory(): void {
    for (const vehicleId of this.vehicles.keys()) {
      this.clearHistory(vehicleId);
    }
  }

  resetAnalyticsWindow(keepMs: number): void {
    if (keepMs <= 0) {
      this.clearAllHistory();
      return;
    }
    const cutoff = new Date(this.now().getTime() - keepMs);
    for (const [vehicleId, state] of this.vehicles) {
      state.history.pruneOlderThan(cutoff);
      const latest = state.history.latest();
      if (!latest) state.current = null;
      this.publishHealth(vehicleId, state, latest);
    }
  }

  // ─── Streams ────────────────────────────────────────────────────────────────

  subscribeHealth(vehicleId: string, listener: ChannelListener<HealthRecord | null>): () => void {
    if (this.disposed) return () => undefined;
    return this.vehicleState(vehicleId).health.subscribe(listener);
  }

  subscribeAllHealth(listener: ChannelListener<HealthUpdate>): () => void {
    return this.allHealth.subscribe(listener);
  }

  subscribeAlerts(listener: ChannelListener<readonly BatteryAlert[]>): () => void {
    return this.ledger.subscribe(listener);
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private vehicleState(vehicleId: string): VehicleState {
    let state = this.vehicles.get(vehicleId);
    if (!state) {
      state = {
        history: new HistoryStore(this.maxHistoryEntries),
        current: null,
        health: new BroadcastChannel<HealthRecord | null>(`health:${vehicleId}`),
      };
      this.vehicles.set(vehicleId, state);
    }
    return state;
  }

  private publishHealth(vehicleId: string, state: VehicleState, record: HealthRecord | null): void {
    state.health.publish(record);
    this.allHealth.publish({ vehicleId, record });
  }

  private persist(what: string, write: () => Promise<void> | undefined): void {
    try {
      void write()?.catch((err: unknown) => {
        console.error(`[monitor] failed to persist ${what}:`, err);
      });
    } catch (err) {
      console.error(`[monitor] failed to persist ${what}:`, err);
    }
  }
}
