import type { HealthRecord } from '../../entities/health-record.js';
import type { BatteryAlert } from '../../entities/battery-alert.js';
import type { BatteryAnalytics } from '../../entities/battery-analytics.js';

export interface TimeRange {
  startTime: Date;
  endTime: Date;
}

export interface HistoryOptions {
  /** Return only the N most recent records, still in chronological order. */
  limit?: number;
}

export interface AnalyticsOptions {
  /** Window length ending at "now"; defaults to 24 hours. */
  periodMs?: number;
}

export interface AlertFilters {
  vehicleId?: string;
  unreadOnly?: boolean;
}

export interface VehicleScope {
  vehicleId?: string;
}

/** Read queries and alert housekeeping consumed by the UI or CLI collaborator. */
export interface BatteryQueryPort {
  currentHealth(vehicleId: string): HealthRecord | null;
  history(vehicleId: string, opts?: HistoryOptions): HealthRecord[];
  historyInRange(vehicleId: string, range: TimeRange): HealthRecord[];
  analytics(vehicleId: string, opts?: AnalyticsOptions): BatteryAnalytics;
  alerts(filters?: AlertFilters): BatteryAlert[];
  unreadCount(scope?: VehicleScope): number;
  markRead(alertId: string): boolean;
  markAllRead(scope?: VehicleScope): void;
  removeAlert(alertId: string): boolean;
  clearAlerts(scope?: VehicleScope): void;
}

/** Administrative resets. */
export interface BatteryAdminPort {
  clearHistory(vehicleId: string): void;
  clearAllHistory(): void;
  /** `keepMs <= 0` clears everything; otherwise drops records older than now - keepMs. */
  resetAnalyticsWindow(keepMs: number): void;
}
