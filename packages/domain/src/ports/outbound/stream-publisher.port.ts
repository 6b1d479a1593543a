import type { HealthRecord } from '../../entities/health-record.js';
import type { BatteryAlert } from '../../entities/battery-alert.js';

export interface StreamPublisherPort {
  /** `null` means the vehicle's history was reset. */
  publishHealth(vehicleId: string, record: HealthRecord | null): Promise<void>;
  /** Full newest-first alert snapshot after every ledger change. */
  publishAlerts(alerts: readonly BatteryAlert[]): Promise<void>;
}
