import type { BatteryAlert } from '../../entities/battery-alert.js';

/** Write-through sink for alerts raised by the detector. */
export interface AlertRepositoryPort {
  createAlert(alert: BatteryAlert): Promise<void>;
  markRead(alertIds: string[]): Promise<void>;
}
