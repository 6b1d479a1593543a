import type { AlertRepositoryPort, BatteryAlert } from '@voltwatch/domain';
import { getPool, type Queryable } from './pool.js';

export class PgAlertRepository implements AlertRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async createAlert(alert: BatteryAlert): Promise<void> {
    await this.db.query(
      `INSERT INTO battery.alerts
         (id, vehicle_id, ts, alert_type, severity, title, message, is_read, data)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)
       ON CONFLICT (id) DO NOTHING`,
      [
        alert.id,
        alert.vehicleId,
        alert.timestamp,
        alert.type,
        alert.severity,
        alert.title,
        alert.message,
        alert.isRead,
        JSON.stringify(alert.data ?? {}),
      ],
    );
  }

  async markRead(alertIds: string[]): Promise<void> {
    if (alertIds.length === 0) return;
    await this.db.query(
      `UPDATE battery.alerts
       SET is_read = TRUE, updated_at = NOW()
       WHERE id = ANY($1::text[])`,
      [alertIds],
    );
  }
}
