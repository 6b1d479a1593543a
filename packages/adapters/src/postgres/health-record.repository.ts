import type { HealthRecord, HealthRecordRepositoryPort } from '@voltwatch/domain';
import { getPool, type Queryable } from './pool.js';

export class PgHealthRecordRepository implements HealthRecordRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async append(record: HealthRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO battery.health_records
         (vehicle_id, ts, voltage, soc, soh, status, recommendation,
          estimated_hours, battery_type, metadata)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10)`,
      [
        record.vehicleId,
        record.timestamp,
        record.voltage,
        record.stateOfCharge,
        record.stateOfHealth,
        record.status,
        record.recommendation,
        record.estimatedRuntimeHours ?? null,
        record.batteryType,
        JSON.stringify(record.metadata ?? {}),
      ],
    );
  }
}
