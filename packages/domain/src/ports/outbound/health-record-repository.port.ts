import type { HealthRecord } from '../../entities/health-record.js';

/** Append-only sink for ingested snapshots. */
export interface HealthRecordRepositoryPort {
  append(record: HealthRecord): Promise<void>;
}
