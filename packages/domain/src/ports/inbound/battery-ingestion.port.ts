import type { HealthRecord } from '../../entities/health-record.js';

// ---------------------------------------------------------------------------
// Inbound health payload (decoded transport record)
// ---------------------------------------------------------------------------

/**
 * Fields recognised on a battery-health payload. Everything is optional on
 * the wire; missing or invalid values are defaulted during normalization.
 */
export interface RawHealthPayload {
  voltage?: number;
  soc?: number;
  soh?: number;
  status?: string;
  recommendation?: string;
  estimated_hours?: number;
  battery_type?: string;
  /** ISO-8601; ingest time when absent or unparseable */
  timestamp?: string;
  metadata?: Record<string, unknown>;
  [extra: string]: unknown;
}

export interface HealthBatch {
  vehicleId: string;
  payloads: unknown[];
}

export interface HealthIngestResult {
  accepted: number;
  rejected: number;
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface BatteryIngestionPort {
  /** Never throws; returns null when the payload could not be ingested. */
  ingest(vehicleId: string, payload: unknown): HealthRecord | null;
  ingestBatch(batch: HealthBatch): HealthIngestResult;
}
