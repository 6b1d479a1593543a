import { z } from 'zod';
import { BATTERY_STATUSES } from '@voltwatch/domain';
import type { BatteryStatus, HealthRecord } from '@voltwatch/domain';

export const DEFAULT_RECOMMENDATION = 'No recommendation available';
export const UNKNOWN_BATTERY_TYPE = 'unknown';

// Invalid values fall back to undefined and are defaulted below.
const num = z.number().finite().optional().catch(undefined);
const str = z.string().optional().catch(undefined);

const RECOGNISED_FIELDS: ReadonlySet<string> = new Set([
  'voltage',
  'soc',
  'soh',
  'status',
  'recommendation',
  'estimated_hours',
  'estimatedHours',
  'battery_type',
  'batteryType',
  'timestamp',
  'metadata',
]);

const healthPayloadSchema = z.object({
  voltage: num,
  soc: num,
  soh: num,
  status: str,
  recommendation: str,
  estimated_hours: num,
  estimatedHours: num,
  battery_type: str,
  batteryType: str,
  timestamp: str,
  metadata: z.record(z.unknown()).optional().catch(undefined),
});

export type NormalizeResult =
  | { ok: true; record: HealthRecord; defaulted: string[] }
  | { ok: false; reason: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseStatus(token: string | undefined): BatteryStatus {
  const lowered = token?.toLowerCase();
  return BATTERY_STATUSES.find((s) => s === lowered) ?? 'unknown';
}

function parseTimestamp(raw: string | undefined, now: Date): Date {
  if (raw === undefined) return now;
  const parsed = new Date(raw);
  return Number.isNaN(parsed.getTime()) ? now : parsed;
}

/**
 * Turns a decoded transport record into a HealthRecord. Missing or invalid
 * numerics become 0, unknown enums "unknown", and the timestamp falls back to `now`.
 * Only a payload that is not an object at all is rejected.
 */
export function normalizeHealthPayload(
  vehicleId: string,
  payload: unknown,
  now: Date,
): NormalizeResult {
  if (!isPlainObject(payload)) {
    return { ok: false, reason: `payload is not an object (${Array.isArray(payload) ? 'array' : typeof payload})` };
  }

  const fields = healthPayloadSchema.parse(payload);
  const defaulted: string[] = [];
  const numeric = (name: 'voltage' | 'soc' | 'soh'): number => {
    const value = fields[name];
    if (value === undefined) {
      defaulted.push(name);
      return 0;
    }
    return value;
  };

  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!RECOGNISED_FIELDS.has(key)) extras[key] = value;
  }
  const hasMetadata = fields.metadata !== undefined || Object.keys(extras).length > 0;
  const estimatedRuntimeHours = fields.estimated_hours ?? fields.estimatedHours;

  const record: HealthRecord = {
    vehicleId,
    voltage: numeric('voltage'),
    stateOfCharge: numeric('soc'),
    stateOfHealth: numeric('soh'),
    status: parseStatus(fields.status),
    recommendation: fields.recommendation ?? DEFAULT_RECOMMENDATION,
    ...(estimatedRuntimeHours !== undefined ? { estimatedRuntimeHours } : {}),
    batteryType: fields.battery_type ?? fields.batteryType ?? UNKNOWN_BATTERY_TYPE,
    timestamp: parseTimestamp(fields.timestamp, now),
    ...(hasMetadata ? { metadata: Object.freeze({ ...extras, ...fields.metadata }) } : {}),
  };

  return { ok: true, record: Object.freeze(record), defaulted };
}
