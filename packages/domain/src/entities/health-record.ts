export type BatteryStatus = 'fresh' | 'good' | 'weak' | 'low' | 'dead' | 'unknown';

export const BATTERY_STATUSES: readonly BatteryStatus[] = [
  'fresh',
  'good',
  'weak',
  'low',
  'dead',
  'unknown',
] as const;

/** Threshold profile selected from the battery type string. */
export type BatteryClass = '9V' | '12V';

/** One battery snapshot for a vehicle. Immutable once normalized. */
export interface HealthRecord {
  readonly vehicleId: string;
  /** Volts. Negative values are an "unavailable" sentinel from the edge device. */
  readonly voltage: number;
  /** State of charge, 0–100 %. */
  readonly stateOfCharge: number;
  /** State of health, 0–100 %. */
  readonly stateOfHealth: number;
  readonly status: BatteryStatus;
  readonly recommendation: string;
  readonly estimatedRuntimeHours?: number;
  readonly batteryType: string;
  readonly timestamp: Date;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export function batteryClassOf(batteryType: string): BatteryClass {
  const type = batteryType.toLowerCase();
  return type.includes('9v') || type.includes('alkaline') ? '9V' : '12V';
}

export function isCriticalStatus(status: BatteryStatus): boolean {
  return status === 'dead' || status === 'low';
}

export function needsAttention(status: BatteryStatus): boolean {
  return status === 'weak' || isCriticalStatus(status);
}
