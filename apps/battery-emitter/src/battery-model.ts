import { SeededRng } from '@voltwatch/adapters';
import { isCriticalStatus, needsAttention } from '@voltwatch/domain';
import type { RawHealthPayload } from '@voltwatch/domain';

/** Voltage bands of a 9V alkaline cell measured without load. */
export const NINE_VOLT_BANDS = {
  nominal: 9.0,
  fresh: 9.5,
  good: 8.5,
  weak: 7.5,
  dead: 6.0,
} as const;

/** Typical life of a fresh 9V alkaline cell, in hours. */
const BASE_LIFE_HOURS = 20;

export type CellStatus = 'fresh' | 'good' | 'weak' | 'low' | 'dead';

export interface CellAssessment {
  voltage: number;
  soc: number;
  soh: number;
  status: CellStatus;
  recommendation: string;
  estimatedHours: number;
}

const round = (value: number, digits: number) => {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
};

/** Piecewise-linear state of charge: 100 / 80 / 40 / 10 / 0 at the band edges. */
export function stateOfCharge(voltage: number): number {
  const b = NINE_VOLT_BANDS;
  if (voltage >= b.fresh) return 100;
  if (voltage >= b.good) return 80 + ((voltage - b.good) / (b.fresh - b.good)) * 20;
  if (voltage >= b.weak) return 40 + ((voltage - b.weak) / (b.good - b.weak)) * 40;
  if (voltage >= b.dead) return 10 + ((voltage - b.dead) / (b.weak - b.dead)) * 30;
  return 0;
}

export function cellStatus(voltage: number): { status: CellStatus; recommendation: string } {
  const b = NINE_VOLT_BANDS;
  if (voltage >= b.fresh) return { status: 'fresh', recommendation: 'Battery is fresh and ready to use' };
  if (voltage >= b.good) return { status: 'good', recommendation: 'Battery is in good condition' };
  if (voltage >= b.weak) {
    return { status: 'weak', recommendation: 'Battery is getting weak, consider replacement soon' };
  }
  if (voltage >= b.dead) return { status: 'low', recommendation: 'Battery is low, replace soon' };
  return { status: 'dead', recommendation: 'Battery is dead, replace immediately' };
}

export function estimatedHours(voltage: number, soc: number): number {
  if (voltage >= NINE_VOLT_BANDS.good) return (soc / 100) * BASE_LIFE_HOURS;
  if (voltage >= NINE_VOLT_BANDS.weak) return Math.min(5, (soc / 100) * 8);
  return Math.min(1, (soc / 100) * 2);
}

export function assessCell(voltage: number): CellAssessment {
  const soc = stateOfCharge(voltage);
  const soh = Math.min(100, Math.max(0, (voltage / NINE_VOLT_BANDS.nominal) * 100));
  return {
    voltage: round(voltage, 2),
    soc: round(soc, 1),
    soh: round(soh, 1),
    ...cellStatus(voltage),
    estimatedHours: round(estimatedHours(voltage, soc), 2),
  };
}

export interface SimulatorOptions {
  startVoltage?: number;
  drainPerTick?: number;
  /** Peak voltage noise added each tick. */
  noise?: number;
  batteryType?: string;
  /** Replace the cell with a near-dead one on this tick (1-based). */
  swapAfterTicks?: number;
  swapVoltage?: number;
  seed?: number;
}

/** Wire payload accepted by `POST /api/ingest/:vehicleId/health`. */
export interface HealthPayload extends RawHealthPayload {
  voltage: number;
  soc: number;
  soh: number;
  status: CellStatus;
  recommendation: string;
  estimated_hours: number;
  battery_type: string;
  measurement_method: 'voltage_only';
  timestamp: string;
}

export type TransitionLevel = 'warn' | 'info';

/** How loudly to report a status change; null when the status is unchanged or healthy. */
export function transitionLevel(previous: CellStatus | undefined, next: CellStatus): TransitionLevel | null {
  if (previous === next) return null;
  if (isCriticalStatus(next)) return 'warn';
  return needsAttention(next) ? 'info' : null;
}

/** A draining cell. Each `tick` advances one emit interval. */
export class BatterySimulator {
  private voltage: number;
  private ticks = 0;
  private readonly rng: SeededRng;

  constructor(private readonly opts: SimulatorOptions = {}) {
    this.voltage = opts.startVoltage ?? 9.6;
    this.rng = new SeededRng(opts.seed ?? 1);
  }

  tick(now: Date): HealthPayload {
    this.ticks++;
    if (this.opts.swapAfterTicks !== undefined && this.ticks === this.opts.swapAfterTicks) {
      this.voltage = this.opts.swapVoltage ?? 4.8;
    } else {
      const drain = this.opts.drainPerTick ?? 0.01;
      this.voltage = Math.max(0, this.voltage - drain + this.rng.jitter(this.opts.noise ?? 0));
    }

    const cell = assessCell(this.voltage);
    return {
      voltage: cell.voltage,
      soc: cell.soc,
      soh: cell.soh,
      status: cell.status,
      recommendation: cell.recommendation,
      estimated_hours: cell.estimatedHours,
      battery_type: this.opts.batteryType ?? '9V_alkaline',
      measurement_method: 'voltage_only',
      timestamp: now.toISOString(),
    };
  }

  get tickCount(): number {
    return this.ticks;
  }
}
