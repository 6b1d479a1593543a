export type HealthTrend = 'improving' | 'declining' | 'stable';

export interface VoltageRange {
  readonly min: number;
  readonly max: number;
}

/** Aggregates over a vehicle's history window ending at "now". */
export interface BatteryAnalytics {
  readonly averageVoltage: number;
  readonly averageSOC: number;
  readonly averageSOH: number;
  readonly voltageRange: VoltageRange;
  readonly trend: HealthTrend;
  readonly dataPoints: number;
  /** e.g. "24 hours" */
  readonly period: string;
}
