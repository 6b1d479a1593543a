import type { BatteryAnalytics, HealthRecord, HealthTrend } from '@voltwatch/domain';

export const DEFAULT_ANALYTICS_PERIOD_MS = 24 * 60 * 60 * 1000;

/** Minimum window size before a trend other than "stable" is reported. */
const TREND_MIN_POINTS = 10;
/** SOH percentage points the half-window means must differ by. */
const TREND_DELTA = 2;

export interface AnalyticsWindow {
  periodMs?: number;
  now: Date;
}

function round(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function periodLabel(periodMs: number): string {
  return `${Math.floor(periodMs / 3_600_000)} hours`;
}

/** First half is the first floor(n/2) samples; the second half takes the rest. */
export function classifyTrend(sohSeries: readonly number[]): HealthTrend {
  if (sohSeries.length < TREND_MIN_POINTS) return 'stable';
  const split = Math.floor(sohSeries.length / 2);
  const firstAvg = mean(sohSeries.slice(0, split));
  const secondAvg = mean(sohSeries.slice(split));
  if (secondAvg > firstAvg + TREND_DELTA) return 'improving';
  if (secondAvg < firstAvg - TREND_DELTA) return 'declining';
  return 'stable';
}

/** Stateless aggregation over a vehicle's history. */
export class AnalyticsEngine {
  computeAnalytics(history: readonly HealthRecord[], window: AnalyticsWindow): BatteryAnalytics {
    const periodMs = window.periodMs ?? DEFAULT_ANALYTICS_PERIOD_MS;
    const end = window.now.getTime();
    const start = end - periodMs;
    const inWindow = history.filter((r) => {
      const ts = r.timestamp.getTime();
      return ts > start && ts < end;
    });

    if (inWindow.length === 0) {
      return {
        averageVoltage: 0,
        averageSOC: 0,
        averageSOH: 0,
        voltageRange: { min: 0, max: 0 },
        trend: 'stable',
        dataPoints: 0,
        period: periodLabel(periodMs),
      };
    }

    const voltages = inWindow.map((r) => r.voltage);
    const socs = inWindow.map((r) => r.stateOfCharge);
    const sohs = inWindow.map((r) => r.stateOfHealth);

    return {
      averageVoltage: round(mean(voltages), 2),
      averageSOC: round(mean(socs), 1),
      averageSOH: round(mean(sohs), 1),
      voltageRange: { min: Math.min(...voltages), max: Math.max(...voltages) },
      trend: classifyTrend(sohs),
      dataPoints: inWindow.length,
      period: periodLabel(periodMs),
    };
  }
}
