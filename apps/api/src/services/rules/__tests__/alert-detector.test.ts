import { describe, it, expect } from '@jest/globals';
import type { BatteryAlert, HealthRecord } from '@voltwatch/domain';
import { AlertDetector } from '../alert-detector.js';
import { AlertReasons } from '../alert-rules.config.js';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

const T0 = Date.parse('2026-01-01T00:00:00.000Z');
const SEC = 1000;
const MIN = 60 * SEC;

function reading(voltage: number, offsetMs: number, overrides: Partial<HealthRecord> = {}): HealthRecord {
  return {
    vehicleId: 'car_1',
    voltage,
    stateOfCharge: 80,
    stateOfHealth: 95,
    status: 'good',
    recommendation: 'ok',
    batteryType: '9V',
    timestamp: new Date(T0 + offsetMs),
    ...overrides,
  };
}

/** Feeds records one at a time the way the monitor does. Returns raised alerts in order. */
function replay(records: HealthRecord[], detector = new AlertDetector()): BatteryAlert[] {
  const history: HealthRecord[] = [];
  let ledger: BatteryAlert[] = [];
  const raised: BatteryAlert[] = [];
  for (const record of records) {
    history.push(record);
    for (const alert of detector.evaluate({ record, history, alerts: ledger })) {
      ledger = [alert, ...ledger];
      raised.push(alert);
    }
  }
  return raised;
}

const isDisposal = (a: BatteryAlert) => a.data?.['reason'] === AlertReasons.dispose;
const isSwap = (a: BatteryAlert) => a.data?.['reason'] === AlertReasons.swap;

// ─── Disposal ─────────────────────────────────────────────────────────────────

describe('AlertDetector — disposal hysteresis', () => {
  it('raises one disposal alert for a battery that stays dead', () => {
    const alerts = replay([reading(4.0, 0), reading(4.0, 10 * MIN), reading(4.0, 20 * MIN)]);

    expect(alerts.filter(isDisposal)).toHaveLength(1);
    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatchObject({
      type: 'batteryLow',
      severity: 'critical',
      title: 'Battery Disposed/Dead',
      message:
        'Voltage is at 4.00V (80.0%). This is <= 4.5V and indicates the battery should be disposed/replaced.',
    });
  });

  it('re-arms after a reading above 4.7V', () => {
    const alerts = replay([reading(4.0, 0), reading(4.8, 10 * MIN), reading(4.0, 20 * MIN)]);

    expect(alerts.filter(isDisposal)).toHaveLength(2);
  });

  it('does not re-arm on a recovery that stays at or below 4.7V', () => {
    const alerts = replay([reading(4.0, 0), reading(4.7, 10 * MIN), reading(4.0, 20 * MIN)]);

    expect(alerts.filter(isDisposal)).toHaveLength(1);
  });

  it('short-circuits the critical rule while suppressed', () => {
    const alerts = replay([
      reading(4.0, 0, { stateOfCharge: 0 }),
      reading(4.0, 10 * MIN, { stateOfCharge: 0 }),
    ]);

    expect(alerts).toHaveLength(1);
  });

  it('treats a negative voltage sentinel as disposal without throwing', () => {
    const alerts = replay([reading(-1, 0)]);

    expect(alerts).toHaveLength(1);
    expect(alerts[0]?.data).toMatchObject({ voltage: -1, soc: 80, batteryType: '9V' });
  });
});

// ─── Critical / low ───────────────────────────────────────────────────────────

describe('AlertDetector — voltage tiers', () => {
  it('fires a critical alert on every qualifying reading', () => {
    const alerts = replay([reading(6.0, 0), reading(6.0, MIN)]);

    expect(alerts.map((a) => a.severity)).toEqual(['critical', 'critical']);
    expect(alerts[0]?.title).toBe('Critical Battery Level');
    expect(alerts[0]?.message).toBe(
      'Battery voltage is critically low at 6.00V (80.0%). Immediate replacement required.',
    );
  });

  it('treats SOC at or below 10% as critical regardless of voltage', () => {
    const alerts = replay([reading(9.0, 0, { stateOfCharge: 10 })]);

    expect(alerts).toHaveLength(1);
    expect(alerts[0]?.severity).toBe('critical');
  });

  it('debounces low warnings within 30 minutes', () => {
    const twelveVolt = { batteryType: '12V' };
    const alerts = replay([reading(11.8, 0, twelveVolt), reading(11.8, 5 * MIN, twelveVolt)]);

    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatchObject({
      type: 'batteryLow',
      severity: 'warning',
      title: 'Low Battery Level',
      message: 'Battery voltage is low at 11.80V (80.0%). Consider replacement soon.',
    });
  });

  it('raises a second low warning once 30 minutes have passed', () => {
    const twelveVolt = { batteryType: '12V' };
    const alerts = replay([reading(11.8, 0, twelveVolt), reading(11.8, 31 * MIN, twelveVolt)]);

    expect(alerts).toHaveLength(2);
  });

  it('suppresses a low warning shortly after a critical alert', () => {
    const alerts = replay([reading(6.0, 0), reading(7.2, 5 * MIN)]);

    expect(alerts.map((a) => a.severity)).toEqual(['critical']);
  });

  it('uses SOC at or below 25% as a low trigger', () => {
    const alerts = replay([reading(9.0, 0, { stateOfCharge: 25 })]);

    expect(alerts.map((a) => a.severity)).toEqual(['warning']);
  });

  it('selects thresholds from the battery class', () => {
    // 7.0V is low for a 9V cell but critical for anything in the 12V class
    expect(replay([reading(7.0, 0)]).map((a) => a.severity)).toEqual(['warning']);
    expect(replay([reading(7.0, 0, { batteryType: 'lead-acid' })]).map((a) => a.severity)).toEqual([
      'critical',
    ]);
  });
});

// ─── Health degradation ───────────────────────────────────────────────────────

describe('AlertDetector — health degradation', () => {
  it('is info at 60–70% SOH and warning below 60%', () => {
    expect(replay([reading(9.0, 0, { stateOfHealth: 65 })])[0]).toMatchObject({
      type: 'healthDegradation',
      severity: 'info',
      title: 'Battery Health Degradation',
      message: 'Battery health has degraded to 65.0%. Monitor performance closely.',
    });
    expect(replay([reading(9.0, 0, { stateOfHealth: 55 })])[0]?.severity).toBe('warning');
  });

  it('debounces for 24 hours', () => {
    const degraded = { stateOfHealth: 65 };
    const alerts = replay([
      reading(9.0, 0, degraded),
      reading(9.0, 12 * 60 * MIN, degraded),
      reading(9.0, 25 * 60 * MIN, degraded),
    ]);

    expect(alerts.filter((a) => a.type === 'healthDegradation')).toHaveLength(2);
  });

  it('is evaluated alongside the voltage tiers', () => {
    const alerts = replay([reading(6.0, 0, { stateOfHealth: 50 })]);

    expect(alerts.map((a) => a.type)).toEqual(['batteryLow', 'healthDegradation']);
  });
});

// ─── Sudden drop / swap ───────────────────────────────────────────────────────

describe('AlertDetector — sudden drop', () => {
  it('flags a 1.8V drop within 10 seconds', () => {
    const alerts = replay([
      reading(8.8, 0, { stateOfCharge: 50 }),
      reading(7.0, 10 * SEC, { stateOfCharge: 50 }),
    ]);

    const drops = alerts.filter((a) => a.type === 'suddenDrop');
    expect(drops).toHaveLength(1);
    expect(drops[0]?.message).toBe(
      'Voltage dropped by 1.80V in 10s (from 8.80V to 7.00V). Investigate possible failure or disconnection.',
    );
    expect(drops[0]?.data).toMatchObject({
      fromVoltage: 8.8,
      toVoltage: 7.0,
      windowSeconds: 10,
      batteryType: '9V',
    });
    expect(drops[0]?.data?.['reason']).toBeUndefined();
  });

  it('ignores a 0.5V drop', () => {
    expect(replay([reading(8.8, 0), reading(8.3, 10 * SEC)])).toEqual([]);
  });

  it('uses the earliest sample inside the 30 second window as baseline', () => {
    const alerts = replay([reading(9.4, 0), reading(9.0, 5 * SEC), reading(8.3, 20 * SEC)]);

    const drop = alerts.find((a) => a.type === 'suddenDrop');
    expect(drop?.data).toMatchObject({ fromVoltage: 9.4, toVoltage: 8.3, windowSeconds: 20 });
  });

  it('falls back to the previous sample when none is inside the window', () => {
    const alerts = replay([reading(9.4, 0), reading(8.2, 5 * MIN)]);

    expect(alerts.find((a) => a.type === 'suddenDrop')?.data).toMatchObject({
      fromVoltage: 9.4,
      windowSeconds: 300,
    });
  });

  it('debounces drops for 30 seconds', () => {
    const alerts = replay([reading(9.4, 0), reading(8.2, 5 * SEC), reading(7.6, 10 * SEC)]);

    expect(alerts.filter((a) => a.type === 'suddenDrop')).toHaveLength(1);
  });
});

describe('AlertDetector — swap detection', () => {
  it('tags a good-to-very-low transition within 2 minutes as a swap', () => {
    const alerts = replay([reading(8.8, 0), reading(4.8, 60 * SEC)]);

    expect(alerts.map((a) => [a.type, a.severity])).toEqual([
      ['batteryLow', 'critical'],
      ['suddenDrop', 'critical'],
    ]);
    const swap = alerts.find(isSwap);
    expect(swap?.data).toMatchObject({
      reason: 'swap_detected',
      detected: 'good_to_very_low',
      previousWasGood: 8.8,
      lowThreshold: 7.5,
      margin: 0.5,
      fromVoltage: 8.8,
      toVoltage: 4.8,
      windowSeconds: 60,
    });
  });

  it('leaves a 3 minute gap to the generic drop rule', () => {
    const alerts = replay([reading(8.8, 0), reading(4.8, 3 * MIN)]);

    expect(alerts.filter(isSwap)).toHaveLength(0);
    const drops = alerts.filter((a) => a.type === 'suddenDrop');
    expect(drops).toHaveLength(1);
    expect(drops[0]?.data).toMatchObject({ fromVoltage: 8.8, toVoltage: 4.8, windowSeconds: 180 });
  });

  it('requires the earlier reading to be good for the battery class', () => {
    // 7.9V is below lowV + 0.5 for a 9V cell
    const alerts = replay([reading(7.9, 0), reading(4.8, 60 * SEC)]);

    expect(alerts.filter(isSwap)).toHaveLength(0);
  });

  it('debounces repeated swaps within 15 seconds', () => {
    const alerts = replay([
      reading(8.8, 0),
      reading(4.8, 60 * SEC),
      reading(8.8, 65 * SEC),
      reading(4.8, 70 * SEC),
    ]);

    expect(alerts.filter(isSwap)).toHaveLength(1);
  });

  it('raises one swap for a dead battery that keeps reporting', () => {
    const records = [reading(8.8, 0)];
    for (let t = 2 * SEC; t <= 120 * SEC; t += 2 * SEC) records.push(reading(4.8, t));

    const swaps = replay(records).filter(isSwap);

    expect(swaps).toHaveLength(1);
    expect(swaps[0]?.timestamp.getTime()).toBe(T0 + 2 * SEC);
  });

  it('only compares against the reading just before', () => {
    // 8.8V is inside the 2 minute gap, but the 7.0V reading sits between
    const alerts = replay([reading(8.8, 0), reading(7.0, 30 * SEC), reading(4.8, 60 * SEC)]);

    expect(alerts.filter(isSwap)).toHaveLength(0);
  });
});

describe('AlertDetector — output', () => {
  it('stamps alerts with the reading time and unique ids', () => {
    const alerts = replay([reading(6.0, 0, { stateOfHealth: 50 })]);

    expect(alerts.every((a) => a.timestamp.getTime() === T0)).toBe(true);
    expect(new Set(alerts.map((a) => a.id)).size).toBe(alerts.length);
    expect(alerts[0]?.id.startsWith(`alert_${T0}_`)).toBe(true);
    expect(alerts.every((a) => !a.isRead)).toBe(true);
  });

  it('returns frozen alerts', () => {
    const [alert] = replay([reading(6.0, 0)]);

    expect(Object.isFrozen(alert)).toBe(true);
    expect(Object.isFrozen(alert?.data)).toBe(true);
  });

  it('exposes its rule order', () => {
    expect(new AlertDetector().ruleIds).toEqual([
      'voltage_tier',
      'health_degradation',
      'battery_swap',
      'sudden_drop',
    ]);
  });
});
