import { batteryClassOf } from '@voltwatch/domain';
import type { BatteryAlert, BatteryClass, HealthRecord } from '@voltwatch/domain';
import {
  AlertReasons,
  DEFAULT_ALERT_RULES,
  type AlertRulesConfig,
  type VoltageProfile,
} from './alert-rules.config.js';
import {
  createCriticalBatteryAlert,
  createDisposalAlert,
  createHealthDegradationAlert,
  createLowBatteryAlert,
  createSuddenDropAlert,
} from './alert-factory.js';

export interface DetectionInput {
  record: HealthRecord;
  /** Vehicle history in stored order; may end with `record` itself. */
  history: readonly HealthRecord[];
  /** The vehicle's existing alerts, newest first. */
  alerts: readonly BatteryAlert[];
}

interface RuleContext {
  record: HealthRecord;
  /** History strictly before `record`. */
  prior: readonly HealthRecord[];
  /** Alerts raised earlier in this pass, then the stored ones. Newest first. */
  alerts: readonly BatteryAlert[];
  batteryClass: BatteryClass;
  profile: VoltageProfile;
  config: AlertRulesConfig;
}

interface DetectionRule {
  id: string;
  evaluate: (ctx: RuleContext) => BatteryAlert | null;
}

function ageMs(alert: BatteryAlert, record: HealthRecord): number {
  return record.timestamp.getTime() - alert.timestamp.getTime();
}

function readingOf(record: HealthRecord) {
  return {
    vehicleId: record.vehicleId,
    voltage: record.voltage,
    soc: record.stateOfCharge,
    batteryType: record.batteryType,
    timestamp: record.timestamp,
  };
}

function isDisposalAlert(alert: BatteryAlert): boolean {
  return alert.type === 'batteryLow' && alert.data?.['reason'] === AlertReasons.dispose;
}

function isSwapAlert(alert: BatteryAlert): boolean {
  return alert.type === 'suddenDrop' && alert.data?.['reason'] === AlertReasons.swap;
}

// First matching branch wins: disposal, then critical, then low.
const voltageTierRule: DetectionRule = {
  id: 'voltage_tier',
  evaluate: ({ record, prior, alerts, profile, config }) => {
    const { voltage, stateOfCharge: soc } = record;

    if (voltage <= config.dispose.voltage) {
      const last = alerts.find(isDisposalAlert);
      if (!last) return createDisposalAlert(readingOf(record));
      const rearmAbove = config.dispose.voltage + config.dispose.recoveryMargin;
      const recovered = prior.some(
        (h) => h.timestamp.getTime() > last.timestamp.getTime() && h.voltage > rearmAbove,
      );
      return recovered ? createDisposalAlert(readingOf(record)) : null;
    }

    if (voltage <= profile.criticalV || soc <= config.voltageTier.criticalSoc) {
      return createCriticalBatteryAlert(readingOf(record));
    }

    if (voltage <= profile.lowV || soc <= config.voltageTier.lowSoc) {
      const recent = alerts.some(
        (a) => a.type === 'batteryLow' && ageMs(a, record) < config.voltageTier.lowDebounceMs,
      );
      return recent ? null : createLowBatteryAlert(readingOf(record));
    }

    return null;
  },
};

const healthDegradationRule: DetectionRule = {
  id: 'health_degradation',
  evaluate: ({ record, alerts, config }) => {
    const rule = config.healthDegradation;
    if (record.stateOfHealth > rule.soh) return null;
    const recent = alerts.some(
      (a) => a.type === 'healthDegradation' && ageMs(a, record) < rule.debounceMs,
    );
    if (recent) return null;
    return createHealthDegradationAlert(
      {
        vehicleId: record.vehicleId,
        soh: record.stateOfHealth,
        batteryType: record.batteryType,
        timestamp: record.timestamp,
      },
      rule.warningSoh,
    );
  },
};

// A healthy reading followed shortly by a near-dead one reads as a battery swap.
const swapRule: DetectionRule = {
  id: 'battery_swap',
  evaluate: ({ record, prior, alerts, profile, config }) => {
    const rule = config.swap;
    if (record.voltage > rule.veryLowV) return null;

    // Only the reading just before this one counts; a run of dead readings is one swap.
    const previous = prior[prior.length - 1];
    if (!previous) return null;
    const now = record.timestamp.getTime();
    if (now - previous.timestamp.getTime() > rule.maxGapMs) return null;
    if (previous.voltage < profile.lowV + rule.goodMargin) return null;

    const recent = alerts.some((a) => isSwapAlert(a) && ageMs(a, record) <= rule.debounceMs);
    if (recent) return null;

    return createSuddenDropAlert(
      {
        vehicleId: record.vehicleId,
        fromVoltage: previous.voltage,
        toVoltage: record.voltage,
        withinMs: now - previous.timestamp.getTime(),
        batteryType: record.batteryType,
        timestamp: record.timestamp,
      },
      {
        reason: AlertReasons.swap,
        detected: 'good_to_very_low',
        previousWasGood: previous.voltage,
        lowThreshold: profile.lowV,
        margin: rule.goodMargin,
      },
    );
  },
};

const suddenDropRule: DetectionRule = {
  id: 'sudden_drop',
  evaluate: ({ record, prior, alerts, config }) => {
    const rule = config.suddenDrop;
    const now = record.timestamp.getTime();
    const baseline =
      prior.find((h) => now - h.timestamp.getTime() <= rule.windowMs) ?? prior[prior.length - 1];
    if (!baseline) return null;

    const drop = baseline.voltage - record.voltage;
    if (drop < rule.deltaV) return null;

    const recent = alerts.some((a) => a.type === 'suddenDrop' && ageMs(a, record) <= rule.windowMs);
    if (recent) return null;

    return createSuddenDropAlert({
      vehicleId: record.vehicleId,
      fromVoltage: baseline.voltage,
      toVoltage: record.voltage,
      withinMs: now - baseline.timestamp.getTime(),
      batteryType: record.batteryType,
      timestamp: record.timestamp,
    });
  },
};

const RULES: DetectionRule[] = [voltageTierRule, healthDegradationRule, swapRule, suddenDropRule];

/**
 * Stateless rule pass over one freshly ingested record.
 * Debounce windows are measured against the record's own timestamp, and each rule
 * sees the alerts raised by the rules before it.
 */
export class AlertDetector {
  constructor(private readonly config: AlertRulesConfig = DEFAULT_ALERT_RULES) {}

  /** New alerts in the order they were raised. */
  evaluate(input: DetectionInput): BatteryAlert[] {
    const { record, history } = input;
    const prior =
      history[history.length - 1] === record ? history.slice(0, -1) : history.slice();
    const batteryClass = batteryClassOf(record.batteryType);
    const raised: BatteryAlert[] = [];

    for (const rule of RULES) {
      const alert = rule.evaluate({
        record,
        prior,
        alerts: [...raised.slice().reverse(), ...input.alerts],
        batteryClass,
        profile: this.config.profiles[batteryClass],
        config: this.config,
      });
      if (alert) raised.push(alert);
    }
    return raised;
  }

  get ruleIds(): string[] {
    return RULES.map((r) => r.id);
  }
}
