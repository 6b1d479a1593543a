import type { BatteryClass } from '@voltwatch/domain';

export const AlertReasons = {
  dispose: 'absolute_dispose_<=4_5V',
  swap: 'swap_detected',
} as const;

export type VoltageProfile = {
  criticalV: number;
  lowV: number;
};

export type AlertRulesConfig = {
  profiles: Record<BatteryClass, VoltageProfile>;
  voltageTier: {
    criticalSoc: number;
    lowSoc: number;
    /** Any batteryLow alert this recent suppresses a new low warning. */
    lowDebounceMs: number;
  };
  dispose: {
    /** Absolute floor regardless of battery class. */
    voltage: number;
    /** A reading above voltage + margin re-arms the rule. */
    recoveryMargin: number;
  };
  healthDegradation: {
    soh: number;
    /** Below this the alert is a warning, otherwise info. */
    warningSoh: number;
    debounceMs: number;
  };
  suddenDrop: {
    windowMs: number;
    deltaV: number;
  };
  swap: {
    veryLowV: number;
    /** Previous reading counts as good at lowV + margin. */
    goodMargin: number;
    maxGapMs: number;
    debounceMs: number;
  };
};

export const DEFAULT_ALERT_RULES: AlertRulesConfig = {
  profiles: {
    '9V': { criticalV: 6.5, lowV: 7.5 },
    '12V': { criticalV: 11.5, lowV: 12.0 },
  },
  voltageTier: {
    criticalSoc: 10,
    lowSoc: 25,
    lowDebounceMs: 30 * 60 * 1000,
  },
  dispose: {
    voltage: 4.5,
    recoveryMargin: 0.2,
  },
  healthDegradation: {
    soh: 70,
    warningSoh: 60,
    debounceMs: 24 * 60 * 60 * 1000,
  },
  suddenDrop: {
    windowMs: 30 * 1000,
    deltaV: 1.0,
  },
  swap: {
    veryLowV: 5.0,
    goodMargin: 0.5,
    maxGapMs: 2 * 60 * 1000,
    debounceMs: 15 * 1000,
  },
};
