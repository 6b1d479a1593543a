import { v4 as uuidv4 } from 'uuid';
import type { AlertSeverity, AlertType, BatteryAlert } from '@voltwatch/domain';
import { AlertReasons } from './alert-rules.config.js';

interface ReadingInput {
  vehicleId: string;
  voltage: number;
  soc: number;
  batteryType: string;
  timestamp: Date;
}

interface DropInput {
  vehicleId: string;
  fromVoltage: number;
  toVoltage: number;
  withinMs: number;
  batteryType: string;
  timestamp: Date;
}

/** Time-derived and unique even for alerts raised by the same record. */
export function newAlertId(timestamp: Date): string {
  return `alert_${timestamp.getTime()}_${uuidv4().slice(0, 8)}`;
}

function buildAlert(
  fields: {
    vehicleId: string;
    type: AlertType;
    severity: AlertSeverity;
    title: string;
    message: string;
    timestamp: Date;
  },
  data: Record<string, unknown>,
): BatteryAlert {
  return Object.freeze({
    id: newAlertId(fields.timestamp),
    ...fields,
    isRead: false,
    data: Object.freeze({ ...data }),
  });
}

function readingSummary(voltage: number, soc: number): string {
  return `${voltage.toFixed(2)}V (${soc.toFixed(1)}%)`;
}

export function createDisposalAlert(input: ReadingInput): BatteryAlert {
  return buildAlert(
    {
      vehicleId: input.vehicleId,
      type: 'batteryLow',
      severity: 'critical',
      title: 'Battery Disposed/Dead',
      message: `Voltage is at ${readingSummary(input.voltage, input.soc)}. This is <= 4.5V and indicates the battery should be disposed/replaced.`,
      timestamp: input.timestamp,
    },
    {
      voltage: input.voltage,
      soc: input.soc,
      batteryType: input.batteryType,
      reason: AlertReasons.dispose,
    },
  );
}

export function createCriticalBatteryAlert(input: ReadingInput): BatteryAlert {
  return buildAlert(
    {
      vehicleId: input.vehicleId,
      type: 'batteryLow',
      severity: 'critical',
      title: 'Critical Battery Level',
      message: `Battery voltage is critically low at ${readingSummary(input.voltage, input.soc)}. Immediate replacement required.`,
      timestamp: input.timestamp,
    },
    { voltage: input.voltage, soc: input.soc, batteryType: input.batteryType },
  );
}

export function createLowBatteryAlert(input: ReadingInput): BatteryAlert {
  return buildAlert(
    {
      vehicleId: input.vehicleId,
      type: 'batteryLow',
      severity: 'warning',
      title: 'Low Battery Level',
      message: `Battery voltage is low at ${readingSummary(input.voltage, input.soc)}. Consider replacement soon.`,
      timestamp: input.timestamp,
    },
    { voltage: input.voltage, soc: input.soc, batteryType: input.batteryType },
  );
}

export function createHealthDegradationAlert(
  input: { vehicleId: string; soh: number; batteryType: string; timestamp: Date },
  warningSoh: number,
): BatteryAlert {
  return buildAlert(
    {
      vehicleId: input.vehicleId,
      type: 'healthDegradation',
      severity: input.soh < warningSoh ? 'warning' : 'info',
      title: 'Battery Health Degradation',
      message: `Battery health has degraded to ${input.soh.toFixed(1)}%. Monitor performance closely.`,
      timestamp: input.timestamp,
    },
    { soh: input.soh, batteryType: input.batteryType },
  );
}

/** `extra` is merged into the provenance payload (swap detection tags it). */
export function createSuddenDropAlert(
  input: DropInput,
  extra: Record<string, unknown> = {},
): BatteryAlert {
  const drop = input.fromVoltage - input.toVoltage;
  const seconds = Math.trunc(input.withinMs / 1000);
  return buildAlert(
    {
      vehicleId: input.vehicleId,
      type: 'suddenDrop',
      severity: 'critical',
      title: 'Sudden Voltage Drop',
      message: `Voltage dropped by ${drop.toFixed(2)}V in ${seconds}s (from ${input.fromVoltage.toFixed(2)}V to ${input.toVoltage.toFixed(2)}V). Investigate possible failure or disconnection.`,
      timestamp: input.timestamp,
    },
    {
      fromVoltage: input.fromVoltage,
      toVoltage: input.toVoltage,
      drop,
      windowSeconds: seconds,
      batteryType: input.batteryType,
      ...extra,
    },
  );
}
