export type AlertType =
  | 'batteryLow'
  | 'healthDegradation'
  | 'suddenDrop'
  | 'connectionLost'
  | 'sensorError'
  | 'systemError';

export type AlertSeverity = 'info' | 'warning' | 'critical';

const SEVERITY_RANK: Record<AlertSeverity, number> = {
  info: 0,
  warning: 1,
  critical: 2,
};

export function severityRank(severity: AlertSeverity): number {
  return SEVERITY_RANK[severity];
}

/**
 * An alert raised for a vehicle's battery.
 * Everything except `isRead` is fixed at creation; marking an alert read
 * replaces the entry with a copy rather than mutating it.
 */
export interface BatteryAlert {
  readonly id: string;
  readonly vehicleId: string;
  readonly type: AlertType;
  readonly severity: AlertSeverity;
  readonly title: string;
  readonly message: string;
  readonly timestamp: Date;
  readonly isRead: boolean;
  /** Rule provenance: voltages, thresholds, `reason` tag. */
  readonly data?: Readonly<Record<string, unknown>>;
}
