/**
 * Domain Entity Tests
 *
 * The domain package exports interfaces, string-literal unions and a handful
 * of pure helpers. These tests verify:
 *   1. Entities can be constructed with valid data
 *   2. Battery-class selection matches the threshold profiles
 *   3. Status and severity helpers order values as expected
 */

import { describe, it, expect } from '@jest/globals';

import {
  BATTERY_STATUSES,
  batteryClassOf,
  isCriticalStatus,
  needsAttention,
  severityRank,
} from '../index.js';
import type {
  HealthRecord,
  BatteryStatus,
  BatteryAlert,
  AlertType,
  AlertSeverity,
  BatteryAnalytics,
} from '../index.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const NOW = new Date('2026-03-01T08:00:00.000Z');

function makeHealthRecord(overrides: Partial<HealthRecord> = {}): HealthRecord {
  return {
    vehicleId: 'car_1',
    voltage: 8.9,
    stateOfCharge: 82,
    stateOfHealth: 96,
    status: 'good',
    recommendation: 'Battery is in good condition',
    batteryType: '9V_alkaline',
    timestamp: NOW,
    ...overrides,
  };
}

function makeAlert(overrides: Partial<BatteryAlert> = {}): BatteryAlert {
  return {
    id: 'alert_1772352000000_ab12cd34',
    vehicleId: 'car_1',
    type: 'batteryLow',
    severity: 'warning',
    title: 'Low Battery Level',
    message: 'Battery voltage is low at 7.40V (35.0%). Consider replacement soon.',
    timestamp: NOW,
    isRead: false,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// HealthRecord
// ═══════════════════════════════════════════════════════════════════════════════

describe('HealthRecord entity', () => {
  it('constructs with all required fields', () => {
    const r = makeHealthRecord();
    expect(r.vehicleId).toBe('car_1');
    expect(r.voltage).toBe(8.9);
    expect(r.stateOfCharge).toBe(82);
    expect(r.stateOfHealth).toBe(96);
    expect(r.status).toBe('good');
    expect(r.timestamp.toISOString()).toBe('2026-03-01T08:00:00.000Z');
  });

  it('optional fields default to undefined', () => {
    const r = makeHealthRecord();
    expect(r.estimatedRuntimeHours).toBeUndefined();
    expect(r.metadata).toBeUndefined();
  });

  it('BatteryStatus list covers every status including the unknown sentinel', () => {
    const statuses: BatteryStatus[] = ['fresh', 'good', 'weak', 'low', 'dead', 'unknown'];
    expect(BATTERY_STATUSES).toEqual(statuses);
  });
});

describe('batteryClassOf', () => {
  it.each([
    ['9V', '9V'],
    ['9v', '9V'],
    ['9V_alkaline', '9V'],
    ['Alkaline PP3', '9V'],
    ['12V', '12V'],
    ['12V_lead_acid', '12V'],
    ['unknown', '12V'],
    ['', '12V'],
  ])('classifies %p as %s', (batteryType, expected) => {
    expect(batteryClassOf(batteryType)).toBe(expected);
  });
});

describe('status helpers', () => {
  it('treats low and dead as critical', () => {
    expect(isCriticalStatus('low')).toBe(true);
    expect(isCriticalStatus('dead')).toBe(true);
    expect(isCriticalStatus('weak')).toBe(false);
    expect(isCriticalStatus('unknown')).toBe(false);
  });

  it('flags weak batteries as needing attention without being critical', () => {
    expect(needsAttention('weak')).toBe(true);
    expect(needsAttention('low')).toBe(true);
    expect(needsAttention('good')).toBe(false);
    expect(needsAttention('fresh')).toBe(false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// BatteryAlert
// ═══════════════════════════════════════════════════════════════════════════════

describe('BatteryAlert entity', () => {
  it('constructs unread by default in factories', () => {
    const a = makeAlert();
    expect(a.isRead).toBe(false);
    expect(a.data).toBeUndefined();
  });

  it('carries rule provenance in data', () => {
    const a = makeAlert({ data: { voltage: 4.2, reason: 'absolute_dispose_<=4_5V' } });
    expect(a.data?.['reason']).toBe('absolute_dispose_<=4_5V');
  });

  it('AlertType union covers expected values', () => {
    const types: AlertType[] = [
      'batteryLow',
      'healthDegradation',
      'suddenDrop',
      'connectionLost',
      'sensorError',
      'systemError',
    ];
    expect(types).toHaveLength(6);
  });

  it('orders severities info < warning < critical', () => {
    const severities: AlertSeverity[] = ['critical', 'info', 'warning'];
    const sorted = [...severities].sort((a, b) => severityRank(a) - severityRank(b));
    expect(sorted).toEqual(['info', 'warning', 'critical']);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// BatteryAnalytics
// ═══════════════════════════════════════════════════════════════════════════════

describe('BatteryAnalytics entity', () => {
  it('represents the zero state', () => {
    const analytics: BatteryAnalytics = {
      averageVoltage: 0,
      averageSOC: 0,
      averageSOH: 0,
      voltageRange: { min: 0, max: 0 },
      trend: 'stable',
      dataPoints: 0,
      period: '24 hours',
    };
    expect(analytics.dataPoints).toBe(0);
    expect(analytics.voltageRange).toEqual({ min: 0, max: 0 });
  });
});
