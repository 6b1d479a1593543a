/**
 * Monitor configuration
 * Read from the environment once at startup; invalid values are fatal.
 */

import { z } from 'zod';

const monitorEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  CORS_ORIGIN: z.string().default('*'),
  DATABASE_URL: z.string().url().optional(),
  MAX_HISTORY_ENTRIES: z.coerce.number().int().positive().default(1000),
  MAX_ALERTS: z.coerce.number().int().positive().default(100),
  RETENTION_DAYS: z.coerce.number().positive().default(7),
  CLEANUP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  HEALTH_TOPIC_PATTERN: z.string().min(1).default('car/+/battery/health'),
});

export interface MonitorConfig {
  port: number;
  corsOrigin: string;
  databaseUrl?: string;
  maxHistoryEntries: number;
  maxAlerts: number;
  retentionMs: number;
  cleanupIntervalMs: number;
  healthTopicPattern: string;
}

export function loadMonitorConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const parsed = monitorEnvSchema.parse(env);
  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    ...(parsed.DATABASE_URL ? { databaseUrl: parsed.DATABASE_URL } : {}),
    maxHistoryEntries: parsed.MAX_HISTORY_ENTRIES,
    maxAlerts: parsed.MAX_ALERTS,
    retentionMs: parsed.RETENTION_DAYS * 24 * 60 * 60 * 1000,
    cleanupIntervalMs: parsed.CLEANUP_INTERVAL_MS,
    healthTopicPattern: parsed.HEALTH_TOPIC_PATTERN,
  };
}
