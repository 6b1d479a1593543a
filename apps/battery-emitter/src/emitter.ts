import 'dotenv/config';
import { fetch } from 'undici';
import { z } from 'zod';
import {
  BatterySimulator,
  transitionLevel,
  type CellStatus,
  type HealthPayload,
} from './battery-model.js';

/**
 * Battery emitter — one process per vehicle.
 *
 * Env vars:
 *   VEHICLE_ID        — vehicle to emit for (required)
 *   API_BASE_URL      — base URL of the monitor API (default: http://api:3001)
 *   EMIT_INTERVAL_MS  — emit interval in ms (default: 2000)
 *   BATTERY_TYPE      — reported battery type (default: 9V_alkaline)
 *   START_VOLTAGE     — initial cell voltage (default: 9.6)
 *   DRAIN_PER_TICK    — volts lost per emit (default: 0.01)
 *   SWAP_AFTER_TICKS  — swap in a near-dead cell on this tick (optional)
 *   SEED              — noise seed (default: 1)
 */

const envSchema = z.object({
  VEHICLE_ID: z.string().min(1),
  API_BASE_URL: z.string().url().default('http://api:3001'),
  EMIT_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
  BATTERY_TYPE: z.string().min(1).default('9V_alkaline'),
  START_VOLTAGE: z.coerce.number().positive().default(9.6),
  DRAIN_PER_TICK: z.coerce.number().min(0).default(0.01),
  SWAP_AFTER_TICKS: z.coerce.number().int().positive().optional(),
  SEED: z.coerce.number().int().default(1),
});

const parsed = envSchema.safeParse(process.env);
if (!parsed.success) {
  console.error('[emitter] invalid environment', parsed.error.issues);
  process.exit(1);
}
const env = parsed.data;

const simulator = new BatterySimulator({
  startVoltage: env.START_VOLTAGE,
  drainPerTick: env.DRAIN_PER_TICK,
  noise: 0.02,
  batteryType: env.BATTERY_TYPE,
  ...(env.SWAP_AFTER_TICKS !== undefined ? { swapAfterTicks: env.SWAP_AFTER_TICKS } : {}),
  seed: env.SEED,
});

const tag = `[emitter:${env.VEHICLE_ID}]`;

async function post(payload: HealthPayload): Promise<void> {
  try {
    const resp = await fetch(
      `${env.API_BASE_URL}/api/ingest/${encodeURIComponent(env.VEHICLE_ID)}/health`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      },
    );
    if (!resp.ok) {
      const text = await resp.text();
      console.error(`${tag} ingest failed ${resp.status}: ${text}`);
    }
  } catch (err) {
    console.error(`${tag} network error`, err instanceof Error ? err.message : err);
  }
}

let lastStatus: CellStatus | undefined;

function emit(): void {
  const payload = simulator.tick(new Date());
  const level = transitionLevel(lastStatus, payload.status);
  if (level === 'warn') console.warn(`${tag} battery ${payload.status} at ${payload.voltage.toFixed(2)}V`);
  else if (level === 'info') console.log(`${tag} battery ${payload.status} at ${payload.voltage.toFixed(2)}V`);
  lastStatus = payload.status;
  if (simulator.tickCount % 30 === 1) {
    console.log(`${tag} V=${payload.voltage.toFixed(2)} SOC=${payload.soc.toFixed(1)}% status=${payload.status}`);
  }
  void post(payload);
}

console.log(`${tag} starting, interval ${env.EMIT_INTERVAL_MS}ms`);
const timer = setInterval(emit, env.EMIT_INTERVAL_MS);

const stop = () => {
  clearInterval(timer);
  console.log(`${tag} stopped after ${simulator.tickCount} readings`);
  process.exit(0);
};
process.on('SIGTERM', stop);
process.on('SIGINT', stop);
