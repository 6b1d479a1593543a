// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool } from './postgres/pool.js';
export type { DbPool, Queryable } from './postgres/pool.js';
export { PgHealthRecordRepository } from './postgres/health-record.repository.js';
export { PgAlertRepository } from './postgres/alert.repository.js';

// ─── In-process Transport ─────────────────────────────────────────────────────
export { InMemoryMessageBus, topicMatches } from './memory/in-memory-message-bus.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export {
  DeterministicClock,
  SeededRng,
  wallClockNow,
} from './clock/deterministic-clock.js';
export type { Clock } from './clock/deterministic-clock.js';
