// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/health-record.js';
export * from './entities/battery-alert.js';
export * from './entities/battery-analytics.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/battery-ingestion.port.js';
export * from './ports/inbound/battery-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/health-record-repository.port.js';
export * from './ports/outbound/alert-repository.port.js';
export * from './ports/outbound/stream-publisher.port.js';
export * from './ports/outbound/telemetry-source.port.js';
