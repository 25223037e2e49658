// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/telemetry-state.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/ingestion-adapter.port.js';
export * from './ports/inbound/telemetry-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/telemetry-store.port.js';
export * from './ports/outbound/telemetry-source.port.js';
