// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/device-identity.js';
export * from './entities/route.js';
export * from './entities/telemetry-message.js';
export * from './entities/session-state.js';
export * from './entities/command.js';
export * from './entities/device-config.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/cloud-directory.port.js';
export * from './ports/outbound/credential-store.port.js';
export * from './ports/outbound/mqtt-transport.port.js';
export * from './ports/outbound/clock.port.js';
