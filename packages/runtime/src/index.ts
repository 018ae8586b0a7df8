// @careledger/runtime
// The entity lifecycle consistency and audit engine.
//
// This package provides:
// - Ledger: the guarded mutation boundary every write goes through
// - Invariant guards: per-entity validators run inside the write transaction
// - History recorder and event log writer: the two append-only audit trails
// - Configuration and logging

export * from './ledger/index.js';
export * from './guards/index.js';
export * from './history/index.js';
export * from './events/index.js';
export { loadConfig, requireDatabaseUrl, ConfigError, type LedgerConfig, type LogLevel } from './config.js';
export { createLogger, type Logger, type LoggerOptions } from './logger.js';
export { createPostgresLedger, type PostgresLedger } from './bootstrap.js';
