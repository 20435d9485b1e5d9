export { config, readConfig, type AppConfig } from './config/index.js';
export { logger } from './config/logger.js';
export { createDb, getDb, initDb, rollbackDb, closeDb, migrationSource } from './db/index.js';
export { EVENT_COLUMNS, type EventColumnSpec } from './db/eventColumns.js';
export {
  SchemaValidationError,
  IntegrityViolationError,
  NotFoundError,
  isIntegrityViolation,
} from './errors.js';
export {
  loadEventsCsv,
  type LoadOptions,
  type LoadSummary,
  type ChunkReport,
} from './modules/ingest/loader.js';
export { readCsvChunks, type CsvChunk } from './modules/ingest/csvReader.js';
export {
  deriveSessions,
  ensureOperators,
  ensureSessions,
  insertMissingSessions,
  resolveShiftId,
  SHIFT_IDS,
} from './modules/ingest/reconcile.js';
export * from './modules/users/repository.js';
export * from './modules/roster/repository.js';
export * from './modules/sessions/repository.js';
export * from './modules/analytics/repository.js';
export * from './modules/alerting/repository.js';
export type * from './types/index.js';
