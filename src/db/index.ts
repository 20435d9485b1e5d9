import { knex, type Knex } from 'knex';
import { config, type AppConfig } from '../config/index.js';
import { logger } from '../config/logger.js';
import * as roster from './migrations/001_roster.js';
import * as sessionsEvents from './migrations/002_sessions_events.js';
import * as analytics from './migrations/003_analytics.js';
import * as alerting from './migrations/004_alerting.js';
import * as seedShiftDefinitions from './migrations/005_seed_shift_definitions.js';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

// Registered statically: the same list runs from the CLI, from a compiled
// build and from the test runner without globbing the migrations directory.
const MIGRATIONS: readonly NamedMigration[] = [
  { name: '001_roster', migration: roster },
  { name: '002_sessions_events', migration: sessionsEvents },
  { name: '003_analytics', migration: analytics },
  { name: '004_alerting', migration: alerting },
  { name: '005_seed_shift_definitions', migration: seedShiftDefinitions },
];

export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  getMigrations: async () => [...MIGRATIONS],
  getMigrationName: (m) => m.name,
  getMigration: async (m) => m.migration,
};

let db: Knex | null = null;

/** Build a PostgreSQL-backed Knex instance from configuration. */
export function createDb(cfg: AppConfig = config): Knex {
  return knex({
    client: 'pg',
    connection: cfg.databaseUrl,
    pool: { min: 0, max: cfg.dbPoolMax },
  });
}

/** Process-wide Knex instance, created on first use. */
export function getDb(): Knex {
  if (!db) {
    db = createDb();
  }
  return db;
}

/**
 * Create every table, constraint and index, and seed the shift definitions,
 * by applying all pending migrations. Safe to call on an initialised
 * database. Returns the names of the migrations applied by this call.
 */
export async function initDb(target: Knex = getDb()): Promise<string[]> {
  const [batchNo, applied]: [number, string[]] = await target.migrate.latest({ migrationSource });
  if (applied.length === 0) {
    logger.info('Database schema already up to date');
  } else {
    logger.info({ batch: batchNo, migrations: applied }, `Applied ${applied.length} migration(s)`);
  }
  return applied;
}

/** Revert every applied migration (drops all tables). */
export async function rollbackDb(target: Knex = getDb()): Promise<string[]> {
  const [, reverted]: [number, string[]] = await target.migrate.rollback({ migrationSource }, true);
  return reverted;
}

export async function closeDb(): Promise<void> {
  if (db) {
    const current = db;
    db = null;
    await current.destroy();
  }
}
