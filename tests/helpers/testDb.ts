import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { Database } from 'better-sqlite3';
import { knex, type Knex } from 'knex';
import { initDb } from '../../src/db/index.js';
import { EVENT_COLUMNS } from '../../src/db/eventColumns.js';

/** Fresh in-memory SQLite database with every migration applied. */
export async function createTestDb(): Promise<Knex> {
  const db = knex({
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
    // One connection: every pooled :memory: connection would be its own database.
    pool: {
      min: 1,
      max: 1,
      afterCreate: (conn: Database, done: (err: Error | null, conn: Database) => void) => {
        conn.pragma('foreign_keys = ON');
        done(null, conn);
      },
    },
  });
  await initDb(db);
  return db;
}

export async function countRows(db: Knex, table: string): Promise<number> {
  const row: { count?: number | string } | undefined = await db(table).count({ count: '*' }).first();
  return Number(row?.count ?? 0);
}

// ── CSV fixtures ─────────────────────────────────────────────

const SAMPLE_VALUES: Record<string, string> = {
  TimeInterval: '0.5',
  Address: '4',
  FunctionCode: '3',
  CommandResponse: '1',
  ControlMode: '2',
  ControlScheme: '1',
  CRC: '12345',
  DataLength: '16',
  InvalidFunctionCode: '0',
  InvalidDataLength: '0',
  PumpState: '1',
  SolenoidState: '0',
  SetPoint: '20',
  PipelinePSI: '7.25',
  PIDCycleTime: '1',
  PIDDeadband: '0.5',
  PIDGain: '0.8',
  PIDRate: '0.1',
  PIDReset: '0.2',
  deltaSetPoint: '0',
  deltaPipelinePSI: '0.05',
  deltaPIDCycleTime: '0',
  deltaPIDDeadband: '0',
  deltaPIDGain: '0',
  deltaPIDRate: '0',
  deltaPIDReset: '0',
  Label: 'Normal',
};

export const CSV_HEADER: readonly string[] = [
  'Session_ID',
  'Operator_ID',
  'Timestamp',
  'Shift',
  ...EVENT_COLUMNS.map((c) => c.csv),
];

export interface FixtureRow {
  Session_ID: string;
  Operator_ID: string;
  Timestamp: string;
  Shift: string;
  [column: string]: string;
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Render rows as CSV text; event columns not given take sample values. */
export function toCsv(rows: readonly FixtureRow[], header: readonly string[] = CSV_HEADER): string {
  const lines = [header.map(csvField).join(',')];
  for (const row of rows) {
    lines.push(header.map((h) => csvField(row[h] ?? SAMPLE_VALUES[h] ?? '')).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export interface TempDir {
  dir: string;
  write(name: string, contents: string): Promise<string>;
  cleanup(): Promise<void>;
}

export async function makeTempDir(): Promise<TempDir> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'opsight-test-'));
  return {
    dir,
    async write(name, contents) {
      const file = path.join(dir, name);
      await writeFile(file, contents, 'utf8');
      return file;
    },
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
