import type { Knex } from 'knex';
import { SchemaValidationError } from '../../errors.js';
import { inBatches } from '../../utils/batches.js';
import type { IngestRow } from './normalize.js';

/**
 * Session/Operator reconciliation: make sure every Operator and Session an
 * incoming batch references exists before its events are inserted.
 *
 * Idempotent. Existing rows are never touched; only missing ones are added,
 * each kind with batched multi-row inserts. The functions issue plain statements
 * against the executor they are given: on the root Knex each insert commits
 * on its own, inside a transaction it commits with that transaction.
 */

/** Shift label → shift_definitions.shift_id (seeded by migration 005). */
export const SHIFT_IDS: ReadonlyMap<string, number> = new Map([
  ['DAY', 1],
  ['NIGHT', 2],
]);

export const DEFAULT_INACTIVITY_THRESHOLD_MIN = 10;

// Keeps IN (...) lists and multi-row inserts well under bind-parameter limits.
const STATEMENT_BATCH = 1000;
const MAX_REPORTED_VALUES = 10;

export interface DerivedSession {
  session_id: number;
  operator_id: string;
  shift_id: number;
  session_start: Date;
  session_end: Date;
  inactivity_threshold_min: number;
}

/** Map a shift label (case-insensitive, trimmed) to its shift id. */
export function resolveShiftId(label: string): number | undefined {
  return SHIFT_IDS.get(label.trim().toUpperCase());
}

/**
 * Group rows by session id and derive one session per group:
 * operator and shift from the first row seen, start/end from the
 * min/max timestamp.
 *
 * Throws SchemaValidationError, naming the distinct offending labels, if any
 * row carries a shift label outside the mapping.
 */
export function deriveSessions(rows: readonly IngestRow[]): DerivedSession[] {
  const unknownShifts = new Set<string>();
  const sessions = new Map<number, DerivedSession>();

  for (const row of rows) {
    const shiftId = resolveShiftId(row.shift);
    if (shiftId === undefined) {
      unknownShifts.add(row.shift);
      continue;
    }

    const existing = sessions.get(row.session_id);
    if (!existing) {
      sessions.set(row.session_id, {
        session_id: row.session_id,
        operator_id: row.operator_id,
        shift_id: shiftId,
        session_start: row.timestamp,
        session_end: row.timestamp,
        inactivity_threshold_min: DEFAULT_INACTIVITY_THRESHOLD_MIN,
      });
      continue;
    }

    if (row.timestamp < existing.session_start) existing.session_start = row.timestamp;
    if (row.timestamp > existing.session_end) existing.session_end = row.timestamp;
  }

  if (unknownShifts.size > 0) {
    const values = [...unknownShifts].slice(0, MAX_REPORTED_VALUES);
    throw new SchemaValidationError(
      `Unrecognized Shift values (expected one of ${[...SHIFT_IDS.keys()].join(', ')}): `
        + values.map((v) => JSON.stringify(v)).join(', '),
      values,
    );
  }

  return [...sessions.values()];
}

/**
 * Create an operator (operator_rank = true) for every id not already stored.
 * Returns the ids that were created.
 */
export async function ensureOperators(db: Knex, operatorIds: Iterable<string>): Promise<string[]> {
  const ids = [...new Set(operatorIds)];
  if (ids.length === 0) return [];

  const existing = new Set<string>();
  for (const batch of inBatches(ids, STATEMENT_BATCH)) {
    const rows: Array<{ operator_id: string }> = await db('operators')
      .whereIn('operator_id', batch)
      .select('operator_id');
    for (const r of rows) existing.add(r.operator_id);
  }

  const missing = ids.filter((id) => !existing.has(id));
  for (const batch of inBatches(missing, STATEMENT_BATCH)) {
    await db('operators').insert(batch.map((id) => ({ operator_id: id, operator_rank: true })));
  }
  return missing;
}

/**
 * Insert the derived sessions whose ids are not stored yet.
 * Returns the session ids that were created.
 */
export async function insertMissingSessions(db: Knex, sessions: readonly DerivedSession[]): Promise<number[]> {
  if (sessions.length === 0) return [];

  const existing = new Set<number>();
  const ids = sessions.map((s) => s.session_id);
  for (const batch of inBatches(ids, STATEMENT_BATCH)) {
    const rows: Array<{ session_id: number }> = await db('sessions')
      .whereIn('session_id', batch)
      .select('session_id');
    for (const r of rows) existing.add(Number(r.session_id));
  }

  const missing = sessions.filter((s) => !existing.has(s.session_id));
  for (const batch of inBatches(missing, STATEMENT_BATCH)) {
    await db('sessions').insert(batch);
  }
  return missing.map((s) => s.session_id);
}

/** Derive sessions from validated rows and insert the missing ones. */
export async function ensureSessions(db: Knex, rows: readonly IngestRow[]): Promise<number[]> {
  return insertMissingSessions(db, deriveSessions(rows));
}
