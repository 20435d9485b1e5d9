import type { Knex } from 'knex';
import type { EventRow, SessionRow } from '../../types/index.js';
import { DEFAULT_INACTIVITY_THRESHOLD_MIN } from '../ingest/reconcile.js';

export interface NewSession {
  /** Supplied when the id comes from the source system; serial otherwise. */
  session_id?: number;
  operator_id: string;
  shift_id: number;
  shift_instance_id?: number | null;
  session_start: Date;
  session_end?: Date | null;
  inactivity_threshold_min?: number;
}

export interface SessionDetail extends SessionRow {
  crew_id: number | null;
  shift_name: string | null;
  event_count: number;
  has_features: boolean;
}

export async function createSession(db: Knex, input: NewSession): Promise<SessionRow> {
  const [row]: SessionRow[] = await db('sessions')
    .insert({
      ...(input.session_id !== undefined ? { session_id: input.session_id } : {}),
      operator_id: input.operator_id,
      shift_id: input.shift_id,
      shift_instance_id: input.shift_instance_id ?? null,
      session_start: input.session_start,
      session_end: input.session_end ?? null,
      inactivity_threshold_min: input.inactivity_threshold_min ?? DEFAULT_INACTIVITY_THRESHOLD_MIN,
    })
    .returning('*');
  return row;
}

export async function findSession(db: Knex, sessionId: number): Promise<SessionRow | undefined> {
  const row: SessionRow | undefined = await db('sessions').where({ session_id: sessionId }).first();
  return row;
}

/** Session joined with its operator's crew, its shift name and event/feature presence. */
export async function getSessionDetail(db: Knex, sessionId: number): Promise<SessionDetail | undefined> {
  const row: (SessionRow & { crew_id: number | null; shift_name: string | null; session_features_id: number | null }) | undefined =
    await db('sessions')
      .join('operators', 'operators.operator_id', 'sessions.operator_id')
      .join('shift_definitions', 'shift_definitions.shift_id', 'sessions.shift_id')
      .leftJoin('session_features', 'session_features.session_id', 'sessions.session_id')
      .where('sessions.session_id', sessionId)
      .first(
        'sessions.*',
        'operators.crew_id',
        'shift_definitions.shift_name',
        'session_features.session_features_id',
      );
  if (!row) return undefined;

  const { session_features_id, ...session } = row;
  return {
    ...session,
    event_count: await countEventsForSession(db, sessionId),
    has_features: session_features_id !== null,
  };
}

export async function listSessionsForOperator(db: Knex, operatorId: string): Promise<SessionRow[]> {
  const rows: SessionRow[] = await db('sessions')
    .where({ operator_id: operatorId })
    .orderBy('session_start')
    .select('*');
  return rows;
}

/** Mark an ongoing session as ended. Returns false if no open session matched. */
export async function closeSession(db: Knex, sessionId: number, endedAt: Date = new Date()): Promise<boolean> {
  const updated = await db('sessions')
    .where({ session_id: sessionId })
    .whereNull('session_end')
    .update({ session_end: endedAt });
  return updated > 0;
}

/**
 * Delete a session. The database cascades the delete to its events (and
 * their detections), its feature row and its alerts; the operator and the
 * shift definition stay. Returns false if there was no such session.
 */
export async function deleteSession(db: Knex, sessionId: number): Promise<boolean> {
  const deleted = await db('sessions').where({ session_id: sessionId }).del();
  return deleted > 0;
}

export async function listEventsForSession(db: Knex, sessionId: number): Promise<EventRow[]> {
  const rows: EventRow[] = await db('events')
    .where({ session_id: sessionId })
    .orderBy([{ column: 'timestamp' }, { column: 'event_id' }])
    .select('*');
  return rows;
}

export async function countEventsForSession(db: Knex, sessionId: number): Promise<number> {
  const row: { count?: number | string } | undefined = await db('events')
    .where({ session_id: sessionId })
    .count({ count: '*' })
    .first();
  return Number(row?.count ?? 0);
}
