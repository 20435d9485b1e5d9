import type { Knex } from 'knex';
import type {
  CrewRow,
  CrewRotationRow,
  OperatorRow,
  ShiftDefinitionRow,
  ShiftInstanceRow,
} from '../../types/index.js';
import { toCalendarDate } from '../../utils/time.js';

const MS_PER_DAY = 86_400_000;

// ── Crews ────────────────────────────────────────────────────

export async function createCrew(db: Knex, crewName: string): Promise<CrewRow> {
  const [row]: CrewRow[] = await db('crews').insert({ crew_name: crewName }).returning('*');
  return row;
}

export async function listCrews(db: Knex): Promise<CrewRow[]> {
  const rows: CrewRow[] = await db('crews').orderBy('crew_id').select('*');
  return rows;
}

// ── Shift definitions ────────────────────────────────────────

export interface NewShiftDefinition {
  shift_name: string;
  start_time?: string | null;   // HH:MM:SS
  end_time?: string | null;
  duration_hours?: number | null;
}

export async function createShiftDefinition(db: Knex, input: NewShiftDefinition): Promise<ShiftDefinitionRow> {
  const [row]: ShiftDefinitionRow[] = await db('shift_definitions')
    .insert({
      shift_name: input.shift_name,
      start_time: input.start_time ?? null,
      end_time: input.end_time ?? null,
      duration_hours: input.duration_hours ?? null,
    })
    .returning('*');
  return row;
}

export async function listShiftDefinitions(db: Knex): Promise<ShiftDefinitionRow[]> {
  const rows: ShiftDefinitionRow[] = await db('shift_definitions').orderBy('shift_id').select('*');
  return rows;
}

// ── Crew rotations ───────────────────────────────────────────

export interface NewCrewRotation {
  crew_id: number;
  anchor_date: string;          // YYYY-MM-DD, first "on" day of a cycle
  on_days: number;
  off_days: number;
}

export async function createCrewRotation(db: Knex, input: NewCrewRotation): Promise<CrewRotationRow> {
  if (!Number.isInteger(input.on_days) || !Number.isInteger(input.off_days)
    || input.on_days < 0 || input.off_days < 0 || input.on_days + input.off_days === 0) {
    throw new RangeError(`Invalid rotation ${input.on_days} on / ${input.off_days} off`);
  }
  const [row]: CrewRotationRow[] = await db('crew_rotations').insert(input).returning('*');
  return row;
}

export async function listCrewRotations(db: Knex, crewId: number): Promise<CrewRotationRow[]> {
  const rows: CrewRotationRow[] = await db('crew_rotations')
    .where({ crew_id: crewId })
    .orderBy('rotation_id')
    .select('*');
  return rows;
}

function utcDayNumber(day: string): number {
  const [y, m, d] = day.split('-').map(Number);
  return Math.floor(Date.UTC(y, m - 1, d) / MS_PER_DAY);
}

/**
 * Whether a rotation puts its crew on duty on `day` (YYYY-MM-DD).
 * The cycle is `on_days` on followed by `off_days` off, starting at the
 * anchor date and repeating in both directions.
 */
export function isCrewOnDuty(
  rotation: Pick<CrewRotationRow, 'anchor_date' | 'on_days' | 'off_days'>,
  day: string,
): boolean {
  const anchor = toCalendarDate(rotation.anchor_date);
  const cycle = rotation.on_days + rotation.off_days;
  if (!anchor || cycle <= 0) return false;

  const offset = utcDayNumber(day) - utcDayNumber(anchor);
  const position = ((offset % cycle) + cycle) % cycle;
  return position < rotation.on_days;
}

/** Crew ids that at least one rotation puts on duty on `day`. */
export async function crewsOnDuty(db: Knex, day: string): Promise<number[]> {
  const rotations: CrewRotationRow[] = await db('crew_rotations').orderBy('crew_id').select('*');
  const onDuty = new Set<number>();
  for (const r of rotations) {
    if (isCrewOnDuty(r, day)) onDuty.add(r.crew_id);
  }
  return [...onDuty];
}

// ── Shift instances ──────────────────────────────────────────

export interface NewShiftInstance {
  crew_id: number;
  shift_id: number;
  shift_start?: Date | null;
  shift_end?: Date | null;
}

export async function createShiftInstance(db: Knex, input: NewShiftInstance): Promise<ShiftInstanceRow> {
  const [row]: ShiftInstanceRow[] = await db('shift_instances')
    .insert({
      crew_id: input.crew_id,
      shift_id: input.shift_id,
      shift_start: input.shift_start ?? null,
      shift_end: input.shift_end ?? null,
    })
    .returning('*');
  return row;
}

export async function listShiftInstances(db: Knex, crewId: number): Promise<ShiftInstanceRow[]> {
  const rows: ShiftInstanceRow[] = await db('shift_instances')
    .where({ crew_id: crewId })
    .orderBy('shift_start')
    .select('*');
  return rows;
}

// ── Operators ────────────────────────────────────────────────

export interface NewOperator {
  operator_id: string;
  crew_id?: number | null;
  default_shift_id?: number | null;
  operator_rank?: boolean;
}

export async function createOperator(db: Knex, input: NewOperator): Promise<OperatorRow> {
  const [row]: OperatorRow[] = await db('operators')
    .insert({
      operator_id: input.operator_id,
      crew_id: input.crew_id ?? null,
      default_shift_id: input.default_shift_id ?? null,
      operator_rank: input.operator_rank ?? true,
    })
    .returning('*');
  return row;
}

export async function findOperator(db: Knex, operatorId: string): Promise<OperatorRow | undefined> {
  const row: OperatorRow | undefined = await db('operators').where({ operator_id: operatorId }).first();
  return row;
}

export async function listOperatorsByCrew(db: Knex, crewId: number): Promise<OperatorRow[]> {
  const rows: OperatorRow[] = await db('operators')
    .where({ crew_id: crewId })
    .orderBy('operator_id')
    .select('*');
  return rows;
}
