import type { Knex } from 'knex';
import type {
  BaselineProfileRow,
  DetectionRow,
  SessionFeatureMetrics,
  SessionFeaturesRow,
} from '../../types/index.js';

/** Parse a JSON text column; PostgreSQL json/jsonb already arrives parsed. */
function parseJsonColumn(value: unknown): unknown {
  if (typeof value === 'string') {
    try {
      return JSON.parse(value);
    } catch {
      return value;   // not JSON: hand back the text as stored
    }
  }
  return value;
}

// ── Session features (1:1 with sessions) ─────────────────────

/**
 * Store the feature vector of a session. A second row for the same session
 * fails on uq_session_features_session.
 */
export async function recordSessionFeatures(
  db: Knex,
  sessionId: number,
  metrics: SessionFeatureMetrics,
): Promise<SessionFeaturesRow> {
  const [row]: SessionFeaturesRow[] = await db('session_features')
    .insert({ session_id: sessionId, ...metrics })
    .returning('*');
  return row;
}

export async function findSessionFeatures(db: Knex, sessionId: number): Promise<SessionFeaturesRow | undefined> {
  const row: SessionFeaturesRow | undefined = await db('session_features').where({ session_id: sessionId }).first();
  return row;
}

// ── Baseline profiles ────────────────────────────────────────

export interface NewBaselineProfile {
  operator_id: string;
  shift_id?: number | null;
  baseline_version: string;
  trained_from: Date;
  trained_to: Date;
  profile: unknown;
}

export interface BaselineProfile extends BaselineProfileRow {
  profile: unknown;
}

function toBaselineProfile(row: BaselineProfileRow): BaselineProfile {
  return { ...row, profile: parseJsonColumn(row.profile_json) };
}

export async function createBaselineProfile(db: Knex, input: NewBaselineProfile): Promise<BaselineProfile> {
  if (input.trained_to < input.trained_from) {
    throw new RangeError('Baseline training window ends before it starts');
  }
  const [row]: BaselineProfileRow[] = await db('baseline_profiles')
    .insert({
      operator_id: input.operator_id,
      shift_id: input.shift_id ?? null,
      baseline_version: input.baseline_version,
      trained_from: input.trained_from,
      trained_to: input.trained_to,
      profile_json: JSON.stringify(input.profile),
    })
    .returning('*');
  return toBaselineProfile(row);
}

export async function findBaselineProfile(db: Knex, baselineId: number): Promise<BaselineProfile | undefined> {
  const row: BaselineProfileRow | undefined = await db('baseline_profiles').where({ baseline_id: baselineId }).first();
  return row ? toBaselineProfile(row) : undefined;
}

/**
 * Most recently trained baseline of an operator. With `shiftId` the search is
 * limited to that shift; `null` means the all-shifts baseline.
 */
export async function latestBaselineForOperator(
  db: Knex,
  operatorId: string,
  shiftId?: number | null,
): Promise<BaselineProfile | undefined> {
  const query = db('baseline_profiles').where({ operator_id: operatorId });
  if (shiftId === null) {
    query.whereNull('shift_id');
  } else if (shiftId !== undefined) {
    query.where({ shift_id: shiftId });
  }
  const row: BaselineProfileRow | undefined = await query
    .orderBy([{ column: 'trained_to', order: 'desc' }, { column: 'baseline_id', order: 'desc' }])
    .first();
  return row ? toBaselineProfile(row) : undefined;
}

// ── Detections ───────────────────────────────────────────────

export interface NewDetection {
  event_id: number;
  baseline_id: number;
  model_type: string;
  anomaly_score: number;
  threshold: number;
  evidence: unknown;
  predicted_label: string;
  detection_time?: Date;
}

export interface Detection extends DetectionRow {
  evidence: unknown;
}

function toDetection(row: DetectionRow): Detection {
  return { ...row, evidence: parseJsonColumn(row.evidence_json) };
}

/**
 * Store one model's verdict on one event against one baseline. At most one
 * verdict per (event, baseline, model type): a repeat fails on
 * uq_detection_event_baseline_model.
 */
export async function recordDetection(db: Knex, input: NewDetection): Promise<Detection> {
  const [row]: DetectionRow[] = await db('detections')
    .insert({
      event_id: input.event_id,
      baseline_id: input.baseline_id,
      model_type: input.model_type,
      anomaly_score: input.anomaly_score,
      threshold: input.threshold,
      evidence_json: JSON.stringify(input.evidence),
      predicted_label: input.predicted_label,
      ...(input.detection_time ? { detection_time: input.detection_time } : {}),
    })
    .returning('*');
  return toDetection(row);
}

export async function listDetectionsForEvent(db: Knex, eventId: number): Promise<Detection[]> {
  const rows: DetectionRow[] = await db('detections')
    .where({ event_id: eventId })
    .orderBy('detection_id')
    .select('*');
  return rows.map(toDetection);
}
