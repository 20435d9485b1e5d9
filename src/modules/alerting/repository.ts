import type { Knex } from 'knex';
import { NotFoundError } from '../../errors.js';
import type { AlertCtiLinkRow, AlertRow, CtiObjectRow } from '../../types/index.js';

export interface NewAlert {
  detection_id: number;
  severity: number;
  alert_category: string;
  alert_description: string;
  alert_time?: Date;
}

/**
 * Raise an alert for a detection. The event and session are taken from the
 * detection so the three references can never disagree.
 */
export async function raiseAlert(db: Knex, input: NewAlert): Promise<AlertRow> {
  const source: { event_id: number; session_id: number } | undefined = await db('detections')
    .join('events', 'events.event_id', 'detections.event_id')
    .where('detections.detection_id', input.detection_id)
    .first('events.event_id', 'events.session_id');
  if (!source) throw new NotFoundError('Detection', input.detection_id);

  const [row]: AlertRow[] = await db('alerts')
    .insert({
      event_id: source.event_id,
      session_id: source.session_id,
      detection_id: input.detection_id,
      severity: input.severity,
      alert_category: input.alert_category,
      alert_description: input.alert_description,
      ...(input.alert_time ? { alert_time: input.alert_time } : {}),
    })
    .returning('*');
  return row;
}

export async function listAlertsForSession(db: Knex, sessionId: number): Promise<AlertRow[]> {
  const rows: AlertRow[] = await db('alerts')
    .where({ session_id: sessionId })
    .orderBy([{ column: 'alert_time', order: 'desc' }, { column: 'alert_id', order: 'desc' }])
    .select('*');
  return rows;
}

/** Delete an alert and, by cascade, its CTI links. CTI objects stay. */
export async function deleteAlert(db: Knex, alertId: number): Promise<boolean> {
  const deleted = await db('alerts').where({ alert_id: alertId }).del();
  return deleted > 0;
}

// ── Threat intelligence ──────────────────────────────────────

export interface NewCtiObject {
  cti_type: string;
  cti_name: string;
  external_id?: string | null;
  rule?: string | null;
  confidence?: number | null;
}

export async function createCtiObject(db: Knex, input: NewCtiObject): Promise<CtiObjectRow> {
  const [row]: CtiObjectRow[] = await db('cti_objects')
    .insert({
      cti_type: input.cti_type,
      cti_name: input.cti_name,
      external_id: input.external_id ?? null,
      rule: input.rule ?? null,
      confidence: input.confidence ?? null,
    })
    .returning('*');
  return row;
}

/** Link an alert to a CTI object. Linking the same pair twice fails on the primary key. */
export async function linkAlertToCti(
  db: Knex,
  alertId: number,
  ctiId: number,
  matchReason?: string,
): Promise<AlertCtiLinkRow> {
  const [row]: AlertCtiLinkRow[] = await db('alert_cti_links')
    .insert({ alert_id: alertId, cti_id: ctiId, match_reason: matchReason ?? null })
    .returning('*');
  return row;
}

export interface LinkedCtiObject extends CtiObjectRow {
  match_reason: string | null;
}

export async function listCtiForAlert(db: Knex, alertId: number): Promise<LinkedCtiObject[]> {
  const rows: LinkedCtiObject[] = await db('alert_cti_links')
    .join('cti_objects', 'cti_objects.cti_id', 'alert_cti_links.cti_id')
    .where('alert_cti_links.alert_id', alertId)
    .orderBy('cti_objects.cti_id')
    .select('cti_objects.*', 'alert_cti_links.match_reason');
  return rows;
}
