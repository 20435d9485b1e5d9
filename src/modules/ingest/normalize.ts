import { createHash } from 'node:crypto';
import { SchemaValidationError } from '../../errors.js';
import { EVENT_COLUMNS, type EventColumnSpec } from '../../db/eventColumns.js';
import type { EventFieldName } from '../../types/index.js';
import { parseTimestamp } from '../../utils/time.js';

/** Columns every ingestion CSV must carry. */
export const REQUIRED_COLUMNS = ['Session_ID', 'Operator_ID', 'Timestamp', 'Shift'] as const;

export type RawCsvRow = Record<string, string>;

export type EventFieldValues = Partial<Record<EventFieldName, string | number | null>>;

/** A CSV row after coercion; the shift label is kept only for reconciliation. */
export interface IngestRow {
  session_id: number;
  operator_id: string;
  timestamp: Date;
  shift: string;
  fields: EventFieldValues;
}

/** Strip byte-order marks and surrounding whitespace from a header name. */
export function normalizeHeader(name: string): string {
  return name.replace(/\uFEFF/g, '').trim();
}

/** Throw a SchemaValidationError naming every required column the header lacks. */
export function assertRequiredColumns(header: readonly string[]): void {
  const missing = REQUIRED_COLUMNS.filter((c) => !header.includes(c));
  if (missing.length > 0) {
    throw new SchemaValidationError(`CSV missing required columns: ${missing.join(', ')}`, missing);
  }
}

/**
 * Integer session id. Accepts "12" and "12.0"; anything else
 * (empty, fractional, hex, exponent) counts as missing.
 */
export function parseSessionId(value: string | undefined): number | null {
  const trimmed = value?.trim() ?? '';
  if (!/^[+-]?\d+(?:\.0*)?$/.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) ? n : null;
}

/** Truncate to at most `max` characters (code points, as varchar counts them). */
export function truncate(value: string, max: number): string {
  if (value.length <= max) return value;
  const chars = Array.from(value);
  return chars.length <= max ? value : chars.slice(0, max).join('');
}

function coerceField(spec: EventColumnSpec, raw: string): string | number | null {
  if (spec.kind === 'string') {
    const value = spec.column === 'label' ? raw.trim() : raw;
    return spec.maxLength !== undefined ? truncate(value, spec.maxLength) : value;
  }

  const trimmed = raw.trim();
  if (trimmed === '') return null;
  const n = Number(trimmed);
  if (!Number.isFinite(n)) return null;
  if (spec.kind === 'integer' && !Number.isInteger(n)) return null;
  return n;
}

/**
 * Coerce one CSV row into its typed form.
 *
 * Event columns absent from the file stay absent (the NOT NULL constraints
 * decide). Returns null when session id, operator id or timestamp is
 * missing or unparsable; such rows are dropped.
 */
export function coerceRow(raw: RawCsvRow): IngestRow | null {
  const sessionId = parseSessionId(raw.Session_ID);
  const operatorId = raw.Operator_ID?.trim() ?? '';
  const timestamp = raw.Timestamp === undefined ? null : parseTimestamp(raw.Timestamp);

  if (sessionId === null || operatorId === '' || timestamp === null) {
    return null;
  }

  const fields: EventFieldValues = {};
  for (const spec of EVENT_COLUMNS) {
    const value = raw[spec.csv];
    if (value !== undefined) {
      fields[spec.column] = coerceField(spec, value);
    }
  }

  return {
    session_id: sessionId,
    operator_id: operatorId,
    timestamp,
    shift: raw.Shift ?? '',
    fields,
  };
}

/**
 * Content hash of an event as stored.
 * Uses null byte as separator to prevent delimiter-injection collisions.
 */
export function computeIngestHash(row: IngestRow): string {
  const parts = [
    String(row.session_id),
    row.operator_id,
    row.timestamp.toISOString(),
    ...EVENT_COLUMNS.map((spec) => {
      const value = row.fields[spec.column];
      return value === undefined || value === null ? '' : String(value);
    }),
  ];
  return createHash('sha256').update(parts.join('\0')).digest('hex');
}
