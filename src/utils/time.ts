/** Value of a timestamp column as the drivers hand it back. */
export type DbTimestamp = Date | string | number;

// ISO 8601 calendar date, optional time (space or T), optional Z or offset.
const ISO_DATETIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?)?$/i;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parse an ISO 8601 date or date-time. Zone-less values are taken as UTC.
 * Returns null for empty input, any other format, and out-of-range fields.
 */
export function parseTimestamp(value: string): Date | null {
  const m = ISO_DATETIME.exec(value.trim());
  if (!m) return null;

  const [, year, month, day, hour = '00', minute = '00', second = '00', fraction = '', zone = 'Z'] = m;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  if (mo < 1 || mo > 12 || d < 1 || d > daysInMonth(y, mo)) return null;
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) return null;

  const ms = fraction === '' ? '' : `.${fraction.slice(0, 3).padEnd(3, '0')}`;
  const offset = /^[+-]\d{4}$/.test(zone) ? `${zone.slice(0, 3)}:${zone.slice(3)}` : zone.toUpperCase();
  const parsed = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}${ms}${offset}`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Normalise a timestamp column value to a Date.
 * PostgreSQL returns Date objects, SQLite returns epoch milliseconds for
 * bound Dates and `YYYY-MM-DD HH:MM:SS` (UTC) for CURRENT_TIMESTAMP defaults.
 */
export function toDate(value: DbTimestamp): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === 'number') return Number.isFinite(value) ? new Date(value) : null;
  return parseTimestamp(value);
}

/**
 * Calendar date (`YYYY-MM-DD`) of a DATE column value. node-postgres parses
 * DATE into local midnight, so Date values are read with local accessors.
 */
export function toCalendarDate(value: DbTimestamp): string | null {
  if (typeof value === 'string') {
    const m = /^(\d{4}-\d{2}-\d{2})/.exec(value.trim());
    return m ? m[1] : null;
  }
  const d = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(d.getTime())) return null;
  if (typeof value === 'number') return d.toISOString().slice(0, 10);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}
