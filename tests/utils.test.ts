import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  errorCode,
  IntegrityViolationError,
  isIntegrityViolation,
  NotFoundError,
  SchemaValidationError,
} from '../src/errors.js';
import { readCsvChunks, type CsvChunk } from '../src/modules/ingest/csvReader.js';
import { inBatches } from '../src/utils/batches.js';
import { parseTimestamp, toCalendarDate, toDate } from '../src/utils/time.js';
import { makeTempDir } from './helpers/testDb.js';

describe('parseTimestamp', () => {
  it('reads zone-less values as UTC', () => {
    expect(parseTimestamp('2024-03-01 08:00')?.toISOString()).toBe('2024-03-01T08:00:00.000Z');
    expect(parseTimestamp('2024-03-01T08:00:05.250')?.toISOString()).toBe('2024-03-01T08:00:05.250Z');
  });

  it('honours an explicit offset', () => {
    expect(parseTimestamp('2024-03-01T08:00:00+02:00')?.toISOString()).toBe('2024-03-01T06:00:00.000Z');
  });

  it('returns null for empty or unparsable input', () => {
    expect(parseTimestamp('   ')).toBeNull();
    expect(parseTimestamp('not-a-timestamp')).toBeNull();
    expect(parseTimestamp('hello 5')).toBeNull();
    expect(parseTimestamp('1')).toBeNull();
    expect(parseTimestamp('x 2020')).toBeNull();
    expect(parseTimestamp('Session 12')).toBeNull();
    expect(parseTimestamp('03/01/2024 08:00')).toBeNull();
  });

  it('rejects out-of-range fields instead of rolling them over', () => {
    expect(parseTimestamp('2023-02-29 08:00:00')).toBeNull();
    expect(parseTimestamp('2024-13-01 08:00:00')).toBeNull();
    expect(parseTimestamp('2024-03-01 24:00:00')).toBeNull();
    expect(parseTimestamp('2024-02-29 23:59:59')?.toISOString()).toBe('2024-02-29T23:59:59.000Z');
  });

  it('accepts a bare date and a compact offset', () => {
    expect(parseTimestamp('2024-03-01')?.toISOString()).toBe('2024-03-01T00:00:00.000Z');
    expect(parseTimestamp('2024-03-01T08:00:00-0130')?.toISOString()).toBe('2024-03-01T09:30:00.000Z');
  });
});

describe('toDate / toCalendarDate', () => {
  it('accepts every shape the drivers return', () => {
    const ms = Date.UTC(2024, 2, 1, 8);
    expect(toDate(ms)?.toISOString()).toBe('2024-03-01T08:00:00.000Z');
    expect(toDate('2024-03-01 08:00:00')?.toISOString()).toBe('2024-03-01T08:00:00.000Z');
    expect(toDate(new Date(Number.NaN))).toBeNull();
  });

  it('extracts the calendar day', () => {
    expect(toCalendarDate('2024-03-01')).toBe('2024-03-01');
    expect(toCalendarDate(Date.UTC(2024, 2, 1))).toBe('2024-03-01');
    expect(toCalendarDate(new Date(2024, 2, 1))).toBe('2024-03-01');
    expect(toCalendarDate('soon')).toBeNull();
  });
});

describe('inBatches', () => {
  it('slices into consecutive batches', () => {
    expect([...inBatches([1, 2, 3, 4, 5], 2)]).toEqual([[1, 2], [3, 4], [5]]);
    expect([...inBatches([], 3)]).toEqual([]);
  });

  it('rejects a non-positive size', () => {
    expect(() => [...inBatches([1], 0)]).toThrow(RangeError);
  });
});

describe('errors', () => {
  it('classifies constraint errors of both drivers', () => {
    expect(isIntegrityViolation({ code: '23505' })).toBe(true);
    expect(isIntegrityViolation({ code: '23503' })).toBe(true);
    expect(isIntegrityViolation({ code: 'SQLITE_CONSTRAINT_FOREIGNKEY' })).toBe(true);
    expect(isIntegrityViolation({ code: '42P01' })).toBe(false);
    expect(isIntegrityViolation(new Error('plain'))).toBe(false);
    expect(errorCode({ code: 7 })).toBeUndefined();
  });

  it('wraps the driver error with the chunk index', () => {
    const cause = Object.assign(new Error('duplicate key value'), { code: '23505' });
    const err = new IntegrityViolationError(3, cause);

    expect(err.chunkIndex).toBe(3);
    expect(err.code).toBe('23505');
    expect(err.cause).toBe(cause);
    expect(err.message).toBe('Integrity violation in chunk 3; chunk rolled back: duplicate key value');
  });

  it('names the missing entity', () => {
    expect(new NotFoundError('Detection', 12).message).toBe('Detection 12 not found');
  });
});

describe('readCsvChunks', () => {
  async function collect(contents: string, size: number): Promise<CsvChunk[]> {
    const tmp = await makeTempDir();
    try {
      const file = await tmp.write('in.csv', contents);
      const chunks: CsvChunk[] = [];
      for await (const chunk of readCsvChunks(file, size)) chunks.push(chunk);
      return chunks;
    } finally {
      await tmp.cleanup();
    }
  }

  it('normalises the header and yields full chunks then the remainder', async () => {
    const chunks = await collect(
      '\uFEFF Session_ID ,Operator_ID,Timestamp,Shift\n1,OP01,t1,DAY\n2,OP01,t2,NIGHT\n\n3,OP02,t3,DAY\n',
      2,
    );

    expect(chunks.map((c) => c.index)).toEqual([0, 1]);
    expect(chunks[0].header).toEqual(['Session_ID', 'Operator_ID', 'Timestamp', 'Shift']);
    expect(chunks[0].rows).toEqual([
      { Session_ID: '1', Operator_ID: 'OP01', Timestamp: 't1', Shift: 'DAY' },
      { Session_ID: '2', Operator_ID: 'OP01', Timestamp: 't2', Shift: 'NIGHT' },
    ]);
    expect(chunks[1].rows).toEqual([{ Session_ID: '3', Operator_ID: 'OP02', Timestamp: 't3', Shift: 'DAY' }]);
  });

  it('reads short rows with the missing cells absent', async () => {
    const chunks = await collect('Session_ID,Operator_ID,Timestamp,Shift\n1,OP01\n', 10);

    expect(chunks[0].rows).toEqual([{ Session_ID: '1', Operator_ID: 'OP01' }]);
  });

  it('checks the header even when no rows follow', async () => {
    await expect(collect('Session_ID,Timestamp\n', 10)).rejects.toBeInstanceOf(SchemaValidationError);
  });

  it('rejects when the file cannot be opened', async () => {
    const iteration = readCsvChunks(path.join(os.tmpdir(), 'opsight-missing', 'events.csv'), 10).next();
    await expect(iteration).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('rejects a non-positive chunk size', async () => {
    await expect(collect('a\n1\n', 0)).rejects.toBeInstanceOf(RangeError);
  });
});
