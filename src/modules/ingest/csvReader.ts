import { createReadStream } from 'node:fs';
import { parse } from 'csv-parse';
import { assertRequiredColumns, normalizeHeader, type RawCsvRow } from './normalize.js';

export interface CsvChunk {
  /** Zero-based position of the chunk in the file. */
  index: number;
  /** Normalised header names, in file order. */
  header: readonly string[];
  rows: RawCsvRow[];
}

function isRawCsvRow(value: unknown): value is RawCsvRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.values(value).every((v) => typeof v === 'string');
}

/**
 * Stream a headed CSV file and yield it in chunks of at most `chunkSize`
 * records. Only one chunk is held in memory at a time.
 *
 * The header is checked for the required columns as soon as it is read,
 * so a header-only file with a bad header fails too.
 */
export async function* readCsvChunks(filePath: string, chunkSize: number): AsyncGenerator<CsvChunk> {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }

  let header: string[] = [];
  const source = createReadStream(filePath);
  const parser = source.pipe(
    parse({
      bom: true,
      skip_empty_lines: true,
      // Short rows read as absent cells; coerceRow decides drop or NULL.
      relax_column_count: true,
      columns: (names: string[]) => {
        header = names.map(normalizeHeader);
        assertRequiredColumns(header);
        return header;
      },
    }),
  );
  // pipe() does not forward source errors: an unreadable file would never settle the loop.
  source.on('error', (err) => parser.destroy(err));

  let index = 0;
  let rows: RawCsvRow[] = [];

  for await (const record of parser) {
    const row: unknown = record;
    if (!isRawCsvRow(row)) {
      throw new TypeError(`Unexpected CSV record shape in chunk ${index}`);
    }
    rows.push(row);
    if (rows.length >= chunkSize) {
      yield { index, header, rows };
      index += 1;
      rows = [];
    }
  }

  if (rows.length > 0) {
    yield { index, header, rows };
  }
}
