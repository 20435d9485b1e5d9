import type { Knex } from 'knex';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../../config/index.js';
import { logger as rootLogger } from '../../config/logger.js';
import { IntegrityViolationError, isIntegrityViolation } from '../../errors.js';
import { inBatches } from '../../utils/batches.js';
import { readCsvChunks, type CsvChunk } from './csvReader.js';
import {
  assertRequiredColumns,
  coerceRow,
  computeIngestHash,
  type IngestRow,
} from './normalize.js';
import { deriveSessions, ensureOperators, insertMissingSessions } from './reconcile.js';

/**
 * Bulk CSV → events loader.
 *
 * Each chunk goes READ → NORMALIZED → VALIDATED → REFERENCES_RESOLVED →
 * INSERTED → COMMITTED inside one transaction; any failure before the commit
 * rolls the whole chunk back. Chunks run strictly one after another, so a
 * chunk's reconciliation sees every row committed by the chunks before it.
 * Committed chunks are never undone.
 */

// Rows per INSERT statement: ~31 bound values per event row stays far below
// PostgreSQL's 65535 parameter limit.
const EVENT_INSERT_BATCH = 1000;

export interface LoadOptions {
  /** Rows per chunk; defaults to INGEST_CHUNK_SIZE. */
  chunkSize?: number;
  logger?: Logger;
}

export interface ChunkReport {
  index: number;
  rowsRead: number;
  rowsDropped: number;
  operatorsCreated: number;
  sessionsCreated: number;
  inserted: number;
  totalInserted: number;
}

export interface LoadSummary {
  runId: string;
  chunks: ChunkReport[];
  totalInserted: number;
  totalDropped: number;
}

type EventInsert = Record<string, string | number | Date | null | undefined>;

function toEventInsert(row: IngestRow): EventInsert {
  return {
    session_id: row.session_id,
    operator_id: row.operator_id,
    timestamp: row.timestamp,
    ...row.fields,
    ingest_hash: computeIngestHash(row),
  };
}

async function loadChunk(
  db: Knex,
  chunk: CsvChunk,
  totalBefore: number,
  log: Logger,
): Promise<ChunkReport> {
  // NORMALIZED / VALIDATED: nothing has touched the database yet.
  assertRequiredColumns(chunk.header);

  const rows: IngestRow[] = [];
  for (const raw of chunk.rows) {
    const row = coerceRow(raw);
    if (row) rows.push(row);
  }
  const rowsDropped = chunk.rows.length - rows.length;
  const sessions = deriveSessions(rows);

  if (rows.length === 0) {
    log.warn({ chunk: chunk.index, rowsDropped }, 'Chunk has no loadable rows; skipped');
    return {
      index: chunk.index,
      rowsRead: chunk.rows.length,
      rowsDropped,
      operatorsCreated: 0,
      sessionsCreated: 0,
      inserted: 0,
      totalInserted: totalBefore,
    };
  }

  try {
    return await db.transaction(async (trx) => {
      // REFERENCES_RESOLVED
      const operators = await ensureOperators(trx, rows.map((r) => r.operator_id));
      const created = await insertMissingSessions(trx, sessions);

      // INSERTED
      const events = rows.map(toEventInsert);
      for (const batch of inBatches(events, EVENT_INSERT_BATCH)) {
        await trx('events').insert(batch);
      }

      return {
        index: chunk.index,
        rowsRead: chunk.rows.length,
        rowsDropped,
        operatorsCreated: operators.length,
        sessionsCreated: created.length,
        inserted: events.length,
        totalInserted: totalBefore + events.length,
      };
    });
  } catch (err) {
    if (isIntegrityViolation(err)) {
      log.error({ chunk: chunk.index, err }, 'Integrity violation; chunk rolled back');
      throw new IntegrityViolationError(chunk.index, err);
    }
    throw err;
  }
}

/**
 * Load an events CSV into `operators`, `sessions` and `events`.
 *
 * The caller owns `db` and is responsible for destroying it. Stops at the
 * first failing chunk: SchemaValidationError for a bad header or shift label,
 * IntegrityViolationError for a constraint hit, anything else unchanged.
 */
export async function loadEventsCsv(
  db: Knex,
  csvPath: string,
  options: LoadOptions = {},
): Promise<LoadSummary> {
  const chunkSize = options.chunkSize ?? config.ingestChunkSize;
  const runId = uuidv4();
  const log = (options.logger ?? rootLogger).child({ runId });

  log.info({ csvPath, chunkSize }, 'Event ingestion started');

  const chunks: ChunkReport[] = [];
  let totalInserted = 0;
  let totalDropped = 0;

  for await (const chunk of readCsvChunks(csvPath, chunkSize)) {
    const report = await loadChunk(db, chunk, totalInserted, log);
    chunks.push(report);
    totalInserted = report.totalInserted;
    totalDropped += report.rowsDropped;

    log.info(
      {
        chunk: report.index,
        dropped: report.rowsDropped,
        operatorsCreated: report.operatorsCreated,
        sessionsCreated: report.sessionsCreated,
      },
      `Inserted ${report.inserted.toLocaleString('en-US')} events (total: ${totalInserted.toLocaleString('en-US')})`,
    );
  }

  log.info({ chunks: chunks.length, totalInserted, totalDropped }, 'Event ingestion finished');
  return { runId, chunks, totalInserted, totalDropped };
}
