import { Command, InvalidArgumentError } from 'commander';
import type { Knex } from 'knex';
import type { Logger } from 'pino';
import { config } from './config/index.js';
import { logger as rootLogger } from './config/logger.js';
import { getDb, initDb } from './db/index.js';
import { loadEventsCsv } from './modules/ingest/loader.js';

type ProgramDependencies = {
  /** Database handle factory; the process-wide pg instance by default. */
  dbFactory?: () => Knex;
  logger?: Logger;
};

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function buildProgram(deps: ProgramDependencies = {}): Command {
  const dbFactory = deps.dbFactory ?? getDb;
  const log = deps.logger ?? rootLogger;
  const program = new Command();

  program
    .name('opsight')
    .description('ICS operator behavior store: schema setup and event ingestion')
    .version('0.1.0');

  program
    .command('init-db')
    .description('Create all tables, constraints and indexes and seed the DAY/NIGHT shifts')
    .action(async () => {
      const applied = await initDb(dbFactory());
      log.info({ migrations: applied.length }, 'Database initialised');
    });

  program
    .command('load')
    .description('Load an events CSV in chunks, one transaction per chunk')
    .argument('<csv>', 'Path to the events CSV file')
    .option('--chunk-size <n>', 'Rows per chunk', parsePositiveInt, config.ingestChunkSize)
    .action(async (csv: string, cmdOptions: { chunkSize: number }) => {
      const summary = await loadEventsCsv(dbFactory(), csv, {
        chunkSize: cmdOptions.chunkSize,
        logger: log,
      });
      log.info(
        { runId: summary.runId, chunks: summary.chunks.length, dropped: summary.totalDropped },
        `Loaded ${summary.totalInserted.toLocaleString('en-US')} events`,
      );
    });

  return program;
}
