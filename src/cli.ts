#!/usr/bin/env node
import 'dotenv/config';
import { logger } from './config/logger.js';
import { closeDb } from './db/index.js';
import { buildProgram } from './program.js';

async function main(): Promise<void> {
  try {
    await buildProgram().parseAsync(process.argv);
  } finally {
    await closeDb();
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
