import type { Knex } from 'knex';
import { logger } from '../../config/logger.js';

/**
 * Migration 005 — seed the two shift types the ingestion shift mapping
 * points at (DAY = 1, NIGHT = 2).
 *
 * Inserted one at a time on the freshly created table so the serial hands
 * out 1 and 2 in that order.
 */
const SEED_SHIFTS = [
  { shift_name: 'DAY', start_time: '06:00:00', end_time: '18:00:00', duration_hours: 12 },
  { shift_name: 'NIGHT', start_time: '18:00:00', end_time: '06:00:00', duration_hours: 12 },
];

export async function up(knex: Knex): Promise<void> {
  for (const shift of SEED_SHIFTS) {
    await knex('shift_definitions').insert(shift);
  }
  logger.info('[Migration 005] Seeded DAY and NIGHT shift definitions');
}

export async function down(knex: Knex): Promise<void> {
  await knex('shift_definitions')
    .whereIn('shift_name', SEED_SHIFTS.map((s) => s.shift_name))
    .del();
}
