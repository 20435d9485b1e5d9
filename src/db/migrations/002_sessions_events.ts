import type { Knex } from 'knex';
import { logger } from '../../config/logger.js';
import { EVENT_COLUMNS } from '../eventColumns.js';

/**
 * Migration 002 — operator work sessions and ICS command events.
 *
 * Deleting a session removes its events (ON DELETE CASCADE).
 * `ingest_hash` is unique so that replaying an already loaded file fails
 * instead of silently duplicating events.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('sessions', (t) => {
    t.increments('session_id');
    t.integer('shift_instance_id').nullable()
      .references('shift_instance_id').inTable('shift_instances');
    t.string('operator_id', 10).notNullable()
      .references('operator_id').inTable('operators');
    t.integer('shift_id').notNullable()
      .references('shift_id').inTable('shift_definitions');
    t.timestamp('session_start', { useTz: true }).notNullable();
    t.timestamp('session_end', { useTz: true }).nullable();   // NULL = ongoing
    t.integer('inactivity_threshold_min').notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.index(['operator_id', 'session_start'], 'ix_sessions_operator_start');
    t.index(['shift_id', 'session_start'], 'ix_sessions_shift_start');
  });

  await knex.schema.createTable('events', (t) => {
    t.increments('event_id');
    t.integer('session_id').notNullable()
      .references('session_id').inTable('sessions')
      .onDelete('CASCADE');
    t.string('operator_id', 10).notNullable()
      .references('operator_id').inTable('operators');
    t.timestamp('timestamp', { useTz: true }).notNullable();

    for (const col of EVENT_COLUMNS) {
      switch (col.kind) {
        case 'float':
          t.double(col.column).notNullable();
          break;
        case 'integer':
          t.integer(col.column).notNullable();
          break;
        case 'string':
          t.string(col.column, col.maxLength).notNullable();
          break;
      }
    }

    t.string('ingest_hash', 64).notNullable();
    t.unique(['ingest_hash'], { indexName: 'uq_events_ingest_hash' });
    t.index(['session_id', 'timestamp'], 'ix_events_session_time');
    t.index(['operator_id', 'timestamp'], 'ix_events_operator_time');
    t.index(['address', 'function_code'], 'ix_events_address_fc');
  });

  logger.info('[Migration 002] Created sessions and events tables');
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('events');
  await knex.schema.dropTableIfExists('sessions');
}
