import type { Knex } from 'knex';
import { logger } from '../../config/logger.js';

/**
 * Migration 004 — alerts and threat-intelligence correlation.
 *
 * Alerts go away with their session, event or detection; CTI links go away
 * with their alert. CTI objects themselves are never cascaded.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('alerts', (t) => {
    t.increments('alert_id');
    t.integer('event_id').notNullable()
      .references('event_id').inTable('events')
      .onDelete('CASCADE');
    t.integer('session_id').notNullable()
      .references('session_id').inTable('sessions')
      .onDelete('CASCADE');
    t.integer('detection_id').notNullable()
      .references('detection_id').inTable('detections')
      .onDelete('CASCADE');
    t.timestamp('alert_time', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.integer('severity').notNullable();
    t.string('alert_category', 30).notNullable();
    t.string('alert_description', 500).notNullable();
    t.index(['alert_time', 'severity'], 'ix_alerts_time_severity');
    t.index(['detection_id'], 'ix_alerts_detection_id');
  });

  await knex.schema.createTable('cti_objects', (t) => {
    t.increments('cti_id');
    t.string('cti_type', 30).notNullable();
    t.string('cti_name', 150).notNullable();
    t.string('external_id', 50).nullable();
    t.string('rule', 500).nullable();
    t.integer('confidence').nullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  // ── alert ↔ CTI join table (composite PK) ───────────────────
  await knex.schema.createTable('alert_cti_links', (t) => {
    t.integer('alert_id').notNullable()
      .references('alert_id').inTable('alerts')
      .onDelete('CASCADE');
    t.integer('cti_id').notNullable()
      .references('cti_id').inTable('cti_objects');
    t.string('match_reason', 250).nullable();
    t.timestamp('link_created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.primary(['alert_id', 'cti_id']);
  });

  logger.info('[Migration 004] Created alerts, cti_objects and alert_cti_links tables');
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('alert_cti_links');
  await knex.schema.dropTableIfExists('cti_objects');
  await knex.schema.dropTableIfExists('alerts');
}
