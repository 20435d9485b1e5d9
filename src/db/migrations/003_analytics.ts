import type { Knex } from 'knex';
import { logger } from '../../config/logger.js';

/**
 * Migration 003 — behavioral features, baselines and detection verdicts.
 *
 * These rows are produced by the scoring side; this service only stores them.
 */
export async function up(knex: Knex): Promise<void> {
  // ── session_features (1:1 with sessions) ────────────────────
  await knex.schema.createTable('session_features', (t) => {
    t.increments('session_features_id');
    t.integer('session_id').notNullable()
      .references('session_id').inTable('sessions')
      .onDelete('CASCADE');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.double('command_frequency').notNullable();
    t.double('inter_command_mean').notNullable();
    t.double('inter_command_std').notNullable();
    t.double('command_burst_rate').notNullable();
    t.double('control_mode_change_rate').notNullable();
    t.double('high_risk_command_ratio').notNullable();
    t.double('invalid_command_rate').notNullable();
    t.double('pump_state_change_rate').notNullable();
    t.double('set_point_shock_event_rate').notNullable();
    t.double('pid_modification_rate').notNullable();
    t.double('command_entropy').notNullable();
    t.double('process_command_correlation').notNullable();
    t.unique(['session_id'], { indexName: 'uq_session_features_session' });
  });

  await knex.schema.createTable('baseline_profiles', (t) => {
    t.increments('baseline_id');
    t.string('operator_id', 10).notNullable()
      .references('operator_id').inTable('operators');
    t.integer('shift_id').nullable()                    // NULL = all shifts
      .references('shift_id').inTable('shift_definitions');
    t.string('baseline_version', 20).notNullable();
    t.timestamp('trained_from', { useTz: true }).notNullable();
    t.timestamp('trained_to', { useTz: true }).notNullable();
    t.text('profile_json').notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.unique(['operator_id', 'shift_id', 'baseline_version'], {
      indexName: 'uq_baseline_operator_shift_version',
    });
    t.index(['operator_id', 'shift_id'], 'ix_baseline_operator_shift');
  });

  // A detection is meaningless without its event: it goes with it.
  await knex.schema.createTable('detections', (t) => {
    t.increments('detection_id');
    t.integer('event_id').notNullable()
      .references('event_id').inTable('events')
      .onDelete('CASCADE');
    t.integer('baseline_id').notNullable()
      .references('baseline_id').inTable('baseline_profiles');
    t.string('model_type', 30).notNullable();
    t.double('anomaly_score').notNullable();
    t.double('threshold').notNullable();
    t.text('evidence_json').notNullable();
    t.string('predicted_label', 15).notNullable();
    t.timestamp('detection_time', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.unique(['event_id', 'baseline_id', 'model_type'], {
      indexName: 'uq_detection_event_baseline_model',
    });
    t.index(['event_id'], 'ix_detection_event_id');
    t.index(['baseline_id', 'detection_time'], 'ix_detection_baseline_time');
  });

  // NULL shift_ids never collide in the unique above: all-shift baselines
  // need their own partial index.
  await knex.raw(`
    CREATE UNIQUE INDEX uq_baseline_operator_version_all_shifts
    ON baseline_profiles (operator_id, baseline_version)
    WHERE shift_id IS NULL
  `);

  logger.info('[Migration 003] Created session_features, baseline_profiles and detections tables');
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('detections');
  await knex.raw('DROP INDEX IF EXISTS uq_baseline_operator_version_all_shifts');
  await knex.schema.dropTableIfExists('baseline_profiles');
  await knex.schema.dropTableIfExists('session_features');
}
