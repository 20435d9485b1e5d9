import type { Knex } from 'knex';
import { logger } from '../../config/logger.js';

/**
 * Migration 001 — application users and the operator roster.
 *
 * users, crews, shift_definitions, operators, crew_rotations, shift_instances.
 * Operator IDs are assigned by the plant and supplied by the caller; every
 * other key here is a serial.
 */
export async function up(knex: Knex): Promise<void> {
  // ── users (monitoring tool accounts) ────────────────────────
  await knex.schema.createTable('users', (t) => {
    t.increments('user_id');
    t.string('username', 50).notNullable().unique({ indexName: 'uq_users_username' });
    t.string('password_hash', 255).notNullable();
    t.string('role', 30).notNullable();
    t.string('email', 100).notNullable().unique({ indexName: 'uq_users_email' });
    t.boolean('is_active').notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('last_login', { useTz: true }).nullable();
  });

  await knex.schema.createTable('crews', (t) => {
    t.increments('crew_id');
    t.string('crew_name', 10).notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('shift_definitions', (t) => {
    t.increments('shift_id');
    t.string('shift_name', 20).nullable();             // e.g. 'DAY', 'NIGHT'
    t.time('start_time').nullable();
    t.time('end_time').nullable();
    t.integer('duration_hours').nullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('operators', (t) => {
    t.string('operator_id', 10).primary();              // caller-supplied, never generated
    t.integer('crew_id').nullable()
      .references('crew_id').inTable('crews');
    t.integer('default_shift_id').nullable()
      .references('shift_id').inTable('shift_definitions');
    t.boolean('operator_rank').notNullable().defaultTo(true);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  // ── crew rotation pattern: on/off days counted from an anchor date ──
  await knex.schema.createTable('crew_rotations', (t) => {
    t.increments('rotation_id');
    t.integer('crew_id').notNullable()
      .references('crew_id').inTable('crews');
    t.date('anchor_date').notNullable();
    t.integer('on_days').notNullable();
    t.integer('off_days').notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('shift_instances', (t) => {
    t.increments('shift_instance_id');
    t.integer('crew_id').notNullable()
      .references('crew_id').inTable('crews');
    t.integer('shift_id').notNullable()
      .references('shift_id').inTable('shift_definitions');
    t.timestamp('shift_start', { useTz: true }).nullable();
    t.timestamp('shift_end', { useTz: true }).nullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  logger.info('[Migration 001] Created users and roster tables');
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('shift_instances');
  await knex.schema.dropTableIfExists('crew_rotations');
  await knex.schema.dropTableIfExists('operators');
  await knex.schema.dropTableIfExists('shift_definitions');
  await knex.schema.dropTableIfExists('crews');
  await knex.schema.dropTableIfExists('users');
}
