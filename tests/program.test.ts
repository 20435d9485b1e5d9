import { InvalidArgumentError } from 'commander';
import type { Knex } from 'knex';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildProgram, parsePositiveInt } from '../src/program.js';
import { countRows, createTestDb, makeTempDir, toCsv, type TempDir } from './helpers/testDb.js';

describe('parsePositiveInt', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('250')).toBe(250);
  });

  it.each(['0', '-3', '2.5', 'ten', ''])('rejects %j', (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe('opsight program', () => {
  let db: Knex;
  let tmp: TempDir;

  beforeEach(async () => {
    db = await createTestDb();
    tmp = await makeTempDir();
  });

  afterEach(async () => {
    await db.destroy();
    await tmp.cleanup();
  });

  function program() {
    const cli = buildProgram({ dbFactory: () => db });
    for (const cmd of [cli, ...cli.commands]) {
      cmd.exitOverride().configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
    }
    return cli;
  }

  it('init-db leaves an initialised database as it is', async () => {
    await program().parseAsync(['init-db'], { from: 'user' });
    expect(await countRows(db, 'shift_definitions')).toBe(2);
  });

  it('load ingests the file in chunks of the given size', async () => {
    const file = await tmp.write('events.csv', toCsv([
      { Session_ID: '1', Operator_ID: 'OP01', Timestamp: '2024-03-01 08:00:00', Shift: 'DAY' },
      { Session_ID: '1', Operator_ID: 'OP01', Timestamp: '2024-03-01 08:01:00', Shift: 'DAY' },
      { Session_ID: '2', Operator_ID: 'OP02', Timestamp: '2024-03-01 08:02:00', Shift: 'DAY' },
    ]));

    await program().parseAsync(['load', file, '--chunk-size', '2'], { from: 'user' });

    expect(await countRows(db, 'events')).toBe(3);
    expect(await countRows(db, 'sessions')).toBe(2);
  });

  it('load refuses a non-positive chunk size', async () => {
    const file = await tmp.write('events.csv', toCsv([]));

    await expect(program().parseAsync(['load', file, '--chunk-size', '0'], { from: 'user' }))
      .rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });
});
