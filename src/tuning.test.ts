import { migrate } from './db';
import { type TuningValues } from './pipeline.types';
import { createMigratedPool, createTestDatabase } from './test/pgMem';
import { TuningState } from './tuning';

const defaults: TuningValues = {
  maxTotalDbSize: 5000,
  maxBatchSize: 500,
  minBatchInterval: 60_000,
  maxWait: 600_000,
};

describe('tuning.TuningState', () => {
  it('starts from the configured defaults with no pacing history', async () => {
    const pool = await createMigratedPool();
    const tuning = new TuningState(pool, defaults);

    await tuning.load();

    expect(tuning.snapshot()).toEqual({
      ...defaults,
      lastSendTime: 0,
      scheduledSendTime: 0,
      backoffMs: 0,
    });
    await pool.end();
  });

  it('survives a restart', async () => {
    const database = createTestDatabase();
    const first = database.createPool();
    await migrate(first);
    const before = new TuningState(first, defaults);
    await before.load();
    await before.update({ backoffMs: 120_000, lastSendTime: 1_700_000_000_000 });
    await before.update({ scheduledSendTime: 1_700_000_060_000, backoffMs: 240_000 });

    const second = database.createPool();
    const after = new TuningState(second, defaults);
    await after.load();

    expect(after.backoffMs).toEqual(240_000);
    expect(after.lastSendTime).toEqual(1_700_000_000_000);
    expect(after.scheduledSendTime).toEqual(1_700_000_060_000);
    expect(after.maxBatchSize).toEqual(500);
    await first.end();
    await second.end();
  });

  it('applies every tuning value the server sent and leaves the others', async () => {
    const database = createTestDatabase();
    const pool = database.createPool();
    await migrate(pool);
    const tuning = new TuningState(pool, defaults);
    await tuning.load();

    await tuning.applyServerValues({ maxBatchSize: 250, maxWait: 30_000 });

    expect(tuning.maxBatchSize).toEqual(250);
    expect(tuning.maxWait).toEqual(30_000);
    expect(tuning.maxTotalDbSize).toEqual(5000);
    expect(tuning.minBatchInterval).toEqual(60_000);

    const reloaded = new TuningState(database.createPool(), defaults);
    await reloaded.load();
    expect(reloaded.maxBatchSize).toEqual(250);
    expect(reloaded.maxWait).toEqual(30_000);
    await pool.end();
  });

  it('keeps the new values in memory when they cannot be persisted', async () => {
    const pool = await createMigratedPool();
    const tuning = new TuningState(pool, defaults);
    await tuning.load();
    await pool.query('DROP TABLE pipeline_state');

    await tuning.update({ backoffMs: 60_000 });

    expect(tuning.backoffMs).toEqual(60_000);
    await pool.end();
  });

  it('falls back to the defaults when the state cannot be read', async () => {
    const pool = createTestDatabase().createPool();
    const tuning = new TuningState(pool, defaults);

    await tuning.load();

    expect(tuning.maxWait).toEqual(600_000);
    expect(tuning.backoffMs).toEqual(0);
    await pool.end();
  });
});
