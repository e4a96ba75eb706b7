import { type Pool } from 'pg';
import { newDb } from 'pg-mem';

import { migrate } from '../db';

/**
 * An in-memory PostgreSQL. Pools created from the same database share their
 * data, which is how tests simulate a process restart.
 */
export function createTestDatabase(): { createPool: () => Pool } {
  const db = newDb({ noAstCoverageCheck: true });
  const { Pool: MemoryPool } = db.adapters.createPg();
  return {
    createPool: () => new MemoryPool(),
  };
}

export async function createMigratedPool(): Promise<Pool> {
  const pool = createTestDatabase().createPool();
  await migrate(pool);
  return pool;
}
