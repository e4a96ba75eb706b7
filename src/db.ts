import { Pool } from 'pg';

export function createPool(databaseUrl: string): Pool {
  return new Pool({ connectionString: databaseUrl });
}

const MIGRATIONS = [
  `CREATE TABLE IF NOT EXISTS events (
    id TEXT PRIMARY KEY,
    event_type TEXT NOT NULL,
    payload TEXT NOT NULL,
    session_id TEXT,
    event_time BIGINT NOT NULL,
    size_bytes INTEGER NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS events_session_id_idx ON events (session_id)`,
  `CREATE INDEX IF NOT EXISTS events_event_time_idx ON events (event_time)`,
  `CREATE TABLE IF NOT EXISTS pipeline_state (
    state_key TEXT PRIMARY KEY,
    state_value BIGINT NOT NULL
  )`,
];

/** Creates the event and state tables. Safe to run on every start. */
export async function migrate(db: Pool): Promise<void> {
  for (const statement of MIGRATIONS) {
    await db.query(statement);
  }
}
