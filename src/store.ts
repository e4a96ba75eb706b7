import { type Pool } from 'pg';

import { StorageReadFailure, StorageWriteFailure } from './errors';
import { type Batch } from './event.types';
import { logger } from './logger';
import { payloadSize, toInteger } from './utils';

/**
 * Durable store of events waiting to be uploaded.
 *
 * The event count and total payload size are kept in memory and adjusted on
 * every write, so the hot path (`AddEvent` size checks, batch sizing) never
 * scans the table. `open()` seeds them from whatever survived the last run.
 */
export class EventStore {
  private eventCount = 0;
  private totalSize = 0;

  constructor(private readonly db: Pool) {}

  public async open(): Promise<void> {
    try {
      const { rows } = await this.db.query(
        'SELECT COUNT(*) AS event_count, COALESCE(SUM(size_bytes), 0) AS total_size FROM events'
      );
      this.eventCount = toInteger(rows[0]?.event_count);
      this.totalSize = toInteger(rows[0]?.total_size);
    } catch (err) {
      logger.error(new StorageReadFailure('load event totals', err).message);
      this.eventCount = 0;
      this.totalSize = 0;
    }
    logger.debug('Event store opened with %d events (%d bytes)', this.eventCount, this.totalSize);
  }

  /**
   * Stores one event.
   *
   * @returns the number of stored events afterwards, or 0 when the write
   * failed and the event was dropped
   */
  public async insert(
    type: string,
    data: string,
    id: string,
    sessionId: string | undefined,
    timestamp: number
  ): Promise<number> {
    const size = payloadSize(data);
    try {
      await this.db.query(
        `INSERT INTO events (id, event_type, payload, session_id, event_time, size_bytes)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [id, type, data, sessionId ?? null, timestamp, size]
      );
    } catch (err) {
      logger.error(new StorageWriteFailure(`store event "${id}"`, err).message);
      return 0;
    }
    this.eventCount += 1;
    this.totalSize += size;
    return this.eventCount;
  }

  public count(): number {
    return this.eventCount;
  }

  public totalSizeBytes(): number {
    return this.totalSize;
  }

  /** Session of the earliest stored event, i.e. the session with the earliest minimum timestamp. */
  public async oldestSessionId(): Promise<string | undefined> {
    try {
      const { rows } = await this.db.query(
        `SELECT session_id FROM events
         WHERE session_id IS NOT NULL
         ORDER BY event_time ASC, id ASC
         LIMIT 1`
      );
      const sessionId: unknown = rows[0]?.session_id;
      return typeof sessionId === 'string' && sessionId.length > 0 ? sessionId : undefined;
    } catch (err) {
      logger.warn(new StorageReadFailure('find the oldest session', err).message);
      return undefined;
    }
  }

  public async deleteSession(sessionId: string): Promise<void> {
    await this.deleteWhere('delete session', 'session_id = $1', [sessionId]);
  }

  /** Up to `approxCount` events in timestamp order. Nothing is removed. */
  public async selectBatch(approxCount: number): Promise<Batch> {
    const limit = Math.max(Math.floor(approxCount), 1);
    try {
      const { rows } = await this.db.query(
        `SELECT id, payload FROM events ORDER BY event_time ASC, id ASC LIMIT ${limit}`
      );
      return rows.map((row) => ({ id: String(row.id), data: String(row.payload) }));
    } catch (err) {
      logger.warn(new StorageReadFailure('select a batch', err).message);
      return [];
    }
  }

  public async delete(ids: Iterable<string>): Promise<void> {
    const values = [...new Set(ids)];
    if (values.length === 0) {
      return;
    }
    const placeholders = values.map((_, index) => `$${index + 1}`).join(', ');
    await this.deleteWhere('delete uploaded events', `id IN (${placeholders})`, values);
  }

  public async deleteAll(): Promise<void> {
    await this.deleteWhere('delete all events');
  }

  private async deleteWhere(
    operation: string,
    condition?: string,
    values: unknown[] = []
  ): Promise<void> {
    const where = condition === undefined ? '' : ` WHERE ${condition}`;
    try {
      const { rows } = await this.db.query(`DELETE FROM events${where} RETURNING size_bytes`, values);
      this.eventCount = Math.max(this.eventCount - rows.length, 0);
      this.totalSize = Math.max(
        this.totalSize - rows.reduce((sum, row) => sum + toInteger(row.size_bytes), 0),
        0
      );
    } catch (err) {
      logger.warn(new StorageWriteFailure(operation, err).message);
    }
  }
}
