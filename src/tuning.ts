import { type Pool } from 'pg';

import { StorageReadFailure, StorageWriteFailure } from './errors';
import { logger } from './logger';
import { type PersistedState, type TuningValues } from './pipeline.types';
import { toInteger } from './utils';

const STATE_KEYS: ReadonlyArray<keyof PersistedState> = [
  'maxTotalDbSize',
  'maxBatchSize',
  'minBatchInterval',
  'maxWait',
  'lastSendTime',
  'scheduledSendTime',
  'backoffMs',
];

const STATE_KEY_SET: ReadonlySet<string> = new Set(STATE_KEYS);

const isStateKey = (key: unknown): key is keyof PersistedState =>
  typeof key === 'string' && STATE_KEY_SET.has(key);

/**
 * Server-adjustable tuning values plus the pacing state (last send, scheduled
 * send, backoff). Every change is written through to `pipeline_state` so the
 * scheduling arithmetic picks up where it left off after a restart.
 */
export class TuningState {
  private state: PersistedState;

  constructor(
    private readonly db: Pool,
    private readonly defaults: TuningValues
  ) {
    this.state = { ...defaults, lastSendTime: 0, scheduledSendTime: 0, backoffMs: 0 };
  }

  public get maxTotalDbSize(): number {
    return this.state.maxTotalDbSize;
  }

  public get maxBatchSize(): number {
    return this.state.maxBatchSize;
  }

  public get minBatchInterval(): number {
    return this.state.minBatchInterval;
  }

  public get maxWait(): number {
    return this.state.maxWait;
  }

  public get lastSendTime(): number {
    return this.state.lastSendTime;
  }

  public get scheduledSendTime(): number {
    return this.state.scheduledSendTime;
  }

  public get backoffMs(): number {
    return this.state.backoffMs;
  }

  public snapshot(): Readonly<PersistedState> {
    return { ...this.state };
  }

  public async load(): Promise<void> {
    const loaded: PersistedState = {
      ...this.defaults,
      lastSendTime: 0,
      scheduledSendTime: 0,
      backoffMs: 0,
    };
    try {
      const { rows } = await this.db.query('SELECT state_key, state_value FROM pipeline_state');
      for (const row of rows) {
        const key: unknown = row.state_key;
        if (isStateKey(key)) {
          loaded[key] = toInteger(row.state_value, loaded[key]);
        }
      }
    } catch (err) {
      logger.warn(new StorageReadFailure('load tuning state', err).message);
    }
    this.state = loaded;
    logger.debug('Tuning state loaded: %j', this.state);
  }

  /**
   * Applies `changes` in memory, then persists them. A failed write is logged;
   * the in-memory values stay in effect for this process.
   */
  public async update(changes: Partial<PersistedState>): Promise<void> {
    const entries = STATE_KEYS.flatMap((key) => {
      const value = changes[key];
      return value === undefined ? [] : [[key, value] as const];
    });
    if (entries.length === 0) {
      return;
    }

    for (const [key, value] of entries) {
      this.state[key] = value;
    }

    const placeholders = entries.map((_, i) => `($${i * 2 + 1}, $${i * 2 + 2})`).join(', ');
    try {
      await this.db.query(
        `INSERT INTO pipeline_state (state_key, state_value) VALUES ${placeholders}
         ON CONFLICT (state_key) DO UPDATE SET state_value = EXCLUDED.state_value`,
        entries.flat()
      );
    } catch (err) {
      logger.warn(new StorageWriteFailure('persist tuning state', err).message);
    }
  }

  /** Takes whichever tuning values the server sent; the server is authoritative. */
  public async applyServerValues(values: Partial<TuningValues>): Promise<void> {
    const accepted: Partial<TuningValues> = {};
    for (const key of ['maxTotalDbSize', 'maxBatchSize', 'minBatchInterval', 'maxWait'] as const) {
      const value = values[key];
      if (value !== undefined) {
        accepted[key] = value;
      }
    }
    if (Object.keys(accepted).length > 0) {
      logger.debug('Applying server tuning values: %j', accepted);
      await this.update(accepted);
    }
  }
}
