import dotenv from 'dotenv';

import { ConfigError } from './errors';
import { type PipelineConfig } from './pipeline.types';

dotenv.config();

const KB = 1024;
const SECOND = 1000;
const MINUTE = 60 * SECOND;
const DAY = 24 * 60 * MINUTE;

export const DEFAULT_CONFIG: PipelineConfig = {
  databaseUrl: 'postgres://localhost:5432/events',
  transport: {
    endpointUrl: 'http://localhost:8080/api/v1/events',
    requestTimeoutMs: 30 * SECOND,
  },
  scheduling: {
    batchDelayMs: 10 * SECOND,
    regionBatchDelayMs: SECOND,
    backgroundReportingIntervalMs: 15 * MINUTE,
  },
  tuningDefaults: {
    maxTotalDbSize: 5 * KB * KB,
    maxBatchSize: 500 * KB,
    minBatchInterval: MINUTE,
    maxWait: 7 * DAY,
  },
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const int = (name: string, fallback: number): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    if (!/^\d+$/.test(raw.trim())) {
      throw new ConfigError(name, raw);
    }
    return parseInt(raw, 10);
  };

  return {
    databaseUrl: env.DATABASE_URL || DEFAULT_CONFIG.databaseUrl,
    transport: {
      endpointUrl: env.EVENTS_ENDPOINT_URL || DEFAULT_CONFIG.transport.endpointUrl,
      requestTimeoutMs: int('EVENTS_REQUEST_TIMEOUT_MS', DEFAULT_CONFIG.transport.requestTimeoutMs),
    },
    scheduling: {
      batchDelayMs: int('BATCH_DELAY_MS', DEFAULT_CONFIG.scheduling.batchDelayMs),
      regionBatchDelayMs: int('REGION_BATCH_DELAY_MS', DEFAULT_CONFIG.scheduling.regionBatchDelayMs),
      backgroundReportingIntervalMs: int(
        'BACKGROUND_REPORTING_INTERVAL_MS',
        DEFAULT_CONFIG.scheduling.backgroundReportingIntervalMs
      ),
    },
    tuningDefaults: {
      maxTotalDbSize: int('MAX_TOTAL_DB_SIZE_BYTES', DEFAULT_CONFIG.tuningDefaults.maxTotalDbSize),
      maxBatchSize: int('MAX_BATCH_SIZE_BYTES', DEFAULT_CONFIG.tuningDefaults.maxBatchSize),
      minBatchInterval: int('MIN_BATCH_INTERVAL_MS', DEFAULT_CONFIG.tuningDefaults.minBatchInterval),
      maxWait: int('MAX_WAIT_MS', DEFAULT_CONFIG.tuningDefaults.maxWait),
    },
  };
}
