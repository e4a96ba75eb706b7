import { loadConfig } from './config';
import { createPool } from './db';
import { EventPipeline, type PipelineDependencies } from './pipeline';
import { type PipelineConfig } from './pipeline.types';
import { HttpTransport } from './transport';

export * from './errors';
export * from './event.types';
export * from './pipeline.types';
export { loadConfig, DEFAULT_CONFIG } from './config';
export { createPool, migrate } from './db';
export { EventPipeline, toTelemetryEvent, type PipelineDependencies } from './pipeline';
export { UploadCoordinator, SUCCESS_STATUS, type UploadOutcome } from './coordinator';
export { UploadScheduler, FOREGROUND } from './scheduler';
export { EventStore } from './store';
export { TuningState } from './tuning';
export { RxWakeupTimer } from './timer';
export { HttpTransport, parseTuning } from './transport';
export { logger } from './logger';

/**
 * Builds a pipeline against PostgreSQL and the HTTP collector described by
 * `config`. Anything in `overrides` replaces the default collaborator.
 */
export function createEventPipeline(
  config: PipelineConfig = loadConfig(),
  overrides: Partial<PipelineDependencies> = {}
): EventPipeline {
  return new EventPipeline(config, {
    db: overrides.db ?? createPool(config.databaseUrl),
    transport: overrides.transport ?? new HttpTransport(config.transport),
    timer: overrides.timer,
    appState: overrides.appState,
    clock: overrides.clock,
  });
}
