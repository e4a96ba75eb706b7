import type * as rx from 'rxjs';

import { type TransportFailure } from './errors';
import { type EventInput } from './event.types';

export type Clock = () => number;

export interface IEventPipeline {
  setup: () => void;
  start: () => void;
  stop: () => Promise<void>;
  drain: () => Promise<void>;
  addEvent: (event: EventInput) => void;
  upload: () => void;
  deleteAll: () => void;
}

/** Server-adjustable bounds. Sizes in bytes, intervals in milliseconds. */
export interface TuningValues {
  maxTotalDbSize: number;
  maxBatchSize: number;
  minBatchInterval: number;
  maxWait: number;
}

export interface PacingState {
  lastSendTime: number;
  scheduledSendTime: number;
  backoffMs: number;
}

export type PersistedState = TuningValues & PacingState;

export interface SchedulingConfig {
  batchDelayMs: number;
  regionBatchDelayMs: number;
  backgroundReportingIntervalMs: number;
}

export interface TransportConfig {
  endpointUrl: string;
  requestTimeoutMs: number;
  headers?: Record<string, string>;
}

export interface PipelineConfig {
  databaseUrl: string;
  transport: TransportConfig;
  scheduling: SchedulingConfig;
  tuningDefaults: TuningValues;
}

export class EventResponse {
  constructor(
    public readonly status: number,
    public readonly tuning: Partial<TuningValues> = {}
  ) {}
}

export type SendResult = EventResponse | TransportFailure;

export interface Transport {
  send: (payloads: string[]) => Promise<SendResult>;
}

/** A single pending wakeup; arming again replaces it. */
export interface WakeupTimer {
  readonly wakeups$: rx.Observable<number>;
  arm: (at: number) => void;
  isPending: () => boolean;
  cancel: () => void;
}

export interface AppState {
  isInForeground: () => boolean;
}
