export enum EventType {
  LOCATION = 'location',
  REGION = 'region_event',
}

export interface TelemetryEvent {
  id: string;
  type: string;
  data: string;
  /** Milliseconds since the epoch. */
  timestamp: number;
  sessionId?: string;
}

/**
 * What producers hand to `addEvent`. Every field is optional here because
 * callers outside the type system may leave some out; incomplete events are
 * rejected when the command runs.
 */
export type EventInput = Partial<TelemetryEvent>;

export interface BatchEntry {
  id: string;
  data: string;
}

export type Batch = BatchEntry[];
