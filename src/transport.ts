import axios from 'axios';

import { TransportFailure, errorMessage } from './errors';
import { logger } from './logger';
import {
  EventResponse,
  type SendResult,
  type Transport,
  type TransportConfig,
  type TuningValues,
} from './pipeline.types';

const KB = 1024;

/** Response headers the collector uses to retune clients, and the factor to bytes/ms. */
export const TUNING_HEADERS: ReadonlyArray<[keyof TuningValues, string, number]> = [
  ['maxTotalDbSize', 'x-max-total', KB],
  ['maxBatchSize', 'x-max-batch', KB],
  ['maxWait', 'x-max-wait', 1],
  ['minBatchInterval', 'x-min-batch-interval', 1],
];

export class HttpTransport implements Transport {
  constructor(
    private readonly config: TransportConfig,
    private readonly now: () => number = Date.now
  ) {}

  public async send(payloads: string[]): Promise<SendResult> {
    const body = payloads.join('\n');
    try {
      const response = await axios.post(this.config.endpointUrl, body, {
        headers: {
          ...this.config.headers,
          'Content-Type': 'application/x-ndjson',
          'X-Sent-At': String(Math.floor(this.now() / 1000)),
        },
        timeout: this.config.requestTimeoutMs,
        // every status is handed to the coordinator, which decides what counts
        validateStatus: () => true,
      });
      logger.debug('Collector answered %d for %d events', response.status, payloads.length);
      return new EventResponse(response.status, parseTuning(response.headers));
    } catch (err) {
      const reason = `Error posting events: ${errorMessage(err)}`;
      return new TransportFailure(reason, payloads.length, err);
    }
  }
}

export function parseTuning(headers: unknown): Partial<TuningValues> {
  const tuning: Partial<TuningValues> = {};
  if (typeof headers !== 'object' || headers === null) {
    return tuning;
  }
  for (const [key, header, factor] of TUNING_HEADERS) {
    const raw: unknown = Reflect.get(headers, header);
    const value = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number(raw) : NaN;
    if (Number.isInteger(value) && value > 0) {
      tuning[key] = value * factor;
    }
  }
  return tuning;
}
