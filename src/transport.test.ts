import axios from 'axios';

import { TransportFailure } from './errors';
import { EventResponse } from './pipeline.types';
import { HttpTransport, parseTuning } from './transport';

jest.mock('axios');

const mockedAxiosPost = jest.spyOn(axios, 'post');

const config = {
  endpointUrl: 'https://collector.test/api/v1/events',
  requestTimeoutMs: 5000,
  headers: { 'X-App-Key': 'test-key' },
};

describe('transport.HttpTransport', () => {
  beforeEach(() => {
    mockedAxiosPost.mockReset();
  });

  it('posts the payloads as newline-delimited records', async () => {
    mockedAxiosPost.mockResolvedValue({ status: 200, headers: {} });
    const transport = new HttpTransport(config, () => 1_700_000_000_500);

    await transport.send(['{"a":1}', '{"b":2}']);

    expect(mockedAxiosPost).toHaveBeenCalledTimes(1);
    expect(mockedAxiosPost).toHaveBeenCalledWith(
      'https://collector.test/api/v1/events',
      '{"a":1}\n{"b":2}',
      expect.objectContaining({
        timeout: 5000,
        headers: {
          'X-App-Key': 'test-key',
          'Content-Type': 'application/x-ndjson',
          'X-Sent-At': '1700000000',
        },
      })
    );
  });

  it('returns the status and the tuning values of the response', async () => {
    mockedAxiosPost.mockResolvedValue({
      status: 200,
      headers: {
        'x-max-total': '10',
        'x-max-batch': '2',
        'x-max-wait': '86400000',
        'x-min-batch-interval': '30000',
      },
    });
    const transport = new HttpTransport(config);

    const result = await transport.send(['{}']);

    expect(result).toEqual(
      new EventResponse(200, {
        maxTotalDbSize: 10_240,
        maxBatchSize: 2048,
        maxWait: 86_400_000,
        minBatchInterval: 30_000,
      })
    );
  });

  it('hands error statuses back instead of throwing', async () => {
    mockedAxiosPost.mockResolvedValue({ status: 503, headers: {} });
    const transport = new HttpTransport(config);

    const result = await transport.send(['{}']);

    expect(result).toBeInstanceOf(EventResponse);
    expect(result).toHaveProperty('status', 503);
  });

  it('reports network errors and timeouts as transport failures', async () => {
    mockedAxiosPost.mockRejectedValue(new Error('timeout of 5000ms exceeded'));
    const transport = new HttpTransport(config);

    const result = await transport.send(['{}', '{}']);

    expect(result).toBeInstanceOf(TransportFailure);
    expect(result).toHaveProperty(
      'message',
      'Unable to send 2 events: Error posting events: timeout of 5000ms exceeded'
    );
  });
});

describe('transport.parseTuning', () => {
  it('skips missing, malformed and non-positive headers', () => {
    expect(
      parseTuning({ 'x-max-total': 'abc', 'x-max-batch': '0', 'x-max-wait': 1000 })
    ).toEqual({ maxWait: 1000 });
  });

  it('returns nothing for absent headers', () => {
    expect(parseTuning(undefined)).toEqual({});
  });
});
