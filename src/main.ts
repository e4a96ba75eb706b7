import { randomUUID } from 'crypto';

import { loadConfig } from './config';
import { createPool } from './db';
import { EventType, type TelemetryEvent } from './event.types';
import { createEventPipeline } from './index';
import { logger } from './logger';
import { type IEventPipeline } from './pipeline.types';
import { sleep } from './utils';

const main = async (): Promise<void> => {
  const duration = 1000 * 60 * 0.5;
  const config = loadConfig();
  const sessionId = randomUUID();

  const db = createPool(config.databaseUrl);
  const service: IEventPipeline = createEventPipeline(config, { db });

  service.setup();

  // send events before the service is started
  const initial = payloadEmitter('pre-start', EventType.REGION, sessionId);
  for (let i = 0; i < 3; i++) {
    service.addEvent(initial.next().value);
  }

  service.start();

  // simulate background producers
  const emitters: Array<[Generator<TelemetryEvent, never>, number]> = [
    [payloadEmitter('screen_view', 'screen_view', sessionId), 200],
    [payloadEmitter('location', EventType.LOCATION, sessionId), 1500],
    [payloadEmitter('region', EventType.REGION, sessionId), 5000],
  ];

  const timers = emitters.map(([emitter, latency]) => {
    return setInterval(() => {
      const event = emitter.next().value;
      logger.info('service.addEvent(%j)', event);
      service.addEvent(event);
    }, latency);
  });

  // after a while, stop the producers and the pipeline
  await sleep(duration).then(async () => {
    logger.info('Stopping');
    timers.forEach((timer) => {
      clearInterval(timer);
    });

    await service.stop();
    await db.end();
    logger.info('Done!');
  });
};

function* payloadEmitter(
  name: string,
  type: string,
  sessionId: string
): Generator<TelemetryEvent, never> {
  let lastId: number = 1;
  while (true) {
    const timestamp = Date.now();
    yield {
      id: randomUUID(),
      type,
      sessionId,
      timestamp,
      data: JSON.stringify({ name, seq: lastId++, timestamp }),
    };
  }
}

main().catch((err) => {
  logger.error(err);
});
