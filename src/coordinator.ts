import { ServerRejection, TransportFailure, errorMessage } from './errors';
import { logger } from './logger';
import { type Clock, EventResponse, type SendResult, type Transport } from './pipeline.types';
import { type UploadScheduler } from './scheduler';
import { type EventStore } from './store';
import { type TuningState } from './tuning';
import { nextBackoff } from './utils';

export type UploadOutcome = 'empty' | 'succeeded' | 'failed';

/** Only a plain 200 counts; any other status, 2xx included, is retried. */
export const SUCCESS_STATUS = 200;

export class UploadCoordinator {
  constructor(
    private readonly store: EventStore,
    private readonly tuning: TuningState,
    private readonly scheduler: UploadScheduler,
    private readonly transport: Transport,
    private readonly now: Clock = Date.now
  ) {}

  public async uploadEvents(): Promise<UploadOutcome> {
    // advance the pacing clock even when the send below fails
    await this.tuning.update({ lastSendTime: this.now() });

    const eventCount = this.store.count();
    if (eventCount <= 0) {
      logger.debug('No events to send. Ending analytics upload.');
      return 'empty';
    }

    const averageSize = Math.max(Math.floor(this.store.totalSizeBytes() / eventCount), 1);
    const approxCount = Math.max(Math.floor(this.tuning.maxBatchSize / averageSize), 1);
    const batch = await this.store.selectBatch(approxCount);
    if (batch.length === 0) {
      return 'empty';
    }

    const result = await this.send(batch.map((entry) => entry.data));
    const isSuccess = result instanceof EventResponse && result.status === SUCCESS_STATUS;

    if (isSuccess) {
      logger.info('%d analytic events uploaded successfully.', batch.length);
      await this.store.delete(batch.map((entry) => entry.id));
      await this.tuning.update({ backoffMs: 0 });
    } else {
      const backoffMs = nextBackoff(
        this.tuning.backoffMs,
        this.tuning.minBatchInterval,
        this.tuning.maxWait
      );
      await this.tuning.update({ backoffMs });
      const failure =
        result instanceof EventResponse ? new ServerRejection(result.status, batch.length) : result;
      logger.warn('%s. Will retry in %d ms.', failure.message, backoffMs);
    }

    if (!isSuccess || this.store.count() > 0) {
      logger.debug('Scheduling next event batch upload.');
      await this.scheduler.schedule(this.scheduler.nextSendDelay());
    }

    if (result instanceof EventResponse) {
      await this.tuning.applyServerValues(result.tuning);
    }

    return isSuccess ? 'succeeded' : 'failed';
  }

  private async send(payloads: string[]): Promise<SendResult> {
    try {
      return await this.transport.send(payloads);
    } catch (err) {
      return new TransportFailure(
        `Unexpected error posting events: ${errorMessage(err)}`,
        payloads.length,
        err
      );
    }
  }
}
