import { EventType } from './event.types';
import { logger } from './logger';
import {
  type AppState,
  type Clock,
  type SchedulingConfig,
  type WakeupTimer,
} from './pipeline.types';
import { type TuningState } from './tuning';

export const FOREGROUND: AppState = { isInForeground: () => true };

/**
 * Decides when the next upload should run and arms the wakeup timer.
 *
 * Only the earliest deadline wins: a request for a later time never replaces
 * a pending wakeup, unless the recorded one is already stale.
 */
export class UploadScheduler {
  constructor(
    private readonly tuning: TuningState,
    private readonly timer: WakeupTimer,
    private readonly config: SchedulingConfig,
    private readonly appState: AppState = FOREGROUND,
    private readonly now: Clock = Date.now
  ) {}

  public nextSendDelay(): number {
    const nextSendTime =
      this.tuning.lastSendTime + this.tuning.minBatchInterval + this.tuning.backoffMs;
    return Math.max(nextSendTime - this.now(), 0);
  }

  public delayForEvent(type: string): number {
    const { batchDelayMs, regionBatchDelayMs, backgroundReportingIntervalMs } = this.config;
    const normalDelay = Math.max(this.nextSendDelay(), batchDelayMs);

    if (type === EventType.REGION) {
      return regionBatchDelayMs;
    }

    if (type === EventType.LOCATION && !this.appState.isInForeground()) {
      const sinceLastSend = this.now() - this.tuning.lastSendTime;
      const minimumWait = backgroundReportingIntervalMs - sinceLastSend;
      if (minimumWait > this.nextSendDelay() && minimumWait > batchDelayMs) {
        logger.info(
          'Location event stored while in background; upload deferred for %d ms',
          minimumWait
        );
        return minimumWait;
      }
    }

    return normalDelay;
  }

  public async scheduleForEvent(type: string): Promise<void> {
    await this.schedule(this.delayForEvent(type));
  }

  /**
   * @returns whether the timer was (re)armed
   */
  public async schedule(delayMs: number): Promise<boolean> {
    const now = this.now();
    const sendTime = now + delayMs;
    const previous = this.tuning.scheduledSendTime;

    const stale = previous < now;
    const earlier = sendTime < previous;
    if (!stale && !earlier && this.timer.isPending()) {
      logger.verbose('Upload already scheduled for an earlier time (%d)', previous);
      return false;
    }

    this.timer.arm(sendTime);
    await this.tuning.update({ scheduledSendTime: sendTime });
    logger.debug('Next upload scheduled in %d ms', delayMs);
    return true;
  }

  /**
   * Re-arms the wakeup after a restart. The timer itself does not survive the
   * process, only the recorded `scheduledSendTime` does.
   */
  public async resume(pendingEvents: number): Promise<void> {
    if (pendingEvents <= 0) {
      return;
    }
    const remaining = this.tuning.scheduledSendTime - this.now();
    await this.schedule(remaining > 0 ? remaining : this.nextSendDelay());
  }
}
