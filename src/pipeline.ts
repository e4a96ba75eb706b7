import { type Pool } from 'pg';
import * as rx from 'rxjs';

import { UploadCoordinator } from './coordinator';
import { migrate } from './db';
import { MalformedCommand, StorageWriteFailure, errorMessage } from './errors';
import { type EventInput, type TelemetryEvent } from './event.types';
import { logger } from './logger';
import {
  type AppState,
  type Clock,
  type IEventPipeline,
  type PipelineConfig,
  type Transport,
  type WakeupTimer,
} from './pipeline.types';
import { CachedSubject } from './rxjs.utils';
import { FOREGROUND, UploadScheduler } from './scheduler';
import { EventStore } from './store';
import { RxWakeupTimer } from './timer';
import { TuningState } from './tuning';
import { payloadSize } from './utils';

type Command =
  | { kind: 'open' }
  | { kind: 'add'; event: EventInput }
  | { kind: 'upload' }
  | { kind: 'deleteAll' }
  | { kind: 'drain'; done: () => void };

export interface PipelineDependencies {
  db: Pool;
  transport: Transport;
  timer?: WakeupTimer;
  appState?: AppState;
  clock?: Clock;
}

/**
 * Front door of the uploader. Every command goes through one FIFO queue that
 * a single worker drains, so the store and the tuning state are only ever
 * touched by one operation at a time, whichever producer or timer issued it.
 */
export class EventPipeline implements IEventPipeline {
  public readonly store: EventStore;
  public readonly tuning: TuningState;
  public readonly scheduler: UploadScheduler;
  public readonly coordinator: UploadCoordinator;

  private readonly db: Pool;
  private readonly timer: WakeupTimer;
  private readonly commands$ = new rx.Subject<Command>();
  private readonly finished$ = new rx.Subject<void>();
  private cache: CachedSubject<Command> | undefined;
  private wakeups: rx.Subscription | undefined;
  private started = false;
  private stopped = false;

  constructor(
    config: Pick<PipelineConfig, 'scheduling' | 'tuningDefaults'>,
    dependencies: PipelineDependencies
  ) {
    const clock = dependencies.clock ?? Date.now;
    this.db = dependencies.db;
    this.timer = dependencies.timer ?? new RxWakeupTimer(clock);
    this.store = new EventStore(this.db);
    this.tuning = new TuningState(this.db, config.tuningDefaults);
    this.scheduler = new UploadScheduler(
      this.tuning,
      this.timer,
      config.scheduling,
      dependencies.appState ?? FOREGROUND,
      clock
    );
    this.coordinator = new UploadCoordinator(
      this.store,
      this.tuning,
      this.scheduler,
      dependencies.transport,
      clock
    );
  }

  public setup(): void {
    this.cache = new CachedSubject(this.commands$);
  }

  public start(): void {
    if (this.started || this.stopped) {
      return;
    }
    this.started = true;
    this.cache?.stop();

    this.commands$
      .pipe(
        rx.concatMap((command) =>
          rx.defer(() => this.dispatch(command)).pipe(
            rx.catchError((err) => {
              logger.error('Command "%s" failed: %s', command.kind, errorMessage(err));
              return rx.EMPTY;
            })
          )
        )
      )
      .subscribe({
        error: (err) => {
          logger.error('Unexpected error: "%s"', errorMessage(err));
        },
        complete: () => {
          logger.info('Shutting down');
          this.finished$.next();
        },
      });

    this.wakeups = this.timer.wakeups$.subscribe(() => {
      this.upload();
    });

    this.commands$.next({ kind: 'open' });
    this.cache?.flush();
  }

  public async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.wakeups?.unsubscribe();

    if (this.started) {
      const finished = rx.firstValueFrom(this.finished$);
      this.commands$.complete();
      await finished;
    } else {
      this.commands$.complete();
    }
    // queued events may have re-armed it while draining
    this.timer.cancel();
  }

  /** Resolves once every command queued before this call has run. */
  public async drain(): Promise<void> {
    if (this.stopped || (!this.started && this.cache === undefined)) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.commands$.next({ kind: 'drain', done: resolve });
    });
  }

  public addEvent(event: EventInput): void {
    this.commands$.next({ kind: 'add', event: { ...event } });
  }

  public upload(): void {
    this.commands$.next({ kind: 'upload' });
  }

  public deleteAll(): void {
    this.commands$.next({ kind: 'deleteAll' });
  }

  private async dispatch(command: Command): Promise<void> {
    logger.verbose('Processing command: %s', command.kind);
    switch (command.kind) {
      case 'open':
        await this.open();
        break;
      case 'add':
        await this.storeEvent(command.event);
        break;
      case 'upload':
        await this.coordinator.uploadEvents();
        break;
      case 'deleteAll':
        logger.info('Deleting all analytic events.');
        await this.store.deleteAll();
        break;
      case 'drain':
        command.done();
        break;
    }
  }

  private async open(): Promise<void> {
    try {
      await migrate(this.db);
    } catch (err) {
      logger.error(new StorageWriteFailure('create the event schema', err).message);
    }
    await this.store.open();
    await this.tuning.load();
    await this.scheduler.resume(this.store.count());
  }

  private async storeEvent(input: EventInput): Promise<void> {
    const event = toTelemetryEvent(input);
    if (event instanceof MalformedCommand) {
      logger.warn('Unable to add event: %s', event.message);
      return;
    }

    if (this.store.totalSizeBytes() + payloadSize(event.data) > this.tuning.maxTotalDbSize) {
      logger.info('Event database size exceeded. Deleting oldest session.');
      const oldestSessionId = await this.store.oldestSessionId();
      if (oldestSessionId !== undefined) {
        await this.store.deleteSession(oldestSessionId);
      }
    }

    await this.store.insert(event.type, event.data, event.id, event.sessionId, event.timestamp);
    await this.scheduler.scheduleForEvent(event.type);
  }
}

export function toTelemetryEvent(input: EventInput): TelemetryEvent | MalformedCommand {
  const { id, type, data, timestamp, sessionId } = input;
  const missing: string[] = [];
  if (!id) missing.push('id');
  if (!type) missing.push('type');
  if (!data) missing.push('data');
  if (timestamp === undefined || !Number.isInteger(timestamp)) missing.push('timestamp');

  if (!id || !type || !data || timestamp === undefined || missing.length > 0) {
    return new MalformedCommand(missing);
  }
  return { id, type, data, timestamp, sessionId: sessionId || undefined };
}
