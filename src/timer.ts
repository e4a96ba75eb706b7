import * as rx from 'rxjs';

import { type Clock, type WakeupTimer } from './pipeline.types';

/** Longest delay a Node.js timer holds; anything longer fires after 1 ms. */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

/**
 * In-process wakeup timer. `switchMap` keeps at most one pending timer:
 * arming again (or cancelling) drops the previous one.
 */
export class RxWakeupTimer implements WakeupTimer {
  private readonly arm$ = new rx.Subject<number | null>();
  private readonly fired$ = new rx.Subject<number>();
  private pendingAt: number | undefined;

  constructor(private readonly now: Clock = Date.now) {
    this.arm$
      .pipe(rx.switchMap((at) => (at === null ? rx.EMPTY : this.waitUntil(at))))
      .subscribe((at) => {
        this.pendingAt = undefined;
        this.fired$.next(at);
      });
  }

  private waitUntil(at: number): rx.Observable<number> {
    return rx.defer(() => {
      const remaining = Math.max(at - this.now(), 0);
      if (remaining > MAX_TIMEOUT_MS) {
        return rx.timer(MAX_TIMEOUT_MS).pipe(rx.concatMap(() => this.waitUntil(at)));
      }
      return rx.timer(remaining).pipe(rx.map(() => at));
    });
  }

  public get wakeups$(): rx.Observable<number> {
    return this.fired$.asObservable();
  }

  public arm(at: number): void {
    this.pendingAt = at;
    this.arm$.next(at);
  }

  public isPending(): boolean {
    return this.pendingAt !== undefined;
  }

  public pendingTime(): number | undefined {
    return this.pendingAt;
  }

  public cancel(): void {
    this.pendingAt = undefined;
    this.arm$.next(null);
  }
}
