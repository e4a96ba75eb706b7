import * as rx from 'rxjs';

export class CachedSubject<T> {
  private readonly flushCache$ = new rx.Subject<void>();
  private readonly stopCaching$ = new rx.Subject<void>();

  constructor(upstream$: rx.Subject<T>) {
    this.setup(upstream$);
  }

  public stop(): void {
    this.stopCaching$.next();
  }

  public flush(): void {
    this.flushCache$.next();
  }

  private setup(upstream$: rx.Subject<T>): void {
    // Cache the values that are sent during the timeframe between `setup()`
    // and `start()`, otherwise, they would be lost
    const cache$ = new rx.ReplaySubject<T>();

    // 1. copy every upstream value into the cache until caching is stopped
    upstream$.pipe(rx.takeUntil(this.stopCaching$)).subscribe((value) => {
      cache$.next(value);
    });

    // 2. on the first flush, replay the cached values into the real flow
    this.flushCache$
      .pipe(
        rx.take(1),
        rx.exhaustMap(() => {
          cache$.complete();
          return cache$;
        })
      )
      .subscribe((value) => {
        upstream$.next(value);
      });
  }
}
