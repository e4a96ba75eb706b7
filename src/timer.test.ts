import { MAX_TIMEOUT_MS, RxWakeupTimer } from './timer';

describe('timer.RxWakeupTimer', () => {
  beforeEach(() => {
    jest.useFakeTimers({ now: 10_000 });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('fires once at the armed time', () => {
    const timer = new RxWakeupTimer();
    const fired: number[] = [];
    timer.wakeups$.subscribe((at) => fired.push(at));

    timer.arm(15_000);
    expect(timer.isPending()).toBe(true);

    jest.advanceTimersByTime(4999);
    expect(fired).toEqual([]);

    jest.advanceTimersByTime(1);
    expect(fired).toEqual([15_000]);
    expect(timer.isPending()).toBe(false);
  });

  it('keeps only the latest wakeup', () => {
    const timer = new RxWakeupTimer();
    const fired: number[] = [];
    timer.wakeups$.subscribe((at) => fired.push(at));

    timer.arm(20_000);
    timer.arm(12_000);
    jest.advanceTimersByTime(20_000);

    expect(fired).toEqual([12_000]);
  });

  it('fires immediately for a time in the past', () => {
    const timer = new RxWakeupTimer();
    const fired: number[] = [];
    timer.wakeups$.subscribe((at) => fired.push(at));

    timer.arm(5000);
    jest.advanceTimersByTime(1);

    expect(fired).toEqual([5000]);
  });

  it('drops the pending wakeup on cancel', () => {
    const timer = new RxWakeupTimer();
    const fired: number[] = [];
    timer.wakeups$.subscribe((at) => fired.push(at));

    timer.arm(11_000);
    timer.cancel();
    jest.advanceTimersByTime(5000);

    expect(fired).toEqual([]);
    expect(timer.isPending()).toBe(false);
    expect(timer.pendingTime()).toBeUndefined();
  });

  it('waits out delays longer than a single timer can hold', () => {
    const timer = new RxWakeupTimer();
    const fired: number[] = [];
    timer.wakeups$.subscribe((at) => fired.push(at));

    const thirtyDays = 30 * 24 * 60 * 60 * 1000;
    const at = 10_000 + thirtyDays;
    timer.arm(at);

    jest.advanceTimersByTime(200);
    expect(fired).toEqual([]);

    jest.advanceTimersByTime(MAX_TIMEOUT_MS);
    expect(fired).toEqual([]);
    expect(timer.pendingTime()).toEqual(at);

    jest.advanceTimersByTime(thirtyDays - MAX_TIMEOUT_MS - 201);
    expect(fired).toEqual([]);

    jest.advanceTimersByTime(1);
    expect(fired).toEqual([at]);
    expect(timer.isPending()).toBe(false);
  });
});
