import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AbortedError, TimerScheduler } from './scheduler.js';

describe('TimerScheduler', () => {
  let scheduler: TimerScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    scheduler = new TimerScheduler('test');
  });

  afterEach(() => {
    scheduler.stop();
    vi.useRealTimers();
  });

  it('runs a scheduled task once after its delay', async () => {
    const task = vi.fn(async () => {});
    scheduler.schedule('a', 1000, task);

    await vi.advanceTimersByTimeAsync(999);
    expect(task).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.has('a')).toBe(false);
  });

  it('replaces a pending task scheduled under the same key', async () => {
    const first = vi.fn(async () => {});
    const second = vi.fn(async () => {});
    scheduler.schedule('a', 1000, first);
    scheduler.schedule('a', 1000, second);

    await vi.advanceTimersByTimeAsync(1000);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('repeats periodic tasks until cancelled', async () => {
    const task = vi.fn(async () => {});
    scheduler.every('tick', 100, task);

    await vi.advanceTimersByTimeAsync(350);
    expect(task).toHaveBeenCalledTimes(3);

    expect(scheduler.cancel('tick')).toBe(true);
    await vi.advanceTimersByTimeAsync(500);
    expect(task).toHaveBeenCalledTimes(3);
  });

  it('cancels one key and leaves the others pending', async () => {
    const confirm = vi.fn(async () => {});
    scheduler.schedule('post:1', 1000, async () => {});
    scheduler.schedule('confirm:1', 1000, confirm);

    expect(scheduler.cancel('post:1')).toBe(true);
    expect(scheduler.cancel('post:1')).toBe(false);
    expect(scheduler.has('post:1')).toBe(false);
    expect(scheduler.has('confirm:1')).toBe(true);

    await vi.advanceTimersByTimeAsync(1000);
    expect(confirm).toHaveBeenCalledTimes(1);
  });

  it('keeps running after a task rejects', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const task = vi.fn(async () => {
      throw new Error('boom');
    });
    scheduler.every('failing', 100, task);

    await vi.advanceTimersByTimeAsync(200);
    expect(task).toHaveBeenCalledTimes(2);
    expect(errors).toHaveBeenCalledWith('[test] Task failing failed:', 'boom');
    errors.mockRestore();
  });

  it('rejects a sleep with AbortedError when its signal aborts', async () => {
    const controller = new AbortController();
    const sleeping = scheduler.sleep(5000, controller.signal);
    const assertion = expect(sleeping).rejects.toBeInstanceOf(AbortedError);

    controller.abort();
    await assertion;
  });

  it('resolves a sleep once the time has passed', async () => {
    let done = false;
    void scheduler.sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(1000);
    expect(done).toBe(true);
  });
});
