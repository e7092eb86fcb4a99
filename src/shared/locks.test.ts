import { describe, expect, it } from 'vitest';
import { KeyedLock } from './locks.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs callers on the same key one at a time in arrival order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('a', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block callers on other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const held = lock.run('a', () => gate.promise);

    await expect(lock.run('b', async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await held;
  });

  it('releases the key when the callback throws', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('a', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.run('a', async () => 1)).resolves.toBe(1);
  });

  it('acquires overlapping key sets without deadlocking', async () => {
    const lock = new KeyedLock();
    const results = await Promise.all([
      lock.runMany(['user:1', 'user:2'], async () => 'x'),
      lock.runMany(['user:2', 'user:1'], async () => 'y'),
    ]);

    expect(results).toEqual(['x', 'y']);
    await expect(lock.run('user:1', async () => 'free')).resolves.toBe('free');
  });
});
