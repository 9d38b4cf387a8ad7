import { describe, test, expect } from '@jest/globals';
import { LockManager } from '../src/services/lockManager';
import { ConflictError, ErrorCode } from '../src/types';

describe('LockManager', () => {
  test('runs operations on the same key one at a time, in arrival order', async () => {
    const locks = new LockManager(1000);
    const order: string[] = [];

    const task = (name: string) =>
      locks.withLock('auction:a', async () => {
        order.push(`${name}:start`);
        await Promise.resolve();
        await Promise.resolve();
        order.push(`${name}:end`);
      });

    await Promise.all([task('a'), task('b'), task('c')]);

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(locks.isLocked('auction:a')).toBe(false);
  });

  test('does not make unrelated keys wait', async () => {
    const locks = new LockManager(1000);
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });

    const holder = locks.withLock('auction:x', () => held);
    const other = await locks.withLock('auction:y', async () => 'done');

    expect(other).toBe('done');
    expect(locks.isLocked('auction:x')).toBe(true);

    release();
    await holder;
    expect(locks.getStats().totalLocks).toBe(0);
  });

  test('fails a waiter with AUCTION_LOCKED once the timeout passes', async () => {
    const locks = new LockManager(20);
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });

    const holder = locks.withLock('auction:a', () => held);
    const waiter = locks.withLock('auction:a', async () => 'never');

    await expect(waiter).rejects.toBeInstanceOf(ConflictError);
    await expect(waiter).rejects.toMatchObject({ code: ErrorCode.AUCTION_LOCKED, statusCode: 409 });
    expect(locks.getStats().waiting).toBe(0);

    release();
    await holder;
    expect(locks.isLocked('auction:a')).toBe(false);
  });

  test('releases the lock when the protected function throws', async () => {
    const locks = new LockManager(1000);

    await expect(
      locks.withLock('auction:a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(locks.isLocked('auction:a')).toBe(false);
  });

  test('withLocks takes overlapping sets in a fixed order without deadlocking', async () => {
    const locks = new LockManager(1000);

    const results = await Promise.all([
      locks.withLocks(['item:b', 'item:a'], async () => 'first'),
      locks.withLocks(['item:a', 'item:b', 'item:a'], async () => 'second'),
    ]);

    expect(results).toEqual(['first', 'second']);
    expect(locks.getStats()).toEqual({ totalLocks: 0, lockedKeys: [], waiting: 0 });
  });
});
