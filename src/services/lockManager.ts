import { config } from '../config';
import { logger } from '../utils/logger';
import { ErrorCode, ConflictError } from '../types';

/**
 * Lock state for one key
 */
interface LockState {
  acquiredAt: number;
  waiters: Array<() => void>;
}

/**
 * LockManager - Serializes operations that share a key
 *
 * How it works:
 * 1. Before validating and writing, acquire the lock for the key
 * 2. Only one operation holds a key at a time; others queue in arrival order
 * 3. On release the lock is handed straight to the next waiter
 * 4. A waiter that is not served within the timeout fails with AUCTION_LOCKED
 *
 * Keys are per auction ("auction:<id>") or per item ("item:<id>"), so
 * operations on unrelated auctions never wait on each other.
 */
export class LockManager {
  private locks: Map<string, LockState>;
  private defaultTimeout: number;

  constructor(defaultTimeout: number = config.auction.lockTimeout) {
    this.locks = new Map();
    this.defaultTimeout = defaultTimeout;
  }

  /**
   * Acquire the lock for a key, waiting behind earlier holders
   */
  async acquireLock(key: string, timeout: number = this.defaultTimeout): Promise<void> {
    const existingLock = this.locks.get(key);

    if (!existingLock) {
      this.locks.set(key, { acquiredAt: Date.now(), waiters: [] });
      logger.debug(`Lock acquired for ${key}`);
      return;
    }

    logger.debug(`Lock busy for ${key}, queued behind ${existingLock.waiters.length + 1} operation(s)`);

    await new Promise<void>((resolve, reject) => {
      const grant = (): void => {
        clearTimeout(timer);
        resolve();
      };

      const timer = setTimeout(() => {
        const index = existingLock.waiters.indexOf(grant);
        if (index !== -1) {
          existingLock.waiters.splice(index, 1);
        }
        logger.warn(`Lock wait timed out for ${key} after ${timeout}ms`);
        reject(
          new ConflictError(
            'Auction is currently locked, please try again',
            ErrorCode.AUCTION_LOCKED,
            { key, timeout }
          )
        );
      }, timeout);

      existingLock.waiters.push(grant);
    });
  }

  /**
   * Release the lock for a key, handing it to the next waiter if any
   */
  releaseLock(key: string): void {
    const lock = this.locks.get(key);

    if (!lock) {
      return;
    }

    const next = lock.waiters.shift();
    if (next) {
      lock.acquiredAt = Date.now();
      next();
      logger.debug(`Lock handed over for ${key}`);
      return;
    }

    this.locks.delete(key);
    logger.debug(`Lock released for ${key}`);
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  /**
   * Execute a function with lock protection
   * Automatically acquires and releases lock
   *
   * Usage:
   *   await lockManager.withLock(`auction:${auctionId}`, async () => {
   *     // Your protected code here
   *   });
   */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    await this.acquireLock(key);

    try {
      return await fn();
    } finally {
      this.releaseLock(key);
    }
  }

  /**
   * Execute a function while holding several locks
   * Keys are deduplicated and taken in sorted order so two callers
   * locking overlapping sets cannot deadlock.
   */
  async withLocks<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    const ordered = Array.from(new Set(keys)).sort();

    const run = (index: number): Promise<T> =>
      index === ordered.length ? fn() : this.withLock(ordered[index], () => run(index + 1));

    return run(0);
  }

  /**
   * Get lock statistics (for debugging)
   */
  getStats(): { totalLocks: number; lockedKeys: string[]; waiting: number } {
    let waiting = 0;
    for (const lock of this.locks.values()) {
      waiting += lock.waiters.length;
    }

    return {
      totalLocks: this.locks.size,
      lockedKeys: Array.from(this.locks.keys()),
      waiting,
    };
  }
}

export const auctionLockKey = (auctionId: string): string => `auction:${auctionId}`;
export const itemLockKey = (itemId: string): string => `item:${itemId}`;

// Export singleton instance
export const lockManager = new LockManager();
