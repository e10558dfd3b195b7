import { describe, it, expect } from 'vitest';
import { ConcurrencyLimiter } from '../../../src/shared/concurrency/concurrency-limiter';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('ConcurrencyLimiter', () => {
  it('should reject a non-positive limit', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
    expect(() => new ConcurrencyLimiter(1.5)).toThrow(RangeError);
  });

  it('should never run more tasks than the limit', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let active = 0;
    let peak = 0;

    await limiter.map([5, 1, 3, 2, 4, 1], async (delay) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(delay);
      active--;
    });

    expect(peak).toBe(2);
    expect(limiter.activeCount).toBe(0);
    expect(limiter.pendingCount).toBe(0);
  });

  it('should keep results in input order', async () => {
    const limiter = new ConcurrencyLimiter(3);

    const results = await limiter.map([30, 5, 20, 1], async (delay, index) => {
      await sleep(delay);
      return `item-${index}`;
    });

    expect(results).toEqual(['item-0', 'item-1', 'item-2', 'item-3']);
  });

  it('should release the slot when a task fails', async () => {
    const limiter = new ConcurrencyLimiter(1);

    await expect(limiter.run(async () => Promise.reject(new Error('nope')))).rejects.toThrow('nope');
    await expect(limiter.run(async () => 'next')).resolves.toBe('next');
    expect(limiter.activeCount).toBe(0);
  });

  it('should hold an acquired slot until it is released, once', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const release = await limiter.acquire();
    let acquiredSecond = false;

    const second = limiter.acquire().then((releaseSecond) => {
      acquiredSecond = true;
      return releaseSecond;
    });
    await sleep(10);
    expect(acquiredSecond).toBe(false);
    expect(limiter.pendingCount).toBe(1);

    release();
    release();
    const releaseSecond = await second;

    expect(limiter.activeCount).toBe(1);
    releaseSecond();
    expect(limiter.activeCount).toBe(0);
  });
});
