import { describe, it, expect } from 'vitest';
import { AbortedError } from '../politeness/clock.js';
import { HostRateLimiter } from '../politeness/rate-limiter.js';
import { ManualClock } from './test-helpers.js';

describe('HostRateLimiter', () => {
  it('lets the first request to a host through immediately', async () => {
    const clock = new ManualClock(1_000);
    const limiter = new HostRateLimiter({ minDelayMs: 2_000, clock });

    await limiter.acquire('example.com');

    expect(clock.now()).toBe(1_000);
    expect(clock.sleeps).toEqual([]);
  });

  it('keeps concurrent requests to one host at least minDelay apart', async () => {
    const clock = new ManualClock();
    const limiter = new HostRateLimiter({ minDelayMs: 2_000, clock });

    await Promise.all(Array.from({ length: 5 }, () => limiter.acquire('example.com')));

    // One full wait per request after the first: no two callers passed together
    expect(clock.sleeps).toEqual([2_000, 2_000, 2_000, 2_000]);
    expect(clock.now()).toBe(8_000);
  });

  it('gates hosts independently', async () => {
    const clock = new ManualClock();
    const limiter = new HostRateLimiter({ minDelayMs: 500, clock });

    await Promise.all(['a.test', 'b.test', 'a.test', 'b.test'].map((h) => limiter.acquire(h)));

    // Both second requests are due at 500; the first wait covers the other
    expect(clock.sleeps).toEqual([500]);
    expect(clock.now()).toBe(500);
  });

  it('waits only for the remainder of the delay', async () => {
    const clock = new ManualClock();
    const limiter = new HostRateLimiter({ minDelayMs: 2_000, clock });

    await limiter.acquire('example.com');
    clock.advance(1_500);
    await limiter.acquire('example.com');

    expect(clock.sleeps).toEqual([500]);
  });

  it('treats host names case-insensitively', async () => {
    const clock = new ManualClock();
    const limiter = new HostRateLimiter({ minDelayMs: 1_000, clock });

    await limiter.acquire('Example.COM');
    await limiter.acquire('example.com');

    expect(clock.sleeps).toEqual([1_000]);
  });

  it('adds jitter from the injected random source', async () => {
    const clock = new ManualClock();
    const limiter = new HostRateLimiter({
      minDelayMs: 1_000,
      jitterMs: 400,
      clock,
      random: () => 0.5,
    });

    await limiter.acquire('example.com');
    await limiter.acquire('example.com');

    expect(clock.sleeps).toEqual([1_200]);
  });

  it('only raises a host delay', () => {
    const limiter = new HostRateLimiter({ minDelayMs: 1_000, clock: new ManualClock() });

    limiter.setHostDelay('example.com', 500);
    expect(limiter.delayFor('example.com')).toBe(1_000);

    limiter.setHostDelay('example.com', 5_000);
    expect(limiter.delayFor('example.com')).toBe(5_000);
    expect(limiter.delayFor('other.test')).toBe(1_000);
  });

  it('rejects with AbortedError once the signal aborts and releases the host', async () => {
    const clock = new ManualClock();
    const limiter = new HostRateLimiter({ minDelayMs: 1_000, clock });
    const controller = new AbortController();

    await limiter.acquire('example.com');
    controller.abort();
    await expect(limiter.acquire('example.com', controller.signal)).rejects.toBeInstanceOf(
      AbortedError
    );

    // The chain was released: a later caller still gets through
    await limiter.acquire('example.com');
    expect(clock.now()).toBe(1_000);
  });
});
