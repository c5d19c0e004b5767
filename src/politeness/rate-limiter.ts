/**
 * Per-host politeness gate.
 *
 * Acquisitions for the same host are chained through a promise per host, so
 * reading the last request time, waiting, and recording the new time form one
 * critical section: two concurrent fetches to a host can never both pass.
 */
import { systemClock, throwIfAborted, type Clock } from './clock.js';

export interface RateLimiterOptions {
  /** Minimum gap between two requests to the same host. */
  minDelayMs: number;
  /** Upper bound of extra random delay added to each wait. */
  jitterMs?: number;
  clock?: Clock;
  /** Returns a number in [0, 1). */
  random?: () => number;
}

export class HostRateLimiter {
  private readonly lastRequest = new Map<string, number>();
  private readonly hostDelayMs = new Map<string, number>();
  private readonly tails = new Map<string, Promise<void>>();
  private readonly minDelayMs: number;
  private readonly jitterMs: number;
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(options: RateLimiterOptions) {
    this.minDelayMs = options.minDelayMs;
    this.jitterMs = options.jitterMs ?? 0;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  /** Raise the delay for one host (e.g. from a robots Crawl-delay). Never lowers it. */
  setHostDelay(host: string, delayMs: number): void {
    const key = host.toLowerCase();
    if (delayMs > this.delayFor(key)) {
      this.hostDelayMs.set(key, delayMs);
    }
  }

  /** Effective minimum gap for a host. */
  delayFor(host: string): number {
    return this.hostDelayMs.get(host.toLowerCase()) ?? this.minDelayMs;
  }

  /**
   * Suspend until the host's delay has elapsed since its previous request,
   * then record the new request time.
   * Rejects with AbortedError if `signal` aborts; the chain is released either way.
   */
  async acquire(host: string, signal?: AbortSignal): Promise<void> {
    const key = host.toLowerCase();
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      throwIfAborted(signal);

      const last = this.lastRequest.get(key);
      if (last !== undefined) {
        const gap = this.delayFor(key) + this.random() * this.jitterMs;
        const wait = last + gap - this.clock.now();
        if (wait > 0) await this.clock.sleep(wait, signal);
      }

      this.lastRequest.set(key, this.clock.now());
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}
