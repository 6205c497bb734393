import type { RateLimitDecision, RateWindow } from '../types';
import { InMemoryRateWindowStore, RateWindowStore } from './store';
import { createLogger } from '../utils/logger';

const logger = createLogger('ratelimit');

export const DEFAULT_MAX_REQUESTS = 10;
export const DEFAULT_WINDOW_MS = 60_000;

/**
 * Admission control keyed by client.
 */
export interface RateLimiter {
  /**
   * Count one request from `clientKey` at `now` (epoch ms) and decide
   * whether it is admitted.
   */
  check(clientKey: string, now?: number): RateLimitDecision;

  /** Drop windows that have closed; returns the number removed */
  sweep(now?: number): number;

  /** Forget every client */
  reset(): void;

  /** Number of clients currently tracked */
  readonly size: number;
}

export interface FixedWindowRateLimiterOptions {
  maxRequests?: number;
  windowMs?: number;
  store?: RateWindowStore;
  /** Clock used when `check`/`sweep` get no explicit time */
  clock?: () => number;
}

/**
 * Fixed window counter.
 *
 * The first request of a client opens a window of `windowMs`; every request
 * inside it increments the count, denied ones included. Once `now` reaches
 * `resetAt` the next request opens a fresh window with count 1.
 *
 * @example
 * ```typescript
 * const limiter = new FixedWindowRateLimiter({ maxRequests: 10, windowMs: 60_000 });
 * const decision = limiter.check('203.0.113.7');
 * if (!decision.allowed) {
 *   // respond 429
 * }
 * ```
 */
export class FixedWindowRateLimiter implements RateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  private readonly store: RateWindowStore;
  private readonly clock: () => number;

  constructor(options: FixedWindowRateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? DEFAULT_MAX_REQUESTS;
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.store = options.store ?? new InMemoryRateWindowStore();
    this.clock = options.clock ?? Date.now;

    if (this.maxRequests < 1 || this.windowMs < 1) {
      throw new Error(
        `Invalid rate limit policy: ${this.maxRequests} requests per ${this.windowMs}ms`
      );
    }
  }

  check(clientKey: string, now: number = this.clock()): RateLimitDecision {
    const window = this.store.update(clientKey, (current) => this.advance(current, now));
    const allowed = window.count <= this.maxRequests;

    if (!allowed && window.count === this.maxRequests + 1) {
      logger.info(
        { clientKey, limit: this.maxRequests, resetAt: window.resetAt },
        'Client reached rate limit'
      );
    }

    return {
      allowed,
      remaining: allowed ? this.maxRequests - window.count : 0,
      resetAt: window.resetAt,
      limit: this.maxRequests,
    };
  }

  sweep(now: number = this.clock()): number {
    const removed = this.store.deleteExpired(now);
    if (removed > 0) {
      logger.debug({ removed, active: this.store.size }, 'Swept expired rate windows');
    }
    return removed;
  }

  reset(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }

  private advance(current: RateWindow | undefined, now: number): RateWindow {
    if (!current || now >= current.resetAt) {
      return { count: 1, resetAt: now + this.windowMs };
    }
    return { count: current.count + 1, resetAt: current.resetAt };
  }
}
