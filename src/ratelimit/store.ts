import type { RateWindow } from '../types';

/**
 * Holder of per-client rate windows.
 *
 * Operations are synchronous: a read-modify-write performed inside one call
 * to `update` cannot interleave with another request on the event loop.
 */
export interface RateWindowStore {
  /**
   * Replace the window of `key` with the result of `fn` and return it.
   * `fn` receives the current window, or undefined when none exists.
   */
  update(key: string, fn: (current: RateWindow | undefined) => RateWindow): RateWindow;

  get(key: string): RateWindow | undefined;

  delete(key: string): boolean;

  /** Remove every window whose resetAt is at or before `now`; returns how many were removed */
  deleteExpired(now: number): number;

  clear(): void;

  readonly size: number;
}

/**
 * Process-local store. Nothing is persisted; a restart clears every counter.
 */
export class InMemoryRateWindowStore implements RateWindowStore {
  private readonly windows = new Map<string, RateWindow>();

  update(key: string, fn: (current: RateWindow | undefined) => RateWindow): RateWindow {
    const next = fn(this.windows.get(key));
    this.windows.set(key, next);
    return next;
  }

  get(key: string): RateWindow | undefined {
    const window = this.windows.get(key);
    return window ? { ...window } : undefined;
  }

  delete(key: string): boolean {
    return this.windows.delete(key);
  }

  deleteExpired(now: number): number {
    let removed = 0;
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.windows.clear();
  }

  get size(): number {
    return this.windows.size;
  }
}
