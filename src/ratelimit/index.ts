export {
  FixedWindowRateLimiter,
  DEFAULT_MAX_REQUESTS,
  DEFAULT_WINDOW_MS,
  type RateLimiter,
  type FixedWindowRateLimiterOptions,
} from './limiter';
export { InMemoryRateWindowStore, type RateWindowStore } from './store';
