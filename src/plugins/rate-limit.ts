import { FastifyInstance, FastifyRequest, FastifyReply, onRequestHookHandler } from 'fastify';
import fp from 'fastify-plugin';
import type { RateLimitConfig, RateLimitDecision } from '../types';
import { FixedWindowRateLimiter, RateLimiter } from '../ratelimit';
import { RateLimitExceededError } from '../errors';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';
import { trackGauge, trackMetric } from '../obs';

declare module 'fastify' {
  interface FastifyInstance {
    rateLimiter: RateLimiter;
    /** onRequest hook admitting or refusing a request for its client */
    rateLimit: onRequestHookHandler;
  }
}

export const RATE_LIMIT_HEADERS = {
  limit: 'X-Rate-Limit-Limit',
  remaining: 'X-Rate-Limit-Remaining',
  reset: 'X-Rate-Limit-Reset',
} as const;

/**
 * Rate limit plugin options
 */
export interface RateLimitPluginOptions {
  config: RateLimitConfig;
  /** Limiter to use instead of building one from config */
  limiter?: RateLimiter;
  /** Clock shared with the limiter; defaults to Date.now */
  clock?: () => number;
}

/**
 * Write the rate limit headers; reset is a Unix timestamp in seconds
 */
export function setRateLimitHeaders(reply: FastifyReply, decision: RateLimitDecision): void {
  reply.header(RATE_LIMIT_HEADERS.limit, String(decision.limit));
  reply.header(RATE_LIMIT_HEADERS.remaining, String(decision.remaining));
  reply.header(RATE_LIMIT_HEADERS.reset, String(Math.ceil(decision.resetAt / 1000)));
}

/**
 * Create the admission hook for a limiter
 */
export function createRateLimitHook(limiter: RateLimiter, clock: () => number = Date.now): onRequestHookHandler {
  return async function rateLimitHook(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | undefined> {
    const now = clock();
    const clientKey = request.ip;
    const decision = limiter.check(clientKey, now);

    setRateLimitHeaders(reply, decision);

    if (decision.allowed) {
      return undefined;
    }

    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    const error = new RateLimitExceededError(decision.resetAt, { correlationId, clientKey });
    request.log.info(
      { correlationId, clientKey, resetAt: decision.resetAt },
      'Request refused by rate limiter'
    );
    trackMetric('rate_limit_rejections_total', 1);

    const retryAfterSeconds = Math.max(0, Math.ceil((decision.resetAt - now) / 1000));
    reply.header('Retry-After', String(retryAfterSeconds));
    return reply.code(error.statusCode).send(error.toApiResponse(correlationId));
  };
}

/**
 * Fastify plugin owning the process-wide rate limiter
 *
 * Decorates the instance with `rateLimiter` and a `rateLimit` hook that
 * routes opt into, and sweeps closed windows on an interval until the
 * server closes.
 */
async function rateLimitPlugin(fastify: FastifyInstance, options: RateLimitPluginOptions): Promise<void> {
  const clock = options.clock ?? Date.now;
  const limiter =
    options.limiter ??
    new FixedWindowRateLimiter({
      maxRequests: options.config.maxRequests,
      windowMs: options.config.windowMs,
      clock,
    });

  fastify.decorate('rateLimiter', limiter);
  fastify.decorate('rateLimit', createRateLimitHook(limiter, clock));

  const sweepTimer = setInterval(() => {
    limiter.sweep(clock());
    trackGauge('rate_limit_clients', limiter.size);
  }, options.config.sweepIntervalMs);
  sweepTimer.unref();

  fastify.addHook('onClose', async () => {
    clearInterval(sweepTimer);
  });
}

export default fp(rateLimitPlugin, {
  name: 'rate-limit',
});
