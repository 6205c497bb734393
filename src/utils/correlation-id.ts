import { v4 as uuidv4 } from 'uuid';
import { FastifyRequest, FastifyReply } from 'fastify';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId?: string;
  }
}

export const CORRELATION_ID_HEADER = 'x-correlation-id';

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Extract or generate correlation ID from request
 *
 * The first call fixes the ID for the lifetime of the request, so the
 * route handler, the error handler and the rate limiter all agree on it.
 */
export function getCorrelationId(request: FastifyRequest): string {
  if (request.correlationId) {
    return request.correlationId;
  }

  const headerValue = request.headers[CORRELATION_ID_HEADER];
  let correlationId: string;

  if (typeof headerValue === 'string' && headerValue.length > 0) {
    correlationId = headerValue;
  } else if (Array.isArray(headerValue) && headerValue.length > 0) {
    correlationId = headerValue[0];
  } else {
    correlationId = generateCorrelationId();
  }

  request.correlationId = correlationId;
  return correlationId;
}

/**
 * Add correlation ID to response headers
 */
export function setCorrelationId(reply: FastifyReply, correlationId: string): void {
  reply.header(CORRELATION_ID_HEADER, correlationId);
}
