import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ConversionServiceError } from './base';
import { ErrorContext } from './types';
import { ValidationError, UploadTooLargeError, InternalError } from './classes';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';
import { trackMetric } from '../obs';

/**
 * Read the HTTP status Fastify and its plugins attach to their errors
 */
function statusCodeOf(error: Error): number | undefined {
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Wrap a plain Error in the appropriate ConversionServiceError class
 *
 * Fastify and @fastify/multipart errors carry a statusCode; anything
 * else reaching the handler is an InternalError.
 *
 * @param error - The error to wrap
 * @param context - Additional context to attach
 * @param maxUploadBytes - Limit quoted when the upload was too large
 */
export function wrapError(
  error: Error,
  context: ErrorContext = {},
  maxUploadBytes = 0
): ConversionServiceError {
  if (error instanceof ConversionServiceError) {
    return error;
  }

  const statusCode = statusCodeOf(error);
  if (statusCode === 413) {
    return new UploadTooLargeError(maxUploadBytes, context);
  }
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return new ValidationError(error.message, context);
  }

  return new InternalError(error.message, context);
}

/**
 * Create a Fastify error handler that uses ConversionServiceError
 *
 * This handler:
 * 1. Extracts correlation ID from request
 * 2. Wraps plain errors in ConversionServiceError
 * 3. Logs with full context (5xx at error level, 4xx at info)
 * 4. Returns structured API response
 */
export function createErrorHandler(app: FastifyInstance, options: { maxUploadBytes?: number } = {}) {
  return (error: Error, request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    const serviceError = wrapError(error, { correlationId }, options.maxUploadBytes);

    const logPayload = {
      correlationId,
      code: serviceError.code,
      message: serviceError.message,
      statusCode: serviceError.statusCode,
      retryable: serviceError.retryable,
      context: serviceError.context,
    };

    if (serviceError.statusCode >= 500) {
      app.log.error({ ...logPayload, stack: serviceError.stack }, 'Request error');
      trackMetric('conversion_failures_total', 1, { code: serviceError.code });
    } else {
      app.log.info(logPayload, 'Request rejected');
    }

    return reply.status(serviceError.statusCode).send(serviceError.toApiResponse(correlationId));
  };
}
