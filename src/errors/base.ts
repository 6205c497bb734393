import { ErrorCode } from './codes';
import { ErrorContext, ApiErrorResponse } from './types';

/**
 * Base error class for all conversion service errors
 *
 * Provides structured error handling with:
 * - Error codes for programmatic handling
 * - HTTP status codes and a short title for API responses
 * - Retryable flag telling clients whether to try again
 * - Context for debugging and logging
 */
export abstract class ConversionServiceError extends Error {
  /** Structured error code for programmatic handling */
  abstract readonly code: ErrorCode;

  /** HTTP status code to return */
  abstract readonly statusCode: number;

  /** Title sent as the `error` field of the API response */
  abstract readonly title: string;

  /** Whether repeating the same request may succeed */
  abstract readonly retryable: boolean;

  /** Additional context for debugging and logging */
  readonly context: ErrorContext;

  /** ISO 8601 timestamp when error occurred */
  readonly timestamp: string;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.timestamp = new Date().toISOString();

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for API response
   *
   * Context and stack stay in the logs; clients get the code, the
   * message and the correlation ID to quote back.
   */
  toApiResponse(correlationId: string): ApiErrorResponse {
    return {
      error: this.title,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      correlationId,
      timestamp: this.timestamp,
    };
  }
}
