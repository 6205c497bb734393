import { ErrorCode } from './codes';

/**
 * Context information attached to errors for debugging and logging
 */
export interface ErrorContext {
  /** Request correlation ID for distributed tracing */
  correlationId?: string;
  /** Uploaded filename */
  fileName?: string;
  /** Lower-cased extension of the upload */
  extension?: string;
  /** Target OpenDocument format */
  targetFormat?: string;
  /** Conversion strategy that failed */
  strategy?: string;
  /** File size in bytes */
  fileSize?: number;
  /** Processing duration in milliseconds */
  duration?: number;
  /** soffice process exit code */
  exitCode?: number;
  /** Client address the rate limit applies to */
  clientKey?: string;
  /** Allow additional context fields */
  [key: string]: unknown;
}

/**
 * Structured error response returned by the API
 */
export interface ApiErrorResponse {
  /** Short human-readable title (e.g., "Unsupported file format") */
  error: string;
  /** Structured error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable error message */
  message: string;
  /** HTTP status code */
  statusCode: number;
  /** Request correlation ID */
  correlationId: string;
  /** ISO 8601 timestamp when error occurred */
  timestamp: string;
}
