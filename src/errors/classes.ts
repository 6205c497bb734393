import { ErrorCode } from './codes';
import { ErrorContext } from './types';
import { ConversionServiceError } from './base';

// =============================================================================
// Admission Errors (429 - retryable after the window resets)
// =============================================================================

/**
 * Client exceeded its request quota for the current window
 */
export class RateLimitExceededError extends ConversionServiceError {
  readonly code = ErrorCode.RATE_LIMIT_EXCEEDED;
  readonly statusCode = 429;
  readonly title = 'Too Many Requests';
  readonly retryable = true;

  constructor(resetAt: number, context: ErrorContext = {}) {
    super(
      `Rate limit exceeded. Try again after ${new Date(resetAt).toISOString()}.`,
      { ...context, resetAt }
    );
  }
}

// =============================================================================
// Upload Errors (4xx - Client errors, non-retryable)
// =============================================================================

/**
 * Request validation failed
 */
export class ValidationError extends ConversionServiceError {
  readonly code = ErrorCode.VALIDATION_ERROR;
  readonly statusCode = 400;
  readonly title = 'Bad Request';
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

/**
 * Multipart body carried no `file` field
 */
export class MissingFileError extends ConversionServiceError {
  readonly code = ErrorCode.MISSING_FILE;
  readonly statusCode = 400;
  readonly title = 'Bad Request';
  readonly retryable = false;

  constructor(fieldName: string, context: ErrorContext = {}) {
    super(`Missing multipart file field: ${fieldName}`, context);
  }
}

/**
 * Uploaded filename has no extension to dispatch on
 */
export class MissingExtensionError extends ConversionServiceError {
  readonly code = ErrorCode.MISSING_EXTENSION;
  readonly statusCode = 400;
  readonly title = 'Bad Request';
  readonly retryable = false;

  constructor(fileName: string, context: ErrorContext = {}) {
    super('File must have an extension', { ...context, fileName });
  }
}

/**
 * Uploaded file has no content
 */
export class EmptyUploadError extends ConversionServiceError {
  readonly code = ErrorCode.EMPTY_UPLOAD;
  readonly statusCode = 400;
  readonly title = 'Bad Request';
  readonly retryable = false;

  constructor(context: ErrorContext = {}) {
    super('Uploaded file is empty', context);
  }
}

/**
 * Upload exceeded the configured size limit
 */
export class UploadTooLargeError extends ConversionServiceError {
  readonly code = ErrorCode.UPLOAD_TOO_LARGE;
  readonly statusCode = 413;
  readonly title = 'Payload Too Large';
  readonly retryable = false;

  constructor(maxBytes: number, context: ErrorContext = {}) {
    super(`Uploaded file exceeds the ${maxBytes} byte limit`, { ...context, maxBytes });
  }
}

// =============================================================================
// Format Errors (400 - Bad Request, non-retryable)
// =============================================================================

/**
 * Extension is not in the dispatch table
 */
export class UnsupportedFormatError extends ConversionServiceError {
  readonly code = ErrorCode.UNSUPPORTED_FORMAT;
  readonly statusCode = 400;
  readonly title = 'Unsupported file format';
  readonly retryable = false;

  constructor(extension: string, context: ErrorContext = {}) {
    super(`Unsupported file format: .${extension}`, { ...context, extension });
  }
}

/**
 * Upload could not be read as the format its extension claims
 */
export class CorruptDocumentError extends ConversionServiceError {
  readonly code = ErrorCode.CORRUPT_DOCUMENT;
  readonly statusCode = 400;
  readonly title = 'Bad Request';
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Unreadable document: ${message}`, context);
  }
}

// =============================================================================
// Conversion Errors (5xx)
// =============================================================================

/**
 * Library conversion raised or soffice exited non-zero
 */
export class ConversionFailedError extends ConversionServiceError {
  readonly code = ErrorCode.CONVERSION_FAILED;
  readonly statusCode = 500;
  readonly title = 'Conversion Failed';
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Conversion failed: ${message}`, context);
  }
}

/**
 * soffice did not finish within the configured timeout
 */
export class ConversionTimeoutError extends ConversionServiceError {
  readonly code = ErrorCode.CONVERSION_TIMEOUT;
  readonly statusCode = 504;
  readonly title = 'Conversion Timeout';
  readonly retryable = true;

  constructor(timeoutMs: number, context: ErrorContext = {}) {
    super(`LibreOffice conversion timed out after ${timeoutMs}ms`, { ...context, duration: timeoutMs });
  }
}

/**
 * Conversion reported success but produced no bytes
 */
export class EmptyOutputError extends ConversionServiceError {
  readonly code = ErrorCode.EMPTY_OUTPUT;
  readonly statusCode = 500;
  readonly title = 'Conversion Failed';
  readonly retryable = false;

  constructor(context: ErrorContext = {}) {
    super('Converted file is empty', context);
  }
}

// =============================================================================
// Internal Errors (500 - non-retryable)
// =============================================================================

/**
 * Unexpected failure with no better classification
 */
export class InternalError extends ConversionServiceError {
  readonly code = ErrorCode.INTERNAL_ERROR;
  readonly statusCode = 500;
  readonly title = 'Internal Server Error';
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}
