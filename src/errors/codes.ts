/**
 * Structured error codes for programmatic error handling
 *
 * Categories:
 * - Admission   : rate limiting (429)
 * - Upload      : missing, empty or oversized uploads (400/413)
 * - Format      : unsupported or unreadable documents (400)
 * - CONVERSION_*: library or soffice failures (500/504)
 * - INTERNAL_*  : anything else (500)
 */
export enum ErrorCode {
  // Admission errors (429 - retryable once the window resets)
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',

  // Upload errors (4xx - client errors, non-retryable)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  MISSING_FILE = 'MISSING_FILE',
  MISSING_EXTENSION = 'MISSING_EXTENSION',
  EMPTY_UPLOAD = 'EMPTY_UPLOAD',
  UPLOAD_TOO_LARGE = 'UPLOAD_TOO_LARGE',

  // Format errors (400 - non-retryable)
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  CORRUPT_DOCUMENT = 'CORRUPT_DOCUMENT',

  // Conversion errors (5xx)
  CONVERSION_FAILED = 'CONVERSION_FAILED',
  CONVERSION_TIMEOUT = 'CONVERSION_TIMEOUT',
  EMPTY_OUTPUT = 'EMPTY_OUTPUT',

  // Internal errors (500 - non-retryable)
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
