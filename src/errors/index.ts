/**
 * Error Handling Module
 *
 * ```typescript
 * import { UnsupportedFormatError, wrapError } from './errors';
 *
 * throw new UnsupportedFormatError('zip', { correlationId });
 *
 * const serviceError = wrapError(error, { correlationId });
 * ```
 */

// Error codes enum
export { ErrorCode } from './codes';

// Types and interfaces
export type { ErrorContext, ApiErrorResponse } from './types';

// Base error class
export { ConversionServiceError } from './base';

// All specialized error classes
export {
  // Admission errors
  RateLimitExceededError,
  // Upload errors
  ValidationError,
  MissingFileError,
  MissingExtensionError,
  EmptyUploadError,
  UploadTooLargeError,
  // Format errors
  UnsupportedFormatError,
  CorruptDocumentError,
  // Conversion errors
  ConversionFailedError,
  ConversionTimeoutError,
  EmptyOutputError,
  // Internal errors
  InternalError,
} from './classes';

// Handler utilities
export { wrapError, createErrorHandler } from './handler';
