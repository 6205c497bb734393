// Common TypeScript interfaces and types

export interface HealthStatus {
  status: 'ok';
}

export interface ReadinessStatus {
  ready: boolean;
  checks?: {
    soffice?: boolean;
  };
}

export interface RateLimitConfig {
  /** Requests admitted per window per client (default: 10) */
  maxRequests: number;
  /** Window length in milliseconds (default: 60000) */
  windowMs: number;
  /** How often expired windows are swept from memory (default: 60000) */
  sweepIntervalMs: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;
  trustProxy: boolean;
  /** Allowed CORS origins; undefined reflects every origin */
  corsOrigins?: string[];
  maxUploadBytes: number;
  rateLimit: RateLimitConfig;
  // LibreOffice conversion settings
  conversionTimeout: number;
  conversionWorkdir: string;
  conversionMaxConcurrent: number;
  sofficePath: string;
  // Azure Application Insights settings
  azureMonitorConnectionString?: string;
  enableTelemetry: boolean;
}

export interface CorrelationContext {
  correlationId: string;
}

// Rate Limiting Types

/**
 * Per-client accounting record for the current window
 */
export interface RateWindow {
  /** Requests observed in this window, denied ones included */
  count: number;
  /** Epoch milliseconds at which the window closes */
  resetAt: number;
}

/**
 * Outcome of an admission check
 */
export interface RateLimitDecision {
  allowed: boolean;
  /** Requests still admissible in the current window (never negative) */
  remaining: number;
  /** Epoch milliseconds at which the window closes */
  resetAt: number;
  /** Configured requests per window */
  limit: number;
}

// Format Dispatch Types

export type TargetFormat = 'ods' | 'odt' | 'odp';

/**
 * library: converted in-process from the OOXML package
 * external: converted by the soffice subprocess pool
 */
export type ConversionStrategy = 'library' | 'external';

export type DocumentFamily = 'excel' | 'word' | 'powerpoint' | 'publisher' | 'access';

export interface FormatRoute {
  family: DocumentFamily;
  strategy: ConversionStrategy;
  targetFormat: TargetFormat;
}

export interface DispatchResult extends FormatRoute {
  /** Uploaded filename without its final extension */
  baseName: string;
  /** Lower-cased extension without the dot */
  extension: string;
  /** Filename of the converted document */
  outputFileName: string;
}

// LibreOffice Conversion Types

/**
 * Options for an external soffice conversion
 */
export interface ConversionOptions {
  /** Extension of the input document, without the dot */
  sourceExtension: string;
  /** OpenDocument format to produce */
  targetFormat: TargetFormat;
  /** Timeout in milliseconds (default: 60000) */
  timeout?: number;
  /** Working directory for temp files (default: OS temp dir) */
  workdir?: string;
  /** Correlation ID for logging and tracing */
  correlationId?: string;
}

/**
 * Conversion pool statistics
 * Tracks job execution and pool state for observability
 */
export interface ConversionPoolStats {
  /** Number of currently active conversion jobs */
  activeJobs: number;
  /** Number of jobs waiting in queue */
  queuedJobs: number;
  /** Total number of successfully completed conversions */
  completedJobs: number;
  /** Total number of failed conversions */
  failedJobs: number;
  /** Total number of conversion attempts (completed + failed) */
  totalConversions: number;
}

/**
 * Anything able to turn a document into an OpenDocument file out of process.
 * Implemented by LibreOfficeConverter; tests substitute their own.
 */
export interface ExternalConverter {
  convert(input: Buffer, options: ConversionOptions): Promise<Buffer>;
  /** Whether the underlying tool can be invoked */
  isAvailable(): Promise<boolean>;
}

/**
 * Result of a conversion handed back to the HTTP layer
 */
export interface ConversionResult {
  buffer: Buffer;
  fileName: string;
  strategy: ConversionStrategy;
  targetFormat: TargetFormat;
}
