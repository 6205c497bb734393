import { tmpdir } from 'os';
import { AppConfig } from '../types';

const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024; // 50MB

/**
 * Parse an integer environment variable, falling back to the default
 * when the variable is unset or empty
 */
function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return parseInt(raw, 10);
}

/**
 * Parse a comma-separated list, dropping blank entries
 */
function readList(name: string): string[] | undefined {
  const raw = process.env[name];
  if (!raw) {
    return undefined;
  }
  const items = raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  return items.length > 0 ? items : undefined;
}

/**
 * Load configuration from environment variables
 *
 * Defaults admit 10 conversions per client per minute and allow one
 * minute for a single soffice run.
 */
export function loadConfig(): AppConfig {
  return {
    port: readInt('PORT', 8080),
    nodeEnv: process.env.NODE_ENV || 'development',
    logLevel: process.env.LOG_LEVEL || 'info',
    trustProxy: process.env.TRUST_PROXY === 'true',
    corsOrigins: readList('CORS_ORIGINS'),
    maxUploadBytes: readInt('MAX_UPLOAD_BYTES', DEFAULT_MAX_UPLOAD_BYTES),
    rateLimit: {
      maxRequests: readInt('RATE_LIMIT_MAX', 10),
      windowMs: readInt('RATE_LIMIT_WINDOW_MS', 60000),
      sweepIntervalMs: readInt('RATE_LIMIT_SWEEP_INTERVAL_MS', 60000),
    },
    // LibreOffice conversion settings
    conversionTimeout: readInt('CONVERSION_TIMEOUT', 60000),
    conversionWorkdir: process.env.CONVERSION_WORKDIR || tmpdir(),
    conversionMaxConcurrent: readInt('CONVERSION_MAX_CONCURRENT', 4),
    sofficePath: process.env.SOFFICE_PATH || 'soffice',
    // Azure Application Insights settings
    azureMonitorConnectionString: process.env.AZURE_MONITOR_CONNECTION_STRING,
    enableTelemetry: process.env.ENABLE_TELEMETRY !== 'false', // Enabled by default, can be explicitly disabled
  };
}

/**
 * Validate numeric settings
 *
 * Every count, size and duration must be a positive integer.
 * @throws Error naming each offending variable
 */
export function validateConfig(config: AppConfig): void {
  const numeric: Array<[string, number]> = [
    ['PORT', config.port],
    ['MAX_UPLOAD_BYTES', config.maxUploadBytes],
    ['RATE_LIMIT_MAX', config.rateLimit.maxRequests],
    ['RATE_LIMIT_WINDOW_MS', config.rateLimit.windowMs],
    ['RATE_LIMIT_SWEEP_INTERVAL_MS', config.rateLimit.sweepIntervalMs],
    ['CONVERSION_TIMEOUT', config.conversionTimeout],
    ['CONVERSION_MAX_CONCURRENT', config.conversionMaxConcurrent],
  ];

  const invalid = numeric
    .filter(([, value]) => !Number.isInteger(value) || value <= 0)
    .map(([name]) => name);

  if (invalid.length > 0) {
    throw new Error(
      `Invalid configuration: ${invalid.join(', ')} must be positive integers`
    );
  }
}
