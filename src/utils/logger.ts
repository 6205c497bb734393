import pino from 'pino';

const SERVICE_NAME = 'officeconv';

/**
 * Get the log level from environment variables
 * Priority: LOG_LEVEL > NODE_ENV=test (silent) > default (info)
 */
export function getLogLevel(): pino.LevelWithSilent {
  const level = process.env.LOG_LEVEL;
  if (level && isLevel(level)) {
    return level;
  }

  // In test and CI environments, default to silent to reduce noise
  if (process.env.NODE_ENV === 'test' || process.env.CI === 'true') {
    return 'silent';
  }

  return 'info';
}

const LEVELS: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string): value is pino.LevelWithSilent {
  return LEVELS.includes(value);
}

/**
 * Create a named logger with environment-aware log level
 * @param name - Component name, e.g. "convert:soffice"
 */
export function createLogger(name: string): pino.Logger {
  return pino({
    name,
    level: getLogLevel(),
    base: { service: SERVICE_NAME },
  });
}

/**
 * Reduce an unknown thrown value to a loggable message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
