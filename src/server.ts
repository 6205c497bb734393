import dotenv from 'dotenv';
import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { healthRoutes } from './routes/health';
import { convertRoutes } from './routes/convert';
import rateLimitPlugin, { RATE_LIMIT_HEADERS } from './plugins/rate-limit';
import { loadConfig, validateConfig } from './config';
import { createErrorHandler } from './errors';
import { getCorrelationId, setCorrelationId } from './utils/correlation-id';
import { ConversionService, createLibreOfficeConverter } from './convert';
import { initializeAppInsights } from './obs';
import type { RateLimiter } from './ratelimit';
import type { AppConfig, ExternalConverter } from './types';

// Load environment variables from .env file
dotenv.config();

/**
 * Collaborators that can be swapped, mainly by tests
 */
export interface BuildOptions {
  /** Overrides applied on top of the environment configuration */
  config?: Partial<AppConfig>;
  rateLimiter?: RateLimiter;
  externalConverter?: ExternalConverter;
  /** Clock used for rate limiting */
  clock?: () => number;
}

/**
 * Build and configure the Fastify application
 * @returns Configured Fastify instance
 */
export async function build(options: BuildOptions = {}): Promise<FastifyInstance> {
  const config: AppConfig = { ...loadConfig(), ...options.config };
  validateConfig(config);

  const app = Fastify({
    logger: config.nodeEnv === 'test' ? false : { level: config.logLevel },
    trustProxy: config.trustProxy,
  });

  app.decorateRequest('correlationId', '');

  // Every response carries the correlation ID, including 429s and errors
  app.addHook('onRequest', async (request, reply) => {
    setCorrelationId(reply, getCorrelationId(request));
  });

  app.setErrorHandler(createErrorHandler(app, { maxUploadBytes: config.maxUploadBytes }));

  await app.register(cors, {
    origin: config.corsOrigins ?? true,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    exposedHeaders: [
      'Content-Disposition',
      'X-Conversion-Status',
      'x-correlation-id',
      RATE_LIMIT_HEADERS.limit,
      RATE_LIMIT_HEADERS.remaining,
      RATE_LIMIT_HEADERS.reset,
    ],
  });

  await app.register(multipart, {
    limits: {
      fileSize: config.maxUploadBytes,
      files: 1,
    },
  });

  await app.register(rateLimitPlugin, {
    config: config.rateLimit,
    limiter: options.rateLimiter,
    clock: options.clock,
  });

  const converter = options.externalConverter ?? createLibreOfficeConverter(config);
  const service = new ConversionService(converter, {
    timeout: config.conversionTimeout,
    workdir: config.conversionWorkdir,
  });

  // Register routes
  await app.register(healthRoutes, { converter, nodeEnv: config.nodeEnv });
  await app.register(convertRoutes, { service });

  return app;
}

/**
 * Start the server if this file is run directly
 */
if (require.main === module) {
  const config = loadConfig();
  initializeAppInsights(config);

  build()
    .then(async (app) => {
      try {
        await app.listen({
          port: config.port,
          host: '0.0.0.0', // Required for container deployments
        });

        app.log.info(`Server listening on port ${config.port}`);
        app.log.info(`Environment: ${config.nodeEnv}`);
      } catch (err) {
        app.log.error(err);
        process.exit(1);
      }

      // Graceful shutdown
      const shutdown = async (signal: string) => {
        app.log.info(`Received ${signal}, shutting down gracefully...`);
        await app.close();
        process.exit(0);
      };

      process.on('SIGTERM', () => void shutdown('SIGTERM'));
      process.on('SIGINT', () => void shutdown('SIGINT'));
    })
    .catch((err) => {
      console.error('Failed to build application:', err);
      process.exit(1);
    });
}
