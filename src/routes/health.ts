import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ExternalConverter, HealthStatus, ReadinessStatus } from '../types';
import { getCorrelationId } from '../utils/correlation-id';

export interface HealthRouteOptions {
  converter: ExternalConverter;
  nodeEnv: string;
}

/**
 * Health check routes
 */
export async function healthRoutes(app: FastifyInstance, options: HealthRouteOptions): Promise<void> {
  /**
   * GET /healthz - Liveness probe
   * Always returns 200 if the service is running
   */
  app.get<{ Reply: HealthStatus }>('/healthz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ status: 'ok' });
  });

  /**
   * GET /readyz - Readiness probe
   *
   * Probes soffice. Outside production a missing soffice only degrades the
   * service (in-process formats still convert), so it stays ready.
   */
  app.get<{ Reply: ReadinessStatus }>('/readyz', async (request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    const sofficeReady = await options.converter.isAvailable();

    if (!sofficeReady) {
      request.log.warn({ correlationId }, 'soffice unavailable');
    }

    const ready = options.nodeEnv !== 'production' || sofficeReady;
    const status: ReadinessStatus = {
      ready,
      checks: {
        soffice: sofficeReady,
      },
    };

    return reply.code(ready ? 200 : 503).send(status);
  });
}
