import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { MultipartFile } from '@fastify/multipart';
import type { ConversionService } from '../convert';
import { MissingFileError } from '../errors';
import { getCorrelationId } from '../utils/correlation-id';

export const FILE_FIELD = 'file';

export interface ConvertRouteOptions {
  service: ConversionService;
}

/**
 * Content-Disposition for a download; characters a header cannot carry
 * are replaced with underscores
 */
export function contentDisposition(fileName: string): string {
  const safeName = fileName.replace(/[^\x20-\x7E]|["\\;]/g, '_');
  return `attachment; filename=${safeName}`;
}

/**
 * Conversion routes
 */
export async function convertRoutes(app: FastifyInstance, options: ConvertRouteOptions): Promise<void> {
  /**
   * POST /convert/ - convert the multipart `file` upload to OpenDocument
   *
   * Admission runs in onRequest, before any of the body is read.
   */
  app.post(
    '/convert/',
    { onRequest: app.rateLimit },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const correlationId = getCorrelationId(request);

      const file: MultipartFile | undefined = await request.file();
      if (!file || file.fieldname !== FILE_FIELD) {
        throw new MissingFileError(FILE_FIELD, { correlationId });
      }

      const buffer = await file.toBuffer();
      request.log.info(
        { correlationId, fileName: file.filename, size: buffer.length },
        'Received conversion request'
      );

      const result = await options.service.convert({ fileName: file.filename, buffer }, correlationId);

      return reply
        .code(200)
        .header('Content-Type', 'application/octet-stream')
        .header('Content-Disposition', contentDisposition(result.fileName))
        .header('X-Conversion-Status', 'success')
        .send(result.buffer);
    }
  );
}
