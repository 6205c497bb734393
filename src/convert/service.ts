import type { ConversionResult, ExternalConverter } from '../types';
import { dispatch } from '../dispatch';
import {
  ConversionFailedError,
  ConversionServiceError,
  EmptyOutputError,
  EmptyUploadError,
  ErrorContext,
} from '../errors';
import { createLogger, errorMessage } from '../utils/logger';
import { trackMetric } from '../obs';
import { convertInProcess } from './library';

const logger = createLogger('convert:service');

export interface UploadedDocument {
  fileName: string;
  buffer: Buffer;
}

export interface ConversionServiceOptions {
  /** soffice timeout in milliseconds */
  timeout: number;
  /** Parent directory for soffice job directories */
  workdir: string;
}

/**
 * Conversion pipeline
 *
 * 1. Dispatch on the file extension (no I/O, nothing written)
 * 2. Reject empty uploads
 * 3. Convert in-process or through soffice
 * 4. Reject empty output
 *
 * Failures that are not already ConversionServiceErrors become
 * ConversionFailedError.
 */
export class ConversionService {
  constructor(
    private readonly external: ExternalConverter,
    private readonly options: ConversionServiceOptions
  ) {}

  async convert(upload: UploadedDocument, correlationId: string): Promise<ConversionResult> {
    const job = dispatch(upload.fileName, { correlationId });
    const context: ErrorContext = {
      correlationId,
      fileName: upload.fileName,
      extension: job.extension,
      targetFormat: job.targetFormat,
      strategy: job.strategy,
      fileSize: upload.buffer.length,
    };

    if (upload.buffer.length === 0) {
      throw new EmptyUploadError(context);
    }

    logger.info(
      { correlationId, fileName: upload.fileName, strategy: job.strategy, targetFormat: job.targetFormat },
      job.strategy === 'library'
        ? 'Converting document in-process'
        : 'Converting document with LibreOffice'
    );

    const startTime = Date.now();
    let output: Buffer;

    try {
      output =
        job.strategy === 'library'
          ? await convertInProcess(upload.buffer, job.family, context)
          : await this.external.convert(upload.buffer, {
              sourceExtension: job.extension,
              targetFormat: job.targetFormat,
              timeout: this.options.timeout,
              workdir: this.options.workdir,
              correlationId,
            });
    } catch (error) {
      logger.error(
        { correlationId, fileName: upload.fileName, strategy: job.strategy, error: errorMessage(error) },
        'Conversion failed'
      );
      if (error instanceof ConversionServiceError) {
        throw error;
      }
      throw new ConversionFailedError(errorMessage(error), context);
    }

    if (output.length === 0) {
      throw new EmptyOutputError(context);
    }

    const duration = Date.now() - startTime;
    trackMetric('conversion_duration_ms', duration, {
      strategy: job.strategy,
      targetFormat: job.targetFormat,
    });

    logger.info(
      {
        correlationId,
        fileName: upload.fileName,
        outputFileName: job.outputFileName,
        outputSize: output.length,
        duration,
      },
      'Conversion succeeded'
    );

    return {
      buffer: output,
      fileName: job.outputFileName,
      strategy: job.strategy,
      targetFormat: job.targetFormat,
    };
  }
}
