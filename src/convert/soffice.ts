import { promises as fs } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { execFile } from 'child_process';
import { promisify } from 'util';
import type { ConversionOptions, ConversionPoolStats, ExternalConverter } from '../types';
import { createLogger, errorMessage } from '../utils/logger';
import { trackDependency, trackGauge } from '../obs';
import { ConversionFailedError, ConversionTimeoutError, EmptyOutputError } from '../errors';
import { withTempWorkspace } from './workspace';

const logger = createLogger('convert:soffice');
const execFileAsync = promisify(execFile);

const DEFAULT_TIMEOUT = 60000; // 60 seconds
const DEFAULT_MAX_CONCURRENT = 4;
const VERSION_PROBE_TIMEOUT = 10000;

export interface LibreOfficeConverterOptions {
  /** Maximum simultaneous soffice processes (default: 4) */
  maxConcurrent?: number;
  /** soffice executable (default: "soffice" on PATH) */
  sofficePath?: string;
  /** Timeout applied when a conversion passes none */
  timeout?: number;
  /** Parent directory for job directories when a conversion passes none */
  workdir?: string;
}

/**
 * Read a property of a thrown value without trusting its shape
 */
function field(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, key);
  return value;
}

/**
 * LibreOffice Conversion Pool
 *
 * Converts office documents to OpenDocument using soffice --headless with
 * bounded concurrency. Each job runs in its own child process and temp
 * directory, so the event loop keeps serving other requests meanwhile.
 *
 * Features:
 * - Bounded concurrency with FIFO queue
 * - Timeout handling with process kill
 * - Temp directory removed on every exit path
 * - Stats tracking for observability
 *
 * @example
 * ```typescript
 * const converter = new LibreOfficeConverter({ maxConcurrent: 4 });
 * const ods = await converter.convert(xlsbBuffer, {
 *   sourceExtension: 'xlsb',
 *   targetFormat: 'ods',
 *   correlationId: 'request-123',
 * });
 * ```
 */
export class LibreOfficeConverter implements ExternalConverter {
  private activeJobs: number = 0;
  private queue: Array<() => void> = [];
  private stats: ConversionPoolStats = {
    activeJobs: 0,
    queuedJobs: 0,
    completedJobs: 0,
    failedJobs: 0,
    totalConversions: 0,
  };
  private readonly maxConcurrent: number;
  private readonly sofficePath: string;
  private readonly defaultTimeout: number;
  private readonly defaultWorkdir: string;

  constructor(options: LibreOfficeConverterOptions = {}) {
    this.maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
    this.sofficePath = options.sofficePath ?? 'soffice';
    this.defaultTimeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.defaultWorkdir = options.workdir ?? tmpdir();

    logger.info(
      { maxConcurrent: this.maxConcurrent, sofficePath: this.sofficePath },
      'LibreOfficeConverter initialized'
    );
  }

  /**
   * Convert a document buffer to the requested OpenDocument format
   *
   * @throws ConversionTimeoutError if soffice outlives the timeout
   * @throws ConversionFailedError if soffice exits non-zero or writes no file
   * @throws EmptyOutputError if the output file is empty
   */
  async convert(input: Buffer, options: ConversionOptions): Promise<Buffer> {
    const correlationId = options.correlationId || this.generateCorrelationId();
    const timeout = options.timeout || this.defaultTimeout;
    const workdir = options.workdir || this.defaultWorkdir;
    const dependencyName = `${options.sourceExtension} to ${options.targetFormat} conversion`;

    logger.debug(
      {
        correlationId,
        inputSize: input.length,
        sourceExtension: options.sourceExtension,
        targetFormat: options.targetFormat,
        timeout,
        workdir,
      },
      'Queueing soffice conversion'
    );

    // Acquire slot in the pool (may queue if pool is full)
    await this.acquireSlot(correlationId);

    const startTime = Date.now();

    try {
      this.stats.activeJobs = this.activeJobs;
      this.stats.totalConversions++;
      this.reportPoolGauges();

      const result = await withTempWorkspace({ workdir, correlationId }, async (workspace) => {
        const inputPath = workspace.inputPathFor(options.sourceExtension);
        await fs.writeFile(inputPath, input);
        logger.debug({ correlationId, inputPath, size: input.length }, 'Wrote input to temp file');

        await this.executeLibreOffice(inputPath, workspace.dir, options.targetFormat, timeout, correlationId);

        return this.readOutput(workspace.outputPathFor(options.targetFormat), correlationId);
      });

      const duration = Date.now() - startTime;
      trackDependency({
        type: 'LibreOffice',
        name: dependencyName,
        duration,
        success: true,
        correlationId,
      });

      this.stats.completedJobs++;
      logger.info(
        {
          correlationId,
          outputSize: result.length,
          duration,
          stats: this.stats,
        },
        'Conversion completed successfully'
      );

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      const message = errorMessage(error);

      trackDependency({
        type: 'LibreOffice',
        name: dependencyName,
        duration,
        success: false,
        correlationId,
        error: message,
      });

      this.stats.failedJobs++;
      logger.error(
        {
          correlationId,
          error: message,
          stats: this.stats,
        },
        'Conversion failed'
      );
      throw error;
    } finally {
      this.releaseSlot(correlationId);
    }
  }

  /**
   * Whether soffice answers `--version`
   */
  async isAvailable(): Promise<boolean> {
    try {
      await execFileAsync(this.sofficePath, ['--version'], { timeout: VERSION_PROBE_TIMEOUT });
      return true;
    } catch (error) {
      logger.warn({ sofficePath: this.sofficePath, error: errorMessage(error) }, 'soffice probe failed');
      return false;
    }
  }

  /**
   * Acquire a slot in the conversion pool
   * If pool is full, the promise will wait in queue until a slot is available
   */
  private async acquireSlot(correlationId: string): Promise<void> {
    if (this.activeJobs < this.maxConcurrent) {
      this.activeJobs++;
      logger.debug(
        { correlationId, activeJobs: this.activeJobs, maxConcurrent: this.maxConcurrent },
        'Slot acquired immediately'
      );
      return;
    }

    this.stats.queuedJobs++;
    this.reportPoolGauges();
    logger.debug({ correlationId, queuedJobs: this.stats.queuedJobs }, 'Pool full, waiting in queue');

    await new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });

    this.stats.queuedJobs--;
    logger.debug({ correlationId, activeJobs: this.activeJobs }, 'Slot acquired from queue');
  }

  /**
   * Release a slot in the conversion pool
   * If queue has waiting jobs, immediately grant slot to next in queue
   */
  private releaseSlot(correlationId: string): void {
    this.activeJobs--;
    this.stats.activeJobs = this.activeJobs;

    logger.debug(
      { correlationId, activeJobs: this.activeJobs, queueLength: this.queue.length },
      'Slot released'
    );

    const next = this.queue.shift();
    if (next) {
      this.activeJobs++;
      next();
    }
    this.reportPoolGauges();
  }

  private reportPoolGauges(): void {
    trackGauge('conversion_pool_active', this.activeJobs);
    trackGauge('conversion_pool_queued', this.queue.length);
  }

  /**
   * Execute soffice
   *
   * Command: soffice --headless --norestore --convert-to <fmt> --outdir <dir>
   *          -env:UserInstallation=file://<dir>/.libreoffice-profile <input>
   */
  private async executeLibreOffice(
    inputPath: string,
    outputDir: string,
    targetFormat: string,
    timeout: number,
    correlationId: string
  ): Promise<void> {
    // Per-job user profile prevents lock conflicts between parallel runs
    const userProfile = path.join(outputDir, '.libreoffice-profile');

    const args = [
      '--headless',
      '--norestore',
      '--convert-to',
      targetFormat,
      '--outdir',
      outputDir,
      `-env:UserInstallation=file://${userProfile}`,
      inputPath,
    ];

    logger.debug(
      { correlationId, command: this.sofficePath, args, timeout },
      'Executing LibreOffice conversion'
    );

    try {
      const { stdout, stderr } = await execFileAsync(this.sofficePath, args, {
        timeout,
        maxBuffer: 10 * 1024 * 1024, // 10MB buffer for stdout/stderr
      });

      if (stderr) {
        logger.warn({ correlationId, stderr }, 'LibreOffice produced stderr output');
      }

      logger.debug(
        { correlationId, stdout: stdout ? stdout.trim() : '' },
        'LibreOffice conversion completed'
      );
    } catch (error) {
      const killed = field(error, 'killed') === true;
      const signal = field(error, 'signal');
      const code = field(error, 'code');
      const stderr = field(error, 'stderr');
      const stdout = field(error, 'stdout');

      if (killed || signal === 'SIGTERM') {
        logger.error({ correlationId, timeout, killed, signal }, 'LibreOffice conversion timed out');
        throw new ConversionTimeoutError(timeout, { correlationId });
      }

      if (code === 'ENOENT') {
        throw new ConversionFailedError(`LibreOffice executable not found: ${this.sofficePath}`, {
          correlationId,
        });
      }

      if (typeof code === 'number') {
        const errorDetails: string[] = [];
        if (typeof stderr === 'string' && stderr.trim()) errorDetails.push(`stderr: ${stderr.trim()}`);
        if (typeof stdout === 'string' && stdout.trim()) errorDetails.push(`stdout: ${stdout.trim()}`);
        const detailsStr = errorDetails.length > 0 ? ` | ${errorDetails.join(' | ')}` : '';

        logger.error(
          { correlationId, exitCode: code, stderr, stdout },
          'LibreOffice conversion failed'
        );
        throw new ConversionFailedError(`LibreOffice exited with code ${code}${detailsStr}`, {
          correlationId,
          exitCode: code,
        });
      }

      logger.error({ correlationId, error: errorMessage(error) }, 'LibreOffice execution error');
      throw new ConversionFailedError(errorMessage(error), { correlationId });
    }
  }

  /**
   * Read the file soffice wrote
   */
  private async readOutput(outputPath: string, correlationId: string): Promise<Buffer> {
    let output: Buffer;
    try {
      output = await fs.readFile(outputPath);
    } catch (error) {
      throw new ConversionFailedError('LibreOffice conversion did not produce output file', {
        correlationId,
        cause: errorMessage(error),
      });
    }

    if (output.length === 0) {
      throw new EmptyOutputError({ correlationId });
    }

    logger.debug({ correlationId, outputPath, size: output.length }, 'Read converted output');
    return output;
  }

  /**
   * Get current pool statistics
   */
  getStats(): ConversionPoolStats {
    return { ...this.stats };
  }

  private generateCorrelationId(): string {
    return `conv-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
  }
}

/**
 * Create a converter from application config
 */
export function createLibreOfficeConverter(config: {
  conversionMaxConcurrent: number;
  sofficePath: string;
  conversionTimeout: number;
  conversionWorkdir: string;
}): LibreOfficeConverter {
  return new LibreOfficeConverter({
    maxConcurrent: config.conversionMaxConcurrent,
    sofficePath: config.sofficePath,
    timeout: config.conversionTimeout,
    workdir: config.conversionWorkdir,
  });
}
