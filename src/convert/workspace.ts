import { promises as fs } from 'fs';
import path from 'path';
import { createLogger, errorMessage } from '../utils/logger';

const logger = createLogger('convert:workspace');

const DIR_PREFIX = 'officeconv-';

/**
 * A private directory holding one job's input and output files
 */
export interface TempWorkspace {
  /** Absolute path of the job directory */
  readonly dir: string;
  /** Path the input document is written to */
  inputPathFor(extension: string): string;
  /** Path soffice writes its output to for the given target extension */
  outputPathFor(extension: string): string;
}

export interface TempWorkspaceOptions {
  /** Parent directory for job directories */
  workdir: string;
  correlationId?: string;
}

/**
 * Build a job directory name unique to this process and moment
 */
export function createJobId(correlationId?: string): string {
  const randomSuffix = Math.random().toString(36).substring(2, 15);
  const safeId = (correlationId ?? 'job').replace(/[^A-Za-z0-9_-]/g, '').slice(0, 64) || 'job';
  return `${safeId}-${Date.now()}-${randomSuffix}`;
}

/**
 * Run `fn` inside a freshly created job directory and remove the directory
 * afterwards, whether `fn` resolves or rejects.
 *
 * A failed removal is logged at warn level and does not change the outcome
 * of `fn`.
 */
export async function withTempWorkspace<T>(
  options: TempWorkspaceOptions,
  fn: (workspace: TempWorkspace) => Promise<T>
): Promise<T> {
  const { correlationId } = options;
  const dir = path.join(options.workdir, `${DIR_PREFIX}${createJobId(correlationId)}`);

  await fs.mkdir(dir, { recursive: true });
  logger.debug({ correlationId, dir }, 'Created temp directory');

  const workspace: TempWorkspace = {
    dir,
    inputPathFor: (extension) => path.join(dir, `input.${extension}`),
    outputPathFor: (extension) => path.join(dir, `input.${extension}`),
  };

  try {
    return await fn(workspace);
  } finally {
    try {
      await fs.rm(dir, { recursive: true, force: true });
      logger.debug({ correlationId, dir }, 'Cleaned up temp directory');
    } catch (cleanupError) {
      logger.warn(
        { correlationId, dir, error: errorMessage(cleanupError) },
        'Failed to cleanup temp directory'
      );
    }
  }
}
