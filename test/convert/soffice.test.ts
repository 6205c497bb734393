import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

type ExecResult = { stdout: string; stderr: string };

// Create global mock for promisified execFile (must be before util mock)
const mockExecFileAsync = jest.fn<Promise<ExecResult>, [string, string[], object]>();

// Mock promisify to return our mock for execFile
jest.mock('util', () => {
  const actualUtil: typeof import('util') = jest.requireActual('util');

  return {
    ...actualUtil,
    promisify: (fn: (...args: never[]) => unknown) => {
      if (fn.name === 'execFile') {
        return mockExecFileAsync;
      }
      return actualUtil.promisify(fn);
    },
  };
});

import { LibreOfficeConverter, createLibreOfficeConverter } from '../../src/convert/soffice';
import {
  ConversionFailedError,
  ConversionTimeoutError,
  EmptyOutputError,
} from '../../src/errors';

function argAfter(args: string[], flag: string): string {
  return args[args.indexOf(flag) + 1];
}

/**
 * Behave like soffice: write <outdir>/input.<format>
 */
function writeOutput(content: string) {
  return async (_file: string, args: string[]): Promise<ExecResult> => {
    const outdir = argAfter(args, '--outdir');
    const format = argAfter(args, '--convert-to');
    await fs.writeFile(path.join(outdir, `input.${format}`), content);
    return { stdout: `convert ${args[args.length - 1]}`, stderr: '' };
  };
}

describe('LibreOfficeConverter', () => {
  let workdir: string;
  let converter: LibreOfficeConverter;

  beforeEach(async () => {
    jest.clearAllMocks();
    workdir = await fs.mkdtemp(path.join(os.tmpdir(), 'soffice-test-'));
    converter = new LibreOfficeConverter({ maxConcurrent: 4, workdir });
    mockExecFileAsync.mockImplementation(writeOutput('converted document'));
  });

  afterEach(async () => {
    await fs.rm(workdir, { recursive: true, force: true });
  });

  describe('convert', () => {
    it('should convert through soffice and return the output file', async () => {
      const result = await converter.convert(Buffer.from('legacy xls'), {
        sourceExtension: 'xls',
        targetFormat: 'ods',
        correlationId: 'test-correlation-id',
      });

      expect(result.toString()).toBe('converted document');
      expect(mockExecFileAsync).toHaveBeenCalledTimes(1);

      const [command, args, options] = mockExecFileAsync.mock.calls[0];
      expect(command).toBe('soffice');
      expect(args.slice(0, 5)).toEqual(['--headless', '--norestore', '--convert-to', 'ods', '--outdir']);
      expect(options).toEqual({ timeout: 60000, maxBuffer: 10 * 1024 * 1024 });
    });

    it('should write the upload to the input path it passes soffice', async () => {
      let written = '';
      mockExecFileAsync.mockImplementation(async (file, args) => {
        written = await fs.readFile(args[args.length - 1], 'utf8');
        return writeOutput('ok')(file, args);
      });

      await converter.convert(Buffer.from('word 97 bytes'), { sourceExtension: 'doc', targetFormat: 'odt' });

      const args = mockExecFileAsync.mock.calls[0][1];
      expect(path.basename(args[args.length - 1])).toBe('input.doc');
      expect(written).toBe('word 97 bytes');
    });

    it('should give each job its own user profile inside the job directory', async () => {
      await converter.convert(Buffer.from('x'), { sourceExtension: 'ppt', targetFormat: 'odp' });

      const args = mockExecFileAsync.mock.calls[0][1];
      const outdir = argAfter(args, '--outdir');
      expect(args).toContain(`-env:UserInstallation=file://${path.join(outdir, '.libreoffice-profile')}`);
      expect(path.dirname(outdir)).toBe(workdir);
    });

    it('should remove the job directory after success', async () => {
      await converter.convert(Buffer.from('x'), { sourceExtension: 'xls', targetFormat: 'ods' });

      expect(await fs.readdir(workdir)).toEqual([]);
    });

    it('should honour a per-call timeout and workdir', async () => {
      const otherDir = await fs.mkdtemp(path.join(os.tmpdir(), 'soffice-other-'));
      try {
        await converter.convert(Buffer.from('x'), {
          sourceExtension: 'xls',
          targetFormat: 'ods',
          timeout: 5000,
          workdir: otherDir,
        });

        const [, args, options] = mockExecFileAsync.mock.calls[0];
        expect(options).toEqual({ timeout: 5000, maxBuffer: 10 * 1024 * 1024 });
        expect(path.dirname(argAfter(args, '--outdir'))).toBe(otherDir);
      } finally {
        await fs.rm(otherDir, { recursive: true, force: true });
      }
    });

    it('should raise ConversionTimeoutError when soffice is killed', async () => {
      mockExecFileAsync.mockRejectedValue({ killed: true, signal: 'SIGTERM', message: 'Timeout' });

      const promise = converter.convert(Buffer.from('x'), {
        sourceExtension: 'xls',
        targetFormat: 'ods',
        timeout: 1000,
      });

      await expect(promise).rejects.toThrow(ConversionTimeoutError);
      await expect(promise).rejects.toThrow('LibreOffice conversion timed out after 1000ms');
      expect(await fs.readdir(workdir)).toEqual([]);
    });

    it('should raise ConversionFailedError with stderr on a non-zero exit', async () => {
      mockExecFileAsync.mockRejectedValue(
        Object.assign(new Error('Command failed'), {
          code: 1,
          stderr: 'Error: source file could not be loaded\n',
          stdout: '',
        })
      );

      const promise = converter.convert(Buffer.from('x'), { sourceExtension: 'pub', targetFormat: 'odt' });

      await expect(promise).rejects.toThrow(ConversionFailedError);
      await expect(promise).rejects.toThrow(
        'Conversion failed: LibreOffice exited with code 1 | stderr: Error: source file could not be loaded'
      );
      expect(await fs.readdir(workdir)).toEqual([]);
    });

    it('should report a missing executable', async () => {
      const missing = new LibreOfficeConverter({ sofficePath: '/opt/missing/soffice', workdir });
      mockExecFileAsync.mockRejectedValue(Object.assign(new Error('spawn ENOENT'), { code: 'ENOENT' }));

      await expect(
        missing.convert(Buffer.from('x'), { sourceExtension: 'mdb', targetFormat: 'ods' })
      ).rejects.toThrow('Conversion failed: LibreOffice executable not found: /opt/missing/soffice');
    });

    it('should fail when soffice writes no output file', async () => {
      mockExecFileAsync.mockResolvedValue({ stdout: '', stderr: '' });

      await expect(
        converter.convert(Buffer.from('x'), { sourceExtension: 'xls', targetFormat: 'ods' })
      ).rejects.toThrow('Conversion failed: LibreOffice conversion did not produce output file');
      expect(await fs.readdir(workdir)).toEqual([]);
    });

    it('should fail when the output file is empty', async () => {
      mockExecFileAsync.mockImplementation(writeOutput(''));

      await expect(
        converter.convert(Buffer.from('x'), { sourceExtension: 'xls', targetFormat: 'ods' })
      ).rejects.toThrow(EmptyOutputError);
    });
  });

  describe('pool', () => {
    it('should never run more than maxConcurrent jobs at once', async () => {
      const pool = new LibreOfficeConverter({ maxConcurrent: 2, workdir });
      let running = 0;
      let peak = 0;

      mockExecFileAsync.mockImplementation(async (file, args) => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 20));
        running--;
        return writeOutput('ok')(file, args);
      });

      const jobs = Array.from({ length: 5 }, () =>
        pool.convert(Buffer.from('x'), { sourceExtension: 'xls', targetFormat: 'ods' })
      );
      await Promise.all(jobs);

      expect(peak).toBe(2);
      expect(pool.getStats()).toEqual({
        activeJobs: 0,
        queuedJobs: 0,
        completedJobs: 5,
        failedJobs: 0,
        totalConversions: 5,
      });
    });

    it('should free the slot of a failed job', async () => {
      const pool = new LibreOfficeConverter({ maxConcurrent: 1, workdir });
      mockExecFileAsync.mockRejectedValueOnce(Object.assign(new Error('Command failed'), { code: 77 }));

      const first = pool.convert(Buffer.from('x'), { sourceExtension: 'xls', targetFormat: 'ods' });
      const second = pool.convert(Buffer.from('x'), { sourceExtension: 'xls', targetFormat: 'ods' });

      await expect(first).rejects.toThrow('Conversion failed: LibreOffice exited with code 77');
      await expect(second).resolves.toEqual(Buffer.from('converted document'));

      const stats = pool.getStats();
      expect(stats.failedJobs).toBe(1);
      expect(stats.completedJobs).toBe(1);
      expect(stats.activeJobs).toBe(0);
    });
  });

  describe('isAvailable', () => {
    it('should probe soffice --version', async () => {
      mockExecFileAsync.mockResolvedValue({ stdout: 'LibreOffice 7.6', stderr: '' });

      await expect(converter.isAvailable()).resolves.toBe(true);
      expect(mockExecFileAsync).toHaveBeenCalledWith('soffice', ['--version'], { timeout: 10000 });
    });

    it('should report unavailable when the probe fails', async () => {
      mockExecFileAsync.mockRejectedValue(Object.assign(new Error('spawn soffice ENOENT'), { code: 'ENOENT' }));

      await expect(converter.isAvailable()).resolves.toBe(false);
    });
  });

  describe('createLibreOfficeConverter', () => {
    it('should build a converter from application config', async () => {
      const configured = createLibreOfficeConverter({
        conversionMaxConcurrent: 1,
        sofficePath: '/usr/bin/soffice',
        conversionTimeout: 2500,
        conversionWorkdir: workdir,
      });

      await configured.convert(Buffer.from('x'), { sourceExtension: 'xls', targetFormat: 'ods' });

      const [command, args, options] = mockExecFileAsync.mock.calls[0];
      expect(command).toBe('/usr/bin/soffice');
      expect(options).toEqual({ timeout: 2500, maxBuffer: 10 * 1024 * 1024 });
      expect(path.dirname(argAfter(args, '--outdir'))).toBe(workdir);
    });
  });
});
