import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createJobId, withTempWorkspace } from '../../src/convert/workspace';

describe('withTempWorkspace', () => {
  let workdir: string;

  beforeEach(async () => {
    workdir = await fs.mkdtemp(path.join(os.tmpdir(), 'workspace-test-'));
  });

  afterEach(async () => {
    await fs.rm(workdir, { recursive: true, force: true });
  });

  it('should create a job directory under the workdir', async () => {
    let seenDir = '';
    let existed = false;

    await withTempWorkspace({ workdir, correlationId: 'req-42' }, async (workspace) => {
      seenDir = workspace.dir;
      existed = (await fs.stat(workspace.dir)).isDirectory();
    });

    expect(existed).toBe(true);
    expect(path.dirname(seenDir)).toBe(workdir);
    expect(path.basename(seenDir)).toMatch(/^officeconv-req-42-\d+-[a-z0-9]+$/);
  });

  it('should place input and output files inside the job directory', async () => {
    await withTempWorkspace({ workdir }, async (workspace) => {
      expect(workspace.inputPathFor('xlsb')).toBe(path.join(workspace.dir, 'input.xlsb'));
      expect(workspace.outputPathFor('ods')).toBe(path.join(workspace.dir, 'input.ods'));
    });
  });

  it('should return the callback result and remove the directory', async () => {
    const result = await withTempWorkspace({ workdir }, async (workspace) => {
      await fs.writeFile(workspace.inputPathFor('doc'), 'data');
      return 'done';
    });

    expect(result).toBe('done');
    expect(await fs.readdir(workdir)).toEqual([]);
  });

  it('should remove the directory when the callback rejects', async () => {
    const failure = new Error('soffice crashed');

    await expect(
      withTempWorkspace({ workdir }, async (workspace) => {
        await fs.writeFile(workspace.inputPathFor('ppt'), 'data');
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(await fs.readdir(workdir)).toEqual([]);
  });

  it('should give concurrent jobs separate directories', async () => {
    const dirs = await Promise.all(
      [1, 2, 3].map(() => withTempWorkspace({ workdir, correlationId: 'same' }, async (w) => w.dir))
    );

    expect(new Set(dirs).size).toBe(3);
  });
});

describe('createJobId', () => {
  it('should strip characters unsafe in a path', () => {
    expect(createJobId('abc/../x y')).toMatch(/^abcxy-\d+-[a-z0-9]+$/);
  });

  it('should fall back to "job"', () => {
    expect(createJobId()).toMatch(/^job-\d+-[a-z0-9]+$/);
    expect(createJobId('///')).toMatch(/^job-\d+-[a-z0-9]+$/);
  });
});
