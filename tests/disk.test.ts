import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Disk, EntityNotFoundError, createDiskLogger } from '../src';

describe('Disk facade', () => {
  const makeTempDir = async () => fs.mkdtemp(path.join(os.tmpdir(), 'disk-facade-'));

  const cleanupTempDir = async (dirPath: string | null) => {
    if (dirPath) {
      await fs.rm(dirPath, { recursive: true, force: true });
    }
  };

  const createQuietDisk = () => {
    const logger = createDiskLogger({ verbose: false });
    const startSpy = jest.spyOn(logger, 'logOperationStart');
    const completeSpy = jest.spyOn(logger, 'logOperationComplete');
    const errorSpy = jest.spyOn(logger, 'logDiskError').mockImplementation(() => {});
    const disk = new Disk({ logger, config: { encoding: 'utf8' } });
    return { disk, startSpy, completeSpy, errorSpy };
  };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('copies, lists, rewrites and prunes a project tree', async () => {
    let workspace: string | null = null;
    try {
      workspace = await makeTempDir();
      const { disk } = createQuietDisk();
      const source = path.join(workspace, 'site');
      const target = path.join(workspace, 'deploy');
      await fs.mkdir(path.join(source, 'assets'), { recursive: true });
      await fs.mkdir(path.join(source, 'drafts'));
      await fs.writeFile(path.join(source, 'index.html'), '<h1>v1</h1>');
      await fs.writeFile(path.join(source, 'assets', 'site.css'), 'body {}');

      await disk.copyFolder(source, target);

      expect(await disk.listFilesRecursively(target)).toEqual([
        path.join(target, 'index.html'),
        path.join(target, 'assets', 'site.css'),
        `${path.join(target, 'drafts')}${path.sep}`,
      ]);
      expect(await disk.listChildDirectories(target)).toEqual([
        path.join(target, 'assets'),
        path.join(target, 'drafts'),
      ]);

      const deployedIndex = path.join(target, 'index.html');
      await disk.setReadOnly(deployedIndex, true);
      expect(await disk.isReadOnly(deployedIndex)).toBe(true);

      await disk.writeTextToFile(deployedIndex, '<h1>v2</h1>');
      expect(await disk.isReadOnly(deployedIndex)).toBe(false);
      expect(await disk.readAllText(deployedIndex)).toBe('<h1>v2</h1>');

      await disk.setReadOnly(deployedIndex, true);
      await disk.deleteFileOrDirectories([path.join(target, 'drafts'), deployedIndex]);

      expect(await disk.listFilesRecursively(target)).toEqual([path.join(target, 'assets', 'site.css')]);
      expect(await disk.isFile(path.join(target, 'assets', 'site.css'))).toBe(true);
      expect(await disk.isFolder(path.join(target, 'assets'))).toBe(true);
      expect(await disk.classify(deployedIndex)).toBe('folder');
    } finally {
      await cleanupTempDir(workspace);
    }
  });

  it('traces each operation through the logger', async () => {
    let workspace: string | null = null;
    try {
      workspace = await makeTempDir();
      const { disk, startSpy, completeSpy } = createQuietDisk();
      const filePath = path.join(workspace, 'a.txt');
      await fs.writeFile(filePath, 'a');

      await disk.classify(filePath);

      expect(startSpy).toHaveBeenCalledWith({ operation: 'classify', paths: [filePath] });
      expect(completeSpy).toHaveBeenCalledWith(
        expect.objectContaining({ operation: 'classify', paths: [filePath], result: 'file' }),
      );
    } finally {
      await cleanupTempDir(workspace);
    }
  });

  it('logs and rethrows typed errors unchanged', async () => {
    let workspace: string | null = null;
    try {
      workspace = await makeTempDir();
      const { disk, errorSpy, completeSpy } = createQuietDisk();
      const missing = path.join(workspace, 'missing.txt');

      await expect(disk.deleteFileOrDirectory(missing)).rejects.toBeInstanceOf(EntityNotFoundError);

      expect(completeSpy).not.toHaveBeenCalled();
      expect(errorSpy).toHaveBeenCalledTimes(1);
      const [loggedError, info] = errorSpy.mock.calls[0];
      expect(loggedError).toBeInstanceOf(EntityNotFoundError);
      expect(info).toMatchObject({ operation: 'deleteFileOrDirectory', paths: [missing] });
    } finally {
      await cleanupTempDir(workspace);
    }
  });

  it('reads and writes with the configured encoding', async () => {
    let workspace: string | null = null;
    try {
      workspace = await makeTempDir();
      const logger = createDiskLogger({ verbose: false });
      const disk = new Disk({ logger, config: { encoding: 'latin1' } });
      const filePath = path.join(workspace, 'menu.txt');

      await disk.writeTextToFile(filePath, 'crème');

      expect((await fs.readFile(filePath)).length).toBe(5);
      expect(await disk.readAllText(filePath)).toBe('crème');
    } finally {
      await cleanupTempDir(workspace);
    }
  });
});
