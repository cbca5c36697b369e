import type { DiskFacade, DiskPath, EntityKind } from '../types/disk';
import { createDiskLogger, type DiskLogger, type DiskOperationName } from '../utils/diskLogger';
import * as attributes from './attributeStore';
import { resolveDiskConfig, type DiskConfig } from './config';
import * as classifier from './entityClassifier';
import { applyLogLevel } from './log';
import { copyFolder } from './recursiveCopier';
import { deleteFileOrDirectories, deleteFileOrDirectory } from './recursiveDeleter';
import { listChildDirectories, listFilesRecursively } from './recursiveEnumerator';
import { readAllText, writeTextToFile } from './textFileIO';

export interface DiskOptions {
  config?: Partial<DiskConfig>;
  logger?: DiskLogger;
}

/**
 * Facade over the filesystem modules. Stateless apart from its configuration:
 * every call goes straight to the live filesystem.
 */
export class Disk implements DiskFacade {
  readonly config: DiskConfig;

  private readonly logger: DiskLogger;

  constructor(options: DiskOptions = {}) {
    this.config = resolveDiskConfig(options.config);
    this.logger = options.logger ?? createDiskLogger({ verbose: this.config.verbose });
  }

  private async trace<T>(
    operation: DiskOperationName,
    paths: DiskPath[],
    run: () => Promise<T>,
  ): Promise<T> {
    const startedAt = Date.now();
    this.logger.logOperationStart({ operation, paths });
    try {
      const result = await run();
      this.logger.logOperationComplete({
        operation,
        paths,
        durationMs: Date.now() - startedAt,
        result,
      });
      return result;
    } catch (error: unknown) {
      this.logger.logDiskError(error, { operation, paths, durationMs: Date.now() - startedAt });
      throw error;
    }
  }

  classify(path: DiskPath): Promise<EntityKind> {
    return this.trace('classify', [path], () => classifier.classify(path));
  }

  async isFolder(path: DiskPath): Promise<boolean> {
    return (await this.classify(path)) === 'folder';
  }

  async isFile(path: DiskPath): Promise<boolean> {
    return (await this.classify(path)) === 'file';
  }

  isReadOnly(path: DiskPath): Promise<boolean> {
    return this.trace('isReadOnly', [path], () => attributes.isReadOnly(path));
  }

  setReadOnly(path: DiskPath, isReadOnly: boolean): Promise<void> {
    return this.trace('setReadOnly', [path], () => attributes.setReadOnly(path, isReadOnly));
  }

  copyFolder(source: DiskPath, destination: DiskPath): Promise<void> {
    return this.trace('copyFolder', [source, destination], () => copyFolder(source, destination));
  }

  deleteFileOrDirectory(path: DiskPath): Promise<void> {
    return this.trace('deleteFileOrDirectory', [path], () => deleteFileOrDirectory(path));
  }

  deleteFileOrDirectories(paths: Iterable<DiskPath>): Promise<void> {
    const ordered = [...paths];
    return this.trace('deleteFileOrDirectories', ordered, () => deleteFileOrDirectories(ordered));
  }

  listFilesRecursively(directory: DiskPath): Promise<DiskPath[]> {
    return this.trace('listFilesRecursively', [directory], () => listFilesRecursively(directory));
  }

  listChildDirectories(directory: DiskPath): Promise<DiskPath[]> {
    return this.trace('listChildDirectories', [directory], () => listChildDirectories(directory));
  }

  readAllText(path: DiskPath): Promise<string> {
    return this.trace('readAllText', [path], () => readAllText(path, this.config.encoding));
  }

  writeTextToFile(path: DiskPath, contents: string): Promise<void> {
    return this.trace('writeTextToFile', [path], () =>
      writeTextToFile(path, contents, this.config.encoding),
    );
  }
}

export const createDisk = (config?: Partial<DiskConfig>): Disk => {
  const disk = new Disk({ config });
  applyLogLevel(disk.config.logLevel);
  return disk;
};
