import path from 'path';
import { readDirectoryListing } from '../common/directoryListing';
import type { DiskPath } from '../types/disk';

export const toSentinel = (directory: DiskPath): DiskPath => `${directory}${path.sep}`;

export const listChildDirectories = async (directory: DiskPath): Promise<DiskPath[]> => {
  const { directories } = await readDirectoryListing(directory);
  return directories;
};

/**
 * Lists every file below `directory`: its own files, then a sentinel
 * (`directory` + separator) when it holds nothing at all, then each
 * subdirectory's results in listing order.
 */
export const listFilesRecursively = async (directory: DiskPath): Promise<DiskPath[]> => {
  const { files, directories } = await readDirectoryListing(directory);
  const results: DiskPath[] = [...files];

  if (files.length === 0 && directories.length === 0) {
    results.push(toSentinel(directory));
  }

  for (const child of directories) {
    results.push(...(await listFilesRecursively(child)));
  }

  return results;
};
