import fs from 'fs/promises';
import path from 'path';
import { joinChild, readDirectoryListing } from '../common/directoryListing';
import { DiskIOError, SourceNotFoundError, isDiskError } from '../common/diskErrors';
import type { DirectoryListing, DiskPath } from '../types/disk';
import { statOrNull } from './entityClassifier';

const ensureDirectory = async (directory: DiskPath) => {
  try {
    await fs.mkdir(directory, { recursive: true });
  } catch (error: unknown) {
    throw new DiskIOError({ path: directory, stage: 'copy', cause: error });
  }
};

const copyFileOverwriting = async (sourceFile: DiskPath, destinationFile: DiskPath) => {
  try {
    // copyFile replaces an existing destination unless COPYFILE_EXCL is passed.
    await fs.copyFile(sourceFile, destinationFile);
  } catch (error: unknown) {
    throw new DiskIOError({ path: sourceFile, stage: 'copy', cause: error });
  }
};

const copyLevel = async (source: DiskPath, destination: DiskPath): Promise<void> => {
  await ensureDirectory(destination);

  let listing: DirectoryListing;
  try {
    listing = await readDirectoryListing(source);
  } catch (error: unknown) {
    if (isDiskError(error) && error.code === 'ENTITY_NOT_FOUND') {
      throw new SourceNotFoundError({ path: source, stage: 'copy', cause: error });
    }
    throw error;
  }

  for (const sourceFile of listing.files) {
    await copyFileOverwriting(sourceFile, joinChild(destination, path.basename(sourceFile)));
  }

  for (const sourceDirectory of listing.directories) {
    await copyLevel(sourceDirectory, joinChild(destination, path.basename(sourceDirectory)));
  }
};

/**
 * Mirrors `source` onto `destination`: files first, then each subdirectory,
 * depth-first. Existing destination files are always overwritten and nothing
 * already copied is undone when a later step fails.
 */
export const copyFolder = async (source: DiskPath, destination: DiskPath): Promise<void> => {
  const stats = await statOrNull(source);
  if (!stats?.isDirectory()) {
    throw new SourceNotFoundError({ path: source, stage: 'copy' });
  }
  await copyLevel(source, destination);
};
