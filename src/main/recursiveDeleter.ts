import fs from 'fs/promises';
import { toDiskError } from '../common/diskErrors';
import type { DiskPath } from '../types/disk';
import { isReadOnly, setReadOnly } from './attributeStore';
import { isDeletableDirectory } from './entityClassifier';

const removeDirectoryTree = async (directory: DiskPath) => {
  try {
    await fs.rm(directory, { recursive: true });
  } catch (error: unknown) {
    throw toDiskError(error, { path: directory, stage: 'delete' });
  }
};

const removeFile = async (filePath: DiskPath) => {
  try {
    await fs.unlink(filePath);
  } catch (error: unknown) {
    throw toDiskError(error, { path: filePath, stage: 'delete' });
  }
};

/**
 * Deletes a directory tree in one call, or a single file after clearing its
 * read-only flag. A path with nothing behind it rejects with
 * `EntityNotFoundError`.
 */
export const deleteFileOrDirectory = async (targetPath: DiskPath): Promise<void> => {
  if (await isDeletableDirectory(targetPath)) {
    await removeDirectoryTree(targetPath);
    return;
  }

  if (await isReadOnly(targetPath)) {
    await setReadOnly(targetPath, false);
  }

  await removeFile(targetPath);
};

/** Deletes each path in order and stops at the first failure. */
export const deleteFileOrDirectories = async (paths: Iterable<DiskPath>): Promise<void> => {
  for (const eachPath of paths) {
    await deleteFileOrDirectory(eachPath);
  }
};
