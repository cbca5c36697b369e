import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import { endsWithSeparator } from '../common/directoryListing';
import type { DiskPath, EntityKind } from '../types/disk';

/**
 * `stat` that answers `null` for anything it cannot see, the same way an
 * existence check does. Classification is never an error.
 */
export const statOrNull = async (targetPath: DiskPath): Promise<Stats | null> => {
  try {
    return await fs.stat(targetPath);
  } catch {
    return null;
  }
};

export { endsWithSeparator };

export const isHiddenName = (targetPath: DiskPath) => {
  const name = path.basename(targetPath);
  return name.startsWith('.') && name !== '.' && name !== '..';
};

export const classify = async (targetPath: DiskPath): Promise<EntityKind> => {
  const stats = await statOrNull(targetPath);
  return stats?.isFile() ? 'file' : 'folder';
};

export const isFolder = async (targetPath: DiskPath) => (await classify(targetPath)) === 'folder';

export const isFile = async (targetPath: DiskPath) => (await classify(targetPath)) === 'file';

/**
 * Routing test for deletion. A trailing separator always means "directory";
 * otherwise the path must be an existing, non-hidden directory. Hidden
 * directories fall through to the file branch of the deleter.
 */
export const isDeletableDirectory = async (targetPath: DiskPath): Promise<boolean> => {
  if (endsWithSeparator(targetPath)) {
    return true;
  }
  const stats = await statOrNull(targetPath);
  if (!stats) {
    return false;
  }
  return stats.isDirectory() && !isHiddenName(targetPath);
};
