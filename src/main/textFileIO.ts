import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { isDiskError, toDiskError } from '../common/diskErrors';
import type { DiskPath } from '../types/disk';
import { setReadOnly } from './attributeStore';
import { DEFAULT_ENCODING } from './config';

const openFile = async (
  filePath: DiskPath,
  flags: 'r' | 'w',
  stage: 'read' | 'write',
): Promise<FileHandle> => {
  try {
    return await fs.open(filePath, flags);
  } catch (error: unknown) {
    throw toDiskError(error, { path: filePath, stage });
  }
};

export const readAllText = async (
  filePath: DiskPath,
  encoding: BufferEncoding = DEFAULT_ENCODING,
): Promise<string> => {
  const handle = await openFile(filePath, 'r', 'read');
  try {
    return await handle.readFile({ encoding });
  } catch (error: unknown) {
    throw toDiskError(error, { path: filePath, stage: 'read' });
  } finally {
    await handle.close();
  }
};

const clearReadOnlyIfPresent = async (filePath: DiskPath) => {
  try {
    await setReadOnly(filePath, false);
  } catch (error: unknown) {
    // A file that does not exist yet has no flag to clear; the open below creates it.
    if (isDiskError(error) && error.code === 'ENTITY_NOT_FOUND') {
      return;
    }
    throw error;
  }
};

/**
 * Clears the read-only flag, then truncates and rewrites the file in place.
 * There is no temp-file swap, so an interrupted write leaves a partial file.
 */
export const writeTextToFile = async (
  filePath: DiskPath,
  contents: string,
  encoding: BufferEncoding = DEFAULT_ENCODING,
): Promise<void> => {
  await clearReadOnlyIfPresent(filePath);
  const handle = await openFile(filePath, 'w', 'write');
  try {
    await handle.writeFile(contents, { encoding });
  } catch (error: unknown) {
    throw toDiskError(error, { path: filePath, stage: 'write' });
  } finally {
    await handle.close();
  }
};
