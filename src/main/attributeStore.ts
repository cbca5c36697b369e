import fs from 'fs/promises';
import {
  AttributeAccessError,
  EntityNotFoundError,
  errorCodeOf,
} from '../common/diskErrors';
import type { DiskPath } from '../types/disk';
import { scopedLogger } from './log';

const OWNER_WRITE = 0o200;
const ALL_WRITE = 0o222;
const PERMISSION_BITS = 0o7777;

const logger = scopedLogger('attribute-store');

const toAttributeError = (error: unknown, path: DiskPath) => {
  if (errorCodeOf(error) === 'ENOENT') {
    return new EntityNotFoundError({ path, stage: 'attributes', cause: error });
  }
  return new AttributeAccessError({ path, stage: 'attributes', cause: error });
};

const readMode = async (path: DiskPath): Promise<number> => {
  try {
    const stats = await fs.stat(path);
    return stats.mode & PERMISSION_BITS;
  } catch (error: unknown) {
    throw toAttributeError(error, path);
  }
};

export const isReadOnlyMode = (mode: number) => (mode & OWNER_WRITE) === 0;

/**
 * Returns the permission bits with only the write bits changed, leaving the
 * read, execute and special bits as they were.
 */
export const withReadOnly = (mode: number, isReadOnly: boolean) =>
  isReadOnly ? mode & ~ALL_WRITE : mode | OWNER_WRITE;

export const isReadOnly = async (path: DiskPath): Promise<boolean> =>
  isReadOnlyMode(await readMode(path));

export const setReadOnly = async (path: DiskPath, readOnly: boolean): Promise<void> => {
  const mode = await readMode(path);
  if (isReadOnlyMode(mode) === readOnly) {
    return;
  }
  const nextMode = withReadOnly(mode, readOnly);
  try {
    await fs.chmod(path, nextMode);
  } catch (error: unknown) {
    throw toAttributeError(error, path);
  }
  logger.debug(
    `${readOnly ? 'Set' : 'Cleared'} read-only flag on ${path} (${mode.toString(8)} → ${nextMode.toString(8)})`,
  );
};
