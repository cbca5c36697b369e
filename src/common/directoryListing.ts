import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { toDiskError } from './diskErrors';
import type { DirectoryListing, DiskPath } from '../types/disk';

type ListedKind = 'file' | 'directory' | null;

export const endsWithSeparator = (targetPath: DiskPath) =>
  targetPath.endsWith('/') || targetPath.endsWith(path.sep);

/**
 * Appends a child name to `directory` as written by the caller. No `./` or
 * `..` segment is collapsed.
 */
export const joinChild = (directory: DiskPath, name: string): DiskPath =>
  endsWithSeparator(directory) ? `${directory}${name}` : `${directory}${path.sep}${name}`;

const sortEntries = (entries: Dirent[]): Dirent[] =>
  [...entries].sort((a, b) => a.name.localeCompare(b.name));

const resolveLinkKind = async (entryPath: string): Promise<ListedKind> => {
  try {
    const stats = await fs.stat(entryPath);
    if (stats.isDirectory()) return 'directory';
    if (stats.isFile()) return 'file';
    return null;
  } catch {
    // Dangling link: neither a file nor a directory.
    return null;
  }
};

const kindOf = async (entry: Dirent, entryPath: string): Promise<ListedKind> => {
  if (entry.isSymbolicLink()) {
    return resolveLinkKind(entryPath);
  }
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  return null;
};

/**
 * Reads one level of `directory`. Entries come back sorted by name so every
 * recursive walk visits a level in the same order on every platform.
 */
export const readDirectoryListing = async (directory: DiskPath): Promise<DirectoryListing> => {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(directory, { withFileTypes: true });
  } catch (error: unknown) {
    throw toDiskError(error, { path: directory, stage: 'list' });
  }

  const listing: DirectoryListing = { files: [], directories: [] };
  for (const entry of sortEntries(entries)) {
    const entryPath = joinChild(directory, entry.name);
    const kind = await kindOf(entry, entryPath);
    if (kind === 'file') {
      listing.files.push(entryPath);
    } else if (kind === 'directory') {
      listing.directories.push(entryPath);
    }
  }
  return listing;
};
