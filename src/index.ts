export { Disk, createDisk, type DiskOptions } from './main/disk';
export { resolveDiskConfig, type DiskConfig } from './main/config';
export { isReadOnly, setReadOnly } from './main/attributeStore';
export {
  classify,
  endsWithSeparator,
  isDeletableDirectory,
  isFile,
  isFolder,
} from './main/entityClassifier';
export { copyFolder } from './main/recursiveCopier';
export { deleteFileOrDirectories, deleteFileOrDirectory } from './main/recursiveDeleter';
export { listChildDirectories, listFilesRecursively } from './main/recursiveEnumerator';
export { readAllText, writeTextToFile } from './main/textFileIO';
export { readDirectoryListing } from './common/directoryListing';
export {
  AttributeAccessError,
  DiskError,
  DiskIOError,
  EntityNotFoundError,
  SourceNotFoundError,
  isDiskError,
} from './common/diskErrors';
export { createDiskLogger, type DiskLogger } from './utils/diskLogger';
export type * from './types/disk';
