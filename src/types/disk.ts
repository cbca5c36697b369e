export type DiskPath = string;

export type EntityKind = 'file' | 'folder';

export type DiskStage =
  | 'classify'
  | 'attributes'
  | 'copy'
  | 'delete'
  | 'list'
  | 'read'
  | 'write';

export type DiskErrorCode =
  | 'SOURCE_NOT_FOUND'
  | 'ENTITY_NOT_FOUND'
  | 'ATTRIBUTE_ACCESS'
  | 'IO_ERROR';

export interface DirectoryListing {
  /** Direct files, sorted by name */
  files: DiskPath[];
  /** Direct subdirectories, sorted by name */
  directories: DiskPath[];
}

export interface DiskFacade {
  classify(path: DiskPath): Promise<EntityKind>;
  isFolder(path: DiskPath): Promise<boolean>;
  isFile(path: DiskPath): Promise<boolean>;
  isReadOnly(path: DiskPath): Promise<boolean>;
  setReadOnly(path: DiskPath, isReadOnly: boolean): Promise<void>;
  copyFolder(source: DiskPath, destination: DiskPath): Promise<void>;
  deleteFileOrDirectory(path: DiskPath): Promise<void>;
  deleteFileOrDirectories(paths: Iterable<DiskPath>): Promise<void>;
  listFilesRecursively(directory: DiskPath): Promise<DiskPath[]>;
  listChildDirectories(directory: DiskPath): Promise<DiskPath[]>;
  readAllText(path: DiskPath): Promise<string>;
  writeTextToFile(path: DiskPath, contents: string): Promise<void>;
}
