import type { DiskErrorCode, DiskPath, DiskStage } from '../types/disk';

export interface DiskErrorContext {
  path: DiskPath;
  stage: DiskStage;
  cause?: unknown;
}

const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
};

export class DiskError extends Error {
  readonly code: DiskErrorCode;

  readonly path: DiskPath;

  readonly stage: DiskStage;

  constructor(code: DiskErrorCode, message: string, context: DiskErrorContext) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.code = code;
    this.path = context.path;
    this.stage = context.stage;
  }
}

export class SourceNotFoundError extends DiskError {
  constructor(context: DiskErrorContext) {
    super(
      'SOURCE_NOT_FOUND',
      `Cannot copy folder as the source folder '${context.path}' does not exist.`,
      context,
    );
  }
}

export class EntityNotFoundError extends DiskError {
  constructor(context: DiskErrorContext) {
    super('ENTITY_NOT_FOUND', `Nothing exists at '${context.path}' (${context.stage}).`, context);
  }
}

export class AttributeAccessError extends DiskError {
  constructor(context: DiskErrorContext) {
    super(
      'ATTRIBUTE_ACCESS',
      `Cannot access the read-only attribute of '${context.path}': ${describeCause(context.cause)}`,
      context,
    );
  }
}

export class DiskIOError extends DiskError {
  constructor(context: DiskErrorContext) {
    super(
      'IO_ERROR',
      `I/O failure during ${context.stage} of '${context.path}': ${describeCause(context.cause)}`,
      context,
    );
  }
}

/** Reads the Node system error code (`ENOENT`, `EACCES`, ...) off an unknown error. */
export const errorCodeOf = (error: unknown): string | undefined => {
  if (error && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
};

export const isDiskError = (error: unknown): error is DiskError => error instanceof DiskError;

export const toDiskError = (
  error: unknown,
  context: Omit<DiskErrorContext, 'cause'>,
): DiskError => {
  if (isDiskError(error)) {
    return error;
  }
  if (errorCodeOf(error) === 'ENOENT') {
    return new EntityNotFoundError({ ...context, cause: error });
  }
  return new DiskIOError({ ...context, cause: error });
};
