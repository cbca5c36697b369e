import { DISK_LOG_LEVELS, scopedLogger, type DiskLogLevel } from './log';

export interface DiskConfig {
  /** Text encoding used by readAllText / writeTextToFile */
  encoding: BufferEncoding;
  /** Print per-operation traces through the disk logger */
  verbose: boolean;
  /** Console level for the scoped electron-log channel */
  logLevel: DiskLogLevel;
}

const logger = scopedLogger('disk-config');

export const DEFAULT_ENCODING: BufferEncoding = 'utf8';
export const DEFAULT_LOG_LEVEL: DiskLogLevel = 'warn';

export const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return false;
};

const isBufferEncoding = (value: string): value is BufferEncoding => Buffer.isEncoding(value);

const isLogLevel = (value: string): value is DiskLogLevel =>
  DISK_LOG_LEVELS.some((level) => level === value);

const resolveEncoding = (raw: string | undefined): BufferEncoding => {
  if (!raw) {
    return DEFAULT_ENCODING;
  }
  const candidate = raw.trim().toLowerCase();
  if (isBufferEncoding(candidate)) {
    return candidate;
  }
  logger.warn(`DISK_TEXT_ENCODING "${raw}" is not a known encoding; falling back to ${DEFAULT_ENCODING}.`);
  return DEFAULT_ENCODING;
};

const resolveLogLevel = (raw: string | undefined): DiskLogLevel => {
  if (!raw) {
    return DEFAULT_LOG_LEVEL;
  }
  const candidate = raw.trim().toLowerCase();
  if (isLogLevel(candidate)) {
    return candidate;
  }
  logger.warn(`DISK_LOG_LEVEL "${raw}" is not a known level; falling back to ${DEFAULT_LOG_LEVEL}.`);
  return DEFAULT_LOG_LEVEL;
};

export const resolveDiskConfig = (
  overrides?: Partial<DiskConfig>,
  env: NodeJS.ProcessEnv = process.env,
): DiskConfig => {
  const base: DiskConfig = {
    encoding: resolveEncoding(env.DISK_TEXT_ENCODING),
    verbose: coerceBoolean(env.DISK_LOG_VERBOSE),
    logLevel: resolveLogLevel(env.DISK_LOG_LEVEL),
  };
  return { ...base, ...overrides };
};
