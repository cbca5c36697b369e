import util from 'util';
import { bold, cyan, dim, green, red, yellow } from 'colorette';
import { errorCodeOf, isDiskError } from '../common/diskErrors';
import type { DiskPath } from '../types/disk';

const MAX_ARGUMENT_LENGTH = 160;

export type DiskOperationName =
  | 'classify'
  | 'isReadOnly'
  | 'setReadOnly'
  | 'copyFolder'
  | 'deleteFileOrDirectory'
  | 'deleteFileOrDirectories'
  | 'listFilesRecursively'
  | 'listChildDirectories'
  | 'readAllText'
  | 'writeTextToFile';

export interface OperationStartInfo {
  operation: DiskOperationName;
  paths: DiskPath[];
}

export interface OperationCompleteInfo extends OperationStartInfo {
  durationMs: number;
  result?: unknown;
}

export interface DiskErrorLogInfo {
  operation?: DiskOperationName;
  paths?: DiskPath[];
  durationMs?: number;
}

export interface DiskLoggerOptions {
  verbose?: boolean;
}

const isProductionBuild = () => process.env.NODE_ENV === 'production';

const timestamp = () => dim(new Date().toISOString());

const prefix = () => cyan('[disk]');

const indentBlock = (value: string, indent = '   ') =>
  value.split('\n').map((line) => `${indent}${line}`).join('\n');

const formatDuration = (durationMs: number) => `${durationMs.toFixed(1)} ms`;

const truncateText = (text: string) => {
  if (text.length <= MAX_ARGUMENT_LENGTH) return text;
  return `${text.slice(0, MAX_ARGUMENT_LENGTH - 1)}…`;
};

const formatValue = (value: unknown) =>
  util.inspect(value, {
    colors: true,
    depth: 3,
    breakLength: 80,
    maxArrayLength: 10,
    maxStringLength: MAX_ARGUMENT_LENGTH,
  });

const emit = (header: string, details: string[] = []) => {
  console.log(`${timestamp()} ${header}`);
  details.forEach((detail) => console.log(indentBlock(detail)));
};

const emitError = (header: string, details: string[] = []) => {
  console.error(`${timestamp()} ${header}`);
  details.forEach((detail) => console.error(indentBlock(detail)));
};

const describePaths = (paths: DiskPath[]) => paths.map((entry) => truncateText(entry)).join(' → ');

export const createDiskLogger = (options: DiskLoggerOptions = {}) => {
  const verbose = (options.verbose ?? false) && !isProductionBuild();

  const logOperationStart = (info: OperationStartInfo) => {
    if (!verbose) return;
    const header = `${prefix()} ${yellow('start')} ${bold(info.operation)} ${describePaths(info.paths)}`;
    emit(header);
  };

  const logOperationComplete = (info: OperationCompleteInfo) => {
    if (!verbose) return;
    const header = `${prefix()} ${green('done')} ${bold(info.operation)} ${dim(`in ${formatDuration(info.durationMs)}`)}`;
    const details: string[] = [];
    if (info.result !== undefined) {
      details.push(`Result: ${formatValue(info.result)}`);
    }
    emit(header, details);
  };

  const logDiskError = (error: unknown, info: DiskErrorLogInfo = {}) => {
    if (isProductionBuild()) return;
    const err = error instanceof Error ? error : new Error(String(error));
    const header = `${prefix()} ${red('operation failed')} ${info.operation ? bold(info.operation) : ''}`.trim();
    const details: string[] = [];
    if (isDiskError(err)) {
      details.push(`Code: ${err.code}`);
      details.push(`Stage: ${err.stage}`);
      details.push(`Path: ${err.path}`);
      const causeCode = errorCodeOf(err.cause);
      if (causeCode) {
        details.push(`System error: ${causeCode}`);
      }
    } else if (info.paths?.length) {
      details.push(`Paths: ${describePaths(info.paths)}`);
    }
    if (info.durationMs !== undefined) {
      details.push(`Duration: ${formatDuration(info.durationMs)}`);
    }
    details.push(err.stack ?? err.message);
    emitError(header, details);
  };

  return {
    verbose,
    logOperationStart,
    logOperationComplete,
    logDiskError,
  };
};

export type DiskLogger = ReturnType<typeof createDiskLogger>;
