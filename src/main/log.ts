import log from 'electron-log/node';

export type DiskLogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export const DISK_LOG_LEVELS: readonly DiskLogLevel[] = [
  'error',
  'warn',
  'info',
  'verbose',
  'debug',
  'silly',
];

// Library code never writes a log file on its own.
log.transports.file.level = false;
log.transports.console.level = 'warn';

export const scopedLogger = (scope: string) => log.scope(scope);

export const applyLogLevel = (level: DiskLogLevel) => {
  log.transports.console.level = level;
};

export default log;
