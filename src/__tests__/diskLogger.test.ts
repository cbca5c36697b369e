import { EntityNotFoundError } from '../common/diskErrors';
import { createDiskLogger } from '../utils/diskLogger';

const collect = (spy: jest.SpyInstance) =>
  spy.mock.calls.map((call: unknown[]) => call.join(' ')).join('\n');

describe('diskLogger', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    jest.restoreAllMocks();
    process.env = { ...originalEnv };
  });

  it('stays quiet when verbose tracing is off', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createDiskLogger({ verbose: false });

    logger.logOperationStart({ operation: 'copyFolder', paths: ['/src', '/dst'] });
    logger.logOperationComplete({ operation: 'copyFolder', paths: ['/src', '/dst'], durationMs: 3 });

    expect(logger.verbose).toBe(false);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('prints operation traces when verbose', () => {
    process.env.NODE_ENV = 'test';
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createDiskLogger({ verbose: true });

    logger.logOperationStart({ operation: 'listFilesRecursively', paths: ['/data'] });
    logger.logOperationComplete({
      operation: 'listFilesRecursively',
      paths: ['/data'],
      durationMs: 12.34,
      result: ['/data/a.txt'],
    });

    const output = collect(logSpy);
    expect(output).toContain('listFilesRecursively');
    expect(output).toContain('/data');
    expect(output).toContain('12.3 ms');
    expect(output).toContain('Result:');
  });

  it('never traces in production builds', () => {
    process.env.NODE_ENV = 'production';
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createDiskLogger({ verbose: true });

    logger.logOperationStart({ operation: 'classify', paths: ['/x'] });

    expect(logger.verbose).toBe(false);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('reports disk errors with code, stage and path even when not verbose', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createDiskLogger();
    const cause = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });
    const error = new EntityNotFoundError({ path: '/tmp/gone.txt', stage: 'delete', cause });

    logger.logDiskError(error, { operation: 'deleteFileOrDirectory', durationMs: 1 });

    const output = collect(errorSpy);
    expect(output).toContain('deleteFileOrDirectory');
    expect(output).toContain('Code: ENTITY_NOT_FOUND');
    expect(output).toContain('Stage: delete');
    expect(output).toContain('Path: /tmp/gone.txt');
    expect(output).toContain('System error: ENOENT');
    expect(output).toContain("Nothing exists at '/tmp/gone.txt' (delete).");
  });

  it('keeps errors off the console in production builds', () => {
    process.env.NODE_ENV = 'production';
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createDiskLogger();

    logger.logDiskError(new EntityNotFoundError({ path: '/tmp/gone.txt', stage: 'read' }), {
      operation: 'readAllText',
    });

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('reports plain errors with the paths involved', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createDiskLogger();

    logger.logDiskError('boom', { operation: 'copyFolder', paths: ['/a', '/b'] });

    const output = collect(errorSpy);
    expect(output).toContain('Paths: /a → /b');
    expect(output).toContain('boom');
  });
});
