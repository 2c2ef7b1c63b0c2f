import { afterEach, describe, expect, test, vi } from 'vitest';

import { Logger, createConsoleLogger } from './index';

describe('Logger', () => {
  const createMethods = () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('forwards every method to the wrapped implementation', () => {
    const methods = createMethods();
    const logger = new Logger(methods);

    logger.debug('d', 1);
    logger.info('i');
    logger.warn('w');
    logger.error('e', { code: 2 });

    expect(methods.debug).toHaveBeenCalledWith('d', 1);
    expect(methods.info).toHaveBeenCalledWith('i');
    expect(methods.warn).toHaveBeenCalledWith('w');
    expect(methods.error).toHaveBeenCalledWith('e', { code: 2 });
  });

  describe('withLevel', () => {
    test('drops calls below the threshold', () => {
      const methods = createMethods();
      const logger = new Logger(methods).withLevel('warn');

      logger.debug('hidden');
      logger.info('hidden');
      logger.warn('shown');
      logger.error('shown');

      expect(methods.debug).not.toHaveBeenCalled();
      expect(methods.info).not.toHaveBeenCalled();
      expect(methods.warn).toHaveBeenCalledWith('shown');
      expect(methods.error).toHaveBeenCalledWith('shown');
    });

    test('silent drops everything', () => {
      const methods = createMethods();
      const logger = new Logger(methods).withLevel('silent');

      logger.error('hidden');

      expect(methods.error).not.toHaveBeenCalled();
    });
  });

  describe('createConsoleLogger', () => {
    test('writes info to stderr and hides debug by default', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const logger = createConsoleLogger();

      logger.info('[Test] hello');
      logger.debug('[Test] details');

      expect(errorSpy.mock.calls).toEqual([['[Test] hello']]);
    });

    test('writes debug to stderr at debug level, never to stdout', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const logger = createConsoleLogger('debug');

      logger.debug('[Test] details');

      expect(errorSpy).toHaveBeenCalledWith('[Test] details');
      expect(debugSpy).not.toHaveBeenCalled();
      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});
