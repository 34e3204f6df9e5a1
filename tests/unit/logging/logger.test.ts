/**
 * @fileoverview Unit tests for the console loggers
 */

import { Container, consoleLogger, createConsoleLogger } from '../../../src';

describe('Console logger', () => {
  let debug: jest.SpyInstance;
  let info: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should drop debug messages by default', () => {
    consoleLogger.debug('hidden');
    consoleLogger.info('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith('[INFO] shown');
  });

  it('should keep binding writes out of the default container output', () => {
    new Container().set('Clock', () => 0).set('Time', 'Clock');

    expect(debug).not.toHaveBeenCalled();
  });

  it('should print debug messages at debug level', () => {
    const container = new Container({ name: 'app', logger: createConsoleLogger('debug') });

    container.set('Clock', () => 0);

    expect(debug).toHaveBeenCalledWith("[DEBUG] [app] Bound 'Clock' to factory");
  });

  it('should drop messages below the requested level', () => {
    const logger = createConsoleLogger('warn');

    logger.info('hidden');
    logger.warn('careful', { id: 'Clock' });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] careful', { id: 'Clock' });
  });
});
