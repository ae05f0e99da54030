import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ExtendedError } from './errors';
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from './logger';

describe('logger', () => {
  const initialLevel = getLogLevel();

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('should only accept known level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('should drop messages below the minimum level', () => {
    setLogLevel('warn');
    const logger = createLogger('sync');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(console.debug).not.toHaveBeenCalled();
    expect(console.error).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('[sync] '));
  });

  it('should send info to stderr when enabled', () => {
    setLogLevel('info');

    createLogger('sync').info('Starting upload');

    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Starting upload'));
  });

  it('should merge error details into the logged context', () => {
    setLogLevel('error');

    createLogger('sync').error(
      'Upload failed',
      new ExtendedError({ message: 'boom', details: { statusCode: 500 } }),
      { file: 'a.txt' }
    );

    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('{\n  "file": "a.txt",\n  "statusCode": 500\n}')
    );
  });
});
