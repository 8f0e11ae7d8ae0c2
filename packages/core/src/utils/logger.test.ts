import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, getLogLevel } from './logger.js';

describe('getLogLevel', () => {
  const original = process.env.LOG_LEVEL;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = original;
    }
  });

  it('should default to INFO', () => {
    delete process.env.LOG_LEVEL;
    expect(getLogLevel()).toBe('INFO');
  });

  it('should accept lowercase values', () => {
    process.env.LOG_LEVEL = 'debug';
    expect(getLogLevel()).toBe('DEBUG');
  });

  it('should ignore unknown values', () => {
    process.env.LOG_LEVEL = 'VERBOSE';
    expect(getLogLevel()).toBe('INFO');
  });
});

describe('createLogger', () => {
  const original = process.env.LOG_LEVEL;

  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (original === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = original;
    }
  });

  it('should prefix messages with the scope', () => {
    process.env.LOG_LEVEL = 'INFO';
    createLogger('draft-contexts').info('created draft 1');
    expect(console.log).toHaveBeenCalledWith('[draft-contexts]', 'created draft 1');
  });

  it('should pass extra arguments through', () => {
    process.env.LOG_LEVEL = 'INFO';
    const cause = new Error('disk full');
    createLogger('write-router').error('write failed', cause);
    expect(console.error).toHaveBeenCalledWith('[write-router]', 'write failed', cause);
  });

  it('should drop messages below the minimum level', () => {
    process.env.LOG_LEVEL = 'WARNING';
    const logger = createLogger('overlay');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    expect(console.debug).not.toHaveBeenCalled();
    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith('[overlay]', 'shown');
  });

  it('should nest child scopes', () => {
    process.env.LOG_LEVEL = 'DEBUG';
    const child = createLogger('write-router').child('embedded');
    expect(child.scope).toBe('write-router:embedded');
    child.debug('linked');
    expect(console.debug).toHaveBeenCalledWith('[write-router:embedded]', 'linked');
  });
});
