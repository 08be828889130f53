/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('chalk', () => {
  const identity = (s: string) => s;
  return {
    default: { gray: identity, blue: identity, yellow: identity, red: identity, green: identity },
  };
});

import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const consoleSpy = {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    logger.setLevel('info');
  });

  describe('log levels', () => {
    it('should log debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] test message');
    });

    it('should not log debug when level is info', () => {
      const log = new Logger();

      log.debug('test message');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should send warnings to console.warn', () => {
      const log = new Logger();

      log.warn('careful');

      expect(consoleSpy.warn).toHaveBeenCalledWith('[WARN] careful');
    });

    it('should not log info when level is warn', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.info('test message');
      log.success('done');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should not log anything when level is silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.debug('debug');
      log.info('info');
      log.warn('warn');
      log.error('error');

      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(consoleSpy.warn).not.toHaveBeenCalled();
      expect(consoleSpy.error).not.toHaveBeenCalled();
    });
  });

  describe('output', () => {
    it('should print data as indented JSON', () => {
      const log = new Logger();

      log.info('with data', { a: 1 });

      expect(consoleSpy.log).toHaveBeenNthCalledWith(1, '[INFO] with data');
      expect(consoleSpy.log).toHaveBeenNthCalledWith(2, '{\n  "a": 1\n}');
    });

    it('should mark success and failure', () => {
      const log = new Logger();

      log.success('created');
      log.fail('skipped');

      expect(consoleSpy.log).toHaveBeenNthCalledWith(1, '✓ created');
      expect(consoleSpy.log).toHaveBeenNthCalledWith(2, '✗ skipped');
    });

    it('should print stack traces only at debug level', () => {
      const log = new Logger();
      const error = new Error('boom');

      log.error('failed', error);
      expect(consoleSpy.error).toHaveBeenCalledTimes(1);

      log.setLevel('debug');
      log.error('failed', error);
      expect(consoleSpy.error).toHaveBeenCalledTimes(3);
      expect(consoleSpy.error).toHaveBeenLastCalledWith(error.stack);
    });
  });

  describe('prefix', () => {
    it('should include the child prefix in formatted messages', () => {
      const log = new Logger().child('generate');

      log.info('test message');

      expect(consoleSpy.log).toHaveBeenCalledWith('[INFO] [generate] test message');
    });

    it('should chain prefixes and copy the level into children', () => {
      const parent = new Logger();
      parent.setLevel('debug');
      const child = parent.child('cli').child('init');

      expect(child.getLevel()).toBe('debug');
      child.debug('step');

      expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] [cli:init] step');
    });
  });
});
