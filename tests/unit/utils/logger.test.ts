/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
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
    logger.setPrefix('');
  });

  describe('log levels', () => {
    it('should log debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    });

    it('should not log debug when level is info', () => {
      const log = new Logger();

      log.debug('test message');

      expect(consoleSpy.error).not.toHaveBeenCalled();
    });

    it('should not log info when level is warn', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.info('test message');

      expect(consoleSpy.error).not.toHaveBeenCalled();
    });

    it('should log warn through console.warn', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.warn('test message');

      expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
    });

    it('should log nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.error('test message');
      log.warn('test message');

      expect(consoleSpy.error).not.toHaveBeenCalled();
      expect(consoleSpy.warn).not.toHaveBeenCalled();
    });

    it('should never write diagnostics to stdout', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('a');
      log.info('b');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });
  });

  describe('messages', () => {
    it('should include the level and prefix', () => {
      const log = new Logger();
      log.setPrefix('validate');

      log.info('loaded');

      expect(consoleSpy.error.mock.calls[0][0]).toContain('[INFO] [validate] loaded');
    });

    it('should print the stack of an Error', () => {
      const log = new Logger();
      const error = new Error('boom');

      log.error('failed', error);

      expect(consoleSpy.error).toHaveBeenCalledTimes(2);
      expect(consoleSpy.error.mock.calls[1][0]).toContain('boom');
    });

    it('should print attached data as JSON', () => {
      const log = new Logger();

      log.info('loaded', { labels: 3 });

      expect(consoleSpy.error.mock.calls[1][0]).toContain('"labels": 3');
    });
  });

  describe('child', () => {
    it('should inherit level and nest prefixes', () => {
      const parent = new Logger();
      parent.setLevel('debug');
      parent.setPrefix('cli');

      const child = parent.child('export');
      child.debug('hello');

      expect(child.getLevel()).toBe('debug');
      expect(consoleSpy.error.mock.calls[0][0]).toContain('[cli:export] hello');
    });
  });
});
