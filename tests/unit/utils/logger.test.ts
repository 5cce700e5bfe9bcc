/**
 * @arch propweave.test.unit
 * @intent:cli-output
 */
/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger, isLogLevel } from '../../../src/utils/logger.js';

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
    // Reset singleton state
    logger.setLevel('info');
    logger.setPrefix('');
  });

  describe('log levels', () => {
    it('should log debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(consoleSpy.log).toHaveBeenCalled();
    });

    it('should not log debug when level is info', () => {
      const log = new Logger();
      log.setLevel('info');

      log.debug('test message');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should not log info when level is warn', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.info('test message');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should log warn to stderr', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.warn('test message');

      expect(consoleSpy.warn).toHaveBeenCalledWith(expect.stringContaining('[WARN] test message'));
    });

    it('should log error when level is error', () => {
      const log = new Logger();
      log.setLevel('error');

      log.error('test message');

      expect(consoleSpy.error).toHaveBeenCalledWith(expect.stringContaining('[ERROR] test message'));
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

  describe('isEnabled', () => {
    it('should compare against the current level', () => {
      const log = new Logger();
      log.setLevel('warn');

      expect(log.isEnabled('info')).toBe(false);
      expect(log.isEnabled('warn')).toBe(true);
      expect(log.isEnabled('error')).toBe(true);
    });

    it('should never enable silent', () => {
      const log = new Logger();
      log.setLevel('debug');

      expect(log.isEnabled('silent')).toBe(false);
    });
  });

  describe('prefix', () => {
    it('should include prefix in formatted message', () => {
      const log = new Logger();
      log.setPrefix('TestPrefix');

      log.info('test message');

      expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('[TestPrefix] test message'));
    });
  });

  describe('data', () => {
    it('should log data object after the message', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test', { key: 'value' });

      expect(consoleSpy.log).toHaveBeenCalledTimes(2);
    });

    it('should log Error object with stack', () => {
      const log = new Logger();

      log.error('test', new Error('test error'));

      expect(consoleSpy.error).toHaveBeenCalledTimes(2);
    });
  });

  describe('child', () => {
    it('should nest prefixes', () => {
      const log = new Logger();
      log.setPrefix('Parent');

      log.child('Child').info('test');

      expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('[Parent:Child] test'));
    });

    it('should follow the root level set after it was created', () => {
      const log = new Logger();
      const child = log.child('Child');
      const grandchild = child.child('Nested');

      log.setLevel('error');
      child.info('test');
      grandchild.warn('test');

      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(consoleSpy.warn).not.toHaveBeenCalled();
      expect(grandchild.getLevel()).toBe('error');
    });
  });

  describe('isLogLevel', () => {
    it('should accept known levels only', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('silent')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel('toString')).toBe(false);
    });
  });

  describe('singleton', () => {
    it('should export singleton logger instance', () => {
      expect(logger).toBeInstanceOf(Logger);
      expect(logger.getLevel()).toBe('info');
    });
  });
});
