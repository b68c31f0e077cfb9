/**
 * Logger Tests
 * ============
 * Tests for the centralized logging system
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger, Logger, LogLevel, winstonLogger, createLogger } from '../../src/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Log Levels', () => {
    it('should have all required log levels', () => {
      expect(LogLevel.ERROR).toBe('error');
      expect(LogLevel.WARN).toBe('warn');
      expect(LogLevel.INFO).toBe('info');
      expect(LogLevel.DEBUG).toBe('debug');
      expect(LogLevel.TRACE).toBe('trace');
    });
  });

  describe('Transports', () => {
    it('should keep a muted console transport when LOG_CONSOLE is false', () => {
      expect(process.env.LOG_CONSOLE).toBe('false');
      expect(winstonLogger.transports).toHaveLength(1);
      expect(winstonLogger.transports[0].silent).toBe(true);
    });
  });

  describe('Logger Instance', () => {
    it('should use the default namespace', () => {
      expect(logger.getNamespace()).toBe('ontocache');
    });

    it('should log info messages with the namespace', () => {
      const spy = vi.spyOn(winstonLogger, 'info').mockImplementation(() => winstonLogger);
      createLogger('@ontocache/storage').info('Registered', { ontologyId: 'uo' });

      expect(spy).toHaveBeenCalledWith('Registered', {
        namespace: '@ontocache/storage',
        ontologyId: 'uo',
      });
    });

    it('should flatten Error objects', () => {
      const spy = vi.spyOn(winstonLogger, 'error').mockImplementation(() => winstonLogger);
      const error = new Error('Test error');
      logger.error('Error occurred', error, { path: '/tmp/a' });

      expect(spy).toHaveBeenCalledWith('Error occurred', {
        namespace: 'ontocache',
        path: '/tmp/a',
        error: { message: 'Test error', stack: error.stack, name: 'Error' },
      });
    });

    it('should pass non-Error details through', () => {
      const spy = vi.spyOn(winstonLogger, 'error').mockImplementation(() => winstonLogger);
      logger.error('Failure', 'raw detail');

      expect(spy).toHaveBeenCalledWith('Failure', { namespace: 'ontocache', error: 'raw detail' });
    });

    it('should route trace to debug', () => {
      const spy = vi.spyOn(winstonLogger, 'debug').mockImplementation(() => winstonLogger);
      logger.trace('Very verbose');

      expect(spy).toHaveBeenCalledWith('Very verbose', { namespace: 'ontocache', level: 'trace' });
    });
  });

  describe('Logger Context', () => {
    it('should set and clear context', () => {
      const scoped = new Logger('scoped');
      scoped.setContext({ ontologyId: 'hp' });
      scoped.setContext({ version: '2024-01-01' });

      expect(scoped.getContext()).toEqual({ ontologyId: 'hp', version: '2024-01-01' });

      scoped.clearContext();
      expect(scoped.getContext()).toEqual({});
    });

    it('should create child loggers that inherit context', () => {
      const spy = vi.spyOn(winstonLogger, 'warn').mockImplementation(() => winstonLogger);
      const parent = new Logger('parent');
      parent.setContext({ ontologyId: 'go' });
      const child = parent.child({ fileType: 'owl' });

      child.warn('Child message');

      expect(child.getNamespace()).toBe('parent');
      expect(spy).toHaveBeenCalledWith('Child message', {
        namespace: 'parent',
        ontologyId: 'go',
        fileType: 'owl',
      });
    });
  });
});
