import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  DocsError,
  FileSystemError,
  NotFoundError,
  ErrorCollector,
  AggregateDocsError,
  isDocsError,
  toError,
  getErrorMessage,
  logError,
} from './errors.js';
import logger from './logger.js';

// Mock the logger module
vi.mock('./logger.js', () => ({
  default: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('Error Utilities', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('DocsError', () => {
    it('should default the code', () => {
      const error = new DocsError('Test error message');

      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('Test error message');
      expect(error.code).toBe('DOCS_ERROR');
      expect(error.name).toBe('DocsError');
    });

    it('should give subclasses their own code and name', () => {
      const error = new NotFoundError('missing.md not found', { context: { path: 'missing.md' } });

      expect(error.code).toBe('NOT_FOUND');
      expect(error.name).toBe('NotFoundError');
      expect(error.context).toEqual({ path: 'missing.md' });
      expect(isDocsError(error)).toBe(true);
    });

    it('should keep the cause', () => {
      const cause = new Error('EACCES');
      const error = new FileSystemError('Cannot write', { cause });

      expect(error.cause).toBe(cause);
    });

    it('should serialize to JSON without the stack', () => {
      const error = new FileSystemError('Cannot write', { context: { path: 'a.md' } });

      expect(error.toJSON()).toEqual({
        name: 'FileSystemError',
        message: 'Cannot write',
        code: 'FS_ERROR',
        context: { path: 'a.md' },
      });
    });
  });

  describe('toError', () => {
    it('should return Error instance as-is', () => {
      const original = new Error('Original error');
      expect(toError(original)).toBe(original);
    });

    it('should convert string to Error', () => {
      const result = toError('String error');
      expect(result).toBeInstanceOf(Error);
      expect(result.message).toBe('String error');
    });

    it('should use the message property of plain objects', () => {
      expect(toError({ message: 'Object error' }).message).toBe('Object error');
      expect(toError({ error: 'Nested error' }).message).toBe('Nested error');
    });

    it('should stringify objects without a message', () => {
      expect(toError({ status: 500 }).message).toBe('{"status":500}');
    });

    it('should convert null and numbers', () => {
      expect(toError(null).message).toBe('null');
      expect(toError(42).message).toBe('42');
    });
  });

  describe('getErrorMessage', () => {
    it('should extract message from Error instance', () => {
      expect(getErrorMessage(new Error('Test message'))).toBe('Test message');
    });

    it('should return string as-is', () => {
      expect(getErrorMessage('Direct string')).toBe('Direct string');
    });

    it('should handle undefined', () => {
      expect(getErrorMessage(undefined)).toBe('undefined');
    });
  });

  describe('logError', () => {
    it('should log error with context', () => {
      const error = new Error('Test error');

      logError(error, 'lint');

      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ context: 'lint', stack: error.stack }),
        'Test error'
      );
    });

    it('should include code and context of docs errors', () => {
      const error = new NotFoundError('gone', { context: { path: 'x.md' } });

      logError(error);

      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ code: 'NOT_FOUND', docsContext: { path: 'x.md' } }),
        'gone'
      );
    });
  });

  describe('ErrorCollector', () => {
    it('should not throw when empty', () => {
      const collector = new ErrorCollector();
      expect(collector.hasErrors()).toBe(false);
      expect(() => collector.throwIfAny()).not.toThrow();
    });

    it('should aggregate collected errors', () => {
      const collector = new ErrorCollector();
      collector.add(new Error('first'));
      collector.add('second');

      expect(collector.hasErrors()).toBe(true);
      expect(() => collector.throwIfAny()).toThrow(AggregateDocsError);
      expect(() => collector.throwIfAny()).toThrow('Multiple errors occurred: first; second');
    });
  });
});
