import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import { toAbs, toRel, dirOf, joinRel, relativeRef, ancestorsOf } from './path-utils.js';

describe('Path Utilities', () => {
  const root = '/home/user/docs';

  describe('toAbs', () => {
    it('should convert relative path to absolute path', () => {
      expect(toAbs(root, 'guides/rag.md')).toBe(path.join(root, 'guides', 'rag.md'));
    });

    it('should handle empty string', () => {
      expect(toAbs(root, '')).toBe(root);
    });

    it('should return absolute paths unchanged', () => {
      expect(toAbs(root, '/etc/hosts')).toBe('/etc/hosts');
    });
  });

  describe('toRel', () => {
    it('should convert absolute path to relative path', () => {
      expect(toRel(root, '/home/user/docs/guides/rag.md')).toBe('guides/rag.md');
    });

    it('should handle paths outside the root', () => {
      expect(toRel(root, '/home/user/other/file.md')).toBe('../other/file.md');
    });

    it('should return relative paths unchanged', () => {
      expect(toRel(root, 'guides/rag.md')).toBe('guides/rag.md');
    });
  });

  describe('dirOf', () => {
    it('should return the directory of nested ids', () => {
      expect(dirOf('ai/prompts/index.md')).toBe('ai/prompts');
    });

    it('should return empty string for root files', () => {
      expect(dirOf('index.md')).toBe('');
    });
  });

  describe('joinRel', () => {
    it('should resolve sibling references', () => {
      expect(joinRel('ai/prompts', 'templates.md')).toBe('ai/prompts/templates.md');
    });

    it('should resolve parent references', () => {
      expect(joinRel('ai/prompts', '../vector-db/index.md')).toBe('ai/vector-db/index.md');
    });

    it('should drop trailing slashes and leading dots', () => {
      expect(joinRel('', './n8n/')).toBe('n8n');
    });

    it('should return empty string for the root itself', () => {
      expect(joinRel('ai', '..')).toBe('');
    });

    it('should keep references that climb out of the root', () => {
      expect(joinRel('ai', '../../outside.md')).toBe('../outside.md');
    });
  });

  describe('relativeRef', () => {
    it('should build references between directories', () => {
      expect(relativeRef('ai/prompts', 'ai/vector-db/index.md')).toBe('../vector-db/index.md');
      expect(relativeRef('', 'ai/index.md')).toBe('ai/index.md');
    });
  });

  describe('ancestorsOf', () => {
    it('should list ancestors nearest first', () => {
      expect(ancestorsOf('a/b/c.md')).toEqual(['a/b', 'a', '']);
      expect(ancestorsOf('c.md')).toEqual(['']);
    });
  });
});
