import { describe, it, expect } from 'vitest';
import { checkSyntax } from './syntax.js';

describe('checkSyntax', () => {
  it('should return undefined for languages that are not checked', () => {
    expect(checkSyntax('python', 'def broken(')).toBeUndefined();
  });

  describe('json', () => {
    it('should accept valid JSON and empty blocks', () => {
      expect(checkSyntax('json', '{\n  "a": [1, 2]\n}')).toBeNull();
      expect(checkSyntax('json', '  ')).toBeNull();
    });

    it('should report the line of a trailing comma', () => {
      const problem = checkSyntax('json', '{\n  "a": 1,\n}');

      expect(problem?.line).toBe(3);
    });
  });

  describe('yaml', () => {
    it('should accept multi-document YAML', () => {
      expect(checkSyntax('yaml', 'a: 1\n---\nb: 2\n')).toBeNull();
    });

    it('should report bad indentation', () => {
      const problem = checkSyntax('yml', 'a: 1\n  b: 2\n');

      expect(problem?.message).toContain('bad indentation');
    });
  });

  describe('scripts', () => {
    it('should accept typed and JSX code', () => {
      expect(checkSyntax('ts', 'const n: number = 1;\nexport default n;\n')).toBeNull();
      expect(checkSyntax('tsx', 'export const App = () => <div>{1}</div>;\n')).toBeNull();
      expect(checkSyntax('javascript', 'async function main() {\n  await fetch("/");\n}\n')).toBeNull();
    });

    it('should report the first syntax error and its line', () => {
      const problem = checkSyntax('typescript', 'const a = 1;\nconst b = ;\n');

      expect(problem).toEqual({ line: 2, message: 'Expression expected.' });
    });

    it('should not report type errors', () => {
      expect(checkSyntax('ts', 'const n: number = "text";\n')).toBeNull();
    });
  });
});
