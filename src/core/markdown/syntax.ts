/**
 * Parse-only checks for the languages a guide's code fences commonly declare.
 * Nothing here evaluates a snippet.
 */

import * as yaml from 'js-yaml';
import ts from 'typescript';
import { getErrorMessage } from '../utils/errors.js';

export interface SyntaxProblem {
  /** 1-based line within the snippet */
  line: number;
  message: string;
}

type Checker = (code: string) => SyntaxProblem | null;

function lineAtOffset(code: string, offset: number): number {
  return code.slice(0, offset).split('\n').length;
}

const checkJson: Checker = code => {
  if (code.trim() === '') return null;
  try {
    JSON.parse(code);
    return null;
  } catch (error) {
    const message = getErrorMessage(error);
    const position = /position (\d+)/.exec(message);
    return { line: position ? lineAtOffset(code, Number(position[1])) : 1, message };
  }
};

const checkYaml: Checker = code => {
  try {
    yaml.loadAll(code);
    return null;
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      return { line: error.mark ? error.mark.line + 1 : 1, message: error.reason || error.message };
    }
    return { line: 1, message: getErrorMessage(error) };
  }
};

function scriptChecker(fileName: string): Checker {
  return code => {
    const output = ts.transpileModule(code, {
      fileName,
      reportDiagnostics: true,
      compilerOptions: {
        target: ts.ScriptTarget.ES2022,
        module: ts.ModuleKind.ESNext,
        jsx: ts.JsxEmit.Preserve,
        allowJs: true,
      },
    });

    const diagnostic = output.diagnostics?.find(d => d.category === ts.DiagnosticCategory.Error);
    if (!diagnostic) return null;

    const line =
      diagnostic.file && diagnostic.start !== undefined
        ? diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start).line + 1
        : 1;
    return { line, message: ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n') };
  };
}

const CHECKERS: Record<string, Checker> = {
  json: checkJson,
  yaml: checkYaml,
  yml: checkYaml,
  js: scriptChecker('snippet.js'),
  javascript: scriptChecker('snippet.js'),
  mjs: scriptChecker('snippet.mjs'),
  cjs: scriptChecker('snippet.cjs'),
  jsx: scriptChecker('snippet.jsx'),
  ts: scriptChecker('snippet.ts'),
  typescript: scriptChecker('snippet.ts'),
  tsx: scriptChecker('snippet.tsx'),
};

/**
 * Returns the first syntax problem of a snippet, null when it parses, and
 * undefined when the language is not one we check.
 */
export function checkSyntax(lang: string, code: string): SyntaxProblem | null | undefined {
  const checker = Object.hasOwn(CHECKERS, lang) ? CHECKERS[lang] : undefined;
  return checker ? checker(code) : undefined;
}
