import type { CodeFence, Document } from '../entities/Document.js';
import type { Issue } from '../entities/Issue.js';
import { checkSyntax } from '../markdown/syntax.js';
import { createIssue, type Rule } from './types.js';

/** Lines at least this long that carry literal `\n` escapes are code that lost its line breaks */
export const COMPRESSED_LINE_LENGTH = 150;

/** Languages recognized when code follows the fence opener without a break, as in ```pythonimport os */
export const GLUED_LANGUAGES = [
  'javascript', 'typescript', 'powershell', 'dockerfile', 'markdown', 'console', 'python', 'csharp', 'kotlin',
  'swift', 'shell', 'jsonc', 'bash', 'json', 'yaml', 'html', 'java', 'ruby', 'rust', 'text', 'yml', 'xml', 'sql',
  'css', 'cpp', 'php', 'tsx', 'jsx', 'js', 'ts', 'sh', 'go', 'cs', 'py',
];

const KNOWN_LANGUAGE = [...GLUED_LANGUAGES].sort((a, b) => b.length - a.length).join('|');

/**
 * A fence opener followed by code on the same line, after prose or at the
 * start of the line. The language is a known word, or any word followed by
 * whitespace.
 */
export const GLUED_FENCE = new RegExp(
  `^(.*?)\\s*\`\`\`((?:${KNOWN_LANGUAGE})(?![\\d+#.-])|[A-Za-z][\\w+#.-]*(?=\\s))(.{20,})$`
);

/**
 * Describe a glued fence opener on the line, or return null. At the start of
 * a line it only counts when the code lost its line breaks.
 */
export function gluedFenceMessage(text: string): string | null {
  const glued = GLUED_FENCE.exec(text);
  if (!glued) return null;
  const [, prose, , code] = glued;
  if (prose !== '') return 'Code fence opener is glued to the preceding text';
  return code.includes('\\n') ? 'Code starts on the fence opener line' : null;
}

/** Lines a fence holds, its opener excluded */
function isInsideFence(line: number, fences: CodeFence[]): boolean {
  return fences.some(f => line > f.openLine && (f.closeLine === null || line <= f.closeLine));
}

function fenceIssues(doc: Document, fence: CodeFence): Issue[] {
  const issues: Issue[] = [];

  if (fence.closeLine === null) {
    issues.push(
      createIssue('code-fence-unclosed', doc.id, fence.openLine, `Code fence opened with ${fence.fence} is never closed`)
    );
  }

  fence.content.forEach((text, index) => {
    if (text.length >= COMPRESSED_LINE_LENGTH && text.includes('\\n')) {
      const line = fence.openLine + 1 + index;
      issues.push(
        createIssue('code-fence-escaped-newlines', doc.id, line, 'Code line contains literal \\n escapes instead of line breaks', {
          fix: { kind: 'expand-escapes', line },
        })
      );
    }
  });

  if (fence.closeLine !== null && fence.lang) {
    const problem = checkSyntax(fence.lang, fence.content.join('\n'));
    if (problem) {
      issues.push(
        createIssue(
          'code-fence-syntax',
          doc.id,
          fence.openLine + problem.line,
          `${fence.lang} code block does not parse: ${problem.message}`
        )
      );
    }
  }

  return issues;
}

export const codeFencesRule: Rule = {
  name: 'code-fences',
  ids: ['code-fence-unclosed', 'code-fence-syntax', 'code-fence-escaped-newlines'],

  checkDocument(doc: Document): Issue[] {
    const issues = doc.fences.flatMap(fence => fenceIssues(doc, fence));

    doc.body.split(/\r?\n/).forEach((text, index) => {
      const line = index + 1;
      if (line <= doc.lineOffset || isInsideFence(line, doc.fences)) return;
      const message = gluedFenceMessage(text);
      if (message) {
        issues.push(
          createIssue('code-fence-escaped-newlines', doc.id, line, message, {
            fix: { kind: 'expand-escapes', line },
          })
        );
      }
    });

    return issues.sort((a, b) => a.line - b.line);
  },
};
