import { describe, it, expect } from 'vitest';
import { formatFixSummary, formatJson, formatReport, formatScaffoldResult } from './report-formatter.js';
import { createIssue } from '../../core/rules/types.js';
import { summarize } from '../../core/services/LintService.js';

describe('formatReport', () => {
  it('should group issues by file and end with a summary', () => {
    const report = summarize(
      '/docs',
      [
        createIssue('link-broken', 'index.md', 8, 'Link "gone.md" is broken: gone.md does not exist'),
        createIssue('placeholder-page', 'tools/nmap.md', 11, 'Page still has placeholder content'),
      ],
      3
    );

    expect(formatReport(report).split('\n')).toEqual([
      'index.md',
      '     8  error    Link "gone.md" is broken: gone.md does not exist  link-broken',
      '',
      'tools/nmap.md',
      '    11  info     Page still has placeholder content  placeholder-page',
      '',
      '✖ 2 problems (1 error, 0 warnings, 1 info) in 3 documents',
    ]);
  });

  it('should mention fixable issues', () => {
    const report = summarize(
      '/docs',
      [
        createIssue('link-directory', 'a.md', 1, 'x', {
          fix: { kind: 'replace-link', line: 1, from: 'a/', to: 'a/index.md' },
        }),
      ],
      1
    );

    expect(formatReport(report).split('\n').at(-1)).toBe(
      '✖ 1 problem (0 errors, 1 warning, 0 info) in 1 document, 1 fixable with "fix"'
    );
  });

  it('should report a clean run', () => {
    expect(formatReport(summarize('/docs', [], 1))).toBe('✔ No problems found in 1 document');
  });
});

describe('formatFixSummary', () => {
  it('should list applied fixes per file', () => {
    const issue = createIssue('link-directory', 'index.md', 5, 'x');
    const output = formatFixSummary({
      results: [
        { docId: 'index.md', applied: [issue], skipped: [], content: '', changed: true },
        { docId: 'b.md', applied: [], skipped: [], content: '', changed: false },
      ],
      filesChanged: 1,
      fixesApplied: 1,
      backups: ['index.md.bak'],
      dryRun: false,
    });

    expect(output).toBe('index.md: fixed 1 issue\n     5  link-directory\n1 fix in 1 file, 1 backup written');
  });

  it('should say when nothing was written', () => {
    const output = formatFixSummary({ results: [], filesChanged: 0, fixesApplied: 0, backups: [], dryRun: true });

    expect(output).toBe('Dry run: 0 fixes in 0 files');
  });
});

describe('formatScaffoldResult', () => {
  it('should list created and skipped files', () => {
    expect(formatScaffoldResult({ created: ['a.md'], skipped: ['b.md'], dryRun: true })).toBe(
      '+ a.md\n= b.md (exists)\nDry run: would create 1 file, skipped 1'
    );
  });
});

describe('formatJson', () => {
  it('should pretty-print', () => {
    expect(formatJson({ a: 1 })).toBe('{\n  "a": 1\n}');
  });
});
