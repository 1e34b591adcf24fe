import type { DocId } from '../entities/Document.js';
import type { Issue, LintReport } from '../entities/Issue.js';
import { GLUED_FENCE } from '../rules/codeFences.js';
import { ErrorCollector, logError } from '../utils/errors.js';
import logger from '../utils/logger.js';
import type { DocumentService } from './DocumentService.js';
import { FrontmatterService, frontmatterService } from './FrontmatterService.js';
import { LintService, type LintOptions } from './LintService.js';

export interface FixOptions {
  dryRun?: boolean;
  /** Copy each file to `<file>.bak` before its first rewrite */
  backup?: boolean;
  lint?: LintOptions;
}

export interface FixResult {
  docId: DocId;
  applied: Issue[];
  skipped: Issue[];
  content: string;
  changed: boolean;
}

export interface FixSummary {
  results: FixResult[];
  filesChanged: number;
  fixesApplied: number;
  backups: DocId[];
  dryRun: boolean;
}

export const BACKUP_SUFFIX = '.bak';

const OPENERS = ['(', '<', '"', "'", ' '];
const CLOSERS = [')', '>', '"', "'", ' ', '\t', undefined];

/**
 * Replace a link target on one line. The target must sit where a link target
 * sits (after `(`, `<`, a quote or `: `) so that link text is never rewritten.
 */
export function replaceTarget(line: string, from: string, to: string): string | null {
  let index = line.indexOf(from);
  while (index !== -1) {
    const before = line[index - 1];
    const after = line[index + from.length];
    if (before !== undefined && OPENERS.includes(before) && CLOSERS.includes(after)) {
      return line.slice(0, index) + to + line.slice(index + from.length);
    }
    index = line.indexOf(from, index + 1);
  }
  return null;
}

/**
 * Turn a line of code whose line breaks were stored as literal `\n` escapes
 * back into real lines. `\\n` (an escaped escape, as used inside string
 * literals) becomes `\n` and `\"` becomes `"`.
 */
export function expandEscapes(line: string): string[] {
  if (!line.includes('\\n')) return [line];

  const parts = line.split(/(?<!\\)\\n/);
  const out: string[] = [];
  parts.forEach((part, index) => {
    if (part) {
      out.push(part.replace(/\\\\n/g, '\\n').replace(/\\"/g, '"'));
    } else if (index < parts.length - 1) {
      out.push('');
    }
  });
  return out;
}

/** Put a glued fence opener on its own line, then expand the code after it */
export function expandLine(line: string): string[] {
  const glued = GLUED_FENCE.exec(line);
  if (glued) {
    const [, prose, lang, code] = glued;
    const opener = ['```' + lang, ...expandEscapes(code)];
    return prose === '' ? opener : [prose.trimEnd(), ...opener];
  }
  return expandEscapes(line);
}

export class FixService {
  constructor(
    private readonly documents: DocumentService,
    private readonly lintService: LintService = new LintService(),
    private readonly frontmatter: FrontmatterService = frontmatterService
  ) {}

  /**
   * Group fixable issues by the file they belong to
   */
  planFixes(report: LintReport): Map<DocId, Issue[]> {
    const plan = new Map<DocId, Issue[]>();
    for (const issue of report.issues) {
      if (!issue.fix) continue;
      const list = plan.get(issue.docId) ?? [];
      list.push(issue);
      plan.set(issue.docId, list);
    }
    return plan;
  }

  /**
   * Apply fixes to one file's content: link rewrites first, then code
   * expansion from the bottom up, then front matter, so that every line
   * number still points at the line it was computed for.
   */
  applyFixes(raw: string, issues: Issue[]): { content: string; applied: Issue[]; skipped: Issue[] } {
    const lines = raw.split('\n');
    const applied: Issue[] = [];
    const skipped: Issue[] = [];

    for (const issue of issues) {
      if (issue.fix?.kind !== 'replace-link') continue;
      const index = issue.fix.line - 1;
      const replaced = index < lines.length ? replaceTarget(lines[index], issue.fix.from, issue.fix.to) : null;
      if (replaced === null) {
        skipped.push(issue);
      } else {
        lines[index] = replaced;
        applied.push(issue);
      }
    }

    const expansions = issues
      .filter(issue => issue.fix?.kind === 'expand-escapes')
      .sort((a, b) => b.line - a.line);
    const expandedLines = new Set<number>();
    for (const issue of expansions) {
      if (expandedLines.has(issue.line) || issue.line > lines.length) {
        skipped.push(issue);
        continue;
      }
      expandedLines.add(issue.line);
      const text = lines[issue.line - 1];
      const carriage = text.endsWith('\r') ? '\r' : '';
      const expanded = expandLine(carriage ? text.slice(0, -1) : text).map(l => l + carriage);
      lines.splice(issue.line - 1, 1, ...expanded);
      applied.push(issue);
    }

    let content = lines.join('\n');

    const fields: Record<string, string> = {};
    const frontmatterIssues: Issue[] = [];
    for (const issue of issues) {
      if (issue.fix?.kind !== 'frontmatter') continue;
      Object.assign(fields, issue.fix.set);
      frontmatterIssues.push(issue);
    }
    if (frontmatterIssues.length > 0) {
      const updated = this.frontmatter.setFields(content, fields);
      if (updated === content) {
        skipped.push(...frontmatterIssues);
      } else {
        content = updated;
        applied.push(...frontmatterIssues);
      }
    }

    return { content, applied, skipped };
  }

  /**
   * Lint the corpus and write every fix that applies
   */
  async fix(options: FixOptions = {}): Promise<FixSummary> {
    const dryRun = options.dryRun ?? false;
    const corpus = await this.documents.loadCorpus();
    const report = this.lintService.lint(corpus, options.lint);
    const plan = this.planFixes(report);

    const results: FixResult[] = [];
    const backups: DocId[] = [];
    const errors = new ErrorCollector();

    for (const [docId, issues] of plan) {
      const doc = corpus.documents.find(d => d.id === docId);
      if (!doc) continue;

      const { content, applied, skipped } = this.applyFixes(doc.body, issues);
      const changed = content !== doc.body;
      results.push({ docId, applied, skipped, content, changed });

      if (!changed || dryRun) continue;

      try {
        if (options.backup && (await this.documents.store.backup(docId, BACKUP_SUFFIX))) {
          backups.push(`${docId}${BACKUP_SUFFIX}`);
        }
        await this.documents.store.store(docId, content);
        logger.info(`Fixed ${applied.length} issue(s) in ${docId}`);
      } catch (error) {
        logError(error, 'fix', { docId });
        errors.add(error);
      }
    }

    errors.throwIfAny('Some files could not be fixed');

    return {
      results,
      filesChanged: results.filter(r => r.changed).length,
      fixesApplied: results.reduce((sum, r) => sum + r.applied.length, 0),
      backups,
      dryRun,
    };
  }
}
