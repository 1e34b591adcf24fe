import { Chalk, type ChalkInstance } from 'chalk';
import type { Issue, LintReport, Severity } from '../../core/entities/Issue.js';
import type { FixSummary } from '../../core/services/FixService.js';
import type { ScaffoldResult } from '../../core/services/ScaffoldService.js';

export type OutputFormat = 'text' | 'json';

export interface FormatOptions {
  color?: boolean;
}

const plural = (count: number, word: string, many = `${word}s`): string => `${count} ${count === 1 ? word : many}`;

function colorFor(chalk: ChalkInstance, severity: Severity): (text: string) => string {
  if (severity === 'error') return chalk.red;
  if (severity === 'warning') return chalk.yellow;
  return chalk.blue;
}

function formatIssue(chalk: ChalkInstance, issue: Issue): string {
  const line = String(issue.line).padStart(4);
  const severity = colorFor(chalk, issue.severity)(issue.severity.padEnd(7));
  return `  ${chalk.dim(line)}  ${severity}  ${issue.message}  ${chalk.dim(issue.rule)}`;
}

/**
 * Issues grouped by file, then a one-line summary
 */
export function formatReport(report: LintReport, options: FormatOptions = {}): string {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  const { summary } = report;
  const lines: string[] = [];

  let current: string | null = null;
  for (const issue of report.issues) {
    if (issue.docId !== current) {
      if (current !== null) lines.push('');
      current = issue.docId;
      lines.push(chalk.underline(issue.docId));
    }
    lines.push(formatIssue(chalk, issue));
  }

  const total = report.issues.length;
  if (total === 0) {
    lines.push(chalk.green(`✔ No problems found in ${plural(summary.documents, 'document')}`));
    return lines.join('\n');
  }

  const counts = `${plural(summary.errors, 'error')}, ${plural(summary.warnings, 'warning')}, ${summary.infos} info`;
  const fixable = summary.fixable > 0 ? `, ${summary.fixable} fixable with "fix"` : '';
  const headline = `✖ ${plural(total, 'problem')} (${counts}) in ${plural(summary.documents, 'document')}${fixable}`;

  lines.push('');
  lines.push(summary.errors > 0 ? chalk.red.bold(headline) : chalk.yellow.bold(headline));
  return lines.join('\n');
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function formatFixSummary(summary: FixSummary, options: FormatOptions = {}): string {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  const lines: string[] = [];
  const verb = summary.dryRun ? 'would fix' : 'fixed';

  for (const result of summary.results) {
    if (!result.changed) continue;
    lines.push(`${chalk.cyan(result.docId)}: ${verb} ${plural(result.applied.length, 'issue')}`);
    for (const issue of result.applied) {
      lines.push(`  ${String(issue.line).padStart(4)}  ${issue.rule}`);
    }
  }

  const skipped = summary.results.reduce((sum, r) => sum + r.skipped.length, 0);
  lines.push(
    `${summary.dryRun ? 'Dry run: ' : ''}${plural(summary.fixesApplied, 'fix', 'fixes')} in ${plural(summary.filesChanged, 'file')}` +
      (skipped > 0 ? `, ${skipped} could not be applied` : '') +
      (summary.backups.length > 0 ? `, ${plural(summary.backups.length, 'backup')} written` : '')
  );
  return lines.join('\n');
}

export function formatScaffoldResult(result: ScaffoldResult, options: FormatOptions = {}): string {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  const verb = result.dryRun ? 'would create' : 'created';
  const lines = [
    ...result.created.map(id => `${chalk.green('+')} ${id}`),
    ...result.skipped.map(id => `${chalk.dim('=')} ${id} (exists)`),
    `${result.dryRun ? 'Dry run: ' : ''}${verb} ${plural(result.created.length, 'file')}, skipped ${result.skipped.length}`,
  ];
  return lines.join('\n');
}
