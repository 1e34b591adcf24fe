import type { DocId } from './Document.js';

export const RULE_IDS = [
  'frontmatter-missing',
  'frontmatter-invalid',
  'frontmatter-required',
  'frontmatter-type',
  'link-broken',
  'link-directory',
  'link-site-root',
  'link-outside-root',
  'anchor-broken',
  'code-fence-unclosed',
  'code-fence-syntax',
  'code-fence-escaped-newlines',
  'toc-invalid',
  'toc-broken-href',
  'toc-orphan',
  'placeholder-page',
] as const;

export type RuleId = (typeof RULE_IDS)[number];

export type Severity = 'error' | 'warning' | 'info';

export const SEVERITY_ORDER: Record<Severity, number> = {
  error: 0,
  warning: 1,
  info: 2,
};

export function isRuleId(value: string): value is RuleId {
  return (RULE_IDS as readonly string[]).includes(value);
}

/**
 * A repair that the fix service knows how to apply.
 * Line numbers are 1-based and count from the top of the file, front matter included.
 */
export type Fix =
  | { kind: 'replace-link'; line: number; from: string; to: string }
  | { kind: 'expand-escapes'; line: number }
  | { kind: 'frontmatter'; set: Record<string, string> };

export interface Issue {
  rule: RuleId;
  severity: Severity;
  /** Corpus-relative path of the offending file (a Markdown document or a toc.yml) */
  docId: DocId;
  line: number;
  message: string;
  /** Heading of the section the issue was found in, when there is one */
  section?: string;
  fix?: Fix;
}

export interface LintSummary {
  documents: number;
  errors: number;
  warnings: number;
  infos: number;
  fixable: number;
}

export interface LintReport {
  root: string;
  issues: Issue[];
  summary: LintSummary;
}
