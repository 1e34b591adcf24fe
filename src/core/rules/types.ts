import type { Corpus, Document, DocId } from '../entities/Document.js';
import type { Fix, Issue, RuleId, Severity } from '../entities/Issue.js';

export interface RuleContext {
  corpus: Corpus;
  documentsById: Map<DocId, Document>;
  requiredFields: string[];
  /** Heading slugs and explicit HTML anchors of a document */
  anchorsOf(doc: Document): Set<string>;
}

export interface Rule {
  name: string;
  /** Ids of every issue this rule can report */
  readonly ids: readonly RuleId[];
  checkDocument?(doc: Document, ctx: RuleContext): Issue[];
  checkCorpus?(ctx: RuleContext): Issue[];
}

export const DEFAULT_SEVERITY: Record<RuleId, Severity> = {
  'frontmatter-missing': 'error',
  'frontmatter-invalid': 'error',
  'frontmatter-required': 'error',
  'frontmatter-type': 'warning',
  'link-broken': 'error',
  'link-directory': 'warning',
  'link-site-root': 'info',
  'link-outside-root': 'warning',
  'anchor-broken': 'error',
  'code-fence-unclosed': 'error',
  'code-fence-syntax': 'error',
  'code-fence-escaped-newlines': 'warning',
  'toc-invalid': 'error',
  'toc-broken-href': 'error',
  'toc-orphan': 'info',
  'placeholder-page': 'info',
};

export function createIssue(
  rule: RuleId,
  docId: DocId,
  line: number,
  message: string,
  extra: { section?: string; fix?: Fix } = {}
): Issue {
  const issue: Issue = { rule, severity: DEFAULT_SEVERITY[rule], docId, line, message };
  if (extra.section !== undefined) issue.section = extra.section;
  if (extra.fix !== undefined) issue.fix = extra.fix;
  return issue;
}
