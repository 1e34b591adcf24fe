import type { Corpus, Document, DocId } from '../entities/Document.js';
import { SEVERITY_ORDER, type Issue, type LintReport, type RuleId } from '../entities/Issue.js';
import { RULES, type Rule, type RuleContext } from '../rules/index.js';
import logger from '../utils/logger.js';

export interface LintOptions {
  requiredFields?: string[];
  disabledRules?: RuleId[];
  /** When set, only these rules report */
  onlyRules?: RuleId[];
  /** Restrict document-level checks to these ids; corpus-level checks still see everything */
  documents?: DocId[];
}

function anchorIndex(): (doc: Document) => Set<string> {
  const cache = new Map<DocId, Set<string>>();
  return doc => {
    let anchors = cache.get(doc.id);
    if (!anchors) {
      anchors = new Set(doc.headings.map(h => h.slug));
      for (const match of doc.content.matchAll(/<a\s[^>]*?(?:name|id)\s*=\s*(?:"([^"]+)"|'([^']+)')/gi)) {
        anchors.add(match[1] ?? match[2]);
      }
      for (const match of doc.content.matchAll(/\{#([\w-]+)\}/g)) {
        anchors.add(match[1]);
      }
      cache.set(doc.id, anchors);
    }
    return anchors;
  };
}

export function compareIssues(a: Issue, b: Issue): number {
  return (
    a.docId.localeCompare(b.docId) ||
    a.line - b.line ||
    SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity] ||
    a.rule.localeCompare(b.rule)
  );
}

export function summarize(root: string, issues: Issue[], documents: number): LintReport {
  return {
    root,
    issues,
    summary: {
      documents,
      errors: issues.filter(i => i.severity === 'error').length,
      warnings: issues.filter(i => i.severity === 'warning').length,
      infos: issues.filter(i => i.severity === 'info').length,
      fixable: issues.filter(i => i.fix !== undefined).length,
    },
  };
}

export class LintService {
  constructor(private readonly rules: readonly Rule[] = RULES) {}

  /**
   * Run every enabled rule over the corpus
   */
  lint(corpus: Corpus, options: LintOptions = {}): LintReport {
    const disabled = new Set<RuleId>(options.disabledRules ?? []);
    const only = options.onlyRules && options.onlyRules.length > 0 ? new Set(options.onlyRules) : null;
    const enabled = (id: RuleId): boolean => !disabled.has(id) && (only === null || only.has(id));

    const ctx: RuleContext = {
      corpus,
      documentsById: new Map(corpus.documents.map(doc => [doc.id, doc])),
      requiredFields: options.requiredFields ?? ['title', 'description'],
      anchorsOf: anchorIndex(),
    };

    const selected = options.documents ? new Set(options.documents) : null;
    const documents = selected ? corpus.documents.filter(doc => selected.has(doc.id)) : corpus.documents;
    const activeRules = this.rules.filter(rule => rule.ids.some(enabled));

    const issues: Issue[] = [];
    for (const rule of activeRules) {
      if (rule.checkDocument) {
        for (const doc of documents) {
          issues.push(...rule.checkDocument(doc, ctx));
        }
      }
      if (rule.checkCorpus) {
        const corpusIssues = rule.checkCorpus(ctx);
        // toc.yml issues always belong to the run; page issues only when the page was selected
        const kept = selected
          ? corpusIssues.filter(issue => selected.has(issue.docId) || !issue.docId.endsWith('.md'))
          : corpusIssues;
        issues.push(...kept);
      }
      logger.debug(`Rule ${rule.name} done`);
    }

    const reported = issues.filter(issue => enabled(issue.rule)).sort(compareIssues);
    return summarize(corpus.root, reported, documents.length);
  }
}
