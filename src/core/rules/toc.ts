import type { TocFile } from '../entities/Document.js';
import type { Issue } from '../entities/Issue.js';
import { classifyLink, splitTarget } from '../markdown/scanner.js';
import { flattenToc, parseToc } from '../markdown/toc.js';
import { dirOf, joinRel } from '../utils/path-utils.js';
import { createIssue, type Rule, type RuleContext } from './types.js';

function hrefExists(resolved: string, ctx: RuleContext): boolean {
  const { files, directories } = ctx.corpus;
  if (files.has(resolved)) return true;
  return (
    directories.has(resolved) &&
    (files.has(joinRel(resolved, 'toc.yml')) || files.has(joinRel(resolved, 'index.md')))
  );
}

function checkToc(toc: TocFile, ctx: RuleContext): Issue[] {
  const parsed = parseToc(toc.raw);
  if (!parsed.ok) {
    return [createIssue('toc-invalid', toc.id, parsed.line, `Invalid toc: ${parsed.message}`)];
  }

  const issues: Issue[] = [];
  const tocDir = dirOf(toc.id);
  const listed = new Set<string>();

  for (const entry of flattenToc(parsed.entries)) {
    if (!entry.href) continue;
    const kind = classifyLink(entry.href);
    if (kind === 'external' || kind === 'anchor') continue;

    const { path } = splitTarget(entry.href);
    const resolved =
      kind === 'site' ? joinRel('', path.startsWith('~/') ? path.slice(2) : path.slice(1)) : joinRel(tocDir, path);
    listed.add(resolved);

    if (!hrefExists(resolved, ctx)) {
      issues.push(
        createIssue('toc-broken-href', toc.id, entry.line, `toc entry "${entry.name}" points at missing ${entry.href}`)
      );
    }
  }

  for (const doc of ctx.corpus.documents) {
    if (dirOf(doc.id) === tocDir && !listed.has(doc.id)) {
      issues.push(createIssue('toc-orphan', doc.id, 1, `Page is not listed in ${toc.id}`));
    }
  }

  return issues;
}

export const tocRule: Rule = {
  name: 'toc',
  ids: ['toc-invalid', 'toc-broken-href', 'toc-orphan'],

  checkCorpus(ctx: RuleContext): Issue[] {
    return ctx.corpus.tocs.flatMap(toc => checkToc(toc, ctx));
  },
};
