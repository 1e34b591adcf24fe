import type { Document, Link } from '../entities/Document.js';
import type { Issue } from '../entities/Issue.js';
import { splitTarget } from '../markdown/scanner.js';
import { dirOf, joinRel, relativeRef } from '../utils/path-utils.js';
import { createIssue, type Rule, type RuleContext } from './types.js';

const SEE_ALSO = /^see also$/i;

function describe(link: Link): string {
  if (link.image) return 'Image';
  return link.section && SEE_ALSO.test(link.section) ? 'See Also link' : 'Link';
}

/** Everything after the path part of a target: `?query#fragment` */
function suffixOf(target: string): string {
  const index = target.search(/[?#]/);
  return index === -1 ? '' : target.slice(index);
}

function pathPartOf(target: string): string {
  return target.slice(0, target.length - suffixOf(target).length);
}

function rawFragmentOf(target: string): string | null {
  const index = target.indexOf('#');
  return index === -1 ? null : target.slice(index + 1);
}

/** Corpus path a site-root or relative link points at */
export function resolveLink(doc: Document, link: Link): string {
  const { path } = splitTarget(link.target);
  if (link.kind === 'site') {
    return joinRel('', path.startsWith('~/') ? path.slice(2) : path.slice(1));
  }
  return joinRel(dirOf(doc.id), path);
}

const escapesRoot = (resolved: string): boolean => resolved === '..' || resolved.startsWith('../');

function checkAnchor(
  doc: Document,
  link: Link,
  targetDoc: Document,
  ctx: RuleContext,
  where: string
): Issue | null {
  const { fragment } = splitTarget(link.target);
  const rawFragment = rawFragmentOf(link.target);
  if (!fragment || rawFragment === null) return null;

  const anchors = ctx.anchorsOf(targetDoc);
  if (anchors.has(fragment) || anchors.has(fragment.toLowerCase())) return null;

  // Headings that open with an emoji slug to a leading hyphen
  const emojiSlug = `-${fragment.toLowerCase()}`;
  const fix = anchors.has(emojiSlug)
    ? {
        kind: 'replace-link' as const,
        line: link.line,
        from: link.target,
        to: `${link.target.slice(0, link.target.length - rawFragment.length)}-${rawFragment}`,
      }
    : undefined;

  return createIssue(
    'anchor-broken',
    doc.id,
    link.line,
    `${describe(link)} anchor "#${fragment}" matches no heading in ${where}`,
    { section: link.section, fix }
  );
}

function checkLink(doc: Document, link: Link, ctx: RuleContext): Issue[] {
  const { corpus } = ctx;

  if (link.kind === 'external') return [];

  if (link.kind === 'anchor') {
    const issue = checkAnchor(doc, link, doc, ctx, 'this page');
    return issue ? [issue] : [];
  }

  const { path } = splitTarget(link.target);
  if (path === '') return [];

  const resolved = resolveLink(doc, link);
  const extra = { section: link.section };

  if (escapesRoot(resolved)) {
    return [
      createIssue(
        'link-outside-root',
        doc.id,
        link.line,
        `${describe(link)} "${link.target}" points outside the documentation root`,
        extra
      ),
    ];
  }

  const issues: Issue[] = [];

  if (corpus.files.has(resolved)) {
    if (link.kind === 'site') {
      issues.push(
        createIssue(
          'link-site-root',
          doc.id,
          link.line,
          `${describe(link)} "${link.target}" is root-relative; use a relative path`,
          {
            ...extra,
            fix: {
              kind: 'replace-link',
              line: link.line,
              from: link.target,
              to: `${relativeRef(dirOf(doc.id), resolved)}${suffixOf(link.target)}`,
            },
          }
        )
      );
    }

    const targetDoc = ctx.documentsById.get(resolved);
    if (targetDoc) {
      const anchorIssue = checkAnchor(doc, link, targetDoc, ctx, resolved);
      if (anchorIssue) issues.push(anchorIssue);
    }
    return issues;
  }

  if (corpus.directories.has(resolved)) {
    const index = joinRel(resolved, 'index.md');
    if (corpus.files.has(index)) {
      const pathPart = pathPartOf(link.target);
      return [
        createIssue(
          'link-directory',
          doc.id,
          link.line,
          `${describe(link)} "${link.target}" points at a directory; link its index.md`,
          {
            ...extra,
            fix: {
              kind: 'replace-link',
              line: link.line,
              from: link.target,
              to: `${pathPart.replace(/\/*$/, '')}/index.md${suffixOf(link.target)}`,
            },
          }
        ),
      ];
    }
    return [
      createIssue(
        'link-broken',
        doc.id,
        link.line,
        `${describe(link)} "${link.target}" points at directory ${resolved || '.'} which has no index.md`,
        extra
      ),
    ];
  }

  const lower = resolved.toLowerCase();
  const caseMatch = [...corpus.files].find(file => file.toLowerCase() === lower);
  const hint = caseMatch ? ` (did you mean ${relativeRef(dirOf(doc.id), caseMatch)}?)` : '';

  return [
    createIssue(
      'link-broken',
      doc.id,
      link.line,
      `${describe(link)} "${link.target}" is broken: ${resolved} does not exist${hint}`,
      extra
    ),
  ];
}

export const linksRule: Rule = {
  name: 'links',
  ids: ['link-broken', 'link-directory', 'link-site-root', 'link-outside-root', 'anchor-broken'],

  checkDocument(doc: Document, ctx: RuleContext): Issue[] {
    return doc.links.flatMap(link => checkLink(doc, link, ctx));
  },
};
