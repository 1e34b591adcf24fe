import type { CodeFence, Heading, Link, LinkKind } from '../entities/Document.js';
import { Slugger, stripInlineMarkup } from './slug.js';

export interface ScanResult {
  headings: Heading[];
  links: Link[];
  fences: CodeFence[];
}

const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})(.*)$/;
const ATX_HEADING = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?[ \t]*$/;
const SETEXT_UNDERLINE = /^ {0,3}(=+|-+)[ \t]*$/;
const NOT_PARAGRAPH = /^ {0,3}(?:[-*+>|#]|\d+[.)]\s|$)/;
const REFERENCE_DEFINITION = /^ {0,3}\[([^\]^][^\]]*)\]:[ \t]*(<[^>]*>|\S+)/;
const INLINE_LINK =
  /(!?)\[((?:[^[\]]|\[[^[\]]*\])*)\]\(\s*(<[^>]*>|[^\s()]*(?:\([^\s()]*\)[^\s()]*)*)(?:\s+(?:"[^"]*"|'[^']*'|\([^)]*\)))?\s*\)/g;
const HTML_LINK = /<(a|img)\s[^>]*?(?:href|src)\s*=\s*(?:"([^"]*)"|'([^']*)')/gi;
const INLINE_CODE = /(`+)[^`]*?\1/g;

export function classifyLink(target: string): LinkKind {
  if (/^[a-z][a-z0-9+.-]*:/i.test(target) || target.startsWith('//')) return 'external';
  if (target.startsWith('#')) return 'anchor';
  if (target.startsWith('~/') || target.startsWith('/')) return 'site';
  return 'relative';
}

function unwrapTarget(raw: string): string {
  return raw.startsWith('<') && raw.endsWith('>') ? raw.slice(1, -1) : raw;
}

function isClosingFence(line: string, open: string): boolean {
  const trimmed = line.trim();
  if (line.length - line.trimStart().length > 3) return false;
  const marker = open[0];
  let run = 0;
  while (run < trimmed.length && trimmed[run] === marker) run++;
  return run >= open.length && run === trimmed.length;
}

function extractInlineLinks(text: string, line: number, section: string | undefined, out: Link[]): void {
  for (const match of text.matchAll(INLINE_LINK)) {
    const [, bang, label, rawTarget] = match;
    const target = unwrapTarget(rawTarget);
    if (target) {
      out.push({ text: label, target, kind: classifyLink(target), line, image: bang === '!', section });
    }
    // Images nested in link text: [![badge](img.svg)](page.md)
    if (label.includes('](')) {
      extractInlineLinks(label, line, section, out);
    }
  }
}

/**
 * Walk a Markdown body once and collect its headings, links and fenced code
 * blocks. `lineOffset` is added to every line number so that positions refer
 * to the whole file rather than the body.
 */
export function scanMarkdown(body: string, lineOffset = 0): ScanResult {
  const lines = body.split(/\r?\n/);
  const headings: Heading[] = [];
  const links: Link[] = [];
  const fences: CodeFence[] = [];
  const slugger = new Slugger();

  let openFence: CodeFence | null = null;
  let section: string | undefined;
  let previousParagraph: string | null = null;

  lines.forEach((text, index) => {
    const line = index + 1 + lineOffset;

    if (openFence) {
      if (isClosingFence(text, openFence.fence)) {
        openFence.closeLine = line;
        openFence = null;
      } else {
        openFence.content.push(text);
      }
      return;
    }

    const fenceMatch = FENCE_OPEN.exec(text);
    if (fenceMatch && !(fenceMatch[1][0] === '`' && fenceMatch[2].includes('`'))) {
      const info = fenceMatch[2].trim();
      openFence = {
        lang: (info.split(/\s+/)[0] ?? '').replace(/^\{|\}$/g, '').toLowerCase(),
        fence: fenceMatch[1],
        openLine: line,
        closeLine: null,
        content: [],
      };
      fences.push(openFence);
      previousParagraph = null;
      return;
    }

    const headingMatch = ATX_HEADING.exec(text);
    if (headingMatch) {
      const raw = (headingMatch[2] ?? '').replace(/(?:^|[ \t]+)#+$/, '').trim();
      const heading: Heading = {
        depth: headingMatch[1].length,
        text: stripInlineMarkup(raw),
        slug: slugger.slug(raw),
        line,
      };
      headings.push(heading);
      section = heading.text;
      extractInlineLinks(raw, line, section, links);
      previousParagraph = null;
      return;
    }

    const underline = SETEXT_UNDERLINE.exec(text);
    if (underline && previousParagraph !== null) {
      const heading: Heading = {
        depth: underline[1][0] === '=' ? 1 : 2,
        text: stripInlineMarkup(previousParagraph),
        slug: slugger.slug(previousParagraph),
        line: line - 1,
      };
      headings.push(heading);
      section = heading.text;
      previousParagraph = null;
      return;
    }

    const reference = REFERENCE_DEFINITION.exec(text);
    if (reference) {
      const target = unwrapTarget(reference[2]);
      links.push({ text: reference[1], target, kind: classifyLink(target), line, image: false, section });
      previousParagraph = null;
      return;
    }

    const visible = text.replace(INLINE_CODE, match => ' '.repeat(match.length));
    extractInlineLinks(visible, line, section, links);
    for (const match of visible.matchAll(HTML_LINK)) {
      const target = match[2] ?? match[3];
      if (target) {
        links.push({
          text: '',
          target,
          kind: classifyLink(target),
          line,
          image: match[1].toLowerCase() === 'img',
          section,
        });
      }
    }

    previousParagraph = NOT_PARAGRAPH.test(text) ? null : text.trim();
  });

  return { headings, links, fences };
}

/** Strip the query string and split a link target into path and decoded fragment */
export function splitTarget(target: string): { path: string; fragment: string | null } {
  const hashIndex = target.indexOf('#');
  const beforeHash = hashIndex === -1 ? target : target.slice(0, hashIndex);
  const fragment = hashIndex === -1 ? null : safeDecode(target.slice(hashIndex + 1));
  const queryIndex = beforeHash.indexOf('?');
  const rawPath = queryIndex === -1 ? beforeHash : beforeHash.slice(0, queryIndex);
  return { path: safeDecode(rawPath), fragment };
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
