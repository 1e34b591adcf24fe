import * as yaml from 'js-yaml';
import type { TocEntry } from '../entities/Document.js';
import { getErrorMessage } from '../utils/errors.js';

export type TocParseResult =
  | { ok: true; entries: TocEntry[] }
  | { ok: false; line: number; message: string };

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Finds the source line of each entry by walking the raw lines in document
 * order, since YAML values carry no positions.
 */
class LineCursor {
  private next = 0;
  private readonly lines: string[];

  constructor(raw: string) {
    this.lines = raw.split(/\r?\n/);
  }

  find(name: string): number {
    for (let i = this.next; i < this.lines.length; i++) {
      if (/^\s*-?\s*name\s*:/.test(this.lines[i]) && this.lines[i].includes(name)) {
        this.next = i + 1;
        return i + 1;
      }
    }
    return this.next + 1;
  }
}

function toEntries(value: unknown[], cursor: LineCursor, path: string): TocEntry[] | string {
  const entries: TocEntry[] = [];

  for (const [index, item] of value.entries()) {
    const where = `${path}[${index}]`;
    if (!isMapping(item)) return `${where} is not a mapping`;
    if (typeof item.name !== 'string' || item.name.trim() === '') return `${where} has no name`;
    if (item.href !== undefined && typeof item.href !== 'string') return `${where}.href is not a string`;
    if (item.items !== undefined && !Array.isArray(item.items)) return `${where}.items is not a list`;

    const line = cursor.find(item.name);
    const children = item.items ? toEntries(item.items, cursor, `${where}.items`) : [];
    if (typeof children === 'string') return children;

    entries.push({ name: item.name, href: item.href, items: children, line });
  }

  return entries;
}

/**
 * Parse a DocFX toc.yml: a YAML list of `{ name, href?, items? }`
 */
export function parseToc(raw: string): TocParseResult {
  let value: unknown;
  try {
    value = yaml.load(raw);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      return { ok: false, line: error.mark ? error.mark.line + 1 : 1, message: error.reason };
    }
    return { ok: false, line: 1, message: getErrorMessage(error) };
  }

  if (value === undefined || value === null) return { ok: true, entries: [] };
  if (!Array.isArray(value)) return { ok: false, line: 1, message: 'toc must be a YAML list' };

  const entries = toEntries(value, new LineCursor(raw), 'toc');
  if (typeof entries === 'string') return { ok: false, line: 1, message: entries };
  return { ok: true, entries };
}

/** Pre-order walk over every entry */
export function flattenToc(entries: TocEntry[]): TocEntry[] {
  return entries.flatMap(entry => [entry, ...flattenToc(entry.items)]);
}

/** toc.yml for a single-page folder */
export function renderToc(entries: { name: string; href: string }[]): string {
  return yaml.dump(
    entries.map(({ name, href }) => ({ name, href })),
    { lineWidth: -1 }
  );
}
