import { describe, it, expect } from 'vitest';
import { flattenToc, parseToc, renderToc } from './toc.js';

const TOC = `- name: Home
  href: index.md
- name: Guides
  items:
  - name: Setup
    href: guides/setup.md
`;

describe('parseToc', () => {
  it('should parse nested entries with their lines', () => {
    expect(parseToc(TOC)).toEqual({
      ok: true,
      entries: [
        { name: 'Home', href: 'index.md', items: [], line: 1 },
        {
          name: 'Guides',
          items: [{ name: 'Setup', href: 'guides/setup.md', items: [], line: 5 }],
          line: 3,
        },
      ],
    });
  });

  it('should treat an empty file as an empty toc', () => {
    expect(parseToc('')).toEqual({ ok: true, entries: [] });
  });

  it('should reject a toc that is not a list', () => {
    expect(parseToc('name: Home\n')).toEqual({ ok: false, line: 1, message: 'toc must be a YAML list' });
  });

  it('should reject entries without a name', () => {
    expect(parseToc('- href: a.md\n')).toEqual({ ok: false, line: 1, message: 'toc[0] has no name' });
  });

  it('should reject items that are not a list', () => {
    expect(parseToc('- name: A\n  items: nope\n')).toEqual({
      ok: false,
      line: 1,
      message: 'toc[0].items is not a list',
    });
  });

  it('should report YAML syntax errors', () => {
    const result = parseToc('- name: [unclosed\n');

    expect(result.ok).toBe(false);
  });
});

describe('flattenToc', () => {
  it('should walk entries in pre-order', () => {
    const parsed = parseToc(TOC);
    const names = parsed.ok ? flattenToc(parsed.entries).map(e => e.name) : [];

    expect(names).toEqual(['Home', 'Guides', 'Setup']);
  });
});

describe('renderToc', () => {
  it('should render entries that parse back', () => {
    const raw = renderToc([{ name: 'Guides', href: 'index.md' }]);

    expect(raw).toBe('- name: Guides\n  href: index.md\n');
    expect(parseToc(raw)).toEqual({ ok: true, entries: [{ name: 'Guides', href: 'index.md', items: [], line: 1 }] });
  });

  it('should quote names that YAML would read as another type', () => {
    const raw = renderToc([{ name: '2024', href: 'index.md' }]);

    expect(raw).toBe("- name: '2024'\n  href: index.md\n");
    expect(parseToc(raw)).toEqual({ ok: true, entries: [{ name: '2024', href: 'index.md', items: [], line: 1 }] });
  });
});
