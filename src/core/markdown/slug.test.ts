import { describe, it, expect } from 'vitest';
import { slugify, stripInlineMarkup, Slugger } from './slug.js';

describe('slugify', () => {
  it('should lowercase and hyphenate plain headings', () => {
    expect(slugify('Vector Database Basics')).toBe('vector-database-basics');
  });

  it('should drop punctuation but keep each space as a hyphen', () => {
    expect(slugify('Breach Data & Credential Leaks')).toBe('breach-data--credential-leaks');
  });

  it('should lead with a hyphen when the heading opens with an emoji', () => {
    expect(slugify('🔍 People & Phone Number Lookup')).toBe('-people--phone-number-lookup');
  });

  it('should ignore emoji variation selectors', () => {
    expect(slugify('⚙️ Configuration')).toBe('-configuration');
  });

  it('should keep underscores, digits and non-latin letters', () => {
    expect(slugify('top_k in Qdrant 1.9')).toBe('top_k-in-qdrant-19');
    expect(slugify('Übersicht')).toBe('übersicht');
  });

  it('should use the visible text of inline markup', () => {
    expect(slugify('Using `n8n` with [Pinecone](https://example.com)')).toBe('using-n8n-with-pinecone');
  });
});

describe('stripInlineMarkup', () => {
  it('should remove html tags', () => {
    expect(stripInlineMarkup('Setup <small>beta</small>')).toBe('Setup beta');
  });
});

describe('Slugger', () => {
  it('should number repeated slugs', () => {
    const slugger = new Slugger();

    expect(slugger.slug('Setup')).toBe('setup');
    expect(slugger.slug('Setup')).toBe('setup-1');
    expect(slugger.slug('Setup')).toBe('setup-2');
  });

  it('should skip numbers already taken by literal headings', () => {
    const slugger = new Slugger();

    expect(slugger.slug('Step 1')).toBe('step-1');
    expect(slugger.slug('Step')).toBe('step');
    expect(slugger.slug('Step')).toBe('step-2');
  });
});
