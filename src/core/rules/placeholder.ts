import type { Document } from '../entities/Document.js';
import type { Issue } from '../entities/Issue.js';
import { createIssue, type Rule } from './types.js';

export const PLACEHOLDER_MARKER = /this is a placeholder/i;

export const placeholderRule: Rule = {
  name: 'placeholder',
  ids: ['placeholder-page'],

  checkDocument(doc: Document): Issue[] {
    const lines = doc.content.split(/\r?\n/);
    const index = lines.findIndex(line => PLACEHOLDER_MARKER.test(line));
    if (index === -1) return [];
    return [
      createIssue('placeholder-page', doc.id, doc.lineOffset + index + 1, 'Page still has placeholder content'),
    ];
  },
};
