import type { Document } from '../entities/Document.js';
import type { Issue } from '../entities/Issue.js';
import { frontmatterService } from '../services/FrontmatterService.js';
import { createIssue, type Rule, type RuleContext } from './types.js';

/** Values the fixer can fill in for fields a page lacks */
export function derivedFieldValue(field: string, doc: Document): string | undefined {
  if (field === 'title') return doc.title;
  if (field === 'description') return `Documentation for ${doc.title}`;
  return undefined;
}

export const frontmatterRule: Rule = {
  name: 'frontmatter',
  ids: ['frontmatter-missing', 'frontmatter-invalid', 'frontmatter-required', 'frontmatter-type'],

  checkDocument(doc: Document, ctx: RuleContext): Issue[] {
    if (!doc.hasFrontmatter) {
      const set: Record<string, string> = {};
      for (const field of ctx.requiredFields) {
        const value = derivedFieldValue(field, doc);
        if (value !== undefined) set[field] = value;
      }
      return [
        createIssue('frontmatter-missing', doc.id, 1, 'Missing YAML front matter', {
          fix: Object.keys(set).length > 0 ? { kind: 'frontmatter', set } : undefined,
        }),
      ];
    }

    if (doc.frontmatterError) {
      return [createIssue('frontmatter-invalid', doc.id, 1, `Invalid front matter: ${doc.frontmatterError}`)];
    }

    return frontmatterService.validate(doc.frontmatter, ctx.requiredFields).map(problem => {
      if (!problem.missing) {
        const rule = ctx.requiredFields.includes(problem.field) ? 'frontmatter-required' : 'frontmatter-type';
        return createIssue(rule, doc.id, 1, problem.message);
      }
      const value = derivedFieldValue(problem.field, doc);
      return createIssue('frontmatter-required', doc.id, 1, problem.message, {
        fix: value === undefined ? undefined : { kind: 'frontmatter', set: { [problem.field]: value } },
      });
    });
  },
};
