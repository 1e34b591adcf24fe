import type { Rule } from './types.js';
import { frontmatterRule } from './frontmatter.js';
import { linksRule } from './links.js';
import { codeFencesRule } from './codeFences.js';
import { tocRule } from './toc.js';
import { placeholderRule } from './placeholder.js';

export const RULES: readonly Rule[] = [frontmatterRule, linksRule, codeFencesRule, tocRule, placeholderRule];

export { DEFAULT_SEVERITY, createIssue } from './types.js';
export type { Rule, RuleContext } from './types.js';
