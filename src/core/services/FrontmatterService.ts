import matter from 'gray-matter';
import { z } from 'zod';
import type { FrontmatterData } from '../entities/Document.js';
import { getErrorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';

const DELIMITER = '---';

const StringListSchema = z.union([z.array(z.string()), z.string()]);

const DateSchema = z
  .string()
  .refine(value => !Number.isNaN(Date.parse(value)), { message: 'must be a date (YYYY-MM-DD)' });

/** Known fields whose type the site generator depends on */
export const FrontmatterSchema = z
  .object({
    title: z.string().optional(),
    description: z.string().optional(),
    author: z.string().optional(),
    date: DateSchema.optional(),
    'ms.date': DateSchema.optional(),
    'ms.topic': z.string().optional(),
    category: z.string().optional(),
    tags: StringListSchema.optional(),
    keywords: StringListSchema.optional(),
  })
  .passthrough();

export interface ParsedFrontmatter {
  data: FrontmatterData;
  /** Markdown body after the front matter block */
  content: string;
  hasFrontmatter: boolean;
  /** Parse failure of an existing block */
  error?: string;
  /** Number of lines the front matter block occupies, closing delimiter included */
  lineOffset: number;
}

export interface FieldProblem {
  field: string;
  message: string;
  /** True when the field is absent or blank, as opposed to present with the wrong type */
  missing: boolean;
}

interface Block {
  /** Lines between the delimiters */
  yamlLines: string[];
  lineOffset: number;
  content: string;
}

const BOM = '\uFEFF';

/** Separate a leading byte order mark, which gray-matter also drops */
function splitBom(raw: string): { bom: string; text: string } {
  return raw.startsWith(BOM) ? { bom: BOM, text: raw.slice(BOM.length) } : { bom: '', text: raw };
}

/** Line ending of the first line */
function lineEnding(text: string): string {
  return /\r?\n/.exec(text)?.[0] ?? '\n';
}

/** Offset just past the line break that ends line `index`, or the end of the text */
function offsetAfterLine(text: string, index: number): number {
  const breaks = /\r?\n/g;
  let match: RegExpExecArray | null;
  let count = 0;
  while ((match = breaks.exec(text)) !== null) {
    if (count === index) return match.index + match[0].length;
    count++;
  }
  return text.length;
}

/**
 * Locate the front matter block by its delimiter lines. Returns null when the
 * file does not open with a delimiter, and a block without content when the
 * closing delimiter is missing. `text` carries no byte order mark.
 */
function findBlock(text: string): Block | { unclosed: true } | null {
  const lines = text.split(/\r?\n/);
  if (lines[0]?.trimEnd() !== DELIMITER) return null;

  const closeIndex = lines.findIndex((line, index) => index > 0 && line.trimEnd() === DELIMITER);
  if (closeIndex === -1) return { unclosed: true };

  return {
    yamlLines: lines.slice(1, closeIndex),
    lineOffset: closeIndex + 1,
    content: text.slice(offsetAfterLine(text, closeIndex)),
  };
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function yamlKeyPattern(field: string): RegExp {
  const escaped = field.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`^(["']?)${escaped}\\1\\s*:`);
}

function expectationFor(field: string, issue: z.ZodIssue): string {
  if (issue.code === 'custom') return issue.message;
  if (field === 'tags' || field === 'keywords') return 'must be a list of strings';
  if (field === 'date' || field === 'ms.date') return 'must be a date (YYYY-MM-DD)';
  return 'must be a string';
}

export class FrontmatterService {
  /**
   * Parse markdown content with front matter
   */
  parse(raw: string): ParsedFrontmatter {
    const { text } = splitBom(raw);
    const block = findBlock(text);

    if (block === null) {
      return { data: {}, content: text, hasFrontmatter: false, lineOffset: 0 };
    }

    if ('unclosed' in block) {
      return {
        data: {},
        content: text,
        hasFrontmatter: true,
        error: 'Front matter block is not closed',
        lineOffset: 0,
      };
    }

    try {
      // Passing options bypasses gray-matter's content cache, which shares data objects
      const parsed = matter(text, { delimiters: DELIMITER });
      const data: unknown = parsed.data;

      if (!isMapping(data)) {
        return {
          data: {},
          content: block.content,
          hasFrontmatter: true,
          error: 'Front matter must be a YAML mapping',
          lineOffset: block.lineOffset,
        };
      }

      return {
        data: this.normalizeData(data),
        content: block.content,
        hasFrontmatter: true,
        lineOffset: block.lineOffset,
      };
    } catch (error) {
      logger.debug(`Failed to parse front matter: ${getErrorMessage(error)}`);
      return {
        data: {},
        content: block.content,
        hasFrontmatter: true,
        error: getErrorMessage(error).split('\n')[0],
        lineOffset: block.lineOffset,
      };
    }
  }

  /**
   * Stringify a body with a new front matter block
   */
  stringify(content: string, data: FrontmatterData): string {
    return matter.stringify(content, this.cleanData(data));
  }

  /**
   * Set string fields in a document's front matter. Existing lines for those
   * fields are replaced in place and new fields are appended to the block, so
   * the rest of the block keeps its formatting. A document without front
   * matter gets a new block. The byte order mark and line endings are kept.
   */
  setFields(raw: string, fields: Record<string, string>): string {
    const { bom, text } = splitBom(raw);
    const eol = lineEnding(text);
    const block = findBlock(text);

    if (block === null) {
      const stringified = this.stringify(text, fields);
      return bom + (eol === '\n' ? stringified : stringified.replace(/\r?\n/g, eol));
    }
    if ('unclosed' in block) {
      return raw;
    }

    const yamlLines = [...block.yamlLines];
    for (const [field, value] of Object.entries(fields)) {
      const line = `${field}: ${JSON.stringify(value)}`;
      const index = yamlLines.findIndex(existing => yamlKeyPattern(field).test(existing));
      if (index === -1) {
        yamlLines.push(line);
      } else {
        yamlLines[index] = line;
      }
    }

    return bom + [DELIMITER, ...yamlLines, DELIMITER].join(eol) + eol + block.content;
  }

  /**
   * Check the required fields and the types of known fields
   */
  validate(data: FrontmatterData, requiredFields: string[]): FieldProblem[] {
    const problems: FieldProblem[] = [];

    for (const field of requiredFields) {
      const value = data[field];
      if (value === undefined || (typeof value === 'string' && value.trim() === '')) {
        problems.push({ field, message: `Missing required front matter field "${field}"`, missing: true });
      } else if (typeof value !== 'string') {
        problems.push({ field, message: `Front matter field "${field}" must be a string`, missing: false });
      }
    }

    const result = FrontmatterSchema.safeParse(data);
    if (!result.success) {
      for (const issue of result.error.issues) {
        const field = String(issue.path[0] ?? '');
        if (requiredFields.includes(field)) continue;
        problems.push({
          field,
          message: `Front matter field "${field}" ${expectationFor(field, issue)}`,
          missing: false,
        });
      }
    }

    return problems;
  }

  /**
   * Normalize front matter data
   */
  private normalizeData(data: Record<string, unknown>): FrontmatterData {
    const normalized: FrontmatterData = {};

    for (const [key, value] of Object.entries(data)) {
      if (value === undefined || value === null) {
        continue;
      }

      // YAML turns unquoted dates into Date objects
      if (value instanceof Date) {
        normalized[key] = Number.isNaN(value.getTime()) ? String(value) : value.toISOString().split('T')[0];
      } else {
        normalized[key] = value;
      }
    }

    return normalized;
  }

  /**
   * Clean data before stringifying (remove undefined/null values and empty lists)
   */
  private cleanData(data: FrontmatterData): Record<string, unknown> {
    const cleaned: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (value === undefined || value === null) continue;
      if (Array.isArray(value) && value.length === 0) continue;
      cleaned[key] = value;
    }

    return cleaned;
  }
}

// Export a default instance for convenience
export const frontmatterService = new FrontmatterService();
