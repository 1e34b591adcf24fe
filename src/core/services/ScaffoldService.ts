import type { Corpus, DocId } from '../entities/Document.js';
import { resolveLink } from '../rules/links.js';
import { splitTarget } from '../markdown/scanner.js';
import { renderToc } from '../markdown/toc.js';
import { StoreType } from '../store/DocumentStore.js';
import { deriveTitle } from '../utils/titles.js';
import { joinRel } from '../utils/path-utils.js';
import { ValidationError } from '../utils/errors.js';
import logger from '../utils/logger.js';
import type { ScaffoldConfig } from '../utils/config.js';
import type { DocumentService } from './DocumentService.js';

export type ScaffoldTarget = { kind: 'page'; id: DocId } | { kind: 'directory'; dir: DocId };

export interface ScaffoldOptions {
  dryRun?: boolean;
}

export interface ScaffoldResult {
  created: DocId[];
  skipped: DocId[];
  dryRun: boolean;
}

const pad = (n: number): string => String(n).padStart(2, '0');

export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function targetKey(target: ScaffoldTarget): string {
  return target.kind === 'page' ? target.id : `${target.dir}/`;
}

export class ScaffoldService {
  constructor(
    private readonly documents: DocumentService,
    private readonly config: ScaffoldConfig = { topic: 'article', author: undefined },
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Markdown for a new page that only holds front matter and section stubs
   */
  placeholderPage(title: string): string {
    const fields: [string, string][] = [
      ['title', title],
      ['description', `Documentation for ${title}`],
    ];
    if (this.config.author) fields.push(['author', this.config.author]);
    fields.push(['ms.date', formatDate(this.clock())], ['ms.topic', this.config.topic]);

    return [
      '---',
      ...fields.map(([key, value]) => `${key}: ${JSON.stringify(value)}`),
      '---',
      '',
      `# ${title}`,
      '',
      `This is a placeholder for ${title} content.`,
      '',
      '## Overview',
      '',
      'Content will be added here soon.',
      '',
      '## Topics',
      '',
      'Add topics here.',
      '',
    ].join('\n');
  }

  /**
   * Pages and folders that internal links point at but that do not exist
   */
  findMissingTargets(corpus: Corpus): ScaffoldTarget[] {
    const targets = new Map<string, ScaffoldTarget>();

    for (const doc of corpus.documents) {
      for (const link of doc.links) {
        if (link.kind !== 'relative' && link.kind !== 'site') continue;
        const { path } = splitTarget(link.target);
        if (path === '') continue;

        const resolved = resolveLink(doc, link);
        if (resolved === '..' || resolved.startsWith('../')) continue;

        let target: ScaffoldTarget | null = null;
        if (path.toLowerCase().endsWith('.md')) {
          if (!corpus.files.has(resolved)) target = { kind: 'page', id: resolved };
        } else if (path.endsWith('/') || corpus.directories.has(resolved)) {
          if (!corpus.files.has(joinRel(resolved, 'index.md'))) target = { kind: 'directory', dir: resolved };
        }

        if (target) targets.set(targetKey(target), target);
      }
    }

    return [...targets.values()].sort((a, b) => targetKey(a).localeCompare(targetKey(b)));
  }

  /**
   * Interpret user-supplied paths: `.md` files are pages, anything else a folder
   */
  targetsFromPaths(paths: string[]): ScaffoldTarget[] {
    return paths.map((p): ScaffoldTarget => {
      const normalized = joinRel('', p.replace(/\\/g, '/'));
      if (normalized === '' || normalized === '..' || normalized.startsWith('../')) {
        throw new ValidationError(`Path must stay inside the documentation root: ${p}`);
      }
      return normalized.toLowerCase().endsWith('.md')
        ? { kind: 'page', id: normalized }
        : { kind: 'directory', dir: normalized };
    });
  }

  async scaffoldMissing(options: ScaffoldOptions = {}): Promise<ScaffoldResult> {
    const corpus = await this.documents.loadCorpus();
    return this.scaffold(this.findMissingTargets(corpus), options);
  }

  async scaffoldPaths(paths: string[], options: ScaffoldOptions = {}): Promise<ScaffoldResult> {
    return this.scaffold(this.targetsFromPaths(paths), options);
  }

  /**
   * Create placeholder pages; folders get an index.md and a toc.yml. Existing
   * files are never touched.
   */
  async scaffold(targets: ScaffoldTarget[], options: ScaffoldOptions = {}): Promise<ScaffoldResult> {
    const dryRun = options.dryRun ?? false;
    const result: ScaffoldResult = { created: [], skipped: [], dryRun };

    const write = async (id: DocId, content: string): Promise<void> => {
      if (dryRun) {
        if (await this.documents.store.exists(id)) result.skipped.push(id);
        else result.created.push(id);
        return;
      }
      const stored = await this.documents.store.create(id, content);
      if (stored.type === StoreType.Created) {
        logger.info(`Created ${id}`);
        result.created.push(id);
      } else {
        logger.debug(`${id} already exists - skipping`);
        result.skipped.push(id);
      }
    };

    for (const target of targets) {
      if (target.kind === 'page') {
        await write(target.id, this.placeholderPage(deriveTitle(target.id)));
      } else {
        const index = joinRel(target.dir, 'index.md');
        const title = deriveTitle(index);
        await write(index, this.placeholderPage(title));
        await write(joinRel(target.dir, 'toc.yml'), renderToc([{ name: title, href: 'index.md' }]));
      }
    }

    return result;
  }
}
