import fg from 'fast-glob';
import type { Corpus, Document, DocId, RawDocument, TocFile } from '../entities/Document.js';
import { FileSystemDocumentStore, type DocumentStore } from '../store/DocumentStore.js';
import { FrontmatterService, frontmatterService } from './FrontmatterService.js';
import { scanMarkdown } from '../markdown/scanner.js';
import { deriveTitle } from '../utils/titles.js';
import { ancestorsOf, toAbs } from '../utils/path-utils.js';
import { DEFAULT_IGNORE } from '../utils/config.js';
import logger from '../utils/logger.js';
export type { DocId };

export interface DocumentServiceOptions {
  root: string;
  ignore?: string[];
  store?: DocumentStore;
  frontmatter?: FrontmatterService;
}

export class DocumentService {
  readonly root: string;
  readonly store: DocumentStore;
  private readonly ignore: string[];
  private readonly frontmatter: FrontmatterService;

  constructor(options: DocumentServiceOptions) {
    this.root = options.root;
    this.ignore = options.ignore ?? DEFAULT_IGNORE;
    this.store = options.store ?? new FileSystemDocumentStore(options.root);
    this.frontmatter = options.frontmatter ?? frontmatterService;
  }

  /** Every file under the root that is not ignored, sorted */
  async listFiles(pattern: string | string[] = '**/*'): Promise<string[]> {
    const paths = await fg(pattern, {
      cwd: this.root,
      dot: false,
      onlyFiles: true,
      ignore: this.ignore,
    });
    return paths.sort();
  }

  async listDocumentIds(): Promise<DocId[]> {
    return this.listFiles('**/*.md');
  }

  async listDocuments(): Promise<Document[]> {
    const ids = await this.listDocumentIds();
    const documents = await Promise.all(ids.map(id => this.getDocument(id)));
    return documents.filter((doc): doc is Document => doc !== null);
  }

  async getDocument(id: DocId): Promise<Document | null> {
    const raw = await this.store.get(id);
    if (!raw) return null;
    return this.hydrate(raw);
  }

  /**
   * Parse front matter and scan the body of a raw document
   */
  hydrate(raw: RawDocument): Document {
    const parsed = this.frontmatter.parse(raw.body);
    const scan = scanMarkdown(parsed.content, parsed.lineOffset);

    const fmTitle = parsed.data.title;
    const h1 = scan.headings.find(h => h.depth === 1);
    const title =
      typeof fmTitle === 'string' && fmTitle.trim() ? fmTitle.trim() : h1?.text || deriveTitle(raw.id);

    return {
      ...raw,
      title,
      frontmatter: parsed.data,
      hasFrontmatter: parsed.hasFrontmatter,
      frontmatterError: parsed.error,
      lineOffset: parsed.lineOffset,
      content: parsed.content,
      ...scan,
    };
  }

  /**
   * Load every document, the file and directory sets used to resolve links,
   * and the toc.yml files
   */
  async loadCorpus(): Promise<Corpus> {
    const files = await this.listFiles();
    const directories = new Set<string>(['']);
    for (const file of files) {
      for (const dir of ancestorsOf(file)) directories.add(dir);
    }

    const documentIds = files.filter(file => file.toLowerCase().endsWith('.md'));
    const loaded = await Promise.all(documentIds.map(id => this.getDocument(id)));
    const documents = loaded.filter((doc): doc is Document => doc !== null);

    const tocs: TocFile[] = [];
    for (const file of files.filter(f => f === 'toc.yml' || f.endsWith('/toc.yml'))) {
      const raw = await this.store.get(file);
      if (raw) tocs.push({ id: file, fullPath: toAbs(this.root, file), raw: raw.body });
    }

    logger.debug(`Loaded ${documents.length} documents and ${tocs.length} toc files from ${this.root}`);

    return {
      root: this.root,
      documents,
      files: new Set(files),
      directories,
      tocs,
    };
  }
}
