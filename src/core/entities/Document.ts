import type { RelPath } from '../utils/path-utils.js';

/** POSIX path of a file relative to the corpus root */
export type DocId = RelPath;

export type RawDocument = {
  id: DocId;
  body: string;
  fullPath: string;
};

export type FrontmatterValue = unknown;
export type FrontmatterData = Record<string, FrontmatterValue>;

export type Heading = {
  depth: number;
  text: string;
  slug: string;
  line: number;
};

export type LinkKind = 'external' | 'anchor' | 'site' | 'relative';

export type Link = {
  text: string;
  /** Target exactly as written, without surrounding angle brackets or title */
  target: string;
  kind: LinkKind;
  line: number;
  image: boolean;
  /** Text of the closest heading above the link */
  section?: string;
};

export type CodeFence = {
  /** First word of the info string, lowercased; empty when none was given */
  lang: string;
  fence: string;
  openLine: number;
  /** Line of the closing fence, or null when the fence runs to the end of the file */
  closeLine: number | null;
  content: string[];
};

export type DocumentMeta = {
  id: DocId;
  /** Title from front matter, first H1, or file name */
  title: string;
  frontmatter: FrontmatterData;
  hasFrontmatter: boolean;
  /** Set when the front matter block exists but cannot be parsed */
  frontmatterError?: string;
  /** Number of file lines that precede the body (front matter block) */
  lineOffset: number;
  headings: Heading[];
  links: Link[];
  fences: CodeFence[];
};

export type Document = DocumentMeta & RawDocument & {
  /** Markdown body without the front matter block */
  content: string;
};

export type TocEntry = {
  name: string;
  href?: string;
  items: TocEntry[];
  line: number;
};

export type TocFile = {
  id: DocId;
  fullPath: string;
  raw: string;
};

export interface Corpus {
  root: string;
  documents: Document[];
  /** Every file under the root, as corpus-relative POSIX paths */
  files: Set<string>;
  /** Every directory that contains at least one file, including '' for the root */
  directories: Set<string>;
  tocs: TocFile[];
}
