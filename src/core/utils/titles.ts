import path from 'node:path';
import type { DocId } from '../entities/Document.js';

/**
 * Human title for a page that has none: the file name (the folder name for an
 * index page) without its `NN-` ordering prefix, with dashes and underscores
 * turned into spaces and every word capitalized.
 *
 * `security/pgp/03-key-management.md` → `Key Management`
 */
export function deriveTitle(id: DocId): string {
  const parsed = path.posix.parse(id.replace(/\/+$/, ''));
  let base = parsed.ext.toLowerCase() === '.md' ? parsed.name : parsed.base;

  if (base.toLowerCase() === 'index') {
    const parent = path.posix.basename(parsed.dir);
    base = parent || 'Home';
  }

  const words = base
    .replace(/^\d+[-_]/, '')
    .split(/[-_\s]+/)
    .filter(Boolean);

  return words.map(word => word[0].toUpperCase() + word.slice(1)).join(' ');
}
