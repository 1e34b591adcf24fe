import fs from 'node:fs/promises';
import * as path from 'node:path';
import type { DocId, RawDocument } from '../entities/Document.js';
import { toAbs, type AbsPath } from '../utils/path-utils.js';
import { FileSystemError } from '../utils/errors.js';

export type StoreResult =
  | { type: StoreType.Created }
  | {
      type: StoreType.Updated;
      oldContent: string;
    }
  | { type: StoreType.Skipped };

export enum StoreType {
  Created = 'created',
  Updated = 'updated',
  Skipped = 'skipped',
}

export interface DocumentStore {
  readonly root: AbsPath;

  /** Read a file, or null if it doesn't exist */
  get(id: DocId): Promise<RawDocument | null>;

  /** Overwrite the file with raw content, creating folders as needed */
  store(id: DocId, raw: string): Promise<StoreResult>;

  /** Write the file only when nothing exists at that path */
  create(id: DocId, raw: string): Promise<StoreResult>;

  /** Quick existence check without reading the file */
  exists(id: DocId): Promise<boolean>;

  /** Copy a file to `<file><suffix>` unless that copy already exists */
  backup(id: DocId, suffix: string): Promise<boolean>;

  /** Delete a file */
  remove(id: DocId): Promise<void>;
}

export class FileSystemDocumentStore implements DocumentStore {
  constructor(public readonly root: AbsPath) {}

  async get(id: DocId): Promise<RawDocument | null> {
    const fullPath = toAbs(this.root, id);
    try {
      const body = await fs.readFile(fullPath, 'utf8');
      return { id, body, fullPath };
    } catch (error) {
      if (isMissing(error)) return null;
      throw new FileSystemError(`Cannot read ${id}`, { cause: error, context: { path: fullPath } });
    }
  }

  async store(id: DocId, rawContent: string): Promise<StoreResult> {
    const fullPath = await this.prepareFolder(id);
    const existing = await this.get(id);

    await this.write(id, fullPath, rawContent);

    return existing ? { type: StoreType.Updated, oldContent: existing.body } : { type: StoreType.Created };
  }

  async create(id: DocId, rawContent: string): Promise<StoreResult> {
    const fullPath = await this.prepareFolder(id);
    try {
      await fs.writeFile(fullPath, rawContent, { encoding: 'utf8', flag: 'wx' });
      return { type: StoreType.Created };
    } catch (error) {
      if (isAlreadyThere(error)) return { type: StoreType.Skipped };
      throw new FileSystemError(`Cannot create ${id}`, { cause: error, context: { path: fullPath } });
    }
  }

  async exists(id: DocId): Promise<boolean> {
    try {
      await fs.access(toAbs(this.root, id));
      return true;
    } catch {
      return false;
    }
  }

  async backup(id: DocId, suffix: string): Promise<boolean> {
    const fullPath = toAbs(this.root, id);
    try {
      await fs.copyFile(fullPath, `${fullPath}${suffix}`, fs.constants.COPYFILE_EXCL);
      return true;
    } catch (error) {
      if (isAlreadyThere(error)) return false;
      throw new FileSystemError(`Cannot back up ${id}`, { cause: error, context: { path: fullPath } });
    }
  }

  async remove(id: DocId): Promise<void> {
    const fullPath = toAbs(this.root, id);
    try {
      await fs.unlink(fullPath);
    } catch (error) {
      throw new FileSystemError(`Cannot remove ${id}`, { cause: error, context: { path: fullPath } });
    }
  }

  /* ------------------------------------------------------------------ Helpers */
  private async prepareFolder(id: DocId): Promise<string> {
    const fullPath = toAbs(this.root, id);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    return fullPath;
  }

  private async write(id: DocId, fullPath: string, content: string): Promise<void> {
    try {
      await fs.writeFile(fullPath, content, 'utf8');
    } catch (error) {
      throw new FileSystemError(`Cannot write ${id}`, { cause: error, context: { path: fullPath } });
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

const isMissing = (error: unknown): boolean => errorCode(error) === 'ENOENT';
const isAlreadyThere = (error: unknown): boolean => errorCode(error) === 'EEXIST';
