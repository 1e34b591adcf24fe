import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { FileSystemDocumentStore, StoreType } from './DocumentStore.js';
import { FileSystemError } from '../utils/errors.js';

describe('FileSystemDocumentStore', () => {
  let store: FileSystemDocumentStore;
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docstore-test-'));
    store = new FileSystemDocumentStore(testDir);
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('get', () => {
    it('should read an existing document', async () => {
      await fs.mkdir(path.join(testDir, 'guides'), { recursive: true });
      await fs.writeFile(path.join(testDir, 'guides', 'rag.md'), '# RAG\n');

      const result = await store.get('guides/rag.md');

      expect(result).toEqual({
        id: 'guides/rag.md',
        body: '# RAG\n',
        fullPath: path.join(testDir, 'guides', 'rag.md'),
      });
    });

    it('should return null for a missing document', async () => {
      expect(await store.get('missing.md')).toBeNull();
    });

    it('should wrap other read failures', async () => {
      await fs.mkdir(path.join(testDir, 'folder.md'));

      await expect(store.get('folder.md')).rejects.toBeInstanceOf(FileSystemError);
    });
  });

  describe('store', () => {
    it('should create folders and report creation', async () => {
      const result = await store.store('a/b/new.md', 'content');

      expect(result).toEqual({ type: StoreType.Created });
      expect(await fs.readFile(path.join(testDir, 'a', 'b', 'new.md'), 'utf8')).toBe('content');
    });

    it('should report the previous content on update', async () => {
      await store.store('page.md', 'old');

      const result = await store.store('page.md', 'new');

      expect(result).toEqual({ type: StoreType.Updated, oldContent: 'old' });
      expect(await fs.readFile(path.join(testDir, 'page.md'), 'utf8')).toBe('new');
    });
  });

  describe('create', () => {
    it('should never overwrite an existing file', async () => {
      await store.store('page.md', 'keep me');

      const result = await store.create('page.md', 'placeholder');

      expect(result).toEqual({ type: StoreType.Skipped });
      expect(await fs.readFile(path.join(testDir, 'page.md'), 'utf8')).toBe('keep me');
    });

    it('should create a missing file', async () => {
      expect(await store.create('docs/new.md', 'x')).toEqual({ type: StoreType.Created });
      expect(await store.exists('docs/new.md')).toBe(true);
    });
  });

  describe('backup', () => {
    it('should copy the file once and keep the first copy', async () => {
      await store.store('page.md', 'v1');

      expect(await store.backup('page.md', '.bak')).toBe(true);
      await store.store('page.md', 'v2');
      expect(await store.backup('page.md', '.bak')).toBe(false);

      expect(await fs.readFile(path.join(testDir, 'page.md.bak'), 'utf8')).toBe('v1');
    });
  });

  describe('remove', () => {
    it('should delete the file', async () => {
      await store.store('page.md', 'x');

      await store.remove('page.md');

      expect(await store.exists('page.md')).toBe(false);
    });

    it('should fail for a missing file', async () => {
      await expect(store.remove('nope.md')).rejects.toThrow('Cannot remove nope.md');
    });
  });
});
