import { describe, it, expect, beforeEach } from 'vitest';
import { handleFix } from './fix.js';
import { handleScaffold } from './scaffold.js';
import { handleCleanBackups } from './cleanBackups.js';
import { buildConfig, configSchema, type DocsConfig } from '../../core/utils/config.js';
import { corpusFileExists, page, readCorpusFile, writeCorpus } from '../../tests/corpus.js';

describe('write commands', () => {
  let root: string;
  let config: DocsConfig;
  let output: string[];
  const write = (text: string) => output.push(text);

  beforeEach(async () => {
    root = await writeCorpus({
      'index.md': page('Home', '# Home\n\n[Guides](guides/)\n[Tools](tools/nmap.md)\n'),
      'guides/index.md': page('Guides', '# Guides\n'),
      'old.md.bak': 'backup',
    });
    config = buildConfig(configSchema.parse({ DOCS_AUTHOR: 'Docs Team' }), root);
    output = [];
  });

  describe('fix', () => {
    it('should apply fixes and print a summary', async () => {
      const code = await handleFix({ root, color: false, backup: true }, { config, write });

      expect(code).toBe(0);
      expect(output).toEqual(['index.md: fixed 1 issue\n     8  link-directory\n1 fix in 1 file, 1 backup written']);
      expect(await readCorpusFile(root, 'index.md')).toContain('[Guides](guides/index.md)');
    });

    it('should print JSON without file contents', async () => {
      await handleFix({ root, dryRun: true, format: 'json' }, { config, write });

      const summary = JSON.parse(output[0]);
      expect(summary.dryRun).toBe(true);
      expect(summary.results[0]).toEqual({
        docId: 'index.md',
        applied: [expect.objectContaining({ rule: 'link-directory' })],
        skipped: [],
        changed: true,
      });
    });
  });

  describe('scaffold', () => {
    it('should create missing link targets with the configured author', async () => {
      await handleScaffold([], { root, color: false }, { config, write });

      expect(output).toEqual(['+ tools/nmap.md\ncreated 1 file, skipped 0']);
      expect(await readCorpusFile(root, 'tools/nmap.md')).toContain('author: "Docs Team"');
    });

    it('should create the given paths', async () => {
      await handleScaffold(['reference'], { root, color: false, dryRun: true }, { config, write });

      expect(output).toEqual([
        '+ reference/index.md\n+ reference/toc.yml\nDry run: would create 2 files, skipped 0',
      ]);
    });
  });

  describe('clean-backups', () => {
    it('should remove backup files and print their paths', async () => {
      await handleCleanBackups({ root }, { config, write });

      expect(output).toEqual(['old.md.bak']);
      expect(await corpusFileExists(root, 'old.md.bak')).toBe(false);
    });
  });
});
