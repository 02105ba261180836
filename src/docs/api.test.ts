/**
 * Unit tests for the archive query engine
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { ServerContext } from '../context.js';
import { StoreError } from '../errors/index.js';
import {
  FIXTURE_PAGES,
  createFixtureContext,
  createTestLogger,
  makeTempDir,
  removeDir,
  writeFiles,
} from '../__tests__/utils.js';
import { ArchiveQueryEngine } from './api.js';
import { DATABASE_FILE, DocumentStore } from './store.js';

function fixtureBytes(name: string): number {
  return Buffer.byteLength(FIXTURE_PAGES[name] ?? '');
}

describe('ArchiveQueryEngine', () => {
  let archive: string;
  let context: ServerContext;

  beforeEach(async () => {
    archive = await makeTempDir();
    context = await createFixtureContext(archive);
  });

  afterEach(async () => {
    await removeDir(archive);
  });

  describe('search', () => {
    it('should find pages by content', async () => {
      const result = await context.query.search('ephemeris', 10);

      expect(result.success).toBe(true);
      const paths = result.success ? result.data.map(hit => hit.path).sort() : [];
      expect(paths).toEqual(['page_kernels.html', 'page_time.html']);
    });

    it('should return an empty list when nothing matches', async () => {
      await expect(context.query.search('nonexistent', 10)).resolves.toEqual({ success: true, data: [] });
    });

    it('should report malformed full-text queries as a failed result', async () => {
      const result = await context.query.search('"unterminated', 10);

      expect(result.success).toBe(false);
      expect(result.success ? '' : result.error).toMatch(/^Search failed for query '"unterminated': /);
    });

    it('should throw when the store was never initialized', async () => {
      const store = new DocumentStore(path.join(archive, 'never.db'), { enableFullText: true }, createTestLogger());
      const engine = new ArchiveQueryEngine(archive, store);

      await expect(engine.search('ephemeris', 10)).rejects.toBeInstanceOf(StoreError);
    });

    it('should search by substring in fallback mode', async () => {
      const fallbackRoot = await makeTempDir();
      try {
        const fallback = await createFixtureContext(fallbackRoot, false);
        const result = await fallback.query.search('EPHEMERIS', 10);

        const paths = result.success ? result.data.map(hit => hit.path) : [];
        expect(paths.sort()).toEqual(['page_kernels.html', 'page_time.html']);
      } finally {
        await removeDir(fallbackRoot);
      }
    });
  });

  describe('getPage', () => {
    it('should return title, size and text of a nested page', async () => {
      const result = await context.query.getPage('subdir/deep/deeper.html');

      expect(result).toEqual({
        success: true,
        data: {
          path: 'subdir/deep/deeper.html',
          title: 'Deeply Nested Page',
          size: fixtureBytes('subdir/deep/deeper.html'),
          text: 'Deeply Nested Page Deeply Nested Page A page two directories down. See also: ../../index.html | ../nested.html',
        },
      });
    });

    it('should include the raw HTML on request', async () => {
      const result = await context.query.getPage('index.html', true);

      expect(result.success ? result.data.raw : undefined).toBe(FIXTURE_PAGES['index.html']);
    });

    it('should reject paths that leave the archive', async () => {
      await expect(context.query.getPage('../../etc/passwd')).resolves.toEqual({
        success: false,
        error: "Path '../../etc/passwd' is outside the archive or invalid",
      });
      await expect(context.query.getPage('/etc/passwd')).resolves.toEqual({
        success: false,
        error: "Path '/etc/passwd' is outside the archive or invalid",
      });
    });

    it('should reject symlinks pointing outside the archive', async () => {
      const outside = await makeTempDir();
      try {
        await writeFiles(outside, { 'secret.html': '<title>Secret</title>' });
        await fs.symlink(path.join(outside, 'secret.html'), path.join(archive, 'link.html'));

        const result = await context.query.getPage('link.html');

        expect(result).toEqual({ success: false, error: "Path 'link.html' is outside the archive or invalid" });
      } finally {
        await removeDir(outside);
      }
    });

    it('should report missing files', async () => {
      await expect(context.query.getPage('nope.html')).resolves.toEqual({
        success: false,
        error: "File 'nope.html' not found in archive",
      });
    });

    it('should reject directories', async () => {
      await expect(context.query.getPage('subdir')).resolves.toEqual({
        success: false,
        error: "Path 'subdir' is a directory, not a file",
      });
    });
  });

  describe('listPages', () => {
    it('should list every indexed page in path order', async () => {
      const result = await context.query.listPages(undefined, 50);

      expect(result.success ? result.data.map(page => page.path) : []).toEqual([
        'index.html',
        'page_kernels.html',
        'page_links.html',
        'page_time.html',
        'subdir/deep/deeper.html',
        'subdir/nested.html',
      ]);
    });

    it('should treat malformed glob patterns as matching nothing', async () => {
      for (const pattern of ['[', '[z-a]', '\\']) {
        expect(await context.query.listPages(pattern, 50)).toEqual({ success: true, data: [] });
      }
    });

    it('should filter by glob pattern', async () => {
      const result = await context.query.listPages('subdir/*', 50);

      expect(result.success ? result.data.map(page => page.path) : []).toEqual([
        'subdir/deep/deeper.html',
        'subdir/nested.html',
      ]);
    });
  });

  describe('extractLinks', () => {
    it('should keep links that resolve inside the archive and fragment anchors', async () => {
      const result = await context.query.extractLinks('page_links.html', true);

      expect(result.success ? result.data : []).toEqual([
        { href: 'index.html', text: 'index.html' },
        { href: './page_kernels.html', text: './page_kernels.html' },
        { href: 'subdir/nested.html', text: 'subdir/nested.html' },
        { href: '#top', text: '#top' },
      ]);
    });

    it('should return every anchor when not filtering', async () => {
      const result = await context.query.extractLinks('page_links.html', false);

      expect(result.success ? result.data.map(link => link.href) : []).toEqual([
        'index.html',
        './page_kernels.html',
        'subdir/nested.html',
        'missing.html',
        '#top',
        'https://docs.example.org/',
        'https://example.com/test',
      ]);
    });

    it('should resolve relative links against the page directory', async () => {
      const result = await context.query.extractLinks('subdir/deep/deeper.html', true);

      expect(result.success ? result.data.map(link => link.href) : []).toEqual(['../../index.html', '../nested.html']);
    });

    it('should resolve root-relative links against the archive root', async () => {
      await writeFiles(archive, {
        'subdir/rooted.html': [
          '<a href="/page_time.html">a</a>',
          '<a href="/nope.html">b</a>',
          '<a href="../page_time.html?x=1#frag">c</a>',
          '<a href="../../outside.html">d</a>',
        ].join(''),
      });

      const result = await context.query.extractLinks('subdir/rooted.html', true);

      expect(result.success ? result.data.map(link => link.href) : []).toEqual([
        '/page_time.html',
        '../page_time.html?x=1#frag',
      ]);
    });

    it('should reject invalid and missing paths', async () => {
      await expect(context.query.extractLinks('../x.html', true)).resolves.toEqual({
        success: false,
        error: "Invalid path '../x.html'",
      });
      await expect(context.query.extractLinks('nope.html', true)).resolves.toEqual({
        success: false,
        error: "File 'nope.html' not found",
      });
    });
  });

  describe('getArchiveStats', () => {
    it('should count files, size, indexed pages and search mode', async () => {
      await writeFiles(archive, { 'notes.txt': 'plain text' });
      const { size: databaseSize } = await fs.stat(path.join(archive, DATABASE_FILE));
      const expectedSize = Object.keys(FIXTURE_PAGES).reduce((sum, name) => sum + fixtureBytes(name), 0) + 10 + databaseSize;

      const result = await context.query.getArchiveStats();

      expect(result).toEqual({
        success: true,
        data: {
          archivePath: archive,
          htmlFiles: 6,
          otherFiles: 2,
          totalSize: expectedSize,
          indexedPages: 6,
          searchMode: 'fulltext',
        },
      });
    });
  });
});
