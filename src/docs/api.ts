/**
 * Query Engine
 * Read-only operations over the document store and the mirror on disk
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import Database from 'better-sqlite3';
import type {
  ArchiveStats,
  PageContent,
  PageLink,
  PageSummary,
  QueryResult,
  SearchHit,
} from '../types/docs.js';
import { CheerioHtmlParser, type HtmlParser } from './parser.js';
import { resolveInArchive } from './paths.js';
import { scanDirectory } from './scanner.js';
import type { DocumentStore } from './store.js';

function stem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export class ArchiveQueryEngine {
  readonly archivePath: string;
  private readonly store: DocumentStore;
  private readonly parser: HtmlParser;

  constructor(archivePath: string, store: DocumentStore, parser: HtmlParser = new CheerioHtmlParser()) {
    this.archivePath = archivePath;
    this.store = store;
    this.parser = parser;
  }

  /**
   * Ranked or substring search, depending on the store's strategy.
   * An FTS query the engine cannot parse comes back as a failed result.
   */
  async search(query: string, limit: number): Promise<QueryResult<SearchHit[]>> {
    const strategy = this.store.searchStrategy;
    try {
      const hits = this.store.withConnection(db => strategy.search(db, query, limit));
      return { success: true, data: hits };
    } catch (error) {
      if (error instanceof Database.SqliteError) {
        return { success: false, error: `Search failed for query '${query}': ${error.message}` };
      }
      throw error;
    }
  }

  async getPage(requested: string, includeRaw = false): Promise<QueryResult<PageContent>> {
    const entry = await resolveInArchive(this.archivePath, requested);
    switch (entry.kind) {
      case 'outside':
        return { success: false, error: `Path '${requested}' is outside the archive or invalid` };
      case 'missing':
        return { success: false, error: `File '${requested}' not found in archive` };
      case 'directory':
        return { success: false, error: `Path '${requested}' is a directory, not a file` };
    }

    const buffer = await fs.readFile(entry.absolutePath);
    const raw = buffer.toString('utf-8');
    const parsed = this.parser.parse(raw, stem(entry.absolutePath));

    return {
      success: true,
      data: {
        path: requested,
        title: parsed.title,
        size: buffer.length,
        text: parsed.text,
        ...(includeRaw ? { raw } : {}),
      },
    };
  }

  async listPages(filterPattern: string | undefined, limit: number): Promise<QueryResult<PageSummary[]>> {
    return { success: true, data: this.store.listPages(filterPattern, limit) };
  }

  /**
   * Anchors of a page. With `internalOnly`, keep same-page fragments and
   * links that resolve to an existing entry inside the archive; a leading
   * `/` is taken relative to the archive root.
   */
  async extractLinks(requested: string, internalOnly = true): Promise<QueryResult<PageLink[]>> {
    const entry = await resolveInArchive(this.archivePath, requested);
    switch (entry.kind) {
      case 'outside':
        return { success: false, error: `Invalid path '${requested}'` };
      case 'missing':
        return { success: false, error: `File '${requested}' not found` };
      case 'directory':
        return { success: false, error: `Path '${requested}' is a directory, not a file` };
    }

    const html = (await fs.readFile(entry.absolutePath)).toString('utf-8');
    const { links } = this.parser.parse(html, stem(entry.absolutePath));

    if (!internalOnly) {
      return { success: true, data: links };
    }

    const currentDir = path.posix.dirname(requested.split(path.sep).join('/'));
    const internal: PageLink[] = [];

    for (const link of links) {
      if (link.href.startsWith('http')) {
        continue;
      }

      const target = link.href.split('#')[0]?.split('?')[0] ?? '';
      if (!target) {
        if (link.href.startsWith('#')) {
          internal.push(link);
        }
        continue;
      }

      const linkPath = target.startsWith('/')
        ? target.replace(/^\/+/, '')
        : path.posix.join(currentDir, target);

      const resolved = await resolveInArchive(this.archivePath, path.posix.normalize(linkPath));
      if (resolved.kind === 'file' || resolved.kind === 'directory') {
        internal.push(link);
      }
    }

    return { success: true, data: internal };
  }

  async getArchiveStats(): Promise<QueryResult<ArchiveStats>> {
    // Every file on disk counts, the index database and manifest included
    const scan = await scanDirectory(this.archivePath, { includeHidden: true });
    return {
      success: true,
      data: {
        archivePath: this.archivePath,
        htmlFiles: scan.htmlFiles.length,
        otherFiles: scan.otherFiles.length,
        totalSize: scan.totalSize,
        indexedPages: this.store.count(),
        searchMode: this.store.searchMode,
      },
    };
  }
}
