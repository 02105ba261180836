/**
 * Documentation Indexer
 * Walks a mirror and upserts one record per HTML page into the store
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { DocumentRecord, IndexBuildResult } from '../types/docs.js';
import { CheerioHtmlParser, type HtmlParser } from './parser.js';
import { scanDirectory, toRelativePath } from './scanner.js';
import type { DocumentStore } from './store.js';

export class DocumentIndexer {
  private readonly store: DocumentStore;
  private readonly logger: Logger;
  private readonly parser: HtmlParser;

  constructor(store: DocumentStore, logger: Logger, parser: HtmlParser = new CheerioHtmlParser()) {
    this.store = store;
    this.logger = logger;
    this.parser = parser;
  }

  /**
   * Index every HTML file under `mirrorRoot`. Re-running over unchanged
   * files leaves the store as it was.
   */
  async rebuildIndex(mirrorRoot: string): Promise<IndexBuildResult> {
    const startTime = Date.now();
    const scan = await scanDirectory(mirrorRoot);

    if (scan.errors.length > 0) {
      this.logger.warn(`Scan completed with ${scan.errors.length} errors`, { errors: scan.errors });
    }

    const records: DocumentRecord[] = [];
    let failed = 0;

    for (const file of scan.htmlFiles) {
      try {
        records.push(await this.indexFile(file, mirrorRoot));
      } catch (error) {
        failed++;
        this.logger.warn(`Failed to index ${file}`, { error: toError(error).message });
      }
    }

    this.store.upsertMany(records);

    return {
      indexed: records.length,
      failed,
      duration: Date.now() - startTime,
    };
  }

  /**
   * Build the index only when the store holds no records yet
   */
  async ensureIndex(mirrorRoot: string): Promise<IndexBuildResult | null> {
    if (this.store.count() > 0) {
      this.logger.debug('Search index already built', { dbPath: this.store.dbPath });
      return null;
    }

    this.logger.info('Building search index...', { mirrorRoot });
    const result = await this.rebuildIndex(mirrorRoot);
    this.logger.info('Search index built successfully', { ...result });
    return result;
  }

  /**
   * Extract the record for one file
   */
  private async indexFile(filePath: string, mirrorRoot: string): Promise<DocumentRecord> {
    const relativePath = toRelativePath(mirrorRoot, filePath);
    const [buffer, stats] = await Promise.all([fs.readFile(filePath), fs.stat(filePath)]);

    // Invalid UTF-8 sequences decode to U+FFFD instead of failing
    const parsed = this.parser.parse(buffer.toString('utf-8'), path.basename(filePath, path.extname(filePath)));

    return {
      path: relativePath,
      title: parsed.title,
      content: parsed.text,
      url: parsed.canonicalUrl ?? relativePath,
      lastModified: stats.mtimeMs / 1000,
    };
  }
}
