/**
 * Cache Orchestrator
 * Returns a usable mirror, downloading one only when the cached copy is invalid
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { CacheConfig, CrawlerConfig } from '../config/schema.js';
import { ErrorCode, PreconditionError, toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { FetchLike, SleepFn } from '../types/cache.js';
import { DocumentationCrawler } from './crawler.js';
import { sleep as defaultSleep } from './fetcher.js';
import { isCacheValid } from './validator.js';

const WRITE_PROBE = '.write_test';

export interface CacheManagerDeps {
  fetchImpl?: FetchLike;
  sleep?: SleepFn;
  freeDiskBytes?: (dir: string) => Promise<number>;
}

export class CacheManager {
  private readonly cache: CacheConfig;
  private readonly crawler: DocumentationCrawler;
  private readonly logger: Logger;

  constructor(cache: CacheConfig, crawler: CrawlerConfig, logger: Logger, deps: CacheManagerDeps = {}) {
    this.cache = cache;
    this.logger = logger;
    this.crawler = new DocumentationCrawler(
      {
        hostSegment: cache.hostSegment,
        pathPrefix: cache.pathPrefix,
        minFreeDiskMb: cache.minFreeDiskMb,
        freeDiskBytes: deps.freeDiskBytes,
        retry: {
          maxRetries: crawler.maxRetries,
          timeout: crawler.requestTimeout,
          userAgent: crawler.userAgent,
          fetchImpl: deps.fetchImpl ?? ((url, init) => fetch(url, init)),
          sleep: deps.sleep ?? defaultSleep,
        },
      },
      logger.child({ component: 'crawler' })
    );
  }

  get cacheDir(): string {
    return this.cache.cacheDir;
  }

  /**
   * Root of the mirrored tree inside the cache directory
   */
  get mirrorRoot(): string {
    return path.join(this.cache.cacheDir, this.cache.hostSegment);
  }

  async isValid(): Promise<boolean> {
    return isCacheValid(this.cache.cacheDir, {
      hostSegment: this.cache.hostSegment,
      minFileCount: this.cache.minFileCount,
      logger: this.logger,
    });
  }

  /**
   * Mirror root of a valid cache, downloading the documentation first when needed
   */
  async getOrRefresh(): Promise<string> {
    if (await this.isValid()) {
      this.logger.debug('Using existing documentation cache', { cacheDir: this.cache.cacheDir });
      return this.mirrorRoot;
    }

    this.logger.info('Documentation cache not found or invalid', { cacheDir: this.cache.cacheDir });

    await this.ensureWritable();

    if (this.cache.skipDownload) {
      throw new PreconditionError(
        `Cache invalid and download skipped (DOCMIRROR_SKIP_DOWNLOAD=true): ${this.cache.cacheDir}`,
        ErrorCode.DOWNLOAD_SKIPPED,
        { cacheDir: this.cache.cacheDir }
      );
    }

    await this.crawler.crawl(this.cache.baseUrl, this.cache.cacheDir);
    return this.mirrorRoot;
  }

  /**
   * Delete the cache and download it again
   */
  async refresh(): Promise<string> {
    this.logger.info('Removing existing cache', { cacheDir: this.cache.cacheDir });
    await fs.rm(this.cache.cacheDir, { recursive: true, force: true });
    return this.getOrRefresh();
  }

  /**
   * Create the cache directory and a probe file inside it
   */
  private async ensureWritable(): Promise<void> {
    const probe = path.join(this.cache.cacheDir, WRITE_PROBE);
    try {
      await fs.mkdir(this.cache.cacheDir, { recursive: true });
      await fs.writeFile(probe, '');
      await fs.rm(probe);
    } catch (error) {
      throw new PreconditionError(
        `No write permission for cache directory: ${this.cache.cacheDir}`,
        ErrorCode.CACHE_NOT_WRITABLE,
        { cacheDir: this.cache.cacheDir },
        toError(error)
      );
    }
  }
}

export { isCacheValid } from './validator.js';
export { DocumentationCrawler, CrawlFrontier } from './crawler.js';
export { downloadWithRetry } from './fetcher.js';
export { shouldDownload, normalizeUrlKey, urlToMirrorPath } from './scope.js';
export { readManifest, MANIFEST_FILE } from './manifest.js';
