/**
 * Scoped Crawler
 * Breadth-first download of one documentation tree into a temporary
 * directory, published over the cache directory only once it is complete.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  DocMirrorError,
  ErrorCode,
  ErrorSeverity,
  HttpStatusError,
  PreconditionError,
  toError,
} from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { CacheManifest, RetryOptions } from '../types/cache.js';
import { extractHrefs } from '../docs/parser.js';
import { downloadWithRetry } from './fetcher.js';
import { createManifest, writeManifest } from './manifest.js';
import { normalizeUrlKey, resolveLink, shouldDownload, urlToMirrorPath } from './scope.js';

export const TEMP_DIR_NAME = '.docmirror-download-tmp';
export const PREVIOUS_DIR_NAME = '.docmirror-previous';

const PROGRESS_INTERVAL = 50;
const BYTES_PER_MB = 1024 * 1024;

export interface CrawlerOptions {
  hostSegment: string;
  pathPrefix: string;
  minFreeDiskMb: number;
  retry: RetryOptions;
  /** Free bytes available to the filesystem holding `dir` */
  freeDiskBytes?: (dir: string) => Promise<number>;
}

/**
 * BFS state for one crawl: visited keys and a FIFO of pending URLs
 */
export class CrawlFrontier {
  private readonly queue: string[] = [];
  private head = 0;
  private readonly visited = new Set<string>();

  constructor(start: string) {
    this.queue.push(start);
  }

  enqueue(url: string): void {
    this.queue.push(url);
  }

  /**
   * Next URL whose key has not been seen yet, marking it visited
   */
  next(): string | undefined {
    while (this.head < this.queue.length) {
      const url = this.queue[this.head++];
      if (url === undefined) {
        continue;
      }
      const key = normalizeUrlKey(url);
      if (this.visited.has(key)) {
        continue;
      }
      this.visited.add(key);
      return url;
    }
    return undefined;
  }

  get visitedCount(): number {
    return this.visited.size;
  }
}

async function statfsFreeBytes(dir: string): Promise<number> {
  const stats = await fs.statfs(dir);
  return stats.bavail * stats.bsize;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export class DocumentationCrawler {
  private readonly options: CrawlerOptions;
  private readonly logger: Logger;

  constructor(options: CrawlerOptions, logger: Logger) {
    this.options = options;
    this.logger = logger;
  }

  /**
   * Crawl `baseUrl` and publish the result as `cacheDir`.
   * On failure nothing of the new crawl survives and a previous
   * mirror in `cacheDir` is left as it was.
   */
  async crawl(baseUrl: string, cacheDir: string): Promise<CacheManifest> {
    const target = path.resolve(cacheDir);
    const parent = path.dirname(target);
    const tempDir = path.join(parent, TEMP_DIR_NAME);

    this.logger.info('Downloading documentation', { baseUrl, cacheDir: target });

    if (await pathExists(tempDir)) {
      this.logger.warn('Removing incomplete download', { tempDir });
      await fs.rm(tempDir, { recursive: true, force: true });
    }
    await fs.mkdir(tempDir, { recursive: true });

    try {
      await this.checkDiskSpace(tempDir);

      const fileCount = await this.download(baseUrl, tempDir);
      this.logger.info(`Downloaded ${fileCount} files successfully`);

      const manifest = createManifest(baseUrl, fileCount);
      await writeManifest(tempDir, manifest);

      await this.publish(tempDir, target);
      this.logger.info('Documentation cached successfully', { cacheDir: target });
      return manifest;
    } catch (error) {
      await fs.rm(tempDir, { recursive: true, force: true });
      throw error;
    }
  }

  /**
   * Fail before any network activity when the disk is nearly full
   */
  private async checkDiskSpace(dir: string): Promise<void> {
    const freeBytes = await (this.options.freeDiskBytes ?? statfsFreeBytes)(dir);
    const availableMb = freeBytes / BYTES_PER_MB;
    if (availableMb < this.options.minFreeDiskMb) {
      throw new PreconditionError(
        `Insufficient disk space: ${availableMb.toFixed(1)} MB available, ${this.options.minFreeDiskMb} MB required`,
        ErrorCode.INSUFFICIENT_DISK_SPACE,
        { dir, availableMb, requiredMb: this.options.minFreeDiskMb }
      );
    }
  }

  /**
   * BFS over the in-scope pages; returns the number of files saved
   */
  private async download(baseUrl: string, tempDir: string): Promise<number> {
    const { hostSegment, pathPrefix, retry } = this.options;
    const frontier = new CrawlFrontier(baseUrl);
    const mirrorDir = path.join(tempDir, hostSegment);
    let fileCount = 0;
    let skipped = 0;

    for (let url = frontier.next(); url !== undefined; url = frontier.next()) {
      if (!shouldDownload(url, baseUrl, pathPrefix)) {
        continue;
      }

      let body: Buffer;
      try {
        body = await downloadWithRetry(url, retry, this.logger);
      } catch (error) {
        if (error instanceof HttpStatusError && error.isNotFound) {
          skipped++;
          continue;
        }
        this.logger.error(`Failed to download ${url}`, toError(error));
        throw error;
      }

      const savePath = path.join(mirrorDir, urlToMirrorPath(url));
      await fs.mkdir(path.dirname(savePath), { recursive: true });
      await fs.writeFile(savePath, body);
      fileCount++;

      if (fileCount % PROGRESS_INTERVAL === 0) {
        this.logger.info(`Downloaded ${fileCount} files...`);
      }

      let hrefs: string[];
      try {
        hrefs = extractHrefs(body.toString('utf-8'));
      } catch (error) {
        this.logger.warn(`Failed to parse links from ${url}`, { error: toError(error).message });
        continue;
      }

      for (const href of hrefs) {
        const absolute = resolveLink(href, url);
        if (absolute && shouldDownload(absolute, baseUrl, pathPrefix)) {
          frontier.enqueue(absolute);
        }
      }
    }

    this.logger.debug('Crawl finished', { fileCount, skipped, visited: frontier.visitedCount });
    return fileCount;
  }

  /**
   * Swap the finished download into place. The previous mirror is moved
   * aside first and restored if the final rename fails.
   */
  private async publish(tempDir: string, target: string): Promise<void> {
    const previousDir = path.join(path.dirname(target), PREVIOUS_DIR_NAME);
    const hadPrevious = await pathExists(target);

    if (hadPrevious) {
      await fs.rm(previousDir, { recursive: true, force: true });
      await fs.rename(target, previousDir);
    }

    try {
      await fs.rename(tempDir, target);
    } catch (error) {
      if (hadPrevious) {
        await fs.rename(previousDir, target);
      }
      throw new DocMirrorError(
        `Failed to publish documentation cache at ${target}`,
        ErrorCode.PUBLISH_FAILED,
        ErrorSeverity.CRITICAL,
        { tempDir, target },
        toError(error)
      );
    }

    if (hadPrevious) {
      await fs.rm(previousDir, { recursive: true, force: true });
    }
  }
}
