/**
 * Cache Validator
 * Decides whether an on-disk mirror can be served without downloading again
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Logger } from '../logger/index.js';
import { countHtmlFiles } from '../docs/scanner.js';
import { MANIFEST_FILE, readManifest } from './manifest.js';

export interface CacheValidationOptions {
  hostSegment: string;
  minFileCount: number;
  logger?: Logger;
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check, in order: the manifest parses, it is marked completed, the mirror
 * directory exists, and it holds at least `minFileCount` HTML files.
 * Never throws; an unreadable or missing manifest means "invalid".
 */
export async function isCacheValid(cacheDir: string, options: CacheValidationOptions): Promise<boolean> {
  const { hostSegment, minFileCount, logger } = options;

  const manifest = await readManifest(cacheDir);
  if (!manifest) {
    logger?.debug('Cache manifest missing or unreadable', {
      manifest: path.join(cacheDir, MANIFEST_FILE),
    });
    return false;
  }

  if (!manifest.completed) {
    logger?.debug('Cache download not completed', { cacheDir });
    return false;
  }

  const docDir = path.join(cacheDir, hostSegment);
  if (!(await isDirectory(docDir))) {
    logger?.debug('Documentation directory not found', { docDir });
    return false;
  }

  const fileCount = await countHtmlFiles(docDir);
  if (fileCount < minFileCount) {
    logger?.debug('Insufficient HTML files in cache', { fileCount, minFileCount });
    return false;
  }

  logger?.debug('Cache is valid', { fileCount });
  return true;
}
