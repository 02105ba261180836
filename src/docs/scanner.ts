/**
 * Document Scanner
 * Walks a mirror directory and sorts its files into HTML pages and everything else
 */

import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { ScanResult, ScanError } from '../types/docs.js';

export interface ScanOptions {
  /** Also walk dot-files and dot-directories */
  includeHidden?: boolean;
}

/**
 * Scan a directory tree. Unless `includeHidden` is set, hidden entries
 * (the manifest, the index database, a leftover download directory) are
 * skipped. Paths are absolute and sorted.
 */
export async function scanDirectory(dirPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const htmlFiles: string[] = [];
  const otherFiles: string[] = [];
  const errors: ScanError[] = [];
  let totalSize = 0;

  await scanDirectoryRecursive(dirPath, options.includeHidden ?? false, htmlFiles, otherFiles, errors);

  // Get file sizes
  for (const file of [...htmlFiles, ...otherFiles]) {
    try {
      const stats = await fs.stat(file);
      totalSize += stats.size;
    } catch (error) {
      errors.push({
        filePath: file,
        error: `Failed to stat file: ${String(error)}`,
      });
    }
  }

  htmlFiles.sort();
  otherFiles.sort();

  return {
    htmlFiles,
    otherFiles,
    totalSize,
    errors,
  };
}

/**
 * Recursive directory scanning helper
 */
async function scanDirectoryRecursive(
  dirPath: string,
  includeHidden: boolean,
  htmlFiles: string[],
  otherFiles: string[],
  errors: ScanError[]
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    errors.push({
      filePath: dirPath,
      error: `Failed to read directory: ${String(error)}`,
    });
    return;
  }

  for (const entry of entries) {
    if (!includeHidden && entry.name.startsWith('.')) {
      continue;
    }

    const fullPath = path.join(dirPath, entry.name);

    if (entry.isDirectory()) {
      await scanDirectoryRecursive(fullPath, includeHidden, htmlFiles, otherFiles, errors);
    } else if (entry.isFile()) {
      if (isHtmlFile(entry.name)) {
        htmlFiles.push(fullPath);
      } else {
        otherFiles.push(fullPath);
      }
    }
  }
}

/**
 * Check if file is an HTML page
 */
export function isHtmlFile(filename: string): boolean {
  return path.extname(filename).toLowerCase() === '.html';
}

/**
 * Count HTML pages under a directory
 */
export async function countHtmlFiles(dirPath: string): Promise<number> {
  const result = await scanDirectory(dirPath);
  return result.htmlFiles.length;
}

/**
 * Path of `filePath` relative to `rootDir`, always `/`-separated
 */
export function toRelativePath(rootDir: string, filePath: string): string {
  return path.relative(rootDir, filePath).split(path.sep).join('/');
}
