/**
 * Type definitions for the document store and query engine
 */

/**
 * One indexed page, keyed by its path relative to the mirror root
 */
export interface DocumentRecord {
  path: string;
  title: string;
  content: string;
  url: string;
  /** Source file modification time, seconds since the epoch */
  lastModified: number;
}

/**
 * Anchor found in a page
 */
export interface PageLink {
  href: string;
  text: string;
}

/**
 * Fields extracted from one HTML document
 */
export interface ParsedPage {
  title: string;
  text: string;
  canonicalUrl?: string;
  links: PageLink[];
}

export type SearchMode = 'fulltext' | 'substring';

export interface SearchHit {
  path: string;
  title: string;
  url: string;
  snippet: string;
}

export interface PageContent {
  path: string;
  title: string;
  size: number;
  text: string;
  raw?: string;
}

export interface PageSummary {
  path: string;
  title: string;
  url: string;
}

export interface ArchiveStats {
  archivePath: string;
  htmlFiles: number;
  otherFiles: number;
  totalSize: number;
  indexedPages: number;
  searchMode: SearchMode;
}

export interface ScanResult {
  htmlFiles: string[];
  otherFiles: string[];
  totalSize: number;
  errors: ScanError[];
}

export interface ScanError {
  filePath: string;
  error: string;
}

export interface IndexBuildResult {
  indexed: number;
  failed: number;
  duration: number;
}

/**
 * Query engine result: data on success, a caller-facing message on failure
 */
export type QueryResult<T> = { success: true; data: T } | { success: false; error: string };
