/**
 * Documentation store, indexing and queries
 */

export * from './api.js';
export * from './indexer.js';
export * from './parser.js';
export * from './paths.js';
export * from './scanner.js';
export * from './search.js';
export * from './store.js';

export type {
  ArchiveStats,
  DocumentRecord,
  IndexBuildResult,
  PageContent,
  PageLink,
  PageSummary,
  ParsedPage,
  QueryResult,
  ScanError,
  ScanResult,
  SearchHit,
  SearchMode,
} from '../types/docs.js';
