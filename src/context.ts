/**
 * Server context
 * Everything a tool call needs, built once at startup
 */

import * as path from 'path';
import type { Config } from './config/schema.js';
import { ArchiveQueryEngine, DATABASE_FILE, DocumentIndexer, DocumentStore } from './docs/index.js';
import type { Logger } from './logger/index.js';

export interface ServerContext {
  archivePath: string;
  store: DocumentStore;
  indexer: DocumentIndexer;
  query: ArchiveQueryEngine;
  logger: Logger;
}

/**
 * The index of the cached mirror lives in the cache directory; an explicit
 * local archive keeps its index beside the pages.
 */
export function resolveDatabasePath(archivePath: string, cacheDir: string, mirrorRoot: string): string {
  if (path.resolve(archivePath) === path.resolve(mirrorRoot)) {
    return path.join(cacheDir, DATABASE_FILE);
  }
  return path.join(archivePath, DATABASE_FILE);
}

export function createServerContext(
  archivePath: string,
  dbPath: string,
  config: Pick<Config, 'index'>,
  logger: Logger
): ServerContext {
  const store = new DocumentStore(
    dbPath,
    { enableFullText: config.index.enableFullText },
    logger.child({ component: 'store' })
  );

  return {
    archivePath,
    store,
    indexer: new DocumentIndexer(store, logger.child({ component: 'indexer' })),
    query: new ArchiveQueryEngine(archivePath, store),
    logger,
  };
}

/**
 * Create the schema and build the index when the store is empty
 */
export async function prepareContext(context: ServerContext): Promise<void> {
  if (!context.store.isInitialized) {
    context.store.initialize();
  }
  await context.indexer.ensureIndex(context.archivePath);
}
