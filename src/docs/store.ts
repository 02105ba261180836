/**
 * Document Store
 * SQLite persistence for indexed pages. Every operation opens its own
 * connection and closes it when done; no handle is shared between calls.
 */

import Database from 'better-sqlite3';
import { ErrorCode, StoreError, toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { DocumentRecord, PageSummary, SearchMode } from '../types/docs.js';
import { FullTextSearchStrategy, SubstringSearchStrategy, type SearchStrategy } from './search.js';

export const DATABASE_FILE = '.archive_index.db';

const CREATE_PAGES = `
  CREATE TABLE IF NOT EXISTS pages (
    id INTEGER PRIMARY KEY,
    path TEXT UNIQUE,
    title TEXT,
    content TEXT,
    url TEXT,
    last_modified REAL
  )
`;

const CREATE_PAGES_FTS = `
  CREATE VIRTUAL TABLE IF NOT EXISTS pages_fts USING fts5(
    title, content, url, content=pages, content_rowid=id
  )
`;

// Keep the external-content FTS table in step with pages
const CREATE_FTS_TRIGGERS = `
  CREATE TRIGGER IF NOT EXISTS pages_ai AFTER INSERT ON pages BEGIN
    INSERT INTO pages_fts(rowid, title, content, url)
    VALUES (new.id, new.title, new.content, new.url);
  END;
  CREATE TRIGGER IF NOT EXISTS pages_ad AFTER DELETE ON pages BEGIN
    INSERT INTO pages_fts(pages_fts, rowid, title, content, url)
    VALUES ('delete', old.id, old.title, old.content, old.url);
  END;
  CREATE TRIGGER IF NOT EXISTS pages_au AFTER UPDATE ON pages BEGIN
    INSERT INTO pages_fts(pages_fts, rowid, title, content, url)
    VALUES ('delete', old.id, old.title, old.content, old.url);
    INSERT INTO pages_fts(rowid, title, content, url)
    VALUES (new.id, new.title, new.content, new.url);
  END;
`;

const UPSERT_PAGE = `
  INSERT INTO pages (path, title, content, url, last_modified)
  VALUES (@path, @title, @content, @url, @lastModified)
  ON CONFLICT(path) DO UPDATE SET
    title = excluded.title,
    content = excluded.content,
    url = excluded.url,
    last_modified = excluded.last_modified
`;

export interface DocumentStoreOptions {
  enableFullText: boolean;
}

export class DocumentStore {
  readonly dbPath: string;
  private readonly options: DocumentStoreOptions;
  private readonly logger: Logger;
  private strategy: SearchStrategy | null = null;

  constructor(dbPath: string, options: DocumentStoreOptions, logger: Logger) {
    this.dbPath = dbPath;
    this.options = options;
    this.logger = logger;
  }

  /**
   * Create the schema and pick the search strategy. FTS5 is used when
   * enabled and available; otherwise search falls back to substring matching.
   */
  initialize(): SearchMode {
    const db = this.open(false);
    let strategy: SearchStrategy;
    try {
      db.exec(CREATE_PAGES);
      strategy = this.options.enableFullText && this.createFullTextIndex(db)
        ? new FullTextSearchStrategy()
        : new SubstringSearchStrategy();
    } catch (error) {
      throw new StoreError(
        `Failed to initialize document store at ${this.dbPath}`,
        ErrorCode.INITIALIZATION_ERROR,
        { dbPath: this.dbPath },
        toError(error)
      );
    } finally {
      db.close();
    }

    this.strategy = strategy;
    this.logger.info(`${strategy.description} enabled`, { dbPath: this.dbPath });
    return strategy.mode;
  }

  /**
   * Returns false when the FTS5 module is missing
   */
  private createFullTextIndex(db: Database.Database): boolean {
    const existed = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'pages_fts'")
      .get() !== undefined;

    try {
      db.exec(CREATE_PAGES_FTS);
    } catch (error) {
      this.logger.warn('FTS5 not available, using basic search', { error: toError(error).message });
      return false;
    }
    db.exec(CREATE_FTS_TRIGGERS);

    // Pages indexed while full-text search was off are not in the new index yet
    if (!existed && this.countWith(db) > 0) {
      db.exec("INSERT INTO pages_fts(pages_fts) VALUES ('rebuild')");
    }
    return true;
  }

  get isInitialized(): boolean {
    return this.strategy !== null;
  }

  get searchStrategy(): SearchStrategy {
    if (!this.strategy) {
      throw new StoreError('Database not initialized', ErrorCode.STORE_NOT_INITIALIZED, { dbPath: this.dbPath });
    }
    return this.strategy;
  }

  get searchMode(): SearchMode {
    return this.searchStrategy.mode;
  }

  private open(readonly: boolean): Database.Database {
    return new Database(this.dbPath, readonly ? { readonly: true, fileMustExist: true } : {});
  }

  /**
   * Run `fn` on a fresh read-only connection
   */
  withConnection<T>(fn: (db: Database.Database) => T): T {
    if (!this.strategy) {
      throw new StoreError('Database not initialized', ErrorCode.STORE_NOT_INITIALIZED, { dbPath: this.dbPath });
    }
    const db = this.open(true);
    try {
      return fn(db);
    } finally {
      db.close();
    }
  }

  /**
   * Insert or replace records by path, in one transaction
   */
  upsertMany(records: DocumentRecord[]): void {
    if (!this.strategy) {
      throw new StoreError('Database not initialized', ErrorCode.STORE_NOT_INITIALIZED, { dbPath: this.dbPath });
    }
    const db = this.open(false);
    try {
      const upsert = db.prepare<[DocumentRecord]>(UPSERT_PAGE);
      db.transaction((batch: DocumentRecord[]) => {
        for (const record of batch) {
          upsert.run(record);
        }
      })(records);
    } catch (error) {
      throw new StoreError(
        `Failed to write ${records.length} records to ${this.dbPath}`,
        ErrorCode.INDEX_BUILD_ERROR,
        { dbPath: this.dbPath },
        toError(error)
      );
    } finally {
      db.close();
    }
  }

  private countWith(db: Database.Database): number {
    const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM pages').get();
    return row?.count ?? 0;
  }

  count(): number {
    return this.withConnection(db => this.countWith(db));
  }

  /**
   * Pages ordered by path, optionally filtered with a GLOB pattern
   */
  listPages(filterPattern: string | undefined, limit: number): PageSummary[] {
    return this.withConnection(db => {
      if (filterPattern) {
        return db
          .prepare<[string, number], PageSummary>(
            'SELECT path, title, url FROM pages WHERE path GLOB ? ORDER BY path LIMIT ?'
          )
          .all(filterPattern, limit);
      }
      return db
        .prepare<[number], PageSummary>('SELECT path, title, url FROM pages ORDER BY path LIMIT ?')
        .all(limit);
    });
  }
}
