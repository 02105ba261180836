/**
 * Search strategies over the document store.
 * One of them is picked when the store is initialised, depending on
 * whether SQLite's FTS5 module is usable.
 */

import type Database from 'better-sqlite3';
import type { SearchHit, SearchMode } from '../types/docs.js';

export interface SearchStrategy {
  readonly mode: SearchMode;
  readonly description: string;
  search(db: Database.Database, query: string, limit: number): SearchHit[];
}

/**
 * Ranked search through the `pages_fts` index, best bm25 score first.
 * The query uses FTS5 syntax; a malformed query raises a SqliteError.
 */
export class FullTextSearchStrategy implements SearchStrategy {
  readonly mode = 'fulltext' as const;
  readonly description = 'Full-text search (FTS5)';

  search(db: Database.Database, query: string, limit: number): SearchHit[] {
    return db
      .prepare<[string, number], SearchHit>(
        `SELECT p.path AS path, p.title AS title, p.url AS url,
                snippet(pages_fts, 1, '<mark>', '</mark>', '...', 64) AS snippet
         FROM pages_fts
         JOIN pages p ON pages_fts.rowid = p.id
         WHERE pages_fts MATCH ?
         ORDER BY bm25(pages_fts)
         LIMIT ?`
      )
      .all(query, limit);
  }
}

/**
 * Escape LIKE wildcards so the query matches literally
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, char => `\\${char}`);
}

/**
 * Case-insensitive substring match on title and content, in storage order
 */
export class SubstringSearchStrategy implements SearchStrategy {
  readonly mode = 'substring' as const;
  readonly description = 'Basic search';

  search(db: Database.Database, query: string, limit: number): SearchHit[] {
    const pattern = `%${escapeLike(query)}%`;
    return db
      .prepare<[string, string, string, number], SearchHit>(
        `SELECT path, title, url,
                substr(content, max(1, instr(lower(content), lower(?)) - 50), 150) AS snippet
         FROM pages
         WHERE title LIKE ? ESCAPE '\\' OR content LIKE ? ESCAPE '\\'
         LIMIT ?`
      )
      .all(query, pattern, pattern, limit);
  }
}
