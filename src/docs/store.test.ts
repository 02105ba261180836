/**
 * Unit tests for the SQLite document store and search strategies
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'path';
import Database from 'better-sqlite3';
import { ErrorCode, StoreError } from '../errors/index.js';
import type { DocumentRecord } from '../types/docs.js';
import { createTestLogger, makeTempDir, readRecord, removeDir } from '../__tests__/utils.js';
import { escapeLike } from './search.js';
import { DATABASE_FILE, DocumentStore } from './store.js';

const ALPHA: DocumentRecord = {
  path: 'a.html',
  title: 'Alpha',
  content: 'Alpha page about ephemeris data',
  url: 'a.html',
  lastModified: 1,
};

const BETA: DocumentRecord = {
  path: 'subdir/b.html',
  title: 'Beta',
  content: 'Beta talks about kernels and 100% coverage',
  url: 'https://docs.example.org/reference/b.html',
  lastModified: 2,
};

const GAMMA: DocumentRecord = {
  path: 'c.html',
  title: 'Gamma ephemeris',
  content: 'ephemeris ephemeris ephemeris everywhere',
  url: 'c.html',
  lastModified: 3,
};

const RECORDS = [ALPHA, BETA, GAMMA];

describe('DocumentStore', () => {
  let dir: string;
  let dbPath: string;

  function createStore(enableFullText = true): DocumentStore {
    return new DocumentStore(dbPath, { enableFullText }, createTestLogger());
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    dbPath = path.join(dir, DATABASE_FILE);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('before initialization', () => {
    it('should refuse queries', () => {
      const store = createStore();

      expect(store.isInitialized).toBe(false);
      expect(() => store.count()).toThrow(StoreError);
      expect(() => store.searchMode).toThrow('Database not initialized');
    });

    it('should carry the not-initialized code', () => {
      const store = createStore();
      let code: ErrorCode | undefined;
      try {
        store.upsertMany(RECORDS);
      } catch (error) {
        code = error instanceof StoreError ? error.code : undefined;
      }
      expect(code).toBe(ErrorCode.STORE_NOT_INITIALIZED);
    });
  });

  describe('initialize', () => {
    it('should enable full-text search by default', () => {
      const store = createStore();

      expect(store.initialize()).toBe('fulltext');
      expect(store.searchMode).toBe('fulltext');
      expect(store.count()).toBe(0);
    });

    it('should fall back to substring search when full-text is disabled', () => {
      const store = createStore(false);

      expect(store.initialize()).toBe('substring');
    });

    it('should be safe to run twice on the same file', () => {
      createStore().initialize();
      const store = createStore();

      expect(store.initialize()).toBe('fulltext');
    });
  });

  describe('records', () => {
    let store: DocumentStore;

    beforeEach(() => {
      store = createStore();
      store.initialize();
      store.upsertMany(RECORDS);
    });

    it('should count and fetch records by path', () => {
      expect(store.count()).toBe(3);
      expect(readRecord(store, 'subdir/b.html')).toEqual(BETA);
      expect(readRecord(store, 'missing.html')).toBeUndefined();
    });

    it('should replace records with the same path', () => {
      store.upsertMany([{ ...ALPHA, title: 'Alpha v2', lastModified: 10 }]);

      expect(store.count()).toBe(3);
      expect(readRecord(store, 'a.html')?.title).toBe('Alpha v2');
      expect(readRecord(store, 'a.html')?.lastModified).toBe(10);
    });

    it('should list pages ordered by path', () => {
      expect(store.listPages(undefined, 50)).toEqual([
        { path: 'a.html', title: 'Alpha', url: 'a.html' },
        { path: 'c.html', title: 'Gamma ephemeris', url: 'c.html' },
        { path: 'subdir/b.html', title: 'Beta', url: 'https://docs.example.org/reference/b.html' },
      ]);
    });

    it('should apply the limit and a glob filter', () => {
      expect(store.listPages(undefined, 1).map(p => p.path)).toEqual(['a.html']);
      expect(store.listPages('subdir/*', 50).map(p => p.path)).toEqual(['subdir/b.html']);
      expect(store.listPages('zzz*', 50)).toEqual([]);
    });

    it('should return no rows for malformed glob patterns', () => {
      for (const pattern of ['[', '[z-a]', '\\']) {
        expect(store.listPages(pattern, 50)).toEqual([]);
      }
    });

    it('should run queries on independent connections', () => {
      const nested = store.withConnection(() => store.count());
      expect(nested).toBe(3);
    });
  });

  describe('full-text search', () => {
    let store: DocumentStore;

    beforeEach(() => {
      store = createStore();
      store.initialize();
      store.upsertMany(RECORDS);
    });

    function search(query: string) {
      return store.withConnection(db => store.searchStrategy.search(db, query, 10));
    }

    it('should rank the most relevant page first', () => {
      const hits = search('ephemeris');

      expect(hits.map(h => h.path)).toEqual(['c.html', 'a.html']);
    });

    it('should mark the match in the snippet', () => {
      const hit = search('kernels')[0];

      expect(hit?.path).toBe('subdir/b.html');
      expect(hit?.snippet).toContain('<mark>kernels</mark>');
    });

    it('should respect the limit', () => {
      expect(store.withConnection(db => store.searchStrategy.search(db, 'ephemeris', 1))).toHaveLength(1);
    });

    it('should follow updates through the triggers', () => {
      store.upsertMany([{ ...BETA, content: 'Beta now covers frames' }]);

      expect(search('kernels')).toEqual([]);
      expect(search('frames').map(h => h.path)).toEqual(['subdir/b.html']);
    });

    it('should raise a SQLite error for malformed queries', () => {
      expect(() => search('"unterminated')).toThrow(Database.SqliteError);
    });

    it('should index pages stored before full-text search was enabled', () => {
      const otherPath = path.join(dir, 'other.db');
      const before = new DocumentStore(otherPath, { enableFullText: false }, createTestLogger());
      before.initialize();
      before.upsertMany(RECORDS);

      const after = new DocumentStore(otherPath, { enableFullText: true }, createTestLogger());
      expect(after.initialize()).toBe('fulltext');
      const hits = after.withConnection(db => after.searchStrategy.search(db, 'kernels', 10));

      expect(hits.map(h => h.path)).toEqual(['subdir/b.html']);
    });
  });

  describe('substring search', () => {
    let store: DocumentStore;

    beforeEach(() => {
      store = createStore(false);
      store.initialize();
      store.upsertMany(RECORDS);
    });

    function search(query: string) {
      return store.withConnection(db => store.searchStrategy.search(db, query, 10));
    }

    it('should match case-insensitively in storage order', () => {
      expect(search('EPHEMERIS').map(h => h.path)).toEqual(['a.html', 'c.html']);
    });

    it('should cut the snippet around the first match', () => {
      expect(search('ephemeris')[0]?.snippet).toBe('Alpha page about ephemeris data');
    });

    it('should match LIKE wildcards literally', () => {
      expect(search('100%').map(h => h.path)).toEqual(['subdir/b.html']);
      expect(search('a_p')).toEqual([]);
    });

    it('should return nothing for unknown words', () => {
      expect(search('nonexistent')).toEqual([]);
    });
  });
});

describe('escapeLike', () => {
  it('should escape wildcards and the escape character', () => {
    expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
  });
});
