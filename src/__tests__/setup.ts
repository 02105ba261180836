/**
 * Jest setup file - runs before all tests
 */

process.env['NODE_ENV'] = 'test';

// Keep test output clean and leave no log files behind
process.env['DOCMIRROR_LOG_SILENT'] = 'true';
process.env['DOCMIRROR_LOG_TO_FILE'] = 'false';

// Jest gives every test file a fresh module registry, but native addons stay
// cached per worker process. better-sqlite3 registers its SqliteError class on
// the addon only once, so without this reset errors thrown in later test files
// would be instances of an earlier file's SqliteError class.
const sqliteAddon: { isInitialized?: boolean } = require(
  require.resolve('better-sqlite3/build/Release/better_sqlite3.node')
);
sqliteAddon.isInitialized = false;
