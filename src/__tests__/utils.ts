/**
 * Test utilities and helper functions
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { Config } from '../config/schema.js';
import { createServerContext, prepareContext, type ServerContext } from '../context.js';
import { DATABASE_FILE, type DocumentStore } from '../docs/store.js';
import { Logger } from '../logger/index.js';
import type { FetchLike } from '../types/cache.js';
import type { DocumentRecord } from '../types/docs.js';

/**
 * Logger that writes nowhere
 */
export function createTestLogger(): Logger {
  return new Logger({
    level: 'debug',
    format: 'simple',
    dir: './logs',
    maxFiles: 1,
    maxSize: '1m',
    toFile: false,
    silent: true,
  });
}

export async function makeTempDir(prefix = 'docmirror-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function createTestHtml(title: string, body: string, links: string[] = []): string {
  const linksHtml = links.length > 0
    ? `<p>See also: ${links.map(href => `<a href="${href}">${href}</a>`).join(' | ')}</p>`
    : '';

  return `<!DOCTYPE html>
<html>
<head>
  <title>${title}</title>
</head>
<body>
  <h1>${title}</h1>
  <p>${body}</p>
  ${linksHtml}
</body>
</html>`;
}

/**
 * Six-page archive with a two-level subdirectory and relative links
 */
export const FIXTURE_PAGES: Record<string, string> = {
  'index.html': createTestHtml(
    'Toolkit Documentation Index',
    'Start page of the toolkit reference archive used by the tests.',
    ['page_kernels.html', 'page_time.html', 'page_links.html', 'subdir/nested.html']
  ),
  'page_kernels.html': createTestHtml(
    'Kernel Files Guide',
    'Kernel files carry SPK ephemeris data and CK orientation data for spacecraft.',
    ['page_time.html', 'index.html']
  ),
  'page_time.html': createTestHtml(
    'Time Conversions',
    'Converting between ephemeris time and UTC with leapsecond tables.',
    ['index.html', 'page_kernels.html']
  ),
  'page_links.html': createTestHtml(
    'Link Samples',
    'A page holding internal, external and anchor links.',
    ['index.html', './page_kernels.html', 'subdir/nested.html', 'missing.html', '#top',
      'https://docs.example.org/', 'https://example.com/test']
  ),
  'subdir/nested.html': createTestHtml(
    'Nested Page',
    'A page one directory down.',
    ['../index.html', '../page_kernels.html', 'deep/deeper.html']
  ),
  'subdir/deep/deeper.html': createTestHtml(
    'Deeply Nested Page',
    'A page two directories down.',
    ['../../index.html', '../nested.html']
  ),
};

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }
}

export async function createFixtureArchive(root: string): Promise<string> {
  await writeFiles(root, FIXTURE_PAGES);
  return root;
}

/**
 * Fixture archive with its index built, served the way an explicit
 * local archive is: the database sits inside the archive directory
 */
export async function createFixtureContext(root: string, enableFullText = true): Promise<ServerContext> {
  await createFixtureArchive(root);
  const context = createServerContext(
    root,
    path.join(root, DATABASE_FILE),
    { index: { enableFullText } },
    createTestLogger()
  );
  await prepareContext(context);
  return context;
}

export type FakeResponse =
  | { status: number; body?: string }
  | Error;

const NOT_FOUND: FakeResponse = { status: 404 };

export interface FakeFetch {
  fetchImpl: FetchLike;
  calls: string[];
}

/**
 * In-process stand-in for `fetch`. A route may list several responses,
 * returned one per call; the last one repeats. Unknown URLs get a 404.
 */
export function createFakeFetch(routes: Record<string, FakeResponse | FakeResponse[]>): FakeFetch {
  const calls: string[] = [];
  const served = new Map<string, number>();

  const fetchImpl: FetchLike = async (url: string) => {
    calls.push(url);
    const route = routes[url];
    const queue: FakeResponse[] = route === undefined ? [NOT_FOUND] : Array.isArray(route) ? route : [route];
    const index = served.get(url) ?? 0;
    served.set(url, index + 1);

    const next = queue[Math.min(index, queue.length - 1)] ?? NOT_FOUND;
    if (next instanceof Error) {
      throw next;
    }
    return new Response(next.body ?? '', { status: next.status });
  };

  return { fetchImpl, calls };
}

export function htmlPage(body: string): FakeResponse {
  return { status: 200, body };
}

/**
 * Full configuration for tests, rooted in a temporary directory
 */
export function createTestConfig(cacheDir: string): Config {
  return {
    server: { nodeEnv: 'test' },
    logging: {
      level: 'debug',
      format: 'simple',
      dir: path.join(cacheDir, 'logs'),
      maxFiles: 1,
      maxSize: '1m',
      toFile: false,
      silent: true,
    },
    mcp: { serverName: 'docmirror-mcp-test', serverVersion: '0.0.0', transport: 'stdio' },
    cache: {
      cacheDir,
      baseUrl: 'https://docs.example.org/reference/',
      hostSegment: 'docs.example.org',
      pathPrefix: '/reference/',
      skipDownload: false,
      minFileCount: 2,
      minFreeDiskMb: 0,
    },
    crawler: { maxRetries: 3, requestTimeout: 1000, userAgent: 'docmirror-mcp-test' },
    index: { enableFullText: true },
  };
}

interface StoredPage {
  path: string;
  title: string;
  content: string;
  url: string;
  last_modified: number;
}

/**
 * Every stored record, ordered by path
 */
export function readRecords(store: DocumentStore): DocumentRecord[] {
  return store
    .withConnection(db =>
      db.prepare<[], StoredPage>('SELECT path, title, content, url, last_modified FROM pages ORDER BY path').all()
    )
    .map(row => ({
      path: row.path,
      title: row.title,
      content: row.content,
      url: row.url,
      lastModified: row.last_modified,
    }));
}

export function readRecord(store: DocumentStore, recordPath: string): DocumentRecord | undefined {
  return readRecords(store).find(record => record.path === recordPath);
}
