import { homedir } from 'os';
import { join } from 'path';
import type { Config } from './schema.js';

export const APP_NAME = 'docmirror-mcp';
export const APP_AUTHOR = 'docmirror';

/**
 * Platform-appropriate cache directory
 * - Linux: $XDG_CACHE_HOME/docmirror-mcp or ~/.cache/docmirror-mcp
 * - macOS: ~/Library/Caches/docmirror-mcp
 * - Windows: %LOCALAPPDATA%\docmirror\docmirror-mcp\Cache
 */
export function defaultCacheDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  switch (platform) {
    case 'darwin':
      return join(home, 'Library', 'Caches', APP_NAME);
    case 'win32':
      return join(env['LOCALAPPDATA'] ?? join(home, 'AppData', 'Local'), APP_AUTHOR, APP_NAME, 'Cache');
    default:
      return join(env['XDG_CACHE_HOME'] || join(home, '.cache'), APP_NAME);
  }
}

/**
 * Default configuration values
 * These are used when no environment variables or config files override them
 */
export const defaultConfig: Config = {
  server: {
    nodeEnv: 'development',
  },
  logging: {
    level: 'info',
    format: 'json',
    dir: './logs',
    maxFiles: 10,
    maxSize: '10m',
    toFile: true,
    silent: false,
  },
  mcp: {
    serverName: APP_NAME,
    serverVersion: '0.1.0',
    transport: 'stdio',
  },
  cache: {
    cacheDir: defaultCacheDir(),
    baseUrl: 'https://naif.jpl.nasa.gov/pub/naif/toolkit_docs/C/',
    hostSegment: 'naif.jpl.nasa.gov',
    pathPrefix: '/pub/naif/toolkit_docs/C/',
    skipDownload: false,
    minFileCount: 500,
    minFreeDiskMb: 100,
  },
  crawler: {
    maxRetries: 3,
    requestTimeout: 30000,
    userAgent: `${APP_NAME}/0.1.0`,
  },
  index: {
    enableFullText: true,
  },
};
