/**
 * Command-line arguments
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { CacheManager } from './cache/index.js';
import { ErrorCode, PreconditionError, ValidationError, toError } from './errors/index.js';

export type CliCommand =
  | { kind: 'serve-cache' }
  | { kind: 'serve-archive'; archivePath: string }
  | { kind: 'refresh' }
  | { kind: 'show-cache-dir' }
  | { kind: 'help' };

export const USAGE = 'Usage: docmirror-mcp [OPTIONS] [ARCHIVE_PATH]';

export const HELP_TEXT = `docmirror-mcp - MCP server for a cached, searchable documentation mirror

${USAGE}

Options:
  ARCHIVE_PATH      Path to a local documentation archive (optional)
  --refresh         Force re-download of cached documentation
  --cache-dir       Show cache directory location and exit
  --help, -h        Show this help message

If ARCHIVE_PATH is not provided, documentation is downloaded to a
platform-appropriate cache directory on first run.`;

/**
 * Parse the arguments after the script name. At most one argument is
 * accepted; anything not starting with `-` is an archive path.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  if (argv.length > 1) {
    throw new ValidationError(`Unexpected arguments: ${argv.join(' ')}`, { argv });
  }

  const [arg] = argv;
  switch (arg) {
    case undefined:
      return { kind: 'serve-cache' };
    case '--help':
    case '-h':
      return { kind: 'help' };
    case '--cache-dir':
      return { kind: 'show-cache-dir' };
    case '--refresh':
      return { kind: 'refresh' };
    default:
      if (arg.startsWith('-')) {
        throw new ValidationError(`Unknown option: ${arg}`, { argv });
      }
      return { kind: 'serve-archive', archivePath: arg };
  }
}

type ServeCommand = Extract<CliCommand, { kind: 'serve-cache' | 'serve-archive' | 'refresh' }>;

/**
 * Directory of pages to serve for a command: the cached mirror (downloaded
 * when missing or invalid, or always with `--refresh`) or an existing
 * local archive.
 */
export async function resolveArchivePath(command: ServeCommand, cache: CacheManager): Promise<string> {
  switch (command.kind) {
    case 'serve-cache':
      return cache.getOrRefresh();
    case 'refresh':
      return cache.refresh();
    case 'serve-archive': {
      const archivePath = path.resolve(command.archivePath);
      try {
        await fs.access(archivePath);
      } catch (error) {
        throw new PreconditionError(
          `Archive path does not exist: ${archivePath}`,
          ErrorCode.ARCHIVE_NOT_FOUND,
          { archivePath },
          toError(error)
        );
      }
      return archivePath;
    }
  }
}
