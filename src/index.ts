#!/usr/bin/env node

/**
 * Documentation Mirror MCP Server - Entry Point
 * Serves a cached, searchable mirror of an HTML documentation tree over MCP
 */

import { CacheManager } from './cache/index.js';
import { HELP_TEXT, USAGE, parseCliArgs, resolveArchivePath } from './cli.js';
import { getConfig } from './config/index.js';
import { createServerContext, resolveDatabasePath } from './context.js';
import { ConfigurationError, DocMirrorError, ValidationError } from './errors/index.js';
import { getLogger } from './logger/index.js';
import { DocMirrorMCPServer } from './server.js';

async function main(): Promise<void> {
  try {
    const command = parseCliArgs(process.argv.slice(2));

    if (command.kind === 'help') {
      console.log(HELP_TEXT);
      process.exit(0);
    }

    const config = getConfig();

    if (command.kind === 'show-cache-dir') {
      console.log(config.cache.cacheDir);
      process.exit(0);
    }

    const logger = getLogger(config.logging);

    logger.info('Starting documentation mirror MCP server', {
      version: config.mcp.serverVersion,
      nodeEnv: config.server.nodeEnv,
    });

    const cache = new CacheManager(config.cache, config.crawler, logger.child({ component: 'cache' }));
    const archivePath = await resolveArchivePath(command, cache);
    logger.info('Serving documentation archive', { archivePath });

    const context = createServerContext(
      archivePath,
      resolveDatabasePath(archivePath, cache.cacheDir, cache.mirrorRoot),
      config,
      logger
    );

    const server = new DocMirrorMCPServer(config, context, logger);
    await server.start();
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(USAGE);
      console.error("Try 'docmirror-mcp --help' for more information.");
      process.exit(1);
    }

    if (error instanceof ConfigurationError) {
      console.error('Configuration error:', error.message);
      process.exit(1);
    }

    if (error instanceof DocMirrorError) {
      console.error(`Failed to initialize documentation archive: ${error.message}`);
      process.exit(1);
    }

    console.error('Fatal error:', error);
    process.exit(1);
  }
}

// Start the server
void main();
