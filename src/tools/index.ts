/**
 * Tools registry and handlers
 * Central module for all MCP tools
 */

import type { ZodTypeAny, z } from 'zod';
import type { ServerContext } from '../context.js';
import { ErrorCode } from '../errors/index.js';
import {
  ExtractLinksArgsSchema,
  GetArchiveStatsArgsSchema,
  GetPageArgsSchema,
  ListPagesArgsSchema,
  SearchArchiveArgsSchema,
  ToolName,
  type ToolCallResponse,
  type ToolDescriptor,
} from '../types/tools.js';
import { getArchiveStats } from './archive-stats.js';
import { extractLinks } from './extract-links.js';
import { getPage } from './get-page.js';
import { listPages } from './list-pages.js';
import { searchArchive } from './search-archive.js';
import { formatValidationErrors, validateToolArgs } from './validation.js';

/**
 * Get all available MCP tools
 */
export function listAllTools(): ToolDescriptor[] {
  return [
    {
      name: ToolName.SEARCH_ARCHIVE,
      description: 'Search for content across all pages in the documentation archive. Returns titles, paths and snippets, best match first.',
      inputSchema: {
        type: 'object',
        properties: {
          query: {
            type: 'string',
            description: 'Search query (full-text syntax when available, otherwise a plain substring)',
          },
          limit: {
            type: 'number',
            description: 'Maximum number of results to return (default: 10)',
            minimum: 1,
            maximum: 100,
          },
        },
        required: ['query'],
      },
    },
    {
      name: ToolName.GET_PAGE,
      description: 'Get the content of a specific page from the archive as plain text.',
      inputSchema: {
        type: 'object',
        properties: {
          path: {
            type: 'string',
            description: 'Relative path to the page within the archive (e.g. "index.html")',
          },
          include_raw: {
            type: 'boolean',
            description: 'Also include the raw HTML content (default: false)',
          },
        },
        required: ['path'],
      },
    },
    {
      name: ToolName.LIST_PAGES,
      description: 'List indexed pages in the archive, ordered by path.',
      inputSchema: {
        type: 'object',
        properties: {
          filter_pattern: {
            type: 'string',
            description: 'Optional glob pattern matched against page paths (e.g. "subdir/*")',
          },
          limit: {
            type: 'number',
            description: 'Maximum number of pages to return (default: 50)',
            minimum: 1,
            maximum: 1000,
          },
        },
      },
    },
    {
      name: ToolName.EXTRACT_LINKS,
      description: 'Extract the links of a page in the archive.',
      inputSchema: {
        type: 'object',
        properties: {
          path: {
            type: 'string',
            description: 'Relative path to the page within the archive',
          },
          internal_only: {
            type: 'boolean',
            description: 'Only return links that resolve to pages inside the archive (default: true)',
          },
        },
        required: ['path'],
      },
    },
    {
      name: ToolName.GET_ARCHIVE_STATS,
      description: 'Get statistics about the archive: file counts, total size, indexed pages and search type.',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    },
  ];
}

async function withValidArgs<S extends ZodTypeAny>(
  schema: S,
  args: unknown,
  handler: (args: z.output<S>) => Promise<ToolCallResponse>
): Promise<ToolCallResponse> {
  const validation = validateToolArgs(schema, args ?? {});
  if (!validation.success) {
    return {
      content: [{
        type: 'text',
        text: JSON.stringify({
          error: 'Invalid tool arguments',
          code: ErrorCode.TOOL_INVALID_INPUT,
          details: formatValidationErrors(validation.errors),
        }, null, 2),
      }],
      isError: true,
    };
  }
  return handler(validation.data);
}

/**
 * Call a tool by name
 */
export async function callTool(context: ServerContext, name: string, args: unknown): Promise<ToolCallResponse> {
  switch (name) {
    case ToolName.SEARCH_ARCHIVE:
      return withValidArgs(SearchArchiveArgsSchema, args, valid => searchArchive(context, valid));

    case ToolName.GET_PAGE:
      return withValidArgs(GetPageArgsSchema, args, valid => getPage(context, valid));

    case ToolName.LIST_PAGES:
      return withValidArgs(ListPagesArgsSchema, args, valid => listPages(context, valid));

    case ToolName.EXTRACT_LINKS:
      return withValidArgs(ExtractLinksArgsSchema, args, valid => extractLinks(context, valid));

    case ToolName.GET_ARCHIVE_STATS:
      return withValidArgs(GetArchiveStatsArgsSchema, args, () => getArchiveStats(context));

    default:
      return {
        content: [{
          type: 'text',
          text: JSON.stringify({
            error: `Unknown tool: ${name}`,
            code: ErrorCode.TOOL_NOT_FOUND,
            availableTools: listAllTools().map(t => t.name),
          }, null, 2),
        }],
        isError: true,
      };
  }
}

// Re-export tool functions
export { searchArchive } from './search-archive.js';
export { getPage } from './get-page.js';
export { listPages } from './list-pages.js';
export { extractLinks } from './extract-links.js';
export { getArchiveStats } from './archive-stats.js';
