/**
 * MCP Tool type definitions
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

/**
 * Tool descriptor interface
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * Tool call response interface - uses MCP SDK type
 */
export type ToolCallResponse = CallToolResult;

export const SearchArchiveArgsSchema = z.object({
  query: z.string().min(1),
  limit: z.number().int().min(1).max(100).optional().default(10),
});

export type SearchArchiveArgs = z.infer<typeof SearchArchiveArgsSchema>;

export const GetPageArgsSchema = z.object({
  path: z.string().min(1),
  include_raw: z.boolean().optional().default(false),
});

export type GetPageArgs = z.infer<typeof GetPageArgsSchema>;

export const ListPagesArgsSchema = z.object({
  filter_pattern: z.string().optional(),
  limit: z.number().int().min(1).max(1000).optional().default(50),
});

export type ListPagesArgs = z.infer<typeof ListPagesArgsSchema>;

export const ExtractLinksArgsSchema = z.object({
  path: z.string().min(1),
  internal_only: z.boolean().optional().default(true),
});

export type ExtractLinksArgs = z.infer<typeof ExtractLinksArgsSchema>;

/**
 * Archive statistics take no arguments
 */
export const GetArchiveStatsArgsSchema = z.object({});

export type GetArchiveStatsArgs = z.infer<typeof GetArchiveStatsArgsSchema>;

/**
 * Tool names enum
 */
export enum ToolName {
  SEARCH_ARCHIVE = 'search_archive',
  GET_PAGE = 'get_page',
  LIST_PAGES = 'list_pages',
  EXTRACT_LINKS = 'extract_links',
  GET_ARCHIVE_STATS = 'get_archive_stats',
}
