/**
 * Archive search tool
 */

import type { ServerContext } from '../context.js';
import type { SearchHit } from '../types/docs.js';
import type { SearchArchiveArgs, ToolCallResponse } from '../types/tools.js';
import { errorResult, textResult } from './results.js';

export function formatSearchResults(query: string, hits: SearchHit[]): string {
  if (hits.length === 0) {
    return `No results found for query: '${query}'`;
  }

  let response = `Found ${hits.length} results for '${query}':\n\n`;
  hits.forEach((hit, i) => {
    response += `${i + 1}. **${hit.title}**\n`;
    response += `   Path: ${hit.path}\n`;
    if (hit.url !== hit.path) {
      response += `   Original URL: ${hit.url}\n`;
    }
    response += `   Snippet: ${hit.snippet}\n\n`;
  });
  return response;
}

export async function searchArchive(context: ServerContext, args: SearchArchiveArgs): Promise<ToolCallResponse> {
  const result = await context.query.search(args.query, args.limit);
  if (!result.success) {
    return errorResult(result.error);
  }
  return textResult(formatSearchResults(args.query, result.data));
}
