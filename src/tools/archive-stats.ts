/**
 * Archive statistics tool
 */

import type { ServerContext } from '../context.js';
import { FullTextSearchStrategy, SubstringSearchStrategy } from '../docs/search.js';
import type { ArchiveStats } from '../types/docs.js';
import type { ToolCallResponse } from '../types/tools.js';
import { errorResult, textResult } from './results.js';

const BYTES_PER_MB = 1024 * 1024;

export function formatArchiveStats(stats: ArchiveStats): string {
  const searchType = stats.searchMode === 'fulltext'
    ? new FullTextSearchStrategy().description
    : new SubstringSearchStrategy().description;

  let response = '# Archive Statistics\n\n';
  response += `**Archive Path:** ${stats.archivePath}\n`;
  response += `**HTML Pages:** ${stats.htmlFiles}\n`;
  response += `**Other Files:** ${stats.otherFiles}\n`;
  response += `**Total Files:** ${stats.htmlFiles + stats.otherFiles}\n`;
  response += `**Indexed Pages:** ${stats.indexedPages}\n`;
  response += `**Total Size:** ${(stats.totalSize / BYTES_PER_MB).toFixed(1)} MB\n`;
  response += `**Search Type:** ${searchType}\n`;
  return response;
}

export async function getArchiveStats(context: ServerContext): Promise<ToolCallResponse> {
  const result = await context.query.getArchiveStats();
  if (!result.success) {
    return errorResult(result.error);
  }
  return textResult(formatArchiveStats(result.data));
}
