/**
 * Page listing tool
 */

import type { ServerContext } from '../context.js';
import type { PageSummary } from '../types/docs.js';
import type { ListPagesArgs, ToolCallResponse } from '../types/tools.js';
import { errorResult, textResult } from './results.js';

export function formatPageList(pages: PageSummary[], filterPattern?: string): string {
  if (pages.length === 0) {
    return 'No pages found in archive';
  }

  let response = `Archive contains ${pages.length} pages`;
  if (filterPattern) {
    response += ` matching '${filterPattern}'`;
  }
  response += ':\n\n';

  for (const page of pages) {
    response += `• **${page.title}**\n  Path: ${page.path}\n`;
    if (page.url !== page.path) {
      response += `  Original: ${page.url}\n`;
    }
    response += '\n';
  }
  return response;
}

export async function listPages(context: ServerContext, args: ListPagesArgs): Promise<ToolCallResponse> {
  const result = await context.query.listPages(args.filter_pattern, args.limit);
  if (!result.success) {
    return errorResult(result.error);
  }
  return textResult(formatPageList(result.data, args.filter_pattern));
}
