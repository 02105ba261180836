/**
 * Link extraction tool
 */

import type { ServerContext } from '../context.js';
import type { PageLink } from '../types/docs.js';
import type { ExtractLinksArgs, ToolCallResponse } from '../types/tools.js';
import { errorResult, textResult } from './results.js';

export function formatLinks(path: string, links: PageLink[], internalOnly: boolean): string {
  const kind = internalOnly ? 'internal ' : '';
  if (links.length === 0) {
    return `No ${kind}links found in '${path}'`;
  }

  let response = `Found ${links.length} ${kind}links in '${path}':\n\n`;
  for (const link of links) {
    response += `• [${link.text || 'No text'}](${link.href})\n`;
  }
  return response;
}

export async function extractLinks(context: ServerContext, args: ExtractLinksArgs): Promise<ToolCallResponse> {
  try {
    const result = await context.query.extractLinks(args.path, args.internal_only);
    if (!result.success) {
      return errorResult(result.error);
    }
    return textResult(formatLinks(args.path, result.data, args.internal_only));
  } catch (error) {
    return errorResult(
      `Could not extract links from '${args.path}': ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
