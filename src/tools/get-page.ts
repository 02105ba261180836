/**
 * Page retrieval tool
 */

import type { ServerContext } from '../context.js';
import type { PageContent } from '../types/docs.js';
import type { GetPageArgs, ToolCallResponse } from '../types/tools.js';
import { errorResult, textResult } from './results.js';

export function formatPage(page: PageContent): string {
  let response = `# ${page.title}\n\n`;
  response += `**Path:** ${page.path}\n`;
  response += `**File size:** ${page.size} bytes\n\n`;
  response += `**Content:**\n${page.text}`;
  if (page.raw !== undefined) {
    response += `\n\n**Raw HTML:**\n\`\`\`html\n${page.raw}\n\`\`\``;
  }
  return response;
}

export async function getPage(context: ServerContext, args: GetPageArgs): Promise<ToolCallResponse> {
  try {
    const result = await context.query.getPage(args.path, args.include_raw);
    if (!result.success) {
      return errorResult(result.error);
    }
    return textResult(formatPage(result.data));
  } catch (error) {
    return errorResult(`Could not read file '${args.path}': ${error instanceof Error ? error.message : String(error)}`);
  }
}
