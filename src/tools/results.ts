import type { ToolCallResponse } from '../types/tools.js';

export function textResult(text: string): ToolCallResponse {
  return { content: [{ type: 'text', text }] };
}

/**
 * Descriptive failure text for the caller, flagged as an error result
 */
export function errorResult(message: string): ToolCallResponse {
  return {
    content: [{ type: 'text', text: `Error: ${message}` }],
    isError: true,
  };
}
