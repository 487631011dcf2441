/**
 * Tool Results
 *
 * Every tool answers with one JSON document in a text content block.
 * Payloads carrying an `error` key are flagged with `isError`.
 */

import { isErrorPayload, ToolError } from '../errors.js';

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function jsonResult(payload: unknown): ToolResult {
  const result: ToolResult = {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  };
  if (isErrorPayload(payload)) {
    result.isError = true;
  }
  return result;
}

export function errorResult(error: unknown): ToolResult {
  if (error instanceof ToolError) {
    return jsonResult(error.toPayload());
  }
  const message = error instanceof Error ? error.message : String(error);
  return jsonResult({ error: `Unexpected error: ${message}` });
}
