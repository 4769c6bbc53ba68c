import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

export type ServerResult = CallToolResult;

export function textResult(text: string): ServerResult {
  return { content: [{ type: "text", text }] };
}

export function errorResult(text: string): ServerResult {
  return { content: [{ type: "text", text }], isError: true };
}
