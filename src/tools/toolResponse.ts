import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { PaginationParams, ToolEnvelope } from "../types/index.js";

/**
 * Serialises an envelope into the single text block a tool call returns.
 */
export function toToolResult<T>(envelope: ToolEnvelope<T>): CallToolResult {
  const result: CallToolResult = {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(envelope, null, 2),
      },
    ],
  };
  if (envelope.status === "error") {
    result.isError = true;
  }
  return result;
}

/**
 * Maps snake_case tool arguments onto the API's pagination query.
 */
export function toPaginationParams(args: {
  page?: number;
  page_size?: number;
}): PaginationParams {
  return { page: args.page, pageSize: args.page_size };
}
