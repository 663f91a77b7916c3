import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";

/**
 * Run a tool body and wrap its value as pretty-printed JSON text.
 * Thrown errors become an `isError` result instead of a protocol error.
 */
export function runTool(name: string, body: () => unknown): CallToolResult {
  try {
    return {
      content: [{ type: "text", text: JSON.stringify(body(), null, 2) }],
    };
  } catch (error) {
    const message = errorMessage(error);
    logger.warn({ tool: name, error: message }, "Tool failed");
    return {
      content: [{ type: "text", text: `Error: ${message}` }],
      isError: true,
    };
  }
}
