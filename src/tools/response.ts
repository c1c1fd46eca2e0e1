import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { CommandResult, UnexpectedExecutionError } from "../types/result.js";
import { errorMessage } from "../execution/runner.js";

export const EMPTY_OUTPUT = "(no output)";

/** Render a tool outcome as MCP content. Failures keep their JSON descriptor and set isError. */
export function toCallToolResult(result: CommandResult): CallToolResult {
  if (!result.ok) {
    return { content: [{ type: "text", text: JSON.stringify(result.failure, null, 2) }], isError: true };
  }
  if (result.kind === "json") {
    return { content: [{ type: "text", text: JSON.stringify(result.data, null, 2) }] };
  }
  return { content: [{ type: "text", text: result.text === "" ? EMPTY_OUTPUT : result.text }] };
}

/** For a handler that threw instead of returning a failure. */
export function thrownToCallToolResult(err: unknown): CallToolResult {
  const descriptor: UnexpectedExecutionError = {
    error: "unexpected execution error",
    details: errorMessage(err),
  };
  return { content: [{ type: "text", text: JSON.stringify(descriptor, null, 2) }], isError: true };
}
