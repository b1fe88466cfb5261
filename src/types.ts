/**
 * Shared Type Definitions
 *
 * The structure every tool follows. A tool module pairs the definition shown
 * to clients with the handler that runs when the tool is called.
 */

import type { Tool, CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { GitBugRunner } from "./git-bug.js";

/**
 * What a handler gets besides its arguments.
 */
export interface ToolContext {
  run: GitBugRunner;
  /** Fires when the client cancels the request. */
  signal?: AbortSignal;
}

/**
 * A function that handles tool execution.
 *
 * @param args - Key-value pairs passed by the client, not yet validated
 * @returns A result with content array and optional isError flag
 */
export type ToolHandler = (args: Record<string, unknown>, context: ToolContext) => Promise<CallToolResult>;

/**
 * A complete tool module with its definition and implementation.
 *
 * Example:
 * ```typescript
 * export const tool: ToolModule = {
 *   definition: {
 *     name: "my_tool",
 *     description: "Does something useful",
 *     inputSchema: { type: "object", properties: { ... } }
 *   },
 *   handler: async (args, { run, signal }) => {
 *     const output = await run(["bug"], signal);
 *     return { content: [{ type: "text", text: output }] };
 *   }
 * };
 * ```
 */
export interface ToolModule {
  definition: Tool;
  handler: ToolHandler;
}
