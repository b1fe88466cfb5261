/**
 * MCP Server
 *
 * Builds the protocol server and connects it to the tool registry. The SDK
 * handles the protocol itself; this file only answers the two requests a
 * tools-only server has to: "what tools do you have?" and "run tool X".
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { SERVER_NAME, SERVER_VERSION } from "./config.js";
import type { GitBugRunner } from "./git-bug.js";
import { logger } from "./logger.js";
import { definitions, handlers } from "./tools/index.js";
import { describeError, errorResult } from "./tools/result.js";

export function createServer(run: GitBugRunner): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: definitions };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    const handler = handlers.get(name);
    if (!handler) {
      return errorResult(`Unknown tool: ${name}`);
    }

    logger.debug({ tool: name }, "tool call");
    try {
      // extra.signal aborts when the client cancels, which kills the subprocess
      return await handler(args ?? {}, { run, signal: extra.signal });
    } catch (error) {
      logger.error({ tool: name, err: error }, "tool handler threw");
      return errorResult(`Error: ${describeError(error)}`);
    }
  });

  return server;
}
