#!/usr/bin/env node
/**
 * MCP Server Entry Point
 *
 * The client spawns this process and exchanges JSON-RPC messages with it
 * over stdin/stdout.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createGitBugRunner } from "./git-bug.js";
import { logger } from "./logger.js";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const server = createServer(createGitBugRunner(config));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ repoDir: config.repoDir, bin: config.gitBugBin }, "gitbug-mcp server running on stdio");
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "server failed");
  process.exit(1);
});
