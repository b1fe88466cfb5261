/**
 * Tool Registry
 *
 * Collects all tools and exports them in the formats the server needs:
 * - definitions: Array of tool schemas for ListToolsRequest
 * - handlers: Map of tool name → handler function for CallToolRequest
 *
 * To add a new tool, create its module under src/tools/ and add it to
 * toolModules below.
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { ToolModule, ToolHandler } from "../types.js";

import { tool as createIssue } from "./create-issue.js";
import { tool as listIssues } from "./list-issues.js";
import { tool as showIssue } from "./show-issue.js";
import { tool as addComment } from "./add-comment.js";
import { tool as updateIssueStatus } from "./update-issue-status.js";
import { tool as updateIssueTitle } from "./update-issue-title.js";
import { tool as deleteIssue } from "./delete-issue.js";

const toolModules: ToolModule[] = [
  createIssue,
  listIssues,
  showIssue,
  addComment,
  updateIssueStatus,
  updateIssueTitle,
  deleteIssue,
];

export const definitions: Tool[] = toolModules.map((t) => t.definition);

export const handlers: Map<string, ToolHandler> = new Map(
  toolModules.map((t) => [t.definition.name, t.handler])
);
