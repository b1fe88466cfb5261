/**
 * List Issues Tool
 *
 * Runs `git-bug bug` with whichever filters were given. The query, if any,
 * goes last as a positional argument.
 */

import { z } from "zod";
import type { ToolModule } from "../types.js";
import { describeError, errorResult, parseArgs, pushFlags, textResult } from "./result.js";

const ListIssuesArgs = z.object({
  status: z.string().optional(),
  author: z.string().optional(),
  label: z.string().optional(),
  format: z.string().optional(),
  query: z.string().optional(),
});

export type ListIssuesArgs = z.infer<typeof ListIssuesArgs>;

export function buildListIssuesArgs(filters: ListIssuesArgs): string[] {
  const argv = pushFlags(["bug"], [
    ["--status", filters.status],
    ["--author", filters.author],
    ["--label", filters.label],
    ["--format", filters.format],
  ]);
  if (filters.query) argv.push(filters.query);
  return argv;
}

export const tool: ToolModule = {
  definition: {
    name: "list_issues",
    description: "List bugs in git-bug with optional filters",
    inputSchema: {
      type: "object",
      properties: {
        status: {
          type: "string",
          description: "Filter by status (open, closed)",
        },
        author: {
          type: "string",
          description: "Filter by author",
        },
        label: {
          type: "string",
          description: "Filter by label",
        },
        format: {
          type: "string",
          description: "Output format (default, plain, id, json)",
        },
        query: {
          type: "string",
          description: "Search query string",
        },
      },
      required: [],
    },
  },

  handler: async (args, { run, signal }) => {
    const parsed = parseArgs("list_issues", ListIssuesArgs, args);
    if (!parsed.ok) return parsed.result;
    const { status = "", author = "", label = "", format = "", query = "" } = parsed.data;

    let output: string;
    try {
      output = await run(buildListIssuesArgs(parsed.data), signal);
    } catch (error) {
      return errorResult(`Failed to list issues: ${describeError(error)}`);
    }

    return textResult(output, {
      success: true,
      issues: output.trim(),
      filters: { status, author, label, format, query },
    });
  },
};
