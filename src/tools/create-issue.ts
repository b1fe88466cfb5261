/**
 * Create Issue Tool
 *
 * Opens a new bug and reports the id git-bug prints for it.
 */

import { z } from "zod";
import type { ToolModule } from "../types.js";
import { describeError, errorResult, parseArgs, textResult } from "./result.js";

const CreateIssueArgs = z.object({
  title: z.string().min(1, "title must not be empty"),
  message: z.string().min(1, "message must not be empty"),
});

export type CreateIssueArgs = z.infer<typeof CreateIssueArgs>;

export function buildCreateIssueArgs({ title, message }: CreateIssueArgs): string[] {
  return ["bug", "new", "--title", title, "--message", message, "--non-interactive"];
}

/**
 * git-bug prints the new id on the last line of its output.
 */
export function extractBugId(output: string): string {
  const lines = output.trim().split("\n");
  return lines[lines.length - 1].trim();
}

export const tool: ToolModule = {
  definition: {
    name: "create_issue",
    description: "Create a new bug in git-bug",
    inputSchema: {
      type: "object",
      properties: {
        title: {
          type: "string",
          description: "The title of the issue",
        },
        message: {
          type: "string",
          description: "The description/message of the issue",
        },
      },
      required: ["title", "message"],
    },
  },

  handler: async (args, { run, signal }) => {
    const parsed = parseArgs("create_issue", CreateIssueArgs, args);
    if (!parsed.ok) return parsed.result;
    const { title } = parsed.data;

    let output: string;
    try {
      output = await run(buildCreateIssueArgs(parsed.data), signal);
    } catch (error) {
      return errorResult(`Failed to create issue: ${describeError(error)}`);
    }

    const bugId = extractBugId(output);
    return textResult(`Created issue: ${title}\n${bugId}`, {
      success: true,
      message: "Issue created successfully",
      title,
      bug_id: bugId,
      output: output.trim(),
    });
  },
};
