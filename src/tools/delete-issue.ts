/**
 * Delete Issue Tool
 *
 * Removes a bug from the local repository. git-bug does not ask for
 * confirmation here, so neither do we.
 */

import { z } from "zod";
import type { ToolModule } from "../types.js";
import { describeError, errorResult, parseArgs, textResult } from "./result.js";

const DeleteIssueArgs = z.object({
  bug_id: z.string().min(1, "bug_id must not be empty"),
});

export type DeleteIssueArgs = z.infer<typeof DeleteIssueArgs>;

export function buildDeleteIssueArgs({ bug_id }: DeleteIssueArgs): string[] {
  return ["bug", "rm", bug_id];
}

export const tool: ToolModule = {
  definition: {
    name: "delete_issue",
    description: "Remove a bug from git-bug",
    inputSchema: {
      type: "object",
      properties: {
        bug_id: {
          type: "string",
          description: "The ID of the bug to delete",
        },
      },
      required: ["bug_id"],
    },
  },

  handler: async (args, { run, signal }) => {
    const parsed = parseArgs("delete_issue", DeleteIssueArgs, args);
    if (!parsed.ok) return parsed.result;
    const { bug_id } = parsed.data;

    let output: string;
    try {
      output = await run(buildDeleteIssueArgs(parsed.data), signal);
    } catch (error) {
      return errorResult(`Failed to delete bug ${bug_id}: ${describeError(error)}`);
    }

    return textResult(`Deleted bug ${bug_id}`, {
      success: true,
      bug_id,
      message: "Bug deleted successfully",
      output: output.trim(),
    });
  },
};
