/**
 * Update Issue Title Tool
 */

import { z } from "zod";
import type { ToolModule } from "../types.js";
import { describeError, errorResult, parseArgs, textResult } from "./result.js";

const UpdateIssueTitleArgs = z.object({
  bug_id: z.string().min(1, "bug_id must not be empty"),
  title: z.string().min(1, "title must not be empty"),
});

export type UpdateIssueTitleArgs = z.infer<typeof UpdateIssueTitleArgs>;

export function buildUpdateIssueTitleArgs({ bug_id, title }: UpdateIssueTitleArgs): string[] {
  return ["bug", "title", "edit", bug_id, "--title", title, "--non-interactive"];
}

export const tool: ToolModule = {
  definition: {
    name: "update_issue_title",
    description: "Update the title of a bug",
    inputSchema: {
      type: "object",
      properties: {
        bug_id: {
          type: "string",
          description: "The ID of the bug to update",
        },
        title: {
          type: "string",
          description: "The new title for the bug",
        },
      },
      required: ["bug_id", "title"],
    },
  },

  handler: async (args, { run, signal }) => {
    const parsed = parseArgs("update_issue_title", UpdateIssueTitleArgs, args);
    if (!parsed.ok) return parsed.result;
    const { bug_id, title } = parsed.data;

    let output: string;
    try {
      output = await run(buildUpdateIssueTitleArgs(parsed.data), signal);
    } catch (error) {
      return errorResult(`Failed to update title of bug ${bug_id}: ${describeError(error)}`);
    }

    return textResult(`Updated bug ${bug_id} title to: ${title}`, {
      success: true,
      bug_id,
      new_title: title,
      message: "Bug title updated successfully",
      output: output.trim(),
    });
  },
};
