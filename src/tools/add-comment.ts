/**
 * Add Comment Tool
 */

import { z } from "zod";
import type { ToolModule } from "../types.js";
import { describeError, errorResult, parseArgs, textResult } from "./result.js";

const AddCommentArgs = z.object({
  bug_id: z.string().min(1, "bug_id must not be empty"),
  message: z.string().min(1, "message must not be empty"),
});

export type AddCommentArgs = z.infer<typeof AddCommentArgs>;

export function buildAddCommentArgs({ bug_id, message }: AddCommentArgs): string[] {
  return ["bug", "comment", "new", bug_id, "--message", message, "--non-interactive"];
}

export const tool: ToolModule = {
  definition: {
    name: "add_comment",
    description: "Add a comment to a bug",
    inputSchema: {
      type: "object",
      properties: {
        bug_id: {
          type: "string",
          description: "The ID of the bug to comment on",
        },
        message: {
          type: "string",
          description: "The comment message",
        },
      },
      required: ["bug_id", "message"],
    },
  },

  handler: async (args, { run, signal }) => {
    const parsed = parseArgs("add_comment", AddCommentArgs, args);
    if (!parsed.ok) return parsed.result;
    const { bug_id } = parsed.data;

    let output: string;
    try {
      output = await run(buildAddCommentArgs(parsed.data), signal);
    } catch (error) {
      return errorResult(`Failed to add comment to bug ${bug_id}: ${describeError(error)}`);
    }

    return textResult(`Added comment to bug ${bug_id}`, {
      success: true,
      bug_id,
      message: "Comment added successfully",
      output: output.trim(),
    });
  },
};
