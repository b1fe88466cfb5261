/**
 * Update Issue Status Tool
 *
 * Maps the user-facing status ("open" / "closed") onto git-bug's
 * `bug status open|close` subcommands.
 */

import { z } from "zod";
import type { ToolModule } from "../types.js";
import { describeError, errorResult, parseArgs, textResult } from "./result.js";

const STATUS_SUBCOMMANDS: Record<string, string> = {
  open: "open",
  closed: "close",
};

const UpdateIssueStatusArgs = z.object({
  bug_id: z.string().min(1, "bug_id must not be empty"),
  status: z.string(),
});

export type UpdateIssueStatusArgs = z.infer<typeof UpdateIssueStatusArgs>;

/**
 * Returns undefined for a status git-bug has no subcommand for.
 */
export function buildUpdateIssueStatusArgs({ bug_id, status }: UpdateIssueStatusArgs): string[] | undefined {
  if (!Object.hasOwn(STATUS_SUBCOMMANDS, status)) return undefined;
  return ["bug", "status", STATUS_SUBCOMMANDS[status], bug_id];
}

export const tool: ToolModule = {
  definition: {
    name: "update_issue_status",
    description: "Update the status of a bug (open/closed)",
    inputSchema: {
      type: "object",
      properties: {
        bug_id: {
          type: "string",
          description: "The ID of the bug to update",
        },
        status: {
          type: "string",
          enum: ["open", "closed"],
          description: "The new status (open, closed)",
        },
      },
      required: ["bug_id", "status"],
    },
  },

  handler: async (args, { run, signal }) => {
    const parsed = parseArgs("update_issue_status", UpdateIssueStatusArgs, args);
    if (!parsed.ok) return parsed.result;
    const { bug_id, status } = parsed.data;

    const argv = buildUpdateIssueStatusArgs(parsed.data);
    if (!argv) {
      return errorResult(`Invalid status: ${status}. Must be 'open' or 'closed'`);
    }

    let output: string;
    try {
      output = await run(argv, signal);
    } catch (error) {
      return errorResult(`Failed to update status of bug ${bug_id}: ${describeError(error)}`);
    }

    return textResult(`Updated bug ${bug_id} status to ${status}`, {
      success: true,
      bug_id,
      new_status: status,
      message: `Bug status updated to ${status}`,
      output: output.trim(),
    });
  },
};
