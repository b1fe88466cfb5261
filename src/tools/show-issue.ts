/**
 * Show Issue Tool
 */

import { z } from "zod";
import type { ToolModule } from "../types.js";
import { describeError, errorResult, parseArgs, pushFlags, textResult } from "./result.js";

const ShowIssueArgs = z.object({
  bug_id: z.string().min(1, "bug_id must not be empty"),
  format: z.string().optional(),
  field: z.string().optional(),
});

export type ShowIssueArgs = z.infer<typeof ShowIssueArgs>;

export function buildShowIssueArgs({ bug_id, format, field }: ShowIssueArgs): string[] {
  return pushFlags(["bug", "show", bug_id], [
    ["--format", format],
    ["--field", field],
  ]);
}

export const tool: ToolModule = {
  definition: {
    name: "show_issue",
    description: "Display details of a specific bug",
    inputSchema: {
      type: "object",
      properties: {
        bug_id: {
          type: "string",
          description: "The ID of the bug to show",
        },
        format: {
          type: "string",
          description: "Output format (default, json, org-mode)",
        },
        field: {
          type: "string",
          description:
            "Specific field to display (author, authorEmail, createTime, lastEdit, humanId, id, labels, shortId, status, title, actors, participants)",
        },
      },
      required: ["bug_id"],
    },
  },

  handler: async (args, { run, signal }) => {
    const parsed = parseArgs("show_issue", ShowIssueArgs, args);
    if (!parsed.ok) return parsed.result;
    const { bug_id, format = "", field = "" } = parsed.data;

    let output: string;
    try {
      output = await run(buildShowIssueArgs(parsed.data), signal);
    } catch (error) {
      return errorResult(`Failed to show issue ${bug_id}: ${describeError(error)}`);
    }

    return textResult(output, {
      success: true,
      bug_id,
      details: output.trim(),
      format,
      field,
    });
  },
};
