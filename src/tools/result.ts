/**
 * Result helpers shared by the tool modules.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";

export function textResult(text: string, structured?: Record<string, unknown>): CallToolResult {
  const result: CallToolResult = { content: [{ type: "text", text }] };
  if (structured) result.structuredContent = structured;
  return result;
}

export function errorResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }], isError: true };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type ParsedArgs<T> = { ok: true; data: T } | { ok: false; result: CallToolResult };

/**
 * Validates raw call arguments, turning schema failures into an error result.
 */
export function parseArgs<T>(
  toolName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  args: Record<string, unknown>
): ParsedArgs<T> {
  const parsed = schema.safeParse(args);
  if (parsed.success) return { ok: true, data: parsed.data };

  const problems = parsed.error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
  return { ok: false, result: errorResult(`Invalid arguments for ${toolName}: ${problems}`) };
}

/**
 * Appends `flag value` for each option that has a non-empty value.
 */
export function pushFlags(argv: string[], flags: Array<[flag: string, value: string | undefined]>): string[] {
  for (const [flag, value] of flags) {
    if (value) argv.push(flag, value);
  }
  return argv;
}
