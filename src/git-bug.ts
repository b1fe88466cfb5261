/**
 * git-bug Command Runner
 *
 * Every tool funnels through here. The command runs without a shell, with
 * stdin closed and GIT_BUG_NON_INTERACTIVE set, and its stdout and stderr are
 * collected into a single buffer in the order they arrive.
 */

import { spawn } from "child_process";
import { NON_INTERACTIVE_ENV, type ServerConfig } from "./config.js";
import { logger } from "./logger.js";

/**
 * Runs git-bug with the given arguments and resolves with its combined output.
 * Handlers receive one of these through their ToolContext.
 */
export type GitBugRunner = (args: string[], signal?: AbortSignal) => Promise<string>;

export interface RunOptions {
  bin?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

export class GitBugCommandError extends Error {
  readonly output: string;
  readonly exitCode?: number;

  constructor(reason: string, output: string, options: { exitCode?: number; cause?: unknown } = {}) {
    super(`git-bug command failed: ${reason}, output: ${output}`, { cause: options.cause });
    this.name = "GitBugCommandError";
    this.output = output;
    this.exitCode = options.exitCode;
  }
}

export function runGitBug(args: string[], options: RunOptions = {}): Promise<string> {
  const bin = options.bin ?? "git-bug";
  logger.debug({ bin, args, cwd: options.cwd }, "running git-bug");

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let childError: Error | undefined;
    let settled = false;

    const fail = (error: GitBugCommandError) => {
      if (settled) return;
      settled = true;
      logger.warn({ bin, args, exitCode: error.exitCode, output: error.output }, error.message);
      reject(error);
    };

    const child = spawn(bin, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env, [NON_INTERACTIVE_ENV]: "1" },
      signal: options.signal,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const collect = (chunk: Buffer) => {
      chunks.push(chunk);
    };
    child.stdout.on("data", collect);
    child.stderr.on("data", collect);

    child.on("error", (error) => {
      childError = error;
      // Never started (e.g. ENOENT): no close event carries the failure.
      if (child.pid === undefined) {
        fail(new GitBugCommandError(error.message, "", { cause: error }));
      }
    });

    child.on("close", (code, signal) => {
      const output = Buffer.concat(chunks).toString("utf8");
      if (childError) {
        fail(new GitBugCommandError(childError.message, output, { cause: childError }));
      } else if (code === 0) {
        settled = true;
        resolve(output);
      } else if (code !== null) {
        fail(new GitBugCommandError(`exit status ${code}`, output, { exitCode: code }));
      } else {
        fail(new GitBugCommandError(`signal: ${signal ?? "unknown"}`, output));
      }
    });
  });
}

export function createGitBugRunner(config: ServerConfig): GitBugRunner {
  return (args, signal) => runGitBug(args, { bin: config.gitBugBin, cwd: config.repoDir, signal });
}
