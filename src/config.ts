/**
 * Shared Configuration
 *
 * Everything the server needs from its environment, read once at startup.
 */

import * as path from "path";

export const SERVER_NAME = "gitbug-mcp";
export const SERVER_VERSION = "1.0.0";

/**
 * Environment variable that keeps git-bug from prompting.
 */
export const NON_INTERACTIVE_ENV = "GIT_BUG_NON_INTERACTIVE";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServerConfig {
  /** Executable to run, resolved through PATH when not absolute. */
  gitBugBin: string;
  /** Repository directory git-bug runs in. */
  repoDir: string;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Unrecognised levels fall back rather than failing startup.
 */
export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const level = raw?.trim().toLowerCase();
  return level && isLogLevel(level) ? level : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const repo = env.GIT_BUG_REPO?.trim();
  return {
    gitBugBin: env.GIT_BUG_BIN?.trim() || "git-bug",
    repoDir: repo ? path.resolve(repo) : process.cwd(),
  };
}
