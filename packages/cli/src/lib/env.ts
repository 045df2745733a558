/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { CliError } from "./errors.js";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the data directory
 * Priority: CLI option > DELIMSTORE_DATA env var > default "./data"
 */
export function resolveDataPath(cliPath?: string): string {
  const dataPath = cliPath ?? process.env.DELIMSTORE_DATA ?? "./data";
  return path.resolve(expandTilde(dataPath));
}

/**
 * Resolve the database name
 * Priority: CLI option > DELIMSTORE_DB env var
 * @throws CliError if neither is set
 */
export function resolveDatabaseName(cliName?: string): string {
  const name = cliName ?? process.env.DELIMSTORE_DB;
  if (!name || name.trim() === "") {
    throw new CliError("No database name given; use --db <name> or set DELIMSTORE_DB");
  }
  return name.trim();
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.DELIMSTORE_CLI_DEBUG === "1";
}
