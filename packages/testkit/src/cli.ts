/**
 * CLI testing utilities
 */

import { execa } from "execa";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory; must be where `tsx` resolves from */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
}

/**
 * Execute the TypeScript CLI entry point in a child Node process through tsx
 * @param cliPath - Path to the CLI source file
 * @param args - Command arguments
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(cliPath: string, args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { cwd, env } = options;

  const result = await execa("node", ["--import", "tsx", cliPath, ...args], {
    cwd,
    env: { ...process.env, ...env },
    reject: false,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
