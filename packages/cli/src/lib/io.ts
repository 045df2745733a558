/**
 * I/O helpers for CLI
 */

/**
 * Output streams a command writes to
 */
export interface CliIO {
  /** Write to standard output */
  stdout(content: string): void;
  /** Write to standard error */
  stderr(content: string): void;
  /** Whether stderr is an interactive terminal */
  stderrIsTTY: boolean;
}

/**
 * Process streams
 */
export const processIO: CliIO = {
  stdout: (content) => {
    process.stdout.write(content);
  },
  stderr: (content) => {
    process.stderr.write(content);
  },
  stderrIsTTY: process.stderr.isTTY ?? false,
};

/**
 * Collects output in memory
 */
export function createBufferedIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (content) => {
      out.push(content);
    },
    stderr: (content) => {
      err.push(content);
    },
    stderrIsTTY: false,
  };
}
