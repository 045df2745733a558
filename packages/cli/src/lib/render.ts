/**
 * Output rendering helpers
 */

import type { CliIO } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(io: CliIO, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  io.stdout(json + "\n");
}

/**
 * Print lines (one per line)
 */
export function printLines(io: CliIO, lines: readonly string[]): void {
  lines.forEach((line) => io.stdout(line + "\n"));
}

/**
 * Apply ANSI color only when the target stream is a TTY
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  if (!isTTY) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
