/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/** Unit separator */
export const US = "\x1f";
/** Record separator */
export const RS = "\x1e";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "delimstore-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDataDir(prefix = "delimstore-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Render rows in table file format with the standard delimiters
 * @example
 * tableFileContent([["12", "sherlock"]]) // "12\x1fsherlock\x1e\n"
 */
export function tableFileContent(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => `${row.join(US)}${RS}\n`).join("");
}

/**
 * Write a schema definition file
 * @param dir - Data directory
 * @param database - Database name
 * @param lines - Schema directives, e.g. ["TAB elementary", "KEY id", "COL name"]
 * @returns Path of the written file
 */
export async function writeSchemaFile(
  dir: string,
  database: string,
  lines: readonly string[],
  extension = ".dbd"
): Promise<string> {
  const filePath = join(dir, `${database}${extension}`);
  await writeFile(filePath, lines.map((line) => `${line}\n`).join(""), "utf-8");
  return filePath;
}

/**
 * Write a table data file
 * @param dir - Data directory
 * @param fileBase - File name without extension (`table` or `database.table`)
 * @param content - Rows, or raw file content written as is
 * @returns Path of the written file
 */
export async function writeTableFile(
  dir: string,
  fileBase: string,
  content: readonly (readonly string[])[] | string | Uint8Array,
  extension = ".dtf"
): Promise<string> {
  const filePath = join(dir, `${fileBase}${extension}`);
  const data = typeof content === "string" || content instanceof Uint8Array ? content : tableFileContent(content);
  await writeFile(filePath, data);
  return filePath;
}
