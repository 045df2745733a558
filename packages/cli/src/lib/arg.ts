/**
 * Argument parsing and validation helpers
 */

import { z } from "zod";
import type { FieldValue } from "@delimstore/sdk";
import { CliError } from "./errors.js";

const ValuesSchema = z.array(z.union([z.string(), z.number().finite(), z.boolean(), z.null()]));

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new CliError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse a JSON array of values for insert/update
 *
 * Booleans become "1" and "" and null becomes "", the same text the
 * criteria `true`/`false` literals compare against.
 */
export function parseValues(value: string, source: string): FieldValue[] {
  const result = ValuesSchema.safeParse(parseJson(value, source));
  if (!result.success) {
    throw new CliError(`${source} must be a JSON array of strings, numbers, booleans or null`);
  }

  return result.data.map((item) => {
    if (item === null || item === false) return "";
    if (item === true) return "1";
    return item;
  });
}
