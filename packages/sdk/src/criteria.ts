/**
 * Criteria parsing and row matching
 *
 * A criteria string is `COLUMN=VALUE`, `COLUMN=/pattern/` or a bare value
 * compared against the primary key. Criteria naming a column the table
 * does not have match no rows.
 */

import type { Criteria, Row } from "./types.js";
import { logger } from "./observability/logs.js";

const NUMERIC_STRING = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?\s*$/;
const INTEGER_STRING = /^\s*([+-]?)0*(\d+)\s*$/;

/**
 * Parse a raw criteria string
 * @param raw - `COLUMN=VALUE` or a bare value
 * @param primaryKey - Column used when no column is named
 */
export function parseCriteria(raw: string, primaryKey: string): Criteria {
  let column: string;
  let value: string;

  const eq = raw.indexOf("=");
  if (eq !== -1) {
    column = raw.slice(0, eq).trim();
    value = raw.slice(eq + 1).trim();
  } else {
    column = primaryKey;
    value = raw.trim();
  }

  if (value === "true") {
    value = "1";
  } else if (value === "false") {
    value = "";
  }

  const isRegex = value.length >= 2 && value.startsWith("/") && value.endsWith("/");

  return { column, value, isRegex };
}

/**
 * Sign and digits of an integer string with leading zeros removed, or
 * undefined when the text is not an integer
 */
function canonicalInteger(text: string): string | undefined {
  const match = INTEGER_STRING.exec(text);
  if (!match) {
    return undefined;
  }
  const digits = match[2] ?? "";
  return digits === "0" ? "0" : `${match[1] === "-" ? "-" : ""}${digits}`;
}

/**
 * Compare a stored value against a plain criteria value.
 * Two numeric strings compare by number ("12" equals "12.0"); two integer
 * strings compare digit by digit, so keys past 2^53 stay distinct.
 */
export function valuesEqual(stored: string, wanted: string): boolean {
  if (stored === wanted) {
    return true;
  }

  const storedInteger = canonicalInteger(stored);
  const wantedInteger = canonicalInteger(wanted);
  if (storedInteger !== undefined && wantedInteger !== undefined) {
    return storedInteger === wantedInteger;
  }

  if (NUMERIC_STRING.test(stored) && NUMERIC_STRING.test(wanted)) {
    return Number(stored) === Number(wanted);
  }
  return false;
}

/**
 * Build the row predicate for a criteria, or undefined when nothing can match
 */
function buildPredicate(criteria: Criteria, columns: readonly string[]): ((row: Row) => boolean) | undefined {
  const index = columns.indexOf(criteria.column);
  if (index === -1) {
    return undefined;
  }

  if (!criteria.isRegex) {
    return (row) => valuesEqual(row[index] ?? "", criteria.value);
  }

  let pattern: RegExp;
  try {
    pattern = new RegExp(criteria.value.slice(1, -1), "i");
  } catch (err) {
    logger.warn("criteria.invalid_regex", {
      message: criteria.value,
      details: { column: criteria.column, error: err instanceof Error ? err.message : String(err) },
    });
    return undefined;
  }
  return (row) => pattern.test(row[index] ?? "");
}

/**
 * Find the indices of rows matching a criteria
 * @param criteria - Parsed criteria
 * @param columns - The table's full column list
 * @param rows - Rows in file order
 * @returns Matching row indices in ascending order
 */
export function matchingRowIndices(criteria: Criteria, columns: readonly string[], rows: readonly Row[]): number[] {
  const predicate = buildPredicate(criteria, columns);
  if (!predicate) {
    return [];
  }

  const indices: number[] = [];
  rows.forEach((row, i) => {
    if (predicate(row)) {
      indices.push(i);
    }
  });
  return indices;
}

/**
 * Filter rows by a criteria, keeping their order
 */
export function matchRows(criteria: Criteria, columns: readonly string[], rows: readonly Row[]): Row[] {
  const predicate = buildPredicate(criteria, columns);
  if (!predicate) {
    return [];
  }
  return rows.filter(predicate);
}
