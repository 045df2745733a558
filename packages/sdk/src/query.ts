/**
 * Column lists, projection and natural-order sorting
 */

import type { ColumnList, OrderSpec, Row, RowObject, SortDirection, Table } from "./types.js";
import { ColumnNotFoundError } from "./errors.js";

/**
 * Columns resolved against a table
 */
export interface ResolvedColumns {
  /** Column names in requested order */
  names: string[];
  /** Position of each name in the table's column list */
  indices: number[];
}

/**
 * Normalize a column list
 *
 * `*`, an empty string or a whitespace-only string mean every column and
 * come back as an empty list. Backticks around names are removed.
 *
 * @param list - Comma-separated string or array of names
 * @returns Requested names, or [] for all columns
 */
export function parseColumnList(list: ColumnList): string[] {
  let names: readonly string[];
  if (typeof list === "string") {
    const trimmed = list.trim();
    if (trimmed === "*" || trimmed === "") {
      return [];
    }
    names = trimmed.split(",");
  } else {
    names = list;
  }

  const cleaned = names.map((name) => name.replace(/`/g, "").trim());
  if (cleaned.length === 1 && cleaned[0] === "*") {
    return [];
  }
  return cleaned;
}

/**
 * Resolve requested names against a table's columns
 * @param table - Table the names belong to
 * @param requested - Output of parseColumnList ([] for all columns)
 * @throws ColumnNotFoundError naming every unknown column
 */
export function resolveColumns(table: Table, requested: readonly string[]): ResolvedColumns {
  if (requested.length === 0) {
    return { names: [...table.columns], indices: table.columns.map((_, i) => i) };
  }

  const indices: number[] = [];
  const unknown: string[] = [];
  for (const name of requested) {
    const index = table.columns.indexOf(name);
    if (index === -1) {
      unknown.push(name);
    } else {
      indices.push(index);
    }
  }

  if (unknown.length > 0) {
    throw new ColumnNotFoundError(table.name, unknown);
  }
  return { names: [...requested], indices };
}

/**
 * Parse an ordering such as `name`, `name asc` or `date   DESC`
 * @returns The ordering, or undefined for an empty string
 */
export function parseOrder(order: string): OrderSpec | undefined {
  const parts = order.trim().split(/\s+/);
  const column = parts[0];
  if (!column) {
    return undefined;
  }

  const direction: SortDirection = parts[1]?.toLowerCase() === "desc" ? "desc" : "asc";
  return { column, direction };
}

function compareCodePoints(a: string, b: string): number {
  const ac = Array.from(a);
  const bc = Array.from(b);
  const len = Math.min(ac.length, bc.length);
  for (let i = 0; i < len; i++) {
    const diff = (ac[i]?.codePointAt(0) ?? 0) - (bc[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }
  return Math.sign(ac.length - bc.length);
}

/**
 * Compare two runs of digits by integer value, at any length
 */
function compareDigitRuns(a: string, b: string): number {
  const an = a.replace(/^0+/, "");
  const bn = b.replace(/^0+/, "");
  if (an.length !== bn.length) {
    return an.length < bn.length ? -1 : 1;
  }
  return an < bn ? -1 : an > bn ? 1 : 0;
}

const SEGMENT = /\d+|\D+/g;
const DIGITS = /^\d/;

/**
 * Natural-order comparison
 *
 * Both strings are split into alternating digit and non-digit runs. Digit
 * runs compare as integers; everything else compares by code point.
 *
 * @example
 * ["img12", "img10", "img2"].sort(naturalCompare) // ["img2", "img10", "img12"]
 */
export function naturalCompare(a: string, b: string): number {
  const as = a.match(SEGMENT) ?? [];
  const bs = b.match(SEGMENT) ?? [];
  const len = Math.min(as.length, bs.length);

  for (let i = 0; i < len; i++) {
    const x = as[i] ?? "";
    const y = bs[i] ?? "";
    const cmp = DIGITS.test(x) && DIGITS.test(y) ? compareDigitRuns(x, y) : compareCodePoints(x, y);
    if (cmp !== 0) {
      return cmp;
    }
  }
  return Math.sign(as.length - bs.length);
}

/**
 * Stable natural-order sort on one column
 *
 * Descending order reverses the ascending result, so rows with equal keys
 * come out in reverse file order.
 *
 * @param rows - Rows to sort (not modified)
 * @param index - Column position of the sort key
 * @returns A new, sorted array
 */
export function sortRows(rows: readonly Row[], index: number, direction: SortDirection = "asc"): Row[] {
  const sorted = rows
    .map((row, position) => ({ row, position, key: row[index] ?? "" }))
    .sort((x, y) => naturalCompare(x.key, y.key) || x.position - y.position)
    .map((entry) => entry.row);

  return direction === "desc" ? sorted.reverse() : sorted;
}

/**
 * Apply an ordering; unknown columns leave the rows as they are
 */
export function orderRows(rows: readonly Row[], columns: readonly string[], order: OrderSpec | undefined): Row[] {
  if (!order) {
    return [...rows];
  }
  const index = columns.indexOf(order.column);
  if (index === -1) {
    return [...rows];
  }
  return sortRows(rows, index, order.direction);
}

/**
 * Key a row by the table's full column list.
 * Missing trailing values become empty strings; extra values are dropped.
 * Records are plain objects, so column names that are array indices (`"2"`)
 * enumerate first, in ascending order, ahead of the others.
 */
export function toRowObject(columns: readonly string[], row: Row): RowObject {
  return Object.fromEntries(columns.map((column, i) => [column, row[i] ?? ""]));
}

/**
 * Re-key records to the requested columns, in requested order.
 * Index-like names still enumerate first; see {@link toRowObject}.
 */
export function project(records: readonly RowObject[], names: readonly string[]): RowObject[] {
  return records.map((record) => Object.fromEntries(names.map((name) => [name, record[name] ?? ""])));
}
