/**
 * Table file codec
 *
 * A table file is zero or more rows. Each row is its values joined by the
 * column delimiter byte, terminated by the row delimiter byte and a line
 * feed. Nothing is escaped: values must not contain either delimiter byte.
 * Splitting happens on raw bytes so multi-byte UTF-8 text is never cut, and
 * fields that are not UTF-8 are rewritten with their original bytes.
 */

import type { Delimiters, Row } from "./types.js";
import { atomicWriteSync, readFileIfPresent } from "./io.js";

/** Unit separator / record separator */
export const DEFAULT_DELIMITERS: Readonly<Delimiters> = Object.freeze({ column: 31, row: 30 });

/** Delimiters written by older releases */
export const LEGACY_DELIMITERS: Readonly<Delimiters> = Object.freeze({ column: 200, row: 201 });

const LINE_FEED = 0x0a;
const BACKSLASH = 0x5c;

// Bytes stripped from the start of a row: space, tab, LF, CR, NUL, VT
const LEADING_WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0d, 0x00, 0x0b]);

/**
 * Split a buffer on every occurrence of a byte
 */
function splitBytes(buf: Buffer, byte: number): Buffer[] {
  const parts: Buffer[] = [];
  let start = 0;
  let idx = buf.indexOf(byte, start);
  while (idx !== -1) {
    parts.push(buf.subarray(start, idx));
    start = idx + 1;
    idx = buf.indexOf(byte, start);
  }
  parts.push(buf.subarray(start));
  return parts;
}

function trimLeadingWhitespace(buf: Buffer): Buffer {
  let start = 0;
  while (start < buf.length && LEADING_WHITESPACE.has(buf[start] ?? -1)) {
    start++;
  }
  return buf.subarray(start);
}

const STRICT_UTF8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Original bytes of fields that are not valid UTF-8, keyed by the decoded row.
 * Such fields are decoded as Latin-1 and written back byte for byte while
 * their text is unchanged.
 */
const rawFields = new WeakMap<readonly string[], Map<number, { text: string; bytes: Buffer }>>();

function decodeField(bytes: Buffer): { text: string; raw: boolean } {
  try {
    return { text: STRICT_UTF8.decode(bytes), raw: false };
  } catch {
    return { text: bytes.toString("latin1"), raw: true };
  }
}

function decodeRow(bytes: Buffer, delimiters: Delimiters): Row {
  const row: Row = [];
  const raw = new Map<number, { text: string; bytes: Buffer }>();

  splitBytes(trimLeadingWhitespace(bytes), delimiters.column).forEach((field, i) => {
    const decoded = decodeField(field);
    row.push(decoded.text);
    if (decoded.raw) {
      raw.set(i, { text: decoded.text, bytes: Buffer.from(field) });
    }
  });

  if (raw.size > 0) {
    rawFields.set(row, raw);
  }
  return row;
}

function encodeField(row: readonly string[], index: number, value: string): Buffer {
  const original = rawFields.get(row)?.get(index);
  return original && original.text === value ? original.bytes : Buffer.from(value, "utf-8");
}

/**
 * Decode table file contents into rows
 *
 * The segment after the last row delimiter is discarded. Rows are not
 * checked against the table's column count.
 *
 * @param content - Raw file bytes
 * @param delimiters - Delimiter bytes in use
 * @returns Rows in file order
 */
export function decodeRows(content: Buffer, delimiters: Delimiters = DEFAULT_DELIMITERS): Row[] {
  if (content.length === 0) {
    return [];
  }

  const rawRows = splitBytes(content, delimiters.row);
  rawRows.pop();

  return rawRows.map((raw) => decodeRow(raw, delimiters));
}

/**
 * Drop a backslash sitting directly before a delimiter byte
 */
function stripDelimiterEscapes(line: Buffer, delimiters: Delimiters): Buffer {
  if (!line.includes(BACKSLASH)) {
    return line;
  }

  const out: number[] = [];
  for (let i = 0; i < line.length; i++) {
    const byte = line[i] ?? 0;
    const next = line[i + 1];
    if (byte === BACKSLASH && (next === delimiters.column || next === delimiters.row)) {
      continue;
    }
    out.push(byte);
  }
  return Buffer.from(out);
}

/**
 * Encode rows into table file contents
 * @param rows - Rows in the order they should be stored
 * @param delimiters - Delimiter bytes in use
 * @returns Complete file bytes
 */
export function encodeRows(rows: readonly (readonly string[])[], delimiters: Delimiters = DEFAULT_DELIMITERS): Buffer {
  const columnSep = Buffer.from([delimiters.column]);
  const terminator = Buffer.from([delimiters.row, LINE_FEED]);
  const chunks: Buffer[] = [];

  for (const row of rows) {
    const fields = row.map((value, i) => encodeField(row, i, value));
    const parts: Buffer[] = [];
    fields.forEach((field, i) => {
      if (i > 0) parts.push(columnSep);
      parts.push(field);
    });
    chunks.push(stripDelimiterEscapes(Buffer.concat(parts), delimiters));
    chunks.push(terminator);
  }

  return Buffer.concat(chunks);
}

/**
 * Load every row of a table file
 * @param filePath - Table file path
 * @returns Rows, or an empty list when the file is absent or empty
 */
export function readTable(filePath: string, delimiters: Delimiters = DEFAULT_DELIMITERS): Row[] {
  const content = readFileIfPresent(filePath);
  if (!content) {
    return [];
  }
  return decodeRows(content, delimiters);
}

/**
 * Table file contents plus whether the file holds no data yet
 */
export interface LoadedTable {
  rows: Row[];
  /** Absent, empty or whitespace only */
  blank: boolean;
}

/**
 * Load a table file for an insert, which treats blank files as new tables
 */
export function loadTable(filePath: string, delimiters: Delimiters = DEFAULT_DELIMITERS): LoadedTable {
  const content = readFileIfPresent(filePath);
  if (!content) {
    return { rows: [], blank: true };
  }
  return {
    rows: decodeRows(content, delimiters),
    blank: content.toString("utf-8").trim() === "",
  };
}

/**
 * Replace a table file with the given rows
 * @throws TableWriteError if the rewrite fails
 */
export function writeTable(
  filePath: string,
  rows: readonly (readonly string[])[],
  delimiters: Delimiters = DEFAULT_DELIMITERS
): void {
  atomicWriteSync(filePath, encodeRows(rows, delimiters));
}
