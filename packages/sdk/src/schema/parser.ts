/**
 * Schema definition file parser
 *
 * One directive per line, recognized by its three-letter tag:
 *
 * ```text
 * TAB elementary
 * KEY id
 * COL name
 * COL date
 * **
 * TAB colors
 * ...
 * ```
 *
 * `**` closes the current table. Any other line is ignored.
 */

import * as fs from "node:fs";
import type { Schema, Table } from "../types.js";
import { SchemaFileEmptyError, SchemaFileMissingError } from "../errors.js";
import { logger } from "../observability/logs.js";

interface TableDraft {
  name: string;
  columns: string[];
  primaryKey: string | undefined;
}

function emptyDraft(): TableDraft {
  return { name: "", columns: [], primaryKey: undefined };
}

/**
 * Freeze a finished draft, or drop it when it has no name or no columns
 */
function finishDraft(draft: TableDraft): Table | undefined {
  const firstColumn = draft.columns[0];
  if (draft.name === "" || firstColumn === undefined) {
    return undefined;
  }

  return Object.freeze({
    name: draft.name,
    columns: Object.freeze([...draft.columns]),
    primaryKey: draft.primaryKey ?? firstColumn,
  });
}

/**
 * Parse schema definition text
 * @param text - Schema file contents
 * @returns Tables in declaration order
 */
export function parseSchema(text: string): Schema {
  const tables: Table[] = [];
  let draft = emptyDraft();

  const flush = (): void => {
    const table = finishDraft(draft);
    if (table) {
      tables.push(table);
    }
    draft = emptyDraft();
  };

  for (const line of text.split(/\r?\n/)) {
    if (line.startsWith("**")) {
      flush();
      continue;
    }

    const tag = line.slice(0, 4).trim();
    const value = line.slice(3).trim();

    switch (tag) {
      case "TAB":
        draft.name = value;
        break;
      case "KEY":
        draft.columns.push(value);
        draft.primaryKey = value;
        break;
      case "COL":
        draft.columns.push(value);
        break;
    }
  }
  flush();

  return Object.freeze(tables);
}

/**
 * Read and parse a schema definition file
 * @param schemaPath - Path to the `.dbd` file
 * @throws SchemaFileMissingError if the file cannot be opened
 * @throws SchemaFileEmptyError if the file has no lines
 */
export function loadSchemaFile(schemaPath: string): Schema {
  let text: string;
  try {
    text = fs.readFileSync(schemaPath, "utf-8");
  } catch (err) {
    throw new SchemaFileMissingError(schemaPath, { cause: err });
  }

  if (text.length === 0) {
    throw new SchemaFileEmptyError(schemaPath);
  }

  const schema = parseSchema(text);
  logger.debug("schema.parse", {
    message: schemaPath,
    details: { tables: schema.map((t) => t.name) },
  });
  return schema;
}
