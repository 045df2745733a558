/**
 * Main database implementation
 */

import * as path from "node:path";
import type {
  ColumnList,
  Database,
  DatabaseOptions,
  Delimiters,
  FieldValue,
  ResolvedDatabaseOptions,
  Row,
  RowObject,
  Schema,
  SchemaCache,
  Table,
} from "./types.js";
import { AutoKeyOverflowError, ColumnListMismatchError, DuplicateKeyError, MissingTableParamError, TableNotFoundError } from "./errors.js";
import { loadTable, readTable, writeTable } from "./codec.js";
import { matchingRowIndices, matchRows, parseCriteria } from "./criteria.js";
import { orderRows, parseColumnList, parseOrder, project, resolveColumns, toRowObject } from "./query.js";
import { delimitersFor, resolveOptions } from "./options.js";
import { loadSchemaFile } from "./schema/parser.js";
import { FileSchemaCache } from "./schema/cache.js";
import { logger } from "./observability/logs.js";
import { timed } from "./observability/metrics.js";

const LEADING_INTEGER = /^\s*([+-]?\d+)/;

/**
 * Numeric value of a key for autokey purposes; non-numeric keys count as 0
 */
export function keyToInteger(key: string): number {
  const match = LEADING_INTEGER.exec(key);
  if (!match?.[1]) {
    return 0;
  }
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : 0;
}

/**
 * Delimited text file database
 *
 * Every operation reads the table file, works on the rows in memory and,
 * for mutations, rewrites the whole file. Nothing is held between calls
 * except the schema.
 *
 * @example
 * ```typescript
 * const db = openDatabase("./data", "library");
 *
 * const id = db.insert("books", "title, author", ["Dune", "Herbert"]);
 * const rows = db.select("books", "id,title", "author=/herb/", "title desc");
 * db.update("books", "title", ["Dune Messiah"], `id=${id}`);
 * db.delete("books", id);
 * ```
 */
class DelimitedDatabase implements Database {
  #options: Readonly<ResolvedDatabaseOptions>;
  #datapath: string;
  #databaseName: string;
  #delimiters: Delimiters;
  #schema: Schema;

  constructor(datapath: string, databaseName: string, options: DatabaseOptions) {
    this.#options = resolveOptions(options);
    this.#datapath = trimTrailingSeparators(datapath);
    this.#databaseName = databaseName;
    this.#delimiters = delimitersFor(this.#options);
    this.#schema = this.#loadSchema(options.cache ?? new FileSchemaCache());
  }

  get options(): Readonly<ResolvedDatabaseOptions> {
    return this.#options;
  }

  /**
   * Load the schema from the cache, or parse it and refresh the cache
   */
  #loadSchema(cache: SchemaCache): Schema {
    const schemaPath = path.join(this.#datapath, `${this.#databaseName}${this.#options.schemaExtension}`);
    const cacheKey = path.resolve(schemaPath);

    if (this.#options.useCache) {
      const cached = cache.get(cacheKey);
      if (cached) {
        return cached;
      }
    }

    const schema = loadSchemaFile(schemaPath);
    cache.put(cacheKey, schema);
    logger.debug("database.open", {
      database: this.#databaseName,
      details: { tables: schema.length, cached: false },
    });
    return schema;
  }

  /**
   * Look up a table, first match wins
   * @throws MissingTableParamError for a blank name
   * @throws TableNotFoundError if no table has this name
   */
  #table(name: string): Table {
    if (!name || name.trim() === "") {
      throw new MissingTableParamError();
    }
    const table = this.#schema.find((t) => t.name === name);
    if (!table) {
      throw new TableNotFoundError(name);
    }
    return table;
  }

  #tablePath(table: Table): string {
    const prefix = this.#options.prependDatabaseNameToTableFilename ? `${this.#databaseName}.` : "";
    return path.join(this.#datapath, `${prefix}${table.name}${this.#options.dataExtension}`);
  }

  #write(table: Table, filePath: string, rows: readonly Row[]): void {
    writeTable(filePath, rows, this.#delimiters);
    logger.debug("table.write", {
      database: this.#databaseName,
      table: table.name,
      message: filePath,
      details: { rows: rows.length },
    });
  }

  /**
   * Indices of rows targeted by a criteria; every row when it is empty
   */
  #targetRows(table: Table, rows: readonly Row[], criteria: string): number[] {
    if (criteria.trim() === "") {
      return rows.map((_, i) => i);
    }
    return matchingRowIndices(parseCriteria(criteria, table.primaryKey), table.columns, rows);
  }

  listTables(): string[] {
    return this.#schema.map((t) => t.name);
  }

  tableSchema(table: string): string[] {
    return [...this.#table(table).columns];
  }

  primaryKey(table: string): string {
    return this.#table(table).primaryKey;
  }

  select(table: string, columns: ColumnList = "*", criteria = "", order = ""): RowObject[] {
    const t = this.#table(table);
    return timed(
      t.name,
      "select",
      () => {
        let rows = readTable(this.#tablePath(t), this.#delimiters);

        if (criteria.trim() !== "") {
          rows = matchRows(parseCriteria(criteria, t.primaryKey), t.columns, rows);
        }

        rows = orderRows(rows, t.columns, parseOrder(order));
        const records = rows.map((row) => toRowObject(t.columns, row));

        const requested = parseColumnList(columns);
        if (requested.length === 0) {
          return records;
        }
        return project(records, resolveColumns(t, requested).names);
      },
      (result) => result.length
    );
  }

  insert(table: string, columns: ColumnList = "*", values: readonly FieldValue[]): string {
    const t = this.#table(table);
    return timed(
      t.name,
      "insert",
      () => {
        const filePath = this.#tablePath(t);
        const { rows, blank } = loadTable(filePath, this.#delimiters);

        const resolved = resolveColumns(t, parseColumnList(columns));
        if (resolved.names.length !== values.length) {
          throw new ColumnListMismatchError(resolved.names.length, values.length);
        }

        const text = values.map((value) => String(value));
        const keyIndex = t.columns.indexOf(t.primaryKey);
        const suppliedAt = resolved.indices.indexOf(keyIndex);

        let key: string;
        if (suppliedAt === -1) {
          key = String(blank ? 1 : this.#nextKey(t, rows, keyIndex));
        } else {
          key = text[suppliedAt] ?? "";
          if (!blank && rows.some((row) => (row[keyIndex] ?? "") === key)) {
            throw new DuplicateKeyError(t.name, key);
          }
        }

        const record: Row = t.columns.map(() => "");
        record[keyIndex] = key;
        resolved.indices.forEach((columnIndex, i) => {
          record[columnIndex] = text[i] ?? "";
        });

        this.#write(t, filePath, [...rows, record]);
        return key;
      },
      () => 1
    );
  }

  /**
   * One greater than the largest numeric key
   * @throws AutoKeyOverflowError when the largest key is at the safe integer bound
   */
  #nextKey(table: Table, rows: readonly Row[], keyIndex: number): number {
    let max = 0;
    rows.forEach((row, i) => {
      const value = keyToInteger(row[keyIndex] ?? "");
      if (i === 0 || value > max) {
        max = value;
      }
    });

    if (max >= Number.MAX_SAFE_INTEGER) {
      throw new AutoKeyOverflowError(table.name);
    }
    return max + 1;
  }

  update(table: string, columns: ColumnList, values: readonly FieldValue[], criteria = ""): number {
    const t = this.#table(table);
    return timed(
      t.name,
      "update",
      () => {
        const filePath = this.#tablePath(t);
        const rows = readTable(filePath, this.#delimiters);
        const targets = this.#targetRows(t, rows, criteria);

        const resolved = resolveColumns(t, parseColumnList(columns));
        if (resolved.names.length !== values.length) {
          throw new ColumnListMismatchError(resolved.names.length, values.length);
        }

        if (targets.length === 0) {
          return 0;
        }

        const text = values.map((value) => String(value));
        for (const r of targets) {
          const row = rows[r];
          if (!row) continue;
          while (row.length < t.columns.length) {
            row.push("");
          }
          resolved.indices.forEach((columnIndex, i) => {
            row[columnIndex] = text[i] ?? "";
          });
        }

        this.#write(t, filePath, rows);
        return targets.length;
      },
      (count) => count
    );
  }

  delete(table: string, criteria = ""): number {
    const t = this.#table(table);
    return timed(
      t.name,
      "delete",
      () => {
        const filePath = this.#tablePath(t);
        const rows = readTable(filePath, this.#delimiters);
        const targets = this.#targetRows(t, rows, criteria);

        if (targets.length === 0) {
          return 0;
        }

        const removed = new Set(targets);
        this.#write(t, filePath, rows.filter((_, i) => !removed.has(i)));
        return targets.length;
      },
      (count) => count
    );
  }
}

/**
 * Remove trailing path separators, keeping a lone root separator
 */
function trimTrailingSeparators(datapath: string): string {
  const trimmed = datapath.replace(/[\\/]+$/, "");
  return trimmed === "" && datapath !== "" ? datapath.slice(0, 1) : trimmed;
}

/**
 * Open a database
 *
 * Reads `<datapath>/<databaseName>.dbd` (or the schema cache) once; table
 * files are read on every operation.
 *
 * @param datapath - Directory holding the schema and table files
 * @param databaseName - Schema file name without extension
 * @param options - Filename, cache and delimiter options
 * @throws DatabaseNotFoundError if the schema file is missing or empty
 * @throws InvalidOptionsError if options fail validation
 */
export function openDatabase(datapath: string, databaseName: string, options: DatabaseOptions = {}): Database {
  return new DelimitedDatabase(datapath, databaseName, options);
}
