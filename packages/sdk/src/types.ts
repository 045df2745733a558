/**
 * Core types for delimstore
 */

/**
 * A table declared in the schema file
 */
export interface Table {
  /** Table name (first match wins on lookup) */
  readonly name: string;
  /** Column names in declaration order, primary key included */
  readonly columns: readonly string[];
  /** Primary key column, declared with `KEY` */
  readonly primaryKey: string;
}

/**
 * Tables in declaration order
 */
export type Schema = readonly Table[];

/**
 * One stored record: raw text values in column order
 */
export type Row = string[];

/**
 * A record keyed by column name
 */
export type RowObject = Record<string, string>;

/**
 * Value accepted on insert/update; stored as text
 */
export type FieldValue = string | number;

/**
 * Column list input: comma-separated string or explicit names.
 * `*` or an empty string means every column.
 */
export type ColumnList = string | readonly string[];

/**
 * Parsed `COLUMN=VALUE` filter
 */
export interface Criteria {
  /** Column to compare against */
  column: string;
  /** Comparison value, or a `/pattern/` when isRegex is set */
  value: string;
  /** Whether value is wrapped in slashes */
  isRegex: boolean;
}

/**
 * Sort direction for select ordering
 */
export type SortDirection = "asc" | "desc";

/**
 * Parsed `<column> [ASC|DESC]` ordering
 */
export interface OrderSpec {
  column: string;
  direction: SortDirection;
}

/**
 * Column and value delimiter bytes used in table files
 */
export interface Delimiters {
  /** Byte between values of one row */
  column: number;
  /** Byte terminating a row (followed by a line feed) */
  row: number;
}

/**
 * Persisted schema lookup consulted at open time
 *
 * Keys are absolute schema file paths. Eviction and invalidation are up
 * to the implementation.
 */
export interface SchemaCache {
  get(key: string): Schema | undefined;
  put(key: string, schema: Schema): void;
}

/**
 * Options accepted by openDatabase
 */
export interface DatabaseOptions {
  /** Prefix table filenames with `<databaseName>.` (default: false) */
  prependDatabaseNameToTableFilename?: boolean;
  /** Read the schema from the cache when present (default: true) */
  useCache?: boolean;
  /** Negated alias of useCache, kept for older callers */
  noCache?: boolean;
  /** Use bytes 200/201 instead of 31/30 as delimiters (default: false) */
  legacyDelimiterMode?: boolean;
  /** Schema file extension (default: ".dbd") */
  schemaExtension?: string;
  /** Table file extension (default: ".dtf") */
  dataExtension?: string;
  /** Schema cache collaborator (default: a FileSchemaCache) */
  cache?: SchemaCache;
}

/**
 * Options after defaults and aliases have been applied
 */
export interface ResolvedDatabaseOptions {
  prependDatabaseNameToTableFilename: boolean;
  useCache: boolean;
  legacyDelimiterMode: boolean;
  schemaExtension: string;
  dataExtension: string;
}

/**
 * Main database interface
 */
export interface Database {
  /** Resolved construction options */
  readonly options: Readonly<ResolvedDatabaseOptions>;

  /**
   * List table names in declaration order
   */
  listTables(): string[];

  /**
   * Get a table's columns in declaration order (primary key first)
   * @param table - Table name
   */
  tableSchema(table: string): string[];

  /**
   * Get a table's primary key column
   * @param table - Table name
   */
  primaryKey(table: string): string;

  /**
   * Read records from a table
   * @param table - Table name
   * @param columns - Columns to return (default: all)
   * @param criteria - `COLUMN=VALUE`, `COLUMN=/regex/` or a bare key value
   * @param order - `<column> [ASC|DESC]`
   * @returns Matching records keyed by column name
   */
  select(table: string, columns?: ColumnList, criteria?: string, order?: string): RowObject[];

  /**
   * Append a record
   * @param table - Table name
   * @param columns - Columns the values are assigned to (default: all)
   * @param values - One value per column
   * @returns Primary key of the new record
   */
  insert(table: string, columns: ColumnList, values: readonly FieldValue[]): string;

  /**
   * Overwrite columns of every matching record
   * @returns Number of targeted records
   */
  update(table: string, columns: ColumnList, values: readonly FieldValue[], criteria?: string): number;

  /**
   * Remove every matching record (all records when criteria is empty)
   * @returns Number of removed records
   */
  delete(table: string, criteria?: string): number;
}
