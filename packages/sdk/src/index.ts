/**
 * delimstore SDK
 *
 * A file-backed record store: schema-defined tables persisted as delimited
 * text files, queried with select/insert/update/delete
 */

// Re-export types
export type {
  Table,
  Schema,
  Row,
  RowObject,
  FieldValue,
  ColumnList,
  Criteria,
  SortDirection,
  OrderSpec,
  Delimiters,
  SchemaCache,
  DatabaseOptions,
  ResolvedDatabaseOptions,
  Database,
} from "./types.js";

// Database
export { openDatabase, keyToInteger } from "./database.js";
export { resolveOptions, delimitersFor, DatabaseOptionsSchema } from "./options.js";

// Schema parsing and caching
export { parseSchema, loadSchemaFile } from "./schema/parser.js";
export type { MemorySchemaCacheOptions, SchemaCacheStats } from "./schema/cache.js";
export { FileSchemaCache, MemorySchemaCache } from "./schema/cache.js";

// Codec and query utilities
export type { LoadedTable } from "./codec.js";
export {
  decodeRows,
  encodeRows,
  readTable,
  loadTable,
  writeTable,
  DEFAULT_DELIMITERS,
  LEGACY_DELIMITERS,
} from "./codec.js";
export { parseCriteria, matchRows, matchingRowIndices, valuesEqual } from "./criteria.js";
export type { ResolvedColumns } from "./query.js";
export {
  parseColumnList,
  resolveColumns,
  parseOrder,
  naturalCompare,
  sortRows,
  orderRows,
  toRowObject,
  project,
} from "./query.js";

// Observability
export type { LogLevel, LogEntry, LogSink } from "./observability/logs.js";
export { logger, formatLogEntry } from "./observability/logs.js";
export type { Operation, OperationMetrics, TableMetrics } from "./observability/metrics.js";
export { metrics } from "./observability/metrics.js";

// Re-export errors
export {
  DelimStoreError,
  DatabaseNotFoundError,
  SchemaFileMissingError,
  SchemaFileEmptyError,
  MissingTableParamError,
  TableNotFoundError,
  ColumnNotFoundError,
  ColumnListMismatchError,
  DuplicateKeyError,
  AutoKeyOverflowError,
  InvalidOptionsError,
  TableReadError,
  TableWriteError,
} from "./errors.js";
