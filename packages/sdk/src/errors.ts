/**
 * Error types for delimstore operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - Domain errors (schema, table, column, key) never wrap I/O failures;
 *   I/O failures surface as TableReadError / TableWriteError
 */

/**
 * Base class for all delimstore errors
 */
export abstract class DelimStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a database cannot be opened (schema file missing or empty)
 */
export class DatabaseNotFoundError extends DelimStoreError {
  readonly code: string = "E_DATABASE_NOT_FOUND";

  constructor(
    public readonly schemaPath: string,
    reason = "missing or not readable",
    options?: ErrorOptions
  ) {
    super(`Schema file ${reason}: ${schemaPath}`, options);
  }
}

/**
 * Thrown when the schema file does not exist or cannot be opened
 */
export class SchemaFileMissingError extends DatabaseNotFoundError {
  override readonly code = "E_SCHEMA_MISSING";

  constructor(schemaPath: string, options?: ErrorOptions) {
    super(schemaPath, "missing or not readable", options);
  }
}

/**
 * Thrown when the schema file contains no lines
 */
export class SchemaFileEmptyError extends DatabaseNotFoundError {
  override readonly code = "E_SCHEMA_EMPTY";

  constructor(schemaPath: string, options?: ErrorOptions) {
    super(schemaPath, "empty", options);
  }
}

/**
 * Thrown when an operation is given a blank table name
 */
export class MissingTableParamError extends DelimStoreError {
  readonly code = "E_MISSING_TABLE";

  constructor(options?: ErrorOptions) {
    super("Missing table name", options);
  }
}

/**
 * Thrown when a table is not declared in the schema
 */
export class TableNotFoundError extends DelimStoreError {
  readonly code = "E_TABLE_NOT_FOUND";

  constructor(
    public readonly table: string,
    options?: ErrorOptions
  ) {
    super(`Table not found: ${table}`, options);
  }
}

/**
 * Thrown when requested or assigned columns are not declared on a table
 */
export class ColumnNotFoundError extends DelimStoreError {
  readonly code = "E_COLUMN_NOT_FOUND";

  constructor(
    public readonly table: string,
    public readonly columns: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Column name(s) do not exist on table ${table}: ${columns.join(",")}`, options);
  }
}

/**
 * Thrown when the number of values differs from the number of resolved columns
 */
export class ColumnListMismatchError extends DelimStoreError {
  readonly code = "E_COLUMN_LIST_MISMATCH";

  constructor(
    public readonly expected: number,
    public readonly received: number,
    options?: ErrorOptions
  ) {
    super(`Column list and value list differ in length: got ${received} but expected ${expected}`, options);
  }
}

/**
 * Thrown when an explicit primary key collides with an existing record
 */
export class DuplicateKeyError extends DelimStoreError {
  readonly code = "E_DUPLICATE_KEY";

  constructor(
    public readonly table: string,
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(`Duplicate key on table ${table}: ${key}`, options);
  }
}

/**
 * Thrown when the next automatic key would exceed the safe integer range
 */
export class AutoKeyOverflowError extends DelimStoreError {
  readonly code = "E_AUTOKEY_OVERFLOW";

  constructor(
    public readonly table: string,
    options?: ErrorOptions
  ) {
    super(`Cannot assign next key on table ${table}: out of bounds`, options);
  }
}

/**
 * Thrown when database options fail validation
 */
export class InvalidOptionsError extends DelimStoreError {
  readonly code = "E_INVALID_OPTIONS";

  constructor(
    public readonly issues: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Invalid database options: ${issues.join("; ")}`, options);
  }
}

/**
 * Thrown when a table data file exists but cannot be read
 */
export class TableReadError extends DelimStoreError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read table file: ${filePath}`, options);
  }
}

/**
 * Thrown when a table data file cannot be rewritten
 */
export class TableWriteError extends DelimStoreError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write table file: ${filePath}`, options);
  }
}
