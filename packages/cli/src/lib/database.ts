/**
 * Database adapter for CLI
 * Resolves global options into an opened SDK database
 */

import { openDatabase, type Database } from "@delimstore/sdk";
import { resolveDatabaseName, resolveDataPath } from "./env.js";

/**
 * Global options shared by every command
 */
export interface GlobalOptions {
  data?: string;
  db?: string;
  prependDb?: boolean;
  cache: boolean;
  legacyDelimiters?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Open the database named by the global options
 * @throws CliError if no database name is configured
 * @throws DatabaseNotFoundError if the schema file is missing or empty
 */
export function openCliDatabase(opts: GlobalOptions): Database {
  return openDatabase(resolveDataPath(opts.data), resolveDatabaseName(opts.db), {
    prependDatabaseNameToTableFilename: opts.prependDb ?? false,
    useCache: opts.cache,
    legacyDelimiterMode: opts.legacyDelimiters ?? false,
  });
}
