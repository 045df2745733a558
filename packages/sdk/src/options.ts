/**
 * Database option validation and defaults
 */

import { z } from "zod";
import type { DatabaseOptions, Delimiters, ResolvedDatabaseOptions, SchemaCache } from "./types.js";
import { InvalidOptionsError } from "./errors.js";
import { DEFAULT_DELIMITERS, LEGACY_DELIMITERS } from "./codec.js";

function isSchemaCache(value: unknown): value is SchemaCache {
  return (
    typeof value === "object" &&
    value !== null &&
    "get" in value &&
    typeof value.get === "function" &&
    "put" in value &&
    typeof value.put === "function"
  );
}

const ExtensionSchema = z
  .string()
  .regex(/^\.[A-Za-z0-9_-]+$/, "extension must be a dot followed by letters, digits, '_' or '-'");

export const DatabaseOptionsSchema = z
  .object({
    prependDatabaseNameToTableFilename: z.boolean().optional(),
    useCache: z.boolean().optional(),
    noCache: z.boolean().optional(),
    legacyDelimiterMode: z.boolean().optional(),
    schemaExtension: ExtensionSchema.optional(),
    dataExtension: ExtensionSchema.optional(),
    cache: z.custom<SchemaCache>(isSchemaCache, "cache must implement get() and put()").optional(),
  })
  .strict();

/**
 * Apply defaults and the legacy `noCache` alias
 * @throws InvalidOptionsError if the options fail validation
 */
export function resolveOptions(options: DatabaseOptions = {}): ResolvedDatabaseOptions {
  const result = DatabaseOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
      { cause: result.error }
    );
  }

  const parsed = result.data;
  const useCache = parsed.noCache === true ? false : (parsed.useCache ?? true);

  return Object.freeze({
    prependDatabaseNameToTableFilename: parsed.prependDatabaseNameToTableFilename ?? false,
    useCache,
    legacyDelimiterMode: parsed.legacyDelimiterMode ?? false,
    schemaExtension: parsed.schemaExtension ?? ".dbd",
    dataExtension: parsed.dataExtension ?? ".dtf",
  });
}

/**
 * Delimiter bytes for a resolved option set
 */
export function delimitersFor(options: Pick<ResolvedDatabaseOptions, "legacyDelimiterMode">): Delimiters {
  return options.legacyDelimiterMode ? LEGACY_DELIMITERS : DEFAULT_DELIMITERS;
}
