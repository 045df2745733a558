/**
 * Schema caches consulted when a database is opened
 */

import * as fs from "node:fs";
import { basename, dirname, join } from "node:path";
import { z } from "zod";
import type { Schema, SchemaCache, Table } from "../types.js";
import { logger } from "../observability/logs.js";

const CACHE_FORMAT_VERSION = 1;

const TableSchema = z
  .object({
    name: z.string().min(1),
    columns: z.array(z.string()).min(1),
    primaryKey: z.string(),
  })
  .superRefine((table, ctx) => {
    if (!table.columns.includes(table.primaryKey)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["primaryKey"],
        message: "primary key must be one of the table's columns",
      });
    }
  });

const CacheFileSchema = z.object({
  version: z.literal(CACHE_FORMAT_VERSION),
  source: z.object({
    mtimeMs: z.number(),
    size: z.number(),
  }),
  tables: z.array(TableSchema),
});

type CacheFile = z.infer<typeof CacheFileSchema>;

function freezeSchema(tables: readonly Table[]): Schema {
  return Object.freeze(
    tables.map((t) =>
      Object.freeze({ name: t.name, columns: Object.freeze([...t.columns]), primaryKey: t.primaryKey })
    )
  );
}

/**
 * Schema cache persisted beside the schema file as `.<schema file>.cache`
 *
 * Entries record the schema file's mtime and size; an entry whose source
 * metadata no longer matches is treated as a miss.
 */
export class FileSchemaCache implements SchemaCache {
  /**
   * Path of the cache file for a schema file
   */
  static cachePathFor(schemaPath: string): string {
    return join(dirname(schemaPath), `.${basename(schemaPath)}.cache`);
  }

  get(key: string): Schema | undefined {
    const cachePath = FileSchemaCache.cachePathFor(key);

    let raw: string;
    let stats: fs.Stats;
    try {
      raw = fs.readFileSync(cachePath, "utf-8");
      stats = fs.statSync(key);
    } catch {
      logger.debug("schema.cache.miss", { message: key });
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      logger.warn("schema.cache.invalid", { message: cachePath, details: { error: String(err) } });
      return undefined;
    }

    const result = CacheFileSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn("schema.cache.invalid", {
        message: cachePath,
        details: { issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
      });
      return undefined;
    }

    const entry = result.data;
    if (entry.source.mtimeMs !== stats.mtimeMs || entry.source.size !== stats.size) {
      logger.debug("schema.cache.miss", { message: key, details: { reason: "stale" } });
      return undefined;
    }

    logger.debug("schema.cache.hit", { message: key });
    return freezeSchema(entry.tables);
  }

  put(key: string, schema: Schema): void {
    const cachePath = FileSchemaCache.cachePathFor(key);

    try {
      const stats = fs.statSync(key);
      const entry: CacheFile = {
        version: CACHE_FORMAT_VERSION,
        source: { mtimeMs: stats.mtimeMs, size: stats.size },
        tables: schema.map((t) => ({ name: t.name, columns: [...t.columns], primaryKey: t.primaryKey })),
      };
      fs.writeFileSync(cachePath, JSON.stringify(entry, null, 2) + "\n", "utf-8");
    } catch (err) {
      logger.warn("schema.cache.write_failed", { message: cachePath, details: { error: String(err) } });
    }
  }
}

/**
 * Configuration options for the in-memory schema cache
 */
export interface MemorySchemaCacheOptions {
  /** Maximum number of schemas to keep (default: 100) */
  maxSize?: number;
}

/**
 * Cache statistics for monitoring and debugging
 */
export interface SchemaCacheStats {
  /** Current number of cached schemas */
  size: number;
  /** Cache hit rate (hits / total requests) */
  hitRate: number;
  /** Total number of evictions performed */
  evicted: number;
}

/**
 * In-process LRU schema cache
 *
 * Uses native Map insertion order for O(1) LRU operations.
 */
export class MemorySchemaCache implements SchemaCache {
  private cache = new Map<string, Schema>();
  private maxSize: number;
  private hits = 0;
  private misses = 0;
  private evicted = 0;

  constructor(options: MemorySchemaCacheOptions = {}) {
    this.maxSize = Math.max(1, options.maxSize ?? 100);
  }

  get(key: string): Schema | undefined {
    const schema = this.cache.get(key);
    if (!schema) {
      this.misses++;
      return undefined;
    }

    // LRU: Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, schema);

    this.hits++;
    return schema;
  }

  put(key: string, schema: Schema): void {
    this.cache.delete(key);
    this.cache.set(key, freezeSchema(schema));

    while (this.cache.size > this.maxSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
      this.evicted++;
    }
  }

  /**
   * Remove one entry, or every entry when no key is given
   */
  clear(key?: string): void {
    if (key === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(key);
    }
  }

  stats(): SchemaCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.cache.size,
      hitRate: total > 0 ? this.hits / total : 0,
      evicted: this.evicted,
    };
  }
}
