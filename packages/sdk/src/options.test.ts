import { describe, it, expect } from "vitest";
import { resolveOptions, delimitersFor } from "./options.js";
import { MemorySchemaCache } from "./schema/cache.js";
import { DEFAULT_DELIMITERS, LEGACY_DELIMITERS } from "./codec.js";
import { InvalidOptionsError } from "./errors.js";

describe("resolveOptions", () => {
  it("should apply defaults", () => {
    expect(resolveOptions()).toEqual({
      prependDatabaseNameToTableFilename: false,
      useCache: true,
      legacyDelimiterMode: false,
      schemaExtension: ".dbd",
      dataExtension: ".dtf",
    });
  });

  it("should let noCache override useCache", () => {
    expect(resolveOptions({ useCache: true, noCache: true }).useCache).toBe(false);
    expect(resolveOptions({ noCache: false }).useCache).toBe(true);
    expect(resolveOptions({ useCache: false }).useCache).toBe(false);
  });

  it("should accept a custom cache", () => {
    expect(() => resolveOptions({ cache: new MemorySchemaCache() })).not.toThrow();
  });

  it("should return frozen options", () => {
    expect(Object.isFrozen(resolveOptions({}))).toBe(true);
  });

  it("should reject unknown keys", () => {
    const options = { legacyDelimiterMode: true, delimiter: "|" };
    expect(() => resolveOptions(options)).toThrow(InvalidOptionsError);
    expect(() => resolveOptions(options)).toThrow(/delimiter/);
  });

  it("should reject malformed extensions", () => {
    expect(() => resolveOptions({ schemaExtension: "dbd" })).toThrow(InvalidOptionsError);
    expect(() => resolveOptions({ dataExtension: "./x" })).toThrow(/^Invalid database options: dataExtension: /);
  });

  it("should collect every issue", () => {
    try {
      resolveOptions({ schemaExtension: "a", dataExtension: "b" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidOptionsError);
      if (err instanceof InvalidOptionsError) {
        expect(err.issues).toHaveLength(2);
        expect(err.code).toBe("E_INVALID_OPTIONS");
      }
    }
  });
});

describe("delimitersFor", () => {
  it("should pick delimiters by mode", () => {
    expect(delimitersFor({ legacyDelimiterMode: false })).toBe(DEFAULT_DELIMITERS);
    expect(delimitersFor({ legacyDelimiterMode: true })).toBe(LEGACY_DELIMITERS);
  });
});
