/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { resolveDataPath, resolveDatabaseName, isVerbose } from "../src/lib/env.js";
import { CliError } from "../src/lib/errors.js";

const VARS = ["DELIMSTORE_DATA", "DELIMSTORE_DB", "DELIMSTORE_CLI_DEBUG"] as const;

describe("environment resolution", () => {
  let originalEnv: Record<string, string | undefined>;

  beforeEach(() => {
    originalEnv = Object.fromEntries(VARS.map((name) => [name, process.env[name]]));
    for (const name of VARS) {
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const name of VARS) {
      const value = originalEnv[name];
      if (value !== undefined) {
        process.env[name] = value;
      } else {
        delete process.env[name];
      }
    }
  });

  describe("resolveDataPath", () => {
    it("should use CLI option when provided", () => {
      process.env.DELIMSTORE_DATA = "/env/path";
      expect(resolveDataPath("/cli/path")).toBe(path.resolve("/cli/path"));
    });

    it("should use DELIMSTORE_DATA env var when CLI option not provided", () => {
      process.env.DELIMSTORE_DATA = "/env/path";
      expect(resolveDataPath()).toBe(path.resolve("/env/path"));
    });

    it("should use default ./data when neither provided", () => {
      expect(resolveDataPath()).toBe(path.resolve("./data"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveDataPath("~/library")).toBe(path.join(homedir(), "library"));
      expect(resolveDataPath("~")).toBe(homedir());
    });
  });

  describe("resolveDatabaseName", () => {
    it("should prefer the CLI option", () => {
      process.env.DELIMSTORE_DB = "fromenv";
      expect(resolveDatabaseName("library")).toBe("library");
    });

    it("should fall back to DELIMSTORE_DB", () => {
      process.env.DELIMSTORE_DB = " fromenv ";
      expect(resolveDatabaseName()).toBe("fromenv");
    });

    it("should throw CliError when no name is configured", () => {
      expect(() => resolveDatabaseName()).toThrow(CliError);
      expect(() => resolveDatabaseName("  ")).toThrow("No database name given; use --db <name> or set DELIMSTORE_DB");
    });
  });

  describe("isVerbose", () => {
    it("should follow DELIMSTORE_CLI_DEBUG", () => {
      expect(isVerbose()).toBe(false);
      process.env.DELIMSTORE_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
    });
  });
});
