/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import {
  ColumnNotFoundError,
  DatabaseNotFoundError,
  DuplicateKeyError,
  SchemaFileEmptyError,
  TableNotFoundError,
  TableWriteError,
} from "@delimstore/sdk";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("not found", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should map missing databases and tables to exit code 2", () => {
      expect(mapSdkErrorToExitCode(new DatabaseNotFoundError("/data/x.dbd"))).toBe(2);
      expect(mapSdkErrorToExitCode(new SchemaFileEmptyError("/data/x.dbd"))).toBe(2);
      expect(mapSdkErrorToExitCode(new TableNotFoundError("books"))).toBe(2);
    });

    it("should map other SDK errors to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new ColumnNotFoundError("books", ["isbn"]))).toBe(1);
      expect(mapSdkErrorToExitCode(new DuplicateKeyError("books", "1"))).toBe(1);
      expect(mapSdkErrorToExitCode(new TableWriteError("/data/books.dtf"))).toBe(1);
    });

    it("should use the exit code carried by CLI and commander errors", () => {
      expect(mapSdkErrorToExitCode(new CliError("x", { exitCode: 3 }))).toBe(3);
      expect(mapSdkErrorToExitCode(new CommanderError(4, "commander.test", "x"))).toBe(4);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(mapSdkErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapSdkErrorToExitCode("string error")).toBe(1);
      expect(mapSdkErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format error message", () => {
      expect(formatCliError(new TableNotFoundError("books"))).toBe("Table not found: books");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include cause in verbose mode", () => {
      const err = new CliError("wrapper", { cause: new Error("underlying") });

      const formatted = formatCliError(err, true);
      expect(formatted).toContain("\n  Cause: Error: underlying");
    });

    it("should include stack in verbose mode", () => {
      const formatted = formatCliError(new Error("test"), true);
      expect(formatted).toContain("Error: test\n    at ");
    });

    it("should not include stack in non-verbose mode", () => {
      expect(formatCliError(new Error("test"), false)).toBe("test");
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
