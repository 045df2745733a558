/**
 * Integration tests for CLI commands
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempDataDir, removeDir, writeSchemaFile, writeTableFile, US, RS } from "@delimstore/testkit/fs";
import { run } from "../src/program.js";
import { createBufferedIO } from "../src/lib/io.js";

describe("CLI", () => {
  let dataDir: string;
  let originalDb: string | undefined;

  beforeEach(async () => {
    originalDb = process.env.DELIMSTORE_DB;
    delete process.env.DELIMSTORE_DB;

    dataDir = await createTempDataDir("delimstore-cli-");
    await writeSchemaFile(dataDir, "library", ["TAB elementary", "KEY id", "COL name", "COL date", "**", "TAB colors", "COL name", "COL hex"]);
    await writeTableFile(dataDir, "elementary", [
      ["12", "sherlock", "1925-09-09"],
      ["47", "watson", "1931-10-31"],
    ]);
  });

  afterEach(async () => {
    if (originalDb !== undefined) {
      process.env.DELIMSTORE_DB = originalDb;
    }
    await removeDir(dataDir);
  });

  /**
   * Run the CLI against the test database, collecting output
   */
  async function cli(...args: string[]): Promise<{ exitCode: number; stdout: string; stderr: string }> {
    const io = createBufferedIO();
    const exitCode = await run(["--data", dataDir, "--db", "library", ...args], io);
    return { exitCode, stdout: io.out.join(""), stderr: io.err.join("") };
  }

  describe("tables", () => {
    it("should list tables one per line", async () => {
      const result = await cli("tables");

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("elementary\ncolors\n");
    });
  });

  describe("schema", () => {
    it("should mark the primary key", async () => {
      const result = await cli("schema", "elementary");

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("id (key)\nname\ndate\n");
    });

    it("should print JSON with --json", async () => {
      const result = await cli("schema", "colors", "--json");

      expect(JSON.parse(result.stdout)).toEqual({ table: "colors", primaryKey: "name", columns: ["name", "hex"] });
    });
  });

  describe("select", () => {
    it("should print every record as JSON", async () => {
      const result = await cli("select", "elementary");

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual([
        { id: "12", name: "sherlock", date: "1925-09-09" },
        { id: "47", name: "watson", date: "1931-10-31" },
      ]);
    });

    it("should apply columns, criteria and raw output", async () => {
      const result = await cli("select", "elementary", "--columns", "id,name", "--where", "name=/^s/", "--raw");

      expect(result.stdout).toBe('[{"id":"12","name":"sherlock"}]\n');
    });

    it("should order records", async () => {
      const result = await cli("select", "elementary", "--columns", "id", "--order", "date desc", "--raw");

      expect(result.stdout).toBe('[{"id":"47"},{"id":"12"}]\n');
    });

    it("should exit 2 for an unknown table", async () => {
      const result = await cli("select", "villains");

      expect(result.exitCode).toBe(2);
      expect(result.stdout).toBe("");
      expect(result.stderr).toBe("Error: Table not found: villains\n");
    });

    it("should exit 1 for an unknown column", async () => {
      const result = await cli("select", "elementary", "--columns", "alias");

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Column name(s) do not exist on table elementary: alias\n");
    });
  });

  describe("insert", () => {
    it("should print the assigned key", async () => {
      const result = await cli("insert", "elementary", "--columns", "name,date", "--values", '["moriarty", "1893-05-04"]');

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("48\n");
      expect(await readFile(join(dataDir, "elementary.dtf"), "utf-8")).toContain(
        `${RS}\n48${US}moriarty${US}1893-05-04${RS}\n`
      );
    });

    it("should store booleans as criteria text", async () => {
      await cli("insert", "colors", "--values", '["white", true]');

      const result = await cli("select", "colors", "--where", "hex=true", "--raw");
      expect(result.stdout).toBe('[{"name":"white","hex":"1"}]\n');
    });

    it("should reject invalid JSON values", async () => {
      const result = await cli("insert", "elementary", "--values", "[moriarty]");

      expect(result.exitCode).toBe(1);
      expect(result.stderr.startsWith("Error: Invalid JSON in --values:")).toBe(true);
    });

    it("should reject a duplicate key", async () => {
      const result = await cli("insert", "elementary", "--values", '["12", "mycroft", ""]');

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Duplicate key on table elementary: 12\n");
    });

    it("should require --values", async () => {
      const result = await cli("insert", "elementary");

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("required option '--values <json>' not specified");
    });
  });

  describe("update", () => {
    it("should report the number of updated records", async () => {
      const result = await cli("update", "elementary", "--columns", "name", "--values", '["shezza"]', "--where", "12");

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("Updated 1 record\n");
    });

    it("should stay silent with --quiet", async () => {
      const result = await cli("--quiet", "update", "elementary", "--columns", "date", "--values", '["?"]');

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("");
    });
  });

  describe("delete", () => {
    it("should refuse to delete everything without --all", async () => {
      const result = await cli("delete", "elementary");

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Refusing to delete every record without --all; pass --where or --all\n");
    });

    it("should refuse --where together with --all and keep every record", async () => {
      const before = await readFile(join(dataDir, "elementary.dtf"), "utf-8");
      const result = await cli("delete", "elementary", "--where", "name=watson", "--all");

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Pass either --where or --all, not both\n");
      expect(await readFile(join(dataDir, "elementary.dtf"), "utf-8")).toBe(before);
    });

    it("should delete matching records", async () => {
      const result = await cli("delete", "elementary", "--where", "name=watson");

      expect(result.stdout).toBe("Deleted 1 record\n");
      expect((await cli("select", "elementary", "--columns", "id", "--raw")).stdout).toBe('[{"id":"12"}]\n');
    });

    it("should delete every record with --all", async () => {
      const result = await cli("delete", "elementary", "--all");

      expect(result.stdout).toBe("Deleted 2 records\n");
      expect(await readFile(join(dataDir, "elementary.dtf"), "utf-8")).toBe("");
    });
  });

  describe("global options", () => {
    it("should exit 2 when the database does not exist", async () => {
      const io = createBufferedIO();
      const exitCode = await run(["--data", dataDir, "--db", "archive", "tables"], io);

      expect(exitCode).toBe(2);
      expect(io.err.join("")).toBe(`Error: Schema file missing or not readable: ${join(dataDir, "archive.dbd")}\n`);
    });

    it("should exit 1 when no database is named", async () => {
      const io = createBufferedIO();
      const exitCode = await run(["--data", dataDir, "tables"], io);

      expect(exitCode).toBe(1);
      expect(io.err.join("")).toBe("Error: No database name given; use --db <name> or set DELIMSTORE_DB\n");
    });

    it("should read table files named after the database with --prepend-db", async () => {
      await writeTableFile(dataDir, "library.colors", [["black", "#000000"]]);

      const result = await cli("--prepend-db", "select", "colors", "--raw");
      expect(result.stdout).toBe('[{"name":"black","hex":"#000000"}]\n');
    });

    it("should emit a timing metric with --verbose", async () => {
      const result = await cli("--verbose", "tables");

      expect(result.exitCode).toBe(0);
      expect(result.stderr).toMatch(/^metric cli\.tables duration_ms=\d+ success=true\n$/);
    });

    it("should print the version", async () => {
      const io = createBufferedIO();
      const exitCode = await run(["--version"], io);

      expect(exitCode).toBe(0);
      expect(io.out.join("")).toBe("0.1.0\n");
    });

    it("should fail on an unknown command", async () => {
      const io = createBufferedIO();
      const exitCode = await run(["reindex"], io);

      expect(exitCode).toBe(1);
      expect(io.err.join("")).toContain("unknown command 'reindex'");
    });
  });
});
