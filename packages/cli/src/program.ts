/**
 * delimstore command definitions
 */

import { Command, CommanderError } from "commander";
import { z } from "zod";
import { openCliDatabase, type GlobalOptions } from "./lib/database.js";
import { isVerbose } from "./lib/env.js";
import { parseValues } from "./lib/arg.js";
import { processIO, type CliIO } from "./lib/io.js";
import { printJson, printLines, colorize } from "./lib/render.js";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";
import { readPackageVersion } from "./lib/version.js";

const GlobalOptionsSchema = z.object({
  data: z.string().optional(),
  db: z.string().optional(),
  prependDb: z.boolean().optional(),
  cache: z.boolean().default(true),
  legacyDelimiters: z.boolean().optional(),
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
});

const SchemaOptionsSchema = z.object({ json: z.boolean().optional() });

const SelectOptionsSchema = z.object({
  columns: z.string().default("*"),
  where: z.string().default(""),
  order: z.string().default(""),
  raw: z.boolean().optional(),
});

const InsertOptionsSchema = z.object({
  columns: z.string().default("*"),
  values: z.string(),
});

const UpdateOptionsSchema = z.object({
  columns: z.string().default("*"),
  values: z.string(),
  where: z.string().default(""),
});

const DeleteOptionsSchema = z.object({
  where: z.string().default(""),
  all: z.boolean().optional(),
});

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

/**
 * Build the command tree writing to the given streams
 */
export function buildProgram(io: CliIO = processIO): Command {
  const program = new Command();

  const globals = (): GlobalOptions => GlobalOptionsSchema.parse(program.opts());
  const verbose = (): boolean => globals().verbose === true || isVerbose();
  const timed = <T>(label: string, fn: () => T): T => withTiming(io, verbose(), label, fn);

  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(colorize(str, "red", io.stderrIsTTY)),
    })
    .exitOverride();

  program
    .name("delimstore")
    .description("delimstore - schema-defined tables in delimited text files")
    .version(readPackageVersion())
    .option("--data <path>", "Directory holding the schema and table files")
    .option("--db <name>", "Database (schema file) name")
    .option("--prepend-db", "Table files are named <db>.<table>.dtf")
    .option("--no-cache", "Always parse the schema file")
    .option("--legacy-delimiters", "Read and write the legacy delimiter bytes")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  program
    .command("tables")
    .description("List tables in declaration order")
    .action(() => {
      timed("cli.tables", () => {
        const db = openCliDatabase(globals());
        printLines(io, db.listTables());
      });
    });

  program
    .command("schema <table>")
    .description("Show a table's columns (primary key first)")
    .option("--json", "Output as JSON")
    .action((table: string, options: unknown) => {
      const opts = SchemaOptionsSchema.parse(options);
      timed("cli.schema", () => {
        const db = openCliDatabase(globals());
        const columns = db.tableSchema(table);
        const primaryKey = db.primaryKey(table);

        if (opts.json) {
          printJson(io, { table, primaryKey, columns });
        } else {
          printLines(
            io,
            columns.map((column) => (column === primaryKey ? `${column} (key)` : column))
          );
        }
      });
    });

  program
    .command("select <table>")
    .description("Print matching records as JSON")
    .option("--columns <list>", "Comma-separated columns to return", "*")
    .option("--where <criteria>", "COLUMN=VALUE, COLUMN=/regex/ or a bare key value", "")
    .option("--order <spec>", "<column> [asc|desc]", "")
    .option("--raw", "Output compact JSON")
    .action((table: string, options: unknown) => {
      const opts = SelectOptionsSchema.parse(options);
      timed("cli.select", () => {
        const db = openCliDatabase(globals());
        const rows = db.select(table, opts.columns, opts.where, opts.order);
        printJson(io, rows, { raw: opts.raw });
      });
    });

  program
    .command("insert <table>")
    .description("Append a record and print its key")
    .option("--columns <list>", "Comma-separated columns the values are for", "*")
    .requiredOption("--values <json>", "JSON array of values")
    .action((table: string, options: unknown) => {
      const opts = InsertOptionsSchema.parse(options);
      timed("cli.insert", () => {
        const values = parseValues(opts.values, "--values");
        const db = openCliDatabase(globals());
        const key = db.insert(table, opts.columns, values);
        io.stdout(`${key}\n`);
      });
    });

  program
    .command("update <table>")
    .description("Overwrite columns of matching records")
    .option("--columns <list>", "Comma-separated columns the values are for", "*")
    .requiredOption("--values <json>", "JSON array of values")
    .option("--where <criteria>", "Limit the records updated", "")
    .action((table: string, options: unknown) => {
      const opts = UpdateOptionsSchema.parse(options);
      timed("cli.update", () => {
        const values = parseValues(opts.values, "--values");
        const db = openCliDatabase(globals());
        const count = db.update(table, opts.columns, values, opts.where);
        if (!globals().quiet) {
          io.stdout(`Updated ${plural(count, "record")}\n`);
        }
      });
    });

  program
    .command("delete <table>")
    .description("Remove matching records")
    .option("--where <criteria>", "Limit the records removed")
    .option("--all", "Remove every record")
    .action((table: string, options: unknown) => {
      const opts = DeleteOptionsSchema.parse(options);
      timed("cli.delete", () => {
        if (opts.where.trim() === "" && !opts.all) {
          throw new CliError("Refusing to delete every record without --all; pass --where or --all");
        }
        if (opts.where.trim() !== "" && opts.all) {
          throw new CliError("Pass either --where or --all, not both");
        }
        const db = openCliDatabase(globals());
        const count = db.delete(table, opts.where);
        if (!globals().quiet) {
          io.stdout(`Deleted ${plural(count, "record")}\n`);
        }
      });
    });

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix)
 * @returns Process exit code
 */
export async function run(args: readonly string[], io: CliIO = processIO): Promise<number> {
  const program = buildProgram(io);

  try {
    await program.parseAsync([...args], { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already written its own usage errors, help and version
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const parsed = GlobalOptionsSchema.safeParse(program.opts());
    const verbose = (parsed.success && parsed.data.verbose === true) || isVerbose();
    io.stderr(colorize(`Error: ${formatCliError(err, verbose)}`, "red", io.stderrIsTTY) + "\n");
    return mapSdkErrorToExitCode(err);
  }
}
