/**
 * schemagraph — CLI Commands
 *
 * Registers the `schemagraph` subcommands: render Cypher for schema
 * documents, load row files, run cleanup and statement jobs, manage indexes
 * and show store statistics.
 */

import { resolve } from "node:path";
import type { Command } from "commander";
import { loadConfig, resolveConfig, type SchemaGraphConfig } from "../config.js";
import { buildCleanupQueries, runCleanup } from "../core/cleanup.js";
import { buildIndexQueries, deriveIndexes, ensureIndexes } from "../core/indexes.js";
import { runJobFile } from "../core/jobs.js";
import { load, loadMatchLinks, type LoadSummary } from "../core/loader.js";
import { buildIngestionQuery, buildMatchLinkQuery } from "../core/querybuilder.js";
import { ConfigurationError } from "../errors.js";
import { createLogger, setLogger } from "../logging.js";
import { loadRowsFile, loadSchemaFile } from "../schema/document.js";
import { allRelationships, schemaName, type GraphSchema } from "../schema/model.js";
import { createStore } from "../storage/index.js";
import type { GraphStore, RowValue, UpdateTag } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type CliContext = {
  program: Command;
  logger: {
    info: (msg: string) => void;
    warn: (msg: string) => void;
    error: (msg: string) => void;
  };
  /** Environment for `SCHEMAGRAPH_*` overrides. Defaults to process.env. */
  env?: Readonly<Record<string, string | undefined>>;
  /** Store factory; defaults to the configured backend. */
  openStore?: (config: SchemaGraphConfig) => GraphStore;
};

type GlobalOptions = {
  config?: string;
  store?: string;
  db?: string;
  logLevel?: string;
};

type WriteOptions = {
  tag: string;
  param: string[];
  schema?: string;
};

// =============================================================================
// Helpers
// =============================================================================

/** Simple table formatter for terminal output. */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));

  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
  const formatRow = (cells: string[]) =>
    cells.map((c, i) => ` ${c.padEnd(widths[i] ?? 0)} `).join("│");

  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}

/** All digits is an epoch tag; anything else is used as given. */
export function parseUpdateTag(raw: string): UpdateTag {
  return /^\d+$/.test(raw) ? Number(raw) : raw;
}

function isRowValue(value: unknown): value is RowValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return true;
  if (typeof value === "number") return Number.isFinite(value);
  return (
    Array.isArray(value) &&
    value.every(
      (v) =>
        typeof v === "string" ||
        typeof v === "boolean" ||
        (typeof v === "number" && Number.isFinite(v)),
    )
  );
}

/** `K=V` gives a string, `K:=V` parses V as JSON (numbers, booleans, null, lists). */
export function parseParam(raw: string): [string, RowValue] {
  const json = raw.indexOf(":=");
  const eq = raw.indexOf("=");
  if (json > 0 && json < eq) {
    const name = raw.slice(0, json);
    let value: unknown;
    try {
      value = JSON.parse(raw.slice(json + 2));
    } catch {
      throw new ConfigurationError("cli", "param", `${name}: value is not valid JSON`);
    }
    if (!isRowValue(value)) {
      throw new ConfigurationError(
        "cli",
        "param",
        `${name}: value must be a scalar, a list of scalars or null`,
      );
    }
    return [name, value];
  }
  if (eq <= 0) {
    throw new ConfigurationError("cli", "param", `expected K=V or K:=JSON, got "${raw}"`);
  }
  return [raw.slice(0, eq), raw.slice(eq + 1)];
}

export function parseParams(raws: readonly string[]): Record<string, RowValue> {
  const out: Record<string, RowValue> = {};
  for (const raw of raws) {
    const [name, value] = parseParam(raw);
    out[name] = value;
  }
  return out;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePositiveInt(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError("cli", undefined, `expected a positive integer, got "${raw}"`);
  }
  return value;
}

function pickSchema(schemas: GraphSchema[], name: string | undefined, file: string): GraphSchema {
  if (name) {
    const found = schemas.find((s) => schemaName(s) === name);
    if (!found) throw new ConfigurationError(file, "schema", `no schema named ${name}`);
    return found;
  }
  const [only, ...rest] = schemas;
  if (!only || rest.length > 0) {
    throw new ConfigurationError(
      file,
      "schema",
      "document holds several schemas; pick one with --schema",
    );
  }
  return only;
}

function filterSchemas(
  schemas: GraphSchema[],
  name: string | undefined,
  file: string,
): GraphSchema[] {
  return name ? [pickSchema(schemas, name, file)] : schemas;
}

function summaryRows(summary: LoadSummary): string[][] {
  return [
    ["Rows", String(summary.rows)],
    ["Batches", String(summary.batches)],
    ["Nodes created", String(summary.nodesCreated)],
    ["Relationships created", String(summary.relationshipsCreated)],
    [
      "Relationships skipped",
      summary.relationshipsSkipped === null ? "n/a" : String(summary.relationshipsSkipped),
    ],
  ];
}

// =============================================================================
// CLI Registration
// =============================================================================

/**
 * Register `schemagraph` CLI commands.
 */
export function registerSchemaGraphCli(ctx: CliContext): void {
  const program = ctx.program;

  program
    .option("-c, --config <file>", "JSON config file")
    .option("--store <kind>", "Graph store: memory, sqlite or neo4j")
    .option("--db <path>", "SQLite database path")
    .option("--log-level <level>", "Log level");

  const resolveCliConfig = (): SchemaGraphConfig => {
    const opts = program.opts<GlobalOptions>();
    const base = loadConfig({ file: opts.config, env: ctx.env ?? process.env });
    const config = resolveConfig({
      ...base,
      ...(opts.store ? { store: opts.store } : {}),
      ...(opts.db ? { sqlite: { path: resolve(opts.db) } } : {}),
      ...(opts.logLevel ? { logLevel: opts.logLevel } : {}),
    });
    setLogger(createLogger("schemagraph", { level: config.logLevel }));
    return config;
  };

  /** Run a command body; errors are reported and set a non-zero exit code. */
  const run = async (fn: () => Promise<void> | void): Promise<void> => {
    try {
      await fn();
    } catch (error) {
      ctx.logger.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  };

  const withStore = async (
    config: SchemaGraphConfig,
    fn: (store: GraphStore) => Promise<void>,
  ): Promise<void> => {
    const store = (ctx.openStore ?? createStore)(config);
    try {
      await store.initialize();
      await fn(store);
    } finally {
      await store.close();
    }
  };

  // ---------------------------------------------------------------------------
  // cypher ingest | cleanup | indexes
  // ---------------------------------------------------------------------------
  const cypher = program
    .command("cypher")
    .description("Print the Cypher generated for schema documents");

  cypher
    .command("ingest")
    .description("Print the ingestion query of each schema")
    .argument("<schema>", "Schema document (JSON)")
    .option("--schema <name>", "Only this schema")
    .action((file: string, opts: { schema?: string }) =>
      run(() => {
        for (const schema of filterSchemas(loadSchemaFile(file), opts.schema, file)) {
          const query =
            schema.kind === "node"
              ? buildIngestionQuery(schema, allRelationships(schema))
              : buildMatchLinkQuery(schema);
          console.log(`// ${schemaName(schema)}\n${query}\n`);
        }
      }),
    );

  cypher
    .command("cleanup")
    .description("Print the cleanup queries of each schema")
    .argument("<schema>", "Schema document (JSON)")
    .option("--schema <name>", "Only this schema")
    .option("--cascade", "Cascade deletes to stale children")
    .action((file: string, opts: { schema?: string; cascade?: boolean }) =>
      run(() => {
        for (const schema of filterSchemas(loadSchemaFile(file), opts.schema, file)) {
          const queries = buildCleanupQueries(schema, { cascadeDelete: opts.cascade });
          console.log(`// ${schemaName(schema)}\n${queries.join("\n\n")}\n`);
        }
      }),
    );

  cypher
    .command("indexes")
    .description("Print the index statements for schema documents")
    .argument("<schemas...>", "Schema documents (JSON)")
    .action((files: string[]) =>
      run(() => {
        const schemas = files.flatMap((file) => loadSchemaFile(file));
        console.log(buildIndexQueries(deriveIndexes(schemas)).join("\n"));
      }),
    );

  // ---------------------------------------------------------------------------
  // load
  // ---------------------------------------------------------------------------
  program
    .command("load")
    .description("Load a JSON array of rows with one schema")
    .argument("<schema>", "Schema document (JSON)")
    .argument("<rows>", "Rows file (JSON array of objects)")
    .requiredOption("--tag <tag>", "Update tag of this run")
    .option("--param <K=V>", "Call parameter; K:=JSON for non-strings", collect, [])
    .option("--schema <name>", "Schema to use when the document holds several")
    .option("--batch-size <n>", "Rows per transaction")
    .action((schemaFile: string, rowsFile: string, opts: WriteOptions & { batchSize?: string }) =>
      run(async () => {
        const config = resolveCliConfig();
        const schema = pickSchema(loadSchemaFile(schemaFile), opts.schema, schemaFile);
        const rows = loadRowsFile(rowsFile);
        const options = {
          updateTag: parseUpdateTag(opts.tag),
          kwargs: parseParams(opts.param),
          batchSize: opts.batchSize ? parsePositiveInt(opts.batchSize) : config.batchSize,
        };

        await withStore(config, async (store) => {
          const summary =
            schema.kind === "node"
              ? await load(store, schema, rows, options)
              : await loadMatchLinks(store, schema, rows, options);
          console.log(`\nLoaded ${schemaName(schema)}\n`);
          console.log(table(["Metric", "Value"], summaryRows(summary)));
        });
      }),
    );

  // ---------------------------------------------------------------------------
  // cleanup
  // ---------------------------------------------------------------------------
  program
    .command("cleanup")
    .description("Delete what the given update tag did not touch")
    .argument("<schema>", "Schema document (JSON)")
    .requiredOption("--tag <tag>", "Update tag of the run that just finished")
    .option("--param <K=V>", "Scope parameter; K:=JSON for non-strings", collect, [])
    .option("--schema <name>", "Schema to clean when the document holds several")
    .option("--cascade", "Cascade deletes to stale children")
    .action((file: string, opts: WriteOptions & { cascade?: boolean }) =>
      run(async () => {
        const config = resolveCliConfig();
        const schema = pickSchema(loadSchemaFile(file), opts.schema, file);
        await withStore(config, async (store) => {
          const counts = await runCleanup(store, schema, {
            updateTag: parseUpdateTag(opts.tag),
            parameters: parseParams(opts.param),
            cascadeDelete: opts.cascade,
            iterationSize: config.iterationSize,
          });
          console.log(`\nCleaned ${schemaName(schema)}\n`);
          console.log(
            table(
              ["Metric", "Value"],
              [
                ["Nodes deleted", String(counts.nodesDeleted)],
                ["Relationships deleted", String(counts.relationshipsDeleted)],
              ],
            ),
          );
        });
      }),
    );

  // ---------------------------------------------------------------------------
  // job
  // ---------------------------------------------------------------------------
  program
    .command("job")
    .description("Run a JSON statement job")
    .argument("<file>", "Job document (JSON)")
    .option("--tag <tag>", "Update tag, bound as UPDATE_TAG")
    .option("--param <K=V>", "Job parameter; K:=JSON for non-strings", collect, [])
    .action((file: string, opts: { tag?: string; param: string[] }) =>
      run(async () => {
        const config = resolveCliConfig();
        const options = {
          parameters: parseParams(opts.param),
          updateTag: opts.tag === undefined ? undefined : parseUpdateTag(opts.tag),
        };
        await withStore(config, async (store) => {
          const summary = await runJobFile(store, file, options);
          console.log(`\nRan ${summary.job}\n`);
          console.log(
            table(
              ["Metric", "Value"],
              [
                ["Statements", String(summary.statements)],
                ["Nodes created", String(summary.counts.nodesCreated)],
                ["Nodes deleted", String(summary.counts.nodesDeleted)],
                ["Relationships created", String(summary.counts.relationshipsCreated)],
                ["Relationships deleted", String(summary.counts.relationshipsDeleted)],
                ["Properties set", String(summary.counts.propertiesSet)],
              ],
            ),
          );
        });
      }),
    );

  // ---------------------------------------------------------------------------
  // indexes
  // ---------------------------------------------------------------------------
  program
    .command("indexes")
    .description("Create the indexes the given schemas need")
    .argument("<schemas...>", "Schema documents (JSON)")
    .action((files: string[]) =>
      run(async () => {
        const config = resolveCliConfig();
        const specs = deriveIndexes(files.flatMap((file) => loadSchemaFile(file)));
        await withStore(config, async (store) => {
          const created = await ensureIndexes(store, specs);
          console.log(`${created} of ${specs.length} indexes created`);
        });
      }),
    );

  // ---------------------------------------------------------------------------
  // status
  // ---------------------------------------------------------------------------
  program
    .command("status")
    .description("Show graph statistics")
    .action(() =>
      run(async () => {
        const config = resolveCliConfig();
        await withStore(config, async (store) => {
          const stats = await store.getStats();
          console.log(`\nschemagraph (${store.kind})\n`);
          console.log(
            table(
              ["Metric", "Value"],
              [
                ["Nodes", String(stats.totalNodes)],
                ["Relationships", String(stats.totalRelationships)],
                ["Indexes", String(stats.indexes)],
              ],
            ),
          );

          if (Object.keys(stats.nodesByLabel).length > 0) {
            console.log("\nBy Label:");
            console.log(
              table(
                ["Label", "Nodes"],
                Object.entries(stats.nodesByLabel)
                  .sort(([, a], [, b]) => b - a)
                  .map(([label, count]) => [label, String(count)]),
              ),
            );
          }

          if (Object.keys(stats.relationshipsByType).length > 0) {
            console.log("\nBy Type:");
            console.log(
              table(
                ["Type", "Count"],
                Object.entries(stats.relationshipsByType)
                  .sort(([, a], [, b]) => b - a)
                  .map(([type, count]) => [type, String(count)]),
              ),
            );
          }
        });
      }),
    );
}
