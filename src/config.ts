/**
 * schemagraph configuration schema (TypeBox) and defaults.
 *
 * Resolution order: DEFAULT_CONFIG, then the JSON config file, then
 * `SCHEMAGRAPH_*` environment variables.
 */

import { readFileSync } from "node:fs";
import { Type, type Static } from "@sinclair/typebox";
import { Errors } from "@sinclair/typebox/errors";
import { Check } from "@sinclair/typebox/value";
import { ConfigurationError, fieldFromPointer } from "./errors.js";

export const SchemaGraphConfigSchema = Type.Object(
  {
    store: Type.Union([Type.Literal("memory"), Type.Literal("sqlite"), Type.Literal("neo4j")], {
      description: "Backing graph store",
    }),
    sqlite: Type.Object(
      {
        path: Type.String({ minLength: 1, description: "Database file, or :memory:" }),
      },
      { additionalProperties: false },
    ),
    neo4j: Type.Object(
      {
        uri: Type.String({ minLength: 1, description: "Bolt URI, e.g. bolt://localhost:7687" }),
        user: Type.String(),
        password: Type.String(),
        database: Type.Optional(Type.String({ minLength: 1 })),
      },
      { additionalProperties: false },
    ),
    batchSize: Type.Integer({ minimum: 1, description: "Rows written per transaction" }),
    iterationSize: Type.Integer({ minimum: 1, description: "Rows deleted per cleanup chunk" }),
    logLevel: Type.Union([
      Type.Literal("fatal"),
      Type.Literal("error"),
      Type.Literal("warn"),
      Type.Literal("info"),
      Type.Literal("debug"),
      Type.Literal("trace"),
      Type.Literal("silent"),
    ]),
  },
  { additionalProperties: false },
);

export type SchemaGraphConfig = Static<typeof SchemaGraphConfigSchema>;

export const DEFAULT_CONFIG: SchemaGraphConfig = {
  store: "sqlite",
  sqlite: { path: "schemagraph.db" },
  neo4j: { uri: "bolt://localhost:7687", user: "neo4j", password: "" },
  batchSize: 10_000,
  iterationSize: 100,
  logLevel: "info",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge a partial config over the defaults and validate it.
 * Throws ConfigurationError naming the first invalid field.
 */
export function resolveConfig(input: unknown = {}): SchemaGraphConfig {
  if (!isRecord(input)) {
    throw new ConfigurationError("config", undefined, "configuration must be a JSON object");
  }
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const [key, value] of Object.entries(input)) {
    if (value === undefined) continue;
    const base = merged[key];
    merged[key] = isRecord(base) && isRecord(value) ? { ...base, ...value } : value;
  }

  if (Check(SchemaGraphConfigSchema, merged)) return merged;

  const [first] = [...Errors(SchemaGraphConfigSchema, merged)];
  if (!first) {
    throw new ConfigurationError("config", undefined, "configuration does not match schema");
  }
  throw new ConfigurationError("config", fieldFromPointer(first.path), first.message);
}

// =============================================================================
// Loading
// =============================================================================

type Env = Readonly<Record<string, string | undefined>>;

/** Numbers stay strings when they do not parse, so validation reports the field. */
function numeric(raw: string): number | string {
  const value = Number(raw);
  return raw.trim() !== "" && Number.isFinite(value) ? value : raw;
}

function envOverrides(env: Env): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const sqlite: Record<string, unknown> = {};
  const neo4j: Record<string, unknown> = {};

  if (env.SCHEMAGRAPH_STORE !== undefined) out.store = env.SCHEMAGRAPH_STORE;
  if (env.SCHEMAGRAPH_SQLITE_PATH !== undefined) sqlite.path = env.SCHEMAGRAPH_SQLITE_PATH;
  if (env.SCHEMAGRAPH_NEO4J_URI !== undefined) neo4j.uri = env.SCHEMAGRAPH_NEO4J_URI;
  if (env.SCHEMAGRAPH_NEO4J_USER !== undefined) neo4j.user = env.SCHEMAGRAPH_NEO4J_USER;
  if (env.SCHEMAGRAPH_NEO4J_PASSWORD !== undefined) neo4j.password = env.SCHEMAGRAPH_NEO4J_PASSWORD;
  if (env.SCHEMAGRAPH_NEO4J_DATABASE !== undefined) neo4j.database = env.SCHEMAGRAPH_NEO4J_DATABASE;
  if (env.SCHEMAGRAPH_BATCH_SIZE !== undefined) out.batchSize = numeric(env.SCHEMAGRAPH_BATCH_SIZE);
  if (env.SCHEMAGRAPH_ITERATION_SIZE !== undefined) {
    out.iterationSize = numeric(env.SCHEMAGRAPH_ITERATION_SIZE);
  }
  if (env.SCHEMAGRAPH_LOG_LEVEL !== undefined) out.logLevel = env.SCHEMAGRAPH_LOG_LEVEL;

  if (Object.keys(sqlite).length > 0) out.sqlite = sqlite;
  if (Object.keys(neo4j).length > 0) out.neo4j = neo4j;
  return out;
}

function readConfigFile(file: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError("config", undefined, `cannot read ${file}: ${message}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError("config", undefined, `${file} must hold a JSON object`);
  }
  return parsed;
}

function mergeSection(
  base: Record<string, unknown>,
  over: Record<string, unknown>,
  key: string,
): unknown {
  const a = base[key];
  const b = over[key];
  if (b === undefined) return a;
  return isRecord(a) && isRecord(b) ? { ...a, ...b } : b;
}

export function loadConfig(opts: { file?: string; env?: Env } = {}): SchemaGraphConfig {
  const fromFile = opts.file ? readConfigFile(opts.file) : {};
  const fromEnv = envOverrides(opts.env ?? process.env);
  return resolveConfig({
    ...fromFile,
    ...fromEnv,
    sqlite: mergeSection(fromFile, fromEnv, "sqlite"),
    neo4j: mergeSection(fromFile, fromEnv, "neo4j"),
  });
}
