import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_CONFIG, loadConfig, resolveConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

describe("resolveConfig", () => {
  it("should return the defaults for an empty object", () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
  });

  it("should merge nested sections over the defaults", () => {
    const config = resolveConfig({ store: "neo4j", neo4j: { uri: "bolt://graph:7687" } });

    expect(config.store).toBe("neo4j");
    expect(config.neo4j).toEqual({ uri: "bolt://graph:7687", user: "neo4j", password: "" });
    expect(config.sqlite).toEqual({ path: "schemagraph.db" });
  });

  it("should ignore undefined values", () => {
    expect(resolveConfig({ batchSize: undefined }).batchSize).toBe(10_000);
  });

  it("should name the first invalid field", () => {
    expect(configError(() => resolveConfig({ batchSize: 0 })).field).toBe("batchSize");
    expect(configError(() => resolveConfig({ neo4j: { uri: "" } })).field).toBe("neo4j.uri");
    expect(configError(() => resolveConfig({ store: "postgres" })).field).toBe("store");
  });

  it("should reject unknown keys", () => {
    expect(() => resolveConfig({ colour: "red" })).toThrow(ConfigurationError);
  });

  it("should reject anything but an object", () => {
    expect(() => resolveConfig([])).toThrow("config: configuration must be a JSON object");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "schemagraph-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should apply environment overrides", () => {
    const config = loadConfig({
      env: {
        SCHEMAGRAPH_STORE: "neo4j",
        SCHEMAGRAPH_NEO4J_PASSWORD: "test-secret",
        SCHEMAGRAPH_NEO4J_DATABASE: "graph",
        SCHEMAGRAPH_BATCH_SIZE: "500",
        SCHEMAGRAPH_LOG_LEVEL: "debug",
      },
    });

    expect(config.store).toBe("neo4j");
    expect(config.neo4j).toEqual({
      uri: "bolt://localhost:7687",
      user: "neo4j",
      password: "test-secret",
      database: "graph",
    });
    expect(config.batchSize).toBe(500);
    expect(config.logLevel).toBe("debug");
  });

  it("should report a non-numeric size against its field", () => {
    const err = configError(() => loadConfig({ env: { SCHEMAGRAPH_ITERATION_SIZE: "lots" } }));
    expect(err.field).toBe("iterationSize");
  });

  it("should layer the environment over the file", () => {
    const file = join(dir, "schemagraph.json");
    writeFileSync(file, JSON.stringify({ store: "memory", sqlite: { path: "from-file.db" }, iterationSize: 25 }));

    const config = loadConfig({ file, env: { SCHEMAGRAPH_SQLITE_PATH: "from-env.db" } });

    expect(config.store).toBe("memory");
    expect(config.sqlite).toEqual({ path: "from-env.db" });
    expect(config.iterationSize).toBe(25);
  });

  it("should reject a file that is not JSON", () => {
    const file = join(dir, "broken.json");
    writeFileSync(file, "{ store: ");

    expect(() => loadConfig({ file, env: {} })).toThrow(`config: cannot read ${file}:`);
  });

  it("should reject a file that holds no object", () => {
    const file = join(dir, "list.json");
    writeFileSync(file, "[1, 2]");

    expect(() => loadConfig({ file, env: {} })).toThrow(`config: ${file} must hold a JSON object`);
  });
});
