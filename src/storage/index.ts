export { InMemoryGraphStore } from "./memory-store.js";
export { SQLiteGraphStore } from "./sqlite-store.js";
export { Neo4jGraphStore, driverExecutor } from "./neo4j-store.js";
export type {
  CypherExecutor,
  CypherResult,
  CypherRunner,
  Neo4jConfig,
  UpdateCounters,
} from "./neo4j-store.js";
export { LocalGraphStore } from "./local-store.js";

import type { SchemaGraphConfig } from "../config.js";
import type { GraphStore } from "../types.js";
import { InMemoryGraphStore } from "./memory-store.js";
import { Neo4jGraphStore } from "./neo4j-store.js";
import { SQLiteGraphStore } from "./sqlite-store.js";

/** Build the configured backend. The caller still has to `initialize()` it. */
export function createStore(
  config: Pick<SchemaGraphConfig, "store" | "sqlite" | "neo4j">,
): GraphStore {
  switch (config.store) {
    case "memory":
      return new InMemoryGraphStore();
    case "sqlite":
      return new SQLiteGraphStore(config.sqlite.path);
    case "neo4j":
      return Neo4jGraphStore.connect(config.neo4j);
  }
}
