/**
 * schemagraph — Neo4j Graph Store
 *
 * Runs the synthesized Cypher through neo4j-driver. Writes go through
 * `session.executeWrite`, one managed transaction per batch or cleanup chunk.
 * The driver sits behind a small executor interface so the store can be
 * exercised without a server.
 */

import {
  auth,
  driver as createDriver,
  int,
  isInt,
  type Driver,
  type ManagedTransaction,
} from "neo4j-driver";
import { buildIndexQuery } from "../core/indexes.js";
import { ROWS_PARAMETER, buildIngestionQuery, buildMatchLinkQuery } from "../core/querybuilder.js";
import {
  LIMIT_SIZE_PARAMETER,
  type CleanupCounts,
  type CleanupStatement,
  type GraphNodeRecord,
  type GraphRelationshipRecord,
  type GraphStatement,
  type GraphStats,
  type GraphStore,
  type IndexSpec,
  type MatchLinkWriteBatch,
  type NodeWriteBatch,
  type PropertyMap,
  type PropertyValue,
  type QueryParameters,
  type RelationshipFilter,
  type Row,
  type RowValue,
  type ScalarValue,
  type StatementCounts,
  type WriteSummary,
} from "../types.js";

// =============================================================================
// Executor
// =============================================================================

export type Neo4jConfig = {
  uri: string;
  user: string;
  password: string;
  database?: string;
};

export type UpdateCounters = {
  nodesCreated: number;
  nodesDeleted: number;
  relationshipsCreated: number;
  relationshipsDeleted: number;
  propertiesSet: number;
  indexesAdded: number;
  containsUpdates: boolean;
};

export type CypherResult = {
  records: Array<Record<string, unknown>>;
  counters: UpdateCounters;
};

export interface CypherRunner {
  run(query: string, parameters?: Record<string, unknown>): Promise<CypherResult>;
}

/** Transaction boundary the store runs its work in. */
export interface CypherExecutor {
  write<T>(work: (tx: CypherRunner) => Promise<T>): Promise<T>;
  read<T>(work: (tx: CypherRunner) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

function wrapTransaction(tx: ManagedTransaction): CypherRunner {
  return {
    async run(query, parameters) {
      const result = await tx.run(query, parameters);
      const stats = result.summary.counters.updates();
      return {
        records: result.records.map((record) => record.toObject()),
        counters: {
          nodesCreated: stats.nodesCreated,
          nodesDeleted: stats.nodesDeleted,
          relationshipsCreated: stats.relationshipsCreated,
          relationshipsDeleted: stats.relationshipsDeleted,
          propertiesSet: stats.propertiesSet,
          indexesAdded: stats.indexesAdded,
          containsUpdates: result.summary.counters.containsUpdates(),
        },
      };
    },
  };
}

/** Executor over a neo4j-driver `Driver`: one session per unit of work. */
export function driverExecutor(driver: Driver, database?: string): CypherExecutor {
  return {
    async write(work) {
      const session = driver.session({ database, defaultAccessMode: "WRITE" });
      try {
        return await session.executeWrite((tx) => work(wrapTransaction(tx)));
      } finally {
        await session.close();
      }
    },
    async read(work) {
      const session = driver.session({ database, defaultAccessMode: "READ" });
      try {
        return await session.executeRead((tx) => work(wrapTransaction(tx)));
      } finally {
        await session.close();
      }
    },
    async close() {
      await driver.close();
    },
  };
}

// =============================================================================
// Value Conversion
// =============================================================================

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function requireIdentifier(kind: string, name: string): string {
  if (!IDENTIFIER.test(name)) throw new Error(`Invalid ${kind}: ${name}`);
  return name;
}

/** Integral numbers travel as Neo4j integers, not floats. */
function toDriverValue(value: RowValue): unknown {
  if (typeof value === "number" && Number.isInteger(value)) return int(value);
  if (Array.isArray(value)) return value.map((v) => toDriverValue(v));
  return value;
}

function toDriverParameters(params: QueryParameters): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(params)) out[name] = toDriverValue(value);
  return out;
}

function toDriverRow(row: Row): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(row)) {
    if (value !== undefined) out[name] = toDriverValue(value);
  }
  return out;
}

/** Call parameters plus the rows under `$DictList`. */
function batchParameters(batch: {
  parameters: QueryParameters;
  rows: readonly Row[];
}): Record<string, unknown> {
  return { ...toDriverParameters(batch.parameters), [ROWS_PARAMETER]: batch.rows.map(toDriverRow) };
}

function toScalar(value: unknown): ScalarValue | null {
  if (isInt(value)) return value.toNumber();
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return null;
}

export function fromDriverValue(value: unknown): PropertyValue | null {
  if (Array.isArray(value)) {
    return value.map(toScalar).filter((v): v is ScalarValue => v !== null);
  }
  return toScalar(value);
}

function toPropertyMap(value: unknown): PropertyMap {
  const out: PropertyMap = {};
  if (typeof value !== "object" || value === null || Array.isArray(value)) return out;
  for (const [name, raw] of Object.entries(value)) {
    const converted = fromDriverValue(raw);
    if (converted !== null) out[name] = converted;
  }
  return out;
}

function toStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function toCount(value: unknown): number {
  const scalar = toScalar(value);
  return typeof scalar === "number" ? scalar : 0;
}

// =============================================================================
// Neo4j Graph Store
// =============================================================================

export class Neo4jGraphStore implements GraphStore {
  readonly kind = "neo4j";
  private executor: CypherExecutor;

  constructor(executor: CypherExecutor) {
    this.executor = executor;
  }

  static connect(config: Neo4jConfig): Neo4jGraphStore {
    const driver = createDriver(config.uri, auth.basic(config.user, config.password));
    return new Neo4jGraphStore(driverExecutor(driver, config.database));
  }

  // ---------- Lifecycle ----------

  async initialize(): Promise<void> {
    await this.executor.read((tx) => tx.run("RETURN 1 AS ok"));
  }

  async close(): Promise<void> {
    await this.executor.close();
  }

  // ---------- Indexes ----------

  async ensureIndexes(specs: readonly IndexSpec[]): Promise<number> {
    let created = 0;
    // Schema changes cannot share a transaction with other statements.
    for (const spec of specs) {
      const query = buildIndexQuery(spec).replace(/;$/, "");
      const result = await this.executor.write((tx) => tx.run(query));
      created += result.counters.indexesAdded;
    }
    return created;
  }

  async listIndexes(): Promise<IndexSpec[]> {
    const result = await this.executor.read((tx) =>
      tx.run(
        "SHOW INDEXES YIELD entityType, labelsOrTypes, properties, type " +
          "WHERE type = 'RANGE' RETURN entityType, labelsOrTypes, properties",
      ),
    );
    const specs: IndexSpec[] = [];
    for (const record of result.records) {
      const [labelOrType] = toStringList(record.labelsOrTypes);
      const properties = toStringList(record.properties);
      if (!labelOrType || properties.length === 0) continue;
      if (record.entityType === "NODE" && properties.length === 1) {
        specs.push({ kind: "node", label: labelOrType, property: properties[0] });
      } else if (record.entityType === "RELATIONSHIP") {
        specs.push({ kind: "relationship", relLabel: labelOrType, properties });
      }
    }
    return specs;
  }

  // ---------- Writes ----------

  async writeNodes(batch: NodeWriteBatch): Promise<WriteSummary> {
    const query = buildIngestionQuery(batch.schema, batch.relationships);
    const result = await this.executor.write((tx) => tx.run(query, batchParameters(batch)));
    return {
      nodesCreated: result.counters.nodesCreated,
      relationshipsCreated: result.counters.relationshipsCreated,
      relationshipsSkipped: null,
    };
  }

  async writeMatchLinks(batch: MatchLinkWriteBatch): Promise<WriteSummary> {
    const query = buildMatchLinkQuery(batch.schema);
    const result = await this.executor.write((tx) => tx.run(query, batchParameters(batch)));
    return {
      nodesCreated: 0,
      relationshipsCreated: result.counters.relationshipsCreated,
      relationshipsSkipped: null,
    };
  }

  // ---------- Cleanup ----------

  /**
   * Runs the statement in `iterationSize` chunks, each its own transaction,
   * until nothing is deleted.
   */
  async runCleanupStatement(statement: CleanupStatement): Promise<CleanupCounts> {
    const totals: CleanupCounts = { nodesDeleted: 0, relationshipsDeleted: 0 };
    const params = {
      ...toDriverParameters(statement.parameters),
      [LIMIT_SIZE_PARAMETER]: int(statement.iterationSize),
    };
    let deleted: number;
    do {
      const result = await this.executor.write((tx) => tx.run(statement.query, params));
      totals.nodesDeleted += result.counters.nodesDeleted;
      totals.relationshipsDeleted += result.counters.relationshipsDeleted;
      deleted = result.counters.nodesDeleted + result.counters.relationshipsDeleted;
    } while (statement.iterative && deleted > 0);
    return totals;
  }

  // ---------- Statement Jobs ----------

  /** Iterative statements repeat, each chunk its own transaction, until a chunk changes nothing. */
  async runStatement(statement: GraphStatement): Promise<StatementCounts> {
    const totals: StatementCounts = {
      nodesCreated: 0,
      nodesDeleted: 0,
      relationshipsCreated: 0,
      relationshipsDeleted: 0,
      propertiesSet: 0,
    };
    const params = {
      ...toDriverParameters(statement.parameters),
      [LIMIT_SIZE_PARAMETER]: int(statement.iterationSize),
    };
    let changed: boolean;
    do {
      const { counters } = await this.executor.write((tx) => tx.run(statement.query, params));
      totals.nodesCreated += counters.nodesCreated;
      totals.nodesDeleted += counters.nodesDeleted;
      totals.relationshipsCreated += counters.relationshipsCreated;
      totals.relationshipsDeleted += counters.relationshipsDeleted;
      totals.propertiesSet += counters.propertiesSet;
      changed = counters.containsUpdates;
    } while (statement.iterative && changed);
    return totals;
  }

  // ---------- Inspection ----------

  async findNodes(
    label: string,
    where: Readonly<Record<string, ScalarValue>> = {},
  ): Promise<GraphNodeRecord[]> {
    const params: Record<string, unknown> = {};
    const conditions = Object.entries(where).map(([property, value], i) => {
      params[`w${i}`] = toDriverValue(value);
      return `n.${requireIdentifier("property", property)} = $w${i}`;
    });
    const query = [
      `MATCH (n:${requireIdentifier("label", label)})`,
      ...(conditions.length > 0 ? [`WHERE ${conditions.join(" AND ")}`] : []),
      "RETURN labels(n) AS labels, properties(n) AS properties",
    ].join("\n");
    const result = await this.executor.read((tx) => tx.run(query, params));
    return result.records.map((record) => ({
      labels: toStringList(record.labels),
      properties: toPropertyMap(record.properties),
    }));
  }

  async findRelationships(filter: RelationshipFilter = {}): Promise<GraphRelationshipRecord[]> {
    const start = filter.startLabel ? `a:${requireIdentifier("label", filter.startLabel)}` : "a";
    const end = filter.endLabel ? `b:${requireIdentifier("label", filter.endLabel)}` : "b";
    const rel = filter.type ? `r:${requireIdentifier("relationship type", filter.type)}` : "r";
    const result = await this.executor.read((tx) =>
      tx.run(
        `MATCH (${start})-[${rel}]->(${end})\n` +
          "RETURN type(r) AS type, labels(a) AS startLabels, a.id AS startId, " +
          "labels(b) AS endLabels, b.id AS endId, properties(r) AS properties",
      ),
    );
    return result.records.map((record) => ({
      type: typeof record.type === "string" ? record.type : "",
      start: { labels: toStringList(record.startLabels), id: fromDriverValue(record.startId) },
      end: { labels: toStringList(record.endLabels), id: fromDriverValue(record.endId) },
      properties: toPropertyMap(record.properties),
    }));
  }

  async getStats(): Promise<GraphStats> {
    return this.executor.read(async (tx) => {
      const nodes = await tx.run("MATCH (n) RETURN count(n) AS count");
      const rels = await tx.run("MATCH ()-[r]->() RETURN count(r) AS count");
      const byLabel = await tx.run(
        "MATCH (n) UNWIND labels(n) AS label RETURN label, count(*) AS count",
      );
      const byType = await tx.run("MATCH ()-[r]->() RETURN type(r) AS type, count(*) AS count");
      const indexes = await tx.run("SHOW INDEXES YIELD name RETURN count(*) AS count");

      const nodesByLabel: Record<string, number> = {};
      for (const record of byLabel.records) {
        if (typeof record.label === "string") nodesByLabel[record.label] = toCount(record.count);
      }
      const relationshipsByType: Record<string, number> = {};
      for (const record of byType.records) {
        if (typeof record.type === "string") {
          relationshipsByType[record.type] = toCount(record.count);
        }
      }
      return {
        totalNodes: toCount(nodes.records[0]?.count),
        totalRelationships: toCount(rels.records[0]?.count),
        nodesByLabel,
        relationshipsByType,
        indexes: toCount(indexes.records[0]?.count),
      };
    });
  }
}
