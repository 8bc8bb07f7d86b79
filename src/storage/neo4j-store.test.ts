import { describe, it, expect, beforeEach } from "vitest";
import { int } from "neo4j-driver";
import { buildCleanupJob } from "../core/cleanup.js";
import { buildIngestionQuery } from "../core/querybuilder.js";
import { fromKwargs, fromRow } from "../schema/bindings.js";
import { defineNodeSchema } from "../schema/model.js";
import type { NodeWriteBatch } from "../types.js";
import {
  Neo4jGraphStore,
  fromDriverValue,
  type CypherExecutor,
  type CypherResult,
  type CypherRunner,
  type UpdateCounters,
} from "./neo4j-store.js";

type Call = {
  mode: "read" | "write";
  query: string;
  parameters: Record<string, unknown> | undefined;
};

type Responder = (query: string, parameters: Record<string, unknown> | undefined) => Partial<CypherResult>;

function counters(partial: Partial<UpdateCounters> = {}): UpdateCounters {
  const counts = {
    nodesCreated: 0,
    nodesDeleted: 0,
    relationshipsCreated: 0,
    relationshipsDeleted: 0,
    propertiesSet: 0,
    indexesAdded: 0,
    ...partial,
  };
  const { containsUpdates, ...numbers } = counts;
  return { ...counts, containsUpdates: containsUpdates ?? Object.values(numbers).some((n) => n > 0) };
}

/** Records every query and answers from a responder instead of a server. */
class FakeExecutor implements CypherExecutor {
  readonly calls: Call[] = [];
  closed = false;
  respond: Responder = () => ({});

  private runner(mode: Call["mode"]): CypherRunner {
    return {
      run: async (query, parameters) => {
        this.calls.push({ mode, query, parameters });
        const result = this.respond(query, parameters);
        return { records: result.records ?? [], counters: result.counters ?? counters() };
      },
    };
  }

  async write<T>(work: (tx: CypherRunner) => Promise<T>): Promise<T> {
    return work(this.runner("write"));
  }

  async read<T>(work: (tx: CypherRunner) => Promise<T>): Promise<T> {
    return work(this.runner("read"));
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const ZoneSchema = defineNodeSchema({
  label: "Zone",
  properties: { id: fromRow("id"), size: fromRow("size"), ratio: fromRow("ratio"), region: fromKwargs("REGION") },
});

const WidgetSchema = defineNodeSchema({
  label: "Widget",
  properties: { id: fromRow("id") },
  subResourceRelationship: {
    targetLabel: "Account",
    targetMatcher: { id: fromKwargs("ACCOUNT_ID") },
    relLabel: "RESOURCE",
    direction: "INWARD",
  },
});

describe("Neo4jGraphStore", () => {
  let executor: FakeExecutor;
  let store: Neo4jGraphStore;

  beforeEach(() => {
    executor = new FakeExecutor();
    store = new Neo4jGraphStore(executor);
  });

  // ---------- Lifecycle ----------

  it("should verify the connection on initialize and close the executor", async () => {
    await store.initialize();
    await store.close();

    expect(executor.calls).toEqual([{ mode: "read", query: "RETURN 1 AS ok", parameters: undefined }]);
    expect(executor.closed).toBe(true);
  });

  // ---------- Writes ----------

  it("should send rows as DictList with integers converted", async () => {
    executor.respond = () => ({ counters: counters({ nodesCreated: 1 }) });
    const batch: NodeWriteBatch = {
      job: "load Zone",
      schema: ZoneSchema,
      relationships: [],
      rows: [{ id: "z-1", size: 3, ratio: 0.5, extra: undefined }],
      resolved: [],
      parameters: { REGION: "eu-west-1", UPDATE_TAG: 5 },
      updateTag: 5,
    };

    const summary = await store.writeNodes(batch);

    expect(summary).toEqual({ nodesCreated: 1, relationshipsCreated: 0, relationshipsSkipped: null });
    expect(executor.calls).toHaveLength(1);
    const [call] = executor.calls;
    expect(call?.mode).toBe("write");
    expect(call?.query).toBe(buildIngestionQuery(ZoneSchema, []));
    expect(call?.parameters).toStrictEqual({
      REGION: "eu-west-1",
      UPDATE_TAG: int(5),
      DictList: [{ id: "z-1", size: int(3), ratio: 0.5 }],
    });
  });

  // ---------- Cleanup ----------

  it("should repeat an iterative cleanup until a chunk deletes nothing", async () => {
    const results = [
      counters({ nodesDeleted: 2, relationshipsDeleted: 3 }),
      counters({ nodesDeleted: 1 }),
      counters(),
    ];
    executor.respond = () => ({ counters: results.shift() ?? counters() });
    const job = buildCleanupJob(WidgetSchema, {
      updateTag: 9,
      parameters: { ACCOUNT_ID: "acct-1" },
      iterationSize: 50,
    });
    const [nodes] = job.statements;
    if (!nodes) throw new Error("expected a node cleanup statement");

    const counts = await store.runCleanupStatement(nodes);

    expect(counts).toEqual({ nodesDeleted: 3, relationshipsDeleted: 3 });
    expect(executor.calls).toHaveLength(3);
    expect(executor.calls[0]?.query).toBe(nodes.query);
    expect(executor.calls[0]?.parameters).toEqual({
      ACCOUNT_ID: "acct-1",
      UPDATE_TAG: int(9),
      LIMIT_SIZE: int(50),
    });
  });

  it("should run a non-iterative cleanup once", async () => {
    executor.respond = () => ({ counters: counters({ relationshipsDeleted: 4 }) });
    const cleanup = buildCleanupJob(WidgetSchema, { updateTag: 9, parameters: { ACCOUNT_ID: "acct-1" } });
    const [, scopeRels] = cleanup.statements;
    if (!scopeRels) throw new Error("expected a scope relationship statement");

    const counts = await store.runCleanupStatement({ ...scopeRels, iterative: false });

    expect(counts).toEqual({ nodesDeleted: 0, relationshipsDeleted: 4 });
    expect(executor.calls).toHaveLength(1);
  });

  // ---------- Statement Jobs ----------

  it("should repeat an iterative statement until a chunk changes nothing", async () => {
    const results = [
      counters({ propertiesSet: 4 }),
      counters({ relationshipsCreated: 1, propertiesSet: 1 }),
      counters(),
    ];
    executor.respond = () => ({ counters: results.shift() ?? counters() });

    const counts = await store.runStatement({
      query: "MATCH (w:Widget) WHERE w.exposed IS NULL WITH w LIMIT $LIMIT_SIZE SET w.exposed = false",
      parameters: { UPDATE_TAG: 3 },
      iterative: true,
      iterationSize: 25,
    });

    expect(counts).toEqual({
      nodesCreated: 0,
      nodesDeleted: 0,
      relationshipsCreated: 1,
      relationshipsDeleted: 0,
      propertiesSet: 5,
    });
    expect(executor.calls).toHaveLength(3);
    expect(executor.calls[0]?.parameters).toEqual({ UPDATE_TAG: int(3), LIMIT_SIZE: int(25) });
  });

  it("should run a non-iterative statement once even when it changed something", async () => {
    executor.respond = () => ({ counters: counters({ propertiesSet: 2 }) });

    const counts = await store.runStatement({
      query: "MATCH (w:Widget) SET w.checked = true",
      parameters: {},
      iterative: false,
      iterationSize: 0,
    });

    expect(counts.propertiesSet).toBe(2);
    expect(executor.calls.map((c) => c.mode)).toEqual(["write"]);
  });

  // ---------- Indexes ----------

  it("should create each index in its own write and count additions", async () => {
    executor.respond = (query) => ({ counters: counters({ indexesAdded: query.includes("(n.id)") ? 1 : 0 }) });

    const created = await store.ensureIndexes([
      { kind: "node", label: "Widget", property: "id" },
      { kind: "node", label: "Widget", property: "lastupdated" },
    ]);

    expect(created).toBe(1);
    expect(executor.calls.map((c) => [c.mode, c.query])).toEqual([
      ["write", "CREATE INDEX IF NOT EXISTS FOR (n:Widget) ON (n.id)"],
      ["write", "CREATE INDEX IF NOT EXISTS FOR (n:Widget) ON (n.lastupdated)"],
    ]);
  });

  it("should list single-property node indexes and relationship indexes", async () => {
    executor.respond = () => ({
      records: [
        { entityType: "NODE", labelsOrTypes: ["Widget"], properties: ["id"] },
        { entityType: "NODE", labelsOrTypes: ["Widget"], properties: ["id", "name"] },
        { entityType: "RELATIONSHIP", labelsOrTypes: ["DRIVES"], properties: ["lastupdated", "_sub_resource_id"] },
        { entityType: "NODE", labelsOrTypes: null, properties: null },
      ],
    });

    expect(await store.listIndexes()).toEqual([
      { kind: "node", label: "Widget", property: "id" },
      { kind: "relationship", relLabel: "DRIVES", properties: ["lastupdated", "_sub_resource_id"] },
    ]);
  });

  // ---------- Inspection ----------

  it("should find nodes by label and property values", async () => {
    executor.respond = () => ({
      records: [{ labels: ["Widget", "Tagged"], properties: { id: "w-1", size: int(3), zones: ["z-1", "z-2"] } }],
    });

    const nodes = await store.findNodes("Widget", { id: "w-1", size: 3 });

    expect(nodes).toEqual([
      { labels: ["Widget", "Tagged"], properties: { id: "w-1", size: 3, zones: ["z-1", "z-2"] } },
    ]);
    expect(executor.calls[0]?.query).toBe(
      "MATCH (n:Widget)\nWHERE n.id = $w0 AND n.size = $w1\n" +
        "RETURN labels(n) AS labels, properties(n) AS properties",
    );
    expect(executor.calls[0]?.parameters).toEqual({ w0: "w-1", w1: int(3) });
  });

  it("should refuse labels that are not identifiers", async () => {
    await expect(store.findNodes("Bad Label")).rejects.toThrow("Invalid label: Bad Label");
    expect(executor.calls).toEqual([]);
  });

  it("should build relationship filters into the pattern", async () => {
    executor.respond = () => ({
      records: [
        {
          type: "RESOURCE",
          startLabels: ["Account"],
          startId: "acct-1",
          endLabels: ["Widget"],
          endId: "w-1",
          properties: { lastupdated: int(9) },
        },
      ],
    });

    const rels = await store.findRelationships({ type: "RESOURCE", startLabel: "Account" });

    expect(executor.calls[0]?.query.split("\n")[0]).toBe("MATCH (a:Account)-[r:RESOURCE]->(b)");
    expect(rels).toEqual([
      {
        type: "RESOURCE",
        start: { labels: ["Account"], id: "acct-1" },
        end: { labels: ["Widget"], id: "w-1" },
        properties: { lastupdated: 9 },
      },
    ]);
  });

  it("should gather stats in one read", async () => {
    executor.respond = (query) => {
      if (query.startsWith("MATCH (n) RETURN")) return { records: [{ count: int(3) }] };
      if (query.startsWith("MATCH ()-[r]->() RETURN count")) return { records: [{ count: int(2) }] };
      if (query.includes("UNWIND labels(n)")) {
        return { records: [{ label: "Account", count: int(1) }, { label: "Widget", count: int(2) }] };
      }
      if (query.includes("type(r) AS type")) return { records: [{ type: "RESOURCE", count: int(2) }] };
      return { records: [{ count: int(4) }] };
    };

    expect(await store.getStats()).toEqual({
      totalNodes: 3,
      totalRelationships: 2,
      nodesByLabel: { Account: 1, Widget: 2 },
      relationshipsByType: { RESOURCE: 2 },
      indexes: 4,
    });
    expect(executor.calls.map((c) => c.mode)).toEqual(["read", "read", "read", "read", "read"]);
  });
});

describe("fromDriverValue", () => {
  it("should convert driver integers and drop unsupported values", () => {
    expect(fromDriverValue(int(7))).toBe(7);
    expect(fromDriverValue([int(1), "a", null])).toEqual([1, "a"]);
    expect(fromDriverValue({ nested: true })).toBeNull();
  });
});
