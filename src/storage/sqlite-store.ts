/**
 * schemagraph — SQLite Graph Store
 *
 * Embedded property graph on better-sqlite3 (synchronous, zero-config).
 * Properties are JSON documents; lookup indexes are expression indexes on
 * `json_extract`, so matcher queries can use them.
 *
 * Schema:
 *   nodes          — one row per node, `key_value` = JSON of its `id`
 *   node_labels    — node ↔ label junction, ordered by `position`
 *   relationships  — typed, directed, unique per (type, start, end)
 *   graph_indexes  — index specs requested through ensureIndexes
 */

import Database from "better-sqlite3";
import type { IndexSpec, MatchCriteria, PropertyMap, ScalarValue } from "../types.js";
import { indexKey } from "../types.js";
import {
  LocalGraphStore,
  type RelationshipSide,
  type StoredNode,
  type StoredRelationship,
} from "./local-store.js";
import { criteriaMatch } from "./matching.js";

// =============================================================================
// Schema DDL
// =============================================================================

const SCHEMA_VERSION = 1;

const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS nodes (
  node_id     INTEGER PRIMARY KEY AUTOINCREMENT,
  key_value   TEXT NOT NULL,
  properties  TEXT NOT NULL DEFAULT '{}'
);

CREATE INDEX IF NOT EXISTS idx_nodes_key ON nodes(key_value);

CREATE TABLE IF NOT EXISTS node_labels (
  node_id   INTEGER NOT NULL,
  label     TEXT NOT NULL,
  position  INTEGER NOT NULL,
  PRIMARY KEY (label, node_id),
  FOREIGN KEY (node_id) REFERENCES nodes(node_id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_node_labels_node ON node_labels(node_id);

CREATE TABLE IF NOT EXISTS relationships (
  rel_id      INTEGER PRIMARY KEY AUTOINCREMENT,
  rel_type    TEXT NOT NULL,
  start_id    INTEGER NOT NULL,
  end_id      INTEGER NOT NULL,
  properties  TEXT NOT NULL DEFAULT '{}',
  UNIQUE (rel_type, start_id, end_id),
  FOREIGN KEY (start_id) REFERENCES nodes(node_id) ON DELETE CASCADE,
  FOREIGN KEY (end_id) REFERENCES nodes(node_id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_relationships_start ON relationships(start_id, rel_type);
CREATE INDEX IF NOT EXISTS idx_relationships_end ON relationships(end_id, rel_type);
CREATE INDEX IF NOT EXISTS idx_relationships_type ON relationships(rel_type);

CREATE TABLE IF NOT EXISTS graph_indexes (
  index_key   TEXT PRIMARY KEY,
  spec        TEXT NOT NULL,
  created_at  TEXT NOT NULL
);
`;

// =============================================================================
// Helpers
// =============================================================================

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

type SqlValue = string | number | null;

type RawNodeRow = { node_id: number; properties: string; labels: string };
type RawRelationshipRow = {
  rel_id: number;
  rel_type: string;
  start_id: number;
  end_id: number;
  properties: string;
};

function jsonParse<T>(value: string | null | undefined, fallback: T): T {
  if (!value) return fallback;
  try {
    return JSON.parse(value) as T;
  } catch {
    return fallback;
  }
}

function sqlValue(value: ScalarValue): SqlValue {
  return typeof value === "boolean" ? (value ? 1 : 0) : value;
}

function jsonPath(property: string): string {
  if (!IDENTIFIER.test(property)) {
    throw new Error(`Invalid property name for a JSON path: ${property}`);
  }
  return `'$.${property}'`;
}

function rowToNode(row: RawNodeRow): StoredNode {
  return {
    nodeId: row.node_id,
    labels: row.labels ? row.labels.split(",") : [],
    properties: jsonParse<PropertyMap>(row.properties, {}),
  };
}

function rowToRelationship(row: RawRelationshipRow): StoredRelationship {
  return {
    relId: row.rel_id,
    type: row.rel_type,
    startId: row.start_id,
    endId: row.end_id,
    properties: jsonParse<PropertyMap>(row.properties, {}),
  };
}

/** Node columns plus its labels in insertion order. */
const NODE_SELECT = `
  SELECT n.node_id, n.properties,
    (SELECT group_concat(label, ',') FROM (
      SELECT label FROM node_labels WHERE node_id = n.node_id ORDER BY position
    )) AS labels
  FROM nodes n`;

// =============================================================================
// SQLite Graph Store
// =============================================================================

export class SQLiteGraphStore extends LocalGraphStore {
  readonly kind = "sqlite";
  private db: Database.Database;

  constructor(dbPath: string) {
    super();
    this.db = new Database(dbPath);
  }

  // ---------- Lifecycle ----------

  async initialize(): Promise<void> {
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("synchronous = NORMAL");

    this.db.exec(SCHEMA_DDL);

    const versionRow = this.db.prepare("SELECT version FROM schema_version LIMIT 1").get() as
      | { version: number }
      | undefined;
    if (!versionRow) {
      this.db.prepare("INSERT INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }

  protected transaction<T>(fn: () => T): T {
    if (this.db.inTransaction) return fn();
    return this.db.transaction(fn)();
  }

  // ---------- Nodes ----------

  protected nodeById(nodeId: number): StoredNode | null {
    const row = this.db
      .prepare(`${NODE_SELECT} WHERE n.node_id = ?`)
      .get(nodeId) as RawNodeRow | undefined;
    return row ? rowToNode(row) : null;
  }

  protected nodeByKey(label: string, id: ScalarValue): StoredNode | null {
    const row = this.db
      .prepare(
        `${NODE_SELECT}
         JOIN node_labels l ON l.node_id = n.node_id
         WHERE l.label = ? AND n.key_value = ?
         ORDER BY n.node_id LIMIT 1`,
      )
      .get(label, JSON.stringify(id)) as RawNodeRow | undefined;
    return row ? rowToNode(row) : null;
  }

  protected nodesWithLabel(label: string): StoredNode[] {
    const rows = this.db
      .prepare(
        `${NODE_SELECT} JOIN node_labels l ON l.node_id = n.node_id
         WHERE l.label = ? ORDER BY n.node_id`,
      )
      .all(label) as RawNodeRow[];
    return rows.map(rowToNode);
  }

  protected allNodes(): StoredNode[] {
    const rows = this.db.prepare(`${NODE_SELECT} ORDER BY n.node_id`).all() as RawNodeRow[];
    return rows.map(rowToNode);
  }

  protected override matchNodes(label: string, criteria: MatchCriteria): StoredNode[] {
    if (criteria.some((term) => term.value === null)) return [];

    const clauses = ["l.label = ?"];
    const params: SqlValue[] = [label];
    for (const term of criteria) {
      const { value } = term;
      // List values are only compared after the query.
      if (value === null || Array.isArray(value)) continue;
      const path = jsonPath(term.property);
      if (term.mode === "exact") {
        clauses.push(`json_extract(n.properties, ${path}) = ?`);
        params.push(sqlValue(value));
      } else if (typeof value !== "string") {
        return [];
      } else if (term.mode === "ignoreCase") {
        clauses.push(
          `json_type(n.properties, ${path}) = 'text'` +
            ` AND lower(json_extract(n.properties, ${path})) = lower(?)`,
        );
        params.push(value);
      } else {
        clauses.push(
          `json_type(n.properties, ${path}) = 'text'` +
            ` AND instr(lower(json_extract(n.properties, ${path})), lower(?)) > 0`,
        );
        params.push(value);
      }
    }

    const rows = this.db
      .prepare(
        `${NODE_SELECT} JOIN node_labels l ON l.node_id = n.node_id
         WHERE ${clauses.join(" AND ")} ORDER BY n.node_id`,
      )
      .all(...params) as RawNodeRow[];
    return rows.map(rowToNode).filter((node) => criteriaMatch(node.properties, criteria));
  }

  protected insertNode(labels: string[], properties: PropertyMap): StoredNode {
    const result = this.db
      .prepare("INSERT INTO nodes (key_value, properties) VALUES (?, ?)")
      .run(JSON.stringify(properties.id ?? null), JSON.stringify(properties));
    const nodeId = Number(result.lastInsertRowid);
    const addLabel = this.db.prepare(
      "INSERT INTO node_labels (node_id, label, position) VALUES (?, ?, ?)",
    );
    labels.forEach((label, position) => addLabel.run(nodeId, label, position));
    return { nodeId, labels: [...labels], properties };
  }

  protected saveNode(node: StoredNode): void {
    this.db
      .prepare("UPDATE nodes SET key_value = ?, properties = ? WHERE node_id = ?")
      .run(
        JSON.stringify(node.properties.id ?? null),
        JSON.stringify(node.properties),
        node.nodeId,
      );
    const addLabel = this.db.prepare(
      "INSERT OR IGNORE INTO node_labels (node_id, label, position) VALUES (?, ?, ?)",
    );
    node.labels.forEach((label, position) => addLabel.run(node.nodeId, label, position));
  }

  protected removeNode(nodeId: number): number {
    const removed = this.db
      .prepare("DELETE FROM relationships WHERE start_id = ? OR end_id = ?")
      .run(nodeId, nodeId).changes;
    this.db.prepare("DELETE FROM nodes WHERE node_id = ?").run(nodeId);
    return removed;
  }

  // ---------- Relationships ----------

  protected relationshipBetween(
    type: string,
    startId: number,
    endId: number,
  ): StoredRelationship | null {
    const row = this.db
      .prepare("SELECT * FROM relationships WHERE rel_type = ? AND start_id = ? AND end_id = ?")
      .get(type, startId, endId) as RawRelationshipRow | undefined;
    return row ? rowToRelationship(row) : null;
  }

  protected relationshipsOf(
    nodeId: number,
    type: string,
    side: RelationshipSide,
  ): StoredRelationship[] {
    const column = side === "start" ? "start_id" : "end_id";
    const rows = this.db
      .prepare(`SELECT * FROM relationships WHERE ${column} = ? AND rel_type = ? ORDER BY rel_id`)
      .all(nodeId, type) as RawRelationshipRow[];
    return rows.map(rowToRelationship);
  }

  protected relationshipsOfType(type: string): StoredRelationship[] {
    const rows = this.db
      .prepare("SELECT * FROM relationships WHERE rel_type = ? ORDER BY rel_id")
      .all(type) as RawRelationshipRow[];
    return rows.map(rowToRelationship);
  }

  protected allRelationships(): StoredRelationship[] {
    const rows = this.db
      .prepare("SELECT * FROM relationships ORDER BY rel_id")
      .all() as RawRelationshipRow[];
    return rows.map(rowToRelationship);
  }

  protected insertRelationship(
    type: string,
    startId: number,
    endId: number,
    properties: PropertyMap,
  ): StoredRelationship {
    const result = this.db
      .prepare(
        "INSERT INTO relationships (rel_type, start_id, end_id, properties) VALUES (?, ?, ?, ?)",
      )
      .run(type, startId, endId, JSON.stringify(properties));
    return { relId: Number(result.lastInsertRowid), type, startId, endId, properties };
  }

  protected saveRelationship(rel: StoredRelationship): void {
    this.db
      .prepare("UPDATE relationships SET properties = ? WHERE rel_id = ?")
      .run(JSON.stringify(rel.properties), rel.relId);
  }

  protected removeRelationship(relId: number): void {
    this.db.prepare("DELETE FROM relationships WHERE rel_id = ?").run(relId);
  }

  // ---------- Indexes ----------

  protected addIndex(spec: IndexSpec): boolean {
    const key = indexKey(spec);
    const inserted = this.db
      .prepare("INSERT OR IGNORE INTO graph_indexes (index_key, spec, created_at) VALUES (?, ?, ?)")
      .run(key, JSON.stringify(spec), new Date().toISOString()).changes;

    if (spec.kind === "node") {
      // Shared by every label: the label filter goes through node_labels.
      this.db.exec(
        `CREATE INDEX IF NOT EXISTS "idx_prop_${spec.property}"` +
          ` ON nodes(json_extract(properties, ${jsonPath(spec.property)}))`,
      );
    } else {
      if (!IDENTIFIER.test(spec.relLabel)) {
        throw new Error(`Invalid relationship label for an index: ${spec.relLabel}`);
      }
      const columns = spec.properties
        .map((p) => `json_extract(properties, ${jsonPath(p)})`)
        .join(", ");
      this.db.exec(
        `CREATE INDEX IF NOT EXISTS "idx_rel_${spec.relLabel}_${spec.properties.join("_")}"` +
          ` ON relationships(rel_type, ${columns})`,
      );
    }
    return inserted > 0;
  }

  protected indexSpecs(): IndexSpec[] {
    const rows = this.db
      .prepare("SELECT spec FROM graph_indexes ORDER BY rowid")
      .all() as Array<{ spec: string }>;
    return rows.flatMap((row) => {
      const spec = jsonParse<IndexSpec | null>(row.spec, null);
      return spec ? [spec] : [];
    });
  }
}
