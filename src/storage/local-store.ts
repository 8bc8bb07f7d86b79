/**
 * schemagraph — In-Process Plan Interpreter
 *
 * Shared base for stores that hold the graph in this process (memory and
 * SQLite). It executes resolved write batches and cleanup steps on top of a
 * handful of synchronous primitives, each call wrapped in the subclass's
 * transaction so a failure leaves the graph untouched.
 */

import type { LinkDirection, RelationshipSchema } from "../schema/model.js";
import {
  UPDATE_TAG_PARAMETER,
  indexKey,
  type CleanupCounts,
  type CleanupStatement,
  type CleanupStep,
  type GraphNodeRecord,
  type GraphRelationshipRecord,
  type GraphStatement,
  type GraphStats,
  type GraphStore,
  type IndexSpec,
  type MatchCriteria,
  type MatchLinkWriteBatch,
  type NodeHandle,
  type NodeWriteBatch,
  type PropertyMap,
  type QueryParameters,
  type RelationshipFilter,
  type ScalarValue,
  type ScopePattern,
  type StatementCounts,
  type StoreKind,
  type UpdateTag,
  type WriteSummary,
} from "../types.js";
import { applyProperties, criteriaMatch, isStale, valuesEqual } from "./matching.js";

export type StoredNode = {
  nodeId: number;
  labels: string[];
  properties: PropertyMap;
};

export type StoredRelationship = {
  relId: number;
  type: string;
  startId: number;
  endId: number;
  properties: PropertyMap;
};

/** Which end of a relationship a node sits on. */
export type RelationshipSide = "start" | "end";

function sideFor(direction: LinkDirection): RelationshipSide {
  return direction === "OUTWARD" ? "start" : "end";
}

function otherEnd(rel: StoredRelationship, side: RelationshipSide): number {
  return side === "start" ? rel.endId : rel.startId;
}

export abstract class LocalGraphStore implements GraphStore {
  abstract readonly kind: StoreKind;

  abstract initialize(): Promise<void>;
  abstract close(): Promise<void>;

  // ---------- Primitives ----------

  protected abstract transaction<T>(fn: () => T): T;
  protected abstract nodeById(nodeId: number): StoredNode | null;
  protected abstract nodeByKey(label: string, id: ScalarValue): StoredNode | null;
  protected abstract nodesWithLabel(label: string): StoredNode[];
  protected abstract allNodes(): StoredNode[];
  protected abstract insertNode(labels: string[], properties: PropertyMap): StoredNode;
  protected abstract saveNode(node: StoredNode): void;
  /** Delete a node and every relationship touching it; returns how many went with it. */
  protected abstract removeNode(nodeId: number): number;

  protected abstract relationshipBetween(
    type: string,
    startId: number,
    endId: number,
  ): StoredRelationship | null;
  protected abstract relationshipsOf(
    nodeId: number,
    type: string,
    side: RelationshipSide,
  ): StoredRelationship[];
  protected abstract relationshipsOfType(type: string): StoredRelationship[];
  protected abstract allRelationships(): StoredRelationship[];
  protected abstract insertRelationship(
    type: string,
    startId: number,
    endId: number,
    properties: PropertyMap,
  ): StoredRelationship;
  protected abstract saveRelationship(rel: StoredRelationship): void;
  protected abstract removeRelationship(relId: number): void;

  /** Record an index; returns false when it already existed. */
  protected abstract addIndex(spec: IndexSpec): boolean;
  protected abstract indexSpecs(): IndexSpec[];

  /** Nodes with `label` satisfying every term. Subclasses may push this down to their engine. */
  protected matchNodes(label: string, criteria: MatchCriteria): StoredNode[] {
    if (criteria.some((term) => term.value === null)) return [];
    return this.nodesWithLabel(label).filter((node) => criteriaMatch(node.properties, criteria));
  }

  // ---------- Indexes ----------

  async ensureIndexes(specs: readonly IndexSpec[]): Promise<number> {
    return this.transaction(() => {
      let created = 0;
      const seen = new Set<string>();
      for (const spec of specs) {
        const key = indexKey(spec);
        if (seen.has(key)) continue;
        seen.add(key);
        if (this.addIndex(spec)) created++;
      }
      return created;
    });
  }

  async listIndexes(): Promise<IndexSpec[]> {
    return this.indexSpecs();
  }

  // ---------- Writes ----------

  async writeNodes(batch: NodeWriteBatch): Promise<WriteSummary> {
    return this.transaction(() => {
      const summary: WriteSummary = {
        nodesCreated: 0,
        relationshipsCreated: 0,
        relationshipsSkipped: 0,
      };
      const timestamp = Date.now();
      let skipped = 0;

      for (const row of batch.resolved) {
        const { node, created } = this.mergeNode(
          batch.schema.label,
          batch.schema.extraLabels,
          row.id,
          timestamp,
        );
        applyProperties(node.properties, row.properties);
        node.properties.lastupdated = batch.updateTag;
        this.saveNode(node);
        if (created) summary.nodesCreated++;

        for (const rel of row.relationships) {
          for (const criteria of rel.targets) {
            const targets = this.matchNodes(rel.relationship.targetLabel, criteria);
            if (targets.length === 0) {
              skipped++;
              continue;
            }
            for (const target of targets) {
              const [startId, endId] = orient(rel.relationship, node.nodeId, target.nodeId);
              const created = this.mergeRelationship(
                rel.relationship.relLabel,
                startId,
                endId,
                rel.properties,
                batch.updateTag,
                timestamp,
              );
              if (created) summary.relationshipsCreated++;
            }
          }
        }
      }

      summary.relationshipsSkipped = skipped;
      return summary;
    });
  }

  async writeMatchLinks(batch: MatchLinkWriteBatch): Promise<WriteSummary> {
    return this.transaction(() => {
      const summary: WriteSummary = {
        nodesCreated: 0,
        relationshipsCreated: 0,
        relationshipsSkipped: 0,
      };
      const timestamp = Date.now();
      let skipped = 0;
      const { schema } = batch;

      for (const row of batch.resolved) {
        const sources = this.matchAny(schema.sourceLabel, row.sources);
        const targets = this.matchAny(schema.targetLabel, row.targets);
        if (sources.length === 0 || targets.length === 0) {
          skipped++;
          continue;
        }
        for (const source of sources) {
          for (const target of targets) {
            const [startId, endId] =
              schema.direction === "OUTWARD"
                ? [source.nodeId, target.nodeId]
                : [target.nodeId, source.nodeId];
            const created = this.mergeRelationship(
              schema.relLabel,
              startId,
              endId,
              row.properties,
              batch.updateTag,
              timestamp,
            );
            if (created) summary.relationshipsCreated++;
          }
        }
      }

      summary.relationshipsSkipped = skipped;
      return summary;
    });
  }

  private mergeNode(
    label: string,
    extraLabels: readonly string[],
    id: ScalarValue,
    timestamp: number,
  ): { node: StoredNode; created: boolean } {
    const existing = this.nodeByKey(label, id);
    if (existing) {
      for (const extra of extraLabels) {
        if (!existing.labels.includes(extra)) existing.labels.push(extra);
      }
      return { node: existing, created: false };
    }
    const node = this.insertNode([label, ...extraLabels], { id, firstseen: timestamp });
    return { node, created: true };
  }

  /** MERGE one relationship; true when it was created. */
  private mergeRelationship(
    type: string,
    startId: number,
    endId: number,
    properties: QueryParameters,
    updateTag: UpdateTag,
    timestamp: number,
  ): boolean {
    let rel = this.relationshipBetween(type, startId, endId);
    const created = rel === null;
    if (!rel) rel = this.insertRelationship(type, startId, endId, { firstseen: timestamp });
    applyProperties(rel.properties, properties);
    rel.properties.lastupdated = updateTag;
    this.saveRelationship(rel);
    return created;
  }

  /** Union of the matches of each criteria set, without duplicates. */
  private matchAny(label: string, sets: readonly MatchCriteria[]): StoredNode[] {
    const found = new Map<number, StoredNode>();
    for (const criteria of sets) {
      for (const node of this.matchNodes(label, criteria)) found.set(node.nodeId, node);
    }
    return [...found.values()];
  }

  // ---------- Cleanup ----------

  async runCleanupStatement(statement: CleanupStatement): Promise<CleanupCounts> {
    return this.transaction(() => this.applyCleanup(statement.step, statement.parameters));
  }

  /** Local stores interpret cleanup steps, not Cypher text. */
  async runStatement(_statement: GraphStatement): Promise<StatementCounts> {
    throw new Error(`the ${this.kind} store cannot run Cypher statements; use the neo4j store`);
  }

  private applyCleanup(step: CleanupStep, params: QueryParameters): CleanupCounts {
    const counts: CleanupCounts = { nodesDeleted: 0, relationshipsDeleted: 0 };
    const tag = params[UPDATE_TAG_PARAMETER] ?? null;

    switch (step.kind) {
      case "nodes": {
        const candidates = step.scope
          ? uniqueNodes(this.scopeMembers(step.label, step.scope, params).map((m) => m.node))
          : this.nodesWithLabel(step.label);
        for (const node of candidates) {
          if (!isStale(node.properties, tag) || !this.nodeById(node.nodeId)) continue;
          if (step.cascade) {
            const side = sideFor(step.cascade.direction);
            for (const rel of this.relationshipsOf(node.nodeId, step.cascade.relLabel, side)) {
              const child = this.nodeById(otherEnd(rel, side));
              if (!child || child.nodeId === node.nodeId) continue;
              if (!isStale(child.properties, tag)) continue;
              counts.relationshipsDeleted += this.removeNode(child.nodeId);
              counts.nodesDeleted++;
            }
          }
          counts.relationshipsDeleted += this.removeNode(node.nodeId);
          counts.nodesDeleted++;
        }
        return counts;
      }

      case "scope-relationships": {
        for (const { rel } of this.scopeMembers(step.label, step.scope, params)) {
          if (!isStale(rel.properties, tag)) continue;
          this.removeRelationship(rel.relId);
          counts.relationshipsDeleted++;
        }
        return counts;
      }

      case "relationships": {
        const nodes = step.scope
          ? uniqueNodes(this.scopeMembers(step.label, step.scope, params).map((m) => m.node))
          : this.nodesWithLabel(step.label);
        const side = sideFor(step.direction);
        const removed = new Set<number>();
        for (const node of nodes) {
          for (const rel of this.relationshipsOf(node.nodeId, step.relLabel, side)) {
            if (removed.has(rel.relId) || !isStale(rel.properties, tag)) continue;
            const other = this.nodeById(otherEnd(rel, side));
            if (!other || !other.labels.includes(step.targetLabel)) continue;
            this.removeRelationship(rel.relId);
            removed.add(rel.relId);
          }
        }
        counts.relationshipsDeleted = removed.size;
        return counts;
      }

      case "matchlinks": {
        const scopeLabel = params[step.scopeLabelParameter] ?? null;
        const scopeId = params[step.scopeIdParameter] ?? null;
        if (scopeLabel === null || scopeId === null) return counts;
        const [startLabel, endLabel] =
          step.direction === "OUTWARD"
            ? [step.sourceLabel, step.targetLabel]
            : [step.targetLabel, step.sourceLabel];
        for (const rel of this.relationshipsOfType(step.relLabel)) {
          if (!isStale(rel.properties, tag)) continue;
          const label = rel.properties._sub_resource_label;
          const id = rel.properties._sub_resource_id;
          if (label === undefined || id === undefined) continue;
          if (!valuesEqual(label, scopeLabel) || !valuesEqual(id, scopeId)) continue;
          const start = this.nodeById(rel.startId);
          const end = this.nodeById(rel.endId);
          if (!start?.labels.includes(startLabel) || !end?.labels.includes(endLabel)) continue;
          this.removeRelationship(rel.relId);
          counts.relationshipsDeleted++;
        }
        return counts;
      }
    }
  }

  /** Nodes with `label` attached to a scope node through the scope relationship. */
  private scopeMembers(
    label: string,
    scope: ScopePattern,
    params: QueryParameters,
  ): Array<{ node: StoredNode; rel: StoredRelationship }> {
    const criteria: MatchCriteria = scope.matcher.map((m) => ({
      property: m.property,
      value: params[m.parameter] ?? null,
      mode: "exact",
    }));
    // INWARD: (n)<-[s]-(scope), so the scope node is the start of s.
    const scopeSide: RelationshipSide = scope.direction === "INWARD" ? "start" : "end";
    const members: Array<{ node: StoredNode; rel: StoredRelationship }> = [];
    for (const scopeNode of this.matchNodes(scope.label, criteria)) {
      for (const rel of this.relationshipsOf(scopeNode.nodeId, scope.relLabel, scopeSide)) {
        const node = this.nodeById(otherEnd(rel, scopeSide));
        if (node && node.labels.includes(label)) members.push({ node, rel });
      }
    }
    return members;
  }

  // ---------- Inspection ----------

  async findNodes(
    label: string,
    where: Readonly<Record<string, ScalarValue>> = {},
  ): Promise<GraphNodeRecord[]> {
    const criteria: MatchCriteria = Object.entries(where).map(([property, value]) => ({
      property,
      value,
      mode: "exact",
    }));
    return this.matchNodes(label, criteria).map((node) => ({
      labels: [...node.labels],
      properties: structuredClone(node.properties),
    }));
  }

  async findRelationships(filter: RelationshipFilter = {}): Promise<GraphRelationshipRecord[]> {
    const rels = filter.type ? this.relationshipsOfType(filter.type) : this.allRelationships();
    const out: GraphRelationshipRecord[] = [];
    for (const rel of rels) {
      const start = this.nodeById(rel.startId);
      const end = this.nodeById(rel.endId);
      if (!start || !end) continue;
      if (filter.startLabel && !start.labels.includes(filter.startLabel)) continue;
      if (filter.endLabel && !end.labels.includes(filter.endLabel)) continue;
      out.push({
        type: rel.type,
        start: handle(start),
        end: handle(end),
        properties: structuredClone(rel.properties),
      });
    }
    return out;
  }

  async getStats(): Promise<GraphStats> {
    const nodesByLabel: Record<string, number> = {};
    const relationshipsByType: Record<string, number> = {};
    const nodes = this.allNodes();
    const rels = this.allRelationships();
    for (const node of nodes) {
      for (const label of node.labels) nodesByLabel[label] = (nodesByLabel[label] ?? 0) + 1;
    }
    for (const rel of rels) {
      relationshipsByType[rel.type] = (relationshipsByType[rel.type] ?? 0) + 1;
    }
    return {
      totalNodes: nodes.length,
      totalRelationships: rels.length,
      nodesByLabel,
      relationshipsByType,
      indexes: this.indexSpecs().length,
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function orient(rel: RelationshipSchema, nodeId: number, targetId: number): [number, number] {
  return rel.direction === "OUTWARD" ? [nodeId, targetId] : [targetId, nodeId];
}

function uniqueNodes(nodes: StoredNode[]): StoredNode[] {
  const byId = new Map<number, StoredNode>();
  for (const node of nodes) byId.set(node.nodeId, node);
  return [...byId.values()];
}

function handle(node: StoredNode): NodeHandle {
  return { labels: [...node.labels], id: node.properties.id ?? null };
}
