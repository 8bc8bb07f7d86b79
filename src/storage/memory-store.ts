/**
 * schemagraph — In-Memory Graph Store
 *
 * Test-friendly backend backed by Maps. Transactions snapshot the whole
 * state and restore it when the work throws.
 */

import { indexKey, type IndexSpec, type PropertyMap, type ScalarValue } from "../types.js";
import {
  LocalGraphStore,
  type RelationshipSide,
  type StoredNode,
  type StoredRelationship,
} from "./local-store.js";
import { valuesEqual } from "./matching.js";

type MemoryState = {
  nodes: Map<number, StoredNode>;
  relationships: Map<number, StoredRelationship>;
  indexes: Map<string, IndexSpec>;
  nextNodeId: number;
  nextRelId: number;
};

function emptyState(): MemoryState {
  return {
    nodes: new Map(),
    relationships: new Map(),
    indexes: new Map(),
    nextNodeId: 1,
    nextRelId: 1,
  };
}

export class InMemoryGraphStore extends LocalGraphStore {
  readonly kind = "memory";
  private state = emptyState();
  private depth = 0;

  async initialize(): Promise<void> {
    // No-op
  }

  async close(): Promise<void> {
    this.state = emptyState();
  }

  protected transaction<T>(fn: () => T): T {
    if (this.depth > 0) return fn();
    const snapshot = structuredClone(this.state);
    this.depth++;
    try {
      return fn();
    } catch (err) {
      this.state = snapshot;
      throw err;
    } finally {
      this.depth--;
    }
  }

  // ---------- Nodes ----------

  protected nodeById(nodeId: number): StoredNode | null {
    return this.state.nodes.get(nodeId) ?? null;
  }

  protected nodeByKey(label: string, id: ScalarValue): StoredNode | null {
    for (const node of this.state.nodes.values()) {
      const key = node.properties.id;
      if (key !== undefined && node.labels.includes(label) && valuesEqual(key, id)) return node;
    }
    return null;
  }

  protected nodesWithLabel(label: string): StoredNode[] {
    return [...this.state.nodes.values()].filter((node) => node.labels.includes(label));
  }

  protected allNodes(): StoredNode[] {
    return [...this.state.nodes.values()];
  }

  protected insertNode(labels: string[], properties: PropertyMap): StoredNode {
    const node: StoredNode = { nodeId: this.state.nextNodeId++, labels, properties };
    this.state.nodes.set(node.nodeId, node);
    return node;
  }

  protected saveNode(node: StoredNode): void {
    this.state.nodes.set(node.nodeId, node);
  }

  protected removeNode(nodeId: number): number {
    let removed = 0;
    for (const rel of [...this.state.relationships.values()]) {
      if (rel.startId === nodeId || rel.endId === nodeId) {
        this.state.relationships.delete(rel.relId);
        removed++;
      }
    }
    this.state.nodes.delete(nodeId);
    return removed;
  }

  // ---------- Relationships ----------

  protected relationshipBetween(
    type: string,
    startId: number,
    endId: number,
  ): StoredRelationship | null {
    for (const rel of this.state.relationships.values()) {
      if (rel.type === type && rel.startId === startId && rel.endId === endId) return rel;
    }
    return null;
  }

  protected relationshipsOf(
    nodeId: number,
    type: string,
    side: RelationshipSide,
  ): StoredRelationship[] {
    return [...this.state.relationships.values()].filter(
      (rel) => rel.type === type && (side === "start" ? rel.startId : rel.endId) === nodeId,
    );
  }

  protected relationshipsOfType(type: string): StoredRelationship[] {
    return [...this.state.relationships.values()].filter((rel) => rel.type === type);
  }

  protected allRelationships(): StoredRelationship[] {
    return [...this.state.relationships.values()];
  }

  protected insertRelationship(
    type: string,
    startId: number,
    endId: number,
    properties: PropertyMap,
  ): StoredRelationship {
    const relId = this.state.nextRelId++;
    const rel: StoredRelationship = { relId, type, startId, endId, properties };
    this.state.relationships.set(rel.relId, rel);
    return rel;
  }

  protected saveRelationship(rel: StoredRelationship): void {
    this.state.relationships.set(rel.relId, rel);
  }

  protected removeRelationship(relId: number): void {
    this.state.relationships.delete(relId);
  }

  // ---------- Indexes ----------

  protected addIndex(spec: IndexSpec): boolean {
    const key = indexKey(spec);
    if (this.state.indexes.has(key)) return false;
    this.state.indexes.set(key, spec);
    return true;
  }

  protected indexSpecs(): IndexSpec[] {
    return [...this.state.indexes.values()];
  }
}
