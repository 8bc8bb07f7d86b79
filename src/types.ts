/**
 * schemagraph — Core Types
 *
 * Values, rows, resolved write batches, cleanup steps and the storage
 * contract shared by every backend. Schema descriptors live in
 * `schema/model.ts`; this file only describes what flows between the
 * compiler and a store.
 */

import type { MatchMode } from "./schema/bindings.js";
import type {
  LinkDirection,
  MatchLinkSchema,
  NodeSchema,
  RelationshipSchema,
} from "./schema/model.js";

// =============================================================================
// Values & Rows
// =============================================================================

export type ScalarValue = string | number | boolean;

/** Anything a graph property can hold. */
export type PropertyValue = ScalarValue | ScalarValue[];

/** A row or kwargs value. `null` means "absent" and removes the property when written. */
export type RowValue = PropertyValue | null;

/** One flat input record produced by a collector. Never mutated by the engine. */
export type Row = Readonly<Record<string, RowValue | undefined>>;

/** Per-call constants (`UPDATE_TAG`, scope ids, ...). */
export type Kwargs = Readonly<Record<string, RowValue | undefined>>;

/** Identifies one sync run. Convention: epoch seconds. */
export type UpdateTag = number | string;

/** Parameters handed to a query, keyed by `$name`. */
export type QueryParameters = Record<string, RowValue>;

export type PropertyMap = Record<string, PropertyValue>;

/** Well-known kwargs key carrying the run's staleness tag. */
export const UPDATE_TAG_PARAMETER = "UPDATE_TAG";

/** Well-known parameter holding the cleanup chunk size. */
export const LIMIT_SIZE_PARAMETER = "LIMIT_SIZE";

// =============================================================================
// Matching
// =============================================================================

/** One resolved matcher term: `property <mode> value`. */
export type MatchTerm = {
  property: string;
  value: RowValue;
  mode: MatchMode;
};

/** All terms must hold for a node to match. */
export type MatchCriteria = readonly MatchTerm[];

// =============================================================================
// Resolved Writes
// =============================================================================

export type ResolvedRelationshipWrite = {
  relationship: RelationshipSchema;
  /** One criteria set per fan-out element; each is matched independently. */
  targets: MatchCriteria[];
  properties: QueryParameters;
};

export type ResolvedNodeRow = {
  id: ScalarValue;
  properties: QueryParameters;
  relationships: ResolvedRelationshipWrite[];
};

export type ResolvedMatchLinkRow = {
  sources: MatchCriteria[];
  targets: MatchCriteria[];
  properties: QueryParameters;
};

export type NodeWriteBatch = {
  /** Job name used in logs and wrapped errors, e.g. `load Widget`. */
  job: string;
  schema: NodeSchema;
  /** Relationships to write for this batch (all of them unless filtered). */
  relationships: readonly RelationshipSchema[];
  /** Raw rows, for backends that resolve bindings inside the query. */
  rows: readonly Row[];
  resolved: readonly ResolvedNodeRow[];
  parameters: QueryParameters;
  updateTag: UpdateTag;
};

export type MatchLinkWriteBatch = {
  job: string;
  schema: MatchLinkSchema;
  rows: readonly Row[];
  resolved: readonly ResolvedMatchLinkRow[];
  parameters: QueryParameters;
  updateTag: UpdateTag;
};

export type WriteSummary = {
  nodesCreated: number;
  relationshipsCreated: number;
  /** Relationship matches that found no endpoint. `null` when the backend cannot tell. */
  relationshipsSkipped: number | null;
};

// =============================================================================
// Indexes
// =============================================================================

export type IndexSpec =
  | { kind: "node"; label: string; property: string }
  | { kind: "relationship"; relLabel: string; properties: readonly string[] };

export function indexKey(spec: IndexSpec): string {
  return spec.kind === "node"
    ? `node:${spec.label}.${spec.property}`
    : `rel:${spec.relLabel}(${spec.properties.join(",")})`;
}

// =============================================================================
// Cleanup
// =============================================================================

/**
 * How a node reaches its scope: `(n)<-[:relLabel]-(scope:label {matcher})`
 * for INWARD. Matcher values come from the statement parameters.
 */
export type ScopePattern = {
  relLabel: string;
  direction: LinkDirection;
  label: string;
  matcher: ReadonlyArray<{ property: string; parameter: string }>;
};

export type CleanupStep =
  | {
      kind: "nodes";
      label: string;
      scope: ScopePattern | null;
      /** Delete stale direct children reached through `relLabel` in `direction`. */
      cascade: { relLabel: string; direction: LinkDirection } | null;
    }
  | {
      /** The scope relationship itself, `(n)<-[s]-(scope)`. */
      kind: "scope-relationships";
      label: string;
      scope: ScopePattern;
    }
  | {
      kind: "relationships";
      label: string;
      scope: ScopePattern | null;
      relLabel: string;
      /** Relative to the node with `label`. */
      direction: LinkDirection;
      targetLabel: string;
    }
  | {
      kind: "matchlinks";
      sourceLabel: string;
      targetLabel: string;
      relLabel: string;
      direction: LinkDirection;
      scopeLabelParameter: string;
      scopeIdParameter: string;
    };

/** One Cypher statement with its parameters. */
export type GraphStatement = {
  query: string;
  parameters: QueryParameters;
  /** Repeat the query, bound to `$LIMIT_SIZE = iterationSize`, until a run changes nothing. */
  iterative: boolean;
  iterationSize: number;
};

export type CleanupStatement = GraphStatement & {
  step: CleanupStep;
};

/** What running a statement changed, summed over every iteration. */
export type StatementCounts = {
  nodesCreated: number;
  nodesDeleted: number;
  relationshipsCreated: number;
  relationshipsDeleted: number;
  propertiesSet: number;
};

export type CleanupCounts = {
  nodesDeleted: number;
  relationshipsDeleted: number;
};

// =============================================================================
// Inspection
// =============================================================================

export type GraphNodeRecord = {
  labels: string[];
  properties: PropertyMap;
};

export type NodeHandle = {
  labels: string[];
  id: PropertyValue | null;
};

export type GraphRelationshipRecord = {
  type: string;
  start: NodeHandle;
  end: NodeHandle;
  properties: PropertyMap;
};

export type RelationshipFilter = {
  type?: string;
  startLabel?: string;
  endLabel?: string;
};

export type GraphStats = {
  totalNodes: number;
  totalRelationships: number;
  nodesByLabel: Record<string, number>;
  relationshipsByType: Record<string, number>;
  indexes: number;
};

// =============================================================================
// Storage Contract
// =============================================================================

export type StoreKind = "memory" | "sqlite" | "neo4j";

/**
 * Backing property-graph store. Every write and every cleanup statement runs
 * as one transaction; a failure leaves the store as it was before the call.
 */
export interface GraphStore {
  readonly kind: StoreKind;

  // -- Lifecycle --
  initialize(): Promise<void>;
  close(): Promise<void>;

  // -- Indexes --
  /** Create-if-missing. Resolves to the number of indexes actually created. */
  ensureIndexes(specs: readonly IndexSpec[]): Promise<number>;
  listIndexes(): Promise<IndexSpec[]>;

  // -- Writes --
  writeNodes(batch: NodeWriteBatch): Promise<WriteSummary>;
  writeMatchLinks(batch: MatchLinkWriteBatch): Promise<WriteSummary>;

  // -- Cleanup --
  runCleanupStatement(statement: CleanupStatement): Promise<CleanupCounts>;

  // -- Statement jobs --
  /** Run hand-written Cypher. Only stores that speak Cypher support this. */
  runStatement(statement: GraphStatement): Promise<StatementCounts>;

  // -- Inspection --
  findNodes(
    label: string,
    where?: Readonly<Record<string, ScalarValue>>,
  ): Promise<GraphNodeRecord[]>;
  findRelationships(filter?: RelationshipFilter): Promise<GraphRelationshipRecord[]>;
  getStats(): Promise<GraphStats>;
}
