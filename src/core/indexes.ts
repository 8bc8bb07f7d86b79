/**
 * schemagraph — Index Manager
 *
 * Derives the lookup indexes a schema needs (unique key, staleness tag,
 * matcher properties, explicit extra indexes) and creates them with
 * create-if-missing semantics.
 */

import { wrapStoreError } from "../errors.js";
import { getComponentLogger } from "../logging.js";
import { bindingExtraIndex, type BindingList } from "../schema/bindings.js";
import {
  SUB_RESOURCE_ID_PROPERTY,
  SUB_RESOURCE_LABEL_PROPERTY,
  allRelationships,
  type GraphSchema,
  type MatchLinkSchema,
  type NodeSchema,
} from "../schema/model.js";
import { indexKey, type GraphStore, type IndexSpec } from "../types.js";

// =============================================================================
// Derivation
// =============================================================================

class IndexSet {
  private readonly specs = new Map<string, IndexSpec>();

  node(label: string, property: string): void {
    this.add({ kind: "node", label, property });
  }

  matcher(label: string, matcher: BindingList): void {
    for (const [property] of matcher) this.node(label, property);
  }

  add(spec: IndexSpec): void {
    const key = indexKey(spec);
    if (!this.specs.has(key)) this.specs.set(key, spec);
  }

  toArray(): IndexSpec[] {
    return [...this.specs.values()];
  }
}

function collectNode(set: IndexSet, schema: NodeSchema): void {
  set.node(schema.label, "id");
  set.node(schema.label, "lastupdated");
  for (const extra of schema.extraLabels) set.node(extra, "id");
  for (const [name, binding] of schema.properties) {
    if (bindingExtraIndex(binding)) set.node(schema.label, name);
  }
  for (const rel of allRelationships(schema)) {
    set.matcher(rel.targetLabel, rel.targetMatcher);
  }
}

function collectMatchLink(set: IndexSet, schema: MatchLinkSchema): void {
  set.matcher(schema.sourceLabel, schema.sourceMatcher);
  set.matcher(schema.targetLabel, schema.targetMatcher);
  set.add({
    kind: "relationship",
    relLabel: schema.relLabel,
    properties: ["lastupdated", SUB_RESOURCE_LABEL_PROPERTY, SUB_RESOURCE_ID_PROPERTY],
  });
}

export function deriveNodeIndexes(schema: NodeSchema): IndexSpec[] {
  const set = new IndexSet();
  collectNode(set, schema);
  return set.toArray();
}

export function deriveMatchLinkIndexes(schema: MatchLinkSchema): IndexSpec[] {
  const set = new IndexSet();
  collectMatchLink(set, schema);
  return set.toArray();
}

/** Indexes for a whole schema universe, deduplicated, in first-seen order. */
export function deriveIndexes(schemas: readonly GraphSchema[]): IndexSpec[] {
  const set = new IndexSet();
  for (const schema of schemas) {
    if (schema.kind === "node") collectNode(set, schema);
    else collectMatchLink(set, schema);
  }
  return set.toArray();
}

// =============================================================================
// Cypher Rendering
// =============================================================================

export function buildIndexQuery(spec: IndexSpec): string {
  if (spec.kind === "node") {
    return `CREATE INDEX IF NOT EXISTS FOR (n:${spec.label}) ON (n.${spec.property});`;
  }
  const props = spec.properties.map((p) => `r.${p}`).join(", ");
  return `CREATE INDEX IF NOT EXISTS FOR ()-[r:${spec.relLabel}]-() ON (${props});`;
}

export function buildIndexQueries(specs: readonly IndexSpec[]): string[] {
  return specs.map(buildIndexQuery);
}

// =============================================================================
// Creation
// =============================================================================

/**
 * Create any missing indexes. Safe to call repeatedly. Store failures are
 * reported under `job`.
 */
export async function ensureIndexes(
  store: GraphStore,
  specs: readonly IndexSpec[],
  job = "ensure indexes",
): Promise<number> {
  if (specs.length === 0) return 0;
  let created: number;
  try {
    created = await store.ensureIndexes(specs);
  } catch (err) {
    throw wrapStoreError(job, err);
  }
  if (created > 0) {
    getComponentLogger("indexes").debug(
      { job, created, requested: specs.length },
      "created graph indexes",
    );
  }
  return created;
}
