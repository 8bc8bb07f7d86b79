/**
 * schemagraph — Cleanup Builder
 *
 * Plans and runs deletion of nodes and relationships whose `lastupdated`
 * differs from the current run tag. Node schemas with a sub-resource are
 * cleaned inside one scope (e.g. one account); MatchLinks are always scoped
 * through their `_sub_resource_label` / `_sub_resource_id` properties.
 *
 * Step order for a scoped node schema:
 *   1. stale nodes reached through the scope (optionally cascading one hop)
 *   2. stale scope relationships
 *   3. stale other relationships of in-scope nodes
 * Nodes go first because the scope relationship is how they are found.
 */

import { ConfigurationError, wrapStoreError } from "../errors.js";
import { getComponentLogger } from "../logging.js";
import {
  SUB_RESOURCE_ID_PROPERTY,
  SUB_RESOURCE_LABEL_PROPERTY,
  matchLinkScopeParameter,
  schemaName,
  type GraphSchema,
  type LinkDirection,
  type MatchLinkSchema,
  type NodeSchema,
  type RelationshipSchema,
} from "../schema/model.js";
import {
  LIMIT_SIZE_PARAMETER,
  UPDATE_TAG_PARAMETER,
  type CleanupCounts,
  type CleanupStatement,
  type CleanupStep,
  type GraphStore,
  type Kwargs,
  type QueryParameters,
  type ScalarValue,
  type ScopePattern,
  type UpdateTag,
} from "../types.js";
import { relationshipPattern } from "./querybuilder.js";
import { buildParameters } from "./resolver.js";

export const DEFAULT_ITERATION_SIZE = 100;

/** The tenant-like parent a cleanup is restricted to. */
export type CleanupScope = {
  label: string;
  id: ScalarValue;
};

export type CleanupOptions = {
  updateTag: UpdateTag;
  /** Values for the sub-resource matcher's kwargs names. */
  parameters?: Kwargs;
  /** Shorthand for a single-property sub-resource matcher; required for MatchLinks. */
  scope?: CleanupScope;
  /** Overrides the schema's `cascadeDelete`. */
  cascadeDelete?: boolean;
  /** Rows deleted per chunk by stores that delete iteratively. */
  iterationSize?: number;
};

export type CleanupJob = {
  /** `cleanup <schema>`. */
  name: string;
  schema: string;
  statements: CleanupStatement[];
};

// =============================================================================
// Planning
// =============================================================================

function opposite(direction: LinkDirection): LinkDirection {
  return direction === "INWARD" ? "OUTWARD" : "INWARD";
}

function scopePattern(schema: NodeSchema, sub: RelationshipSchema): ScopePattern {
  const matcher = sub.targetMatcher.map(([property, binding]) => {
    if (binding.kind !== "kwargs") {
      throw new ConfigurationError(
        schema.label,
        `subResourceRelationship.targetMatcher.${property}`,
        "scoped cleanup needs the sub-resource matcher bound with fromKwargs",
      );
    }
    return { property, parameter: binding.name };
  });
  return { relLabel: sub.relLabel, direction: sub.direction, label: sub.targetLabel, matcher };
}

function relationshipSteps(schema: NodeSchema, scope: ScopePattern | null): CleanupStep[] {
  return schema.otherRelationships.map((rel): CleanupStep => ({
    kind: "relationships",
    label: schema.label,
    scope,
    relLabel: rel.relLabel,
    direction: rel.direction,
    targetLabel: rel.targetLabel,
  }));
}

function planNodeCleanup(schema: NodeSchema, cascadeDelete: boolean): CleanupStep[] {
  if (cascadeDelete && !schema.scopedCleanup) {
    throw new ConfigurationError(
      schema.label,
      "cascadeDelete",
      "cascade delete requires scoped cleanup",
    );
  }
  const sub = schema.subResourceRelationship;
  if (sub) {
    if (!schema.scopedCleanup) {
      throw new ConfigurationError(
        schema.label,
        "scopedCleanup",
        "a schema with a sub-resource relationship must use scoped cleanup",
      );
    }
    const scope = scopePattern(schema, sub);
    return [
      {
        kind: "nodes",
        label: schema.label,
        scope,
        cascade: cascadeDelete
          ? { relLabel: sub.relLabel, direction: opposite(sub.direction) }
          : null,
      },
      { kind: "scope-relationships", label: schema.label, scope },
      ...relationshipSteps(schema, scope),
    ];
  }
  if (schema.scopedCleanup) {
    // Unowned nodes are never deleted by a scoped pass; only their relationships age out.
    return relationshipSteps(schema, null);
  }
  return [
    { kind: "nodes", label: schema.label, scope: null, cascade: null },
    ...relationshipSteps(schema, null),
  ];
}

function planMatchLinkCleanup(schema: MatchLinkSchema): CleanupStep[] {
  return [
    {
      kind: "matchlinks",
      sourceLabel: schema.sourceLabel,
      targetLabel: schema.targetLabel,
      relLabel: schema.relLabel,
      direction: schema.direction,
      scopeLabelParameter: matchLinkScopeParameter(schema, SUB_RESOURCE_LABEL_PROPERTY),
      scopeIdParameter: matchLinkScopeParameter(schema, SUB_RESOURCE_ID_PROPERTY),
    },
  ];
}

/** Validate and plan cleanup steps. Throws before anything touches a store. */
export function planCleanup(
  schema: GraphSchema,
  opts: { cascadeDelete?: boolean } = {},
): CleanupStep[] {
  if (schema.kind === "matchlink") return planMatchLinkCleanup(schema);
  return planNodeCleanup(schema, opts.cascadeDelete ?? schema.cascadeDelete);
}

// =============================================================================
// Cypher Rendering
// =============================================================================

const STALE = `<> $${UPDATE_TAG_PARAMETER}`;
const LIMIT = `$${LIMIT_SIZE_PARAMETER}`;

function scopeNode(scope: ScopePattern): string {
  const props = scope.matcher.map((m) => `${m.property}: $${m.parameter}`).join(", ");
  return `:${scope.label} {${props}}`;
}

function scopeMatch(label: string, scope: ScopePattern, relVariable: string): string {
  const pattern = relationshipPattern(
    `n:${label}`,
    relVariable,
    scope.relLabel,
    scope.direction,
    scopeNode(scope),
  );
  return `MATCH ${pattern}`;
}

export function renderCleanupStep(step: CleanupStep): string {
  switch (step.kind) {
    case "nodes": {
      const lines = [
        step.scope ? scopeMatch(step.label, step.scope, "") : `MATCH (n:${step.label})`,
        `WHERE n.lastupdated ${STALE}`,
        `WITH n LIMIT ${LIMIT}`,
      ];
      if (step.cascade) {
        lines.push(
          `OPTIONAL MATCH ${relationshipPattern(
            "n",
            "",
            step.cascade.relLabel,
            step.cascade.direction,
            "child",
          )}`,
          `WHERE child.lastupdated ${STALE}`,
          "DETACH DELETE child, n",
        );
      } else {
        lines.push("DETACH DELETE n");
      }
      return lines.join("\n");
    }
    case "scope-relationships":
      return [
        scopeMatch(step.label, step.scope, "s"),
        `WHERE s.lastupdated ${STALE}`,
        `WITH s LIMIT ${LIMIT}`,
        "DELETE s",
      ].join("\n");
    case "relationships": {
      const source = step.scope ? "n" : `n:${step.label}`;
      const target = `:${step.targetLabel}`;
      const lines = [
        ...(step.scope ? [scopeMatch(step.label, step.scope, "")] : []),
        `MATCH ${relationshipPattern(source, "r", step.relLabel, step.direction, target)}`,
      ];
      lines.push(`WHERE r.lastupdated ${STALE}`, `WITH r LIMIT ${LIMIT}`, "DELETE r");
      return lines.join("\n");
    }
    case "matchlinks": {
      const source = `from:${step.sourceLabel}`;
      const target = `to:${step.targetLabel}`;
      return [
        `MATCH ${relationshipPattern(source, "r", step.relLabel, step.direction, target)}`,
        `WHERE r.lastupdated ${STALE}` +
          ` AND r.${SUB_RESOURCE_LABEL_PROPERTY} = $${step.scopeLabelParameter}` +
          ` AND r.${SUB_RESOURCE_ID_PROPERTY} = $${step.scopeIdParameter}`,
        `WITH r LIMIT ${LIMIT}`,
        "DELETE r",
      ].join("\n");
    }
  }
}

/** Cypher for every cleanup step of a schema, without binding any parameters. */
export function buildCleanupQueries(
  schema: GraphSchema,
  opts: { cascadeDelete?: boolean } = {},
): string[] {
  return planCleanup(schema, opts).map(renderCleanupStep);
}

// =============================================================================
// Jobs
// =============================================================================

function scopeMatcherParameters(scope: ScopePattern): Array<[string, string]> {
  return scope.matcher.map((m): [string, string] => [m.property, m.parameter]);
}

function scopeParameterNames(step: CleanupStep): Array<[string, string]> {
  switch (step.kind) {
    case "nodes":
    case "relationships":
      return step.scope ? scopeMatcherParameters(step.scope) : [];
    case "scope-relationships":
      return scopeMatcherParameters(step.scope);
    case "matchlinks":
      return [
        [SUB_RESOURCE_LABEL_PROPERTY, step.scopeLabelParameter],
        [SUB_RESOURCE_ID_PROPERTY, step.scopeIdParameter],
      ];
  }
}

function applyScope(
  schema: GraphSchema,
  scope: CleanupScope | undefined,
  params: QueryParameters,
): void {
  const name = schemaName(schema);
  if (schema.kind === "matchlink") {
    if (!scope) return;
    const labelParameter = matchLinkScopeParameter(schema, SUB_RESOURCE_LABEL_PROPERTY);
    bindScopeValue(name, params, labelParameter, scope.label);
    const idParameter = matchLinkScopeParameter(schema, SUB_RESOURCE_ID_PROPERTY);
    bindScopeValue(name, params, idParameter, scope.id);
    return;
  }
  if (!scope) return;
  const sub = schema.subResourceRelationship;
  if (!sub) {
    throw new ConfigurationError(
      name,
      "scope",
      "schema has no sub-resource relationship to scope by",
    );
  }
  if (scope.label !== sub.targetLabel) {
    throw new ConfigurationError(
      name,
      "scope",
      `scope label ${scope.label} does not match sub-resource ${sub.targetLabel}`,
    );
  }
  if (sub.targetMatcher.length !== 1) {
    throw new ConfigurationError(
      name,
      "scope",
      "sub-resource matcher has several properties; pass parameters instead",
    );
  }
  const binding = sub.targetMatcher[0][1];
  if (binding.kind === "kwargs") bindScopeValue(name, params, binding.name, scope.id);
}

/** A scope value may repeat a parameter but never contradict it. */
function bindScopeValue(
  name: string,
  params: QueryParameters,
  parameter: string,
  value: ScalarValue,
): void {
  const existing = params[parameter];
  if (existing !== undefined && existing !== null && existing !== value) {
    throw new ConfigurationError(
      name,
      "scope",
      `parameter ${parameter}=${String(existing)} disagrees with scope value ${String(value)}`,
    );
  }
  params[parameter] = value;
}

/**
 * Build a runnable cleanup job. Every configuration problem (cascade without
 * scoping, missing scope values, bad iteration size) is raised here.
 */
export function buildCleanupJob(schema: GraphSchema, options: CleanupOptions): CleanupJob {
  const name = schemaName(schema);
  const steps = planCleanup(schema, { cascadeDelete: options.cascadeDelete });

  const iterationSize = options.iterationSize ?? DEFAULT_ITERATION_SIZE;
  if (!Number.isInteger(iterationSize) || iterationSize < 1) {
    throw new ConfigurationError(
      name,
      "iterationSize",
      `must be a positive integer, got ${iterationSize}`,
    );
  }

  const params = buildParameters(name, options.parameters ?? {}, options.updateTag);
  applyScope(schema, options.scope, params);

  for (const step of steps) {
    for (const [property, parameter] of scopeParameterNames(step)) {
      if (params[parameter] === undefined || params[parameter] === null) {
        const field =
          schema.kind === "matchlink"
            ? "scope"
            : `subResourceRelationship.targetMatcher.${property}`;
        throw new ConfigurationError(name, field, `missing cleanup parameter "${parameter}"`);
      }
    }
  }

  return {
    name: `cleanup ${name}`,
    schema: name,
    statements: steps.map((step) => ({
      step,
      query: renderCleanupStep(step),
      parameters: params,
      iterative: true,
      iterationSize,
    })),
  };
}

/** Build and run the cleanup job for one schema. */
export async function runCleanup(
  store: GraphStore,
  schema: GraphSchema,
  options: CleanupOptions,
): Promise<CleanupCounts> {
  const job = buildCleanupJob(schema, options);
  const log = getComponentLogger("cleanup");
  const totals: CleanupCounts = { nodesDeleted: 0, relationshipsDeleted: 0 };

  if (job.statements.length === 0) {
    log.debug({ job: job.name }, "nothing to clean up");
    return totals;
  }

  for (const statement of job.statements) {
    let counts: CleanupCounts;
    try {
      counts = await store.runCleanupStatement(statement);
    } catch (err) {
      throw wrapStoreError(job.name, err);
    }
    totals.nodesDeleted += counts.nodesDeleted;
    totals.relationshipsDeleted += counts.relationshipsDeleted;
  }

  log.info({ job: job.name, updateTag: options.updateTag, ...totals }, "cleanup finished");
  return totals;
}
