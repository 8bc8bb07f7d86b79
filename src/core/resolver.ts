/**
 * schemagraph — Property Binding Resolver
 *
 * Turns schema bindings plus a row and the per-call kwargs into concrete
 * values. Node rows resolve to a key, a property map and one criteria set
 * per relationship target; list bindings fan a matcher out into several sets.
 */

import { ConfigurationError, GraphStoreError } from "../errors.js";
import type { Binding, BindingList } from "../schema/bindings.js";
import type { MatchLinkSchema, NodeSchema, RelationshipSchema } from "../schema/model.js";
import {
  UPDATE_TAG_PARAMETER,
  type Kwargs,
  type MatchTerm,
  type MatchCriteria,
  type QueryParameters,
  type ResolvedMatchLinkRow,
  type ResolvedNodeRow,
  type Row,
  type RowValue,
  type ScalarValue,
  type UpdateTag,
} from "../types.js";

/** Where a binding sits, for error messages. */
export type BindingContext = {
  schema: string;
  field: string;
};

// =============================================================================
// Single Binding
// =============================================================================

/** Own values only; inherited keys such as `toString` count as absent. */
function ownValue(source: Kwargs, name: string): RowValue | undefined {
  return Object.prototype.hasOwnProperty.call(source, name) ? source[name] : undefined;
}

function hasValue(source: Kwargs, name: string): boolean {
  return ownValue(source, name) !== undefined;
}

function resolveRowList(field: string, row: Row, ctx: BindingContext): ScalarValue[] {
  const value = ownValue(row, field);
  if (!Array.isArray(value)) {
    const actual = value === null || value === undefined ? "nothing" : typeof value;
    throw new ConfigurationError(
      ctx.schema,
      ctx.field,
      `row field "${field}" must hold a list, got ${actual}`,
    );
  }
  return value;
}

/**
 * Resolve one binding. Missing row fields resolve to `null`; missing kwargs
 * and non-list values behind a list binding are configuration errors.
 */
export function resolveBinding(
  binding: Binding,
  row: Row,
  kwargs: Kwargs,
  ctx: BindingContext,
): RowValue {
  switch (binding.kind) {
    case "row":
      return ownValue(row, binding.field) ?? null;
    case "kwargs": {
      if (!hasValue(kwargs, binding.name)) {
        throw new ConfigurationError(
          ctx.schema,
          ctx.field,
          `missing kwargs value "${binding.name}"`,
        );
      }
      return kwargs[binding.name] ?? null;
    }
    case "rowList":
      return resolveRowList(binding.field, row, ctx);
  }
}

// =============================================================================
// Call Parameters
// =============================================================================

/**
 * Build the parameters shared by every row of one call: the caller's kwargs
 * plus the run tag under `UPDATE_TAG`.
 */
export function buildParameters(
  schema: string,
  kwargs: Kwargs,
  updateTag: UpdateTag,
): QueryParameters {
  const params: QueryParameters = {};
  for (const [name, value] of Object.entries(kwargs)) {
    if (value !== undefined) params[name] = value;
  }
  const passed = params[UPDATE_TAG_PARAMETER];
  if (passed !== undefined && passed !== updateTag) {
    throw new ConfigurationError(
      schema,
      UPDATE_TAG_PARAMETER,
      `kwargs ${UPDATE_TAG_PARAMETER}=${String(passed)} ` +
        `disagrees with the run tag ${String(updateTag)}`,
    );
  }
  params[UPDATE_TAG_PARAMETER] = updateTag;
  return params;
}

/** Error-message prefix for one relationship of a node schema. */
function relationshipSection(schema: NodeSchema, rel: RelationshipSchema): string {
  return rel === schema.subResourceRelationship
    ? "subResourceRelationship"
    : `relationship ${rel.relLabel}`;
}

/** Binding sections of a node schema, limited to the relationships being written. */
export function nodeBindingSections(
  schema: NodeSchema,
  relationships: readonly RelationshipSchema[],
): Array<[string, BindingList]> {
  const sections: Array<[string, BindingList]> = [["properties", schema.properties]];
  for (const rel of relationships) {
    const prefix = relationshipSection(schema, rel);
    sections.push([`${prefix}.targetMatcher`, rel.targetMatcher]);
    sections.push([`${prefix}.properties`, rel.properties]);
  }
  return sections;
}

export function matchLinkBindingSections(schema: MatchLinkSchema): Array<[string, BindingList]> {
  return [
    ["sourceMatcher", schema.sourceMatcher],
    ["targetMatcher", schema.targetMatcher],
    ["properties", schema.properties],
  ];
}

/** Fail fast when any kwargs binding in the given sections has no value. */
export function requireKwargs(
  schema: string,
  sections: ReadonlyArray<[string, BindingList]>,
  params: QueryParameters,
): void {
  for (const [section, list] of sections) {
    for (const [name, binding] of list) {
      if (binding.kind === "kwargs" && !hasValue(params, binding.name)) {
        throw new ConfigurationError(
          schema,
          `${section}.${name}`,
          `missing kwargs value "${binding.name}"`,
        );
      }
    }
  }
}

// =============================================================================
// Matchers & Property Maps
// =============================================================================

/**
 * Resolve a matcher into criteria sets. Each list binding multiplies the sets
 * by its elements, so an empty list yields no criteria at all.
 */
export function resolveMatcher(
  schema: string,
  section: string,
  matcher: BindingList,
  row: Row,
  params: QueryParameters,
): MatchCriteria[] {
  let sets: MatchTerm[][] = [[]];
  for (const [property, binding] of matcher) {
    const ctx = { schema, field: `${section}.${property}` };
    if (binding.kind === "rowList") {
      const values = resolveRowList(binding.field, row, ctx);
      const next: MatchTerm[][] = [];
      for (const set of sets) {
        for (const value of values) next.push([...set, { property, value, mode: "exact" }]);
      }
      sets = next;
    } else {
      const value = resolveBinding(binding, row, params, ctx);
      const mode = binding.kind === "row" ? binding.match : "exact";
      sets = sets.map((set) => [...set, { property, value, mode }]);
    }
  }
  return sets;
}

export function resolveProperties(
  schema: string,
  section: string,
  list: BindingList,
  row: Row,
  params: QueryParameters,
): QueryParameters {
  const out: QueryParameters = {};
  for (const [name, binding] of list) {
    out[name] = resolveBinding(binding, row, params, { schema, field: `${section}.${name}` });
  }
  return out;
}

// =============================================================================
// Rows
// =============================================================================

export function resolveNodeRows(
  schema: NodeSchema,
  relationships: readonly RelationshipSchema[],
  rows: readonly Row[],
  params: QueryParameters,
  job: string,
): ResolvedNodeRow[] {
  return rows.map((row, index) => {
    const properties = resolveProperties(
      schema.label,
      "properties",
      schema.properties,
      row,
      params,
    );
    const id = properties.id;
    if (id === null || id === undefined || Array.isArray(id)) {
      throw new GraphStoreError(
        job,
        `row ${index} has no usable id (got ${JSON.stringify(id ?? null)})`,
      );
    }
    return {
      id,
      properties,
      relationships: relationships.map((rel) => {
        const section = relationshipSection(schema, rel);
        const matcherField = `${section}.targetMatcher`;
        return {
          relationship: rel,
          targets: resolveMatcher(schema.label, matcherField, rel.targetMatcher, row, params),
          properties: resolveProperties(
            schema.label,
            `${section}.properties`,
            rel.properties,
            row,
            params,
          ),
        };
      }),
    };
  });
}

export function resolveMatchLinkRows(
  schema: MatchLinkSchema,
  rows: readonly Row[],
  params: QueryParameters,
): ResolvedMatchLinkRow[] {
  return rows.map((row) => ({
    sources: resolveMatcher(schema.name, "sourceMatcher", schema.sourceMatcher, row, params),
    targets: resolveMatcher(schema.name, "targetMatcher", schema.targetMatcher, row, params),
    properties: resolveProperties(schema.name, "properties", schema.properties, row, params),
  }));
}
