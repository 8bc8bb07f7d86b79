/**
 * schemagraph — Cypher Query Builder
 *
 * Renders node and MatchLink schemas into single idempotent Cypher
 * statements. Rows arrive as `$DictList`; kwargs and the run tag arrive as
 * top-level parameters. The statements only MERGE relationships onto nodes
 * that already exist, so a missing target simply produces no relationship.
 */

import { ConfigurationError } from "../errors.js";
import type { Binding, BindingList } from "../schema/bindings.js";
import {
  allRelationships,
  relationshipKey,
  type LinkDirection,
  type MatchLinkSchema,
  type NodeSchema,
  type RelationshipSchema,
} from "../schema/model.js";
import { UPDATE_TAG_PARAMETER } from "../types.js";

/** Parameter name carrying the row batch. */
export const ROWS_PARAMETER = "DictList";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// =============================================================================
// Fragments
// =============================================================================

function quoteName(name: string): string {
  return IDENTIFIER.test(name) ? name : `\`${name.replace(/`/g, "``")}\``;
}

/** Cypher expression producing a binding's value for the current `item`. */
export function bindingExpression(binding: Binding): string {
  switch (binding.kind) {
    case "row":
    case "rowList":
      return `item.${quoteName(binding.field)}`;
    case "kwargs":
      return `$${binding.name}`;
  }
}

function matchCondition(variable: string, property: string, binding: Binding): string {
  const left = `${variable}.${property}`;
  const right = bindingExpression(binding);
  if (binding.kind === "rowList") return `${left} IN ${right}`;
  if (binding.kind === "row" && binding.match === "ignoreCase") {
    return `toLower(${left}) = toLower(${right})`;
  }
  if (binding.kind === "row" && binding.match === "contains") {
    return `toLower(${left}) CONTAINS toLower(${right})`;
  }
  return `${left} = ${right}`;
}

/** `WHERE a AND b` for every term of a matcher. */
export function matcherWhere(variable: string, matcher: BindingList): string {
  const conditions = matcher.map(([prop, binding]) => matchCondition(variable, prop, binding));
  return `WHERE ${conditions.join(" AND ")}`;
}

/** `(from)-[r:L]->(to)` or `(from)<-[r:L]-(to)`. */
export function relationshipPattern(
  from: string,
  relVariable: string,
  relLabel: string,
  direction: LinkDirection,
  to: string,
): string {
  const rel = `[${relVariable}:${relLabel}]`;
  return direction === "OUTWARD" ? `(${from})-${rel}->(${to})` : `(${from})<-${rel}-(${to})`;
}

function setClause(
  variable: string,
  properties: BindingList,
  skip: readonly string[] = [],
): string[] {
  const assignments = [`${variable}.lastupdated = $${UPDATE_TAG_PARAMETER}`];
  for (const [name, binding] of properties) {
    if (skip.includes(name)) continue;
    assignments.push(`${variable}.${name} = ${bindingExpression(binding)}`);
  }
  return assignments;
}

// =============================================================================
// Node Ingestion
// =============================================================================

function attachRelationship(
  rel: RelationshipSchema,
  target: string,
  relVariable: string,
): string[] {
  return [
    "WITH i, item",
    `OPTIONAL MATCH (${target}:${rel.targetLabel})`,
    matcherWhere(target, rel.targetMatcher),
    `WITH i, item, ${target} WHERE ${target} IS NOT NULL`,
    `MERGE ${relationshipPattern("i", relVariable, rel.relLabel, rel.direction, target)}`,
    `ON CREATE SET ${relVariable}.firstseen = timestamp()`,
    `SET ${setClause(relVariable, rel.properties).join(", ")}`,
  ];
}

/**
 * Keep only the relationships the caller asked for. Each selected entry must
 * belong to the schema; `undefined` selects everything.
 */
export function selectRelationships(
  schema: NodeSchema,
  selected?: readonly RelationshipSchema[],
): RelationshipSchema[] {
  const declared = allRelationships(schema);
  if (!selected) return declared;
  const wanted = new Set<string>();
  for (const rel of selected) {
    const key = relationshipKey(rel);
    if (!declared.some((d) => relationshipKey(d) === key)) {
      throw new ConfigurationError(
        schema.label,
        "selectedRelationships",
        `relationship ${key} is not declared on this schema`,
      );
    }
    wanted.add(key);
  }
  return declared.filter((rel) => wanted.has(relationshipKey(rel)));
}

/**
 * One statement that merges every row's node, stamps it, and attaches each
 * selected relationship whose target already exists.
 */
export function buildIngestionQuery(
  schema: NodeSchema,
  selectedRelationships?: readonly RelationshipSchema[],
): string {
  const idBinding = schema.properties.find(([name]) => name === "id");
  if (!idBinding) {
    throw new ConfigurationError(
      schema.label,
      "properties.id",
      "every node schema must bind an id",
    );
  }

  const assignments = setClause("i", schema.properties, ["id"]);
  for (const extra of schema.extraLabels) assignments.push(`i:${extra}`);

  const lines = [
    `UNWIND $${ROWS_PARAMETER} AS item`,
    `MERGE (i:${schema.label} {id: ${bindingExpression(idBinding[1])}})`,
    "ON CREATE SET i.firstseen = timestamp()",
    `SET ${assignments.join(", ")}`,
  ];

  const relationships = selectRelationships(schema, selectedRelationships);
  if (relationships.length === 0) return lines.join("\n");

  const parts: string[][] = [];
  let other = 0;
  for (const rel of relationships) {
    if (rel === schema.subResourceRelationship) {
      parts.push(attachRelationship(rel, "j", "r"));
    } else {
      parts.push(attachRelationship(rel, `n${other}`, `r${other}`));
      other++;
    }
  }

  lines.push("WITH i, item", "CALL {");
  parts.forEach((part, index) => {
    if (index > 0) lines.push("    UNION");
    for (const line of part) lines.push(`    ${line}`);
  });
  lines.push("}");
  return lines.join("\n");
}

// =============================================================================
// MatchLink Ingestion
// =============================================================================

/** Links pre-existing nodes only; never creates either endpoint. */
export function buildMatchLinkQuery(schema: MatchLinkSchema): string {
  return [
    `UNWIND $${ROWS_PARAMETER} AS item`,
    `MATCH (from:${schema.sourceLabel})`,
    matcherWhere("from", schema.sourceMatcher),
    `MATCH (to:${schema.targetLabel})`,
    matcherWhere("to", schema.targetMatcher),
    `MERGE ${relationshipPattern("from", "r", schema.relLabel, schema.direction, "to")}`,
    "ON CREATE SET r.firstseen = timestamp()",
    `SET ${setClause("r", schema.properties).join(", ")}`,
  ].join("\n");
}
