/**
 * schemagraph — Schema Model
 *
 * Node, relationship and MatchLink descriptors are plain frozen data. The
 * `define*` factories validate them once, at construction, so the query
 * synthesizer and the cleanup builder can trust their input.
 */

import { ConfigurationError } from "../errors.js";
import {
  describeBinding,
  toBindingList,
  type Binding,
  type BindingInput,
  type BindingList,
} from "./bindings.js";

// =============================================================================
// Constants
// =============================================================================

/** Direction of a relationship, relative to the node that owns it. */
export type LinkDirection = "INWARD" | "OUTWARD";

/** Relationship label every sub-resource (tenant scope) relationship must carry. */
export const SUB_RESOURCE_REL_LABEL = "RESOURCE";

export const SUB_RESOURCE_LABEL_PROPERTY = "_sub_resource_label";
export const SUB_RESOURCE_ID_PROPERTY = "_sub_resource_id";

/** Written by the engine on every node and relationship; schemas may not bind them. */
export const RESERVED_PROPERTIES: readonly string[] = ["firstseen", "lastupdated"];

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// =============================================================================
// Schema Types
// =============================================================================

export type RelationshipSchema = Readonly<{
  targetLabel: string;
  /** Ordered `[targetProperty, binding]` pairs; all must match. */
  targetMatcher: BindingList;
  relLabel: string;
  direction: LinkDirection;
  properties: BindingList;
}>;

export type NodeSchema = Readonly<{
  kind: "node";
  label: string;
  /** Ordered `[property, binding]` pairs. Always contains `id`. */
  properties: BindingList;
  /** Link to the owning tenant-like parent. `null` for root types. */
  subResourceRelationship: RelationshipSchema | null;
  otherRelationships: readonly RelationshipSchema[];
  /** Labels added to the node alongside `label`. */
  extraLabels: readonly string[];
  scopedCleanup: boolean;
  cascadeDelete: boolean;
}>;

export type MatchLinkSchema = Readonly<{
  kind: "matchlink";
  /** Used in logs, job names and error messages. */
  name: string;
  sourceLabel: string;
  sourceMatcher: BindingList;
  targetLabel: string;
  targetMatcher: BindingList;
  relLabel: string;
  /** OUTWARD means `(source)-[rel]->(target)`. */
  direction: LinkDirection;
  properties: BindingList;
}>;

export type GraphSchema = NodeSchema | MatchLinkSchema;

// =============================================================================
// Input Types
// =============================================================================

export type RelationshipSchemaInput = {
  targetLabel: string;
  targetMatcher: BindingInput;
  relLabel: string;
  direction: LinkDirection;
  properties?: BindingInput;
};

export type NodeSchemaInput = {
  label: string;
  properties: BindingInput;
  subResourceRelationship?: RelationshipSchemaInput | null;
  otherRelationships?: readonly RelationshipSchemaInput[];
  extraLabels?: readonly string[];
  scopedCleanup?: boolean;
  cascadeDelete?: boolean;
};

export type MatchLinkSchemaInput = {
  name?: string;
  sourceLabel: string;
  sourceMatcher: BindingInput;
  targetLabel: string;
  targetMatcher: BindingInput;
  relLabel: string;
  direction: LinkDirection;
  properties: BindingInput;
};

// =============================================================================
// Validation Helpers
// =============================================================================

function requireIdentifier(schema: string, field: string, value: string): void {
  if (!IDENTIFIER.test(value)) {
    throw new ConfigurationError(schema, field, `"${value}" is not a valid identifier`);
  }
}

function requireDirection(schema: string, field: string, value: string): void {
  if (value !== "INWARD" && value !== "OUTWARD") {
    throw new ConfigurationError(
      schema,
      field,
      `direction must be INWARD or OUTWARD, got "${value}"`,
    );
  }
}

function checkBinding(schema: string, field: string, binding: Binding, inMatcher: boolean): void {
  switch (binding.kind) {
    case "row":
      if (binding.field.length === 0) {
        throw new ConfigurationError(schema, field, "row binding needs a field name");
      }
      if (!inMatcher && binding.match !== "exact") {
        throw new ConfigurationError(
          schema,
          field,
          `match mode "${binding.match}" is only allowed inside a matcher`,
        );
      }
      return;
    case "kwargs":
      requireIdentifier(schema, field, binding.name);
      return;
    case "rowList":
      if (!inMatcher) {
        throw new ConfigurationError(
          schema,
          field,
          `${describeBinding(binding)} fans out relationships and is only allowed inside a matcher`,
        );
      }
      if (binding.field.length === 0) {
        throw new ConfigurationError(schema, field, "row list binding needs a field name");
      }
      return;
  }
}

function checkBindingList(
  schema: string,
  section: string,
  list: BindingList,
  opts: { inMatcher: boolean; reserved: boolean },
): void {
  const seen = new Set<string>();
  for (const [name, binding] of list) {
    const field = `${section}.${name}`;
    requireIdentifier(schema, field, name);
    if (seen.has(name)) {
      throw new ConfigurationError(schema, field, "declared more than once");
    }
    seen.add(name);
    if (opts.reserved && RESERVED_PROPERTIES.includes(name)) {
      throw new ConfigurationError(
        schema,
        field,
        `"${name}" is written by the engine and cannot be bound`,
      );
    }
    checkBinding(schema, field, binding, opts.inMatcher);
  }
}

function buildRelationship(
  schema: string,
  section: string,
  input: RelationshipSchemaInput,
): RelationshipSchema {
  requireIdentifier(schema, `${section}.targetLabel`, input.targetLabel);
  requireIdentifier(schema, `${section}.relLabel`, input.relLabel);
  requireDirection(schema, `${section}.direction`, input.direction);

  const targetMatcher = toBindingList(input.targetMatcher);
  if (targetMatcher.length === 0) {
    throw new ConfigurationError(
      schema,
      `${section}.targetMatcher`,
      "matcher needs at least one property",
    );
  }
  checkBindingList(schema, `${section}.targetMatcher`, targetMatcher, {
    inMatcher: true,
    reserved: false,
  });

  const properties = toBindingList(input.properties ?? []);
  checkBindingList(schema, `${section}.properties`, properties, {
    inMatcher: false,
    reserved: true,
  });

  return Object.freeze({
    targetLabel: input.targetLabel,
    targetMatcher,
    relLabel: input.relLabel,
    direction: input.direction,
    properties,
  });
}

/** Identity of a relationship within one node schema. */
export function relationshipKey(
  rel: Pick<RelationshipSchema, "relLabel" | "direction" | "targetLabel">,
): string {
  const arrow = rel.direction === "INWARD" ? `<-[:${rel.relLabel}]-` : `-[:${rel.relLabel}]->`;
  return `${arrow}(:${rel.targetLabel})`;
}

// =============================================================================
// Factories
// =============================================================================

/** Validate a standalone relationship descriptor. */
export function defineRelationship(input: RelationshipSchemaInput): RelationshipSchema {
  return buildRelationship(`relationship ${input.relLabel}`, "relationship", input);
}

export function defineNodeSchema(input: NodeSchemaInput): NodeSchema {
  const schema = input.label;
  requireIdentifier(schema, "label", input.label);

  const extraLabels = [...(input.extraLabels ?? [])];
  for (const extra of extraLabels) {
    requireIdentifier(schema, "extraLabels", extra);
    if (extra === input.label) {
      throw new ConfigurationError(schema, "extraLabels", `"${extra}" repeats the primary label`);
    }
  }
  if (new Set(extraLabels).size !== extraLabels.length) {
    throw new ConfigurationError(schema, "extraLabels", "contains duplicates");
  }

  const properties = toBindingList(input.properties);
  checkBindingList(schema, "properties", properties, { inMatcher: false, reserved: true });
  if (!properties.some(([name]) => name === "id")) {
    throw new ConfigurationError(schema, "properties.id", "every node schema must bind an id");
  }

  let subResource: RelationshipSchema | null = null;
  if (input.subResourceRelationship) {
    subResource = buildRelationship(
      schema,
      "subResourceRelationship",
      input.subResourceRelationship,
    );
    if (subResource.relLabel !== SUB_RESOURCE_REL_LABEL) {
      throw new ConfigurationError(
        schema,
        "subResourceRelationship.relLabel",
        `sub-resource relationships must be labelled ${SUB_RESOURCE_REL_LABEL}, ` +
          `got ${subResource.relLabel}`,
      );
    }
    if (subResource.direction !== "INWARD") {
      throw new ConfigurationError(
        schema,
        "subResourceRelationship.direction",
        "sub-resource relationships must be INWARD",
      );
    }
    for (const [name, binding] of subResource.targetMatcher) {
      if (binding.kind === "rowList" || (binding.kind === "row" && binding.match !== "exact")) {
        throw new ConfigurationError(
          schema,
          `subResourceRelationship.targetMatcher.${name}`,
          "sub-resource matchers only support exact single-value bindings",
        );
      }
    }
  }

  const others = (input.otherRelationships ?? []).map((rel, i) =>
    buildRelationship(schema, `otherRelationships[${i}]`, rel),
  );

  const keys = new Set<string>();
  for (const rel of subResource ? [subResource, ...others] : others) {
    const key = relationshipKey(rel);
    if (keys.has(key)) {
      throw new ConfigurationError(
        schema,
        "otherRelationships",
        `relationship ${key} is declared more than once`,
      );
    }
    keys.add(key);
  }

  const scopedCleanup = input.scopedCleanup ?? true;
  const cascadeDelete = input.cascadeDelete ?? false;
  if (cascadeDelete && !scopedCleanup) {
    throw new ConfigurationError(schema, "cascadeDelete", "cascade delete requires scoped cleanup");
  }

  return Object.freeze({
    kind: "node",
    label: input.label,
    properties,
    subResourceRelationship: subResource,
    otherRelationships: Object.freeze(others),
    extraLabels: Object.freeze(extraLabels),
    scopedCleanup,
    cascadeDelete,
  });
}

export function defineMatchLink(input: MatchLinkSchemaInput): MatchLinkSchema {
  const name = input.name ?? `${input.sourceLabel}:${input.relLabel}:${input.targetLabel}`;
  requireIdentifier(name, "sourceLabel", input.sourceLabel);
  requireIdentifier(name, "targetLabel", input.targetLabel);
  requireIdentifier(name, "relLabel", input.relLabel);
  requireDirection(name, "direction", input.direction);

  const sourceMatcher = toBindingList(input.sourceMatcher);
  const targetMatcher = toBindingList(input.targetMatcher);
  if (sourceMatcher.length === 0) {
    throw new ConfigurationError(name, "sourceMatcher", "matcher needs at least one property");
  }
  if (targetMatcher.length === 0) {
    throw new ConfigurationError(name, "targetMatcher", "matcher needs at least one property");
  }
  checkBindingList(name, "sourceMatcher", sourceMatcher, { inMatcher: true, reserved: false });
  checkBindingList(name, "targetMatcher", targetMatcher, { inMatcher: true, reserved: false });

  const properties = toBindingList(input.properties);
  checkBindingList(name, "properties", properties, { inMatcher: false, reserved: true });
  for (const required of [SUB_RESOURCE_LABEL_PROPERTY, SUB_RESOURCE_ID_PROPERTY]) {
    const entry = properties.find(([prop]) => prop === required);
    if (!entry) {
      throw new ConfigurationError(
        name,
        `properties.${required}`,
        "MatchLinks must carry the sub-resource label and id",
      );
    }
    if (entry[1].kind !== "kwargs") {
      throw new ConfigurationError(name, `properties.${required}`, "must be bound with fromKwargs");
    }
  }

  return Object.freeze({
    kind: "matchlink",
    name,
    sourceLabel: input.sourceLabel,
    sourceMatcher,
    targetLabel: input.targetLabel,
    targetMatcher,
    relLabel: input.relLabel,
    direction: input.direction,
    properties,
  });
}

// =============================================================================
// Accessors
// =============================================================================

export function schemaName(schema: GraphSchema): string {
  return schema.kind === "node" ? schema.label : schema.name;
}

/** Sub-resource first, then the others in declaration order. */
export function allRelationships(schema: NodeSchema): RelationshipSchema[] {
  return schema.subResourceRelationship
    ? [schema.subResourceRelationship, ...schema.otherRelationships]
    : [...schema.otherRelationships];
}

/** Name of the kwargs binding a MatchLink uses for one of its mandatory properties. */
export function matchLinkScopeParameter(schema: MatchLinkSchema, property: string): string {
  const entry = schema.properties.find(([prop]) => prop === property);
  if (!entry || entry[1].kind !== "kwargs") {
    throw new ConfigurationError(
      schema.name,
      `properties.${property}`,
      "must be bound with fromKwargs",
    );
  }
  return entry[1].name;
}
