/**
 * schemagraph — Schema Documents
 *
 * JSON form of node and MatchLink schemas, for the CLI and for collectors
 * that keep their schemas as data. Bindings use a string shorthand:
 *
 *   "name"        row field
 *   "$ACCOUNT_ID" kwargs value
 *   "ids[]"       row list (matchers only)
 *
 * or an object (`{ "row": "name", "ignoreCase": true }`, `{ "kwargs": ... }`,
 * `{ "rowList": ... }`) when options are needed. Documents are checked with
 * TypeBox first, then handed to the schema factories for semantic checks.
 */

import { readFileSync } from "node:fs";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Errors } from "@sinclair/typebox/errors";
import { Check } from "@sinclair/typebox/value";
import { ConfigurationError, fieldFromPointer } from "../errors.js";
import type { Row } from "../types.js";
import { fromKwargs, fromRow, fromRowList, type Binding } from "./bindings.js";
import {
  defineMatchLink,
  defineNodeSchema,
  type GraphSchema,
  type RelationshipSchemaInput,
} from "./model.js";

// =============================================================================
// Document Schema
// =============================================================================

const BindingDocument = Type.Union([
  Type.String({ minLength: 1 }),
  Type.Object(
    {
      row: Type.String({ minLength: 1 }),
      extraIndex: Type.Optional(Type.Boolean()),
      ignoreCase: Type.Optional(Type.Boolean()),
      fuzzyAndIgnoreCase: Type.Optional(Type.Boolean()),
    },
    { additionalProperties: false },
  ),
  Type.Object(
    {
      kwargs: Type.String({ minLength: 1 }),
      extraIndex: Type.Optional(Type.Boolean()),
    },
    { additionalProperties: false },
  ),
  Type.Object({ rowList: Type.String({ minLength: 1 }) }, { additionalProperties: false }),
]);

const BindingsDocument = Type.Record(Type.String(), BindingDocument);

const Direction = Type.Union([Type.Literal("INWARD"), Type.Literal("OUTWARD")]);

const RelationshipDocument = Type.Object(
  {
    targetLabel: Type.String(),
    targetMatcher: BindingsDocument,
    relLabel: Type.String(),
    direction: Direction,
    properties: Type.Optional(BindingsDocument),
  },
  { additionalProperties: false },
);

const NodeSchemaDocument = Type.Object(
  {
    kind: Type.Optional(Type.Literal("node")),
    label: Type.String(),
    properties: BindingsDocument,
    subResourceRelationship: Type.Optional(Type.Union([RelationshipDocument, Type.Null()])),
    otherRelationships: Type.Optional(Type.Array(RelationshipDocument)),
    extraLabels: Type.Optional(Type.Array(Type.String())),
    scopedCleanup: Type.Optional(Type.Boolean()),
    cascadeDelete: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

const MatchLinkDocument = Type.Object(
  {
    kind: Type.Literal("matchlink"),
    name: Type.Optional(Type.String()),
    sourceLabel: Type.String(),
    sourceMatcher: BindingsDocument,
    targetLabel: Type.String(),
    targetMatcher: BindingsDocument,
    relLabel: Type.String(),
    direction: Direction,
    properties: BindingsDocument,
  },
  { additionalProperties: false },
);

export const SchemaDocumentSchema = Type.Object(
  {
    schemas: Type.Array(Type.Union([NodeSchemaDocument, MatchLinkDocument]), { minItems: 1 }),
  },
  { additionalProperties: false },
);

export type SchemaDocument = Static<typeof SchemaDocumentSchema>;

export const RowValueDocument = Type.Union([
  Type.String(),
  Type.Number(),
  Type.Boolean(),
  Type.Null(),
  Type.Array(Type.Union([Type.String(), Type.Number(), Type.Boolean()])),
]);

export const RowsDocumentSchema = Type.Array(Type.Record(Type.String(), RowValueDocument));

// =============================================================================
// Conversion
// =============================================================================

/** Expand the shorthand or object form into a binding. */
export function parseBinding(doc: Static<typeof BindingDocument>): Binding {
  if (typeof doc === "string") {
    if (doc.startsWith("$")) return fromKwargs(doc.slice(1));
    if (doc.endsWith("[]")) return fromRowList(doc.slice(0, -2));
    return fromRow(doc);
  }
  if ("row" in doc) return fromRow(doc.row, doc);
  if ("kwargs" in doc) return fromKwargs(doc.kwargs, doc);
  return fromRowList(doc.rowList);
}

function parseBindings(doc: Static<typeof BindingsDocument>): Record<string, Binding> {
  const out: Record<string, Binding> = {};
  for (const [name, binding] of Object.entries(doc)) out[name] = parseBinding(binding);
  return out;
}

function parseRelationship(doc: Static<typeof RelationshipDocument>): RelationshipSchemaInput {
  return {
    targetLabel: doc.targetLabel,
    targetMatcher: parseBindings(doc.targetMatcher),
    relLabel: doc.relLabel,
    direction: doc.direction,
    properties: doc.properties ? parseBindings(doc.properties) : undefined,
  };
}

/** Throw the first TypeBox error of `value` as a configuration error. */
export function firstError(source: string, schema: TSchema, value: unknown): never {
  const [first] = [...Errors(schema, value)];
  if (!first) throw new ConfigurationError(source, undefined, "document does not match schema");
  throw new ConfigurationError(source, fieldFromPointer(first.path), first.message);
}

/** Validate a parsed JSON document and build its schemas. */
export function parseSchemaDocument(json: unknown, source = "document"): GraphSchema[] {
  if (!Check(SchemaDocumentSchema, json)) firstError(source, SchemaDocumentSchema, json);

  return json.schemas.map((doc): GraphSchema => {
    if (doc.kind === "matchlink") {
      return defineMatchLink({
        name: doc.name,
        sourceLabel: doc.sourceLabel,
        sourceMatcher: parseBindings(doc.sourceMatcher),
        targetLabel: doc.targetLabel,
        targetMatcher: parseBindings(doc.targetMatcher),
        relLabel: doc.relLabel,
        direction: doc.direction,
        properties: parseBindings(doc.properties),
      });
    }
    return defineNodeSchema({
      label: doc.label,
      properties: parseBindings(doc.properties),
      subResourceRelationship: doc.subResourceRelationship
        ? parseRelationship(doc.subResourceRelationship)
        : null,
      otherRelationships: (doc.otherRelationships ?? []).map(parseRelationship),
      extraLabels: doc.extraLabels,
      scopedCleanup: doc.scopedCleanup,
      cascadeDelete: doc.cascadeDelete,
    });
  });
}

/** Validate a parsed JSON array of rows. */
export function parseRows(json: unknown, source = "rows"): Row[] {
  if (!Check(RowsDocumentSchema, json)) firstError(source, RowsDocumentSchema, json);
  return json;
}

export function readJson(file: string): unknown {
  try {
    return JSON.parse(readFileSync(file, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(file, undefined, `cannot read JSON: ${message}`);
  }
}

export function loadSchemaFile(file: string): GraphSchema[] {
  return parseSchemaDocument(readJson(file), file);
}

export function loadRowsFile(file: string): Row[] {
  return parseRows(readJson(file), file);
}
