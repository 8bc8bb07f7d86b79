import { describe, it, expect, vi } from "vitest";
import { GraphStoreError } from "../errors.js";
import { fromKwargs, fromRow } from "../schema/bindings.js";
import { defineMatchLink, defineNodeSchema } from "../schema/model.js";
import { InMemoryGraphStore } from "../storage/memory-store.js";
import type { IndexSpec } from "../types.js";
import {
  buildIndexQueries,
  buildIndexQuery,
  deriveIndexes,
  deriveMatchLinkIndexes,
  deriveNodeIndexes,
  ensureIndexes,
} from "./indexes.js";

const WidgetSchema = defineNodeSchema({
  label: "Widget",
  properties: { id: fromRow("id"), arn: fromRow("arn", { extraIndex: true }), name: fromRow("name") },
  extraLabels: ["Tagged"],
  subResourceRelationship: {
    targetLabel: "Account",
    targetMatcher: { id: fromKwargs("ACCOUNT_ID") },
    relLabel: "RESOURCE",
    direction: "INWARD",
  },
  otherRelationships: [
    { targetLabel: "Zone", targetMatcher: { name: fromRow("zone") }, relLabel: "IN_ZONE", direction: "OUTWARD" },
  ],
});

const GearSchema = defineNodeSchema({
  label: "Gear",
  properties: { id: fromRow("id") },
  subResourceRelationship: {
    targetLabel: "Account",
    targetMatcher: { id: fromKwargs("ACCOUNT_ID") },
    relLabel: "RESOURCE",
    direction: "INWARD",
  },
});

const DrivesSchema = defineMatchLink({
  sourceLabel: "Widget",
  sourceMatcher: { id: fromRow("source") },
  targetLabel: "Gear",
  targetMatcher: { id: fromRow("target") },
  relLabel: "DRIVES",
  direction: "OUTWARD",
  properties: { _sub_resource_label: fromKwargs("SUB_LABEL"), _sub_resource_id: fromKwargs("SUB_ID") },
});

describe("deriveNodeIndexes", () => {
  it("should cover the key, the tag, extra labels, extra indexes and matchers", () => {
    expect(deriveNodeIndexes(WidgetSchema)).toEqual([
      { kind: "node", label: "Widget", property: "id" },
      { kind: "node", label: "Widget", property: "lastupdated" },
      { kind: "node", label: "Tagged", property: "id" },
      { kind: "node", label: "Widget", property: "arn" },
      { kind: "node", label: "Account", property: "id" },
      { kind: "node", label: "Zone", property: "name" },
    ]);
  });
});

describe("deriveMatchLinkIndexes", () => {
  it("should index both matchers and the relationship scope properties", () => {
    expect(deriveMatchLinkIndexes(DrivesSchema)).toEqual([
      { kind: "node", label: "Widget", property: "id" },
      { kind: "node", label: "Gear", property: "id" },
      {
        kind: "relationship",
        relLabel: "DRIVES",
        properties: ["lastupdated", "_sub_resource_label", "_sub_resource_id"],
      },
    ]);
  });
});

describe("deriveIndexes", () => {
  it("should deduplicate across schemas in first-seen order", () => {
    const specs = deriveIndexes([GearSchema, WidgetSchema, DrivesSchema]);

    expect(specs.map((s) => (s.kind === "node" ? `${s.label}.${s.property}` : s.relLabel))).toEqual([
      "Gear.id",
      "Gear.lastupdated",
      "Account.id",
      "Widget.id",
      "Widget.lastupdated",
      "Tagged.id",
      "Widget.arn",
      "Zone.name",
      "DRIVES",
    ]);
  });
});

describe("buildIndexQuery", () => {
  it("should render node and relationship indexes", () => {
    expect(buildIndexQuery({ kind: "node", label: "Widget", property: "id" })).toBe(
      "CREATE INDEX IF NOT EXISTS FOR (n:Widget) ON (n.id);",
    );
    const properties = ["lastupdated", "_sub_resource_id"];
    expect(buildIndexQuery({ kind: "relationship", relLabel: "DRIVES", properties })).toBe(
      "CREATE INDEX IF NOT EXISTS FOR ()-[r:DRIVES]-() ON (r.lastupdated, r._sub_resource_id);",
    );
  });

  it("should render one query per spec", () => {
    expect(buildIndexQueries(deriveNodeIndexes(GearSchema))).toEqual([
      "CREATE INDEX IF NOT EXISTS FOR (n:Gear) ON (n.id);",
      "CREATE INDEX IF NOT EXISTS FOR (n:Gear) ON (n.lastupdated);",
      "CREATE INDEX IF NOT EXISTS FOR (n:Account) ON (n.id);",
    ]);
  });
});

describe("ensureIndexes", () => {
  it("should create missing indexes once", async () => {
    const store = new InMemoryGraphStore();
    const specs = deriveNodeIndexes(GearSchema);

    expect(await ensureIndexes(store, specs)).toBe(3);
    expect(await ensureIndexes(store, specs)).toBe(0);
  });

  it("should not call the store for an empty list", async () => {
    const store = new InMemoryGraphStore();
    const spy = vi.spyOn(store, "ensureIndexes");

    expect(await ensureIndexes(store, [])).toBe(0);
    expect(spy).not.toHaveBeenCalled();
  });

  class BrokenStore extends InMemoryGraphStore {
    override async ensureIndexes(_specs: readonly IndexSpec[]): Promise<number> {
      throw new Error("schema locked");
    }
  }

  it("should wrap store failures", async () => {
    await expect(ensureIndexes(new BrokenStore(), deriveNodeIndexes(GearSchema))).rejects.toThrow(
      new GraphStoreError("ensure indexes", "schema locked"),
    );
  });

  it("should report failures under the caller's job", async () => {
    const specs = deriveNodeIndexes(GearSchema);
    await expect(ensureIndexes(new BrokenStore(), specs, "load Gear")).rejects.toThrow(
      new GraphStoreError("load Gear", "schema locked"),
    );
  });
});
