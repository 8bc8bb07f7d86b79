import { describe, it, expect } from "vitest";
import { fromKwargs, fromRow, fromRowList, toBindingList } from "../schema/bindings.js";
import { defineMatchLink, defineNodeSchema, defineRelationship } from "../schema/model.js";
import {
  bindingExpression,
  buildIngestionQuery,
  buildMatchLinkQuery,
  matcherWhere,
  relationshipPattern,
  selectRelationships,
} from "./querybuilder.js";

const WidgetSchema = defineNodeSchema({
  label: "Widget",
  properties: { id: fromRow("id"), name: fromRow("name"), region: fromKwargs("REGION") },
  subResourceRelationship: {
    targetLabel: "Account",
    targetMatcher: { id: fromKwargs("ACCOUNT_ID") },
    relLabel: "RESOURCE",
    direction: "INWARD",
  },
  otherRelationships: [
    {
      targetLabel: "Zone",
      targetMatcher: { id: fromRowList("zone_ids") },
      relLabel: "IN_ZONE",
      direction: "OUTWARD",
      properties: { weight: fromRow("weight") },
    },
  ],
});

describe("fragments", () => {
  it("should render binding expressions", () => {
    expect(bindingExpression(fromRow("name"))).toBe("item.name");
    expect(bindingExpression(fromRow("zone-name"))).toBe("item.`zone-name`");
    expect(bindingExpression(fromRowList("ids"))).toBe("item.ids");
    expect(bindingExpression(fromKwargs("ACCOUNT_ID"))).toBe("$ACCOUNT_ID");
  });

  it("should render each match mode", () => {
    const matcher = toBindingList({
      id: fromRowList("ids"),
      name: fromRow("name", { ignoreCase: true }),
      arn: fromRow("arn", { fuzzyAndIgnoreCase: true }),
      region: fromKwargs("REGION"),
    });

    expect(matcherWhere("n", matcher)).toBe(
      "WHERE n.id IN item.ids AND toLower(n.name) = toLower(item.name)" +
        " AND toLower(n.arn) CONTAINS toLower(item.arn) AND n.region = $REGION",
    );
  });

  it("should point relationship patterns both ways", () => {
    expect(relationshipPattern("i", "r", "RESOURCE", "INWARD", "j")).toBe("(i)<-[r:RESOURCE]-(j)");
    expect(relationshipPattern("i", "r0", "IN_ZONE", "OUTWARD", "n0")).toBe("(i)-[r0:IN_ZONE]->(n0)");
  });
});

describe("buildIngestionQuery", () => {
  it("should merge the node only when there are no relationships", () => {
    const schema = defineNodeSchema({ label: "Zone", properties: { id: fromRow("id"), name: fromRow("name") } });

    expect(buildIngestionQuery(schema)).toBe(
      [
        "UNWIND $DictList AS item",
        "MERGE (i:Zone {id: item.id})",
        "ON CREATE SET i.firstseen = timestamp()",
        "SET i.lastupdated = $UPDATE_TAG, i.name = item.name",
      ].join("\n"),
    );
  });

  it("should add extra labels in the SET clause", () => {
    const schema = defineNodeSchema({ label: "Zone", properties: { id: fromRow("id") }, extraLabels: ["Tagged"] });
    expect(buildIngestionQuery(schema).split("\n")[3]).toBe("SET i.lastupdated = $UPDATE_TAG, i:Tagged");
  });

  it("should attach every relationship in a union subquery", () => {
    expect(buildIngestionQuery(WidgetSchema)).toBe(
      [
        "UNWIND $DictList AS item",
        "MERGE (i:Widget {id: item.id})",
        "ON CREATE SET i.firstseen = timestamp()",
        "SET i.lastupdated = $UPDATE_TAG, i.name = item.name, i.region = $REGION",
        "WITH i, item",
        "CALL {",
        "    WITH i, item",
        "    OPTIONAL MATCH (j:Account)",
        "    WHERE j.id = $ACCOUNT_ID",
        "    WITH i, item, j WHERE j IS NOT NULL",
        "    MERGE (i)<-[r:RESOURCE]-(j)",
        "    ON CREATE SET r.firstseen = timestamp()",
        "    SET r.lastupdated = $UPDATE_TAG",
        "    UNION",
        "    WITH i, item",
        "    OPTIONAL MATCH (n0:Zone)",
        "    WHERE n0.id IN item.zone_ids",
        "    WITH i, item, n0 WHERE n0 IS NOT NULL",
        "    MERGE (i)-[r0:IN_ZONE]->(n0)",
        "    ON CREATE SET r0.firstseen = timestamp()",
        "    SET r0.lastupdated = $UPDATE_TAG, r0.weight = item.weight",
        "}",
      ].join("\n"),
    );
  });

  it("should write only the selected relationships", () => {
    const [zone] = WidgetSchema.otherRelationships;
    const query = buildIngestionQuery(WidgetSchema, zone ? [zone] : []);

    expect(query).toContain("MERGE (i)-[r0:IN_ZONE]->(n0)");
    expect(query).not.toContain("RESOURCE");
    expect(query).not.toContain("UNION");
  });
});

describe("selectRelationships", () => {
  it("should keep declaration order", () => {
    const zone = defineRelationship({
      targetLabel: "Zone",
      targetMatcher: { id: fromRowList("zone_ids") },
      relLabel: "IN_ZONE",
      direction: "OUTWARD",
    });
    const selected = selectRelationships(WidgetSchema, [zone]);
    expect(selected).toEqual([WidgetSchema.otherRelationships[0]]);
    expect(selectRelationships(WidgetSchema)).toHaveLength(2);
  });

  it("should reject relationships the schema does not declare", () => {
    const owns = defineRelationship({
      targetLabel: "Zone",
      targetMatcher: { id: fromRow("zone_id") },
      relLabel: "OWNS",
      direction: "OUTWARD",
    });
    expect(() => selectRelationships(WidgetSchema, [owns])).toThrow(
      "Widget.selectedRelationships: relationship -[:OWNS]->(:Zone) is not declared on this schema",
    );
  });
});

describe("buildMatchLinkQuery", () => {
  it("should match both endpoints and merge the link", () => {
    const link = defineMatchLink({
      sourceLabel: "Widget",
      sourceMatcher: { id: fromRow("source") },
      targetLabel: "Widget",
      targetMatcher: { name: fromRow("target", { ignoreCase: true }) },
      relLabel: "CONNECTS_TO",
      direction: "OUTWARD",
      properties: {
        _sub_resource_label: fromKwargs("SUB_LABEL"),
        _sub_resource_id: fromKwargs("SUB_ID"),
        port: fromRow("port"),
      },
    });

    expect(buildMatchLinkQuery(link)).toBe(
      [
        "UNWIND $DictList AS item",
        "MATCH (from:Widget)",
        "WHERE from.id = item.source",
        "MATCH (to:Widget)",
        "WHERE toLower(to.name) = toLower(item.target)",
        "MERGE (from)-[r:CONNECTS_TO]->(to)",
        "ON CREATE SET r.firstseen = timestamp()",
        "SET r.lastupdated = $UPDATE_TAG, r._sub_resource_label = $SUB_LABEL, " +
          "r._sub_resource_id = $SUB_ID, r.port = item.port",
      ].join("\n"),
    );
  });
});
