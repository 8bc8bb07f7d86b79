import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigurationError, GraphStoreError } from "../errors.js";
import { InMemoryGraphStore } from "../storage/memory-store.js";
import type { GraphStatement, StatementCounts } from "../types.js";
import {
  loadStatementJobFile,
  parseStatementJob,
  runJob,
  runJobFile,
  type StatementJob,
} from "./jobs.js";

const NOTHING: StatementCounts = {
  nodesCreated: 0,
  nodesDeleted: 0,
  relationshipsCreated: 0,
  relationshipsDeleted: 0,
  propertiesSet: 0,
};

/** Records every statement and answers from a queue of counts. */
class StatementStore extends InMemoryGraphStore {
  readonly statements: GraphStatement[] = [];
  results: Array<StatementCounts | Error> = [];

  override async runStatement(statement: GraphStatement): Promise<StatementCounts> {
    this.statements.push(statement);
    const next = this.results.shift() ?? NOTHING;
    if (next instanceof Error) throw next;
    return next;
  }
}

const EXPOSURE_JOB = {
  name: "Mark exposed widgets",
  statements: [
    {
      query: "MATCH (w:Widget) SET w.exposed = $EXPOSED",
      parameters: { EXPOSED: true, REGION: "default" },
    },
    {
      query: "MATCH (w:Widget) WITH w LIMIT $LIMIT_SIZE SET w.checked = true",
      iterative: true,
      iterationsize: 50,
    },
  ],
};

describe("parseStatementJob", () => {
  it("should fill statement defaults", () => {
    const job = parseStatementJob(EXPOSURE_JOB);

    expect(job).toEqual({
      name: "Mark exposed widgets",
      shortName: undefined,
      statements: [
        {
          query: "MATCH (w:Widget) SET w.exposed = $EXPOSED",
          parameters: { EXPOSED: true, REGION: "default" },
          iterative: false,
          iterationSize: 0,
        },
        {
          query: "MATCH (w:Widget) WITH w LIMIT $LIMIT_SIZE SET w.checked = true",
          parameters: {},
          iterative: true,
          iterationSize: 50,
        },
      ],
    });
  });

  it("should require an iteration size on iterative statements", () => {
    const doc = { name: "broken", statements: [{ query: "MATCH (n) DETACH DELETE n", iterative: true }] };

    expect(() => parseStatementJob(doc, undefined, "broken.json")).toThrow(
      new ConfigurationError(
        "broken.json",
        "statements.0.iterationsize",
        "an iterative statement needs a positive iterationsize",
      ),
    );
  });

  it("should name the field that fails validation", () => {
    let caught: unknown;
    try {
      parseStatementJob({ name: "typo", statements: [{ query: "RETURN 1", iterate: true }] });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError ? caught.schema : null).toBe("job");
  });
});

describe("loadStatementJobFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "schemagraph-jobs-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should name the job after its file", () => {
    const file = join(dir, "widget_exposure.json");
    writeFileSync(file, JSON.stringify(EXPOSURE_JOB));

    const job = loadStatementJobFile(file);
    expect(job.shortName).toBe("widget_exposure");
    expect(job.statements).toHaveLength(2);
  });

  it("should run a job straight from its file", async () => {
    const file = join(dir, "widget_exposure.json");
    writeFileSync(file, JSON.stringify(EXPOSURE_JOB));
    const store = new StatementStore();

    const summary = await runJobFile(store, file);
    expect(summary.job).toBe("widget_exposure");
    expect(store.statements).toHaveLength(2);
  });
});

describe("runJob", () => {
  let store: StatementStore;
  let job: StatementJob;

  beforeEach(() => {
    store = new StatementStore();
    job = parseStatementJob(EXPOSURE_JOB);
  });

  it("should merge caller parameters over each statement's own", async () => {
    await runJob(store, job, { parameters: { REGION: "eu-west-1" }, updateTag: 9 });

    expect(store.statements.map((st) => st.parameters)).toEqual([
      { EXPOSED: true, REGION: "eu-west-1", UPDATE_TAG: 9 },
      { REGION: "eu-west-1", UPDATE_TAG: 9 },
    ]);
    expect(store.statements.map((st) => [st.iterative, st.iterationSize])).toEqual([
      [false, 0],
      [true, 50],
    ]);
  });

  it("should sum the counts of every statement", async () => {
    store.results = [
      { ...NOTHING, propertiesSet: 3 },
      { ...NOTHING, relationshipsCreated: 2, propertiesSet: 1 },
    ];

    expect(await runJob(store, job)).toEqual({
      job: "Mark exposed widgets",
      statements: 2,
      counts: { ...NOTHING, relationshipsCreated: 2, propertiesSet: 4 },
    });
  });

  it("should reject an UPDATE_TAG parameter that disagrees with the tag", async () => {
    await expect(runJob(store, job, { parameters: { UPDATE_TAG: 8 }, updateTag: 9 })).rejects.toThrow(
      "Mark exposed widgets.UPDATE_TAG: kwargs UPDATE_TAG=8 disagrees with the run tag 9",
    );
    expect(store.statements).toEqual([]);
  });

  it("should stop at the first failing statement", async () => {
    store.results = [new Error("syntax error near SET")];

    await expect(runJob(store, job)).rejects.toThrow(
      new GraphStoreError("Mark exposed widgets statement #1", "syntax error near SET"),
    );
    expect(store.statements).toHaveLength(1);
  });

  it("should refuse to run on a store without Cypher", async () => {
    await expect(runJob(new InMemoryGraphStore(), job)).rejects.toThrow(
      "Mark exposed widgets statement #1: the memory store cannot run Cypher statements; use the neo4j store",
    );
  });
});
