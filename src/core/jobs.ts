/**
 * schemagraph — Statement Jobs
 *
 * Hand-written Cypher kept as JSON, for analysis and enrichment passes that
 * run after a sync:
 *
 *   {
 *     "name": "Mark exposed widgets",
 *     "statements": [
 *       { "query": "MATCH ... LIMIT $LIMIT_SIZE SET", "iterative": true, "iterationsize": 100 },
 *       { "query": "MATCH ... SET ...", "parameters": { "EXPOSED": true } }
 *     ]
 *   }
 *
 * Statements run in order and the first failure aborts the job. Caller
 * parameters are merged over each statement's own.
 */

import { basename, extname } from "node:path";
import { Type } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { ConfigurationError, wrapStoreError } from "../errors.js";
import { getComponentLogger } from "../logging.js";
import { RowValueDocument, firstError, readJson } from "../schema/document.js";
import type {
  GraphStatement,
  GraphStore,
  Kwargs,
  QueryParameters,
  StatementCounts,
  UpdateTag,
} from "../types.js";
import { buildParameters } from "./resolver.js";

// =============================================================================
// Document Schema
// =============================================================================

const StatementDocument = Type.Object(
  {
    query: Type.String({ minLength: 1 }),
    parameters: Type.Optional(Type.Record(Type.String(), RowValueDocument)),
    iterative: Type.Optional(Type.Boolean()),
    iterationsize: Type.Optional(Type.Integer({ minimum: 0 })),
  },
  { additionalProperties: false },
);

export const StatementJobDocumentSchema = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    statements: Type.Array(StatementDocument),
  },
  { additionalProperties: false },
);

export type StatementJob = {
  name: string;
  /** File name without extension, when loaded from a file. Used in logs. */
  shortName: string | undefined;
  statements: GraphStatement[];
};

export type JobRunOptions = {
  /** Merged over every statement's parameters. */
  parameters?: Kwargs;
  /** Bound as `UPDATE_TAG`; must agree with any `UPDATE_TAG` parameter. */
  updateTag?: UpdateTag;
};

export type JobSummary = {
  job: string;
  statements: number;
  counts: StatementCounts;
};

// =============================================================================
// Parsing
// =============================================================================

/** Validate a parsed JSON job document. */
export function parseStatementJob(json: unknown, shortName?: string, source = "job"): StatementJob {
  if (!Check(StatementJobDocumentSchema, json)) {
    firstError(source, StatementJobDocumentSchema, json);
  }

  const statements = json.statements.map((doc, i): GraphStatement => {
    const iterative = doc.iterative ?? false;
    const iterationSize = doc.iterationsize ?? 0;
    if (iterative && iterationSize < 1) {
      throw new ConfigurationError(
        source,
        `statements.${i}.iterationsize`,
        "an iterative statement needs a positive iterationsize",
      );
    }
    return { query: doc.query, parameters: { ...doc.parameters }, iterative, iterationSize };
  });

  return { name: json.name, shortName, statements };
}

export function loadStatementJobFile(file: string): StatementJob {
  return parseStatementJob(readJson(file), basename(file, extname(file)), file);
}

// =============================================================================
// Running
// =============================================================================

function callParameters(label: string, options: JobRunOptions): QueryParameters {
  if (options.updateTag !== undefined) {
    return buildParameters(label, options.parameters ?? {}, options.updateTag);
  }
  const params: QueryParameters = {};
  for (const [name, value] of Object.entries(options.parameters ?? {})) {
    if (value !== undefined) params[name] = value;
  }
  return params;
}

/** Run every statement of a job in order. */
export async function runJob(
  store: GraphStore,
  job: StatementJob,
  options: JobRunOptions = {},
): Promise<JobSummary> {
  const label = job.shortName ?? job.name;
  const params = callParameters(label, options);
  const log = getComponentLogger("jobs");
  const counts: StatementCounts = {
    nodesCreated: 0,
    nodesDeleted: 0,
    relationshipsCreated: 0,
    relationshipsDeleted: 0,
    propertiesSet: 0,
  };

  log.debug({ job: label, statements: job.statements.length }, "starting job");
  for (const [i, statement] of job.statements.entries()) {
    let result: StatementCounts;
    try {
      const parameters = { ...statement.parameters, ...params };
      result = await store.runStatement({ ...statement, parameters });
    } catch (err) {
      throw wrapStoreError(`${label} statement #${i + 1}`, err);
    }
    counts.nodesCreated += result.nodesCreated;
    counts.nodesDeleted += result.nodesDeleted;
    counts.relationshipsCreated += result.relationshipsCreated;
    counts.relationshipsDeleted += result.relationshipsDeleted;
    counts.propertiesSet += result.propertiesSet;
    log.debug({ job: label, statement: i + 1 }, "statement completed");
  }

  log.info({ job: label, ...counts }, "job finished");
  return { job: label, statements: job.statements.length, counts };
}

export async function runJobFile(
  store: GraphStore,
  file: string,
  options: JobRunOptions = {},
): Promise<JobSummary> {
  return runJob(store, loadStatementJobFile(file), options);
}
