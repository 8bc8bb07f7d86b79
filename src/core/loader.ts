/**
 * schemagraph — Loader
 *
 * Entry points collectors call once per entity type and run:
 *   load()           — merge node rows and their relationships
 *   loadMatchLinks() — link pairs of pre-existing nodes
 *
 * Both validate kwargs and resolve every row before the first write, create
 * the schema's indexes, then write in batches of `batchSize` rows; each batch
 * is one store transaction.
 */

import { ConfigurationError, wrapStoreError } from "../errors.js";
import { getComponentLogger } from "../logging.js";
import type { MatchLinkSchema, NodeSchema, RelationshipSchema } from "../schema/model.js";
import type { GraphStore, Kwargs, Row, UpdateTag, WriteSummary } from "../types.js";
import { deriveMatchLinkIndexes, deriveNodeIndexes, ensureIndexes } from "./indexes.js";
import { selectRelationships } from "./querybuilder.js";
import {
  buildParameters,
  matchLinkBindingSections,
  nodeBindingSections,
  requireKwargs,
  resolveMatchLinkRows,
  resolveNodeRows,
} from "./resolver.js";

export const DEFAULT_BATCH_SIZE = 10_000;

export type LoadOptions = {
  /** Staleness tag of the current run; stamped as `lastupdated`. */
  updateTag: UpdateTag;
  kwargs?: Kwargs;
  batchSize?: number;
  /** Write only these relationships (all declared ones when omitted). */
  selectedRelationships?: readonly RelationshipSchema[];
};

export type MatchLinkLoadOptions = Omit<LoadOptions, "selectedRelationships">;

export type LoadSummary = {
  rows: number;
  batches: number;
  nodesCreated: number;
  relationshipsCreated: number;
  /** `null` when the store cannot count matches that found no endpoint. */
  relationshipsSkipped: number | null;
};

// =============================================================================
// Helpers
// =============================================================================

function emptySummary(): LoadSummary {
  return { rows: 0, batches: 0, nodesCreated: 0, relationshipsCreated: 0, relationshipsSkipped: 0 };
}

function checkBatchSize(schema: string, batchSize: number): void {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigurationError(
      schema,
      "batchSize",
      `must be a positive integer, got ${batchSize}`,
    );
  }
}

function addSummary(total: LoadSummary, part: WriteSummary, rows: number): void {
  total.rows += rows;
  total.batches += 1;
  total.nodesCreated += part.nodesCreated;
  total.relationshipsCreated += part.relationshipsCreated;
  total.relationshipsSkipped =
    total.relationshipsSkipped === null || part.relationshipsSkipped === null
      ? null
      : total.relationshipsSkipped + part.relationshipsSkipped;
}

function* chunks<T>(
  items: readonly T[],
  size: number,
): Generator<{ start: number; items: readonly T[] }> {
  for (let start = 0; start < items.length; start += size) {
    yield { start, items: items.slice(start, start + size) };
  }
}

function logSummary(job: string, summary: LoadSummary, updateTag: UpdateTag): void {
  const log = getComponentLogger("loader");
  log.info({ job, updateTag, ...summary }, "load finished");
  if (summary.relationshipsSkipped) {
    log.info(
      { job, skipped: summary.relationshipsSkipped },
      "relationship endpoints not found; those relationships were skipped",
    );
  }
}

// =============================================================================
// Nodes
// =============================================================================

export async function load(
  store: GraphStore,
  schema: NodeSchema,
  rows: readonly Row[],
  options: LoadOptions,
): Promise<LoadSummary> {
  const job = `load ${schema.label}`;
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  checkBatchSize(schema.label, batchSize);

  const relationships = selectRelationships(schema, options.selectedRelationships);
  const parameters = buildParameters(schema.label, options.kwargs ?? {}, options.updateTag);
  requireKwargs(schema.label, nodeBindingSections(schema, relationships), parameters);

  const summary = emptySummary();
  if (rows.length === 0) {
    getComponentLogger("loader").debug({ job }, "no rows to load");
    return summary;
  }

  const resolved = resolveNodeRows(schema, relationships, rows, parameters, job);
  await ensureIndexes(store, deriveNodeIndexes(schema), job);

  for (const chunk of chunks(rows, batchSize)) {
    let written: WriteSummary;
    try {
      written = await store.writeNodes({
        job,
        schema,
        relationships,
        rows: chunk.items,
        resolved: resolved.slice(chunk.start, chunk.start + chunk.items.length),
        parameters,
        updateTag: options.updateTag,
      });
    } catch (err) {
      throw wrapStoreError(job, err);
    }
    addSummary(summary, written, chunk.items.length);
  }

  logSummary(job, summary, options.updateTag);
  return summary;
}

// =============================================================================
// MatchLinks
// =============================================================================

export async function loadMatchLinks(
  store: GraphStore,
  schema: MatchLinkSchema,
  rows: readonly Row[],
  options: MatchLinkLoadOptions,
): Promise<LoadSummary> {
  const job = `load ${schema.name}`;
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  checkBatchSize(schema.name, batchSize);

  const parameters = buildParameters(schema.name, options.kwargs ?? {}, options.updateTag);
  requireKwargs(schema.name, matchLinkBindingSections(schema), parameters);

  const summary = emptySummary();
  if (rows.length === 0) {
    getComponentLogger("loader").debug({ job }, "no rows to load");
    return summary;
  }

  const resolved = resolveMatchLinkRows(schema, rows, parameters);
  await ensureIndexes(store, deriveMatchLinkIndexes(schema), job);

  for (const chunk of chunks(rows, batchSize)) {
    let written: WriteSummary;
    try {
      written = await store.writeMatchLinks({
        job,
        schema,
        rows: chunk.items,
        resolved: resolved.slice(chunk.start, chunk.start + chunk.items.length),
        parameters,
        updateTag: options.updateTag,
      });
    } catch (err) {
      throw wrapStoreError(job, err);
    }
    addSummary(summary, written, chunk.items.length);
  }

  logSummary(job, summary, options.updateTag);
  return summary;
}
