/**
 * schemagraph — Sync Orchestrator
 *
 * Runs named stages in registration order against one store and one update
 * tag. Each stage gets an explicit SyncContext; nothing is read from process
 * globals. A failing stage stops the run and its error is rethrown after the
 * stage's record is closed.
 */

import type { Logger } from "pino";
import { ConfigurationError } from "../errors.js";
import { getComponentLogger } from "../logging.js";
import type { GraphSchema } from "../schema/model.js";
import { schemaName } from "../schema/model.js";
import type { CleanupCounts, GraphStore, Kwargs, Row, UpdateTag } from "../types.js";
import { runCleanup, type CleanupScope } from "./cleanup.js";
import { runJob, type JobSummary, type StatementJob } from "./jobs.js";
import { load, loadMatchLinks, type LoadSummary } from "./loader.js";

export type SyncContext = {
  updateTag: UpdateTag;
  store: GraphStore;
  logger: Logger;
  /** Run-wide kwargs (scope ids and the like) shared by every stage. */
  parameters: Kwargs;
};

export type SyncStage<T = unknown> = (ctx: SyncContext) => Promise<T>;

export type SyncStatus = "running" | "completed" | "failed";

export type SyncRecord = {
  stage: string;
  status: SyncStatus;
  startedAt: string;
  completedAt: string | null;
  durationMs: number | null;
  /** Whatever the stage resolved to. */
  result: unknown;
  error: string | null;
};

export type SyncReport = {
  updateTag: UpdateTag;
  records: SyncRecord[];
};

/** Epoch seconds; the conventional update tag. */
export function generateUpdateTag(now: number = Date.now()): number {
  return Math.floor(now / 1000);
}

export class Sync {
  private stages: Array<{ name: string; run: SyncStage }> = [];
  private records: SyncRecord[] = [];
  private store: GraphStore;

  constructor(store: GraphStore) {
    this.store = store;
  }

  addStage<T>(name: string, run: SyncStage<T>): this {
    if (name.trim() === "") {
      throw new ConfigurationError("sync", "stage", "stage name must not be empty");
    }
    if (this.stages.some((stage) => stage.name === name)) {
      throw new ConfigurationError("sync", "stage", `stage "${name}" is already registered`);
    }
    this.stages.push({ name, run });
    return this;
  }

  get stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  /** Records of the most recent run, including the failed stage if it aborted. */
  get lastRecords(): SyncRecord[] {
    return [...this.records];
  }

  async run(options: { updateTag?: UpdateTag; parameters?: Kwargs } = {}): Promise<SyncReport> {
    const updateTag = options.updateTag ?? generateUpdateTag();
    const logger = getComponentLogger("sync");
    const ctx: SyncContext = {
      updateTag,
      store: this.store,
      logger,
      parameters: options.parameters ?? {},
    };
    this.records = [];

    logger.info({ updateTag, stages: this.stages.length }, "sync started");

    for (const stage of this.stages) {
      const startMs = Date.now();
      const record: SyncRecord = {
        stage: stage.name,
        status: "running",
        startedAt: new Date(startMs).toISOString(),
        completedAt: null,
        durationMs: null,
        result: null,
        error: null,
      };
      this.records.push(record);

      try {
        record.result = await stage.run(ctx);
        record.status = "completed";
      } catch (error) {
        record.status = "failed";
        record.error = error instanceof Error ? error.message : String(error);
        throw error;
      } finally {
        record.completedAt = new Date().toISOString();
        record.durationMs = Date.now() - startMs;
        logger.info(
          { stage: record.stage, status: record.status, durationMs: record.durationMs },
          "stage finished",
        );
      }
    }

    return { updateTag, records: this.lastRecords };
  }
}

// =============================================================================
// Stage Helpers
// =============================================================================

export type EntitySyncOptions = {
  /** Rows to load, or a collector producing them for this run. */
  rows: readonly Row[] | ((ctx: SyncContext) => readonly Row[] | Promise<readonly Row[]>);
  /** Merged over the run parameters. */
  kwargs?: Kwargs;
  /** Run cleanup after the load. Defaults to true. */
  cleanup?: boolean;
  cascadeDelete?: boolean;
  scope?: CleanupScope;
  batchSize?: number;
  iterationSize?: number;
};

export type EntitySyncResult = {
  load: LoadSummary;
  cleanup: CleanupCounts | null;
};

/** Stage that loads one schema's rows and then cleans up what this run did not touch. */
export function syncEntity(
  schema: GraphSchema,
  options: EntitySyncOptions,
): SyncStage<EntitySyncResult> {
  return async (ctx) => {
    const rows = typeof options.rows === "function" ? await options.rows(ctx) : options.rows;
    const kwargs: Kwargs = { ...ctx.parameters, ...options.kwargs };
    const loadOptions = { updateTag: ctx.updateTag, kwargs, batchSize: options.batchSize };

    const loaded =
      schema.kind === "node"
        ? await load(ctx.store, schema, rows, loadOptions)
        : await loadMatchLinks(ctx.store, schema, rows, loadOptions);

    if (options.cleanup === false) {
      ctx.logger.debug({ schema: schemaName(schema) }, "cleanup disabled for stage");
      return { load: loaded, cleanup: null };
    }

    const cleaned = await runCleanup(ctx.store, schema, {
      updateTag: ctx.updateTag,
      parameters: kwargs,
      scope: options.scope,
      cascadeDelete: options.cascadeDelete,
      iterationSize: options.iterationSize,
    });
    return { load: loaded, cleanup: cleaned };
  };
}

/** Stage that runs an analysis job with the run's parameters and update tag. */
export function analysisJob(job: StatementJob): SyncStage<JobSummary> {
  return (ctx) => runJob(ctx.store, job, { parameters: ctx.parameters, updateTag: ctx.updateTag });
}
