/**
 * schemagraph — declarative schema-driven upsert and stale-data cleanup for
 * property graphs.
 *
 * Collectors describe each entity type once (a node schema or a MatchLink),
 * hand rows to `load`, and call `runCleanup` with the same update tag to
 * remove whatever the run did not touch.
 */

// Schema
export { fromKwargs, fromRow, fromRowList, describeBinding } from "./schema/bindings.js";
export type {
  Binding,
  BindingInput,
  BindingList,
  FromRowOptions,
  MatchMode,
} from "./schema/bindings.js";
export {
  RESERVED_PROPERTIES,
  SUB_RESOURCE_ID_PROPERTY,
  SUB_RESOURCE_LABEL_PROPERTY,
  SUB_RESOURCE_REL_LABEL,
  allRelationships,
  defineMatchLink,
  defineNodeSchema,
  defineRelationship,
  relationshipKey,
  schemaName,
} from "./schema/model.js";
export type {
  GraphSchema,
  LinkDirection,
  MatchLinkSchema,
  MatchLinkSchemaInput,
  NodeSchema,
  NodeSchemaInput,
  RelationshipSchema,
  RelationshipSchemaInput,
} from "./schema/model.js";
export { loadRowsFile, loadSchemaFile, parseRows, parseSchemaDocument } from "./schema/document.js";

// Core
export {
  buildIngestionQuery,
  buildMatchLinkQuery,
  selectRelationships,
} from "./core/querybuilder.js";
export {
  buildIndexQueries,
  buildIndexQuery,
  deriveIndexes,
  ensureIndexes,
} from "./core/indexes.js";
export { buildCleanupJob, buildCleanupQueries, planCleanup, runCleanup } from "./core/cleanup.js";
export type { CleanupJob, CleanupOptions, CleanupScope } from "./core/cleanup.js";
export { DEFAULT_BATCH_SIZE, load, loadMatchLinks } from "./core/loader.js";
export type { LoadOptions, LoadSummary, MatchLinkLoadOptions } from "./core/loader.js";
export { loadStatementJobFile, parseStatementJob, runJob, runJobFile } from "./core/jobs.js";
export type { JobRunOptions, JobSummary, StatementJob } from "./core/jobs.js";
export { Sync, analysisJob, generateUpdateTag, syncEntity } from "./core/sync.js";
export type {
  EntitySyncOptions,
  EntitySyncResult,
  SyncContext,
  SyncRecord,
  SyncReport,
  SyncStage,
} from "./core/sync.js";

// Storage
export {
  InMemoryGraphStore,
  Neo4jGraphStore,
  SQLiteGraphStore,
  createStore,
  driverExecutor,
} from "./storage/index.js";
export type { CypherExecutor, CypherResult, CypherRunner, Neo4jConfig } from "./storage/index.js";

// Ambient
export { ConfigurationError, GraphStoreError } from "./errors.js";
export { DEFAULT_CONFIG, SchemaGraphConfigSchema, loadConfig, resolveConfig } from "./config.js";
export type { SchemaGraphConfig } from "./config.js";
export { createLogger, getLogger, setLogger } from "./logging.js";

export { LIMIT_SIZE_PARAMETER, UPDATE_TAG_PARAMETER, indexKey } from "./types.js";
export type * from "./types.js";
