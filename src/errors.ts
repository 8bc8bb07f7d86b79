/**
 * schemagraph — Error Types
 *
 * Two failure classes cross the public API:
 *   ConfigurationError — a malformed schema or call; raised before the store is touched
 *   GraphStoreError    — the backing store rejected a write or cleanup; wraps the native error
 *
 * A relationship whose endpoint is missing is not an error: it is counted as a
 * skip in the load summary and logged at info level.
 */

/** A schema or call is malformed. Never retried. */
export class ConfigurationError extends Error {
  /** Schema label (or MatchLink name) the problem was found in. */
  readonly schema: string;
  /** Offending field, binding or option, when one can be named. */
  readonly field: string | undefined;

  constructor(schema: string, field: string | undefined, message: string) {
    super(field ? `${schema}.${field}: ${message}` : `${schema}: ${message}`);
    this.name = "ConfigurationError";
    this.schema = schema;
    this.field = field;
  }
}

/** The backing store failed during a write or cleanup; the whole call was aborted. */
export class GraphStoreError extends Error {
  /** Load or cleanup job that failed, e.g. `load Widget` or `cleanup Widget`. */
  readonly job: string;

  constructor(job: string, message: string, options?: { cause?: unknown }) {
    super(`${job}: ${message}`, options);
    this.name = "GraphStoreError";
    this.job = job;
  }
}

/**
 * Wrap anything thrown by a store with the job it happened in. Configuration
 * errors pass through.
 */
export function wrapStoreError(job: string, err: unknown): Error {
  if (err instanceof ConfigurationError || err instanceof GraphStoreError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new GraphStoreError(job, message, { cause: err });
}

/** TypeBox error path to a field name: `/neo4j/uri` becomes `neo4j.uri`; the root has none. */
export function fieldFromPointer(path: string): string | undefined {
  const field = path.replace(/^\//, "").split("/").join(".");
  return field === "" ? undefined : field;
}
