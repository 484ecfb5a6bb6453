export type ErrorKind = "transient" | "permanent";

export type EngineErrorCode =
  | "corrupt_record"
  | "analysis_unavailable"
  | "store_unavailable"
  | "lock_timeout"
  | "schema_migration_failure";

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Persisted bytes for a subject could not be read back as a review state.
 * Carries the raw bytes and where they were quarantined.
 */
export class CorruptRecordError extends EngineError {
  readonly code = "corrupt_record";
  readonly retryable = false;

  constructor(
    readonly key: string,
    readonly raw: string,
    readonly quarantineRef: string | null,
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Corrupt review state for ${key}: ${reason}`, options);
  }
}

export class AnalysisUnavailableError extends EngineError {
  readonly code = "analysis_unavailable";
  readonly retryable = true;

  constructor(readonly key: string, options?: { cause?: unknown }) {
    super(`Analysis unavailable for ${key}: ${describeCause(options?.cause)}`, options);
  }
}

export class StoreUnavailableError extends EngineError {
  readonly code = "store_unavailable";
  readonly retryable = true;

  constructor(readonly key: string, readonly operation: "load" | "save" | "delete", options?: { cause?: unknown }) {
    super(`State store ${operation} failed for ${key}: ${describeCause(options?.cause)}`, options);
  }
}

export class LockTimeoutError extends EngineError {
  readonly code = "lock_timeout";
  readonly retryable = true;

  constructor(readonly key: string, readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for the review lock on ${key}`);
  }
}

export class SchemaMigrationError extends EngineError {
  readonly code = "schema_migration_failure";
  readonly retryable = false;

  constructor(
    readonly key: string,
    readonly fromVersion: number,
    readonly toVersion: number,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot migrate review state for ${key} from schema ${fromVersion} to ${toVersion}: ${reason}`, options);
  }
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return "unknown error";
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Classify a failure as transient (the caller may retry later) or permanent.
 * Engine errors carry their own verdict; anything else is treated as transient
 * unless its message names a condition a retry cannot fix.
 */
export function classifyError(err: unknown): ErrorKind {
  if (err instanceof EngineError) {
    return err.retryable ? "transient" : "permanent";
  }

  const message = err instanceof Error ? err.message : String(err);

  if (/EACCES|EPERM|EROFS/.test(message)) return "permanent";
  if (/invalid|validation/i.test(message)) return "permanent";

  return "transient";
}
