import { createHash } from "node:crypto";
import type { ReviewState, ReviewStateV1, ReviewSubject } from "../types.js";
import type { CorruptRecordError } from "../errors.js";

export type LoadResult =
  | { kind: "found"; state: ReviewState; migratedFrom: number | null }
  | { kind: "not_found" }
  | { kind: "corrupt"; error: CorruptRecordError };

/**
 * Durable storage for one review state record per subject.
 *
 * A single `save` is all-or-nothing. Serialising read-merge-write cycles for
 * the same subject is the caller's job (see SubjectLock).
 */
export interface StateStore {
  /**
   * Load the record for a subject. Corrupt records are quarantined before
   * `corrupt` is returned; the stored bytes are left in place.
   * @throws StoreUnavailableError on I/O failure
   * @throws SchemaMigrationError when the record cannot be brought to the current schema
   */
  load(subject: ReviewSubject): Promise<LoadResult>;
  /**
   * Persist a record, migrating it first when it uses an older schema.
   * @throws StoreUnavailableError on I/O failure
   */
  save(state: ReviewState | ReviewStateV1): Promise<void>;
  /** Returns false when there was nothing to delete. */
  delete(subject: ReviewSubject): Promise<boolean>;
  close(): Promise<void>;
}

/** Short content digest used to name quarantined copies of corrupt records. */
export function contentDigest(raw: string): string {
  return createHash("sha256").update(raw).digest("hex").slice(0, 12);
}
