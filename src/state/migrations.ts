import { CURRENT_SCHEMA_VERSION } from "../types.js";
import type { Finding, FindingStatus, FindingV1, ReviewState, ReviewStateV1 } from "../types.js";
import { SchemaMigrationError } from "../errors.js";
import { normalizeCategory, normalizeSeverity } from "../categories.js";
import { computeContentFingerprint, deriveStableAnchor } from "../identity/hasher.js";

export type StateDocument = Record<string, unknown>;

export interface Migration {
  from: number;
  to: number;
  description: string;
  migrate(doc: StateDocument): StateDocument;
}

const EPOCH = new Date(0).toISOString();

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const V1_STATUSES: ReadonlySet<unknown> = new Set<FindingStatus>(["open", "resolved", "invalidated", "dismissed"]);

function isLineNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isFindingV1(value: unknown): value is FindingV1 {
  if (!isObject(value)) return false;
  const range = value.line_range;
  return (
    typeof value.id === "string" &&
    typeof value.file_path === "string" &&
    Array.isArray(range) && range.length === 2 &&
    isLineNumber(range[0]) && isLineNumber(range[1]) &&
    typeof value.category === "string" &&
    typeof value.severity === "string" &&
    typeof value.message === "string" &&
    V1_STATUSES.has(value.status)
  );
}

export function isReviewStateV1(value: unknown): value is ReviewStateV1 {
  if (!isObject(value)) return false;
  return (
    typeof value.pr_id === "string" &&
    typeof value.provider === "string" &&
    Array.isArray(value.findings)
  );
}

/** Split a schema-1 `owner/repo/123` identifier into repository and number. */
function parseLegacyPrId(prId: string): { repository: string; subject_number: number } {
  const match = prId.match(/^(.+)[/#](\d+)$/);
  if (!match) {
    throw new Error(`malformed pr_id "${prId}"`);
  }
  return { repository: match[1], subject_number: parseInt(match[2], 10) };
}

function migrateFindingV1(f: FindingV1, fallbackCreatedAt: string): Finding {
  const severity = normalizeSeverity(f.severity);
  const fingerprint = computeContentFingerprint(severity, f.message, f.suggestion);
  const createdAt = f.created_at ?? fallbackCreatedAt;
  const [a, b] = f.line_range;
  return {
    // Schema-1 ids were derived from absolute lines; they are kept so the record
    // identity never changes, and simply stop matching new candidates.
    id: f.id,
    file_path: f.file_path,
    line_range: { start: Math.min(a, b), end: Math.max(a, b) },
    category: normalizeCategory(f.category),
    severity,
    message: f.message,
    suggested_fix: f.suggestion ?? null,
    status: f.status,
    content_fingerprint: fingerprint,
    stable_anchor: deriveStableAnchor(undefined, fingerprint),
    first_seen_commit: null,
    last_seen_commit: null,
    created_at: createdAt,
    resolved_at: f.status === "open" ? null : f.resolved_at ?? createdAt,
  };
}

const v1ToV2: Migration = {
  from: 1,
  to: 2,
  description: "flat pr_id record with finding list -> subject key with finding map, pause window and history",
  migrate(doc) {
    if (!isReviewStateV1(doc)) {
      throw new Error("document is not a schema 1 review state");
    }

    const fallbackCreatedAt = doc.last_review_at ?? EPOCH;
    const findings: Record<string, Finding> = {};
    const rawFindings: readonly unknown[] = doc.findings;
    for (const raw of rawFindings) {
      if (!isFindingV1(raw)) {
        const id = isObject(raw) && typeof raw.id === "string" ? raw.id : "(no id)";
        throw new Error(`schema 1 finding ${id} has an unexpected shape`);
      }
      if (!findings[raw.id]) {
        findings[raw.id] = migrateFindingV1(raw, fallbackCreatedAt);
      }
    }

    return {
      schema_version: 2,
      subject: { provider: doc.provider, ...parseLegacyPrId(doc.pr_id) },
      findings,
      reviewed_commits: [...new Set(doc.reviewed_commits ?? [])],
      last_review_at: doc.last_review_at ?? null,
      paused: doc.paused === true,
      pause_until: null,
      paused_at: null,
      pending: [],
      history: [],
    } satisfies ReviewState;
  },
};

export const MIGRATIONS: readonly Migration[] = [v1ToV2];

/**
 * Schema version of a raw document. Records written before versioning have no
 * `schema_version` but carry a `pr_id`. Returns null when neither applies.
 */
export function detectSchemaVersion(doc: StateDocument): number | null {
  if (typeof doc.schema_version === "number" && Number.isInteger(doc.schema_version)) {
    return doc.schema_version;
  }
  if (typeof doc.pr_id === "string") return 1;
  return null;
}

/**
 * Run the migration chain from `fromVersion` up to `target`. Every failure is
 * reported as a SchemaMigrationError; the input document is never modified.
 */
export function migrateDocument(
  doc: StateDocument,
  fromVersion: number,
  key: string,
  migrations: readonly Migration[] = MIGRATIONS,
  target: number = CURRENT_SCHEMA_VERSION,
): StateDocument {
  if (fromVersion > target) {
    throw new SchemaMigrationError(key, fromVersion, target, "record was written by a newer engine");
  }

  let current: StateDocument = structuredClone(doc);
  let version = fromVersion;
  while (version < target) {
    const step = migrations.find((m) => m.from === version);
    if (!step) {
      throw new SchemaMigrationError(key, fromVersion, target, `no migration registered from schema ${version}`);
    }
    try {
      current = step.migrate(current);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SchemaMigrationError(key, fromVersion, target, `step ${step.from}->${step.to} failed: ${reason}`, { cause: err });
    }
    current.schema_version = step.to;
    version = step.to;
  }
  return current;
}
