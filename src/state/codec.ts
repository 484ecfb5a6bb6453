import { CURRENT_SCHEMA_VERSION } from "../types.js";
import type {
  Finding,
  Hunk,
  PendingChange,
  ReviewCycle,
  ReviewState,
  ReviewStateV1,
  ReviewSubject,
} from "../types.js";
import { CATEGORY_RULES } from "../categories.js";
import { SchemaMigrationError } from "../errors.js";
import { subjectKey } from "../identity/hasher.js";
import { detectSchemaVersion, isReviewStateV1, migrateDocument, type Migration, MIGRATIONS } from "./migrations.js";

export type DecodeResult =
  | { ok: true; state: ReviewState; migratedFrom: number | null }
  | { ok: false; reason: string };

const STATUSES = new Set(["open", "resolved", "invalidated", "dismissed"]);
const SEVERITIES = new Set(["info", "warning", "error"]);
const TRIGGERS = new Set(["push", "schedule", "review", "resume"]);

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isObject(value) && Object.values(value).every((v) => typeof v === "string");
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function isReviewSubject(value: unknown): value is ReviewSubject {
  return (
    isObject(value) &&
    typeof value.provider === "string" &&
    typeof value.repository === "string" &&
    typeof value.subject_number === "number"
  );
}

function isFinding(value: unknown, id: string): value is Finding {
  if (!isObject(value)) return false;
  const range = value.line_range;
  return (
    value.id === id &&
    typeof value.file_path === "string" &&
    isObject(range) && typeof range.start === "number" && typeof range.end === "number" &&
    typeof value.category === "string" && Object.prototype.hasOwnProperty.call(CATEGORY_RULES, value.category) &&
    typeof value.severity === "string" && SEVERITIES.has(value.severity) &&
    typeof value.message === "string" &&
    isNullableString(value.suggested_fix) &&
    typeof value.status === "string" && STATUSES.has(value.status) &&
    typeof value.content_fingerprint === "string" &&
    typeof value.stable_anchor === "string" &&
    isNullableString(value.first_seen_commit) &&
    isNullableString(value.last_seen_commit) &&
    typeof value.created_at === "string" &&
    isNullableString(value.resolved_at)
  );
}

function isHunk(value: unknown): value is Hunk {
  return (
    isObject(value) &&
    typeof value.file_path === "string" &&
    isCount(value.old_start) && isCount(value.old_lines) &&
    isCount(value.new_start) && isCount(value.new_lines)
  );
}

function isPendingChange(value: unknown): value is PendingChange {
  return (
    isObject(value) &&
    typeof value.head_commit === "string" &&
    isStringArray(value.commits) &&
    typeof value.recorded_at === "string" &&
    Array.isArray(value.hunks) && value.hunks.every(isHunk) &&
    isStringArray(value.deleted_files) &&
    isStringRecord(value.renamed_files)
  );
}

function isReviewCycle(value: unknown): value is ReviewCycle {
  return (
    isObject(value) &&
    typeof value.at === "string" &&
    typeof value.trigger === "string" && TRIGGERS.has(value.trigger) &&
    typeof value.head_commit === "string" &&
    isStringArray(value.commits) &&
    isCount(value.opened) && isCount(value.refreshed) && isCount(value.reopened) &&
    isCount(value.resolved) && isCount(value.invalidated) && isCount(value.pruned) &&
    typeof value.state_reset === "boolean"
  );
}

/** Shape check for a current-schema document. Returns the first problem found. */
export function validateState(value: unknown): string | null {
  if (!isObject(value)) return "document is not an object";
  if (value.schema_version !== CURRENT_SCHEMA_VERSION) return `unexpected schema_version ${String(value.schema_version)}`;
  if (!isReviewSubject(value.subject)) return "subject is missing or malformed";
  if (!isObject(value.findings)) return "findings is not a map";
  for (const [id, finding] of Object.entries(value.findings)) {
    if (!isFinding(finding, id)) return `finding ${id} is malformed`;
  }
  if (!isStringArray(value.reviewed_commits)) return "reviewed_commits is not a list of commit refs";
  if (!isNullableString(value.last_review_at)) return "last_review_at is malformed";
  if (typeof value.paused !== "boolean") return "paused is not a boolean";
  if (!isNullableString(value.pause_until)) return "pause_until is malformed";
  if (!isNullableString(value.paused_at)) return "paused_at is malformed";
  if (!Array.isArray(value.pending) || !value.pending.every(isPendingChange)) return "pending is malformed";
  if (!Array.isArray(value.history) || !value.history.every(isReviewCycle)) return "history is malformed";
  return null;
}

function isValidState(value: unknown): value is ReviewState {
  return validateState(value) === null;
}

/**
 * Parse persisted bytes. Unreadable or malformed documents come back as
 * `{ok: false}`; documents from an older schema are migrated and documents
 * the engine cannot migrate throw SchemaMigrationError.
 */
export function decodeState(raw: string, key: string, migrations: readonly Migration[] = MIGRATIONS): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  if (!isObject(parsed)) {
    return { ok: false, reason: "document is not an object" };
  }

  const version = detectSchemaVersion(parsed);
  if (version === null) {
    return { ok: false, reason: "document has no schema_version" };
  }

  const doc = version === CURRENT_SCHEMA_VERSION ? parsed : migrateDocument(parsed, version, key, migrations);
  const problem = validateState(doc);
  if (problem !== null || !isValidState(doc)) {
    const reason = problem ?? "document is malformed";
    // A migrated record that fails validation is a migration bug, not corruption
    if (version !== CURRENT_SCHEMA_VERSION) {
      throw new SchemaMigrationError(key, version, CURRENT_SCHEMA_VERSION, `migrated record is invalid: ${reason}`);
    }
    return { ok: false, reason };
  }
  return { ok: true, state: doc, migratedFrom: version === CURRENT_SCHEMA_VERSION ? null : version };
}

/**
 * Bring a record up to the current schema before it is persisted. Records
 * already at the current version pass through untouched.
 */
export function upgradeForSave(
  state: ReviewState | ReviewStateV1,
  migrations: readonly Migration[] = MIGRATIONS,
): ReviewState {
  if (!isReviewStateV1(state) && state.schema_version === CURRENT_SCHEMA_VERSION) {
    return state;
  }

  const doc: Record<string, unknown> = { ...state };
  const version = detectSchemaVersion(doc) ?? 1;
  const key = isReviewStateV1(state) ? `${state.provider}:${state.pr_id}` : subjectKey(state.subject);
  const migrated = migrateDocument(doc, version, key, migrations);
  const problem = validateState(migrated);
  if (problem !== null || !isValidState(migrated)) {
    throw new SchemaMigrationError(key, version, CURRENT_SCHEMA_VERSION, `migrated record is invalid: ${problem ?? "document is malformed"}`);
  }
  return migrated;
}

function sortRecord<T>(record: Record<string, T>): Record<string, T> {
  const sorted: Record<string, T> = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = record[key];
  }
  return sorted;
}

/**
 * Canonical JSON for a state: fixed field order and findings sorted by id, so
 * equal states always serialise to equal bytes.
 */
export function encodeState(state: ReviewState): string {
  const findings: Record<string, Finding> = {};
  for (const [id, f] of Object.entries(sortRecord(state.findings))) {
    findings[id] = {
      id: f.id,
      file_path: f.file_path,
      line_range: { start: f.line_range.start, end: f.line_range.end },
      category: f.category,
      severity: f.severity,
      message: f.message,
      suggested_fix: f.suggested_fix,
      status: f.status,
      content_fingerprint: f.content_fingerprint,
      stable_anchor: f.stable_anchor,
      first_seen_commit: f.first_seen_commit,
      last_seen_commit: f.last_seen_commit,
      created_at: f.created_at,
      resolved_at: f.resolved_at,
    };
  }

  const doc: ReviewState = {
    schema_version: state.schema_version,
    subject: {
      provider: state.subject.provider,
      repository: state.subject.repository,
      subject_number: state.subject.subject_number,
    },
    findings,
    reviewed_commits: state.reviewed_commits,
    last_review_at: state.last_review_at,
    paused: state.paused,
    pause_until: state.pause_until,
    paused_at: state.paused_at,
    pending: state.pending.map((p) => ({
      head_commit: p.head_commit,
      commits: p.commits,
      recorded_at: p.recorded_at,
      hunks: p.hunks.map((h) => ({
        file_path: h.file_path,
        old_start: h.old_start,
        old_lines: h.old_lines,
        new_start: h.new_start,
        new_lines: h.new_lines,
      })),
      deleted_files: p.deleted_files,
      renamed_files: sortRecord(p.renamed_files),
    })),
    history: state.history,
  };
  return JSON.stringify(doc, null, 2);
}

/** Empty state synthesised for a subject with no (readable) record. */
export function emptyState(subject: ReviewSubject): ReviewState {
  return {
    schema_version: CURRENT_SCHEMA_VERSION,
    subject: {
      provider: subject.provider,
      repository: subject.repository,
      subject_number: subject.subject_number,
    },
    findings: {},
    reviewed_commits: [],
    last_review_at: null,
    paused: false,
    pause_until: null,
    paused_at: null,
    pending: [],
    history: [],
  };
}
