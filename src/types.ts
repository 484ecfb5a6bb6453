// --- Configuration ---

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface StateConfig {
  backend: "file" | "sqlite";
  dir: string;
  dbPath: string;
}

export interface LockConfig {
  backend: "memory" | "file";
  timeoutMs: number;
  staleMs: number;
  dir: string;
}

export interface RetentionConfig {
  expiryDays: number;
}

export interface PauseConfig {
  defaultDurationMs: number | null; // null = pause until explicit resume
  maxDurationMs: number;
}

export interface TrackerConfig {
  nearMatch: boolean;
}

export interface HistoryConfig {
  maxEntries: number;
}

export interface ReportConfig {
  historyLimit: number;
  commentTag: string;
}

export interface CommandConfig {
  prefix: string;
}

export interface EngineConfig {
  state: StateConfig;
  lock: LockConfig;
  retention: RetentionConfig;
  pause: PauseConfig;
  tracker: TrackerConfig;
  history: HistoryConfig;
  report: ReportConfig;
  commands: CommandConfig;
  logLevel: LogLevel;
}

// --- Review subject ---

export interface ReviewSubject {
  readonly provider: string;
  readonly repository: string;
  readonly subject_number: number;
}

// --- Findings ---

export type FindingCategory =
  | "security"
  | "bug"
  | "performance"
  | "reliability"
  | "maintainability"
  | "style"
  | "documentation"
  | "testing"
  | "other";

export type Severity = "info" | "warning" | "error";

export type FindingStatus = "open" | "resolved" | "invalidated" | "dismissed";

export type TerminalStatus = Exclude<FindingStatus, "open">;

export interface LineRange {
  start: number;
  end: number;
}

export interface Finding {
  readonly id: string;
  file_path: string;
  line_range: LineRange;
  readonly category: FindingCategory;
  severity: Severity;
  message: string;
  suggested_fix: string | null;
  status: FindingStatus;
  content_fingerprint: string;
  readonly stable_anchor: string;
  readonly first_seen_commit: string | null;
  last_seen_commit: string | null;
  readonly created_at: string;
  resolved_at: string | null;
}

/** Where a candidate sits in the code, independent of absolute line numbers. */
export interface CandidateAnchor {
  /** Enclosing logical unit, e.g. a function or class name. */
  symbol?: string;
  /** Source text of the flagged lines. */
  snippet?: string;
}

/** Raw finding as produced by the analysis layer. */
export interface CandidateFinding {
  file_path: string;
  line_range: LineRange;
  category: string;
  severity: string;
  message: string;
  suggestion?: string | null;
  content_fingerprint?: string;
  anchor?: CandidateAnchor;
}

// --- Change sets ---

/** Unified-diff hunk. `old*` coordinates refer to the last reviewed revision. */
export interface Hunk {
  file_path: string;
  old_start: number;
  old_lines: number;
  new_start: number;
  new_lines: number;
}

export interface ChangeSet {
  hunks: Hunk[];
  deleted_files: string[];
  /** old path -> new path */
  renamed_files?: Record<string, string>;
  /** Current line count per file, when the host knows it. */
  file_line_counts?: Record<string, number>;
}

// --- Persisted state ---

export type TriggerKind = "push" | "schedule" | "review" | "resume";

/** An automatic trigger received while paused, waiting for the next merge. */
export interface PendingChange {
  head_commit: string;
  commits: string[];
  recorded_at: string;
  hunks: Hunk[];
  deleted_files: string[];
  renamed_files: Record<string, string>;
}

export interface ReviewCycle {
  at: string;
  trigger: TriggerKind;
  head_commit: string;
  commits: string[];
  opened: number;
  refreshed: number;
  reopened: number;
  resolved: number;
  invalidated: number;
  pruned: number;
  state_reset: boolean;
}

export const CURRENT_SCHEMA_VERSION = 2;

export interface ReviewState {
  schema_version: number;
  subject: ReviewSubject;
  findings: Record<string, Finding>;
  reviewed_commits: string[];
  last_review_at: string | null;
  paused: boolean;
  pause_until: string | null;
  paused_at: string | null;
  pending: PendingChange[];
  history: ReviewCycle[];
}

// Schema 1: the flat layout written before finding identity was content-addressed.
export interface FindingV1 {
  id: string;
  file_path: string;
  line_range: [number, number];
  category: string;
  severity: string;
  message: string;
  suggestion: string | null;
  status: FindingStatus;
  created_at: string | null;
  resolved_at: string | null;
}

export interface ReviewStateV1 {
  schema_version?: 1;
  pr_id: string; // "owner/repo/123"
  provider: string;
  findings: FindingV1[];
  reviewed_commits: string[];
  last_review_at: string | null;
  paused: boolean;
  conversation_history?: unknown[];
  metadata?: Record<string, unknown>;
}

// --- Tracker ---

export interface ReconcileCounts {
  opened: number;
  refreshed: number;
  reopened: number;
  resolved: number;
  invalidated: number;
  unchanged: number;
  deduplicated: number;
  nearMatched: number;
  skipped: number;
}

export interface ReconcileResult {
  findings: Record<string, Finding>;
  counts: ReconcileCounts;
  /** Ids touched this cycle, grouped by what happened to them. */
  transitions: {
    opened: string[];
    reopened: string[];
    resolved: string[];
    invalidated: string[];
  };
}

// --- Lifecycle ---

export interface TriggerDecision {
  shouldMerge: boolean;
  reason: string;
  autoResumed: boolean;
}

export interface TriggerInput {
  subject: ReviewSubject;
  trigger: TriggerKind;
  headCommit: string;
  /** New commits in this event, oldest first. Defaults to [headCommit]. */
  commits?: string[];
  changes: ChangeSet;
}

export interface MergeInput extends TriggerInput {
  candidates: CandidateFinding[];
}

export type WarningCode = "state_reset" | "candidates_skipped" | "migrated";

export interface EngineWarning {
  code: WarningCode;
  message: string;
  ref?: string;
}

export type MergeStatus = "merged" | "deferred";

export interface MergeOutcome {
  status: MergeStatus;
  state: ReviewState;
  cycle: ReviewCycle | null;
  counts: ReconcileCounts | null;
  warnings: EngineWarning[];
  stateReset: boolean;
}

export interface TriggerPlan {
  decision: TriggerDecision;
  sinceCommit: string | null;
  /** Pending changes accumulated while paused, merged with the new event. */
  changes: ChangeSet;
  warnings: EngineWarning[];
}

// --- Report ---

export interface SummaryCounts {
  open: number;
  resolved: number;
  invalidated: number;
  dismissed: number;
  by_severity: Record<Severity, number>;
}

export interface ReportFinding {
  id: string;
  file_path: string;
  line_range: LineRange;
  category: FindingCategory;
  severity: Severity;
  status: FindingStatus;
  message: string;
  suggested_fix: string | null;
  first_seen_commit: string | null;
  last_seen_commit: string | null;
  resolved_at: string | null;
}

export interface Report {
  subject: string;
  summary_counts: SummaryCounts;
  active_findings: ReportFinding[];
  resolved_findings: ReportFinding[];
  history: ReviewCycle[];
  paused: { until: string | null } | null;
  last_updated: string | null;
}

// --- External collaborators ---

export interface AnalysisRequest {
  subject: ReviewSubject;
  headCommit: string;
  sinceCommit: string | null;
  changes: ChangeSet;
  signal?: AbortSignal;
}

export interface AnalysisSupplier {
  analyze(request: AnalysisRequest): Promise<CandidateFinding[]>;
}

export interface PublishedReport {
  subject: ReviewSubject;
  report: Report;
  body: string;
  digest: string;
}

/** Publishes one persistent comment per subject; must update in place. */
export interface HostingClient {
  publish(report: PublishedReport): Promise<void>;
}
