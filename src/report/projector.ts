import { createHash } from "node:crypto";
import type { Finding, Report, ReportFinding, ReviewState, SummaryCounts } from "../types.js";
import { SEVERITY_RANK } from "../categories.js";
import { subjectKey } from "../identity/hasher.js";

function toReportFinding(f: Finding): ReportFinding {
  return {
    id: f.id,
    file_path: f.file_path,
    line_range: { start: f.line_range.start, end: f.line_range.end },
    category: f.category,
    severity: f.severity,
    status: f.status,
    message: f.message,
    suggested_fix: f.suggested_fix,
    first_seen_commit: f.first_seen_commit,
    last_seen_commit: f.last_seen_commit,
    resolved_at: f.resolved_at,
  };
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Severity desc, then file, then range, then id. */
function compareActive(a: Finding, b: Finding): number {
  return (
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    compareText(a.file_path, b.file_path) ||
    a.line_range.start - b.line_range.start ||
    a.line_range.end - b.line_range.end ||
    compareText(a.id, b.id)
  );
}

/** Most recently closed first; findings without a timestamp last. */
function compareClosed(a: Finding, b: Finding): number {
  return compareText(b.resolved_at ?? "", a.resolved_at ?? "") || compareText(a.id, b.id);
}

function summarize(findings: Finding[]): SummaryCounts {
  const counts: SummaryCounts = {
    open: 0,
    resolved: 0,
    invalidated: 0,
    dismissed: 0,
    by_severity: { error: 0, warning: 0, info: 0 },
  };
  for (const f of findings) {
    counts[f.status]++;
    if (f.status === "open") counts.by_severity[f.severity]++;
  }
  return counts;
}

/**
 * Pure projection of a review state into the report shown to humans. The same
 * state always yields the same report; nothing here reads the clock.
 */
export function project(state: ReviewState, historyLimit: number): Report {
  const findings = Object.values(state.findings);
  const active = findings.filter((f) => f.status === "open").sort(compareActive);
  const closed = findings.filter((f) => f.status !== "open").sort(compareClosed);
  const history = state.history.slice(Math.max(0, state.history.length - historyLimit)).reverse();

  return {
    subject: subjectKey(state.subject),
    summary_counts: summarize(findings),
    active_findings: active.map(toReportFinding),
    resolved_findings: closed.map(toReportFinding),
    history,
    paused: state.paused ? { until: state.pause_until } : null,
    last_updated: state.history.at(-1)?.at ?? state.last_review_at,
  };
}

/** sha256 over the report JSON; equal reports give equal digests. */
export function reportDigest(report: Report): string {
  return createHash("sha256").update(JSON.stringify(report)).digest("hex");
}
