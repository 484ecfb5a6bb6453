import type {
  CandidateFinding,
  ChangeSet,
  Finding,
  FindingCategory,
  LineRange,
  ReconcileCounts,
  ReconcileResult,
  Severity,
} from "../types.js";
import { normalizeCategory, normalizeSeverity } from "../categories.js";
import { computeContentFingerprint, computeFindingId, deriveStableAnchor } from "../identity/hasher.js";
import { hasVanished, isTouched, rangesOverlap, renamedPath, shiftRange } from "./location.js";

export interface ReconcileInput {
  prior: Record<string, Finding>;
  candidates: CandidateFinding[];
  changes: ChangeSet;
  headCommit: string;
  now: string;
  nearMatch?: boolean;
}

interface PreparedCandidate {
  id: string;
  file_path: string;
  line_range: LineRange;
  category: FindingCategory;
  severity: Severity;
  message: string;
  suggested_fix: string | null;
  content_fingerprint: string;
  stable_anchor: string;
}

function isPositiveInt(n: unknown): n is number {
  return typeof n === "number" && Number.isInteger(n) && n > 0;
}

/**
 * Validate and normalise a raw candidate. Returns null when the candidate has
 * no usable location or message. Reversed ranges are swapped.
 */
export function prepareCandidate(candidate: CandidateFinding): PreparedCandidate | null {
  const { file_path, line_range, message } = candidate;
  if (typeof file_path !== "string" || file_path.trim() === "") return null;
  if (typeof message !== "string" || message.trim() === "") return null;
  if (!line_range || !isPositiveInt(line_range.start) || !isPositiveInt(line_range.end)) return null;

  const range: LineRange = line_range.start <= line_range.end
    ? { start: line_range.start, end: line_range.end }
    : { start: line_range.end, end: line_range.start };

  const category = normalizeCategory(typeof candidate.category === "string" ? candidate.category : "");
  const severity = normalizeSeverity(typeof candidate.severity === "string" ? candidate.severity : "");
  const suggestion = typeof candidate.suggestion === "string" && candidate.suggestion.trim() !== ""
    ? candidate.suggestion
    : null;
  const fingerprint = candidate.content_fingerprint?.trim()
    || computeContentFingerprint(severity, message, suggestion);
  const anchor = deriveStableAnchor(candidate.anchor, fingerprint);

  return {
    id: computeFindingId(file_path, category, anchor),
    file_path,
    line_range: range,
    category,
    severity,
    message,
    suggested_fix: suggestion,
    content_fingerprint: fingerprint,
    stable_anchor: anchor,
  };
}

function emptyCounts(): ReconcileCounts {
  return {
    opened: 0,
    refreshed: 0,
    reopened: 0,
    resolved: 0,
    invalidated: 0,
    unchanged: 0,
    deduplicated: 0,
    nearMatched: 0,
    skipped: 0,
  };
}

function sameRange(a: LineRange, b: LineRange): boolean {
  return a.start === b.start && a.end === b.end;
}

/**
 * Reconcile the prior findings of a subject against one analysis pass.
 *
 * Re-detected findings keep their id and are refreshed; dismissed ones stay
 * dismissed. Prior open findings that were not re-detected are invalidated when
 * their location vanished, resolved when a changed hunk covers them, and left
 * open otherwise. The input map is not modified.
 */
export function reconcile(input: ReconcileInput): ReconcileResult {
  const { changes, headCommit, now } = input;
  const counts = emptyCounts();
  const transitions: ReconcileResult["transitions"] = { opened: [], reopened: [], resolved: [], invalidated: [] };

  const findings: Record<string, Finding> = {};
  for (const [id, f] of Object.entries(input.prior)) {
    findings[id] = { ...f, line_range: { ...f.line_range } };
  }
  const priorOpenIds = Object.keys(findings)
    .filter((id) => findings[id].status === "open")
    .sort();

  const matched = new Set<string>();
  const batchIds = new Set<string>();
  const unmatched: PreparedCandidate[] = [];

  const applyMatch = (finding: Finding, candidate: PreparedCandidate): void => {
    matched.add(finding.id);
    finding.last_seen_commit = headCommit;

    let changed = false;
    if (!sameRange(finding.line_range, candidate.line_range)) {
      finding.line_range = { ...candidate.line_range };
      changed = true;
    }
    if (finding.content_fingerprint !== candidate.content_fingerprint) {
      finding.content_fingerprint = candidate.content_fingerprint;
      finding.message = candidate.message;
      finding.severity = candidate.severity;
      finding.suggested_fix = candidate.suggested_fix;
      changed = true;
    }

    if (finding.status === "resolved" || finding.status === "invalidated") {
      finding.status = "open";
      finding.resolved_at = null;
      counts.reopened++;
      transitions.reopened.push(finding.id);
    } else if (changed) {
      counts.refreshed++;
    } else {
      counts.unchanged++;
    }
  };

  // 1. Exact identity matches
  for (const raw of input.candidates) {
    const candidate = prepareCandidate(raw);
    if (!candidate) {
      counts.skipped++;
      continue;
    }
    if (batchIds.has(candidate.id)) {
      counts.deduplicated++;
      continue;
    }
    batchIds.add(candidate.id);

    const existing = findings[candidate.id];
    if (existing) {
      applyMatch(existing, candidate);
    } else {
      unmatched.push(candidate);
    }
  }

  // 2. Near matches: same file and category, overlapping range, anchor drifted
  const fresh: PreparedCandidate[] = [];
  for (const candidate of unmatched) {
    const near = input.nearMatch
      ? priorOpenIds.find((id) => {
          if (matched.has(id)) return false;
          const f = findings[id];
          return (
            f.category === candidate.category &&
            renamedPath(changes, f.file_path) === candidate.file_path &&
            rangesOverlap(shiftRange(changes, candidate.file_path, f.line_range), candidate.line_range)
          );
        })
      : undefined;

    if (near) {
      const f = findings[near];
      f.file_path = candidate.file_path;
      applyMatch(f, candidate);
      counts.nearMatched++;
    } else {
      fresh.push(candidate);
    }
  }

  for (const candidate of fresh) {
    findings[candidate.id] = {
      id: candidate.id,
      file_path: candidate.file_path,
      line_range: candidate.line_range,
      category: candidate.category,
      severity: candidate.severity,
      message: candidate.message,
      suggested_fix: candidate.suggested_fix,
      status: "open",
      content_fingerprint: candidate.content_fingerprint,
      stable_anchor: candidate.stable_anchor,
      first_seen_commit: headCommit,
      last_seen_commit: headCommit,
      created_at: now,
      resolved_at: null,
    };
    counts.opened++;
    transitions.opened.push(candidate.id);
  }

  // 3. Prior open findings the analysis did not re-emit
  for (const id of priorOpenIds) {
    if (matched.has(id)) continue;
    const f = findings[id];
    const path = renamedPath(changes, f.file_path);

    if (changes.deleted_files.includes(f.file_path) || hasVanished(changes, path, f.line_range)) {
      f.status = "invalidated";
      f.resolved_at = now;
      counts.invalidated++;
      transitions.invalidated.push(id);
    } else if (isTouched(changes, path, f.line_range)) {
      f.status = "resolved";
      f.resolved_at = now;
      counts.resolved++;
      transitions.resolved.push(id);
    } else {
      const shifted = shiftRange(changes, path, f.line_range);
      if (path !== f.file_path || !sameRange(shifted, f.line_range)) {
        f.file_path = path;
        f.line_range = shifted;
      }
      counts.unchanged++;
    }
  }

  return { findings, counts, transitions };
}

export function hasTransitions(counts: ReconcileCounts): boolean {
  return counts.opened + counts.refreshed + counts.reopened + counts.resolved + counts.invalidated > 0;
}
