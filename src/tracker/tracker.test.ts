import { describe, expect, test } from "vitest";
import type { CandidateFinding, ChangeSet, Finding } from "../types.js";
import { prepareCandidate, reconcile } from "./tracker.js";

const T0 = "2026-03-01T10:00:00.000Z";
const T1 = "2026-03-02T10:00:00.000Z";
const NO_CHANGES: ChangeSet = { hunks: [], deleted_files: [] };

function makeCandidate(overrides: Partial<CandidateFinding> = {}): CandidateFinding {
  return {
    file_path: "file.py",
    line_range: { start: 10, end: 12 },
    category: "bug",
    severity: "warning",
    message: "Result of parse() is never checked",
    anchor: { symbol: "load_config", snippet: "cfg = parse(raw)" },
    ...overrides,
  };
}

/** One finding, opened at T0 by commit c1. */
function seed(candidate: CandidateFinding = makeCandidate()): { findings: Record<string, Finding>; id: string } {
  const result = reconcile({ prior: {}, candidates: [candidate], changes: NO_CHANGES, headCommit: "c1", now: T0 });
  const [id] = Object.keys(result.findings);
  return { findings: result.findings, id };
}

function withStatus(findings: Record<string, Finding>, id: string, status: Finding["status"]): Record<string, Finding> {
  return { ...findings, [id]: { ...findings[id], status, resolved_at: status === "open" ? null : T0 } };
}

describe("prepareCandidate", () => {
  test("normalises category and severity aliases", () => {
    const prepared = prepareCandidate(makeCandidate({ category: "Error Handling", severity: "critical" }));
    expect(prepared?.category).toBe("reliability");
    expect(prepared?.severity).toBe("error");
  });

  test.each(["constructor", "toString", "__proto__", "hasOwnProperty"])(
    "the built-in object key %s falls back to other and info",
    (name) => {
      const prepared = prepareCandidate(makeCandidate({ category: name, severity: name }));
      expect(prepared?.category).toBe("other");
      expect(prepared?.severity).toBe("info");
    },
  );

  test("findings with built-in object keys as category survive a JSON round trip", () => {
    const { findings, id } = seed(makeCandidate({ category: "constructor", severity: "valueOf" }));
    const reloaded: Record<string, Finding> = JSON.parse(JSON.stringify(findings));
    expect(reloaded[id].category).toBe("other");
    expect(reloaded[id].severity).toBe("info");
  });

  test("swaps reversed ranges", () => {
    expect(prepareCandidate(makeCandidate({ line_range: { start: 12, end: 10 } }))?.line_range).toEqual({ start: 10, end: 12 });
  });

  test("rejects candidates without a usable location or message", () => {
    expect(prepareCandidate(makeCandidate({ file_path: " " }))).toBeNull();
    expect(prepareCandidate(makeCandidate({ message: "" }))).toBeNull();
    expect(prepareCandidate(makeCandidate({ line_range: { start: 0, end: 3 } }))).toBeNull();
    expect(prepareCandidate(makeCandidate({ line_range: { start: 1.5, end: 3 } }))).toBeNull();
  });

  test("ids do not depend on line numbers", () => {
    const a = prepareCandidate(makeCandidate());
    const b = prepareCandidate(makeCandidate({ line_range: { start: 40, end: 42 } }));
    expect(a?.id).toBe(b?.id);
  });

  test("empty suggestion is stored as null", () => {
    expect(prepareCandidate(makeCandidate({ suggestion: "   " }))?.suggested_fix).toBeNull();
  });
});

describe("reconcile", () => {
  test("opens a new finding on an empty state", () => {
    const result = reconcile({ prior: {}, candidates: [makeCandidate()], changes: NO_CHANGES, headCommit: "c1", now: T0 });
    const findings = Object.values(result.findings);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      file_path: "file.py",
      line_range: { start: 10, end: 12 },
      status: "open",
      first_seen_commit: "c1",
      last_seen_commit: "c1",
      created_at: T0,
      resolved_at: null,
    });
    expect(result.counts.opened).toBe(1);
    expect(result.transitions.opened).toEqual([findings[0].id]);
  });

  test("resolves an open finding whose lines were changed and not re-reported", () => {
    const { findings, id } = seed();
    const changes: ChangeSet = {
      hunks: [{ file_path: "file.py", old_start: 1, old_lines: 20, new_start: 1, new_lines: 22 }],
      deleted_files: [],
    };
    const result = reconcile({ prior: findings, candidates: [], changes, headCommit: "c2", now: T1 });

    expect(result.findings[id].status).toBe("resolved");
    expect(result.findings[id].resolved_at).toBe(T1);
    expect(result.counts.resolved).toBe(1);
  });

  test("keeps a finding open when only other files changed", () => {
    const { findings, id } = seed();
    const changes: ChangeSet = {
      hunks: [{ file_path: "other.py", old_start: 1, old_lines: 20, new_start: 1, new_lines: 20 }],
      deleted_files: [],
    };
    const result = reconcile({ prior: findings, candidates: [], changes, headCommit: "c2", now: T1 });

    expect(result.findings[id].status).toBe("open");
    expect(result.findings[id].line_range).toEqual({ start: 10, end: 12 });
    expect(result.counts.unchanged).toBe(1);
  });

  test("invalidates findings in deleted files", () => {
    const { findings, id } = seed();
    const result = reconcile({
      prior: findings,
      candidates: [],
      changes: { hunks: [], deleted_files: ["file.py"] },
      headCommit: "c2",
      now: T1,
    });
    expect(result.findings[id].status).toBe("invalidated");
    expect(result.findings[id].resolved_at).toBe(T1);
  });

  test("invalidates findings whose lines were removed outright", () => {
    const { findings, id } = seed();
    const changes: ChangeSet = {
      hunks: [{ file_path: "file.py", old_start: 8, old_lines: 10, new_start: 7, new_lines: 0 }],
      deleted_files: [],
    };
    const result = reconcile({ prior: findings, candidates: [], changes, headCommit: "c2", now: T1 });
    expect(result.findings[id].status).toBe("invalidated");
    expect(result.counts.invalidated).toBe(1);
  });

  test("invalidates findings past the end of a truncated file", () => {
    const { findings, id } = seed();
    const result = reconcile({
      prior: findings,
      candidates: [],
      changes: { hunks: [], deleted_files: [], file_line_counts: { "file.py": 5 } },
      headCommit: "c2",
      now: T1,
    });
    expect(result.findings[id].status).toBe("invalidated");
  });

  test("shifts untouched findings below an insertion", () => {
    const { findings, id } = seed();
    const changes: ChangeSet = {
      hunks: [
        { file_path: "file.py", old_start: 2, old_lines: 0, new_start: 3, new_lines: 4 },
        { file_path: "file.py", old_start: 30, old_lines: 2, new_start: 34, new_lines: 9 },
      ],
      deleted_files: [],
    };
    const result = reconcile({ prior: findings, candidates: [], changes, headCommit: "c2", now: T1 });

    expect(result.findings[id].status).toBe("open");
    expect(result.findings[id].line_range).toEqual({ start: 14, end: 16 });
  });

  test("follows renamed files without changing the id", () => {
    const { findings, id } = seed();
    const result = reconcile({
      prior: findings,
      candidates: [],
      changes: { hunks: [], deleted_files: [], renamed_files: { "file.py": "lib/file.py" } },
      headCommit: "c2",
      now: T1,
    });
    expect(result.findings[id].file_path).toBe("lib/file.py");
    expect(result.findings[id].status).toBe("open");
  });

  test("a re-detected finding keeps its id and refreshes its location", () => {
    const { findings, id } = seed();
    const result = reconcile({
      prior: findings,
      candidates: [makeCandidate({ line_range: { start: 14, end: 16 } })],
      changes: { hunks: [{ file_path: "file.py", old_start: 2, old_lines: 0, new_start: 3, new_lines: 4 }], deleted_files: [] },
      headCommit: "c2",
      now: T1,
    });

    expect(Object.keys(result.findings)).toEqual([id]);
    expect(result.findings[id]).toMatchObject({
      line_range: { start: 14, end: 16 },
      first_seen_commit: "c1",
      last_seen_commit: "c2",
      created_at: T0,
    });
    expect(result.counts.refreshed).toBe(1);
    expect(result.counts.opened).toBe(0);
  });

  test("a reworded message refreshes content only when the fingerprint changes", () => {
    const { findings, id } = seed();
    const result = reconcile({
      prior: findings,
      candidates: [makeCandidate({ message: "parse() may return None here", severity: "error" })],
      changes: NO_CHANGES,
      headCommit: "c2",
      now: T1,
    });
    expect(result.findings[id].message).toBe("parse() may return None here");
    expect(result.findings[id].severity).toBe("error");
    expect(result.counts.refreshed).toBe(1);
  });

  test("re-detection with identical content counts as unchanged", () => {
    const { findings } = seed();
    const result = reconcile({ prior: findings, candidates: [makeCandidate()], changes: NO_CHANGES, headCommit: "c1", now: T1 });
    expect(result.counts).toMatchObject({ unchanged: 1, opened: 0, refreshed: 0, resolved: 0 });
  });

  test("dismissed findings stay dismissed when reported again", () => {
    const seeded = seed();
    const prior = withStatus(seeded.findings, seeded.id, "dismissed");
    const result = reconcile({ prior, candidates: [makeCandidate()], changes: NO_CHANGES, headCommit: "c2", now: T1 });

    expect(result.findings[seeded.id].status).toBe("dismissed");
    expect(result.findings[seeded.id].resolved_at).toBe(T0);
    expect(result.counts.reopened).toBe(0);
  });

  test("dismissed findings are not resolved by changes either", () => {
    const seeded = seed();
    const prior = withStatus(seeded.findings, seeded.id, "dismissed");
    const result = reconcile({ prior, candidates: [], changes: { hunks: [], deleted_files: ["file.py"] }, headCommit: "c2", now: T1 });
    expect(result.findings[seeded.id].status).toBe("dismissed");
  });

  test("reopens resolved findings that are reported again", () => {
    const seeded = seed();
    const prior = withStatus(seeded.findings, seeded.id, "resolved");
    const result = reconcile({ prior, candidates: [makeCandidate()], changes: NO_CHANGES, headCommit: "c3", now: T1 });

    expect(result.findings[seeded.id].status).toBe("open");
    expect(result.findings[seeded.id].resolved_at).toBeNull();
    expect(result.transitions.reopened).toEqual([seeded.id]);
  });

  test("collapses duplicate candidates in one batch", () => {
    const result = reconcile({
      prior: {},
      candidates: [makeCandidate(), makeCandidate({ line_range: { start: 11, end: 11 } })],
      changes: NO_CHANGES,
      headCommit: "c1",
      now: T0,
    });
    expect(Object.keys(result.findings)).toHaveLength(1);
    expect(Object.values(result.findings)[0].line_range).toEqual({ start: 10, end: 12 });
    expect(result.counts.deduplicated).toBe(1);
  });

  test("counts invalid candidates as skipped", () => {
    const result = reconcile({
      prior: {},
      candidates: [makeCandidate({ line_range: { start: -1, end: 2 } })],
      changes: NO_CHANGES,
      headCommit: "c1",
      now: T0,
    });
    expect(result.findings).toEqual({});
    expect(result.counts.skipped).toBe(1);
  });

  test("does not modify the prior map", () => {
    const { findings, id } = seed();
    const before = structuredClone(findings);
    reconcile({ prior: findings, candidates: [], changes: { hunks: [], deleted_files: ["file.py"] }, headCommit: "c2", now: T1 });
    expect(findings).toEqual(before);
    expect(findings[id].status).toBe("open");
  });

  describe("near-match pass", () => {
    const drifted = makeCandidate({ anchor: { symbol: "load_config", snippet: "cfg = parse(raw, strict=True)" }, line_range: { start: 11, end: 13 } });

    test("is off by default: a drifted anchor opens a second finding", () => {
      const { findings, id } = seed();
      const result = reconcile({ prior: findings, candidates: [drifted], changes: NO_CHANGES, headCommit: "c2", now: T1 });

      expect(Object.keys(result.findings)).toHaveLength(2);
      expect(result.findings[id].status).toBe("open");
      expect(result.counts.opened).toBe(1);
    });

    test("adopts the prior id when enabled", () => {
      const { findings, id } = seed();
      const result = reconcile({ prior: findings, candidates: [drifted], changes: NO_CHANGES, headCommit: "c2", now: T1, nearMatch: true });

      expect(Object.keys(result.findings)).toEqual([id]);
      expect(result.findings[id].line_range).toEqual({ start: 11, end: 13 });
      expect(result.findings[id].last_seen_commit).toBe("c2");
      expect(result.counts.nearMatched).toBe(1);
      expect(result.counts.opened).toBe(0);
    });

    test("requires the same category", () => {
      const { findings } = seed();
      const result = reconcile({
        prior: findings,
        candidates: [{ ...drifted, category: "style" }],
        changes: NO_CHANGES,
        headCommit: "c2",
        now: T1,
        nearMatch: true,
      });
      expect(Object.keys(result.findings)).toHaveLength(2);
    });
  });
});
