import { describe, expect, test } from "vitest";
import type { ChangeSet, Hunk } from "../types.js";
import { hasVanished, hunkOldRange, isTouched, rangesOverlap, renamedPath, shiftRange } from "./location.js";

function hunk(oldStart: number, oldLines: number, newLines: number, file = "a.ts"): Hunk {
  return { file_path: file, old_start: oldStart, old_lines: oldLines, new_start: oldStart, new_lines: newLines };
}

function changes(hunks: Hunk[], extra: Partial<ChangeSet> = {}): ChangeSet {
  return { hunks, deleted_files: [], ...extra };
}

describe("hunkOldRange", () => {
  test("covers the replaced lines", () => {
    expect(hunkOldRange(hunk(5, 3, 1))).toEqual({ start: 5, end: 7 });
  });

  test("a pure insertion touches its anchor line only", () => {
    expect(hunkOldRange(hunk(5, 0, 4))).toEqual({ start: 5, end: 5 });
  });
});

test("rangesOverlap is inclusive", () => {
  expect(rangesOverlap({ start: 1, end: 5 }, { start: 5, end: 9 })).toBe(true);
  expect(rangesOverlap({ start: 1, end: 4 }, { start: 5, end: 9 })).toBe(false);
});

describe("isTouched", () => {
  const set = changes([hunk(10, 2, 2), hunk(1, 1, 1, "b.ts")]);

  test("true when a hunk of the same file overlaps", () => {
    expect(isTouched(set, "a.ts", { start: 11, end: 15 })).toBe(true);
  });

  test("false for ranges beside the hunk or in other files", () => {
    expect(isTouched(set, "a.ts", { start: 12, end: 15 })).toBe(false);
    expect(isTouched(set, "c.ts", { start: 10, end: 10 })).toBe(false);
  });
});

describe("hasVanished", () => {
  test("a hunk that only removed the lines", () => {
    expect(hasVanished(changes([hunk(10, 5, 0)]), "a.ts", { start: 11, end: 13 })).toBe(true);
    expect(hasVanished(changes([hunk(10, 5, 1)]), "a.ts", { start: 11, end: 13 })).toBe(false);
  });

  test("a range past the end of the file", () => {
    const set = changes([], { file_line_counts: { "a.ts": 8 } });
    expect(hasVanished(set, "a.ts", { start: 9, end: 9 })).toBe(true);
    expect(hasVanished(set, "a.ts", { start: 8, end: 9 })).toBe(false);
  });

  test("a deleted file", () => {
    expect(hasVanished(changes([], { deleted_files: ["a.ts"] }), "a.ts", { start: 1, end: 1 })).toBe(true);
  });
});

describe("shiftRange", () => {
  test("insertions above move the range down", () => {
    expect(shiftRange(changes([hunk(3, 0, 2)]), "a.ts", { start: 10, end: 12 })).toEqual({ start: 12, end: 14 });
  });

  test("removals above move the range up", () => {
    expect(shiftRange(changes([hunk(4, 3, 1)]), "a.ts", { start: 10, end: 12 })).toEqual({ start: 8, end: 10 });
  });

  test("overlapping and later hunks leave it alone", () => {
    const range = { start: 10, end: 12 };
    expect(shiftRange(changes([hunk(11, 1, 3), hunk(20, 1, 5)]), "a.ts", range)).toBe(range);
  });
});

test("renamedPath follows renames", () => {
  const set = changes([], { renamed_files: { "old.ts": "new.ts" } });
  expect(renamedPath(set, "old.ts")).toBe("new.ts");
  expect(renamedPath(set, "other.ts")).toBe("other.ts");
});
