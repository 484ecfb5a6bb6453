import type { ChangeSet, Hunk, LineRange } from "../types.js";

export function rangesOverlap(a: LineRange, b: LineRange): boolean {
  return a.start <= b.end && b.start <= a.end;
}

/**
 * Lines a hunk replaced on the old side. A pure insertion (`old_lines` = 0)
 * sits after `old_start`, so it is treated as touching that line only.
 */
export function hunkOldRange(hunk: Hunk): LineRange {
  if (hunk.old_lines === 0) {
    return { start: hunk.old_start, end: hunk.old_start };
  }
  return { start: hunk.old_start, end: hunk.old_start + hunk.old_lines - 1 };
}

export function hunksForFile(changes: ChangeSet, filePath: string): Hunk[] {
  return changes.hunks.filter((h) => h.file_path === filePath);
}

export function isTouched(changes: ChangeSet, filePath: string, range: LineRange): boolean {
  return hunksForFile(changes, filePath).some((h) => rangesOverlap(hunkOldRange(h), range));
}

/**
 * True when the location no longer exists in the new revision: the file was
 * deleted, a hunk removed every line of the range without adding any, or the
 * range starts past the current end of the file.
 */
export function hasVanished(changes: ChangeSet, filePath: string, range: LineRange): boolean {
  if (changes.deleted_files.includes(filePath)) return true;

  const removed = hunksForFile(changes, filePath).some((h) => {
    if (h.new_lines > 0 || h.old_lines === 0) return false;
    const old = hunkOldRange(h);
    return old.start <= range.start && old.end >= range.end;
  });
  if (removed) return true;

  const lineCount = changes.file_line_counts?.[filePath];
  return lineCount !== undefined && range.start > lineCount;
}

/**
 * Move a range by the net line delta of hunks that end above it. Hunks that
 * overlap the range leave it where it is; the caller decides what a touched
 * finding means.
 */
export function shiftRange(changes: ChangeSet, filePath: string, range: LineRange): LineRange {
  let delta = 0;
  for (const hunk of hunksForFile(changes, filePath)) {
    const old = hunkOldRange(hunk);
    const endsAbove = hunk.old_lines === 0 ? old.start < range.start : old.end < range.start;
    if (endsAbove) {
      delta += hunk.new_lines - hunk.old_lines;
    }
  }
  if (delta === 0) return range;
  const start = Math.max(1, range.start + delta);
  return { start, end: Math.max(start, range.end + delta) };
}

export function renamedPath(changes: ChangeSet, filePath: string): string {
  return changes.renamed_files?.[filePath] ?? filePath;
}
