/**
 * Turns a unified diff (as returned by hosting providers for a compare or a
 * push) into the hunk-level change-set the tracker consumes. Hunk bodies are
 * only counted through, never interpreted.
 */

import type { ChangeSet, Hunk } from "../types.js";

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

interface FileHeader {
  oldPath: string | null;
  newPath: string | null;
  renameFrom: string | null;
  renameTo: string | null;
  deleted: boolean;
}

function emptyHeader(): FileHeader {
  return { oldPath: null, newPath: null, renameFrom: null, renameTo: null, deleted: false };
}

/** `diff --git a/x b/y` -> ["x", "y"]; paths with spaces are not split reliably, so headers below win. */
function gitHeaderPaths(line: string): [string, string] | null {
  const match = line.match(/^diff --git a\/(.+) b\/(.+)$/);
  return match ? [match[1], match[2]] : null;
}

function stripPrefix(path: string, prefix: "a/" | "b/"): string | null {
  if (path === "/dev/null") return null;
  return path.startsWith(prefix) ? path.slice(2) : path;
}

/**
 * Path the tracker should file a hunk under: the new path, except for
 * deletions where only the old one exists.
 */
function currentPath(header: FileHeader): string | null {
  return header.renameTo ?? header.newPath ?? header.oldPath ?? header.renameFrom;
}

/**
 * Parse a unified diff into a ChangeSet.
 * Missing counts in a hunk header default to 1, as in `diff -u`.
 */
export function parseUnifiedDiff(diff: string): ChangeSet {
  const hunks: Hunk[] = [];
  const deleted = new Set<string>();
  const renamed: Record<string, string> = {};
  let header = emptyHeader();
  let oldRemaining = 0;
  let newRemaining = 0;

  const finishFile = () => {
    const oldPath = header.renameFrom ?? header.oldPath;
    if (header.deleted && oldPath) {
      deleted.add(oldPath);
    }
    const from = header.renameFrom;
    const to = header.renameTo;
    if (from && to && from !== to) {
      renamed[from] = to;
    }
  };

  for (const line of diff.split(/\r?\n/)) {
    if (line.startsWith("diff --git ")) {
      finishFile();
      header = emptyHeader();
      oldRemaining = 0;
      newRemaining = 0;
      const paths = gitHeaderPaths(line);
      if (paths) {
        header.oldPath = paths[0];
        header.newPath = paths[1];
      }
      continue;
    }

    // Inside a hunk body: a removed line such as "--- x" is content, not a header
    if (oldRemaining > 0 || newRemaining > 0) {
      if (line.startsWith("\\")) continue;
      if (line.startsWith("-")) {
        oldRemaining--;
      } else if (line.startsWith("+")) {
        newRemaining--;
      } else {
        oldRemaining--;
        newRemaining--;
      }
      continue;
    }

    if (line.startsWith("deleted file mode")) {
      header.deleted = true;
      continue;
    }
    if (line.startsWith("rename from ")) {
      header.renameFrom = line.slice("rename from ".length);
      continue;
    }
    if (line.startsWith("rename to ")) {
      header.renameTo = line.slice("rename to ".length);
      continue;
    }

    // File headers: --- a/path / +++ b/path (or /dev/null)
    if (line.startsWith("--- ")) {
      const path = stripPrefix(line.slice(4).trim(), "a/");
      if (path !== null) header.oldPath = path;
      continue;
    }
    if (line.startsWith("+++ ")) {
      const path = stripPrefix(line.slice(4).trim(), "b/");
      if (path === null) {
        header.deleted = true;
        header.newPath = null;
      } else {
        header.newPath = path;
      }
      continue;
    }

    const hunkMatch = line.match(HUNK_HEADER);
    if (hunkMatch) {
      const filePath = header.deleted ? header.oldPath : currentPath(header);
      const hunk: Hunk = {
        file_path: filePath ?? "",
        old_start: parseInt(hunkMatch[1], 10),
        old_lines: hunkMatch[2] === undefined ? 1 : parseInt(hunkMatch[2], 10),
        new_start: parseInt(hunkMatch[3], 10),
        new_lines: hunkMatch[4] === undefined ? 1 : parseInt(hunkMatch[4], 10),
      };
      oldRemaining = hunk.old_lines;
      newRemaining = hunk.new_lines;
      if (filePath) hunks.push(hunk);
    }
  }
  finishFile();

  return {
    hunks,
    deleted_files: [...deleted].sort(),
    renamed_files: renamed,
  };
}

/** Concatenate change-sets in order, e.g. one per pushed commit. */
export function mergeChangeSets(...sets: ChangeSet[]): ChangeSet {
  const merged: ChangeSet = { hunks: [], deleted_files: [] };
  const deleted = new Set<string>();
  const renamed: Record<string, string> = {};
  const lineCounts: Record<string, number> = {};
  let hasLineCounts = false;

  for (const set of sets) {
    merged.hunks.push(...set.hunks);
    for (const path of set.deleted_files) deleted.add(path);
    Object.assign(renamed, set.renamed_files ?? {});
    if (set.file_line_counts) {
      Object.assign(lineCounts, set.file_line_counts);
      hasLineCounts = true;
    }
  }

  merged.deleted_files = [...deleted].sort();
  merged.renamed_files = renamed;
  if (hasLineCounts) merged.file_line_counts = lineCounts;
  return merged;
}
