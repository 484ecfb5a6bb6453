import type { Finding, ReviewCycle } from "../types.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Drop terminal findings whose `resolved_at` is older than the expiry horizon.
 * Open findings, and terminal ones without a timestamp, are always kept.
 * Returns the kept map and the ids removed.
 */
export function pruneExpiredFindings(
  findings: Record<string, Finding>,
  expiryDays: number,
  now: number,
): { findings: Record<string, Finding>; pruned: string[] } {
  const cutoff = now - expiryDays * MS_PER_DAY;
  const kept: Record<string, Finding> = {};
  const pruned: string[] = [];

  for (const [id, f] of Object.entries(findings)) {
    if (f.status !== "open" && f.resolved_at !== null && new Date(f.resolved_at).getTime() < cutoff) {
      pruned.push(id);
      continue;
    }
    kept[id] = f;
  }

  return { findings: kept, pruned: pruned.sort() };
}

/** Keep the most recent `maxEntries` cycles. */
export function trimHistory(history: ReviewCycle[], maxEntries: number): ReviewCycle[] {
  if (history.length <= maxEntries) return history;
  return history.slice(history.length - maxEntries);
}
