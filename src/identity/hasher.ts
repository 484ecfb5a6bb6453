import { createHash } from "node:crypto";
import type { CandidateAnchor, FindingCategory, ReviewSubject } from "../types.js";

const DIGEST_LENGTH = 16;

function digest(...parts: string[]): string {
  return createHash("sha256").update(parts.join("\0")).digest("hex").slice(0, DIGEST_LENGTH);
}

/** Storage key for a subject: `{provider}:{repository}:{subject_number}`. */
export function subjectKey(subject: ReviewSubject): string {
  return `${subject.provider}:${subject.repository}:${subject.subject_number}`;
}

export function normalizeText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * Normalise a code snippet so indentation, trailing whitespace and blank
 * lines do not influence the anchor.
 */
export function normalizeSnippet(snippet: string): string {
  return snippet
    .split(/\r?\n/)
    .map((line) => line.trim().replace(/\s+/g, " "))
    .filter((line) => line.length > 0)
    .join("\n");
}

export function computeContentFingerprint(severity: string, message: string, suggestion?: string | null): string {
  return digest(severity, normalizeText(message), normalizeText(suggestion ?? ""));
}

/**
 * Anchor digest for a finding. Prefers the flagged code (optionally scoped by
 * its enclosing symbol), then the symbol alone, then the content fingerprint.
 * Absolute line numbers never take part.
 */
export function deriveStableAnchor(anchor: CandidateAnchor | undefined, contentFingerprint: string): string {
  const snippet = anchor?.snippet ? normalizeSnippet(anchor.snippet) : "";
  const symbol = anchor?.symbol?.trim() ?? "";

  if (snippet) return digest("snippet", symbol, snippet);
  if (symbol) return digest("symbol", symbol);
  return digest("content", contentFingerprint);
}

export function computeFindingId(filePath: string, category: FindingCategory, stableAnchor: string): string {
  return digest(filePath, category, stableAnchor);
}
