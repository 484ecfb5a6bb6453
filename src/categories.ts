import type { FindingCategory, Severity } from "./types.js";

export interface CategoryRule {
  label: string;
  emoji: string;
}

/** Rendering rules per category. New categories are added here, not as new types. */
export const CATEGORY_RULES: Record<FindingCategory, CategoryRule> = {
  security: { label: "Security", emoji: "🔐" },
  bug: { label: "Bug", emoji: "🐛" },
  reliability: { label: "Reliability", emoji: "🧯" },
  performance: { label: "Performance", emoji: "⚡" },
  maintainability: { label: "Maintainability", emoji: "🧹" },
  testing: { label: "Testing", emoji: "🧪" },
  documentation: { label: "Documentation", emoji: "📚" },
  style: { label: "Style", emoji: "✨" },
  other: { label: "Other", emoji: "📌" },
};

const CATEGORY_ALIASES: Record<string, FindingCategory> = {
  sec: "security",
  vulnerability: "security",
  vuln: "security",
  auth: "security",
  injection: "security",
  secrets: "security",
  correctness: "bug",
  logic: "bug",
  defect: "bug",
  error: "bug",
  perf: "performance",
  efficiency: "performance",
  "error-handling": "reliability",
  error_handling: "reliability",
  concurrency: "reliability",
  robustness: "reliability",
  clean: "maintainability",
  "clean-code": "maintainability",
  complexity: "maintainability",
  readability: "maintainability",
  design: "maintainability",
  refactor: "maintainability",
  idiomatic: "maintainability",
  formatting: "style",
  naming: "style",
  nit: "style",
  nitpick: "style",
  docs: "documentation",
  comments: "documentation",
  tests: "testing",
  test: "testing",
  coverage: "testing",
};

const SEVERITY_ALIASES: Record<string, Severity> = {
  error: "error",
  critical: "error",
  high: "error",
  blocker: "error",
  issue: "error",
  warning: "warning",
  warn: "warning",
  medium: "warning",
  major: "warning",
  moderate: "warning",
  info: "info",
  low: "info",
  minor: "info",
  nit: "info",
  nitpick: "info",
  suggestion: "info",
  note: "info",
};

export const SEVERITY_RANK: Record<Severity, number> = {
  error: 2,
  warning: 1,
  info: 0,
};

export const SEVERITY_EMOJI: Record<Severity, string> = {
  error: "🚨",
  warning: "⚠️",
  info: "💡",
};

function isCategory(value: string): value is FindingCategory {
  return Object.prototype.hasOwnProperty.call(CATEGORY_RULES, value);
}

// Own keys only: "constructor" or "toString" must not resolve through Object.prototype
function lookup<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

/** Map a free-form category string onto the closed category set. */
export function normalizeCategory(raw: string): FindingCategory {
  const key = raw.trim().toLowerCase().replace(/\s+/g, "-");
  if (isCategory(key)) return key;
  return lookup(CATEGORY_ALIASES, key) ?? "other";
}

export function normalizeSeverity(raw: string): Severity {
  return lookup(SEVERITY_ALIASES, raw.trim().toLowerCase()) ?? "info";
}
