import type { FindingStatus, Report, ReportFinding, ReviewCycle } from "../types.js";
import { CATEGORY_RULES, SEVERITY_EMOJI } from "../categories.js";

const STATUS_EMOJI: Record<FindingStatus, string> = {
  open: "🔍",
  resolved: "✅",
  invalidated: "🗑️",
  dismissed: "⏭️",
};

export const STATE_RESET_NOTICE = "State reset due to corruption";

function location(f: ReportFinding): string {
  const { start, end } = f.line_range;
  return start === end ? `${f.file_path}:${start}` : `${f.file_path}:${start}-${end}`;
}

function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 3) + "...";
}

function formatCycle(c: ReviewCycle): string {
  const changes: string[] = [];
  if (c.opened > 0) changes.push(`+${c.opened} opened`);
  if (c.reopened > 0) changes.push(`${c.reopened} reopened`);
  if (c.resolved > 0) changes.push(`${c.resolved} resolved`);
  if (c.invalidated > 0) changes.push(`${c.invalidated} invalidated`);
  if (c.pruned > 0) changes.push(`${c.pruned} pruned`);
  const summary = changes.length > 0 ? changes.join(", ") : "no changes";
  const reset = c.state_reset ? ` ⚠️ ${STATE_RESET_NOTICE.toLowerCase()}` : "";
  return `| ${c.at} | ${c.trigger} | \`${c.head_commit.slice(0, 7)}\` | ${summary}${reset} |`;
}

/**
 * Render the persistent review comment. Output depends only on the report,
 * so re-rendering an unchanged state produces identical text.
 */
export function renderMarkdown(report: Report, tag: string): string {
  const parts: string[] = [tag, ""];
  const counts = report.summary_counts;

  parts.push(`## 🧭 Review status`);
  parts.push("");

  if (report.history.some((c) => c.state_reset)) {
    parts.push(`> ⚠️ **${STATE_RESET_NOTICE}.** Earlier findings could not be read and tracking restarted.`);
    parts.push("");
  }

  if (report.paused) {
    const until = report.paused.until ? `until ${report.paused.until}` : "until resumed";
    parts.push(`> ⏸️ Automatic reviews are paused ${until}. Pushes are recorded and reviewed on resume.`);
    parts.push("");
  }

  const severityParts: string[] = [];
  for (const severity of ["error", "warning", "info"] as const) {
    const n = counts.by_severity[severity];
    if (n > 0) severityParts.push(`${SEVERITY_EMOJI[severity]} ${n} ${severity}`);
  }
  parts.push(`| Open | Resolved | Invalidated | Dismissed |`);
  parts.push(`|------|----------|-------------|-----------|`);
  parts.push(`| ${counts.open} | ${counts.resolved} | ${counts.invalidated} | ${counts.dismissed} |`);
  parts.push("");
  if (severityParts.length > 0) {
    parts.push(`Open by severity: ${severityParts.join(", ")}`);
    parts.push("");
  }

  if (report.active_findings.length > 0) {
    parts.push(`### 🔍 Active findings`);
    parts.push("");
    for (const f of report.active_findings) {
      const rule = CATEGORY_RULES[f.category];
      parts.push(`- ${SEVERITY_EMOJI[f.severity]} **${f.severity}** ${rule.emoji} ${rule.label} \`${location(f)}\` (\`${f.id}\`)`);
      parts.push(`  ${f.message}`);
      if (f.suggested_fix) {
        parts.push(`  > 💡 ${truncate(f.suggested_fix, 200)}`);
      }
    }
    parts.push("");
  } else {
    parts.push(`No open findings. ✨`);
    parts.push("");
  }

  if (report.resolved_findings.length > 0) {
    parts.push(`<details>`);
    parts.push(`<summary>${STATUS_EMOJI.resolved} Closed findings (${report.resolved_findings.length})</summary>`);
    parts.push("");
    for (const f of report.resolved_findings) {
      parts.push(`- ${STATUS_EMOJI[f.status]} ${f.status} \`${location(f)}\`: ${truncate(f.message, 120)}`);
    }
    parts.push("");
    parts.push(`</details>`);
    parts.push("");
  }

  if (report.history.length > 0) {
    parts.push(`<details>`);
    parts.push(`<summary>🕘 Review history</summary>`);
    parts.push("");
    parts.push(`| When | Trigger | Head | Changes |`);
    parts.push(`|------|---------|------|---------|`);
    for (const c of report.history) {
      parts.push(formatCycle(c));
    }
    parts.push("");
    parts.push(`</details>`);
    parts.push("");
  }

  parts.push("---");
  parts.push(`*Last updated ${report.last_updated ?? "never"}*`);

  return parts.join("\n");
}
