export type ReviewCommand =
  | { kind: "pause"; durationMs?: number | null }
  | { kind: "resume" }
  | { kind: "review" }
  | { kind: "dismiss"; ids: string[] }
  | { kind: "invalid"; command: string; reason: string };

const UNIT_MS: Record<string, number> = {
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

const VERBS = new Set(["pause", "resume", "review", "dismiss"]);

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Parse a pause duration such as `30m`, `24h`, `2d` or `1w`.
 * Returns null when the text is not a positive duration.
 */
export function parseDuration(text: string): number | null {
  const match = text.trim().toLowerCase().match(/^(\d+)\s*([mhdw])$/);
  if (!match) return null;
  const amount = parseInt(match[1], 10);
  if (amount <= 0) return null;
  return amount * UNIT_MS[match[2]];
}

/**
 * Find the first command line in a comment body.
 * Supported: pause [duration|indefinitely], resume, review, dismiss <id>...
 */
export function parseCommand(body: string, prefix = "/"): ReviewCommand | null {
  const lineRegex = new RegExp(`^\\s*${escapeRegex(prefix)}([a-z]+)\\b(.*)$`, "i");

  for (const line of body.split(/\r?\n/)) {
    const match = line.match(lineRegex);
    if (!match) continue;

    const verb = match[1].toLowerCase();
    if (!VERBS.has(verb)) continue;
    const args = match[2].trim().split(/\s+/).filter(Boolean);

    switch (verb) {
      case "pause": {
        if (args.length === 0) return { kind: "pause" };
        if (/^(indefinitely|forever)$/i.test(args[0])) return { kind: "pause", durationMs: null };
        const durationMs = parseDuration(args[0]);
        if (durationMs === null) {
          return { kind: "invalid", command: verb, reason: `Unrecognised duration "${args[0]}" (use e.g. 30m, 24h, 2d, 1w)` };
        }
        return { kind: "pause", durationMs };
      }
      case "resume":
        return { kind: "resume" };
      case "review":
        return { kind: "review" };
      case "dismiss": {
        const ids = [...new Set(args.map((a) => a.replace(/^`|`$/g, "")).filter(Boolean))];
        if (ids.length === 0) {
          return { kind: "invalid", command: verb, reason: "dismiss needs at least one finding id" };
        }
        return { kind: "dismiss", ids };
      }
    }
  }
  return null;
}
