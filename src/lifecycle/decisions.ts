import type { ReviewState, TriggerDecision, TriggerKind } from "../types.js";

const AUTOMATIC_TRIGGERS: ReadonlySet<TriggerKind> = new Set(["push", "schedule"]);

export function isAutomaticTrigger(trigger: TriggerKind): boolean {
  return AUTOMATIC_TRIGGERS.has(trigger);
}

export function pauseExpired(state: ReviewState, now: number): boolean {
  if (!state.paused || state.pause_until === null) return false;
  return new Date(state.pause_until).getTime() <= now;
}

/**
 * Decide whether a trigger runs the merge or is only recorded.
 * Does not modify the state; the controller applies an automatic resume.
 */
export function evaluateTrigger(state: ReviewState, trigger: TriggerKind, now: number): TriggerDecision {
  // 1. Explicit commands always merge
  if (trigger === "resume") {
    return { shouldMerge: true, reason: "Explicit resume", autoResumed: false };
  }
  if (trigger === "review") {
    return { shouldMerge: true, reason: state.paused ? "On-demand review while paused" : "On-demand review", autoResumed: false };
  }

  // 2. Active subjects merge on every automatic trigger
  if (!state.paused) {
    return { shouldMerge: true, reason: `Automatic ${trigger}`, autoResumed: false };
  }

  // 3. Timed pause that has run out
  if (pauseExpired(state, now)) {
    return { shouldMerge: true, reason: `Pause expired at ${state.pause_until}`, autoResumed: true };
  }

  // 4. Still paused, record only
  const until = state.pause_until ? ` until ${state.pause_until}` : " until resumed";
  return { shouldMerge: false, reason: `Paused${until}`, autoResumed: false };
}
