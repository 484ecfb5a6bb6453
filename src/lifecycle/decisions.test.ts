import { describe, expect, test } from "vitest";
import type { ReviewState } from "../types.js";
import { emptyState } from "../state/codec.js";
import { evaluateTrigger, isAutomaticTrigger, pauseExpired } from "./decisions.js";

const NOW = Date.parse("2026-06-10T12:00:00.000Z");

function makeState(overrides: Partial<ReviewState> = {}): ReviewState {
  return { ...emptyState({ provider: "github", repository: "acme/widget", subject_number: 1 }), ...overrides };
}

const pausedUntil = (iso: string | null) => makeState({ paused: true, pause_until: iso, paused_at: "2026-06-09T12:00:00.000Z" });

describe("evaluateTrigger", () => {
  test("active subjects merge on automatic triggers", () => {
    expect(evaluateTrigger(makeState(), "push", NOW)).toEqual({ shouldMerge: true, reason: "Automatic push", autoResumed: false });
    expect(evaluateTrigger(makeState(), "schedule", NOW).shouldMerge).toBe(true);
  });

  test("paused subjects only record automatic triggers", () => {
    expect(evaluateTrigger(pausedUntil("2026-06-11T12:00:00.000Z"), "push", NOW)).toEqual({
      shouldMerge: false,
      reason: "Paused until 2026-06-11T12:00:00.000Z",
      autoResumed: false,
    });
    expect(evaluateTrigger(pausedUntil(null), "schedule", NOW).reason).toBe("Paused until resumed");
  });

  test("an elapsed pause resumes automatically", () => {
    expect(evaluateTrigger(pausedUntil("2026-06-10T12:00:00.000Z"), "push", NOW)).toEqual({
      shouldMerge: true,
      reason: "Pause expired at 2026-06-10T12:00:00.000Z",
      autoResumed: true,
    });
  });

  test("review and resume always merge", () => {
    expect(evaluateTrigger(pausedUntil(null), "review", NOW)).toEqual({
      shouldMerge: true,
      reason: "On-demand review while paused",
      autoResumed: false,
    });
    expect(evaluateTrigger(pausedUntil(null), "resume", NOW).shouldMerge).toBe(true);
  });
});

test("pauseExpired ignores indefinite pauses", () => {
  expect(pauseExpired(pausedUntil(null), NOW)).toBe(false);
  expect(pauseExpired(pausedUntil("2026-06-10T11:59:59.000Z"), NOW)).toBe(true);
  expect(pauseExpired(makeState({ pause_until: "2020-01-01T00:00:00.000Z" }), NOW)).toBe(false);
});

test("isAutomaticTrigger", () => {
  expect(isAutomaticTrigger("push")).toBe(true);
  expect(isAutomaticTrigger("schedule")).toBe(true);
  expect(isAutomaticTrigger("review")).toBe(false);
  expect(isAutomaticTrigger("resume")).toBe(false);
});
