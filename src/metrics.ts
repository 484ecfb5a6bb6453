import { Registry, Counter, Gauge, collectDefaultMetrics } from "prom-client";
import type { MergeStatus, ReconcileCounts } from "./types.js";

export type MergeMetricOutcome = MergeStatus | "failed";

/**
 * Prometheus metrics for the review state engine.
 *
 * Counters are incremented as events happen inside the controller; the
 * registry is private so several engines (or tests) never share series.
 */
export class EngineMetrics {
  private registry: Registry;

  private mergesTotal: Counter<"outcome">;
  private transitionsTotal: Counter<"transition">;
  private stateResetsTotal: Counter;
  private lockTimeoutsTotal: Counter;
  private locksHeld: Gauge;

  constructor(options: { collectDefaults?: boolean; prefix?: string } = {}) {
    this.registry = new Registry();
    const prefix = options.prefix ?? "review_state";

    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.mergesTotal = new Counter({
      name: `${prefix}_merges_total`,
      help: "Merge protocol runs by outcome",
      labelNames: ["outcome"],
      registers: [this.registry],
    });

    this.transitionsTotal = new Counter({
      name: `${prefix}_finding_transitions_total`,
      help: "Finding lifecycle transitions applied by merges",
      labelNames: ["transition"],
      registers: [this.registry],
    });

    this.stateResetsTotal = new Counter({
      name: `${prefix}_state_resets_total`,
      help: "Merges that started from a fresh state because the stored record was corrupt",
      registers: [this.registry],
    });

    this.lockTimeoutsTotal = new Counter({
      name: `${prefix}_lock_timeouts_total`,
      help: "Subject lock acquisitions that timed out",
      registers: [this.registry],
    });

    this.locksHeld = new Gauge({
      name: `${prefix}_locks_held`,
      help: "Subject locks currently held by this process",
      registers: [this.registry],
    });
  }

  recordMerge(outcome: MergeMetricOutcome, counts?: ReconcileCounts | null): void {
    this.mergesTotal.labels(outcome).inc();
    if (!counts) return;

    const transitions: Array<[string, number]> = [
      ["opened", counts.opened],
      ["refreshed", counts.refreshed],
      ["reopened", counts.reopened],
      ["resolved", counts.resolved],
      ["invalidated", counts.invalidated],
    ];
    for (const [transition, n] of transitions) {
      if (n > 0) this.transitionsTotal.labels(transition).inc(n);
    }
  }

  recordPruned(count: number): void {
    if (count > 0) this.transitionsTotal.labels("pruned").inc(count);
  }

  recordStateReset(): void {
    this.stateResetsTotal.inc();
  }

  recordLockTimeout(): void {
    this.lockTimeoutsTotal.inc();
  }

  lockAcquired(): void {
    this.locksHeld.inc();
  }

  lockReleased(): void {
    this.locksHeld.dec();
  }

  /** Prometheus text exposition of all engine series. */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
