import type {
  ChangeSet,
  EngineConfig,
  EngineWarning,
  MergeInput,
  MergeOutcome,
  PendingChange,
  ReviewCycle,
  ReviewState,
  ReviewSubject,
  TriggerInput,
  TriggerPlan,
} from "../types.js";
import type { StateStore } from "../state/store.js";
import type { SubjectLock } from "../state/lock.js";
import type { Logger } from "../logger.js";
import type { EngineMetrics } from "../metrics.js";
import { LockTimeoutError } from "../errors.js";
import { subjectKey } from "../identity/hasher.js";
import { emptyState } from "../state/codec.js";
import { hasTransitions, reconcile } from "../tracker/tracker.js";
import { evaluateTrigger } from "./decisions.js";
import { pruneExpiredFindings, trimHistory } from "./retention.js";

const NO_CHANGES: ChangeSet = { hunks: [], deleted_files: [] };

interface LoadedState {
  state: ReviewState;
  stateReset: boolean;
  warnings: EngineWarning[];
}

export interface PauseOptions {
  /** Pause length; `null` pauses until an explicit resume. Defaults to `pause.defaultDurationMs`. */
  durationMs?: number | null;
}

export interface CommandOutcome {
  state: ReviewState;
  warnings: EngineWarning[];
}

export interface DismissOutcome extends CommandOutcome {
  dismissed: string[];
  missing: string[];
}

/** Pending changes first, then the new event; deleted files and renames are unioned. */
export function combineChanges(pending: PendingChange[], incoming: ChangeSet): ChangeSet {
  const hunks = [...pending.flatMap((p) => p.hunks), ...incoming.hunks];
  const deleted = new Set([...pending.flatMap((p) => p.deleted_files), ...incoming.deleted_files]);
  const renamed: Record<string, string> = {};
  for (const p of pending) Object.assign(renamed, p.renamed_files);
  Object.assign(renamed, incoming.renamed_files ?? {});

  const combined: ChangeSet = { hunks, deleted_files: [...deleted], renamed_files: renamed };
  if (incoming.file_line_counts) combined.file_line_counts = incoming.file_line_counts;
  return combined;
}

function eventCommits(input: TriggerInput): string[] {
  return input.commits && input.commits.length > 0 ? input.commits : [input.headCommit];
}

/**
 * Owns the pause state machine and the merge protocol. Every change to a
 * persisted review state goes through `withSubject`: lock, load, mutate in
 * memory, save once, release.
 */
export class LifecycleController {
  constructor(
    private store: StateStore,
    private lock: SubjectLock,
    private config: EngineConfig,
    private logger: Logger,
    private metrics?: EngineMetrics,
  ) {}

  /**
   * Read-only evaluation of a trigger, taken under the subject lock so it never
   * observes a half-finished merge. Tells the caller whether to run analysis
   * and over which cumulative change-set.
   */
  async plan(input: TriggerInput): Promise<TriggerPlan> {
    return this.withSubject(input.subject, async ({ state, warnings }) => {
      const decision = evaluateTrigger(state, input.trigger, Date.now());
      return {
        decision,
        sinceCommit: state.reviewed_commits.at(-1) ?? null,
        changes: combineChanges(state.pending, input.changes),
        warnings,
      };
    });
  }

  /**
   * The merge protocol. Candidates must already be resolved: nothing in here
   * waits on anything but the store.
   */
  async merge(input: MergeInput): Promise<MergeOutcome> {
    const key = subjectKey(input.subject);
    const log = this.logger.child({ subject: key, phase: "merge" });

    try {
      const outcome = await this.withSubject(input.subject, async (loaded) => {
        const now = Date.now();
        const decision = evaluateTrigger(loaded.state, input.trigger, now);
        if (!decision.shouldMerge) {
          log.info("Trigger deferred", { reason: decision.reason, trigger: input.trigger });
          return this.recordPending(loaded, input, now);
        }
        return this.applyMerge(loaded, input, now, decision.autoResumed, log);
      });
      this.metrics?.recordMerge(outcome.status, outcome.counts);
      return outcome;
    } catch (err) {
      this.metrics?.recordMerge("failed");
      log.error("Merge failed, stored state left unchanged", { error: String(err) });
      throw err;
    }
  }

  /** Record an automatic trigger without merging. */
  async defer(input: TriggerInput): Promise<MergeOutcome> {
    const outcome = await this.withSubject(input.subject, async (loaded) => this.recordPending(loaded, input, Date.now()));
    this.metrics?.recordMerge(outcome.status, null);
    return outcome;
  }

  async pause(subject: ReviewSubject, options: PauseOptions = {}): Promise<CommandOutcome> {
    const key = subjectKey(subject);
    return this.withSubject(subject, async ({ state, warnings }) => {
      const now = Date.now();
      const requested = options.durationMs === undefined ? this.config.pause.defaultDurationMs : options.durationMs;
      const durationMs = requested === null ? null : Math.min(requested, this.config.pause.maxDurationMs);

      if (!state.paused) {
        state.paused_at = new Date(now).toISOString();
      }
      state.paused = true;
      state.pause_until = durationMs === null ? null : new Date(now + durationMs).toISOString();

      await this.store.save(state);
      this.logger.info("Subject paused", { subject: key, until: state.pause_until ?? "resume" });
      return { state, warnings };
    });
  }

  /** Lift a pause. The caller follows up with a forced merge of pending changes. */
  async resume(subject: ReviewSubject): Promise<CommandOutcome> {
    const key = subjectKey(subject);
    return this.withSubject(subject, async ({ state, warnings }) => {
      if (!state.paused) {
        return { state, warnings };
      }
      state.paused = false;
      state.pause_until = null;
      state.paused_at = null;

      await this.store.save(state);
      this.logger.info("Subject resumed", { subject: key, pending: state.pending.length });
      return { state, warnings };
    });
  }

  /** Mark findings as dismissed by a human. Dismissal is never undone by re-detection. */
  async dismiss(subject: ReviewSubject, ids: string[]): Promise<DismissOutcome> {
    const key = subjectKey(subject);
    return this.withSubject(subject, async ({ state, warnings }) => {
      const nowIso = new Date().toISOString();
      const dismissed: string[] = [];
      const missing: string[] = [];

      for (const id of ids) {
        const finding = state.findings[id];
        if (!finding) {
          missing.push(id);
          continue;
        }
        if (finding.status !== "dismissed") {
          finding.status = "dismissed";
          finding.resolved_at = nowIso;
          dismissed.push(id);
        }
      }

      if (dismissed.length > 0) {
        await this.store.save(state);
        this.logger.info("Findings dismissed", { subject: key, dismissed: dismissed.length });
      }
      if (missing.length > 0) {
        this.logger.warn("Dismiss requested for unknown findings", { subject: key, missing });
      }
      return { state, warnings, dismissed, missing };
    });
  }

  /** Current state of a subject, read under the lock. */
  async snapshot(subject: ReviewSubject): Promise<CommandOutcome> {
    return this.withSubject(subject, async ({ state, warnings }) => ({ state, warnings }));
  }

  /** Delete the record of a subject that was closed or removed. */
  async forget(subject: ReviewSubject): Promise<boolean> {
    const key = subjectKey(subject);
    const release = await this.acquire(key);
    try {
      const removed = await this.store.delete(subject);
      this.logger.info("Forgot subject", { subject: key, removed });
      return removed;
    } finally {
      await this.release(release);
    }
  }

  private async acquire(key: string): Promise<() => Promise<void>> {
    try {
      const release = await this.lock.acquire(key, this.config.lock.timeoutMs);
      this.metrics?.lockAcquired();
      return release;
    } catch (err) {
      if (err instanceof LockTimeoutError) {
        this.metrics?.recordLockTimeout();
        this.logger.warn("Subject lock timed out", { subject: key, timeoutMs: err.timeoutMs });
      }
      throw err;
    }
  }

  private async release(release: () => Promise<void>): Promise<void> {
    await release();
    this.metrics?.lockReleased();
  }

  private async withSubject<T>(subject: ReviewSubject, fn: (loaded: LoadedState) => Promise<T>): Promise<T> {
    const key = subjectKey(subject);
    const release = await this.acquire(key);
    try {
      const loaded = await this.loadState(subject);
      return await fn(loaded);
    } finally {
      await this.release(release);
    }
  }

  private async loadState(subject: ReviewSubject): Promise<LoadedState> {
    const result = await this.store.load(subject);
    switch (result.kind) {
      case "found": {
        const warnings: EngineWarning[] = result.migratedFrom === null
          ? []
          : [{ code: "migrated", message: `State migrated from schema ${result.migratedFrom}` }];
        return { state: result.state, stateReset: false, warnings };
      }
      case "not_found":
        return { state: emptyState(subject), stateReset: false, warnings: [] };
      case "corrupt": {
        const warning: EngineWarning = {
          code: "state_reset",
          message: `State reset due to corruption: ${result.error.reason}`,
        };
        if (result.error.quarantineRef) warning.ref = result.error.quarantineRef;
        return { state: emptyState(subject), stateReset: true, warnings: [warning] };
      }
    }
  }

  private async recordPending(loaded: LoadedState, input: TriggerInput, now: number): Promise<MergeOutcome> {
    const { state } = loaded;
    const known = new Set(state.reviewed_commits);
    const alreadyPending = state.pending.some((p) => p.head_commit === input.headCommit);

    if (!known.has(input.headCommit) && !alreadyPending) {
      state.pending.push({
        head_commit: input.headCommit,
        commits: eventCommits(input).filter((c) => !known.has(c)),
        recorded_at: new Date(now).toISOString(),
        hunks: input.changes.hunks,
        deleted_files: input.changes.deleted_files,
        renamed_files: input.changes.renamed_files ?? {},
      });
      await this.store.save(state);
    }

    return {
      status: "deferred",
      state,
      cycle: null,
      counts: null,
      warnings: loaded.warnings,
      stateReset: loaded.stateReset,
    };
  }

  private async applyMerge(
    loaded: LoadedState,
    input: MergeInput,
    now: number,
    autoResumed: boolean,
    log: Logger,
  ): Promise<MergeOutcome> {
    const { state, stateReset } = loaded;
    const warnings = [...loaded.warnings];
    const nowIso = new Date(now).toISOString();

    let pauseChanged = false;
    if (state.paused && (autoResumed || input.trigger === "resume")) {
      state.paused = false;
      state.pause_until = null;
      state.paused_at = null;
      pauseChanged = true;
      log.info("Pause lifted by trigger", { trigger: input.trigger, autoResumed });
    }

    // A head that was already merged (a redelivered event) has had its hunks applied
    const replayed = state.reviewed_commits.includes(input.headCommit);
    if (replayed) {
      log.info("Head already reviewed, reconciling candidates without its hunks", { head: input.headCommit.slice(0, 7) });
    }
    const changes = combineChanges(state.pending, replayed ? NO_CHANGES : input.changes);
    const known = new Set(state.reviewed_commits);
    const newCommits: string[] = [];
    for (const commit of [...state.pending.flatMap((p) => p.commits), ...eventCommits(input)]) {
      if (!known.has(commit)) {
        known.add(commit);
        newCommits.push(commit);
      }
    }
    const consumedPending = state.pending.length;

    const result = reconcile({
      prior: state.findings,
      candidates: input.candidates,
      changes,
      headCommit: input.headCommit,
      now: nowIso,
      nearMatch: this.config.tracker.nearMatch,
    });
    if (result.counts.skipped > 0) {
      warnings.push({ code: "candidates_skipped", message: `${result.counts.skipped} candidate(s) had no usable location or message` });
      log.warn("Skipped invalid candidates", { skipped: result.counts.skipped });
    }

    const { findings, pruned } = pruneExpiredFindings(result.findings, this.config.retention.expiryDays, now);

    state.findings = findings;
    state.reviewed_commits.push(...newCommits);
    state.pending = [];

    const effective =
      hasTransitions(result.counts) ||
      pruned.length > 0 ||
      newCommits.length > 0 ||
      consumedPending > 0 ||
      pauseChanged ||
      stateReset;

    let cycle: ReviewCycle | null = null;
    if (effective) {
      cycle = {
        at: nowIso,
        trigger: input.trigger,
        head_commit: input.headCommit,
        commits: newCommits,
        opened: result.counts.opened,
        refreshed: result.counts.refreshed,
        reopened: result.counts.reopened,
        resolved: result.counts.resolved,
        invalidated: result.counts.invalidated,
        pruned: pruned.length,
        state_reset: stateReset,
      };
      state.history = trimHistory([...state.history, cycle], this.config.history.maxEntries);
    }
    state.last_review_at = nowIso;

    await this.store.save(state);

    this.metrics?.recordPruned(pruned.length);
    if (stateReset) this.metrics?.recordStateReset();

    log.info("Merged review cycle", {
      trigger: input.trigger,
      head: input.headCommit.slice(0, 7),
      commits: newCommits.length,
      opened: result.counts.opened,
      resolved: result.counts.resolved,
      invalidated: result.counts.invalidated,
      reopened: result.counts.reopened,
      pruned: pruned.length,
      stateReset,
    });

    return { status: "merged", state, cycle, counts: result.counts, warnings, stateReset };
  }
}
