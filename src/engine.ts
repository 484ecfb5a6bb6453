import { randomUUID } from "node:crypto";
import type {
  AnalysisSupplier,
  CandidateFinding,
  EngineConfig,
  EngineWarning,
  HostingClient,
  MergeOutcome,
  Report,
  ReviewState,
  ReviewSubject,
  TriggerInput,
  TriggerPlan,
} from "./types.js";
import type { StateStore } from "./state/store.js";
import type { SubjectLock } from "./state/lock.js";
import type { Logger } from "./logger.js";
import type { EngineMetrics } from "./metrics.js";
import { FileStateStore } from "./state/file-store.js";
import { SqliteStateStore } from "./state/sqlite-store.js";
import { FileSubjectLock, InProcessSubjectLock } from "./state/lock.js";
import { LifecycleController, type PauseOptions } from "./lifecycle/controller.js";
import { AnalysisUnavailableError, classifyError } from "./errors.js";
import { subjectKey } from "./identity/hasher.js";
import { project, reportDigest } from "./report/projector.js";
import { renderMarkdown } from "./report/markdown.js";
import { parseCommand, type ReviewCommand } from "./commands.js";
import { createRootLogger } from "./logger.js";

/** What the host knows about the subject when a trigger fires. */
export type SubjectEvent = Omit<TriggerInput, "subject" | "trigger">;

export interface RenderedReport {
  report: Report;
  body: string;
  digest: string;
  /** True when the hosting client accepted an update for this render. */
  published: boolean;
}

export interface TriggerResult extends RenderedReport {
  outcome: MergeOutcome;
}

export interface StateResult extends RenderedReport {
  state: ReviewState;
  warnings: EngineWarning[];
}

export type CommandResult =
  | { command: "pause" | "dismiss"; result: StateResult; dismissed?: string[]; missing?: string[] }
  | { command: "resume" | "review"; result: TriggerResult }
  | { command: "invalid"; reason: string };

export interface ProcessOptions {
  signal?: AbortSignal;
}

export interface ReviewEngineOptions {
  logger?: Logger;
  metrics?: EngineMetrics;
  hosting?: HostingClient;
}

/**
 * Entry point for trigger events. Analysis runs before the subject lock is
 * taken; the lifecycle controller then applies the merge protocol.
 */
export class ReviewEngine {
  readonly controller: LifecycleController;
  private logger: Logger;
  private hosting?: HostingClient;
  private publishedDigests = new Map<string, string>();

  constructor(
    private store: StateStore,
    lock: SubjectLock,
    private config: EngineConfig,
    private supplier: AnalysisSupplier,
    options: ReviewEngineOptions = {},
  ) {
    this.logger = options.logger ?? createRootLogger(config.logLevel);
    this.hosting = options.hosting;
    this.controller = new LifecycleController(store, lock, config, this.logger, options.metrics);
  }

  async processTrigger(input: TriggerInput, options: ProcessOptions = {}): Promise<TriggerResult> {
    const key = subjectKey(input.subject);
    const traceId = randomUUID().slice(0, 8);
    const log = this.logger.child({ subject: key, traceId });

    log.info("Processing trigger", { trigger: input.trigger, head: input.headCommit.slice(0, 7) });
    const plan = await this.controller.plan(input);

    let outcome: MergeOutcome;
    if (!plan.decision.shouldMerge) {
      log.info("Recording change while paused", { reason: plan.decision.reason });
      options.signal?.throwIfAborted();
      outcome = await this.controller.defer(input);
    } else {
      log.info("Running analysis", { reason: plan.decision.reason, since: plan.sinceCommit?.slice(0, 7) ?? "start" });
      const candidates = await this.analyze(input, plan, options.signal);
      // Cancellation is honoured up to here; once the merge starts it runs to completion
      options.signal?.throwIfAborted();
      outcome = await this.controller.merge({ ...input, candidates });
    }

    for (const warning of outcome.warnings) {
      log.warn("Cycle warning", { code: warning.code, message: warning.message, ref: warning.ref });
    }

    const rendered = await this.publish(outcome.state, log);
    return { ...rendered, outcome };
  }

  async pause(subject: ReviewSubject, options: PauseOptions = {}): Promise<StateResult> {
    const log = this.logger.child({ subject: subjectKey(subject) });
    const { state, warnings } = await this.controller.pause(subject, options);
    return { ...(await this.publish(state, log)), state, warnings };
  }

  /** Lift a pause and review everything recorded while it was active. */
  async resume(subject: ReviewSubject, event: SubjectEvent, options: ProcessOptions = {}): Promise<TriggerResult> {
    await this.controller.resume(subject);
    return this.processTrigger({ ...event, subject, trigger: "resume" }, options);
  }

  /** On-demand review; runs even while paused and leaves the pause in place. */
  async review(subject: ReviewSubject, event: SubjectEvent, options: ProcessOptions = {}): Promise<TriggerResult> {
    return this.processTrigger({ ...event, subject, trigger: "review" }, options);
  }

  async dismiss(subject: ReviewSubject, ids: string[]): Promise<StateResult & { dismissed: string[]; missing: string[] }> {
    const log = this.logger.child({ subject: subjectKey(subject) });
    const { state, warnings, dismissed, missing } = await this.controller.dismiss(subject, ids);
    return { ...(await this.publish(state, log)), state, warnings, dismissed, missing };
  }

  /** Current report for a subject without running a cycle. */
  async report(subject: ReviewSubject): Promise<Report> {
    const { state } = await this.controller.snapshot(subject);
    return project(state, this.config.report.historyLimit);
  }

  async forget(subject: ReviewSubject): Promise<boolean> {
    this.publishedDigests.delete(subjectKey(subject));
    return this.controller.forget(subject);
  }

  /**
   * Run a comment command. Returns null when the body holds no command.
   * `review` and `resume` need the subject's current head and changes.
   */
  async handleCommand(
    subject: ReviewSubject,
    body: string,
    event?: SubjectEvent,
    options: ProcessOptions = {},
  ): Promise<CommandResult | null> {
    const command = parseCommand(body, this.config.commands.prefix);
    if (command === null) return null;
    return this.runCommand(subject, command, event, options);
  }

  private async runCommand(
    subject: ReviewSubject,
    command: ReviewCommand,
    event: SubjectEvent | undefined,
    options: ProcessOptions,
  ): Promise<CommandResult> {
    this.logger.info("Command received", { subject: subjectKey(subject), command: command.kind });

    switch (command.kind) {
      case "pause": {
        const pauseOptions: PauseOptions = command.durationMs === undefined ? {} : { durationMs: command.durationMs };
        return { command: "pause", result: await this.pause(subject, pauseOptions) };
      }
      case "dismiss": {
        const { dismissed, missing, ...result } = await this.dismiss(subject, command.ids);
        return { command: "dismiss", result, dismissed, missing };
      }
      case "resume":
      case "review": {
        if (!event) {
          return { command: "invalid", reason: `${command.kind} needs the subject's current head commit and changes` };
        }
        const result = command.kind === "resume"
          ? await this.resume(subject, event, options)
          : await this.review(subject, event, options);
        return { command: command.kind, result };
      }
      case "invalid":
        return { command: "invalid", reason: command.reason };
    }
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  private async analyze(input: TriggerInput, plan: TriggerPlan, signal?: AbortSignal): Promise<CandidateFinding[]> {
    signal?.throwIfAborted();
    try {
      return await this.supplier.analyze({
        subject: input.subject,
        headCommit: input.headCommit,
        sinceCommit: plan.sinceCommit,
        changes: plan.changes,
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new AnalysisUnavailableError(subjectKey(input.subject), { cause: err });
    }
  }

  /**
   * Project and render the state, then hand it to the hosting client when the
   * digest differs from the last one published for the subject.
   */
  private async publish(state: ReviewState, log: Logger): Promise<RenderedReport> {
    const key = subjectKey(state.subject);
    const report = project(state, this.config.report.historyLimit);
    const body = renderMarkdown(report, this.config.report.commentTag);
    const digest = reportDigest(report);

    if (!this.hosting || this.publishedDigests.get(key) === digest) {
      return { report, body, digest, published: false };
    }

    try {
      await this.hosting.publish({ subject: state.subject, report, body, digest });
      this.publishedDigests.set(key, digest);
      return { report, body, digest, published: true };
    } catch (err) {
      // The state is already saved; the next cycle republishes
      log.error("Failed to publish report", { error: String(err), kind: classifyError(err) });
      return { report, body, digest, published: false };
    }
  }
}

export function createStateStore(config: EngineConfig, logger: Logger): StateStore {
  if (config.state.backend === "sqlite") {
    return new SqliteStateStore(config.state.dbPath, logger);
  }
  return new FileStateStore(config.state.dir, logger);
}

export function createSubjectLock(config: EngineConfig): SubjectLock {
  if (config.lock.backend === "file") {
    return new FileSubjectLock(config.lock.dir, config.lock.staleMs);
  }
  return new InProcessSubjectLock();
}

/** Wire an engine from configuration. */
export function createEngine(
  config: EngineConfig,
  supplier: AnalysisSupplier,
  options: ReviewEngineOptions = {},
): ReviewEngine {
  const logger = options.logger ?? createRootLogger(config.logLevel);
  return new ReviewEngine(createStateStore(config, logger), createSubjectLock(config), config, supplier, { ...options, logger });
}
