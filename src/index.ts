export * from "./types.js";
export * from "./errors.js";
export { createRootLogger, silentLogger, type Logger, type LogContext, type LogSink } from "./logger.js";
export { EngineMetrics, type MergeMetricOutcome } from "./metrics.js";
export { loadConfig, resolveConfig, validateConfig, applyEnvOverrides, DEFAULTS, type ConfigError } from "./config.js";
export { CATEGORY_RULES, normalizeCategory, normalizeSeverity, type CategoryRule } from "./categories.js";
export {
  subjectKey,
  computeContentFingerprint,
  computeFindingId,
  deriveStableAnchor,
} from "./identity/hasher.js";
export { reconcile, prepareCandidate, type ReconcileInput } from "./tracker/tracker.js";
export type { StateStore, LoadResult } from "./state/store.js";
export { FileStateStore } from "./state/file-store.js";
export { SqliteStateStore, type CorruptRecordRow } from "./state/sqlite-store.js";
export { InProcessSubjectLock, FileSubjectLock, type SubjectLock, type ReleaseLock } from "./state/lock.js";
export { encodeState, decodeState, emptyState } from "./state/codec.js";
export { MIGRATIONS, type Migration } from "./state/migrations.js";
export { LifecycleController, combineChanges, type PauseOptions } from "./lifecycle/controller.js";
export { evaluateTrigger } from "./lifecycle/decisions.js";
export { project, reportDigest } from "./report/projector.js";
export { renderMarkdown } from "./report/markdown.js";
export { parseCommand, parseDuration, type ReviewCommand } from "./commands.js";
export { parseUnifiedDiff, mergeChangeSets } from "./hunks/diff-parser.js";
export {
  ReviewEngine,
  createEngine,
  createStateStore,
  createSubjectLock,
  type SubjectEvent,
  type TriggerResult,
  type StateResult,
  type CommandResult,
  type ProcessOptions,
  type ReviewEngineOptions,
} from "./engine.js";
