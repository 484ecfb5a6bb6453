import { readFileSync } from "node:fs";
import { parse } from "yaml";
import type { EngineConfig, LogLevel } from "./types.js";
import type { Logger } from "./logger.js";
import { parseDuration } from "./commands.js";

export interface ConfigError {
  field: string;
  message: string;
  severity: "error" | "warning";
}

export function validateConfig(config: EngineConfig): ConfigError[] {
  const errors: ConfigError[] = [];

  // Storage
  if (config.state.backend === "file" && !config.state.dir.trim()) {
    errors.push({ field: "state.dir", message: "Required when state.backend is file", severity: "error" });
  }
  if (config.state.backend === "sqlite" && !config.state.dbPath.trim()) {
    errors.push({ field: "state.dbPath", message: "Required when state.backend is sqlite", severity: "error" });
  }

  // Locking
  if (config.lock.timeoutMs < 100) {
    errors.push({ field: "lock.timeoutMs", message: "Must be >= 100", severity: "error" });
  }
  if (config.lock.backend === "file") {
    if (!config.lock.dir.trim()) {
      errors.push({ field: "lock.dir", message: "Required when lock.backend is file", severity: "error" });
    }
    if (config.lock.staleMs <= config.lock.timeoutMs) {
      errors.push({ field: "lock.staleMs", message: "Should exceed lock.timeoutMs or live holders may be taken over", severity: "warning" });
    }
    if (config.state.backend === "sqlite") {
      errors.push({ field: "lock.backend", message: "File locks are unnecessary with the sqlite backend in a single process", severity: "warning" });
    }
  }

  if (config.retention.expiryDays < 1) {
    errors.push({ field: "retention.expiryDays", message: "Must be >= 1", severity: "error" });
  }

  // Pause
  if (config.pause.maxDurationMs < 60_000) {
    errors.push({ field: "pause.maxDurationMs", message: "Must be >= 60000 (1m)", severity: "error" });
  }
  if (config.pause.defaultDurationMs !== null) {
    if (config.pause.defaultDurationMs < 60_000) {
      errors.push({ field: "pause.defaultDurationMs", message: "Must be >= 60000 (1m) or null", severity: "error" });
    } else if (config.pause.defaultDurationMs > config.pause.maxDurationMs) {
      errors.push({ field: "pause.defaultDurationMs", message: "Exceeds pause.maxDurationMs and will be capped", severity: "warning" });
    }
  }

  if (config.history.maxEntries < 1) {
    errors.push({ field: "history.maxEntries", message: "Must be >= 1", severity: "error" });
  }
  if (config.report.historyLimit < 0) {
    errors.push({ field: "report.historyLimit", message: "Must be >= 0", severity: "error" });
  }
  if (config.report.historyLimit > config.history.maxEntries) {
    errors.push({ field: "report.historyLimit", message: "Larger than history.maxEntries; only stored cycles are shown", severity: "warning" });
  }
  if (!config.report.commentTag.trim()) {
    errors.push({ field: "report.commentTag", message: "Must not be empty; the publisher finds its comment by this tag", severity: "error" });
  }

  if (!config.commands.prefix || /\s/.test(config.commands.prefix)) {
    errors.push({ field: "commands.prefix", message: "Must be non-empty without whitespace", severity: "error" });
  }

  return errors;
}

export const DEFAULTS: EngineConfig = {
  state: { backend: "file", dir: "data/review-state", dbPath: "data/review-state.db" },
  lock: { backend: "memory", timeoutMs: 30_000, staleMs: 120_000, dir: "data/review-state/locks" },
  retention: { expiryDays: 30 },
  pause: { defaultDurationMs: null, maxDurationMs: 30 * 86_400_000 },
  tracker: { nearMatch: false },
  history: { maxEntries: 50 },
  report: { historyLimit: 10, commentTag: "<!-- review-state -->" },
  commands: { prefix: "/" },
  logLevel: "info",
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Typed readers over an untyped YAML section. A value of the wrong type is
 * reported and the default kept.
 */
class SectionReader {
  constructor(
    private raw: RawSection,
    private path: string,
    private errors: ConfigError[],
  ) {}

  private invalid(key: string, expected: string): void {
    this.errors.push({ field: `${this.path}.${key}`, message: `Expected ${expected}`, severity: "error" });
  }

  string(key: string, fallback: string): string {
    const value = this.raw[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value === "string") return value;
    this.invalid(key, "a string");
    return fallback;
  }

  number(key: string, fallback: number): number {
    const value = this.raw[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value === "number" && Number.isFinite(value)) return value;
    this.invalid(key, "a number");
    return fallback;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.raw[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value === "boolean") return value;
    this.invalid(key, "true or false");
    return fallback;
  }

  oneOf<T extends string>(key: string, options: readonly T[], fallback: T): T {
    const value = this.raw[key];
    if (value === undefined || value === null) return fallback;
    const match = options.find((o) => o === value);
    if (match !== undefined) return match;
    this.invalid(key, `one of ${options.join(", ")}`);
    return fallback;
  }

  /** Milliseconds as a number or a duration string such as "24h". */
  duration(key: string, fallback: number): number {
    const value = this.raw[key];
    if (typeof value === "string") {
      const ms = parseDuration(value);
      if (ms !== null) return ms;
      this.invalid(key, "a duration such as 30m, 24h, 2d or 1w");
      return fallback;
    }
    return this.number(key, fallback);
  }

  /** Like `duration`, but an explicit null (or "none") is kept as null. */
  optionalDuration(key: string, fallback: number | null): number | null {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (value === null || value === "none") return null;
    return this.duration(key, fallback ?? 0);
  }
}

function section(root: RawSection, key: string, errors: ConfigError[]): SectionReader {
  const value = root[key];
  if (value !== undefined && value !== null && !isRecord(value)) {
    errors.push({ field: key, message: "Expected a mapping", severity: "error" });
  }
  return new SectionReader(isRecord(value) ? value : {}, key, errors);
}

/** Build an EngineConfig from a parsed YAML document over DEFAULTS. */
export function resolveConfig(fileConfig: unknown, errors: ConfigError[] = []): EngineConfig {
  const root: RawSection = isRecord(fileConfig) ? fileConfig : {};
  if (fileConfig !== undefined && fileConfig !== null && !isRecord(fileConfig)) {
    errors.push({ field: "(root)", message: "Config file must contain a mapping", severity: "error" });
  }

  const state = section(root, "state", errors);
  const lock = section(root, "lock", errors);
  const retention = section(root, "retention", errors);
  const pause = section(root, "pause", errors);
  const tracker = section(root, "tracker", errors);
  const history = section(root, "history", errors);
  const report = section(root, "report", errors);
  const commands = section(root, "commands", errors);
  const top = new SectionReader(root, "(root)", errors);

  return {
    state: {
      backend: state.oneOf("backend", ["file", "sqlite"], DEFAULTS.state.backend),
      dir: state.string("dir", DEFAULTS.state.dir),
      dbPath: state.string("dbPath", DEFAULTS.state.dbPath),
    },
    lock: {
      backend: lock.oneOf("backend", ["memory", "file"], DEFAULTS.lock.backend),
      timeoutMs: lock.duration("timeoutMs", DEFAULTS.lock.timeoutMs),
      staleMs: lock.duration("staleMs", DEFAULTS.lock.staleMs),
      dir: lock.string("dir", DEFAULTS.lock.dir),
    },
    retention: { expiryDays: retention.number("expiryDays", DEFAULTS.retention.expiryDays) },
    pause: {
      defaultDurationMs: pause.optionalDuration("defaultDurationMs", DEFAULTS.pause.defaultDurationMs),
      maxDurationMs: pause.duration("maxDurationMs", DEFAULTS.pause.maxDurationMs),
    },
    tracker: { nearMatch: tracker.boolean("nearMatch", DEFAULTS.tracker.nearMatch) },
    history: { maxEntries: history.number("maxEntries", DEFAULTS.history.maxEntries) },
    report: {
      historyLimit: report.number("historyLimit", DEFAULTS.report.historyLimit),
      commentTag: report.string("commentTag", DEFAULTS.report.commentTag),
    },
    commands: { prefix: commands.string("prefix", DEFAULTS.commands.prefix) },
    logLevel: top.oneOf("logLevel", LOG_LEVELS, DEFAULTS.logLevel),
  };
}

function parsePositiveInt(name: string, raw: string): number {
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 1) {
    throw new Error(`Invalid ${name}: "${raw}" (must be >= 1)`);
  }
  return value;
}

/** Apply REVIEW_STATE_* (and LOG_LEVEL) environment overrides in place. */
export function applyEnvOverrides(config: EngineConfig, env: NodeJS.ProcessEnv): void {
  if (env.REVIEW_STATE_BACKEND) {
    const backend = env.REVIEW_STATE_BACKEND;
    if (backend !== "file" && backend !== "sqlite") {
      throw new Error(`Invalid REVIEW_STATE_BACKEND: "${backend}". Must be one of: file, sqlite`);
    }
    config.state.backend = backend;
  }
  if (env.REVIEW_STATE_DIR) {
    config.state.dir = env.REVIEW_STATE_DIR;
  }
  if (env.REVIEW_STATE_DB_PATH) {
    config.state.dbPath = env.REVIEW_STATE_DB_PATH;
  }
  if (env.REVIEW_STATE_LOCK_BACKEND) {
    const backend = env.REVIEW_STATE_LOCK_BACKEND;
    if (backend !== "memory" && backend !== "file") {
      throw new Error(`Invalid REVIEW_STATE_LOCK_BACKEND: "${backend}". Must be one of: memory, file`);
    }
    config.lock.backend = backend;
  }
  if (env.REVIEW_STATE_LOCK_DIR) {
    config.lock.dir = env.REVIEW_STATE_LOCK_DIR;
  }
  if (env.REVIEW_STATE_LOCK_TIMEOUT_MS) {
    config.lock.timeoutMs = parsePositiveInt("REVIEW_STATE_LOCK_TIMEOUT_MS", env.REVIEW_STATE_LOCK_TIMEOUT_MS);
  }
  if (env.REVIEW_STATE_EXPIRY_DAYS) {
    config.retention.expiryDays = parsePositiveInt("REVIEW_STATE_EXPIRY_DAYS", env.REVIEW_STATE_EXPIRY_DAYS);
  }
  if (env.REVIEW_STATE_NEAR_MATCH) {
    config.tracker.nearMatch = env.REVIEW_STATE_NEAR_MATCH === "true" || env.REVIEW_STATE_NEAR_MATCH === "1";
  }
  if (env.REVIEW_STATE_COMMAND_PREFIX) {
    config.commands.prefix = env.REVIEW_STATE_COMMAND_PREFIX;
  }
  if (env.LOG_LEVEL) {
    const level = LOG_LEVELS.find((l) => l === env.LOG_LEVEL);
    if (level === undefined) {
      throw new Error(`Invalid LOG_LEVEL: "${env.LOG_LEVEL}". Must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    config.logLevel = level;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Load the engine configuration: YAML file over defaults, then environment
 * overrides, then validation. Fatal problems throw; warnings are logged.
 */
export function loadConfig(path: string = "review-state.yaml", options: LoadConfigOptions = {}): EngineConfig {
  const env = options.env ?? process.env;
  let fileConfig: unknown = {};

  try {
    const raw = readFileSync(path, "utf-8");
    fileConfig = parse(raw) ?? {};
  } catch (err) {
    if (!isErrnoException(err) || err.code !== "ENOENT") {
      throw err;
    }
    options.logger?.warn("Config file not found, using defaults + env vars", { path });
  }

  const errors: ConfigError[] = [];
  const config = resolveConfig(fileConfig, errors);
  applyEnvOverrides(config, env);
  errors.push(...validateConfig(config));

  const fatalErrors = errors.filter((e) => e.severity === "error");
  const warnings = errors.filter((e) => e.severity === "warning");

  for (const w of warnings) {
    options.logger?.warn("Config warning", { field: w.field, message: w.message });
  }
  if (fatalErrors.length > 0) {
    const details = fatalErrors.map((e) => `  ${e.field}: ${e.message}`).join("\n");
    throw new Error(`Invalid configuration:\n${details}`);
  }

  return config;
}
