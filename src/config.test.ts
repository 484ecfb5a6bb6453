import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { LogLevel } from "./types.js";
import { createRootLogger } from "./logger.js";
import { applyEnvOverrides, DEFAULTS, loadConfig, resolveConfig, validateConfig, type ConfigError } from "./config.js";

describe("resolveConfig", () => {
  test("an empty document yields the defaults", () => {
    expect(resolveConfig({})).toEqual(DEFAULTS);
    expect(resolveConfig(null)).toEqual(DEFAULTS);
  });

  test("merges sections over the defaults and reads duration strings", () => {
    const config = resolveConfig({
      state: { backend: "sqlite", dbPath: "/var/lib/review/state.db" },
      pause: { defaultDurationMs: "24h", maxDurationMs: "2w" },
      tracker: { nearMatch: true },
      logLevel: "debug",
    });

    expect(config.state).toEqual({ backend: "sqlite", dir: DEFAULTS.state.dir, dbPath: "/var/lib/review/state.db" });
    expect(config.pause).toEqual({ defaultDurationMs: 86_400_000, maxDurationMs: 1_209_600_000 });
    expect(config.tracker.nearMatch).toBe(true);
    expect(config.logLevel).toBe("debug");
    expect(config.lock).toEqual(DEFAULTS.lock);
  });

  test("reports values of the wrong type and keeps the default", () => {
    const errors: ConfigError[] = [];
    const config = resolveConfig({ retention: { expiryDays: "thirty" }, lock: { backend: "redis" }, history: 5 }, errors);

    expect(config.retention.expiryDays).toBe(30);
    expect(config.lock.backend).toBe("memory");
    expect(errors).toEqual([
      { field: "history", message: "Expected a mapping", severity: "error" },
      { field: "lock.backend", message: "Expected one of memory, file", severity: "error" },
      { field: "retention.expiryDays", message: "Expected a number", severity: "error" },
    ]);
  });

  test("an explicit null pause duration means pause until resumed", () => {
    expect(resolveConfig({ pause: { defaultDurationMs: "24h" } }).pause.defaultDurationMs).toBe(86_400_000);
    expect(resolveConfig({ pause: { defaultDurationMs: null } }).pause.defaultDurationMs).toBeNull();
  });
});

describe("applyEnvOverrides", () => {
  test("applies REVIEW_STATE_* variables", () => {
    const config = resolveConfig({});
    applyEnvOverrides(config, {
      REVIEW_STATE_BACKEND: "sqlite",
      REVIEW_STATE_DB_PATH: "/tmp/x.db",
      REVIEW_STATE_LOCK_TIMEOUT_MS: "1500",
      REVIEW_STATE_EXPIRY_DAYS: "7",
      REVIEW_STATE_NEAR_MATCH: "1",
      REVIEW_STATE_COMMAND_PREFIX: "@bot ",
      LOG_LEVEL: "warn",
    });

    expect(config.state.backend).toBe("sqlite");
    expect(config.state.dbPath).toBe("/tmp/x.db");
    expect(config.lock.timeoutMs).toBe(1500);
    expect(config.retention.expiryDays).toBe(7);
    expect(config.tracker.nearMatch).toBe(true);
    expect(config.commands.prefix).toBe("@bot ");
    expect(config.logLevel).toBe("warn");
    expect(DEFAULTS.state.backend).toBe("file");
  });

  test("rejects invalid values", () => {
    expect(() => applyEnvOverrides(resolveConfig({}), { REVIEW_STATE_BACKEND: "redis" })).toThrow(
      'Invalid REVIEW_STATE_BACKEND: "redis". Must be one of: file, sqlite',
    );
    expect(() => applyEnvOverrides(resolveConfig({}), { REVIEW_STATE_EXPIRY_DAYS: "0" })).toThrow(
      'Invalid REVIEW_STATE_EXPIRY_DAYS: "0" (must be >= 1)',
    );
  });
});

describe("validateConfig", () => {
  test("accepts the defaults", () => {
    expect(validateConfig(DEFAULTS)).toEqual([]);
  });

  test("flags out-of-range values and incoherent combinations", () => {
    const config = structuredClone(DEFAULTS);
    config.retention.expiryDays = 0;
    config.pause.defaultDurationMs = 60 * 86_400_000;
    config.commands.prefix = "@bot ";
    config.lock.backend = "file";
    config.lock.staleMs = 1_000;

    expect(validateConfig(config)).toEqual([
      { field: "lock.staleMs", message: "Should exceed lock.timeoutMs or live holders may be taken over", severity: "warning" },
      { field: "retention.expiryDays", message: "Must be >= 1", severity: "error" },
      { field: "pause.defaultDurationMs", message: "Exceeds pause.maxDurationMs and will be capped", severity: "warning" },
      { field: "commands.prefix", message: "Must be non-empty without whitespace", severity: "error" },
    ]);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = join(tmpdir(), `review-state-config-test-${randomUUID()}`);
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads YAML, applies env overrides and logs warnings", () => {
    const path = join(dir, "review-state.yaml");
    writeFileSync(path, ["state:", "  backend: sqlite", "  dbPath: data/test.db", "report:", "  historyLimit: 80", ""].join("\n"));

    const lines: string[] = [];
    const logger = createRootLogger("warn", (_level: LogLevel, line) => lines.push(line));
    const config = loadConfig(path, { env: { REVIEW_STATE_EXPIRY_DAYS: "14" }, logger });

    expect(config.state.backend).toBe("sqlite");
    expect(config.retention.expiryDays).toBe(14);
    expect(config.report.historyLimit).toBe(80);
    expect(lines.map((l) => JSON.parse(l).field)).toEqual(["report.historyLimit"]);
  });

  test("uses defaults when the file is missing", () => {
    expect(loadConfig(join(dir, "missing.yaml"), { env: {} })).toEqual(DEFAULTS);
  });

  test("throws on fatal problems", () => {
    const path = join(dir, "bad.yaml");
    writeFileSync(path, "history:\n  maxEntries: 0\n");
    expect(() => loadConfig(path, { env: {} })).toThrow("Invalid configuration:\n  history.maxEntries: Must be >= 1");
  });
});
