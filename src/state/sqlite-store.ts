import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ReviewState, ReviewStateV1, ReviewSubject } from "../types.js";
import type { Logger } from "../logger.js";
import { CorruptRecordError, SchemaMigrationError, StoreUnavailableError } from "../errors.js";
import { subjectKey } from "../identity/hasher.js";
import { decodeState, encodeState, upgradeForSave } from "./codec.js";
import { contentDigest, type LoadResult, type StateStore } from "./store.js";

interface StateRow {
  payload: string;
}

export interface CorruptRecordRow {
  subjectKey: string;
  digest: string;
  payload: string;
  reason: string;
  detectedAt: string;
}

/**
 * SQLite-backed state store. One row per subject; corrupt payloads are copied
 * into `corrupt_records` before being reported.
 */
export class SqliteStateStore implements StateStore {
  private db: Database.Database;
  private selectStmt: Database.Statement<[string], StateRow>;
  private upsertStmt: Database.Statement<[string, number, string, string]>;
  private deleteStmt: Database.Statement<[string]>;
  private quarantineStmt: Database.Statement<[string, string, string, string, string]>;

  constructor(
    dbPath: string,
    private logger: Logger,
  ) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS review_states (
        subject_key TEXT PRIMARY KEY,
        schema_version INTEGER NOT NULL,
        payload TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS corrupt_records (
        subject_key TEXT NOT NULL,
        digest TEXT NOT NULL,
        payload TEXT NOT NULL,
        reason TEXT NOT NULL,
        detected_at TEXT NOT NULL,
        PRIMARY KEY (subject_key, digest)
      );
    `);

    this.selectStmt = this.db.prepare<[string], StateRow>(
      `SELECT payload FROM review_states WHERE subject_key = ?`,
    );
    this.upsertStmt = this.db.prepare<[string, number, string, string]>(`
      INSERT INTO review_states (subject_key, schema_version, payload, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(subject_key) DO UPDATE SET
        schema_version = excluded.schema_version,
        payload = excluded.payload,
        updated_at = excluded.updated_at
    `);
    this.deleteStmt = this.db.prepare<[string]>(`DELETE FROM review_states WHERE subject_key = ?`);
    this.quarantineStmt = this.db.prepare<[string, string, string, string, string]>(`
      INSERT OR IGNORE INTO corrupt_records (subject_key, digest, payload, reason, detected_at)
      VALUES (?, ?, ?, ?, ?)
    `);
  }

  async load(subject: ReviewSubject): Promise<LoadResult> {
    const key = subjectKey(subject);

    let row: StateRow | undefined;
    try {
      row = this.selectStmt.get(key);
    } catch (err) {
      throw new StoreUnavailableError(key, "load", { cause: err });
    }
    if (!row) return { kind: "not_found" };

    const decoded = decodeState(row.payload, key);
    if (decoded.ok) {
      if (decoded.migratedFrom !== null) {
        this.logger.info("Migrated state record", { subject: key, from: decoded.migratedFrom });
      }
      return { kind: "found", state: decoded.state, migratedFrom: decoded.migratedFrom };
    }

    const digest = contentDigest(row.payload);
    try {
      this.quarantineStmt.run(key, digest, row.payload, decoded.reason, new Date().toISOString());
    } catch (err) {
      throw new StoreUnavailableError(key, "load", { cause: err });
    }
    const ref = `corrupt_records:${key}:${digest}`;
    this.logger.warn("State record is corrupt, quarantined a copy", { subject: key, reason: decoded.reason, ref });
    return { kind: "corrupt", error: new CorruptRecordError(key, row.payload, ref, decoded.reason) };
  }

  async save(record: ReviewState | ReviewStateV1): Promise<void> {
    let state: ReviewState;
    try {
      state = upgradeForSave(record);
    } catch (err) {
      if (err instanceof SchemaMigrationError) throw err;
      throw new StoreUnavailableError("(unmigrated record)", "save", { cause: err });
    }

    const key = subjectKey(state.subject);
    try {
      this.upsertStmt.run(key, state.schema_version, encodeState(state), new Date().toISOString());
    } catch (err) {
      throw new StoreUnavailableError(key, "save", { cause: err });
    }
  }

  async delete(subject: ReviewSubject): Promise<boolean> {
    const key = subjectKey(subject);
    try {
      return this.deleteStmt.run(key).changes > 0;
    } catch (err) {
      throw new StoreUnavailableError(key, "delete", { cause: err });
    }
  }

  /** Quarantined payloads for manual inspection, newest first. */
  listCorruptRecords(subject?: ReviewSubject): CorruptRecordRow[] {
    const sql = `
      SELECT subject_key as subjectKey, digest, payload, reason, detected_at as detectedAt
      FROM corrupt_records
      ${subject ? "WHERE subject_key = ?" : ""}
      ORDER BY detected_at DESC, digest ASC
    `;
    const stmt = this.db.prepare<unknown[], CorruptRecordRow>(sql);
    return subject ? stmt.all(subjectKey(subject)) : stmt.all();
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
