import { copyFile, mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { ReviewState, ReviewStateV1, ReviewSubject } from "../types.js";
import type { Logger } from "../logger.js";
import { CorruptRecordError, SchemaMigrationError, StoreUnavailableError } from "../errors.js";
import { subjectKey } from "../identity/hasher.js";
import { decodeState, encodeState, upgradeForSave } from "./codec.js";
import { contentDigest, type LoadResult, type StateStore } from "./store.js";

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/** File name for a subject key, safe on every filesystem. */
export function recordFileName(key: string): string {
  return `${key.replace(/[^A-Za-z0-9._-]/g, "_")}.json`;
}

/**
 * One JSON document per subject in a directory. Saves write a temp file and
 * rename it over the record, so readers see the old or the new bytes only.
 */
export class FileStateStore implements StateStore {
  constructor(
    private dir: string,
    private logger: Logger,
  ) {}

  pathFor(subject: ReviewSubject): string {
    return join(this.dir, recordFileName(subjectKey(subject)));
  }

  async load(subject: ReviewSubject): Promise<LoadResult> {
    const key = subjectKey(subject);
    const filePath = this.pathFor(subject);

    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        this.logger.debug("No state record", { subject: key });
        return { kind: "not_found" };
      }
      throw new StoreUnavailableError(key, "load", { cause: err });
    }

    const decoded = decodeState(raw, key);
    if (decoded.ok) {
      if (decoded.migratedFrom !== null) {
        this.logger.info("Migrated state record", { subject: key, from: decoded.migratedFrom });
      }
      return { kind: "found", state: decoded.state, migratedFrom: decoded.migratedFrom };
    }

    const quarantinePath = await this.quarantine(filePath, raw, key);
    this.logger.warn("State record is corrupt, quarantined a copy", {
      subject: key,
      reason: decoded.reason,
      quarantinePath,
      bytes: raw.length,
    });
    return { kind: "corrupt", error: new CorruptRecordError(key, raw, quarantinePath, decoded.reason) };
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
    const filePath = this.pathFor(state.subject);
    const tmpPath = join(this.dir, `.state-${randomUUID()}.tmp`);

    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(tmpPath, encodeState(state));
      await rename(tmpPath, filePath);
    } catch (err) {
      await unlink(tmpPath).catch((cleanupErr: unknown) => {
        if (!isErrnoException(cleanupErr) || cleanupErr.code !== "ENOENT") {
          this.logger.warn("Failed to remove temp state file", { subject: key, tmpPath, error: String(cleanupErr) });
        }
      });
      throw new StoreUnavailableError(key, "save", { cause: err });
    }
    this.logger.debug("Saved state record", { subject: key });
  }

  async delete(subject: ReviewSubject): Promise<boolean> {
    const key = subjectKey(subject);
    try {
      await unlink(this.pathFor(subject));
      this.logger.info("Deleted state record", { subject: key });
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return false;
      throw new StoreUnavailableError(key, "delete", { cause: err });
    }
  }

  async close(): Promise<void> {
    // Nothing held open between calls.
  }

  /**
   * Copy corrupt bytes next to the record. Named by content digest so reloading
   * the same bytes does not pile up copies.
   */
  private async quarantine(filePath: string, raw: string, key: string): Promise<string> {
    const target = filePath.replace(/\.json$/, `.corrupt-${contentDigest(raw)}.json`);
    try {
      await copyFile(filePath, target);
    } catch (err) {
      throw new StoreUnavailableError(key, "load", { cause: err });
    }
    return target;
  }
}
