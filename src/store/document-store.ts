/**
 * Document store — owns the JSON file holding sessions, information
 * records and call logs.
 *
 * File location:
 *   <stateDir>/data/shared_information.json   (override via config)
 *
 * Shape: see `LedgerDocument` in ./types.ts.
 *
 * Single JSON file, rewritten wholesale on every save. Writes go to a
 * temp file beside the target and are renamed over it, so the file holds
 * either the old or the new complete document. There is no locking:
 * one `DocumentStore` instance per file, callers serialise access.
 *
 * Mutators call `markDirty()`; a successful save clears the flag and a
 * failed one leaves it set, so `close()` only writes unsaved changes.
 */

import fs from "node:fs";
import path from "node:path";

import { ensureDir } from "../config/index.js";
import { errorMessage, silentLogger, type Logger } from "../logging/logger.js";
import { emptyDocument, ledgerDocumentSchema, type LedgerDocument } from "./types.js";

export interface DocumentStoreOptions {
  /** Absolute path of the backing JSON file. */
  filePath: string;
  logger?: Logger;
  /** Clock used for `created_at` / `last_updated` stamps. */
  now?: () => Date;
}

export class DocumentStore {
  readonly filePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private doc: LedgerDocument;
  private closed = false;
  private dirty = false;

  private constructor(options: DocumentStoreOptions) {
    this.filePath = options.filePath;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.doc = emptyDocument(this.timestamp());
  }

  /** Construct a store and load (or initialise) its file. */
  static open(options: DocumentStoreOptions): DocumentStore {
    const store = new DocumentStore(options);
    store.load();
    return store;
  }

  /** Live document. Mutations are persisted by the next `save()`. */
  get document(): LedgerDocument {
    return this.doc;
  }

  /** True when the in-memory document has changes not yet on disk. */
  get isDirty(): boolean {
    return this.dirty;
  }

  /** Flag the document as changed since the last successful save. */
  markDirty(): void {
    this.dirty = true;
  }

  /** Current clock reading as an ISO-8601 string. */
  timestamp(): string {
    return this.now().toISOString();
  }

  // ── Read ──────────────────────────────────────────────────────────

  /**
   * Load the document from disk.
   *
   * A missing file is initialised and written immediately. An unreadable
   * or corrupt file is logged, backed up when possible, and replaced in
   * memory by an empty document; nothing is thrown.
   */
  load(): LedgerDocument {
    if (!fs.existsSync(this.filePath)) {
      this.doc = emptyDocument(this.timestamp());
      this.save();
      return this.doc;
    }

    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf-8");
    } catch (err) {
      this.logger.error("Error loading data", {
        file: this.filePath,
        error: errorMessage(err),
      });
      this.doc = emptyDocument(this.timestamp());
      return this.doc;
    }

    const parsed = this.parse(raw);
    if (parsed) {
      this.doc = parsed;
    } else {
      this.backupCorruptFile();
      this.doc = emptyDocument(this.timestamp());
    }
    return this.doc;
  }

  private parse(raw: string): LedgerDocument | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.error("Error loading data: invalid JSON", {
        file: this.filePath,
        error: errorMessage(err),
      });
      return null;
    }

    const result = ledgerDocumentSchema(this.timestamp()).safeParse(json);
    if (!result.success) {
      this.logger.error("Error loading data: unexpected document shape", {
        file: this.filePath,
        issues: result.error.issues.map(
          (i) => `${i.path.join(".") || "<root>"}: ${i.message}`,
        ),
      });
      return null;
    }
    return result.data;
  }

  private backupCorruptFile(): void {
    const backupPath = `${this.filePath}.bak.${this.now().getTime()}`;
    try {
      fs.copyFileSync(this.filePath, backupPath);
      this.logger.warn("Corrupt store file backed up", { backup: backupPath });
    } catch (err) {
      this.logger.error("Could not back up corrupt store file", {
        file: this.filePath,
        error: errorMessage(err),
      });
    }
  }

  // ── Write ─────────────────────────────────────────────────────────

  /**
   * Persist the full document, stamping `metadata.last_updated`.
   * Returns `false` (and logs) on failure; the in-memory document is kept.
   */
  save(): boolean {
    const previousStamp = this.doc.metadata.last_updated;
    this.doc.metadata.last_updated = this.timestamp();

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      ensureDir(path.dirname(this.filePath));
      fs.writeFileSync(tmpPath, JSON.stringify(this.doc, null, 2) + "\n", "utf-8");
      fs.renameSync(tmpPath, this.filePath);
    } catch (err) {
      this.doc.metadata.last_updated = previousStamp;
      this.logger.error("Error saving data", {
        file: this.filePath,
        error: errorMessage(err),
      });
      this.removeTempFile(tmpPath);
      this.dirty = true;
      return false;
    }

    this.dirty = false;
    this.logger.debug("Data saved successfully", { file: this.filePath });
    return true;
  }

  private removeTempFile(tmpPath: string): void {
    try {
      fs.rmSync(tmpPath, { force: true });
    } catch (err) {
      this.logger.warn("Could not remove temp file", {
        file: tmpPath,
        error: errorMessage(err),
      });
    }
  }

  /** Deep copy of the current document. */
  snapshot(): LedgerDocument {
    return structuredClone(this.doc);
  }

  /**
   * Final flush at shutdown, written only when there are unsaved changes.
   * Later calls are no-ops returning `true`.
   */
  close(): boolean {
    if (this.closed) return true;
    this.closed = true;
    if (!this.dirty) return true;
    return this.save();
  }
}
