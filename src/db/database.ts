import BetterSqlite3 from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { runMigrations } from "./migrations.js";
import { StorageUnavailableError } from "./errors.js";
import { logger } from "../utils/logger.js";

const DEFAULT_BUSY_TIMEOUT_MS = 5000;

export interface StoreOptions {
  busyTimeoutMs?: number;
}

/** One open SQLite connection. Lives for the duration of a single call. */
export class Database {
  public raw: BetterSqlite3.Database;

  private constructor(dbPath: string, options: { readOnly: boolean; timeout: number }) {
    this.raw = new BetterSqlite3(dbPath, {
      readonly: options.readOnly,
      fileMustExist: options.readOnly,
      timeout: options.timeout,
    });
  }

  static open(dbPath: string, options: { readOnly: boolean; timeout: number }): Database {
    return new Database(dbPath, options);
  }

  close(): void {
    if (this.raw.open) this.raw.close();
  }
}

/**
 * Handle to the messaging metadata store. Holds no connection: every `read` or
 * `write` opens a fresh one and closes it before returning, on success or failure.
 */
export class Store {
  readonly path: string;
  private readonly busyTimeoutMs: number;

  constructor(path: string, options: StoreOptions = {}) {
    this.path = path;
    this.busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
  }

  read<T>(fn: (db: Database) => T): T {
    return this.withConnection(true, fn);
  }

  write<T>(fn: (db: Database) => T): T {
    return this.withConnection(false, fn);
  }

  /** Creates the directory and any missing tables. Existing data is untouched. */
  migrate(): void {
    if (this.path !== ":memory:") {
      mkdirSync(dirname(this.path), { recursive: true });
    }
    this.write((db) => runMigrations(db.raw));
  }

  private withConnection<T>(readOnly: boolean, fn: (db: Database) => T): T {
    let db: Database | undefined;
    try {
      db = Database.open(this.path, { readOnly, timeout: this.busyTimeoutMs });
      return fn(db);
    } catch (error) {
      throw StorageUnavailableError.from(error);
    } finally {
      db?.close();
    }
  }
}

/**
 * Runs a read and falls back to `fallback` when the store is unavailable. Callers
 * cannot tell an empty result from a failed one; the failure is only logged.
 */
export function readOrDefault<T>(
  store: Store,
  operation: string,
  fallback: T,
  fn: (db: Database) => T,
): T {
  try {
    return store.read(fn);
  } catch (error) {
    logger.error(`[db] ${operation} failed:`, error instanceof Error ? error.message : error);
    return fallback;
  }
}
