import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { PersistenceError } from "../errors";
import type { ConfigStore } from "../types";

const MEMORY = ":memory:";

/**
 * {@link ConfigStore} backed by the local profile database's `app_config` table.
 *
 * Wraps an open better-sqlite3 handle; the table is created on construction.
 * Reads surface driver errors unchanged, writes wrap them in {@link PersistenceError}.
 */
export class SqliteConfigStore implements ConfigStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS app_config (
        key   TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
  }

  /**
   * Opens (or creates) the database file, creating its directory first.
   * File databases run in WAL mode.
   */
  static open(dbPath: string = MEMORY): SqliteConfigStore {
    if (dbPath !== MEMORY) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true, mode: 0o700 });
    }
    const db = new Database(dbPath);
    if (dbPath !== MEMORY) {
      db.pragma("journal_mode = WAL");
    }
    return new SqliteConfigStore(db);
  }

  async get(key: string): Promise<string | null> {
    const row = this.db
      .prepare<[string], { value: string }>("SELECT value FROM app_config WHERE key = ?")
      .get(key);
    return row?.value ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    try {
      this.db
        .prepare<[string, string]>(
          "INSERT INTO app_config (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value"
        )
        .run(key, value);
    } catch (e) {
      throw new PersistenceError(`Failed to persist "${key}": ${(e as Error)?.message ?? e}`);
    }
  }

  close(): void {
    this.db.close();
  }
}
