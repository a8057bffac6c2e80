import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

import { StorageError } from "../errors.js";
import { migrations, type Migration } from "./migrations.js";

export type Db = Database.Database;

const FATAL_SQLITE_CODES = ["SQLITE_CANTOPEN", "SQLITE_CORRUPT", "SQLITE_NOTADB", "SQLITE_FULL"];
const FATAL_SQLITE_PREFIXES = ["SQLITE_IOERR", "SQLITE_READONLY"];

/** Opens (creating if needed) the database file and brings its schema up to date. */
export function openDb(dbPath: string): Db {
  let db: Db;
  try {
    if (dbPath !== ":memory:") fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    db = new Database(dbPath);
  } catch (cause) {
    throw toStorageError(`open ${dbPath}`, cause, true);
  }

  try {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
    db.pragma("foreign_keys = ON");
    ensureSchema(db);
  } catch (cause) {
    db.close();
    throw toStorageError(`prepare ${dbPath}`, cause, true);
  }
  return db;
}

const MIGRATION_LOG_DDL = `
  CREATE TABLE IF NOT EXISTS schema_migrations(
    version INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )
`;

/**
 * Applies, in version order and inside one transaction, every migration not
 * yet recorded in `schema_migrations`. Safe to call on every start.
 */
export function ensureSchema(db: Db, all: Migration[] = migrations): void {
  const upgrade = db.transaction(() => {
    db.exec(MIGRATION_LOG_DDL);
    const applied = new Set(
      db
        .prepare<[], { version: number }>("SELECT version FROM schema_migrations")
        .all()
        .map((row) => row.version)
    );
    const record = db.prepare<[number, string]>("INSERT INTO schema_migrations(version, name) VALUES(?, ?)");

    for (const m of [...all].sort((a, b) => a.version - b.version)) {
      if (applied.has(m.version)) continue;
      db.exec(m.sql);
      record.run(m.version, m.name);
    }
  });

  try {
    upgrade();
  } catch (cause) {
    throw toStorageError("ensure schema", cause, true);
  }
}

function sqliteCodeOf(cause: unknown): string | undefined {
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") return cause.code;
  return undefined;
}

/** Whether a failure means the database itself is unusable, not just this write. */
export function isFatalStorageFailure(db: Db | null, cause: unknown): boolean {
  if (db && !db.open) return true;
  const code = sqliteCodeOf(cause);
  if (!code) return false;
  return FATAL_SQLITE_CODES.includes(code) || FATAL_SQLITE_PREFIXES.some((p) => code.startsWith(p));
}

export function toStorageError(operation: string, cause: unknown, fatal: boolean): StorageError {
  if (cause instanceof StorageError) return cause;
  return new StorageError(
    {
      operation,
      sqliteCode: sqliteCodeOf(cause),
      fatal,
      detail: cause instanceof Error ? cause.message : String(cause)
    },
    { cause }
  );
}
