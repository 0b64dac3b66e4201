/**
 * SQLite connection singleton
 *
 * One better-sqlite3 handle per process, opened lazily from DB_PATH.
 * Tests swap it with setDbForTesting().
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, resolve } from "path";
import { DB_PATH_ENV, DEFAULT_DB_PATH } from "@/constants";

const PRAGMAS = ["foreign_keys = ON", "journal_mode = WAL"] as const;

let current: Database.Database | null = null;

/**
 * Absolute database file from DB_PATH, parent directory created.
 * ":memory:" is passed through.
 */
function prepareDbPath(): string {
  const configured = process.env[DB_PATH_ENV] || DEFAULT_DB_PATH;
  if (configured === ":memory:") {
    return configured;
  }

  const dbPath = resolve(process.cwd(), configured);
  mkdirSync(dirname(dbPath), { recursive: true });
  return dbPath;
}

/**
 * Open the connection, or return the one already open
 */
export function openDb(): Database.Database {
  if (!current) {
    const db = new Database(prepareDbPath());
    for (const pragma of PRAGMAS) {
      db.pragma(pragma);
    }
    current = db;
  }
  return current;
}

export function closeDb(): void {
  current?.close();
  current = null;
}

/**
 * The open connection
 *
 * @throws {Error} If openDb() has not been called
 */
export function getDb(): Database.Database {
  if (!current) {
    throw new Error("Database not opened, call openDb() first");
  }
  return current;
}

/**
 * @internal Test use only: inject (or clear) the connection
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  current = testDb;
}
