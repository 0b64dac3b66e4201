/**
 * Temporary SQLite databases for integration and e2e tests
 *
 * Each harness is a fresh file with every migration applied, injected
 * into the connection singleton so the repos use it. Call cleanup()
 * after each test.
 */

import Database from "better-sqlite3";
import { mkdirSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { randomUUID } from "crypto";
import { applyMigrations, setDbForTesting } from "@/db";

export interface TestDbHarness {
  db: Database.Database;
  dbPath: string;
  /** Detach from the singleton, close, and delete the file and its WAL */
  cleanup: () => void;
}

const TEST_DB_DIR = join(tmpdir(), "job-skills-radar-tests");

export function createTestDb(): TestDbHarness {
  mkdirSync(TEST_DB_DIR, { recursive: true });
  const dbPath = join(TEST_DB_DIR, `test-${randomUUID()}.db`);

  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  applyMigrations(db);
  setDbForTesting(db);

  return {
    db,
    dbPath,
    cleanup: () => {
      setDbForTesting(null);
      if (db.open) {
        db.close();
      }
      for (const suffix of ["", "-wal", "-shm"]) {
        rmSync(dbPath + suffix, { force: true });
      }
    },
  };
}
