/**
 * Ingestion runs repository
 *
 * Data access layer for ingestion_runs and run_errors tables.
 */

import type {
  IngestionRun,
  IngestionRunInput,
  IngestionRunUpdate,
  PostingErrorReport,
  RunErrorRow,
} from "@/types";
import { getDb } from "../connection";

/**
 * Columns finishRun() may set, in update order
 */
const UPDATABLE_COLUMNS = [
  "finished_at",
  "status",
  "offers_fetched",
  "postings_inserted",
  "postings_duplicates",
  "postings_filtered",
  "postings_invalid",
  "postings_closed",
  "errors_count",
  "notes",
] as const satisfies readonly (keyof IngestionRunUpdate)[];

/**
 * Create a new ingestion run
 * Returns the run id
 */
export function createRun(input: IngestionRunInput): number {
  const db = getDb();

  const result = db
    .prepare(
      `
    INSERT INTO ingestion_runs (provider, query_json, started_at)
    VALUES (?, ?, ?)
  `,
    )
    .run(
      input.provider,
      input.query ? JSON.stringify(input.query) : null,
      new Date().toISOString(),
    );

  return Number(result.lastInsertRowid);
}

/**
 * Update/finish an ingestion run
 */
export function finishRun(runId: number, update: IngestionRunUpdate): void {
  const db = getDb();

  const fields: string[] = [];
  const values: (string | number | null)[] = [];

  for (const column of UPDATABLE_COLUMNS) {
    const value = update[column];
    if (value !== undefined) {
      fields.push(`${column} = ?`);
      values.push(value);
    }
  }

  if (fields.length === 0) {
    return; // Nothing to update
  }

  values.push(runId);

  const sql = `UPDATE ingestion_runs SET ${fields.join(", ")} WHERE id = ?`;
  db.prepare(sql).run(...values);
}

/**
 * Get run by id
 */
export function getRunById(id: number): IngestionRun | undefined {
  const db = getDb();
  return db.prepare("SELECT * FROM ingestion_runs WHERE id = ?").get(id) as
    | IngestionRun
    | undefined;
}

/**
 * Store the rejected records of a run
 */
export function insertRunErrors(
  runId: number,
  errors: PostingErrorReport[],
): void {
  if (errors.length === 0) {
    return;
  }
  const db = getDb();
  const stmt = db.prepare(
    "INSERT INTO run_errors (run_id, external_id, reason) VALUES (?, ?, ?)",
  );
  const insertAll = db.transaction((items: PostingErrorReport[]) => {
    for (const item of items) {
      stmt.run(runId, item.externalId, item.reason);
    }
  });
  insertAll(errors);
}

export function listRunErrors(runId: number): RunErrorRow[] {
  const db = getDb();
  return db
    .prepare("SELECT * FROM run_errors WHERE run_id = ? ORDER BY id")
    .all(runId) as RunErrorRow[];
}
