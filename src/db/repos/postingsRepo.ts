/**
 * Postings repository
 *
 * Data access layer for postings table. Location, contract and skills
 * are stored as JSON text columns.
 */

import type { KnownIdsSource, Posting, PostingRow } from "@/types";
import { getDb } from "../connection";
import { pickContract, pickLocation } from "@/utils/postingValidation";
import * as logger from "@/logger";

function parseJsonColumn(text: string, column: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    logger.warn("Malformed JSON column, using empty value", { column });
    return null;
  }
}

function decodeSkills(text: string): string[] {
  const value = parseJsonColumn(text, "skills_json");
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === "string");
}

/**
 * Map a postings row back to the domain shape
 */
export function rowToPosting(row: PostingRow): Posting {
  const posting: Posting = {
    externalId: row.external_id,
    title: row.title,
    description: row.description,
    createdAt: row.created_at,
    location: pickLocation(parseJsonColumn(row.location_json, "location_json")),
    contract: pickContract(parseJsonColumn(row.contract_json, "contract_json")),
    skills: decodeSkills(row.skills_json),
    processed: row.processed === 1,
  };
  if (row.updated_at) posting.updatedAt = row.updated_at;
  if (row.company_name) posting.companyName = row.company_name;
  if (row.rome_code) posting.romeCode = row.rome_code;
  if (row.url) posting.url = row.url;
  return posting;
}

/**
 * Insert new postings in one transaction
 *
 * Existing external ids are left untouched (ON CONFLICT DO NOTHING).
 *
 * @returns Number of rows actually inserted
 */
export function insertPostings(
  provider: string,
  postings: Posting[],
  collectedAt: Date = new Date(),
): number {
  const db = getDb();

  const stmt = db.prepare(`
    INSERT INTO postings (
      external_id, provider, title, description, created_at, updated_at,
      company_name, location_json, contract_json, rome_code, url,
      skills_json, processed, collected_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(external_id) DO NOTHING
  `);

  const collected = collectedAt.toISOString();
  const insertAll = db.transaction((items: Posting[]) => {
    let inserted = 0;
    for (const posting of items) {
      const result = stmt.run(
        posting.externalId,
        provider,
        posting.title,
        posting.description,
        posting.createdAt,
        posting.updatedAt ?? null,
        posting.companyName ?? null,
        JSON.stringify(posting.location),
        JSON.stringify(posting.contract),
        posting.romeCode ?? null,
        posting.url ?? null,
        JSON.stringify(posting.skills),
        posting.processed ? 1 : 0,
        collected,
      );
      inserted += result.changes;
    }
    return inserted;
  });

  return insertAll(postings);
}

/**
 * All stored external ids (open and closed)
 */
export function listKnownExternalIds(): string[] {
  const db = getDb();
  const rows = db.prepare("SELECT external_id FROM postings").all() as {
    external_id: string;
  }[];
  return rows.map((r) => r.external_id);
}

/**
 * Known-ids source backed by the postings table, for Deduplicator.load()
 */
export const storedPostingIds: KnownIdsSource = {
  loadKnownIds: () => listKnownExternalIds(),
};

export type ListPostingsFilter = {
  /** Include postings closed on the source (default true) */
  includeClosed?: boolean;
  romeCode?: string;
};

/**
 * List postings ordered by id (insertion order)
 */
export function listPostings(filter: ListPostingsFilter = {}): Posting[] {
  const db = getDb();
  const clauses: string[] = [];
  const params: string[] = [];

  if (filter.includeClosed === false) {
    clauses.push("closed_at IS NULL");
  }
  if (filter.romeCode !== undefined) {
    clauses.push("rome_code = ?");
    params.push(filter.romeCode);
  }

  const where = clauses.length > 0 ? ` WHERE ${clauses.join(" AND ")}` : "";
  const rows = db
    .prepare(`SELECT * FROM postings${where} ORDER BY id`)
    .all(...params) as PostingRow[];
  return rows.map(rowToPosting);
}

export function getPostingByExternalId(
  externalId: string,
): Posting | undefined {
  const db = getDb();
  const row = db
    .prepare("SELECT * FROM postings WHERE external_id = ?")
    .get(externalId) as PostingRow | undefined;
  return row ? rowToPosting(row) : undefined;
}

/**
 * Closed-on-source timestamp of a posting (null while open)
 */
export function getPostingClosedAt(externalId: string): string | null {
  const db = getDb();
  const row = db
    .prepare("SELECT closed_at FROM postings WHERE external_id = ?")
    .get(externalId) as { closed_at: string | null } | undefined;
  return row?.closed_at ?? null;
}

/**
 * Mark open postings absent from the latest complete fetch as closed
 *
 * @param provider - Only postings of this provider are considered
 * @param romeCode - Only postings of this ROME code; null for all
 * @param seenExternalIds - Ids returned by the source in this run
 * @returns Number of postings closed
 */
export function closeMissingPostings(
  provider: string,
  romeCode: string | null,
  seenExternalIds: Iterable<string>,
  closedAt: Date = new Date(),
): number {
  const db = getDb();
  const seen = new Set(seenExternalIds);

  const openRows = (
    romeCode === null
      ? db
          .prepare(
            "SELECT external_id FROM postings WHERE provider = ? AND closed_at IS NULL",
          )
          .all(provider)
      : db
          .prepare(
            "SELECT external_id FROM postings WHERE provider = ? AND rome_code = ? AND closed_at IS NULL",
          )
          .all(provider, romeCode)
  ) as { external_id: string }[];

  const toClose = openRows
    .map((r) => r.external_id)
    .filter((id) => !seen.has(id));
  if (toClose.length === 0) {
    return 0;
  }

  const stmt = db.prepare(
    "UPDATE postings SET closed_at = ? WHERE external_id = ? AND closed_at IS NULL",
  );
  const stamp = closedAt.toISOString();
  const closeAll = db.transaction((ids: string[]) => {
    let closed = 0;
    for (const id of ids) {
      closed += stmt.run(stamp, id).changes;
    }
    return closed;
  });

  return closeAll(toClose);
}
