/**
 * Skills repository
 *
 * Data access layer for skills table (skill records + detection counters).
 */

import type { Skill, SkillRow } from "@/types";
import { getDb } from "../connection";

function decodeSynonyms(text: string): string[] {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return [];
  }
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : [];
}

function rowToSkill(row: SkillRow): Skill {
  return {
    name: row.name,
    key: row.key,
    categoryId: row.category_id,
    synonyms: decodeSynonyms(row.synonyms_json),
    detectionCount: row.detection_count,
    lastDetectedAt: row.last_detected_at,
  };
}

/**
 * Upsert skill records by name in one transaction
 */
export function saveSkills(skills: Skill[]): void {
  const db = getDb();

  const stmt = db.prepare(`
    INSERT INTO skills (
      name, key, category_id, synonyms_json, detection_count, last_detected_at
    )
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(name) DO UPDATE SET
      key = excluded.key,
      category_id = excluded.category_id,
      synonyms_json = excluded.synonyms_json,
      detection_count = excluded.detection_count,
      last_detected_at = excluded.last_detected_at,
      updated_at = datetime('now')
  `);

  const saveAll = db.transaction((items: Skill[]) => {
    for (const skill of items) {
      stmt.run(
        skill.name,
        skill.key,
        skill.categoryId,
        JSON.stringify(skill.synonyms),
        skill.detectionCount,
        skill.lastDetectedAt,
      );
    }
  });

  saveAll(skills);
}

export function listSkills(): Skill[] {
  const db = getDb();
  const rows = db
    .prepare("SELECT * FROM skills ORDER BY name")
    .all() as SkillRow[];
  return rows.map(rowToSkill);
}
