/**
 * Skill registry
 *
 * Owns the Skill records and their running detection counters. Seeded
 * from the taxonomy, carrying over persisted counters by name.
 */

import type { Posting, Skill, TaxonomyRuntime } from "@/types";

export class SkillRegistry {
  private readonly records: Map<string, Skill>;

  private constructor(records: Map<string, Skill>) {
    this.records = records;
  }

  /**
   * One record per taxonomy skill, in taxonomy order.
   *
   * Persisted skills no longer in the taxonomy are dropped.
   */
  static fromTaxonomy(
    taxonomy: TaxonomyRuntime,
    existing: Skill[] = [],
  ): SkillRegistry {
    const previous = new Map(existing.map((skill) => [skill.name, skill]));
    const records = new Map<string, Skill>();

    for (const definition of taxonomy.skills.values()) {
      const persisted = previous.get(definition.name);
      records.set(definition.name, {
        name: definition.name,
        key: definition.key,
        categoryId: definition.categoryId,
        synonyms: [...definition.synonyms],
        detectionCount: persisted?.detectionCount ?? 0,
        lastDetectedAt: persisted?.lastDetectedAt ?? null,
      });
    }

    return new SkillRegistry(records);
  }

  /**
   * Increments each distinct skill of each posting once.
   *
   * @returns Names of the skills touched, in registry order
   */
  recordDetections(
    postings: Pick<Posting, "skills">[],
    detectedAt: Date,
  ): string[] {
    const stamp = detectedAt.toISOString();
    const touched = new Set<string>();

    for (const posting of postings) {
      for (const name of new Set(posting.skills)) {
        const record = this.records.get(name);
        if (!record) {
          continue;
        }
        record.detectionCount += 1;
        record.lastDetectedAt = stamp;
        touched.add(name);
      }
    }

    return [...this.records.keys()].filter((name) => touched.has(name));
  }

  get(name: string): Skill | undefined {
    const record = this.records.get(name);
    return record ? { ...record, synonyms: [...record.synonyms] } : undefined;
  }

  list(): Skill[] {
    return [...this.records.values()].map((record) => ({
      ...record,
      synonyms: [...record.synonyms],
    }));
  }
}
