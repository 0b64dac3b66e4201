/**
 * Unit tests for the skill registry
 */

import { describe, it, expect } from "vitest";
import { SkillRegistry } from "@/signal/aggregation";
import type { Skill } from "@/types";
import { createTestTaxonomy } from "../helpers/taxonomy";

const taxonomy = createTestTaxonomy();

describe("SkillRegistry", () => {
  it("should seed one record per taxonomy skill", () => {
    const registry = SkillRegistry.fromTaxonomy(taxonomy);

    expect(registry.list()).toHaveLength(15);
    expect(registry.get("JavaScript")).toEqual({
      name: "JavaScript",
      key: "javascript",
      categoryId: "langages",
      synonyms: ["js", "ecmascript"],
      detectionCount: 0,
      lastDetectedAt: null,
    });
  });

  it("should carry over persisted counters and drop unknown skills", () => {
    const existing: Skill[] = [
      {
        name: "Python",
        key: "python",
        categoryId: "langages",
        synonyms: [],
        detectionCount: 4,
        lastDetectedAt: "2025-01-01T00:00:00.000Z",
      },
      {
        name: "COBOL",
        key: "cobol",
        categoryId: "langages",
        synonyms: [],
        detectionCount: 9,
        lastDetectedAt: null,
      },
    ];

    const registry = SkillRegistry.fromTaxonomy(taxonomy, existing);

    expect(registry.get("Python")?.detectionCount).toBe(4);
    expect(registry.get("COBOL")).toBeUndefined();
  });

  it("should count each skill once per posting", () => {
    const registry = SkillRegistry.fromTaxonomy(taxonomy);

    const touched = registry.recordDetections(
      [{ skills: ["Docker", "Python", "Docker"] }, { skills: ["Python", "COBOL"] }],
      new Date("2025-03-01T00:00:00Z"),
    );

    expect(touched).toEqual(["Python", "Docker"]);
    expect(registry.get("Python")).toMatchObject({
      detectionCount: 2,
      lastDetectedAt: "2025-03-01T00:00:00.000Z",
    });
    expect(registry.get("Docker")?.detectionCount).toBe(1);
    expect(registry.get("Java")?.lastDetectedAt).toBeNull();
  });

  it("should hand out copies", () => {
    const registry = SkillRegistry.fromTaxonomy(taxonomy);
    const copy = registry.get("JavaScript");
    copy?.synonyms.push("jscript");

    expect(registry.get("JavaScript")?.synonyms).toEqual(["js", "ecmascript"]);
  });
});
