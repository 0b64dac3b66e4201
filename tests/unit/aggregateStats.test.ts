/**
 * Unit tests for skill statistics aggregation
 */

import { describe, it, expect } from "vitest";
import {
  aggregate,
  compareSkillNames,
  toPercentage,
  type AggregatablePosting,
} from "@/signal/aggregation/aggregateStats";
import { extractSkills, skillNames } from "@/signal/matcher";
import { normalizeText } from "@/utils/text/textNormalization";
import { buildTaxonomy, createTestTaxonomy } from "../helpers/taxonomy";

const taxonomy = createTestTaxonomy();
const analyzedAt = new Date("2025-04-30T12:00:00Z");

function posting(
  externalId: string,
  skills: string[],
  overrides: Partial<AggregatablePosting> = {},
): AggregatablePosting {
  return {
    externalId,
    skills,
    createdAt: "2025-03-14T10:00:00Z",
    location: {},
    ...overrides,
  };
}

const nancy = posting("1", ["Docker", "Python"], {
  location: { departmentCode: "54", regionCode: "44" },
});
const paris = posting("2", ["JavaScript", "Docker"], {
  createdAt: "2025-04-02T09:00:00Z",
  location: { departmentCode: "75", regionCode: "11" },
});
const noSkills = posting("3", []);

describe("aggregate", () => {
  it("should build ranking, categories and breakdowns", () => {
    const stats = aggregate([nancy, paris, noSkills], taxonomy, { analyzedAt });

    expect(stats).toEqual({
      periodId: "2025-04",
      analyzedAt: "2025-04-30T12:00:00.000Z",
      granularity: "month",
      locationField: "region",
      totalPostings: 2,
      ranking: [
        { skill: "Docker", categoryId: "cloud_devops", count: 2, percentage: 100 },
        { skill: "JavaScript", categoryId: "langages", count: 1, percentage: 50 },
        { skill: "Python", categoryId: "langages", count: 1, percentage: 50 },
      ],
      categories: [
        {
          categoryId: "cloud_devops",
          postingCount: 2,
          percentage: 100,
          skillsDetected: 1,
          skillsAvailable: 5,
          skills: [
            { skill: "Docker", categoryId: "cloud_devops", count: 2, percentage: 100 },
          ],
        },
        {
          categoryId: "langages",
          postingCount: 2,
          percentage: 100,
          skillsDetected: 2,
          skillsAvailable: 7,
          skills: [
            { skill: "JavaScript", categoryId: "langages", count: 1, percentage: 50 },
            { skill: "Python", categoryId: "langages", count: 1, percentage: 50 },
          ],
        },
      ],
      geography: [
        { key: "11", count: 1 },
        { key: "44", count: 1 },
      ],
      timeline: [
        { key: "2025-03", count: 1 },
        { key: "2025-04", count: 1 },
      ],
    });
  });

  it("should count a duplicated id once, first occurrence winning", () => {
    const stats = aggregate(
      [nancy, posting("1", ["Kubernetes"]), posting("4", []), posting("4", ["Git"])],
      taxonomy,
      { analyzedAt },
    );

    expect(stats.totalPostings).toBe(1);
    expect(stats.ranking.map((stat) => stat.skill)).toEqual(["Docker", "Python"]);
  });

  it("should count a skill once per posting", () => {
    const stats = aggregate(
      [posting("1", ["Docker", "Docker"])],
      taxonomy,
      { analyzedAt },
    );
    expect(stats.ranking).toEqual([
      { skill: "Docker", categoryId: "cloud_devops", count: 1, percentage: 100 },
    ]);
  });

  it("should not depend on input order", () => {
    const forward = aggregate([nancy, paris], taxonomy, { analyzedAt });
    const backward = aggregate([paris, nancy], taxonomy, { analyzedAt });
    expect(backward).toEqual(forward);
  });

  it("should give identical output for identical input", () => {
    const input = [nancy, paris, noSkills];
    expect(aggregate(input, taxonomy, { analyzedAt })).toEqual(
      aggregate(input, taxonomy, { analyzedAt }),
    );
  });

  it("should never count a skill in more postings than were considered", () => {
    const stats = aggregate(
      [
        nancy,
        paris,
        posting("5", ["Docker", "Docker", "Git"]),
        posting("5", ["Docker"]),
        posting("6", ["Python", "Python"]),
      ],
      taxonomy,
      { analyzedAt },
    );

    expect(stats.totalPostings).toBe(4);
    for (const stat of stats.ranking) {
      expect(stat.count).toBeLessThanOrEqual(stats.totalPostings);
      expect(stat.percentage).toBeLessThanOrEqual(100);
    }
    for (const category of stats.categories) {
      expect(category.postingCount).toBeLessThanOrEqual(stats.totalPostings);
    }
  });

  it("should put postings without location or date in the unknown bucket", () => {
    const stats = aggregate(
      [nancy, posting("9", ["Python"], { createdAt: "n/a" })],
      taxonomy,
      { analyzedAt },
    );

    expect(stats.geography).toEqual([
      { key: "44", count: 1 },
      { key: "unknown", count: 1 },
    ]);
    expect(stats.timeline).toEqual([
      { key: "2025-03", count: 1 },
      { key: "unknown", count: 1 },
    ]);
  });

  it("should break down by department and quarter when asked", () => {
    const stats = aggregate([nancy, paris], taxonomy, {
      analyzedAt,
      granularity: "quarter",
      locationField: "department",
      periodId: "2025-Q2",
    });

    expect(stats.periodId).toBe("2025-Q2");
    expect(stats.geography).toEqual([
      { key: "54", count: 1 },
      { key: "75", count: 1 },
    ]);
    expect(stats.timeline).toEqual([
      { key: "2025-Q1", count: 1 },
      { key: "2025-Q2", count: 1 },
    ]);
  });

  it("should return zero totals for empty input", () => {
    expect(aggregate([], taxonomy, { analyzedAt })).toEqual({
      periodId: "2025-04",
      analyzedAt: "2025-04-30T12:00:00.000Z",
      granularity: "month",
      locationField: "region",
      totalPostings: 0,
      ranking: [],
      categories: [],
      geography: [],
      timeline: [],
    });
  });
});

describe("normalize, extract and aggregate", () => {
  it("should rank skills found in free-text postings", () => {
    const small = buildTaxonomy({
      langages: ["Python", "JavaScript"],
      outils: ["Docker"],
    });
    const texts = [
      { id: "1", text: "Recherche développeur Python et Docker" },
      { id: "2", text: "Profil JavaScript avec Docker souhaité" },
    ];

    const postings = texts.map(({ id, text }) =>
      posting(id, skillNames(extractSkills(normalizeText(text), small))),
    );
    expect(postings.map((p) => p.skills)).toEqual([
      ["Python", "Docker"],
      ["JavaScript", "Docker"],
    ]);

    const stats = aggregate(postings, small, { analyzedAt });
    expect(stats.totalPostings).toBe(2);
    expect(stats.ranking).toEqual([
      { skill: "Docker", categoryId: "outils", count: 2, percentage: 100 },
      { skill: "JavaScript", categoryId: "langages", count: 1, percentage: 50 },
      { skill: "Python", categoryId: "langages", count: 1, percentage: 50 },
    ]);
  });
});

describe("toPercentage", () => {
  it("should round to one decimal", () => {
    expect(toPercentage(1, 3)).toBe(33.3);
    expect(toPercentage(2, 3)).toBe(66.7);
  });

  it("should return 0 for an empty total", () => {
    expect(toPercentage(0, 0)).toBe(0);
  });
});

describe("compareSkillNames", () => {
  it("should compare case-folded names first", () => {
    expect(compareSkillNames("javascript", "Python")).toBe(-1);
  });

  it("should fall back to the raw name", () => {
    expect(compareSkillNames("Python", "python")).toBe(-1);
    expect(compareSkillNames("Go", "Go")).toBe(0);
  });
});
