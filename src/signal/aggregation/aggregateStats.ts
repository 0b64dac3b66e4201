/**
 * Skill statistics aggregation
 *
 * Pure in-memory aggregation of processed postings into AggregateStats.
 * No DB access, no side effects; the same input always yields the same
 * output, independent of input Map/Set iteration order.
 */

import type {
  AggregateOptions,
  AggregateStats,
  BreakdownEntry,
  CategoryStat,
  LocationField,
  Posting,
  SkillStat,
  TaxonomyRuntime,
} from "@/types";
import {
  DEFAULT_GRANULARITY,
  DEFAULT_LOCATION_FIELD,
  PERCENTAGE_DECIMALS,
  UNKNOWN_BUCKET,
} from "@/constants";
import { bucketKeyOf, defaultPeriodId } from "@/utils/time/periods";

/**
 * Fields of a posting the aggregator reads
 */
export type AggregatablePosting = Pick<
  Posting,
  "externalId" | "skills" | "createdAt" | "location"
>;

const PERCENTAGE_FACTOR = 10 ** PERCENTAGE_DECIMALS;

export function toPercentage(count: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return Math.round((count / total) * 100 * PERCENTAGE_FACTOR) / PERCENTAGE_FACTOR;
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Skill name order for ties: case-folded name, then raw name
 */
export function compareSkillNames(a: string, b: string): number {
  return (
    compareCodeUnits(a.toLowerCase(), b.toLowerCase()) || compareCodeUnits(a, b)
  );
}

function rankSkills(stats: SkillStat[]): SkillStat[] {
  return [...stats].sort(
    (a, b) => b.count - a.count || compareSkillNames(a.skill, b.skill),
  );
}

function sortBreakdown(counts: Map<string, number>): BreakdownEntry[] {
  return [...counts.entries()]
    .map(([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count || compareCodeUnits(a.key, b.key));
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * First occurrence of each id, then only postings with skills
 */
function selectPostings<T extends AggregatablePosting>(postings: T[]): T[] {
  const seen = new Set<string>();
  const selected: T[] = [];
  for (const posting of postings) {
    if (seen.has(posting.externalId)) {
      continue;
    }
    seen.add(posting.externalId);
    if (posting.skills.length > 0) {
      selected.push(posting);
    }
  }
  return selected;
}

function locationKey(
  posting: AggregatablePosting,
  field: LocationField,
): string {
  const value =
    field === "region"
      ? posting.location.regionCode
      : posting.location.departmentCode;
  return value || UNKNOWN_BUCKET;
}

/**
 * Aggregate postings into ranked skill statistics.
 *
 * Steps:
 * 1. Deduplicate by externalId (first occurrence wins), keep postings with skills
 * 2. Count distinct postings per taxonomy skill (unknown skill names ignored)
 * 3. Rank by count desc, name asc; percentages to one decimal
 * 4. Per-category view for categories with at least one detection
 * 5. Geography and timeline breakdowns
 *
 * Empty input yields zero totals and empty lists.
 */
export function aggregate(
  postings: AggregatablePosting[],
  taxonomy: TaxonomyRuntime,
  options: AggregateOptions = {},
): AggregateStats {
  const granularity = options.granularity ?? DEFAULT_GRANULARITY;
  const locationField = options.locationField ?? DEFAULT_LOCATION_FIELD;
  const analyzedAt = options.analyzedAt ?? new Date();
  const periodId = options.periodId ?? defaultPeriodId(analyzedAt);

  const selected = selectPostings(postings);
  const total = selected.length;

  const skillCounts = new Map<string, number>();
  const categoryCounts = new Map<string, number>();
  const geoCounts = new Map<string, number>();
  const timeCounts = new Map<string, number>();

  for (const posting of selected) {
    const categories = new Set<string>();
    for (const name of new Set(posting.skills)) {
      const definition = taxonomy.skills.get(name);
      if (!definition) {
        continue;
      }
      increment(skillCounts, name);
      categories.add(definition.categoryId);
    }
    for (const categoryId of categories) {
      increment(categoryCounts, categoryId);
    }

    increment(geoCounts, locationKey(posting, locationField));
    increment(
      timeCounts,
      bucketKeyOf(posting.createdAt, granularity) ?? UNKNOWN_BUCKET,
    );
  }

  const ranking = rankSkills(
    [...skillCounts.entries()].flatMap(([skill, count]) => {
      const definition = taxonomy.skills.get(skill);
      return definition
        ? [
            {
              skill,
              categoryId: definition.categoryId,
              count,
              percentage: toPercentage(count, total),
            },
          ]
        : [];
    }),
  );

  const categories: CategoryStat[] = [...categoryCounts.entries()]
    .map(([categoryId, postingCount]) => {
      const skills = ranking.filter((stat) => stat.categoryId === categoryId);
      return {
        categoryId,
        postingCount,
        percentage: toPercentage(postingCount, total),
        skillsDetected: skills.length,
        skillsAvailable: taxonomy.categories.get(categoryId)?.skills.length ?? 0,
        skills,
      };
    })
    .sort(
      (a, b) =>
        b.postingCount - a.postingCount ||
        compareCodeUnits(a.categoryId, b.categoryId),
    );

  const timeline = [...timeCounts.entries()]
    .map(([key, count]) => ({ key, count }))
    .sort((a, b) => {
      if (a.key === UNKNOWN_BUCKET) return 1;
      if (b.key === UNKNOWN_BUCKET) return -1;
      return compareCodeUnits(a.key, b.key);
    });

  return {
    periodId,
    analyzedAt: analyzedAt.toISOString(),
    granularity,
    locationField,
    totalPostings: total,
    ranking,
    categories,
    geography: sortBreakdown(geoCounts),
    timeline,
  };
}
