/**
 * French department and region lookup
 *
 * Department codes come from the first digits of the postal code; regions
 * come from the INSEE table in data/regions.json.
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { REGIONS_PATH } from "@/constants";
import { ConfigurationError } from "@/utils/errors";
import { isNonEmptyString, isRecord } from "@/utils/guards";

export type RegionInfo = {
  code: string;
  label: string;
};

/**
 * Department code → region
 */
export type RegionIndex = ReadonlyMap<string, RegionInfo>;

const POSTAL_CODE_PATTERN = /^\d{5}$/;

/**
 * Department code of a French postal code.
 *
 * - Metropolitan: first two digits ("54000" → "54")
 * - Corsica: 200xx-201xx → "2A", 202xx-206xx → "2B"
 * - Overseas: first three digits ("97400" → "974")
 *
 * @returns undefined when the postal code is not five digits
 */
export function departmentFromPostalCode(
  postalCode: string | undefined,
): string | undefined {
  const code = postalCode?.trim();
  if (!code || !POSTAL_CODE_PATTERN.test(code)) {
    return undefined;
  }

  if (code.startsWith("97") || code.startsWith("98")) {
    return code.slice(0, 3);
  }
  if (code.startsWith("20")) {
    return Number(code.slice(0, 3)) < 202 ? "2A" : "2B";
  }
  return code.slice(0, 2);
}

/**
 * Builds the department → region index from a `{ regions }` document.
 *
 * @throws {ConfigurationError} If the document is malformed
 */
export function buildRegionIndex(raw: unknown): RegionIndex {
  if (!isRecord(raw) || !isRecord(raw.regions)) {
    throw new ConfigurationError("regions file must contain a regions object");
  }

  const index = new Map<string, RegionInfo>();
  for (const [code, region] of Object.entries(raw.regions)) {
    if (
      !isRecord(region) ||
      !isNonEmptyString(region.label) ||
      !Array.isArray(region.departments)
    ) {
      throw new ConfigurationError(`region ${code} is malformed`);
    }
    for (const department of region.departments) {
      if (typeof department !== "string") {
        throw new ConfigurationError(
          `region ${code} has a non-string department`,
        );
      }
      index.set(department, { code, label: region.label });
    }
  }
  return index;
}

let cachedIndex: RegionIndex | null = null;

/**
 * Loads and caches the region index from data/regions.json
 */
export function loadRegionIndex(path: string = REGIONS_PATH): RegionIndex {
  if (cachedIndex && path === REGIONS_PATH) {
    return cachedIndex;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolve(process.cwd(), path), "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`cannot read regions file ${path}`, {
      cause: err,
    });
  }

  const index = buildRegionIndex(raw);
  if (path === REGIONS_PATH) {
    cachedIndex = index;
  }
  return index;
}
