/**
 * Posting validation
 *
 * Boundary check between a source mapper and the pipeline core. The
 * mapper output is untrusted; only the three identifying fields are
 * required, everything else is carried over when it has the right type.
 */

import type {
  PostingContract,
  PostingInput,
  PostingLocation,
} from "@/types";
import { ValidationError } from "@/utils/errors";
import { isNonEmptyString, isRecord } from "@/utils/guards";

function optionalString(value: unknown): string | undefined {
  return isNonEmptyString(value) ? value.trim() : undefined;
}

/**
 * Location fields of an untrusted object, wrong types dropped
 */
export function pickLocation(value: unknown): PostingLocation {
  if (!isRecord(value)) {
    return {};
  }
  const location: PostingLocation = {};
  const label = optionalString(value.label);
  const postalCode = optionalString(value.postalCode);
  const commune = optionalString(value.commune);
  const departmentCode = optionalString(value.departmentCode);
  const regionCode = optionalString(value.regionCode);
  const regionLabel = optionalString(value.regionLabel);
  if (label) location.label = label;
  if (postalCode) location.postalCode = postalCode;
  if (commune) location.commune = commune;
  if (departmentCode) location.departmentCode = departmentCode;
  if (regionCode) location.regionCode = regionCode;
  if (regionLabel) location.regionLabel = regionLabel;
  return location;
}

export function pickContract(value: unknown): PostingContract {
  if (!isRecord(value)) {
    return {};
  }
  const contract: PostingContract = {};
  const type = optionalString(value.type);
  const typeLabel = optionalString(value.typeLabel);
  const nature = optionalString(value.nature);
  const experienceLabel = optionalString(value.experienceLabel);
  const workingHoursLabel = optionalString(value.workingHoursLabel);
  if (type) contract.type = type;
  if (typeLabel) contract.typeLabel = typeLabel;
  if (nature) contract.nature = nature;
  if (experienceLabel) contract.experienceLabel = experienceLabel;
  if (workingHoursLabel) contract.workingHoursLabel = workingHoursLabel;
  if (typeof value.alternance === "boolean") {
    contract.alternance = value.alternance;
  }
  return contract;
}

/**
 * Validates a mapped posting candidate.
 *
 * @throws {ValidationError} When externalId, title or createdAt is missing,
 * null or empty, or createdAt is not a parsable date
 */
export function validatePosting(input: unknown): PostingInput {
  if (!isRecord(input)) {
    throw new ValidationError("posting", "must be an object", null);
  }

  const externalId =
    typeof input.externalId === "number"
      ? String(input.externalId)
      : optionalString(input.externalId);
  if (externalId === undefined) {
    throw new ValidationError("externalId", "is missing or empty", null);
  }

  const title = optionalString(input.title);
  if (title === undefined) {
    throw new ValidationError("title", "is missing or empty", externalId);
  }

  const createdAt = optionalString(input.createdAt);
  if (createdAt === undefined) {
    throw new ValidationError("createdAt", "is missing or empty", externalId);
  }
  if (Number.isNaN(Date.parse(createdAt))) {
    throw new ValidationError(
      "createdAt",
      `is not a valid date: "${createdAt}"`,
      externalId,
    );
  }

  const posting: PostingInput = {
    externalId,
    title,
    description:
      typeof input.description === "string" ? input.description : "",
    createdAt,
    location: pickLocation(input.location),
    contract: pickContract(input.contract),
  };

  const updatedAt = optionalString(input.updatedAt);
  if (updatedAt && !Number.isNaN(Date.parse(updatedAt))) {
    posting.updatedAt = updatedAt;
  }
  const companyName = optionalString(input.companyName);
  if (companyName) posting.companyName = companyName;
  const romeCode = optionalString(input.romeCode);
  if (romeCode) posting.romeCode = romeCode;
  const url = optionalString(input.url);
  if (url) posting.url = url;

  return posting;
}
