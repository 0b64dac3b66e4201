/**
 * Unit tests for posting validation
 *
 * Required fields, type coercion of the identifier, and optional fields
 * carried over only when they have the expected type.
 */

import { describe, it, expect } from "vitest";
import { validatePosting } from "@/utils/postingValidation";
import { ValidationError } from "@/utils/errors";

function rejection(input: unknown): ValidationError {
  try {
    validatePosting(input);
  } catch (err) {
    if (err instanceof ValidationError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected validatePosting to throw");
}

describe("validatePosting", () => {
  it("should accept the minimal posting and trim identifying fields", () => {
    expect(
      validatePosting({
        externalId: " 42 ",
        title: " Développeur ",
        createdAt: "2025-03-14T10:00:00Z",
      }),
    ).toEqual({
      externalId: "42",
      title: "Développeur",
      description: "",
      createdAt: "2025-03-14T10:00:00Z",
      location: {},
      contract: {},
    });
  });

  it("should turn a numeric id into a string", () => {
    const posting = validatePosting({
      externalId: 12345,
      title: "Dev",
      createdAt: "2025-03-14",
    });
    expect(posting.externalId).toBe("12345");
  });

  it("should reject a missing id", () => {
    const err = rejection({ title: "Dev", createdAt: "2025-03-14" });
    expect(err.message).toBe("Invalid posting: externalId is missing or empty");
    expect(err.externalId).toBeNull();
    expect(err.field).toBe("externalId");
  });

  it("should reject an empty title and report the id", () => {
    const err = rejection({ externalId: "7", title: "   ", createdAt: "2025-03-14" });
    expect(err.message).toBe("Invalid posting 7: title is missing or empty");
    expect(err.externalId).toBe("7");
  });

  it("should reject a null creation date", () => {
    const err = rejection({ externalId: "7", title: "Dev", createdAt: null });
    expect(err.message).toBe("Invalid posting 7: createdAt is missing or empty");
  });

  it("should reject an unparsable creation date", () => {
    const err = rejection({ externalId: "7", title: "Dev", createdAt: "not-a-date" });
    expect(err.message).toBe(
      'Invalid posting 7: createdAt is not a valid date: "not-a-date"',
    );
  });

  it("should reject a value that is not an object", () => {
    expect(rejection(["7"]).message).toBe(
      "Invalid posting: posting must be an object",
    );
  });

  it("should keep optional fields of the right type only", () => {
    const posting = validatePosting({
      externalId: "8",
      title: "Dev",
      description: "<p>Python</p>",
      createdAt: "2025-03-14T10:00:00Z",
      updatedAt: "yesterday",
      companyName: 42,
      romeCode: "M1805",
      url: "",
      location: { postalCode: "54000", regionCode: 44, label: "54 - Nancy" },
      contract: { type: "", alternance: true, typeLabel: "CDI" },
    });

    expect(posting).toEqual({
      externalId: "8",
      title: "Dev",
      description: "<p>Python</p>",
      createdAt: "2025-03-14T10:00:00Z",
      romeCode: "M1805",
      location: { postalCode: "54000", label: "54 - Nancy" },
      contract: { alternance: true, typeLabel: "CDI" },
    });
  });
});
