/**
 * Unit tests for taxonomy validation, compilation and loading
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { compileTaxonomy, emptyTaxonomy, loadTaxonomy } from "@/taxonomy";
import { validateTaxonomyRaw } from "@/utils/taxonomyValidation";
import { ConfigurationError } from "@/utils/errors";
import { buildTaxonomy } from "../helpers/taxonomy";

describe("validateTaxonomyRaw", () => {
  it("should accept the versioned document", () => {
    const raw = validateTaxonomyRaw({
      version: "2025.01",
      categories: { langages: ["Python", { name: "Java" }] },
    });
    expect(raw.version).toBe("2025.01");
    expect(raw.categories).toEqual({ langages: ["Python", { name: "Java" }] });
  });

  it("should accept a bare category mapping as unversioned", () => {
    const raw = validateTaxonomyRaw({ langages: ["Python"] });
    expect(raw.version).toBe("unversioned");
    expect(raw.categories).toEqual({ langages: ["Python"] });
  });

  it("should accept a taxonomy with zero categories", () => {
    expect(validateTaxonomyRaw({ version: "1", categories: {} }).categories).toEqual(
      {},
    );
  });

  it("should reject a document that is not an object", () => {
    expect(() => validateTaxonomyRaw(["Python"])).toThrow(ConfigurationError);
    expect(() => validateTaxonomyRaw("Python")).toThrow(ConfigurationError);
    expect(() => validateTaxonomyRaw(null)).toThrow(ConfigurationError);
  });

  it("should reject a non-string version", () => {
    expect(() => validateTaxonomyRaw({ version: 3, categories: {} })).toThrow(
      "version must be a non-empty string",
    );
  });

  it("should reject an empty category", () => {
    expect(() => validateTaxonomyRaw({ langages: [] })).toThrow(
      "Configuration error: taxonomy categories.langages cannot be empty",
    );
  });

  it("should reject a category that is not a list", () => {
    expect(() => validateTaxonomyRaw({ langages: "Python" })).toThrow(
      "categories.langages must be an array",
    );
  });

  it("should reject malformed entries", () => {
    expect(() => validateTaxonomyRaw({ langages: [42] })).toThrow(
      "categories.langages[0] must be a string or an object",
    );
    expect(() => validateTaxonomyRaw({ langages: ["  "] })).toThrow(
      "categories.langages[0] cannot be empty or whitespace-only",
    );
    expect(() =>
      validateTaxonomyRaw({ langages: [{ synonyms: ["py"] }] }),
    ).toThrow("categories.langages[0].name must be a non-empty string");
    expect(() =>
      validateTaxonomyRaw({ langages: [{ name: "Python", synonyms: "py" }] }),
    ).toThrow("categories.langages[0].synonyms must be an array");
  });

  it("should reject canonical names that collide after normalization", () => {
    expect(() =>
      validateTaxonomyRaw({ langages: ["Python"], outils: ["python"] }),
    ).toThrow(
      'Configuration error: taxonomy duplicate skill name "python" in outils (already defined in langages)',
    );
  });
});

describe("compileTaxonomy", () => {
  it("should register skills in file order with normalized keys", () => {
    const taxonomy = buildTaxonomy({
      langages: ["Python", { name: "C++", synonyms: ["cpp"] }],
      bases: ["PostgreSQL"],
    });

    expect([...taxonomy.skills.keys()]).toEqual(["Python", "C++", "PostgreSQL"]);
    expect(taxonomy.skills.get("C++")).toEqual({
      name: "C++",
      key: "c++",
      categoryId: "langages",
      synonyms: ["cpp"],
      order: 1,
    });
    expect(taxonomy.categories.get("langages")).toEqual({
      id: "langages",
      skills: ["Python", "C++"],
    });
  });

  it("should index multi-token aliases by their first token", () => {
    const taxonomy = buildTaxonomy({
      cloud: [{ name: "AWS", synonyms: ["Amazon Web Services"] }],
    });
    expect(taxonomy.aliasIndex.get("amazon")).toEqual([
      {
        skill: "AWS",
        categoryId: "cloud",
        tokens: ["amazon", "web", "services"],
        notFollowedBy: [],
      },
    ]);
  });

  it("should add the joined variant of dotted and hyphenated aliases", () => {
    const taxonomy = buildTaxonomy({
      frameworks: ["Vue.js"],
      methodes: [{ name: "Microservices", synonyms: ["micro-services"] }],
    });

    expect(taxonomy.aliasIndex.get("vue")?.[0].tokens).toEqual(["vue", "js"]);
    expect(taxonomy.aliasIndex.get("vuejs")?.[0].skill).toBe("Vue.js");
    expect(taxonomy.aliasIndex.get("micro")?.[0].tokens).toEqual([
      "micro",
      "services",
    ]);
    expect(taxonomy.aliasIndex.get("microservices")).toHaveLength(1);
  });

  it("should let an explicit alias win over a joined variant", () => {
    const taxonomy = buildTaxonomy({
      frameworks: ["Node.js"],
      outils: [{ name: "Toolkit", synonyms: ["nodejs"] }],
    });
    expect(taxonomy.aliasIndex.get("nodejs")).toEqual([
      {
        skill: "Toolkit",
        categoryId: "outils",
        tokens: ["nodejs"],
        notFollowedBy: [],
      },
    ]);
  });

  it("should normalize notFollowedBy tokens", () => {
    const taxonomy = buildTaxonomy({
      outils: [{ name: "Git", notFollowedBy: ["Hub", "LAB"] }],
    });
    expect(taxonomy.aliasIndex.get("git")?.[0].notFollowedBy).toEqual([
      "hub",
      "lab",
    ]);
  });

  it("should reject an alias that normalizes to zero tokens", () => {
    expect(() =>
      buildTaxonomy({ outils: [{ name: "Foo", synonyms: ["!!!"] }] }),
    ).toThrow('skill "Foo" has alias "!!!" that normalizes to zero tokens');
  });

  it("should reject an alias claimed by two skills", () => {
    expect(() =>
      buildTaxonomy({
        langages: [{ name: "JavaScript", synonyms: ["js"] }],
        formats: [{ name: "JSON", synonyms: ["JS"] }],
      }),
    ).toThrow('alias "JS" of "JSON" is already an alias of "JavaScript"');
  });

  it("should reject a multi-token notFollowedBy entry", () => {
    expect(() =>
      buildTaxonomy({ outils: [{ name: "Git", notFollowedBy: ["hub lab"] }] }),
    ).toThrow(ConfigurationError);
  });

  it("should keep duplicate aliases of one skill once", () => {
    const taxonomy = compileTaxonomy({
      version: "test",
      categories: { bases: [{ name: "SQL", synonyms: ["sql", "Sql"] }] },
    });
    expect(taxonomy.aliasIndex.get("sql")).toHaveLength(1);
  });
});

describe("emptyTaxonomy", () => {
  it("should have no categories, skills or aliases", () => {
    const taxonomy = emptyTaxonomy();
    expect(taxonomy.version).toBe("unversioned");
    expect(taxonomy.categories.size).toBe(0);
    expect(taxonomy.skills.size).toBe(0);
    expect(taxonomy.aliasIndex.size).toBe(0);
  });
});

describe("loadTaxonomy", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "taxonomy-test-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should load and compile a taxonomy file", () => {
    const file = join(dir, "taxonomy.json");
    writeFileSync(
      file,
      JSON.stringify({ version: "9", categories: { bases: ["SQLite"] } }),
    );

    const taxonomy = loadTaxonomy(file);
    expect(taxonomy.version).toBe("9");
    expect([...taxonomy.skills.keys()]).toEqual(["SQLite"]);
  });

  it("should return the empty taxonomy when the file is missing", () => {
    const taxonomy = loadTaxonomy(join(dir, "missing.json"));
    expect(taxonomy.skills.size).toBe(0);
    expect(taxonomy.version).toBe("unversioned");
  });

  it("should raise ConfigurationError on malformed JSON", () => {
    const file = join(dir, "broken.json");
    writeFileSync(file, "{ not json");
    expect(() => loadTaxonomy(file)).toThrow(ConfigurationError);
  });

  it("should load the bundled taxonomy", () => {
    const taxonomy = loadTaxonomy("data/taxonomy.json");
    expect(taxonomy.skills.get("TypeScript")?.categoryId).toBe(
      "langages_programmation",
    );
    expect(taxonomy.skills.get("Docker")?.categoryId).toBe("cloud_devops");
  });
});
