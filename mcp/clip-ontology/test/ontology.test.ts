import { describe, it, expect } from "vitest";
import { SchemaError } from "../src/errors.js";
import { CorrelationTable, DurationStat, MasterOntology } from "../src/services/ontology.js";
import { DEFAULT_SCHEMA, defineSchema, type CategoryDef } from "../src/services/schema.js";

const NOW = new Date("2026-01-05T10:00:00.000Z");

function category(name: string, required = false): CategoryDef {
  return { name, group: "visual", label: name, description: name, required };
}

describe("DurationStat", () => {
  it("matches the batch mean and variance of the same samples", () => {
    const samples = [2.5, 3.1, 4.7, 1.2, 9.9, 0.4, 6.05];
    const stat = new DurationStat();
    for (const s of samples) stat.push(s);

    const mean = samples.reduce((a, b) => a + b, 0) / samples.length;
    const squares = samples.reduce((acc, s) => acc + (s - mean) ** 2, 0);

    expect(stat.count).toBe(samples.length);
    expect(stat.mean).toBeCloseTo(mean, 10);
    expect(stat.variance).toBeCloseTo(squares / samples.length, 10);
    expect(stat.sampleVariance).toBeCloseTo(squares / (samples.length - 1), 10);
    expect(stat.stddev).toBeCloseTo(Math.sqrt(squares / samples.length), 10);
  });

  it("reports zero variance for a single sample", () => {
    const stat = new DurationStat();
    stat.push(2);
    expect(stat.mean).toBe(2);
    expect(stat.variance).toBe(0);
    expect(stat.sampleVariance).toBe(0);
  });
});

describe("CorrelationTable", () => {
  it("counts pairs and ranks them", () => {
    const table = new CorrelationTable({ a: "clip_function", b: "primary_emotion" });
    table.increment("hook", "curiosity");
    table.increment("hook", "curiosity");
    table.increment("cta", "urgency");
    table.increment("hook", "fear");

    expect(table.key).toBe("clip_function:primary_emotion");
    expect(table.count("hook", "curiosity")).toBe(2);
    expect(table.count("hook", "hope")).toBe(0);
    expect(table.total()).toBe(4);
    expect(table.top(2)).toEqual([
      { a: "hook", b: "curiosity", count: 2 },
      { a: "cta", b: "urgency", count: 1 },
    ]);
  });
});

describe("defineSchema", () => {
  const base = {
    categories: [category("clip_function", true), category("shot_type"), category("primary_emotion")],
    correlations: [{ a: "clip_function", b: "shot_type" }],
    functionCategory: "clip_function",
  };

  it("accepts a well-formed schema", () => {
    expect(defineSchema(base).categories.map((c) => c.name)).toEqual(["clip_function", "shot_type", "primary_emotion"]);
  });

  it("rejects duplicate categories", () => {
    expect(() => defineSchema({ ...base, categories: [...base.categories, category("shot_type")] })).toThrow(
      SchemaError
    );
  });

  it("rejects pairs naming undeclared categories or the same category twice", () => {
    expect(() => defineSchema({ ...base, correlations: [{ a: "clip_function", b: "music_style" }] })).toThrow(
      SchemaError
    );
    expect(() => defineSchema({ ...base, correlations: [{ a: "shot_type", b: "shot_type" }] })).toThrow(SchemaError);
  });

  it("tracks a symmetric pair once", () => {
    expect(() =>
      defineSchema({
        ...base,
        correlations: [
          { a: "clip_function", b: "shot_type" },
          { a: "shot_type", b: "clip_function" },
        ],
      })
    ).toThrow("declared more than once");
  });

  it("requires the function category to be declared", () => {
    expect(() => defineSchema({ ...base, functionCategory: "narrative_role" })).toThrow(SchemaError);
  });
});

describe("MasterOntology", () => {
  it("refuses categories the schema does not declare", () => {
    const ontology = new MasterOntology(DEFAULT_SCHEMA, undefined, NOW);
    expect(() => ontology.store("mood")).toThrow(SchemaError);
    expect(() => ontology.knownValues("mood")).toThrow(SchemaError);
  });

  it("starts with every category open", () => {
    const ontology = new MasterOntology(DEFAULT_SCHEMA, undefined, NOW);
    expect(ontology.bootstrapIfEmpty()).toEqual(DEFAULT_SCHEMA.categories.map((c) => c.name));

    ontology.store("shot_type").resolve("wide", "v1");
    expect(ontology.openCategories()).not.toContain("shot_type");
    expect(ontology.openCategories()).toHaveLength(DEFAULT_SCHEMA.categories.length - 1);
  });

  it("builds a vocabulary hint without the unknown sentinel", () => {
    const ontology = new MasterOntology(DEFAULT_SCHEMA, undefined, NOW);
    const shots = ontology.store("shot_type");
    for (const label of ["wide", "close_up", "close_up", null, "overhead", "close_up", "wide"]) {
      shots.resolve(label, "v1");
    }

    const hint = ontology.vocabularyHint(2);
    expect(hint.shot_type).toEqual(["close_up", "wide"]);
    expect(hint.clip_function).toEqual([]);
    expect(Object.keys(hint)).toEqual(DEFAULT_SCHEMA.categories.map((c) => c.name));
  });

  it("finds a correlation table in either orientation", () => {
    const ontology = new MasterOntology(DEFAULT_SCHEMA, undefined, NOW);
    expect(ontology.correlation("clip_function", "shot_type")?.swapped).toBe(false);
    expect(ontology.correlation("shot_type", "clip_function")?.swapped).toBe(true);
    expect(ontology.correlation("music_style", "shot_type")).toBeNull();
  });

  it("round-trips through its document to identical JSON", () => {
    const ontology = new MasterOntology(DEFAULT_SCHEMA, undefined, NOW);
    ontology.store("shot_type").resolve("Close-Up", "v1");
    ontology.store("shot_type").resolve("wide", "v2");
    ontology.store("clip_function").resolve("hook", "v1");
    ontology.store("secondary_emotion").resolve(null, "v1");
    ontology.correlationFor({ a: "clip_function", b: "shot_type" }).increment("hook", "close_up");
    ontology.recordDuration("hook", 0.1);
    ontology.recordDuration("hook", 0.2);
    ontology.recordDuration("hook", 1 / 3);
    ontology.markVideoMerged(3, NOW);

    const first = JSON.stringify(ontology.toDocument(), null, 2);
    const restored = MasterOntology.fromDocument(JSON.parse(first), DEFAULT_SCHEMA);
    const second = JSON.stringify(restored.toDocument(), null, 2);

    expect(second).toBe(first);
    expect(restored.durationStat("hook")?.mean).toBe(ontology.durationStat("hook")?.mean);
    expect(restored.store("shot_type").get("close_up")?.surfaceForms).toEqual(["Close-Up"]);
  });

  it("rejects a document naming an undeclared category", () => {
    const doc = new MasterOntology(DEFAULT_SCHEMA, undefined, NOW).toDocument();
    doc.categories.mood = { happy: { frequency: 1, surface_forms: ["happy"], first_seen_video: "v1" } };
    expect(() => MasterOntology.fromDocument(doc, DEFAULT_SCHEMA)).toThrow(SchemaError);
  });

  it("rejects a malformed document", () => {
    expect(() => MasterOntology.fromDocument({ version: 1, categories: [] }, DEFAULT_SCHEMA)).toThrow();
  });

  it("clones deeply", () => {
    const ontology = new MasterOntology(DEFAULT_SCHEMA, undefined, NOW);
    ontology.store("shot_type").resolve("wide", "v1");
    const copy = ontology.clone();
    copy.store("shot_type").resolve("wide", "v2");
    copy.recordDuration("hook", 2);

    expect(ontology.store("shot_type").get("wide")?.frequency).toBe(1);
    expect(copy.store("shot_type").get("wide")?.frequency).toBe(2);
    expect(ontology.durationStat("hook")).toBeUndefined();
  });

  it("summarizes its size", () => {
    const ontology = new MasterOntology(DEFAULT_SCHEMA, undefined, NOW);
    ontology.store("clip_function").resolve("hook", "v1");
    ontology.store("clip_function").resolve("cta", "v1");
    ontology.store("primary_emotion").resolve("curiosity", "v1");
    ontology.store("secondary_emotion").resolve(null, "v1");
    ontology.markVideoMerged(4, NOW);

    expect(ontology.stats()).toEqual({
      videosAnalyzed: 1,
      clipsAnalyzed: 4,
      totalCategories: DEFAULT_SCHEMA.categories.length,
      populatedCategories: 2,
      distinctValues: 3,
      averageClipsPerVideo: 4,
      distinctFunctions: 2,
      distinctEmotions: 1,
      updatedAt: "2026-01-05T10:00:00.000Z",
    });
  });
});
