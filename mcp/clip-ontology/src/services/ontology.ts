/**
 * Master Ontology
 *
 * The root aggregate: one value store per declared category, the declared
 * correlation tables, and per-function duration statistics. Owned by the
 * merger; everything else reads a snapshot.
 */

import { z } from "zod";
import { SchemaError } from "../errors.js";
import {
  CategoryValueStore,
  DEFAULT_SIMILARITY_POLICY,
  type CanonicalValue,
  type KnownValue,
  type SimilarityPolicy,
} from "./value-store.js";
import { correlationKey, findCategory, type CorrelationPair, type OntologySchema } from "./schema.js";

export const ONTOLOGY_DOCUMENT_VERSION = 1;

// ============================================================================
// Duration statistics
// ============================================================================

/**
 * Streaming count/mean/variance (Welford). No samples are kept.
 */
export class DurationStat {
  constructor(
    public count = 0,
    public mean = 0,
    public m2 = 0
  ) {}

  push(seconds: number): void {
    this.count++;
    const delta = seconds - this.mean;
    this.mean += delta / this.count;
    this.m2 += delta * (seconds - this.mean);
  }

  /** Population variance */
  get variance(): number {
    return this.count > 0 ? this.m2 / this.count : 0;
  }

  get sampleVariance(): number {
    return this.count > 1 ? this.m2 / (this.count - 1) : 0;
  }

  get stddev(): number {
    return Math.sqrt(this.variance);
  }
}

// ============================================================================
// Correlation tables
// ============================================================================

export interface CorrelationCount {
  a: string;
  b: string;
  count: number;
}

/**
 * Co-occurrence counts for one declared (A, B) category pair.
 */
export class CorrelationTable {
  readonly counts = new Map<string, Map<string, number>>();

  constructor(readonly pair: CorrelationPair) {}

  get key(): string {
    return correlationKey(this.pair.a, this.pair.b);
  }

  increment(valueA: string, valueB: string, by = 1): void {
    let row = this.counts.get(valueA);
    if (!row) {
      row = new Map();
      this.counts.set(valueA, row);
    }
    row.set(valueB, (row.get(valueB) ?? 0) + by);
  }

  count(valueA: string, valueB: string): number {
    return this.counts.get(valueA)?.get(valueB) ?? 0;
  }

  total(): number {
    let total = 0;
    for (const row of this.counts.values()) {
      for (const n of row.values()) total += n;
    }
    return total;
  }

  /** All cells by descending count, ties broken by value A then value B */
  entries(): CorrelationCount[] {
    const cells: CorrelationCount[] = [];
    for (const [a, row] of this.counts) {
      for (const [b, count] of row) cells.push({ a, b, count });
    }
    return cells.sort((x, y) => y.count - x.count || compare(x.a, y.a) || compare(x.b, y.b));
  }

  top(k: number): CorrelationCount[] {
    return this.entries().slice(0, k);
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ============================================================================
// Persisted document
// ============================================================================

const ValueDocumentSchema = z.object({
  frequency: z.number().int().min(0),
  surface_forms: z.array(z.string()),
  first_seen_video: z.string().nullable(),
});

const DurationDocumentSchema = z.object({
  count: z.number().int().min(0),
  mean: z.number(),
  m2: z.number().min(0),
});

export const OntologyDocumentSchema = z.object({
  version: z.literal(ONTOLOGY_DOCUMENT_VERSION),
  created_at: z.string(),
  updated_at: z.string(),
  videos_analyzed: z.number().int().min(0),
  clips_analyzed: z.number().int().min(0),
  categories: z.record(z.record(ValueDocumentSchema)),
  correlations: z.record(z.record(z.record(z.number().int().min(0)))),
  duration_stats: z.record(DurationDocumentSchema),
});

export type OntologyDocument = z.infer<typeof OntologyDocumentSchema>;

// ============================================================================
// Aggregate
// ============================================================================

export interface OntologyStats {
  videosAnalyzed: number;
  clipsAnalyzed: number;
  totalCategories: number;
  populatedCategories: number;
  distinctValues: number;
  averageClipsPerVideo: number;
  distinctFunctions: number;
  distinctEmotions: number;
  updatedAt: string;
}

export class MasterOntology {
  private readonly stores = new Map<string, CategoryValueStore>();
  private readonly correlations = new Map<string, CorrelationTable>();
  private readonly durations = new Map<string, DurationStat>();

  videoCount = 0;
  clipCount = 0;
  createdAt: string;
  updatedAt: string;

  constructor(
    readonly schema: OntologySchema,
    readonly policy: SimilarityPolicy = DEFAULT_SIMILARITY_POLICY,
    now: Date = new Date()
  ) {
    this.createdAt = now.toISOString();
    this.updatedAt = this.createdAt;
    for (const pair of schema.correlations) {
      const table = new CorrelationTable(pair);
      this.correlations.set(table.key, table);
    }
  }

  /**
   * Make sure every declared category has a store and report the ones that
   * have no canonical values yet (open mode).
   */
  bootstrapIfEmpty(): string[] {
    return this.schema.categories.map((c) => this.store(c.name)).filter((s) => s.isOpen()).map((s) => s.category);
  }

  openCategories(): string[] {
    return this.schema.categories.map((c) => c.name).filter((name) => this.stores.get(name)?.isOpen() ?? true);
  }

  /** Value store for a declared category, created on first use */
  store(category: string): CategoryValueStore {
    const existing = this.stores.get(category);
    if (existing) return existing;
    if (!findCategory(this.schema, category)) {
      throw new SchemaError(`Unknown category "${category}"`);
    }
    const created = new CategoryValueStore(category, this.policy);
    this.stores.set(category, created);
    return created;
  }

  /** Existing store, without creating one */
  findStore(category: string): CategoryValueStore | undefined {
    return this.stores.get(category);
  }

  knownValues(category: string, limit?: number): KnownValue[] {
    if (!findCategory(this.schema, category)) {
      throw new SchemaError(`Unknown category "${category}"`);
    }
    return this.stores.get(category)?.knownValues(limit) ?? [];
  }

  /** Category -> known tokens (most frequent first), for prompting the annotator */
  vocabularyHint(limit?: number): Record<string, string[]> {
    const hint: Record<string, string[]> = {};
    for (const category of this.schema.categories) {
      hint[category.name] = this.knownValues(category.name, limit).map((v) => v.token);
    }
    return hint;
  }

  correlationTables(): CorrelationTable[] {
    return this.schema.correlations.map((pair) => this.correlationFor(pair));
  }

  correlationFor(pair: CorrelationPair): CorrelationTable {
    const table = this.correlations.get(correlationKey(pair.a, pair.b));
    if (!table) {
      throw new SchemaError(`Undeclared correlation pair ${pair.a}/${pair.b}`);
    }
    return table;
  }

  /**
   * Table for a pair in either orientation. `swapped` is true when the
   * table's first category is `b`.
   */
  correlation(a: string, b: string): { table: CorrelationTable; swapped: boolean } | null {
    const direct = this.correlations.get(correlationKey(a, b));
    if (direct) return { table: direct, swapped: false };
    const reverse = this.correlations.get(correlationKey(b, a));
    return reverse ? { table: reverse, swapped: true } : null;
  }

  recordDuration(fn: string, seconds: number): void {
    let stat = this.durations.get(fn);
    if (!stat) {
      stat = new DurationStat();
      this.durations.set(fn, stat);
    }
    stat.push(seconds);
  }

  durationStat(fn: string): DurationStat | undefined {
    return this.durations.get(fn);
  }

  /** Functions sorted by name with their stats */
  durationStats(): Array<[string, DurationStat]> {
    return [...this.durations.entries()].sort(([a], [b]) => compare(a, b));
  }

  markVideoMerged(clips: number, now: Date): void {
    this.videoCount++;
    this.clipCount += clips;
    this.updatedAt = now.toISOString();
  }

  stats(): OntologyStats {
    let populated = 0;
    let distinct = 0;
    for (const category of this.schema.categories) {
      const size = this.stores.get(category.name)?.size ?? 0;
      if (size > 0) populated++;
      distinct += size;
    }
    const emotionCategory = findCategory(this.schema, "primary_emotion");
    return {
      videosAnalyzed: this.videoCount,
      clipsAnalyzed: this.clipCount,
      totalCategories: this.schema.categories.length,
      populatedCategories: populated,
      distinctValues: distinct,
      averageClipsPerVideo: this.videoCount > 0 ? this.clipCount / this.videoCount : 0,
      distinctFunctions: this.stores.get(this.schema.functionCategory)?.size ?? 0,
      distinctEmotions: emotionCategory ? (this.stores.get(emotionCategory.name)?.size ?? 0) : 0,
      updatedAt: this.updatedAt,
    };
  }

  /** Deep copy through the persisted form */
  clone(): MasterOntology {
    return MasterOntology.fromDocument(this.toDocument(), this.schema, this.policy);
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  /**
   * Plain document with a fixed key order: categories and pairs in schema
   * order, values and functions sorted, so equal ontologies serialize to
   * identical bytes.
   */
  toDocument(): OntologyDocument {
    const categories: OntologyDocument["categories"] = {};
    for (const category of this.schema.categories) {
      const values: OntologyDocument["categories"][string] = {};
      for (const value of this.stores.get(category.name)?.all() ?? []) {
        values[value.token] = {
          frequency: value.frequency,
          surface_forms: [...value.surfaceForms],
          first_seen_video: value.firstSeenVideoId,
        };
      }
      categories[category.name] = values;
    }

    const correlations: OntologyDocument["correlations"] = {};
    for (const table of this.correlationTables()) {
      const rows: Record<string, Record<string, number>> = {};
      for (const a of [...table.counts.keys()].sort(compare)) {
        const row = table.counts.get(a) ?? new Map<string, number>();
        const cells: Record<string, number> = {};
        for (const b of [...row.keys()].sort(compare)) {
          cells[b] = row.get(b) ?? 0;
        }
        rows[a] = cells;
      }
      correlations[table.key] = rows;
    }

    const durationStats: OntologyDocument["duration_stats"] = {};
    for (const [fn, stat] of this.durationStats()) {
      durationStats[fn] = { count: stat.count, mean: stat.mean, m2: stat.m2 };
    }

    return {
      version: ONTOLOGY_DOCUMENT_VERSION,
      created_at: this.createdAt,
      updated_at: this.updatedAt,
      videos_analyzed: this.videoCount,
      clips_analyzed: this.clipCount,
      categories,
      correlations,
      duration_stats: durationStats,
    };
  }

  /**
   * Rebuild from a persisted document. Throws a ZodError for a malformed
   * document and a SchemaError when it names categories or pairs the schema
   * does not declare.
   */
  static fromDocument(
    input: unknown,
    schema: OntologySchema,
    policy: SimilarityPolicy = DEFAULT_SIMILARITY_POLICY
  ): MasterOntology {
    const doc = OntologyDocumentSchema.parse(input);
    const ontology = new MasterOntology(schema, policy);
    ontology.createdAt = doc.created_at;
    ontology.updatedAt = doc.updated_at;
    ontology.videoCount = doc.videos_analyzed;
    ontology.clipCount = doc.clips_analyzed;

    for (const [category, values] of Object.entries(doc.categories)) {
      if (!findCategory(schema, category)) {
        throw new SchemaError(`Persisted ontology has undeclared category "${category}"`);
      }
      const initial: CanonicalValue[] = Object.entries(values).map(([token, value]) => ({
        token,
        frequency: value.frequency,
        surfaceForms: value.surface_forms,
        firstSeenVideoId: value.first_seen_video,
      }));
      ontology.stores.set(category, new CategoryValueStore(category, policy, initial));
    }

    for (const [key, rows] of Object.entries(doc.correlations)) {
      const table = ontology.correlations.get(key);
      if (!table) {
        throw new SchemaError(`Persisted ontology has undeclared correlation pair "${key}"`);
      }
      for (const [a, cells] of Object.entries(rows)) {
        for (const [b, count] of Object.entries(cells)) {
          table.increment(a, b, count);
        }
      }
    }

    for (const [fn, stat] of Object.entries(doc.duration_stats)) {
      ontology.durations.set(fn, new DurationStat(stat.count, stat.mean, stat.m2));
    }

    return ontology;
  }
}
