/**
 * Recipe Index
 *
 * Remembers which clips accompanied which script lines, bucketed by clip
 * function, and which function tends to follow which. This is the
 * "what do I show while the voiceover says X" side of the ontology.
 */

import { z } from "zod";
import { normalize, UNKNOWN_TOKEN } from "./value-store.js";

export const RECIPE_DOCUMENT_VERSION = 1;
export const DEFAULT_RECIPE_LIMIT = 50;
export const SEQUENCE_LENGTH = 5;
export const TRANSITION_EXAMPLE_LIMIT = 20;

export const CLIP_TYPES = [
  "product_shot",
  "text_graphic",
  "screen_demo",
  "talking_head",
  "demonstration",
  "testimonial",
  "lifestyle",
  "broll",
  "other",
] as const;
export type ClipType = (typeof CLIP_TYPES)[number];

export const CLIP_TYPE_DESCRIPTIONS: Record<ClipType, string> = {
  product_shot: "Close-up or beauty shot of the product. Use when mentioning the product, features, or results.",
  text_graphic: "Text, titles, or graphics on screen. Use for emphasis, stats, quotes, or CTAs.",
  screen_demo: "Screen recording or software demonstration. Use when showing how something works.",
  talking_head: "Person speaking directly to camera. Use for direct address and credibility.",
  demonstration: "Person actively showing or doing something. Use for tutorials and proof.",
  testimonial: "Customer or user speaking. Use for social proof.",
  lifestyle: "People using the product or in relevant situations. Use for relatable moments.",
  broll: "Supplementary footage. Use to illustrate concepts or cover cuts.",
  other: "Anything that fits none of the above.",
};

export interface RecipeEntry {
  /** Insertion order across the whole index; higher is newer */
  seq: number;
  videoId: string;
  clipNumber: number;
  function: string;
  clipType: ClipType;
  script: string;
  purpose: string;
  start: number;
  end: number;
  /** Canonical tokens of the clip, by category */
  values: Record<string, string>;
}

export type NewRecipeEntry = Omit<RecipeEntry, "seq">;

export interface TransitionCount {
  from: string;
  to: string;
  count: number;
}

export interface SequenceCount {
  sequence: string;
  count: number;
}

/** A pair of neighbouring clips, kept as an example of a clip-type transition */
export interface TransitionExample {
  fromScript: string;
  fromFunction: string;
  toScript: string;
  toFunction: string;
}

export interface ClipTypeTransition {
  from: ClipType;
  to: ClipType;
  /** Oldest first, at most TRANSITION_EXAMPLE_LIMIT */
  examples: TransitionExample[];
}

/**
 * Classify a clip from its canonical subject type, setting, action and the
 * free-text subject description.
 */
export function deriveClipType(values: Record<string, string>, subjectDescription = ""): ClipType {
  const subject = values.subject_type ?? "";
  const setting = values.setting_type ?? "";
  const action = values.subject_action ?? "";
  const description = subjectDescription.toLowerCase();

  if (subject === "product" || description.includes("product")) return "product_shot";
  if (subject === "text_screen" || subject === "graphic") return "text_graphic";
  if (setting.includes("screen_recording")) return "screen_demo";
  if (subject === "person") {
    if (action === "speaking") return "talking_head";
    if (action === "demonstrating") return "demonstration";
    if (description.includes("testimonial") || description.includes("customer")) return "testimonial";
    return "lifestyle";
  }
  if (subject === "b_roll") return "broll";
  return "other";
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function scriptKey(script: string): string {
  return script.trim().toLowerCase();
}

function transitionKey(from: ClipType, to: ClipType): string {
  return `${from} -> ${to}`;
}

/**
 * Append to a bucket unless it already holds the same non-empty script;
 * the oldest entry goes once the bucket is over `limit`.
 */
function pushUnique(bucket: RecipeEntry[], entry: RecipeEntry, limit: number): boolean {
  const key = scriptKey(entry.script);
  if (key && bucket.some((existing) => scriptKey(existing.script) === key)) {
    return false;
  }
  bucket.push(entry);
  while (bucket.length > limit) bucket.shift();
  return true;
}

// ============================================================================
// Persisted document
// ============================================================================

const RecipeEntrySchema = z.object({
  seq: z.number().int().min(0),
  videoId: z.string(),
  clipNumber: z.number().int(),
  function: z.string(),
  clipType: z.enum(CLIP_TYPES),
  script: z.string(),
  purpose: z.string(),
  start: z.number(),
  end: z.number(),
  values: z.record(z.string()),
});

const TransitionExampleSchema = z.object({
  fromScript: z.string(),
  fromFunction: z.string(),
  toScript: z.string(),
  toFunction: z.string(),
});

const ClipTypeTransitionSchema = z.object({
  from: z.enum(CLIP_TYPES),
  to: z.enum(CLIP_TYPES),
  examples: z.array(TransitionExampleSchema),
});

export const RecipeDocumentSchema = z.object({
  version: z.literal(RECIPE_DOCUMENT_VERSION),
  videos_learned_from: z.number().int().min(0),
  next_seq: z.number().int().min(0),
  functions: z.record(z.array(RecipeEntrySchema)),
  clip_types: z.record(z.enum(CLIP_TYPES), z.array(RecipeEntrySchema)).default({}),
  transitions: z.record(z.record(z.number().int().min(0))),
  clip_type_transitions: z.array(ClipTypeTransitionSchema).default([]),
  sequences: z.record(z.number().int().min(0)),
});

export type RecipeDocument = z.infer<typeof RecipeDocumentSchema>;

// ============================================================================
// Index
// ============================================================================

export class RecipeIndex {
  /** function -> entries, oldest first */
  private readonly buckets = new Map<string, RecipeEntry[]>();
  /** clip type -> entries, oldest first; capped like the function buckets */
  private readonly clipTypeBuckets = new Map<ClipType, RecipeEntry[]>();
  private readonly transitions = new Map<string, Map<string, number>>();
  private readonly clipTypeTransitions = new Map<string, ClipTypeTransition>();
  private readonly sequences = new Map<string, number>();
  private nextSeq = 0;

  videosLearnedFrom = 0;

  constructor(readonly limitPerFunction: number = DEFAULT_RECIPE_LIMIT) {}

  get size(): number {
    let total = 0;
    for (const bucket of this.buckets.values()) total += bucket.length;
    return total;
  }

  functions(): string[] {
    return [...this.buckets.keys()].sort(compare);
  }

  /**
   * Add an entry to its function bucket and its clip-type bucket. Returns
   * false when the function bucket already holds the same non-empty script.
   * The oldest entry of a bucket is evicted once it is over its limit.
   */
  add(entry: NewRecipeEntry): boolean {
    let bucket = this.buckets.get(entry.function);
    if (!bucket) {
      bucket = [];
      this.buckets.set(entry.function, bucket);
    }
    let typeBucket = this.clipTypeBuckets.get(entry.clipType);
    if (!typeBucket) {
      typeBucket = [];
      this.clipTypeBuckets.set(entry.clipType, typeBucket);
    }

    const stored: RecipeEntry = { ...entry, values: { ...entry.values }, seq: this.nextSeq };
    const added = pushUnique(bucket, stored, this.limitPerFunction);
    const addedToType = pushUnique(typeBucket, stored, this.limitPerFunction);
    if (added || addedToType) this.nextSeq++;
    return added;
  }

  recordTransition(from: string, to: string): void {
    let row = this.transitions.get(from);
    if (!row) {
      row = new Map();
      this.transitions.set(from, row);
    }
    row.set(to, (row.get(to) ?? 0) + 1);
  }

  /** Keep the pair as an example of its clip-type transition, up to the cap */
  recordTransitionExample(from: NewRecipeEntry, to: NewRecipeEntry): void {
    const key = transitionKey(from.clipType, to.clipType);
    let transition = this.clipTypeTransitions.get(key);
    if (!transition) {
      transition = { from: from.clipType, to: to.clipType, examples: [] };
      this.clipTypeTransitions.set(key, transition);
    }
    if (transition.examples.length >= TRANSITION_EXAMPLE_LIMIT) return;
    transition.examples.push({
      fromScript: from.script,
      fromFunction: from.function,
      toScript: to.script,
      toFunction: to.function,
    });
  }

  /**
   * Count the video's opening function sequence. Returns the recorded key,
   * or null for a video with no known functions.
   */
  recordSequence(functions: string[]): string | null {
    if (functions.length === 0) return null;
    const key = functions.slice(0, SEQUENCE_LENGTH).join(" → ");
    this.sequences.set(key, (this.sequences.get(key) ?? 0) + 1);
    return key;
  }

  /** Most recent first */
  examplesFor(fn: string, limit?: number): RecipeEntry[] {
    const bucket = this.buckets.get(normalize(fn)) ?? [];
    const entries = [...bucket].reverse();
    return limit === undefined ? entries : entries.slice(0, limit);
  }

  /** Most recent first */
  examplesForClipType(clipType: ClipType, limit?: number): RecipeEntry[] {
    const entries = [...(this.clipTypeBuckets.get(clipType) ?? [])].reverse();
    return limit === undefined ? entries : entries.slice(0, limit);
  }

  /** Clip types with at least one example, in CLIP_TYPES order */
  clipTypes(): ClipType[] {
    return CLIP_TYPES.filter((clipType) => (this.clipTypeBuckets.get(clipType)?.length ?? 0) > 0);
  }

  /** Every clip-type transition seen, ordered by from type then to type */
  clipTypeTransitionExamples(): ClipTypeTransition[] {
    return [...this.clipTypeTransitions.entries()]
      .sort(([a], [b]) => compare(a, b))
      .map(([, transition]) => ({ ...transition, examples: transition.examples.map((e) => ({ ...e })) }));
  }

  /**
   * Entries whose script contains `text`, case-insensitively, most recent
   * first. Blank text matches nothing.
   */
  search(text: string, limit?: number): RecipeEntry[] {
    const needle = text.trim().toLowerCase();
    if (!needle) return [];

    const hits: RecipeEntry[] = [];
    for (const bucket of this.buckets.values()) {
      for (const entry of bucket) {
        if (entry.script.toLowerCase().includes(needle)) hits.push(entry);
      }
    }
    hits.sort((a, b) => b.seq - a.seq);
    return limit === undefined ? hits : hits.slice(0, limit);
  }

  /** Successors of `fn` by descending count, ties by name */
  topTransitions(fn: string, k?: number): Array<{ next: string; count: number }> {
    const row = this.transitions.get(normalize(fn));
    if (!row) return [];
    const successors = [...row.entries()]
      .map(([next, count]) => ({ next, count }))
      .sort((a, b) => b.count - a.count || compare(a.next, b.next));
    return k === undefined ? successors : successors.slice(0, k);
  }

  transitionCount(from: string, to: string): number {
    return this.transitions.get(from)?.get(to) ?? 0;
  }

  allTransitions(k?: number): TransitionCount[] {
    const all: TransitionCount[] = [];
    for (const [from, row] of this.transitions) {
      for (const [to, count] of row) all.push({ from, to, count });
    }
    all.sort((a, b) => b.count - a.count || compare(a.from, b.from) || compare(a.to, b.to));
    return k === undefined ? all : all.slice(0, k);
  }

  topSequences(k?: number): SequenceCount[] {
    const all = [...this.sequences.entries()]
      .map(([sequence, count]) => ({ sequence, count }))
      .sort((a, b) => b.count - a.count || compare(a.sequence, b.sequence));
    return k === undefined ? all : all.slice(0, k);
  }

  /** Clip type usage within one function bucket, most used first */
  clipTypeCounts(fn: string): Array<{ clipType: ClipType; count: number }> {
    const counts = new Map<ClipType, number>();
    for (const entry of this.buckets.get(fn) ?? []) {
      counts.set(entry.clipType, (counts.get(entry.clipType) ?? 0) + 1);
    }
    return [...counts.entries()]
      .map(([clipType, count]) => ({ clipType, count }))
      .sort((a, b) => b.count - a.count || compare(a.clipType, b.clipType));
  }

  /**
   * Record one video's merged clips, given in timestamp order. Clips whose
   * function resolved to unknown are not indexed and do not break the
   * transition chain between their neighbours.
   */
  recordVideo(
    clips: NewRecipeEntry[]
  ): { added: number; transitions: Array<{ from: string; to: string }>; sequence: string | null } {
    const known = clips.filter((clip) => clip.function && clip.function !== UNKNOWN_TOKEN);

    let added = 0;
    for (const clip of known) {
      if (this.add(clip)) added++;
    }

    const transitions: Array<{ from: string; to: string }> = [];
    for (let i = 1; i < known.length; i++) {
      const from = known[i - 1].function;
      const to = known[i].function;
      this.recordTransition(from, to);
      this.recordTransitionExample(known[i - 1], known[i]);
      transitions.push({ from, to });
    }

    const sequence = this.recordSequence(known.map((clip) => clip.function));
    this.videosLearnedFrom++;
    return { added, transitions, sequence };
  }

  clone(): RecipeIndex {
    return RecipeIndex.fromDocument(this.toDocument(), this.limitPerFunction);
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  toDocument(): RecipeDocument {
    const functions: RecipeDocument["functions"] = {};
    for (const fn of this.functions()) {
      functions[fn] = (this.buckets.get(fn) ?? []).map((entry) => ({ ...entry, values: { ...entry.values } }));
    }

    const transitions: RecipeDocument["transitions"] = {};
    for (const from of [...this.transitions.keys()].sort(compare)) {
      const row = this.transitions.get(from) ?? new Map<string, number>();
      const cells: Record<string, number> = {};
      for (const to of [...row.keys()].sort(compare)) cells[to] = row.get(to) ?? 0;
      transitions[from] = cells;
    }

    const clipTypes: RecipeDocument["clip_types"] = {};
    for (const clipType of this.clipTypes()) {
      clipTypes[clipType] = (this.clipTypeBuckets.get(clipType) ?? []).map((entry) => ({
        ...entry,
        values: { ...entry.values },
      }));
    }

    const sequences: RecipeDocument["sequences"] = {};
    for (const key of [...this.sequences.keys()].sort(compare)) {
      sequences[key] = this.sequences.get(key) ?? 0;
    }

    return {
      version: RECIPE_DOCUMENT_VERSION,
      videos_learned_from: this.videosLearnedFrom,
      next_seq: this.nextSeq,
      functions,
      clip_types: clipTypes,
      transitions,
      clip_type_transitions: this.clipTypeTransitionExamples(),
      sequences,
    };
  }

  static fromDocument(input: unknown, limitPerFunction: number = DEFAULT_RECIPE_LIMIT): RecipeIndex {
    const doc = RecipeDocumentSchema.parse(input);
    const index = new RecipeIndex(limitPerFunction);
    index.videosLearnedFrom = doc.videos_learned_from;
    index.nextSeq = doc.next_seq;

    for (const [fn, entries] of Object.entries(doc.functions)) {
      // a lowered limit trims the oldest entries
      index.buckets.set(fn, entries.slice(-limitPerFunction));
    }
    for (const clipType of CLIP_TYPES) {
      const entries = doc.clip_types[clipType];
      if (entries) index.clipTypeBuckets.set(clipType, entries.slice(-limitPerFunction));
    }
    for (const [from, row] of Object.entries(doc.transitions)) {
      index.transitions.set(from, new Map(Object.entries(row)));
    }
    for (const transition of doc.clip_type_transitions) {
      index.clipTypeTransitions.set(transitionKey(transition.from, transition.to), {
        from: transition.from,
        to: transition.to,
        examples: transition.examples.slice(0, TRANSITION_EXAMPLE_LIMIT),
      });
    }
    for (const [key, count] of Object.entries(doc.sequences)) {
      index.sequences.set(key, count);
    }
    return index;
  }
}
