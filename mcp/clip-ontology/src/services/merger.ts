/**
 * Ontology Merger
 *
 * Folds one video's validated clips into the master ontology and the
 * recipe index. Callers own the transaction: mergeVideo mutates whatever
 * it is handed, so pass working copies when the result may be discarded.
 */

import { createLogger } from "../utils/logger.js";
import type { MasterOntology } from "./ontology.js";
import { deriveClipType, type NewRecipeEntry, type RecipeIndex } from "./recipe-index.js";
import type { ClipAnnotation, ValidationFailure } from "./validation.js";
import { UNKNOWN_TOKEN, type ResolveDecision } from "./value-store.js";

const log = createLogger("merger");

export interface MergeInput {
  videoId: string;
  transcript: string;
  totalDuration: number | null;
  /** Clips received from the annotator, before validation */
  clipsReceived: number;
  clips: ClipAnnotation[];
  failures: ValidationFailure[];
}

export interface MergedClip {
  clip: ClipAnnotation;
  /** Canonical token per resolved category */
  canonical: Record<string, string>;
}

/**
 * Everything needed to render a per-video report after the fact.
 */
export interface VideoRecord {
  videoId: string;
  mergedAt: string;
  totalDuration: number | null;
  transcript: string;
  clips: MergedClip[];
  failures: ValidationFailure[];
}

export interface MergeSummary {
  videoId: string;
  clipsReceived: number;
  clipsMerged: number;
  clipsDropped: number;
  failures: ValidationFailure[];
  /** Canonical values created by this merge, per category */
  newValues: Record<string, string[]>;
  ambiguous: ResolveDecision[];
  decisions: ResolveDecision[];
  transitions: Array<{ from: string; to: string }>;
  sequence: string | null;
  recipesAdded: number;
  /** Categories that had no values before this merge */
  openCategories: string[];
}

export interface MergeResult {
  summary: MergeSummary;
  record: VideoRecord;
}

function byStart(a: MergedClip, b: MergedClip): number {
  return a.clip.start - b.clip.start;
}

/**
 * Resolve every clip's labels (in clip order), update correlations and
 * duration stats, then index the clips as recipes in timestamp order.
 */
export function mergeVideo(
  ontology: MasterOntology,
  recipes: RecipeIndex,
  input: MergeInput,
  now: Date = new Date()
): MergeResult {
  const { schema } = ontology;
  const openCategories = ontology.bootstrapIfEmpty();

  const decisions: ResolveDecision[] = [];
  const newValues: Record<string, string[]> = {};
  const merged: MergedClip[] = [];

  for (const clip of input.clips) {
    const canonical: Record<string, string> = {};

    // 1. resolve labels
    for (const category of schema.categories) {
      if (!(category.name in clip.values)) continue;
      const { value, decision } = ontology.store(category.name).resolve(clip.values[category.name], input.videoId);
      canonical[category.name] = value.token;
      decisions.push(decision);
      if (decision.outcome === "created" || decision.outcome === "ambiguous") {
        if (!newValues[category.name]) newValues[category.name] = [];
        newValues[category.name].push(value.token);
      }
    }

    // 2. correlations; absent categories count as unknown
    for (const pair of schema.correlations) {
      const a = canonical[pair.a];
      const b = canonical[pair.b];
      if (!a || !b || a === UNKNOWN_TOKEN || b === UNKNOWN_TOKEN) continue;
      ontology.correlationFor(pair).increment(a, b);
    }

    // 3. durations
    const fn = canonical[schema.functionCategory];
    if (fn && fn !== UNKNOWN_TOKEN) {
      ontology.recordDuration(fn, clip.end - clip.start);
    }

    merged.push({ clip, canonical });
  }

  // 4. recipes, transitions and sequence in timestamp order
  const ordered = [...merged].sort(byStart);
  const entries: NewRecipeEntry[] = ordered.map(({ clip, canonical }) => ({
    videoId: input.videoId,
    clipNumber: clip.clipNumber,
    function: canonical[schema.functionCategory] ?? UNKNOWN_TOKEN,
    clipType: deriveClipType(canonical, clip.subjectDescription),
    script: clip.scriptSegment,
    purpose: clip.purpose,
    start: clip.start,
    end: clip.end,
    values: canonical,
  }));
  const recorded = recipes.recordVideo(entries);

  ontology.markVideoMerged(merged.length, now);

  const summary: MergeSummary = {
    videoId: input.videoId,
    clipsReceived: input.clipsReceived,
    clipsMerged: merged.length,
    clipsDropped: input.failures.length,
    failures: input.failures,
    newValues,
    ambiguous: decisions.filter((d) => d.outcome === "ambiguous"),
    decisions,
    transitions: recorded.transitions,
    sequence: recorded.sequence,
    recipesAdded: recorded.added,
    openCategories,
  };

  const discovered = Object.values(newValues).reduce((n, tokens) => n + tokens.length, 0);
  log.info(
    `Merged ${input.videoId}: ${summary.clipsMerged}/${summary.clipsReceived} clips, ` +
      `${summary.clipsDropped} dropped, ${discovered} new values, ${summary.ambiguous.length} ambiguous`
  );

  return {
    summary,
    record: {
      videoId: input.videoId,
      mergedAt: now.toISOString(),
      totalDuration: input.totalDuration,
      transcript: input.transcript,
      clips: ordered,
      failures: input.failures,
    },
  };
}
