/**
 * Category Value Store
 *
 * Folds free-text labels produced by the annotator into a small canonical
 * vocabulary for one category:
 * - labels are normalized (case, whitespace, punctuation)
 * - exact normalized matches share a value
 * - near matches (edit distance / token overlap) merge above the threshold
 * - everything else becomes a new canonical value
 *
 * Merging is order dependent: whichever spelling is seen first becomes the
 * canonical token.
 */

import { distance } from "fastest-levenshtein";
import { createLogger } from "../utils/logger.js";

const log = createLogger("value-store");

export const UNKNOWN_TOKEN = "unknown";

export interface CanonicalValue {
  token: string;
  frequency: number;
  surfaceForms: string[];
  firstSeenVideoId: string | null;
}

export interface SimilarityPolicy {
  /** Best-match score at which two labels are considered the same value */
  threshold: number;
  /** Scores in [threshold, threshold + margin) create a new value and are flagged */
  ambiguityMargin: number;
}

export const DEFAULT_SIMILARITY_POLICY: SimilarityPolicy = {
  threshold: 0.82,
  ambiguityMargin: 0.03,
};

export type ResolveOutcome = "exact" | "merged" | "created" | "ambiguous" | "unknown";

export interface ResolveDecision {
  category: string;
  raw: string | null;
  token: string;
  outcome: ResolveOutcome;
  /** Best similarity score against existing values, when one was computed */
  score: number | null;
  /** Closest existing token, when one was compared */
  closest: string | null;
}

export interface ResolveResult {
  value: CanonicalValue;
  decision: ResolveDecision;
}

export interface KnownValue {
  token: string;
  frequency: number;
}

/**
 * Lowercase, trim, and collapse runs of whitespace/punctuation into single
 * underscores. "Close-Up " and "close   up" both become "close_up".
 */
export function normalize(raw: string): string {
  return raw
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[\p{P}\p{S}\s]+/gu, "_")
    .replace(/^_+|_+$/g, "");
}

/** 1 - levenshtein / longer length */
export function editSimilarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - distance(a, b) / longest;
}

/** Jaccard overlap of the underscore-separated tokens */
export function tokenOverlap(a: string, b: string): number {
  const A = new Set(a.split("_").filter(Boolean));
  const B = new Set(b.split("_").filter(Boolean));
  let inter = 0;
  for (const x of A) if (B.has(x)) inter++;
  const union = A.size + B.size - inter;
  return union ? inter / union : 1;
}

/** Similarity of two normalized tokens, in [0, 1] */
export function similarity(a: string, b: string): number {
  return Math.max(editSimilarity(a, b), tokenOverlap(a, b));
}

function isUnknown(token: string): boolean {
  return token === "" || token === UNKNOWN_TOKEN;
}

export class CategoryValueStore {
  private readonly values = new Map<string, CanonicalValue>();

  constructor(
    readonly category: string,
    private readonly policy: SimilarityPolicy = DEFAULT_SIMILARITY_POLICY,
    initial: CanonicalValue[] = []
  ) {
    for (const value of initial) {
      this.values.set(value.token, {
        token: value.token,
        frequency: value.frequency,
        surfaceForms: [...value.surfaceForms],
        firstSeenVideoId: value.firstSeenVideoId,
      });
    }
  }

  /** Number of canonical values, not counting the unknown sentinel */
  get size(): number {
    return this.values.size - (this.values.has(UNKNOWN_TOKEN) ? 1 : 0);
  }

  /** With nothing to compare against, any resolved value becomes canonical as-is */
  isOpen(): boolean {
    return this.size === 0;
  }

  get(token: string): CanonicalValue | undefined {
    return this.values.get(token);
  }

  /**
   * Map a raw label onto a canonical value, incrementing its frequency.
   * Deterministic for a given store state.
   */
  resolve(raw: string | null | undefined, videoId: string): ResolveResult {
    const surface = typeof raw === "string" ? raw.trim() : "";
    const token = normalize(surface);

    if (isUnknown(token)) {
      const value = this.bump(UNKNOWN_TOKEN, surface, videoId);
      return this.decide(value, { raw: raw ?? null, outcome: "unknown", score: null, closest: null });
    }

    if (this.values.has(token)) {
      const value = this.bump(token, surface, videoId);
      return this.decide(value, { raw: surface, outcome: "exact", score: 1, closest: token });
    }

    const best = this.bestMatch(token);
    if (!best) {
      const value = this.bump(token, surface, videoId);
      return this.decide(value, { raw: surface, outcome: "created", score: null, closest: null });
    }

    const mergeAt = Math.min(1, this.policy.threshold + this.policy.ambiguityMargin);
    if (best.score >= mergeAt) {
      const value = this.bump(best.token, surface, videoId);
      return this.decide(value, { raw: surface, outcome: "merged", score: best.score, closest: best.token });
    }

    const outcome = best.score >= this.policy.threshold ? "ambiguous" : "created";
    const value = this.bump(token, surface, videoId);
    return this.decide(value, { raw: surface, outcome, score: best.score, closest: best.token });
  }

  /**
   * Closest existing value by similarity. Ties go to the more frequent value,
   * then to the lexically smaller token.
   */
  bestMatch(token: string): { token: string; score: number } | null {
    let best: { token: string; score: number; frequency: number } | null = null;
    for (const candidate of this.values.values()) {
      if (candidate.token === UNKNOWN_TOKEN) continue;
      const score = similarity(token, candidate.token);
      if (
        !best ||
        score > best.score ||
        (score === best.score && candidate.frequency > best.frequency) ||
        (score === best.score && candidate.frequency === best.frequency && candidate.token < best.token)
      ) {
        best = { token: candidate.token, score, frequency: candidate.frequency };
      }
    }
    return best ? { token: best.token, score: best.score } : null;
  }

  /** Values by descending frequency (ties by token), without the unknown sentinel */
  knownValues(limit?: number): KnownValue[] {
    const known = [...this.values.values()]
      .filter((v) => v.token !== UNKNOWN_TOKEN)
      .sort((a, b) => b.frequency - a.frequency || (a.token < b.token ? -1 : a.token > b.token ? 1 : 0))
      .map((v) => ({ token: v.token, frequency: v.frequency }));
    return limit === undefined ? known : known.slice(0, limit);
  }

  /** Every stored value including the sentinel, sorted by token */
  all(): CanonicalValue[] {
    return [...this.values.values()].sort((a, b) => (a.token < b.token ? -1 : a.token > b.token ? 1 : 0));
  }

  totalFrequency(includeUnknown = false): number {
    let total = 0;
    for (const value of this.values.values()) {
      if (!includeUnknown && value.token === UNKNOWN_TOKEN) continue;
      total += value.frequency;
    }
    return total;
  }

  private bump(token: string, surface: string, videoId: string): CanonicalValue {
    let value = this.values.get(token);
    if (!value) {
      value = { token, frequency: 0, surfaceForms: [], firstSeenVideoId: videoId };
      this.values.set(token, value);
    }
    value.frequency++;
    if (surface && !value.surfaceForms.includes(surface)) {
      value.surfaceForms.push(surface);
    }
    return value;
  }

  private decide(
    value: CanonicalValue,
    details: Omit<ResolveDecision, "category" | "token">
  ): ResolveResult {
    const decision: ResolveDecision = { category: this.category, token: value.token, ...details };
    if (decision.outcome === "ambiguous") {
      log.warn(
        `${this.category}: "${decision.raw}" scored ${decision.score?.toFixed(3)} against "${decision.closest}" (ambiguous band); kept as new value "${value.token}"`
      );
    } else {
      log.debug(`${this.category}: "${decision.raw ?? ""}" -> ${value.token} (${decision.outcome})`);
    }
    return { value, decision };
  }
}
