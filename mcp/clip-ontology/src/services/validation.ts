import { createLogger } from "../utils/logger.js";
import type { CategoryDef, OntologySchema } from "./schema.js";

const log = createLogger("validation");

/**
 * One video's output from the annotator, before validation.
 */
export interface RawVideoAnnotations {
  /** Total video length in seconds; null or 0 skips the upper bound check */
  totalDuration: number | null;
  transcript: string;
  clips: unknown[];
}

/**
 * A clip that passed validation. `values` holds only the categories the
 * annotator supplied; null marks a category that was present but empty.
 */
export interface ClipAnnotation {
  index: number;
  clipNumber: number;
  start: number;
  end: number;
  values: Record<string, string | null>;
  scriptSegment: string;
  purpose: string;
  textOnScreen: string[];
  subjectDescription: string;
}

export type ValidationFailureReason =
  | "malformed_record"
  | "missing_category"
  | "invalid_category_value"
  | "invalid_timestamp"
  | "non_positive_duration"
  | "out_of_bounds";

export interface ValidationFailure {
  index: number;
  clipNumber: number | null;
  reason: ValidationFailureReason;
  message: string;
}

export type ClipValidationResult =
  | { ok: true; clip: ClipAnnotation }
  | { ok: false; failure: ValidationFailure };

export interface ValidatedBatch {
  clips: ClipAnnotation[];
  failures: ValidationFailure[];
}

export interface BoundsOptions {
  totalDuration: number | null;
  /** Seconds a clip may run past totalDuration */
  tolerance: number;
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Timestamps
// ============================================================================

const TIMESTAMP_PART = /^\d+(\.\d+)?$/;

/**
 * Seconds from a number or an `SS.mmm`, `MM:SS.mmm` or `HH:MM:SS.mmm`
 * string. Returns null for anything else.
 */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") return null;

  const parts = value.trim().split(":");
  if (parts.length > 3) return null;
  // only the seconds field may carry a fraction
  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    if (!TIMESTAMP_PART.test(part)) return null;
    if (i < parts.length - 1 && part.includes(".")) return null;
  }

  return parts.reduce((total, part) => total * 60 + Number(part), 0);
}

// ============================================================================
// Field extraction
// ============================================================================

function lookup(raw: RawRecord, category: CategoryDef): unknown {
  if (category.name in raw) return raw[category.name];
  const group = raw[category.group];
  if (isRecord(group) && category.name in group) return group[category.name];
  return undefined;
}

function textField(raw: RawRecord, ...keys: string[]): string {
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
  }
  return "";
}

function stringList(value: unknown): string[] {
  if (typeof value === "string") return value.trim() ? [value] : [];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === "string" && item.trim() !== "");
}

// ============================================================================
// Model output
// ============================================================================

/**
 * Map the model's JSON onto RawVideoAnnotations. Clips are passed through
 * untouched for the validator.
 */
export function toRawAnnotations(parsed: unknown): RawVideoAnnotations {
  const clips = isRecord(parsed) ? parsed.clips : undefined;
  if (!isRecord(parsed) || !Array.isArray(clips)) {
    throw new Error("Model response has no clips array");
  }
  const videoSummary = parsed.video_summary;
  const summary: RawRecord = isRecord(videoSummary) ? videoSummary : {};
  const duration = summary.total_duration_seconds;
  const transcript = summary.full_transcript;

  return {
    totalDuration: typeof duration === "number" && Number.isFinite(duration) ? duration : null,
    transcript: typeof transcript === "string" ? transcript : "",
    clips,
  };
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Check one raw clip against the schema. Never touches the ontology.
 */
export function validateClip(
  raw: unknown,
  index: number,
  schema: OntologySchema,
  bounds: BoundsOptions
): ClipValidationResult {
  const fail = (clipNumber: number | null, reason: ValidationFailureReason, message: string): ClipValidationResult => ({
    ok: false,
    failure: { index, clipNumber, reason, message },
  });

  if (!isRecord(raw)) {
    return fail(null, "malformed_record", `Clip ${index} is not an object`);
  }

  const rawNumber = raw.clip_number;
  const clipNumber = typeof rawNumber === "number" && Number.isInteger(rawNumber) ? rawNumber : index + 1;

  const start = parseTimestamp(raw.start ?? raw.timestamp_start);
  const end = parseTimestamp(raw.end ?? raw.timestamp_end);
  if (start === null || end === null) {
    return fail(clipNumber, "invalid_timestamp", `Clip ${index} has a missing or unparseable timestamp`);
  }
  if (start < 0 || end < 0) {
    return fail(clipNumber, "invalid_timestamp", `Clip ${index} has a negative timestamp (${start} -> ${end})`);
  }
  if (end <= start) {
    return fail(clipNumber, "non_positive_duration", `Clip ${index} ends at ${end}s, not after its start ${start}s`);
  }
  if (bounds.totalDuration && bounds.totalDuration > 0 && end > bounds.totalDuration + bounds.tolerance) {
    return fail(
      clipNumber,
      "out_of_bounds",
      `Clip ${index} ends at ${end}s, past the video's ${bounds.totalDuration}s`
    );
  }

  const values: Record<string, string | null> = {};
  for (const category of schema.categories) {
    const value = lookup(raw, category);
    if (value === undefined) {
      if (category.required) {
        return fail(clipNumber, "missing_category", `Clip ${index} is missing required category "${category.name}"`);
      }
      continue;
    }
    if (value === null) {
      values[category.name] = null;
    } else if (typeof value === "string") {
      values[category.name] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      values[category.name] = String(value);
    } else {
      return fail(
        clipNumber,
        "invalid_category_value",
        `Clip ${index} has a non-scalar value for "${category.name}"`
      );
    }
  }

  const rawVisual = raw.visual;
  const visual: RawRecord = isRecord(rawVisual) ? rawVisual : {};

  return {
    ok: true,
    clip: {
      index,
      clipNumber,
      start,
      end,
      values,
      scriptSegment: textField(raw, "script_segment"),
      purpose: textField(raw, "purpose_summary", "purpose"),
      textOnScreen: stringList(visual.text_on_screen ?? raw.text_on_screen),
      subjectDescription: textField(visual, "subject_description") || textField(raw, "subject_description"),
    },
  };
}

/**
 * Validate every clip of a video. Bad clips are dropped and reported;
 * the batch as a whole never fails.
 */
export function validateBatch(
  batch: RawVideoAnnotations,
  schema: OntologySchema,
  options: { durationTolerance: number }
): ValidatedBatch {
  const clips: ClipAnnotation[] = [];
  const failures: ValidationFailure[] = [];
  const bounds: BoundsOptions = { totalDuration: batch.totalDuration, tolerance: options.durationTolerance };

  batch.clips.forEach((raw, index) => {
    const result = validateClip(raw, index, schema, bounds);
    if (result.ok) {
      clips.push(result.clip);
    } else {
      log.warn(`Dropped clip: ${result.failure.message} (${result.failure.reason})`);
      failures.push(result.failure);
    }
  });

  return { clips, failures };
}
