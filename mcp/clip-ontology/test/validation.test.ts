import { describe, it, expect } from "vitest";
import { defineSchema } from "../src/services/schema.js";
import {
  parseTimestamp,
  toRawAnnotations,
  validateBatch,
  validateClip,
  type BoundsOptions,
} from "../src/services/validation.js";

const schema = defineSchema({
  functionCategory: "clip_function",
  categories: [
    { name: "shot_type", group: "visual", label: "Shot Types", description: "Framing", required: true },
    { name: "camera_movement", group: "visual", label: "Camera Movements", description: "Movement", required: false },
    { name: "primary_emotion", group: "emotional", label: "Primary Emotions", description: "Emotion", required: false },
    { name: "clip_function", group: "functional", label: "Clip Functions", description: "Role", required: true },
  ],
  correlations: [{ a: "clip_function", b: "shot_type" }],
});

const noBounds: BoundsOptions = { totalDuration: null, tolerance: 0.5 };

function clip(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { start: 0, end: 2, shot_type: "close_up", clip_function: "hook", ...overrides };
}

describe("parseTimestamp", () => {
  it("accepts numbers and colon-separated strings", () => {
    expect(parseTimestamp(1.5)).toBe(1.5);
    expect(parseTimestamp("3.25")).toBe(3.25);
    expect(parseTimestamp("01:02.250")).toBe(62.25);
    expect(parseTimestamp("1:00:00")).toBe(3600);
    expect(parseTimestamp(" 00:05 ")).toBe(5);
  });

  it("rejects anything else", () => {
    expect(parseTimestamp("1:2:3:4")).toBeNull();
    expect(parseTimestamp("1.5:00")).toBeNull();
    expect(parseTimestamp("-1")).toBeNull();
    expect(parseTimestamp("soon")).toBeNull();
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp(Number.NaN)).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
  });
});

describe("validateClip", () => {
  it("reads flat categories and free-text fields", () => {
    const result = validateClip(
      clip({
        clip_number: 7,
        camera_movement: null,
        script_segment: "Tired of bad coffee?",
        purpose_summary: "Opens on the pain point",
        text_on_screen: ["BAD COFFEE?", " ", 3],
      }),
      0,
      schema,
      noBounds
    );

    expect(result).toEqual({
      ok: true,
      clip: {
        index: 0,
        clipNumber: 7,
        start: 0,
        end: 2,
        values: { shot_type: "close_up", camera_movement: null, clip_function: "hook" },
        scriptSegment: "Tired of bad coffee?",
        purpose: "Opens on the pain point",
        textOnScreen: ["BAD COFFEE?"],
        subjectDescription: "",
      },
    });
  });

  it("reads categories nested under their group", () => {
    const result = validateClip(
      {
        timestamp_start: "00:01.5",
        timestamp_end: "00:04",
        visual: { shot_type: "wide", subject_description: "a product on a desk", text_on_screen: "50% OFF" },
        functional: { clip_function: "cta" },
        emotional: { primary_emotion: 4 },
        purpose: "Closes the sale",
      },
      2,
      schema,
      noBounds
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.clip.clipNumber).toBe(3);
    expect(result.clip.start).toBe(1.5);
    expect(result.clip.end).toBe(4);
    expect(result.clip.values).toEqual({ shot_type: "wide", primary_emotion: "4", clip_function: "cta" });
    expect(result.clip.purpose).toBe("Closes the sale");
    expect(result.clip.textOnScreen).toEqual(["50% OFF"]);
    expect(result.clip.subjectDescription).toBe("a product on a desk");
  });

  it("rejects a record that is not an object", () => {
    expect(validateClip(["not", "a", "clip"], 4, schema, noBounds)).toEqual({
      ok: false,
      failure: { index: 4, clipNumber: null, reason: "malformed_record", message: "Clip 4 is not an object" },
    });
  });

  it("rejects missing, unparseable, and negative timestamps", () => {
    const missing = validateClip(clip({ end: undefined }), 0, schema, noBounds);
    const garbled = validateClip(clip({ start: "later" }), 0, schema, noBounds);
    const negative = validateClip(clip({ start: -1 }), 0, schema, noBounds);

    expect(missing.ok ? null : missing.failure.reason).toBe("invalid_timestamp");
    expect(garbled.ok ? null : garbled.failure.reason).toBe("invalid_timestamp");
    expect(negative.ok ? null : negative.failure.reason).toBe("invalid_timestamp");
  });

  it("rejects clips that do not end after they start", () => {
    const result = validateClip(clip({ start: 3, end: 3 }), 1, schema, noBounds);
    expect(result).toEqual({
      ok: false,
      failure: {
        index: 1,
        clipNumber: 2,
        reason: "non_positive_duration",
        message: "Clip 1 ends at 3s, not after its start 3s",
      },
    });
  });

  it("bounds clips by the video length plus tolerance", () => {
    const bounds: BoundsOptions = { totalDuration: 10, tolerance: 0.5 };
    expect(validateClip(clip({ start: 8, end: 10.5 }), 0, schema, bounds).ok).toBe(true);

    const past = validateClip(clip({ start: 8, end: 10.6 }), 0, schema, bounds);
    expect(past.ok ? null : past.failure.reason).toBe("out_of_bounds");

    const unknownLength = validateClip(clip({ start: 8, end: 99 }), 0, schema, { totalDuration: 0, tolerance: 0.5 });
    expect(unknownLength.ok).toBe(true);
  });

  it("requires required categories but not optional ones", () => {
    const result = validateClip(clip({ clip_function: undefined }), 0, schema, noBounds);
    expect(result.ok ? null : result.failure).toEqual({
      index: 0,
      clipNumber: 1,
      reason: "missing_category",
      message: 'Clip 0 is missing required category "clip_function"',
    });
  });

  it("accepts null for a required category", () => {
    const result = validateClip(clip({ shot_type: null }), 0, schema, noBounds);
    expect(result.ok ? result.clip.values.shot_type : "failed").toBeNull();
  });

  it("rejects structured category values", () => {
    const result = validateClip(clip({ camera_movement: ["pan", "tilt"] }), 0, schema, noBounds);
    expect(result.ok ? null : result.failure.reason).toBe("invalid_category_value");
  });

  it("does not modify its input", () => {
    const raw = clip({ visual: { text_on_screen: ["A"] } });
    const before = JSON.stringify(raw);
    validateClip(raw, 0, schema, noBounds);
    expect(JSON.stringify(raw)).toBe(before);
  });
});

describe("validateBatch", () => {
  it("keeps good clips and reports the bad ones by index", () => {
    const batch = validateBatch(
      {
        totalDuration: 9,
        transcript: "",
        clips: [clip(), clip({ start: 5, end: 4 }), "junk", clip({ start: 2, end: 5, shot_type: "wide" })],
      },
      schema,
      { durationTolerance: 0.5 }
    );

    expect(batch.clips.map((c) => c.index)).toEqual([0, 3]);
    expect(batch.failures.map((f) => [f.index, f.reason])).toEqual([
      [1, "non_positive_duration"],
      [2, "malformed_record"],
    ]);
  });
});

describe("toRawAnnotations", () => {
  it("reads the video summary and passes clips through", () => {
    const clips = [{ clip_number: 1 }];
    expect(
      toRawAnnotations({
        video_summary: { total_duration_seconds: 31.5, full_transcript: "Hello there" },
        clips,
      })
    ).toEqual({ totalDuration: 31.5, transcript: "Hello there", clips });
  });

  it("tolerates a missing summary", () => {
    expect(toRawAnnotations({ clips: [] })).toEqual({ totalDuration: null, transcript: "", clips: [] });
  });

  it("rejects output without a clips array", () => {
    expect(() => toRawAnnotations({ video_summary: {} })).toThrow("Model response has no clips array");
    expect(() => toRawAnnotations("clips")).toThrow("Model response has no clips array");
  });
});
