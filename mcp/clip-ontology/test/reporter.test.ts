import { describe, it, expect } from "vitest";
import { mergeVideo, type VideoRecord } from "../src/services/merger.js";
import { MasterOntology } from "../src/services/ontology.js";
import { RecipeIndex } from "../src/services/recipe-index.js";
import {
  formatVocabularyHint,
  renderKnownValues,
  renderMasterReport,
  renderPlaybook,
  renderVideoReport,
} from "../src/services/reporter.js";
import { DEFAULT_SCHEMA, defineSchema } from "../src/services/schema.js";
import type { ClipAnnotation } from "../src/services/validation.js";

const NOW = new Date("2026-03-01T09:30:00.000Z");
const RULE = "=".repeat(70);
const THIN = "-".repeat(70);

const schema = defineSchema({
  functionCategory: "clip_function",
  categories: [
    { name: "shot_type", group: "visual", label: "Shot Types", description: "Framing", required: false },
    { name: "clip_function", group: "functional", label: "Clip Functions", description: "Role", required: false },
  ],
  correlations: [{ a: "clip_function", b: "shot_type" }],
});

function clip(index: number, start: number, end: number, values: Record<string, string | null>): ClipAnnotation {
  return {
    index,
    clipNumber: index + 1,
    start,
    end,
    values,
    scriptSegment: "",
    purpose: "",
    textOnScreen: [],
    subjectDescription: "",
  };
}

function build(): { ontology: MasterOntology; recipes: RecipeIndex; record: VideoRecord } {
  const ontology = new MasterOntology(schema, undefined, NOW);
  const recipes = new RecipeIndex();
  const hook = {
    ...clip(0, 0, 2, { shot_type: "close_up", clip_function: "hook" }),
    scriptSegment: "Stop scrolling",
    purpose: "Grabs attention",
    textOnScreen: ["STOP"],
  };
  const { record } = mergeVideo(
    ontology,
    recipes,
    {
      videoId: "ad-1",
      transcript: "Stop scrolling. Buy now.",
      totalDuration: 6,
      clipsReceived: 4,
      clips: [
        hook,
        clip(1, 2, 5, { shot_type: "close_up", clip_function: "cta" }),
        clip(2, 5, 6, { shot_type: null, clip_function: "cta" }),
      ],
      failures: [
        {
          index: 3,
          clipNumber: 4,
          reason: "out_of_bounds",
          message: "Clip 3 ends at 9s, past the video's 6s",
        },
      ],
    },
    NOW
  );
  return { ontology, recipes, record };
}

const transitionLines = [
  RULE,
  "TOP TRANSITIONS",
  "(Which clip function follows which)",
  THIN,
  "  cta → cta: 1",
  "  hook → cta: 1",
  "",
  RULE,
  "COMMON FUNCTION SEQUENCES",
  "(How videos typically open)",
  THIN,
  "  (1x) hook → cta → cta",
];

describe("renderMasterReport", () => {
  it("lists values, durations, correlations, and transitions", () => {
    const { ontology, recipes } = build();

    expect(renderMasterReport(ontology, recipes)).toBe(
      [
        RULE,
        "MASTER CLIP ONTOLOGY REPORT",
        RULE,
        "Videos analyzed: 1",
        "Clips analyzed: 3",
        "Average clips per video: 3.0",
        "Categories populated: 2/2",
        "Last updated: 2026-03-01T09:30:00.000Z",
        "",
        RULE,
        "SHOT TYPES",
        "(Framing)",
        THIN,
        "  close_up  2x (100.0%)",
        "  (unlabeled: 1x)",
        "",
        RULE,
        "CLIP FUNCTIONS",
        "(Role)",
        THIN,
        "  cta  2x (66.7%)",
        "  hook  1x (33.3%)",
        "",
        RULE,
        "CLIP FUNCTION DURATIONS",
        THIN,
        "  cta: mean 2.00s, stddev 1.00s (n=2)",
        "  hook: mean 2.00s, stddev 0.00s (n=1)",
        "",
        RULE,
        "CORRELATIONS",
        "(Most frequent value pairs)",
        THIN,
        "  clip_function × shot_type",
        "    cta + close_up: 1",
        "    hook + close_up: 1",
        "",
        ...transitionLines,
      ].join("\n") + "\n"
    );
  });

  it("limits the values shown per category", () => {
    const { ontology, recipes } = build();
    const report = renderMasterReport(ontology, recipes, { valuesPerCategory: 1 });
    expect(report).toContain("  cta  2x (66.7%)\n  ... and 1 more\n");
  });

  it("renders only the header for an empty ontology without creating stores", () => {
    const ontology = new MasterOntology(DEFAULT_SCHEMA, undefined, NOW);
    const report = renderMasterReport(ontology, new RecipeIndex());

    expect(report).toBe(
      [
        RULE,
        "MASTER CLIP ONTOLOGY REPORT",
        RULE,
        "Videos analyzed: 0",
        "Clips analyzed: 0",
        `Categories populated: 0/${DEFAULT_SCHEMA.categories.length}`,
        "Last updated: 2026-03-01T09:30:00.000Z",
      ].join("\n") + "\n"
    );
    expect(ontology.findStore("shot_type")).toBeUndefined();
  });

  it("does not change the state it reads", () => {
    const { ontology, recipes } = build();
    const before = JSON.stringify([ontology.toDocument(), recipes.toDocument()]);
    renderMasterReport(ontology, recipes);
    renderPlaybook(recipes);
    renderKnownValues(ontology);
    expect(JSON.stringify([ontology.toDocument(), recipes.toDocument()])).toBe(before);
  });
});

describe("renderKnownValues", () => {
  it("lists each populated category on one line", () => {
    const { ontology } = build();
    expect(renderKnownValues(ontology)).toBe(
      [
        "CLIP ONTOLOGY - KNOWN VALUES",
        "=".repeat(50),
        "",
        "shot_type:",
        "  close_up",
        "",
        "clip_function:",
        "  cta, hook",
      ].join("\n") + "\n"
    );
  });
});

describe("renderVideoReport", () => {
  it("shows every merged clip and every dropped one", () => {
    const { record } = build();
    expect(renderVideoReport(record, schema)).toBe(
      [
        RULE,
        "VIDEO REPORT: ad-1",
        RULE,
        "Merged: 2026-03-01T09:30:00.000Z",
        "Duration: 6.00s",
        "Clips: 3 merged, 1 dropped",
        "",
        RULE,
        "TRANSCRIPT",
        THIN,
        "Stop scrolling. Buy now.",
        "",
        RULE,
        "CLIPS",
        THIN,
        "#1  0.00s - 2.00s (2.00s)",
        "  shot_type: close_up",
        "  clip_function: hook",
        '  Script: "Stop scrolling"',
        "  Purpose: Grabs attention",
        "  On-screen text: STOP",
        "",
        "#2  2.00s - 5.00s (3.00s)",
        "  shot_type: close_up",
        "  clip_function: cta",
        "",
        "#3  5.00s - 6.00s (1.00s)",
        "  shot_type: unknown",
        "  clip_function: cta",
        "",
        RULE,
        "DROPPED CLIPS",
        THIN,
        "  index 3: out_of_bounds - Clip 3 ends at 9s, past the video's 6s",
      ].join("\n") + "\n"
    );
  });

  it("marks a missing transcript and duration", () => {
    const { record } = build();
    const report = renderVideoReport({ ...record, transcript: "  ", totalDuration: null }, schema);
    expect(report).toContain("Duration: unknown\n");
    expect(report).toContain(`TRANSCRIPT\n${THIN}\n(none)\n`);
  });
});

describe("renderPlaybook", () => {
  it("lists recent examples per function", () => {
    const { recipes } = build();
    expect(renderPlaybook(recipes)).toBe(
      [
        RULE,
        "SCRIPT-TO-CLIP PLAYBOOK",
        RULE,
        "Videos learned from: 1",
        "Recipes: 3",
        "",
        RULE,
        "CTA (2 examples)",
        THIN,
        "Clip types: other 2",
        "Most used: other - Anything that fits none of the above.",
        "  - [other] [no dialogue] (ad-1 #3)",
        "  - [other] [no dialogue] (ad-1 #2)",
        "",
        RULE,
        "HOOK (1 examples)",
        THIN,
        "Clip types: other 1",
        "Most used: other - Anything that fits none of the above.",
        '  - [other] "Stop scrolling" (ad-1 #1)',
        "",
        RULE,
        "OTHER CLIPS (3 examples)",
        "(Anything that fits none of the above.)",
        THIN,
        "  - [cta] [no dialogue] (ad-1 #3)",
        "  - [cta] [no dialogue] (ad-1 #2)",
        '  - [hook] "Stop scrolling" (ad-1 #1)',
        "",
        RULE,
        "CLIP TYPE TRANSITIONS",
        "(Which clip type follows which)",
        THIN,
        "  other → other (2 examples)",
        '    e.g. [hook] "Stop scrolling" → [cta] [no dialogue]',
        "",
        ...transitionLines,
      ].join("\n") + "\n"
    );
  });
});

describe("formatVocabularyHint", () => {
  it("lists categories with values in schema order", () => {
    expect(formatVocabularyHint({ clip_function: ["hook", "cta"], shot_type: [] }, schema)).toBe(
      "- clip_function: hook, cta"
    );
    expect(formatVocabularyHint({}, schema)).toBe("");
  });
});
