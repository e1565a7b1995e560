import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect } from "vitest";
import { GeminiAnnotationSource, buildAnnotationPrompt } from "../src/clients/gemini.js";
import { buildVertexUrl } from "../src/clients/google-auth.js";
import { ConfigError } from "../src/errors.js";
import { DEFAULT_SCHEMA, defineSchema } from "../src/services/schema.js";

const schema = defineSchema({
  functionCategory: "clip_function",
  categories: [
    { name: "shot_type", group: "visual", label: "Shot Types", description: "Framing", required: true },
    { name: "clip_function", group: "functional", label: "Clip Functions", description: "Role", required: false },
  ],
  correlations: [],
});

describe("buildAnnotationPrompt", () => {
  it("nests each category under its group", () => {
    const prompt = buildAnnotationPrompt(schema, {});

    expect(prompt).toContain(
      [
        '    "visual": {',
        '      "shot_type": "<framing>"',
        "    },",
        '    "functional": {',
        '      "clip_function": "<role, or null>"',
        "    }",
      ].join("\n")
    );
    expect(prompt).toContain("First analysis - discover all values.");
  });

  it("lists the known values", () => {
    const prompt = buildAnnotationPrompt(schema, { shot_type: ["close_up", "wide"], clip_function: [] });

    expect(prompt).toContain("## KNOWN VALUES\n\n- shot_type: close_up, wide\n\nReuse a known value");
    expect(prompt).not.toContain("First analysis");
  });

  it("covers every category of the default schema", () => {
    const prompt = buildAnnotationPrompt(DEFAULT_SCHEMA, {});
    for (const category of DEFAULT_SCHEMA.categories) {
      expect(prompt).toContain(`"${category.name}": "<`);
    }
  });
});

describe("GeminiAnnotationSource", () => {
  const source = new GeminiAnnotationSource({ model: "gemini-test", location: "us-central1", serviceAccountPath: null });

  it("rejects a missing video", async () => {
    await expect(
      source.annotate({ videoId: "ad-1", videoPath: "/no/such/dir/ad-1.mp4", schema, vocabulary: {} })
    ).rejects.toThrow("Video not found: /no/such/dir/ad-1.mp4");
  });

  it("requires a service account before calling the API", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "clip-ontology-gemini-"));
    const videoPath = path.join(dir, "ad-1.mp4");
    fs.writeFileSync(videoPath, "not really a video");
    try {
      await expect(source.annotate({ videoId: "ad-1", videoPath, schema, vocabulary: {} })).rejects.toThrow(
        ConfigError
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("buildVertexUrl", () => {
  it("uses the regional or global endpoint", () => {
    expect(buildVertexUrl("proj", "gemini-test", "generateContent", "europe-west4")).toBe(
      "https://europe-west4-aiplatform.googleapis.com/v1/projects/proj/locations/europe-west4/publishers/google/models/gemini-test:generateContent"
    );
    expect(buildVertexUrl("proj", "gemini-test", "generateContent", "global")).toBe(
      "https://aiplatform.googleapis.com/v1/projects/proj/locations/global/publishers/google/models/gemini-test:generateContent"
    );
  });
});
