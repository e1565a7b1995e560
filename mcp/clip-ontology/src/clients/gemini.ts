import fs from "fs";
import path from "path";
import { z } from "zod";
import { getGoogleAccessToken, buildVertexUrl } from "./google-auth.js";
import type { AnnotationRequest, AnnotationSource } from "../services/ontology-service.js";
import type { OntologySchema } from "../services/schema.js";
import { CATEGORY_GROUPS } from "../services/schema.js";
import { toRawAnnotations, type RawVideoAnnotations } from "../services/validation.js";
import { formatVocabularyHint } from "../services/reporter.js";
import { parseModelJson } from "../utils/json.js";
import { createLogger } from "../utils/logger.js";
import { resolvePath } from "../utils/paths.js";

const log = createLogger("gemini");

const VIDEO_MIME_TYPES: Record<string, string> = {
  ".mp4": "video/mp4",
  ".mov": "video/quicktime",
  ".webm": "video/webm",
  ".avi": "video/x-msvideo",
  ".mkv": "video/x-matroska",
};

export interface GeminiAnnotatorOptions {
  model: string;
  location: string;
  serviceAccountPath: string | null;
}

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
      })
    )
    .optional(),
});

// ============================================================================
// Prompt
// ============================================================================

/**
 * Annotation prompt listing every category of the schema, grouped the way
 * the response nests them, plus the values already in use.
 */
export function buildAnnotationPrompt(schema: OntologySchema, vocabulary: Record<string, string[]>): string {
  const known = formatVocabularyHint(vocabulary, schema);

  const groups = CATEGORY_GROUPS.map((group) => {
    const categories = schema.categories.filter((c) => c.group === group);
    if (categories.length === 0) return "";
    const fields = categories
      .map((c) => `      "${c.name}": "<${c.description.toLowerCase()}${c.required ? "" : ", or null"}>"`)
      .join(",\n");
    return `    "${group}": {\n${fields}\n    }`;
  }).filter(Boolean);

  return `You are an expert video editor analyzing a video advertisement. Identify every clip change (cut, camera move, scene, subject or on-screen text change) and describe each clip.

## KNOWN VALUES

${known || "First analysis - discover all values."}

Reuse a known value whenever it fits. Invent a new snake_case value only when none does.

## OUTPUT FORMAT - JSON

{
  "video_summary": {
    "total_duration_seconds": <float>,
    "full_transcript": "<complete verbatim transcript>"
  },
  "clips": [
    {
      "clip_number": <int>,
      "timestamp_start": "<MM:SS.mmm>",
      "timestamp_end": "<MM:SS.mmm>",
      "script_segment": "<exact words spoken in this clip>",
      "purpose_summary": "<why this clip exists here>",
${groups.join(",\n")}
    }
  ]
}

Put "subject_description" and "text_on_screen" (list of strings) inside "visual".
Timestamps must not overlap; the end of clip N is the start of clip N+1.

OUTPUT ONLY VALID JSON.`;
}

// ============================================================================
// Source
// ============================================================================

/**
 * Annotates videos with Gemini on Vertex AI. The video is sent inline.
 */
export class GeminiAnnotationSource implements AnnotationSource {
  constructor(private readonly options: GeminiAnnotatorOptions) {}

  async annotate(request: AnnotationRequest): Promise<RawVideoAnnotations> {
    const resolvedPath = resolvePath(request.videoPath);
    if (!fs.existsSync(resolvedPath)) {
      throw new Error(`Video not found: ${resolvedPath}`);
    }

    const prompt = buildAnnotationPrompt(request.schema, request.vocabulary);
    const text = await this.generate(resolvedPath, prompt);
    log.debug(`${request.videoId}: ${text.length} chars from ${this.options.model}`);
    return toRawAnnotations(parseModelJson(text));
  }

  private async generate(videoPath: string, prompt: string): Promise<string> {
    const { accessToken, projectId } = await getGoogleAccessToken(this.options.serviceAccountPath);

    const base64Video = fs.readFileSync(videoPath).toString("base64");
    const mimeType = VIDEO_MIME_TYPES[path.extname(videoPath).toLowerCase()] ?? "video/mp4";

    const requestBody = {
      contents: [
        {
          role: "user",
          parts: [
            { inlineData: { mimeType, data: base64Video } },
            { text: prompt },
          ],
        },
      ],
      generationConfig: {
        temperature: 0.3,
        maxOutputTokens: 65536,
        responseMimeType: "application/json",
      },
    };

    const url = buildVertexUrl(projectId, this.options.model, "generateContent", this.options.location);

    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${accessToken}`,
      },
      body: JSON.stringify(requestBody),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Gemini API error: ${response.status} ${errorText}`);
    }

    const data = GeminiResponseSchema.parse(await response.json());

    const text = data.candidates?.[0]?.content?.parts
      ?.map((p) => p.text || "")
      .join("");

    if (!text) {
      throw new Error("Gemini returned no text");
    }
    return text;
  }
}
