import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { formatVocabularyHint } from "../services/reporter.js";
import { toRawAnnotations } from "../services/validation.js";
import { parseModelJson } from "../utils/json.js";
import { errorResult, jsonResult, registerTool, textResult, type ToolContext } from "./registry.js";

/**
 * Ontology tools - merge annotations, vocabulary hint, reports, stats
 */

export function registerOntologyTools(server: McpServer, { service }: ToolContext): void {
  registerTool(server, {
    name: "merge_annotations",
    title: "Merge Annotations",
    description:
      "Merge one video's clip annotations (the annotator's JSON: video_summary + clips) into the master ontology. Returns the merge summary.",
    inputSchema: {
      videoId: z.string().min(1).describe("Identifier of the annotated video"),
      annotations: z
        .union([z.string(), z.record(z.string(), z.unknown())])
        .describe("Annotator output, as a JSON object or the raw response text"),
      force: z.boolean().optional().default(false).describe("Merge even if this video id was merged before"),
      includeDecisions: z
        .boolean()
        .optional()
        .default(false)
        .describe("Include every per-label resolve decision in the response"),
    },
    handler: async (args) => {
      try {
        const parsed = typeof args.annotations === "string" ? parseModelJson(args.annotations) : args.annotations;
        const summary = await service.mergeVideo(args.videoId, toRawAnnotations(parsed), { force: args.force });
        return jsonResult(args.includeDecisions ? summary : { ...summary, decisions: undefined });
      } catch (error) {
        return errorResult("merging annotations", error);
      }
    },
  });

  registerTool(server, {
    name: "get_vocabulary_hint",
    title: "Get Vocabulary Hint",
    description: "Known values per category, most frequent first, for biasing the next annotation request.",
    inputSchema: {
      limit: z.number().int().min(1).optional().describe("Values per category (default: configured hintLimit)"),
      format: z.enum(["json", "text"]).optional().default("json").describe("JSON mapping or prompt-ready text"),
    },
    handler: async (args) => {
      try {
        const hint = service.vocabularyHint(args.limit);
        return args.format === "text" ? textResult(formatVocabularyHint(hint, service.schema)) : jsonResult(hint);
      } catch (error) {
        return errorResult("building vocabulary hint", error);
      }
    },
  });

  registerTool(server, {
    name: "get_known_values",
    title: "Get Known Values",
    description: "Canonical values of one category with their frequencies, most frequent first.",
    inputSchema: {
      category: z.string().describe("Category name, e.g. shot_type"),
      limit: z.number().int().min(1).optional(),
    },
    handler: async (args) => {
      try {
        return jsonResult(service.knownValues(args.category, args.limit));
      } catch (error) {
        return errorResult("listing known values", error);
      }
    },
  });

  registerTool(server, {
    name: "get_master_report",
    title: "Get Master Report",
    description:
      "Text report of the master ontology: top values per category, duration per clip function, top correlations and transitions.",
    inputSchema: {
      format: z.enum(["full", "values"]).optional().default("full").describe("Full report or known values only"),
    },
    handler: async (args) => {
      try {
        return textResult(args.format === "values" ? service.renderKnownValues() : service.renderMasterReport());
      } catch (error) {
        return errorResult("rendering master report", error);
      }
    },
  });

  registerTool(server, {
    name: "get_video_report",
    title: "Get Video Report",
    description: "Clip-by-clip report for a merged video: transcript, canonical values and purpose text.",
    inputSchema: {
      videoId: z.string().min(1),
    },
    handler: async (args) => {
      try {
        return textResult(service.renderVideoReport(args.videoId));
      } catch (error) {
        return errorResult("rendering video report", error);
      }
    },
  });

  registerTool(server, {
    name: "get_ontology_stats",
    title: "Get Ontology Stats",
    description: "Videos and clips analyzed, populated categories, distinct values, functions and emotions.",
    inputSchema: {},
    handler: async () => {
      try {
        return jsonResult(service.stats());
      } catch (error) {
        return errorResult("reading ontology stats", error);
      }
    },
  });
}
