import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { videoIdFromPath, videoJobsFromDirectory } from "../services/ontology-service.js";
import { resolvePath } from "../utils/paths.js";
import { errorResult, jsonResult, registerTool, type ToolContext } from "./registry.js";

/**
 * Analysis tools - annotate videos with the AI service and merge the results
 */

export function registerAnalysisTools(server: McpServer, { service, source }: ToolContext): void {
  registerTool(server, {
    name: "analyze_video",
    title: "Analyze Video",
    description:
      "Annotate one video with Gemini (prompted with the current vocabulary) and merge its clips into the ontology.",
    inputSchema: {
      videoPath: z.string().describe("Path to the video file (relative paths resolve from the project root)"),
      videoId: z.string().optional().describe("Identifier to record (default: file name without extension)"),
      force: z.boolean().optional().default(false).describe("Re-merge a video that was merged before"),
    },
    handler: async (args) => {
      try {
        const videoPath = resolvePath(args.videoPath);
        const videoId = args.videoId ?? videoIdFromPath(videoPath);
        const result = await service.processVideos([{ videoId, videoPath }], source, { force: args.force });
        if (result.failed.length > 0) {
          return errorResult("analyzing video", new Error(result.failed[0].error));
        }
        if (result.skipped.length > 0) {
          return jsonResult({ skipped: videoId, reason: "already merged; pass force to merge again" });
        }
        return jsonResult({ ...result.merged[0], decisions: undefined });
      } catch (error) {
        return errorResult("analyzing video", error);
      }
    },
  });

  registerTool(server, {
    name: "analyze_directory",
    title: "Analyze Directory",
    description:
      "Annotate and merge every video in a directory. Merges run one at a time; the next video's annotation request overlaps the current merge.",
    inputSchema: {
      directory: z.string().describe("Directory containing video files"),
      limit: z.number().int().min(1).optional().describe("Process at most this many videos"),
      force: z.boolean().optional().default(false).describe("Re-merge videos that were merged before"),
      pipeline: z.boolean().optional().default(true).describe("Overlap annotation of the next video with the current merge"),
    },
    handler: async (args) => {
      try {
        const jobs = videoJobsFromDirectory(resolvePath(args.directory), args.limit);
        const result = await service.processVideos(jobs, source, { force: args.force, pipeline: args.pipeline });
        return jsonResult({
          videos: jobs.length,
          merged: result.merged.map((s) => ({
            videoId: s.videoId,
            clipsMerged: s.clipsMerged,
            clipsDropped: s.clipsDropped,
            newValues: s.newValues,
          })),
          skipped: result.skipped,
          failed: result.failed,
          stats: service.stats(),
        });
      } catch (error) {
        return errorResult("analyzing directory", error);
      }
    },
  });
}
