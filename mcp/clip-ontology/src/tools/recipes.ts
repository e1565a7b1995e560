import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { CLIP_TYPES } from "../services/recipe-index.js";
import { errorResult, jsonResult, registerTool, textResult, type ToolContext } from "./registry.js";

/**
 * Recipe tools - script-to-clip examples, search, transitions, playbook
 */

export function registerRecipeTools(server: McpServer, { service }: ToolContext): void {
  registerTool(server, {
    name: "get_playbook",
    title: "Get Playbook",
    description:
      "Script-to-clip playbook: per clip function and per clip type, recent script examples, then common transitions with examples.",
    inputSchema: {},
    handler: async () => {
      try {
        return textResult(service.renderPlaybook());
      } catch (error) {
        return errorResult("rendering playbook", error);
      }
    },
  });

  registerTool(server, {
    name: "get_recipe_examples",
    title: "Get Recipe Examples",
    description:
      "Recipe entries (script segment + clip annotation) for one clip function or one clip type, most recent first.",
    inputSchema: {
      function: z.string().optional().describe("Clip function, e.g. hook"),
      clipType: z.enum(CLIP_TYPES).optional().describe("Clip type, e.g. talking_head (instead of function)"),
      limit: z.number().int().min(1).optional().default(10),
    },
    handler: async (args) => {
      try {
        if (args.clipType) {
          return jsonResult(service.examplesForClipType(args.clipType, args.limit));
        }
        if (args.function === undefined) {
          return errorResult("listing recipe examples", new Error("Pass a function or a clipType"));
        }
        return jsonResult(service.examplesFor(args.function, args.limit));
      } catch (error) {
        return errorResult("listing recipe examples", error);
      }
    },
  });

  registerTool(server, {
    name: "search_recipes",
    title: "Search Recipes",
    description: "Recipe entries whose script segment contains the query (case-insensitive), most recent first.",
    inputSchema: {
      query: z.string().describe("Text to look for in past script segments"),
      limit: z.number().int().min(1).optional().default(20),
    },
    handler: async (args) => {
      try {
        return jsonResult(service.searchRecipes(args.query, args.limit));
      } catch (error) {
        return errorResult("searching recipes", error);
      }
    },
  });

  registerTool(server, {
    name: "get_top_transitions",
    title: "Get Top Transitions",
    description: "Clip functions that most often follow the given one, with counts.",
    inputSchema: {
      function: z.string().describe("Clip function to look up"),
      k: z.number().int().min(1).optional().default(5),
    },
    handler: async (args) => {
      try {
        return jsonResult(service.topTransitions(args.function, args.k));
      } catch (error) {
        return errorResult("listing transitions", error);
      }
    },
  });
}
