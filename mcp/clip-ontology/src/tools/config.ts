import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { loadConfig, redactConfig, updateConfig } from "../utils/config.js";
import { errorResult, jsonResult, registerTool, textResult, type ToolContext } from "./registry.js";

/**
 * Config tools - get and save configuration
 */

export function registerConfigTools(server: McpServer, { configPath }: ToolContext): void {
  registerTool(server, {
    name: "get_config",
    title: "Get Configuration",
    description: "Load current configuration (service account path redacted unless asked).",
    inputSchema: {
      includeKeys: z
        .boolean()
        .optional()
        .default(false)
        .describe("Include secrets in response (default: false, secrets are redacted)"),
    },
    handler: async (args) => {
      try {
        const config = loadConfig(configPath);
        return jsonResult(args.includeKeys ? config : redactConfig(config));
      } catch (error) {
        return errorResult("loading config", error);
      }
    },
  });

  registerTool(server, {
    name: "save_config",
    title: "Save Configuration",
    description:
      "Update configuration fields. Merges with existing config and validates the result; ontology settings apply on the next server start.",
    inputSchema: {
      updates: z.record(z.string(), z.unknown()).describe("Configuration fields to update (key-value pairs)"),
    },
    handler: async (args) => {
      try {
        const updated = updateConfig(args.updates, configPath);
        return textResult(`Configuration updated:\n${JSON.stringify(redactConfig(updated), null, 2)}`);
      } catch (error) {
        return errorResult("saving config", error);
      }
    },
  });
}
