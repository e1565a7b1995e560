import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerAnalysisTools } from "./analysis.js";
import { registerConfigTools } from "./config.js";
import { registerOntologyTools } from "./ontology.js";
import { registerRecipeTools } from "./recipes.js";
import type { ToolContext } from "./registry.js";

export const SERVER_NAME = "clip-ontology";
export const SERVER_VERSION = "1.0.0";

/** MCP server with every tool group registered, not yet connected */
export function createServer(context: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerConfigTools(server, context);
  registerOntologyTools(server, context);
  registerRecipeTools(server, context);
  registerAnalysisTools(server, context);

  return server;
}
