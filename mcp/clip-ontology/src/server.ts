#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { GeminiAnnotationSource } from "./clients/gemini.js";
import { OntologyService } from "./services/ontology-service.js";
import { createServer } from "./tools/index.js";
import { loadConfig, resolveSettings } from "./utils/config.js";
import { setLogLevel } from "./utils/logger.js";
import { CONFIG_PATH } from "./utils/paths.js";

// Start server
async function main() {
  const settings = resolveSettings(loadConfig(CONFIG_PATH));
  setLogLevel(settings.logLevel);

  // Create MCP server
  const server = createServer({
    service: OntologyService.fromSettings(settings),
    source: new GeminiAnnotationSource({
      model: settings.geminiModel,
      location: settings.vertexLocation,
      serviceAccountPath: settings.serviceAccountPath,
    }),
    configPath: CONFIG_PATH,
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Clip Ontology MCP Server running on stdio (state in ${settings.ontologyDir})`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
