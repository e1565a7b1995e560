import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { z, ZodRawShape, ZodTypeAny } from "zod";
import { errorMessage } from "../errors.js";
import type { AnnotationSource, OntologyService } from "../services/ontology-service.js";

/**
 * What the tool handlers share: the one ontology service, the annotator,
 * and where the config file lives.
 */
export interface ToolContext {
  service: OntologyService;
  source: AnnotationSource;
  configPath: string;
}

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface ToolDef<Shape extends ZodRawShape> {
  name: string;
  title: string;
  description: string;
  inputSchema: Shape;
  handler: (args: z.objectOutputType<Shape, ZodTypeAny>) => Promise<ToolResult>;
}

export function registerTool<Shape extends ZodRawShape>(server: McpServer, tool: ToolDef<Shape>): void {
  server.tool(tool.name, tool.description, tool.inputSchema, (args) => tool.handler(args));
}

// ============================================================================
// Results: JSON for data, plain text for rendered reports
// ============================================================================

export function textResult(text: string): ToolResult {
  return {
    content: [{ type: "text" as const, text }],
  };
}

export function jsonResult(value: unknown): ToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

export function errorResult(doing: string, error: unknown): ToolResult {
  return {
    content: [{ type: "text" as const, text: `Error ${doing}: ${errorMessage(error)}` }],
    isError: true,
  };
}
