#!/usr/bin/env npx tsx
/**
 * Print reports from the persisted ontology without starting the server
 *
 * Usage:
 *   npx tsx scripts/ontology-report.ts [--format=full|values|stats|json|playbook] [--video=<id>] [--output=file.txt]
 */

import fs from "fs";
import { OntologyService } from "../mcp/clip-ontology/src/services/ontology-service.js";
import { serializeDocument } from "../mcp/clip-ontology/src/services/storage.js";
import { optionValue } from "../mcp/clip-ontology/src/utils/args.js";
import { loadConfig, resolveSettings } from "../mcp/clip-ontology/src/utils/config.js";
import { resolvePath } from "../mcp/clip-ontology/src/utils/paths.js";

const FORMATS = ["full", "values", "stats", "json", "playbook"] as const;
type Format = (typeof FORMATS)[number];

function isFormat(value: string): value is Format {
  return FORMATS.some((format) => format === value);
}

async function main() {
  const args = process.argv.slice(2);

  if (args[0] === "--help") {
    console.log("Usage: npx tsx scripts/ontology-report.ts [options]");
    console.log();
    console.log("Options:");
    console.log(`  --format=<format>  One of ${FORMATS.join(", ")} (default: full)`);
    console.log("  --video=<id>       Print the report of one merged video instead");
    console.log("  --dir=<path>       Ontology directory (default: configured ontologyDir)");
    console.log("  --output=<file>    Write to a file instead of stdout");
    process.exit(0);
  }

  let format: Format = "full";
  let videoId: string | undefined;
  let dir: string | undefined;
  let output: string | undefined;

  for (const arg of args) {
    const value = optionValue(arg);
    if (arg.startsWith("--format=")) {
      if (!isFormat(value)) {
        console.error(`Error: unknown format "${value}"`);
        process.exit(1);
      }
      format = value;
    } else if (arg.startsWith("--video=")) {
      videoId = value;
    } else if (arg.startsWith("--dir=")) {
      dir = resolvePath(value);
    } else if (arg.startsWith("--output=")) {
      output = value;
    }
  }

  const settings = resolveSettings(loadConfig());
  const service = OntologyService.fromSettings({ ...settings, ontologyDir: dir ?? settings.ontologyDir });

  let text: string;
  if (videoId) {
    text = service.renderVideoReport(videoId);
  } else if (format === "values") {
    text = service.renderKnownValues();
  } else if (format === "stats") {
    text = serializeDocument(service.stats());
  } else if (format === "json") {
    text = serializeDocument(service.snapshot().ontology.toDocument());
  } else if (format === "playbook") {
    text = service.renderPlaybook();
  } else {
    text = service.renderMasterReport();
  }

  if (output) {
    fs.writeFileSync(output, text);
    console.log(`Report saved to: ${output}`);
  } else {
    process.stdout.write(text);
  }
}

main().catch((error) => {
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
