/**
 * Plain-text views over the ontology and recipe index. Read-only; output
 * depends only on the state passed in.
 */

import type { MasterOntology } from "./ontology.js";
import type { VideoRecord } from "./merger.js";
import { CLIP_TYPE_DESCRIPTIONS, type RecipeIndex } from "./recipe-index.js";
import type { OntologySchema } from "./schema.js";
import { UNKNOWN_TOKEN } from "./value-store.js";

const RULE = "=".repeat(70);
const THIN_RULE = "-".repeat(70);

export interface MasterReportOptions {
  valuesPerCategory?: number;
  pairsPerCorrelation?: number;
  transitions?: number;
  sequences?: number;
}

function seconds(value: number): string {
  return `${value.toFixed(2)}s`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + "..." : text;
}

function quoteScript(script: string, max: number): string {
  const trimmed = script.trim();
  return trimmed ? `"${truncate(trimmed, max)}"` : "[no dialogue]";
}

function heading(title: string, subtitle?: string): string[] {
  const lines = [RULE, title];
  if (subtitle) lines.push(`(${subtitle})`);
  lines.push(THIN_RULE);
  return lines;
}

// ============================================================================
// Master report
// ============================================================================

export function renderMasterReport(
  ontology: MasterOntology,
  recipes: RecipeIndex,
  options: MasterReportOptions = {}
): string {
  const valuesPerCategory = options.valuesPerCategory ?? 15;
  const pairsPerCorrelation = options.pairsPerCorrelation ?? 5;
  const stats = ontology.stats();
  const lines: string[] = [];

  lines.push(RULE, "MASTER CLIP ONTOLOGY REPORT", RULE);
  lines.push(`Videos analyzed: ${stats.videosAnalyzed}`);
  lines.push(`Clips analyzed: ${stats.clipsAnalyzed}`);
  if (stats.videosAnalyzed > 0) {
    lines.push(`Average clips per video: ${stats.averageClipsPerVideo.toFixed(1)}`);
  }
  lines.push(`Categories populated: ${stats.populatedCategories}/${stats.totalCategories}`);
  lines.push(`Last updated: ${stats.updatedAt}`);
  lines.push("");

  for (const category of ontology.schema.categories) {
    const store = ontology.findStore(category.name);
    const known = store?.knownValues() ?? [];
    if (!store || known.length === 0) continue;

    lines.push(...heading(category.label.toUpperCase(), category.description));
    const total = store.totalFrequency();
    for (const value of known.slice(0, valuesPerCategory)) {
      const pct = total > 0 ? (value.frequency / total) * 100 : 0;
      lines.push(`  ${value.token}  ${value.frequency}x (${pct.toFixed(1)}%)`);
    }
    if (known.length > valuesPerCategory) {
      lines.push(`  ... and ${known.length - valuesPerCategory} more`);
    }
    const unknown = store.get(UNKNOWN_TOKEN);
    if (unknown && unknown.frequency > 0) {
      lines.push(`  (unlabeled: ${unknown.frequency}x)`);
    }
    lines.push("");
  }

  const durations = ontology.durationStats();
  if (durations.length > 0) {
    lines.push(...heading("CLIP FUNCTION DURATIONS"));
    for (const [fn, stat] of durations) {
      lines.push(`  ${fn}: mean ${seconds(stat.mean)}, stddev ${seconds(stat.stddev)} (n=${stat.count})`);
    }
    lines.push("");
  }

  const tables = ontology.correlationTables().filter((table) => table.total() > 0);
  if (tables.length > 0) {
    lines.push(...heading("CORRELATIONS", "Most frequent value pairs"));
    for (const table of tables) {
      lines.push(`  ${table.pair.a} × ${table.pair.b}`);
      for (const cell of table.top(pairsPerCorrelation)) {
        lines.push(`    ${cell.a} + ${cell.b}: ${cell.count}`);
      }
    }
    lines.push("");
  }

  lines.push(...renderTransitionLines(recipes, options.transitions ?? 10, options.sequences ?? 10));
  return lines.join("\n").trimEnd() + "\n";
}

function renderTransitionLines(recipes: RecipeIndex, transitionLimit: number, sequenceLimit: number): string[] {
  const lines: string[] = [];

  const transitions = recipes.allTransitions(transitionLimit);
  if (transitions.length > 0) {
    lines.push(...heading("TOP TRANSITIONS", "Which clip function follows which"));
    for (const t of transitions) {
      lines.push(`  ${t.from} → ${t.to}: ${t.count}`);
    }
    lines.push("");
  }

  const sequences = recipes.topSequences(sequenceLimit);
  if (sequences.length > 0) {
    lines.push(...heading("COMMON FUNCTION SEQUENCES", "How videos typically open"));
    for (const s of sequences) {
      lines.push(`  (${s.count}x) ${s.sequence}`);
    }
    lines.push("");
  }

  return lines;
}

/** One line per populated category: its values, most frequent first */
export function renderKnownValues(ontology: MasterOntology): string {
  const lines: string[] = ["CLIP ONTOLOGY - KNOWN VALUES", "=".repeat(50), ""];
  for (const category of ontology.schema.categories) {
    const known = ontology.knownValues(category.name);
    if (known.length === 0) continue;
    lines.push(`${category.name}:`, `  ${known.map((v) => v.token).join(", ")}`, "");
  }
  return lines.join("\n").trimEnd() + "\n";
}

// ============================================================================
// Video report
// ============================================================================

export function renderVideoReport(record: VideoRecord, schema: OntologySchema): string {
  const lines: string[] = [];
  lines.push(RULE, `VIDEO REPORT: ${record.videoId}`, RULE);
  lines.push(`Merged: ${record.mergedAt}`);
  lines.push(`Duration: ${record.totalDuration ? seconds(record.totalDuration) : "unknown"}`);
  lines.push(`Clips: ${record.clips.length} merged, ${record.failures.length} dropped`);
  lines.push("");

  lines.push(...heading("TRANSCRIPT"));
  lines.push(record.transcript.trim() || "(none)");
  lines.push("");

  lines.push(...heading("CLIPS"));
  for (const { clip, canonical } of record.clips) {
    lines.push(
      `#${clip.clipNumber}  ${seconds(clip.start)} - ${seconds(clip.end)} (${seconds(clip.end - clip.start)})`
    );
    for (const category of schema.categories) {
      const token = canonical[category.name];
      if (token !== undefined) lines.push(`  ${category.name}: ${token}`);
    }
    if (clip.scriptSegment.trim()) lines.push(`  Script: "${clip.scriptSegment.trim()}"`);
    if (clip.purpose.trim()) lines.push(`  Purpose: ${clip.purpose.trim()}`);
    if (clip.textOnScreen.length > 0) lines.push(`  On-screen text: ${clip.textOnScreen.join(" | ")}`);
    lines.push("");
  }

  if (record.failures.length > 0) {
    lines.push(...heading("DROPPED CLIPS"));
    for (const failure of record.failures) {
      lines.push(`  index ${failure.index}: ${failure.reason} - ${failure.message}`);
    }
    lines.push("");
  }

  return lines.join("\n").trimEnd() + "\n";
}

// ============================================================================
// Playbook
// ============================================================================

export function renderPlaybook(recipes: RecipeIndex, examplesPerFunction = 3): string {
  const lines: string[] = [];
  lines.push(RULE, "SCRIPT-TO-CLIP PLAYBOOK", RULE);
  lines.push(`Videos learned from: ${recipes.videosLearnedFrom}`);
  lines.push(`Recipes: ${recipes.size}`);
  lines.push("");

  for (const fn of recipes.functions()) {
    const examples = recipes.examplesFor(fn);
    if (examples.length === 0) continue;

    lines.push(...heading(`${fn.toUpperCase().replace(/_/g, " ")} (${examples.length} examples)`));
    const types = recipes.clipTypeCounts(fn);
    lines.push(`Clip types: ${types.map((t) => `${t.clipType} ${t.count}`).join(", ")}`);
    if (types.length > 0) {
      const top = types[0].clipType;
      lines.push(`Most used: ${top} - ${CLIP_TYPE_DESCRIPTIONS[top]}`);
    }
    for (const entry of examples.slice(0, examplesPerFunction)) {
      lines.push(`  - [${entry.clipType}] ${quoteScript(entry.script, 80)} (${entry.videoId} #${entry.clipNumber})`);
    }
    lines.push("");
  }

  for (const clipType of recipes.clipTypes()) {
    const examples = recipes.examplesForClipType(clipType);
    const label = clipType.toUpperCase().replace(/_/g, " ");
    lines.push(...heading(`${label} CLIPS (${examples.length} examples)`, CLIP_TYPE_DESCRIPTIONS[clipType]));
    for (const entry of examples.slice(0, examplesPerFunction)) {
      lines.push(`  - [${entry.function}] ${quoteScript(entry.script, 80)} (${entry.videoId} #${entry.clipNumber})`);
    }
    lines.push("");
  }

  const clipTypeTransitions = recipes.clipTypeTransitionExamples();
  if (clipTypeTransitions.length > 0) {
    lines.push(...heading("CLIP TYPE TRANSITIONS", "Which clip type follows which"));
    for (const transition of clipTypeTransitions) {
      lines.push(`  ${transition.from} → ${transition.to} (${transition.examples.length} examples)`);
      // first pair that has any dialogue
      const example = transition.examples.find((e) => e.fromScript.trim() || e.toScript.trim());
      if (example) {
        lines.push(
          `    e.g. [${example.fromFunction}] ${quoteScript(example.fromScript, 40)} → [${example.toFunction}] ${quoteScript(example.toScript, 40)}`
        );
      }
    }
    lines.push("");
  }

  lines.push(...renderTransitionLines(recipes, 20, 10));
  return lines.join("\n").trimEnd() + "\n";
}

// ============================================================================
// Vocabulary hint
// ============================================================================

/**
 * Prompt-ready listing of known values. Categories without values are
 * left out.
 */
export function formatVocabularyHint(hint: Record<string, string[]>, schema: OntologySchema): string {
  const lines: string[] = [];
  for (const category of schema.categories) {
    const tokens = hint[category.name] ?? [];
    if (tokens.length > 0) lines.push(`- ${category.name}: ${tokens.join(", ")}`);
  }
  return lines.join("\n");
}
