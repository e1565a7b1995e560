import { createHash } from "crypto";
import fs from "fs";
import path from "path";
import { z } from "zod";
import { PersistenceError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import {
  MASTER_ONTOLOGY_FILE,
  PROCESSING_LOG_FILE,
  RECIPE_INDEX_FILE,
  REPORTS_DIR_NAME,
} from "../utils/paths.js";
import { MasterOntology } from "./ontology.js";
import { RecipeIndex } from "./recipe-index.js";
import type { OntologySchema } from "./schema.js";
import type { SimilarityPolicy } from "./value-store.js";

const log = createLogger("storage");

// ============================================================================
// Processing log
// ============================================================================

const ProcessedEntrySchema = z.object({
  clips: z.number().int().min(0),
  merged_at: z.string(),
});

const FailedEntrySchema = z.object({
  error: z.string(),
  failed_at: z.string(),
});

/** A JSON object read as [id, entry] pairs, so ids such as "__proto__" survive */
function tableEntries(value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
  return Object.entries(value);
}

const ProcessingLogSchema = z.object({
  processed: z.preprocess(tableEntries, z.array(z.tuple([z.string(), ProcessedEntrySchema]))),
  failed: z.preprocess(tableEntries, z.array(z.tuple([z.string(), FailedEntrySchema]))),
});

export type ProcessedEntry = z.infer<typeof ProcessedEntrySchema>;
export type FailedEntry = z.infer<typeof FailedEntrySchema>;

/**
 * Which videos have been merged (or failed), keyed by video id. The merger
 * itself does not deduplicate, so this is what keeps a video from being
 * counted twice.
 */
export interface ProcessingLog {
  processed: Map<string, ProcessedEntry>;
  failed: Map<string, FailedEntry>;
}

export function emptyProcessingLog(): ProcessingLog {
  return { processed: new Map(), failed: new Map() };
}

export function processingLogDocument(processingLog: ProcessingLog): {
  processed: Record<string, ProcessedEntry>;
  failed: Record<string, FailedEntry>;
} {
  return {
    processed: Object.fromEntries(processingLog.processed),
    failed: Object.fromEntries(processingLog.failed),
  };
}

/** Stable JSON text: two-space indent and a trailing newline */
export function serializeDocument(doc: unknown): string {
  return JSON.stringify(doc, null, 2) + "\n";
}

/**
 * Sanitized id plus a short hash of the raw id, so ids that sanitize alike
 * ("a/b" and "a_b") keep separate files.
 */
export function reportFileName(videoId: string): string {
  const digest = createHash("sha256").update(videoId).digest("hex").slice(0, 8);
  return `${videoId.replace(/[^A-Za-z0-9._-]/g, "_")}-${digest}.txt`;
}

interface StagedFile {
  filePath: string;
  tempPath: string;
  /** Content before the commit, null when there was no file */
  previous: string | null;
}

function readIfFile(filePath: string): string | null {
  const stat = fs.statSync(filePath, { throwIfNoEntry: false });
  return stat?.isFile() ? fs.readFileSync(filePath, "utf-8") : null;
}

// ============================================================================
// Repository
// ============================================================================

/**
 * The ontology directory: master ontology, recipe index, processing log
 * and rendered per-video reports. Every write goes to a temp file that is
 * then renamed over the target.
 */
export class OntologyRepository {
  readonly ontologyPath: string;
  readonly recipesPath: string;
  readonly logPath: string;
  readonly reportsDir: string;

  constructor(readonly dir: string) {
    this.ontologyPath = path.join(dir, MASTER_ONTOLOGY_FILE);
    this.recipesPath = path.join(dir, RECIPE_INDEX_FILE);
    this.logPath = path.join(dir, PROCESSING_LOG_FILE);
    this.reportsDir = path.join(dir, REPORTS_DIR_NAME);
  }

  /** Null when nothing has been saved yet */
  loadOntology(schema: OntologySchema, policy: SimilarityPolicy): MasterOntology | null {
    const data = this.readJson(this.ontologyPath, "Cannot read master ontology");
    if (data === undefined) return null;
    try {
      return MasterOntology.fromDocument(data, schema, policy);
    } catch (error) {
      throw new PersistenceError("Master ontology is not a valid document", this.ontologyPath, error);
    }
  }

  loadRecipes(limitPerFunction: number): RecipeIndex | null {
    const data = this.readJson(this.recipesPath, "Cannot read recipe index");
    if (data === undefined) return null;
    try {
      return RecipeIndex.fromDocument(data, limitPerFunction);
    } catch (error) {
      throw new PersistenceError("Recipe index is not a valid document", this.recipesPath, error);
    }
  }

  /**
   * Commit one merge: ontology, recipe index and processing log are
   * replaced together or not at all.
   */
  saveState(ontology: MasterOntology, recipes: RecipeIndex, processingLog: ProcessingLog): void {
    this.writeAllAtomic([
      { filePath: this.ontologyPath, content: serializeDocument(ontology.toDocument()) },
      { filePath: this.recipesPath, content: serializeDocument(recipes.toDocument()) },
      { filePath: this.logPath, content: serializeDocument(processingLogDocument(processingLog)) },
    ]);
  }

  loadProcessingLog(): ProcessingLog {
    const data = this.readJson(this.logPath, "Cannot read processing log");
    if (data === undefined) return emptyProcessingLog();
    const parsed = ProcessingLogSchema.safeParse(data);
    if (!parsed.success) {
      throw new PersistenceError("Processing log is not a valid document", this.logPath, parsed.error);
    }
    return { processed: new Map(parsed.data.processed), failed: new Map(parsed.data.failed) };
  }

  saveProcessingLog(processingLog: ProcessingLog): void {
    this.writeAtomic(this.logPath, serializeDocument(processingLogDocument(processingLog)));
  }

  reportPath(videoId: string): string {
    return path.join(this.reportsDir, reportFileName(videoId));
  }

  writeVideoReport(videoId: string, text: string): string {
    const reportPath = this.reportPath(videoId);
    this.writeAtomic(reportPath, text);
    return reportPath;
  }

  readVideoReport(videoId: string): string | null {
    const reportPath = this.reportPath(videoId);
    if (!fs.existsSync(reportPath)) return null;
    try {
      return fs.readFileSync(reportPath, "utf-8");
    } catch (error) {
      throw new PersistenceError("Cannot read video report", reportPath, error);
    }
  }

  writeAtomic(filePath: string, content: string): void {
    this.writeAllAtomic([{ filePath, content }]);
  }

  /**
   * Replace several files as one unit. Everything is staged to temp files
   * first; when a rename fails, the files already replaced get their
   * previous content back and files that did not exist are removed.
   */
  writeAllAtomic(files: Array<{ filePath: string; content: string }>): void {
    const staged: StagedFile[] = [];
    let current = this.dir;
    try {
      for (const { filePath, content } of files) {
        current = filePath;
        const tempPath = `${filePath}.${process.pid}.tmp`;
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        staged.push({ filePath, tempPath, previous: readIfFile(filePath) });
        fs.writeFileSync(tempPath, content);
      }
    } catch (error) {
      this.discard(staged);
      log.error(`Write failed for ${current}`, error);
      throw new PersistenceError("Cannot write", current, error);
    }

    const replaced: StagedFile[] = [];
    for (const file of staged) {
      try {
        fs.renameSync(file.tempPath, file.filePath);
      } catch (error) {
        this.discard(staged);
        this.restore(replaced);
        log.error(`Write failed for ${file.filePath}`, error);
        throw new PersistenceError("Cannot write", file.filePath, error);
      }
      replaced.push(file);
    }
  }

  private discard(staged: StagedFile[]): void {
    for (const file of staged) {
      fs.rmSync(file.tempPath, { force: true });
    }
  }

  private restore(replaced: StagedFile[]): void {
    for (const file of [...replaced].reverse()) {
      try {
        if (file.previous === null) {
          fs.rmSync(file.filePath, { force: true });
        } else {
          fs.writeFileSync(file.tempPath, file.previous);
          fs.renameSync(file.tempPath, file.filePath);
        }
      } catch (error) {
        log.error(`Could not restore ${file.filePath}`, error);
      }
    }
  }

  private readJson(filePath: string, message: string): unknown {
    if (!fs.existsSync(filePath)) return undefined;
    try {
      const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
      return data;
    } catch (error) {
      log.error(`${message}: ${filePath}`, error);
      throw new PersistenceError(message, filePath, error);
    }
  }
}
