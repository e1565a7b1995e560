/**
 * Ontology Service
 *
 * Owns the committed ontology and recipe index and is the only writer.
 * A merge runs under a mutex on working copies; the copies are persisted
 * and only then swapped in, so readers always see a complete snapshot and
 * a failed merge leaves nothing behind.
 */

import fs from "fs";
import path from "path";
import { DuplicateVideoError, NotFoundError, errorMessage } from "../errors.js";
import type { OntologySettings } from "../utils/config.js";
import { createLogger } from "../utils/logger.js";
import { Mutex } from "../utils/mutex.js";
import { VIDEO_EXTENSIONS } from "../utils/paths.js";
import { mergeVideo, type MergeSummary, type VideoRecord } from "./merger.js";
import { MasterOntology, type OntologyStats } from "./ontology.js";
import { RecipeIndex, DEFAULT_RECIPE_LIMIT, type ClipType, type RecipeEntry } from "./recipe-index.js";
import { renderKnownValues, renderMasterReport, renderPlaybook, renderVideoReport } from "./reporter.js";
import { DEFAULT_SCHEMA, type OntologySchema } from "./schema.js";
import { OntologyRepository } from "./storage.js";
import { validateBatch, type RawVideoAnnotations } from "./validation.js";
import { DEFAULT_SIMILARITY_POLICY, type KnownValue, type SimilarityPolicy } from "./value-store.js";

const log = createLogger("ontology-service");

// ============================================================================
// Annotation source (the AI collaborator)
// ============================================================================

export interface AnnotationRequest {
  videoId: string;
  videoPath: string;
  schema: OntologySchema;
  /** Known values per category, most frequent first */
  vocabulary: Record<string, string[]>;
}

/**
 * Produces raw clip annotations for a video. Timeouts and retries are the
 * implementation's business.
 */
export interface AnnotationSource {
  annotate(request: AnnotationRequest): Promise<RawVideoAnnotations>;
}

export interface VideoJob {
  videoId: string;
  videoPath: string;
}

export interface BatchOptions {
  force?: boolean;
  /** Request the next video's annotations while the current one merges (default true) */
  pipeline?: boolean;
}

export interface BatchResult {
  merged: MergeSummary[];
  skipped: string[];
  failed: Array<{ videoId: string; error: string }>;
}

/** File name without its extension */
export function videoIdFromPath(videoPath: string): string {
  return path.basename(videoPath, path.extname(videoPath));
}

/**
 * One job per video file directly inside `directory`, sorted by file name.
 */
export function videoJobsFromDirectory(directory: string, limit?: number): VideoJob[] {
  if (!fs.existsSync(directory)) {
    throw new NotFoundError(`Directory not found: ${directory}`);
  }
  const jobs = fs
    .readdirSync(directory)
    .filter((name) => VIDEO_EXTENSIONS.includes(path.extname(name).toLowerCase()))
    .sort()
    .map((name) => ({ videoId: videoIdFromPath(name), videoPath: path.join(directory, name) }));
  return limit === undefined ? jobs : jobs.slice(0, limit);
}

type AnnotationOutcome = { ok: true; raw: RawVideoAnnotations } | { ok: false; error: unknown };

// ============================================================================
// Service
// ============================================================================

export interface OntologyServiceOptions {
  dir: string;
  schema?: OntologySchema;
  policy?: SimilarityPolicy;
  durationTolerance?: number;
  recipeLimitPerFunction?: number;
  hintLimit?: number;
  clock?: () => Date;
}

interface CommittedState {
  ontology: MasterOntology;
  recipes: RecipeIndex;
}

export class OntologyService {
  readonly repository: OntologyRepository;
  readonly schema: OntologySchema;
  private readonly policy: SimilarityPolicy;
  private readonly durationTolerance: number;
  private readonly recipeLimit: number;
  private readonly hintLimit: number;
  private readonly clock: () => Date;

  private readonly mutex = new Mutex();
  private state: CommittedState | null = null;
  private readonly videos = new Map<string, VideoRecord>();

  constructor(options: OntologyServiceOptions) {
    this.repository = new OntologyRepository(options.dir);
    this.schema = options.schema ?? DEFAULT_SCHEMA;
    this.policy = options.policy ?? DEFAULT_SIMILARITY_POLICY;
    this.durationTolerance = options.durationTolerance ?? 0.5;
    this.recipeLimit = options.recipeLimitPerFunction ?? DEFAULT_RECIPE_LIMIT;
    this.hintLimit = options.hintLimit ?? 10;
    this.clock = options.clock ?? (() => new Date());
  }

  static fromSettings(settings: OntologySettings, schema: OntologySchema = DEFAULT_SCHEMA): OntologyService {
    return new OntologyService({
      dir: settings.ontologyDir,
      schema,
      policy: { threshold: settings.similarityThreshold, ambiguityMargin: settings.ambiguityMargin },
      durationTolerance: settings.durationTolerance,
      recipeLimitPerFunction: settings.recipeLimitPerFunction,
      hintLimit: settings.hintLimit,
    });
  }

  /**
   * The committed state, loaded from disk on first use. A missing state
   * directory yields an empty ontology.
   */
  snapshot(): CommittedState {
    if (!this.state) {
      this.state = this.load();
    }
    return this.state;
  }

  private load(): CommittedState {
    const ontology =
      this.repository.loadOntology(this.schema, this.policy) ??
      new MasterOntology(this.schema, this.policy, this.clock());
    const recipes = this.repository.loadRecipes(this.recipeLimit) ?? new RecipeIndex(this.recipeLimit);
    log.debug(`Loaded ontology: ${ontology.videoCount} videos, ${recipes.size} recipes`);
    return { ontology, recipes };
  }

  isProcessed(videoId: string): boolean {
    return this.repository.loadProcessingLog().processed.has(videoId);
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Validate and merge one video's annotations as a single transaction.
   * Refuses a video already in the processing log unless `force` is set.
   */
  mergeVideo(videoId: string, raw: RawVideoAnnotations, options: { force?: boolean } = {}): Promise<MergeSummary> {
    return this.mutex.runExclusive(() => {
      const processingLog = this.repository.loadProcessingLog();
      if (processingLog.processed.has(videoId) && !options.force) {
        throw new DuplicateVideoError(videoId);
      }

      const committed = this.snapshot();
      const validated = validateBatch(raw, this.schema, { durationTolerance: this.durationTolerance });

      const ontology = committed.ontology.clone();
      const recipes = committed.recipes.clone();
      const now = this.clock();
      const { summary, record } = mergeVideo(
        ontology,
        recipes,
        {
          videoId,
          transcript: raw.transcript,
          totalDuration: raw.totalDuration,
          clipsReceived: raw.clips.length,
          clips: validated.clips,
          failures: validated.failures,
        },
        now
      );

      processingLog.processed.set(videoId, { clips: summary.clipsMerged, merged_at: now.toISOString() });
      processingLog.failed.delete(videoId);

      this.repository.saveState(ontology, recipes, processingLog);
      this.state = { ontology, recipes };
      this.videos.set(videoId, record);

      try {
        this.repository.writeVideoReport(videoId, renderVideoReport(record, this.schema));
      } catch (error) {
        log.warn(`Merged ${videoId} but could not write its report: ${errorMessage(error)}`);
      }

      return summary;
    });
  }

  private recordFailure(videoId: string, error: unknown): Promise<void> {
    return this.mutex.runExclusive(() => {
      const processingLog = this.repository.loadProcessingLog();
      processingLog.failed.set(videoId, { error: errorMessage(error), failed_at: this.clock().toISOString() });
      this.repository.saveProcessingLog(processingLog);
    });
  }

  /**
   * Annotate and merge a list of videos. Merges run one at a time in job
   * order; with pipelining on, the annotation request for the next video
   * goes out before the current one is merged. A failing video is logged
   * and skipped.
   */
  async processVideos(jobs: VideoJob[], source: AnnotationSource, options: BatchOptions = {}): Promise<BatchResult> {
    const pipeline = options.pipeline ?? true;
    const result: BatchResult = { merged: [], skipped: [], failed: [] };

    const processed = this.repository.loadProcessingLog().processed;
    const queue = jobs.filter((job) => {
      if (options.force || !processed.has(job.videoId)) return true;
      result.skipped.push(job.videoId);
      return false;
    });
    if (result.skipped.length > 0) {
      log.info(`Skipping ${result.skipped.length} already merged video(s)`);
    }

    const annotate = (job: VideoJob): Promise<AnnotationOutcome> =>
      source
        .annotate({
          videoId: job.videoId,
          videoPath: job.videoPath,
          schema: this.schema,
          vocabulary: this.vocabularyHint(),
        })
        .then(
          (raw): AnnotationOutcome => ({ ok: true, raw }),
          (error: unknown): AnnotationOutcome => ({ ok: false, error })
        );

    let pending: Promise<AnnotationOutcome> | null = queue.length > 0 ? annotate(queue[0]) : null;

    for (let i = 0; i < queue.length; i++) {
      const job = queue[i];
      const outcome: AnnotationOutcome = pending ? await pending : await annotate(job);
      pending = pipeline && i + 1 < queue.length ? annotate(queue[i + 1]) : null;

      log.info(`[${i + 1}/${queue.length}] ${job.videoId}`);
      try {
        if (!outcome.ok) throw outcome.error;
        result.merged.push(await this.mergeVideo(job.videoId, outcome.raw, { force: options.force }));
      } catch (error) {
        log.error(`Failed to process ${job.videoId}: ${errorMessage(error)}`);
        result.failed.push({ videoId: job.videoId, error: errorMessage(error) });
        await this.recordFailure(job.videoId, error);
      }
    }

    log.info(
      `Batch done: ${result.merged.length} merged, ${result.skipped.length} skipped, ${result.failed.length} failed`
    );
    return result;
  }

  // ==========================================================================
  // Reads (committed snapshot)
  // ==========================================================================

  vocabularyHint(limit: number = this.hintLimit): Record<string, string[]> {
    return this.snapshot().ontology.vocabularyHint(limit);
  }

  knownValues(category: string, limit?: number): KnownValue[] {
    return this.snapshot().ontology.knownValues(category, limit);
  }

  stats(): OntologyStats {
    return this.snapshot().ontology.stats();
  }

  renderMasterReport(): string {
    const { ontology, recipes } = this.snapshot();
    return renderMasterReport(ontology, recipes);
  }

  renderKnownValues(): string {
    return renderKnownValues(this.snapshot().ontology);
  }

  renderPlaybook(): string {
    return renderPlaybook(this.snapshot().recipes);
  }

  /**
   * Report for a merged video: rendered from memory when it was merged by
   * this process, otherwise read from its saved report file.
   */
  renderVideoReport(videoId: string): string {
    const record = this.videos.get(videoId);
    if (record) return renderVideoReport(record, this.schema);

    const saved = this.repository.readVideoReport(videoId);
    if (saved !== null) return saved;
    throw new NotFoundError(`No report for video "${videoId}"`);
  }

  examplesFor(fn: string, limit?: number): RecipeEntry[] {
    return this.snapshot().recipes.examplesFor(fn, limit);
  }

  examplesForClipType(clipType: ClipType, limit?: number): RecipeEntry[] {
    return this.snapshot().recipes.examplesForClipType(clipType, limit);
  }

  searchRecipes(text: string, limit?: number): RecipeEntry[] {
    return this.snapshot().recipes.search(text, limit);
  }

  topTransitions(fn: string, k?: number): Array<{ next: string; count: number }> {
    return this.snapshot().recipes.topTransitions(fn, k);
  }
}
