import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { CONFIG_PATH, DEFAULT_ONTOLOGY_DIR, resolvePath } from "./paths.js";
import { createLogger, LOG_LEVELS, type LogLevel } from "./logger.js";

const log = createLogger("config");

/**
 * Raw contents of data/config.json. Only the fields in `SettingsSchema` are
 * read by the server, and only through `resolveSettings`.
 */
export type Config = Record<string, unknown>;

export interface OntologySettings {
  similarityThreshold: number;
  ambiguityMargin: number;
  durationTolerance: number;
  recipeLimitPerFunction: number;
  hintLimit: number;
  geminiModel: string;
  vertexLocation: string;
  serviceAccountPath: string | null;
  ontologyDir: string;
  logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: OntologySettings = {
  similarityThreshold: 0.82,
  ambiguityMargin: 0.03,
  durationTolerance: 0.5,
  recipeLimitPerFunction: 50,
  hintLimit: 10,
  geminiModel: "gemini-2.5-pro",
  vertexLocation: "us-central1",
  serviceAccountPath: null,
  ontologyDir: DEFAULT_ONTOLOGY_DIR,
  logLevel: "info",
};

const SettingsSchema = z.object({
  similarityThreshold: z.number().gt(0).lte(1).optional(),
  ambiguityMargin: z.number().min(0).max(0.5).optional(),
  durationTolerance: z.number().min(0).optional(),
  recipeLimitPerFunction: z.number().int().min(1).optional(),
  hintLimit: z.number().int().min(1).optional(),
  geminiModel: z.string().min(1).optional(),
  vertexLocation: z.string().min(1).optional(),
  serviceAccountPath: z.string().min(1).optional(),
  ontologyDir: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

/**
 * Load configuration from data/config.json
 */
export function loadConfig(configPath: string = CONFIG_PATH): Config {
  try {
    if (fs.existsSync(configPath)) {
      const data: unknown = JSON.parse(fs.readFileSync(configPath, "utf-8"));
      if (isRecord(data)) return data;
      log.error(`Ignoring ${configPath}: expected a JSON object`);
    }
  } catch (error) {
    log.error("Error loading config:", error);
  }
  return {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Save configuration to data/config.json
 */
export function saveConfig(config: Config, configPath: string = CONFIG_PATH): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2));
}

/**
 * Update specific config fields (merge with existing). The merged result must
 * still resolve to valid settings, otherwise nothing is written.
 */
export function updateConfig(updates: Config, configPath: string = CONFIG_PATH): Config {
  const current = loadConfig(configPath);
  const updated = { ...current, ...updates };
  resolveSettings(updated);
  saveConfig(updated, configPath);
  return updated;
}

/**
 * Validate the ontology fields of a config and fill in defaults
 */
export function resolveSettings(config: Config): OntologySettings {
  const parsed = SettingsSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    similarityThreshold: values.similarityThreshold ?? DEFAULT_SETTINGS.similarityThreshold,
    ambiguityMargin: values.ambiguityMargin ?? DEFAULT_SETTINGS.ambiguityMargin,
    durationTolerance: values.durationTolerance ?? DEFAULT_SETTINGS.durationTolerance,
    recipeLimitPerFunction: values.recipeLimitPerFunction ?? DEFAULT_SETTINGS.recipeLimitPerFunction,
    hintLimit: values.hintLimit ?? DEFAULT_SETTINGS.hintLimit,
    geminiModel: values.geminiModel ?? DEFAULT_SETTINGS.geminiModel,
    vertexLocation: values.vertexLocation ?? DEFAULT_SETTINGS.vertexLocation,
    serviceAccountPath: values.serviceAccountPath ? resolvePath(values.serviceAccountPath) : null,
    ontologyDir: values.ontologyDir ? resolvePath(values.ontologyDir) : DEFAULT_SETTINGS.ontologyDir,
    logLevel: values.logLevel ?? DEFAULT_SETTINGS.logLevel,
  };
}

const SECRET_FIELDS = ["serviceAccountPath"];

/**
 * Copy of the config with secrets shortened for display
 */
export function redactConfig(config: Config): Config {
  const safeConfig: Config = { ...config };
  for (const field of SECRET_FIELDS) {
    const value = safeConfig[field];
    if (typeof value === "string" && value) {
      safeConfig[field] = value.length > 12 ? value.slice(0, 8) + "..." + value.slice(-4) : "***";
    }
  }
  return safeConfig;
}
