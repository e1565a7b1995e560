import fs from "fs";
import { fileURLToPath } from "url";
import path from "path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Walk up to the directory holding package.json (works from src/ and dist/ alike)
function findProjectRoot(start: string): string {
  let dir = start;
  while (!fs.existsSync(path.join(dir, "package.json"))) {
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(__dirname, "../../../../");
    dir = parent;
  }
  return dir;
}

export const PROJECT_ROOT = process.env.CLIP_ONTOLOGY_ROOT
  ? path.resolve(process.env.CLIP_ONTOLOGY_ROOT)
  : findProjectRoot(__dirname);

// Data directories
export const DATA_DIR = path.join(PROJECT_ROOT, "data");
export const CONFIG_PATH = path.join(DATA_DIR, "config.json");
export const DEFAULT_ONTOLOGY_DIR = path.join(DATA_DIR, "ontology");

// Documents inside an ontology directory
export const MASTER_ONTOLOGY_FILE = "master-ontology.json";
export const RECIPE_INDEX_FILE = "recipe-index.json";
export const PROCESSING_LOG_FILE = "processing-log.json";
export const REPORTS_DIR_NAME = "reports";

export const VIDEO_EXTENSIONS = [".mp4", ".mov", ".webm", ".avi", ".mkv"];

// Ensure a path is absolute (relative to project root if not)
export function resolvePath(filepath: string): string {
  if (path.isAbsolute(filepath)) {
    return filepath;
  }
  return path.join(PROJECT_ROOT, filepath);
}
