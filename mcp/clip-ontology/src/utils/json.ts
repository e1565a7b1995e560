/**
 * Parse a JSON object out of model output.
 *
 * Accepts bare JSON, JSON wrapped in a markdown fence, or JSON embedded in
 * surrounding prose (the first balanced top-level object wins).
 */
export function parseModelJson(text: string): unknown {
  let cleaned = text.trim();
  if (cleaned.startsWith("```json")) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith("```")) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -3);
  }

  try {
    return JSON.parse(cleaned.trim());
  } catch {
    // fall through to the object scan
  }

  const block = firstJsonObject(text);
  if (block === null) {
    throw new Error("No JSON object found in model response");
  }
  try {
    return JSON.parse(block);
  } catch (error) {
    throw new Error(`Could not parse JSON from model response: ${error instanceof Error ? error.message : error}`);
  }
}

/** First balanced `{...}` span, skipping braces inside string literals. */
export function firstJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}
