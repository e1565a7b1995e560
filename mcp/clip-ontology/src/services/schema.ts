/**
 * Ontology schema: the fixed category list and the category pairs whose
 * co-occurrence is tracked. Categories never grow at runtime; only their
 * values do.
 */

import { SchemaError } from "../errors.js";

export const CATEGORY_GROUPS = ["visual", "audio", "emotional", "functional", "structure"] as const;
export type CategoryGroup = (typeof CATEGORY_GROUPS)[number];

export interface CategoryDef {
  name: string;
  group: CategoryGroup;
  label: string;
  description: string;
  required: boolean;
}

export interface CorrelationPair {
  a: string;
  b: string;
}

export interface OntologySchema {
  categories: readonly CategoryDef[];
  correlations: readonly CorrelationPair[];
  /** Category whose values drive duration stats, recipes, and transitions */
  functionCategory: string;
}

export function correlationKey(a: string, b: string): string {
  return `${a}:${b}`;
}

/**
 * Build a schema, rejecting duplicate categories, pairs that reference
 * undeclared categories or pair a category with itself, and pairs declared
 * twice in either orientation.
 */
export function defineSchema(input: OntologySchema): OntologySchema {
  const names = new Set<string>();
  for (const category of input.categories) {
    if (!/^[a-z][a-z0-9_]*$/.test(category.name)) {
      throw new SchemaError(`Invalid category name "${category.name}" (expected snake_case)`);
    }
    if (names.has(category.name)) {
      throw new SchemaError(`Duplicate category "${category.name}"`);
    }
    names.add(category.name);
  }

  if (!names.has(input.functionCategory)) {
    throw new SchemaError(`Function category "${input.functionCategory}" is not declared`);
  }

  const seenPairs = new Set<string>();
  for (const { a, b } of input.correlations) {
    if (!names.has(a) || !names.has(b)) {
      throw new SchemaError(`Correlation pair ${a}/${b} references an undeclared category`);
    }
    if (a === b) {
      throw new SchemaError(`Correlation pair pairs "${a}" with itself`);
    }
    if (seenPairs.has(correlationKey(a, b)) || seenPairs.has(correlationKey(b, a))) {
      throw new SchemaError(`Correlation pair ${a}/${b} is declared more than once`);
    }
    seenPairs.add(correlationKey(a, b));
  }

  return Object.freeze({
    categories: Object.freeze(input.categories.map((c) => Object.freeze({ ...c }))),
    correlations: Object.freeze(input.correlations.map((p) => Object.freeze({ ...p }))),
    functionCategory: input.functionCategory,
  });
}

export function findCategory(schema: OntologySchema, name: string): CategoryDef | undefined {
  return schema.categories.find((c) => c.name === name);
}

export function requiredCategories(schema: OntologySchema): CategoryDef[] {
  return schema.categories.filter((c) => c.required);
}

// Ad-clip taxonomy: visual, audio, emotional, functional, structure
export const DEFAULT_SCHEMA: OntologySchema = defineSchema({
  functionCategory: "clip_function",
  categories: [
    // VISUAL
    { name: "shot_type", group: "visual", label: "Shot Types", description: "How the camera frames the subject", required: true },
    { name: "camera_angle", group: "visual", label: "Camera Angles", description: "Camera height/position relative to subject", required: false },
    { name: "camera_movement", group: "visual", label: "Camera Movements", description: "How the camera moves during the clip", required: false },
    { name: "composition", group: "visual", label: "Compositions", description: "How elements are arranged in frame", required: false },
    { name: "setting_type", group: "visual", label: "Setting Types", description: "Types of environments/locations", required: false },
    { name: "lighting_style", group: "visual", label: "Lighting Styles", description: "Lighting approaches", required: false },
    { name: "color_mood", group: "visual", label: "Color Moods", description: "Overall color/mood palettes", required: false },
    { name: "subject_type", group: "visual", label: "Subject Types", description: "What the clip focuses on", required: true },
    { name: "subject_action", group: "visual", label: "Subject Actions", description: "What subjects do in clips", required: false },
    { name: "text_purpose", group: "visual", label: "Text Purposes", description: "Why text appears on screen", required: false },
    // AUDIO
    { name: "speaker_type", group: "audio", label: "Speaker Types", description: "Who is speaking", required: false },
    { name: "vocal_tone", group: "audio", label: "Vocal Tones", description: "Tone of voice delivery", required: false },
    { name: "vocal_pacing", group: "audio", label: "Vocal Pacings", description: "Speed of speech", required: false },
    { name: "music_style", group: "audio", label: "Music Styles", description: "Types of background music", required: false },
    // EMOTIONAL
    { name: "primary_emotion", group: "emotional", label: "Primary Emotions", description: "Main emotion evoked by the clip", required: true },
    { name: "secondary_emotion", group: "emotional", label: "Secondary Emotions", description: "Supporting emotion, if any", required: false },
    { name: "emotional_intensity", group: "emotional", label: "Emotional Intensities", description: "How strong the emotion is", required: false },
    { name: "emotional_direction", group: "emotional", label: "Emotional Directions", description: "Whether the emotion is positive, negative or shifting", required: false },
    // FUNCTIONAL
    { name: "clip_function", group: "functional", label: "Clip Functions", description: "Role of the clip in the ad structure", required: true },
    { name: "narrative_role", group: "functional", label: "Narrative Roles", description: "Role in the story arc", required: false },
    { name: "persuasion_mechanism", group: "functional", label: "Persuasion Mechanisms", description: "Psychological technique at work", required: false },
    { name: "persuasion_target", group: "functional", label: "Persuasion Targets", description: "What the clip tries to change in the viewer", required: false },
    // STRUCTURE
    { name: "transition_in", group: "structure", label: "Transitions In", description: "How the clip is entered", required: false },
    { name: "transition_out", group: "structure", label: "Transitions Out", description: "How the clip is left", required: false },
  ],
  correlations: [
    { a: "clip_function", b: "primary_emotion" },
    { a: "clip_function", b: "shot_type" },
    { a: "clip_function", b: "subject_type" },
    { a: "shot_type", b: "camera_movement" },
    { a: "primary_emotion", b: "persuasion_mechanism" },
  ],
});
