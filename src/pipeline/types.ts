/**
 * Dialogue domain types and their zod schemas.
 * Field names are snake_case because records are persisted verbatim as JSON.
 */
import { z } from 'zod';
import {
  DIALOGUE_MODES,
  DIFFICULTY_LEVELS,
  PARAMETER_DEFAULTS,
  TARGET_LANGUAGES,
  TURN_LIMITS,
} from '../config.js';

// ── Authoring parameters ──────────────────────────────────────────────────────

const nonBlank = (field: string) =>
  z.string().trim().min(1, { message: `${field} must not be empty` });

export const DraftParametersSchema = z.object({
  context:    nonBlank('context'),
  goal:       nonBlank('goal'),
  mode:       z.enum(DIALOGUE_MODES).default(PARAMETER_DEFAULTS.mode),
  language:   z.enum(TARGET_LANGUAGES).default(PARAMETER_DEFAULTS.language),
  difficulty: z.enum(DIFFICULTY_LEVELS).default(PARAMETER_DEFAULTS.difficulty),
  turns:      z.number().int().min(TURN_LIMITS.min).max(TURN_LIMITS.max).default(PARAMETER_DEFAULTS.turns),
});

/** Parameters after defaults are applied */
export type DraftParameters = z.infer<typeof DraftParametersSchema>;

/** What a caller may pass in; omitted fields take their defaults */
export type DraftParametersInput = z.input<typeof DraftParametersSchema>;

export interface Personas {
  user_traits: string;
  ai_traits: string;
}

// ── Metadata ──────────────────────────────────────────────────────────────────

export const ArtifactMetadataSchema = z.object({
  creation_time: z.string().min(1),
  context:       z.string(),
  goal:          z.string(),
});

export type ArtifactMetadata = z.infer<typeof ArtifactMetadataSchema>;

// ── Draft ─────────────────────────────────────────────────────────────────────

export interface DialogueDraft {
  text: string;
  key_points: string[];
  intentions: string[];
}

/** A draft as it exists on disk, metadata attached */
export interface PersistedDraft extends DialogueDraft {
  metadata: ArtifactMetadata;
}

export const PersistedDraftSchema = z.object({
  text:       z.string(),
  key_points: z.array(z.string()),
  intentions: z.array(z.string()),
  metadata:   ArtifactMetadataSchema,
});

/**
 * Shape the draft agent asks the model for. `original_text` is accepted as an
 * alias of `text` since earlier prompts used that name.
 */
export const DraftPayloadSchema = z.preprocess(
  (raw) => {
    if (raw && typeof raw === 'object' && !Array.isArray(raw) && !('text' in raw) && 'original_text' in raw) {
      const { original_text, ...rest } = raw;
      return { ...rest, text: original_text };
    }
    return raw;
  },
  z.object({
    text:       z.string().refine(s => s.trim().length > 0, { message: 'text must not be empty' }),
    key_points: z.array(z.string()).default([]),
    intentions: z.array(z.string()).default([]),
  }),
);

// ── Styled dialogue ───────────────────────────────────────────────────────────

export interface StyledDialogue {
  text: string;
  user_traits: string;
  ai_traits: string;
  /** The source draft, embedded by value so the record is self-describing */
  origin: DialogueDraft & { metadata?: ArtifactMetadata };
}

export interface PersistedStyledDialogue extends StyledDialogue {
  metadata: ArtifactMetadata;
}

export const PersistedStyledDialogueSchema = z.object({
  text:        z.string(),
  user_traits: z.string(),
  ai_traits:   z.string(),
  origin: z.object({
    text:       z.string(),
    key_points: z.array(z.string()),
    intentions: z.array(z.string()),
    metadata:   ArtifactMetadataSchema.optional(),
  }),
  metadata: ArtifactMetadataSchema,
});
