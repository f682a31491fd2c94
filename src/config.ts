import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Model provider
  LLM_PROVIDER:         z.enum(['openai', 'anthropic', 'openrouter']).default('openai'),
  LLM_MODEL:            z.string().min(1).optional(),
  OPENAI_API_KEY:       z.string().min(1).optional(),
  ANTHROPIC_API_KEY:    z.string().min(1).optional(),
  OPENROUTER_API_KEY:   z.string().min(1).optional(),
  OPENROUTER_BASE_URL:  z.string().url().default('https://openrouter.ai/api/v1'),

  // Gateway limits
  LLM_TIMEOUT_MS:       z.coerce.number().int().positive().default(60_000),
  LLM_MAX_ATTEMPTS:     z.coerce.number().int().min(1).default(2),
  LLM_MAX_TOKENS:       z.coerce.number().int().positive().default(2_000),

  // Artifacts
  ARTIFACT_DIR:         z.string().default('./dialogue_artifacts'),

  // Session
  WORK_MODE:            z.enum(['collaborative', 'automatic']).default('collaborative'),

  // Logging
  LOG_LEVEL:  z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${missing}`);
}

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = parsed.data;

// ── Providers ─────────────────────────────────────────────────────────────────

export type LlmProvider = Env['LLM_PROVIDER'];

export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai:     'gpt-4o-mini',
  anthropic:  'claude-sonnet-4-6',
  openrouter: 'openai/gpt-4o-mini',
};

// ── Authoring parameters ──────────────────────────────────────────────────────

export const DIALOGUE_MODES = ['ai_first', 'user_first'] as const;

export type DialogueMode = typeof DIALOGUE_MODES[number];

export const TARGET_LANGUAGES = [
  'English',
  'Chinese',
  'Japanese',
  'Korean',
  'French',
  'German',
  'Spanish',
] as const;

export type TargetLanguage = typeof TARGET_LANGUAGES[number];

// CEFR levels, A1 (beginner) to C2 (proficient)
export const DIFFICULTY_LEVELS = ['A1', 'A2', 'B1', 'B2', 'C1', 'C2'] as const;

export type DifficultyLevel = typeof DIFFICULTY_LEVELS[number];

export const TURN_LIMITS = {
  min:     1,
  max:     20,
  default: 5,
} as const;

export const PARAMETER_DEFAULTS = {
  mode:       'ai_first',
  language:   'English',
  difficulty: 'B1',
  turns:      TURN_LIMITS.default,
} as const satisfies {
  mode: DialogueMode;
  language: TargetLanguage;
  difficulty: DifficultyLevel;
  turns: number;
};

// ── Work modes ────────────────────────────────────────────────────────────────

export type WorkMode = Env['WORK_MODE'];

// ── Artifacts ─────────────────────────────────────────────────────────────────

export const ARTIFACT_LAYOUT = {
  draftsDir:       'drafts',
  styledDir:       'styled',
  styledTag:       'final',
  contextFragment: 20,   // max chars of sanitized context in a base identifier
  titleFragment:   30,   // max chars of context in a rendered title
} as const;
