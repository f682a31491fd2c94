/**
 * Draft Agent: turns authoring parameters into a structured dialogue draft.
 *
 * The model is asked for a JSON object (text, key_points, intentions). The first
 * balanced {...} span of the reply is parsed against DraftPayloadSchema; when that
 * fails the whole reply becomes the draft text with empty lists. A malformed reply
 * degrades the draft, it never fails the pipeline.
 */
import {
  asGatewayFailure,
  type GatewayFailure,
  type CompletionGateway,
  type CompletionResult,
  type ToolSpec,
} from '../ai/gateway.js';
import { extractFirstJsonObject, tryParseJson } from '../utils/json.js';
import { logger } from '../utils/logger.js';
import { DialogueAgent } from './agent.js';
import {
  DraftParametersSchema,
  DraftPayloadSchema,
  type DialogueDraft,
  type DraftParameters,
  type DraftParametersInput,
} from './types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type DraftOutcome =
  | { kind: 'parsed'; draft: DialogueDraft }
  | { kind: 'raw_fallback'; draft: DialogueDraft; reason: string }
  | { kind: 'failed'; error: GatewayFailure };

export interface DraftAgentOptions {
  /** 'tool' asks the model to answer through a function call instead of inline JSON */
  structuredOutput?: 'text' | 'tool';
}

// ── Prompts ───────────────────────────────────────────────────────────────────

export const DRAFT_TOOL: ToolSpec = {
  name: 'submit_dialogue_draft',
  description: 'Submit the generated dialogue together with its key plot points and the speakers\' intentions.',
  parameters: {
    type: 'object',
    properties: {
      text:       { type: 'string', description: 'The full dialogue, one utterance per line, each prefixed with its speaker' },
      key_points: { type: 'array', items: { type: 'string' }, description: 'Plot beats the dialogue must hit, in order' },
      intentions: { type: 'array', items: { type: 'string' }, description: 'Implicit goals of each speaker' },
    },
    required: ['text', 'key_points', 'intentions'],
  },
};

export function buildDraftPrompt(params: DraftParameters, structuredOutput: 'text' | 'tool' = 'text'): string {
  const firstSpeaker = params.mode === 'ai_first' ? 'the AI character' : 'the user character';
  const answerFormat = structuredOutput === 'tool'
    ? `Submit the result by calling the ${DRAFT_TOOL.name} tool.`
    : `Return ONLY the JSON object — no markdown, no explanation, no code fences.`;

  return [
    'You are a professional dialogue writer. Write a natural, flowing dialogue that meets these requirements:',
    '',
    `Context: ${params.context}`,
    `First speaker: ${firstSpeaker}`,
    `Goal: ${params.goal}`,
    `Language: ${params.language}`,
    `Difficulty (CEFR): ${params.difficulty}`,
    `Turns: ${params.turns} (one turn = the user and the AI each speak once)`,
    '',
    'Alongside the dialogue, summarise its key plot points and the implicit intentions of each speaker.',
    'Respond with a single JSON object with exactly these fields:',
    '{',
    '  "text": "the full dialogue, one utterance per line, each prefixed with User: or AI:",',
    '  "key_points": ["plot point 1", "plot point 2"],',
    '  "intentions": ["intention 1", "intention 2"]',
    '}',
    '',
    `Write the dialogue in ${params.language}.`,
    answerFormat,
  ].join('\n');
}

// ── Parsing ───────────────────────────────────────────────────────────────────

/** Strict attempt against DraftPayloadSchema, raw fallback otherwise. Never throws. */
export function parseDraftResponse(result: CompletionResult): Exclude<DraftOutcome, { kind: 'failed' }> {
  if (result.kind === 'tool_call') {
    const raw = JSON.stringify(result.toolArguments);
    if (result.toolName !== DRAFT_TOOL.name) return fallback(raw, `unexpected tool call ${result.toolName}`);
    return validate(result.toolArguments, raw);
  }

  const span = extractFirstJsonObject(result.text);
  if (span === null) return fallback(result.text, 'no JSON object in response');

  const json = tryParseJson(span);
  if (json === undefined) return fallback(result.text, 'embedded object is not valid JSON');

  return validate(json, result.text);
}

function validate(candidate: unknown, raw: string): Exclude<DraftOutcome, { kind: 'failed' }> {
  const parsed = DraftPayloadSchema.safeParse(candidate);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(i => i.path.join('.') || '(root)').join(', ');
    return fallback(raw, `schema mismatch: ${fields}`);
  }
  return { kind: 'parsed', draft: parsed.data };
}

function fallback(raw: string, reason: string): { kind: 'raw_fallback'; draft: DialogueDraft; reason: string } {
  return { kind: 'raw_fallback', draft: { text: raw, key_points: [], intentions: [] }, reason };
}

// ── Agent ─────────────────────────────────────────────────────────────────────

export class DraftAgent extends DialogueAgent {
  readonly type = 'draft';
  readonly description = 'Generates a structured dialogue draft from authoring parameters';

  private readonly structuredOutput: 'text' | 'tool';

  constructor(gateway: CompletionGateway, opts: DraftAgentOptions = {}) {
    super(gateway);
    this.structuredOutput = opts.structuredOutput ?? 'text';
  }

  /**
   * Throws only on invalid parameters (ZodError). Gateway failures come back
   * as `{ kind: 'failed' }`; unparseable replies as `{ kind: 'raw_fallback' }`.
   */
  async generate(input: DraftParametersInput): Promise<DraftOutcome> {
    const params = DraftParametersSchema.parse(input);
    logger.info('DraftAgent: generating draft', {
      context: params.context, mode: params.mode, language: params.language, turns: params.turns,
    });

    let result: CompletionResult;
    try {
      result = await this.gateway.complete({
        prompt: buildDraftPrompt(params, this.structuredOutput),
        ...(this.structuredOutput === 'tool' ? { tools: [DRAFT_TOOL] } : {}),
      });
    } catch (err) {
      const error = asGatewayFailure(err);
      logger.warn('DraftAgent: no draft this step', { reason: error.reason, message: error.message });
      return { kind: 'failed', error };
    }

    const outcome = parseDraftResponse(result);
    if (outcome.kind === 'raw_fallback') {
      logger.warn('DraftAgent: structured parse failed — using raw text', { reason: outcome.reason });
    } else {
      logger.info('DraftAgent: draft parsed', {
        keyPoints: outcome.draft.key_points.length,
        intentions: outcome.draft.intentions.length,
      });
    }
    return outcome;
  }
}
