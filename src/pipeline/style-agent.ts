/**
 * Style Agent: rewrites a draft in the voices of two personas.
 *
 * Template choice: an explicit locale hint wins; otherwise the draft text is
 * checked for CJK unified ideographs (U+4E00–U+9FFF). This is a heuristic, not a
 * language detector: Japanese text with kanji also selects the Chinese template.
 * The output is free text and is not parsed.
 */
import { asGatewayFailure, GatewayFailure } from '../ai/gateway.js';
import type { TargetLanguage } from '../config.js';
import { logger } from '../utils/logger.js';
import { DialogueAgent } from './agent.js';
import type { DialogueDraft } from './types.js';

export type StyleLocale = 'en' | 'zh';

export type StyleOutcome =
  | { kind: 'styled'; text: string; locale: StyleLocale }
  | { kind: 'failed'; error: GatewayFailure };

const CJK_IDEOGRAPH = /[\u4e00-\u9fff]/;

export function detectLocale(text: string): StyleLocale {
  return CJK_IDEOGRAPH.test(text) ? 'zh' : 'en';
}

/** Only languages with a template of their own map to a hint. */
export function localeHintFor(language: TargetLanguage): StyleLocale | undefined {
  if (language === 'English') return 'en';
  if (language === 'Chinese') return 'zh';
  return undefined;
}

// ── Prompts ───────────────────────────────────────────────────────────────────

function bulletList(items: string[]): string {
  return items.map(item => `- ${item}`).join('\n');
}

const TEMPLATES: Record<StyleLocale, (draft: DialogueDraft, userTraits: string, aiTraits: string) => string> = {
  en: (draft, userTraits, aiTraits) => [
    'As a professional dialogue stylist, rewrite the original dialogue to reflect the character traits below',
    'while keeping the plot points and intentions of the original dialogue unchanged.',
    '',
    '## Original Dialogue',
    draft.text,
    '',
    '## Key Points',
    bulletList(draft.key_points),
    '',
    '## Dialogue Intentions',
    bulletList(draft.intentions),
    '',
    '## Character Traits',
    `User character traits: ${userTraits}`,
    `AI character traits: ${aiTraits}`,
    '',
    'Requirements:',
    '1. Preserve every key point and intention of the original dialogue.',
    '2. Change only tone, diction and phrasing to match the character traits.',
    '3. Keep the dialogue format with clear speaker labels.',
    '4. Keep the output in the same language as the original dialogue (English).',
    '5. Return only the rewritten dialogue, without explanations.',
  ].join('\n'),

  zh: (draft, userTraits, aiTraits) => [
    '作为一个专业的对话风格改编 AI，请根据下面的角色特质改编原始对话，同时保持原始对话的情节和意图不变。',
    '',
    '## 原始对话',
    draft.text,
    '',
    '## 关键节点',
    bulletList(draft.key_points),
    '',
    '## 对话意图',
    bulletList(draft.intentions),
    '',
    '## 角色特质',
    `用户角色特质: ${userTraits}`,
    `AI 角色特质: ${aiTraits}`,
    '',
    '要求：',
    '1. 保留原始对话的全部关键节点和意图。',
    '2. 只根据角色特质调整语气、用词和表达方式。',
    '3. 保持对话格式，清楚区分说话人。',
    '4. 输出语言与原始对话相同（中文）。',
    '5. 只返回改编后的对话文本，不要额外解释。',
  ].join('\n'),
};

export function buildStylePrompt(
  draft: DialogueDraft,
  userTraits: string,
  aiTraits: string,
  locale: StyleLocale,
): string {
  return TEMPLATES[locale](draft, userTraits, aiTraits);
}

// ── Agent ─────────────────────────────────────────────────────────────────────

export class StyleAgent extends DialogueAgent {
  readonly type = 'style';
  readonly description = 'Rewrites a dialogue draft to reflect user and AI personas';

  async adapt(
    draft: DialogueDraft,
    userTraits: string,
    aiTraits: string,
    languageHint?: StyleLocale,
  ): Promise<StyleOutcome> {
    const locale = languageHint ?? detectLocale(draft.text);
    logger.info('StyleAgent: adapting draft', { locale, hinted: languageHint !== undefined });

    try {
      const result = await this.gateway.complete({ prompt: buildStylePrompt(draft, userTraits, aiTraits, locale) });
      if (result.kind === 'tool_call') {
        throw new GatewayFailure('malformed_tool_call', `Unexpected tool call ${result.toolName} from style prompt`, false);
      }
      logger.info('StyleAgent: styled dialogue ready', { chars: result.text.length });
      return { kind: 'styled', text: result.text, locale };
    } catch (err) {
      const error = asGatewayFailure(err);
      logger.warn('StyleAgent: no styled dialogue this step', { reason: error.reason, message: error.message });
      return { kind: 'failed', error };
    }
  }
}
