/**
 * Markdown renderings of persisted artifacts.
 * Section order is fixed: header, body, then Key Points / Dialogue Intentions when non-empty.
 */
import { ARTIFACT_LAYOUT } from '../config.js';
import type { ArtifactMetadata, DialogueDraft, StyledDialogue } from '../pipeline/types.js';

export type Renderer<T> = (content: T, metadata: ArtifactMetadata) => string;

export function renderDraft(draft: DialogueDraft, metadata: ArtifactMetadata): string {
  return [
    ...header('Dialogue Draft', metadata),
    '## Dialogue',
    '',
    ...fenced(draft.text),
    ...bullets('## Key Points', draft.key_points),
    ...bullets('## Dialogue Intentions', draft.intentions),
  ].join('\n');
}

export function renderStyled(styled: StyledDialogue, metadata: ArtifactMetadata): string {
  return [
    ...header('Styled Dialogue', metadata),
    '## Personas',
    '',
    `**User traits**: ${styled.user_traits}`,
    '',
    `**AI traits**: ${styled.ai_traits}`,
    '',
    '## Styled Dialogue',
    '',
    ...fenced(styled.text),
    '## Source Draft',
    '',
    ...fenced(styled.origin.text),
    ...bullets('### Key Points', styled.origin.key_points),
    ...bullets('### Dialogue Intentions', styled.origin.intentions),
  ].join('\n');
}

// ── Sections ──────────────────────────────────────────────────────────────────

function header(kind: string, metadata: ArtifactMetadata): string[] {
  return [
    `# ${kind}: ${titleFragment(metadata.context)}`,
    '',
    `**Created**: ${metadata.creation_time}`,
    '',
    `**Context**: ${metadata.context}`,
    '',
    `**Goal**: ${metadata.goal}`,
    '',
  ];
}

function fenced(body: string): string[] {
  // Fence must outrun any backtick run inside the body
  const longestRun = Math.max(0, ...Array.from(body.matchAll(/`+/g), m => m[0].length));
  const fence = '`'.repeat(Math.max(3, longestRun + 1));
  return [fence, body, fence, ''];
}

function bullets(heading: string, items: string[]): string[] {
  if (items.length === 0) return [];
  return [heading, '', ...items.map(item => `- ${item}`), ''];
}

export function titleFragment(context: string): string {
  const max = ARTIFACT_LAYOUT.titleFragment;
  const chars = Array.from(context);
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : context;
}
