/**
 * Dialogue session: one authoring session, one controller.
 *
 *   idle → drafting → drafted ⇄ editing_draft
 *                        ↓
 *                     styling → styled ⇄ editing_final
 *
 * Entry points run one at a time; a call made while another is in flight is
 * refused. Nothing here throws on pipeline failures: gateway, parse and
 * persistence problems come back as notices and the session stays usable.
 */
import type { WorkMode } from '../config.js';
import { logger } from '../utils/logger.js';
import type { ArtifactPaths, ArtifactStores, MetadataSeed } from '../storage/artifact-store.js';
import type { DraftAgent } from './draft-agent.js';
import { localeHintFor, type StyleAgent } from './style-agent.js';
import {
  DraftParametersSchema,
  type ArtifactMetadata,
  type DialogueDraft,
  type DraftParameters,
  type DraftParametersInput,
  type Personas,
  type StyledDialogue,
} from './types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type SessionState =
  | 'idle'
  | 'drafting'
  | 'drafted'
  | 'editing_draft'
  | 'styling'
  | 'styled'
  | 'editing_final';

export type NoticeCode =
  | 'invalid_parameters'
  | 'invalid_state'
  | 'busy'
  | 'gateway_failure'
  | 'parse_degraded'
  | 'persistence_failure'
  | 'personas_missing'
  | 'degraded_draft_held'
  | 'no_changes'
  | 'persisted'
  | 'step_failed';

export interface Notice {
  level: 'info' | 'warning' | 'error';
  code: NoticeCode;
  message: string;
}

export interface StepReport {
  state: SessionState;
  draft: (DialogueDraft & { metadata?: ArtifactMetadata }) | null;
  /** Whether the current draft came from a structured parse or the raw fallback */
  draftStatus: 'parsed' | 'raw_fallback' | null;
  styled: (StyledDialogue & { metadata?: ArtifactMetadata }) | null;
  draftPaths: ArtifactPaths | null;
  styledPaths: ArtifactPaths | null;
  notices: Notice[];
}

/** Fields a human may revise; omitted fields keep their current value */
export type DraftRevision = Partial<DialogueDraft>;

export interface SessionDeps {
  draftAgent: Pick<DraftAgent, 'generate'>;
  styleAgent: Pick<StyleAgent, 'adapt'>;
  stores: ArtifactStores;
  mode: WorkMode;
}

// ── Session ───────────────────────────────────────────────────────────────────

export class DialogueSession {
  readonly mode: WorkMode;

  private state: SessionState = 'idle';
  private busy = false;
  private notices: Notice[] = [];

  private parameters: DraftParameters | null = null;
  private draft: DialogueDraft | null = null;
  private draftParsed = false;
  private draftMetadata: ArtifactMetadata | null = null;
  private draftPaths: ArtifactPaths | null = null;
  private persistedDraft: DialogueDraft | null = null;

  private styled: StyledDialogue | null = null;
  private styledMetadata: ArtifactMetadata | null = null;
  private styledPaths: ArtifactPaths | null = null;
  private persistedStyledText: string | null = null;

  constructor(private readonly deps: SessionDeps) {
    this.mode = deps.mode;
  }

  get currentState(): SessionState {
    return this.state;
  }

  snapshot(): StepReport {
    return this.report([]);
  }

  /**
   * Idle/Drafted/Styled → Drafting → Drafted. Starts a fresh draft (and fresh
   * artifacts) every time. In automatic mode continues straight to styling when
   * both personas are filled in and the draft parsed.
   */
  async submitParameters(input: DraftParametersInput, personas?: Personas): Promise<StepReport> {
    return this.step(['idle', 'drafted', 'styled'], 'submitParameters', async () => {
      const parsed = DraftParametersSchema.safeParse(input);
      if (!parsed.success) {
        const fields = parsed.error.issues.map(i => i.path.join('.')).join(', ');
        this.notify('error', 'invalid_parameters', `Invalid authoring parameters: ${fields}`);
        return;
      }
      const params = parsed.data;

      const previous = this.state;
      this.state = 'drafting';
      const outcome = await this.deps.draftAgent.generate(params);
      if (outcome.kind === 'failed') {
        this.state = previous;
        this.notify('error', 'gateway_failure', `Draft generation failed (${outcome.error.reason}): ${outcome.error.message}`);
        return;
      }

      this.resetArtifacts();
      this.parameters = params;
      this.draft = normalizeDraft(outcome.draft);
      this.draftParsed = outcome.kind === 'parsed';
      this.state = 'drafted';
      if (outcome.kind === 'raw_fallback') {
        this.notify('warning', 'parse_degraded', `Draft kept as raw text: ${outcome.reason}`);
      }
      await this.persistDraft();

      if (this.mode !== 'automatic') return;
      if (!personas || !personasComplete(personas)) {
        this.notify('warning', 'personas_missing', 'Automatic mode needs both user and AI traits to style the draft');
        return;
      }
      if (!this.draftParsed) {
        this.notify('warning', 'degraded_draft_held', 'Draft did not parse; review it before styling');
        return;
      }
      await this.runStyling(personas);
    });
  }

  /** Drafted → EditingDraft → Drafted. Persists only when a field actually changed. */
  async confirmDraftEdit(revision: DraftRevision): Promise<StepReport> {
    return this.step(['drafted'], 'confirmDraftEdit', async () => {
      const current = this.requireDraft();
      this.state = 'editing_draft';
      const next: DialogueDraft = {
        text:       revision.text ?? current.text,
        key_points: revision.key_points ? cleanLines(revision.key_points) : current.key_points,
        intentions: revision.intentions ? cleanLines(revision.intentions) : current.intentions,
      };
      this.draft = next;

      if (this.persistedDraft && draftsEqual(this.persistedDraft, next)) {
        this.notify('info', 'no_changes', 'Draft unchanged; nothing to save');
      } else {
        await this.persistDraft();
      }
      this.state = 'drafted';
    });
  }

  /** Drafted/Styled → Styling → Styled. Each run produces a new styled artifact. */
  async submitPersonas(personas: Personas): Promise<StepReport> {
    return this.step(['drafted', 'styled'], 'submitPersonas', async () => {
      if (!personasComplete(personas)) {
        this.notify('warning', 'personas_missing', 'Both user and AI traits are required to style the draft');
        return;
      }
      await this.runStyling(personas);
    });
  }

  /** Styled → EditingFinal → Styled, with the same dirty check as draft edits. */
  async confirmFinalEdit(text: string): Promise<StepReport> {
    return this.step(['styled'], 'confirmFinalEdit', async () => {
      const current = this.requireStyled();
      this.state = 'editing_final';
      this.styled = { ...current, text };

      if (this.persistedStyledText !== null && this.persistedStyledText === text) {
        this.notify('info', 'no_changes', 'Styled dialogue unchanged; nothing to save');
      } else {
        await this.persistStyled();
      }
      this.state = 'styled';
    });
  }

  // ── Transitions ─────────────────────────────────────────────────────────────

  private async step(
    allowed: SessionState[],
    name: string,
    body: () => Promise<void>,
  ): Promise<StepReport> {
    if (this.busy) {
      return this.report([{ level: 'error', code: 'busy', message: `${name}: another step is still running` }]);
    }
    if (!allowed.includes(this.state)) {
      return this.report([{
        level: 'error',
        code: 'invalid_state',
        message: `${name} is not allowed in state ${this.state}`,
      }]);
    }

    this.busy = true;
    this.notices = [];
    logger.info(`Session: ${name}`, { state: this.state, mode: this.mode });
    try {
      await body();
    } catch (err) {
      // A collaborator threw mid-step; fall back to the state the held data supports
      this.state = this.settledState();
      this.notify('error', 'step_failed', `${name} failed: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      this.busy = false;
    }
    return this.report(this.notices);
  }

  private settledState(): SessionState {
    if (this.styled) return 'styled';
    return this.draft ? 'drafted' : 'idle';
  }

  private async runStyling(personas: Personas): Promise<void> {
    const draft = this.requireDraft();
    const params = this.requireParameters();
    const previous = this.state;
    this.state = 'styling';

    const outcome = await this.deps.styleAgent.adapt(
      draft, personas.user_traits, personas.ai_traits, localeHintFor(params.language),
    );
    if (outcome.kind === 'failed') {
      this.state = previous;
      this.notify('error', 'gateway_failure', `Styling failed (${outcome.error.reason}): ${outcome.error.message}`);
      return;
    }

    this.styled = {
      text: outcome.text,
      user_traits: personas.user_traits,
      ai_traits: personas.ai_traits,
      origin: { ...structuredClone(draft), ...(this.draftMetadata ? { metadata: this.draftMetadata } : {}) },
    };
    this.styledMetadata = null;
    this.styledPaths = null;
    this.persistedStyledText = null;
    this.state = 'styled';
    await this.persistStyled();
  }

  // ── Persistence ─────────────────────────────────────────────────────────────

  private async persistDraft(): Promise<void> {
    const draft = this.requireDraft();
    const params = this.requireParameters();
    const seed: MetadataSeed = { context: params.context, goal: params.goal };

    const result = await this.deps.stores.drafts.upsert(this.draftPaths?.structuredPath, draft, seed);
    if (result.status === 'failed') {
      this.notify('warning', 'persistence_failure', `Draft not saved: ${result.error.message}`);
      return;
    }
    this.draftPaths = result.paths;
    this.draftMetadata = result.metadata;
    this.persistedDraft = structuredClone(draft);
    this.notify('info', 'persisted', `Draft ${result.status}: ${result.paths.structuredPath}`);
  }

  private async persistStyled(): Promise<void> {
    const styled = this.requireStyled();
    const params = this.requireParameters();
    // Styled artifacts inherit the origin draft's metadata unchanged
    const seed: MetadataSeed = this.draftMetadata ?? { context: params.context, goal: params.goal };

    const result = await this.deps.stores.styled.upsert(this.styledPaths?.structuredPath, styled, seed);
    if (result.status === 'failed') {
      this.notify('warning', 'persistence_failure', `Styled dialogue not saved: ${result.error.message}`);
      return;
    }
    this.styledPaths = result.paths;
    this.styledMetadata = result.metadata;
    this.persistedStyledText = styled.text;
    this.notify('info', 'persisted', `Styled dialogue ${result.status}: ${result.paths.structuredPath}`);
  }

  // ── Helpers ─────────────────────────────────────────────────────────────────

  private resetArtifacts(): void {
    this.draftMetadata = null;
    this.draftPaths = null;
    this.persistedDraft = null;
    this.styled = null;
    this.styledMetadata = null;
    this.styledPaths = null;
    this.persistedStyledText = null;
  }

  private notify(level: Notice['level'], code: NoticeCode, message: string): void {
    this.notices.push({ level, code, message });
    const meta = { code, state: this.state };
    if (level === 'error') logger.error(`Session: ${message}`, meta);
    else if (level === 'warning') logger.warn(`Session: ${message}`, meta);
    else logger.info(`Session: ${message}`, meta);
  }

  private report(notices: Notice[]): StepReport {
    return {
      state: this.state,
      draft: this.draft
        ? structuredClone({ ...this.draft, ...(this.draftMetadata ? { metadata: this.draftMetadata } : {}) })
        : null,
      draftStatus: this.draft ? (this.draftParsed ? 'parsed' : 'raw_fallback') : null,
      styled: this.styled
        ? structuredClone({ ...this.styled, ...(this.styledMetadata ? { metadata: this.styledMetadata } : {}) })
        : null,
      draftPaths: this.draftPaths ? { ...this.draftPaths } : null,
      styledPaths: this.styledPaths ? { ...this.styledPaths } : null,
      notices: [...notices],
    };
  }

  private requireDraft(): DialogueDraft {
    if (!this.draft) throw new Error(`No draft in state ${this.state}`);
    return this.draft;
  }

  private requireStyled(): StyledDialogue {
    if (!this.styled) throw new Error(`No styled dialogue in state ${this.state}`);
    return this.styled;
  }

  private requireParameters(): DraftParameters {
    if (!this.parameters) throw new Error(`No parameters in state ${this.state}`);
    return this.parameters;
  }
}

// ── Pure helpers ──────────────────────────────────────────────────────────────

export function personasComplete(personas: Personas): boolean {
  return personas.user_traits.trim().length > 0 && personas.ai_traits.trim().length > 0;
}

function cleanLines(items: string[]): string[] {
  return items.map(item => item.trim()).filter(item => item.length > 0);
}

function normalizeDraft(draft: DialogueDraft): DialogueDraft {
  return { text: draft.text, key_points: cleanLines(draft.key_points), intentions: cleanLines(draft.intentions) };
}

function sameList(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((item, i) => item === b[i]);
}

export function draftsEqual(a: DialogueDraft, b: DialogueDraft): boolean {
  return a.text === b.text && sameList(a.key_points, b.key_points) && sameList(a.intentions, b.intentions);
}
