import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { GatewayFailure } from '../src/ai/gateway.js';
import type { WorkMode } from '../src/config.js';
import { DraftAgent } from '../src/pipeline/draft-agent.js';
import { DialogueSession, type StepReport } from '../src/pipeline/session.js';
import { StyleAgent } from '../src/pipeline/style-agent.js';
import { createArtifactStores } from '../src/storage/artifact-store.js';
import { ScriptedGateway, text } from './helpers/fake-gateway.js';

const CREATED = '2026-10-18T09:05:03.000Z';
const params = { context: 'cafe meeting', goal: 'exchange contacts' };
const personas = { user_traits: 'shy engineer', ai_traits: 'outgoing writer' };
const metadata = { creation_time: CREATED, ...params };

const JSON_DRAFT = '{"text": "AI: Hi!\\nUser: Hello.", "key_points": ["greet"], "intentions": ["open up"]}';

let root: string;

function makeSession(gateway: ScriptedGateway, mode: WorkMode = 'collaborative', rootDir = root) {
  let n = 0;
  const stores = createArtifactStores(rootDir, {
    now: () => new Date(CREATED),
    randomId: () => `id${String(++n).padStart(6, '0')}`,
  });
  const session = new DialogueSession({
    draftAgent: new DraftAgent(gateway),
    styleAgent: new StyleAgent(gateway),
    stores,
    mode,
  });
  return { session, stores };
}

const codes = (report: StepReport) => report.notices.map(notice => notice.code);

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'dialogue-session-'));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('collaborative session', () => {
  it('keeps a malformed draft, styles it, and embeds it in the styled record', async () => {
    const gateway = new ScriptedGateway(
      text('AI: Hi!\nUser: Hello.'),
      text('AI: Oh! Hi there, lovely day for coffee!\nUser: Um, hello.'),
    );
    const { session, stores } = makeSession(gateway);

    const drafted = await session.submitParameters(params);
    expect(drafted.state).toBe('drafted');
    expect(drafted.draftStatus).toBe('raw_fallback');
    expect(codes(drafted)).toEqual(['parse_degraded', 'persisted']);
    expect(drafted.draft).toEqual({ text: 'AI: Hi!\nUser: Hello.', key_points: [], intentions: [], metadata });
    expect(drafted.draftPaths?.structuredPath).toBe(join(root, 'drafts', '20261018_090503_cafe_meeting_id000001.json'));

    const styled = await session.submitPersonas(personas);
    expect(styled.state).toBe('styled');
    expect(codes(styled)).toEqual(['persisted']);
    expect(styled.styledPaths?.structuredPath)
      .toBe(join(root, 'styled', '20261018_090503_cafe_meeting_final_id000002.json'));

    const path = styled.styledPaths?.structuredPath ?? '';
    await expect(stores.styled.read(path)).resolves.toEqual({
      text: 'AI: Oh! Hi there, lovely day for coffee!\nUser: Um, hello.',
      user_traits: 'shy engineer',
      ai_traits: 'outgoing writer',
      origin: { text: 'AI: Hi!\nUser: Hello.', key_points: [], intentions: [], metadata },
      metadata,
    });
    expect(gateway.requests[1]?.prompt).toContain('User character traits: shy engineer');
  });

  it('persists a draft edit only when something changed', async () => {
    const { session, stores } = makeSession(new ScriptedGateway(text(JSON_DRAFT)));
    const drafted = await session.submitParameters(params);
    expect(session.snapshot()).toEqual({ ...drafted, notices: [] });
    const upsert = vi.spyOn(stores.drafts, 'upsert');

    const unchanged = await session.confirmDraftEdit({ text: 'AI: Hi!\nUser: Hello.' });
    expect(codes(unchanged)).toEqual(['no_changes']);
    expect(upsert).not.toHaveBeenCalled();

    const edited = await session.confirmDraftEdit({ key_points: [' greet ', '', 'swap numbers'] });
    expect(upsert).toHaveBeenCalledTimes(1);
    expect(upsert.mock.calls[0]?.[0]).toBe(drafted.draftPaths?.structuredPath);
    expect(edited.state).toBe('drafted');
    expect(edited.draftPaths).toEqual(drafted.draftPaths);
    expect(edited.draft).toEqual({
      text: 'AI: Hi!\nUser: Hello.',
      key_points: ['greet', 'swap numbers'],
      intentions: ['open up'],
      metadata,
    });
  });

  it('cleans model lists up front so resubmitting the stored draft is not a change', async () => {
    const padded = '{"text": "AI: Hi!", "key_points": [" greet", "", ""], "intentions": ["open up "]}';
    const { session, stores } = makeSession(new ScriptedGateway(text(padded)));
    const drafted = await session.submitParameters(params);
    expect(drafted.draft).toEqual({ text: 'AI: Hi!', key_points: ['greet'], intentions: ['open up'], metadata });
    const upsert = vi.spyOn(stores.drafts, 'upsert');

    const report = await session.confirmDraftEdit({
      text: drafted.draft?.text,
      key_points: drafted.draft?.key_points,
      intentions: drafted.draft?.intentions,
    });
    expect(codes(report)).toEqual(['no_changes']);
    expect(upsert).not.toHaveBeenCalled();
  });

  it('persists a final edit in place and skips identical text', async () => {
    const { session, stores } = makeSession(new ScriptedGateway(text(JSON_DRAFT), text('AI: Heyyy!')));
    await session.submitParameters(params);
    const styled = await session.submitPersonas(personas);

    const unchanged = await session.confirmFinalEdit('AI: Heyyy!');
    expect(codes(unchanged)).toEqual(['no_changes']);

    const edited = await session.confirmFinalEdit('AI: Hey there.');
    expect(codes(edited)).toEqual(['persisted']);
    expect(edited.state).toBe('styled');
    expect(edited.styledPaths).toEqual(styled.styledPaths);
    const record = await stores.styled.read(edited.styledPaths?.structuredPath ?? '');
    expect(record.text).toBe('AI: Hey there.');
  });

  it('writes a new styled artifact each time personas are submitted', async () => {
    const { session } = makeSession(new ScriptedGateway(text(JSON_DRAFT), text('AI: one'), text('AI: two')));
    await session.submitParameters(params);

    const first = await session.submitPersonas(personas);
    const second = await session.submitPersonas({ user_traits: 'calm teacher', ai_traits: 'nervous student' });

    expect(second.styledPaths?.structuredPath).not.toBe(first.styledPaths?.structuredPath);
    expect(second.styled?.text).toBe('AI: two');
  });

  it('starts over with fresh artifacts when parameters are resubmitted', async () => {
    const { session } = makeSession(new ScriptedGateway(text(JSON_DRAFT), text('AI: styled'), text(JSON_DRAFT)));
    const first = await session.submitParameters(params);
    await session.submitPersonas(personas);

    const again = await session.submitParameters({ ...params, turns: 3 });
    expect(again.state).toBe('drafted');
    expect(again.styled).toBeNull();
    expect(again.styledPaths).toBeNull();
    expect(again.draftPaths?.structuredPath).not.toBe(first.draftPaths?.structuredPath);
  });

  it('asks for both personas before styling', async () => {
    const gateway = new ScriptedGateway(text(JSON_DRAFT));
    const { session } = makeSession(gateway);
    await session.submitParameters(params);

    const report = await session.submitPersonas({ user_traits: 'shy engineer', ai_traits: '  ' });
    expect(report.state).toBe('drafted');
    expect(codes(report)).toEqual(['personas_missing']);
    expect(gateway.requests).toHaveLength(1);
  });
});

describe('automatic session', () => {
  it('drafts and styles in one step', async () => {
    const gateway = new ScriptedGateway(text(JSON_DRAFT), text('AI: Well hello!'));
    const { session } = makeSession(gateway, 'automatic');

    const report = await session.submitParameters(params, personas);
    expect(report.state).toBe('styled');
    expect(codes(report)).toEqual(['persisted', 'persisted']);
    expect(report.styled?.origin).toEqual({ text: 'AI: Hi!\nUser: Hello.', key_points: ['greet'], intentions: ['open up'], metadata });
    expect(gateway.requests[1]?.prompt).toContain('## Original Dialogue');
  });

  it('stops at the draft when personas are missing', async () => {
    const { session } = makeSession(new ScriptedGateway(text(JSON_DRAFT)), 'automatic');

    const report = await session.submitParameters(params);
    expect(report.state).toBe('drafted');
    expect(codes(report)).toEqual(['persisted', 'personas_missing']);
  });

  it('holds a degraded draft for review instead of styling it', async () => {
    const gateway = new ScriptedGateway(text('AI: Hi!'));
    const { session } = makeSession(gateway, 'automatic');

    const report = await session.submitParameters(params, personas);
    expect(report.state).toBe('drafted');
    expect(codes(report)).toEqual(['parse_degraded', 'persisted', 'degraded_draft_held']);
    expect(gateway.requests).toHaveLength(1);
  });
});

describe('guards and failures', () => {
  it('refuses operations the current state does not allow', async () => {
    const { session } = makeSession(new ScriptedGateway());

    const report = await session.confirmDraftEdit({ text: 'AI: hi' });
    expect(report.state).toBe('idle');
    expect(report.notices).toEqual([{
      level: 'error',
      code: 'invalid_state',
      message: 'confirmDraftEdit is not allowed in state idle',
    }]);
    expect(codes(await session.submitPersonas(personas))).toEqual(['invalid_state']);
    expect(codes(await session.confirmFinalEdit('AI: hi'))).toEqual(['invalid_state']);
  });

  it('rejects invalid parameters without calling the model', async () => {
    const gateway = new ScriptedGateway();
    const { session } = makeSession(gateway);

    const report = await session.submitParameters({ context: '   ', goal: 'exchange contacts' });
    expect(report.state).toBe('idle');
    expect(report.notices).toEqual([{
      level: 'error',
      code: 'invalid_parameters',
      message: 'Invalid authoring parameters: context',
    }]);
    expect(gateway.requests).toHaveLength(0);
  });

  it('refuses a call made while another is in flight', async () => {
    const { session } = makeSession(new ScriptedGateway(text(JSON_DRAFT)));

    const pending = session.submitParameters(params);
    const refused = await session.submitPersonas(personas);
    expect(codes(refused)).toEqual(['busy']);
    expect((await pending).state).toBe('drafted');
  });

  it('returns to the previous state when drafting fails', async () => {
    const failure = new GatewayFailure('timeout', 'openai.complete timed out after 10ms', true);
    const { session } = makeSession(new ScriptedGateway(text(JSON_DRAFT), failure));
    const drafted = await session.submitParameters(params);

    const report = await session.submitParameters({ ...params, goal: 'say goodbye' });
    expect(report.state).toBe('drafted');
    expect(report.notices).toEqual([{
      level: 'error',
      code: 'gateway_failure',
      message: 'Draft generation failed (timeout): openai.complete timed out after 10ms',
    }]);
    expect(report.draft).toEqual(drafted.draft);
    expect(report.draftPaths).toEqual(drafted.draftPaths);
  });

  it('recovers when a collaborator throws mid-step', async () => {
    const generate = vi.fn()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce({ kind: 'parsed', draft: { text: 'AI: Hi!', key_points: [], intentions: [] } });
    const session = new DialogueSession({
      draftAgent: { generate },
      styleAgent: new StyleAgent(new ScriptedGateway()),
      stores: createArtifactStores(root),
      mode: 'collaborative',
    });

    const failed = await session.submitParameters(params);
    expect(failed.state).toBe('idle');
    expect(failed.notices).toEqual([{ level: 'error', code: 'step_failed', message: 'submitParameters failed: boom' }]);

    const retried = await session.submitParameters(params);
    expect(retried.state).toBe('drafted');
    expect(codes(retried)).toEqual(['persisted']);
  });

  it('returns to drafted when styling throws', async () => {
    const adapt = vi.fn()
      .mockRejectedValueOnce(new Error('style crashed'))
      .mockResolvedValueOnce({ kind: 'styled', text: 'AI: Hey!', locale: 'en' });
    const session = new DialogueSession({
      draftAgent: new DraftAgent(new ScriptedGateway(text(JSON_DRAFT))),
      styleAgent: { adapt },
      stores: createArtifactStores(root),
      mode: 'collaborative',
    });
    await session.submitParameters(params);

    const failed = await session.submitPersonas(personas);
    expect(failed.state).toBe('drafted');
    expect(codes(failed)).toEqual(['step_failed']);

    const retried = await session.submitPersonas(personas);
    expect(retried.state).toBe('styled');
    expect(retried.styled?.text).toBe('AI: Hey!');
  });

  it('stays drafted when styling fails', async () => {
    const failure = new GatewayFailure('auth', 'invalid key', false, 401);
    const { session } = makeSession(new ScriptedGateway(text(JSON_DRAFT), failure));
    await session.submitParameters(params);

    const report = await session.submitPersonas(personas);
    expect(report.state).toBe('drafted');
    expect(codes(report)).toEqual(['gateway_failure']);
    expect(report.styled).toBeNull();
  });

  it('carries on in memory when artifacts cannot be written', async () => {
    const blocker = join(root, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf8');
    const { session } = makeSession(new ScriptedGateway(text(JSON_DRAFT)), 'collaborative', blocker);

    const report = await session.submitParameters(params);
    expect(report.state).toBe('drafted');
    expect(report.draftPaths).toBeNull();
    expect(report.draft?.text).toBe('AI: Hi!\nUser: Hello.');
    expect(codes(report)).toEqual(['persistence_failure']);

    // Nothing was ever saved, so an unchanged edit still retries the write
    const retried = await session.confirmDraftEdit({});
    expect(codes(retried)).toEqual(['persistence_failure']);
  });
});
