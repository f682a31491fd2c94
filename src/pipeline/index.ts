/**
 * Pipeline wiring: builds a session from the environment.
 * Called by the CLI; tests construct DialogueSession directly with fakes.
 */
import { createGateway, type CompletionGateway } from '../ai/index.js';
import { env, type WorkMode } from '../config.js';
import { createArtifactStores, type ArtifactStores } from '../storage/artifact-store.js';
import { logger } from '../utils/logger.js';
import { DraftAgent, type DraftAgentOptions } from './draft-agent.js';
import { DialogueSession } from './session.js';
import { StyleAgent } from './style-agent.js';

export interface PipelineOptions {
  mode?: WorkMode;
  artifactDir?: string;
  gateway?: CompletionGateway;
  structuredOutput?: DraftAgentOptions['structuredOutput'];
}

export interface Pipeline {
  session: DialogueSession;
  draftAgent: DraftAgent;
  styleAgent: StyleAgent;
  stores: ArtifactStores;
}

export function createPipeline(opts: PipelineOptions = {}): Pipeline {
  const gateway = opts.gateway ?? createGateway(env);
  const draftAgent = new DraftAgent(gateway, { structuredOutput: opts.structuredOutput });
  const styleAgent = new StyleAgent(gateway);
  const stores = createArtifactStores(opts.artifactDir ?? env.ARTIFACT_DIR);
  const mode = opts.mode ?? env.WORK_MODE;

  logger.info('Pipeline: ready', {
    mode,
    artifactDir: opts.artifactDir ?? env.ARTIFACT_DIR,
    agents: [draftAgent.describe(), styleAgent.describe()],
  });

  return {
    session: new DialogueSession({ draftAgent, styleAgent, stores, mode }),
    draftAgent,
    styleAgent,
    stores,
  };
}

export { DialogueSession } from './session.js';
export type { DraftRevision, Notice, NoticeCode, SessionState, StepReport } from './session.js';
export { DraftAgent, type DraftOutcome } from './draft-agent.js';
export { StyleAgent, type StyleLocale, type StyleOutcome } from './style-agent.js';
export * from './types.js';
