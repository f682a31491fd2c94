#!/usr/bin/env node
/**
 * CLI entry point: routes commands to the dialogue pipeline.
 *
 *   run   <request.json>                      draft, then style when personas are given
 *   draft <request.json>                      draft only
 *   style <draft.json> <userTraits> <aiTraits> style an already persisted draft
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { createPipeline } from './pipeline/index.js';
import { DraftParametersSchema, type StyledDialogue } from './pipeline/types.js';
import type { StepReport } from './pipeline/session.js';
import { logger } from './utils/logger.js';

const [,, command, ...args] = process.argv;

const RequestSchema = z.object({
  parameters: DraftParametersSchema,
  personas: z.object({ user_traits: z.string(), ai_traits: z.string() }).optional(),
  mode: z.enum(['collaborative', 'automatic']).optional(),
  structured_output: z.enum(['text', 'tool']).optional(),
});

type SessionRequest = z.infer<typeof RequestSchema>;

async function loadRequest(path: string | undefined): Promise<SessionRequest> {
  if (!path) throw new Error('Missing request file: expected a JSON file with { parameters, personas?, mode? }');
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  const parsed = RequestSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new Error(`Invalid request file ${path}: ${fields}`);
  }
  return parsed.data;
}

function printReport(report: StepReport): void {
  for (const notice of report.notices) {
    const log = notice.level === 'error' ? logger.error : notice.level === 'warning' ? logger.warn : logger.info;
    log(`${notice.code}: ${notice.message}`);
  }
  process.stdout.write(JSON.stringify({
    state: report.state,
    draftStatus: report.draftStatus,
    draft: report.draftPaths,
    styled: report.styledPaths,
  }, null, 2) + '\n');
}

async function runCommand(request: SessionRequest, styleAfterDraft: boolean): Promise<StepReport> {
  const mode = styleAfterDraft ? request.mode : 'collaborative';
  const { session } = createPipeline({ mode, structuredOutput: request.structured_output });

  let report = await session.submitParameters(request.parameters, styleAfterDraft ? request.personas : undefined);
  printReport(report);

  // Collaborative runs from the CLI confirm the draft as-is and move on to styling
  if (styleAfterDraft && session.mode === 'collaborative' && request.personas && report.state === 'drafted') {
    report = await session.submitPersonas(request.personas);
    printReport(report);
  }
  return report;
}

async function styleCommand(draftPath: string | undefined, userTraits: string | undefined, aiTraits: string | undefined): Promise<void> {
  if (!draftPath || !userTraits || !aiTraits) {
    throw new Error('Usage: style <draft.json> <userTraits> <aiTraits>');
  }
  const { styleAgent, stores } = createPipeline();
  const draft = await stores.drafts.read(draftPath);

  const outcome = await styleAgent.adapt(draft, userTraits, aiTraits);
  if (outcome.kind === 'failed') {
    logger.error(`Styling failed (${outcome.error.reason}): ${outcome.error.message}`);
    process.exitCode = 1;
    return;
  }

  const styled: StyledDialogue = { text: outcome.text, user_traits: userTraits, ai_traits: aiTraits, origin: draft };
  const paths = await stores.styled.create(styled, draft.metadata);
  process.stdout.write(JSON.stringify({ styled: paths }, null, 2) + '\n');
  if (paths.structuredPath === null) process.exitCode = 1;
}

async function main(): Promise<void> {
  switch (command) {
    case 'run': {
      const report = await runCommand(await loadRequest(args[0]), true);
      if (report.notices.some(n => n.level === 'error')) process.exitCode = 1;
      break;
    }
    case 'draft': {
      const report = await runCommand(await loadRequest(args[0]), false);
      if (report.draft === null) process.exitCode = 1;
      break;
    }
    case 'style':
      await styleCommand(args[0], args[1], args[2]);
      break;
    default:
      logger.error(`Unknown command: ${command ?? '(none)'}. Use: run | draft | style`);
      process.exit(1);
  }
}

main().catch((err) => {
  logger.error('Fatal', { err });
  process.exit(1);
});
