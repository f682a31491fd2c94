#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for Dialogue Studio.
 * Checks the selected provider's API key, the gateway limits and the artifact directory.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 all required checks pass
 *   1 one or more required checks failed
 */
import { access, constants, mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

function checkRequired(label: string, value: string | undefined, hint?: string): void {
  if (value && value.trim().length > 0) {
    // Mask secrets: show first 6 chars + ellipsis
    const display = value.length > 10 ? `${value.slice(0, 6)}…` : '(set)';
    pass(label, display);
  } else {
    fail(label, hint ?? `Set ${label} in .env`);
    anyRequiredFailed = true;
  }
}

function checkOptional(label: string, value: string | undefined, defaultVal: string): void {
  const effective = value ?? defaultVal;
  console.log(`  ${YELLOW}○${RESET} ${label}  ${effective}${value ? '' : '  (default)'}`);
}

function checkPositiveInt(label: string, value: string | undefined): void {
  if (value === undefined) return;
  const n = Number(value);
  if (Number.isInteger(n) && n > 0) pass(label, value);
  else {
    fail(label, `${label} must be a positive integer, got "${value}"`);
    anyRequiredFailed = true;
  }
}

// ── Section: Provider ─────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Dialogue Studio — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Model provider${RESET}`);

const provider = process.env['LLM_PROVIDER'] ?? 'openai';
const PROVIDER_KEYS: Record<string, { key: string; hint: string }> = {
  openai:     { key: 'OPENAI_API_KEY',     hint: 'Get from https://platform.openai.com/api-keys' },
  anthropic:  { key: 'ANTHROPIC_API_KEY',  hint: 'Get from https://console.anthropic.com' },
  openrouter: { key: 'OPENROUTER_API_KEY', hint: 'Get from https://openrouter.ai/keys' },
};

const providerKey = PROVIDER_KEYS[provider];
if (providerKey) {
  pass('LLM_PROVIDER', provider);
  checkRequired(providerKey.key, process.env[providerKey.key], providerKey.hint);
} else {
  fail('LLM_PROVIDER', `Unknown provider "${provider}" — use one of ${Object.keys(PROVIDER_KEYS).join(', ')}`);
  anyRequiredFailed = true;
}
checkOptional('LLM_MODEL', process.env['LLM_MODEL'], '(provider default)');

// ── Section: Gateway limits ───────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Gateway limits${RESET}`);

checkOptional('LLM_TIMEOUT_MS',   process.env['LLM_TIMEOUT_MS'],   '60000');
checkOptional('LLM_MAX_ATTEMPTS', process.env['LLM_MAX_ATTEMPTS'], '2');
checkOptional('LLM_MAX_TOKENS',   process.env['LLM_MAX_TOKENS'],   '2000');
checkPositiveInt('LLM_TIMEOUT_MS',   process.env['LLM_TIMEOUT_MS']);
checkPositiveInt('LLM_MAX_ATTEMPTS', process.env['LLM_MAX_ATTEMPTS']);
checkPositiveInt('LLM_MAX_TOKENS',   process.env['LLM_MAX_TOKENS']);

// ── Section: Session ──────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Session${RESET}`);

checkOptional('WORK_MODE',  process.env['WORK_MODE'],  'collaborative');
checkOptional('LOG_LEVEL',  process.env['LOG_LEVEL'],  'info');
checkOptional('LOG_FORMAT', process.env['LOG_FORMAT'], 'text');

// ── Section: Artifact directory ───────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Artifact directory${RESET}`);

const artifactDir = resolve(process.env['ARTIFACT_DIR'] ?? './dialogue_artifacts');
try {
  await mkdir(artifactDir, { recursive: true });
  await access(artifactDir, constants.W_OK);
  pass('ARTIFACT_DIR writable', artifactDir);
} catch (err) {
  fail('ARTIFACT_DIR not writable', err instanceof Error ? err.message : String(err));
  anyRequiredFailed = true;
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm start -- run examples/cafe-meeting.json${RESET}\n`);
}
