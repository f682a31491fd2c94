/**
 * Artifact store: keeps a JSON record and its Markdown rendering in sync on disk.
 *
 * Each logical artifact gets one base identifier on first write
 * (`<stamp>_<context fragment>[_<tag>]_<8 hex>`); every later revision
 * overwrites the same pair and keeps the metadata recovered from disk.
 * Failures are logged and returned, never thrown, so a session can carry on in memory.
 */
import { randomUUID } from 'node:crypto';
import { access, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { z } from 'zod';
import { ARTIFACT_LAYOUT } from '../config.js';
import { logger } from '../utils/logger.js';
import { tryParseJson } from '../utils/json.js';
import {
  ArtifactMetadataSchema,
  PersistedDraftSchema,
  PersistedStyledDialogueSchema,
  type ArtifactMetadata,
  type DialogueDraft,
  type StyledDialogue,
} from '../pipeline/types.js';
import { renderDraft, renderStyled, type Renderer } from './render.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ArtifactPaths {
  structuredPath: string;
  renderedPath: string;
}

/** Returned by create/update when nothing was persisted */
export const NOT_PERSISTED = { structuredPath: null, renderedPath: null } as const;

export type PersistedPaths = ArtifactPaths | typeof NOT_PERSISTED;

/** Context and goal for a new artifact; `creation_time` is set when inheriting identity */
export interface MetadataSeed {
  context: string;
  goal: string;
  creation_time?: string;
}

export type UpsertResult =
  | { status: 'created'; paths: ArtifactPaths; metadata: ArtifactMetadata }
  | { status: 'updated'; paths: ArtifactPaths; metadata: ArtifactMetadata }
  | { status: 'failed'; error: PersistenceFailure };

export class PersistenceFailure extends Error {
  constructor(message: string, public readonly path?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceFailure';
  }
}

export type Persisted<T> = T & { metadata: ArtifactMetadata };

export interface ArtifactStoreOptions<T> {
  rootDir: string;
  subdir: string;
  label: string;
  render: Renderer<T>;
  schema: z.ZodType<Persisted<T>>;
  /** Extra identifier segment, e.g. "final" for styled dialogues */
  tag?: string;
  now?: () => Date;
  randomId?: () => string;
}

// ── Store ─────────────────────────────────────────────────────────────────────

export class ArtifactStore<T extends object> {
  private readonly now: () => Date;
  private readonly randomId: () => string;

  constructor(private readonly opts: ArtifactStoreOptions<T>) {
    this.now = opts.now ?? (() => new Date());
    this.randomId = opts.randomId ?? (() => randomUUID().replace(/-/g, '').slice(0, 8));
  }

  get directory(): string {
    return join(this.opts.rootDir, this.opts.subdir);
  }

  /** Allocates a new identifier and writes both files. */
  async create(content: T, seed: MetadataSeed): Promise<PersistedPaths> {
    return toPaths(await this.upsert(undefined, content, seed));
  }

  /** Rewrites an existing pair in place; creates a new one when the path is missing. */
  async update(structuredPath: string, content: T, seed: MetadataSeed): Promise<PersistedPaths> {
    return toPaths(await this.upsert(structuredPath, content, seed));
  }

  async upsert(identity: string | undefined, content: T, seed: MetadataSeed): Promise<UpsertResult> {
    const label = this.opts.label;
    try {
      if (identity && await fileExists(identity)) {
        const metadata = await this.recoverMetadata(identity, seed);
        const paths = { structuredPath: identity, renderedPath: renderedPathFor(identity) };
        await this.writePair(paths, content, metadata);
        logger.info(`ArtifactStore[${label}]: updated`, { path: paths.structuredPath });
        return { status: 'updated', paths, metadata };
      }

      if (identity) {
        logger.warn(`ArtifactStore[${label}]: ${identity} not found — creating a new artifact`);
      }
      const metadata = this.freshMetadata(seed);
      const paths = this.allocate(seed.context);
      await this.writePair(paths, content, metadata);
      logger.info(`ArtifactStore[${label}]: created`, { path: paths.structuredPath });
      return { status: 'created', paths, metadata };
    } catch (err) {
      const error = err instanceof PersistenceFailure
        ? err
        : new PersistenceFailure(`Failed to persist ${label} artifact: ${errorMessage(err)}`, identity, { cause: err });
      logger.error(`ArtifactStore[${label}]: persist failed`, { path: identity, error: error.message });
      return { status: 'failed', error };
    }
  }

  /** Loads and validates a persisted record. Throws PersistenceFailure. */
  async read(structuredPath: string): Promise<Persisted<T>> {
    let raw: string;
    try {
      raw = await readFile(structuredPath, 'utf8');
    } catch (err) {
      throw new PersistenceFailure(`Cannot read ${structuredPath}: ${errorMessage(err)}`, structuredPath, { cause: err });
    }
    const result = this.opts.schema.safeParse(tryParseJson(raw));
    if (!result.success) {
      const issues = result.error.issues.map(i => i.path.join('.') || '(root)').join(', ');
      throw new PersistenceFailure(`${structuredPath} is not a valid ${this.opts.label} record: ${issues}`, structuredPath);
    }
    return result.data;
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private async recoverMetadata(structuredPath: string, seed: MetadataSeed): Promise<ArtifactMetadata> {
    try {
      const raw: unknown = JSON.parse(await readFile(structuredPath, 'utf8'));
      const metadata = raw && typeof raw === 'object' && 'metadata' in raw ? raw.metadata : undefined;
      const parsed = ArtifactMetadataSchema.safeParse(metadata);
      if (parsed.success) return parsed.data;
      logger.warn(`ArtifactStore[${this.opts.label}]: no usable metadata — assigning fresh`, { path: structuredPath });
    } catch (err) {
      logger.warn(`ArtifactStore[${this.opts.label}]: metadata unreadable — assigning fresh`, {
        path: structuredPath, error: errorMessage(err),
      });
    }
    return this.freshMetadata(seed);
  }

  private freshMetadata(seed: MetadataSeed): ArtifactMetadata {
    return {
      creation_time: seed.creation_time ?? this.now().toISOString(),
      context: seed.context,
      goal: seed.goal,
    };
  }

  private allocate(context: string): ArtifactPaths {
    const base = [
      compactStamp(this.now()),
      sanitizeContext(context),
      this.opts.tag,
      this.randomId(),
    ].filter(Boolean).join('_');
    const structuredPath = join(this.directory, `${base}.json`);
    return { structuredPath, renderedPath: renderedPathFor(structuredPath) };
  }

  private async writePair(paths: ArtifactPaths, content: T, metadata: ArtifactMetadata): Promise<void> {
    // Metadata always comes from the store, whatever the caller passed
    const record = { ...content, metadata };
    await writeFileAtomic(paths.structuredPath, JSON.stringify(record, null, 2));
    await writeFileAtomic(paths.renderedPath, this.opts.render(content, metadata));
  }
}

// ── Factories ─────────────────────────────────────────────────────────────────

export interface ArtifactStores {
  drafts: ArtifactStore<DialogueDraft>;
  styled: ArtifactStore<StyledDialogue>;
}

export function createArtifactStores(
  rootDir: string,
  clock?: Pick<ArtifactStoreOptions<unknown>, 'now' | 'randomId'>,
): ArtifactStores {
  return {
    drafts: new ArtifactStore<DialogueDraft>({
      rootDir,
      subdir: ARTIFACT_LAYOUT.draftsDir,
      label: 'draft',
      render: renderDraft,
      schema: PersistedDraftSchema,
      ...clock,
    }),
    styled: new ArtifactStore<StyledDialogue>({
      rootDir,
      subdir: ARTIFACT_LAYOUT.styledDir,
      label: 'styled',
      tag: ARTIFACT_LAYOUT.styledTag,
      render: renderStyled,
      schema: PersistedStyledDialogueSchema,
      ...clock,
    }),
  };
}

// ── Helpers ───────────────────────────────────────────────────────────────────

/** Keeps letters, digits, `_`, `-` and whitespace; at most 20 chars; whitespace becomes `_`. */
export function sanitizeContext(context: string): string {
  const kept = context.replace(/[^\p{L}\p{N}_\s-]/gu, '');
  return Array.from(kept).slice(0, ARTIFACT_LAYOUT.contextFragment).join('').trim().replace(/\s+/g, '_');
}

/** 2026-10-18T09:05:03.000Z → 20261018_090503 (UTC) */
export function compactStamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
}

export function renderedPathFor(structuredPath: string): string {
  return structuredPath.endsWith('.json') ? `${structuredPath.slice(0, -'.json'.length)}.md` : `${structuredPath}.md`;
}

function toPaths(result: UpsertResult): PersistedPaths {
  return result.status === 'failed' ? NOT_PERSISTED : result.paths;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function writeFileAtomic(path: string, data: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${randomUUID().slice(0, 8)}.tmp`;
  try {
    await writeFile(tmp, data, 'utf8');
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
