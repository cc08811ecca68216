/**
 * Revision Store
 *
 * Filesystem layout of one run:
 *
 *   <outputDir>/<topicKey>_<YYYYMMDD_HHMMSS>/
 *     run.json
 *     article_v<N>.md
 *     editor_feedback_v<N>.json
 *     fact_check_v<N>.json
 *     authenticity_check_v<N>.json
 *     article_final.md
 *     revision_history.json
 *     publication.md / publication.html
 *
 * Writes are best-effort: a failure is logged, returns false and the run
 * continues in memory. Reads used by resume are strict.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { topicFromKey, toTopicKey } from '../../utils/topic-key';
import {
  EditorialWorkflowError,
  systemClock,
  type AuthenticityVerdict,
  type Clock,
  type EditorVerdict,
  type FactCheckVerdict,
  type PublicationOutput,
  type ReviewerRole,
  type ReviewVerdict,
  type RevisionRecord,
} from './types';

// ============================================================================
// Schemas
// ============================================================================

const SeveritySchema = z.enum(['CRITICAL', 'HIGH', 'MEDIUM', 'LOW']);

const IssueSchema = z.object({
  severity: SeveritySchema,
  type: z.string(),
  location: z.string(),
  issue: z.string(),
  correction: z.string().optional(),
  verified: z.boolean().optional(),
});

const verdictBase = {
  ready: z.boolean(),
  assessment: z.string(),
  issues: z.array(IssueSchema),
  parseFailed: z.boolean(),
  rawResponse: z.string().optional(),
};

export const EditorVerdictSchema = z.object({
  role: z.literal('editor'),
  ...verdictBase,
  grade: z.string(),
  thesis: z.string(),
  strengths: z.array(z.string()),
  criticalIssues: z.array(z.string()),
  improvements: z.array(
    z.object({
      section: z.string(),
      issue: z.string(),
      suggestion: z.string(),
      example: z.string().optional(),
    })
  ),
  lineEdits: z.array(z.object({ original: z.string(), revised: z.string(), reason: z.string() })),
  redFlags: z.array(z.string()),
});

export const FactCheckVerdictSchema = z.object({
  role: z.literal('fact_checker'),
  ...verdictBase,
  score: z.number(),
  verifiedSources: z.array(z.string()),
  unverifiedClaims: z.array(z.string()),
  statisticsCheck: z.string(),
  requiredCorrections: z.array(z.string()),
  extractedUrls: z.array(z.string()),
  extractedStatistics: z.array(z.string()),
});

export const AuthenticityVerdictSchema = z.object({
  role: z.literal('authenticity'),
  ...verdictBase,
  score: z.number(),
  patterns: z.array(
    z.object({ pattern: z.string(), severity: SeveritySchema, example: z.string(), suggestion: z.string() })
  ),
  recommendations: z.array(z.string()),
});

const RunManifestSchema = z.object({
  topic: z.string().min(1),
  topicKey: z.string(),
  createdAt: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;

const RevisionRecordSchema = z.object({
  revision: z.number().int(),
  editorGrade: z.string(),
  editorReady: z.boolean(),
  factCheckScore: z.number(),
  factCheckReady: z.boolean(),
  authenticityScore: z.number(),
  authenticityReady: z.boolean(),
  criticalIssueCount: z.number().int(),
  aiPatternCount: z.number().int(),
});

// ============================================================================
// Naming
// ============================================================================

const VERDICT_FILE_PREFIX: Readonly<Record<ReviewerRole, string>> = {
  editor: 'editor_feedback',
  fact_checker: 'fact_check',
  authenticity: 'authenticity_check',
};

const ARTICLE_FILE_PATTERN = /^article_v(\d+)\.md$/;
const RUN_DIR_PATTERN = /^(.+)_\d{8}_\d{6}$/;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * UTC timestamp used in run directory names, e.g. "20250314_093005".
 */
export function formatRunTimestamp(ms: number): string {
  const d = new Date(ms);
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}_` +
    `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

export function articleFileName(version: number): string {
  return `article_v${version}.md`;
}

export function verdictFileName(role: ReviewerRole, version: number): string {
  return `${VERDICT_FILE_PREFIX[role]}_v${version}.json`;
}

/**
 * Version number from an `article_v<N>.md` path, or undefined.
 */
export function parseArticleVersion(articlePath: string): number | undefined {
  const match = ARTICLE_FILE_PATTERN.exec(path.basename(articlePath));
  if (!match) return undefined;
  const version = Number(match[1]);
  return Number.isInteger(version) && version >= 1 ? version : undefined;
}

/**
 * Topic from a run directory name `<topicKey>_<YYYYMMDD>_<HHMMSS>`.
 */
export function topicFromRunDir(runDir: string): string | undefined {
  const match = RUN_DIR_PATTERN.exec(path.basename(runDir));
  return match ? topicFromKey(match[1]) : undefined;
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// Store
// ============================================================================

export interface LoadedVerdicts {
  readonly editor?: EditorVerdict;
  readonly factCheck?: FactCheckVerdict;
  readonly authenticity?: AuthenticityVerdict;
}

export interface ResumePoint {
  readonly runDir: string;
  readonly topic: string;
  readonly version: number;
  readonly article: string;
}

export class RevisionStore {
  private readonly log: Logger;

  constructor(
    readonly runDir: string,
    logger?: Logger
  ) {
    this.log = logger ?? createPrefixedLogger('[RevisionStore]');
  }

  /**
   * Creates a new run directory and its manifest. A failed write is logged;
   * the returned store still points at the intended directory.
   */
  static async create(
    outputDir: string,
    topic: string,
    options: { clock?: Clock; logger?: Logger } = {}
  ): Promise<RevisionStore> {
    const now = (options.clock ?? systemClock).now();
    const topicKey = toTopicKey(topic);
    const store = new RevisionStore(path.join(outputDir, `${topicKey}_${formatRunTimestamp(now)}`), options.logger);

    const manifest: RunManifest = { topic, topicKey, createdAt: new Date(now).toISOString() };
    await store.writeText('run.json', JSON.stringify(manifest, null, 2));
    return store;
  }

  /**
   * Opens an existing run at an article version for resume.
   *
   * @throws EditorialWorkflowError RESUME_INVALID for a path that is not
   * `article_v<N>.md` inside a run directory, RESUME_NOT_FOUND when the file
   * does not exist
   */
  static async openForResume(articlePath: string, logger?: Logger): Promise<ResumePoint> {
    const version = parseArticleVersion(articlePath);
    if (version === undefined) {
      throw new EditorialWorkflowError(
        'RESUME_INVALID',
        `Not an article version file: ${articlePath} (expected article_v<N>.md)`
      );
    }

    let article: string;
    try {
      article = await readFile(articlePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new EditorialWorkflowError('RESUME_NOT_FOUND', `Article not found: ${articlePath}`);
      }
      throw new EditorialWorkflowError(
        'RESUME_INVALID',
        `Could not read ${articlePath}: ${errorText(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    const store = new RevisionStore(path.dirname(path.resolve(articlePath)), logger);
    const manifest = await store.loadManifest();
    const topic = manifest?.topic ?? topicFromRunDir(store.runDir);
    if (!topic) {
      throw new EditorialWorkflowError(
        'RESUME_INVALID',
        `Cannot determine topic for ${store.runDir}: no run.json and directory name is not <topic>_<YYYYMMDD>_<HHMMSS>`
      );
    }

    return { runDir: store.runDir, topic, version, article };
  }

  pathFor(fileName: string): string {
    return path.join(this.runDir, fileName);
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  private async writeText(fileName: string, content: string): Promise<boolean> {
    const file = this.pathFor(fileName);
    try {
      await mkdir(this.runDir, { recursive: true });
      await writeFile(file, content, 'utf8');
      this.log.debug(`Saved ${file}`);
      return true;
    } catch (error) {
      this.log.error(`Failed to save ${file}: ${errorText(error)}`);
      return false;
    }
  }

  saveArticle(version: number, article: string): Promise<boolean> {
    return this.writeText(articleFileName(version), article);
  }

  saveVerdict(version: number, verdict: ReviewVerdict): Promise<boolean> {
    return this.writeText(verdictFileName(verdict.role, version), JSON.stringify(verdict, null, 2));
  }

  saveFinalArticle(article: string): Promise<boolean> {
    return this.writeText('article_final.md', article);
  }

  saveHistory(history: readonly RevisionRecord[]): Promise<boolean> {
    return this.writeText('revision_history.json', JSON.stringify(history, null, 2));
  }

  async savePublication(publication: PublicationOutput): Promise<boolean> {
    const markdownSaved = await this.writeText('publication.md', publication.markdown);
    if (publication.html === undefined) return markdownSaved;
    const htmlSaved = await this.writeText('publication.html', publication.html);
    return markdownSaved && htmlSaved;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  private async readOptional(fileName: string): Promise<string | undefined> {
    try {
      return await readFile(this.pathFor(fileName), 'utf8');
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  private async readJson<S extends z.ZodTypeAny>(fileName: string, schema: S): Promise<z.infer<S> | undefined> {
    const raw = await this.readOptional(fileName);
    if (raw === undefined) return undefined;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new EditorialWorkflowError(
        'RESUME_INVALID',
        `${this.pathFor(fileName)} is not valid JSON: ${errorText(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new EditorialWorkflowError(
        'RESUME_INVALID',
        `${this.pathFor(fileName)} has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`
      );
    }
    return parsed.data;
  }

  loadManifest(): Promise<RunManifest | undefined> {
    return this.readJson('run.json', RunManifestSchema);
  }

  /**
   * Loads the verdicts persisted for a version. Missing files are logged and
   * omitted.
   *
   * @throws EditorialWorkflowError RESUME_INVALID for a malformed verdict file
   */
  async loadVerdicts(version: number): Promise<LoadedVerdicts> {
    const editor = await this.readJson(verdictFileName('editor', version), EditorVerdictSchema);
    const factCheck = await this.readJson(verdictFileName('fact_checker', version), FactCheckVerdictSchema);
    const authenticity = await this.readJson(verdictFileName('authenticity', version), AuthenticityVerdictSchema);

    const missing = [
      editor ? undefined : verdictFileName('editor', version),
      factCheck ? undefined : verdictFileName('fact_checker', version),
      authenticity ? undefined : verdictFileName('authenticity', version),
    ].filter((name): name is string => name !== undefined);
    if (missing.length > 0) {
      this.log.warn(`No saved feedback for version ${version}: ${missing.join(', ')}`);
    }

    return {
      ...(editor ? { editor } : {}),
      ...(factCheck ? { factCheck } : {}),
      ...(authenticity ? { authenticity } : {}),
    };
  }

  /**
   * History from an earlier run in this directory, or an empty list.
   */
  async loadHistory(): Promise<RevisionRecord[]> {
    return (await this.readJson('revision_history.json', z.array(RevisionRecordSchema))) ?? [];
  }
}
