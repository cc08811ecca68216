/**
 * Editorial Workflow
 *
 * Multi-agent article production:
 * - Research Coordinator: iterative research with a per-topic cache
 * - Draft writer: article v1 from the findings
 * - Review panel + Revision Controller: editor, fact-checker and authenticity
 *   reviews with targeted research and rewrites until all three approve
 * - Post-processing: humanize, layout, numbered citations, channel formatting
 *
 * @example
 * import { runEditorialWorkflow } from './ai/articles';
 *
 * const result = await runEditorialWorkflow('Renewable Energy Storage');
 * console.log(result.readyToPublish, result.outputDir);
 *
 * @example
 * // Resume from a saved version with reader feedback
 * const result = await resumeEditorialWorkflow(
 *   'output/Renewable_Energy_Storage_20250314_093005/article_v3.md',
 *   'Cut the history section and lead with grid-scale costs'
 * );
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { generateText } from 'ai';

import { getModel, type AIRoleKey } from '../config';
import {
  createContextualLogger,
  generateCorrelationId,
  type ContextualLogger,
} from '../../utils/logger';
import { createAuthenticityReviewer } from './agents/authenticity';
import { createEditorReviewer } from './agents/editor';
import { createFactCheckerReviewer } from './agents/fact-checker';
import { humanizeArticle, preparePublication, type PostProcessorDeps } from './agents/post-processor';
import { createResearchCoordinator, type ResearchCoordinator } from './agents/researcher';
import type { ReviewPanel } from './agents/reviewer';
import { createDraftWriter, createRewriter, type DraftWriter, type Rewriter } from './agents/writer';
import { GENERATION_CONFIG, RESEARCH_CONFIG, REVIEW_CONFIG, WORKFLOW_CONFIG } from './config';
import { createTextGenerator, type TextGenerator } from './generation';
import type { ResearchMemory } from './memory';
import { PhaseTimer } from './phase-timer';
import { ProgressTracker } from './progress-tracker';
import {
  getFormatterSystemPrompt,
  getHumanizerSystemPrompt,
  getLayoutSystemPrompt,
} from './prompts/post-processing-prompts';
import { getEditorSystemPrompt } from './prompts/editor-prompts';
import { getFactCheckerSystemPrompt } from './prompts/fact-checker-prompts';
import { getAuthenticitySystemPrompt } from './prompts/authenticity-prompts';
import { getResearchSystemPrompt } from './prompts/research-prompts';
import { getRewriterSystemPrompt, getWriterSystemPrompt } from './prompts/writer-prompts';
import { FileResearchCache, type ResearchCache } from './research-cache';
import type { RetryOptions } from './retry';
import { isEditorReadyForReport } from './revision-gates';
import { RevisionController, type RevisionLoopOutcome } from './revision-controller';
import { RevisionStore } from './revision-store';
import { createSourceGateway, type SourceGateway } from './source-gateway';
import {
  EditorialWorkflowError,
  isEditorialWorkflowError,
  systemClock,
  type Clock,
  type EditorialPhase,
  type EditorialProgressCallback,
  type EditorialWorkflowErrorCode,
  type Finding,
  type WorkflowResult,
} from './types';

// ============================================================================
// Dependencies Interface
// ============================================================================

/**
 * One text generator per role.
 */
export interface EditorialGenerators {
  readonly research: TextGenerator;
  readonly writer: TextGenerator;
  readonly editor: TextGenerator;
  readonly factChecker: TextGenerator;
  readonly authenticity: TextGenerator;
  readonly rewriter: TextGenerator;
  readonly humanizer: TextGenerator;
  readonly layout: TextGenerator;
  readonly formatter: TextGenerator;
}

/**
 * Dependencies for the workflow (enables testing with stubs).
 * All properties are optional; defaults are built for whatever is missing.
 * An OpenRouter client is only required when a generator has to be built.
 */
export interface EditorialWorkflowDeps {
  readonly openrouter?: ReturnType<typeof createOpenRouter>;
  readonly generateText?: typeof generateText;
  readonly generators?: Partial<EditorialGenerators>;
  readonly gateway?: SourceGateway;
  /** Defaults to a file cache under the output directory */
  readonly cache?: ResearchCache;
  readonly memory?: ResearchMemory;
}

export interface EditorialWorkflowOptions {
  /** Base output directory (default: OUTPUT_DIR env var, else "output") */
  readonly outputDir?: string;
  /** Maximum review cycles in this run (default: WORKFLOW_CONFIG.SAFETY_CAP) */
  readonly safetyCap?: number;
  /** Run the three reviewers concurrently (default: false) */
  readonly parallelReviews?: boolean;
  /** Use the research cache (default: true) */
  readonly useCache?: boolean;
  /**
   * Optional progress callback.
   *
   * @example
   * await runEditorialWorkflow(topic, undefined, {
   *   onProgress: (phase, progress, message) => console.log(`[${phase}] ${progress}%: ${message}`),
   * });
   */
  readonly onProgress?: EditorialProgressCallback;
  /** Override for deterministic testing */
  readonly clock?: Clock;
  /** Correlation ID for log tracing; generated when absent */
  readonly correlationId?: string;
  /** Retry tuning for every generation call */
  readonly retry?: Pick<RetryOptions, 'maxAttempts' | 'initialDelayMs' | 'sleep'>;
}

// ============================================================================
// Default Dependencies
// ============================================================================

interface RoleSetup {
  readonly role: AIRoleKey;
  readonly system: string;
  readonly temperature: number;
  readonly label: string;
}

const ROLE_SETUP: Readonly<Record<keyof EditorialGenerators, RoleSetup>> = {
  research: {
    role: 'RESEARCH',
    system: getResearchSystemPrompt(),
    temperature: RESEARCH_CONFIG.TEMPERATURE,
    label: 'Research',
  },
  writer: {
    role: 'WRITER',
    system: getWriterSystemPrompt(),
    temperature: WORKFLOW_CONFIG.WRITER_TEMPERATURE,
    label: 'Writer',
  },
  editor: {
    role: 'EDITOR',
    system: getEditorSystemPrompt(),
    temperature: REVIEW_CONFIG.EDITOR_TEMPERATURE,
    label: 'Editor',
  },
  factChecker: {
    role: 'FACT_CHECKER',
    system: getFactCheckerSystemPrompt(),
    temperature: REVIEW_CONFIG.FACT_CHECKER_TEMPERATURE,
    label: 'FactCheck',
  },
  authenticity: {
    role: 'AUTHENTICITY',
    system: getAuthenticitySystemPrompt(),
    temperature: REVIEW_CONFIG.AUTHENTICITY_TEMPERATURE,
    label: 'Authenticity',
  },
  rewriter: {
    role: 'REWRITER',
    system: getRewriterSystemPrompt(),
    temperature: WORKFLOW_CONFIG.REWRITER_TEMPERATURE,
    label: 'Rewriter',
  },
  humanizer: {
    role: 'HUMANIZER',
    system: getHumanizerSystemPrompt(),
    temperature: WORKFLOW_CONFIG.HUMANIZER_TEMPERATURE,
    label: 'Humanizer',
  },
  layout: {
    role: 'LAYOUT',
    system: getLayoutSystemPrompt(),
    temperature: WORKFLOW_CONFIG.LAYOUT_TEMPERATURE,
    label: 'Layout',
  },
  formatter: {
    role: 'FORMATTER',
    system: getFormatterSystemPrompt(),
    temperature: WORKFLOW_CONFIG.FORMATTER_TEMPERATURE,
    label: 'Formatter',
  },
};

function createOpenRouterClient(): ReturnType<typeof createOpenRouter> {
  const apiKey = process.env.OPENROUTER_API_KEY;
  if (!apiKey) {
    throw new EditorialWorkflowError('CONFIG_ERROR', 'OPENROUTER_API_KEY environment variable is required');
  }
  return createOpenRouter({
    apiKey,
    baseURL: process.env.OPENROUTER_BASE_URL || GENERATION_CONFIG.DEFAULT_OPENROUTER_BASE_URL,
  });
}

/**
 * Fills in every generator the caller did not supply.
 *
 * @throws EditorialWorkflowError CONFIG_ERROR when a generator must be built
 * and OPENROUTER_API_KEY is not set
 */
export function resolveGenerators(deps: EditorialWorkflowDeps = {}): EditorialGenerators {
  const given = deps.generators ?? {};
  let openrouter = deps.openrouter;

  const build = (key: keyof EditorialGenerators): TextGenerator => {
    const supplied = given[key];
    if (supplied) return supplied;

    openrouter ??= createOpenRouterClient();
    const setup = ROLE_SETUP[key];
    return createTextGenerator({
      model: openrouter(getModel(setup.role)),
      system: setup.system,
      temperature: setup.temperature,
      label: setup.label,
      ...(deps.generateText ? { generateText: deps.generateText } : {}),
    });
  };

  return {
    research: build('research'),
    writer: build('writer'),
    editor: build('editor'),
    factChecker: build('factChecker'),
    authenticity: build('authenticity'),
    rewriter: build('rewriter'),
    humanizer: build('humanizer'),
    layout: build('layout'),
    formatter: build('formatter'),
  };
}

// ============================================================================
// Wiring
// ============================================================================

interface Components {
  readonly research: ResearchCoordinator;
  readonly draftWriter: DraftWriter;
  readonly rewriter: Rewriter;
  readonly panel: ReviewPanel;
  readonly postProcessor: PostProcessorDeps;
}

interface RunContext {
  readonly log: ContextualLogger;
  readonly progress: ProgressTracker;
  readonly timer: PhaseTimer;
  readonly clock: Clock;
  readonly startedAt: number;
  readonly correlationId: string;
  readonly outputDir: string;
}

function resolveOutputDir(options: EditorialWorkflowOptions): string {
  return options.outputDir ?? (process.env.OUTPUT_DIR || WORKFLOW_CONFIG.DEFAULT_OUTPUT_DIR);
}

function createRunContext(topic: string, options: EditorialWorkflowOptions): RunContext {
  const clock = options.clock ?? systemClock;
  const correlationId = options.correlationId ?? generateCorrelationId();
  return {
    log: createContextualLogger('[Editorial]', { correlationId, topic }),
    progress: new ProgressTracker(options.onProgress),
    timer: new PhaseTimer(clock),
    clock,
    startedAt: clock.now(),
    correlationId,
    outputDir: resolveOutputDir(options),
  };
}

function buildComponents(
  deps: EditorialWorkflowDeps,
  options: EditorialWorkflowOptions,
  ctx: RunContext
): Components {
  const generators = resolveGenerators(deps);
  const log = ctx.log;
  const retry = options.retry;
  const gateway = deps.gateway ?? createSourceGateway({ logger: log.child({ component: 'sources' }) });
  const cache = deps.cache ?? new FileResearchCache(ctx.outputDir, log);

  return {
    research: createResearchCoordinator({
      gateway,
      generator: generators.research,
      cache,
      clock: ctx.clock,
      logger: log,
      ...(deps.memory ? { memory: deps.memory } : {}),
      ...(retry ? { retry } : {}),
    }),
    draftWriter: createDraftWriter({ generator: generators.writer, logger: log, ...(retry ? { retry } : {}) }),
    rewriter: createRewriter({ generator: generators.rewriter, logger: log, ...(retry ? { retry } : {}) }),
    panel: {
      editor: createEditorReviewer({ generator: generators.editor, logger: log, ...(retry ? { retry } : {}) }),
      factChecker: createFactCheckerReviewer({
        generator: generators.factChecker,
        gateway,
        logger: log,
        ...(retry ? { retry } : {}),
      }),
      authenticity: createAuthenticityReviewer({
        generator: generators.authenticity,
        logger: log,
        ...(retry ? { retry } : {}),
      }),
    },
    postProcessor: {
      humanizer: generators.humanizer,
      layout: generators.layout,
      formatter: generators.formatter,
      logger: log,
      ...(retry ? { retry } : {}),
    },
  };
}

function createController(
  components: Components,
  store: RevisionStore,
  deps: EditorialWorkflowDeps,
  ctx: RunContext
): RevisionController {
  return new RevisionController({
    panel: components.panel,
    rewriter: components.rewriter,
    research: components.research,
    store,
    logger: ctx.log,
    progress: ctx.progress,
    timer: ctx.timer,
    ...(deps.memory ? { memory: deps.memory } : {}),
  });
}

// ============================================================================
// Phase Helpers
// ============================================================================

/**
 * Runs a phase, wrapping unexpected failures with the phase's error code.
 * Errors that already carry a workflow code pass through unchanged.
 */
async function runPhase<T>(
  phaseName: string,
  errorCode: EditorialWorkflowErrorCode,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isEditorialWorkflowError(error)) throw error;
    throw new EditorialWorkflowError(
      errorCode,
      `Editorial workflow failed during ${phaseName}: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}

async function finalize(
  topic: string,
  loop: RevisionLoopOutcome,
  findingsCount: number,
  components: Components,
  store: RevisionStore,
  ctx: RunContext,
  resumedFromVersion?: number
): Promise<WorkflowResult> {
  const { log, progress, timer } = ctx;

  progress.startPhase('finalize');
  timer.start('finalize');

  const finalArticle = await humanizeArticle(loop.article, components.postProcessor);
  await store.saveFinalArticle(finalArticle);
  await store.saveHistory(loop.history);

  const publication = await preparePublication(finalArticle, components.postProcessor);
  await store.savePublication(publication);

  timer.end('finalize');
  progress.completePhase('finalize', `Saved to ${store.runDir}`);

  const { round } = loop;
  const editorReady = !round.editor.parseFailed && isEditorReadyForReport(round.editor.grade);
  const factCheckReady = loop.gate.factCheckReady;
  const authenticityReady = loop.gate.authenticityReady;
  const readyToPublish = editorReady && factCheckReady && authenticityReady;

  const phaseDurations: Record<EditorialPhase, number> = { ...timer.getDurations() };
  const totalDurationMs = ctx.clock.now() - ctx.startedAt;

  log.info(
    `=== Finished "${topic}": grade ${round.editor.grade}, fact-check ${round.factCheck.score}, ` +
      `authenticity ${round.authenticity.score}, ${loop.cycles} cycle(s), ` +
      `${readyToPublish ? 'ready to publish' : 'NOT ready to publish'} (${totalDurationMs}ms) ===`
  );

  return {
    topic,
    outputDir: store.runDir,
    finalArticle,
    editorGrade: round.editor.grade,
    editorReady,
    factCheckScore: round.factCheck.score,
    factCheckReady,
    authenticityScore: round.authenticity.score,
    authenticityReady,
    readyToPublish,
    requiresManualReview: loop.capReached,
    totalRevisions: loop.cycles,
    revisionHistory: loop.history,
    publication,
    metadata: {
      correlationId: ctx.correlationId,
      startedAt: new Date(ctx.startedAt).toISOString(),
      totalDurationMs,
      phaseDurations,
      findingsCount,
      ...(resumedFromVersion !== undefined ? { resumedFromVersion } : {}),
    },
  };
}

// ============================================================================
// Entry Points
// ============================================================================

/**
 * Researches, drafts, reviews and revises an article about `topic`.
 *
 * @throws EditorialWorkflowError INVALID_TOPIC for an empty topic
 * @throws EditorialWorkflowError CONFIG_ERROR if OPENROUTER_API_KEY is needed but missing
 * @throws EditorialWorkflowError RESEARCH_FAILED, DRAFT_FAILED, REVIEW_FAILED or
 * REWRITE_FAILED when a phase fails after retries
 */
export async function runEditorialWorkflow(
  topic: string,
  deps: EditorialWorkflowDeps = {},
  options: EditorialWorkflowOptions = {}
): Promise<WorkflowResult> {
  const trimmedTopic = topic.trim();
  if (trimmedTopic.length === 0) {
    throw new EditorialWorkflowError('INVALID_TOPIC', 'Topic must not be empty');
  }

  const ctx = createRunContext(trimmedTopic, options);
  const components = buildComponents(deps, options, ctx);
  const { log, progress, timer } = ctx;

  log.info(`=== Starting editorial workflow for "${trimmedTopic}" ===`);
  const store = await RevisionStore.create(ctx.outputDir, trimmedTopic, { clock: ctx.clock, logger: log });
  log.info(`Run directory: ${store.runDir}`);

  progress.startPhase('research');
  const research = await timer.measure('research', () =>
    runPhase('research', 'RESEARCH_FAILED', () =>
      components.research.research(trimmedTopic, { useCache: options.useCache ?? true })
    )
  );
  progress.completePhase(
    'research',
    `${research.findings.length} findings, confidence ${research.confidence.toFixed(2)}`
  );

  progress.startPhase('draft');
  const draft = await timer.measure('draft', () =>
    runPhase('draft', 'DRAFT_FAILED', () => components.draftWriter.draft(trimmedTopic, research.findings))
  );
  await store.saveArticle(1, draft);
  progress.completePhase('draft', `Draft saved (${draft.length} chars)`);

  const controller = createController(components, store, deps, ctx);
  const loop = await runPhase('revision', 'REVIEW_FAILED', () =>
    controller.run(
      { topic: trimmedTopic, article: draft, version: 1, findings: research.findings },
      {
        ...(options.safetyCap !== undefined ? { safetyCap: options.safetyCap } : {}),
        ...(options.parallelReviews !== undefined ? { parallelReviews: options.parallelReviews } : {}),
      }
    )
  );

  return finalize(trimmedTopic, loop, research.findings.length + loop.newFindings.length, components, store, ctx);
}

/**
 * Continues a saved run from `article_v<N>.md`: one rewrite driven by the
 * saved verdicts for version N (and `userFeedback`, which outranks them),
 * then the normal review loop.
 *
 * @throws EditorialWorkflowError RESUME_INVALID for a bad path, an unknown
 * topic or a malformed verdict file
 * @throws EditorialWorkflowError RESUME_NOT_FOUND when the article file does not exist
 */
export async function resumeEditorialWorkflow(
  articlePath: string,
  userFeedback?: string,
  deps: EditorialWorkflowDeps = {},
  options: EditorialWorkflowOptions = {}
): Promise<WorkflowResult> {
  const point = await RevisionStore.openForResume(articlePath);
  const ctx = createRunContext(point.topic, options);
  const components = buildComponents(deps, options, ctx);
  const { log } = ctx;

  log.info(`=== Resuming "${point.topic}" from version ${point.version} ===`);
  const store = new RevisionStore(point.runDir, log);
  const verdicts = await store.loadVerdicts(point.version);
  const history = await store.loadHistory();
  const findings: readonly Finding[] = await components.research.cachedFindings(point.topic);
  log.info(`Loaded ${findings.length} cached finding(s)`);

  const controller = createController(components, store, deps, ctx);
  const resumed = await runPhase('rewrite', 'REWRITE_FAILED', () =>
    controller.resumeRewrite({
      topic: point.topic,
      article: point.article,
      version: point.version,
      verdicts,
      findings,
      ...(userFeedback ? { userFeedback } : {}),
    })
  );

  const loop = await runPhase('revision', 'REVIEW_FAILED', () =>
    controller.run(
      {
        topic: point.topic,
        article: resumed.article,
        version: resumed.version,
        findings: [...findings, ...resumed.newFindings],
        history,
        ...(verdicts.factCheck ? { previousFactCheck: verdicts.factCheck } : {}),
      },
      {
        ...(options.safetyCap !== undefined ? { safetyCap: options.safetyCap } : {}),
        ...(options.parallelReviews !== undefined ? { parallelReviews: options.parallelReviews } : {}),
      }
    )
  );

  const findingsCount = findings.length + resumed.newFindings.length + loop.newFindings.length;
  return finalize(point.topic, loop, findingsCount, components, store, ctx, point.version);
}
