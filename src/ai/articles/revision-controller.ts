/**
 * Revision Controller
 *
 * Drives the review → gate → (targeted research) → rewrite cycle until all
 * three reviewers approve or the cycle cap for this run is reached.
 *
 * Versioning: a cycle reviews version N and persists its verdicts as *_vN;
 * the rewrite becomes version N+1.
 */

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import type { ResearchCoordinator } from './agents/researcher';
import { extractResearchRequests } from './agents/researcher';
import { runReviewPanel, type ReviewPanel } from './agents/reviewer';
import type { Rewriter } from './agents/writer';
import { WORKFLOW_CONFIG } from './config';
import type { ResearchMemory } from './memory';
import { createPhaseTimer, type PhaseTimer } from './phase-timer';
import { createNoOpProgressTracker, type ProgressTracker } from './progress-tracker';
import {
  buildRevisionRecord,
  evaluateGate,
  mergeIssues,
  shouldTriggerResearch,
  type GateEvaluation,
} from './revision-gates';
import type { LoadedVerdicts, RevisionStore } from './revision-store';
import type {
  CombinedFeedback,
  FactCheckVerdict,
  Finding,
  ReviewRound,
  RevisionRecord,
} from './types';

// ============================================================================
// Types
// ============================================================================

export interface RevisionControllerDeps {
  readonly panel: ReviewPanel;
  readonly rewriter: Rewriter;
  readonly research: Pick<ResearchCoordinator, 'targetedResearch'>;
  readonly store: RevisionStore;
  readonly memory?: ResearchMemory;
  readonly logger?: Logger;
  readonly progress?: ProgressTracker;
  readonly timer?: PhaseTimer;
}

export interface RevisionLoopOptions {
  /** Maximum review cycles in this run (default: WORKFLOW_CONFIG.SAFETY_CAP) */
  readonly safetyCap?: number;
  /** Run the three reviewers concurrently */
  readonly parallelReviews?: boolean;
}

export interface RevisionLoopInput {
  readonly topic: string;
  readonly article: string;
  readonly version: number;
  /** Research findings available to reviewers */
  readonly findings: readonly Finding[];
  readonly previousFactCheck?: FactCheckVerdict;
  /** History carried over from an earlier run in the same directory */
  readonly history?: readonly RevisionRecord[];
}

export interface RevisionLoopOutcome {
  /** Last reviewed article */
  readonly article: string;
  readonly version: number;
  readonly round: ReviewRound;
  readonly gate: GateEvaluation;
  /** Review cycles run in this call */
  readonly cycles: number;
  readonly capReached: boolean;
  readonly history: readonly RevisionRecord[];
  /** Findings from targeted research during this call */
  readonly newFindings: readonly Finding[];
}

export interface ResumeRewriteInput {
  readonly topic: string;
  readonly article: string;
  readonly version: number;
  readonly verdicts: LoadedVerdicts;
  readonly findings: readonly Finding[];
  readonly userFeedback?: string;
}

export interface ResumeRewriteOutcome {
  readonly article: string;
  readonly version: number;
  readonly newFindings: readonly Finding[];
}

// ============================================================================
// Feedback
// ============================================================================

export function buildCombinedFeedback(
  verdicts: LoadedVerdicts,
  newFindings: readonly Finding[],
  userFeedback?: string
): CombinedFeedback {
  const trimmed = userFeedback?.trim();
  return {
    ...(verdicts.editor ? { editor: verdicts.editor } : {}),
    ...(verdicts.factCheck ? { factCheck: verdicts.factCheck } : {}),
    ...(verdicts.authenticity ? { authenticity: verdicts.authenticity } : {}),
    mergedIssues: mergeIssues(verdicts.editor, verdicts.factCheck, verdicts.authenticity),
    newFindings,
    ...(trimmed ? { userFeedback: trimmed } : {}),
  };
}

// ============================================================================
// Controller
// ============================================================================

export class RevisionController {
  private readonly log: Logger;
  private readonly progress: ProgressTracker;
  private readonly timer: PhaseTimer;

  constructor(private readonly deps: RevisionControllerDeps) {
    this.log = deps.logger ?? createPrefixedLogger('[Revision]');
    this.progress = deps.progress ?? createNoOpProgressTracker();
    this.timer = deps.timer ?? createPhaseTimer();
  }

  /**
   * Runs targeted research when the fact-check calls for it. Returns the new
   * findings (possibly none).
   */
  private async researchIfNeeded(verdicts: LoadedVerdicts): Promise<Finding[]> {
    if (!verdicts.factCheck || !shouldTriggerResearch(verdicts.factCheck)) return [];

    const requests = extractResearchRequests(verdicts.factCheck, verdicts.editor);
    if (requests.length === 0) {
      this.log.info('Research triggered but no claims could be extracted, skipping');
      return [];
    }

    this.log.info(`Running targeted research for ${requests.length} flagged claim(s)`);
    return this.deps.research.targetedResearch(requests);
  }

  private async rememberFeedback(topic: string, revision: number, feedback: CombinedFeedback): Promise<void> {
    if (!this.deps.memory) return;
    try {
      await this.deps.memory.rememberFeedback(topic, revision, feedback);
    } catch (error) {
      this.log.warn(`Feedback memory write failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async rewrite(
    topic: string,
    article: string,
    version: number,
    feedback: CombinedFeedback
  ): Promise<string> {
    this.progress.startPhase('rewrite', `Writing version ${version + 1}`);
    const next = await this.timer.measure('rewrite', () => this.deps.rewriter.rewrite(article, topic, feedback));
    await this.deps.store.saveArticle(version + 1, next);
    this.progress.completePhase('rewrite', `Version ${version + 1} written`);
    return next;
  }

  /**
   * One rewrite of a persisted version, driven by its saved verdicts and
   * optional user feedback. Produces version N+1.
   */
  async resumeRewrite(input: ResumeRewriteInput): Promise<ResumeRewriteOutcome> {
    const newFindings = await this.researchIfNeeded(input.verdicts);
    const feedback = buildCombinedFeedback(input.verdicts, newFindings, input.userFeedback);
    await this.rememberFeedback(input.topic, input.version, feedback);

    this.log.info(`Resuming from version ${input.version}${feedback.userFeedback ? ' with user feedback' : ''}`);
    const article = await this.rewrite(input.topic, input.article, input.version, feedback);
    return { article, version: input.version + 1, newFindings };
  }

  /**
   * Reviews and rewrites until the gate passes or `safetyCap` cycles have run.
   * Hitting the cap ends the loop without a further rewrite.
   */
  async run(input: RevisionLoopInput, options: RevisionLoopOptions = {}): Promise<RevisionLoopOutcome> {
    const cap = options.safetyCap ?? WORKFLOW_CONFIG.SAFETY_CAP;
    const history: RevisionRecord[] = [...(input.history ?? [])];
    const newFindings: Finding[] = [];

    let article = input.article;
    let version = input.version;
    let previousFactCheck = input.previousFactCheck;
    let cycles = 0;

    for (;;) {
      cycles++;
      this.progress.reportCycle('review', cycles, cap, `Reviewing version ${version}`);

      const round = await this.timer.measure('review', () =>
        runReviewPanel(
          this.deps.panel,
          article,
          input.topic,
          {
            revision: version,
            ...(previousFactCheck ? { previousFactCheck } : {}),
            findings: [...input.findings, ...newFindings],
          },
          options.parallelReviews ?? false
        )
      );

      await this.deps.store.saveVerdict(version, round.editor);
      await this.deps.store.saveVerdict(version, round.factCheck);
      await this.deps.store.saveVerdict(version, round.authenticity);

      history.push(buildRevisionRecord(version, round));
      await this.deps.store.saveHistory(history);

      const gate = evaluateGate(round);
      this.log.info(
        `Version ${version}: editor ${round.editor.grade} (${gate.editorReady ? 'ready' : 'not ready'}), ` +
          `fact-check ${round.factCheck.score} (${gate.factCheckReady ? 'ready' : 'not ready'}), ` +
          `authenticity ${round.authenticity.score} (${gate.authenticityReady ? 'ready' : 'not ready'})`
      );

      if (gate.passed) {
        this.log.info(`All reviewers approved version ${version} after ${cycles} cycle(s)`);
        return { article, version, round, gate, cycles, capReached: false, history, newFindings };
      }

      if (cycles >= cap) {
        this.log.warn(`Reached ${cap} revision cycles without approval: manual review required`);
        return { article, version, round, gate, cycles, capReached: true, history, newFindings };
      }

      const found = await this.researchIfNeeded(round);
      newFindings.push(...found);

      const feedback = buildCombinedFeedback(round, newFindings);
      await this.rememberFeedback(input.topic, version, feedback);

      article = await this.rewrite(input.topic, article, version, feedback);
      version++;
      previousFactCheck = round.factCheck;
    }
  }
}
