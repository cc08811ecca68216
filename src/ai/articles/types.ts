/**
 * Editorial Workflow Types
 *
 * Shared data model for research, review and revision.
 */

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error codes for editorial workflow failures.
 */
export type EditorialWorkflowErrorCode =
  | 'CONFIG_ERROR'
  | 'INVALID_TOPIC'
  | 'RESUME_INVALID'
  | 'RESUME_NOT_FOUND'
  | 'RESEARCH_FAILED'
  | 'DRAFT_FAILED'
  | 'REVIEW_FAILED'
  | 'REWRITE_FAILED';

/**
 * Custom error class for editorial workflow failures.
 * Provides structured error information for programmatic handling.
 *
 * @example
 * try {
 *   await resumeEditorialWorkflow('output/run/article_v3.md');
 * } catch (error) {
 *   if (isEditorialWorkflowError(error) && error.code === 'RESUME_NOT_FOUND') {
 *     // Ask for another path
 *   }
 * }
 */
export class EditorialWorkflowError extends Error {
  readonly name = 'EditorialWorkflowError';

  constructor(
    readonly code: EditorialWorkflowErrorCode,
    message: string,
    readonly cause?: Error
  ) {
    super(message);
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EditorialWorkflowError);
    }
  }
}

/**
 * Type guard to check if an error is an EditorialWorkflowError.
 */
export function isEditorialWorkflowError(error: unknown): error is EditorialWorkflowError {
  return error instanceof EditorialWorkflowError;
}

// ============================================================================
// Research Types
// ============================================================================

export type FindingSource = 'web' | 'news' | 'encyclopedia' | 'knowledge_base' | 'targeted_search';

export type ResearchPriority = 'critical' | 'high' | 'medium';

/**
 * One atomic piece of retrieved information with provenance.
 */
export interface Finding {
  readonly source: FindingSource;
  readonly title: string;
  readonly content: string;
  readonly url?: string;
  readonly score?: number;
  /** background, knowledge_base, web, news or targeted_internet_search */
  readonly type: string;
  readonly relatedClaim?: string;
  readonly priority?: ResearchPriority;
}

export interface ResearchSynthesis {
  /** Confidence in [0, 1] that the findings cover the topic */
  readonly confidence: number;
  /** Open questions to research in the next iteration */
  readonly gaps: readonly string[];
}

export interface ResearchResult {
  readonly topic: string;
  readonly findings: readonly Finding[];
  readonly synthesis: ResearchSynthesis;
  readonly confidence: number;
  readonly iterations: number;
  /** ISO timestamp of when the research completed */
  readonly timestamp: string;
}

/**
 * A claim flagged during review that needs narrow, targeted research.
 */
export interface ResearchRequest {
  readonly claim: string;
  readonly issue: string;
  readonly correction?: string;
  readonly priority: ResearchPriority;
}

// ============================================================================
// Review Types
// ============================================================================

export type ReviewerRole = 'editor' | 'fact_checker' | 'authenticity';

export type IssueSeverity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

export interface Issue {
  readonly severity: IssueSeverity;
  readonly type: string;
  readonly location: string;
  readonly issue: string;
  readonly correction?: string;
  readonly verified?: boolean;
}

interface VerdictBase<R extends ReviewerRole> {
  readonly role: R;
  readonly ready: boolean;
  readonly assessment: string;
  readonly issues: readonly Issue[];
  /** True when the reviewer output could not be parsed; `ready` is then false */
  readonly parseFailed: boolean;
  /** Raw generation output, kept for human inspection when parsing failed */
  readonly rawResponse?: string;
}

export interface EditorImprovement {
  readonly section: string;
  readonly issue: string;
  readonly suggestion: string;
  readonly example?: string;
}

export interface LineEdit {
  readonly original: string;
  readonly revised: string;
  readonly reason: string;
}

export interface EditorVerdict extends VerdictBase<'editor'> {
  /** Letter grade, e.g. "A-", or "N/A" when parsing failed */
  readonly grade: string;
  readonly thesis: string;
  readonly strengths: readonly string[];
  /** Ranked, most important first */
  readonly criticalIssues: readonly string[];
  readonly improvements: readonly EditorImprovement[];
  readonly lineEdits: readonly LineEdit[];
  readonly redFlags: readonly string[];
}

export interface FactCheckVerdict extends VerdictBase<'fact_checker'> {
  /** 0-100 */
  readonly score: number;
  readonly verifiedSources: readonly string[];
  readonly unverifiedClaims: readonly string[];
  readonly statisticsCheck: string;
  readonly requiredCorrections: readonly string[];
  /** URLs found in the article text before review */
  readonly extractedUrls: readonly string[];
  /** Numeric/statistical phrases found in the article text before review */
  readonly extractedStatistics: readonly string[];
}

export interface AiPattern {
  readonly pattern: string;
  readonly severity: IssueSeverity;
  readonly example: string;
  readonly suggestion: string;
}

export interface AuthenticityVerdict extends VerdictBase<'authenticity'> {
  /** 0-100 */
  readonly score: number;
  readonly patterns: readonly AiPattern[];
  readonly recommendations: readonly string[];
}

export type ReviewVerdict = EditorVerdict | FactCheckVerdict | AuthenticityVerdict;

/**
 * Verdicts from one review cycle.
 */
export interface ReviewRound {
  readonly editor: EditorVerdict;
  readonly factCheck: FactCheckVerdict;
  readonly authenticity: AuthenticityVerdict;
}

/**
 * Read-only context handed to a reviewer alongside the article snapshot.
 */
export interface ReviewContext {
  readonly revision: number;
  /** Fact-check verdict from the previous cycle (never the current one) */
  readonly previousFactCheck?: FactCheckVerdict;
  /** Research pool plus targeted findings; the fact-checker sees the targeted ones */
  readonly findings?: readonly Finding[];
}

// ============================================================================
// Revision Types
// ============================================================================

export type MergedIssuePriority = 'CRITICAL' | 'HIGH' | 'MEDIUM';

export interface MergedIssue {
  readonly source: ReviewerRole;
  readonly priority: MergedIssuePriority;
  readonly issue: string;
}

/**
 * Everything the rewrite step receives for one revision.
 */
export interface CombinedFeedback {
  readonly editor?: EditorVerdict;
  readonly factCheck?: FactCheckVerdict;
  readonly authenticity?: AuthenticityVerdict;
  readonly mergedIssues: readonly MergedIssue[];
  /** Findings gathered by targeted research during this run */
  readonly newFindings: readonly Finding[];
  /** Free-text feedback from a person; outranks all automated feedback */
  readonly userFeedback?: string;
}

/**
 * Summary row per completed cycle. Append-only.
 */
export interface RevisionRecord {
  readonly revision: number;
  readonly editorGrade: string;
  readonly editorReady: boolean;
  readonly factCheckScore: number;
  readonly factCheckReady: boolean;
  readonly authenticityScore: number;
  readonly authenticityReady: boolean;
  readonly criticalIssueCount: number;
  readonly aiPatternCount: number;
}

// ============================================================================
// Workflow Types
// ============================================================================

export type EditorialPhase = 'research' | 'draft' | 'review' | 'rewrite' | 'finalize';

/**
 * Progress callback for the editorial workflow.
 *
 * @param phase - Current phase
 * @param progress - Progress within the phase (0-100)
 * @param message - Optional human-readable status
 */
export type EditorialProgressCallback = (
  phase: EditorialPhase,
  progress: number,
  message?: string
) => void;

export interface PublicationOutput {
  readonly markdown: string;
  readonly html?: string;
  readonly pullQuotes: readonly string[];
  readonly keyStatistics: readonly string[];
}

export interface WorkflowMetadata {
  readonly correlationId: string;
  readonly startedAt: string;
  readonly totalDurationMs: number;
  readonly phaseDurations: Readonly<Record<EditorialPhase, number>>;
  readonly findingsCount: number;
  readonly resumedFromVersion?: number;
}

export interface WorkflowResult {
  readonly topic: string;
  readonly outputDir: string;
  readonly finalArticle: string;
  readonly editorGrade: string;
  /** Final-report readiness: A+, A or A- (looser than the in-loop gate) */
  readonly editorReady: boolean;
  readonly factCheckScore: number;
  readonly factCheckReady: boolean;
  readonly authenticityScore: number;
  readonly authenticityReady: boolean;
  readonly readyToPublish: boolean;
  /** True when the loop stopped at the safety cap without passing the gate */
  readonly requiresManualReview: boolean;
  readonly totalRevisions: number;
  readonly revisionHistory: readonly RevisionRecord[];
  readonly publication: PublicationOutput;
  readonly metadata: WorkflowMetadata;
}

// ============================================================================
// Clock Abstraction (for testability)
// ============================================================================

/**
 * Clock interface for time-related operations.
 * Enables deterministic testing by allowing time to be mocked.
 *
 * @example
 * const mockClock: Clock = { now: () => 1234567890000 };
 */
export interface Clock {
  /** Returns current timestamp in milliseconds (like Date.now()) */
  now(): number;
}

/**
 * Default clock implementation using system time.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Creates a mock clock for testing.
 *
 * @param autoAdvance - If provided, advances time by this many ms on each call
 *
 * @example
 * const clock = createMockClock(1000000, 100);
 * clock.now(); // 1000000
 * clock.now(); // 1000100
 */
export function createMockClock(initialTime: number, autoAdvance?: number): Clock {
  let currentTime = initialTime;
  return {
    now: () => {
      const time = currentTime;
      if (autoAdvance !== undefined) {
        currentTime += autoAdvance;
      }
      return time;
    },
  };
}
