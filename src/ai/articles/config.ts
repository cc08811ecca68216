/**
 * Editorial Workflow Configuration
 *
 * Centralized configuration for research, review, revision and
 * post-processing. All magic numbers and tuning parameters live here.
 */

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Configuration validation error.
 * Thrown at module load time if configuration is inconsistent.
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(`Editorial workflow config error: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validates that a MIN value is less than or equal to MAX value.
 */
function validateMinMax(
  minValue: number,
  maxValue: number,
  minName: string,
  maxName: string
): void {
  if (minValue > maxValue) {
    throw new ConfigValidationError(
      `${minName} (${minValue}) cannot be greater than ${maxName} (${maxValue})`
    );
  }
}

/**
 * Validates that a value is positive.
 */
function validatePositive(value: number, name: string): void {
  if (value <= 0) {
    throw new ConfigValidationError(`${name} must be positive (got ${value})`);
  }
}

/**
 * Validates temperature is in valid range (0-2).
 */
function validateTemperature(value: number, name: string): void {
  if (value < 0 || value > 2) {
    throw new ConfigValidationError(`${name} must be between 0 and 2 (got ${value})`);
  }
}

function validateUnitInterval(value: number, name: string): void {
  if (value < 0 || value > 1) {
    throw new ConfigValidationError(`${name} must be between 0 and 1 (got ${value})`);
  }
}

// ============================================================================
// Research Configuration
// ============================================================================

export const RESEARCH_CONFIG = {
  /** Upper bound on research iterations per topic */
  MAX_ITERATIONS: 6,
  /** Research stops once synthesis confidence reaches this value */
  CONFIDENCE_THRESHOLD: 0.8,
  /** Confidence used when the synthesis output cannot be parsed */
  FALLBACK_CONFIDENCE: 0.5,
  WEB_RESULTS_PER_QUESTION: 3,
  KB_RESULTS_PER_QUESTION: 30,
  NEWS_RESULTS_PER_QUESTION: 5,
  /** Whitespace tokens of a claim used as the targeted search query */
  TARGETED_QUERY_TOKENS: 5,
  TARGETED_MAX_RESULTS: 3,
  /** Characters of each finding shown to the synthesis step */
  SYNTHESIS_SNIPPET_LENGTH: 600,
  TEMPERATURE: 0.3,
} as const;

// ============================================================================
// Review Configuration
// ============================================================================

export const REVIEW_CONFIG = {
  /** Grades that pass the in-loop approval gate */
  GATE_GRADES: ['A+', 'A'] as const,
  /** Grades reported as editor-ready in the final result */
  FINAL_REPORT_GRADES: ['A+', 'A', 'A-'] as const,
  /** Minimum fact-check score for readiness (also requires zero CRITICAL issues) */
  FACT_CHECK_READY_SCORE: 60,
  /** Fact-check scores below this trigger targeted research */
  RESEARCH_TRIGGER_SCORE: 80,
  /** Authenticity score used when the reviewer gives no explicit readiness */
  AUTHENTICITY_READY_SCORE: 80,
  MAX_EDITOR_CRITICAL_ISSUES: 3,
  EDITOR_TEMPERATURE: 0.3,
  FACT_CHECKER_TEMPERATURE: 0.1,
  AUTHENTICITY_TEMPERATURE: 0.2,
  /** Tool-call steps allowed per fact-check generation */
  FACT_CHECKER_MAX_TOOL_STEPS: 12,
  /** Targeted findings shown to the fact-checker per cycle */
  FACT_CHECK_CONTEXT_FINDINGS: 10,
  /** Characters of each finding's content shown to the fact-checker */
  FACT_CHECK_CONTEXT_CHARS: 400,
} as const;

// ============================================================================
// Workflow Configuration
// ============================================================================

export const WORKFLOW_CONFIG = {
  /**
   * Safety ceiling on review cycles per run. The approval gate is the real
   * stopping condition; reaching this flags the result for manual review.
   */
  SAFETY_CAP: 12,
  /** Base directory for research cache and run directories */
  DEFAULT_OUTPUT_DIR: 'output',
  RESEARCH_CACHE_DIRNAME: 'research_cache',
  /** Max fact-check issues listed in the rewrite summary */
  REWRITE_MAX_FACT_ISSUES: 10,
  /** Max AI-writing patterns listed in the rewrite summary */
  REWRITE_MAX_AI_PATTERNS: 5,
  /** Characters of each finding included in draft and rewrite prompts */
  FINDING_PROMPT_LENGTH: 1500,
  /** Findings included in the draft prompt */
  DRAFT_MAX_FINDINGS: 40,
  WRITER_TEMPERATURE: 0.7,
  REWRITER_TEMPERATURE: 0.5,
  HUMANIZER_TEMPERATURE: 0.7,
  LAYOUT_TEMPERATURE: 0.3,
  FORMATTER_TEMPERATURE: 0.2,
} as const;

// ============================================================================
// Source Configuration
// ============================================================================

export const SOURCE_CONFIG = {
  USER_AGENT: 'EditorialPipeline/1.0',
  FETCH_TIMEOUT_MS: 15_000,
  /** Redirect hops followed per page fetch, each re-checked against the URL guard */
  MAX_REDIRECTS: 5,
  SEARCH_TIMEOUT_MS: 30_000,
  MAX_EXTRACTED_CONTENT_LENGTH: 8000,
  VERIFY_SNIPPET_LENGTH: 500,
  ALTERNATIVE_SNIPPET_LENGTH: 200,
  ALTERNATIVE_SEARCH_RESULTS: 5,
  MAX_ALTERNATIVES: 3,
  ENCYCLOPEDIA_SENTENCES: 5,
  DEFAULT_KB_RESULTS: 30,
  DEFAULT_NEWS_RESULTS: 10,
  DEFAULT_NEWS_COUNTRY: 'US',
  DEFAULT_NEWS_LANG: 'en',
} as const;

// ============================================================================
// Retry Configuration
// ============================================================================

export const RETRY_CONFIG = {
  /** Total attempts, including the first call */
  MAX_ATTEMPTS: 3,
  /** Delay before the first retry; doubles on each further retry */
  INITIAL_DELAY_MS: 10_000,
  /** Multiplier for exponential backoff */
  BACKOFF_MULTIPLIER: 2,
} as const;

// ============================================================================
// Generation Configuration
// ============================================================================

export const GENERATION_CONFIG = {
  /** Generation calls are slow and expensive; tolerate very long responses */
  TIMEOUT_MS: 2 * 60 * 60 * 1000,
  MAX_OUTPUT_TOKENS: 16_000,
  DEFAULT_OPENROUTER_BASE_URL: 'https://openrouter.ai/api/v1',
} as const;

// ============================================================================
// Aggregated Configuration
// ============================================================================

/**
 * All configuration in one object, for consumers that need several groups.
 */
export const CONFIG = {
  research: RESEARCH_CONFIG,
  review: REVIEW_CONFIG,
  workflow: WORKFLOW_CONFIG,
  source: SOURCE_CONFIG,
  retry: RETRY_CONFIG,
  generation: GENERATION_CONFIG,
} as const;

// ============================================================================
// Runtime Configuration Validation
// ============================================================================

/**
 * Validates all configuration values at module load time.
 * Throws ConfigValidationError if any values are inconsistent.
 */
function validateConfiguration(): void {
  // Research
  validatePositive(RESEARCH_CONFIG.MAX_ITERATIONS, 'RESEARCH_CONFIG.MAX_ITERATIONS');
  validateUnitInterval(RESEARCH_CONFIG.CONFIDENCE_THRESHOLD, 'RESEARCH_CONFIG.CONFIDENCE_THRESHOLD');
  validateUnitInterval(RESEARCH_CONFIG.FALLBACK_CONFIDENCE, 'RESEARCH_CONFIG.FALLBACK_CONFIDENCE');
  validatePositive(RESEARCH_CONFIG.WEB_RESULTS_PER_QUESTION, 'RESEARCH_CONFIG.WEB_RESULTS_PER_QUESTION');
  validatePositive(RESEARCH_CONFIG.KB_RESULTS_PER_QUESTION, 'RESEARCH_CONFIG.KB_RESULTS_PER_QUESTION');
  validatePositive(RESEARCH_CONFIG.NEWS_RESULTS_PER_QUESTION, 'RESEARCH_CONFIG.NEWS_RESULTS_PER_QUESTION');
  validatePositive(RESEARCH_CONFIG.TARGETED_QUERY_TOKENS, 'RESEARCH_CONFIG.TARGETED_QUERY_TOKENS');
  validatePositive(RESEARCH_CONFIG.TARGETED_MAX_RESULTS, 'RESEARCH_CONFIG.TARGETED_MAX_RESULTS');
  validateTemperature(RESEARCH_CONFIG.TEMPERATURE, 'RESEARCH_CONFIG.TEMPERATURE');

  // Review
  validateMinMax(
    REVIEW_CONFIG.FACT_CHECK_READY_SCORE,
    REVIEW_CONFIG.RESEARCH_TRIGGER_SCORE,
    'REVIEW_CONFIG.FACT_CHECK_READY_SCORE',
    'REVIEW_CONFIG.RESEARCH_TRIGGER_SCORE'
  );
  validateMinMax(REVIEW_CONFIG.RESEARCH_TRIGGER_SCORE, 100, 'REVIEW_CONFIG.RESEARCH_TRIGGER_SCORE', '100');
  validateMinMax(REVIEW_CONFIG.AUTHENTICITY_READY_SCORE, 100, 'REVIEW_CONFIG.AUTHENTICITY_READY_SCORE', '100');
  for (const grade of REVIEW_CONFIG.GATE_GRADES) {
    if (!REVIEW_CONFIG.FINAL_REPORT_GRADES.some((g) => g === grade)) {
      throw new ConfigValidationError(`REVIEW_CONFIG.FINAL_REPORT_GRADES must include gate grade ${grade}`);
    }
  }
  validatePositive(REVIEW_CONFIG.MAX_EDITOR_CRITICAL_ISSUES, 'REVIEW_CONFIG.MAX_EDITOR_CRITICAL_ISSUES');
  validateTemperature(REVIEW_CONFIG.EDITOR_TEMPERATURE, 'REVIEW_CONFIG.EDITOR_TEMPERATURE');
  validateTemperature(REVIEW_CONFIG.FACT_CHECKER_TEMPERATURE, 'REVIEW_CONFIG.FACT_CHECKER_TEMPERATURE');
  validateTemperature(REVIEW_CONFIG.AUTHENTICITY_TEMPERATURE, 'REVIEW_CONFIG.AUTHENTICITY_TEMPERATURE');
  validatePositive(REVIEW_CONFIG.FACT_CHECKER_MAX_TOOL_STEPS, 'REVIEW_CONFIG.FACT_CHECKER_MAX_TOOL_STEPS');

  // Workflow
  validatePositive(WORKFLOW_CONFIG.SAFETY_CAP, 'WORKFLOW_CONFIG.SAFETY_CAP');
  validatePositive(WORKFLOW_CONFIG.REWRITE_MAX_FACT_ISSUES, 'WORKFLOW_CONFIG.REWRITE_MAX_FACT_ISSUES');
  validatePositive(WORKFLOW_CONFIG.REWRITE_MAX_AI_PATTERNS, 'WORKFLOW_CONFIG.REWRITE_MAX_AI_PATTERNS');
  validatePositive(WORKFLOW_CONFIG.FINDING_PROMPT_LENGTH, 'WORKFLOW_CONFIG.FINDING_PROMPT_LENGTH');
  validatePositive(WORKFLOW_CONFIG.DRAFT_MAX_FINDINGS, 'WORKFLOW_CONFIG.DRAFT_MAX_FINDINGS');
  validateTemperature(WORKFLOW_CONFIG.WRITER_TEMPERATURE, 'WORKFLOW_CONFIG.WRITER_TEMPERATURE');
  validateTemperature(WORKFLOW_CONFIG.REWRITER_TEMPERATURE, 'WORKFLOW_CONFIG.REWRITER_TEMPERATURE');
  validateTemperature(WORKFLOW_CONFIG.HUMANIZER_TEMPERATURE, 'WORKFLOW_CONFIG.HUMANIZER_TEMPERATURE');
  validateTemperature(WORKFLOW_CONFIG.LAYOUT_TEMPERATURE, 'WORKFLOW_CONFIG.LAYOUT_TEMPERATURE');
  validateTemperature(WORKFLOW_CONFIG.FORMATTER_TEMPERATURE, 'WORKFLOW_CONFIG.FORMATTER_TEMPERATURE');

  // Sources
  validatePositive(SOURCE_CONFIG.FETCH_TIMEOUT_MS, 'SOURCE_CONFIG.FETCH_TIMEOUT_MS');
  validatePositive(SOURCE_CONFIG.SEARCH_TIMEOUT_MS, 'SOURCE_CONFIG.SEARCH_TIMEOUT_MS');
  validatePositive(SOURCE_CONFIG.MAX_REDIRECTS, 'SOURCE_CONFIG.MAX_REDIRECTS');
  validatePositive(SOURCE_CONFIG.MAX_EXTRACTED_CONTENT_LENGTH, 'SOURCE_CONFIG.MAX_EXTRACTED_CONTENT_LENGTH');
  validateMinMax(
    SOURCE_CONFIG.MAX_ALTERNATIVES,
    SOURCE_CONFIG.ALTERNATIVE_SEARCH_RESULTS,
    'SOURCE_CONFIG.MAX_ALTERNATIVES',
    'SOURCE_CONFIG.ALTERNATIVE_SEARCH_RESULTS'
  );

  // Retry
  validatePositive(RETRY_CONFIG.MAX_ATTEMPTS, 'RETRY_CONFIG.MAX_ATTEMPTS');
  validatePositive(RETRY_CONFIG.INITIAL_DELAY_MS, 'RETRY_CONFIG.INITIAL_DELAY_MS');
  validatePositive(RETRY_CONFIG.BACKOFF_MULTIPLIER, 'RETRY_CONFIG.BACKOFF_MULTIPLIER');

  // Generation
  validatePositive(GENERATION_CONFIG.TIMEOUT_MS, 'GENERATION_CONFIG.TIMEOUT_MS');
  validatePositive(GENERATION_CONFIG.MAX_OUTPUT_TOKENS, 'GENERATION_CONFIG.MAX_OUTPUT_TOKENS');
}

// Run validation at module load time
validateConfiguration();
