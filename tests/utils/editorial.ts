/**
 * Editorial Workflow Test Utilities
 *
 * Scripted generators, stub gateways, silent loggers and verdict builders
 * shared by unit and integration tests.
 */

import { vi, type Mock } from 'vitest';

import type { GenerateOptions, TextGenerator } from '../../src/ai/articles/generation';
import type { SourceGateway } from '../../src/ai/articles/source-gateway';
import type {
  AuthenticityVerdict,
  EditorVerdict,
  FactCheckVerdict,
  Issue,
  ReviewRound,
} from '../../src/ai/articles/types';
import type { Logger } from '../../src/utils/logger';

// ============================================================================
// Logging & Retry
// ============================================================================

type LogFn = Mock<(message: string) => void>;

export interface MockLogger extends Logger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
}

export function createMockLogger(): MockLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

/** Retry settings that never wait */
export const NO_WAIT_RETRY = { sleep: async (): Promise<void> => {} };

// ============================================================================
// Generators
// ============================================================================

export interface ScriptedGenerator extends TextGenerator {
  readonly generate: Mock<(prompt: string, options?: GenerateOptions) => Promise<string>>;
  /** Prompts received so far, in call order */
  readonly prompts: string[];
}

/**
 * A generator that answers with the scripted responses in order. An Error in
 * the script is thrown instead of returned. Running out of script is an
 * error too, so a test notices unexpected extra calls.
 */
export function scriptedGenerator(responses: ReadonlyArray<string | Error>, label = 'generator'): ScriptedGenerator {
  const queue = [...responses];
  const prompts: string[] = [];
  const generate = vi.fn(async (prompt: string, _options?: GenerateOptions): Promise<string> => {
    prompts.push(prompt);
    const next = queue.shift();
    if (next === undefined) {
      throw new Error(`No scripted response left for ${label}`);
    }
    if (next instanceof Error) throw next;
    return next;
  });
  return { generate, prompts };
}

/**
 * A generator that always returns the same text.
 */
export function constantGenerator(text: string): ScriptedGenerator {
  const prompts: string[] = [];
  const generate = vi.fn(async (prompt: string, _options?: GenerateOptions): Promise<string> => {
    prompts.push(prompt);
    return text;
  });
  return { generate, prompts };
}

// ============================================================================
// Gateway
// ============================================================================

/**
 * Gateway whose every lookup comes back empty unless overridden.
 */
export function createStubGateway(overrides: Partial<SourceGateway> = {}): SourceGateway {
  return {
    searchWeb: vi.fn(async () => []),
    searchNews: vi.fn(async () => []),
    searchEncyclopedia: vi.fn(async () => ({ ok: false as const, error: 'stubbed' })),
    queryKnowledgeBase: vi.fn(async () => []),
    fetchAndExtract: vi.fn(async (url: string) => ({ ok: false as const, url, error: 'stubbed' })),
    verifyUrl: vi.fn(async (url: string) => ({ url, status: 'error' as const, accessible: false })),
    findAlternativeSources: vi.fn(async () => []),
    ...overrides,
  };
}

// ============================================================================
// Reviewer Responses (model output)
// ============================================================================

export function editorJson(grade: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    overall_assessment: `Grade ${grade} draft`,
    grade,
    thesis: 'Storage decides how far renewables can go',
    strengths: ['Clear structure'],
    critical_issues: [],
    improvements: [],
    line_edits: [],
    red_flags: [],
    ...extra,
  });
}

export function factCheckJson(score: number, issues: readonly Record<string, unknown>[] = []): string {
  return JSON.stringify({
    overall_assessment: `Verification score ${score}`,
    verification_score: score,
    issues,
    verified_sources: [],
    unverified_claims: [],
    statistics_check: 'ok',
    required_corrections: [],
  });
}

export function authenticityJson(
  score: number,
  patterns: readonly Record<string, unknown>[] = [],
  readyToPublish?: boolean
): string {
  return JSON.stringify({
    overall_assessment: `Authenticity ${score}`,
    authenticity_score: score,
    ai_patterns_found: patterns,
    recommendations: [],
    ...(readyToPublish !== undefined ? { ready_to_publish: readyToPublish } : {}),
  });
}

// ============================================================================
// Verdict Builders
// ============================================================================

export function buildEditorVerdict(overrides: Partial<EditorVerdict> = {}): EditorVerdict {
  return {
    role: 'editor',
    ready: true,
    assessment: 'Solid',
    issues: [],
    parseFailed: false,
    grade: 'A',
    thesis: 'Storage decides how far renewables can go',
    strengths: [],
    criticalIssues: [],
    improvements: [],
    lineEdits: [],
    redFlags: [],
    ...overrides,
  };
}

export function buildFactCheckVerdict(overrides: Partial<FactCheckVerdict> = {}): FactCheckVerdict {
  return {
    role: 'fact_checker',
    ready: true,
    assessment: 'Verified',
    issues: [],
    parseFailed: false,
    score: 90,
    verifiedSources: [],
    unverifiedClaims: [],
    statisticsCheck: '',
    requiredCorrections: [],
    extractedUrls: [],
    extractedStatistics: [],
    ...overrides,
  };
}

export function buildAuthenticityVerdict(overrides: Partial<AuthenticityVerdict> = {}): AuthenticityVerdict {
  return {
    role: 'authenticity',
    ready: true,
    assessment: 'Reads as human',
    issues: [],
    parseFailed: false,
    score: 90,
    patterns: [],
    recommendations: [],
    ...overrides,
  };
}

export function buildRound(overrides: Partial<ReviewRound> = {}): ReviewRound {
  return {
    editor: buildEditorVerdict(),
    factCheck: buildFactCheckVerdict(),
    authenticity: buildAuthenticityVerdict(),
    ...overrides,
  };
}

export function issue(severity: Issue['severity'], text: string, extra: Partial<Issue> = {}): Issue {
  return { severity, type: 'accuracy', location: '', issue: text, ...extra };
}
