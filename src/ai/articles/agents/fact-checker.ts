/**
 * Fact-Checker Reviewer
 *
 * Verifies claims, sources and statistics. Before calling the model it pulls
 * every URL and numeric phrase out of the article; during the call the model
 * may verify URLs and look for replacement sources through the gateway.
 */

import { tool, type ToolSet } from 'ai';
import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { REVIEW_CONFIG } from '../config';
import { getFactCheckerUserPrompt } from '../prompts/fact-checker-prompts';
import { isFactCheckReady } from '../revision-gates';
import type { AlternativeSource, SourceGateway } from '../source-gateway';
import type { FactCheckVerdict, Issue } from '../types';
import type { UrlVerification } from '../../tools/web-page';
import {
  runReviewerCall,
  ScoreSchema,
  SeveritySchema,
  StringListSchema,
  type Reviewer,
  type ReviewerDeps,
} from './reviewer';

// ============================================================================
// Types
// ============================================================================

export interface FactCheckerDeps extends ReviewerDeps {
  /** Enables the verify_url and find_alternative_source tools */
  readonly gateway?: SourceGateway;
}

export interface VerifiedUrl extends UrlVerification {
  /** Present when the URL is blocked */
  readonly alternatives?: readonly AlternativeSource[];
}

// ============================================================================
// Pre-pass Extraction
// ============================================================================

const URL_PATTERN = /https?:\/\/[^\s)]+/g;
const STATISTIC_PATTERN = /\$?[\d,]+\.?\d*\s*(?:trillion|billion|million|thousand|%|percent)/gi;

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

/**
 * URLs cited in the text, deduplicated in order of appearance. Trailing
 * sentence punctuation and a closing bracket are not part of the URL.
 */
export function extractUrls(text: string): string[] {
  return unique((text.match(URL_PATTERN) ?? []).map((url) => url.replace(/[\].,;:!?]+$/, '')));
}

/**
 * Numeric phrases with a magnitude or percentage, e.g. "$1.2 billion", "45%".
 */
export function extractStatistics(text: string): string[] {
  return unique((text.match(STATISTIC_PATTERN) ?? []).map((s) => s.trim()));
}

// ============================================================================
// Tools
// ============================================================================

/**
 * Verifies a URL; blocked URLs come back with alternative sources attached.
 */
export async function verifyUrlWithAlternatives(
  gateway: SourceGateway,
  url: string,
  claim?: string
): Promise<VerifiedUrl> {
  const verification = await gateway.verifyUrl(url);
  if (verification.status !== 'blocked') return verification;

  const alternatives = await gateway.findAlternativeSources(claim ?? verification.title ?? url, url);
  return { ...verification, alternatives };
}

export function createFactCheckTools(gateway: SourceGateway, log: Logger): ToolSet {
  return {
    verify_url: tool({
      description:
        'Check that a URL loads. Returns status (accessible, blocked, timeout, error), title and an excerpt. ' +
        'Blocked URLs include alternative sources.',
      inputSchema: z.object({
        url: z.string().describe('The URL to verify'),
        claim: z.string().optional().describe('The claim the URL is cited for'),
      }),
      execute: async ({ url, claim }) => {
        log.debug(`verify_url: ${url}`);
        return verifyUrlWithAlternatives(gateway, url, claim);
      },
    }),
    find_alternative_source: tool({
      description: 'Search for other sources that support a claim, excluding an unusable URL.',
      inputSchema: z.object({
        claim: z.string().describe('The claim that needs a source'),
        blocked_url: z.string().describe('The URL that could not be used'),
      }),
      execute: async ({ claim, blocked_url }) => {
        log.debug(`find_alternative_source: ${claim}`);
        return { alternatives: await gateway.findAlternativeSources(claim, blocked_url) };
      },
    }),
  };
}

// ============================================================================
// Schema & Mapping
// ============================================================================

const FactCheckResponseSchema = z.object({
  overall_assessment: z.string().default(''),
  verification_score: ScoreSchema,
  issues: z
    .array(
      z.object({
        severity: SeveritySchema,
        type: z.string().default('unspecified'),
        location: z.string().default(''),
        issue: z.string(),
        correction: z.string().optional(),
        verified: z.boolean().optional(),
      })
    )
    .default([]),
  verified_sources: StringListSchema,
  unverified_claims: StringListSchema,
  statistics_check: z.string().default(''),
  required_corrections: StringListSchema,
});

type FactCheckResponse = z.infer<typeof FactCheckResponseSchema>;

export function toFactCheckVerdict(
  response: FactCheckResponse,
  extractedUrls: readonly string[],
  extractedStatistics: readonly string[]
): FactCheckVerdict {
  const issues: Issue[] = response.issues.map((i) => ({
    severity: i.severity,
    type: i.type,
    location: i.location,
    issue: i.issue,
    ...(i.correction ? { correction: i.correction } : {}),
    ...(i.verified !== undefined ? { verified: i.verified } : {}),
  }));
  const score = response.verification_score;

  return {
    role: 'fact_checker',
    ready: isFactCheckReady(score, issues),
    assessment: response.overall_assessment,
    issues,
    parseFailed: false,
    score,
    verifiedSources: response.verified_sources,
    unverifiedClaims: response.unverified_claims,
    statisticsCheck: response.statistics_check,
    requiredCorrections: response.required_corrections,
    extractedUrls,
    extractedStatistics,
  };
}

export function degradedFactCheckVerdict(
  rawResponse: string,
  extractedUrls: readonly string[] = [],
  extractedStatistics: readonly string[] = []
): FactCheckVerdict {
  return {
    role: 'fact_checker',
    ready: false,
    assessment: 'Fact-check parsing failed',
    issues: [],
    parseFailed: true,
    rawResponse,
    score: 0,
    verifiedSources: [],
    unverifiedClaims: [],
    statisticsCheck: '',
    requiredCorrections: [],
    extractedUrls,
    extractedStatistics,
  };
}

// ============================================================================
// Factory
// ============================================================================

export function createFactCheckerReviewer(deps: FactCheckerDeps): Reviewer<FactCheckVerdict> {
  const log = deps.logger ?? createPrefixedLogger('[FactCheck]');
  const tools = deps.gateway ? createFactCheckTools(deps.gateway, log) : undefined;

  return {
    role: 'fact_checker',
    async review(article, topic, context) {
      const urls = extractUrls(article);
      const statistics = extractStatistics(article);
      log.info(`Checking ${urls.length} URL(s) and ${statistics.length} statistic(s)`);
      if (urls.length > 0) log.debug(`URLs in text: ${urls.join(', ')}`);
      if (statistics.length > 0) log.debug(`Statistics in text: ${statistics.join(', ')}`);

      const verdict = await runReviewerCall(
        { ...deps, logger: log },
        {
          label: 'Fact-check',
          prompt: getFactCheckerUserPrompt(article, topic, context.findings),
          schema: FactCheckResponseSchema,
          options: tools ? { tools, maxToolSteps: REVIEW_CONFIG.FACT_CHECKER_MAX_TOOL_STEPS } : undefined,
          toVerdict: (response) => toFactCheckVerdict(response, urls, statistics),
          degraded: (raw) => degradedFactCheckVerdict(raw, urls, statistics),
        }
      );

      const critical = verdict.issues.filter((i) => i.severity === 'CRITICAL').length;
      log.info(`Score: ${verdict.score}/100, ${critical} critical issue(s) (${verdict.ready ? 'ready' : 'not ready'})`);
      return verdict;
    },
  };
}
