/**
 * Authenticity Reviewer
 *
 * Flags prose patterns typical of machine-written text.
 */

import { z } from 'zod';

import { createPrefixedLogger } from '../../../utils/logger';
import { getAuthenticityUserPrompt } from '../prompts/authenticity-prompts';
import { isAuthenticityReadyByScore } from '../revision-gates';
import type { AiPattern, AuthenticityVerdict, Issue } from '../types';
import {
  runReviewerCall,
  ScoreSchema,
  SeveritySchema,
  StringListSchema,
  type Reviewer,
  type ReviewerDeps,
} from './reviewer';

const AuthenticityResponseSchema = z.object({
  overall_assessment: z.string().default(''),
  authenticity_score: ScoreSchema,
  ai_patterns_found: z
    .array(
      z.object({
        pattern: z.string(),
        severity: SeveritySchema,
        example: z.string().default(''),
        suggestion: z.string().default(''),
      })
    )
    .default([]),
  recommendations: StringListSchema,
  ready_to_publish: z.boolean().optional(),
});

type AuthenticityResponse = z.infer<typeof AuthenticityResponseSchema>;

export function toAuthenticityVerdict(response: AuthenticityResponse): AuthenticityVerdict {
  const patterns: AiPattern[] = response.ai_patterns_found;
  const issues: Issue[] = patterns.map((p) => ({
    severity: p.severity,
    type: 'ai_pattern',
    location: p.example,
    issue: p.pattern,
    ...(p.suggestion ? { correction: p.suggestion } : {}),
  }));
  const score = response.authenticity_score;

  return {
    role: 'authenticity',
    ready: response.ready_to_publish ?? isAuthenticityReadyByScore(score, issues),
    assessment: response.overall_assessment,
    issues,
    parseFailed: false,
    score,
    patterns,
    recommendations: response.recommendations,
  };
}

export function degradedAuthenticityVerdict(rawResponse: string): AuthenticityVerdict {
  return {
    role: 'authenticity',
    ready: false,
    assessment: 'Authenticity check parsing failed',
    issues: [],
    parseFailed: true,
    rawResponse,
    score: 0,
    patterns: [],
    recommendations: [],
  };
}

export function createAuthenticityReviewer(deps: ReviewerDeps): Reviewer<AuthenticityVerdict> {
  const log = deps.logger ?? createPrefixedLogger('[Authenticity]');

  return {
    role: 'authenticity',
    async review(article, topic) {
      const verdict = await runReviewerCall(
        { ...deps, logger: log },
        {
          label: 'Authenticity',
          prompt: getAuthenticityUserPrompt(article, topic),
          schema: AuthenticityResponseSchema,
          toVerdict: toAuthenticityVerdict,
          degraded: degradedAuthenticityVerdict,
        }
      );
      log.info(`Score: ${verdict.score}/100, ${verdict.patterns.length} pattern(s) (${verdict.ready ? 'ready' : 'not ready'})`);
      return verdict;
    },
  };
}
