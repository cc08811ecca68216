/**
 * Fact-Checker Prompts
 */

import { REVIEW_CONFIG } from '../config';
import type { Finding } from '../types';

export function getFactCheckerSystemPrompt(): string {
  return `You are a professional fact-checker. You verify claims; you do not judge style.

Tools:
- verify_url: checks that a cited URL loads and returns its title and an excerpt. A "blocked" result includes alternative sources you may recommend instead.
- find_alternative_source: searches for another source supporting a claim when a URL is unusable.

Method:
1. List every factual claim, number and quote in the article.
2. Check that each cited URL exists and supports the claim next to it.
3. Flag claims with no source, claims the source does not support, and numbers that look wrong or outdated.

Severity:
- CRITICAL: false, fabricated or dangerous claims; fabricated sources.
- HIGH: important claims without a source, or with a source that does not support them.
- MEDIUM: imprecise numbers, outdated figures, weak sources.
- LOW: minor attribution or formatting problems.

A paywalled or blocked source is not evidence of a false claim: suggest an alternative instead.`;
}

/**
 * Renders research gathered for claims flagged in earlier cycles.
 * Only targeted findings are shown; the general research pool already shaped the draft.
 */
export function formatTargetedFindings(findings: readonly Finding[]): string {
  const targeted = findings
    .filter((f) => f.relatedClaim !== undefined)
    .slice(-REVIEW_CONFIG.FACT_CHECK_CONTEXT_FINDINGS);
  if (targeted.length === 0) return '';

  const entries = targeted.map((f) => {
    const content = f.content.slice(0, REVIEW_CONFIG.FACT_CHECK_CONTEXT_CHARS);
    const url = f.url ? ` (${f.url})` : '';
    return `- Claim: ${f.relatedClaim}\n  Found: ${f.title}${url}: ${content}`;
  });

  return `RESEARCH ON PREVIOUSLY FLAGGED CLAIMS:
${entries.join('\n')}

Use this research when judging whether those claims are now supported.`;
}

export function getFactCheckerUserPrompt(article: string, topic: string, findings: readonly Finding[] = []): string {
  const research = formatTargetedFindings(findings);
  const context = research ? `\n${research}\n` : '';

  return `Fact-check this article about "${topic}".
${context}
ARTICLE:
${article}

After verifying, return JSON only:
{
  "overall_assessment": "2-3 sentences",
  "verification_score": 0,
  "issues": [
    {
      "severity": "CRITICAL | HIGH | MEDIUM | LOW",
      "type": "unsupported_claim | missing_source | broken_source | incorrect_statistic | outdated | misattribution",
      "location": "quote or section where the claim appears",
      "issue": "what is wrong",
      "correction": "what it should say or which source to use",
      "verified": false
    }
  ],
  "verified_sources": ["urls confirmed to support their claims"],
  "unverified_claims": ["claims you could not verify"],
  "statistics_check": "one paragraph on the accuracy of the numbers",
  "required_corrections": ["must-fix items before publication"],
  "ready_to_publish": false
}

"verification_score" is 0-100. An article is publishable at ${REVIEW_CONFIG.FACT_CHECK_READY_SCORE} or above with no CRITICAL issues.`;
}
