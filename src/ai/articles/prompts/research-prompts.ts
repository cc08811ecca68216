/**
 * Research Prompts
 *
 * Prompts for topic analysis (questions to answer) and synthesis (how well
 * the findings so far cover the topic).
 */

import { RESEARCH_CONFIG } from '../config';
import type { Finding } from '../types';

/**
 * System prompt shared by the research steps.
 */
export function getResearchSystemPrompt(): string {
  return `You are a research lead for a long-form editorial desk.

You plan research, judge coverage and point at what is still missing. You never write the article itself.

Principles:
- Prefer primary sources, official data and recent reporting.
- Separate established facts from contested claims.
- A question is only useful if a search engine could answer it.
- Always answer in the exact JSON format requested, with no commentary around it.`;
}

/**
 * Asks for the initial set of research questions.
 */
export function getTopicAnalysisPrompt(topic: string): string {
  return `Analyze this topic and list the research questions an expert writer must answer before drafting a well-sourced feature article.

TOPIC: ${topic}

Cover:
- Background and key definitions
- Current state, with the most recent figures available
- Main actors (companies, institutions, researchers)
- Open debates, risks and criticism
- What changes next and why it matters to readers

Return 4-8 specific, searchable questions as a JSON array of strings:
["question 1", "question 2"]`;
}

function formatFindingForSynthesis(finding: Finding, index: number): string {
  const snippet = finding.content.slice(0, RESEARCH_CONFIG.SYNTHESIS_SNIPPET_LENGTH);
  const url = finding.url ? ` (${finding.url})` : '';
  return `[${index + 1}] ${finding.source}/${finding.type}: ${finding.title}${url}\n${snippet}`;
}

/**
 * Asks the model to score coverage and name the gaps.
 */
export function getSynthesisPrompt(topic: string, findings: readonly Finding[]): string {
  const body =
    findings.length > 0
      ? findings.map(formatFindingForSynthesis).join('\n\n')
      : '(no findings yet)';

  return `Assess how completely the research below covers the topic.

TOPIC: ${topic}

FINDINGS (${findings.length}):
${body}

Return JSON only:
{
  "confidence": 0.0,
  "gaps": ["specific follow-up question", "..."]
}

Rules:
- "confidence" is between 0 and 1: how safely a writer could produce an accurate, well-sourced article from these findings alone.
- "gaps" lists concrete, searchable questions for what is missing or contradictory. Use an empty array when coverage is sufficient.`;
}
