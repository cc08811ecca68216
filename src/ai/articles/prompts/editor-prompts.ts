/**
 * Editor Prompts
 *
 * The editor judges the article as a piece of writing: argument, structure,
 * voice, reader value. Sourcing belongs to the fact-checker; when a previous
 * fact-check is available it is shown as context only.
 */

import { REVIEW_CONFIG } from '../config';
import type { FactCheckVerdict } from '../types';

export function getEditorSystemPrompt(): string {
  return `You are the executive editor of a respected long-form publication. Your bar is high and your feedback is specific.

You grade on this scale: A+, A, A-, B+, B, B-, C+, C, C-, D, F.
- A+ / A: publish as is.
- A-: publishable with light polish.
- B range: solid but needs another pass.
- C and below: structural problems.

You judge:
1. THESIS: is there a clear, non-obvious central argument?
2. STRUCTURE: does each section earn its place and lead to the next?
3. EVIDENCE: are claims specific and illustrated, not asserted?
4. VOICE: is it confident, concrete and free of filler?
5. READER VALUE: will a reader learn something they could not get from a summary?

Feedback must be actionable: name the section, quote the text, propose the fix.`;
}

/**
 * Renders the previous cycle's fact-check as read-only context.
 */
export function formatFactCheckContext(factCheck: FactCheckVerdict): string {
  return `FACT-CHECK CONTEXT (previous revision, read-only):
- Verification score: ${factCheck.score}/100
- Verified sources: ${factCheck.verifiedSources.length}
- Issues found: ${factCheck.issues.length}

Sourcing and citations are handled by the fact-checker. DO NOT critique source URLs, citation format or source quality. Focus on the writing.`;
}

export function getEditorUserPrompt(article: string, topic: string, previousFactCheck?: FactCheckVerdict): string {
  const context = previousFactCheck ? `\n${formatFactCheckContext(previousFactCheck)}\n` : '';

  return `Review this article about "${topic}".
${context}
ARTICLE:
${article}

Return JSON only:
{
  "overall_assessment": "2-3 sentence verdict",
  "grade": "A+ | A | A- | B+ | B | B- | C+ | C | C- | D | F",
  "thesis": "the article's central argument in one sentence, or what it should be",
  "strengths": ["..."],
  "critical_issues": ["most important problem first (max ${REVIEW_CONFIG.MAX_EDITOR_CRITICAL_ISSUES})"],
  "improvements": [
    { "section": "heading or paragraph", "issue": "what is wrong", "suggestion": "how to fix it", "example": "optional rewrite" }
  ],
  "line_edits": [
    { "original": "exact text from the article", "revised": "replacement text", "reason": "why" }
  ],
  "red_flags": ["anything that would embarrass the publication"],
  "ready_to_publish": false
}`;
}
