/**
 * Writer and Rewriter Prompts
 *
 * The writer drafts v1 from research findings. The rewriter produces each
 * following version from the current text and the combined review feedback.
 */

import { WORKFLOW_CONFIG } from '../config';
import type { CombinedFeedback, Finding, IssueSeverity } from '../types';

// ============================================================================
// Shared
// ============================================================================

/**
 * Renders findings as a numbered source list for the writer.
 */
export function formatFindings(findings: readonly Finding[], limit: number): string {
  if (findings.length === 0) return '(no research findings available)';

  return findings
    .slice(0, limit)
    .map((f, i) => {
      const url = f.url ? `\nURL: ${f.url}` : '';
      const claim = f.relatedClaim ? `\nRelated claim: ${f.relatedClaim}` : '';
      return `[${i + 1}] (${f.source}) ${f.title}${url}${claim}\n${f.content.slice(0, WORKFLOW_CONFIG.FINDING_PROMPT_LENGTH)}`;
    })
    .join('\n\n');
}

// ============================================================================
// Writer
// ============================================================================

export function getWriterSystemPrompt(): string {
  return `You are a senior feature writer. You write clear, specific, well-sourced long-form articles in Markdown.

Rules:
- Every factual claim that comes from the research must be followed by [Source: URL] using a URL from the findings.
- Never invent sources, URLs, quotes or numbers.
- Open with a concrete scene, number or fact, not a generic statement.
- Use ## headings for sections. No title-case filler headings like "Conclusion".
- Write for an intelligent general reader; explain jargon once.`;
}

export function getDraftPrompt(topic: string, findings: readonly Finding[]): string {
  return `Write a complete feature article (1500-2500 words) about the topic below, using only the research findings provided.

TOPIC: ${topic}

RESEARCH FINDINGS:
${formatFindings(findings, WORKFLOW_CONFIG.DRAFT_MAX_FINDINGS)}

Return only the article in Markdown, starting with a single # title line.`;
}

// ============================================================================
// Rewriter
// ============================================================================

export function getRewriterSystemPrompt(): string {
  return `You are a senior editor revising an article after review.

You must address every item of feedback you are given. Keep what works; fix what was flagged.

Rules:
- User feedback, when present, overrides all other feedback.
- Apply every exact line edit unless it conflicts with user feedback.
- Fix or remove every claim flagged by the fact-check; cite sources as [Source: URL].
- Remove the AI-writing patterns listed by the authenticity review.
- Return the complete revised article in Markdown and nothing else.`;
}

const SERIOUS_SEVERITIES: readonly IssueSeverity[] = ['CRITICAL', 'HIGH'];

/**
 * Builds the feedback summary the rewriter works from.
 */
export function buildFeedbackSummary(feedback: CombinedFeedback): string {
  const parts: string[] = [];

  if (feedback.userFeedback) {
    parts.push(`USER FEEDBACK (HIGHEST PRIORITY):\n${feedback.userFeedback}`);
  }

  const { editor, factCheck, authenticity } = feedback;

  if (editor) {
    parts.push(`EDITOR GRADE: ${editor.grade}\nEDITOR ASSESSMENT: ${editor.assessment}`);

    if (editor.criticalIssues.length > 0) {
      parts.push(`CRITICAL ISSUES:\n${editor.criticalIssues.map((issue, i) => `${i + 1}. ${issue}`).join('\n')}`);
    }
    if (editor.improvements.length > 0) {
      parts.push(
        `IMPROVEMENTS:\n${editor.improvements
          .map((imp) => `- [${imp.section}] ${imp.issue} -> ${imp.suggestion}${imp.example ? ` (e.g. ${imp.example})` : ''}`)
          .join('\n')}`
      );
    }
    if (editor.lineEdits.length > 0) {
      parts.push(
        `LINE EDITS:\n${editor.lineEdits
          .map((edit) => `- Replace: "${edit.original}"\n  With: "${edit.revised}"\n  Why: ${edit.reason}`)
          .join('\n')}`
      );
    }
  }

  if (factCheck) {
    const serious = factCheck.issues
      .filter((issue) => SERIOUS_SEVERITIES.includes(issue.severity))
      .slice(0, WORKFLOW_CONFIG.REWRITE_MAX_FACT_ISSUES);
    parts.push(`FACT-CHECK SCORE: ${factCheck.score}/100`);
    if (serious.length > 0) {
      parts.push(
        `FACT-CHECK ISSUES:\n${serious
          .map((issue) => `- [${issue.severity}] ${issue.location}: ${issue.issue}${issue.correction ? `\n  Correction: ${issue.correction}` : ''}`)
          .join('\n')}`
      );
    }
    if (factCheck.requiredCorrections.length > 0) {
      parts.push(`REQUIRED CORRECTIONS:\n${factCheck.requiredCorrections.map((c) => `- ${c}`).join('\n')}`);
    }
  }

  if (authenticity) {
    parts.push(`AUTHENTICITY SCORE: ${authenticity.score}/100`);
    const patterns = authenticity.patterns.slice(0, WORKFLOW_CONFIG.REWRITE_MAX_AI_PATTERNS);
    if (patterns.length > 0) {
      parts.push(
        `AI-WRITING PATTERNS TO REMOVE:\n${patterns
          .map((p) => `- [${p.severity}] ${p.pattern}: "${p.example}" -> ${p.suggestion}`)
          .join('\n')}`
      );
    }
    if (authenticity.recommendations.length > 0) {
      parts.push(`STYLE RECOMMENDATIONS:\n${authenticity.recommendations.map((r) => `- ${r}`).join('\n')}`);
    }
  }

  if (feedback.mergedIssues.length > 0) {
    parts.push(
      `PRIORITIZED ISSUE LIST (fix in this order):\n${feedback.mergedIssues
        .map((m, i) => `${i + 1}. [${m.priority}/${m.source}] ${m.issue}`)
        .join('\n')}`
    );
  }

  if (feedback.newFindings.length > 0) {
    parts.push(`NEW RESEARCH FOR FLAGGED CLAIMS:\n${formatFindings(feedback.newFindings, feedback.newFindings.length)}`);
  }

  return parts.join('\n\n');
}

export function getRewritePrompt(article: string, topic: string, feedback: CombinedFeedback): string {
  return `Revise the article about "${topic}" so that it addresses every item below.

${buildFeedbackSummary(feedback)}

CURRENT ARTICLE:
${article}

Return the complete revised article in Markdown.`;
}
