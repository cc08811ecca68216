/**
 * Editor Reviewer
 *
 * Judges the article as writing: thesis, structure, evidence, voice. Sourcing
 * is out of scope; a previous fact-check is passed in as read-only context.
 */

import { z } from 'zod';

import { createPrefixedLogger } from '../../../utils/logger';
import { REVIEW_CONFIG } from '../config';
import { getEditorUserPrompt } from '../prompts/editor-prompts';
import { isEditorGateGrade } from '../revision-gates';
import type { EditorVerdict, Issue } from '../types';
import { runReviewerCall, StringListSchema, type Reviewer, type ReviewerDeps } from './reviewer';

// ============================================================================
// Schema
// ============================================================================

const EditorResponseSchema = z.object({
  overall_assessment: z.string().default(''),
  grade: z.string().min(1),
  thesis: z.string().default(''),
  strengths: StringListSchema,
  critical_issues: StringListSchema,
  improvements: z
    .array(
      z.object({
        section: z.string().default(''),
        issue: z.string().default(''),
        suggestion: z.string().default(''),
        example: z.string().optional(),
      })
    )
    .default([]),
  line_edits: z
    .array(
      z.object({
        original: z.string(),
        revised: z.string(),
        reason: z.string().default(''),
      })
    )
    .default([]),
  red_flags: StringListSchema,
});

type EditorResponse = z.infer<typeof EditorResponseSchema>;

// ============================================================================
// Mapping
// ============================================================================

export function toEditorVerdict(response: EditorResponse): EditorVerdict {
  const grade = response.grade.trim().toUpperCase();
  const criticalIssues = response.critical_issues.slice(0, REVIEW_CONFIG.MAX_EDITOR_CRITICAL_ISSUES);
  const issues: Issue[] = criticalIssues.map((text) => ({
    severity: 'CRITICAL',
    type: 'editorial',
    location: '',
    issue: text,
  }));

  return {
    role: 'editor',
    // The model's own ready_to_publish flag is ignored; the grade decides
    ready: isEditorGateGrade(grade),
    assessment: response.overall_assessment,
    issues,
    parseFailed: false,
    grade,
    thesis: response.thesis,
    strengths: response.strengths,
    criticalIssues,
    improvements: response.improvements.map((i) => ({
      section: i.section,
      issue: i.issue,
      suggestion: i.suggestion,
      ...(i.example ? { example: i.example } : {}),
    })),
    lineEdits: response.line_edits,
    redFlags: response.red_flags,
  };
}

export function degradedEditorVerdict(rawResponse: string): EditorVerdict {
  return {
    role: 'editor',
    ready: false,
    assessment: 'Review parsing failed',
    issues: [],
    parseFailed: true,
    rawResponse,
    grade: 'N/A',
    thesis: '',
    strengths: [],
    criticalIssues: [],
    improvements: [],
    lineEdits: [],
    redFlags: [],
  };
}

// ============================================================================
// Factory
// ============================================================================

export function createEditorReviewer(deps: ReviewerDeps): Reviewer<EditorVerdict> {
  const log = deps.logger ?? createPrefixedLogger('[Editor]');

  return {
    role: 'editor',
    async review(article, topic, context) {
      log.info(`Reviewing revision ${context.revision}`);
      const verdict = await runReviewerCall(
        { ...deps, logger: log },
        {
          label: 'Editor',
          prompt: getEditorUserPrompt(article, topic, context.previousFactCheck),
          schema: EditorResponseSchema,
          toVerdict: toEditorVerdict,
          degraded: degradedEditorVerdict,
        }
      );
      log.info(`Grade: ${verdict.grade} (${verdict.ready ? 'ready' : 'not ready'})`);
      return verdict;
    },
  };
}
