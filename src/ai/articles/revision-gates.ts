/**
 * Revision Gates
 *
 * Pure decisions over a review round: the quality gate, the research trigger,
 * the prioritized issue merge and the per-cycle history record.
 */

import { REVIEW_CONFIG } from './config';
import type {
  AuthenticityVerdict,
  EditorVerdict,
  FactCheckVerdict,
  Issue,
  MergedIssue,
  ReviewRound,
  RevisionRecord,
} from './types';

// ============================================================================
// Readiness
// ============================================================================

function normalizeGrade(grade: string): string {
  return grade.trim().toUpperCase();
}

/**
 * In-loop editor gate: A+ or A only.
 */
export function isEditorGateGrade(grade: string): boolean {
  return (REVIEW_CONFIG.GATE_GRADES as readonly string[]).includes(normalizeGrade(grade));
}

/**
 * Final-report editor readiness: A+, A or A-.
 */
export function isEditorReadyForReport(grade: string): boolean {
  return (REVIEW_CONFIG.FINAL_REPORT_GRADES as readonly string[]).includes(normalizeGrade(grade));
}

export function isFactCheckReady(score: number, issues: readonly Issue[]): boolean {
  return score >= REVIEW_CONFIG.FACT_CHECK_READY_SCORE && !issues.some((i) => i.severity === 'CRITICAL');
}

/**
 * Authenticity readiness when the reviewer gave no explicit flag.
 */
export function isAuthenticityReadyByScore(score: number, issues: readonly Issue[]): boolean {
  return score >= REVIEW_CONFIG.AUTHENTICITY_READY_SCORE && !issues.some((i) => i.severity === 'HIGH');
}

export interface GateEvaluation {
  readonly passed: boolean;
  readonly editorReady: boolean;
  readonly factCheckReady: boolean;
  readonly authenticityReady: boolean;
}

/**
 * All three reviewers must be ready. A verdict whose output failed to parse
 * is never ready.
 */
export function evaluateGate(round: ReviewRound): GateEvaluation {
  const editorReady = !round.editor.parseFailed && isEditorGateGrade(round.editor.grade);
  const factCheckReady = !round.factCheck.parseFailed && round.factCheck.ready;
  const authenticityReady = !round.authenticity.parseFailed && round.authenticity.ready;
  return {
    passed: editorReady && factCheckReady && authenticityReady,
    editorReady,
    factCheckReady,
    authenticityReady,
  };
}

// ============================================================================
// Research Trigger
// ============================================================================

const SOURCING_PATTERN = /sourc|citation/i;

/**
 * True when an issue is about sourcing or citations.
 */
export function isSourcingIssue(issue: Issue): boolean {
  return SOURCING_PATTERN.test(issue.type) || SOURCING_PATTERN.test(issue.issue);
}

export function hasSourcingIssue(factCheck: FactCheckVerdict): boolean {
  return factCheck.issues.some(
    (issue) => (issue.severity === 'CRITICAL' || issue.severity === 'HIGH') && isSourcingIssue(issue)
  );
}

/**
 * Targeted research runs on a weak fact-check score or a serious sourcing
 * issue.
 */
export function shouldTriggerResearch(factCheck: FactCheckVerdict): boolean {
  return factCheck.score < REVIEW_CONFIG.RESEARCH_TRIGGER_SCORE || hasSourcingIssue(factCheck);
}

// ============================================================================
// Issue Merge
// ============================================================================

function describeIssue(issue: Issue): string {
  return issue.location ? `${issue.issue} (${issue.location})` : issue.issue;
}

/**
 * Merges reviewer issues into one prioritized list, in this order:
 * fact-check CRITICAL, authenticity HIGH, editor critical issues,
 * fact-check HIGH, authenticity MEDIUM. Lower severities are dropped.
 */
export function mergeIssues(
  editor?: EditorVerdict,
  factCheck?: FactCheckVerdict,
  authenticity?: AuthenticityVerdict
): MergedIssue[] {
  const factIssues = factCheck?.issues ?? [];
  const authIssues = authenticity?.issues ?? [];

  return [
    ...factIssues
      .filter((i) => i.severity === 'CRITICAL')
      .map((i): MergedIssue => ({ source: 'fact_checker', priority: 'CRITICAL', issue: describeIssue(i) })),
    ...authIssues
      .filter((i) => i.severity === 'HIGH')
      .map((i): MergedIssue => ({ source: 'authenticity', priority: 'HIGH', issue: describeIssue(i) })),
    ...(editor?.criticalIssues ?? []).map(
      (text): MergedIssue => ({ source: 'editor', priority: 'CRITICAL', issue: text })
    ),
    ...factIssues
      .filter((i) => i.severity === 'HIGH')
      .map((i): MergedIssue => ({ source: 'fact_checker', priority: 'HIGH', issue: describeIssue(i) })),
    ...authIssues
      .filter((i) => i.severity === 'MEDIUM')
      .map((i): MergedIssue => ({ source: 'authenticity', priority: 'MEDIUM', issue: describeIssue(i) })),
  ];
}

// ============================================================================
// History
// ============================================================================

export function buildRevisionRecord(revision: number, round: ReviewRound): RevisionRecord {
  const gate = evaluateGate(round);
  return {
    revision,
    editorGrade: round.editor.grade,
    editorReady: gate.editorReady,
    factCheckScore: round.factCheck.score,
    factCheckReady: gate.factCheckReady,
    authenticityScore: round.authenticity.score,
    authenticityReady: gate.authenticityReady,
    criticalIssueCount: round.factCheck.issues.filter((i) => i.severity === 'CRITICAL').length,
    aiPatternCount: round.authenticity.patterns.length,
  };
}
