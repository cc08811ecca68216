import { describe, it, expect } from 'vitest';

import {
  buildRevisionRecord,
  evaluateGate,
  isAuthenticityReadyByScore,
  isEditorGateGrade,
  isEditorReadyForReport,
  isFactCheckReady,
  mergeIssues,
  shouldTriggerResearch,
} from '../../../src/ai/articles/revision-gates';
import {
  buildAuthenticityVerdict,
  buildEditorVerdict,
  buildFactCheckVerdict,
  buildRound,
  issue,
} from '../../utils/editorial';

describe('editor grades', () => {
  it('gate accepts only A+ and A', () => {
    expect(isEditorGateGrade('A+')).toBe(true);
    expect(isEditorGateGrade('A')).toBe(true);
    expect(isEditorGateGrade(' a ')).toBe(true);
    expect(isEditorGateGrade('A-')).toBe(false);
    expect(isEditorGateGrade('B+')).toBe(false);
    expect(isEditorGateGrade('N/A')).toBe(false);
  });

  it('final report also accepts A-', () => {
    expect(isEditorReadyForReport('A-')).toBe(true);
    expect(isEditorReadyForReport('A')).toBe(true);
    expect(isEditorReadyForReport('B+')).toBe(false);
  });
});

describe('isFactCheckReady', () => {
  it('requires score of at least 60', () => {
    expect(isFactCheckReady(60, [])).toBe(true);
    expect(isFactCheckReady(59, [])).toBe(false);
  });

  it('is never ready with a CRITICAL issue', () => {
    expect(isFactCheckReady(95, [issue('CRITICAL', 'Fabricated quote')])).toBe(false);
    expect(isFactCheckReady(95, [issue('HIGH', 'Weak source')])).toBe(true);
  });
});

describe('isAuthenticityReadyByScore', () => {
  it('requires score of at least 80 and no HIGH issue', () => {
    expect(isAuthenticityReadyByScore(80, [])).toBe(true);
    expect(isAuthenticityReadyByScore(79, [])).toBe(false);
    expect(isAuthenticityReadyByScore(92, [issue('HIGH', 'Stock phrases')])).toBe(false);
    expect(isAuthenticityReadyByScore(92, [issue('MEDIUM', 'Hedging')])).toBe(true);
  });
});

describe('evaluateGate', () => {
  const cases: Array<[boolean, boolean, boolean]> = [
    [true, true, true],
    [true, true, false],
    [true, false, true],
    [true, false, false],
    [false, true, true],
    [false, true, false],
    [false, false, true],
    [false, false, false],
  ];

  it.each(cases)('editor=%s factCheck=%s authenticity=%s', (editorOk, factOk, authOk) => {
    const round = buildRound({
      editor: buildEditorVerdict({ grade: editorOk ? 'A' : 'B+' }),
      factCheck: buildFactCheckVerdict({ ready: factOk }),
      authenticity: buildAuthenticityVerdict({ ready: authOk }),
    });

    const gate = evaluateGate(round);

    expect(gate).toEqual({
      passed: editorOk && factOk && authOk,
      editorReady: editorOk,
      factCheckReady: factOk,
      authenticityReady: authOk,
    });
  });

  it('ignores the editor ready flag and reads the grade', () => {
    const gate = evaluateGate(buildRound({ editor: buildEditorVerdict({ grade: 'A-', ready: true }) }));
    expect(gate.editorReady).toBe(false);
    expect(gate.passed).toBe(false);
  });

  it('never passes a verdict whose output failed to parse', () => {
    const gate = evaluateGate(
      buildRound({ authenticity: buildAuthenticityVerdict({ ready: true, parseFailed: true }) })
    );
    expect(gate.authenticityReady).toBe(false);
    expect(gate.passed).toBe(false);
  });
});

describe('shouldTriggerResearch', () => {
  it('triggers below a score of 80', () => {
    expect(shouldTriggerResearch(buildFactCheckVerdict({ score: 79 }))).toBe(true);
  });

  it('does not trigger at 85 without sourcing issues', () => {
    expect(shouldTriggerResearch(buildFactCheckVerdict({ score: 85 }))).toBe(false);
  });

  it('triggers at 90 with a HIGH citation issue', () => {
    const factCheck = buildFactCheckVerdict({
      score: 90,
      issues: [issue('HIGH', 'Claim has no citation', { type: 'accuracy' })],
    });
    expect(shouldTriggerResearch(factCheck)).toBe(true);
  });

  it('triggers on a CRITICAL issue whose type mentions sourcing', () => {
    const factCheck = buildFactCheckVerdict({
      score: 88,
      issues: [issue('CRITICAL', 'Figure disputed', { type: 'unsourced_claim' })],
    });
    expect(shouldTriggerResearch(factCheck)).toBe(true);
  });

  it('triggers at 70 with no issues', () => {
    expect(shouldTriggerResearch(buildFactCheckVerdict({ score: 70, issues: [] }))).toBe(true);
  });

  it('triggers at 85 with a CRITICAL missing-source issue', () => {
    const factCheck = buildFactCheckVerdict({
      score: 85,
      issues: [issue('CRITICAL', 'Storage figure cannot be traced', { type: 'missing_source' })],
    });
    expect(shouldTriggerResearch(factCheck)).toBe(true);
  });

  it('does not trigger at 90 with no issues', () => {
    expect(shouldTriggerResearch(buildFactCheckVerdict({ score: 90, issues: [] }))).toBe(false);
  });

  it('ignores MEDIUM sourcing issues', () => {
    const factCheck = buildFactCheckVerdict({
      score: 88,
      issues: [issue('MEDIUM', 'Source is a little dated')],
    });
    expect(shouldTriggerResearch(factCheck)).toBe(false);
  });
});

describe('mergeIssues', () => {
  it('orders fact CRITICAL, auth HIGH, editor critical, fact HIGH, auth MEDIUM', () => {
    const editor = buildEditorVerdict({ criticalIssues: ['Thesis arrives too late'] });
    const factCheck = buildFactCheckVerdict({
      issues: [
        issue('HIGH', 'Outdated capacity figure', { location: 'paragraph 2' }),
        issue('CRITICAL', 'Invented statistic', { location: 'intro' }),
        issue('LOW', 'Minor typo in name'),
      ],
    });
    const authenticity = buildAuthenticityVerdict({
      issues: [
        issue('MEDIUM', 'Hedging language'),
        issue('HIGH', 'Formulaic transitions', { location: 'Moreover, ...' }),
      ],
    });

    expect(mergeIssues(editor, factCheck, authenticity)).toEqual([
      { source: 'fact_checker', priority: 'CRITICAL', issue: 'Invented statistic (intro)' },
      { source: 'authenticity', priority: 'HIGH', issue: 'Formulaic transitions (Moreover, ...)' },
      { source: 'editor', priority: 'CRITICAL', issue: 'Thesis arrives too late' },
      { source: 'fact_checker', priority: 'HIGH', issue: 'Outdated capacity figure (paragraph 2)' },
      { source: 'authenticity', priority: 'MEDIUM', issue: 'Hedging language' },
    ]);
  });

  it('handles missing verdicts', () => {
    expect(mergeIssues(undefined, undefined, undefined)).toEqual([]);
  });
});

describe('buildRevisionRecord', () => {
  it('summarizes a round', () => {
    const round = buildRound({
      editor: buildEditorVerdict({ grade: 'B' }),
      factCheck: buildFactCheckVerdict({
        score: 55,
        ready: false,
        issues: [issue('CRITICAL', 'a'), issue('CRITICAL', 'b'), issue('HIGH', 'c')],
      }),
      authenticity: buildAuthenticityVerdict({
        score: 70,
        ready: false,
        patterns: [{ pattern: 'Rule of three', severity: 'MEDIUM', example: 'fast, cheap, clean', suggestion: 'Pick one' }],
      }),
    });

    expect(buildRevisionRecord(3, round)).toEqual({
      revision: 3,
      editorGrade: 'B',
      editorReady: false,
      factCheckScore: 55,
      factCheckReady: false,
      authenticityScore: 70,
      authenticityReady: false,
      criticalIssueCount: 2,
      aiPatternCount: 1,
    });
  });
});
