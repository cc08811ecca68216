import { describe, it, expect, vi } from 'vitest';

import { createAuthenticityReviewer } from '../../../src/ai/articles/agents/authenticity';
import { createEditorReviewer } from '../../../src/ai/articles/agents/editor';
import {
  createFactCheckerReviewer,
  extractStatistics,
  extractUrls,
  verifyUrlWithAlternatives,
} from '../../../src/ai/articles/agents/fact-checker';
import { runReviewPanel, type ReviewPanel } from '../../../src/ai/articles/agents/reviewer';
import { formatTargetedFindings, getFactCheckerUserPrompt } from '../../../src/ai/articles/prompts/fact-checker-prompts';
import { EditorialWorkflowError, type Finding } from '../../../src/ai/articles/types';
import {
  authenticityJson,
  buildAuthenticityVerdict,
  buildEditorVerdict,
  buildFactCheckVerdict,
  createMockLogger,
  createStubGateway,
  editorJson,
  factCheckJson,
  NO_WAIT_RETRY,
  scriptedGenerator,
} from '../../utils/editorial';

const ARTICLE = `# Storing the Sun

Battery prices fell 89% in a decade [Source: https://energy.example.com/outlook].
Spending reached $1.2 billion, and 40 percent of new sites pair solar with storage
(https://research.example.org/long-duration).`;

const CONTEXT = { revision: 1 };

describe('Editor reviewer', () => {
  it('maps a valid response and caps critical issues at three', async () => {
    const generator = scriptedGenerator([
      editorJson('a', {
        critical_issues: ['Weak lede', 'No thesis', 'Ending trails off', 'Too long'],
        improvements: [{ section: 'Intro', issue: 'Slow', suggestion: 'Open on the price drop' }],
        ready_to_publish: false,
      }),
    ]);
    const editor = createEditorReviewer({ generator, logger: createMockLogger() });

    const verdict = await editor.review(ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(verdict.grade).toBe('A');
    expect(verdict.ready).toBe(true);
    expect(verdict.parseFailed).toBe(false);
    expect(verdict.criticalIssues).toEqual(['Weak lede', 'No thesis', 'Ending trails off']);
    expect(verdict.issues).toEqual([
      { severity: 'CRITICAL', type: 'editorial', location: '', issue: 'Weak lede' },
      { severity: 'CRITICAL', type: 'editorial', location: '', issue: 'No thesis' },
      { severity: 'CRITICAL', type: 'editorial', location: '', issue: 'Ending trails off' },
    ]);
    expect(verdict.improvements).toEqual([{ section: 'Intro', issue: 'Slow', suggestion: 'Open on the price drop' }]);
  });

  it('is not ready at A-', async () => {
    const editor = createEditorReviewer({ generator: scriptedGenerator([editorJson('A-')]), logger: createMockLogger() });

    const verdict = await editor.review(ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(verdict.grade).toBe('A-');
    expect(verdict.ready).toBe(false);
  });

  it('returns a degraded verdict for malformed output', async () => {
    const logger = createMockLogger();
    const editor = createEditorReviewer({ generator: scriptedGenerator(['Great piece, ship it!']), logger });

    const verdict = await editor.review(ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(verdict.ready).toBe(false);
    expect(verdict.parseFailed).toBe(true);
    expect(verdict.grade).toBe('N/A');
    expect(verdict.assessment).toBe('Review parsing failed');
    expect(verdict.rawResponse).toBe('Great piece, ship it!');
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('treats a response without a grade as malformed', async () => {
    const editor = createEditorReviewer({
      generator: scriptedGenerator([JSON.stringify({ overall_assessment: 'Fine' })]),
      logger: createMockLogger(),
    });

    const verdict = await editor.review(ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(verdict.parseFailed).toBe(true);
    expect(verdict.ready).toBe(false);
  });

  it('passes the previous fact-check as read-only context', async () => {
    const generator = scriptedGenerator([editorJson('B')]);
    const editor = createEditorReviewer({ generator, logger: createMockLogger() });

    await editor.review(ARTICLE, 'Renewable Energy Storage', {
      revision: 2,
      previousFactCheck: buildFactCheckVerdict({ score: 70 }),
    });

    expect(generator.prompts[0]).toContain('FACT-CHECK CONTEXT (previous revision, read-only):\n- Verification score: 70/100');
  });

  it('raises REVIEW_FAILED once retries are exhausted', async () => {
    const generator = scriptedGenerator([
      new Error('503 Service Unavailable'),
      new Error('503 Service Unavailable'),
      new Error('503 Service Unavailable'),
    ]);
    const editor = createEditorReviewer({ generator, logger: createMockLogger(), retry: NO_WAIT_RETRY });

    const error = await editor.review(ARTICLE, 'Renewable Energy Storage', CONTEXT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EditorialWorkflowError);
    expect(error).toMatchObject({ code: 'REVIEW_FAILED', message: 'Editor review failed: 503 Service Unavailable' });
    expect(generator.generate).toHaveBeenCalledTimes(3);
  });
});

describe('Fact-checker pre-pass', () => {
  it('extracts URLs without trailing punctuation, deduplicated', () => {
    const text = 'See https://a.example/x, and (https://b.example/y). Again [Source: https://a.example/x].';
    expect(extractUrls(text)).toEqual(['https://a.example/x', 'https://b.example/y']);
  });

  it('extracts statistics with magnitudes and percentages', () => {
    const text = 'Prices fell 89% since 2010 while spending hit $1.2 billion and 40 percent of sites';
    expect(extractStatistics(text)).toEqual(['89%', '$1.2 billion', '40 percent']);
  });
});

describe('Fact-checker reviewer', () => {
  it('maps issues and computes readiness from score and severity', async () => {
    const generator = scriptedGenerator([
      factCheckJson(72, [
        {
          severity: 'high',
          type: 'missing_source',
          location: 'paragraph 2',
          issue: 'No source for the spending figure',
          correction: 'Cite the budget report',
        },
        { severity: 'urgent', issue: 'Odd phrasing' },
      ]),
    ]);
    const reviewer = createFactCheckerReviewer({ generator, logger: createMockLogger() });

    const verdict = await reviewer.review(ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(verdict.score).toBe(72);
    expect(verdict.ready).toBe(true);
    expect(verdict.issues).toEqual([
      {
        severity: 'HIGH',
        type: 'missing_source',
        location: 'paragraph 2',
        issue: 'No source for the spending figure',
        correction: 'Cite the budget report',
      },
      { severity: 'LOW', type: 'unspecified', location: '', issue: 'Odd phrasing' },
    ]);
    expect(verdict.extractedUrls).toEqual([
      'https://energy.example.com/outlook',
      'https://research.example.org/long-duration',
    ]);
    expect(verdict.extractedStatistics).toEqual(['89%', '$1.2 billion', '40 percent']);
  });

  it('is never ready with a CRITICAL issue', async () => {
    const reviewer = createFactCheckerReviewer({
      generator: scriptedGenerator([factCheckJson(95, [{ severity: 'CRITICAL', issue: 'Fabricated quote' }])]),
      logger: createMockLogger(),
    });

    const verdict = await reviewer.review(ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(verdict.ready).toBe(false);
  });

  it('coerces and clamps the score', async () => {
    const generator = scriptedGenerator([
      JSON.stringify({ verification_score: '140', issues: [] }),
    ]);
    const reviewer = createFactCheckerReviewer({ generator, logger: createMockLogger() });

    const verdict = await reviewer.review(ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(verdict.score).toBe(100);
    expect(verdict.ready).toBe(true);
  });

  it('degrades when the score is missing', async () => {
    const reviewer = createFactCheckerReviewer({
      generator: scriptedGenerator([JSON.stringify({ overall_assessment: 'Looks fine', issues: [] })]),
      logger: createMockLogger(),
    });

    const verdict = await reviewer.review(ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(verdict.parseFailed).toBe(true);
    expect(verdict.ready).toBe(false);
    expect(verdict.score).toBe(0);
    expect(verdict.assessment).toBe('Fact-check parsing failed');
    expect(verdict.extractedUrls).toHaveLength(2);
  });

  it('keeps extracted URLs and statistics out of the prompt', async () => {
    const generator = scriptedGenerator([factCheckJson(90)]);
    const logger = createMockLogger();

    const verdict = await createFactCheckerReviewer({ generator, logger }).review(
      ARTICLE,
      'Renewable Energy Storage',
      CONTEXT
    );

    expect(verdict.extractedStatistics).toEqual(['89%', '$1.2 billion', '40 percent']);
    expect(logger.debug).toHaveBeenCalledWith('Statistics in text: 89%, $1.2 billion, 40 percent');
    expect(generator.prompts[0]).not.toContain('URLS CITED IN THE TEXT');
    expect(generator.prompts[0]).not.toContain('NUMBERS AND STATISTICS IN THE TEXT');
    expect(generator.prompts[0]).toBe(getFactCheckerUserPrompt(ARTICLE, 'Renewable Energy Storage'));
  });

  it('shows research on previously flagged claims but not the general pool', async () => {
    const generator = scriptedGenerator([factCheckJson(90)]);
    const findings: Finding[] = [
      { source: 'web', title: 'Background piece', content: 'General context.', type: 'web' },
      {
        source: 'targeted_search',
        title: 'Grid report',
        content: 'Spending reached $1.2 billion in 2024.',
        url: 'https://grid.example.org/report',
        type: 'targeted_internet_search',
        relatedClaim: 'Spending reached $1.2 billion',
        priority: 'high',
      },
    ];

    await createFactCheckerReviewer({ generator, logger: createMockLogger() }).review(
      ARTICLE,
      'Renewable Energy Storage',
      { revision: 2, findings }
    );

    expect(generator.prompts[0]).toContain(
      'RESEARCH ON PREVIOUSLY FLAGGED CLAIMS:\n' +
        '- Claim: Spending reached $1.2 billion\n' +
        '  Found: Grid report (https://grid.example.org/report): Spending reached $1.2 billion in 2024.'
    );
    expect(generator.prompts[0]).not.toContain('Background piece');
  });

  it('shows only the most recent targeted findings, trimmed', () => {
    const findings: Finding[] = Array.from({ length: 12 }, (_, i) => ({
      source: 'targeted_search' as const,
      title: `Result ${i + 1}`,
      content: 'x'.repeat(500),
      type: 'targeted_internet_search',
      relatedClaim: `Claim ${i + 1}`,
    }));

    const rendered = formatTargetedFindings(findings);

    expect(rendered).not.toContain('- Claim: Claim 2\n');
    expect(rendered).toContain('- Claim: Claim 3\n');
    expect(rendered).toContain(`  Found: Result 12: ${'x'.repeat(400)}\n`);
    expect(rendered).not.toContain('x'.repeat(401));
  });

  it('offers verification tools only when a gateway is given', async () => {
    const withTools = scriptedGenerator([factCheckJson(90)]);
    const withoutTools = scriptedGenerator([factCheckJson(90)]);

    await createFactCheckerReviewer({
      generator: withTools,
      gateway: createStubGateway(),
      logger: createMockLogger(),
    }).review(ARTICLE, 'Renewable Energy Storage', CONTEXT);
    await createFactCheckerReviewer({ generator: withoutTools, logger: createMockLogger() }).review(
      ARTICLE,
      'Renewable Energy Storage',
      CONTEXT
    );

    const options = withTools.generate.mock.calls[0][1];
    expect(Object.keys(options?.tools ?? {}).sort()).toEqual(['find_alternative_source', 'verify_url']);
    expect(options?.maxToolSteps).toBe(12);
    expect(withoutTools.generate.mock.calls[0][1]).toBeUndefined();
  });
});

describe('verifyUrlWithAlternatives', () => {
  it('attaches alternatives to blocked URLs', async () => {
    const alternatives = [{ title: 'Open copy', url: 'https://open.example.org/copy', snippet: 'Same data' }];
    const gateway = createStubGateway({
      verifyUrl: vi.fn(async (url: string) => ({
        url,
        status: 'blocked' as const,
        accessible: false,
        statusCode: 403,
        title: 'Members only',
      })),
      findAlternativeSources: vi.fn(async () => alternatives),
    });

    const result = await verifyUrlWithAlternatives(gateway, 'https://paywall.example.com/analysis');

    expect(result.status).toBe('blocked');
    expect(result.alternatives).toEqual(alternatives);
    expect(gateway.findAlternativeSources).toHaveBeenCalledWith('Members only', 'https://paywall.example.com/analysis');
  });

  it('returns accessible URLs as they are', async () => {
    const gateway = createStubGateway({
      verifyUrl: vi.fn(async (url: string) => ({ url, status: 'accessible' as const, accessible: true, statusCode: 200 })),
    });

    const result = await verifyUrlWithAlternatives(gateway, 'https://energy.example.com/outlook', 'Prices fell');

    expect(result).toEqual({
      url: 'https://energy.example.com/outlook',
      status: 'accessible',
      accessible: true,
      statusCode: 200,
    });
    expect(gateway.findAlternativeSources).not.toHaveBeenCalled();
  });
});

describe('Authenticity reviewer', () => {
  it('maps patterns to issues and derives readiness from the score', async () => {
    const reviewer = createAuthenticityReviewer({
      generator: scriptedGenerator([
        authenticityJson(85, [
          { pattern: 'Rule of three', severity: 'medium', example: 'fast, cheap, clean', suggestion: 'Keep one' },
        ]),
      ]),
      logger: createMockLogger(),
    });

    const verdict = await reviewer.review(ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(verdict.ready).toBe(true);
    expect(verdict.patterns).toEqual([
      { pattern: 'Rule of three', severity: 'MEDIUM', example: 'fast, cheap, clean', suggestion: 'Keep one' },
    ]);
    expect(verdict.issues).toEqual([
      { severity: 'MEDIUM', type: 'ai_pattern', location: 'fast, cheap, clean', issue: 'Rule of three', correction: 'Keep one' },
    ]);
  });

  it('is not ready with a HIGH pattern', async () => {
    const reviewer = createAuthenticityReviewer({
      generator: scriptedGenerator([
        authenticityJson(90, [{ pattern: 'Stock opener', severity: 'HIGH', example: 'In today\'s world', suggestion: 'Cut' }]),
      ]),
      logger: createMockLogger(),
    });

    const verdict = await reviewer.review(ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(verdict.ready).toBe(false);
  });

  it('lets an explicit ready_to_publish flag decide', async () => {
    const reviewer = createAuthenticityReviewer({
      generator: scriptedGenerator([authenticityJson(85, [], false)]),
      logger: createMockLogger(),
    });

    const verdict = await reviewer.review(ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(verdict.score).toBe(85);
    expect(verdict.ready).toBe(false);
  });

  it('returns a degraded verdict for malformed output', async () => {
    const reviewer = createAuthenticityReviewer({
      generator: scriptedGenerator(['{"authenticity_score": }']),
      logger: createMockLogger(),
    });

    const verdict = await reviewer.review(ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(verdict.parseFailed).toBe(true);
    expect(verdict.ready).toBe(false);
    expect(verdict.assessment).toBe('Authenticity check parsing failed');
  });
});

describe('runReviewPanel', () => {
  function stubPanel(order: string[], failFactCheck = false): ReviewPanel {
    return {
      editor: {
        role: 'editor',
        review: vi.fn(async () => {
          order.push('editor');
          return buildEditorVerdict();
        }),
      },
      factChecker: {
        role: 'fact_checker',
        review: vi.fn(async () => {
          order.push('fact_checker');
          if (failFactCheck) throw new Error('fact-check down');
          return buildFactCheckVerdict();
        }),
      },
      authenticity: {
        role: 'authenticity',
        review: vi.fn(async () => {
          order.push('authenticity');
          return buildAuthenticityVerdict();
        }),
      },
    };
  }

  it('runs reviewers in order on the same snapshot', async () => {
    const order: string[] = [];
    const panel = stubPanel(order);

    const round = await runReviewPanel(panel, ARTICLE, 'Renewable Energy Storage', CONTEXT);

    expect(order).toEqual(['editor', 'fact_checker', 'authenticity']);
    expect(round.editor.role).toBe('editor');
    expect(panel.authenticity.review).toHaveBeenCalledWith(ARTICLE, 'Renewable Energy Storage', CONTEXT);
  });

  it('settles all reviewers in parallel mode before rethrowing a failure', async () => {
    const order: string[] = [];
    const panel = stubPanel(order, true);

    await expect(runReviewPanel(panel, ARTICLE, 'Renewable Energy Storage', CONTEXT, true)).rejects.toThrow(
      'fact-check down'
    );
    expect(order).toHaveLength(3);
  });
});
