/**
 * Research Coordinator
 *
 * Turns a topic into findings:
 * 1. Cache check (a hit ends the run)
 * 2. Topic analysis into research questions
 * 3. Iterations of gather → synthesize → follow the gaps, until confidence
 *    reaches the threshold, the iteration cap is hit, or no gaps remain
 * 4. Best-effort cache write
 *
 * Also hosts targeted research: narrow searches for claims flagged in review.
 */

import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { RESEARCH_CONFIG } from '../config';
import type { TextGenerator } from '../generation';
import type { ResearchMemory } from '../memory';
import { getSynthesisPrompt, getTopicAnalysisPrompt } from '../prompts/research-prompts';
import type { ResearchCache } from '../research-cache';
import { isSourcingIssue } from '../revision-gates';
import { withRetry, type RetryOptions } from '../retry';
import type { SourceGateway } from '../source-gateway';
import { parseWithFallback } from '../structured-output';
import {
  systemClock,
  type Clock,
  type EditorVerdict,
  type FactCheckVerdict,
  type Finding,
  type ResearchRequest,
  type ResearchResult,
  type ResearchSynthesis,
} from '../types';

// ============================================================================
// Types
// ============================================================================

export interface ResearchDeps {
  readonly gateway: SourceGateway;
  /** Generator for topic analysis and synthesis */
  readonly generator: TextGenerator;
  readonly cache?: ResearchCache;
  readonly memory?: ResearchMemory;
  readonly logger?: Logger;
  readonly clock?: Clock;
  /** Retry tuning for generation calls (tests shorten the delays) */
  readonly retry?: Pick<RetryOptions, 'maxAttempts' | 'initialDelayMs' | 'sleep'>;
}

export interface ResearchOptions {
  /** Read from and write to the cache (default: true) */
  readonly useCache?: boolean;
  readonly maxIterations?: number;
  readonly confidenceThreshold?: number;
  /** Query news search for every question (default: true) */
  readonly includeNews?: boolean;
}

/**
 * Research Coordinator capability as seen by the workflow.
 */
export interface ResearchCoordinator {
  research(topic: string, options?: ResearchOptions): Promise<ResearchResult>;
  targetedResearch(requests: readonly ResearchRequest[]): Promise<Finding[]>;
  /** Findings cached for the topic, if any, without running research */
  cachedFindings(topic: string): Promise<readonly Finding[]>;
}

// ============================================================================
// Schemas
// ============================================================================

const QuestionsSchema = z.union([
  z.array(z.string()),
  z.object({ questions: z.array(z.string()) }).transform((o) => o.questions),
]);

const SynthesisSchema = z.object({
  confidence: z.coerce.number(),
  gaps: z.array(z.string()).default([]),
});

// ============================================================================
// Helpers
// ============================================================================

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return RESEARCH_CONFIG.FALLBACK_CONFIDENCE;
  return Math.max(0, Math.min(1, value));
}

function cleanQuestions(questions: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const q of questions) {
    const trimmed = q.trim();
    if (trimmed.length === 0 || seen.has(trimmed.toLowerCase())) continue;
    seen.add(trimmed.toLowerCase());
    result.push(trimmed);
  }
  return result;
}

/**
 * First N whitespace-delimited tokens of a claim.
 *
 * @example
 * buildTargetedQuery('Grid batteries stored 40 GWh in 2023 across Europe')
 * // → "Grid batteries stored 40 GWh"
 */
export function buildTargetedQuery(claim: string, tokens: number = RESEARCH_CONFIG.TARGETED_QUERY_TOKENS): string {
  return claim.trim().split(/\s+/).slice(0, tokens).join(' ');
}

// ============================================================================
// Topic Analysis & Synthesis
// ============================================================================

/**
 * Generates the initial research questions. Falls back to `[topic]` on
 * malformed or empty output.
 */
export async function analyzeTopic(topic: string, deps: ResearchDeps): Promise<string[]> {
  const log = deps.logger ?? createPrefixedLogger('[Research]');
  const text = await withRetry(() => deps.generator.generate(getTopicAnalysisPrompt(topic)), {
    context: 'Topic analysis',
    logger: log,
    ...deps.retry,
  });

  const questions = cleanQuestions(
    parseWithFallback(text, QuestionsSchema, () => [topic], { logger: log, context: 'Topic analysis' })
  );
  return questions.length > 0 ? questions : [topic];
}

/**
 * Scores coverage of the findings so far. Falls back to neutral confidence
 * with no gaps, which ends the loop.
 */
export async function synthesizeFindings(
  topic: string,
  findings: readonly Finding[],
  deps: ResearchDeps
): Promise<ResearchSynthesis> {
  const log = deps.logger ?? createPrefixedLogger('[Research]');
  const text = await withRetry(() => deps.generator.generate(getSynthesisPrompt(topic, findings)), {
    context: 'Research synthesis',
    logger: log,
    ...deps.retry,
  });

  const parsed = parseWithFallback(
    text,
    SynthesisSchema,
    () => ({ confidence: RESEARCH_CONFIG.FALLBACK_CONFIDENCE, gaps: [] }),
    { logger: log, context: 'Research synthesis' }
  );

  return { confidence: clampConfidence(parsed.confidence), gaps: cleanQuestions(parsed.gaps) };
}

// ============================================================================
// Gathering
// ============================================================================

/**
 * Queries every source type for each question: knowledge base, then web
 * (search and page extraction), then news.
 */
export async function gatherFindings(
  questions: readonly string[],
  deps: ResearchDeps,
  options: ResearchOptions = {}
): Promise<Finding[]> {
  const log = deps.logger ?? createPrefixedLogger('[Research]');
  const findings: Finding[] = [];

  for (const question of questions) {
    const kbRecords = await deps.gateway.queryKnowledgeBase(question, RESEARCH_CONFIG.KB_RESULTS_PER_QUESTION);
    for (const record of kbRecords) {
      findings.push({
        source: 'knowledge_base',
        title: record.title,
        content: record.content,
        ...(record.url ? { url: record.url } : {}),
        ...(record.score !== undefined ? { score: record.score } : {}),
        type: 'knowledge_base',
      });
    }

    const webRecords = await deps.gateway.searchWeb(question, RESEARCH_CONFIG.WEB_RESULTS_PER_QUESTION);
    for (const record of webRecords) {
      if (record.kind !== 'web_search' || !record.url) continue;
      const page = await deps.gateway.fetchAndExtract(record.url);
      if (!page.ok) {
        log.debug(`Dropping ${record.url}: ${page.error}`);
        continue;
      }
      findings.push({
        source: 'web',
        title: page.title || record.title,
        content: page.content,
        url: page.url,
        ...(record.score !== undefined ? { score: record.score } : {}),
        type: 'web',
      });
    }

    if (options.includeNews ?? true) {
      const newsRecords = await deps.gateway.searchNews(question, {
        maxResults: RESEARCH_CONFIG.NEWS_RESULTS_PER_QUESTION,
      });
      for (const record of newsRecords) {
        findings.push({
          source: 'news',
          title: record.title,
          content: record.publisher ? `${record.content} (${record.publisher})` : record.content,
          ...(record.url ? { url: record.url } : {}),
          type: 'news',
        });
      }
    }
  }

  return findings;
}

// ============================================================================
// Main Entry Points
// ============================================================================

/**
 * Runs the full research loop for a topic.
 *
 * @example
 * const result = await runResearch('Renewable Energy Storage', { gateway, generator, cache });
 * console.log(result.findings.length, result.confidence);
 */
export async function runResearch(
  topic: string,
  deps: ResearchDeps,
  options: ResearchOptions = {}
): Promise<ResearchResult> {
  const log = deps.logger ?? createPrefixedLogger('[Research]');
  const clock = deps.clock ?? systemClock;
  const useCache = options.useCache ?? true;
  const maxIterations = options.maxIterations ?? RESEARCH_CONFIG.MAX_ITERATIONS;
  const threshold = options.confidenceThreshold ?? RESEARCH_CONFIG.CONFIDENCE_THRESHOLD;

  if (useCache && deps.cache) {
    const cached = await deps.cache.load(topic);
    if (cached) {
      log.info(`Using cached research for "${topic}" (${cached.findings.length} findings)`);
      return cached;
    }
  }

  log.info(`Researching "${topic}"`);
  let questions = await analyzeTopic(topic, deps);
  log.info(`Topic analysis produced ${questions.length} question(s)`);

  const findings: Finding[] = [];
  let synthesis: ResearchSynthesis = { confidence: 0, gaps: [] };
  let iterations = 0;

  while (iterations < maxIterations && synthesis.confidence < threshold) {
    iterations++;
    log.info(`Iteration ${iterations}/${maxIterations}: ${questions.length} open question(s)`);

    if (iterations === 1) {
      const background = await deps.gateway.searchEncyclopedia(topic);
      if (background.ok) {
        findings.push({
          source: 'encyclopedia',
          title: background.title,
          content: background.summary,
          url: background.url,
          type: 'background',
        });
      } else {
        log.warn(`Encyclopedia lookup skipped: ${background.error}`);
      }
    }

    findings.push(...(await gatherFindings(questions, deps, options)));

    synthesis = await synthesizeFindings(topic, findings, deps);
    log.info(
      `Iteration ${iterations}: ${findings.length} findings, confidence ${synthesis.confidence.toFixed(2)}, ` +
        `${synthesis.gaps.length} gap(s)`
    );

    questions = [...synthesis.gaps];
    if (questions.length === 0) break;
  }

  const result: ResearchResult = {
    topic,
    findings,
    synthesis,
    confidence: synthesis.confidence,
    iterations,
    timestamp: new Date(clock.now()).toISOString(),
  };

  // Fresh results always refresh the cache, even when the read was skipped
  if (deps.cache) {
    await deps.cache.save(result);
  }

  if (deps.memory) {
    try {
      await deps.memory.rememberResearch(result);
    } catch (error) {
      log.warn(`Research memory write failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  return result;
}

/**
 * Runs one bounded web search per flagged claim. A failing request is
 * logged and skipped.
 */
export async function runTargetedResearch(
  requests: readonly ResearchRequest[],
  deps: Pick<ResearchDeps, 'gateway' | 'logger'>
): Promise<Finding[]> {
  const log = deps.logger ?? createPrefixedLogger('[Research]');
  const findings: Finding[] = [];

  for (const request of requests) {
    const query = buildTargetedQuery(request.claim);
    if (query.length === 0) continue;

    try {
      const records = await deps.gateway.searchWeb(query, RESEARCH_CONFIG.TARGETED_MAX_RESULTS);
      for (const record of records) {
        findings.push({
          source: 'targeted_search',
          title: record.title,
          content: record.content,
          ...(record.url ? { url: record.url } : {}),
          ...(record.score !== undefined ? { score: record.score } : {}),
          type: 'targeted_internet_search',
          relatedClaim: request.claim,
          priority: request.priority,
        });
      }
    } catch (error) {
      log.warn(`Targeted research failed for "${query}": ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  log.info(`Targeted research: ${findings.length} finding(s) for ${requests.length} request(s)`);
  return findings;
}

/**
 * Derives targeted research requests from review feedback.
 *
 * - Fact-check CRITICAL/HIGH sourcing issues, keyed by their location
 * - Editor improvements whose suggestion asks for research, sources or citations
 */
export function extractResearchRequests(
  factCheck?: FactCheckVerdict,
  editor?: EditorVerdict
): ResearchRequest[] {
  const requests: ResearchRequest[] = [];

  for (const issue of factCheck?.issues ?? []) {
    if (issue.severity !== 'CRITICAL' && issue.severity !== 'HIGH') continue;
    if (!isSourcingIssue(issue)) continue;
    requests.push({
      claim: issue.location || issue.issue,
      issue: issue.issue,
      ...(issue.correction ? { correction: issue.correction } : {}),
      priority: issue.severity === 'CRITICAL' ? 'critical' : 'high',
    });
  }

  for (const improvement of editor?.improvements ?? []) {
    if (/research|source|citation/i.test(improvement.suggestion)) {
      requests.push({
        claim: improvement.suggestion,
        issue: 'Editor requested more research',
        priority: 'medium',
      });
    }
  }

  return requests;
}

/**
 * Binds the coordinator functions to a set of deps.
 */
export function createResearchCoordinator(deps: ResearchDeps): ResearchCoordinator {
  return {
    research: (topic, options) => runResearch(topic, deps, options),
    targetedResearch: (requests) => runTargetedResearch(requests, deps),
    cachedFindings: async (topic) => (await deps.cache?.load(topic))?.findings ?? [],
  };
}
