/**
 * Reviewer Panel
 *
 * Shared plumbing for the three independent reviewers (editor, fact-checker,
 * authenticity). Each reviewer sees the same article snapshot and read-only
 * context, calls the model through withRetry and parses the response. A
 * response that cannot be parsed becomes a degraded verdict that never
 * passes the gate.
 */

import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import type { GenerateOptions, TextGenerator } from '../generation';
import { withRetry, type RetryOptions } from '../retry';
import { parseStructuredOutput } from '../structured-output';
import {
  EditorialWorkflowError,
  type AuthenticityVerdict,
  type EditorVerdict,
  type FactCheckVerdict,
  type IssueSeverity,
  type ReviewContext,
  type ReviewerRole,
  type ReviewRound,
  type ReviewVerdict,
} from '../types';

// ============================================================================
// Types
// ============================================================================

export interface Reviewer<V extends ReviewVerdict> {
  readonly role: ReviewerRole;
  review(article: string, topic: string, context: ReviewContext): Promise<V>;
}

export interface ReviewPanel {
  readonly editor: Reviewer<EditorVerdict>;
  readonly factChecker: Reviewer<FactCheckVerdict>;
  readonly authenticity: Reviewer<AuthenticityVerdict>;
}

export interface ReviewerDeps {
  readonly generator: TextGenerator;
  readonly logger?: Logger;
  readonly retry?: Pick<RetryOptions, 'maxAttempts' | 'initialDelayMs' | 'sleep'>;
}

interface ReviewerCall<S extends z.ZodTypeAny, V> {
  readonly label: string;
  readonly prompt: string;
  readonly schema: S;
  readonly options?: GenerateOptions;
  /** Maps a parsed response to the verdict */
  readonly toVerdict: (parsed: z.infer<S>) => V;
  /** Builds the not-ready verdict used when the response cannot be parsed */
  readonly degraded: (rawResponse: string, error: string) => V;
}

// ============================================================================
// Shared Schemas
// ============================================================================

const SEVERITIES: readonly IssueSeverity[] = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'];

function toSeverity(value: string): IssueSeverity {
  const upper = value.trim().toUpperCase();
  return SEVERITIES.find((s) => s === upper) ?? 'LOW';
}

/** Case-insensitive severity; unknown values read as LOW */
export const SeveritySchema = z.string().transform(toSeverity);

/** 0-100 score; numeric strings are accepted */
export const ScoreSchema = z.coerce.number().transform((n) => Math.max(0, Math.min(100, Math.round(n))));

export const StringListSchema = z.array(z.string()).default([]);

// ============================================================================
// Shared Call Path
// ============================================================================

/**
 * Calls the model with retry and turns its response into a verdict.
 *
 * @throws EditorialWorkflowError (REVIEW_FAILED) when generation still fails after retries
 */
export async function runReviewerCall<S extends z.ZodTypeAny, V>(
  deps: ReviewerDeps,
  call: ReviewerCall<S, V>
): Promise<V> {
  const log = deps.logger ?? createPrefixedLogger(`[${call.label}]`);

  let text: string;
  try {
    text = await withRetry(() => deps.generator.generate(call.prompt, call.options), {
      context: `${call.label} review`,
      logger: log,
      ...deps.retry,
    });
  } catch (error) {
    throw new EditorialWorkflowError(
      'REVIEW_FAILED',
      `${call.label} review failed: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  const parsed = parseStructuredOutput(text, call.schema);
  if (!parsed.ok) {
    log.warn(`${call.label} response could not be parsed (${parsed.error}); marking not ready`);
    return call.degraded(text, parsed.error);
  }

  return call.toVerdict(parsed.value);
}

// ============================================================================
// Panel
// ============================================================================

/**
 * Runs all three reviewers on the same snapshot.
 *
 * Sequential by default. With `parallel`, the reviewers run concurrently and
 * the first failure is rethrown once all three have settled.
 */
export async function runReviewPanel(
  panel: ReviewPanel,
  article: string,
  topic: string,
  context: ReviewContext,
  parallel = false
): Promise<ReviewRound> {
  if (!parallel) {
    const editor = await panel.editor.review(article, topic, context);
    const factCheck = await panel.factChecker.review(article, topic, context);
    const authenticity = await panel.authenticity.review(article, topic, context);
    return { editor, factCheck, authenticity };
  }

  const [editor, factCheck, authenticity] = await Promise.allSettled([
    panel.editor.review(article, topic, context),
    panel.factChecker.review(article, topic, context),
    panel.authenticity.review(article, topic, context),
  ]);

  if (editor.status === 'rejected') throw editor.reason;
  if (factCheck.status === 'rejected') throw factCheck.reason;
  if (authenticity.status === 'rejected') throw authenticity.reason;

  return { editor: editor.value, factCheck: factCheck.value, authenticity: authenticity.value };
}
