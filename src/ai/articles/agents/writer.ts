/**
 * Writer Agents
 *
 * Draft writer: topic + findings → article v1.
 * Rewriter: article vN + combined feedback → article vN+1.
 *
 * Both run through the shared retry policy. Empty output is an error.
 */

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import type { TextGenerator } from '../generation';
import { getDraftPrompt, getRewritePrompt } from '../prompts/writer-prompts';
import { withRetry, type RetryOptions } from '../retry';
import {
  EditorialWorkflowError,
  type CombinedFeedback,
  type EditorialWorkflowErrorCode,
  type Finding,
} from '../types';

// ============================================================================
// Types
// ============================================================================

export interface WriterDeps {
  readonly generator: TextGenerator;
  readonly logger?: Logger;
  readonly retry?: Pick<RetryOptions, 'maxAttempts' | 'initialDelayMs' | 'sleep'>;
}

export interface DraftWriter {
  draft(topic: string, findings: readonly Finding[]): Promise<string>;
}

export interface Rewriter {
  rewrite(article: string, topic: string, feedback: CombinedFeedback): Promise<string>;
}

// ============================================================================
// Helpers
// ============================================================================

const WHOLE_FENCE = /^```(?:markdown|md)?\s*\n([\s\S]*?)\n```\s*$/;

/**
 * Unwraps an article the model returned inside a single Markdown code fence.
 */
export function unwrapArticle(text: string): string {
  const trimmed = text.trim();
  const match = WHOLE_FENCE.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

async function generateArticle(
  deps: WriterDeps,
  log: Logger,
  prompt: string,
  label: string,
  code: EditorialWorkflowErrorCode
): Promise<string> {
  let text: string;
  try {
    text = await withRetry(() => deps.generator.generate(prompt), { context: label, logger: log, ...deps.retry });
  } catch (error) {
    throw new EditorialWorkflowError(
      code,
      `${label} failed: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  const article = unwrapArticle(text);
  if (article.length === 0) {
    throw new EditorialWorkflowError(code, `${label} returned empty output`);
  }
  return article;
}

// ============================================================================
// Factories
// ============================================================================

export function createDraftWriter(deps: WriterDeps): DraftWriter {
  const log = deps.logger ?? createPrefixedLogger('[Writer]');

  return {
    async draft(topic, findings) {
      log.info(`Drafting "${topic}" from ${findings.length} finding(s)`);
      const article = await generateArticle(deps, log, getDraftPrompt(topic, findings), 'Draft', 'DRAFT_FAILED');
      log.info(`Draft complete (${article.length} chars)`);
      return article;
    },
  };
}

export function createRewriter(deps: WriterDeps): Rewriter {
  const log = deps.logger ?? createPrefixedLogger('[Rewriter]');

  return {
    async rewrite(article, topic, feedback) {
      log.info(
        `Rewriting with ${feedback.mergedIssues.length} prioritized issue(s), ` +
          `${feedback.newFindings.length} new finding(s)${feedback.userFeedback ? ', user feedback' : ''}`
      );
      return generateArticle(
        deps,
        log,
        getRewritePrompt(article, topic, feedback),
        'Rewrite',
        'REWRITE_FAILED'
      );
    },
  };
}
