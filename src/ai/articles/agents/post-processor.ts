/**
 * Post-Processing Pipeline
 *
 * Runs after the revision loop on the approved (or capped) article:
 * 1. Humanizer: light rewrite for rhythm and specificity
 * 2. Layout enhancer: scannability, pull quotes, key statistics
 * 3. Source citations: `[Source: URL]` → numbered references
 * 4. Channel formatter: publication Markdown and HTML
 *
 * No stage can fail the run: a stage that errors (after retry) or returns
 * unusable output is logged and the previous text is kept.
 */

import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { convertSourceCitations } from '../citations';
import type { TextGenerator } from '../generation';
import { getFormatterPrompt, getHumanizerPrompt, getLayoutPrompt } from '../prompts/post-processing-prompts';
import { withRetry, type RetryOptions } from '../retry';
import { parseStructuredOutput } from '../structured-output';
import type { PublicationOutput } from '../types';
import { unwrapArticle } from './writer';

// ============================================================================
// Types
// ============================================================================

export interface PostProcessorDeps {
  readonly humanizer: TextGenerator;
  readonly layout: TextGenerator;
  readonly formatter: TextGenerator;
  readonly logger?: Logger;
  readonly retry?: Pick<RetryOptions, 'maxAttempts' | 'initialDelayMs' | 'sleep'>;
}

export interface LayoutResult {
  readonly markdown: string;
  readonly pullQuotes: readonly string[];
  readonly keyStatistics: readonly string[];
}

export interface FormatResult {
  readonly markdown: string;
  readonly html?: string;
}

// ============================================================================
// Schemas
// ============================================================================

const LayoutResponseSchema = z.object({
  formatted_markdown: z.string().min(1),
  pull_quotes: z.array(z.string()).default([]),
  key_statistics: z.array(z.string()).default([]),
});

const FormatterResponseSchema = z.object({
  formatted_markdown: z.string().min(1),
  html: z.string().optional(),
});

// ============================================================================
// Stages
// ============================================================================

async function generateOrKeep(
  deps: PostProcessorDeps,
  log: Logger,
  generator: TextGenerator,
  prompt: string,
  label: string
): Promise<string | undefined> {
  try {
    return await withRetry(() => generator.generate(prompt), { context: label, logger: log, ...deps.retry });
  } catch (error) {
    log.warn(`${label} failed, keeping previous text: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}

/**
 * One unconditional humanize pass. Empty output keeps the input.
 */
export async function humanizeArticle(article: string, deps: PostProcessorDeps): Promise<string> {
  const log = deps.logger ?? createPrefixedLogger('[PostProcess]');
  const text = await generateOrKeep(deps, log, deps.humanizer, getHumanizerPrompt(article), 'Humanizer');
  if (text === undefined) return article;

  const humanized = unwrapArticle(text);
  if (humanized.length === 0) {
    log.warn('Humanizer returned empty output, keeping input');
    return article;
  }
  return humanized;
}

export async function enhanceLayout(article: string, deps: PostProcessorDeps): Promise<LayoutResult> {
  const log = deps.logger ?? createPrefixedLogger('[PostProcess]');
  const unchanged: LayoutResult = { markdown: article, pullQuotes: [], keyStatistics: [] };

  const text = await generateOrKeep(deps, log, deps.layout, getLayoutPrompt(article), 'Layout');
  if (text === undefined) return unchanged;

  const parsed = parseStructuredOutput(text, LayoutResponseSchema);
  if (!parsed.ok) {
    log.warn(`Layout output unusable (${parsed.error}), keeping input`);
    return unchanged;
  }

  return {
    markdown: parsed.value.formatted_markdown,
    pullQuotes: parsed.value.pull_quotes,
    keyStatistics: parsed.value.key_statistics,
  };
}

export async function formatForChannel(article: string, deps: PostProcessorDeps): Promise<FormatResult> {
  const log = deps.logger ?? createPrefixedLogger('[PostProcess]');

  const text = await generateOrKeep(deps, log, deps.formatter, getFormatterPrompt(article), 'Formatter');
  if (text === undefined) return { markdown: article };

  const parsed = parseStructuredOutput(text, FormatterResponseSchema);
  if (!parsed.ok) {
    log.warn(`Formatter output unusable (${parsed.error}), keeping markdown without HTML`);
    return { markdown: article };
  }

  return {
    markdown: parsed.value.formatted_markdown,
    ...(parsed.value.html ? { html: parsed.value.html } : {}),
  };
}

/**
 * Layout, citations and channel formatting over an already humanized article.
 */
export async function preparePublication(article: string, deps: PostProcessorDeps): Promise<PublicationOutput> {
  const log = deps.logger ?? createPrefixedLogger('[PostProcess]');

  const layout = await enhanceLayout(article, deps);
  const cited = convertSourceCitations(layout.markdown);
  log.info(`Numbered ${cited.sources.length} cited source(s)`);
  const formatted = await formatForChannel(cited.markdown, deps);

  return {
    markdown: formatted.markdown,
    ...(formatted.html ? { html: formatted.html } : {}),
    pullQuotes: layout.pullQuotes,
    keyStatistics: layout.keyStatistics,
  };
}
