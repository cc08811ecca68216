/**
 * Text Generation Capability
 *
 * Every agent talks to the language model through `TextGenerator`: a prompt
 * goes in, text comes out. Structure is recovered afterwards with
 * structured-output.ts, so agents never depend on provider-side JSON modes.
 */

import { generateText, stepCountIs, type LanguageModel, type ToolSet } from 'ai';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { GENERATION_CONFIG } from './config';

// ============================================================================
// Types
// ============================================================================

export interface GenerateOptions {
  /** Tools the model may call before answering */
  readonly tools?: ToolSet;
  /** Upper bound on model steps when tools are given (default: 5) */
  readonly maxToolSteps?: number;
}

/**
 * Opaque text-transformation capability.
 */
export interface TextGenerator {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface TextGeneratorDeps {
  readonly model: LanguageModel;
  readonly system?: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
  /** Per-call timeout (default: GENERATION_CONFIG.TIMEOUT_MS) */
  readonly timeoutMs?: number;
  /** Label used in logs, e.g. "Editor" */
  readonly label?: string;
  readonly generateText?: typeof generateText;
  readonly logger?: Logger;
}

// ============================================================================
// Factory
// ============================================================================

const DEFAULT_TOOL_STEPS = 5;

/**
 * Creates a TextGenerator over the AI SDK's generateText.
 *
 * @example
 * const editor = createTextGenerator({
 *   model: openrouter(getModel('EDITOR')),
 *   system: getEditorSystemPrompt(),
 *   temperature: 0.3,
 *   label: 'Editor',
 * });
 * const text = await editor.generate(prompt);
 */
export function createTextGenerator(deps: TextGeneratorDeps): TextGenerator {
  const genText = deps.generateText ?? generateText;
  const log = deps.logger ?? createPrefixedLogger(`[${deps.label ?? 'Generate'}]`);
  const timeoutMs = deps.timeoutMs ?? GENERATION_CONFIG.TIMEOUT_MS;

  return {
    async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
      const { text, usage } = await genText({
        model: deps.model,
        system: deps.system,
        prompt,
        temperature: deps.temperature,
        maxOutputTokens: deps.maxOutputTokens ?? GENERATION_CONFIG.MAX_OUTPUT_TOKENS,
        abortSignal: AbortSignal.timeout(timeoutMs),
        tools: options.tools,
        stopWhen: options.tools ? stepCountIs(options.maxToolSteps ?? DEFAULT_TOOL_STEPS) : undefined,
      });

      log.debug(
        `Generated ${text.length} chars (tokens in: ${usage.inputTokens ?? 0}, out: ${usage.outputTokens ?? 0})`
      );
      return text;
    },
  };
}
