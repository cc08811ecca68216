/**
 * Model Selection
 *
 * Centralized model selection for every editorial role.
 * Change default models here - no need to modify individual agents.
 */

/**
 * Environment variable names for each role.
 * Set these env vars to override the default models.
 */
export const AI_ENV_KEYS = {
  RESEARCH: 'AI_MODEL_RESEARCH',
  WRITER: 'AI_MODEL_WRITER',
  EDITOR: 'AI_MODEL_EDITOR',
  FACT_CHECKER: 'AI_MODEL_FACT_CHECKER',
  AUTHENTICITY: 'AI_MODEL_AUTHENTICITY',
  REWRITER: 'AI_MODEL_REWRITER',
  HUMANIZER: 'AI_MODEL_HUMANIZER',
  LAYOUT: 'AI_MODEL_LAYOUT',
  FORMATTER: 'AI_MODEL_FORMATTER',
} as const;

/**
 * Default models for each role (OpenRouter ids).
 * Environment variables (AI_ENV_KEYS) take precedence over these defaults.
 *
 * Available models (OpenRouter):
 * - 'deepseek/deepseek-v3.2' - Fast, cost-effective, good quality
 * - 'anthropic/claude-sonnet-4' - Best quality for long-form prose
 * - 'openai/gpt-4o' - High quality, reliable tool calling
 */
export const AI_DEFAULT_MODELS = {
  RESEARCH: 'deepseek/deepseek-v3.2',
  WRITER: 'anthropic/claude-sonnet-4',
  EDITOR: 'anthropic/claude-sonnet-4',
  FACT_CHECKER: 'openai/gpt-4o',
  AUTHENTICITY: 'deepseek/deepseek-v3.2',
  REWRITER: 'anthropic/claude-sonnet-4',
  HUMANIZER: 'anthropic/claude-sonnet-4',
  LAYOUT: 'deepseek/deepseek-v3.2',
  FORMATTER: 'deepseek/deepseek-v3.2',
} as const;

export type AIRoleKey = keyof typeof AI_ENV_KEYS;
export type AIEnvKey = (typeof AI_ENV_KEYS)[AIRoleKey];

/**
 * Get the model for a specific role.
 * Checks the environment variable first, falls back to the default model.
 *
 * @example
 * const model = getModel('EDITOR');
 * // Returns env var AI_MODEL_EDITOR if set, otherwise 'anthropic/claude-sonnet-4'
 */
export function getModel(role: AIRoleKey): string {
  const envKey = AI_ENV_KEYS[role];
  const defaultModel = AI_DEFAULT_MODELS[role];
  return process.env[envKey] || defaultModel;
}
