/**
 * Structured Output Parsing
 *
 * Single extract-and-parse-with-fallback path for every place where free-form
 * generation output must become structured data. Models often wrap JSON in
 * prose or code fences; sometimes they return no JSON at all.
 */

import type { z } from 'zod';

import type { Logger } from '../../utils/logger';

// ============================================================================
// Types
// ============================================================================

export type ParseOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: string };

// ============================================================================
// Extraction
// ============================================================================

/**
 * Returns the body of the first ```json fence, else of the first ``` fence,
 * else the trimmed input.
 */
export function stripCodeFences(text: string): string {
  const jsonFence = text.indexOf('```json');
  if (jsonFence !== -1) {
    const start = jsonFence + '```json'.length;
    const end = text.indexOf('```', start);
    return (end === -1 ? text.slice(start) : text.slice(start, end)).trim();
  }

  const fence = text.indexOf('```');
  if (fence !== -1) {
    const start = fence + 3;
    const end = text.indexOf('```', start);
    return (end === -1 ? text.slice(start) : text.slice(start, end)).trim();
  }

  return text.trim();
}

function tryParse(candidate: string): ParseOutcome<unknown> {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Finds the JSON value in a generation response.
 *
 * Tries the fence-stripped text as a whole, then the widest `{...}` or `[...]`
 * span (whichever opens first).
 */
export function extractJsonPayload(text: string): ParseOutcome<unknown> {
  const stripped = stripCodeFences(text);
  if (stripped.length === 0) {
    return { ok: false, error: 'Empty response' };
  }

  const whole = tryParse(stripped);
  if (whole.ok) return whole;

  const objectStart = stripped.indexOf('{');
  const arrayStart = stripped.indexOf('[');
  const useArray = arrayStart !== -1 && (objectStart === -1 || arrayStart < objectStart);
  const start = useArray ? arrayStart : objectStart;
  const end = stripped.lastIndexOf(useArray ? ']' : '}');

  if (start === -1 || end <= start) {
    return { ok: false, error: 'No JSON payload found in response' };
  }

  return tryParse(stripped.slice(start, end + 1));
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Extracts JSON from `text` and validates it against `schema`.
 */
export function parseStructuredOutput<S extends z.ZodTypeAny>(
  text: string,
  schema: S
): ParseOutcome<z.infer<S>> {
  const payload = extractJsonPayload(text);
  if (!payload.ok) return payload;

  const result = schema.safeParse(payload.value);
  if (!result.success) {
    const detail = result.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: `Response did not match schema: ${detail}` };
  }

  return { ok: true, value: result.data };
}

/**
 * Like parseStructuredOutput, but never fails: malformed output is logged
 * and replaced with the call site's default.
 *
 * @example
 * const synthesis = parseWithFallback(text, SynthesisSchema, () => ({ confidence: 0.5, gaps: [] }), {
 *   logger: log,
 *   context: 'Synthesis',
 * });
 */
export function parseWithFallback<S extends z.ZodTypeAny, F = z.infer<S>>(
  text: string,
  schema: S,
  fallback: (error: string) => F,
  options: { readonly logger?: Logger; readonly context?: string } = {}
): z.infer<S> | F {
  const outcome = parseStructuredOutput(text, schema);
  if (outcome.ok) return outcome.value;

  options.logger?.warn(
    `${options.context ?? 'Structured output'} could not be parsed, using fallback: ${outcome.error}`
  );
  return fallback(outcome.error);
}
