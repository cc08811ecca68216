import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import {
  extractJsonPayload,
  parseStructuredOutput,
  parseWithFallback,
  stripCodeFences,
} from '../../../src/ai/articles/structured-output';
import { createMockLogger } from '../../utils/editorial';

const VerdictSchema = z.object({
  score: z.number(),
  notes: z.array(z.string()).default([]),
});

describe('stripCodeFences', () => {
  it('prefers a json fence', () => {
    expect(stripCodeFences('Here:\n```json\n{"score": 1}\n```\nDone')).toBe('{"score": 1}');
  });

  it('falls back to a plain fence', () => {
    expect(stripCodeFences('```\n[1, 2]\n```')).toBe('[1, 2]');
  });

  it('returns trimmed input without fences', () => {
    expect(stripCodeFences('  {"a": 1}  ')).toBe('{"a": 1}');
  });

  it('takes the rest of the text when the fence is never closed', () => {
    expect(stripCodeFences('```json\n{"a": 1}')).toBe('{"a": 1}');
  });
});

describe('extractJsonPayload', () => {
  it('parses a bare JSON document', () => {
    expect(extractJsonPayload('{"score": 80}')).toEqual({ ok: true, value: { score: 80 } });
  });

  it('finds an object embedded in prose', () => {
    const text = 'My assessment follows. {"score": 72, "notes": ["thin sourcing"]} Hope this helps.';
    expect(extractJsonPayload(text)).toEqual({ ok: true, value: { score: 72, notes: ['thin sourcing'] } });
  });

  it('takes an array when it opens before any object', () => {
    expect(extractJsonPayload('Questions: ["What is it?", "Who uses it?"]')).toEqual({
      ok: true,
      value: ['What is it?', 'Who uses it?'],
    });
  });

  it('reports empty responses', () => {
    expect(extractJsonPayload('   ')).toEqual({ ok: false, error: 'Empty response' });
  });

  it('reports text without any JSON', () => {
    expect(extractJsonPayload('I could not review this article.')).toEqual({
      ok: false,
      error: 'No JSON payload found in response',
    });
  });
});

describe('parseStructuredOutput', () => {
  it('validates and applies schema defaults', () => {
    expect(parseStructuredOutput('```json\n{"score": 91}\n```', VerdictSchema)).toEqual({
      ok: true,
      value: { score: 91, notes: [] },
    });
  });

  it('fails with the offending path when the shape is wrong', () => {
    const outcome = parseStructuredOutput('{"score": "high"}', VerdictSchema);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBe('Response did not match schema: score: Expected number, received string');
    }
  });
});

describe('parseWithFallback', () => {
  it('returns the parsed value when valid', () => {
    const value = parseWithFallback('{"score": 50}', VerdictSchema, () => ({ score: 0, notes: ['fallback'] }));
    expect(value).toEqual({ score: 50, notes: [] });
  });

  it('logs and returns the fallback on malformed output', () => {
    const logger = createMockLogger();

    const value = parseWithFallback('not json', VerdictSchema, () => ({ score: 0, notes: ['fallback'] }), {
      logger,
      context: 'Synthesis',
    });

    expect(value).toEqual({ score: 0, notes: ['fallback'] });
    expect(logger.warn).toHaveBeenCalledWith(
      'Synthesis could not be parsed, using fallback: No JSON payload found in response'
    );
  });
});
