/**
 * Tavily Web Search API wrapper.
 *
 * Primary web search provider. Advanced depth with the LLM answer included;
 * the answer is surfaced as a summary record by the source gateway.
 *
 * Docs: https://docs.tavily.com/documentation/api-reference/endpoint/search
 */

import { SOURCE_CONFIG } from '../articles/config';
import { clampInt, errorMessage, isRecord, safeString } from './shared';

export type TavilySearchDepth = 'basic' | 'advanced';

export interface TavilySearchOptions {
  readonly searchDepth?: TavilySearchDepth;
  readonly maxResults?: number;
  readonly includeAnswer?: boolean;
  readonly timeoutMs?: number;
}

export interface TavilySearchResult {
  readonly title: string;
  readonly url: string;
  readonly content?: string;
  readonly score?: number;
}

export interface TavilySearchResponse {
  readonly query: string;
  readonly answer: string | null;
  readonly results: readonly TavilySearchResult[];
  /** Set when the search could not run or failed; results are then empty */
  readonly error?: string;
}

export function isTavilyConfigured(): boolean {
  return Boolean(process.env.TAVILY_API_KEY);
}

function parseTavilyResult(raw: unknown): TavilySearchResult | null {
  if (!isRecord(raw)) return null;
  const title = safeString(raw.title);
  const url = safeString(raw.url);
  if (!title || !url) return null;

  const content = safeString(raw.content);
  const score = typeof raw.score === 'number' ? raw.score : undefined;

  return {
    title,
    url,
    ...(content ? { content } : {}),
    ...(score !== undefined ? { score } : {}),
  };
}

export function parseTavilyResponse(query: string, raw: unknown): TavilySearchResponse {
  if (!isRecord(raw)) {
    return { query, answer: null, results: [], error: 'Unexpected response shape' };
  }

  const resultsRaw = Array.isArray(raw.results) ? raw.results : [];
  const results = resultsRaw
    .map(parseTavilyResult)
    .filter((r): r is TavilySearchResult => r !== null);

  return { query, answer: safeString(raw.answer) ?? null, results };
}

/**
 * Tavily search wrapper.
 *
 * Never throws: a missing `TAVILY_API_KEY`, an HTTP error or a transport
 * failure comes back as empty results with `error` set, so callers can fall
 * back to another provider.
 */
export async function tavilySearch(
  query: string,
  options: TavilySearchOptions = {}
): Promise<TavilySearchResponse> {
  const cleanedQuery = query.trim();
  if (cleanedQuery.length === 0) {
    return { query: cleanedQuery, answer: null, results: [] };
  }

  const apiKey = process.env.TAVILY_API_KEY;
  if (!apiKey) {
    return { query: cleanedQuery, answer: null, results: [], error: 'TAVILY_API_KEY not configured' };
  }

  const timeoutMs = clampInt(options.timeoutMs ?? SOURCE_CONFIG.SEARCH_TIMEOUT_MS, 1_000, 60_000);
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch('https://api.tavily.com/search', {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        query: cleanedQuery,
        search_depth: options.searchDepth ?? 'advanced',
        max_results: clampInt(options.maxResults ?? 5, 1, 20),
        include_answer: options.includeAnswer ?? true,
      }),
      signal: controller.signal,
    });

    if (!res.ok) {
      return { query: cleanedQuery, answer: null, results: [], error: `Tavily HTTP ${res.status}` };
    }

    const json: unknown = await res.json();
    return parseTavilyResponse(cleanedQuery, json);
  } catch (error) {
    return { query: cleanedQuery, answer: null, results: [], error: errorMessage(error) };
  } finally {
    clearTimeout(timer);
  }
}
