/**
 * Exa Search API wrapper.
 *
 * Secondary web search provider, used when Tavily is unavailable or finds
 * nothing. Neural search with page text included.
 *
 * Docs: https://docs.exa.ai/reference/search
 */

import { SOURCE_CONFIG } from '../articles/config';
import { clampInt, errorMessage, isRecord, safeString } from './shared';

// ============================================================================
// Types
// ============================================================================

export type ExaSearchType = 'auto' | 'neural' | 'keyword' | 'fast';

export interface ExaSearchOptions {
  /** Number of results to return (1-25). Default: 5 */
  readonly numResults?: number;
  /** Search type. Default: 'auto' */
  readonly type?: ExaSearchType;
  /** Maximum characters of page text per result. Default: 2000 */
  readonly textMaxCharacters?: number;
  /** Only include results from these domains */
  readonly includeDomains?: readonly string[];
  /** Exclude results from these domains */
  readonly excludeDomains?: readonly string[];
  readonly timeoutMs?: number;
}

export interface ExaSearchResult {
  readonly title: string;
  readonly url: string;
  /** Main text content from the page */
  readonly content?: string;
  readonly score?: number;
  readonly publishedDate?: string;
  readonly author?: string;
}

export interface ExaSearchResponse {
  readonly query: string;
  readonly results: readonly ExaSearchResult[];
  /** Set when the search could not run or failed; results are then empty */
  readonly error?: string;
}

// ============================================================================
// Configuration
// ============================================================================

const EXA_API_BASE_URL = 'https://api.exa.ai';

const MIN_RESULTS = 1;
const MAX_RESULTS = 25;
const DEFAULT_RESULTS = 5;
const DEFAULT_TEXT_MAX_CHARS = 2000;

export function isExaConfigured(): boolean {
  return Boolean(process.env.EXA_API_KEY);
}

// ============================================================================
// Response Parsing
// ============================================================================

function parseExaResult(raw: unknown): ExaSearchResult | null {
  if (!isRecord(raw)) return null;

  const title = safeString(raw.title);
  const url = safeString(raw.url);
  if (!title || !url) return null;

  const content = safeString(raw.text);
  const score = typeof raw.score === 'number' ? raw.score : undefined;
  const publishedDate = safeString(raw.publishedDate);
  const author = safeString(raw.author);

  return {
    title,
    url,
    ...(content ? { content } : {}),
    ...(score !== undefined ? { score } : {}),
    ...(publishedDate ? { publishedDate } : {}),
    ...(author ? { author } : {}),
  };
}

export function parseExaResponse(query: string, raw: unknown): ExaSearchResponse {
  if (!isRecord(raw)) {
    return { query, results: [], error: 'Unexpected response shape' };
  }

  const resultsRaw = Array.isArray(raw.results) ? raw.results : [];
  const results = resultsRaw
    .map(parseExaResult)
    .filter((r): r is ExaSearchResult => r !== null);

  return { query, results };
}

// ============================================================================
// API Functions
// ============================================================================

/**
 * Exa search wrapper. Never throws; failures come back with `error` set.
 */
export async function exaSearch(
  query: string,
  options: ExaSearchOptions = {}
): Promise<ExaSearchResponse> {
  const cleanedQuery = query.trim();
  if (cleanedQuery.length === 0) {
    return { query: cleanedQuery, results: [] };
  }

  const apiKey = process.env.EXA_API_KEY;
  if (!apiKey) {
    return { query: cleanedQuery, results: [], error: 'EXA_API_KEY not configured' };
  }

  const timeoutMs = clampInt(options.timeoutMs ?? SOURCE_CONFIG.SEARCH_TIMEOUT_MS, 1_000, 60_000);
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const body: Record<string, unknown> = {
      query: cleanedQuery,
      numResults: clampInt(options.numResults ?? DEFAULT_RESULTS, MIN_RESULTS, MAX_RESULTS),
      type: options.type ?? 'auto',
      contents: {
        text: { maxCharacters: options.textMaxCharacters ?? DEFAULT_TEXT_MAX_CHARS },
      },
    };

    if (options.includeDomains && options.includeDomains.length > 0) {
      body.includeDomains = [...options.includeDomains];
    }
    if (options.excludeDomains && options.excludeDomains.length > 0) {
      body.excludeDomains = [...options.excludeDomains];
    }

    const res = await fetch(`${EXA_API_BASE_URL}/search`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': apiKey,
      },
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    if (!res.ok) {
      return { query: cleanedQuery, results: [], error: `Exa HTTP ${res.status}` };
    }

    const json: unknown = await res.json();
    return parseExaResponse(cleanedQuery, json);
  } catch (error) {
    return { query: cleanedQuery, results: [], error: errorMessage(error) };
  } finally {
    clearTimeout(timer);
  }
}
