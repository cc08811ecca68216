/**
 * Vector knowledge-base retrieval over HTTP.
 *
 * Expects an endpoint accepting `POST { query, max_results }` and answering
 * `{ results: [{ content, title?, url?, score? }] }`. Configured through
 * KNOWLEDGE_BASE_URL (and optionally KNOWLEDGE_BASE_API_KEY).
 */

import { SOURCE_CONFIG } from '../articles/config';
import { clampInt, errorMessage, isRecord, safeString } from './shared';

export interface KnowledgeBaseRecord {
  readonly content: string;
  readonly title?: string;
  readonly url?: string;
  readonly score?: number;
}

export interface KnowledgeBaseResponse {
  readonly query: string;
  readonly records: readonly KnowledgeBaseRecord[];
  readonly error?: string;
}

export function isKnowledgeBaseConfigured(): boolean {
  return Boolean(process.env.KNOWLEDGE_BASE_URL);
}

function parseRecord(raw: unknown): KnowledgeBaseRecord | null {
  if (!isRecord(raw)) return null;
  const content = safeString(raw.content) ?? safeString(raw.text);
  if (!content) return null;

  const title = safeString(raw.title);
  const url = safeString(raw.url) ?? safeString(raw.source);
  const score = typeof raw.score === 'number' ? raw.score : undefined;

  return {
    content,
    ...(title ? { title } : {}),
    ...(url ? { url } : {}),
    ...(score !== undefined ? { score } : {}),
  };
}

export function parseKnowledgeBaseResponse(query: string, raw: unknown): KnowledgeBaseResponse {
  if (!isRecord(raw) || !Array.isArray(raw.results)) {
    return { query, records: [], error: 'Unexpected response shape' };
  }
  const records = raw.results
    .map(parseRecord)
    .filter((r): r is KnowledgeBaseRecord => r !== null);
  return { query, records };
}

/**
 * Retrieves passages from the knowledge base. Never throws.
 */
export async function queryKnowledgeBaseApi(
  query: string,
  maxResults: number = SOURCE_CONFIG.DEFAULT_KB_RESULTS
): Promise<KnowledgeBaseResponse> {
  const cleanedQuery = query.trim();
  if (cleanedQuery.length === 0) {
    return { query: cleanedQuery, records: [] };
  }

  const endpoint = process.env.KNOWLEDGE_BASE_URL;
  if (!endpoint) {
    return { query: cleanedQuery, records: [], error: 'KNOWLEDGE_BASE_URL not configured' };
  }

  const apiKey = process.env.KNOWLEDGE_BASE_API_KEY;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), SOURCE_CONFIG.SEARCH_TIMEOUT_MS);

  try {
    const res = await fetch(endpoint, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {}),
      },
      body: JSON.stringify({ query: cleanedQuery, max_results: clampInt(maxResults, 1, 100) }),
      signal: controller.signal,
    });

    if (!res.ok) {
      return { query: cleanedQuery, records: [], error: `Knowledge base HTTP ${res.status}` };
    }

    const json: unknown = await res.json();
    return parseKnowledgeBaseResponse(cleanedQuery, json);
  } catch (error) {
    return { query: cleanedQuery, records: [], error: errorMessage(error) };
  } finally {
    clearTimeout(timer);
  }
}
