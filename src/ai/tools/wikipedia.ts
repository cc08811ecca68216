/**
 * Wikipedia lookup: opensearch to resolve the best-matching page title, then
 * the REST summary endpoint for the lead extract.
 */

import { SOURCE_CONFIG } from '../articles/config';
import { clampInt, errorMessage, isRecord, safeString } from './shared';

export interface EncyclopediaSummary {
  readonly ok: true;
  readonly title: string;
  readonly summary: string;
  readonly url: string;
}

export interface EncyclopediaError {
  readonly ok: false;
  readonly error: string;
}

export type EncyclopediaLookup = EncyclopediaSummary | EncyclopediaError;

export interface WikipediaOptions {
  /** Wikipedia language edition. Default: 'en' */
  readonly lang?: string;
  /** Sentences kept from the extract. Default: 5 */
  readonly sentences?: number;
  readonly timeoutMs?: number;
}

/**
 * Keeps the first `count` sentences of a plain-text extract.
 */
export function clipSentences(text: string, count: number): string {
  const sentences = text.match(/[^.!?]+[.!?]+(\s|$)/g);
  if (!sentences || sentences.length <= count) return text.trim();
  return sentences.slice(0, count).join('').trim();
}

async function getJson(url: string, signal: AbortSignal): Promise<unknown> {
  const res = await fetch(url, {
    headers: { 'User-Agent': SOURCE_CONFIG.USER_AGENT, Accept: 'application/json' },
    signal,
  });
  if (!res.ok) {
    throw new Error(`Wikipedia HTTP ${res.status}`);
  }
  return res.json();
}

function firstTitle(raw: unknown): string | undefined {
  // opensearch: [query, [titles], [descriptions], [urls]]
  if (!Array.isArray(raw)) return undefined;
  const titles: unknown = raw[1];
  return Array.isArray(titles) ? safeString(titles[0]) : undefined;
}

/**
 * Looks up an encyclopedic summary. Never throws.
 */
export async function lookupWikipedia(
  query: string,
  options: WikipediaOptions = {}
): Promise<EncyclopediaLookup> {
  const cleanedQuery = query.trim();
  if (cleanedQuery.length === 0) {
    return { ok: false, error: 'Empty query' };
  }

  const lang = options.lang ?? 'en';
  const base = `https://${lang}.wikipedia.org`;
  const timeoutMs = clampInt(options.timeoutMs ?? SOURCE_CONFIG.FETCH_TIMEOUT_MS, 1_000, 60_000);
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const searchParams = new URLSearchParams({
      action: 'opensearch',
      search: cleanedQuery,
      limit: '1',
      namespace: '0',
      format: 'json',
    });
    const title = firstTitle(await getJson(`${base}/w/api.php?${searchParams.toString()}`, controller.signal));
    if (!title) {
      return { ok: false, error: `No Wikipedia page found for "${cleanedQuery}"` };
    }

    const summary = await getJson(
      `${base}/api/rest_v1/page/summary/${encodeURIComponent(title.replace(/ /g, '_'))}`,
      controller.signal
    );
    if (!isRecord(summary)) {
      return { ok: false, error: 'Unexpected summary response' };
    }

    const extract = safeString(summary.extract);
    if (!extract) {
      return { ok: false, error: `Wikipedia page "${title}" has no extract` };
    }

    const contentUrls = isRecord(summary.content_urls) ? summary.content_urls : undefined;
    const desktop = contentUrls && isRecord(contentUrls.desktop) ? contentUrls.desktop : undefined;
    const url = safeString(desktop?.page) ?? `${base}/wiki/${encodeURIComponent(title.replace(/ /g, '_'))}`;

    return {
      ok: true,
      title: safeString(summary.title) ?? title,
      summary: clipSentences(extract, options.sentences ?? SOURCE_CONFIG.ENCYCLOPEDIA_SENTENCES),
      url,
    };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  } finally {
    clearTimeout(timer);
  }
}
