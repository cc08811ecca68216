/**
 * Google News search via the public RSS search feed.
 *
 * Feed items carry the publisher after the last " - " in the title; the
 * snippet is usually a short HTML blurb flattened by rss-parser.
 */

import Parser from 'rss-parser';

import { SOURCE_CONFIG } from '../articles/config';
import { clampInt, errorMessage, safeString } from './shared';

export interface GoogleNewsOptions {
  /** Two-letter country code. Default: 'US' */
  readonly country?: string;
  /** Two-letter language code. Default: 'en' */
  readonly lang?: string;
  readonly maxResults?: number;
  readonly timeoutMs?: number;
}

export interface NewsArticle {
  readonly title: string;
  readonly url: string;
  readonly publisher?: string;
  readonly publishedAt?: string;
  readonly snippet?: string;
}

export interface GoogleNewsResponse {
  readonly query: string;
  readonly articles: readonly NewsArticle[];
  readonly error?: string;
}

const parser = new Parser();

export function buildGoogleNewsUrl(query: string, country: string, lang: string): string {
  const params = new URLSearchParams({
    q: query,
    hl: `${lang}-${country}`,
    gl: country,
    ceid: `${country}:${lang}`,
  });
  return `https://news.google.com/rss/search?${params.toString()}`;
}

function splitPublisher(rawTitle: string): { title: string; publisher?: string } {
  const idx = rawTitle.lastIndexOf(' - ');
  if (idx <= 0) return { title: rawTitle };
  return { title: rawTitle.slice(0, idx).trim(), publisher: rawTitle.slice(idx + 3).trim() };
}

/**
 * Parses a Google News RSS document into articles.
 */
export async function parseGoogleNewsFeed(xml: string, maxResults: number): Promise<NewsArticle[]> {
  const feed = await parser.parseString(xml);
  const articles: NewsArticle[] = [];

  for (const item of feed.items) {
    const rawTitle = safeString(item.title);
    const url = safeString(item.link);
    if (!rawTitle || !url) continue;

    const { title, publisher } = splitPublisher(rawTitle);
    const publishedAt = safeString(item.isoDate) ?? safeString(item.pubDate);
    const snippet = safeString(item.contentSnippet);

    articles.push({
      title,
      url,
      ...(publisher ? { publisher } : {}),
      ...(publishedAt ? { publishedAt } : {}),
      ...(snippet ? { snippet } : {}),
    });

    if (articles.length >= maxResults) break;
  }

  return articles;
}

/**
 * Searches Google News. Never throws; failures come back with `error` set.
 */
export async function searchGoogleNews(
  query: string,
  options: GoogleNewsOptions = {}
): Promise<GoogleNewsResponse> {
  const cleanedQuery = query.trim();
  if (cleanedQuery.length === 0) {
    return { query: cleanedQuery, articles: [] };
  }

  const country = (options.country ?? SOURCE_CONFIG.DEFAULT_NEWS_COUNTRY).toUpperCase();
  const lang = (options.lang ?? SOURCE_CONFIG.DEFAULT_NEWS_LANG).toLowerCase();
  const maxResults = clampInt(options.maxResults ?? SOURCE_CONFIG.DEFAULT_NEWS_RESULTS, 1, 50);
  const timeoutMs = clampInt(options.timeoutMs ?? SOURCE_CONFIG.FETCH_TIMEOUT_MS, 1_000, 60_000);

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(buildGoogleNewsUrl(cleanedQuery, country, lang), {
      headers: { 'User-Agent': SOURCE_CONFIG.USER_AGENT },
      signal: controller.signal,
    });

    if (!res.ok) {
      return { query: cleanedQuery, articles: [], error: `Google News HTTP ${res.status}` };
    }

    const xml = await res.text();
    return { query: cleanedQuery, articles: await parseGoogleNewsFeed(xml, maxResults) };
  } catch (error) {
    return { query: cleanedQuery, articles: [], error: errorMessage(error) };
  } finally {
    clearTimeout(timer);
  }
}
