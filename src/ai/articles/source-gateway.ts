/**
 * Source Gateway
 *
 * Uniform access to every external knowledge source: web search, news,
 * encyclopedia, knowledge base, page extraction and URL verification.
 *
 * Contract: no operation throws. Provider failures are logged and degrade to
 * empty results; web search cascades from Tavily to Exa before giving up.
 */

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { exaSearch } from '../tools/exa';
import { searchGoogleNews, type GoogleNewsOptions } from '../tools/google-news';
import { queryKnowledgeBaseApi } from '../tools/knowledge-base';
import { errorMessage } from '../tools/shared';
import { tavilySearch } from '../tools/tavily';
import { checkUrl, fetchPage, type PageFetchResult, type UrlVerification } from '../tools/web-page';
import { lookupWikipedia, type EncyclopediaLookup } from '../tools/wikipedia';
import { SOURCE_CONFIG } from './config';

// ============================================================================
// Types
// ============================================================================

export type SourceRecordKind = 'web_search' | 'summary' | 'news' | 'knowledge_base';

/**
 * Normalized record returned by every search-style lookup.
 */
export interface SourceRecord {
  readonly kind: SourceRecordKind;
  readonly title: string;
  readonly content: string;
  readonly url?: string;
  readonly score?: number;
  /** Which provider produced the record, e.g. 'tavily', 'tavily_ai_summary', 'exa' */
  readonly provider: string;
  readonly publishedAt?: string;
  readonly publisher?: string;
}

export interface AlternativeSource {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
}

export interface SourceGateway {
  searchWeb(query: string, maxResults: number): Promise<SourceRecord[]>;
  searchNews(query: string, options?: GoogleNewsOptions): Promise<SourceRecord[]>;
  searchEncyclopedia(query: string): Promise<EncyclopediaLookup>;
  queryKnowledgeBase(query: string, maxResults?: number): Promise<SourceRecord[]>;
  fetchAndExtract(url: string): Promise<PageFetchResult>;
  verifyUrl(url: string): Promise<UrlVerification>;
  findAlternativeSources(claim: string, blockedUrl: string): Promise<AlternativeSource[]>;
}

/**
 * Provider functions behind the gateway. Overridable for tests or to swap
 * a provider without touching callers.
 */
export interface SourceProviders {
  readonly tavilySearch: typeof tavilySearch;
  readonly exaSearch: typeof exaSearch;
  readonly searchGoogleNews: typeof searchGoogleNews;
  readonly lookupWikipedia: typeof lookupWikipedia;
  readonly queryKnowledgeBaseApi: typeof queryKnowledgeBaseApi;
  readonly fetchPage: typeof fetchPage;
  readonly checkUrl: typeof checkUrl;
}

export interface SourceGatewayDeps {
  readonly providers?: Partial<SourceProviders>;
  /** URL verification memo; one per gateway unless shared on purpose */
  readonly urlCache?: UrlVerificationCache;
  readonly logger?: Logger;
}

const DEFAULT_PROVIDERS: SourceProviders = {
  tavilySearch,
  exaSearch,
  searchGoogleNews,
  lookupWikipedia,
  queryKnowledgeBaseApi,
  fetchPage,
  checkUrl,
};

// ============================================================================
// URL Verification Cache
// ============================================================================

/**
 * Memo of URL verification outcomes. No eviction: a run verifies a small,
 * bounded set of URLs.
 */
export class UrlVerificationCache {
  private readonly entries = new Map<string, UrlVerification>();

  get(url: string): UrlVerification | undefined {
    return this.entries.get(url);
  }

  set(url: string, result: UrlVerification): void {
    this.entries.set(url, result);
  }

  has(url: string): boolean {
    return this.entries.has(url);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

// ============================================================================
// Helpers
// ============================================================================

function domainOf(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return '';
  }
}

// ============================================================================
// Implementation
// ============================================================================

export class DefaultSourceGateway implements SourceGateway {
  private readonly providers: SourceProviders;
  private readonly urlCache: UrlVerificationCache;
  private readonly log: Logger;
  private warnedKnowledgeBase = false;

  constructor(deps: SourceGatewayDeps = {}) {
    this.providers = { ...DEFAULT_PROVIDERS, ...deps.providers };
    this.urlCache = deps.urlCache ?? new UrlVerificationCache();
    this.log = deps.logger ?? createPrefixedLogger('[Sources]');
  }

  async searchWeb(query: string, maxResults: number): Promise<SourceRecord[]> {
    try {
      const tavily = await this.providers.tavilySearch(query, { maxResults, searchDepth: 'advanced' });
      if (!tavily.error && (tavily.results.length > 0 || tavily.answer)) {
        const records: SourceRecord[] = [];
        if (tavily.answer) {
          records.push({ kind: 'summary', title: 'AI Summary', content: tavily.answer, provider: 'tavily_ai_summary' });
        }
        for (const r of tavily.results) {
          records.push({
            kind: 'web_search',
            title: r.title,
            content: r.content ?? '',
            url: r.url,
            provider: 'tavily',
            ...(r.score !== undefined ? { score: r.score } : {}),
          });
        }
        return records;
      }
      this.log.warn(`Tavily returned nothing for "${query}"${tavily.error ? ` (${tavily.error})` : ''}, trying Exa`);
    } catch (error) {
      this.log.warn(`Tavily search failed for "${query}": ${errorMessage(error)}, trying Exa`);
    }

    try {
      const exa = await this.providers.exaSearch(query, { numResults: maxResults });
      if (exa.error) {
        this.log.warn(`Exa search failed for "${query}": ${exa.error}`);
        return [];
      }
      return exa.results.map((r) => ({
        kind: 'web_search' as const,
        title: r.title,
        content: r.content ?? '',
        url: r.url,
        provider: 'exa',
        ...(r.score !== undefined ? { score: r.score } : {}),
        ...(r.publishedDate ? { publishedAt: r.publishedDate } : {}),
      }));
    } catch (error) {
      this.log.warn(`Exa search failed for "${query}": ${errorMessage(error)}`);
      return [];
    }
  }

  async searchNews(query: string, options: GoogleNewsOptions = {}): Promise<SourceRecord[]> {
    try {
      const news = await this.providers.searchGoogleNews(query, options);
      if (news.error) {
        this.log.warn(`News search failed for "${query}": ${news.error}`);
        return [];
      }
      return news.articles.map((a) => ({
        kind: 'news' as const,
        title: a.title,
        content: a.snippet ?? a.title,
        url: a.url,
        provider: 'google_news',
        ...(a.publishedAt ? { publishedAt: a.publishedAt } : {}),
        ...(a.publisher ? { publisher: a.publisher } : {}),
      }));
    } catch (error) {
      this.log.warn(`News search failed for "${query}": ${errorMessage(error)}`);
      return [];
    }
  }

  async searchEncyclopedia(query: string): Promise<EncyclopediaLookup> {
    try {
      return await this.providers.lookupWikipedia(query);
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }

  async queryKnowledgeBase(
    query: string,
    maxResults: number = SOURCE_CONFIG.DEFAULT_KB_RESULTS
  ): Promise<SourceRecord[]> {
    if (!process.env.KNOWLEDGE_BASE_URL) {
      if (!this.warnedKnowledgeBase) {
        this.log.warn('KNOWLEDGE_BASE_URL not set, skipping knowledge base lookups');
        this.warnedKnowledgeBase = true;
      }
      return [];
    }

    try {
      const kb = await this.providers.queryKnowledgeBaseApi(query, maxResults);
      if (kb.error) {
        this.log.warn(`Knowledge base query failed for "${query}": ${kb.error}`);
        return [];
      }
      return kb.records.map((r) => ({
        kind: 'knowledge_base' as const,
        title: r.title ?? 'Knowledge Base',
        content: r.content,
        provider: 'knowledge_base',
        ...(r.url ? { url: r.url } : {}),
        ...(r.score !== undefined ? { score: r.score } : {}),
      }));
    } catch (error) {
      this.log.warn(`Knowledge base query failed for "${query}": ${errorMessage(error)}`);
      return [];
    }
  }

  async fetchAndExtract(url: string): Promise<PageFetchResult> {
    try {
      const page = await this.providers.fetchPage(url);
      if (!page.ok) {
        this.log.debug(`Could not extract ${url}: ${page.error}`);
      }
      return page;
    } catch (error) {
      return { ok: false, url, error: errorMessage(error) };
    }
  }

  async verifyUrl(url: string): Promise<UrlVerification> {
    const cached = this.urlCache.get(url);
    if (cached) {
      this.log.debug(`URL verification cache hit: ${url}`);
      return cached;
    }

    let result: UrlVerification;
    try {
      result = await this.providers.checkUrl(url);
    } catch (error) {
      return { url, status: 'error', accessible: false, message: errorMessage(error) };
    }

    // Only outcomes backed by an HTTP status are stable enough to memoize
    if (result.statusCode !== undefined) {
      this.urlCache.set(url, result);
    }
    this.log.info(`Verified ${url}: ${result.status}${result.statusCode ? ` (${result.statusCode})` : ''}`);
    return result;
  }

  async findAlternativeSources(claim: string, blockedUrl: string): Promise<AlternativeSource[]> {
    const domain = domainOf(blockedUrl);
    const query = domain ? `${claim} ${domain}` : claim;
    const records = await this.searchWeb(query, SOURCE_CONFIG.ALTERNATIVE_SEARCH_RESULTS);

    const alternatives: AlternativeSource[] = [];
    for (const record of records) {
      if (record.kind === 'summary' || !record.url || record.url === blockedUrl) continue;
      alternatives.push({
        title: record.title,
        url: record.url,
        snippet: record.content.slice(0, SOURCE_CONFIG.ALTERNATIVE_SNIPPET_LENGTH),
      });
      if (alternatives.length >= SOURCE_CONFIG.MAX_ALTERNATIVES) break;
    }

    this.log.info(`Found ${alternatives.length} alternative source(s) for blocked ${blockedUrl}`);
    return alternatives;
  }
}

/**
 * Creates the default gateway with a fresh URL verification cache.
 */
export function createSourceGateway(deps: SourceGatewayDeps = {}): SourceGateway {
  return new DefaultSourceGateway(deps);
}
