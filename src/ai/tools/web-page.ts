/**
 * Web page fetching: readable-text extraction and URL verification.
 *
 * Extraction works on raw markup with regular expressions: drop chrome
 * elements, keep the first of article / main / body, strip tags and
 * entities, collapse whitespace.
 */

import { SOURCE_CONFIG } from '../articles/config';
import { errorMessage, isAbortError } from './shared';
import { assertPublicUrl, isUnsafeUrlError } from './url-guard';

// ============================================================================
// Types
// ============================================================================

export interface ExtractedPage {
  readonly ok: true;
  readonly url: string;
  readonly title: string;
  readonly content: string;
}

export interface PageError {
  readonly ok: false;
  readonly url: string;
  readonly error: string;
}

export type PageFetchResult = ExtractedPage | PageError;

export type UrlStatus = 'accessible' | 'blocked' | 'timeout' | 'error';

export interface UrlVerification {
  readonly url: string;
  readonly status: UrlStatus;
  readonly accessible: boolean;
  readonly statusCode?: number;
  /** URL after redirects */
  readonly finalUrl?: string;
  readonly title?: string;
  readonly snippet?: string;
  readonly contentLength?: number;
  readonly message?: string;
}

// ============================================================================
// Extraction
// ============================================================================

const REMOVED_ELEMENTS = ['script', 'style', 'nav', 'footer', 'header', 'aside', 'iframe', 'noscript'];

const CONTAINER_PATTERNS = [
  /<article\b[^>]*>([\s\S]*?)<\/article>/i,
  /<main\b[^>]*>([\s\S]*?)<\/main>/i,
  /<body\b[^>]*>([\s\S]*)<\/body>/i,
];

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  mdash: '-',
  ndash: '-',
  hellip: '...',
  rsquo: "'",
  lsquo: "'",
  rdquo: '"',
  ldquo: '"',
};

/** HTTP statuses that mean the page exists but we may not read it */
const BLOCKED_STATUSES = new Set([401, 402, 403, 451]);

const PAYWALL_PATTERNS = [
  /subscribe (now )?to (continue|keep) reading/i,
  /this (article|content|story) is (only )?(available )?(for|to) (paid )?subscribers/i,
  /subscriber[- ]only content/i,
  /sign in to (continue|keep) reading/i,
];

const MAX_CODE_POINT = 0x10ffff;

/** Character for a numeric entity, or the entity itself when out of range */
function fromCodePointOr(entity: string, codePoint: number): string {
  return Number.isInteger(codePoint) && codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : entity;
}

export function decodeEntities(text: string): string {
  return text
    .replace(/&#x([0-9a-f]+);/gi, (match, hex: string) => fromCodePointOr(match, parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (match, dec: string) => fromCodePointOr(match, parseInt(dec, 10)))
    .replace(/&([a-z]+);/gi, (match, name: string) => NAMED_ENTITIES[name.toLowerCase()] ?? match);
}

function stripTags(html: string): string {
  return decodeEntities(html.replace(/<[^>]+>/g, ' ')).replace(/\s+/g, ' ').trim();
}

export function extractTitle(html: string): string {
  const match = html.match(/<title\b[^>]*>([\s\S]*?)<\/title>/i);
  return match ? stripTags(match[1] ?? '') : '';
}

/**
 * Extracts readable text from a page.
 */
export function extractReadableText(
  html: string,
  maxLength: number = SOURCE_CONFIG.MAX_EXTRACTED_CONTENT_LENGTH
): string {
  let cleaned = html.replace(/<!--[\s\S]*?-->/g, ' ');
  for (const tag of REMOVED_ELEMENTS) {
    cleaned = cleaned.replace(new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}\\s*>`, 'gi'), ' ');
  }

  let container = cleaned;
  for (const pattern of CONTAINER_PATTERNS) {
    const match = cleaned.match(pattern);
    if (match && match[1] !== undefined) {
      container = match[1];
      break;
    }
  }

  return stripTags(container).slice(0, maxLength);
}

export function looksPaywalled(text: string): boolean {
  return PAYWALL_PATTERNS.some((pattern) => pattern.test(text));
}

// ============================================================================
// HTTP
// ============================================================================

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

interface PageResponse {
  readonly res: Response;
  /** URL of the last hop */
  readonly finalUrl: string;
  /** Deadline shared by the request, every redirect and the body read */
  readonly signal: AbortSignal;
}

/**
 * GET with redirects followed by hand so that every hop goes through
 * assertPublicUrl before it is requested.
 */
async function getPage(url: string, timeoutMs: number): Promise<PageResponse> {
  const signal = AbortSignal.timeout(timeoutMs);
  let current = url;

  for (let hop = 0; ; hop++) {
    const res = await fetch(current, {
      headers: {
        'User-Agent': SOURCE_CONFIG.USER_AGENT,
        Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
      },
      redirect: 'manual',
      signal,
    });

    const location = res.headers.get('location');
    if (!REDIRECT_STATUSES.has(res.status) || !location) {
      return { res, finalUrl: current, signal };
    }
    await res.body?.cancel();

    if (hop >= SOURCE_CONFIG.MAX_REDIRECTS) {
      throw new Error(`Too many redirects (more than ${SOURCE_CONFIG.MAX_REDIRECTS})`);
    }
    current = assertPublicUrl(new URL(location, current).href).href;
  }
}

/**
 * Reads the body under the request deadline. Rejects with the signal's
 * reason once it fires, whether or not the transport stops the stream.
 */
function readText(res: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<string>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    res.text().then(
      (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Fetches a page and extracts its title and readable text. Never throws.
 */
export async function fetchPage(
  url: string,
  timeoutMs: number = SOURCE_CONFIG.FETCH_TIMEOUT_MS
): Promise<PageFetchResult> {
  try {
    assertPublicUrl(url);
    const { res, signal } = await getPage(url, timeoutMs);
    if (!res.ok) {
      return { ok: false, url, error: `HTTP ${res.status}` };
    }
    const html = await readText(res, signal);
    return { ok: true, url, title: extractTitle(html), content: extractReadableText(html) };
  } catch (error) {
    return { ok: false, url, error: isAbortError(error) ? 'timeout' : errorMessage(error) };
  }
}

/**
 * Checks that a cited URL resolves to a readable page. Never throws.
 *
 * - `accessible`: 200 with readable content
 * - `blocked`: 401/402/403/451, or a 200 page behind a paywall notice
 * - `timeout`: no complete response (headers and body) within the timeout
 * - `error`: unsafe URL or redirect target, other status codes, transport failures
 */
export async function checkUrl(
  url: string,
  timeoutMs: number = SOURCE_CONFIG.FETCH_TIMEOUT_MS
): Promise<UrlVerification> {
  try {
    assertPublicUrl(url);
  } catch (error) {
    return {
      url,
      status: 'error',
      accessible: false,
      message: isUnsafeUrlError(error) ? error.message : errorMessage(error),
    };
  }

  let page: PageResponse;
  try {
    page = await getPage(url, timeoutMs);
  } catch (error) {
    if (isAbortError(error)) {
      return { url, status: 'timeout', accessible: false, message: 'timeout' };
    }
    return { url, status: 'error', accessible: false, message: errorMessage(error) };
  }

  const { res, finalUrl, signal } = page;

  if (BLOCKED_STATUSES.has(res.status)) {
    return {
      url,
      status: 'blocked',
      accessible: false,
      statusCode: res.status,
      finalUrl,
      message: `Access restricted (HTTP ${res.status})`,
    };
  }

  if (res.status !== 200) {
    return { url, status: 'error', accessible: false, statusCode: res.status, finalUrl, message: `HTTP ${res.status}` };
  }

  let html: string;
  try {
    html = await readText(res, signal);
  } catch (error) {
    if (isAbortError(error)) {
      return { url, status: 'timeout', accessible: false, statusCode: res.status, finalUrl, message: 'timeout' };
    }
    return { url, status: 'error', accessible: false, statusCode: res.status, finalUrl, message: errorMessage(error) };
  }

  const text = extractReadableText(html);
  const title = extractTitle(html);
  const paywalled = looksPaywalled(text);

  return {
    url,
    status: paywalled ? 'blocked' : 'accessible',
    accessible: !paywalled,
    statusCode: res.status,
    finalUrl,
    ...(title ? { title } : {}),
    snippet: text.slice(0, SOURCE_CONFIG.VERIFY_SNIPPET_LENGTH),
    contentLength: html.length,
    ...(paywalled ? { message: 'Paywall detected' } : {}),
  };
}
