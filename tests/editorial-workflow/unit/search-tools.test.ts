import { describe, it, expect, vi, afterEach } from 'vitest';

import { exaSearch, parseExaResponse } from '../../../src/ai/tools/exa';
import { buildGoogleNewsUrl, parseGoogleNewsFeed, searchGoogleNews } from '../../../src/ai/tools/google-news';
import { queryKnowledgeBaseApi } from '../../../src/ai/tools/knowledge-base';
import { tavilySearch } from '../../../src/ai/tools/tavily';
import { clipSentences, lookupWikipedia } from '../../../src/ai/tools/wikipedia';
import { errorHandlers, MOCK_KB_URL, MOCK_NEWS_RSS } from '../../mocks/handlers';
import { server } from '../../mocks/server';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('tavilySearch', () => {
  it('returns the answer and parsed results', async () => {
    const response = await tavilySearch('  energy storage  ', { maxResults: 2 });

    expect(response).toEqual({
      query: 'energy storage',
      answer: 'Grid-scale batteries are the fastest-growing form of energy storage.',
      results: [
        {
          title: 'Battery storage outlook',
          url: 'https://energy.example.com/outlook',
          content: 'Installed battery capacity doubled over two years.',
          score: 0.91,
        },
        {
          title: 'Pumped hydro explained',
          url: 'https://energy.example.com/pumped-hydro',
          content: 'Pumped hydro still holds most stored energy worldwide.',
          score: 0.84,
        },
      ],
    });
  });

  it('reports a missing API key without calling the API', async () => {
    vi.stubEnv('TAVILY_API_KEY', '');

    expect(await tavilySearch('energy storage')).toEqual({
      query: 'energy storage',
      answer: null,
      results: [],
      error: 'TAVILY_API_KEY not configured',
    });
  });

  it('reports HTTP failures', async () => {
    server.use(errorHandlers.tavilyError);

    const response = await tavilySearch('energy storage');

    expect(response.error).toBe('Tavily HTTP 500');
    expect(response.results).toEqual([]);
  });

  it('skips the request for a blank query', async () => {
    expect(await tavilySearch('   ')).toEqual({ query: '', answer: null, results: [] });
  });
});

describe('exaSearch', () => {
  it('maps page text to content', async () => {
    const response = await exaSearch('long duration storage');

    expect(response).toEqual({
      query: 'long duration storage',
      results: [
        {
          title: 'Long-duration storage primer',
          url: 'https://research.example.org/long-duration',
          content: 'Iron-air and flow batteries target multi-day discharge.',
          score: 0.88,
          publishedDate: '2024-05-02',
          author: 'Storage Desk',
        },
      ],
    });
  });

  it('reports HTTP failures', async () => {
    server.use(errorHandlers.exaError);

    expect((await exaSearch('storage')).error).toBe('Exa HTTP 401');
  });

  it('reports a missing API key', async () => {
    vi.stubEnv('EXA_API_KEY', '');

    expect((await exaSearch('storage')).error).toBe('EXA_API_KEY not configured');
  });

  it('drops results without a title or url', () => {
    const parsed = parseExaResponse('q', {
      results: [{ title: 'Only title' }, { url: 'https://x.example/1' }, { title: 'Kept', url: 'https://x.example/2' }],
    });

    expect(parsed.results).toEqual([{ title: 'Kept', url: 'https://x.example/2' }]);
  });

  it('flags a non-object body', () => {
    expect(parseExaResponse('q', 'nope')).toEqual({ query: 'q', results: [], error: 'Unexpected response shape' });
  });
});

describe('Google News', () => {
  it('builds the RSS search url', () => {
    expect(buildGoogleNewsUrl('battery storage', 'US', 'en')).toBe(
      'https://news.google.com/rss/search?q=battery+storage&hl=en-US&gl=US&ceid=US%3Aen'
    );
  });

  it('splits the publisher off the title', async () => {
    const articles = await parseGoogleNewsFeed(MOCK_NEWS_RSS, 10);

    expect(articles.map((a) => [a.title, a.publisher, a.url])).toEqual([
      ['Utility signs record battery contract', 'Grid Daily', 'https://news.example.com/record-contract'],
      ['Flow batteries find a niche', undefined, 'https://news.example.com/flow-niche'],
    ]);
    expect(articles[0].snippet).toBe('A utility agreed to buy 400 MW of storage.');
  });

  it('honours maxResults', async () => {
    expect(await parseGoogleNewsFeed(MOCK_NEWS_RSS, 1)).toHaveLength(1);
  });

  it('searches the feed over HTTP', async () => {
    const response = await searchGoogleNews('energy storage');

    expect(response.error).toBeUndefined();
    expect(response.articles).toHaveLength(2);
  });

  it('reports HTTP failures', async () => {
    server.use(errorHandlers.newsError);

    expect(await searchGoogleNews('energy storage')).toEqual({
      query: 'energy storage',
      articles: [],
      error: 'Google News HTTP 503',
    });
  });
});

describe('lookupWikipedia', () => {
  it('resolves the page and clips the extract to five sentences', async () => {
    expect(await lookupWikipedia('grid storage')).toEqual({
      ok: true,
      title: 'Grid energy storage',
      summary:
        'Grid energy storage is a collection of methods used for energy storage on a large scale. ' +
        'Electrical energy is stored when it is plentiful. It is returned when demand rises. ' +
        'Pumped hydro is the largest form. Batteries are growing fastest.',
      url: 'https://en.wikipedia.org/wiki/Grid_energy_storage',
    });
  });

  it('reports a search without matches', async () => {
    server.use(errorHandlers.wikipediaNoMatch);

    expect(await lookupWikipedia('zzzz')).toEqual({ ok: false, error: 'No Wikipedia page found for "zzzz"' });
  });

  it('rejects an empty query', async () => {
    expect(await lookupWikipedia(' ')).toEqual({ ok: false, error: 'Empty query' });
  });
});

describe('clipSentences', () => {
  it('keeps short text unchanged', () => {
    expect(clipSentences('One. Two.', 5)).toBe('One. Two.');
  });

  it('cuts after the requested number of sentences', () => {
    expect(clipSentences('One. Two! Three? Four.', 2)).toBe('One. Two!');
  });
});

describe('queryKnowledgeBaseApi', () => {
  it('returns records with content, reading text as a fallback', async () => {
    vi.stubEnv('KNOWLEDGE_BASE_URL', MOCK_KB_URL);

    expect(await queryKnowledgeBaseApi('storage tenders', 10)).toEqual({
      query: 'storage tenders',
      records: [
        { content: 'Internal note: storage tenders rose in 2023.', title: 'Tender memo', score: 0.77 },
        { content: 'Second passage without a title.' },
      ],
    });
  });

  it('reports a missing endpoint', async () => {
    expect((await queryKnowledgeBaseApi('storage')).error).toBe('KNOWLEDGE_BASE_URL not configured');
  });

  it('reports HTTP failures', async () => {
    vi.stubEnv('KNOWLEDGE_BASE_URL', MOCK_KB_URL);
    server.use(errorHandlers.kbError);

    expect((await queryKnowledgeBaseApi('storage')).error).toBe('Knowledge base HTTP 502');
  });
});
