/**
 * MSW Request Handlers
 *
 * Default mocks for the external sources: Tavily, Exa, Google News RSS,
 * Wikipedia, the knowledge-base endpoint and a handful of article pages.
 */

import { http, HttpResponse } from 'msw';

export const MOCK_KB_URL = 'https://kb.example.test/query';

export const MOCK_TAVILY_RESPONSE = {
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
};

export const MOCK_EXA_RESPONSE = {
  results: [
    {
      title: 'Long-duration storage primer',
      url: 'https://research.example.org/long-duration',
      text: 'Iron-air and flow batteries target multi-day discharge.',
      score: 0.88,
      publishedDate: '2024-05-02',
      author: 'Storage Desk',
    },
  ],
};

export const MOCK_NEWS_RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>"energy storage" - Google News</title>
    <link>https://news.google.com</link>
    <item>
      <title>Utility signs record battery contract - Grid Daily</title>
      <link>https://news.example.com/record-contract</link>
      <pubDate>Tue, 04 Jun 2024 10:00:00 GMT</pubDate>
      <description>A utility agreed to buy 400 MW of storage.</description>
    </item>
    <item>
      <title>Flow batteries find a niche</title>
      <link>https://news.example.com/flow-niche</link>
      <pubDate>Wed, 05 Jun 2024 08:30:00 GMT</pubDate>
      <description>Vanadium systems gain ground in microgrids.</description>
    </item>
  </channel>
</rss>`;

export const MOCK_WIKIPEDIA_SUMMARY = {
  title: 'Grid energy storage',
  extract:
    'Grid energy storage is a collection of methods used for energy storage on a large scale. ' +
    'Electrical energy is stored when it is plentiful. It is returned when demand rises. ' +
    'Pumped hydro is the largest form. Batteries are growing fastest. Hydrogen is being trialled.',
  content_urls: {
    desktop: { page: 'https://en.wikipedia.org/wiki/Grid_energy_storage' },
  },
};

export const MOCK_ARTICLE_HTML = `<!doctype html>
<html>
  <head><title>Battery storage outlook</title><script>track()</script></head>
  <body>
    <nav>Home | About</nav>
    <article><h1>Outlook</h1><p>Installed capacity doubled &amp; costs fell.</p></article>
    <footer>Copyright</footer>
  </body>
</html>`;

export const MOCK_PAYWALL_HTML = `<html><head><title>Members only</title></head>
<body><main><p>Subscribe to continue reading this analysis.</p></main></body></html>`;

export const handlers = [
  // ==========================================================================
  // Search providers
  // ==========================================================================

  http.post('https://api.tavily.com/search', () => HttpResponse.json(MOCK_TAVILY_RESPONSE)),

  http.post('https://api.exa.ai/search', () => HttpResponse.json(MOCK_EXA_RESPONSE)),

  http.get('https://news.google.com/rss/search', () =>
    new HttpResponse(MOCK_NEWS_RSS, { headers: { 'Content-Type': 'application/rss+xml' } })
  ),

  http.post(MOCK_KB_URL, () =>
    HttpResponse.json({
      results: [
        { content: 'Internal note: storage tenders rose in 2023.', title: 'Tender memo', score: 0.77 },
        { text: 'Second passage without a title.' },
        { title: 'Empty entry' },
      ],
    })
  ),

  // ==========================================================================
  // Wikipedia
  // ==========================================================================

  http.get('https://en.wikipedia.org/w/api.php', ({ request }) => {
    const search = new URL(request.url).searchParams.get('search') ?? '';
    return HttpResponse.json([search, ['Grid energy storage'], [''], ['https://en.wikipedia.org/wiki/Grid_energy_storage']]);
  }),

  http.get('https://en.wikipedia.org/api/rest_v1/page/summary/:title', () =>
    HttpResponse.json(MOCK_WIKIPEDIA_SUMMARY)
  ),

  // ==========================================================================
  // Article pages
  // ==========================================================================

  http.get('https://energy.example.com/outlook', () =>
    new HttpResponse(MOCK_ARTICLE_HTML, { headers: { 'Content-Type': 'text/html' } })
  ),

  http.get('https://energy.example.com/pumped-hydro', () =>
    new HttpResponse('<html><head><title>Pumped hydro</title></head><body><p>Reservoirs store water uphill.</p></body></html>', {
      headers: { 'Content-Type': 'text/html' },
    })
  ),

  http.get('https://paywall.example.com/analysis', () =>
    new HttpResponse(MOCK_PAYWALL_HTML, { headers: { 'Content-Type': 'text/html' } })
  ),

  http.get('https://blocked.example.com/report', () => new HttpResponse('Forbidden', { status: 403 })),

  http.get('https://missing.example.com/gone', () => new HttpResponse('Not found', { status: 404 })),

  http.get('https://energy.example.com/outlook-2024', () =>
    new HttpResponse(null, { status: 301, headers: { Location: '/outlook' } })
  ),

  http.get('https://redirect.example.com/internal', () =>
    new HttpResponse(null, { status: 302, headers: { Location: 'http://127.0.0.1:8080/admin' } })
  ),

  // Sends the opening markup, then never finishes the body
  http.get('https://slow.example.com/stream', () => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('<html><head><title>Slow</title></head><body>'));
      },
    });
    return new HttpResponse(stream, { headers: { 'Content-Type': 'text/html' } });
  }),
];

/**
 * Overrides for failure-path tests.
 */
export const errorHandlers = {
  tavilyError: http.post('https://api.tavily.com/search', () =>
    HttpResponse.json({ error: 'Internal error' }, { status: 500 })
  ),
  tavilyEmpty: http.post('https://api.tavily.com/search', () => HttpResponse.json({ answer: null, results: [] })),
  exaError: http.post('https://api.exa.ai/search', () => HttpResponse.json({ error: 'Unauthorized' }, { status: 401 })),
  newsError: http.get('https://news.google.com/rss/search', () => new HttpResponse('Unavailable', { status: 503 })),
  kbError: http.post(MOCK_KB_URL, () => HttpResponse.json({ error: 'down' }, { status: 502 })),
  wikipediaNoMatch: http.get('https://en.wikipedia.org/w/api.php', () => HttpResponse.json(['q', [], [], []])),
};
