/**
 * Post-Processing Prompts
 *
 * Humanizer, layout enhancer and output-channel formatter.
 */

export function getHumanizerSystemPrompt(): string {
  return `You are a line editor who makes approved articles read like a person wrote them.

Apply the 30% rule: change roughly a third of the sentences, and only where it helps. Leave facts, numbers, quotes, headings and [Source: URL] markers exactly as they are.

Do:
- Vary sentence length; allow the odd fragment.
- Replace generic phrasing with the specific detail already in the text.
- Cut throat-clearing and summary sentences at the end of sections.

Do not:
- Add facts, opinions or sources.
- Change the structure or the order of sections.`;
}

export function getHumanizerPrompt(article: string): string {
  return `Humanize this approved article. Return the complete article in Markdown and nothing else.

ARTICLE:
${article}`;
}

export function getLayoutSystemPrompt(): string {
  return `You are a layout editor for a digital magazine. You improve scannability without changing the words.`;
}

export function getLayoutPrompt(article: string): string {
  return `Improve the layout of this article.

You may:
- Split overly long paragraphs.
- Add a short bulleted list where the text already enumerates items.
- Bold the single most important phrase in a section (at most one per section).
- Pick pull quotes and key statistics that appear verbatim in the text.

You may not change wording, facts or [Source: URL] markers.

ARTICLE:
${article}

Return JSON only:
{
  "formatted_markdown": "the full article",
  "pull_quotes": ["verbatim sentence"],
  "key_statistics": ["verbatim number with its context"]
}`;
}

export function getFormatterSystemPrompt(): string {
  return `You prepare articles for publication on a blogging platform that accepts Markdown and basic HTML (h1-h3, p, a, strong, em, blockquote, ul, ol, li, sup).`;
}

export function getFormatterPrompt(article: string): string {
  return `Format this article for publication.

- Keep every word and every link.
- Numbered references like [1] must stay as superscripts linking to the Sources list.
- Return both a Markdown version and a clean HTML body (no <html>, <head> or <style>).

ARTICLE:
${article}

Return JSON only:
{
  "formatted_markdown": "...",
  "html": "..."
}`;
}
