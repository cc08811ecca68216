/**
 * Source Citations
 *
 * Converts inline `[Source: URL]` markers into numbered references with a
 * `## Sources` list at the end of the article.
 */

export interface CitationResult {
  readonly markdown: string;
  /** Cited URLs in reference order; index + 1 is the reference number */
  readonly sources: readonly string[];
}

const SOURCE_MARKER = /\s*\[Source:\s*(https?:\/\/[^\]\s]+)\s*\]/gi;

/**
 * @example
 * convertSourceCitations('Storage grew [Source: https://a.example/x]. Again [Source: https://a.example/x].');
 * // markdown: 'Storage grew [1]. Again [1].\n\n## Sources\n\n1. https://a.example/x'
 */
export function convertSourceCitations(markdown: string): CitationResult {
  const numbers = new Map<string, number>();
  const sources: string[] = [];

  const body = markdown.replace(SOURCE_MARKER, (_match, url: string) => {
    let n = numbers.get(url);
    if (n === undefined) {
      sources.push(url);
      n = sources.length;
      numbers.set(url, n);
    }
    return ` [${n}]`;
  });

  if (sources.length === 0) {
    return { markdown, sources };
  }

  const list = sources.map((url, i) => `${i + 1}. ${url}`).join('\n');
  return { markdown: `${body.trimEnd()}\n\n## Sources\n\n${list}`, sources };
}
