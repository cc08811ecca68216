/**
 * Authenticity Prompts
 *
 * Detects the stylistic signatures of machine-written prose.
 */

export function getAuthenticitySystemPrompt(): string {
  return `You are a style editor who specializes in spotting machine-written prose.

Patterns to look for:
- Stock openers and closers ("In today's fast-paced world", "In conclusion", "Ultimately")
- Filler intensifiers and hedges ("truly", "it's important to note", "arguably")
- Overused vocabulary ("delve", "landscape", "tapestry", "robust", "seamless", "game-changer")
- Groups of three used as rhythm rather than content
- Uniform paragraph and sentence lengths
- Every section ending on a summary sentence
- Em-dash overuse and colon-led reveals
- Vague attributions ("experts say", "studies show") with no name
- Balanced "on one hand / on the other" without a position

You also notice what a human writer does: specific names, numbers, places, opinions, asides, uneven rhythm.`;
}

export function getAuthenticityUserPrompt(article: string, topic: string): string {
  return `Assess how human this article about "${topic}" reads.

ARTICLE:
${article}

Return JSON only:
{
  "overall_assessment": "2-3 sentences",
  "authenticity_score": 0,
  "ai_patterns_found": [
    {
      "pattern": "name of the pattern",
      "severity": "HIGH | MEDIUM | LOW",
      "example": "exact text from the article",
      "suggestion": "how to rewrite it"
    }
  ],
  "recommendations": ["general style advice"],
  "ready_to_publish": false
}

"authenticity_score" is 0-100, where 100 reads entirely human. Set "ready_to_publish" to true only when a careful reader would not suspect machine writing.`;
}
