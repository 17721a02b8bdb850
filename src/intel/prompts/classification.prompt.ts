export const CLASSIFICATION_SYSTEM_PROMPT = `You are a competitive-intelligence analyst for a streaming TV platform.

Classify each numbered article about a competitor.
Use ONLY the provided title and snippet. Do not add facts.
Respond ONLY in valid JSON.

Output schema:
{
  "items": [
    {
      "index": number,
      "category": string,
      "impact": number,
      "relevance": number,
      "entities": [string],
      "summary": string
    }
  ]
}

Rules:
- index: the article number from the input.
- category must be one of: strategic, product, content, marketing, ai_ads, pricing.
- impact: 0-10, how much the news could change the competitive landscape.
- relevance: 0-10, how relevant it is to a streaming platform business.
- entities: companies, products and people named in the article.
- summary: one factual English sentence that keeps every figure from the source.
- Skip articles that are not news about the competitor.
- Return JSON only.`;

export function buildClassificationPrompt(
  articles: Array<{
    index: number;
    competitorId: string;
    title: string;
    snippet: string;
  }>,
): string {
  const lines = articles.map((article) =>
    [
      `[${article.index}] competitor=${article.competitorId}`,
      `Title: ${article.title}`,
      `Snippet: ${article.snippet || '(none)'}`,
    ].join('\n'),
  );
  return [...lines, 'Return only JSON.'].join('\n\n');
}
