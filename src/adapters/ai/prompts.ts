/**
 * Prompts for per-article sentiment and event extraction
 */

import { AnalysisRequest } from '../../types/sentiment';

export const SENTIMENT_SYSTEM_PROMPT = [
  'You are an expert financial news analyst.',
  'Your job is to read news articles about a specific stock and extract structured',
  "information that explains how the news is likely to influence the stock's price.",
  '',
  'Be especially careful to:',
  "- Focus ONLY on information relevant to the stock's performance.",
  '- Distinguish between truly impactful events and minor noise.',
  '- Consider both short-term and medium-term price impact.',
  '',
  'You MUST respond with a single JSON object and no prose.',
].join('\n');

/**
 * Fill the user prompt for a single article
 */
export function buildSentimentUserPrompt(request: AnalysisRequest): string {
  return [
    `Analyze the following news article about stock "${request.ticker}".`,
    '',
    'Return a JSON object with:',
    `  - article_id: "${request.articleId}"`,
    '  - sentiment: "positive", "neutral", or "negative"',
    '  - confidence: a number between 0 and 1',
    '  - event_tags: list of short tags like ["earnings", "acquisition", "lawsuit", "guidance_cut"]',
    "  - impact_score: number between 0 and 1 for how strongly this news is likely to move the stock's price",
    '  - reasoning: a short explanation in plain English',
    '',
    'Article metadata:',
    `  - Title: ${request.title || 'N/A'}`,
    `  - Source: ${request.source || 'Unknown'}`,
    `  - Published at: ${request.publishedAt || 'Unknown'}`,
    `  - URL: ${request.url}`,
    '',
    'Article text:',
    '---',
    request.text,
    '---',
  ].join('\n');
}
