/**
 * Sentiment Data Types for per-article structured extraction
 */

import { ExtractionError } from './errors';
import { NewsArticle } from './news';

export type Polarity = 'BULLISH' | 'BEARISH' | 'NEUTRAL';

export interface SentimentRecord {
  readonly recordId: string;
  readonly articleId: string;
  readonly polarity: Polarity;
  /** Expected price impact, 0.0 to 1.0 */
  readonly magnitude: number;
  /** Model confidence in the polarity, 0.0 to 1.0 */
  readonly confidence: number;
  readonly eventTags: readonly string[];
  readonly reasoning: string;
  /** Inherited from the article */
  readonly publishedAt: string;
  /** UTC calendar date of publishedAt */
  readonly eventDate: string;
}

/**
 * Per-article outcome of the extraction adapter
 */
export type ExtractionResult =
  | { ok: true; record: SentimentRecord }
  | { ok: false; error: ExtractionError };

/**
 * Input handed to the structured-analysis capability
 */
export interface AnalysisRequest {
  articleId: string;
  ticker: string;
  title: string;
  source: string;
  publishedAt: string;
  url: string;
  text: string;
}

/**
 * Structured-analysis capability (a language model behind JSON mode).
 *
 * Resolves with the parsed, not yet validated, model output. Throws
 * MalformedOutputError when the output cannot be parsed.
 */
export interface StructuredAnalyzer {
  readonly analyzerId: string;

  analyze(request: AnalysisRequest, signal?: AbortSignal): Promise<unknown>;
}

/**
 * Per-article extraction step used by the orchestrator
 */
export interface ArticleExtractor {
  extract(article: NewsArticle, signal?: AbortSignal): Promise<ExtractionResult>;
}
