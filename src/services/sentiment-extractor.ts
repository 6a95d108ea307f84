/**
 * Sentiment Extractor Service
 *
 * Turns one news article into a SentimentRecord through a structured-analysis
 * capability:
 * - Empty articles are rejected without a model call
 * - Model output is validated against the sentiment extraction schema
 * - Malformed output and retryable provider errors are retried with
 *   exponential backoff
 * - Failures come back as a tagged result, never as a rejection
 */

import { NewsArticle } from '../types/news';
import {
  AnalysisRequest,
  ArticleExtractor,
  ExtractionResult,
  Polarity,
  SentimentRecord,
  StructuredAnalyzer
} from '../types/sentiment';
import { ExtractionError, ExtractionErrorKind, MalformedOutputError } from '../types/errors';
import { PipelineLogger } from '../types/logger';
import { SentimentExtractionOutput } from '../schemas/sentiment-extraction';
import { SchemaValidator, schemaValidator } from './schema-validator';
import { BaseAIAdapter } from '../adapters/ai/base-ai-adapter';
import { consoleLogger } from '../utils/logger';
import { delay } from '../utils/async';
import { toDateKey } from '../utils/dates';

export interface SentimentExtractorOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  validator?: SchemaValidator;
  logger?: PipelineLogger;
}

const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 250;

const POLARITY_BY_LABEL: Record<SentimentExtractionOutput['sentiment'], Polarity> = {
  positive: 'BULLISH',
  negative: 'BEARISH',
  neutral: 'NEUTRAL'
};

/**
 * Lower-case, trim, drop empties, dedupe and sort
 */
export function normalizeEventTags(tags: readonly string[] | undefined): string[] {
  const normalized = new Set<string>();
  for (const tag of tags ?? []) {
    const value = tag.trim().toLowerCase();
    if (value) {
      normalized.add(value);
    }
  }
  return Array.from(normalized).sort();
}

type AttemptFailure = { kind: Exclude<ExtractionErrorKind, 'EMPTY_TEXT'>; reason: string; retryable: boolean };

export class SentimentExtractor implements ArticleExtractor {
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly validator: SchemaValidator;
  private readonly logger: PipelineLogger;

  constructor(
    private readonly analyzer: StructuredAnalyzer,
    options: SentimentExtractorOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.validator = options.validator ?? schemaValidator;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Extract one sentiment record. Calls the analyzer at most maxRetries + 1 times.
   */
  async extract(article: NewsArticle, signal?: AbortSignal): Promise<ExtractionResult> {
    if (!article.text.trim()) {
      return this.failure(article, 'EMPTY_TEXT', 'Article has no text to analyze', 0);
    }

    const eventDate = toDateKey(article.publishedAt);
    if (!eventDate) {
      return this.failure(article, 'MALFORMED_OUTPUT', `Unparseable publishedAt: ${article.publishedAt}`, 0);
    }

    const request = this.buildRequest(article);
    let attempts = 0;
    let lastFailure: AttemptFailure | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (signal?.aborted) {
        return this.failure(article, 'ABORTED', 'Extraction abandoned', attempts);
      }

      if (attempt > 0) {
        const backoff = this.retryDelayMs * Math.pow(2, attempt - 1);
        this.logger.debug('Retrying sentiment extraction', {
          articleId: article.articleId,
          attempt,
          backoffMs: backoff
        });
        await delay(backoff, signal);
        if (signal?.aborted) {
          return this.failure(article, 'ABORTED', 'Extraction abandoned', attempts);
        }
      }

      attempts++;
      try {
        const output = await this.analyzer.analyze(request, signal);
        const validation = this.validator.validateSentimentExtraction(output);
        if (validation.valid && validation.parsedOutput) {
          return { ok: true, record: this.toRecord(article, eventDate, validation.parsedOutput) };
        }
        lastFailure = {
          kind: 'MALFORMED_OUTPUT',
          reason: `Schema validation failed: ${validation.errors.map(e => `${e.path} ${e.message}`).join('; ')}`,
          retryable: true
        };
      } catch (error) {
        if (signal?.aborted) {
          return this.failure(article, 'ABORTED', 'Extraction abandoned', attempts);
        }
        lastFailure = this.classify(error);
      }

      this.logger.warn('Sentiment extraction attempt failed', {
        articleId: article.articleId,
        attempt: attempts,
        kind: lastFailure.kind,
        reason: lastFailure.reason
      });

      if (!lastFailure.retryable) {
        break;
      }
    }

    const final = lastFailure ?? { kind: 'PROVIDER_ERROR', reason: 'No attempt was made', retryable: false };
    return this.failure(article, final.kind, final.reason, attempts);
  }

  private classify(error: unknown): AttemptFailure {
    return {
      kind: error instanceof MalformedOutputError ? 'MALFORMED_OUTPUT' : 'PROVIDER_ERROR',
      reason: error instanceof Error ? error.message : String(error),
      retryable: BaseAIAdapter.isRetryableError(error)
    };
  }

  private buildRequest(article: NewsArticle): AnalysisRequest {
    return {
      articleId: article.articleId,
      ticker: article.ticker,
      title: article.title,
      source: article.source,
      publishedAt: article.publishedAt,
      url: article.url,
      text: article.text
    };
  }

  private toRecord(article: NewsArticle, eventDate: string, output: SentimentExtractionOutput): SentimentRecord {
    return {
      recordId: `sentiment:${article.articleId}`,
      articleId: article.articleId,
      polarity: POLARITY_BY_LABEL[output.sentiment],
      magnitude: output.impact_score,
      confidence: output.confidence,
      eventTags: normalizeEventTags(output.event_tags),
      reasoning: output.reasoning.trim(),
      publishedAt: article.publishedAt,
      eventDate
    };
  }

  private failure(
    article: NewsArticle,
    kind: ExtractionErrorKind,
    reason: string,
    attempts: number
  ): ExtractionResult {
    return {
      ok: false,
      error: new ExtractionError(reason, article.articleId, kind, attempts)
    };
  }
}
