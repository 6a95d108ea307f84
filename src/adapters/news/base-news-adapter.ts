/**
 * Base News Adapter - common news processing logic for all news adapters
 *
 * Implements the functionality shared by news adapters:
 * - Normalization of provider payloads to NewsArticle
 * - Content hash generation for deduplication
 * - Ticker relevance filtering
 * - Request timeouts and FetchError mapping
 */

import * as crypto from 'crypto';
import { DateRange } from '../../types/date-range';
import { NewsArticle, NewsSource } from '../../types/news';
import { FetchError } from '../../types/errors';
import { PipelineLogger } from '../../types/logger';
import { consoleLogger } from '../../utils/logger';
import { timeoutController } from '../../utils/async';

/**
 * Raw news data from a provider (before normalization)
 */
export interface RawNewsData {
  providerId?: string;
  title: string;
  content: string;
  summary?: string;
  source: string;
  sourceUrl: string;
  publishedAt: string | number;
  symbols?: string[];
}

/**
 * Configuration for a news adapter
 */
export interface NewsAdapterConfig {
  sourceId: string;
  apiEndpoint: string;
  apiKey?: string;
  timeoutMs?: number;
  maxResults?: number;
  logger?: PipelineLogger;
}

/**
 * Abstract base class for news adapters
 */
export abstract class BaseNewsAdapter implements NewsSource {
  protected config: NewsAdapterConfig;
  protected logger: PipelineLogger;

  constructor(config: NewsAdapterConfig) {
    this.config = config;
    this.logger = config.logger ?? consoleLogger;
  }

  get sourceId(): string {
    return this.config.sourceId;
  }

  /**
   * Fetch, normalize, filter and deduplicate coverage for a ticker
   */
  async fetchNews(ticker: string, range: DateRange, signal?: AbortSignal): Promise<NewsArticle[]> {
    const { controller, dispose } = timeoutController(this.config.timeoutMs ?? 15000, signal);
    let raw: RawNewsData[];
    try {
      raw = await this.fetchRaw(ticker, range, controller.signal);
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(
        `${this.sourceId} request failed: ${error instanceof Error ? error.message : String(error)}`,
        'NEWS',
        undefined,
        error
      );
    } finally {
      dispose();
    }

    const seen = new Set<string>();
    const articles: NewsArticle[] = [];
    for (const item of raw) {
      if (!this.isRelevant(item, ticker)) {
        continue;
      }
      const article = this.normalizeArticle(item, ticker);
      if (!article || seen.has(article.contentHash)) {
        continue;
      }
      seen.add(article.contentHash);
      articles.push(article);
    }

    this.logger.info('Fetched news articles', {
      sourceId: this.sourceId,
      ticker,
      received: raw.length,
      kept: articles.length
    });
    return articles;
  }

  /**
   * Normalize raw news data to a NewsArticle, or null when it has no usable timestamp
   */
  protected normalizeArticle(raw: RawNewsData, ticker: string): NewsArticle | null {
    const publishedMs = typeof raw.publishedAt === 'number' ? raw.publishedAt : Date.parse(raw.publishedAt);
    if (isNaN(publishedMs)) {
      return null;
    }

    const contentHash = this.generateContentHash(raw.title, raw.content);

    return {
      articleId: raw.providerId || `${ticker}-${contentHash.slice(0, 16)}`,
      ticker,
      title: raw.title.trim(),
      url: raw.sourceUrl,
      source: raw.source || 'Unknown',
      publishedAt: new Date(publishedMs).toISOString(),
      summary: (raw.summary ?? '').trim(),
      text: raw.content,
      contentHash
    };
  }

  /**
   * Generate a content hash for deduplication
   *
   * SHA-256 of the normalized title and content, so the same story from two
   * feeds hashes the same.
   */
  protected generateContentHash(title: string, content: string): string {
    const combined = `${title.toLowerCase().trim()}|${content.toLowerCase().trim()}`;
    return crypto.createHash('sha256').update(combined).digest('hex');
  }

  /**
   * Keep items tagged with the ticker or mentioning it as a whole word
   */
  protected isRelevant(raw: RawNewsData, ticker: string): boolean {
    const symbol = ticker.toUpperCase();
    if (raw.symbols?.some(s => s.toUpperCase() === symbol)) {
      return true;
    }
    const escaped = symbol.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const mention = new RegExp(`(^|[^A-Z0-9])${escaped}([^A-Z0-9]|$)`);
    return mention.test(`${raw.title} ${raw.summary ?? ''} ${raw.content}`.toUpperCase());
  }

  protected abstract fetchRaw(ticker: string, range: DateRange, signal: AbortSignal): Promise<RawNewsData[]>;
}
