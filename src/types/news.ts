/**
 * News Data Types for the news collaborator
 */

import { DateRange } from './date-range';

export interface NewsArticle {
  readonly articleId: string;
  readonly ticker: string;
  readonly title: string;
  readonly url: string;
  readonly source: string;
  /** ISO-8601 timestamp */
  readonly publishedAt: string;
  readonly summary: string;
  /** Raw article text handed to the structured-analysis capability */
  readonly text: string;
  /** SHA-256 of the normalized title and text */
  readonly contentHash: string;
}

/**
 * Source of news coverage for a ticker.
 *
 * An empty result means no coverage and is not an error. Transport
 * failures are thrown as FetchError.
 */
export interface NewsSource {
  readonly sourceId: string;

  fetchNews(ticker: string, range: DateRange, signal?: AbortSignal): Promise<NewsArticle[]>;
}
