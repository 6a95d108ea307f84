/**
 * MarketAux News Adapter
 *
 * Reads historical coverage from the MarketAux `/v1/news/all` endpoint,
 * filtered to a single ticker and date range.
 */

import { DateRange } from '../../types/date-range';
import { FetchError } from '../../types/errors';
import { addDays } from '../../utils/dates';
import { BaseNewsAdapter, NewsAdapterConfig, RawNewsData } from './base-news-adapter';

interface MarketAuxEntity {
  symbol?: string;
  name?: string;
}

interface MarketAuxArticle {
  uuid?: string;
  title?: string;
  description?: string;
  snippet?: string;
  url?: string;
  source?: string;
  published_at?: string;
  entities?: MarketAuxEntity[];
}

interface MarketAuxResponse {
  data?: unknown;
  error?: { code?: string; message?: string };
}

function isMarketAuxArticle(value: unknown): value is MarketAuxArticle {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class MarketAuxAdapter extends BaseNewsAdapter {
  constructor(config: Omit<NewsAdapterConfig, 'sourceId'> & { sourceId?: string }) {
    super({ ...config, sourceId: config.sourceId ?? 'marketaux' });
  }

  /**
   * Build the request URL; published_before is exclusive so it is set to the day after endDate
   */
  buildUrl(ticker: string, range: DateRange): string {
    const params = new URLSearchParams({
      symbols: ticker,
      filter_entities: 'true',
      language: 'en',
      published_after: `${range.startDate}T00:00:00`,
      published_before: `${addDays(range.endDate, 1)}T00:00:00`,
      limit: String(this.config.maxResults ?? 20),
      api_token: this.config.apiKey ?? ''
    });
    return `${this.config.apiEndpoint}/v1/news/all?${params.toString()}`;
  }

  protected async fetchRaw(ticker: string, range: DateRange, signal: AbortSignal): Promise<RawNewsData[]> {
    if (!this.config.apiKey) {
      throw new FetchError('MarketAux API key is not configured', 'NEWS');
    }

    const response = await fetch(this.buildUrl(ticker, range), { method: 'GET', signal });
    if (!response.ok) {
      const errorBody = await response.text();
      throw new FetchError(`MarketAux API error: ${response.status} - ${errorBody}`, 'NEWS', response.status);
    }

    const body = await response.json() as MarketAuxResponse;
    if (body.error) {
      throw new FetchError(`MarketAux API error: ${body.error.message ?? body.error.code ?? 'unknown'}`, 'NEWS');
    }
    if (!Array.isArray(body.data)) {
      throw new FetchError('MarketAux returned an unexpected payload', 'NEWS');
    }

    return body.data.filter(isMarketAuxArticle).map(item => this.toRaw(item, range));
  }

  private toRaw(item: MarketAuxArticle, range: DateRange): RawNewsData {
    const description = item.description || item.snippet || '';
    return {
      providerId: item.uuid,
      title: item.title ?? '',
      content: description,
      summary: description,
      source: item.source ?? 'Unknown',
      sourceUrl: item.url ?? '',
      publishedAt: item.published_at ?? `${range.startDate}T00:00:00Z`,
      symbols: (item.entities ?? [])
        .map(entity => entity.symbol)
        .filter((symbol): symbol is string => typeof symbol === 'string')
    };
  }
}
