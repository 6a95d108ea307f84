/**
 * Yahoo Finance Adapter - daily OHLCV bars from the chart API
 */

import { DateRange } from '../../types/date-range';
import { MarketDataSource, RawPriceBar } from '../../types/price';
import { FetchError } from '../../types/errors';
import { PipelineLogger } from '../../types/logger';
import { addDays, toEpochSeconds } from '../../utils/dates';
import { timeoutController } from '../../utils/async';
import { consoleLogger } from '../../utils/logger';

export interface YahooAdapterConfig {
  apiEndpoint: string;
  timeoutMs?: number;
  logger?: PipelineLogger;
}

type NullableSeries = Array<number | null> | undefined;

export interface YahooChartResponse {
  chart?: {
    result?: Array<{
      timestamp?: number[];
      indicators?: {
        quote?: Array<{
          open?: NullableSeries;
          high?: NullableSeries;
          low?: NullableSeries;
          close?: NullableSeries;
          volume?: NullableSeries;
        }>;
      };
    }> | null;
    error?: { code?: string; description?: string } | null;
  };
}

export class YahooFinanceAdapter implements MarketDataSource {
  readonly sourceId = 'yahoo';

  private config: YahooAdapterConfig;
  private logger: PipelineLogger;

  constructor(config: YahooAdapterConfig) {
    this.config = config;
    this.logger = config.logger ?? consoleLogger;
  }

  /**
   * period2 is exclusive, so it points at the day after endDate
   */
  buildUrl(ticker: string, range: DateRange): string {
    const params = new URLSearchParams({
      period1: String(toEpochSeconds(range.startDate)),
      period2: String(toEpochSeconds(addDays(range.endDate, 1))),
      interval: '1d',
      events: 'history'
    });
    return `${this.config.apiEndpoint}/v8/finance/chart/${encodeURIComponent(ticker)}?${params.toString()}`;
  }

  async fetchPrices(ticker: string, range: DateRange, signal?: AbortSignal): Promise<RawPriceBar[]> {
    const { controller, dispose } = timeoutController(this.config.timeoutMs ?? 15000, signal);

    let body: YahooChartResponse;
    try {
      const response = await fetch(this.buildUrl(ticker, range), {
        method: 'GET',
        headers: { 'Accept': 'application/json' },
        signal: controller.signal
      });
      if (!response.ok) {
        const errorBody = await response.text();
        throw new FetchError(`Yahoo Finance error: ${response.status} - ${errorBody}`, 'PRICES', response.status);
      }
      body = await response.json() as YahooChartResponse;
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(
        `Yahoo Finance request failed: ${error instanceof Error ? error.message : String(error)}`,
        'PRICES',
        undefined,
        error
      );
    } finally {
      dispose();
    }

    const chartError = body.chart?.error;
    if (chartError) {
      throw new FetchError(`Yahoo Finance error: ${chartError.description ?? chartError.code ?? 'unknown'}`, 'PRICES');
    }

    const bars = this.parseChart(body);
    this.logger.info('Fetched price bars', { sourceId: this.sourceId, ticker, bars: bars.length });
    return bars;
  }

  /**
   * Flatten the column-oriented chart payload into bars; rows with a null close are skipped
   */
  parseChart(body: YahooChartResponse): RawPriceBar[] {
    const result = body.chart?.result?.[0];
    const timestamps = result?.timestamp ?? [];
    const quote = result?.indicators?.quote?.[0];
    if (!quote) {
      return [];
    }

    const at = (series: NullableSeries, i: number): number | null => series?.[i] ?? null;

    const bars: RawPriceBar[] = [];
    timestamps.forEach((timestamp, i) => {
      const close = at(quote.close, i);
      if (close === null) {
        return;
      }
      bars.push({
        date: timestamp,
        open: at(quote.open, i),
        high: at(quote.high, i),
        low: at(quote.low, i),
        close,
        volume: at(quote.volume, i)
      });
    });
    return bars;
  }
}
