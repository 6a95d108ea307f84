/**
 * Price Data Types for the market-data collaborator
 */

import { DateRange } from './date-range';

export interface PricePoint {
  /** ISO date, YYYY-MM-DD */
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Daily bars sorted ascending by date, without duplicate dates.
 * Missing dates (weekends, holidays) are expected.
 */
export interface PriceSeries {
  ticker: string;
  points: PricePoint[];
}

/**
 * Bar as delivered by a provider, before normalization
 */
export interface RawPriceBar {
  date: string | number;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
}

export interface MarketDataSource {
  readonly sourceId: string;

  fetchPrices(ticker: string, range: DateRange, signal?: AbortSignal): Promise<RawPriceBar[]>;
}
