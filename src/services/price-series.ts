/**
 * Price Series Service - turns provider bars into a PriceSeries
 *
 * Provides:
 * - Date normalization of provider timestamps (epoch seconds/millis or ISO strings)
 * - Rejection of incomplete or inconsistent bars (missing values, high < low, non-positive close)
 * - Ascending date order with one bar per date
 */

import { DateRange } from '../types/date-range';
import { PricePoint, PriceSeries, RawPriceBar } from '../types/price';
import { toDateKey } from '../utils/dates';

export interface PriceSeriesResult {
  series: PriceSeries;
  /** Bars dropped or replaced, one message each */
  warnings: string[];
}

export const PriceSeriesService = {
  /**
   * Normalize raw bars into a series sorted ascending by date.
   *
   * Bars outside `range` (when given) are dropped silently. For duplicate
   * dates the last delivered bar wins.
   */
  normalize(ticker: string, bars: RawPriceBar[], range?: DateRange): PriceSeriesResult {
    const warnings: string[] = [];
    const byDate = new Map<string, PricePoint>();

    bars.forEach((bar, index) => {
      const point = this.toPricePoint(bar);
      if (!point) {
        warnings.push(`Dropped malformed price bar #${index} for ${ticker}`);
        return;
      }
      if (range && (point.date < range.startDate || point.date > range.endDate)) {
        return;
      }
      if (byDate.has(point.date)) {
        warnings.push(`Duplicate price bar for ${ticker} on ${point.date}; kept the later one`);
      }
      byDate.set(point.date, point);
    });

    const points = Array.from(byDate.values()).sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

    return { series: { ticker, points }, warnings };
  },

  /**
   * Convert one provider bar, or null when it is unusable
   */
  toPricePoint(bar: RawPriceBar): PricePoint | null {
    const date = this.normalizeDate(bar.date);
    if (!date) {
      return null;
    }

    const { open, high, low, close } = bar;
    if (open === null || high === null || low === null || close === null) {
      return null;
    }
    if (![open, high, low, close].every(Number.isFinite)) {
      return null;
    }
    if (close <= 0 || high < low) {
      return null;
    }

    const volume = bar.volume !== null && Number.isFinite(bar.volume) && bar.volume >= 0 ? bar.volume : 0;

    return { date, open, high, low, close, volume };
  },

  /**
   * Normalize a provider date to YYYY-MM-DD (UTC)
   */
  normalizeDate(value: string | number): string | null {
    if (typeof value === 'number') {
      // Handle both seconds and milliseconds
      const ms = value < 1e12 ? value * 1000 : value;
      return toDateKey(ms);
    }
    return toDateKey(value);
  },

  /**
   * Check the series invariants: ascending dates, no duplicates
   */
  isOrdered(series: PriceSeries): boolean {
    for (let i = 1; i < series.points.length; i++) {
      if (series.points[i - 1].date >= series.points[i].date) {
        return false;
      }
    }
    return true;
  }
};
