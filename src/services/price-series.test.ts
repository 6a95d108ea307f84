/**
 * Tests for price series normalization
 */

import * as fc from 'fast-check';
import { PriceSeriesService } from './price-series';
import { RawPriceBar } from '../types/price';
import { calendarDateArb } from '../test/generators';

const bar = (date: string | number, close: number | null, overrides: Partial<RawPriceBar> = {}): RawPriceBar => ({
  date,
  open: close,
  high: close === null ? null : close + 1,
  low: close === null ? null : close - 1,
  close,
  volume: 100,
  ...overrides
});

describe('PriceSeriesService', () => {
  describe('normalizeDate', () => {
    it('should accept epoch seconds, epoch millis and ISO strings', () => {
      expect(PriceSeriesService.normalizeDate(1709299800)).toBe('2024-03-01');
      expect(PriceSeriesService.normalizeDate(1709299800000)).toBe('2024-03-01');
      expect(PriceSeriesService.normalizeDate('2024-03-01T14:30:00Z')).toBe('2024-03-01');
    });

    it('should return null for unparseable dates', () => {
      expect(PriceSeriesService.normalizeDate('not a date')).toBeNull();
    });
  });

  describe('toPricePoint', () => {
    it('should reject incomplete or inconsistent bars', () => {
      expect(PriceSeriesService.toPricePoint(bar('2024-03-01', null))).toBeNull();
      expect(PriceSeriesService.toPricePoint(bar('2024-03-01', 0))).toBeNull();
      expect(PriceSeriesService.toPricePoint(bar('2024-03-01', 10, { high: 9, low: 11 }))).toBeNull();
      expect(PriceSeriesService.toPricePoint(bar('2024-03-01', 10, { open: NaN }))).toBeNull();
    });

    it('should default a missing volume to zero', () => {
      expect(PriceSeriesService.toPricePoint(bar('2024-03-01', 10, { volume: null }))).toEqual({
        date: '2024-03-01', open: 10, high: 11, low: 9, close: 10, volume: 0
      });
    });
  });

  describe('normalize', () => {
    it('should sort by date and keep the later duplicate', () => {
      const { series, warnings } = PriceSeriesService.normalize('ACME', [
        bar('2024-03-04', 12),
        bar('2024-03-01', 10),
        bar('2024-03-04', 13)
      ]);

      expect(series.ticker).toBe('ACME');
      expect(series.points.map(p => [p.date, p.close])).toEqual([
        ['2024-03-01', 10],
        ['2024-03-04', 13]
      ]);
      expect(warnings).toEqual(['Duplicate price bar for ACME on 2024-03-04; kept the later one']);
    });

    it('should drop malformed bars with a warning and out-of-range bars silently', () => {
      const { series, warnings } = PriceSeriesService.normalize('ACME', [
        bar('2024-02-29', 9),
        bar('2024-03-01', null),
        bar('2024-03-02', 10),
        bar('2024-03-06', 11)
      ], { startDate: '2024-03-01', endDate: '2024-03-05' });

      expect(series.points.map(p => p.date)).toEqual(['2024-03-02']);
      expect(warnings).toEqual(['Dropped malformed price bar #1 for ACME']);
    });

    it('should always produce an ordered series without duplicate dates', () => {
      fc.assert(
        fc.property(
          fc.array(fc.tuple(calendarDateArb(), fc.double({ min: 1, max: 1000, noNaN: true })), { maxLength: 40 }),
          (rows) => {
            const { series } = PriceSeriesService.normalize('TEST', rows.map(([date, close]) => bar(date, close)));
            expect(PriceSeriesService.isOrdered(series)).toBe(true);
            expect(series.points.length).toBe(new Set(rows.map(([date]) => date)).size);
          }
        ),
        { numRuns: 100 }
      );
    });
  });
});
