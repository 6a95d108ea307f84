/**
 * Pattern Detector Service
 *
 * Detects technical patterns over a daily price series using rolling-window
 * comparisons of closing prices:
 * - Bullish/bearish moves: cumulative change over a fixed window
 * - Breakouts: close escapes the range of the preceding N sessions
 * - Reversals: a directional run answered by an opposite one-day move
 * - Sideways ranges: small net change across the whole series
 *
 * Detection is pure. A series shorter than a pattern's minimum window yields
 * no patterns of that kind.
 */

import { PricePoint, PriceSeries } from '../types/price';
import {
  PatternDetectorConfig,
  PatternDirection,
  PatternKind,
  TechnicalPattern
} from '../types/pattern';
import { formatPercent } from '../utils/format';

/**
 * Default detection thresholds and window sizes
 */
export const DEFAULT_PATTERN_CONFIG: PatternDetectorConfig = {
  moveWindowDays: 5,
  moveThreshold: 0.05,
  breakoutLookbackDays: 20,
  breakoutThreshold: 0.01,
  reversalRunLength: 3,
  reversalThreshold: 0.02,
  sidewaysThreshold: 0.03,
  detectSideways: true
};

const KIND_ORDER: Record<PatternKind, number> = {
  BULLISH_MOVE: 0,
  BEARISH_MOVE: 1,
  BREAKOUT: 2,
  REVERSAL: 3,
  SIDEWAYS_RANGE: 4
};

const DIRECTION_ORDER: Record<PatternDirection, number> = {
  BULLISH: 0,
  BEARISH: 1,
  NEUTRAL: 2
};

interface PatternInput {
  kind: PatternKind;
  direction: PatternDirection;
  startDate: string;
  endDate: string;
  anchorDate: string;
  magnitude: number;
  label: string;
  notes: string;
}

function buildPattern(input: PatternInput): TechnicalPattern {
  return {
    patternId: `${input.kind}:${input.anchorDate}:${input.direction}`,
    ...input
  };
}

export const PatternDetectorService = {
  /**
   * Detect all pattern kinds over the series.
   *
   * Output is ordered by anchor date, then kind, then direction.
   */
  detect(series: PriceSeries, overrides: Partial<PatternDetectorConfig> = {}): TechnicalPattern[] {
    const config: PatternDetectorConfig = { ...DEFAULT_PATTERN_CONFIG, ...overrides };
    const points = series.points;

    const patterns = [
      ...this.detectMoves(points, config),
      ...this.detectBreakouts(points, config),
      ...this.detectReversals(points, config),
      ...(config.detectSideways ? this.detectSidewaysRange(points, config) : [])
    ];

    return patterns.sort((a, b) => {
      if (a.anchorDate !== b.anchorDate) {
        return a.anchorDate < b.anchorDate ? -1 : 1;
      }
      if (a.kind !== b.kind) {
        return KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
      }
      return DIRECTION_ORDER[a.direction] - DIRECTION_ORDER[b.direction];
    });
  },

  /**
   * Cumulative close-to-close change over `moveWindowDays` sessions, firing
   * when it exceeds `moveThreshold`. Windows that fire do not overlap.
   */
  detectMoves(points: PricePoint[], config: PatternDetectorConfig): TechnicalPattern[] {
    const window = config.moveWindowDays;
    const patterns: TechnicalPattern[] = [];

    let i = window;
    while (i < points.length) {
      const start = points[i - window];
      const end = points[i];

      if (start.close > 0) {
        const change = end.close / start.close - 1;
        if (Math.abs(change) > config.moveThreshold) {
          const bullish = change > 0;
          patterns.push(buildPattern({
            kind: bullish ? 'BULLISH_MOVE' : 'BEARISH_MOVE',
            direction: bullish ? 'BULLISH' : 'BEARISH',
            startDate: start.date,
            endDate: end.date,
            anchorDate: end.date,
            magnitude: Math.abs(change),
            label: bullish ? 'Bullish Move' : 'Bearish Move',
            notes: `Close moved ${formatPercent(change)} over ${window} sessions (${start.close} to ${end.close}).`
          }));
          i += window;
          continue;
        }
      }
      i += 1;
    }

    return patterns;
  },

  /**
   * Close above the prior N-session high (or below the low) by more than
   * `breakoutThreshold`. Each direction fires once per excursion.
   */
  detectBreakouts(points: PricePoint[], config: PatternDetectorConfig): TechnicalPattern[] {
    const lookback = config.breakoutLookbackDays;
    const threshold = config.breakoutThreshold;
    const patterns: TechnicalPattern[] = [];

    let upsideArmed = true;
    let downsideArmed = true;

    for (let i = lookback; i < points.length; i++) {
      const closes = points.slice(i - lookback, i).map(p => p.close);
      const high = Math.max(...closes);
      const low = Math.min(...closes);
      const current = points[i];

      if (high > 0 && current.close > high * (1 + threshold)) {
        if (upsideArmed) {
          const change = current.close / high - 1;
          patterns.push(buildPattern({
            kind: 'BREAKOUT',
            direction: 'BULLISH',
            startDate: points[i - lookback].date,
            endDate: current.date,
            anchorDate: current.date,
            magnitude: change,
            label: 'Bullish Breakout',
            notes: `Close ${current.close} cleared the ${lookback}-session high of ${high} by ${formatPercent(change)}.`
          }));
          upsideArmed = false;
        }
      } else {
        upsideArmed = true;
      }

      if (low > 0 && current.close < low * (1 - threshold)) {
        if (downsideArmed) {
          const change = current.close / low - 1;
          patterns.push(buildPattern({
            kind: 'BREAKOUT',
            direction: 'BEARISH',
            startDate: points[i - lookback].date,
            endDate: current.date,
            anchorDate: current.date,
            magnitude: Math.abs(change),
            label: 'Bearish Breakdown',
            notes: `Close ${current.close} broke the ${lookback}-session low of ${low} by ${formatPercent(change)}.`
          }));
          downsideArmed = false;
        }
      } else {
        downsideArmed = true;
      }
    }

    return patterns;
  },

  /**
   * A run of at least `reversalRunLength` same-direction sessions ending at a
   * pivot, followed by an opposite move exceeding `reversalThreshold`.
   * Anchored on the pivot day.
   */
  detectReversals(points: PricePoint[], config: PatternDetectorConfig): TechnicalPattern[] {
    const minRun = config.reversalRunLength;
    const patterns: TechnicalPattern[] = [];

    for (let p = minRun; p < points.length - 1; p++) {
      const sign = Math.sign(points[p].close - points[p - 1].close);
      if (sign === 0) {
        continue;
      }

      let run = 1;
      while (
        p - run - 1 >= 0 &&
        Math.sign(points[p - run].close - points[p - run - 1].close) === sign
      ) {
        run++;
      }
      if (run < minRun) {
        continue;
      }

      const pivot = points[p];
      if (pivot.close <= 0) {
        continue;
      }
      const next = points[p + 1];
      const move = next.close / pivot.close - 1;
      if (Math.sign(move) !== -sign || Math.abs(move) <= config.reversalThreshold) {
        continue;
      }

      const bullish = move > 0;
      patterns.push(buildPattern({
        kind: 'REVERSAL',
        direction: bullish ? 'BULLISH' : 'BEARISH',
        startDate: points[p - run].date,
        endDate: next.date,
        anchorDate: pivot.date,
        magnitude: Math.abs(move),
        label: bullish ? 'Bullish Reversal' : 'Bearish Reversal',
        notes: `${run}-session ${sign > 0 ? 'advance' : 'decline'} into ${pivot.date} reversed by ${formatPercent(move)} the next session.`
      }));
    }

    return patterns;
  },

  /**
   * Net change across the whole series below `sidewaysThreshold`.
   * Anchored on the first date.
   */
  detectSidewaysRange(points: PricePoint[], config: PatternDetectorConfig): TechnicalPattern[] {
    if (points.length < 3) {
      return [];
    }

    const first = points[0];
    const last = points[points.length - 1];
    if (first.close <= 0) {
      return [];
    }

    const change = last.close / first.close - 1;
    if (Math.abs(change) >= config.sidewaysThreshold) {
      return [];
    }

    return [buildPattern({
      kind: 'SIDEWAYS_RANGE',
      direction: 'NEUTRAL',
      startDate: first.date,
      endDate: last.date,
      anchorDate: first.date,
      magnitude: Math.abs(change),
      label: 'Sideways / Range-Bound',
      notes: `Net change of ${formatPercent(change)} over the period points to a mostly range-bound market.`
    })];
  }
};
