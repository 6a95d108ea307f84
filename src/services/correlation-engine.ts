/**
 * Correlation Engine Service
 *
 * Aligns sentiment events with technical patterns by time proximity:
 * - Stable sort of both streams by date
 * - Single linear sweep pairing each event with the patterns anchored inside
 *   [eventDate - lookbackDays, eventDate + lookaheadDays]
 * - Confidence decays with the day offset and is boosted or penalized by
 *   directional agreement
 * - Pairs under the confidence floor are dropped; unmatched events and
 *   patterns are returned separately
 */

import { SentimentRecord, Polarity } from '../types/sentiment';
import { PatternDirection, TechnicalPattern } from '../types/pattern';
import {
  Alignment,
  CorrelationConfig,
  CorrelationRecord,
  CorrelationResult,
  CorrelationWindow
} from '../types/correlation';
import { addDays, dayOffset } from '../utils/dates';
import { clamp, roundTo } from '../utils/format';

export const DEFAULT_CORRELATION_WINDOW: CorrelationWindow = {
  lookbackDays: 3,
  lookaheadDays: 3
};

export const DEFAULT_CORRELATION_CONFIG: CorrelationConfig = {
  minConfidence: 0.2,
  agreementBoost: 0.25,
  disagreementPenalty: 0.5
};

export function symmetricWindow(days: number): CorrelationWindow {
  return { lookbackDays: days, lookaheadDays: days };
}

const SIGN: Record<Polarity | PatternDirection, number> = {
  BULLISH: 1,
  BEARISH: -1,
  NEUTRAL: 0
};

/**
 * Sort by a string key, ties kept in input order
 */
function stableSortBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => {
      const ka = key(a.item);
      const kb = key(b.item);
      if (ka !== kb) {
        return ka < kb ? -1 : 1;
      }
      return a.index - b.index;
    })
    .map(entry => entry.item);
}

export const CorrelationEngineService = {
  /**
   * Correlate sentiment records with patterns.
   *
   * Correlations come out in sweep order: by event date, then by pattern
   * anchor date, ties in input order.
   */
  correlate(
    sentiments: readonly SentimentRecord[],
    patterns: readonly TechnicalPattern[],
    window: CorrelationWindow = DEFAULT_CORRELATION_WINDOW,
    overrides: Partial<CorrelationConfig> = {}
  ): CorrelationResult {
    const config: CorrelationConfig = { ...DEFAULT_CORRELATION_CONFIG, ...overrides };

    const sortedSentiments = stableSortBy(sentiments, s => s.eventDate);
    const sortedPatterns = stableSortBy(patterns, p => p.anchorDate);

    const correlations: CorrelationRecord[] = [];
    const matchedSentiments = new Set<SentimentRecord>();
    const matchedPatterns = new Set<TechnicalPattern>();

    let lower = 0;
    for (const sentiment of sortedSentiments) {
      const earliest = addDays(sentiment.eventDate, -window.lookbackDays);
      const latest = addDays(sentiment.eventDate, window.lookaheadDays);

      // Events are ascending, so patterns before this event's window are
      // before every later event's window too.
      while (lower < sortedPatterns.length && sortedPatterns[lower].anchorDate < earliest) {
        lower++;
      }

      for (let j = lower; j < sortedPatterns.length && sortedPatterns[j].anchorDate <= latest; j++) {
        const pattern = sortedPatterns[j];
        const record = this.scorePair(sentiment, pattern, window, config);
        if (record.confidence < config.minConfidence) {
          continue;
        }
        correlations.push(record);
        matchedSentiments.add(sentiment);
        matchedPatterns.add(pattern);
      }
    }

    return {
      correlations,
      uncorrelatedSentiments: sentiments.filter(s => !matchedSentiments.has(s)),
      uncorrelatedPatterns: patterns.filter(p => !matchedPatterns.has(p))
    };
  },

  /**
   * Score one candidate pair
   */
  scorePair(
    sentiment: SentimentRecord,
    pattern: TechnicalPattern,
    window: CorrelationWindow,
    config: CorrelationConfig
  ): CorrelationRecord {
    const offsetDays = dayOffset(sentiment.eventDate, pattern.anchorDate);
    const bound = offsetDays < 0 ? window.lookbackDays : window.lookaheadDays;
    const proximity = 1 - Math.abs(offsetDays) / (bound + 1);

    const alignment = this.alignment(sentiment.polarity, pattern.direction);
    const factor = alignment === 'AGREE'
      ? 1 + config.agreementBoost
      : alignment === 'OPPOSE'
        ? 1 - config.disagreementPenalty
        : 1;

    const confidence = roundTo(clamp(proximity * factor, 0, 1), 4);

    return {
      correlationId: `${sentiment.recordId}|${pattern.patternId}`,
      sentimentId: sentiment.recordId,
      articleId: sentiment.articleId,
      patternId: pattern.patternId,
      eventDate: sentiment.eventDate,
      anchorDate: pattern.anchorDate,
      offsetDays,
      confidence,
      strength: roundTo(confidence * sentiment.magnitude, 4),
      directionalAgreement: alignment === 'AGREE',
      alignment
    };
  },

  /**
   * AGREE when signs match (including neutral/neutral), OPPOSE when they are
   * opposite, NEUTRAL when exactly one side is neutral.
   */
  alignment(polarity: Polarity, direction: PatternDirection): Alignment {
    const a = SIGN[polarity];
    const b = SIGN[direction];
    if (a === b) {
      return 'AGREE';
    }
    return a * b === -1 ? 'OPPOSE' : 'NEUTRAL';
  }
};
