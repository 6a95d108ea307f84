/**
 * Technical pattern types
 */

export type PatternKind =
  | 'BULLISH_MOVE'
  | 'BEARISH_MOVE'
  | 'BREAKOUT'
  | 'REVERSAL'
  | 'SIDEWAYS_RANGE';

export type PatternDirection = 'BULLISH' | 'BEARISH' | 'NEUTRAL';

export interface TechnicalPattern {
  patternId: string;
  kind: PatternKind;
  direction: PatternDirection;
  startDate: string;
  endDate: string;
  /** Date the pattern is attributed to for correlation */
  anchorDate: string;
  /** Absolute fractional price change behind the pattern */
  magnitude: number;
  label: string;
  notes: string;
}

export interface PatternDetectorConfig {
  moveWindowDays: number;
  moveThreshold: number;
  breakoutLookbackDays: number;
  breakoutThreshold: number;
  reversalRunLength: number;
  reversalThreshold: number;
  sidewaysThreshold: number;
  detectSideways: boolean;
}
