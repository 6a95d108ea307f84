/**
 * Sentiment/pattern correlation types
 */

import { SentimentRecord } from './sentiment';
import { TechnicalPattern } from './pattern';

export type Alignment = 'AGREE' | 'OPPOSE' | 'NEUTRAL';

export interface CorrelationRecord {
  correlationId: string;
  sentimentId: string;
  articleId: string;
  patternId: string;
  eventDate: string;
  anchorDate: string;
  /** anchorDate - eventDate in days; positive when the pattern follows the news */
  offsetDays: number;
  confidence: number;
  /** confidence weighted by sentiment magnitude */
  strength: number;
  directionalAgreement: boolean;
  alignment: Alignment;
}

export interface CorrelationWindow {
  lookbackDays: number;
  lookaheadDays: number;
}

export interface CorrelationConfig {
  minConfidence: number;
  agreementBoost: number;
  disagreementPenalty: number;
}

export interface CorrelationResult {
  correlations: CorrelationRecord[];
  uncorrelatedSentiments: SentimentRecord[];
  uncorrelatedPatterns: TechnicalPattern[];
}
