/**
 * Report types
 */

import { DateRange } from './date-range';
import { CorrelationRecord } from './correlation';
import { Polarity, SentimentRecord } from './sentiment';
import { PatternDirection, TechnicalPattern } from './pattern';

export interface ReportSection {
  heading: string;
  narrative: string;
  correlation: CorrelationRecord;
}

export interface ReportSummary {
  articleCount: number;
  sentimentCount: number;
  patternCount: number;
  correlationCount: number;
  polarityCounts: Record<Polarity, number>;
  directionCounts: Record<PatternDirection, number>;
  /** Share of correlations whose polarity matches the pattern direction; null without correlations */
  agreementRate: number | null;
  newsTone: string;
  marketTone: string;
  strongestLink: CorrelationRecord | null;
}

export interface Report {
  ticker: string;
  dateRange: DateRange;
  summary: ReportSummary;
  sections: ReportSection[];
  appendix: {
    uncorrelatedSentiments: SentimentRecord[];
    uncorrelatedPatterns: TechnicalPattern[];
  };
  warnings: string[];
}
