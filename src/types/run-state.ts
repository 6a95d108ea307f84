/**
 * Workflow run state types
 */

import { DateRange } from './date-range';
import { NewsArticle } from './news';
import { SentimentRecord } from './sentiment';
import { PriceSeries } from './price';
import { TechnicalPattern } from './pattern';
import { CorrelationRecord } from './correlation';
import { Report } from './report';
import { ExtractionErrorKind } from './errors';

export type RunStatus =
  | 'INIT'
  | 'NEWS_FETCHED'
  | 'SENTIMENT_EXTRACTED'
  | 'PRICES_FETCHED'
  | 'PATTERNS_DETECTED'
  | 'CORRELATED'
  | 'REPORTED'
  | 'DONE'
  | 'FAILED';

/** Statuses a stage can advance into (everything but INIT and FAILED) */
export type StageStatus = Exclude<RunStatus, 'INIT' | 'FAILED'>;

export interface RunFailure {
  /** The status the run was trying to enter */
  stage: StageStatus;
  errorName: string;
  reason: string;
}

export interface ExtractionFailure {
  articleId: string;
  kind: ExtractionErrorKind;
  attempts: number;
  reason: string;
}

/**
 * One field per stage output. Owned by a single orchestrator run.
 */
export interface RunState {
  readonly runId: string;
  readonly ticker: string;
  readonly dateRange: DateRange;
  readonly status: RunStatus;
  readonly articles: readonly NewsArticle[];
  readonly sentiments: readonly SentimentRecord[];
  readonly extractionFailures: readonly ExtractionFailure[];
  readonly priceSeries: PriceSeries | null;
  readonly patterns: readonly TechnicalPattern[];
  readonly correlations: readonly CorrelationRecord[];
  readonly uncorrelatedSentiments: readonly SentimentRecord[];
  readonly uncorrelatedPatterns: readonly TechnicalPattern[];
  readonly report: Report | null;
  readonly warnings: readonly string[];
  /** Set once an optional stage output came back empty */
  readonly degraded: boolean;
  readonly failure: RunFailure | null;
}

/**
 * Immutable output of one stage, folded into RunState by the orchestrator
 */
export type StageDelta =
  | { status: 'NEWS_FETCHED'; articles: NewsArticle[]; warnings: string[]; degraded: boolean }
  | {
      status: 'SENTIMENT_EXTRACTED';
      sentiments: SentimentRecord[];
      extractionFailures: ExtractionFailure[];
      warnings: string[];
      degraded: boolean;
    }
  | { status: 'PRICES_FETCHED'; priceSeries: PriceSeries; warnings: string[] }
  | { status: 'PATTERNS_DETECTED'; patterns: TechnicalPattern[]; warnings: string[]; degraded: boolean }
  | {
      status: 'CORRELATED';
      correlations: CorrelationRecord[];
      uncorrelatedSentiments: SentimentRecord[];
      uncorrelatedPatterns: TechnicalPattern[];
    }
  | { status: 'REPORTED'; report: Report }
  | { status: 'DONE' }
  | { status: 'FAILED'; failure: RunFailure };

export interface RunRequest {
  ticker: string;
  startDate: string;
  endDate: string;
}

export type RunOutcome =
  | { status: 'DONE'; report: Report; warnings: string[]; state: RunState }
  | { status: 'FAILED'; failure: RunFailure; warnings: string[]; state: RunState };

/**
 * Optional persistence of finished runs for inspection
 */
export interface RunSnapshotStore {
  saveSnapshot(state: RunState): Promise<void>;
}
