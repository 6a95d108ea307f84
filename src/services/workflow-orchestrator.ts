/**
 * Workflow Orchestrator
 *
 * Drives one explanation run through an explicit state machine:
 *
 *   INIT -> NEWS_FETCHED -> SENTIMENT_EXTRACTED -> PRICES_FETCHED
 *        -> PATTERNS_DETECTED -> CORRELATED -> REPORTED -> DONE
 *
 * with FAILED reachable from any non-terminal state. Stages return
 * immutable deltas; only applyDelta changes the run status. The
 * orchestrator is the single writer of RunState.
 */

import { DateRange } from '../types/date-range';
import { MarketDataSource } from '../types/price';
import { NewsArticle, NewsSource } from '../types/news';
import { ArticleExtractor, SentimentRecord, StructuredAnalyzer } from '../types/sentiment';
import {
  ExtractionFailure,
  RunFailure,
  RunOutcome,
  RunRequest,
  RunSnapshotStore,
  RunState,
  RunStatus,
  StageDelta,
  StageStatus
} from '../types/run-state';
import { PipelineConfig } from '../types/config';
import { PipelineLogger } from '../types/logger';
import { FetchError, InsufficientDataError, InvalidTransitionError } from '../types/errors';
import { PriceSeriesService } from './price-series';
import { PatternDetectorService } from './pattern-detector';
import { CorrelationEngineService } from './correlation-engine';
import { ReportGeneratorService } from './report-generator';
import { SentimentExtractor } from './sentiment-extractor';
import { runPool } from './worker-pool';
import {
  PipelineConfigOverrides,
  assertValidPipelineConfig,
  resolvePipelineConfig,
  validateRunRequest
} from './config';
import { raceWithSignal, timeoutController } from '../utils/async';
import { consoleLogger } from '../utils/logger';
import { generateUUID } from '../utils/uuid';

type ActiveStatus = Exclude<RunStatus, 'DONE' | 'FAILED'>;

const NEXT_STATUS: Record<ActiveStatus, StageStatus> = {
  INIT: 'NEWS_FETCHED',
  NEWS_FETCHED: 'SENTIMENT_EXTRACTED',
  SENTIMENT_EXTRACTED: 'PRICES_FETCHED',
  PRICES_FETCHED: 'PATTERNS_DETECTED',
  PATTERNS_DETECTED: 'CORRELATED',
  CORRELATED: 'REPORTED',
  REPORTED: 'DONE'
};

function isActive(status: RunStatus): status is ActiveStatus {
  return status !== 'DONE' && status !== 'FAILED';
}

export function createInitialState(runId: string, ticker: string, dateRange: DateRange): RunState {
  return {
    runId,
    ticker,
    dateRange,
    status: 'INIT',
    articles: [],
    sentiments: [],
    extractionFailures: [],
    priceSeries: null,
    patterns: [],
    correlations: [],
    uncorrelatedSentiments: [],
    uncorrelatedPatterns: [],
    report: null,
    warnings: [],
    degraded: false,
    failure: null
  };
}

/**
 * Fold a stage delta into a new RunState.
 *
 * Accepts only the exact next status, or FAILED from a non-terminal status;
 * anything else throws InvalidTransitionError.
 */
export function applyDelta(state: RunState, delta: StageDelta): RunState {
  if (!isActive(state.status)) {
    throw new InvalidTransitionError(state.status, delta.status);
  }
  if (delta.status !== 'FAILED' && NEXT_STATUS[state.status] !== delta.status) {
    throw new InvalidTransitionError(state.status, delta.status);
  }

  switch (delta.status) {
    case 'NEWS_FETCHED':
      return {
        ...state,
        status: delta.status,
        articles: delta.articles,
        warnings: [...state.warnings, ...delta.warnings],
        degraded: state.degraded || delta.degraded
      };
    case 'SENTIMENT_EXTRACTED':
      return {
        ...state,
        status: delta.status,
        sentiments: delta.sentiments,
        extractionFailures: delta.extractionFailures,
        warnings: [...state.warnings, ...delta.warnings],
        degraded: state.degraded || delta.degraded
      };
    case 'PRICES_FETCHED':
      return {
        ...state,
        status: delta.status,
        priceSeries: delta.priceSeries,
        warnings: [...state.warnings, ...delta.warnings]
      };
    case 'PATTERNS_DETECTED':
      return {
        ...state,
        status: delta.status,
        patterns: delta.patterns,
        warnings: [...state.warnings, ...delta.warnings],
        degraded: state.degraded || delta.degraded
      };
    case 'CORRELATED':
      return {
        ...state,
        status: delta.status,
        correlations: delta.correlations,
        uncorrelatedSentiments: delta.uncorrelatedSentiments,
        uncorrelatedPatterns: delta.uncorrelatedPatterns
      };
    case 'REPORTED':
      return { ...state, status: delta.status, report: delta.report };
    case 'DONE':
      return { ...state, status: delta.status };
    case 'FAILED':
      return { ...state, status: delta.status, failure: delta.failure };
  }
}

function failed(stage: StageStatus, error: unknown): StageDelta {
  const failure: RunFailure = error instanceof Error
    ? { stage, errorName: error.name, reason: error.message }
    : { stage, errorName: 'Error', reason: String(error) };
  return { status: 'FAILED', failure };
}

export interface WorkflowDependencies {
  newsSource: NewsSource;
  marketData: MarketDataSource;
  /** Wrapped in a SentimentExtractor using the resolved extraction settings */
  analyzer: StructuredAnalyzer;
  config?: PipelineConfigOverrides;
  snapshotStore?: RunSnapshotStore;
  logger?: PipelineLogger;
  runIdFactory?: () => string;
}

type Stage = (state: RunState) => Promise<StageDelta>;

export class WorkflowOrchestrator {
  readonly config: PipelineConfig;
  private readonly newsSource: NewsSource;
  private readonly marketData: MarketDataSource;
  private readonly extractor: ArticleExtractor;
  private readonly snapshotStore?: RunSnapshotStore;
  private readonly logger: PipelineLogger;
  private readonly runIdFactory: () => string;

  /**
   * @throws ConfigurationError when the resolved configuration is invalid
   */
  constructor(deps: WorkflowDependencies) {
    this.config = assertValidPipelineConfig(resolvePipelineConfig(deps.config));
    this.newsSource = deps.newsSource;
    this.marketData = deps.marketData;
    this.snapshotStore = deps.snapshotStore;
    this.logger = deps.logger ?? consoleLogger;
    this.extractor = new SentimentExtractor(deps.analyzer, {
      maxRetries: this.config.extraction.maxRetries,
      retryDelayMs: this.config.extraction.retryDelayMs,
      logger: this.logger
    });
    this.runIdFactory = deps.runIdFactory ?? generateUUID;
  }

  /**
   * Execute one run to a terminal state.
   *
   * @throws ConfigurationError for an invalid request; every later problem
   *         ends the run as FAILED instead
   */
  async run(request: RunRequest): Promise<RunOutcome> {
    const dateRange = validateRunRequest(request);
    const ticker = request.ticker.trim().toUpperCase();

    let state = createInitialState(this.runIdFactory(), ticker, dateRange);
    this.logger.info('Run started', { runId: state.runId, ticker, ...dateRange });

    const runTimeout = timeoutController(this.config.runTimeoutMs);
    const stages: Stage[] = [
      s => this.fetchNews(s, runTimeout.controller.signal),
      s => this.extractSentiment(s, runTimeout.controller.signal),
      s => this.fetchPrices(s),
      s => this.detectPatterns(s),
      s => this.correlate(s),
      s => this.generateReport(s),
      async () => ({ status: 'DONE' })
    ];

    try {
      for (const stage of stages) {
        if (!isActive(state.status)) {
          break;
        }
        const target = NEXT_STATUS[state.status];
        let delta: StageDelta;
        try {
          delta = await stage(state);
        } catch (error) {
          delta = failed(target, error);
        }
        state = this.advance(state, delta);
      }
    } finally {
      runTimeout.dispose();
    }

    await this.persist(state);
    return this.toOutcome(state);
  }

  private advance(state: RunState, delta: StageDelta): RunState {
    const next = applyDelta(state, delta);
    for (const warning of next.warnings.slice(state.warnings.length)) {
      this.logger.warn(warning, { runId: state.runId });
    }
    if (next.status === 'FAILED') {
      this.logger.error('Run failed', { runId: state.runId, from: state.status, failure: next.failure });
    } else {
      this.logger.info('Run advanced', { runId: state.runId, from: state.status, to: next.status });
    }
    return next;
  }

  /**
   * Empty optional output: degrade with a warning, or fail when degraded
   * runs are not allowed
   */
  private degradeOrFail(stage: StageStatus, message: string): { warning: string } | StageDelta {
    if (!this.config.allowDegraded) {
      return failed(stage, new InsufficientDataError(message));
    }
    return { warning: message };
  }

  private async fetchNews(state: RunState, signal: AbortSignal): Promise<StageDelta> {
    const warnings: string[] = [];
    let articles: NewsArticle[] = [];

    try {
      const outcome = await raceWithSignal(
        this.newsSource.fetchNews(state.ticker, state.dateRange, signal),
        signal
      );
      if (outcome.completed) {
        articles = outcome.value;
      } else {
        warnings.push(`News fetch timed out after ${this.config.runTimeoutMs}ms`);
      }
    } catch (error) {
      warnings.push(`News fetch failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    let degraded = false;
    if (articles.length === 0) {
      const result = this.degradeOrFail(
        'NEWS_FETCHED',
        `No news articles found for ${state.ticker} between ${state.dateRange.startDate} and ${state.dateRange.endDate}`
      );
      if ('status' in result) {
        return result;
      }
      warnings.push(result.warning);
      degraded = true;
    }

    return { status: 'NEWS_FETCHED', articles, warnings, degraded };
  }

  private async extractSentiment(state: RunState, signal: AbortSignal): Promise<StageDelta> {
    const warnings: string[] = [];
    const sentiments: SentimentRecord[] = [];
    const extractionFailures: ExtractionFailure[] = [];
    let degraded = false;

    if (state.articles.length > 0) {
      const outcomes = await runPool(
        state.articles,
        (article, _index, taskSignal) => this.extractor.extract(article, taskSignal),
        { concurrency: this.config.extraction.concurrency, signal }
      );

      let abandoned = 0;
      outcomes.forEach((outcome, index) => {
        const articleId = state.articles[index].articleId;
        if (outcome.status === 'ABANDONED') {
          abandoned++;
          extractionFailures.push({ articleId, kind: 'ABORTED', attempts: 0, reason: 'Abandoned at run timeout' });
        } else if (outcome.status === 'REJECTED') {
          const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
          extractionFailures.push({ articleId, kind: 'PROVIDER_ERROR', attempts: 0, reason });
          warnings.push(`Sentiment extraction failed for ${articleId}: ${reason}`);
        } else if (outcome.value.ok) {
          sentiments.push(outcome.value.record);
        } else {
          const { error } = outcome.value;
          extractionFailures.push({ articleId, kind: error.kind, attempts: error.attempts, reason: error.message });
          if (error.kind === 'ABORTED') {
            abandoned++;
          } else {
            warnings.push(
              `Sentiment extraction failed for ${articleId} (${error.kind} after ${error.attempts} attempt(s)): ${error.message}`
            );
          }
        }
      });

      if (signal.aborted) {
        warnings.push(
          `Run timeout of ${this.config.runTimeoutMs}ms reached during sentiment extraction; ` +
          `${abandoned} article(s) abandoned`
        );
        degraded = true;
      }

      if (sentiments.length === 0) {
        const result = this.degradeOrFail(
          'SENTIMENT_EXTRACTED',
          `No sentiment records could be extracted from ${state.articles.length} article(s)`
        );
        if ('status' in result) {
          return result;
        }
        warnings.push(result.warning);
        degraded = true;
      }
    }

    return { status: 'SENTIMENT_EXTRACTED', sentiments, extractionFailures, warnings, degraded };
  }

  private async fetchPrices(state: RunState): Promise<StageDelta> {
    const timeoutMs = this.config.priceFetchTimeoutMs;
    const { controller, dispose } = timeoutController(timeoutMs);

    try {
      const outcome = await raceWithSignal(
        this.marketData.fetchPrices(state.ticker, state.dateRange, controller.signal),
        controller.signal
      );
      if (!outcome.completed) {
        return failed('PRICES_FETCHED', new FetchError(`Price fetch timed out after ${timeoutMs}ms`, 'PRICES'));
      }

      const { series, warnings } = PriceSeriesService.normalize(state.ticker, outcome.value, state.dateRange);
      if (series.points.length === 0) {
        return failed(
          'PRICES_FETCHED',
          new InsufficientDataError(
            `No price data for ${state.ticker} between ${state.dateRange.startDate} and ${state.dateRange.endDate}`
          )
        );
      }

      return { status: 'PRICES_FETCHED', priceSeries: series, warnings };
    } catch (error) {
      const fetchError = error instanceof FetchError
        ? error
        : new FetchError(
            `Price fetch failed: ${error instanceof Error ? error.message : String(error)}`,
            'PRICES',
            undefined,
            error
          );
      return failed('PRICES_FETCHED', fetchError);
    } finally {
      dispose();
    }
  }

  private async detectPatterns(state: RunState): Promise<StageDelta> {
    if (!state.priceSeries) {
      return failed('PATTERNS_DETECTED', new InsufficientDataError('No price series to analyze'));
    }

    const patterns = PatternDetectorService.detect(state.priceSeries, this.config.patterns);
    if (patterns.length > 0) {
      return { status: 'PATTERNS_DETECTED', patterns, warnings: [], degraded: false };
    }

    const result = this.degradeOrFail(
      'PATTERNS_DETECTED',
      `No technical patterns detected in ${state.priceSeries.points.length} price point(s)`
    );
    if ('status' in result) {
      return result;
    }
    return { status: 'PATTERNS_DETECTED', patterns, warnings: [result.warning], degraded: true };
  }

  private async correlate(state: RunState): Promise<StageDelta> {
    const result = CorrelationEngineService.correlate(
      state.sentiments,
      state.patterns,
      this.config.correlationWindow,
      this.config.correlation
    );
    return { status: 'CORRELATED', ...result };
  }

  private async generateReport(state: RunState): Promise<StageDelta> {
    return { status: 'REPORTED', report: ReportGeneratorService.generate(state) };
  }

  private async persist(state: RunState): Promise<void> {
    if (!this.snapshotStore) {
      return;
    }
    try {
      await this.snapshotStore.saveSnapshot(state);
    } catch (error) {
      this.logger.error('Failed to save run snapshot', {
        runId: state.runId,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private toOutcome(state: RunState): RunOutcome {
    const warnings = [...state.warnings];
    if (state.status === 'DONE' && state.report) {
      return { status: 'DONE', report: state.report, warnings, state };
    }
    const failure: RunFailure = state.failure ?? {
      stage: 'DONE',
      errorName: 'PipelineError',
      reason: `Run stopped in ${state.status}`
    };
    return { status: 'FAILED', failure, warnings, state };
  }
}
